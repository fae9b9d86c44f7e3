import type { NgramEntry, ScoredCandidate } from '../types/responses.js';
import { DEFAULTS } from '../types/options.js';
import { createInvalidArgumentError } from '../types/errors.js';

const PER_MILLION = 1_000_000;

export interface NoveltyInput {
    generatedCount: number;
    generatedTotal: number;
    referenceCount: number;
    referenceTotal: number;
}

/**
 * Window totals for one n-gram length; both FrequencyTable and
 * ReferenceIndex satisfy this.
 */
export interface WindowCounts {
    windowTotal(n: number): number;
}

export function ratePerMillion(count: number, total: number): number {
    return total > 0 ? (count / total) * PER_MILLION : 0;
}

/**
 * Ratio of a phrase's rate in generated text to its add-k smoothed rate in
 * the reference corpus. An empty reference treats every phrase as absent.
 */
export function noveltyScore(input: NoveltyInput, smoothing: number = DEFAULTS.smoothing): number {
    if (!(input.generatedTotal > 0)) {
        throw createInvalidArgumentError('generatedTotal', input.generatedTotal, 'a positive number');
    }
    if (!(smoothing > 0)) {
        throw createInvalidArgumentError('smoothing', smoothing, 'a positive number');
    }
    const generatedRate = input.generatedCount / input.generatedTotal;
    const referenceRate = (input.referenceCount + smoothing) / (input.referenceTotal + smoothing);
    return generatedRate / referenceRate;
}

export function scoreCandidate(
    entry: NgramEntry,
    generated: WindowCounts,
    reference: WindowCounts & { frequency(key: string): number },
    smoothing: number = DEFAULTS.smoothing
): ScoredCandidate {
    const generatedTotal = generated.windowTotal(entry.n);
    const referenceTotal = reference.windowTotal(entry.n);
    const referenceCount = reference.frequency(entry.ngram);

    return {
        ngram: entry.ngram,
        n: entry.n,
        count: entry.count,
        documents: entry.documents,
        referenceCount,
        generatedRate: ratePerMillion(entry.count, generatedTotal),
        referenceRate: ratePerMillion(referenceCount + smoothing, referenceTotal + smoothing),
        novelty: noveltyScore({
            generatedCount: entry.count,
            generatedTotal,
            referenceCount,
            referenceTotal,
        }, smoothing),
        absentFromReference: referenceCount === 0,
    };
}

/**
 * Novelty desc, then count desc, then longer first, then alphabetical.
 */
export function compareCandidates(a: ScoredCandidate, b: ScoredCandidate): number {
    return b.novelty - a.novelty
        || b.count - a.count
        || b.n - a.n
        || (a.ngram < b.ngram ? -1 : a.ngram > b.ngram ? 1 : 0);
}
