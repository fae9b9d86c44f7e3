import type { TrawlOptions } from '../types/options.js';
import type { ScoredCandidate, TrawlReport } from '../types/responses.js';
import { DEFAULTS } from '../types/options.js';
import { createEmptyCorpusError, createInvalidArgumentError } from '../types/errors.js';
import { FrequencyTable } from '../counting/frequencyTable.js';
import { collapseSubsumed } from '../counting/subsumption.js';
import { DocumentSource, ReferenceIndex } from '../reference/referenceIndex.js';
import { DEFAULT_RANGE } from '../text/ngrams.js';
import { compareCandidates, scoreCandidate } from '../scoring/novelty.js';

function assertNonNegative(name: string, value: number | undefined): void {
    if (value !== undefined && !(value >= 0)) {
        throw createInvalidArgumentError(name, value, 'a non-negative number');
    }
}

/**
 * Trawl a generated corpus for emergent proverbs.
 *
 * Counts long n-grams in the generated documents, keeps those that recur
 * across documents, folds fragments into the longest recurring phrase, and
 * ranks what remains by how much more often it appears in generated text than
 * in the reference corpus.
 *
 * @param reference Reference documents, or an index built earlier (for instance
 *   loaded from a snapshot). A supplied index must cover the range, and a
 *   targeted one must track every candidate.
 */
export async function trawl(
    generated: DocumentSource,
    reference: DocumentSource | ReferenceIndex,
    options: TrawlOptions = {}
): Promise<TrawlReport> {
    const start = Date.now();
    const range = options.range ?? DEFAULT_RANGE;
    const minCount = options.minCount ?? DEFAULTS.minCount;
    const minDocuments = options.minDocuments ?? DEFAULTS.minDocuments;
    const smoothing = options.smoothing ?? DEFAULTS.smoothing;
    const limit = options.limit ?? DEFAULTS.limit;
    const maxReferenceCount = options.maxReferenceCount ?? Infinity;
    const minNovelty = options.minNovelty ?? 0;
    const progress = options.onProgress ?? (() => undefined);

    assertNonNegative('minCount', minCount);
    assertNonNegative('minDocuments', minDocuments);
    assertNonNegative('maxReferenceCount', maxReferenceCount);
    assertNonNegative('minNovelty', minNovelty);
    assertNonNegative('limit', limit);

    // 1. Count generated corpus
    const table = new FrequencyTable(range, options.tokenize);
    for await (const text of generated) {
        table.addDocument(text);
    }
    if (table.documentCount === 0) {
        throw createEmptyCorpusError();
    }
    const distinctNgrams = table.size;
    progress('count', `Counted ${distinctNgrams} distinct n-grams in ${table.documentCount} documents`);

    // 2. Keep recurring phrases
    table.prune({ minCount, minDocuments });
    const afterPrune = table.size;
    progress('prune', `${afterPrune} n-grams recur at least ${minCount} times in ${minDocuments} documents`);

    // 3. Fold fragments into their longest recurring phrase
    let candidates = table.entries();
    let subsumed = 0;
    if (options.collapse ?? true) {
        const collapsed = collapseSubsumed(candidates);
        candidates = collapsed.kept;
        subsumed = collapsed.subsumed.length;
        progress('collapse', `${subsumed} fragments folded into longer phrases`);
    }

    // 4. Reference lookup
    let index: ReferenceIndex;
    if (reference instanceof ReferenceIndex) {
        if (reference.range.minN > table.range.minN || reference.range.maxN < table.range.maxN) {
            throw createInvalidArgumentError(
                'reference index range',
                `${reference.range.minN}-${reference.range.maxN}`,
                `a range covering ${table.range.minN}-${table.range.maxN}`
            );
        }
        const supplied = reference;
        const untracked = candidates.find(c => !supplied.tracks(c.ngram));
        if (untracked) {
            throw createInvalidArgumentError(
                'reference index',
                'targeted',
                `an index tracking every candidate (missing "${untracked.ngram}")`
            );
        }
        index = reference;
    } else {
        index = new ReferenceIndex({
            range: table.range,
            targets: candidates.map(c => c.ngram),
            tokenize: options.tokenize,
        });
        await index.addDocuments(reference);
    }
    progress('reference', `Reference corpus: ${index.documentCount} documents, ${index.tokenCount} tokens`);

    // 5. Score and filter
    const scored: ScoredCandidate[] = candidates
        .map(entry => scoreCandidate(entry, table, index, smoothing))
        .filter(c => c.referenceCount <= maxReferenceCount && c.novelty >= minNovelty)
        .sort(compareCandidates);
    progress('score', `${scored.length} candidates scored`);

    const returned = scored.slice(0, limit);
    return {
        candidates: returned,
        stats: {
            generatedDocuments: table.documentCount,
            generatedTokens: table.tokenCount,
            referenceDocuments: index.documentCount,
            referenceTokens: index.tokenCount,
            distinctNgrams,
            afterPrune,
            subsumed,
            scored: scored.length,
            returned: returned.length,
            elapsedMs: Date.now() - start,
        },
    };
}
