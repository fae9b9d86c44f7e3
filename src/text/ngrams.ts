import type { NgramRange } from '../types/options.js';
import { DEFAULTS } from '../types/options.js';
import { createInvalidArgumentError } from '../types/errors.js';

export const NGRAM_SEPARATOR = ' ';

export const DEFAULT_RANGE: NgramRange = { minN: DEFAULTS.minN, maxN: DEFAULTS.maxN };

export function ngramKey(tokens: readonly string[]): string {
    return tokens.join(NGRAM_SEPARATOR);
}

export function ngramLength(key: string): number {
    return key === '' ? 0 : key.split(NGRAM_SEPARATOR).length;
}

function assertWindowSize(name: string, n: number): void {
    if (!Number.isInteger(n) || n < 1) {
        throw createInvalidArgumentError(name, n, 'a positive integer');
    }
}

export function validateRange(range: NgramRange): NgramRange {
    assertWindowSize('minN', range.minN);
    assertWindowSize('maxN', range.maxN);
    if (range.maxN < range.minN) {
        throw createInvalidArgumentError('maxN', range.maxN, `an integer >= minN (${range.minN})`);
    }
    return range;
}

/**
 * Keys of every window of exactly n tokens, in position order.
 */
export function slidingWindow(tokens: readonly string[], n: number): string[] {
    assertWindowSize('n', n);
    const windows: string[] = [];
    for (let i = 0; i + n <= tokens.length; i++) {
        windows.push(ngramKey(tokens.slice(i, i + n)));
    }
    return windows;
}

/**
 * Windows for every length in the range, ascending n.
 */
export function* generateNgrams(tokens: readonly string[], range: NgramRange = DEFAULT_RANGE): Generator<string> {
    validateRange(range);
    const longest = Math.min(range.maxN, tokens.length);
    for (let n = range.minN; n <= longest; n++) {
        yield* slidingWindow(tokens, n);
    }
}

/**
 * True when `inner` occurs as a contiguous run of tokens inside `outer`.
 */
export function containsNgram(outer: string, inner: string): boolean {
    if (outer === inner) return true;
    const padded = NGRAM_SEPARATOR + outer + NGRAM_SEPARATOR;
    return padded.includes(NGRAM_SEPARATOR + inner + NGRAM_SEPARATOR);
}
