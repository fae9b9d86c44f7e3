import type { NgramEntry, SubsumedEntry } from '../types/responses.js';
import { NGRAM_SEPARATOR, ngramKey } from '../text/ngrams.js';

export interface CollapseResult<T extends NgramEntry> {
    kept: T[];
    subsumed: Array<T & Pick<SubsumedEntry, 'subsumedBy'>>;
}

/**
 * Drop candidates that never occur outside a longer candidate.
 *
 * A sliding window over a recurring 12-word phrase also produces recurring
 * 8-, 9-, 10- and 11-word fragments with the same count; only the full phrase
 * is interesting. An entry is subsumed when a longer candidate contains it and
 * occurs at least as often.
 */
export function collapseSubsumed<T extends NgramEntry>(entries: readonly T[]): CollapseResult<T> {
    const byKey = new Map<string, T>();
    const lengths = new Set<number>();
    for (const entry of entries) {
        byKey.set(entry.ngram, entry);
        lengths.add(entry.n);
    }

    const longestFirst = [...entries].sort((a, b) => b.n - a.n || b.count - a.count);
    const subsumedBy = new Map<string, string>();

    for (const outer of longestFirst) {
        const tokens = outer.ngram.split(NGRAM_SEPARATOR);
        for (let m = outer.n - 1; m >= 1; m--) {
            if (!lengths.has(m)) continue;
            for (let i = 0; i + m <= tokens.length; i++) {
                const key = ngramKey(tokens.slice(i, i + m));
                if (subsumedBy.has(key)) continue;
                const inner = byKey.get(key);
                if (inner && inner.count <= outer.count) {
                    subsumedBy.set(key, outer.ngram);
                }
            }
        }
    }

    const kept: T[] = [];
    const subsumed: CollapseResult<T>['subsumed'] = [];
    for (const entry of entries) {
        const parent = subsumedBy.get(entry.ngram);
        if (parent === undefined) {
            kept.push(entry);
        } else {
            subsumed.push({ ...entry, subsumedBy: parent });
        }
    }
    return { kept, subsumed };
}
