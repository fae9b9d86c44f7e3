import type { NgramRange, PruneOptions, TokenizeOptions } from '../types/options.js';
import type { NgramEntry, NgramStats } from '../types/responses.js';
import { createInvalidArgumentError } from '../types/errors.js';
import { tokenizeSegments } from '../text/tokenizer.js';
import { DEFAULT_RANGE, ngramLength, slidingWindow, validateRange } from '../text/ngrams.js';
import {
    FrequencySnapshot,
    SNAPSHOT_VERSION,
    frequencySnapshotSchema,
    parseSnapshot,
    totalsFromRecord,
    totalsToRecord,
} from './snapshot.js';

/**
 * Count desc, then longer first, then alphabetical.
 */
export function compareByCount(a: NgramEntry, b: NgramEntry): number {
    return b.count - a.count
        || b.n - a.n
        || (a.ngram < b.ngram ? -1 : a.ngram > b.ngram ? 1 : 0);
}

/**
 * Frequency table of n-grams over a stream of documents.
 *
 * Tracks total occurrences and document frequency per key, plus the number
 * of windows seen per length so rates can be normalised later.
 */
export class FrequencyTable {
    readonly range: NgramRange;
    private readonly tokenizeOptions: TokenizeOptions;
    private readonly stats = new Map<string, NgramStats>();
    private readonly windowTotals = new Map<number, number>();
    private documents = 0;
    private tokens = 0;

    constructor(range: NgramRange = DEFAULT_RANGE, tokenizeOptions: TokenizeOptions = {}) {
        this.range = validateRange({ ...range });
        this.tokenizeOptions = tokenizeOptions;
    }

    get size(): number {
        return this.stats.size;
    }

    get documentCount(): number {
        return this.documents;
    }

    get tokenCount(): number {
        return this.tokens;
    }

    windowTotal(n: number): number {
        return this.windowTotals.get(n) ?? 0;
    }

    /**
     * Tokenize and count one document. Returns the number of windows counted.
     */
    addDocument(text: string): number {
        return this.countSegments(tokenizeSegments(text, this.tokenizeOptions));
    }

    /**
     * Count a single pre-tokenized document.
     */
    addTokens(tokens: readonly string[]): number {
        return this.countSegments(tokens.length > 0 ? [tokens] : []);
    }

    private countSegments(segments: readonly (readonly string[])[]): number {
        this.documents++;
        const seen = new Set<string>();
        let windows = 0;

        for (const segment of segments) {
            this.tokens += segment.length;
            const longest = Math.min(this.range.maxN, segment.length);
            for (let n = this.range.minN; n <= longest; n++) {
                const keys = slidingWindow(segment, n);
                this.windowTotals.set(n, this.windowTotal(n) + keys.length);
                windows += keys.length;

                for (const key of keys) {
                    let entry = this.stats.get(key);
                    if (!entry) {
                        entry = { count: 0, documents: 0 };
                        this.stats.set(key, entry);
                    }
                    entry.count++;
                    if (!seen.has(key)) {
                        seen.add(key);
                        entry.documents++;
                    }
                }
            }
        }
        return windows;
    }

    get(key: string): NgramStats | undefined {
        const entry = this.stats.get(key);
        return entry ? { ...entry } : undefined;
    }

    has(key: string): boolean {
        return this.stats.has(key);
    }

    count(key: string): number {
        return this.stats.get(key)?.count ?? 0;
    }

    keys(): IterableIterator<string> {
        return this.stats.keys();
    }

    entries(): NgramEntry[] {
        const result: NgramEntry[] = [];
        for (const [ngram, { count, documents }] of this.stats) {
            result.push({ ngram, n: ngramLength(ngram), count, documents });
        }
        return result;
    }

    top(k: number, filter?: (entry: NgramEntry) => boolean): NgramEntry[] {
        if (k <= 0) return [];
        const entries = filter ? this.entries().filter(filter) : this.entries();
        return entries.sort(compareByCount).slice(0, k);
    }

    /**
     * Remove keys below either threshold. Returns how many were removed.
     */
    prune(options: PruneOptions): number {
        const minCount = options.minCount ?? 0;
        const minDocuments = options.minDocuments ?? 0;
        let removed = 0;
        for (const [key, entry] of this.stats) {
            if (entry.count < minCount || entry.documents < minDocuments) {
                this.stats.delete(key);
                removed++;
            }
        }
        return removed;
    }

    merge(other: FrequencyTable): this {
        if (other.range.minN !== this.range.minN || other.range.maxN !== this.range.maxN) {
            throw createInvalidArgumentError(
                'range',
                `${other.range.minN}-${other.range.maxN}`,
                `${this.range.minN}-${this.range.maxN} to match the receiving table`
            );
        }
        for (const [key, entry] of other.stats) {
            const mine = this.stats.get(key);
            if (mine) {
                mine.count += entry.count;
                mine.documents += entry.documents;
            } else {
                this.stats.set(key, { ...entry });
            }
        }
        for (const [n, total] of other.windowTotals) {
            this.windowTotals.set(n, this.windowTotal(n) + total);
        }
        this.documents += other.documents;
        this.tokens += other.tokens;
        return this;
    }

    toSnapshot(): FrequencySnapshot {
        return {
            version: SNAPSHOT_VERSION,
            kind: 'frequency-table',
            range: { ...this.range },
            documentCount: this.documents,
            tokenCount: this.tokens,
            windowTotals: totalsToRecord(this.windowTotals),
            entries: [...this.stats].map(([key, e]) => [key, e.count, e.documents]),
        };
    }

    static fromSnapshot(data: unknown, tokenizeOptions: TokenizeOptions = {}): FrequencyTable {
        const snapshot = parseSnapshot(frequencySnapshotSchema, data);
        const table = new FrequencyTable(snapshot.range, tokenizeOptions);
        table.documents = snapshot.documentCount;
        table.tokens = snapshot.tokenCount;
        for (const [n, total] of totalsFromRecord(snapshot.windowTotals)) {
            table.windowTotals.set(n, total);
        }
        for (const [key, count, documents] of snapshot.entries) {
            table.stats.set(key, { count, documents });
        }
        return table;
    }
}
