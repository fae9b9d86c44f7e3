import type { NgramRange, TokenizeOptions } from '../types/options.js';
import { tokenizeSegments } from '../text/tokenizer.js';
import { DEFAULT_RANGE, ngramLength, slidingWindow, validateRange } from '../text/ngrams.js';
import {
    ReferenceSnapshot,
    SNAPSHOT_VERSION,
    parseSnapshot,
    referenceSnapshotSchema,
    totalsFromRecord,
    totalsToRecord,
} from '../counting/snapshot.js';

export interface ReferenceIndexOptions {
    range?: NgramRange;
    /** Only these keys are counted. Omit to count every n-gram in range. */
    targets?: Iterable<string>;
    tokenize?: TokenizeOptions;
}

export type DocumentSource = Iterable<string> | AsyncIterable<string>;

/**
 * N-gram frequencies of a human-authored reference corpus.
 *
 * In targeted mode only the candidate phrases are tallied, so a large
 * reference corpus can be streamed through with memory proportional to the
 * candidate list. Window totals are always kept for every length in range.
 */
export class ReferenceIndex {
    readonly range: NgramRange;
    private readonly tokenizeOptions: TokenizeOptions;
    private readonly targets: Set<string> | null;
    private readonly counts = new Map<string, number>();
    private readonly windowTotals = new Map<number, number>();
    private documents = 0;
    private tokens = 0;

    constructor(options: ReferenceIndexOptions = {}) {
        this.tokenizeOptions = options.tokenize ?? {};
        if (options.targets) {
            this.targets = new Set(options.targets);
            this.range = options.range
                ? validateRange({ ...options.range })
                : rangeOfKeys(this.targets);
        } else {
            this.targets = null;
            this.range = validateRange({ ...(options.range ?? DEFAULT_RANGE) });
        }
    }

    get isTargeted(): boolean {
        return this.targets !== null;
    }

    get documentCount(): number {
        return this.documents;
    }

    get tokenCount(): number {
        return this.tokens;
    }

    get size(): number {
        return this.counts.size;
    }

    windowTotal(n: number): number {
        return this.windowTotals.get(n) ?? 0;
    }

    /**
     * True when `key` is counted by this index: always in full mode, only for
     * targets in targeted mode.
     */
    tracks(key: string): boolean {
        return this.targets === null || this.targets.has(key);
    }

    frequency(key: string): number {
        return this.counts.get(key) ?? 0;
    }

    addDocument(text: string): void {
        this.documents++;
        for (const segment of tokenizeSegments(text, this.tokenizeOptions)) {
            this.tokens += segment.length;
            const longest = Math.min(this.range.maxN, segment.length);
            for (let n = this.range.minN; n <= longest; n++) {
                const keys = slidingWindow(segment, n);
                this.windowTotals.set(n, this.windowTotal(n) + keys.length);
                for (const key of keys) {
                    if (this.targets && !this.targets.has(key)) continue;
                    this.counts.set(key, (this.counts.get(key) ?? 0) + 1);
                }
            }
        }
    }

    async addDocuments(source: DocumentSource): Promise<number> {
        let added = 0;
        for await (const text of source) {
            this.addDocument(text);
            added++;
        }
        return added;
    }

    toSnapshot(): ReferenceSnapshot {
        return {
            version: SNAPSHOT_VERSION,
            kind: 'reference-index',
            range: { ...this.range },
            documentCount: this.documents,
            tokenCount: this.tokens,
            windowTotals: totalsToRecord(this.windowTotals),
            ...(this.targets && { targets: [...this.targets] }),
            entries: [...this.counts],
        };
    }

    static fromSnapshot(data: unknown, tokenizeOptions: TokenizeOptions = {}): ReferenceIndex {
        const snapshot = parseSnapshot(referenceSnapshotSchema, data);
        const index = new ReferenceIndex({
            range: snapshot.range,
            targets: snapshot.targets,
            tokenize: tokenizeOptions,
        });
        index.documents = snapshot.documentCount;
        index.tokens = snapshot.tokenCount;
        for (const [n, total] of totalsFromRecord(snapshot.windowTotals)) {
            index.windowTotals.set(n, total);
        }
        for (const [key, count] of snapshot.entries) {
            index.counts.set(key, count);
        }
        return index;
    }
}

function rangeOfKeys(keys: Set<string>): NgramRange {
    if (keys.size === 0) return { ...DEFAULT_RANGE };
    let minN = Infinity;
    let maxN = 0;
    for (const key of keys) {
        const n = ngramLength(key);
        minN = Math.min(minN, n);
        maxN = Math.max(maxN, n);
    }
    return validateRange({ minN, maxN });
}
