
/**
 * Inclusive range of n-gram lengths.
 */
export interface NgramRange {
    minN: number;
    maxN: number;
}

export interface TokenizeOptions {
    /** Lowercase every token. Default: true */
    lowercase?: boolean;
    /** Drop tokens shorter than this many characters. Default: 1 */
    minTokenLength?: number;
    /** Let n-grams span sentence boundaries. Default: false */
    crossSentences?: boolean;
}

export interface PruneOptions {
    minCount?: number;
    minDocuments?: number;
}

export type TrawlStage = 'count' | 'prune' | 'collapse' | 'reference' | 'score';

export interface TrawlOptions extends PruneOptions {
    range?: NgramRange;
    tokenize?: TokenizeOptions;
    /** Drop candidates wholly contained in a longer, equally frequent one. Default: true */
    collapse?: boolean;
    /** Candidates seen more often than this in the reference are dropped. */
    maxReferenceCount?: number;
    minNovelty?: number;
    /** Add-k smoothing applied to reference counts. Default: 1 */
    smoothing?: number;
    limit?: number;
    onProgress?: (stage: TrawlStage, message: string) => void;
}

export interface GenerationOptions {
    total?: number;
    concurrency?: number;
    saveInterval?: number;
    temperature?: number;
    maxTokens?: number;
    systemPrompt?: string;
    userPrompt?: string;
    /**
     * Callback for progress updates.
     * @param completed Requests finished so far, successful or not.
     * @param remaining Requests issued in this run.
     */
    onProgress?: (completed: number, remaining: number) => void;
}

export const DEFAULTS = {
    minN: 8,
    maxN: 20,
    minCount: 3,
    minDocuments: 2,
    smoothing: 1,
    limit: 100,
    total: 1000,
    concurrency: 10,
    saveInterval: 50,
    temperature: 1.1,
    maxTokens: 60,
} as const;
