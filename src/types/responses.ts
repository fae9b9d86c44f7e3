/**
 * Result and response types for proverb-trawl
 */

/**
 * Verbosity level for responses
 */
export type Verbosity = 'minimal' | 'standard' | 'detailed';

export interface NgramStats {
    count: number;
    documents: number;
}

export interface NgramEntry extends NgramStats {
    ngram: string;
    n: number;
}

export interface SubsumedEntry extends NgramEntry {
    subsumedBy: string;
}

/**
 * A candidate emergent proverb with its novelty measurements.
 */
export interface ScoredCandidate extends NgramEntry {
    referenceCount: number;
    /** Occurrences per million windows of the same length in the generated corpus */
    generatedRate: number;
    /** Smoothed occurrences per million windows in the reference corpus */
    referenceRate: number;
    novelty: number;
    absentFromReference: boolean;
}

export interface TrawlStats {
    generatedDocuments: number;
    generatedTokens: number;
    referenceDocuments: number;
    referenceTokens: number;
    distinctNgrams: number;
    afterPrune: number;
    subsumed: number;
    scored: number;
    returned: number;
    elapsedMs: number;
}

export interface TrawlReport {
    candidates: ScoredCandidate[];
    stats: TrawlStats;
}

export interface GenerationResult {
    requested: number;
    succeeded: number;
    failed: number;
    /** Items held after the run, duplicates included */
    total: number;
    /** Distinct items written to the store */
    unique: number;
    alreadyComplete: boolean;
    lastError?: string;
}

/**
 * Minimal response - just the phrases
 */
export interface MinimalTrawlResponse {
    success: boolean;
    candidates: string[];
}

/**
 * Standard response - phrases with counts and scores
 */
export interface StandardTrawlResponse {
    success: boolean;
    message: string;
    candidates: Array<Pick<ScoredCandidate, 'ngram' | 'count' | 'referenceCount' | 'novelty'>>;
}

/**
 * Detailed response - full candidates and pipeline statistics
 */
export interface DetailedTrawlResponse {
    success: boolean;
    message: string;
    candidates: ScoredCandidate[];
    statistics: TrawlStats;
}

export type TrawlResponse = MinimalTrawlResponse | StandardTrawlResponse | DetailedTrawlResponse;
