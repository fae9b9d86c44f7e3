/**
 * proverb-trawl - Library Entry Point
 *
 * Exports the core functionality for use in other projects.
 * This file should NOT import @modelcontextprotocol/sdk or any other
 * server-specific dependencies.
 */

// Text
export { tokenize, tokenizeSegments, splitSentences, normalizeText } from './text/tokenizer.js';
export {
    slidingWindow,
    generateNgrams,
    ngramKey,
    ngramLength,
    containsNgram,
    validateRange,
    DEFAULT_RANGE,
} from './text/ngrams.js';

// Counting
export { FrequencyTable, compareByCount } from './counting/frequencyTable.js';
export { collapseSubsumed } from './counting/subsumption.js';
export type { CollapseResult } from './counting/subsumption.js';
export type { Snapshot, FrequencySnapshot, ReferenceSnapshot } from './counting/snapshot.js';

// Reference corpus
export { ReferenceIndex } from './reference/referenceIndex.js';
export type { ReferenceIndexOptions, DocumentSource } from './reference/referenceIndex.js';
export { FileSnapshotStorage } from './reference/storage.js';
export type { SnapshotStorage } from './reference/storage.js';

// Scoring and pipeline
export { noveltyScore, ratePerMillion, scoreCandidate, compareCandidates } from './scoring/novelty.js';
export { trawl } from './trawl/pipeline.js';

// Corpus files
export { readDocuments, readAllDocuments, inferFormat } from './corpus/loader.js';
export type { CorpusFormat } from './corpus/loader.js';

// Generation
export { CorpusGenerator } from './generation/generator.js';
export { JsonCorpusStore, uniqueInOrder } from './generation/store.js';
export type { CorpusStore } from './generation/store.js';
export { PROVERB_SYSTEM_PROMPT, PROVERB_USER_PROMPT } from './generation/prompts.js';
export { StandardLLMProvider } from './llm/provider.js';

// Configuration
export { loadConfig } from './config.js';
export type { TrawlConfig } from './config.js';

// Types and Interfaces
export * from './types/index.js';
