/**
 * Shared type definitions for proverb-trawl
 */

// Re-export error types
export {
    TrawlException,
    isTrawlException,
    createInvalidArgumentError,
    createCorpusFormatError,
    createEmptyCorpusError,
    createStorageError,
    createSnapshotError,
    createLLMError,
    createConfigError,
    serializeTrawlError,
    createGenericError,
} from './errors.js';

export type {
    TrawlErrorCode,
    TrawlError,
} from './errors.js';

// Re-export response types
export type {
    Verbosity,
    NgramStats,
    NgramEntry,
    SubsumedEntry,
    ScoredCandidate,
    TrawlStats,
    TrawlReport,
    GenerationResult,
    MinimalTrawlResponse,
    StandardTrawlResponse,
    DetailedTrawlResponse,
    TrawlResponse,
} from './responses.js';

// Re-export options
export {
    DEFAULTS
} from './options.js';

export type {
    NgramRange,
    TokenizeOptions,
    PruneOptions,
    TrawlStage,
    TrawlOptions,
    GenerationOptions,
} from './options.js';

// Re-export LLM types
export type {
    LLMMessage,
    LLMResponse,
    LLMProvider,
    CompletionOptions,
} from './llm.js';
