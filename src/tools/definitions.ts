import { Tool } from '@modelcontextprotocol/sdk/types.js';
import { DEFAULTS } from '../types/options.js';

/**
 * Verbosity parameter schema for tools
 */
const verbositySchema = {
    type: 'string',
    enum: ['minimal', 'standard', 'detailed'],
    description: "Response verbosity: 'minimal' (phrases only), 'standard' (default), 'detailed' (scores and pipeline statistics)",
};

const textArray = (description: string) => ({
    type: 'array',
    items: { type: 'string' },
    description,
});

const rangeProperties = {
    min_n: {
        type: 'integer',
        description: `Shortest n-gram length in tokens (default: ${DEFAULTS.minN})`,
    },
    max_n: {
        type: 'integer',
        description: `Longest n-gram length in tokens (default: ${DEFAULTS.maxN})`,
    },
    cross_sentences: {
        type: 'boolean',
        description: 'Let n-grams span sentence boundaries. Default: false.',
    },
};

export const TOOLS: Tool[] = [
    {
        name: 'tokenize',
        description: `Split text into lowercase word tokens the way the trawler counts them.

**When to use:** Checking how a phrase will be matched before scoring it.

**Example:**
  text: "Don't feed the trolls."
  → Returns: { tokens: ["don't", "feed", "the", "trolls"] }`,
        inputSchema: {
            type: 'object',
            properties: {
                text: { type: 'string', description: 'Text to tokenize' },
                lowercase: { type: 'boolean', description: 'Lowercase tokens. Default: true.' },
                split_sentences: {
                    type: 'boolean',
                    description: 'Return one token list per sentence. Default: false.',
                },
            },
            required: ['text'],
        },
    },
    {
        name: 'extract-ngrams',
        description: `Count recurring n-grams across a set of texts.

**When to use:** Exploring which long phrases repeat in a batch of model output.
**When NOT to use:** Ranking against human-written text (use trawl instead).`,
        inputSchema: {
            type: 'object',
            properties: {
                texts: textArray('Documents to count, one string each'),
                ...rangeProperties,
                min_count: { type: 'integer', description: 'Minimum total occurrences (default: 2)' },
                min_documents: { type: 'integer', description: 'Minimum number of documents containing the n-gram (default: 1)' },
                collapse: {
                    type: 'boolean',
                    description: 'Drop n-grams that only occur inside a longer, equally frequent one. Default: false.',
                },
                top: { type: 'integer', description: 'Number of n-grams to return (default: 50)' },
            },
            required: ['texts'],
        },
    },
    {
        name: 'score-novelty',
        description: `Score given phrases by how much more frequent they are in generated text than in reference text.

**Novelty** = (count in generated / generated windows) ÷ ((count in reference + smoothing) / (reference windows + smoothing))`,
        inputSchema: {
            type: 'object',
            properties: {
                phrases: textArray('Phrases to score'),
                generated: textArray('Model-generated documents'),
                reference: textArray('Human-written reference documents'),
                smoothing: { type: 'number', description: `Add-k smoothing for reference counts (default: ${DEFAULTS.smoothing})` },
                cross_sentences: rangeProperties.cross_sentences,
            },
            required: ['phrases', 'generated', 'reference'],
        },
    },
    {
        name: 'trawl',
        description: `Find emergent proverbs: long phrases that recur across generated documents but are rare or absent in the reference corpus.

**Pipeline:** count n-grams → keep recurring ones → fold fragments into the longest phrase → look up reference counts → rank by novelty.

**Example:**
  generated: [...model outputs...], reference: [...human text...]
  → Returns: { candidates: [{ ngram, count, referenceCount, novelty }] }`,
        inputSchema: {
            type: 'object',
            properties: {
                generated: textArray('Model-generated documents'),
                reference: textArray('Human-written reference documents'),
                ...rangeProperties,
                min_count: { type: 'integer', description: `Minimum total occurrences (default: ${DEFAULTS.minCount})` },
                min_documents: { type: 'integer', description: `Minimum documents containing the phrase (default: ${DEFAULTS.minDocuments})` },
                max_reference_count: { type: 'integer', description: 'Drop phrases seen more often than this in the reference' },
                min_novelty: { type: 'number', description: 'Drop phrases scoring below this novelty (default: 0)' },
                collapse: { type: 'boolean', description: 'Fold fragments into longer phrases. Default: true.' },
                limit: { type: 'integer', description: `Maximum candidates returned (default: ${DEFAULTS.limit})` },
                verbosity: verbositySchema,
            },
            required: ['generated', 'reference'],
        },
    },
];
