import { z } from 'zod';
import type { NgramEntry, TrawlResponse, Verbosity } from '../types/index.js';
import { DEFAULTS, createInvalidArgumentError } from '../types/index.js';
import { tokenize, tokenizeSegments } from '../text/tokenizer.js';
import { validateRange } from '../text/ngrams.js';
import { FrequencyTable } from '../counting/frequencyTable.js';
import { collapseSubsumed } from '../counting/subsumption.js';
import { ReferenceIndex } from '../reference/referenceIndex.js';
import { scoreCandidate, compareCandidates } from '../scoring/novelty.js';
import { trawl } from '../trawl/pipeline.js';
import { buildTrawlResponse, parseArgs } from './utils.js';

const verbositySchema = z.enum(['minimal', 'standard', 'detailed']).default('standard');
const count = z.number().int().nonnegative();

const rangeFields = {
    min_n: z.number().int().positive().default(DEFAULTS.minN),
    max_n: z.number().int().positive().default(DEFAULTS.maxN),
    cross_sentences: z.boolean().default(false),
};

export const tokenizeArgsSchema = z.object({
    text: z.string(),
    lowercase: z.boolean().default(true),
    split_sentences: z.boolean().default(false),
});

export const extractNgramsArgsSchema = z.object({
    texts: z.array(z.string()).min(1),
    ...rangeFields,
    min_count: count.default(2),
    min_documents: count.default(1),
    collapse: z.boolean().default(false),
    top: z.number().int().positive().default(50),
});

export const scoreNoveltyArgsSchema = z.object({
    phrases: z.array(z.string().min(1)).min(1),
    generated: z.array(z.string()).min(1),
    reference: z.array(z.string()),
    smoothing: z.number().positive().default(DEFAULTS.smoothing),
    cross_sentences: z.boolean().default(false),
});

export const trawlArgsSchema = z.object({
    generated: z.array(z.string()).min(1),
    reference: z.array(z.string()),
    ...rangeFields,
    min_count: count.default(DEFAULTS.minCount),
    min_documents: count.default(DEFAULTS.minDocuments),
    max_reference_count: count.optional(),
    min_novelty: z.number().nonnegative().default(0),
    collapse: z.boolean().default(true),
    limit: z.number().int().positive().default(DEFAULTS.limit),
    verbosity: verbositySchema,
});

export function tokenizeHandler(args: unknown): { tokens: string[] } | { sentences: string[][] } {
    const a = parseArgs(tokenizeArgsSchema, args, 'tokenize');
    if (a.split_sentences) {
        return { sentences: tokenizeSegments(a.text, { lowercase: a.lowercase }) };
    }
    return { tokens: tokenize(a.text, { lowercase: a.lowercase }) };
}

export interface ExtractNgramsResult {
    documents: number;
    tokens: number;
    distinct: number;
    ngrams: NgramEntry[];
}

export function extractNgramsHandler(args: unknown): ExtractNgramsResult {
    const a = parseArgs(extractNgramsArgsSchema, args, 'extract-ngrams');
    const table = new FrequencyTable(
        validateRange({ minN: a.min_n, maxN: a.max_n }),
        { crossSentences: a.cross_sentences }
    );
    for (const text of a.texts) {
        table.addDocument(text);
    }
    const distinct = table.size;
    table.prune({ minCount: a.min_count, minDocuments: a.min_documents });

    const entries = a.collapse ? collapseSubsumed(table.entries()).kept : table.entries();
    const keep = new Set(entries.map(e => e.ngram));

    return {
        documents: table.documentCount,
        tokens: table.tokenCount,
        distinct,
        ngrams: table.top(a.top, e => keep.has(e.ngram)),
    };
}

/**
 * Score explicit phrases: their counts come from the generated texts, the
 * reference texts supply the comparison.
 */
export function scoreNoveltyHandler(args: unknown) {
    const a = parseArgs(scoreNoveltyArgsSchema, args, 'score-novelty');
    const tokenizeOptions = { crossSentences: a.cross_sentences };
    const phrases = a.phrases.map(p => tokenize(p).join(' '));
    const empty = a.phrases.find((_, i) => phrases[i] === '');
    if (empty !== undefined) {
        throw createInvalidArgumentError('phrases', empty, 'phrases containing at least one word');
    }

    const lengths = phrases.map(p => p.split(' ').length);
    const range = validateRange({ minN: Math.min(...lengths), maxN: Math.max(...lengths) });

    const generated = new ReferenceIndex({ range, targets: phrases, tokenize: tokenizeOptions });
    const reference = new ReferenceIndex({ range, targets: phrases, tokenize: tokenizeOptions });
    a.generated.forEach(t => generated.addDocument(t));
    a.reference.forEach(t => reference.addDocument(t));

    if (generated.tokenCount === 0) {
        throw createInvalidArgumentError('generated', '[]', 'texts containing at least one word');
    }
    const tooLong = a.phrases.find((_, i) => generated.windowTotal(lengths[i]) === 0);
    if (tooLong !== undefined) {
        throw createInvalidArgumentError('phrases', tooLong, 'phrases no longer than the longest generated text');
    }

    const scored = phrases.map((ngram, i) => scoreCandidate(
        { ngram, n: lengths[i], count: generated.frequency(ngram), documents: 0 },
        generated,
        reference,
        a.smoothing
    ));

    return {
        phrases: scored
            .sort(compareCandidates)
            .map(({ documents: _documents, ...rest }) => rest),
    };
}

export async function trawlHandler(args: unknown): Promise<TrawlResponse> {
    const a = parseArgs(trawlArgsSchema, args, 'trawl');
    const report = await trawl(a.generated, a.reference, {
        range: { minN: a.min_n, maxN: a.max_n },
        tokenize: { crossSentences: a.cross_sentences },
        minCount: a.min_count,
        minDocuments: a.min_documents,
        maxReferenceCount: a.max_reference_count,
        minNovelty: a.min_novelty,
        collapse: a.collapse,
        limit: a.limit,
    });
    const verbosity: Verbosity = a.verbosity;
    return buildTrawlResponse(report, verbosity);
}
