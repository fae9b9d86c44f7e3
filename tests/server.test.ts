/**
 * Tests for MCP tool dispatch and the tool handlers
 */

import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { callTool, createServer } from '../src/server.js';
import { TOOLS } from '../src/tools/definitions.js';
import { extractNgramsHandler, scoreNoveltyHandler, tokenizeHandler } from '../src/handlers/trawl.js';
import { TrawlException } from '../src/types/errors.js';
import { GENERATED, NEW_PROVERB, OLD_PROVERB, REFERENCE } from './fixtures.js';

function payload(result: CallToolResult): unknown {
    const [first] = result.content;
    if (first?.type !== 'text') {
        throw new Error('expected text content');
    }
    return JSON.parse(first.text);
}

describe('tool definitions', () => {
    test('every tool has a handler', async () => {
        expect(TOOLS.map(t => t.name)).toEqual(['tokenize', 'extract-ngrams', 'score-novelty', 'trawl']);
        for (const tool of TOOLS) {
            const result = await callTool(tool.name, {});
            expect(payload(result)).not.toMatchObject({ code: 'UNKNOWN_TOOL' });
        }
    });

    test('server can be created', () => {
        expect(createServer()).toBeDefined();
    });
});

describe('callTool', () => {
    test('reports unknown tools as errors', async () => {
        const result = await callTool('nope', {});
        expect(result.isError).toBe(true);
        expect(payload(result)).toEqual({ code: 'UNKNOWN_TOOL', message: 'Unknown tool: nope' });
    });

    test('reports invalid arguments as errors', async () => {
        const result = await callTool('trawl', { generated: [], reference: [] });
        expect(result.isError).toBe(true);
        expect(payload(result)).toMatchObject({ code: 'INVALID_ARGUMENT' });
    });

    test('minimal trawl lists phrases only', async () => {
        const result = await callTool('trawl', { generated: GENERATED, reference: REFERENCE, verbosity: 'minimal' });
        expect(result.isError).toBeUndefined();
        expect(payload(result)).toEqual({ success: true, candidates: [NEW_PROVERB, OLD_PROVERB] });
    });

    test('standard trawl summarizes and scores', async () => {
        const result = await callTool('trawl', { generated: GENERATED, reference: REFERENCE });
        expect(payload(result)).toMatchObject({
            success: true,
            message: '2 of 2 candidate phrases returned from 6 generated documents',
            candidates: [
                { ngram: NEW_PROVERB, count: 3, referenceCount: 0 },
                { ngram: OLD_PROVERB, count: 3, referenceCount: 1 },
            ],
        });
    });

    test('detailed trawl includes pipeline statistics', async () => {
        const result = await callTool('trawl', { generated: GENERATED, reference: REFERENCE, verbosity: 'detailed' });
        expect(payload(result)).toMatchObject({
            statistics: { generatedDocuments: 6, afterPrune: 16, subsumed: 14, returned: 2 },
        });
    });

    test('says so when nothing is found', async () => {
        const result = await callTool('trawl', { generated: ['short text'], reference: [] });
        expect(payload(result)).toMatchObject({ message: 'No emergent phrases found in 1 documents', candidates: [] });
    });
});

describe('tokenizeHandler', () => {
    test('lowercases and keeps contractions', () => {
        expect(tokenizeHandler({ text: "Don't count chickens—before they hatch." })).toEqual({
            tokens: ["don't", 'count', 'chickens', 'before', 'they', 'hatch'],
        });
    });

    test('splits sentences on request', () => {
        expect(tokenizeHandler({ text: 'One two. Three four!', split_sentences: true })).toEqual({
            sentences: [['one', 'two'], ['three', 'four']],
        });
    });

    test('requires text', () => {
        expect(() => tokenizeHandler({})).toThrow(TrawlException);
    });
});

describe('extractNgramsHandler', () => {
    test('counts, prunes and ranks n-grams', () => {
        const result = extractNgramsHandler({ texts: ['a b c', 'a b d'], min_n: 2, max_n: 2 });
        expect(result).toEqual({
            documents: 2,
            tokens: 6,
            distinct: 3,
            ngrams: [{ ngram: 'a b', n: 2, count: 2, documents: 2 }],
        });
    });

    test('rejects an inverted range', () => {
        expect(() => extractNgramsHandler({ texts: ['a b'], min_n: 3, max_n: 2 })).toThrow(/maxN/);
    });
});

describe('scoreNoveltyHandler', () => {
    test('scores explicit phrases against the reference', () => {
        const { phrases } = scoreNoveltyHandler({
            phrases: [OLD_PROVERB, 'Every like is a loan against your future attention span'],
            generated: GENERATED,
            reference: REFERENCE,
        });

        expect(phrases.map(p => [p.ngram, p.count, p.referenceCount])).toEqual([
            [NEW_PROVERB, 3, 0],
            [OLD_PROVERB, 3, 1],
        ]);
        expect(phrases[0].novelty).toBeCloseTo(0.75);
        expect(phrases[1].novelty).toBeCloseTo(0.5);
        expect(phrases[0]).not.toHaveProperty('documents');
    });

    test('rejects phrases longer than every generated text', () => {
        expect(() => scoreNoveltyHandler({ phrases: ['One two three four'], generated: ['one two'], reference: [] }))
            .toThrow('Invalid phrases: One two three four (expected phrases no longer than the longest generated text)');
    });

    test('rejects phrases without words', () => {
        expect(() => scoreNoveltyHandler({ phrases: ['...'], generated: ['text'], reference: [] }))
            .toThrow(/phrases/);
    });
});
