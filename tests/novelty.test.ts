/**
 * Tests for novelty scoring
 */

import { compareCandidates, noveltyScore, ratePerMillion, scoreCandidate } from '../src/scoring/novelty.js';
import { TrawlException } from '../src/types/errors.js';
import type { ScoredCandidate } from '../src/types/responses.js';

describe('ratePerMillion', () => {
    test('scales counts to a per-million rate', () => {
        expect(ratePerMillion(5, 1_000_000)).toBe(5);
        expect(ratePerMillion(1, 1000)).toBeCloseTo(1000);
    });

    test('is zero for an empty total', () => {
        expect(ratePerMillion(1, 0)).toBe(0);
    });
});

describe('noveltyScore', () => {
    test('absent phrase scores the ratio against the smoothed floor', () => {
        const score = noveltyScore({ generatedCount: 10, generatedTotal: 1000, referenceCount: 0, referenceTotal: 999 });
        expect(score).toBeCloseTo(10);
    });

    test('equal rates score about one', () => {
        const score = noveltyScore({ generatedCount: 10, generatedTotal: 1000, referenceCount: 9, referenceTotal: 999 });
        expect(score).toBeCloseTo(1);
    });

    test('rarer in the reference means more novel', () => {
        const common = noveltyScore({ generatedCount: 5, generatedTotal: 500, referenceCount: 50, referenceTotal: 10_000 });
        const rare = noveltyScore({ generatedCount: 5, generatedTotal: 500, referenceCount: 1, referenceTotal: 10_000 });
        expect(rare).toBeGreaterThan(common);
    });

    test('empty reference treats every phrase as absent', () => {
        const score = noveltyScore({ generatedCount: 3, generatedTotal: 100, referenceCount: 0, referenceTotal: 0 });
        expect(score).toBeCloseTo(0.03);
    });

    test('larger smoothing lowers the score of absent phrases', () => {
        const input = { generatedCount: 10, generatedTotal: 1000, referenceCount: 0, referenceTotal: 999 };
        expect(noveltyScore(input, 4)).toBeLessThan(noveltyScore(input, 1));
    });

    test('rejects an empty generated total and non-positive smoothing', () => {
        const input = { generatedCount: 0, generatedTotal: 0, referenceCount: 0, referenceTotal: 10 };
        expect(() => noveltyScore(input)).toThrow(TrawlException);
        expect(() => noveltyScore({ ...input, generatedTotal: 10 }, 0)).toThrow(/smoothing/);
    });
});

describe('scoreCandidate', () => {
    test('uses window totals for the candidate length', () => {
        const totals: Record<number, number> = { 8: 1000, 9: 500 };
        const generated = { windowTotal: (n: number) => totals[n] ?? 0 };
        const reference = {
            windowTotal: (n: number) => (n === 8 ? 999 : 0),
            frequency: (key: string) => (key === 'known phrase' ? 4 : 0),
        };

        const scored = scoreCandidate(
            { ngram: 'w1 w2 w3 w4 w5 w6 w7 w8', n: 8, count: 10, documents: 6 },
            generated,
            reference
        );

        expect(scored.referenceCount).toBe(0);
        expect(scored.absentFromReference).toBe(true);
        expect(scored.generatedRate).toBeCloseTo(10_000);
        expect(scored.referenceRate).toBeCloseTo(1000);
        expect(scored.novelty).toBeCloseTo(10);
        expect(scored.documents).toBe(6);
    });
});

describe('compareCandidates', () => {
    function candidate(ngram: string, novelty: number, count: number): ScoredCandidate {
        return {
            ngram,
            n: ngram.split(' ').length,
            count,
            documents: count,
            referenceCount: 0,
            generatedRate: 0,
            referenceRate: 0,
            novelty,
            absentFromReference: true,
        };
    }

    test('sorts by novelty, count, length, then key', () => {
        const sorted = [
            candidate('b c', 2, 5),
            candidate('a b c', 2, 5),
            candidate('z', 9, 1),
            candidate('a c', 2, 5),
            candidate('q r', 2, 7),
        ].sort(compareCandidates);

        expect(sorted.map(c => c.ngram)).toEqual(['z', 'q r', 'a b c', 'a c', 'b c']);
    });
});
