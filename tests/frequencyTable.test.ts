/**
 * Tests for n-gram frequency counting
 */

import { FrequencyTable } from '../src/counting/frequencyTable.js';
import { TrawlException } from '../src/types/errors.js';

const RANGE = { minN: 2, maxN: 3 };

describe('FrequencyTable', () => {
    let table: FrequencyTable;

    beforeEach(() => {
        table = new FrequencyTable(RANGE);
    });

    describe('addDocument', () => {
        test('counts windows of every length in range', () => {
            expect(table.addDocument('The feed never sleeps')).toBe(5);
            expect(table.windowTotal(2)).toBe(3);
            expect(table.windowTotal(3)).toBe(2);
            expect(table.windowTotal(4)).toBe(0);
            expect(table.size).toBe(5);
        });

        test('tracks occurrences and documents separately', () => {
            table.addDocument('The feed never sleeps');
            table.addDocument('The feed never sleeps. The feed never sleeps.');

            expect(table.get('the feed')).toEqual({ count: 3, documents: 2 });
            expect(table.count('feed never sleeps')).toBe(3);
            expect(table.documentCount).toBe(2);
            expect(table.tokenCount).toBe(12);
            expect(table.windowTotal(2)).toBe(9);
            expect(table.windowTotal(3)).toBe(6);
        });

        test('does not count across sentence boundaries by default', () => {
            table.addDocument('Post it. Then delete it.');
            expect(table.has('it then')).toBe(false);
            expect(table.count('post it')).toBe(1);
        });

        test('counts across sentence boundaries when enabled', () => {
            const crossing = new FrequencyTable(RANGE, { crossSentences: true });
            crossing.addDocument('Post it. Then delete it.');
            expect(crossing.count('it then')).toBe(1);
        });

        test('empty documents still count as documents', () => {
            expect(table.addDocument('')).toBe(0);
            expect(table.documentCount).toBe(1);
            expect(table.size).toBe(0);
        });
    });

    test('addTokens counts a pre-tokenized document', () => {
        expect(table.addTokens(['a', 'b'])).toBe(1);
        expect(table.get('a b')).toEqual({ count: 1, documents: 1 });
        expect(table.count('missing')).toBe(0);
    });

    test('top orders by count, then length, then key', () => {
        table.addDocument('The feed never sleeps');
        table.addDocument('The feed never sleeps. The feed never sleeps.');
        table.addDocument('the feed');

        expect(table.top(3).map(e => e.ngram)).toEqual([
            'the feed',
            'feed never sleeps',
            'the feed never',
        ]);
        expect(table.top(0)).toEqual([]);
        expect(table.top(1, e => e.n === 3)[0]).toEqual({
            ngram: 'feed never sleeps',
            n: 3,
            count: 3,
            documents: 2,
        });
    });

    test('prune removes keys below either threshold', () => {
        table.addDocument('The feed never sleeps');
        table.addDocument('The feed never sleeps');
        table.addDocument('unique words here only');

        expect(table.prune({ minCount: 2 })).toBe(5);
        expect(table.size).toBe(5);
        expect(table.prune({ minDocuments: 3 })).toBe(5);
        expect(table.size).toBe(0);
    });

    test('merge adds counts from another table', () => {
        const other = new FrequencyTable(RANGE);
        table.addDocument('The feed never sleeps');
        other.addDocument('The feed never sleeps');

        table.merge(other);
        expect(table.get('the feed never')).toEqual({ count: 2, documents: 2 });
        expect(table.documentCount).toBe(2);
        expect(table.windowTotal(2)).toBe(6);
    });

    test('merge rejects tables with a different range', () => {
        const other = new FrequencyTable({ minN: 2, maxN: 4 });
        expect(() => table.merge(other)).toThrow(TrawlException);
    });

    test('restores from its snapshot', () => {
        table.addDocument('The feed never sleeps');
        table.addDocument('the feed');
        const restored = FrequencyTable.fromSnapshot(JSON.parse(JSON.stringify(table.toSnapshot())));

        expect(restored.range).toEqual(RANGE);
        expect(restored.get('the feed')).toEqual({ count: 2, documents: 2 });
        expect(restored.windowTotal(2)).toBe(4);
        expect(restored.documentCount).toBe(2);
        expect(restored.tokenCount).toBe(6);
    });

    test('rejects malformed snapshots', () => {
        expect(() => FrequencyTable.fromSnapshot({ version: 1, kind: 'frequency-table', entries: 'nope' }))
            .toThrow(expect.objectContaining({ error: expect.objectContaining({ code: 'SNAPSHOT_INVALID' }) }));
    });

    test('rejects invalid ranges', () => {
        expect(() => new FrequencyTable({ minN: 0, maxN: 3 })).toThrow(TrawlException);
    });
});
