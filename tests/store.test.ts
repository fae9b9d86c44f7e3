import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { JsonCorpusStore, uniqueInOrder } from '../src/generation/store.js';
import { FileSnapshotStorage } from '../src/reference/storage.js';
import { ReferenceIndex } from '../src/reference/referenceIndex.js';
import { TrawlException } from '../src/types/errors.js';

describe('uniqueInOrder', () => {
    test('keeps the first occurrence of each item', () => {
        expect(uniqueInOrder(['b', 'a', 'b', 'c', 'a'])).toEqual(['b', 'a', 'c']);
    });
});

describe('persistence', () => {
    let dir: string;

    beforeEach(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'trawl-store-'));
    });

    afterEach(() => {
        fs.rmSync(dir, { recursive: true, force: true });
    });

    describe('JsonCorpusStore', () => {
        test('loads nothing before the first save', async () => {
            const store = new JsonCorpusStore(path.join(dir, 'proverbs.json'));
            expect(await store.load()).toEqual([]);
        });

        test('writes unique items as an indented JSON array', async () => {
            const file = path.join(dir, 'nested', 'proverbs.json');
            const store = new JsonCorpusStore(file);

            await expect(store.save(['one', 'two', 'one'])).resolves.toBe(2);
            expect(fs.readFileSync(file, 'utf-8')).toBe('[\n    "one",\n    "two"\n]');
            expect(await store.load()).toEqual(['one', 'two']);
        });

        test('rejects a file that is not a string array', async () => {
            const file = path.join(dir, 'proverbs.json');
            fs.writeFileSync(file, '{"items": []}');
            await expect(new JsonCorpusStore(file).load()).rejects.toThrow(/array of strings/);
        });

        test('rejects a file that is not JSON', async () => {
            const file = path.join(dir, 'proverbs.json');
            fs.writeFileSync(file, 'not json');
            await expect(new JsonCorpusStore(file).load()).rejects.toThrow(TrawlException);
        });
    });

    describe('FileSnapshotStorage', () => {
        function sampleIndex(): ReferenceIndex {
            const index = new ReferenceIndex({ range: { minN: 2, maxN: 2 } });
            index.addDocument('a stitch in time');
            return index;
        }

        test('round-trips a reference index snapshot', async () => {
            const storage = new FileSnapshotStorage(path.join(dir, 'snaps'));
            const file = await storage.save('reference', sampleIndex().toSnapshot());

            expect(file).toBe(path.join(dir, 'snaps', 'reference.json'));
            const restored = ReferenceIndex.fromSnapshot(await storage.load('reference'));
            expect(restored.frequency('stitch in')).toBe(1);
            expect(restored.documentCount).toBe(1);
        });

        test('returns null for a missing snapshot', async () => {
            const storage = new FileSnapshotStorage(dir);
            expect(await storage.load('absent')).toBeNull();
        });

        test('lists and deletes snapshots by name', async () => {
            const storage = new FileSnapshotStorage(dir);
            await storage.save('b', sampleIndex().toSnapshot());
            await storage.save('a.json', sampleIndex().toSnapshot());

            expect(await storage.list()).toEqual(['a', 'b']);
            await storage.delete('a');
            await storage.delete('never-saved');
            expect(await storage.list()).toEqual(['b']);
        });

        test('lists nothing when the directory does not exist', async () => {
            expect(await new FileSnapshotStorage(path.join(dir, 'none')).list()).toEqual([]);
        });

        test('keeps names inside the storage directory', async () => {
            const storage = new FileSnapshotStorage(dir);
            const file = await storage.save('../escape', sampleIndex().toSnapshot());
            expect(file).toBe(path.join(dir, 'escape.json'));
        });
    });
});
