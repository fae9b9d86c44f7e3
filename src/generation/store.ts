import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { createCorpusFormatError, createStorageError } from '../types/errors.js';
import { isMissingFile } from '../reference/storage.js';

export interface CorpusStore {
    load(): Promise<string[]>;
    save(items: readonly string[]): Promise<number>;
}

export function uniqueInOrder(items: readonly string[]): string[] {
    return [...new Set(items)];
}

const storedCorpusSchema = z.array(z.string());

/**
 * Generated corpus kept as a JSON array. Saves write each distinct item once,
 * in first-seen order, so an interrupted run can resume from the file.
 */
export class JsonCorpusStore implements CorpusStore {
    readonly filePath: string;

    constructor(filePath: string) {
        this.filePath = filePath;
    }

    async load(): Promise<string[]> {
        let data: string;
        try {
            data = await fs.readFile(this.filePath, 'utf-8');
        } catch (e) {
            if (isMissingFile(e)) return [];
            throw createStorageError(this.filePath, e);
        }

        let parsed: unknown;
        try {
            parsed = JSON.parse(data);
        } catch {
            throw createCorpusFormatError(this.filePath, 'not valid JSON');
        }
        const result = storedCorpusSchema.safeParse(parsed);
        if (!result.success) {
            throw createCorpusFormatError(this.filePath, 'expected a JSON array of strings');
        }
        return result.data;
    }

    /**
     * Returns the number of distinct items written.
     */
    async save(items: readonly string[]): Promise<number> {
        const unique = uniqueInOrder(items);
        try {
            await fs.mkdir(path.dirname(path.resolve(this.filePath)), { recursive: true });
            await fs.writeFile(this.filePath, JSON.stringify(unique, null, 4));
        } catch (e) {
            throw createStorageError(this.filePath, e);
        }
        return unique.length;
    }
}
