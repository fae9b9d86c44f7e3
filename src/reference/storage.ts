/**
 * Snapshot Persistence
 */

import fs from 'fs/promises';
import path from 'path';
import type { Snapshot } from '../counting/snapshot.js';
import { createStorageError } from '../types/errors.js';

export interface SnapshotStorage {
    save(name: string, snapshot: Snapshot): Promise<string>;
    load(name: string): Promise<unknown | null>;
    delete(name: string): Promise<void>;
    list(): Promise<string[]>;
}

export function isMissingFile(error: unknown): boolean {
    return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Reads and writes snapshots as pretty-printed JSON, one file per name.
 * Load returns the raw parsed JSON; callers validate it through
 * FrequencyTable.fromSnapshot or ReferenceIndex.fromSnapshot.
 */
export class FileSnapshotStorage implements SnapshotStorage {
    private storageDir: string;

    constructor(storageDir: string = '.trawl-snapshots') {
        this.storageDir = storageDir;
    }

    private getFilePath(name: string): string {
        const base = path.basename(name);
        return path.join(this.storageDir, base.endsWith('.json') ? base : `${base}.json`);
    }

    async save(name: string, snapshot: Snapshot): Promise<string> {
        const file = this.getFilePath(name);
        try {
            await fs.mkdir(this.storageDir, { recursive: true });
            await fs.writeFile(file, JSON.stringify(snapshot, null, 2));
        } catch (e) {
            throw createStorageError(file, e);
        }
        return file;
    }

    async load(name: string): Promise<unknown | null> {
        const file = this.getFilePath(name);
        let data: string;
        try {
            data = await fs.readFile(file, 'utf-8');
        } catch (e) {
            if (isMissingFile(e)) return null;
            throw createStorageError(file, e);
        }
        try {
            return JSON.parse(data);
        } catch (e) {
            throw createStorageError(file, e);
        }
    }

    async delete(name: string): Promise<void> {
        try {
            await fs.unlink(this.getFilePath(name));
        } catch (e) {
            if (!isMissingFile(e)) throw createStorageError(this.getFilePath(name), e);
        }
    }

    async list(): Promise<string[]> {
        let files: string[];
        try {
            files = await fs.readdir(this.storageDir);
        } catch (e) {
            if (isMissingFile(e)) return [];
            throw createStorageError(this.storageDir, e);
        }
        return files
            .filter(f => f.endsWith('.json'))
            .map(f => f.replace(/\.json$/, ''))
            .sort();
    }
}
