import fs from 'fs';
import path from 'path';
import * as readline from 'readline';
import { z } from 'zod';
import { createCorpusFormatError, createStorageError } from '../types/errors.js';
import { isMissingFile } from '../reference/storage.js';

export type CorpusFormat = 'json' | 'jsonl' | 'lines' | 'paragraphs';

export const CORPUS_FORMATS: readonly CorpusFormat[] = ['json', 'jsonl', 'lines', 'paragraphs'];

const documentSchema = z.union([
    z.string(),
    z.object({ text: z.string() }).passthrough(),
]);

const jsonCorpusSchema = z.array(documentSchema);

function documentText(doc: z.infer<typeof documentSchema>): string {
    return typeof doc === 'string' ? doc : doc.text;
}

export function inferFormat(file: string): CorpusFormat {
    switch (path.extname(file).toLowerCase()) {
        case '.json': return 'json';
        case '.jsonl':
        case '.ndjson': return 'jsonl';
        default: return 'lines';
    }
}

async function readText(file: string): Promise<string> {
    try {
        return await fs.promises.readFile(file, 'utf-8');
    } catch (e) {
        throw createStorageError(file, e);
    }
}

async function* readLines(file: string): AsyncGenerator<string> {
    try {
        await fs.promises.access(file, fs.constants.R_OK);
    } catch (e) {
        throw createStorageError(file, isMissingFile(e) ? new Error('file not found') : e);
    }
    const stream = fs.createReadStream(file, { encoding: 'utf-8' });
    const rl = readline.createInterface({ input: stream, crlfDelay: Infinity });
    try {
        for await (const line of rl) {
            yield line;
        }
    } finally {
        rl.close();
        stream.destroy();
    }
}

/**
 * Stream the documents of one corpus file.
 *
 * - json: an array of strings, or of objects with a string `text` field
 * - jsonl: one JSON string or `{ "text": ... }` object per line
 * - lines: one document per non-empty line
 * - paragraphs: documents separated by blank lines
 */
export async function* readDocuments(file: string, format: CorpusFormat = inferFormat(file)): AsyncGenerator<string> {
    switch (format) {
        case 'json': {
            let data: unknown;
            try {
                data = JSON.parse(await readText(file));
            } catch (e) {
                if (e instanceof SyntaxError) throw createCorpusFormatError(file, `not valid JSON (${e.message})`);
                throw e;
            }
            const parsed = jsonCorpusSchema.safeParse(data);
            if (!parsed.success) {
                throw createCorpusFormatError(file, 'expected an array of strings or { text } objects');
            }
            for (const doc of parsed.data) {
                yield documentText(doc);
            }
            return;
        }
        case 'jsonl': {
            let lineNumber = 0;
            for await (const line of readLines(file)) {
                lineNumber++;
                if (!line.trim()) continue;
                let value: unknown;
                try {
                    value = JSON.parse(line);
                } catch {
                    throw createCorpusFormatError(file, 'not valid JSON', lineNumber);
                }
                const parsed = documentSchema.safeParse(value);
                if (!parsed.success) {
                    throw createCorpusFormatError(file, 'expected a string or { text } object', lineNumber);
                }
                yield documentText(parsed.data);
            }
            return;
        }
        case 'lines': {
            for await (const line of readLines(file)) {
                const trimmed = line.trim();
                if (trimmed) yield trimmed;
            }
            return;
        }
        case 'paragraphs': {
            const text = await readText(file);
            for (const block of text.replace(/\r\n?/g, '\n').split(/\n\s*\n/)) {
                const trimmed = block.trim();
                if (trimmed) yield trimmed;
            }
            return;
        }
    }
}

export async function* readAllDocuments(files: readonly string[], format?: CorpusFormat): AsyncGenerator<string> {
    for (const file of files) {
        yield* readDocuments(file, format);
    }
}

export function isCorpusFormat(value: string): value is CorpusFormat {
    return (CORPUS_FORMATS as readonly string[]).includes(value);
}
