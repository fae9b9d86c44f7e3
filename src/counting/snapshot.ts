import { z } from 'zod';
import { createSnapshotError } from '../types/errors.js';

export const SNAPSHOT_VERSION = 1;

const rangeSchema = z.object({
    minN: z.number().int().positive(),
    maxN: z.number().int().positive(),
}).refine(r => r.maxN >= r.minN, { message: 'maxN must be >= minN' });

const countSchema = z.number().int().nonnegative();

const baseSnapshot = z.object({
    version: z.literal(SNAPSHOT_VERSION),
    range: rangeSchema,
    documentCount: countSchema,
    tokenCount: countSchema,
    /** Window totals keyed by n-gram length */
    windowTotals: z.record(z.string().regex(/^\d+$/), countSchema),
});

export const frequencySnapshotSchema = baseSnapshot.extend({
    kind: z.literal('frequency-table'),
    /** [ngram, count, documents] */
    entries: z.array(z.tuple([z.string().min(1), countSchema, countSchema])),
});

export const referenceSnapshotSchema = baseSnapshot.extend({
    kind: z.literal('reference-index'),
    targets: z.array(z.string().min(1)).optional(),
    /** [ngram, count] */
    entries: z.array(z.tuple([z.string().min(1), countSchema])),
});

export const snapshotSchema = z.discriminatedUnion('kind', [
    frequencySnapshotSchema,
    referenceSnapshotSchema,
]);

export type FrequencySnapshot = z.infer<typeof frequencySnapshotSchema>;
export type ReferenceSnapshot = z.infer<typeof referenceSnapshotSchema>;
export type Snapshot = z.infer<typeof snapshotSchema>;

export function parseSnapshot<T>(schema: z.ZodType<T>, data: unknown): T {
    const result = schema.safeParse(data);
    if (!result.success) {
        const issues = result.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`);
        throw createSnapshotError(issues[0] ?? 'unrecognised content', issues);
    }
    return result.data;
}

export function totalsToRecord(totals: Map<number, number>): Record<string, number> {
    const record: Record<string, number> = {};
    for (const [n, total] of [...totals.entries()].sort((a, b) => a[0] - b[0])) {
        record[String(n)] = total;
    }
    return record;
}

export function totalsFromRecord(record: Record<string, number>): Map<number, number> {
    return new Map(Object.entries(record).map(([n, total]) => [Number(n), total]));
}
