import type { z } from 'zod';
import type {
    TrawlReport,
    Verbosity,
    TrawlResponse,
    MinimalTrawlResponse,
    StandardTrawlResponse,
    DetailedTrawlResponse,
} from '../types/index.js';
import { createGenericError } from '../types/index.js';

/**
 * Validate raw tool arguments against a zod schema.
 */
export function parseArgs<S extends z.ZodTypeAny>(schema: S, args: unknown, tool: string): z.output<S> {
    const result = schema.safeParse(args ?? {});
    if (!result.success) {
        const issues = result.error.issues.map(i => `${i.path.join('.') || '(arguments)'}: ${i.message}`);
        throw createGenericError('INVALID_ARGUMENT', `Invalid arguments for ${tool}: ${issues.join('; ')}`, { issues });
    }
    return result.data;
}

function summarize(report: TrawlReport): string {
    const { stats } = report;
    if (stats.returned === 0) {
        return `No emergent phrases found in ${stats.generatedDocuments} documents`;
    }
    return `${stats.returned} of ${stats.scored} candidate phrases returned ` +
        `from ${stats.generatedDocuments} generated documents`;
}

/**
 * Build trawl response based on verbosity level
 */
export function buildTrawlResponse(report: TrawlReport, verbosity: Verbosity = 'standard'): TrawlResponse {
    if (verbosity === 'minimal') {
        const response: MinimalTrawlResponse = {
            success: true,
            candidates: report.candidates.map(c => c.ngram),
        };
        return response;
    }

    if (verbosity === 'standard') {
        const response: StandardTrawlResponse = {
            success: true,
            message: summarize(report),
            candidates: report.candidates.map(c => ({
                ngram: c.ngram,
                count: c.count,
                referenceCount: c.referenceCount,
                novelty: c.novelty,
            })),
        };
        return response;
    }

    // detailed
    const response: DetailedTrawlResponse = {
        success: true,
        message: summarize(report),
        candidates: report.candidates,
        statistics: report.stats,
    };
    return response;
}
