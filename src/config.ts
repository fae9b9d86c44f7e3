import { z } from 'zod';
import { DEFAULTS } from './types/options.js';
import { createConfigError } from './types/errors.js';

const optionalString = z.string().trim().min(1).optional()
    .or(z.literal('').transform(() => undefined));

const positiveInt = (fallback: number) =>
    z.coerce.number().int().positive().default(fallback);

const envSchema = z.object({
    OPENAI_API_KEY: optionalString,
    OPENAI_BASE_URL: z.string().url().optional()
        .or(z.literal('').transform(() => undefined)),
    TRAWL_MODEL: z.string().min(1).default('gpt-4o-mini'),
    TRAWL_CONCURRENCY: positiveInt(DEFAULTS.concurrency),
    TRAWL_TOTAL: positiveInt(DEFAULTS.total),
    TRAWL_SAVE_INTERVAL: positiveInt(DEFAULTS.saveInterval),
    TRAWL_OUTPUT: z.string().min(1).default('proverbs.json'),
});

export interface TrawlConfig {
    apiKey?: string;
    baseURL?: string;
    model: string;
    concurrency: number;
    total: number;
    saveInterval: number;
    output: string;
}

/**
 * Read configuration from the environment. The CLI loads `.env` through
 * dotenv before calling this.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): TrawlConfig {
    const parsed = envSchema.safeParse(env);
    if (!parsed.success) {
        throw createConfigError(
            parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`)
        );
    }
    const e = parsed.data;
    return {
        apiKey: e.OPENAI_API_KEY,
        baseURL: e.OPENAI_BASE_URL?.replace(/\/$/, ''),
        model: e.TRAWL_MODEL,
        concurrency: e.TRAWL_CONCURRENCY,
        total: e.TRAWL_TOTAL,
        saveInterval: e.TRAWL_SAVE_INTERVAL,
        output: e.TRAWL_OUTPUT,
    };
}
