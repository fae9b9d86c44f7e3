import type { GenerationOptions } from '../types/options.js';
import type { GenerationResult } from '../types/responses.js';
import type { LLMMessage, LLMProvider } from '../types/llm.js';
import { DEFAULTS } from '../types/options.js';
import { createInvalidArgumentError } from '../types/errors.js';
import type { CorpusStore } from './store.js';
import { PROVERB_SYSTEM_PROMPT, PROVERB_USER_PROMPT } from './prompts.js';

function positiveInteger(name: string, value: number): number {
    if (!Number.isInteger(value) || value < 1) {
        throw createInvalidArgumentError(name, value, 'a positive integer');
    }
    return value;
}

/**
 * Builds a corpus of model-generated proverbs.
 *
 * Resumes from whatever the store already holds, keeps at most `concurrency`
 * requests in flight and writes the store every `saveInterval` new items.
 * A failed or empty completion is counted and not retried.
 */
export class CorpusGenerator {
    private readonly provider: LLMProvider;
    private readonly store: CorpusStore;
    private readonly total: number;
    private readonly concurrency: number;
    private readonly saveInterval: number;
    private readonly temperature: number;
    private readonly maxTokens: number;
    private readonly messages: LLMMessage[];
    private readonly onProgress?: (completed: number, remaining: number) => void;

    private pendingSave: Promise<unknown> = Promise.resolve();

    constructor(provider: LLMProvider, store: CorpusStore, options: GenerationOptions = {}) {
        this.provider = provider;
        this.store = store;
        this.total = positiveInteger('total', options.total ?? DEFAULTS.total);
        this.concurrency = positiveInteger('concurrency', options.concurrency ?? DEFAULTS.concurrency);
        this.saveInterval = positiveInteger('saveInterval', options.saveInterval ?? DEFAULTS.saveInterval);
        this.temperature = options.temperature ?? DEFAULTS.temperature;
        this.maxTokens = options.maxTokens ?? DEFAULTS.maxTokens;
        this.messages = [
            { role: 'system', content: options.systemPrompt ?? PROVERB_SYSTEM_PROMPT },
            { role: 'user', content: options.userPrompt ?? PROVERB_USER_PROMPT },
        ];
        this.onProgress = options.onProgress;
    }

    async run(): Promise<GenerationResult> {
        const items = await this.store.load();
        const remaining = this.total - items.length;

        if (remaining <= 0) {
            return {
                requested: 0,
                succeeded: 0,
                failed: 0,
                total: items.length,
                unique: items.length,
                alreadyComplete: true,
            };
        }

        const tally: { completed: number; succeeded: number; failed: number; lastError?: string } = {
            completed: 0,
            succeeded: 0,
            failed: 0,
        };
        let issued = 0;
        let aborted = false;

        const worker = async (): Promise<void> => {
            while (!aborted && issued < remaining) {
                issued++;
                const proverb = await this.requestOne().catch((error: unknown) => {
                    tally.lastError = error instanceof Error ? error.message : String(error);
                    return null;
                });

                tally.completed++;
                if (proverb === null) {
                    tally.failed++;
                } else if (proverb === '') {
                    tally.failed++;
                    tally.lastError = 'Empty completion';
                } else {
                    items.push(proverb);
                    tally.succeeded++;
                    if (tally.succeeded % this.saveInterval === 0) {
                        try {
                            await this.save(items);
                        } catch (error) {
                            aborted = true;
                            throw error;
                        }
                    }
                }
                this.onProgress?.(tally.completed, remaining);
            }
        };

        const workers = Math.min(this.concurrency, remaining);
        await Promise.all(Array.from({ length: workers }, () => worker()));

        const unique = await this.save(items);
        return {
            requested: remaining,
            succeeded: tally.succeeded,
            failed: tally.failed,
            total: items.length,
            unique,
            alreadyComplete: false,
            ...(tally.lastError !== undefined && { lastError: tally.lastError }),
        };
    }

    private async requestOne(): Promise<string> {
        const response = await this.provider.complete(this.messages, {
            temperature: this.temperature,
            maxTokens: this.maxTokens,
        });
        return response.content.trim();
    }

    /**
     * Saves are chained so two workers never write the file at once.
     */
    private save(items: readonly string[]): Promise<number> {
        const snapshot = [...items];
        const next = this.pendingSave.then(() => this.store.save(snapshot));
        this.pendingSave = next;
        return next;
    }
}
