import { createOpenAI } from '@ai-sdk/openai';
import { generateText, CoreMessage, LanguageModel } from 'ai';
import type { CompletionOptions, LLMMessage, LLMProvider, LLMResponse } from '../types/llm.js';
import type { TrawlConfig } from '../config.js';
import { createLLMError } from '../types/errors.js';

function toCoreMessage(message: LLMMessage): CoreMessage {
    switch (message.role) {
        case 'system': return { role: 'system', content: message.content };
        case 'user': return { role: 'user', content: message.content };
        case 'assistant': return { role: 'assistant', content: message.content };
    }
}

/**
 * Chat-completion provider for any OpenAI-compatible endpoint
 * (OpenAI, DeepInfra, vLLM, llama.cpp, Ollama's /v1).
 */
export class StandardLLMProvider implements LLMProvider {
    private model: LanguageModel;
    readonly modelId: string;
    readonly baseURL: string | undefined;

    constructor(config: Pick<TrawlConfig, 'apiKey' | 'baseURL' | 'model'>) {
        this.modelId = config.model;
        this.baseURL = config.baseURL;

        const openai = createOpenAI({
            apiKey: config.apiKey ?? 'dummy-key',
            ...(config.baseURL && { baseURL: config.baseURL, compatibility: 'compatible' as const }),
        });
        this.model = openai.chat(config.model);
    }

    async complete(messages: LLMMessage[], options: CompletionOptions = {}): Promise<LLMResponse> {
        try {
            const result = await generateText({
                model: this.model,
                messages: messages.map(toCoreMessage),
                temperature: options.temperature,
                maxTokens: options.maxTokens,
            });

            return {
                content: result.text,
                usage: {
                    promptTokens: result.usage.promptTokens,
                    completionTokens: result.usage.completionTokens,
                },
            };
        } catch (error) {
            const errMsg = error instanceof Error ? error.message : String(error);
            throw createLLMError(errMsg, { model: this.modelId, url: this.baseURL });
        }
    }
}
