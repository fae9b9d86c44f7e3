/**
 * LLM Provider interfaces.
 */

export interface LLMMessage {
    role: 'system' | 'user' | 'assistant';
    content: string;
}

export interface LLMResponse {
    content: string;
    usage?: {
        promptTokens: number;
        completionTokens: number;
    };
}

export interface CompletionOptions {
    temperature?: number;
    maxTokens?: number;
}

export interface LLMProvider {
    complete(messages: LLMMessage[], options?: CompletionOptions): Promise<LLMResponse>;
}
