import OpenAI from 'openai';
import { Anthropic } from '@anthropic-ai/sdk';
import { tracedCompletion } from '../instrumentation';

export const PROVIDER_NAMES = ['anthropic', 'openai'] as const;
export type ProviderName = typeof PROVIDER_NAMES[number];

export function isProviderName(name: string): name is ProviderName {
    return PROVIDER_NAMES.some(provider => provider === name);
}

export interface CompletionRequest {
    system: string;
    user: string;
    model: string;
    temperature: number;
    maxTokens: number;
}

/**
 * A chat model that turns a system prompt and one user message into text
 */
export interface TranslationProvider {
    readonly name: ProviderName;
    complete(request: CompletionRequest): Promise<string>;
}

export class AnthropicProvider implements TranslationProvider {
    readonly name = 'anthropic';

    constructor(private client: Anthropic) {}

    async complete(request: CompletionRequest): Promise<string> {
        return tracedCompletion(this.name, request.model, request.user.length, async () => {
            const response = await this.client.messages.create({
                model: request.model,
                max_tokens: request.maxTokens,
                temperature: request.temperature,
                system: request.system,
                messages: [{ role: 'user', content: request.user }]
            });

            const text = response.content
                .map(block => (block.type === 'text' ? block.text : ''))
                .join('');
            if (!text) {
                throw new Error(`Anthropic returned no text (stop reason: ${response.stop_reason ?? 'unknown'})`);
            }
            return text;
        });
    }
}

export class OpenAIProvider implements TranslationProvider {
    readonly name = 'openai';

    constructor(private client: OpenAI) {}

    async complete(request: CompletionRequest): Promise<string> {
        return tracedCompletion(this.name, request.model, request.user.length, async () => {
            const { choices } = await this.client.chat.completions.create({
                model: request.model,
                temperature: request.temperature,
                max_tokens: request.maxTokens,
                messages: [
                    { role: 'system', content: request.system },
                    { role: 'user', content: request.user }
                ]
            });

            const text = choices[0]?.message?.content ?? '';
            if (!text) {
                throw new Error(`OpenAI returned no text (finish reason: ${choices[0]?.finish_reason ?? 'unknown'})`);
            }
            return text;
        });
    }
}

export interface ProviderSettings {
    provider: ProviderName;
    openaiBaseUrl: string | null;
}

/**
 * Build a provider from config, reading API keys from the environment
 */
export function createProvider(settings: ProviderSettings, env: NodeJS.ProcessEnv = process.env): TranslationProvider {
    switch (settings.provider) {
        case 'anthropic': {
            const apiKey = env.ANTHROPIC_API_KEY;
            if (!apiKey) {
                throw new Error('ANTHROPIC_API_KEY is required for the anthropic provider.');
            }
            return new AnthropicProvider(new Anthropic({ apiKey }));
        }
        case 'openai': {
            const apiKey = env.OPENAI_API_KEY;
            if (!apiKey) {
                throw new Error('OPENAI_API_KEY is required for the openai provider.');
            }
            const baseURL = settings.openaiBaseUrl ?? env.OPENAI_BASE_URL;
            return new OpenAIProvider(new OpenAI({ apiKey, ...(baseURL ? { baseURL } : {}) }));
        }
    }
}
