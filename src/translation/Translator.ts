import fs from 'fs';
import { MAX_RETRIES } from '../constants';
import { tracedBatch } from '../instrumentation';
import { TextProcessor } from '../processing/TextProcessor';
import { THREE_STEP_TRANSLATION_PROMPT } from '../prompts/prompts';
import { TranslationCache } from '../state/TranslationCache';
import { TranslatorConfig } from '../state/types';
import { renderTemplate } from '../template';
import { buildSourceMessage, parseTranslationResponse } from './format';
import { TranslationProvider } from './providers';

export interface TranslatorOptions {
    /** Prompt template; the bundled three-step prompt when omitted */
    template?: string;
    processor?: TextProcessor;
    maxRetries?: number;
}

export interface TranslationRunSummary {
    translated: number;
    failed: number;
    batches: number;
}

export type ProgressListener = (done: number, total: number) => void;

/**
 * The configured template file, or the bundled prompt when none is set
 */
export async function loadPromptTemplate(config: Pick<TranslatorConfig, 'promptTemplatePath'>): Promise<string> {
    if (!config.promptTemplatePath) {
        return THREE_STEP_TRANSLATION_PROMPT;
    }
    return fs.promises.readFile(config.promptTemplatePath, 'utf8');
}

const sleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

export class Translator {
    private processor: TextProcessor;
    private template: string;
    private maxRetries: number;

    constructor(
        private provider: TranslationProvider,
        private config: TranslatorConfig,
        options: TranslatorOptions = {}
    ) {
        this.template = options.template ?? THREE_STEP_TRANSLATION_PROMPT;
        this.processor = options.processor ?? new TextProcessor(config);
        this.maxRetries = Math.max(1, options.maxRetries ?? MAX_RETRIES);
    }

    buildSystemPrompt(): string {
        return renderTemplate(this.template, {
            source_language: this.config.sourceLanguage,
            target_language: this.config.targetLanguage
        });
    }

    /**
     * Translate a keyed batch of entries in a single request.
     * Entries with nothing translatable are returned with their layout restored.
     */
    async translateBatch(entries: Record<string, string>): Promise<Record<string, string>> {
        const keys = Object.keys(entries);
        return tracedBatch(keys.length, this.config.sourceLanguage, this.config.targetLanguage, async () => {
            const { texts, snapshot } = this.processor.prepare(entries);
            const translated: Record<string, string> = { ...texts };
            const toSend = keys.filter(key => texts[key].trim() !== '');

            if (toSend.length > 0) {
                const items = await this.requestWithRetry(toSend.map(key => texts[key]));
                toSend.forEach((key, i) => {
                    translated[key] = items[i];
                });
            }

            return this.processor.restore(translated, snapshot);
        });
    }

    private async requestWithRetry(texts: string[]): Promise<string[]> {
        const system = this.buildSystemPrompt();
        const user = buildSourceMessage(texts);
        let lastError: unknown = new Error('No translation attempt was made');

        for (let attempt = 1; attempt <= this.maxRetries; attempt++) {
            try {
                const response = await this.provider.complete({
                    system,
                    user,
                    model: this.config.model,
                    temperature: this.config.temperature,
                    maxTokens: this.config.maxTokens
                });
                return parseTranslationResponse(response, texts.length);
            } catch (error) {
                lastError = error;
                const reason = error instanceof Error ? error.message : String(error);
                console.warn(`⚠️ Translation attempt ${attempt}/${this.maxRetries} failed: ${reason}`);
                if (attempt < this.maxRetries && this.config.retryDelayMs > 0) {
                    await sleep(this.config.retryDelayMs);
                }
            }
        }

        throw lastError;
    }

    /**
     * Translate every pending cache item in batches, saving the cache after each one.
     * A batch that still fails after its retries marks its items failed and the run continues.
     */
    async translateAll(cache: TranslationCache, onProgress?: ProgressListener): Promise<TranslationRunSummary> {
        const pending = cache.getPending();
        const batchSize = Math.max(1, this.config.batchSize);
        const summary: TranslationRunSummary = { translated: 0, failed: 0, batches: 0 };

        for (let start = 0; start < pending.length; start += batchSize) {
            const batch = pending.slice(start, start + batchSize);
            const entries = Object.fromEntries(batch.map(item => [String(item.index), item.source]));
            summary.batches++;

            try {
                const results = await this.translateBatch(entries);
                for (const item of batch) {
                    cache.markTranslated(item.index, results[String(item.index)], this.config.model);
                }
                summary.translated += batch.length;
            } catch (error) {
                console.error(`❌ Batch of ${batch.length} item(s) starting at #${batch[0].index} failed:`, error instanceof Error ? error.message : error);
                for (const item of batch) {
                    cache.markFailed(item.index);
                }
                summary.failed += batch.length;
            } finally {
                await cache.save();
            }

            onProgress?.(Math.min(start + batchSize, pending.length), pending.length);
        }

        console.log(`🌐 Translated ${summary.translated} item(s), ${summary.failed} failed, in ${summary.batches} batch(es)`);
        return summary;
    }
}
