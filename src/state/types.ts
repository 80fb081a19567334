/**
 * Shared types for configuration and translation state
 */
import { ExclusionEntry } from '../processing/codeSegments';
import { ReplacementRule } from '../processing/rules';
import { ProviderName } from '../translation/providers';

export interface TranslatorConfig {
    sourceLanguage: string;
    targetLanguage: string;
    provider: ProviderName;
    model: string;
    temperature: number;
    maxTokens: number;
    /** Entries sent to the model per request */
    batchSize: number;
    retryDelayMs: number;
    /** Text file replacing the bundled prompt template */
    promptTemplatePath: string | null;
    /** Base URL for OpenAI-compatible endpoints */
    openaiBaseUrl: string | null;
    /** `sakura` switches placeholders to arrow runs */
    targetPlatform: string;
    preTranslationSwitch: boolean;
    postTranslationSwitch: boolean;
    autoProcessTextCodeSegment: boolean;
    preTranslationData: ReplacementRule[];
    postTranslationData: ReplacementRule[];
    exclusionListData: ExclusionEntry[];
    /** Directory holding translation caches */
    dataDir: string;
}

export type TranslationStatus = 'untranslated' | 'translated' | 'failed';

export interface CacheItem {
    index: number;
    source: string;
    translation?: string;
    status: TranslationStatus;
    model?: string;
    translatedAt?: string;
}

export interface CacheFileData {
    name: string;
    sourceLanguage: string;
    targetLanguage: string;
    items: CacheItem[];
    lastUpdate: string;
}
