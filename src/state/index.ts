/**
 * State management module
 *
 * Exports the config store, the translation cache and their types
 */

export { ConfigStore, DEFAULT_CONFIG, sanitizeConfig, parseConfigValue, isConfigKey } from './ConfigStore';
export { TranslationCache } from './TranslationCache';

export type {
    TranslatorConfig,
    TranslationStatus,
    CacheItem,
    CacheFileData
} from './types';
