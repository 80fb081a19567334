import fs from 'fs';
import path from 'path';
import { isDeepStrictEqual } from 'util';
import { RETRY_DELAY_MS } from '../constants';
import { DEFAULT_SOURCE_LANGUAGE, DEFAULT_TARGET_LANGUAGE } from '../prompts/prompts';
import { isProviderName } from '../translation/providers';
import { TranslatorConfig } from './types';

export const DEFAULT_CONFIG: TranslatorConfig = {
    sourceLanguage: DEFAULT_SOURCE_LANGUAGE,
    targetLanguage: DEFAULT_TARGET_LANGUAGE,
    provider: 'anthropic',
    model: 'claude-sonnet-4-5',
    temperature: 0.3,
    maxTokens: 4096,
    batchSize: 10,
    retryDelayMs: RETRY_DELAY_MS,
    promptTemplatePath: null,
    openaiBaseUrl: null,
    targetPlatform: 'default',
    preTranslationSwitch: false,
    postTranslationSwitch: false,
    autoProcessTextCodeSegment: true,
    preTranslationData: [],
    postTranslationData: [],
    exclusionListData: [],
    dataDir: 'data'
};

type Validators = { [K in keyof TranslatorConfig]: (value: unknown) => value is TranslatorConfig[K] };

const isString = (value: unknown): value is string => typeof value === 'string';
const isNonEmptyString = (value: unknown): value is string => typeof value === 'string' && value.trim().length > 0;
const isBoolean = (value: unknown): value is boolean => typeof value === 'boolean';
const isNullableString = (value: unknown): value is string | null => value === null || isNonEmptyString(value);
const isPositiveInteger = (value: unknown): value is number => Number.isInteger(value) && Number(value) > 0;
const isNonNegativeInteger = (value: unknown): value is number => Number.isInteger(value) && Number(value) >= 0;
const isTemperature = (value: unknown): value is number =>
    typeof value === 'number' && value >= 0 && value <= 2;

function isRecordOfOptionalStrings(value: unknown, keys: string[]): boolean {
    if (typeof value !== 'object' || value === null || Array.isArray(value)) {
        return false;
    }
    return Object.entries(value).every(([key, field]) => keys.includes(key) ? field === undefined || isString(field) : true);
}

const isRuleList = (value: unknown): value is TranslatorConfig['preTranslationData'] =>
    Array.isArray(value) && value.every(rule => isRecordOfOptionalStrings(rule, ['src', 'dst', 'regex']));

const isExclusionList = (value: unknown): value is TranslatorConfig['exclusionListData'] =>
    Array.isArray(value) && value.every(entry => isRecordOfOptionalStrings(entry, ['markers', 'regex']));

const VALIDATORS: Validators = {
    sourceLanguage: isNonEmptyString,
    targetLanguage: isNonEmptyString,
    provider: (value: unknown): value is TranslatorConfig['provider'] => isString(value) && isProviderName(value),
    model: isNonEmptyString,
    temperature: isTemperature,
    maxTokens: isPositiveInteger,
    batchSize: isPositiveInteger,
    retryDelayMs: isNonNegativeInteger,
    promptTemplatePath: isNullableString,
    openaiBaseUrl: isNullableString,
    targetPlatform: isNonEmptyString,
    preTranslationSwitch: isBoolean,
    postTranslationSwitch: isBoolean,
    autoProcessTextCodeSegment: isBoolean,
    preTranslationData: isRuleList,
    postTranslationData: isRuleList,
    exclusionListData: isExclusionList,
    dataDir: isNonEmptyString
};

export function isConfigKey(key: string): key is keyof TranslatorConfig {
    return Object.prototype.hasOwnProperty.call(DEFAULT_CONFIG, key);
}

function assignChecked<K extends keyof TranslatorConfig>(
    target: Partial<TranslatorConfig>,
    key: K,
    value: unknown
): boolean {
    const check = VALIDATORS[key];
    if (!check(value)) {
        return false;
    }
    target[key] = value;
    return true;
}

/**
 * Keep only known keys whose values have the expected type
 */
export function sanitizeConfig(raw: unknown, source = 'config'): Partial<TranslatorConfig> {
    const result: Partial<TranslatorConfig> = {};
    if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
        console.warn(`⚠️ Ignoring ${source}: expected a JSON object`);
        return result;
    }

    for (const [key, value] of Object.entries(raw)) {
        if (!isConfigKey(key)) {
            console.warn(`⚠️ Ignoring unknown key "${key}" in ${source}`);
            continue;
        }
        if (!assignChecked(result, key, value)) {
            console.warn(`⚠️ Ignoring invalid value for "${key}" in ${source}: ${JSON.stringify(value)}`);
        }
    }
    return result;
}

/**
 * Parse a command-line value for a config key: booleans accept on/off,
 * `null` clears nullable keys and lists are given as JSON.
 */
export function parseConfigValue(key: string, text: string): Partial<TranslatorConfig> {
    if (!isConfigKey(key)) {
        throw new Error(`Unknown config key "${key}". Valid keys: ${Object.keys(DEFAULT_CONFIG).join(', ')}`);
    }

    const defaultValue = DEFAULT_CONFIG[key];
    let value: unknown = text;

    if (typeof defaultValue === 'boolean') {
        const lower = text.toLowerCase();
        value = lower === 'true' || lower === 'on' ? true : lower === 'false' || lower === 'off' ? false : text;
    } else if (typeof defaultValue === 'number') {
        value = text.trim() === '' ? text : Number(text);
    } else if (Array.isArray(defaultValue)) {
        try {
            value = JSON.parse(text);
        } catch {
            throw new Error(`"${key}" expects a JSON array`);
        }
    } else if (text === 'null') {
        value = null;
    }

    const result: Partial<TranslatorConfig> = {};
    if (!assignChecked(result, key, value)) {
        throw new Error(`Invalid value for "${key}": ${text}`);
    }
    return result;
}

function isMissingFile(error: unknown): boolean {
    return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

/**
 * ConfigStore - JSON config file merged over built-in defaults
 */
export class ConfigStore {
    readonly filePath: string;

    constructor(filePath: string = process.env.TRANSLATOR_CONFIG || 'config.json') {
        this.filePath = filePath;
    }

    /**
     * Sanitized stored values, or null when there is no config file
     */
    private async readStored(): Promise<Partial<TranslatorConfig> | null> {
        let raw: string;
        try {
            raw = await fs.promises.readFile(this.filePath, 'utf8');
        } catch (error) {
            if (isMissingFile(error)) {
                return null;
            }
            throw error;
        }

        let data: unknown;
        try {
            data = JSON.parse(raw);
        } catch (error) {
            throw new Error(`Config file ${this.filePath} is not valid JSON: ${error instanceof Error ? error.message : error}`);
        }
        return sanitizeConfig(data, this.filePath);
    }

    async load(): Promise<TranslatorConfig> {
        const stored = await this.readStored();
        if (stored === null) {
            console.warn(`🎩 No stored config at ${this.filePath}, using defaults.`);
        }
        return { ...DEFAULT_CONFIG, ...stored };
    }

    /**
     * Merge updates into the stored file. Nothing is written when the stored values already match.
     */
    async save(updates: Partial<TranslatorConfig>): Promise<TranslatorConfig> {
        const stored = (await this.readStored()) ?? {};
        const merged = { ...stored, ...updates };

        if (!isDeepStrictEqual(stored, merged)) {
            const dir = path.dirname(this.filePath);
            await fs.promises.mkdir(dir, { recursive: true });
            await fs.promises.writeFile(this.filePath, JSON.stringify(merged, null, 4));
            console.log(`💾 Saved config to ${this.filePath}`);
        }

        return { ...DEFAULT_CONFIG, ...merged };
    }
}
