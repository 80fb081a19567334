import fs from 'fs';
import path from 'path';
import {
    AffixCode,
    compileCodePatterns,
    collectPatternSources,
    ExclusionEntry,
    extractAffixCodes,
    PlaceholderEntry,
    replaceWithPlaceholders,
    restoreAffixCodes,
    restorePlaceholders
} from './codeSegments';
import { LineLayout, restoreLayout, stripLayout } from './lineLayout';
import { shieldNumberPrefix, unshieldNumberPrefix } from './numbering';
import { applyRules, CompiledRule, compileRules, ReplacementRule } from './rules';

export const DEFAULT_REGEX_LIBRARY_PATH = path.join(__dirname, '..', '..', 'data', 'regex.json');

export interface TextProcessorOptions {
    sourceLanguage: string;
    targetPlatform: string;
    preTranslationSwitch: boolean;
    postTranslationSwitch: boolean;
    autoProcessTextCodeSegment: boolean;
    preTranslationData: ReplacementRule[];
    postTranslationData: ReplacementRule[];
    exclusionListData: ExclusionEntry[];
}

/**
 * Everything `prepare` removed from a batch, needed by `restore` to put it back
 */
export interface ProcessingSnapshot {
    layouts: Record<string, LineLayout>;
    prefixes: Record<string, AffixCode[]>;
    suffixes: Record<string, AffixCode[]>;
    placeholders: Record<string, PlaceholderEntry[]>;
}

export interface PreparedBatch {
    texts: Record<string, string>;
    snapshot: ProcessingSnapshot;
}

/**
 * Read the `regex` field of every entry in a pattern library file
 */
export function loadRegexLibrary(filePath: string = DEFAULT_REGEX_LIBRARY_PATH): string[] {
    const data: unknown = JSON.parse(fs.readFileSync(filePath, 'utf8'));
    if (!Array.isArray(data)) {
        throw new Error(`Regex library ${filePath} must contain a JSON array`);
    }

    const patterns: string[] = [];
    for (const item of data) {
        if (typeof item === 'object' && item !== null && 'regex' in item && typeof item.regex === 'string' && item.regex) {
            patterns.push(item.regex);
        }
    }
    return patterns;
}

function mapValues(texts: Record<string, string>, fn: (text: string) => string): Record<string, string> {
    const result: Record<string, string> = {};
    for (const [key, text] of Object.entries(texts)) {
        result[key] = fn(text);
    }
    return result;
}

export class TextProcessor {
    private preRules: CompiledRule[];
    private postRules: CompiledRule[];
    private codePatterns: RegExp[];

    constructor(private options: TextProcessorOptions, regexLibrary: string[] = loadRegexLibrary()) {
        this.preRules = compileRules(options.preTranslationData);
        this.postRules = compileRules(options.postTranslationData);
        this.codePatterns = compileCodePatterns(
            collectPatternSources(regexLibrary, options.exclusionListData)
        );
    }

    /**
     * Turn source entries into the texts sent to the model
     */
    prepare(entries: Record<string, string>): PreparedBatch {
        const snapshot: ProcessingSnapshot = { layouts: {}, prefixes: {}, suffixes: {}, placeholders: {} };
        let texts = { ...entries };

        if (this.options.preTranslationSwitch) {
            texts = mapValues(texts, text => applyRules(text, this.preRules));
        }

        for (const [key, text] of Object.entries(texts)) {
            const stripped = stripLayout(text, this.options.sourceLanguage);
            texts[key] = stripped.text;
            snapshot.layouts[key] = stripped.layout;
        }

        if (this.options.autoProcessTextCodeSegment) {
            const affixes = extractAffixCodes(texts, this.codePatterns);
            snapshot.prefixes = affixes.prefixes;
            snapshot.suffixes = affixes.suffixes;

            const inner = replaceWithPlaceholders(affixes.texts, this.codePatterns, this.options.targetPlatform);
            snapshot.placeholders = inner.placeholders;
            texts = inner.texts;
        }

        texts = mapValues(texts, shieldNumberPrefix);

        return { texts, snapshot };
    }

    /**
     * Undo `prepare` on the translated texts
     */
    restore(translated: Record<string, string>, snapshot: ProcessingSnapshot): Record<string, string> {
        let texts = { ...translated };

        if (this.options.autoProcessTextCodeSegment) {
            texts = restorePlaceholders(texts, snapshot.placeholders);
            texts = restoreAffixCodes(texts, snapshot.prefixes, snapshot.suffixes);
        }

        if (this.options.postTranslationSwitch) {
            texts = mapValues(texts, text => applyRules(text, this.postRules));
        }

        texts = mapValues(texts, unshieldNumberPrefix);

        const restored: Record<string, string> = {};
        for (const [key, text] of Object.entries(texts)) {
            const layout = snapshot.layouts[key];
            restored[key] = layout ? restoreLayout(text, layout) : text;
        }
        return restored;
    }
}
