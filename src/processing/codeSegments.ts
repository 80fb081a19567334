/**
 * Protection of code segments (control codes, format specifiers, markup) that the
 * model must not touch. Segments at the edges of an entry are cut off and glued back
 * on afterwards; segments in the middle are swapped for numbered placeholders.
 */

export const MAX_PLACEHOLDERS_PER_BATCH = 50;

export interface ExclusionEntry {
    /** Literal text to protect */
    markers?: string;
    /** Regular expression to protect; takes precedence over `markers` */
    regex?: string;
}

export interface AffixCode {
    text: string;
    pattern: string;
}

export interface PlaceholderEntry {
    placeholder: string;
    original: string;
    pattern: string;
}

export interface AffixSplit {
    texts: Record<string, string>;
    prefixes: Record<string, AffixCode[]>;
    suffixes: Record<string, AffixCode[]>;
}

export interface PlaceholderSplit {
    texts: Record<string, string>;
    placeholders: Record<string, PlaceholderEntry[]>;
}

export function escapeRegExp(text: string): string {
    return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Regex sources from the pattern library followed by those from the exclusion list
 */
export function collectPatternSources(library: string[], exclusions: ExclusionEntry[] = []): string[] {
    const sources = library.filter(Boolean);
    for (const entry of exclusions) {
        if (entry.regex) {
            sources.push(entry.regex);
        } else if (entry.markers) {
            sources.push(escapeRegExp(entry.markers));
        }
    }
    return sources;
}

/**
 * Compile each source as `\s*<source>\s*`, case-insensitive and multiline.
 * Sources that do not compile are reported and skipped.
 */
export function compileCodePatterns(sources: string[]): RegExp[] {
    const compiled: RegExp[] = [];
    for (const source of sources) {
        try {
            compiled.push(new RegExp(`\\s*${source}\\s*`, 'gim'));
        } catch (error) {
            console.warn(`⚠️ Skipping invalid code pattern ${source}:`, error instanceof Error ? error.message : error);
        }
    }
    return compiled;
}

function matchAtStart(pattern: RegExp, text: string): string | null {
    const anchored = new RegExp(pattern.source, 'imy');
    const match = anchored.exec(text);
    return match && match[0].length > 0 ? match[0] : null;
}

function lastMatchAtEnd(pattern: RegExp, text: string): RegExpMatchArray | null {
    let found: RegExpMatchArray | null = null;
    for (const match of text.matchAll(pattern)) {
        if (match[0].length > 0 && (match.index ?? 0) + match[0].length === text.length) {
            found = match;
        }
    }
    return found;
}

function splitAffixes(text: string, patterns: RegExp[]): { core: string; prefixes: AffixCode[]; suffixes: AffixCode[] } {
    let core = text;
    let prefixes: AffixCode[] = [];
    let suffixes: AffixCode[] = [];

    for (const pattern of patterns) {
        let prefix = matchAtStart(pattern, core);
        while (prefix !== null) {
            prefixes.push({ text: prefix, pattern: pattern.source });
            core = core.slice(prefix.length);
            prefix = matchAtStart(pattern, core);
        }
    }

    for (const pattern of patterns) {
        let suffix = lastMatchAtEnd(pattern, core);
        while (suffix !== null) {
            suffixes.unshift({ text: suffix[0], pattern: pattern.source });
            core = core.slice(0, suffix.index ?? 0);
            suffix = lastMatchAtEnd(pattern, core);
        }
    }

    // Nothing left to translate: hand the shorter side back to the text
    if (!core.trim() && (prefixes.length > 0 || suffixes.length > 0)) {
        const prefixText = prefixes.map(p => p.text).join('');
        const suffixText = suffixes.map(s => s.text).join('');
        if (prefixes.length > 0 && suffixes.length > 0) {
            if (prefixText.length > suffixText.length) {
                core = core + suffixText;
                suffixes = [];
            } else {
                core = prefixText + core;
                prefixes = [];
            }
        } else if (prefixes.length > 0) {
            core = prefixText + core;
            prefixes = [];
        } else {
            core = core + suffixText;
            suffixes = [];
        }
    }

    return { core, prefixes, suffixes };
}

export function extractAffixCodes(texts: Record<string, string>, patterns: RegExp[]): AffixSplit {
    const result: AffixSplit = { texts: {}, prefixes: {}, suffixes: {} };
    for (const [key, text] of Object.entries(texts)) {
        const { core, prefixes, suffixes } = splitAffixes(text, patterns);
        result.texts[key] = core;
        result.prefixes[key] = prefixes;
        result.suffixes[key] = suffixes;
    }
    return result;
}

export function restoreAffixCodes(
    texts: Record<string, string>,
    prefixes: Record<string, AffixCode[]>,
    suffixes: Record<string, AffixCode[]>
): Record<string, string> {
    const restored: Record<string, string> = {};
    for (const [key, text] of Object.entries(texts)) {
        const prefix = (prefixes[key] ?? []).map(p => p.text).join('');
        const suffix = (suffixes[key] ?? []).map(s => s.text).join('');
        restored[key] = `${prefix}${text}${suffix}`;
    }
    return restored;
}

/**
 * Replace inner code segments with `[P1]`, `[P2]`, ... numbered across the whole batch.
 * The `sakura` platform gets arrow runs (`↓`, `↓↓`, ...) numbered per entry instead.
 */
export function replaceWithPlaceholders(
    texts: Record<string, string>,
    patterns: RegExp[],
    targetPlatform?: string
): PlaceholderSplit {
    const result: PlaceholderSplit = { texts: {}, placeholders: {} };
    let batchCount = 0;

    for (const [key, original] of Object.entries(texts)) {
        let current = original;
        const entries: PlaceholderEntry[] = [];
        let entryCount = 0;

        for (const pattern of patterns) {
            current = current.replace(pattern, matched => {
                if (batchCount >= MAX_PLACEHOLDERS_PER_BATCH) {
                    return matched;
                }
                batchCount++;
                entryCount++;
                const placeholder = targetPlatform === 'sakura' ? '↓'.repeat(entryCount) : `[P${batchCount}]`;
                entries.push({ placeholder, original: matched, pattern: pattern.source });
                return placeholder;
            });

            if (batchCount >= MAX_PLACEHOLDERS_PER_BATCH) {
                break;
            }
        }

        result.texts[key] = current;
        result.placeholders[key] = entries;
    }

    return result;
}

export function restorePlaceholders(
    texts: Record<string, string>,
    placeholders: Record<string, PlaceholderEntry[]>
): Record<string, string> {
    const restored: Record<string, string> = {};
    for (const [key, text] of Object.entries(texts)) {
        let current = text;
        for (const entry of [...(placeholders[key] ?? [])].reverse()) {
            const at = current.indexOf(entry.placeholder);
            if (at < 0) {
                console.warn(`⚠️ Placeholder ${entry.placeholder} missing from "${key}", dropping ${JSON.stringify(entry.original)}`);
                continue;
            }
            current = current.slice(0, at) + entry.original + current.slice(at + entry.placeholder.length);
        }
        restored[key] = current;
    }
    return restored;
}
