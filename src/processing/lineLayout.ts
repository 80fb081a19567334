import { normalizeLineEndings, restoreLineEndings } from './lineEndings';
import { extractTags, restoreTags, TagLayout } from './tags';

const JAPANESE_CHARS =
    '\\u3040-\\u309F\\u30A0-\\u30FF\\u30FB-\\u30FE\\uFF65-\\uFF9F' +
    '\\u4E00-\\u9FFF\\u3400-\\u4DBF\\u3001-\\u303F\\uFF01-\\uFF5E';

const WHITESPACE_AFFIX = /^(\s*)(.*?)(\s*)$/;
const JAPANESE_AFFIX = new RegExp(`^([^${JAPANESE_CHARS}]*)(.*?)([^${JAPANESE_CHARS}]*)$`);

const OPENING_BRACKETS = ['[', '{', '（', '('];
const CLOSING_BRACKETS = [']', '}', '）', ')'];

export type LineInfo =
    | { empty: true; original: string }
    | { empty: false; prefix: string; suffix: string };

export interface LineLayout {
    endings: string[];
    lines: LineInfo[];
    tags: TagLayout | null;
}

export interface StrippedText {
    text: string;
    layout: LineLayout;
}

export function isJapanese(sourceLanguage: string): boolean {
    const lang = sourceLanguage.trim().toLowerCase();
    return lang === 'ja' || lang === 'japanese';
}

function isDigits(text: string): boolean {
    return /^\d+$/.test(text);
}

function keepBrackets(prefix: string, core: string, suffix: string): [string, string, string] {
    const opening = OPENING_BRACKETS.find(b => prefix.endsWith(b));
    if (opening) {
        core = opening + core;
        prefix = prefix.slice(0, -opening.length);
    }

    const closing = CLOSING_BRACKETS.find(b => suffix.startsWith(b));
    if (closing) {
        core = core + closing;
        suffix = suffix.slice(closing.length);
    }

    if (suffix && isDigits(suffix)) {
        core += suffix;
        suffix = '';
    }

    return [prefix, core, suffix];
}

function splitLine(line: string, pattern: RegExp): { prefix: string; core: string; suffix: string } {
    const match = pattern.exec(line);
    if (!match) {
        return { prefix: '', core: line, suffix: '' };
    }

    let [prefix, core, suffix] = keepBrackets(match[1], match[2], match[3]);

    if (!core.trim()) {
        return { prefix: '', core: line, suffix: '' };
    }

    // Numbers beside the text are part of it; only the outer whitespace is kept aside
    if (isDigits(prefix.trim())) {
        const leading = prefix.slice(0, prefix.length - prefix.trimStart().length);
        core = prefix.slice(leading.length) + core;
        prefix = leading;
    }
    if (isDigits(suffix.trim())) {
        const trailing = suffix.slice(suffix.trimEnd().length);
        core = core + suffix.slice(0, suffix.length - trailing.length);
        suffix = trailing;
    }

    return { prefix, core, suffix };
}

/**
 * Reduce an entry to the text worth translating: tag contents only, `\n` breaks,
 * no blank lines and no outer whitespace (or non-Japanese affixes) on any line.
 */
export function stripLayout(text: string, sourceLanguage: string): StrippedText {
    const { text: tagText, layout: tags } = extractTags(text);
    const { text: normalized, endings } = normalizeLineEndings(tagText);
    const pattern = isJapanese(sourceLanguage) ? JAPANESE_AFFIX : WHITESPACE_AFFIX;

    const kept: string[] = [];
    const lines: LineInfo[] = [];

    for (const line of normalized.split('\n')) {
        if (!line.trim()) {
            lines.push({ empty: true, original: line });
            continue;
        }
        const { prefix, core, suffix } = splitLine(line, pattern);
        kept.push(core);
        lines.push({ empty: false, prefix, suffix });
    }

    return { text: kept.join('\n'), layout: { endings, lines, tags } };
}

export function restoreLayout(text: string, layout: LineLayout): string {
    const expected = layout.lines.filter(line => !line.empty).length;
    const translated = expected === 0 && text === '' ? [] : text.split('\n');
    if (translated.length !== expected) {
        console.warn(`⚠️ Line count mismatch: expected ${expected}, got ${translated.length}`);
    }

    let next = 0;
    const restored = layout.lines.map(line => {
        if (line.empty) {
            return line.original;
        }
        const content = next < translated.length ? translated[next] : '';
        next++;
        return `${line.prefix}${content}${line.suffix}`;
    });

    const withEndings = restoreLineEndings(restored.join('\n'), layout.endings);
    return restoreTags(withEndings, layout.tags);
}
