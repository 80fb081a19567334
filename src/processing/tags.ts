/**
 * Tag-only entries such as `<name:Some text>` or `<a:one> <b:two>` are reduced to
 * their inner text before translation and rebuilt afterwards.
 */

export const TAG_SEPARATOR = '\n===TAG_SEPARATOR===\n';

const ANY_TAG = /<[^>]+>/g;
const COLON_TAG = /^(<[^:>]+:)([^]*?)(>)$/;
const SIMPLE_TAG = /^<[^:>]+>$/;

export type TagPart =
    | { kind: 'colon'; prefix: string; suffix: string; contentLeading: string; contentTrailing: string }
    | { kind: 'simple'; tag: string };

export type TagLayout =
    | { type: 'single'; part: TagPart; leading: string; trailing: string }
    | { type: 'multiple'; parts: TagPart[]; separators: string[] };

export interface TagExtraction {
    text: string;
    layout: TagLayout | null;
}

/**
 * Drop `//` line comments and `/* *\/` block comments.
 * A `//` directly after `:` (as in `https://`) is kept.
 */
export function removeComments(text: string): string {
    const withoutLineComments = text
        .split('\n')
        .map(line => line.replace(/(^|[^:])\/\/.*$/, '$1'))
        .join('\n');
    return withoutLineComments.replace(/\/\*[^]*?\*\//g, '');
}

function leadingWhitespace(text: string): string {
    return text.slice(0, text.length - text.trimStart().length);
}

function trailingWhitespace(text: string): string {
    return text.slice(text.trimEnd().length);
}

function classify(tag: string): { part: TagPart; content: string } | null {
    const colon = COLON_TAG.exec(tag);
    if (colon) {
        const inner = colon[2];
        return {
            part: {
                kind: 'colon',
                prefix: colon[1],
                suffix: colon[3],
                contentLeading: leadingWhitespace(inner),
                contentTrailing: trailingWhitespace(inner)
            },
            content: inner.trim()
        };
    }
    if (SIMPLE_TAG.test(tag)) {
        return { part: { kind: 'simple', tag }, content: '' };
    }
    return null;
}

function extractMultiple(text: string): TagExtraction | null {
    const matches = [...text.matchAll(ANY_TAG)];
    if (matches.length < 2) {
        return null;
    }

    const parts: TagPart[] = [];
    const contents: string[] = [];
    const separators: string[] = [];
    let lastEnd = 0;

    for (const match of matches) {
        const start = match.index ?? 0;
        const separator = text.slice(lastEnd, start);
        if (separator.trim()) {
            return null;
        }
        const classified = classify(match[0]);
        if (!classified) {
            return null;
        }
        separators.push(separator);
        parts.push(classified.part);
        contents.push(classified.content);
        lastEnd = start + match[0].length;
    }

    const tail = text.slice(lastEnd);
    if (tail.trim()) {
        return null;
    }
    separators.push(tail);

    return {
        text: contents.join(TAG_SEPARATOR),
        layout: { type: 'multiple', parts, separators }
    };
}

function extractSingle(text: string): TagExtraction | null {
    const stripped = text.trim();
    const matches = [...stripped.matchAll(ANY_TAG)];
    if (matches.length !== 1 || matches[0][0] !== stripped) {
        return null;
    }

    const classified = classify(stripped);
    if (!classified) {
        return null;
    }

    return {
        text: classified.content,
        layout: {
            type: 'single',
            part: classified.part,
            leading: leadingWhitespace(text),
            trailing: trailingWhitespace(text)
        }
    };
}

/**
 * Pull translatable content out of tag-only text.
 * Text that is not made solely of tags comes back untouched with a `null` layout.
 */
export function extractTags(text: string): TagExtraction {
    const cleaned = removeComments(text);
    return extractMultiple(cleaned) ?? extractSingle(cleaned) ?? { text, layout: null };
}

function rebuildPart(part: TagPart, content: string): string {
    if (part.kind === 'simple') {
        return part.tag;
    }
    return part.prefix + part.contentLeading + content + part.contentTrailing + part.suffix;
}

export function restoreTags(content: string, layout: TagLayout | null): string {
    if (!layout) {
        return content;
    }

    if (layout.type === 'single') {
        return layout.leading + rebuildPart(layout.part, content) + layout.trailing;
    }

    const translated = content.split(TAG_SEPARATOR);
    if (translated.length !== layout.parts.length) {
        console.warn(`⚠️ Tag count mismatch: expected ${layout.parts.length}, got ${translated.length}`);
    }

    let result = layout.separators[0] ?? '';
    layout.parts.forEach((part, i) => {
        result += rebuildPart(part, translated[i] ?? '');
        result += layout.separators[i + 1] ?? '';
    });
    return result;
}
