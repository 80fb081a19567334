/**
 * The `<textarea>` exchange format: numbered source lines go out,
 * numbered translations come back.
 */

export class ResponseFormatError extends Error {
    constructor(message: string, readonly response: string) {
        super(message);
        this.name = 'ResponseFormatError';
    }
}

const OPEN_TAG = '<textarea>';
const CLOSE_TAG = '</textarea>';

export function buildSourceMessage(texts: string[]): string {
    const numbered = texts.map((text, i) => `${i + 1}.${text}`);
    return [OPEN_TAG, ...numbered, CLOSE_TAG].join('\n');
}

/**
 * Body of the last `<textarea>` block, without the line breaks hugging the tags
 */
export function extractTextarea(response: string): string {
    const lower = response.toLowerCase();
    const open = lower.lastIndexOf(OPEN_TAG);
    if (open < 0) {
        throw new ResponseFormatError('Response contains no <textarea> block', response);
    }

    const start = open + OPEN_TAG.length;
    const close = lower.indexOf(CLOSE_TAG, start);
    if (close < 0) {
        throw new ResponseFormatError('Response <textarea> block is not closed', response);
    }

    return response
        .slice(start, close)
        .replace(/^[ \t]*\r?\n/, '')
        .replace(/\r?\n[ \t]*$/, '');
}

/**
 * Split a response into its numbered items. A line starts a new item only when it
 * begins with the next expected number; any other line continues the current item.
 */
export function parseTranslationResponse(response: string, expectedCount: number): string[] {
    const body = extractTextarea(response);
    const items: string[] = [];
    let current: string[] | null = null;

    for (const line of body.split(/\r?\n/)) {
        const match = /^\s*(\d+)\.[ \t]*(.*)$/.exec(line);
        if (match && Number(match[1]) === items.length + (current ? 1 : 0) + 1) {
            if (current) {
                items.push(current.join('\n'));
            }
            current = [match[2]];
            continue;
        }

        if (!current) {
            if (!line.trim()) {
                continue;
            }
            throw new ResponseFormatError(`Expected line "1." but got ${JSON.stringify(line)}`, response);
        }
        current.push(line);
    }

    if (current) {
        items.push(current.join('\n'));
    }

    if (items.length !== expectedCount) {
        throw new ResponseFormatError(`Expected ${expectedCount} item(s) but the response has ${items.length}`, response);
    }

    return items;
}
