const NUMBER_PREFIX = /^(\d+)\./gm;
const SHIELDED_PREFIX = /^【(\d+)】/gm;

/**
 * "1. Title" -> "【1】 Title" on every line, so a list number cannot be mistaken
 * for the numbering of the request lines.
 */
export function shieldNumberPrefix(text: string): string {
    return text.replace(NUMBER_PREFIX, '【$1】');
}

export function unshieldNumberPrefix(text: string): string {
    return text.replace(SHIELDED_PREFIX, '$1.');
}
