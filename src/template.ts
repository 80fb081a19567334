/**
 * `{name}`-style placeholder substitution for prompt templates
 */

const PLACEHOLDER_PATTERN = /\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

export class MissingPlaceholderError extends Error {
    readonly missing: string[];

    constructor(missing: string[]) {
        super(`Missing value for placeholder(s): ${missing.map(name => `{${name}}`).join(', ')}`);
        this.name = 'MissingPlaceholderError';
        this.missing = missing;
    }
}

/**
 * Distinct placeholder names, in order of first appearance
 */
export function listPlaceholders(template: string): string[] {
    const names: string[] = [];
    for (const match of template.matchAll(PLACEHOLDER_PATTERN)) {
        if (!names.includes(match[1])) {
            names.push(match[1]);
        }
    }
    return names;
}

/**
 * Substitute every placeholder with its value.
 * Values are inserted literally and are not scanned for further placeholders.
 */
export function renderTemplate(template: string, values: Record<string, string>): string {
    const missing = listPlaceholders(template).filter(
        name => !Object.prototype.hasOwnProperty.call(values, name)
    );
    if (missing.length > 0) {
        throw new MissingPlaceholderError(missing);
    }

    return template.replace(PLACEHOLDER_PATTERN, (_match, name: string) => values[name]);
}
