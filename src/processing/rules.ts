/**
 * Find-and-replace rules applied before or after translation
 */
export interface ReplacementRule {
    /** Literal text to replace */
    src?: string;
    /** Replacement; `$1`-style references are honoured for `regex` rules */
    dst?: string;
    /** Regular expression; takes precedence over `src` */
    regex?: string;
}

export interface CompiledRule {
    src?: string;
    dst: string;
    regex?: RegExp;
}

export function compileRules(rules: ReplacementRule[] = []): CompiledRule[] {
    const compiled: CompiledRule[] = [];
    for (const rule of rules) {
        const dst = rule.dst ?? '';
        if (rule.regex) {
            try {
                compiled.push({ dst, regex: new RegExp(rule.regex, 'g') });
            } catch (error) {
                console.warn(`⚠️ Skipping replacement rule with invalid regex ${rule.regex}:`, error instanceof Error ? error.message : error);
            }
            continue;
        }
        if (rule.src) {
            compiled.push({ src: rule.src, dst });
        }
    }
    return compiled;
}

export function applyRules(text: string, rules: CompiledRule[]): string {
    let current = text;
    for (const rule of rules) {
        if (rule.regex) {
            current = current.replace(rule.regex, rule.dst);
        } else if (rule.src) {
            current = current.split(rule.src).join(rule.dst);
        }
    }
    return current;
}
