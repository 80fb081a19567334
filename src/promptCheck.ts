import { listPlaceholders } from './template';

export const REQUIRED_PLACEHOLDERS = ['source_language', 'target_language'] as const;
export const WORKFLOW_STEPS = ['literal translation', 'correction', 'idiomatic polishing'] as const;

export interface PromptIssue {
    code: 'missing-placeholder' | 'unknown-placeholder' | 'missing-output-format' | 'step-order';
    message: string;
}

/**
 * Static consistency checks for a translation prompt template.
 * Returns an empty list when the template honours its contract.
 */
export function checkPromptTemplate(template: string): PromptIssue[] {
    const issues: PromptIssue[] = [];
    const placeholders = listPlaceholders(template);
    const required: readonly string[] = REQUIRED_PLACEHOLDERS;

    for (const name of REQUIRED_PLACEHOLDERS) {
        if (!placeholders.includes(name)) {
            issues.push({ code: 'missing-placeholder', message: `Placeholder {${name}} does not appear in the template` });
        }
    }

    for (const name of placeholders) {
        if (!required.includes(name)) {
            issues.push({ code: 'unknown-placeholder', message: `Unexpected placeholder {${name}}` });
        }
    }

    if (!/<textarea>[ \t]*\r?\n[ \t]*1\.[^]*?<\/textarea>/i.test(template)) {
        issues.push({
            code: 'missing-output-format',
            message: 'Output instruction must show a <textarea> block whose first line starts with "1."'
        });
    }

    const lower = template.toLowerCase();
    let cursor = 0;
    for (const step of WORKFLOW_STEPS) {
        const position = lower.indexOf(step, cursor);
        if (position < 0) {
            const anywhere = lower.includes(step);
            issues.push({
                code: 'step-order',
                message: anywhere
                    ? `Step "${step}" appears out of order`
                    : `Step "${step}" is not mentioned`
            });
            continue;
        }
        cursor = position + step.length;
    }

    return issues;
}
