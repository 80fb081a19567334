import fs from 'fs';
import path from 'path';
import { Command, CommandContext, CommandDependencies, CommandError } from './types';
import { applyOverrides, stringFlag } from './utils';
import { SYS_PREFIX } from '../constants';
import { checkPromptTemplate } from '../promptCheck';
import { TranslationCache } from '../state/TranslationCache';
import { renderTemplate } from '../template';
import { loadPromptTemplate, Translator } from '../translation/Translator';

/**
 * Entries read from an input file, with the shape needed to write them back
 */
export type EntryFile =
    | { format: 'json-object'; keys: string[]; sources: string[] }
    | { format: 'json-array'; sources: string[] }
    | { format: 'text'; sources: string[] };

/**
 * Parse input contents: `.json` files hold an object or array of strings,
 * anything else is one entry per line
 */
export function parseEntries(fileName: string, raw: string): EntryFile {
    if (path.extname(fileName).toLowerCase() !== '.json') {
        const body = raw.replace(/\r?\n$/, '');
        return { format: 'text', sources: body === '' ? [] : body.split(/\r?\n/) };
    }

    let data: unknown;
    try {
        data = JSON.parse(raw);
    } catch (error) {
        throw new CommandError(`${fileName} is not valid JSON: ${error instanceof Error ? error.message : error}`);
    }

    if (Array.isArray(data)) {
        const sources: string[] = [];
        for (const value of data) {
            if (typeof value !== 'string') {
                throw new CommandError(`${fileName} must contain only strings`);
            }
            sources.push(value);
        }
        return { format: 'json-array', sources };
    }

    if (typeof data === 'object' && data !== null) {
        const keys: string[] = [];
        const sources: string[] = [];
        for (const [key, value] of Object.entries(data)) {
            if (typeof value !== 'string') {
                throw new CommandError(`${fileName}: value of "${key}" is not a string`);
            }
            keys.push(key);
            sources.push(value);
        }
        return { format: 'json-object', keys, sources };
    }

    throw new CommandError(`${fileName} must contain a JSON object or array of strings`);
}

/**
 * Serialize translations in the same shape as the input
 */
export function serializeEntries(file: EntryFile, translations: string[]): string {
    switch (file.format) {
        case 'json-object':
            return JSON.stringify(Object.fromEntries(file.keys.map((key, i) => [key, translations[i]])), null, 2) + '\n';
        case 'json-array':
            return JSON.stringify(translations, null, 2) + '\n';
        case 'text':
            return translations.length === 0 ? '' : translations.join('\n') + '\n';
    }
}

/**
 * `dir/name.json` → `dir/name.<target>.json`
 */
export function defaultOutputPath(inputPath: string, targetLanguage: string): string {
    const { dir, name, ext } = path.parse(inputPath);
    const suffix = targetLanguage.toLowerCase().replace(/[^\w.-]+/g, '_');
    return path.join(dir, `${name}.${suffix}${ext}`);
}

/**
 * render - Print the system prompt for the configured languages
 */
export const renderCommand: Command = {
    names: ['render', 'prompt'],
    usage: 'render [--source LANGUAGE] [--target LANGUAGE] [--template FILE]',
    async execute(ctx: CommandContext, deps: CommandDependencies) {
        const config = applyOverrides(await deps.configStore.load(), ctx.flags);
        const template = await loadPromptTemplate(config);
        ctx.io.print(renderTemplate(template, {
            source_language: config.sourceLanguage,
            target_language: config.targetLanguage
        }));
    }
};

/**
 * check - Report problems in the prompt template
 */
export const checkCommand: Command = {
    names: ['check'],
    usage: 'check [--template FILE]',
    async execute(ctx: CommandContext, deps: CommandDependencies) {
        const config = applyOverrides(await deps.configStore.load(), ctx.flags);
        const template = await loadPromptTemplate(config);
        const issues = checkPromptTemplate(template);
        const label = config.promptTemplatePath ?? 'Built-in prompt';

        if (issues.length === 0) {
            ctx.io.print(`✅ ${label} has no issues`);
            return;
        }

        for (const issue of issues) {
            ctx.io.error(`- [${issue.code}] ${issue.message}`);
        }
        throw new CommandError(`${label} has ${issues.length} issue(s)`);
    }
};

/**
 * translate - Translate every entry of a file, resuming from the cache
 */
export const translateCommand: Command = {
    names: ['translate'],
    usage: 'translate <input> [--out FILE]',
    async execute(ctx: CommandContext, deps: CommandDependencies) {
        const inputPath = ctx.args[0];
        if (!inputPath) {
            throw new CommandError(`Usage: ${translateCommand.usage}`);
        }

        const config = applyOverrides(await deps.configStore.load(), ctx.flags);
        const template = await loadPromptTemplate(config);
        const entries = parseEntries(inputPath, await fs.promises.readFile(inputPath, 'utf8'));

        const cache = await TranslationCache.open(
            path.basename(inputPath),
            config.sourceLanguage,
            config.targetLanguage,
            config.dataDir
        );
        cache.syncSources(entries.sources);

        const translator = new Translator(deps.createProvider(config), config, { template });
        const summary = await translator.translateAll(cache, (done, total) => {
            ctx.io.error(`${SYS_PREFIX}${done}/${total} pending item(s) processed`);
        });

        const translations = cache.getAllItems().map(item =>
            item.status === 'translated' && item.translation !== undefined ? item.translation : item.source
        );
        const outPath = stringFlag(ctx.flags, 'out') ?? defaultOutputPath(inputPath, config.targetLanguage);
        await fs.promises.writeFile(outPath, serializeEntries(entries, translations));
        ctx.io.error(`${SYS_PREFIX}Wrote ${translations.length} item(s) to ${outPath}`);

        if (summary.failed > 0) {
            throw new CommandError(`${summary.failed} item(s) failed and kept their source text. Run the command again to retry them.`);
        }
    }
};

export const translateCommands: Command[] = [
    renderCommand,
    checkCommand,
    translateCommand
];
