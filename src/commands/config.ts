import { Command, CommandContext, CommandDependencies, CommandError } from './types';
import { isConfigKey, parseConfigValue } from '../state/ConfigStore';
import { TranslatorConfig } from '../state/types';
import { SYS_PREFIX } from '../constants';
import { help } from '../help';

/**
 * help - Display usage and the active configuration
 */
export const helpCommand: Command = {
    names: ['help'],
    usage: 'help',
    async execute(ctx: CommandContext, deps: CommandDependencies) {
        const config = await deps.configStore.load();
        const helpTexts = [
            `# STEPWISE TRANSLATOR
- Source language: ${config.sourceLanguage}
- Target language: ${config.targetLanguage}
- Provider: ${config.provider}
- Model: ${config.model}
- Temperature: ${config.temperature}
- Max response length (tokens): ${config.maxTokens}
- Batch size: ${config.batchSize}
- Prompt template: ${config.promptTemplatePath ?? 'built-in three-step prompt'}
- Code segment protection: ${config.autoProcessTextCodeSegment ? 'enabled' : 'disabled'}`,
            ...help
        ];

        for (const text of helpTexts) {
            ctx.io.print(text);
        }
    }
};

/**
 * config - Show or change stored configuration
 */
export const configCommand: Command = {
    names: ['config'],
    usage: 'config [KEY [VALUE]]',
    async execute(ctx: CommandContext, deps: CommandDependencies) {
        const [key, ...rest] = ctx.args;

        if (!key) {
            const config = await deps.configStore.load();
            ctx.io.print(JSON.stringify(config, null, 4));
            return;
        }

        if (!isConfigKey(key)) {
            throw new CommandError(`Unknown config key "${key}". Run "config" to list the keys.`);
        }

        if (rest.length === 0) {
            const config = await deps.configStore.load();
            ctx.io.print(JSON.stringify(config[key]));
            return;
        }

        let update: Partial<TranslatorConfig>;
        try {
            update = parseConfigValue(key, rest.join(' '));
        } catch (error) {
            throw new CommandError(error instanceof Error ? error.message : String(error));
        }

        const saved = await deps.configStore.save(update);
        ctx.io.error(`${SYS_PREFIX}Set ${key} to ${JSON.stringify(saved[key])}`);
    }
};

export const configCommands: Command[] = [
    helpCommand,
    configCommand
];
