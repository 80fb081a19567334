import { parseConfigValue } from '../state/ConfigStore';
import { TranslatorConfig } from '../state/types';
import { CommandError, CommandIO } from './types';

export interface ParsedCommandLine {
    command: string;
    args: string[];
    flags: Record<string, string | true>;
}

/**
 * Flags that override a config key for a single run
 */
export const OVERRIDE_FLAGS: Record<string, keyof TranslatorConfig> = {
    source: 'sourceLanguage',
    target: 'targetLanguage',
    provider: 'provider',
    model: 'model',
    template: 'promptTemplatePath',
    batch: 'batchSize',
    platform: 'targetPlatform'
};

/**
 * Split argv into a command name, positional arguments and `--flag value` / `--flag=value` pairs.
 * A flag followed by another flag (or nothing) is `true`.
 */
export function parseCommandLine(argv: string[]): ParsedCommandLine {
    const positional: string[] = [];
    const flags: Record<string, string | true> = {};

    for (let i = 0; i < argv.length; i++) {
        const token = argv[i];
        if (!token.startsWith('--') || token === '--') {
            positional.push(token);
            continue;
        }

        const body = token.slice(2);
        const eq = body.indexOf('=');
        if (eq >= 0) {
            flags[body.slice(0, eq)] = body.slice(eq + 1);
        } else if (i + 1 < argv.length && !argv[i + 1].startsWith('--')) {
            flags[body] = argv[i + 1];
            i++;
        } else {
            flags[body] = true;
        }
    }

    const [command = 'help', ...args] = positional;
    return { command: command.toLowerCase(), args, flags };
}

/**
 * Apply `--source`, `--target` and the other override flags on top of the loaded config
 */
export function applyOverrides(config: TranslatorConfig, flags: Record<string, string | true>): TranslatorConfig {
    let result = { ...config };
    for (const [flag, key] of Object.entries(OVERRIDE_FLAGS)) {
        const value = flags[flag];
        if (value === undefined) continue;
        if (value === true) {
            throw new CommandError(`--${flag} needs a value`);
        }
        try {
            result = { ...result, ...parseConfigValue(key, value) };
        } catch (error) {
            throw new CommandError(`--${flag}: ${error instanceof Error ? error.message : String(error)}`);
        }
    }
    return result;
}

export function stringFlag(flags: Record<string, string | true>, name: string): string | undefined {
    const value = flags[name];
    return typeof value === 'string' ? value : undefined;
}

export const consoleIO: CommandIO = {
    print(text: string) {
        process.stdout.write(text.endsWith('\n') ? text : `${text}\n`);
    },
    error(text: string) {
        console.error(text);
    }
};
