import { ConfigStore } from '../state/ConfigStore';
import { TranslatorConfig } from '../state/types';
import { TranslationProvider } from '../translation/providers';

/**
 * Where a command writes its output
 */
export interface CommandIO {
    /** Regular output (rendered prompts, translated text, JSON) */
    print(text: string): void;
    /** Status and error messages */
    error(text: string): void;
}

/**
 * Context passed to all command handlers
 */
export interface CommandContext {
    args: string[];
    flags: Record<string, string | true>;
    io: CommandIO;
}

/**
 * Dependencies injected into command handlers
 */
export interface CommandDependencies {
    configStore: ConfigStore;
    createProvider(config: TranslatorConfig): TranslationProvider;
}

/**
 * Interface for a command handler
 */
export interface Command {
    /** Command name(s) that trigger this handler */
    names: string[];
    /** One-line usage shown when arguments are missing */
    usage: string;
    /** Execute the command */
    execute(ctx: CommandContext, deps: CommandDependencies): Promise<void>;
}

/**
 * Raised by a command to stop with a non-zero exit code
 */
export class CommandError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'CommandError';
    }
}
