import { Command, CommandContext, CommandDependencies } from './types';
import { ERROR_PREFIX } from '../constants';

/**
 * Maps command names and aliases (case-insensitive) to their handlers
 */
export class CommandRegistry {
    private commands: Map<string, Command> = new Map();

    /**
     * Add a command under all of its names. A name already taken by another command is an error.
     */
    register(command: Command): void {
        for (const name of command.names) {
            const key = name.toLowerCase();
            const existing = this.commands.get(key);
            if (existing && existing !== command) {
                throw new Error(`Command name "${key}" is already registered`);
            }
            this.commands.set(key, command);
        }
    }

    registerAll(commands: Command[]): void {
        commands.forEach(command => this.register(command));
    }

    get(name: string): Command | undefined {
        return this.commands.get(name.toLowerCase());
    }

    has(name: string): boolean {
        return this.commands.has(name.toLowerCase());
    }

    /**
     * Each registered command once, in registration order
     */
    list(): Command[] {
        return [...new Set(this.commands.values())];
    }

    /**
     * Run the named command. Returns false when no command has that name.
     */
    async execute(commandName: string, ctx: CommandContext, deps: CommandDependencies): Promise<boolean> {
        const command = this.get(commandName);
        if (!command) {
            const known = this.list().map(c => c.names[0]).join(', ');
            ctx.io.error(`${ERROR_PREFIX}Unrecognized command "${commandName}". Available commands: ${known}.`);
            return false;
        }

        await command.execute(ctx, deps);
        return true;
    }

    /**
     * All names, aliases included
     */
    getCommandNames(): string[] {
        return [...this.commands.keys()];
    }
}
