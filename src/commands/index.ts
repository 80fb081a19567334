/**
 * Command line entry point built on the command registry
 */

import { Command, CommandDependencies, CommandIO } from './types';
import { CommandRegistry } from './registry';
import { consoleIO, parseCommandLine } from './utils';
import { ERROR_PREFIX } from '../constants';
import { configCommands } from './config';
import { translateCommands } from './translate';

export const allCommands: Command[] = [
    ...configCommands,
    ...translateCommands
];

export function createRegistry(commands: Command[] = allCommands): CommandRegistry {
    const registry = new CommandRegistry();
    registry.registerAll(commands);
    return registry;
}

/**
 * Run one command line and return the process exit code
 */
export async function runCli(
    argv: string[],
    deps: CommandDependencies,
    io: CommandIO = consoleIO,
    registry: CommandRegistry = createRegistry()
): Promise<number> {
    const { command, args, flags } = parseCommandLine(argv);
    const name = flags.help === true ? 'help' : command;

    try {
        const found = await registry.execute(name, { args, flags, io }, deps);
        return found ? 0 : 1;
    } catch (error) {
        io.error(`${ERROR_PREFIX}${error instanceof Error ? error.message : String(error)}`);
        return 1;
    }
}

export { CommandRegistry } from './registry';
export { CommandError } from './types';
export type { Command, CommandContext, CommandDependencies, CommandIO } from './types';
