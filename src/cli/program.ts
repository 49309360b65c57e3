import { Command, CommanderError } from 'commander';
import { EXIT_OK, EXIT_USAGE, type CommandIO } from './io';

export function createProgram(io: CommandIO): Command {
    return new Command()
        .version('1.0.0')
        .exitOverride()
        .configureOutput({
            writeOut: str => io.stdout(str.trimEnd()),
            writeErr: str => io.stderr(str.trimEnd()),
        });
}

/**
 * Parse `argv` (arguments only, no node/script prefix). Returns an exit code
 * when commander already handled the invocation (help, version, bad usage).
 */
export function parseArguments(program: Command, argv: string[]): number | null {
    try {
        program.parse(argv, { from: 'user' });
        return null;
    } catch (err) {
        if (err instanceof CommanderError) {
            return err.exitCode === 0 ? EXIT_OK : EXIT_USAGE;
        }
        throw err;
    }
}
