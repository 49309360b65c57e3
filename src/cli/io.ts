import type { Logger } from '../logger';

/** Where a command writes. Tests swap in buffers and a captured logger. */
export interface CommandIO {
    stdout: (line: string) => void;
    stderr: (line: string) => void;
    logger: Logger;
}

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export function processIO(logger: Logger): CommandIO {
    return {
        stdout: line => { process.stdout.write(`${line}\n`); },
        stderr: line => { process.stderr.write(`${line}\n`); },
        logger,
    };
}
