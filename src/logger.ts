import pino, { type Logger } from 'pino';
import { CONFIG } from './config';

export type { Logger };

// stdout belongs to the tools' own output, so logs go to stderr
export function createLogger(level: string = CONFIG.LOG_LEVEL): Logger {
    return pino({
        level,
        transport: {
            target: 'pino-pretty',
            options: {
                colorize: true,
                destination: 2,
                ignore: 'pid,hostname',
            }
        }
    });
}
