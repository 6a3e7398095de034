import pino, { type Logger } from 'pino';
import type { BibKgConfig } from '../types/index.js';

export type LoggerOptions = Partial<Pick<BibKgConfig, 'logLevel' | 'jsonLogs'>>;

/**
 * Logger singleton. Configured once at startup via `initLogger()`;
 * modules call `getLogger()` at the point of use.
 *
 * Logs go to stderr. Stdout belongs to `inspect` and `cache show`.
 */
let loggerInstance: Logger | null = null;

export function initLogger(options: LoggerOptions): Logger {
    const { logLevel = 'info', jsonLogs = false } = options;

    loggerInstance = jsonLogs
        ? pino({ level: logLevel }, pino.destination(2))
        : pino({
              level: logLevel,
              transport: {
                  target: 'pino-pretty',
                  options: {
                      destination: 2,
                      colorize: true,
                      translateTime: 'HH:MM:ss',
                      ignore: 'pid,hostname',
                  },
              },
          });

    return loggerInstance;
}

/**
 * Get the logger, falling back to JSON on stderr at info level when
 * `initLogger()` was never called (library use, tests).
 */
export function getLogger(): Logger {
    if (!loggerInstance) {
        loggerInstance = pino({ level: 'info' }, pino.destination(2));
    }
    return loggerInstance;
}
