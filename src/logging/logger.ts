import pino from 'pino';
import type { LoggingConfig } from '../config.js';

export type Logger = pino.Logger;

/** stdout belongs to the MCP stdio transport, so console output goes here. */
export const LOG_FD = 2;

export function prettyTransport(): pino.TransportSingleOptions {
    return {
        target: 'pino-pretty',
        options: { colorize: true, translateTime: 'HH:MM:ss', destination: LOG_FD },
    };
}

/**
 * Creates the server logger, writing to a file when one is configured and to stderr otherwise.
 */
export function createLogger(config?: Partial<LoggingConfig>): Logger {
    const level = config?.level ?? 'info';
    const isJson = config?.json ?? process.env['NODE_ENV'] === 'production';

    if (config?.file) {
        return pino({ level }, pino.destination(config.file));
    }

    if (isJson) {
        return pino({ level }, pino.destination(LOG_FD));
    }

    return pino({ level, transport: prettyTransport() });
}
