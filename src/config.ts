import { z } from 'zod';

const booleanFlag = z
    .enum(['true', 'false', '1', '0'])
    .transform((v) => v === 'true' || v === '1');

const loggingSchema = z.object({
    LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
    LOG_JSON: booleanFlag.optional(),
    LOG_FILE: z.string().min(1).optional(),
});

export interface LoggingConfig {
    level: 'debug' | 'info' | 'warn' | 'error';
    json?: boolean;
    file?: string;
}

export interface AuditorConfig {
    logging: LoggingConfig;
}

/**
 * Reads server configuration from environment variables.
 * Throws on values that do not match the schema.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AuditorConfig {
    const result = loggingSchema.safeParse(env);
    if (!result.success) {
        const issues = result.error.issues
            .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
            .join('; ');
        throw new Error(`Invalid configuration: ${issues}`);
    }

    const { LOG_LEVEL, LOG_JSON, LOG_FILE } = result.data;
    return {
        logging: {
            level: LOG_LEVEL,
            ...(LOG_JSON !== undefined ? { json: LOG_JSON } : {}),
            ...(LOG_FILE ? { file: LOG_FILE } : {}),
        },
    };
}
