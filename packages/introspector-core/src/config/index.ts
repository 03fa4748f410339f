import dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigError } from '../utils/errors.js';

// Loads .env from the working directory, if any. Existing variables win.
dotenv.config();

const LOG_LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'] as const;

const envSchema = z.object({
    LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
    SCRIPTSCOPE_LOG_DIR: z.string().min(1).optional(),
    SCRIPTSCOPE_DOC_MAX_LENGTH: z.coerce.number().int().positive().default(80),
});

export interface AppConfig {
    readonly logLevel: (typeof LOG_LEVELS)[number];
    /** Directory for JSON log files. File logging is off when unset. */
    readonly logDir?: string;
    /** Upper bound for generated script descriptions. */
    readonly documentationMaxLength: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const parsed = envSchema.safeParse(env);
    if (!parsed.success) {
        const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
        throw new ConfigError(`Invalid environment configuration: ${issues.join('; ')}`, { issues });
    }
    return Object.freeze({
        logLevel: parsed.data.LOG_LEVEL,
        logDir: parsed.data.SCRIPTSCOPE_LOG_DIR,
        documentationMaxLength: parsed.data.SCRIPTSCOPE_DOC_MAX_LENGTH,
    });
}

export const config: AppConfig = loadConfig();
