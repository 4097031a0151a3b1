import { z } from 'zod';
import type { LogLevel } from '@nestjs/common';

export const APP_CONFIG = 'AppConfig';

export type EnvSource = Record<string, string | undefined>;

const LOG_LEVELS = ['fatal', 'error', 'warn', 'log', 'debug', 'verbose'] as const;

export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigError';
    }
}

const appConfigSchema = z
    .object({
        PORT: z.coerce.number().int().positive().default(3001),
        JWT_SECRET: z.string().min(1).default('change-me'),
        // RSA modulus for per-repository deploy keys. Never below 2048.
        REPO_KEY_BITS: z.coerce.number().int().min(2048).default(2048),
        REPO_DEFAULT_TIMEOUT: z.coerce.number().int().positive().default(900),
        LOG_LEVEL: z.enum(LOG_LEVELS).default('log'),
    })
    .transform((env) => ({
        port: env.PORT,
        jwtSecret: env.JWT_SECRET,
        keyBits: env.REPO_KEY_BITS,
        defaultTimeout: env.REPO_DEFAULT_TIMEOUT,
        logLevel: env.LOG_LEVEL,
    }));

export type AppConfig = z.infer<typeof appConfigSchema>;

export function loadAppConfig(env: EnvSource = process.env): AppConfig {
    const result = appConfigSchema.safeParse(env);
    if (!result.success) {
        const details = result.error.issues
            .map((issue) => `  - ${issue.path.length > 0 ? issue.path.join('.') : '<root>'}: ${issue.message}`)
            .join('\n');
        throw new ConfigError(`Invalid environment configuration\n${details}`);
    }
    return result.data;
}

/**
 * Levels Nest should print for a threshold, most severe first.
 */
export function logLevelsFor(threshold: AppConfig['logLevel']): LogLevel[] {
    return LOG_LEVELS.slice(0, LOG_LEVELS.indexOf(threshold) + 1);
}
