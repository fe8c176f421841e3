import { z } from 'zod';
import dotenv from 'dotenv';

dotenv.config();

/**
 * Environment variable schema validation.
 * Every variable has a default, so an empty environment yields a working dev setup.
 */
const EnvSchema = z.object({
    PORT: z.coerce.number().int().min(1).max(65535).default(3000),
    HOST: z.string().min(1).default('0.0.0.0'),
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
    WRAPPER_APP_NAME: z.string().min(1).default('wrapper'),
    WRAPPER_ENV: z.string().min(1).default('dev'),
    // Interpolated into DDL, so only plain identifiers are accepted
    WRAPPER_TABLE_NAME: z.string().regex(/^[A-Za-z_][A-Za-z0-9_]*$/, 'must be a plain SQL identifier').default('wrappers'),
    DB_PATH: z.string().min(1).default('./data/wrapper.db'),
    EXPIRY_SWEEP_SECONDS: z.coerce.number().int().min(0).default(60),
    DOCS_ENABLED: z.enum(['true', 'false']).default('true').transform((v) => v === 'true'),
});

type Env = z.infer<typeof EnvSchema>;

export type LogLevel = Env['LOG_LEVEL'];

export interface AppConfig {
    port: number;
    host: string;
    logLevel: LogLevel;
    appName: string;
    env: string;
    tableName: string;
    dbPath: string;
    expirySweepSeconds: number;
    docsEnabled: boolean;
    limits: {
        bodyBytes: number;
        minTtlSeconds: number;
        maxTtlSeconds: number;
        idAttempts: number;
    };
}

function toAppConfig(env: Env): AppConfig {
    return {
        port: env.PORT,
        host: env.HOST,
        logLevel: env.LOG_LEVEL,
        appName: env.WRAPPER_APP_NAME,
        env: env.WRAPPER_ENV,
        tableName: env.WRAPPER_TABLE_NAME,
        dbPath: env.DB_PATH,
        expirySweepSeconds: env.EXPIRY_SWEEP_SECONDS,
        docsEnabled: env.DOCS_ENABLED,
        limits: {
            bodyBytes: 64 * 1024,
            minTtlSeconds: 30,
            // Ten years
            maxTtlSeconds: 10 * 365 * 24 * 60 * 60,
            idAttempts: 3,
        },
    };
}

/**
 * Validates an arbitrary environment map into an {@link AppConfig}.
 *
 * @param {Record<string, string | undefined>} env - Environment variables
 * @returns {AppConfig} Validated configuration
 * @throws {Error} listing every invalid variable
 */
export function loadConfig(env: Record<string, string | undefined>): AppConfig {
    const parsed = EnvSchema.safeParse(env);
    if (!parsed.success) {
        const fields = Object.entries(parsed.error.flatten().fieldErrors)
            .map(([name, messages]) => `${name}: ${(messages ?? []).join(', ')}`)
            .join('; ');
        throw new Error(`Invalid environment configuration: ${fields}`);
    }
    return toAppConfig(parsed.data);
}

const parsed = EnvSchema.safeParse(process.env);
if (!parsed.success) {
    // eslint-disable-next-line no-console
    console.error('Invalid environment configuration:', parsed.error.flatten().fieldErrors);
    process.exit(1);
}

/**
 * Application configuration read from the process environment at startup.
 */
export const config: AppConfig = toAppConfig(parsed.data);
