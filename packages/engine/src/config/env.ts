import 'dotenv/config';
import { z } from 'zod';

const booleanFlag = z.union([
    z.boolean(),
    z
        .string()
        .transform(value => value.trim().toLowerCase())
        .transform(value => ['1', 'true', 'yes', 'on'].includes(value))
]);

const envSchema = z.object({
    // NODE_ENV is set by the tooling (Vitest sets `test`)
    NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
    // Falls back to a level derived from NODE_ENV, see resolveLogLevel()
    TESSERA_LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),
    TESSERA_LOG_PRETTY: booleanFlag.default(false),
    TESSERA_FORM_ALIAS: z.string().min(1, 'TESSERA_FORM_ALIAS must not be empty').default('form'),
    TESSERA_STRICT_VARIABLES: booleanFlag.default(false),
    TESSERA_AUTOESCAPE: booleanFlag.default(true)
});

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
    console.error('Invalid environment configuration:', parsed.error.flatten().fieldErrors);
    throw new Error('Failed to parse environment variables');
}

export type EnvConfig = z.infer<typeof envSchema>;

export type LogLevel = NonNullable<EnvConfig['TESSERA_LOG_LEVEL']>;

export const env: EnvConfig = parsed.data;

/**
 * Log level to use when none is configured explicitly.
 *
 * Tests run silent, production logs `info` and above, everything else logs
 * `debug` and above.
 */
export function resolveLogLevel(config: EnvConfig = env): LogLevel {
    if (config.TESSERA_LOG_LEVEL) {
        return config.TESSERA_LOG_LEVEL;
    }
    switch (config.NODE_ENV) {
        case 'test':
            return 'silent';
        case 'production':
            return 'info';
        default:
            return 'debug';
    }
}
