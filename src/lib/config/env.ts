/**
 * Environment Configuration
 * Loaded once at startup, validated, and frozen for the process lifetime.
 */

import { z } from 'zod';

const booleanFlag = z
    .enum(['true', 'false', '1', '0', 'yes', 'no'])
    .transform((value) => value === 'true' || value === '1' || value === 'yes');

/** Empty strings in .env files mean "unset" */
const optionalString = z
    .string()
    .trim()
    .optional()
    .transform((value) => (value ? value : undefined));

const envSchema = z.object({
    BOT_TOKEN: z.string({ required_error: 'BOT_TOKEN missing in environment' }).trim().min(1, 'BOT_TOKEN missing in environment'),
    WEBHOOK_URL: optionalString.pipe(z.string().url().optional()),
    WEBHOOK_SECRET: optionalString,
    PORT: z
        .string()
        .default('8000')
        .transform(Number)
        .pipe(z.number().int().positive()),
    LOG_LEVEL: z
        .string()
        .default('info')
        .transform((value) => value.toLowerCase())
        .pipe(z.enum(['error', 'warn', 'info', 'debug'])),
    RELAY_DIRECT_URL: booleanFlag.default('true'),
    BOT_API_ROOT: optionalString.pipe(z.string().url().optional()),
});

export type AppConfig = Readonly<z.infer<typeof envSchema>>;

let _config: AppConfig | null = null;

/**
 * Parse configuration from an environment map without caching it
 */
export function parseConfig(env: NodeJS.ProcessEnv): AppConfig {
    const result = envSchema.safeParse(env);
    if (!result.success) {
        const issues = result.error.issues
            .map((i) => `  ${i.path.join('.')}: ${i.message}`)
            .join('\n');
        throw new Error(`Invalid environment configuration:\n${issues}`);
    }
    return Object.freeze(result.data);
}

export function loadConfig(): AppConfig {
    if (_config) return _config;
    _config = parseConfig(process.env);
    return _config;
}

