import { z } from 'zod';

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;

export const EnvSchema = z.object({
    LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
    NODE_ENV: z.enum(['production', 'development', 'test']).default('development'),
    OPENAI_API_KEY: z.string().trim().min(1).optional(),
    OPENAI_BASE_URL: z.string().url().optional(),
});

export type EnvConfig = z.infer<typeof EnvSchema>;

/**
 * Validate process environment.
 *
 * @throws ZodError listing every invalid variable
 */
export function validateEnv(env: NodeJS.ProcessEnv = process.env): EnvConfig {
    return EnvSchema.parse(env);
}
