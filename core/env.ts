import { z } from 'zod';

const envSchema = z.object({
  // Node Environment
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // Logging
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  LOG_TO_FILE: z
    .enum(['true', 'false'])
    .default('true')
    .transform((val) => val === 'true'),

  // Config file
  ANALYTICS_CONFIG: z.string().optional(),

  // Output
  OUTPUT_DIR: z.string().optional(),

  // Analysis
  ANALYTICS_TIMEZONE: z.string().optional(),
  TOP_N: z
    .string()
    .regex(/^\d+$/, 'TOP_N must be a positive integer')
    .transform((val) => parseInt(val, 10))
    .optional(),

  // Data service
  DATA_SERVICE_URL: z.string().url().optional(),
  DATA_SERVICE_COOKIES: z.string().optional(),
});

export type Env = z.infer<typeof envSchema>;

export function parseEnv(source: NodeJS.ProcessEnv = process.env): Env {
  return envSchema.parse(source);
}

/**
 * Like parseEnv, but variables that fail validation fall back to their defaults.
 * ConfigManager re-validates strictly and reports them as a ConfigError.
 */
export function parseEnvLenient(source: NodeJS.ProcessEnv = process.env): Env {
  const result = envSchema.safeParse(source);
  if (result.success) {
    return result.data;
  }
  const invalid = new Set(result.error.issues.map((issue) => String(issue.path[0])));
  const valid = Object.fromEntries(Object.entries(source).filter(([key]) => !invalid.has(key)));
  return envSchema.parse(valid);
}

export const env = parseEnvLenient();
