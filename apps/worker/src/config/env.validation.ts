import { z } from 'zod';

/** Unset and empty variables are both treated as absent */
const blankAsUndefined = (value: unknown) => (value === '' ? undefined : value);

const required = (name: string) =>
  z.string({ required_error: `${name} is required` }).min(1, `${name} is required`);

export const envSchema = z.object({
  // Server
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // Supplier credentials (CRITICAL - checked before any network call)
  SUPPLIER_USERNAME: required('SUPPLIER_USERNAME'),
  SUPPLIER_PASSWORD: required('SUPPLIER_PASSWORD'),

  // Notification webhook (optional, messages are logged when absent)
  WEBHOOK_URL: z.preprocess(blankAsUndefined, z.string().url('WEBHOOK_URL must be a URL').optional()),

  // Files
  CONFIG_PATH: z.string().min(1).default('config/supplier.json'),
  STATE_PATH: z.string().min(1).default('data/state.json'),

  // HTTP
  REQUEST_DELAY_MS: z.preprocess(blankAsUndefined, z.coerce.number().int().min(0).default(1000)),
  REQUEST_TIMEOUT_MS: z.preprocess(blankAsUndefined, z.coerce.number().int().positive().default(60000)),
  USER_AGENT: z.preprocess(blankAsUndefined, z.string().optional()),

  // Logging
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

export type EnvConfig = z.infer<typeof envSchema>;

export function validateEnv(config: Record<string, unknown>): EnvConfig {
  const result = envSchema.safeParse(config);

  if (!result.success) {
    const errors = result.error.errors.map(err =>
      `${err.path.join('.')}: ${err.message}`
    ).join('\n');

    throw new Error(`Environment validation failed:\n${errors}`);
  }

  return result.data;
}
