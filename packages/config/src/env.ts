import { z } from 'zod';

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  DATABASE_URL: z.string().url(),
  DEFAULT_CURRENCY: z.enum(['XAF', 'XOF', 'USD', 'EUR', 'GBP']).default('XAF'),
  MIN_TRANSFER_AMOUNT: z.coerce.number().positive().default(100)
});

export type RuntimeConfig = z.infer<typeof envSchema>;

export function loadRuntimeConfig(input: NodeJS.ProcessEnv = process.env): RuntimeConfig {
  return envSchema.parse(input);
}
