import { z } from 'zod';
import { LOG_LEVELS } from './utils/logger';

export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (compatible; LinkInspector/1.0; +https://example.com/bot)';

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(4000),
  DEFAULT_CONCURRENCY: z.coerce.number().int().min(1).default(5),
  MAX_CONCURRENCY: z.coerce.number().int().min(1).default(50),
  DEFAULT_TIMEOUT_SECONDS: z.coerce.number().int().positive().default(15),
  USER_AGENT: z.string().min(1).default(DEFAULT_USER_AGENT),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
});

export type AppConfig = z.infer<typeof envSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return envSchema.parse(env);
}
