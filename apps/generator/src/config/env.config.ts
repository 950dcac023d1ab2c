import { z } from 'zod';
import {
  DEFAULT_COLUMN_MAPPING,
  DEFAULT_DONE_VALUE,
  DEFAULT_TEMPLATE_PATH,
  RUN_LIMITS,
  STORE_LIMITS,
} from '@certgen/shared';
import { ConfigurationError } from '../common/errors/certificate-errors';

const envSchema = z.object({
  GRAPH_ACCESS_TOKEN: z.string().min(1),
  GRAPH_BASE_URL: z.string().url().default('https://graph.microsoft.com/v1.0'),
  ROSTER_FILE_ID: z.string().min(1),
  ROSTER_SHEET: z.string().min(1).optional(),
  CERTIFICATES_FOLDER_ID: z.string().min(1),
  TEMPLATE_PATH: z.string().min(1).default(DEFAULT_TEMPLATE_PATH),
  COLUMN_NAME: z.string().trim().min(1).default(DEFAULT_COLUMN_MAPPING.name),
  COLUMN_NATIONAL_ID: z.string().trim().min(1).default(DEFAULT_COLUMN_MAPPING.national_id),
  COLUMN_COMPANY: z.string().trim().min(1).default(DEFAULT_COLUMN_MAPPING.company),
  COLUMN_STATUS: z.string().trim().min(1).default(DEFAULT_COLUMN_MAPPING.status),
  STATUS_DONE_VALUE: z.string().trim().min(1).default(DEFAULT_DONE_VALUE),
  STORE_TIMEOUT_MS: z.coerce
    .number()
    .int()
    .min(STORE_LIMITS.MIN_TIMEOUT_MS)
    .max(STORE_LIMITS.MAX_TIMEOUT_MS)
    .default(STORE_LIMITS.DEFAULT_TIMEOUT_MS),
  ROW_CONCURRENCY: z.coerce
    .number()
    .int()
    .min(1)
    .max(RUN_LIMITS.MAX_ROW_CONCURRENCY)
    .default(RUN_LIMITS.DEFAULT_ROW_CONCURRENCY),
  RUN_SUMMARY_PATH: z.string().min(1).optional(),
  LOG_LEVEL: z.enum(['error', 'warn', 'log', 'debug', 'verbose']).default('log'),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
});

export type EnvConfig = z.infer<typeof envSchema>;

export function validateEnv(source: Record<string, unknown> = process.env): EnvConfig {
  // An empty variable counts as unset, so defaults still apply
  const present = Object.fromEntries(Object.entries(source).filter(([, value]) => value !== ''));
  const result = envSchema.safeParse(present);
  if (!result.success) {
    const formatted = result.error.issues
      .map((i) => `  ${i.path.join('.')}: ${i.message}`)
      .join('\n');
    throw new ConfigurationError(`Environment validation failed:\n${formatted}`);
  }
  return result.data;
}

/** Config safe to print: the access token is never shown */
export function redactEnv(env: EnvConfig): Record<string, unknown> {
  return { ...env, GRAPH_ACCESS_TOKEN: '***' };
}
