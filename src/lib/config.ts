import { z } from 'zod';
import { ConfigError } from './errors.js';

// ─── Schema ──────────────────────────────────────────────────────────

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const optionalId = z
  .string()
  .trim()
  .transform((v) => (v.length > 0 ? v : undefined))
  .optional();

export const configSchema = z.object({
  OPENAI_API_KEY: z.string().min(1).optional(),
  OPENAI_BASE_URL: z.string().url().default('https://api.openai.com/v1'),
  ASSISTANT_MODEL: z.string().min(1).default('gpt-4-turbo-preview'),

  TOOL_SERVER_URL: z.string().url().default('http://localhost:5003'),
  TOOL_TIMEOUT_MS: positiveInt(30_000),

  RUN_POLL_BACKOFF: z.enum(['constant', 'exponential']).default('constant'),
  RUN_POLL_INTERVAL_MS: positiveInt(2_000),
  RUN_POLL_MAX_INTERVAL_MS: positiveInt(15_000),
  RUN_POLL_ERROR_DELAY_MS: positiveInt(5_000),
  RUN_MAX_WAIT_MS: positiveInt(600_000),

  LOOKBACK_DAYS: positiveInt(30),
  SESSION_CONCURRENCY: positiveInt(1),
  SESSION_DELAY_MS: z.coerce.number().int().nonnegative().default(5_000),
  SUBJECT_IDS: z
    .string()
    .default('')
    .transform((v) => v.split(',').map((s) => s.trim()).filter((s) => s.length > 0)),

  AGENT_ID_DATA_AGGREGATION: optionalId,
  AGENT_ID_PATTERN_DETECTION: optionalId,
  AGENT_ID_RISK_ASSESSMENT: optionalId,
  AGENT_ID_ACTION_ALERTING: optionalId,
});

export type AppConfig = z.infer<typeof configSchema>;

// ─── Loader ──────────────────────────────────────────────────────────

/**
 * Parse configuration from an environment map (process.env by default).
 * Throws ConfigError listing every invalid key.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const result = configSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `${i.path.join('.')}: ${i.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${issues}`);
  }
  return result.data;
}

export function requireApiKey(config: AppConfig): string {
  if (!config.OPENAI_API_KEY) {
    throw new ConfigError('OPENAI_API_KEY environment variable is required');
  }
  return config.OPENAI_API_KEY;
}
