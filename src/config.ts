import { z } from 'zod';
import { MissingApiKeyError } from './errors.js';
import type { LogLevel } from './logger.js';

export interface RuntimeConfig {
  apiKey: string;
  model: string;
  timeoutMs: number | null; // null => no timeout
  logLevel: LogLevel;
}

const envSchema = z.object({
  OPENAI_API_KEY: z.string().trim().default(''),
  OPENAI_MODEL: z.string().trim().min(1).default('gpt-4o-mini'),
  AGENT_TIMEOUT_MS: z.coerce.number().int().nonnegative().default(0),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

/**
 * Builds the runtime configuration from the environment. Call after
 * `dotenv.config()` so values from `.env` are visible.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): RuntimeConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join(', ');
    throw new Error(`Invalid configuration: ${detail}`);
  }

  const { OPENAI_API_KEY, OPENAI_MODEL, AGENT_TIMEOUT_MS, LOG_LEVEL } = parsed.data;
  if (OPENAI_API_KEY === '') {
    throw new MissingApiKeyError();
  }

  return {
    apiKey: OPENAI_API_KEY,
    model: OPENAI_MODEL,
    timeoutMs: AGENT_TIMEOUT_MS > 0 ? AGENT_TIMEOUT_MS : null,
    logLevel: LOG_LEVEL,
  };
}
