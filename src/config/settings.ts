/**
 * Runtime settings from the environment, overridable by CLI flags.
 */

import { z } from "zod";

export const DEFAULT_MODEL = "claude-sonnet-4-6";

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const settingsEnvSchema = z.object({
  ANTHROPIC_API_KEY: z.string().min(1).optional(),
  TOOLROUTE_MODEL: z.string().min(1).default(DEFAULT_MODEL),
  TOOLROUTE_CONNECT_TIMEOUT_MS: positiveInt(10_000),
  TOOLROUTE_CALL_TIMEOUT_MS: positiveInt(300_000),
  TOOLROUTE_LLM_TIMEOUT_MS: positiveInt(60_000),
  TOOLROUTE_MAX_CONNECT_ATTEMPTS: positiveInt(3),
  TOOLROUTE_RETRY_DELAY_MS: z.coerce.number().int().nonnegative().default(1000),
  TOOLROUTE_MAX_HISTORY: positiveInt(50),
});

export interface Settings {
  apiKey?: string;
  model: string;
  connectTimeoutMs: number;
  callTimeoutMs: number;
  llmTimeoutMs: number;
  maxConnectAttempts: number;
  retryDelayMs: number;
  /** Conversation messages kept by `chat` and passed to the router. */
  maxHistory: number;
}

/**
 * Parse settings from an environment record. Empty strings count as unset.
 * Throws a ZodError naming the offending variable on invalid values.
 */
export function loadSettings(
  env: Record<string, string | undefined> = process.env,
  overrides: Partial<Settings> = {},
): Settings {
  const present: Record<string, string> = {};
  for (const key of Object.keys(settingsEnvSchema.shape)) {
    const value = env[key];
    if (value !== undefined && value.trim() !== "") present[key] = value;
  }

  const parsed = settingsEnvSchema.parse(present);
  const settings: Settings = {
    apiKey: parsed.ANTHROPIC_API_KEY,
    model: parsed.TOOLROUTE_MODEL,
    connectTimeoutMs: parsed.TOOLROUTE_CONNECT_TIMEOUT_MS,
    callTimeoutMs: parsed.TOOLROUTE_CALL_TIMEOUT_MS,
    llmTimeoutMs: parsed.TOOLROUTE_LLM_TIMEOUT_MS,
    maxConnectAttempts: parsed.TOOLROUTE_MAX_CONNECT_ATTEMPTS,
    retryDelayMs: parsed.TOOLROUTE_RETRY_DELAY_MS,
    maxHistory: parsed.TOOLROUTE_MAX_HISTORY,
  };

  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) Object.assign(settings, { [key]: value });
  }
  return settings;
}
