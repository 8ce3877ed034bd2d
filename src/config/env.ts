/**
 * Environment Variable Handler
 *
 * Loads .env (via dotenv) and exposes validated environment variables.
 * API keys are never logged or echoed in error messages; only their
 * presence is reported.
 */

import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';

// No-op when there is no .env file
dotenvConfig();

// ============================================================================
// SCHEMA
// ============================================================================

/**
 * Keys are optional at load time. Commands that need one check with
 * hasApiKey() and raise APIKeyError.
 */
export const EnvSchema = z.object({
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_BASE_URL: z.string().url().optional(),
  /** Overrides llm.model from config.toml */
  LLM_MODEL: z.string().optional(),
  /** Overrides the ~/.cbi home directory */
  CBI_HOME: z.string().optional(),
});

export type EnvVars = z.infer<typeof EnvSchema>;

let envCache: EnvVars | null = null;

// ============================================================================
// PUBLIC API
// ============================================================================

function emptyToUndefined(value: string | undefined): string | undefined {
  return value?.trim() ? value : undefined;
}

/**
 * Load environment variables once, then serve them from cache.
 * A malformed OPENAI_BASE_URL is dropped rather than failing every command.
 */
export function loadEnv(): EnvVars {
  if (envCache !== null) {
    return envCache;
  }

  const raw = {
    OPENAI_API_KEY: emptyToUndefined(process.env.OPENAI_API_KEY),
    OPENAI_BASE_URL: emptyToUndefined(process.env.OPENAI_BASE_URL),
    LLM_MODEL: emptyToUndefined(process.env.LLM_MODEL),
    CBI_HOME: emptyToUndefined(process.env.CBI_HOME),
  };

  const result = EnvSchema.safeParse(raw);
  envCache = result.success ? result.data : { ...raw, OPENAI_BASE_URL: undefined };
  return envCache;
}

export function getEnv<K extends keyof EnvVars>(key: K): EnvVars[K] {
  return loadEnv()[key];
}

/**
 * True when OPENAI_API_KEY is set and non-empty.
 */
export function hasApiKey(): boolean {
  return Boolean(loadEnv().OPENAI_API_KEY);
}

/**
 * Clear the cache so the next loadEnv() re-reads process.env.
 * @internal For tests.
 */
export function _clearEnvCache(): void {
  envCache = null;
}

export const SETUP_INSTRUCTIONS = `
To use OpenAI embeddings and chat models:

1. Get an API key from your OpenAI account (or an OpenAI-compatible server)
2. Set it in the environment or in a .env file:

   OPENAI_API_KEY="your-api-key"
   # OPENAI_BASE_URL="http://localhost:11434/v1"   # compatible servers

3. Re-run the command
`.trim();
