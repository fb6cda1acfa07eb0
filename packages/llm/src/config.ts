/**
 * Extraction configuration from the environment, with explicit overrides
 * (CLI flags) taking precedence.
 */

import { z } from 'zod';
import { ConfigError } from './errors.js';
import { DEFAULT_CONCURRENCY, DEFAULT_MAX_ATTEMPTS, OLLAMA_BASE_URL } from './models.js';

const positiveInt = z.coerce.number().int().positive();

export const ExtractionConfigSchema = z.object({
  provider: z.enum(['ollama', 'openai']).default('ollama'),
  model: z.string().min(1).optional(),
  ollamaBaseUrl: z.string().url().default(OLLAMA_BASE_URL),
  apiKey: z.string().min(1).optional(),
  openaiBaseUrl: z.string().url().optional(),
  /** Per-call timeout; the provider default applies when unset. */
  timeoutMs: positiveInt.optional(),
  maxAttempts: positiveInt.default(DEFAULT_MAX_ATTEMPTS),
  concurrency: positiveInt.default(DEFAULT_CONCURRENCY),
});

export type ExtractionConfig = z.infer<typeof ExtractionConfigSchema>;
export type ExtractionConfigInput = z.input<typeof ExtractionConfigSchema>;

const ENV_KEYS: Record<keyof ExtractionConfig, string> = {
  provider: 'RESUME_PROVIDER',
  model: 'RESUME_MODEL',
  ollamaBaseUrl: 'OLLAMA_BASE_URL',
  apiKey: 'OPENAI_API_KEY',
  openaiBaseUrl: 'OPENAI_BASE_URL',
  timeoutMs: 'LLM_TIMEOUT_MS',
  maxAttempts: 'LLM_MAX_ATTEMPTS',
  concurrency: 'BATCH_CONCURRENCY',
};

function fromEnv(env: NodeJS.ProcessEnv): Record<string, string> {
  const values: Record<string, string> = {};
  for (const [field, key] of Object.entries(ENV_KEYS)) {
    const raw = env[key]?.trim();
    if (raw) values[field] = field === 'provider' ? raw.toLowerCase() : raw;
  }
  return values;
}

export function loadConfig(
  overrides: Partial<ExtractionConfigInput> = {},
  env: NodeJS.ProcessEnv = process.env,
): ExtractionConfig {
  const defined = Object.fromEntries(
    Object.entries(overrides).filter(([, value]) => value !== undefined),
  );
  const result = ExtractionConfigSchema.safeParse({ ...fromEnv(env), ...defined });
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`),
    );
  }
  return result.data;
}
