/**
 * Provider defaults. Environment overrides are applied by `loadConfig`.
 */

import type { ProviderName } from './provider.js';

export const OLLAMA_BASE_URL = 'http://localhost:11434';

export const DefaultModels: Record<ProviderName, string> = {
  /** Any model pulled into the local Ollama server works; llama3 is the baseline. */
  ollama: 'llama3',
  openai: 'gpt-4o-mini',
};

export interface ModelConfig {
  model: string;
  temperature?: number;
  timeout?: number;
}

export const DEFAULT_TIMEOUT_MS = 120000; // 2 minutes
export const DEFAULT_MAX_ATTEMPTS = 3;
export const DEFAULT_CONCURRENCY = 2;

/** Sampling temperature for extraction calls. */
export const EXTRACTION_TEMPERATURE = 0.1;

export const defaultModelConfigs: Record<ProviderName, ModelConfig> = {
  ollama: {
    model: DefaultModels.ollama,
    temperature: EXTRACTION_TEMPERATURE,
    timeout: DEFAULT_TIMEOUT_MS,
  },
  openai: {
    model: DefaultModels.openai,
    temperature: EXTRACTION_TEMPERATURE,
    timeout: 60000,
  },
};
