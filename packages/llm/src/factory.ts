import { OllamaClient } from './client.js';
import type { ExtractionConfig } from './config.js';
import { OpenAIProvider, type ChatCompletionsClient } from './openai.js';
import type { LLMProvider } from './provider.js';

export interface ProviderFactoryOptions {
  env?: NodeJS.ProcessEnv;
  /** Injected chat client for the OpenAI provider. */
  openaiClient?: ChatCompletionsClient;
}

/**
 * Build the provider named by the config. The configured model, when set,
 * becomes the provider's default model.
 */
export function createProvider(
  config: Pick<
    ExtractionConfig,
    'provider' | 'model' | 'ollamaBaseUrl' | 'apiKey' | 'openaiBaseUrl' | 'timeoutMs'
  >,
  options: ProviderFactoryOptions = {},
): LLMProvider {
  switch (config.provider) {
    case 'ollama':
      return new OllamaClient({
        baseUrl: config.ollamaBaseUrl,
        defaultModel: config.model,
        defaultTimeout: config.timeoutMs,
      });
    case 'openai':
      return new OpenAIProvider({
        apiKey: config.apiKey,
        baseUrl: config.openaiBaseUrl,
        defaultModel: config.model,
        defaultTimeout: config.timeoutMs,
        client: options.openaiClient,
        env: options.env,
      });
  }
}
