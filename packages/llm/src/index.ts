/**
 * @resumekit/llm - LLM providers (local Ollama, hosted OpenAI) and reply parsing
 */

export {
  OLLAMA_BASE_URL,
  DefaultModels,
  DEFAULT_TIMEOUT_MS,
  DEFAULT_MAX_ATTEMPTS,
  DEFAULT_CONCURRENCY,
  EXTRACTION_TEMPERATURE,
  defaultModelConfigs,
  type ModelConfig,
} from './models.js';

export {
  createRequestScope,
  type CompleteOptions,
  type LLMProvider,
  type ProviderName,
  type RequestScope,
} from './provider.js';

export {
  OllamaClient,
  type OllamaClientOptions,
  type OllamaGenerateRequest,
  type OllamaGenerateResponse,
} from './client.js';

export {
  OpenAIProvider,
  OPENAI_API_KEY_ENV,
  classifyOpenAIError,
  resolveApiKey,
  retryAfterMs,
  type ChatCompletionBody,
  type ChatCompletionRequestOptions,
  type ChatCompletionResult,
  type ChatCompletionsClient,
  type ChatMessage,
  type OpenAIProviderOptions,
} from './openai.js';

export { createProvider, type ProviderFactoryOptions } from './factory.js';

export {
  loadConfig,
  ExtractionConfigSchema,
  type ExtractionConfig,
  type ExtractionConfigInput,
} from './config.js';

export {
  ResumeKitError,
  EmptyDocumentError,
  UnreadableDocumentError,
  MissingCredentialsError,
  ConfigError,
  CancelledError,
  ProviderError,
  ProviderUnavailableError,
  ProviderAuthError,
  ProviderRateLimitError,
  ProviderResponseError,
  SchemaValidationError,
  MalformedJSONError,
  isRetryableProviderError,
  excerpt,
  type ResumeKitErrorCode,
  type UnreadableReason,
} from './errors.js';

export { jsonExtractionPrompt, structuredExtractionSystem, strictJsonReminder } from './prompts.js';

export {
  closeTruncated,
  defaultFixers,
  errorPosition,
  findJsonObjectSpans,
  isPlainObject,
  jsonFixers,
  parseJsonObject,
  stripCodeFence,
  codeFenceBodies,
  type JsonSpan,
} from './parse.js';
