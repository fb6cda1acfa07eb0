/**
 * Hosted completions through the OpenAI chat API (or any compatible endpoint).
 */

import OpenAI from 'openai';
import {
  CancelledError,
  MissingCredentialsError,
  ProviderAuthError,
  ProviderRateLimitError,
  ProviderResponseError,
  ProviderUnavailableError,
  ResumeKitError,
} from './errors.js';
import { DefaultModels, EXTRACTION_TEMPERATURE, defaultModelConfigs } from './models.js';
import type { CompleteOptions, LLMProvider } from './provider.js';

export interface ChatMessage {
  role: 'system' | 'user';
  content: string;
}

export interface ChatCompletionBody {
  model: string;
  messages: ChatMessage[];
  temperature?: number;
  response_format?: { type: 'json_object' };
}

export interface ChatCompletionRequestOptions {
  signal?: AbortSignal;
  timeout?: number;
  maxRetries?: number;
}

export interface ChatCompletionResult {
  choices: Array<{ message: { content: string | null } }>;
}

/** The slice of the SDK client the provider calls; an `OpenAI` instance satisfies it. */
export interface ChatCompletionsClient {
  chat: {
    completions: {
      create(
        body: ChatCompletionBody,
        options?: ChatCompletionRequestOptions,
      ): Promise<ChatCompletionResult>;
    };
  };
}

export interface OpenAIProviderOptions {
  /** Falls back to OPENAI_API_KEY. */
  apiKey?: string;
  baseUrl?: string;
  defaultModel?: string;
  defaultTimeout?: number;
  client?: ChatCompletionsClient;
  env?: NodeJS.ProcessEnv;
}

const PROVIDER = 'openai';
export const OPENAI_API_KEY_ENV = 'OPENAI_API_KEY';

export function resolveApiKey(
  explicit: string | undefined,
  env: NodeJS.ProcessEnv = process.env,
): string {
  const key = explicit?.trim() || env[OPENAI_API_KEY_ENV]?.trim();
  if (!key) throw new MissingCredentialsError(PROVIDER, OPENAI_API_KEY_ENV);
  return key;
}

export class OpenAIProvider implements LLMProvider {
  readonly name = PROVIDER;
  readonly defaultModel: string;
  private client: ChatCompletionsClient;
  private defaultTimeout: number;

  constructor(options: OpenAIProviderOptions = {}) {
    const apiKey = resolveApiKey(options.apiKey, options.env);
    this.defaultModel = options.defaultModel ?? DefaultModels.openai;
    this.defaultTimeout = options.defaultTimeout ?? defaultModelConfigs.openai.timeout ?? 60000;
    // SDK retries off; the orchestrator retries.
    this.client =
      options.client ?? new OpenAI({ apiKey, baseURL: options.baseUrl, maxRetries: 0 });
  }

  async complete(prompt: string, model: string, options: CompleteOptions = {}): Promise<string> {
    if (options.signal?.aborted) throw new CancelledError();

    const messages: ChatMessage[] = [];
    if (options.system) {
      messages.push({ role: 'system', content: options.system });
    }
    messages.push({ role: 'user', content: prompt });

    let result: ChatCompletionResult;
    try {
      result = await this.client.chat.completions.create(
        {
          model,
          messages,
          temperature: options.temperature ?? EXTRACTION_TEMPERATURE,
          response_format: options.json ? { type: 'json_object' } : undefined,
        },
        {
          signal: options.signal,
          timeout: options.timeoutMs ?? this.defaultTimeout,
          maxRetries: 0,
        },
      );
    } catch (error) {
      throw classifyOpenAIError(error, options.signal);
    }

    const content = result.choices[0]?.message.content;
    if (!content || !content.trim()) {
      throw new ProviderResponseError(PROVIDER, `Model ${model} returned no message content`);
    }
    return content;
  }
}

/**
 * Map SDK errors onto the provider taxonomy.
 */
export function classifyOpenAIError(error: unknown, signal?: AbortSignal): ResumeKitError {
  if (error instanceof ResumeKitError) return error;
  if (signal?.aborted || error instanceof OpenAI.APIUserAbortError) {
    return new CancelledError('OpenAI request was cancelled', { cause: error });
  }
  // Timeout extends connection error, so it is checked first.
  if (error instanceof OpenAI.APIConnectionTimeoutError) {
    return new ProviderUnavailableError(PROVIDER, 'Request timed out', {
      cause: error,
      timedOut: true,
    });
  }
  if (error instanceof OpenAI.APIConnectionError) {
    return new ProviderUnavailableError(PROVIDER, `Connection failed: ${error.message}`, {
      cause: error,
    });
  }
  if (error instanceof OpenAI.AuthenticationError || error instanceof OpenAI.PermissionDeniedError) {
    return new ProviderAuthError(PROVIDER, error.status, error.message, { cause: error });
  }
  if (error instanceof OpenAI.RateLimitError) {
    return new ProviderRateLimitError(PROVIDER, error.message, retryAfterMs(error.headers), {
      cause: error,
    });
  }
  if (error instanceof OpenAI.APIError) {
    return new ProviderResponseError(PROVIDER, error.message, error.status, { cause: error });
  }
  const message = error instanceof Error ? error.message : String(error);
  return new ProviderResponseError(PROVIDER, message, undefined, { cause: error });
}

type HeaderBag = Record<string, string | null | undefined> | Headers | undefined;

/** Parses `retry-after-ms` or `retry-after` (seconds or HTTP date). */
export function retryAfterMs(headers: HeaderBag, now: number = Date.now()): number | undefined {
  const read = (name: string): string | null | undefined =>
    headers instanceof Headers ? headers.get(name) : headers?.[name];

  const ms = Number(read('retry-after-ms'));
  if (Number.isFinite(ms) && ms > 0) return ms;

  const raw = read('retry-after');
  if (!raw) return undefined;
  const seconds = Number(raw);
  if (Number.isFinite(seconds)) return Math.max(0, seconds * 1000);
  const date = Date.parse(raw);
  return Number.isNaN(date) ? undefined : Math.max(0, date - now);
}
