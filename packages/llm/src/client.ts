/**
 * Ollama HTTP client for local LLM inference.
 * Non-streaming completions through /api/generate.
 */

import { z } from 'zod';
import {
  CancelledError,
  ProviderResponseError,
  ProviderUnavailableError,
  ResumeKitError,
  excerpt,
} from './errors.js';
import {
  DEFAULT_TIMEOUT_MS,
  DefaultModels,
  EXTRACTION_TEMPERATURE,
  OLLAMA_BASE_URL,
} from './models.js';
import {
  createRequestScope,
  type CompleteOptions,
  type LLMProvider,
  type RequestScope,
} from './provider.js';

export interface OllamaGenerateRequest {
  model: string;
  prompt: string;
  system?: string;
  format?: 'json';
  options?: {
    temperature?: number;
    top_p?: number;
    num_predict?: number;
    stop?: string[];
  };
}

const OllamaGenerateResponseSchema = z
  .object({
    model: z.string().optional(),
    created_at: z.string().optional(),
    response: z.string(),
    done: z.boolean().optional(),
    total_duration: z.number().optional(),
    prompt_eval_count: z.number().optional(),
    eval_count: z.number().optional(),
  })
  .passthrough();

export type OllamaGenerateResponse = z.infer<typeof OllamaGenerateResponseSchema>;

const OllamaTagsSchema = z.object({
  models: z.array(z.object({ name: z.string() }).passthrough()).default([]),
});

export interface OllamaClientOptions {
  baseUrl?: string;
  defaultModel?: string;
  /** Milliseconds; 2 minutes unless overridden. */
  defaultTimeout?: number;
}

const PROVIDER = 'ollama';

export class OllamaClient implements LLMProvider {
  readonly name = PROVIDER;
  readonly defaultModel: string;
  readonly baseUrl: string;
  private defaultTimeout: number;

  constructor(options: OllamaClientOptions = {}) {
    this.baseUrl = (options.baseUrl ?? OLLAMA_BASE_URL).replace(/\/$/, '');
    this.defaultModel = options.defaultModel ?? DefaultModels.ollama;
    this.defaultTimeout = options.defaultTimeout ?? DEFAULT_TIMEOUT_MS;
  }

  async complete(prompt: string, model: string, options: CompleteOptions = {}): Promise<string> {
    const result = await this.generate(
      {
        model,
        prompt,
        system: options.system,
        format: options.json ? 'json' : undefined,
        options: { temperature: options.temperature ?? EXTRACTION_TEMPERATURE },
      },
      options,
    );

    if (!result.response.trim()) {
      throw new ProviderResponseError(PROVIDER, `Model ${model} returned an empty response`, 200);
    }
    return result.response;
  }

  /**
   * Generate completion using the /api/generate endpoint.
   */
  async generate(
    request: OllamaGenerateRequest,
    options: Pick<CompleteOptions, 'timeoutMs' | 'signal'> = {},
  ): Promise<OllamaGenerateResponse> {
    if (options.signal?.aborted) throw new CancelledError();
    const scope = createRequestScope(options.timeoutMs ?? this.defaultTimeout, options.signal);

    try {
      const response = await fetch(`${this.baseUrl}/api/generate`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ ...request, stream: false }),
        signal: scope.signal,
      });
      const body = await response.text();

      if (!response.ok) {
        throw new ProviderResponseError(
          PROVIDER,
          `Ollama generate failed: ${response.status} - ${excerpt(body)}`,
          response.status,
        );
      }

      return parseGenerateBody(body);
    } catch (error) {
      throw this.classify(error, scope);
    } finally {
      scope.dispose();
    }
  }

  /**
   * Check if Ollama is running and, when given, that the model is pulled.
   */
  async isAvailable(model?: string, timeoutMs: number = 5000): Promise<boolean> {
    try {
      const models = await this.listModels(timeoutMs);
      if (!model) return true;
      return models.some((m) => m === model || m.startsWith(`${model}:`));
    } catch (error) {
      if (error instanceof ProviderUnavailableError || error instanceof ProviderResponseError) {
        return false;
      }
      throw error;
    }
  }

  /**
   * List pulled models.
   */
  async listModels(timeoutMs: number = 5000): Promise<string[]> {
    const scope = createRequestScope(timeoutMs);
    try {
      const response = await fetch(`${this.baseUrl}/api/tags`, { signal: scope.signal });
      if (!response.ok) {
        throw new ProviderResponseError(
          PROVIDER,
          `Failed to list models: ${response.status}`,
          response.status,
        );
      }
      const parsed = OllamaTagsSchema.safeParse(await response.json());
      if (!parsed.success) {
        throw new ProviderResponseError(PROVIDER, 'Unexpected /api/tags payload', response.status);
      }
      return parsed.data.models.map((m) => m.name);
    } catch (error) {
      throw this.classify(error, scope);
    } finally {
      scope.dispose();
    }
  }

  private classify(error: unknown, scope: RequestScope): ResumeKitError {
    if (error instanceof ResumeKitError) return error;
    if (scope.cancelled()) return new CancelledError('Ollama request was cancelled', { cause: error });
    if (scope.timedOut()) {
      return new ProviderUnavailableError(PROVIDER, `Request to ${this.baseUrl} timed out`, {
        cause: error,
        timedOut: true,
      });
    }
    const message = error instanceof Error ? error.message : String(error);
    return new ProviderUnavailableError(
      PROVIDER,
      `Ollama server not available at ${this.baseUrl}: ${message}`,
      { cause: error },
    );
  }
}

function parseGenerateBody(body: string): OllamaGenerateResponse {
  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch (error) {
    throw new ProviderResponseError(PROVIDER, `Non-JSON body: ${excerpt(body)}`, 200, {
      cause: error,
    });
  }

  const parsed = OllamaGenerateResponseSchema.safeParse(json);
  if (!parsed.success) {
    throw new ProviderResponseError(PROVIDER, 'Body has no "response" string', 200);
  }
  return parsed.data;
}
