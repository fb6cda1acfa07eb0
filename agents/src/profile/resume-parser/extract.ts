/**
 * Extraction orchestrator: prompt -> provider -> normalizer.
 *
 * Retry policy lives here and nowhere else:
 * - rate-limit and unavailable errors: exponential backoff, up to maxAttempts calls
 * - malformed JSON: one repair call with a stricter prompt
 * - everything else propagates on first occurrence
 */

import {
  CancelledError,
  DEFAULT_MAX_ATTEMPTS,
  MalformedJSONError,
  ProviderRateLimitError,
  isRetryableProviderError,
  type LLMProvider,
} from '@resumekit/llm';
import { RESUME_SCHEMA_DESCRIPTOR, type SchemaDescriptor } from '@resumekit/schemas';
import { silentLogger } from '../../shared/logger.js';
import type { AgentLogger } from '../../shared/types.js';
import { normalizeResumeResponse, type NormalizedResume } from './normalize.js';
import { EXTRACTION_SYSTEM_PROMPT, buildExtractionPrompt, buildRepairPrompt } from './prompt.js';

export type ExtractionState =
  | 'idle'
  | 'prompting'
  | 'awaiting_completion'
  | 'normalizing'
  | 'done'
  | 'failed';

export interface BackoffOptions {
  baseMs?: number;
  maxMs?: number;
  jitterMs?: number;
}

export interface ExtractResumeOptions {
  /** Defaults to the provider's default model. */
  model?: string;
  /** Total provider calls per prompt, first try included. */
  maxAttempts?: number;
  timeoutMs?: number;
  signal?: AbortSignal;
  backoff?: BackoffOptions;
  descriptor?: SchemaDescriptor;
  logger?: AgentLogger;
  onStateChange?: (state: ExtractionState) => void;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  random?: () => number;
}

export interface ExtractionResult extends NormalizedResume {
  model: string;
  /** Provider calls made, retries and the repair call included. */
  attempts: number;
  /** True when the record came from the repair call. */
  repaired: boolean;
}

const DEFAULT_BACKOFF: Required<BackoffOptions> = { baseMs: 500, maxMs: 8000, jitterMs: 250 };

/**
 * Delay before retry number `attempt` (1-based): 500ms, 1000ms, 2000ms... capped
 * at `maxMs`, raised to the provider's retry-after when it asks for longer (the
 * cap does not apply to retry-after), plus jitter.
 */
export function backoffDelay(
  attempt: number,
  error: unknown,
  options: BackoffOptions = {},
  random: () => number = Math.random,
): number {
  const { baseMs, maxMs, jitterMs } = { ...DEFAULT_BACKOFF, ...options };
  const exponential = Math.min(maxMs, baseMs * Math.pow(2, attempt - 1));
  const retryAfter = error instanceof ProviderRateLimitError ? (error.retryAfterMs ?? 0) : 0;
  const delay = Math.max(exponential, retryAfter);
  return delay + Math.floor(random() * Math.min(jitterMs, delay));
}

/** setTimeout that rejects with CancelledError when the signal aborts. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancelledError());
      return;
    }
    const onAbort = () => {
      clearTimeout(timeoutId);
      reject(new CancelledError());
    };
    const timeoutId = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

function throwIfCancelled(signal?: AbortSignal): void {
  if (signal?.aborted) throw new CancelledError();
}

/**
 * Extract a resume record from document text. Each call is independent;
 * nothing is shared between calls except the provider's configuration.
 */
export async function extractResume(
  documentText: string,
  provider: LLMProvider,
  options: ExtractResumeOptions = {},
): Promise<ExtractionResult> {
  const logger = options.logger ?? silentLogger;
  const descriptor = options.descriptor ?? RESUME_SCHEMA_DESCRIPTOR;
  const model = options.model ?? provider.defaultModel;
  const maxAttempts = Math.max(1, Math.floor(options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS));
  const wait = options.sleep ?? sleep;
  const { signal } = options;
  let attempts = 0;

  const transition = (state: ExtractionState) => {
    logger.debug(`State: ${state}`);
    options.onStateChange?.(state);
  };

  const completeWithRetry = async (prompt: string): Promise<string> => {
    let attempt = 0;
    while (true) {
      attempt++;
      throwIfCancelled(signal);
      transition('awaiting_completion');
      attempts++;
      try {
        return await provider.complete(prompt, model, {
          timeoutMs: options.timeoutMs,
          signal,
          system: EXTRACTION_SYSTEM_PROMPT,
          json: true,
        });
      } catch (error) {
        if (signal?.aborted && !(error instanceof CancelledError)) {
          throw new CancelledError(undefined, { cause: error });
        }
        if (!isRetryableProviderError(error) || attempt >= maxAttempts) throw error;

        const delay = backoffDelay(attempt, error, options.backoff, options.random);
        logger.warn(`Attempt ${attempt}/${maxAttempts} failed; retrying in ${delay}ms`, {
          error: error.message,
        });
        await wait(delay, signal);
      }
    }
  };

  transition('idle');
  try {
    throwIfCancelled(signal);
    transition('prompting');
    const prompt = buildExtractionPrompt(documentText, descriptor);
    logger.info(`Requesting extraction from ${provider.name}/${model}`, {
      chars: documentText.length,
    });

    let raw = await completeWithRetry(prompt);
    transition('normalizing');

    let result: NormalizedResume;
    let repaired = false;
    try {
      result = normalizeResumeResponse(raw);
    } catch (error) {
      if (!(error instanceof MalformedJSONError)) throw error;

      logger.warn('Reply was not valid JSON; retrying once with a stricter prompt', {
        reason: error.reason,
        position: error.position,
      });
      transition('prompting');
      raw = await completeWithRetry(buildRepairPrompt(documentText, descriptor, error.reason));
      transition('normalizing');
      result = normalizeResumeResponse(raw);
      repaired = true;
    }

    for (const warning of result.warnings) {
      logger.warn(`${warning.path}: ${warning.message}`);
    }

    transition('done');
    logger.info('Extraction complete', { attempts, warnings: result.warnings.length });
    return { ...result, model, attempts, repaired };
  } catch (error) {
    transition('failed');
    throw error;
  }
}
