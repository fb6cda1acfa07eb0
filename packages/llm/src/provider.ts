/**
 * Provider capability shared by every LLM backend.
 * Adapters make exactly one outbound call per `complete` and never retry.
 */

export type ProviderName = 'ollama' | 'openai';

export interface CompleteOptions {
  /** Per-call timeout; falls back to the adapter default. */
  timeoutMs?: number;
  /** Caller cancellation. Aborting rejects with CancelledError. */
  signal?: AbortSignal;
  system?: string;
  temperature?: number;
  /** Ask the backend for JSON-only output where it supports it. */
  json?: boolean;
}

export interface LLMProvider {
  readonly name: ProviderName;
  readonly defaultModel: string;
  complete(prompt: string, model: string, options?: CompleteOptions): Promise<string>;
}

export interface RequestScope {
  signal: AbortSignal;
  timedOut(): boolean;
  cancelled(): boolean;
  dispose(): void;
}

/**
 * Abort controller for one outbound request: fires on timeout or when the
 * caller's signal aborts, and remembers which of the two it was.
 */
export function createRequestScope(timeoutMs: number, parent?: AbortSignal): RequestScope {
  const controller = new AbortController();
  let didTimeOut = false;

  const timeoutId = setTimeout(() => {
    didTimeOut = true;
    controller.abort();
  }, timeoutMs);

  const onParentAbort = () => controller.abort();
  if (parent?.aborted) {
    controller.abort();
  } else {
    parent?.addEventListener('abort', onParentAbort, { once: true });
  }

  return {
    signal: controller.signal,
    timedOut: () => didTimeOut && !parent?.aborted,
    cancelled: () => parent?.aborted === true,
    dispose: () => {
      clearTimeout(timeoutId);
      parent?.removeEventListener('abort', onParentAbort);
    },
  };
}
