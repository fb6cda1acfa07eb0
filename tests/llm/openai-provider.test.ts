import { describe, it, expect, vi } from 'vitest';
import OpenAI from 'openai';
import {
  CancelledError,
  MissingCredentialsError,
  OpenAIProvider,
  ProviderAuthError,
  ProviderRateLimitError,
  ProviderResponseError,
  ProviderUnavailableError,
  classifyOpenAIError,
  retryAfterMs,
  type ChatCompletionBody,
  type ChatCompletionRequestOptions,
  type ChatCompletionResult,
} from '@resumekit/llm';

function fakeClient(
  impl: (
    body: ChatCompletionBody,
    options?: ChatCompletionRequestOptions,
  ) => Promise<ChatCompletionResult>,
) {
  const create = vi.fn(impl);
  return { client: { chat: { completions: { create } } }, create };
}

const reply = (content: string | null): ChatCompletionResult => ({
  choices: [{ message: { content } }],
});

describe('OpenAIProvider', () => {
  it('requires an API key', () => {
    expect(() => new OpenAIProvider({ env: {} })).toThrow(MissingCredentialsError);
    expect(() => new OpenAIProvider({ env: {} })).toThrow(
      'openai API key is required. Pass it explicitly or set OPENAI_API_KEY.',
    );
  });

  it('reads the key from the environment', () => {
    const { client } = fakeClient(async () => reply('{}'));
    const provider = new OpenAIProvider({ env: { OPENAI_API_KEY: 'test-secret' }, client });
    expect(provider.defaultModel).toBe('gpt-4o-mini');
  });

  it('sends system and user messages in JSON mode', async () => {
    const { client, create } = fakeClient(async () => reply('{"skills":[]}'));
    const provider = new OpenAIProvider({ apiKey: 'test-secret', client });

    const text = await provider.complete('Extract this', 'gpt-4o-mini', {
      system: 'Be precise',
      json: true,
    });

    expect(text).toBe('{"skills":[]}');
    expect(create).toHaveBeenCalledWith(
      {
        model: 'gpt-4o-mini',
        messages: [
          { role: 'system', content: 'Be precise' },
          { role: 'user', content: 'Extract this' },
        ],
        temperature: 0.1,
        response_format: { type: 'json_object' },
      },
      { signal: undefined, timeout: 60000, maxRetries: 0 },
    );
  });

  it('passes the per-call timeout through', async () => {
    const { client, create } = fakeClient(async () => reply('{}'));
    const provider = new OpenAIProvider({ apiKey: 'test-secret', client, defaultTimeout: 9000 });

    await provider.complete('p', 'gpt-4o', { timeoutMs: 1234 });
    await provider.complete('p', 'gpt-4o');

    expect(create.mock.calls[0][1]?.timeout).toBe(1234);
    expect(create.mock.calls[1][1]?.timeout).toBe(9000);
  });

  it('rejects a reply without content', async () => {
    const { client } = fakeClient(async () => reply(null));
    const provider = new OpenAIProvider({ apiKey: 'test-secret', client });

    await expect(provider.complete('p', 'gpt-4o-mini')).rejects.toThrow(
      '[openai] Model gpt-4o-mini returned no message content',
    );
  });

  it('classifies SDK errors thrown by the client', async () => {
    const { client } = fakeClient(async () => {
      throw OpenAI.APIError.generate(429, undefined, 'Slow down', { 'retry-after': '2' });
    });
    const provider = new OpenAIProvider({ apiKey: 'test-secret', client });

    const error = await provider.complete('p', 'gpt-4o-mini').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ProviderRateLimitError);
    expect(error).toMatchObject({ retryAfterMs: 2000, code: 'PROVIDER_RATE_LIMIT' });
  });

  it('turns an abort during the call into CancelledError', async () => {
    const controller = new AbortController();
    const { client } = fakeClient(async () => {
      controller.abort();
      throw new OpenAI.APIUserAbortError();
    });
    const provider = new OpenAIProvider({ apiKey: 'test-secret', client });

    await expect(
      provider.complete('p', 'gpt-4o-mini', { signal: controller.signal }),
    ).rejects.toBeInstanceOf(CancelledError);
  });
});

describe('classifyOpenAIError', () => {
  it('maps 401 and 403 to ProviderAuthError', () => {
    const unauthorized = classifyOpenAIError(OpenAI.APIError.generate(401, undefined, 'Bad key', {}));
    const forbidden = classifyOpenAIError(OpenAI.APIError.generate(403, undefined, 'No access', {}));

    expect(unauthorized).toBeInstanceOf(ProviderAuthError);
    expect(unauthorized).toMatchObject({ status: 401 });
    expect(forbidden).toBeInstanceOf(ProviderAuthError);
    expect(forbidden).toMatchObject({ status: 403 });
  });

  it('maps other HTTP statuses to ProviderResponseError', () => {
    const error = classifyOpenAIError(OpenAI.APIError.generate(500, undefined, 'Oops', {}));
    expect(error).toBeInstanceOf(ProviderResponseError);
    expect(error).toMatchObject({ status: 500 });
  });

  it('maps connection failures to ProviderUnavailableError', () => {
    const refused = classifyOpenAIError(new OpenAI.APIConnectionError({ message: 'ECONNREFUSED' }));
    const timedOut = classifyOpenAIError(new OpenAI.APIConnectionTimeoutError());

    expect(refused).toBeInstanceOf(ProviderUnavailableError);
    expect(refused).toMatchObject({ timedOut: false });
    expect(timedOut).toBeInstanceOf(ProviderUnavailableError);
    expect(timedOut).toMatchObject({ timedOut: true });
  });

  it('treats an aborted signal as cancellation whatever the error', () => {
    const controller = new AbortController();
    controller.abort();
    const error = classifyOpenAIError(new OpenAI.APIConnectionError({}), controller.signal);
    expect(error).toBeInstanceOf(CancelledError);
  });

  it('wraps unknown errors as ProviderResponseError', () => {
    const error = classifyOpenAIError(new Error('socket hang up'));
    expect(error).toBeInstanceOf(ProviderResponseError);
    expect(error.message).toBe('[openai] socket hang up');
  });
});

describe('retryAfterMs', () => {
  it('prefers retry-after-ms', () => {
    expect(retryAfterMs({ 'retry-after-ms': '1500', 'retry-after': '9' })).toBe(1500);
  });

  it('reads retry-after as seconds', () => {
    expect(retryAfterMs(new Headers({ 'retry-after': '3' }))).toBe(3000);
  });

  it('reads retry-after as an HTTP date', () => {
    const now = Date.parse('Wed, 21 Oct 2026 07:28:00 GMT');
    expect(retryAfterMs({ 'retry-after': 'Wed, 21 Oct 2026 07:28:05 GMT' }, now)).toBe(5000);
  });

  it('returns undefined without a usable header', () => {
    expect(retryAfterMs(undefined)).toBeUndefined();
    expect(retryAfterMs({ 'retry-after': 'soon' })).toBeUndefined();
  });
});
