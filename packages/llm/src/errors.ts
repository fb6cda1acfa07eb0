/**
 * Error taxonomy for resume extraction.
 *
 * Provider errors are raised by the adapters and classified once, so the
 * orchestrator can decide on retries by class alone.
 */

export type ResumeKitErrorCode =
  | 'EMPTY_DOCUMENT'
  | 'UNREADABLE_DOCUMENT'
  | 'MISSING_CREDENTIALS'
  | 'PROVIDER_UNAVAILABLE'
  | 'PROVIDER_AUTH'
  | 'PROVIDER_RATE_LIMIT'
  | 'PROVIDER_RESPONSE'
  | 'SCHEMA_VALIDATION'
  | 'MALFORMED_JSON'
  | 'CANCELLED'
  | 'CONFIG';

export abstract class ResumeKitError extends Error {
  abstract readonly code: ResumeKitErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class EmptyDocumentError extends ResumeKitError {
  readonly code = 'EMPTY_DOCUMENT';

  constructor(message = 'Document text is empty') {
    super(message);
  }
}

export type UnreadableReason = 'not_found' | 'encrypted' | 'corrupt' | 'unsupported_format';

export class UnreadableDocumentError extends ResumeKitError {
  readonly code = 'UNREADABLE_DOCUMENT';

  constructor(
    readonly filePath: string,
    readonly reason: UnreadableReason,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class MissingCredentialsError extends ResumeKitError {
  readonly code = 'MISSING_CREDENTIALS';

  constructor(readonly provider: string, readonly envVar: string) {
    super(`${provider} API key is required. Pass it explicitly or set ${envVar}.`);
  }
}

export class ConfigError extends ResumeKitError {
  readonly code = 'CONFIG';

  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
  }
}

export class CancelledError extends ResumeKitError {
  readonly code = 'CANCELLED';

  constructor(message = 'Extraction was cancelled', options?: { cause?: unknown }) {
    super(message, options);
  }
}

// ============== PROVIDER ERRORS ==============

export abstract class ProviderError extends ResumeKitError {
  constructor(
    readonly provider: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`[${provider}] ${message}`, options);
  }
}

/** Connection refused, DNS failure, or the request timed out. */
export class ProviderUnavailableError extends ProviderError {
  readonly code = 'PROVIDER_UNAVAILABLE';
  readonly timedOut: boolean;

  constructor(
    provider: string,
    message: string,
    options?: { cause?: unknown; timedOut?: boolean },
  ) {
    super(provider, message, options);
    this.timedOut = options?.timedOut ?? false;
  }
}

export class ProviderAuthError extends ProviderError {
  readonly code = 'PROVIDER_AUTH';

  constructor(
    provider: string,
    readonly status: number,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(provider, message, options);
  }
}

export class ProviderRateLimitError extends ProviderError {
  readonly code = 'PROVIDER_RATE_LIMIT';

  constructor(
    provider: string,
    message: string,
    readonly retryAfterMs?: number,
    options?: { cause?: unknown },
  ) {
    super(provider, message, options);
  }
}

export class ProviderResponseError extends ProviderError {
  readonly code = 'PROVIDER_RESPONSE';

  constructor(
    provider: string,
    message: string,
    readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(provider, message, options);
  }
}

export function isRetryableProviderError(
  error: unknown,
): error is ProviderRateLimitError | ProviderUnavailableError {
  return error instanceof ProviderRateLimitError || error instanceof ProviderUnavailableError;
}

// ============== RESPONSE VALIDATION ERRORS ==============

const EXCERPT_LENGTH = 200;

export function excerpt(text: string, length: number = EXCERPT_LENGTH): string {
  const trimmed = text.trim();
  return trimmed.length > length ? `${trimmed.slice(0, length)}...` : trimmed;
}

/** The model reply could not be turned into a resume record at all. */
export class SchemaValidationError extends ResumeKitError {
  readonly code: ResumeKitErrorCode = 'SCHEMA_VALIDATION';
  readonly rawTextExcerpt: string;

  constructor(
    readonly reason: string,
    rawText: string,
    options?: { cause?: unknown },
  ) {
    super(`Response does not match the resume schema: ${reason}`, options);
    this.rawTextExcerpt = excerpt(rawText);
  }
}

export class MalformedJSONError extends SchemaValidationError {
  override readonly code: ResumeKitErrorCode = 'MALFORMED_JSON';

  constructor(
    reason: string,
    rawText: string,
    readonly position?: number,
    options?: { cause?: unknown },
  ) {
    super(reason, rawText, options);
  }
}
