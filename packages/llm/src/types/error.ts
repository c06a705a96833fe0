export class SDKError extends Error {
  override name: string;
  override readonly cause?: Error;

  constructor(message: string, cause?: Error) {
    super(message);
    this.name = this.constructor.name;
    this.cause = cause;
  }
}

export class ConfigurationError extends SDKError {}

export class ValidationError extends SDKError {}

export class UnsupportedModelError extends SDKError {
  readonly model: string;

  constructor(model: string, supported: ReadonlyArray<string> = []) {
    const hint = supported.length > 0 ? `. Supported models: ${supported.join(', ')}` : '';
    super(`Unsupported model: ${model}${hint}`);
    this.model = model;
  }
}

export class AbortError extends SDKError {}

export class RequestTimeoutError extends SDKError {}

export class NetworkError extends SDKError {}

export type ProviderErrorDetails = {
  readonly statusCode: number;
  readonly provider: string;
  readonly errorCode?: string | null;
  readonly raw?: unknown;
  readonly retryAfter?: number | null;
};

/**
 * A provider answered with an error. Subclasses only classify; they carry
 * no state of their own.
 */
export class ProviderError extends SDKError {
  readonly statusCode: number;
  readonly provider: string;
  readonly errorCode: string | null;
  readonly raw: unknown;
  // Milliseconds, from Retry-After
  readonly retryAfter: number | null;

  constructor(message: string, details: ProviderErrorDetails) {
    super(message);
    this.statusCode = details.statusCode;
    this.provider = details.provider;
    this.errorCode = details.errorCode ?? null;
    this.raw = details.raw ?? null;
    this.retryAfter = details.retryAfter ?? null;
  }

  get retryable(): boolean {
    return false;
  }
}

export class AuthenticationError extends ProviderError {}

export class AccessDeniedError extends ProviderError {}

export class NotFoundError extends ProviderError {}

export class InvalidRequestError extends ProviderError {}

export class ContextLengthError extends ProviderError {}

export class ContentFilterError extends ProviderError {}

export class RateLimitError extends ProviderError {
  override get retryable(): boolean {
    return true;
  }
}

export class ServerError extends ProviderError {
  override get retryable(): boolean {
    return true;
  }
}
