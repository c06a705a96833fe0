import {
  AuthenticationError,
  AccessDeniedError,
  NotFoundError,
  InvalidRequestError,
  ContextLengthError,
  RateLimitError,
  ContentFilterError,
  ServerError,
  ProviderError,
  type ProviderErrorDetails,
} from '../types/error.js';
import { asRecord, asString } from './json.js';

export type MapHttpErrorOptions = {
  readonly statusCode: number;
  readonly body: string;
  readonly provider: string;
  readonly headers: Headers;
  readonly raw?: unknown;
};

/**
 * Parses the Retry-After header from response headers.
 * Returns milliseconds, or null if header is not present.
 *
 * - Numeric value (seconds): parsed as int and converted to ms
 * - HTTP date string: computed as delta from now in ms
 */
export function parseRetryAfter(headers: Headers): number | null {
  const retryAfter = headers.get('Retry-After');
  if (!retryAfter) {
    return null;
  }

  if (/^\d+$/.test(retryAfter)) {
    return Number(retryAfter) * 1000;
  }

  const retryDate = new Date(retryAfter);
  if (!isNaN(retryDate.getTime())) {
    return Math.max(0, retryDate.getTime() - Date.now());
  }

  return null;
}

/**
 * Pulls the vendor error code out of a JSON error body. Both supported
 * vendors wrap it as `{ error: { type | code, message } }`.
 */
export function parseErrorCode(body: string): string | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    return null;
  }

  const error = asRecord(asRecord(parsed)?.['error']);
  if (!error) {
    return null;
  }

  const code = asString(error['code']) || asString(error['type']);
  return code || null;
}

type ProviderErrorClass = new (message: string, details: ProviderErrorDetails) => ProviderError;

const STATUS_ERRORS: Readonly<Record<number, readonly [string, ProviderErrorClass]>> = {
  401: ['Authentication failed', AuthenticationError],
  403: ['Access denied', AccessDeniedError],
  404: ['Resource not found', NotFoundError],
  413: ['Context length exceeded', ContextLengthError],
  422: ['Unprocessable entity', InvalidRequestError],
  429: ['Rate limit exceeded', RateLimitError],
};

const CONTENT_FILTER_MARKERS = ['content_filter', 'content_policy', 'safety'];
const CONTEXT_LENGTH_MARKERS = [
  'context_length',
  'too many tokens',
  'maximum context',
  'prompt is too long',
];

// A 400 says little on its own; the body tells filter and length errors apart
function classify400(body: string): readonly [string, ProviderErrorClass] {
  const lowerBody = body.toLowerCase();
  if (CONTENT_FILTER_MARKERS.some((marker) => lowerBody.includes(marker))) {
    return ['Content filtered', ContentFilterError];
  }
  if (CONTEXT_LENGTH_MARKERS.some((marker) => lowerBody.includes(marker))) {
    return ['Context length exceeded', ContextLengthError];
  }
  return ['Invalid request', InvalidRequestError];
}

function classify(statusCode: number, body: string): readonly [string, ProviderErrorClass] {
  if (statusCode === 400) {
    return classify400(body);
  }
  const known = STATUS_ERRORS[statusCode];
  if (known) {
    return known;
  }
  return statusCode >= 500 ? ['Server error', ServerError] : ['HTTP error', ProviderError];
}

/**
 * Maps a non-2xx response to the matching ProviderError subclass. The
 * status is always part of the message so callers that only see the text
 * can still classify it.
 */
export function mapHttpError(options: MapHttpErrorOptions): ProviderError {
  const { statusCode, body, provider, headers, raw } = options;
  const [label, ErrorClass] = classify(statusCode, body);
  const retryable = statusCode === 429 || statusCode >= 500;

  return new ErrorClass(`${label} (${provider} ${statusCode}: ${body})`, {
    statusCode,
    provider,
    errorCode: parseErrorCode(body),
    raw,
    retryAfter: retryable ? parseRetryAfter(headers) : null,
  });
}
