import {
  AuthenticationError,
  RateLimitError,
  UnsupportedModelError,
  ValidationError,
} from '@docweave/llm';
import { ExtractionError } from '../types/index.js';

export type ErrorResponse = {
  readonly status: number;
  readonly body: Record<string, unknown>;
};

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Maps a failed generation to the status and JSON body the caller sees.
 */
export function toErrorResponse(error: unknown): ErrorResponse {
  if (error instanceof ValidationError || error instanceof UnsupportedModelError) {
    return { status: 400, body: { error: error.message } };
  }
  if (error instanceof ExtractionError) {
    return { status: 422, body: { error: error.message, fullResponse: error.fullResponse } };
  }
  if (error instanceof RateLimitError) {
    return { status: 429, body: { error: `Rate limit: ${error.message}`, type: 'rate_limit' } };
  }
  if (error instanceof AuthenticationError) {
    return { status: 401, body: { error: 'Invalid API key', type: 'auth_error' } };
  }
  return { status: 500, body: { error: 'Internal server error', message: errorMessage(error) } };
}
