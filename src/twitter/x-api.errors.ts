import { ApiRequestError, ApiResponseError } from 'twitter-api-v2';
import { describeError } from '@/common/errors/engagement.errors';

export interface XApiErrorDetails {
  readonly status?: number;
  readonly network?: boolean;
  readonly retryAfterMs?: number;
  readonly cause?: unknown;
}

/** Failure from the X API, stripped of the library's request objects. */
export class XApiError extends Error {
  readonly status?: number;
  readonly network: boolean;
  readonly retryAfterMs?: number;

  constructor(message: string, details: XApiErrorDetails = {}) {
    super(message, { cause: details.cause });
    this.name = 'XApiError';
    this.status = details.status;
    this.network = details.network ?? false;
    this.retryAfterMs = details.retryAfterMs;
  }

  get isAuth(): boolean {
    return this.status === 401;
  }

  get isRateLimit(): boolean {
    return this.status === 429;
  }

  /** Worth one more try: the network or the server failed, not the request. */
  get isTransient(): boolean {
    return this.network || (this.status !== undefined && this.status >= 500);
  }

  get isNotFound(): boolean {
    return this.status === 400 || this.status === 404;
  }
}

export function toXApiError(error: unknown, now = Date.now()): XApiError {
  if (error instanceof XApiError) {
    return error;
  }
  if (error instanceof ApiResponseError) {
    const detail = error.data?.detail ?? error.data?.title ?? error.message;
    const resetAt = error.rateLimit?.reset;
    return new XApiError(`X API ${error.code}: ${detail}`, {
      status: error.code,
      retryAfterMs: resetAt ? Math.max(0, resetAt * 1000 - now) : undefined,
      cause: error,
    });
  }
  if (error instanceof ApiRequestError) {
    return new XApiError(`X API request failed: ${error.requestError.message}`, {
      network: true,
      cause: error,
    });
  }
  return new XApiError(describeError(error), { cause: error });
}
