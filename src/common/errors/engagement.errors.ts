/**
 * Error taxonomy for the engagement engine.
 *
 * Every collaborator failure is raised as one of these classes so the
 * phase executor can look the failure up in the policy table instead of
 * matching on messages.
 */
export abstract class EngagementError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Session could not be acquired. Fatal to the account run, never retried. */
export class AuthError extends EngagementError {
  readonly code = 'AUTH_FAILED';
}

export type ScrapeErrorKind = 'transient' | 'invalid-target' | 'session-invalid';

export class ScrapeError extends EngagementError {
  readonly code = 'SCRAPE_FAILED';

  constructor(
    readonly kind: ScrapeErrorKind,
    message: string,
    options?: { cause?: unknown; rateLimited?: boolean; retryAfterMs?: number },
  ) {
    super(message, options);
    this.rateLimited = options?.rateLimited ?? false;
    this.retryAfterMs = options?.retryAfterMs;
  }

  /** A transient failure caused by the platform's rate limit. */
  readonly rateLimited: boolean;
  readonly retryAfterMs?: number;
}

/** Always non-fatal: the candidate is dropped. */
export class ScoringError extends EngagementError {
  readonly code = 'SCORING_FAILED';
}

export type ActionErrorReason = 'session-invalid' | 'rate-limited' | 'other';

export class ActionError extends EngagementError {
  readonly code = 'ACTION_FAILED';

  constructor(
    readonly reason: ActionErrorReason,
    message: string,
    options?: { cause?: unknown; retryAfterMs?: number },
  ) {
    super(message, options);
    this.retryAfterMs = options?.retryAfterMs;
  }

  readonly retryAfterMs?: number;
}

export class StorageError extends EngagementError {
  readonly code = 'STORAGE_FAILED';

  constructor(
    message: string,
    options?: { cause?: unknown; unavailable?: boolean },
  ) {
    super(message, options);
    this.unavailable = options?.unavailable ?? false;
  }

  /** True when the whole store is down rather than one operation failing. */
  readonly unavailable: boolean;
}

export class ConfigError extends EngagementError {
  readonly code = 'CONFIG_INVALID';

  constructor(readonly problems: readonly string[]) {
    super(`Invalid engagement configuration:\n  - ${problems.join('\n  - ')}`);
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
