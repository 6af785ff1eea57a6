import {
  ActionError,
  AuthError,
  ScoringError,
  ScrapeError,
  StorageError,
} from '@/common/errors/engagement.errors';

export type FailureClass =
  | 'auth'
  | 'scrape-transient'
  | 'scrape-invalid-target'
  | 'scrape-session-invalid'
  | 'scrape-unknown'
  | 'scoring'
  | 'action-session-invalid'
  | 'action-rate-limited'
  | 'action-other'
  | 'storage'
  | 'storage-unavailable'
  | 'unknown';

export type PolicyDecision =
  | 'retry-once'
  | 'skip-candidate'
  | 'end-phase'
  | 'skip-phase'
  | 'fail-account';

export const ERROR_POLICY: Readonly<Record<FailureClass, PolicyDecision>> = {
  auth: 'fail-account',
  'scrape-transient': 'retry-once',
  'scrape-invalid-target': 'skip-phase',
  'scrape-session-invalid': 'fail-account',
  'scrape-unknown': 'end-phase',
  scoring: 'skip-candidate',
  'action-session-invalid': 'fail-account',
  'action-rate-limited': 'end-phase',
  'action-other': 'skip-candidate',
  storage: 'skip-candidate',
  'storage-unavailable': 'fail-account',
  unknown: 'skip-candidate',
};

/** Errors raised while fetching a batch are classified apart from per-candidate ones. */
export type FailureStage = 'scrape' | 'candidate';

export function classifyFailure(error: unknown, stage: FailureStage): FailureClass {
  if (error instanceof AuthError) return 'auth';
  if (error instanceof ScrapeError) return `scrape-${error.kind}`;
  if (error instanceof ScoringError) return 'scoring';
  if (error instanceof ActionError) return `action-${error.reason}`;
  if (error instanceof StorageError) {
    return error.unavailable ? 'storage-unavailable' : 'storage';
  }
  return stage === 'scrape' ? 'scrape-unknown' : 'unknown';
}

export function policyFor(error: unknown, stage: FailureStage): PolicyDecision {
  return ERROR_POLICY[classifyFailure(error, stage)];
}
