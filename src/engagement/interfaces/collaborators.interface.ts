import {
  Account,
  ActionKind,
  ActionOutcome,
  Candidate,
  PhaseKind,
  Target,
} from '../engagement.types';

export const AUTHENTICATOR = 'AUTHENTICATOR';
export const SCRAPER = 'SCRAPER';
export const SCORER = 'SCORER';
export const ACTION_BACKEND = 'ACTION_BACKEND';
export const METRICS_SINK = 'METRICS_SINK';
export const REPLY_COMPOSER = 'REPLY_COMPOSER';
export const DEDUP_STORE = 'DEDUP_STORE';

/**
 * Opaque to the engine. Backends narrow it to their own session class.
 */
export interface SessionHandle {
  readonly accountId: string;
  /** Handle the session is logged in as, when the backend knows it. */
  readonly handle?: string;
}

export interface Authenticator {
  /** @throws AuthError */
  authenticate(account: Account): Promise<SessionHandle>;
  release(session: SessionHandle): Promise<void>;
}

export interface FetchRequest {
  readonly target: Target;
  readonly phase: PhaseKind;
  readonly since?: Date;
  readonly limit: number;
  readonly signal?: AbortSignal;
}

export interface Scraper {
  /** @throws ScrapeError, AuthError */
  fetch(session: SessionHandle, request: FetchRequest): Promise<readonly Candidate[]>;
}

export interface Scorer {
  /** Resolves to a score in [0, 1]. @throws ScoringError */
  score(text: string, context: { keywords: readonly string[] }): Promise<number>;
}

export interface ActionBackend {
  like(session: SessionHandle, contentId: string): Promise<void>;
  reply(session: SessionHandle, contentId: string, text: string): Promise<void>;
  repost(session: SessionHandle, contentId: string): Promise<void>;
}

/** Counter per `actionKind` / `actionKind:failure`, plus `lastRunAt` in epoch ms. */
export type MetricsSnapshot = Readonly<Record<string, number>>;

export interface MetricsSink {
  record(
    accountId: string,
    phase: PhaseKind,
    actionKind: ActionKind,
    outcome: ActionOutcome,
  ): Promise<void>;
  markRun(accountId: string, at: Date): Promise<void>;
  snapshot(accountId: string): Promise<MetricsSnapshot>;
}

export interface ReplyContext {
  readonly accountId: string;
  readonly keywords: readonly string[];
  readonly phase: PhaseKind;
}

export interface ReplyComposer {
  /** Reply text, or null when no acceptable reply could be produced. */
  compose(candidate: Candidate, context: ReplyContext): Promise<string | null>;
}

export interface DedupStore {
  /** @throws StorageError */
  hasActed(accountId: string, contentId: string, actionKind: ActionKind): Promise<boolean>;
  /** True when this call created the record. @throws StorageError */
  recordAction(
    accountId: string,
    contentId: string,
    actionKind: ActionKind,
    at: Date,
  ): Promise<boolean>;
}
