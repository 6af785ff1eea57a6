/** Also the default run order. */
export const PHASE_KINDS = [
  'competitor-repost',
  'community',
  'keyword-reply',
  'keyword-retweet',
  'like',
  'home-reply',
] as const;

export type PhaseKind = (typeof PHASE_KINDS)[number];

export const ACTION_KINDS = ['like', 'reply', 'repost'] as const;

export type ActionKind = (typeof ACTION_KINDS)[number];

export type ActionOutcome = 'success' | 'failure';

export interface DelayWindow {
  readonly minSeconds: number;
  readonly maxSeconds: number;
}

export interface RelevanceSettings {
  readonly enabled: boolean;
  /** Inclusive lower bound in [0, 1]. */
  readonly threshold: number;
}

// ===========================================================================
// PHASES
// ===========================================================================

interface PhaseBase {
  readonly enabled: boolean;
  readonly maxActions: number;
  readonly maxPerTarget?: number;
  readonly delay: DelayWindow;
  readonly relevance: RelevanceSettings;
  readonly recencyHours?: number;
  readonly fetchMultiplier: number;
}

export interface EngagementThresholds {
  readonly minLikes: number;
  readonly minReposts: number;
}

export interface CompetitorRepostPhase extends PhaseBase, EngagementThresholds {
  readonly kind: 'competitor-repost';
  readonly mediaOnly: boolean;
}

export interface KeywordReplyPhase extends PhaseBase {
  readonly kind: 'keyword-reply';
}

export interface KeywordRetweetPhase extends PhaseBase, EngagementThresholds {
  readonly kind: 'keyword-retweet';
}

export interface LikePhase extends PhaseBase {
  readonly kind: 'like';
  /** Falls back to the account keywords when empty. */
  readonly keywords: readonly string[];
}

export interface CommunityPhase extends PhaseBase {
  readonly kind: 'community';
  readonly action: ActionKind;
}

/**
 * A paced session over the home feed: at most `repliesPerHour` replies,
 * spaced at least an hour / repliesPerHour apart, for up to `maxHours`.
 * The feed is fetched again after every reply.
 */
export interface HomeReplyPhase extends PhaseBase {
  readonly kind: 'home-reply';
  readonly repliesPerHour: number;
  readonly maxHours: number;
}

export type PhaseConfig =
  | CompetitorRepostPhase
  | KeywordReplyPhase
  | KeywordRetweetPhase
  | LikePhase
  | CommunityPhase
  | HomeReplyPhase;

// ===========================================================================
// ACCOUNTS & SETTINGS
// ===========================================================================

export interface Account {
  readonly id: string;
  readonly active: boolean;
  readonly credentialRef: string;
  readonly proxyRef?: string;
  readonly selfHandles: readonly string[];
  readonly keywords: readonly string[];
  readonly competitorProfiles: readonly string[];
  readonly communityId?: string;
  /** Fully resolved phases, already in run order. */
  readonly phases: readonly PhaseConfig[];
}

export type StorageDriver = 'redis' | 'memory';

export interface EngineSettings {
  readonly maxConcurrentAccounts: number;
  readonly runDeadlineMinutes?: number;
  readonly accountTimeoutMinutes?: number;
  readonly accountStartDelaySeconds: number;
  readonly rateLimitBackoffSeconds: number;
  readonly phaseOrder: readonly PhaseKind[];
  readonly delay: DelayWindow;
  readonly storage: {
    readonly driver: StorageDriver;
    readonly keyPrefix: string;
    readonly dedupTtlDays?: number;
  };
  readonly scoring: {
    readonly model: string;
    readonly timeoutMs?: number;
  };
  readonly replies: {
    readonly model: string;
    readonly retryLimit: number;
    readonly offTopicTerms: readonly string[];
  };
  readonly schedule: {
    readonly enabled: boolean;
  };
}

export interface EngagementConfig {
  readonly settings: EngineSettings;
  readonly accounts: readonly Account[];
}

// ===========================================================================
// CANDIDATES & VERDICTS
// ===========================================================================

export type TargetType = 'profile' | 'keyword' | 'community' | 'feed';

export interface Target {
  readonly type: TargetType;
  /** Handle, keyword or community id; empty for the home feed. */
  readonly value: string;
}

export interface Candidate {
  readonly contentId: string;
  /** Author handle, lower-cased by the scraper. */
  readonly authorId: string;
  readonly likes: number;
  readonly reposts: number;
  readonly replies?: number;
  readonly views?: number;
  readonly text: string;
  readonly createdAt?: Date;
  readonly mediaUrls?: readonly string[];
  readonly origin: {
    readonly phase: PhaseKind;
    readonly target: Target;
  };
}

export type VerdictReason = 'disabled' | 'scored' | 'scoring-error';

export interface RelevanceVerdict {
  readonly candidateId: string;
  readonly score: number | null;
  readonly decision: 'keep' | 'drop';
  readonly reason: VerdictReason;
}

// ===========================================================================
// RESULTS
// ===========================================================================

export type PhaseStatus =
  | 'completed'
  | 'ended-early'
  | 'skipped'
  | 'cancelled'
  | 'failed';

export interface RecordedError {
  readonly code: string;
  readonly message: string;
  readonly phase?: PhaseKind;
  readonly contentId?: string;
}

export interface PhaseResult {
  readonly kind: PhaseKind;
  readonly actionKind: ActionKind;
  readonly status: PhaseStatus;
  readonly actions: number;
  readonly quotaSkipped: number;
  readonly filtered: number;
  readonly dedupHits: number;
  readonly dropped: number;
  readonly failures: number;
  readonly targetsVisited: number;
  readonly rateLimited: boolean;
  /** Wait the platform asked for when it rate limited the phase. */
  readonly retryAfterMs?: number;
  readonly errors: readonly RecordedError[];
  /** Set when the phase stopped on an account-fatal error. */
  readonly terminalError?: RecordedError;
}

export type RunStatus = 'completed' | 'partially-completed' | 'failed';

export interface RunResult {
  readonly accountId: string;
  readonly status: RunStatus;
  readonly phases: readonly PhaseResult[];
  readonly actionTotals: Readonly<Record<ActionKind, number>>;
  readonly errors: readonly RecordedError[];
  readonly fatalError?: RecordedError;
  readonly cancelled: boolean;
  readonly startedAt: Date;
  readonly finishedAt: Date;
  readonly durationMs: number;
}
