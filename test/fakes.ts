import { GenerateRequest, TextGenerator } from '@/ai/interfaces/text-generator.interface';
import { Clock } from '@/common/clock/clock';
import { resolvePhase } from '@/config/engagement.config';
import {
  Account,
  Candidate,
  EngagementConfig,
  EngineSettings,
  PhaseConfig,
  PhaseKind,
  Target,
} from '@/engagement/engagement.types';
import {
  ActionBackend,
  Authenticator,
  FetchRequest,
  ReplyComposer,
  Scorer,
  Scraper,
  SessionHandle,
} from '@/engagement/interfaces/collaborators.interface';
import { targetKey } from '@/engagement/phases/phase-targets';

// ===========================================================================
// BUILDERS
// ===========================================================================

export function makeCandidate(
  contentId: string,
  overrides: Partial<Candidate> = {},
): Candidate {
  return {
    contentId,
    authorId: 'someone',
    likes: 10,
    reposts: 2,
    text: `post ${contentId}`,
    origin: { phase: 'like', target: { type: 'keyword', value: 'ai' } },
    ...overrides,
  };
}

export function makeCandidates(count: number, prefix = 'c'): Candidate[] {
  return Array.from({ length: count }, (_, i) => makeCandidate(`${prefix}${i + 1}`));
}

type PhaseOf<K extends PhaseKind> = Extract<PhaseConfig, { kind: K }>;

function isKind<K extends PhaseKind>(phase: PhaseConfig, kind: K): phase is PhaseOf<K> {
  return phase.kind === kind;
}

/** A resolved phase with zero delay, enabled, and relevance off unless overridden. */
export function makePhase<K extends PhaseKind>(
  kind: K,
  overrides: Partial<Omit<PhaseOf<K>, 'kind'>> = {},
): PhaseOf<K> {
  const base = resolvePhase(kind, [], { minSeconds: 0, maxSeconds: 0 });
  if (!isKind(base, kind)) {
    throw new Error(`resolvePhase returned ${base.kind} for ${kind}`);
  }
  return {
    ...base,
    enabled: true,
    relevance: { enabled: false, threshold: 0.5 },
    ...overrides,
  };
}

export function makeAccount(overrides: Partial<Account> = {}): Account {
  return {
    id: 'acct-1',
    active: true,
    credentialRef: 'ACCT_ONE',
    selfHandles: ['me'],
    keywords: ['ai'],
    competitorProfiles: ['rival'],
    phases: [],
    ...overrides,
  };
}

export function makeSettings(overrides: Partial<EngineSettings> = {}): EngineSettings {
  return {
    maxConcurrentAccounts: 2,
    accountStartDelaySeconds: 0,
    rateLimitBackoffSeconds: 300,
    phaseOrder: ['competitor-repost', 'community', 'keyword-reply', 'keyword-retweet', 'like', 'home-reply'],
    delay: { minSeconds: 0, maxSeconds: 0 },
    storage: { driver: 'memory', keyPrefix: 'test' },
    scoring: { model: 'test-model' },
    replies: { model: 'test-model', retryLimit: 2, offTopicTerms: ['repo', 'stack trace'] },
    schedule: { enabled: false },
    ...overrides,
  };
}

export function makeConfig(
  accounts: readonly Account[] = [makeAccount()],
  settings: Partial<EngineSettings> = {},
): EngagementConfig {
  return { settings: makeSettings(settings), accounts };
}

// ===========================================================================
// COLLABORATORS
// ===========================================================================

/** Time stands still unless advanced; sleeps are recorded and resolve at once. */
export class FakeClock implements Clock {
  readonly sleeps: number[] = [];
  onSleep?: (ms: number) => void;

  constructor(private current = new Date('2026-03-01T12:00:00.000Z')) {}

  now(): Date {
    return new Date(this.current.getTime());
  }

  advance(ms: number): void {
    this.current = new Date(this.current.getTime() + ms);
  }

  async sleep(ms: number): Promise<void> {
    this.sleeps.push(ms);
    this.onSleep?.(ms);
    this.advance(ms);
  }
}

type ScrapeResponse = readonly Candidate[] | Error;

export class FakeScraper implements Scraper {
  readonly requests: FetchRequest[] = [];
  private readonly scripted = new Map<string, ScrapeResponse[]>();

  /** Responses per target, consumed in order; the last one repeats. */
  script(target: Target, ...responses: ScrapeResponse[]): this {
    this.scripted.set(targetKey(target), responses);
    return this;
  }

  async fetch(_session: SessionHandle, request: FetchRequest): Promise<readonly Candidate[]> {
    this.requests.push(request);
    const queue = this.scripted.get(targetKey(request.target)) ?? [];
    const response = queue.length > 1 ? queue.shift() : queue[0];
    if (response instanceof Error) throw response;
    return response ?? [];
  }
}

export interface PerformedAction {
  readonly kind: 'like' | 'reply' | 'repost';
  readonly accountId: string;
  readonly contentId: string;
  readonly text?: string;
}

export class FakeActionBackend implements ActionBackend {
  readonly performed: PerformedAction[] = [];
  readonly attempts: string[] = [];
  private readonly failures = new Map<string, Error>();
  onAction?: (action: PerformedAction) => void;

  failOn(contentId: string, error: Error): this {
    this.failures.set(contentId, error);
    return this;
  }

  async like(session: SessionHandle, contentId: string): Promise<void> {
    this.perform({ kind: 'like', accountId: session.accountId, contentId });
  }

  async reply(session: SessionHandle, contentId: string, text: string): Promise<void> {
    this.perform({ kind: 'reply', accountId: session.accountId, contentId, text });
  }

  async repost(session: SessionHandle, contentId: string): Promise<void> {
    this.perform({ kind: 'repost', accountId: session.accountId, contentId });
  }

  private perform(action: PerformedAction): void {
    this.attempts.push(action.contentId);
    const failure = this.failures.get(action.contentId);
    if (failure) throw failure;
    this.performed.push(action);
    this.onAction?.(action);
  }
}

export class FakeScorer implements Scorer {
  readonly scored: string[] = [];
  private readonly scores = new Map<string, number | Error>();

  constructor(private readonly fallback = 1) {}

  set(text: string, score: number | Error): this {
    this.scores.set(text, score);
    return this;
  }

  async score(text: string): Promise<number> {
    this.scored.push(text);
    const score = this.scores.get(text) ?? this.fallback;
    if (score instanceof Error) throw score;
    return score;
  }
}

export class FakeAuthenticator implements Authenticator {
  readonly authenticated: string[] = [];
  readonly released: string[] = [];
  private readonly failures = new Map<string, Error>();

  failFor(accountId: string, error: Error): this {
    this.failures.set(accountId, error);
    return this;
  }

  async authenticate(account: Account): Promise<SessionHandle> {
    const failure = this.failures.get(account.id);
    if (failure) throw failure;
    this.authenticated.push(account.id);
    return { accountId: account.id };
  }

  async release(session: SessionHandle): Promise<void> {
    this.released.push(session.accountId);
  }
}

export class FakeReplyComposer implements ReplyComposer {
  private readonly rejected = new Set<string>();

  reject(contentId: string): this {
    this.rejected.add(contentId);
    return this;
  }

  async compose(candidate: Candidate): Promise<string | null> {
    return this.rejected.has(candidate.contentId) ? null : `reply to ${candidate.contentId}`;
  }
}

// ===========================================================================
// REDIS
// ===========================================================================

type SetArg = string | number;

/** The subset of ioredis commands RedisService issues, kept in memory. */
export class FakeRedisClient {
  status = 'ready';
  readonly strings = new Map<string, string>();
  readonly ttls = new Map<string, number>();
  readonly hashes = new Map<string, Map<string, string>>();
  readonly commands: SetArg[][] = [];
  failWith?: Error;

  async set(key: string, value: string, ...args: SetArg[]): Promise<'OK' | null> {
    this.check(['set', key, value, ...args]);
    if (args.includes('NX') && this.strings.has(key)) {
      return null;
    }
    this.strings.set(key, value);
    const ex = args.indexOf('EX');
    if (ex >= 0) {
      this.ttls.set(key, Number(args[ex + 1]));
    }
    return 'OK';
  }

  async exists(key: string): Promise<number> {
    this.check(['exists', key]);
    return this.strings.has(key) || this.hashes.has(key) ? 1 : 0;
  }

  async hincrby(key: string, field: string, increment: number): Promise<number> {
    this.check(['hincrby', key, field, increment]);
    const hash = this.hash(key);
    const next = Number(hash.get(field) ?? '0') + increment;
    hash.set(field, String(next));
    return next;
  }

  async hset(key: string, field: string, value: string | number): Promise<number> {
    this.check(['hset', key, field, value]);
    const hash = this.hash(key);
    const created = !hash.has(field);
    hash.set(field, String(value));
    return created ? 1 : 0;
  }

  async hgetall(key: string): Promise<Record<string, string>> {
    this.check(['hgetall', key]);
    return Object.fromEntries(this.hashes.get(key) ?? new Map<string, string>());
  }

  async quit(): Promise<'OK'> {
    this.status = 'end';
    return 'OK';
  }

  disconnect(): void {
    this.status = 'end';
  }

  private hash(key: string): Map<string, string> {
    let hash = this.hashes.get(key);
    if (!hash) {
      hash = new Map();
      this.hashes.set(key, hash);
    }
    return hash;
  }

  private check(command: SetArg[]): void {
    this.commands.push(command);
    if (this.failWith) throw this.failWith;
  }
}

// ===========================================================================
// TEXT MODEL
// ===========================================================================

/** Answers generate() calls from a queue; the last answer repeats. */
export class FakeTextGenerator implements TextGenerator {
  readonly requests: GenerateRequest[] = [];
  private readonly answers: Array<string | Error> = [];

  answer(...answers: Array<string | Error>): this {
    this.answers.push(...answers);
    return this;
  }

  async generate(request: GenerateRequest): Promise<string> {
    this.requests.push(request);
    const next = this.answers.length > 1 ? this.answers.shift() : this.answers[0];
    if (next === undefined) throw new Error('no answer scripted');
    if (next instanceof Error) throw next;
    return next;
  }
}
