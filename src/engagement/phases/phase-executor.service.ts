import { Inject, Injectable, Logger } from '@nestjs/common';
import { addHours, isBefore, subHours } from 'date-fns';
import { CLOCK, Clock } from '@/common/clock/clock';
import {
  ActionError,
  EngagementError,
  ScrapeError,
  describeError,
} from '@/common/errors/engagement.errors';
import {
  Account,
  ActionKind,
  ActionOutcome,
  Candidate,
  DelayWindow,
  HomeReplyPhase,
  PhaseConfig,
  PhaseKind,
  PhaseResult,
  PhaseStatus,
  RecordedError,
  Target,
} from '../engagement.types';
import {
  ACTION_BACKEND,
  ActionBackend,
  DEDUP_STORE,
  DedupStore,
  METRICS_SINK,
  MetricsSink,
  REPLY_COMPOSER,
  ReplyComposer,
  SCRAPER,
  Scraper,
  SessionHandle,
} from '../interfaces/collaborators.interface';
import { RateLimiterService } from '../rate-limit/rate-limiter.service';
import { RelevanceGateService } from '../relevance/relevance-gate.service';
import { filterReason, ownHandles } from './candidate-filters';
import { PolicyDecision, policyFor } from './error-policy';
import { homeReplySpacing } from './home-pacing';
import { actionKindFor, resolveTargets, scoringKeywords, targetKey } from './phase-targets';

export interface PhaseContext {
  readonly account: Account;
  readonly session: SessionHandle;
  readonly phase: PhaseConfig;
  readonly signal?: AbortSignal;
  /** Wait before retrying a rate-limited scrape. */
  readonly rateLimitBackoffMs?: number;
}

type CandidateOutcome =
  | { readonly type: 'next' }
  | { readonly type: 'quota-exhausted' }
  | { readonly type: 'quota-reached' }
  | { readonly type: 'target-exhausted' }
  | { readonly type: 'stop'; readonly status: PhaseStatus; readonly rateLimited?: boolean };

type FetchOutcome =
  | { readonly ok: true; readonly candidates: readonly Candidate[] }
  | { readonly ok: false; readonly decision: PolicyDecision; readonly error: unknown };

export function toRecordedError(
  error: unknown,
  phase?: PhaseKind,
  contentId?: string,
): RecordedError {
  return {
    code: error instanceof EngagementError ? error.code : 'UNEXPECTED',
    message: describeError(error),
    ...(phase ? { phase } : {}),
    ...(contentId ? { contentId } : {}),
  };
}

/** Mutable counters for one phase run, frozen into a PhaseResult at the end. */
class PhaseTally {
  actions = 0;
  quotaSkipped = 0;
  filtered = 0;
  dedupHits = 0;
  dropped = 0;
  failures = 0;
  targetsVisited = 0;
  rateLimited = false;
  retryAfterMs?: number;
  readonly errors: RecordedError[] = [];
  terminalError?: RecordedError;

  constructor(
    readonly kind: PhaseKind,
    readonly actionKind: ActionKind,
  ) {}

  error(error: unknown, contentId?: string): RecordedError {
    const recorded = toRecordedError(error, this.kind, contentId);
    this.errors.push(recorded);
    return recorded;
  }

  finish(status: PhaseStatus): PhaseResult {
    return {
      kind: this.kind,
      actionKind: this.actionKind,
      status,
      actions: this.actions,
      quotaSkipped: this.quotaSkipped,
      filtered: this.filtered,
      dedupHits: this.dedupHits,
      dropped: this.dropped,
      failures: this.failures,
      targetsVisited: this.targetsVisited,
      rateLimited: this.rateLimited,
      ...(this.retryAfterMs !== undefined ? { retryAfterMs: this.retryAfterMs } : {}),
      errors: [...this.errors],
      ...(this.terminalError ? { terminalError: this.terminalError } : {}),
    };
  }
}

/**
 * Runs one phase for one account: per target, fetch a batch, filter it,
 * then walk the survivors in scrape order until the quota runs out.
 * Candidate-level failures are absorbed here; account-fatal ones end the
 * phase with status `failed` and a terminalError.
 */
@Injectable()
export class PhaseExecutorService {
  private readonly logger = new Logger(PhaseExecutorService.name);

  constructor(
    @Inject(SCRAPER) private readonly scraper: Scraper,
    @Inject(ACTION_BACKEND) private readonly actions: ActionBackend,
    @Inject(DEDUP_STORE) private readonly dedup: DedupStore,
    @Inject(METRICS_SINK) private readonly metrics: MetricsSink,
    @Inject(REPLY_COMPOSER) private readonly composer: ReplyComposer,
    @Inject(CLOCK) private readonly clock: Clock,
    private readonly rateLimiter: RateLimiterService,
    private readonly relevance: RelevanceGateService,
  ) {}

  async execute(ctx: PhaseContext): Promise<PhaseResult> {
    const { account, phase, signal } = ctx;
    if (phase.kind === 'home-reply') {
      return this.executeHomeSession(ctx, phase);
    }

    const tally = new PhaseTally(phase.kind, actionKindFor(phase));
    const targets = resolveTargets(phase, account);
    const since = this.sinceFor(phase);
    const limit = Math.max(phase.maxPerTarget ?? phase.maxActions, 1) * phase.fetchMultiplier;

    this.logger.log(
      `[${account.id}] phase=${phase.kind} start targets=${targets.length} quota=${phase.maxActions}`,
    );

    targetLoop: for (const target of targets) {
      if (signal?.aborted) {
        return this.done(ctx, tally, 'cancelled');
      }
      if (this.rateLimiter.allowAction(phase.kind, account.id) === 'quota-exhausted') {
        return this.done(ctx, tally, 'completed');
      }

      tally.targetsVisited += 1;
      const fetched = await this.fetchBatch(ctx, target, { since, limit });
      if (!fetched.ok) {
        return this.fetchFailed(ctx, tally, fetched);
      }

      const survivors = this.filterBatch(ctx, tally, fetched.candidates, since);
      for (let index = 0; index < survivors.length; index++) {
        if (signal?.aborted) {
          return this.done(ctx, tally, 'cancelled');
        }

        const outcome = await this.processCandidate(ctx, tally, target, survivors[index], phase.delay);
        switch (outcome.type) {
          case 'next':
            continue;
          case 'target-exhausted':
            continue targetLoop;
          case 'quota-exhausted':
          case 'quota-reached':
          case 'stop':
            return this.finishBatch(ctx, tally, outcome, survivors.length - index);
        }
      }
    }

    return this.done(ctx, tally, signal?.aborted ? 'cancelled' : 'completed');
  }

  /**
   * Home feed replies as a paced session: one reply per feed fetch, spaced
   * by homeReplySpacing, until the quota, `maxHours` or a fetch that yields
   * no reply ends it.
   */
  private async executeHomeSession(ctx: PhaseContext, phase: HomeReplyPhase): Promise<PhaseResult> {
    const { account, signal } = ctx;
    const tally = new PhaseTally(phase.kind, 'reply');
    const target = resolveTargets(phase, account)[0];
    const since = this.sinceFor(phase);
    const limit = Math.max(40, phase.repliesPerHour * phase.fetchMultiplier);
    const spacing = homeReplySpacing(phase);
    const sessionEnd = addHours(this.clock.now(), phase.maxHours);

    this.logger.log(
      `[${account.id}] phase=${phase.kind} start perHour=${phase.repliesPerHour} ` +
        `maxHours=${phase.maxHours} quota=${phase.maxActions} spacing=${spacing.minSeconds}s`,
    );

    for (;;) {
      if (signal?.aborted) {
        return this.done(ctx, tally, 'cancelled');
      }
      if (!isBefore(this.clock.now(), sessionEnd)) {
        this.logger.log(`[${account.id}] phase=${phase.kind} reached ${phase.maxHours}h limit`);
        return this.done(ctx, tally, 'completed');
      }
      if (this.rateLimiter.allowAction(phase.kind, account.id) === 'quota-exhausted') {
        return this.done(ctx, tally, 'completed');
      }

      tally.targetsVisited += 1;
      const fetched = await this.fetchBatch(ctx, target, { since, limit });
      if (!fetched.ok) {
        return this.fetchFailed(ctx, tally, fetched);
      }

      const survivors = this.filterBatch(ctx, tally, fetched.candidates, since);
      let replied = false;
      for (let index = 0; index < survivors.length && !replied; index++) {
        if (signal?.aborted) {
          return this.done(ctx, tally, 'cancelled');
        }

        const before = tally.actions;
        const outcome = await this.processCandidate(ctx, tally, target, survivors[index], spacing);
        replied = tally.actions > before;
        switch (outcome.type) {
          case 'next':
            continue;
          case 'target-exhausted':
          case 'quota-exhausted':
          case 'quota-reached':
          case 'stop':
            return this.finishBatch(ctx, tally, outcome, survivors.length - index);
        }
      }

      if (!replied) {
        if (signal?.aborted) {
          return this.done(ctx, tally, 'cancelled');
        }
        this.logger.log(`[${account.id}] phase=${phase.kind} no reply from this feed batch, ending`);
        return this.done(ctx, tally, 'completed');
      }
    }
  }

  private sinceFor(phase: PhaseConfig): Date | undefined {
    return phase.recencyHours !== undefined
      ? subHours(this.clock.now(), phase.recencyHours)
      : undefined;
  }

  private filterBatch(
    ctx: PhaseContext,
    tally: PhaseTally,
    candidates: readonly Candidate[],
    since: Date | undefined,
  ): Candidate[] {
    const { account, phase, session } = ctx;
    const own = ownHandles(account, session);
    const survivors: Candidate[] = [];
    for (const candidate of candidates) {
      const reason = filterReason(candidate, phase, own, since);
      if (reason) {
        tally.filtered += 1;
        this.logger.debug(
          `[${account.id}] phase=${phase.kind} filtered content=${candidate.contentId} reason=${reason}`,
        );
      } else {
        survivors.push(candidate);
      }
    }
    return survivors;
  }

  private fetchFailed(
    ctx: PhaseContext,
    tally: PhaseTally,
    failure: Extract<FetchOutcome, { ok: false }>,
  ): PhaseResult {
    const recorded = tally.error(failure.error);
    switch (failure.decision) {
      case 'fail-account':
        tally.terminalError = recorded;
        return this.done(ctx, tally, 'failed');
      case 'skip-phase':
        return this.done(ctx, tally, 'skipped');
      default:
        return this.done(ctx, tally, 'ended-early');
    }
  }

  /** Ends the phase on a candidate outcome; `left` counts the batch from that candidate on. */
  private finishBatch(
    ctx: PhaseContext,
    tally: PhaseTally,
    outcome: Exclude<CandidateOutcome, { type: 'next' }>,
    left: number,
  ): PhaseResult {
    switch (outcome.type) {
      case 'quota-exhausted':
        tally.quotaSkipped += left;
        return this.done(ctx, tally, 'completed');
      case 'quota-reached':
        tally.quotaSkipped += left - 1;
        return this.done(ctx, tally, 'completed');
      case 'target-exhausted':
        return this.done(ctx, tally, 'completed');
      case 'stop':
        tally.rateLimited = outcome.rateLimited ?? false;
        return this.done(ctx, tally, outcome.status);
    }
  }

  // ===========================================================================
  // FETCH
  // ===========================================================================

  private async fetchBatch(
    ctx: PhaseContext,
    target: Target,
    window: { since?: Date; limit: number },
  ): Promise<FetchOutcome> {
    const { account, phase, session, signal } = ctx;

    for (let attempt = 1; ; attempt++) {
      try {
        const candidates = await this.scraper.fetch(session, {
          target,
          phase: phase.kind,
          since: window.since,
          limit: window.limit,
          signal,
        });
        this.logger.log(
          `[${account.id}] phase=${phase.kind} target=${targetKey(target)} fetched=${candidates.length}`,
        );
        return { ok: true, candidates };
      } catch (error) {
        const decision = policyFor(error, 'scrape');
        if (decision === 'retry-once' && attempt === 1) {
          const waitMs = this.scrapeRetryDelay(ctx, error);
          this.logger.warn(
            `[${account.id}] phase=${phase.kind} target=${targetKey(target)} scrape failed, ` +
              `retrying in ${waitMs}ms: ${describeError(error)}`,
          );
          await this.clock.sleep(waitMs, signal);
          if (signal?.aborted) {
            return { ok: true, candidates: [] };
          }
          continue;
        }
        this.logger.error(
          `[${account.id}] phase=${phase.kind} target=${targetKey(target)} scrape failed: ${describeError(error)}`,
        );
        return { ok: false, decision: decision === 'retry-once' ? 'end-phase' : decision, error };
      }
    }
  }

  /** A rate-limited scrape waits out the backoff or the platform's reset; other transients one delay draw. */
  private scrapeRetryDelay(ctx: PhaseContext, error: unknown): number {
    if (error instanceof ScrapeError && error.rateLimited) {
      return Math.max(ctx.rateLimitBackoffMs ?? 0, error.retryAfterMs ?? 0);
    }
    return this.rateLimiter.nextDelay(ctx.phase.delay);
  }

  // ===========================================================================
  // CANDIDATES
  // ===========================================================================

  private async processCandidate(
    ctx: PhaseContext,
    tally: PhaseTally,
    target: Target,
    candidate: Candidate,
    delay: DelayWindow,
  ): Promise<CandidateOutcome> {
    const { account, phase, session, signal } = ctx;
    const actionKind = tally.actionKind;
    const tKey = targetKey(target);
    const tag = `[${account.id}] phase=${phase.kind} content=${candidate.contentId}`;

    try {
      if (await this.dedup.hasActed(account.id, candidate.contentId, actionKind)) {
        tally.dedupHits += 1;
        return { type: 'next' };
      }
    } catch (error) {
      return this.storageFailure(tally, error, candidate, tag);
    }

    const quota = this.rateLimiter.allowAction(phase.kind, account.id, tKey);
    if (quota === 'quota-exhausted') {
      return { type: 'quota-exhausted' };
    }
    if (quota === 'target-exhausted') {
      return { type: 'target-exhausted' };
    }

    const verdict = await this.relevance.evaluate(
      candidate,
      phase.relevance,
      scoringKeywords(phase, account),
    );
    if (verdict.decision === 'drop') {
      tally.dropped += 1;
      this.logger.debug(`${tag} dropped reason=${verdict.reason} score=${verdict.score ?? '-'}`);
      return { type: 'next' };
    }

    let replyText: string | undefined;
    if (actionKind === 'reply') {
      const composed = await this.composeReply(ctx, candidate, tag);
      if (composed === null) {
        tally.dropped += 1;
        return { type: 'next' };
      }
      replyText = composed;
    }

    try {
      await this.perform(session, actionKind, candidate.contentId, replyText);
    } catch (error) {
      const decision = policyFor(error, 'candidate');
      const recorded = tally.error(error, candidate.contentId);
      await this.recordMetric(account.id, phase.kind, actionKind, 'failure');

      if (decision === 'fail-account') {
        this.logger.error(`${tag} session invalid, stopping account: ${recorded.message}`);
        tally.terminalError = recorded;
        return { type: 'stop', status: 'failed' };
      }
      if (decision === 'end-phase') {
        this.logger.warn(`${tag} rate limited, ending phase: ${recorded.message}`);
        tally.retryAfterMs = error instanceof ActionError ? error.retryAfterMs : undefined;
        return { type: 'stop', status: 'ended-early', rateLimited: true };
      }
      tally.failures += 1;
      this.logger.warn(`${tag} ${actionKind} failed: ${recorded.message}`);
      return { type: 'next' };
    }

    let storageStop: CandidateOutcome | undefined;
    try {
      const created = await this.dedup.recordAction(
        account.id,
        candidate.contentId,
        actionKind,
        this.clock.now(),
      );
      if (!created) {
        this.logger.warn(`${tag} dedup record already present`);
      }
    } catch (error) {
      const outcome = this.storageFailure(tally, error, candidate, tag);
      if (outcome.type === 'stop') storageStop = outcome;
    }

    // the action went out, so it counts even when recording it failed
    this.rateLimiter.consumeAction(phase.kind, account.id, tKey);
    tally.actions += 1;
    this.logger.log(`${tag} ${actionKind} ok actions=${tally.actions}/${phase.maxActions}`);
    await this.recordMetric(account.id, phase.kind, actionKind, 'success');

    if (storageStop) {
      return storageStop;
    }

    if (this.rateLimiter.remaining(phase.kind, account.id) === 0) {
      return { type: 'quota-reached' };
    }

    await this.clock.sleep(this.rateLimiter.nextDelay(delay), signal);

    return this.rateLimiter.allowAction(phase.kind, account.id, tKey) === 'target-exhausted'
      ? { type: 'target-exhausted' }
      : { type: 'next' };
  }

  private async perform(
    session: SessionHandle,
    actionKind: ActionKind,
    contentId: string,
    replyText: string | undefined,
  ): Promise<void> {
    switch (actionKind) {
      case 'like':
        return this.actions.like(session, contentId);
      case 'repost':
        return this.actions.repost(session, contentId);
      case 'reply':
        return this.actions.reply(session, contentId, replyText ?? '');
    }
  }

  private async composeReply(
    ctx: PhaseContext,
    candidate: Candidate,
    tag: string,
  ): Promise<string | null> {
    try {
      const text = await this.composer.compose(candidate, {
        accountId: ctx.account.id,
        keywords: scoringKeywords(ctx.phase, ctx.account),
        phase: ctx.phase.kind,
      });
      if (text === null) {
        this.logger.debug(`${tag} no acceptable reply`);
      }
      return text;
    } catch (error) {
      this.logger.warn(`${tag} reply composition failed: ${describeError(error)}`);
      return null;
    }
  }

  private storageFailure(
    tally: PhaseTally,
    error: unknown,
    candidate: Candidate,
    tag: string,
  ): CandidateOutcome {
    const recorded = tally.error(error, candidate.contentId);
    if (policyFor(error, 'candidate') === 'fail-account') {
      this.logger.error(`${tag} storage unavailable: ${recorded.message}`);
      tally.terminalError = recorded;
      return { type: 'stop', status: 'failed' };
    }
    this.logger.warn(`${tag} storage error, skipping: ${recorded.message}`);
    return { type: 'next' };
  }

  private async recordMetric(
    accountId: string,
    phase: PhaseKind,
    actionKind: ActionKind,
    outcome: ActionOutcome,
  ): Promise<void> {
    try {
      await this.metrics.record(accountId, phase, actionKind, outcome);
    } catch (error) {
      this.logger.warn(`[${accountId}] metrics write failed: ${describeError(error)}`);
    }
  }

  private done(ctx: PhaseContext, tally: PhaseTally, status: PhaseStatus): PhaseResult {
    const result = tally.finish(status);
    this.logger.log(
      `[${ctx.account.id}] phase=${result.kind} status=${result.status} actions=${result.actions} ` +
        `quotaSkipped=${result.quotaSkipped} filtered=${result.filtered} dedup=${result.dedupHits} ` +
        `dropped=${result.dropped} failures=${result.failures}`,
    );
    return result;
  }
}
