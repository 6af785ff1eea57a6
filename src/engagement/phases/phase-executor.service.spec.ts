import { Test, TestingModule } from '@nestjs/testing';
import { CLOCK, RANDOM_SOURCE } from '@/common/clock/clock';
import {
  ActionError,
  AuthError,
  ScoringError,
  ScrapeError,
  StorageError,
} from '@/common/errors/engagement.errors';
import { engagementConfig } from '@/config/engagement.config';
import {
  FakeActionBackend,
  FakeClock,
  FakeReplyComposer,
  FakeScorer,
  FakeScraper,
  makeAccount,
  makeCandidate,
  makeCandidates,
  makeConfig,
  makePhase,
} from '@test/fakes';
import { InMemoryDedupStore } from '../dedup/in-memory-dedup.store';
import { Account, ActionKind, PhaseConfig } from '../engagement.types';
import {
  ACTION_BACKEND,
  DEDUP_STORE,
  METRICS_SINK,
  REPLY_COMPOSER,
  SCORER,
  SCRAPER,
} from '../interfaces/collaborators.interface';
import { InMemoryMetricsSink } from '../metrics/in-memory-metrics.sink';
import { RateLimiterService } from '../rate-limit/rate-limiter.service';
import { RelevanceGateService } from '../relevance/relevance-gate.service';
import { PhaseContext, PhaseExecutorService } from './phase-executor.service';

class FlakyDedupStore extends InMemoryDedupStore {
  readonly failures = new Map<string, StorageError>();

  async hasActed(accountId: string, contentId: string, actionKind: ActionKind): Promise<boolean> {
    const failure = this.failures.get(contentId);
    if (failure) throw failure;
    return super.hasActed(accountId, contentId, actionKind);
  }
}

describe('PhaseExecutorService', () => {
  const keywordAi = { type: 'keyword', value: 'ai' } as const;

  let executor: PhaseExecutorService;
  let limiter: RateLimiterService;
  let scraper: FakeScraper;
  let backend: FakeActionBackend;
  let scorer: FakeScorer;
  let composer: FakeReplyComposer;
  let dedup: FlakyDedupStore;
  let metrics: InMemoryMetricsSink;
  let clock: FakeClock;

  beforeEach(async () => {
    scraper = new FakeScraper();
    backend = new FakeActionBackend();
    scorer = new FakeScorer();
    composer = new FakeReplyComposer();
    dedup = new FlakyDedupStore();
    metrics = new InMemoryMetricsSink();
    clock = new FakeClock();

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        PhaseExecutorService,
        RateLimiterService,
        RelevanceGateService,
        { provide: SCRAPER, useValue: scraper },
        { provide: ACTION_BACKEND, useValue: backend },
        { provide: SCORER, useValue: scorer },
        { provide: REPLY_COMPOSER, useValue: composer },
        { provide: DEDUP_STORE, useValue: dedup },
        { provide: METRICS_SINK, useValue: metrics },
        { provide: CLOCK, useValue: clock },
        { provide: RANDOM_SOURCE, useValue: () => 0 },
        { provide: engagementConfig.KEY, useValue: makeConfig() },
      ],
    }).compile();

    executor = module.get<PhaseExecutorService>(PhaseExecutorService);
    limiter = module.get<RateLimiterService>(RateLimiterService);
  });

  function run(
    phase: PhaseConfig,
    account: Account = makeAccount(),
    signal?: AbortSignal,
    context: Partial<Pick<PhaseContext, 'session' | 'rateLimitBackoffMs'>> = {},
  ) {
    limiter.resetRun(account.id, [phase]);
    return executor.execute({
      account,
      session: { accountId: account.id },
      phase,
      signal,
      ...context,
    });
  }

  it('stops at the quota and counts the rest of the batch as quota skips', async () => {
    scraper.script(keywordAi, makeCandidates(10));

    const result = await run(
      makePhase('like', { maxActions: 5, delay: { minSeconds: 1, maxSeconds: 2 } }),
    );

    expect(result.status).toBe('completed');
    expect(result.actions).toBe(5);
    expect(result.quotaSkipped).toBe(5);
    expect(backend.performed.map((a) => a.contentId)).toEqual(['c1', 'c2', 'c3', 'c4', 'c5']);
    expect(clock.sleeps).toEqual([1000, 1000, 1000, 1000]);
  });

  it('drops a candidate whose scoring fails and keeps going', async () => {
    scraper.script(keywordAi, makeCandidates(5));
    scorer.set('post c3', new ScoringError('model unavailable'));

    const result = await run(
      makePhase('like', { relevance: { enabled: true, threshold: 0.5 } }),
    );

    expect(scorer.scored).toEqual(['post c1', 'post c2', 'post c3', 'post c4', 'post c5']);
    expect(backend.performed.map((a) => a.contentId)).toEqual(['c1', 'c2', 'c4', 'c5']);
    expect(result.dropped).toBe(1);
    expect(result.status).toBe('completed');
  });

  it('keeps a score equal to the threshold and drops one just below', async () => {
    scraper.script(keywordAi, makeCandidates(2));
    scorer.set('post c1', 0.5).set('post c2', 0.49);

    const result = await run(
      makePhase('like', { relevance: { enabled: true, threshold: 0.5 } }),
    );

    expect(backend.performed.map((a) => a.contentId)).toEqual(['c1']);
    expect(result.dropped).toBe(1);
  });

  it('skips the scorer entirely when relevance is disabled', async () => {
    scraper.script(keywordAi, makeCandidates(3));

    await run(makePhase('like'));

    expect(scorer.scored).toEqual([]);
    expect(backend.performed).toHaveLength(3);
  });

  it('fails the phase on an invalid session and attempts nothing further', async () => {
    scraper.script(keywordAi, makeCandidates(5));
    backend.failOn('c2', new ActionError('session-invalid', 'token expired'));

    const result = await run(makePhase('like'));

    expect(result.status).toBe('failed');
    expect(result.actions).toBe(1);
    expect(result.terminalError).toEqual({
      code: 'ACTION_FAILED',
      message: 'token expired',
      phase: 'like',
      contentId: 'c2',
    });
    expect(backend.attempts).toEqual(['c1', 'c2']);
  });

  it('is idempotent across runs', async () => {
    scraper.script(keywordAi, makeCandidates(3));
    const phase = makePhase('like');

    const first = await run(phase);
    const second = await run(phase);

    expect(first.actions).toBe(3);
    expect(second.actions).toBe(0);
    expect(second.dedupHits).toBe(3);
    expect(backend.performed).toHaveLength(3);
  });

  it('ends the phase early when the platform rate limits', async () => {
    scraper.script(keywordAi, makeCandidates(4));
    backend.failOn('c2', new ActionError('rate-limited', 'too many requests'));

    const result = await run(makePhase('like'));

    expect(result.status).toBe('ended-early');
    expect(result.rateLimited).toBe(true);
    expect(result.actions).toBe(1);
    expect(await metrics.snapshot('acct-1')).toEqual({ like: 1, 'like:failure': 1 });
  });

  it('reports the platform reset hint when rate limited', async () => {
    scraper.script(keywordAi, makeCandidates(2));
    backend.failOn('c1', new ActionError('rate-limited', 'slow down', { retryAfterMs: 45_000 }));

    const result = await run(makePhase('like'));

    expect(result.status).toBe('ended-early');
    expect(result.retryAfterMs).toBe(45_000);
  });

  it('skips a candidate on other action failures', async () => {
    scraper.script(keywordAi, makeCandidates(3));
    backend.failOn('c2', new ActionError('other', 'post deleted'));

    const result = await run(makePhase('like'));

    expect(result.status).toBe('completed');
    expect(result.failures).toBe(1);
    expect(result.errors).toHaveLength(1);
    expect(backend.performed.map((a) => a.contentId)).toEqual(['c1', 'c3']);
  });

  it('moves to the next target once the per-target cap is reached', async () => {
    scraper
      .script(keywordAi, makeCandidates(3, 'a'))
      .script({ type: 'keyword', value: 'ml' }, makeCandidates(3, 'm'));

    const result = await run(
      makePhase('keyword-reply', { maxActions: 10, maxPerTarget: 2 }),
      makeAccount({ keywords: ['ai', 'ml'] }),
    );

    expect(backend.performed).toEqual([
      { kind: 'reply', accountId: 'acct-1', contentId: 'a1', text: 'reply to a1' },
      { kind: 'reply', accountId: 'acct-1', contentId: 'a2', text: 'reply to a2' },
      { kind: 'reply', accountId: 'acct-1', contentId: 'm1', text: 'reply to m1' },
      { kind: 'reply', accountId: 'acct-1', contentId: 'm2', text: 'reply to m2' },
    ]);
    expect(result.targetsVisited).toBe(2);
    expect(result.status).toBe('completed');
  });

  it('asks the scraper for a batch sized from the cap and recency window', async () => {
    await run(makePhase('keyword-reply', { maxPerTarget: 2, fetchMultiplier: 2, recencyHours: 24 }));

    expect(scraper.requests).toHaveLength(1);
    expect(scraper.requests[0]).toMatchObject({
      target: keywordAi,
      phase: 'keyword-reply',
      limit: 4,
      since: new Date('2026-02-28T12:00:00.000Z'),
    });
  });

  it('skips candidates whose reply was rejected', async () => {
    scraper.script(keywordAi, makeCandidates(2));
    composer.reject('c1');

    const result = await run(makePhase('keyword-reply'));

    expect(backend.performed.map((a) => a.contentId)).toEqual(['c2']);
    expect(result.dropped).toBe(1);
  });

  describe('scrape failures', () => {
    it('retries a transient failure once', async () => {
      scraper.script(keywordAi, new ScrapeError('transient', 'timeout'), makeCandidates(1));

      const result = await run(makePhase('like'));

      expect(scraper.requests).toHaveLength(2);
      expect(result.actions).toBe(1);
      expect(result.errors).toEqual([]);
    });

    it('waits out a rate-limited scrape before retrying it', async () => {
      scraper.script(
        keywordAi,
        new ScrapeError('transient', 'too many requests', { rateLimited: true, retryAfterMs: 30_000 }),
        makeCandidates(1),
      );

      const result = await run(makePhase('like'), makeAccount(), undefined, {
        rateLimitBackoffMs: 10_000,
      });

      expect(clock.sleeps).toEqual([30_000]);
      expect(scraper.requests).toHaveLength(2);
      expect(result.actions).toBe(1);
    });

    it('uses the configured backoff when it exceeds the reset hint', async () => {
      scraper.script(
        keywordAi,
        new ScrapeError('transient', 'too many requests', { rateLimited: true, retryAfterMs: 5_000 }),
        makeCandidates(1),
      );

      await run(makePhase('like'), makeAccount(), undefined, { rateLimitBackoffMs: 120_000 });

      expect(clock.sleeps).toEqual([120_000]);
    });

    it('does not retry when cancelled during the wait', async () => {
      scraper.script(
        keywordAi,
        new ScrapeError('transient', 'too many requests', { rateLimited: true }),
        makeCandidates(1),
      );
      const controller = new AbortController();
      clock.onSleep = () => controller.abort();

      const result = await run(makePhase('like'), makeAccount(), controller.signal, {
        rateLimitBackoffMs: 60_000,
      });

      expect(scraper.requests).toHaveLength(1);
      expect(result.status).toBe('cancelled');
      expect(backend.attempts).toEqual([]);
    });

    it('ends the phase early after a second transient failure', async () => {
      scraper.script(
        keywordAi,
        new ScrapeError('transient', 'timeout'),
        new ScrapeError('transient', 'timeout again'),
      );

      const result = await run(makePhase('like'));

      expect(scraper.requests).toHaveLength(2);
      expect(result.status).toBe('ended-early');
      expect(result.errors).toEqual([
        { code: 'SCRAPE_FAILED', message: 'timeout again', phase: 'like' },
      ]);
    });

    it('skips the phase on an invalid target', async () => {
      scraper.script(
        { type: 'community', value: '42' },
        new ScrapeError('invalid-target', 'community not found'),
      );

      const result = await run(
        makePhase('community'),
        makeAccount({ communityId: '42' }),
      );

      expect(result.status).toBe('skipped');
      expect(result.errors).toHaveLength(1);
      expect(scraper.requests).toHaveLength(1);
    });

    it.each<[string, Error]>([
      ['a lost session', new ScrapeError('session-invalid', 'logged out')],
      ['an auth failure', new AuthError('bad credentials')],
    ])('fails the phase on %s', async (_label, error) => {
      scraper.script(keywordAi, error);

      const result = await run(makePhase('like'));

      expect(result.status).toBe('failed');
      expect(result.terminalError?.message).toBe(error.message);
    });
  });

  describe('pre-score filters', () => {
    it('filters own, stale, weak and media-less posts before scoring', async () => {
      const rival = { type: 'profile', value: 'rival' } as const;
      scraper.script(rival, [
        makeCandidate('own', { authorId: 'Me' }),
        makeCandidate('old', { createdAt: new Date('2026-02-20T00:00:00.000Z'), mediaUrls: ['m'] }),
        makeCandidate('weak', { likes: 1, mediaUrls: ['m'] }),
        makeCandidate('plain', { likes: 50 }),
        makeCandidate('good', { likes: 50, mediaUrls: ['m'] }),
      ]);

      const result = await run(
        makePhase('competitor-repost', {
          maxActions: 5,
          maxPerTarget: 5,
          recencyHours: 48,
          minLikes: 5,
          mediaOnly: true,
          relevance: { enabled: true, threshold: 0.5 },
        }),
      );

      expect(result.filtered).toBe(4);
      expect(scorer.scored).toEqual(['post good']);
      expect(backend.performed).toEqual([
        { kind: 'repost', accountId: 'acct-1', contentId: 'good' },
      ]);
    });
  });

  it('treats the handle the session is logged in as like a configured one', async () => {
    scraper.script(keywordAi, [
      makeCandidate('mine', { authorId: 'Brand_Live' }),
      makeCandidate('theirs', { authorId: 'someone' }),
    ]);

    const result = await run(makePhase('like'), makeAccount(), undefined, {
      session: { accountId: 'acct-1', handle: 'brand_live' },
    });

    expect(result.filtered).toBe(1);
    expect(backend.performed.map((a) => a.contentId)).toEqual(['theirs']);
  });

  describe('storage failures', () => {
    it('skips a candidate when one lookup fails', async () => {
      scraper.script(keywordAi, makeCandidates(3));
      dedup.failures.set('c2', new StorageError('timeout'));

      const result = await run(makePhase('like'));

      expect(backend.performed.map((a) => a.contentId)).toEqual(['c1', 'c3']);
      expect(result.status).toBe('completed');
      expect(result.errors).toHaveLength(1);
    });

    it('fails the phase when storage is unavailable', async () => {
      scraper.script(keywordAi, makeCandidates(3));
      dedup.failures.set('c2', new StorageError('connection refused', { unavailable: true }));

      const result = await run(makePhase('like'));

      expect(backend.performed.map((a) => a.contentId)).toEqual(['c1']);
      expect(result.status).toBe('failed');
      expect(result.terminalError?.code).toBe('STORAGE_FAILED');
    });
  });

  it('stops between candidates once cancelled', async () => {
    scraper.script(keywordAi, makeCandidates(4));
    const controller = new AbortController();
    backend.onAction = () => controller.abort();

    const result = await run(makePhase('like'), makeAccount(), controller.signal);

    expect(result.status).toBe('cancelled');
    expect(result.actions).toBe(1);
    expect(backend.attempts).toEqual(['c1']);
    expect(await dedup.hasActed('acct-1', 'c1', 'like')).toBe(true);
  });

  it('replies to the home feed', async () => {
    scraper.script({ type: 'feed', value: '' }, makeCandidates(2, 'h'));

    const result = await run(makePhase('home-reply', { maxActions: 1 }));

    expect(backend.performed).toEqual([
      { kind: 'reply', accountId: 'acct-1', contentId: 'h1', text: 'reply to h1' },
    ]);
    expect(result.quotaSkipped).toBe(1);
  });

  describe('home feed session', () => {
    const feed = { type: 'feed', value: '' } as const;

    it('spaces replies by the hourly rate and fetches the feed again after each one', async () => {
      scraper.script(feed, makeCandidates(5));

      const result = await run(
        makePhase('home-reply', { maxActions: 10, repliesPerHour: 2, maxHours: 1 }),
      );

      expect(backend.performed.map((a) => a.contentId)).toEqual(['c1', 'c2']);
      expect(clock.sleeps).toEqual([1_800_000, 1_800_000]);
      expect(scraper.requests).toHaveLength(2);
      expect(scraper.requests[0].limit).toBe(40);
      expect(result.dedupHits).toBe(1);
      expect(result.targetsVisited).toBe(2);
      expect(result.status).toBe('completed');
    });

    it('ends once a fresh feed yields nothing new to reply to', async () => {
      scraper.script(feed, makeCandidates(1, 'h'));

      const result = await run(makePhase('home-reply', { maxActions: 5 }));

      expect(backend.performed.map((a) => a.contentId)).toEqual(['h1']);
      expect(clock.sleeps).toEqual([360_000]);
      expect(scraper.requests).toHaveLength(2);
      expect(result.status).toBe('completed');
    });

    it('does not sleep after the last reply the quota allows', async () => {
      scraper.script(feed, makeCandidates(3));

      const result = await run(
        makePhase('home-reply', { maxActions: 2, repliesPerHour: 4, maxHours: 3 }),
      );

      expect(backend.performed.map((a) => a.contentId)).toEqual(['c1', 'c2']);
      expect(clock.sleeps).toEqual([900_000]);
      expect(result.quotaSkipped).toBe(1);
    });
  });
});
