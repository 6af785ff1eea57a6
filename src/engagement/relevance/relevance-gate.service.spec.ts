import { Test, TestingModule } from '@nestjs/testing';
import { ScoringError } from '@/common/errors/engagement.errors';
import { engagementConfig } from '@/config/engagement.config';
import { FakeScorer, makeCandidate, makeConfig } from '@test/fakes';
import { SCORER } from '../interfaces/collaborators.interface';
import { RelevanceGateService } from './relevance-gate.service';

describe('RelevanceGateService', () => {
  const on = { enabled: true, threshold: 0.6 };
  const candidate = makeCandidate('c1', { text: 'graph neural nets' });

  let gate: RelevanceGateService;
  let scorer: FakeScorer;

  async function build(timeoutMs?: number, scorerValue: unknown = new FakeScorer()) {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        RelevanceGateService,
        { provide: SCORER, useValue: scorerValue },
        {
          provide: engagementConfig.KEY,
          useValue: makeConfig([], { scoring: { model: 'test-model', timeoutMs } }),
        },
      ],
    }).compile();
    gate = module.get<RelevanceGateService>(RelevanceGateService);
  }

  beforeEach(async () => {
    scorer = new FakeScorer();
    await build(undefined, scorer);
  });

  it('keeps without scoring when the filter is off', async () => {
    const verdict = await gate.evaluate(candidate, { enabled: false, threshold: 0.9 }, ['ai']);

    expect(verdict).toEqual({ candidateId: 'c1', score: null, decision: 'keep', reason: 'disabled' });
    expect(scorer.scored).toEqual([]);
  });

  it('keeps a score equal to the threshold and drops one just below', async () => {
    scorer.set('graph neural nets', 0.6);
    expect((await gate.evaluate(candidate, on, ['ai'])).decision).toBe('keep');

    scorer.set('graph neural nets', 0.59);
    expect(await gate.evaluate(candidate, on, ['ai'])).toEqual({
      candidateId: 'c1',
      score: 0.59,
      decision: 'drop',
      reason: 'scored',
    });
  });

  it('drops on scorer failure', async () => {
    scorer.set('graph neural nets', new ScoringError('model unavailable'));

    expect(await gate.evaluate(candidate, on, ['ai'])).toEqual({
      candidateId: 'c1',
      score: null,
      decision: 'drop',
      reason: 'scoring-error',
    });
  });

  it.each([1.5, -0.1, Number.NaN])('drops the out-of-range score %p', async (score) => {
    scorer.set('graph neural nets', score);

    expect((await gate.evaluate(candidate, on, ['ai'])).reason).toBe('scoring-error');
  });

  it('drops when the scorer outlives its timeout', async () => {
    await build(50, { score: () => new Promise<number>(() => undefined) });
    jest.useFakeTimers();
    try {
      const pending = gate.evaluate(candidate, on, ['ai']);
      jest.advanceTimersByTime(50);

      expect((await pending).reason).toBe('scoring-error');
    } finally {
      jest.useRealTimers();
    }
  });
});
