import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { describeError } from '@/common/errors/engagement.errors';
import { engagementConfig } from '@/config/engagement.config';
import { Candidate, RelevanceSettings, RelevanceVerdict } from '../engagement.types';
import { SCORER, Scorer } from '../interfaces/collaborators.interface';

/**
 * Applies a phase's relevance threshold to the Scorer. Never throws:
 * scorer failures, timeouts and out-of-range scores become drops.
 */
@Injectable()
export class RelevanceGateService {
  private readonly logger = new Logger(RelevanceGateService.name);
  private readonly timeoutMs?: number;

  constructor(
    @Inject(SCORER) private readonly scorer: Scorer,
    @Inject(engagementConfig.KEY)
    config: ConfigType<typeof engagementConfig>,
  ) {
    this.timeoutMs = config.settings.scoring.timeoutMs;
  }

  async evaluate(
    candidate: Candidate,
    relevance: RelevanceSettings,
    keywords: readonly string[],
  ): Promise<RelevanceVerdict> {
    if (!relevance.enabled) {
      return { candidateId: candidate.contentId, score: null, decision: 'keep', reason: 'disabled' };
    }

    let score: number;
    try {
      score = await this.withTimeout(this.scorer.score(candidate.text, { keywords }));
    } catch (error) {
      this.logger.warn(`scoring failed content=${candidate.contentId}: ${describeError(error)}`);
      return this.scoringError(candidate);
    }

    if (typeof score !== 'number' || !Number.isFinite(score) || score < 0 || score > 1) {
      this.logger.warn(`score out of range content=${candidate.contentId} score=${String(score)}`);
      return this.scoringError(candidate);
    }

    return {
      candidateId: candidate.contentId,
      score,
      decision: score >= relevance.threshold ? 'keep' : 'drop',
      reason: 'scored',
    };
  }

  private scoringError(candidate: Candidate): RelevanceVerdict {
    return {
      candidateId: candidate.contentId,
      score: null,
      decision: 'drop',
      reason: 'scoring-error',
    };
  }

  private withTimeout<T>(work: Promise<T>): Promise<T> {
    const timeoutMs = this.timeoutMs;
    if (!timeoutMs) {
      return work;
    }

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(
        () => reject(new Error(`scorer timed out after ${timeoutMs}ms`)),
        timeoutMs,
      );
    });
    return Promise.race([work, timeout]).finally(() => clearTimeout(timer));
  }
}
