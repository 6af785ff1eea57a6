import { Inject, Injectable } from '@nestjs/common';
import { RANDOM_SOURCE, RandomSource } from '@/common/clock/clock';
import { DelayWindow, PhaseConfig, PhaseKind } from '../engagement.types';

export type QuotaCheck = 'allowed' | 'quota-exhausted' | 'target-exhausted';

interface RunQuota {
  readonly maxActions: number;
  readonly maxPerTarget?: number;
  used: number;
  readonly perTarget: Map<string, number>;
}

/**
 * Draws inter-action delays and tracks per-run quotas. Quotas live only
 * for one account run: `resetRun` at the start, `releaseRun` at the end.
 */
@Injectable()
export class RateLimiterService {
  private readonly runs = new Map<string, Map<PhaseKind, RunQuota>>();

  constructor(@Inject(RANDOM_SOURCE) private readonly random: RandomSource) {}

  /** Uniform integer milliseconds in [minSeconds, maxSeconds]. */
  nextDelay(window: DelayWindow): number {
    const low = Math.ceil(window.minSeconds * 1000);
    const high = Math.floor(window.maxSeconds * 1000);
    if (high <= low) {
      return low;
    }
    const draw = low + Math.floor(this.random() * (high - low + 1));
    return Math.min(draw, high);
  }

  resetRun(accountId: string, phases: readonly PhaseConfig[]): void {
    const quotas = new Map<PhaseKind, RunQuota>();
    for (const phase of phases) {
      quotas.set(phase.kind, {
        maxActions: phase.maxActions,
        maxPerTarget: phase.maxPerTarget,
        used: 0,
        perTarget: new Map(),
      });
    }
    this.runs.set(accountId, quotas);
  }

  releaseRun(accountId: string): void {
    this.runs.delete(accountId);
  }

  /** Checks without mutating. Phases with no quota set are exhausted. */
  allowAction(phase: PhaseKind, accountId: string, target?: string): QuotaCheck {
    const quota = this.runs.get(accountId)?.get(phase);
    if (!quota || quota.used >= quota.maxActions) {
      return 'quota-exhausted';
    }
    if (
      target !== undefined &&
      quota.maxPerTarget !== undefined &&
      (quota.perTarget.get(target) ?? 0) >= quota.maxPerTarget
    ) {
      return 'target-exhausted';
    }
    return 'allowed';
  }

  /** Returns false, without counting, when a limit was already reached. */
  consumeAction(phase: PhaseKind, accountId: string, target?: string): boolean {
    if (this.allowAction(phase, accountId, target) !== 'allowed') {
      return false;
    }
    const quota = this.runs.get(accountId)?.get(phase);
    if (!quota) {
      return false;
    }
    quota.used += 1;
    if (target !== undefined) {
      quota.perTarget.set(target, (quota.perTarget.get(target) ?? 0) + 1);
    }
    return true;
  }

  remaining(phase: PhaseKind, accountId: string): number {
    const quota = this.runs.get(accountId)?.get(phase);
    return quota ? Math.max(quota.maxActions - quota.used, 0) : 0;
  }
}
