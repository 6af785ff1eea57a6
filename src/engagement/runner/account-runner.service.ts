import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { differenceInMilliseconds } from 'date-fns';
import { CLOCK, Clock } from '@/common/clock/clock';
import { AuthError, describeError } from '@/common/errors/engagement.errors';
import { engagementConfig } from '@/config/engagement.config';
import {
  Account,
  PhaseResult,
  RecordedError,
  RunResult,
  RunStatus,
} from '../engagement.types';
import {
  AUTHENTICATOR,
  Authenticator,
  METRICS_SINK,
  MetricsSink,
  SessionHandle,
} from '../interfaces/collaborators.interface';
import { emptyActionTotals } from '../orchestrator/run-report';
import { PhaseExecutorService, toRecordedError } from '../phases/phase-executor.service';
import { RateLimiterService } from '../rate-limit/rate-limiter.service';

export type RunnerState = 'idle' | 'authenticating' | 'running' | 'completed' | 'failed';

export interface AccountRunOptions {
  readonly signal?: AbortSignal;
  /** Defaults to the configured rateLimitBackoffSeconds. */
  readonly rateLimitBackoffSeconds?: number;
}

/**
 * Runs one account: authenticate, then every enabled phase in order inside
 * that one session. Never throws; every outcome becomes a RunResult.
 */
@Injectable()
export class AccountRunnerService {
  private readonly logger = new Logger(AccountRunnerService.name);

  constructor(
    @Inject(AUTHENTICATOR) private readonly authenticator: Authenticator,
    @Inject(METRICS_SINK) private readonly metrics: MetricsSink,
    @Inject(CLOCK) private readonly clock: Clock,
    @Inject(engagementConfig.KEY)
    private readonly config: ConfigType<typeof engagementConfig>,
    private readonly rateLimiter: RateLimiterService,
    private readonly executor: PhaseExecutorService,
  ) {}

  async run(account: Account, options: AccountRunOptions = {}): Promise<RunResult> {
    const { signal } = options;
    const backoffSeconds =
      options.rateLimitBackoffSeconds ?? this.config.settings.rateLimitBackoffSeconds;
    const startedAt = this.clock.now();
    const enabled = account.phases.filter((phase) => phase.enabled);
    const phases: PhaseResult[] = [];
    let fatalError: RecordedError | undefined;
    let session: SessionHandle | undefined;

    let state: RunnerState = 'idle';
    const moveTo = (next: RunnerState) => {
      this.logger.debug(`[${account.id}] ${state} -> ${next}`);
      state = next;
    };

    if (signal?.aborted) {
      this.logger.warn(`[${account.id}] cancelled before start, not authenticating`);
      return this.toRunResult(account.id, startedAt, startedAt, phases, undefined, true);
    }

    this.rateLimiter.resetRun(account.id, enabled);
    moveTo('authenticating');

    try {
      session = await this.authenticator.authenticate(account);
      moveTo('running');

      for (let index = 0; index < enabled.length; index++) {
        if (signal?.aborted) break;

        const phase = enabled[index];
        const result = await this.executor.execute({
          account,
          session,
          phase,
          signal,
          rateLimitBackoffMs: backoffSeconds * 1000,
        });
        phases.push(result);

        if (result.terminalError) {
          fatalError = result.terminalError;
          break;
        }
        if (result.status === 'cancelled') break;

        const hasMore = index < enabled.length - 1;
        // the server's reset hint wins when it is longer than the configured backoff
        const backoffMs = Math.max(backoffSeconds * 1000, result.retryAfterMs ?? 0);
        if (result.rateLimited && hasMore && backoffMs > 0) {
          this.logger.warn(
            `[${account.id}] rate limited in phase=${phase.kind}, backing off ${backoffMs}ms`,
          );
          await this.clock.sleep(backoffMs, signal);
        }
      }
    } catch (error) {
      fatalError = toRecordedError(error);
      if (error instanceof AuthError) {
        this.logger.error(`[${account.id}] authentication failed: ${fatalError.message}`);
      } else {
        this.logger.error(`[${account.id}] run aborted by unexpected error: ${fatalError.message}`);
      }
    } finally {
      if (session) {
        await this.release(session);
      }
      this.rateLimiter.releaseRun(account.id);
    }

    const finishedAt = this.clock.now();
    await this.markRun(account.id, finishedAt);

    const cancelled = signal?.aborted ?? false;
    const result = this.toRunResult(account.id, startedAt, finishedAt, phases, fatalError, cancelled);
    moveTo(result.status === 'failed' ? 'failed' : 'completed');
    return result;
  }

  private toRunResult(
    accountId: string,
    startedAt: Date,
    finishedAt: Date,
    phases: readonly PhaseResult[],
    fatalError: RecordedError | undefined,
    cancelled: boolean,
  ): RunResult {
    const errors = phases.flatMap((p) => p.errors);
    if (fatalError && !errors.includes(fatalError)) {
      errors.push(fatalError);
    }

    const actionTotals = emptyActionTotals();
    for (const phase of phases) {
      actionTotals[phase.actionKind] += phase.actions;
    }

    return {
      accountId,
      status: this.statusOf(phases, fatalError, cancelled),
      phases,
      actionTotals,
      errors,
      ...(fatalError ? { fatalError } : {}),
      cancelled,
      startedAt,
      finishedAt,
      durationMs: differenceInMilliseconds(finishedAt, startedAt),
    };
  }

  private statusOf(
    phases: readonly PhaseResult[],
    fatalError: RecordedError | undefined,
    cancelled: boolean,
  ): RunStatus {
    if (fatalError) return 'failed';
    const incomplete = phases.some(
      (p) =>
        p.status === 'ended-early' ||
        p.status === 'cancelled' ||
        (p.status === 'skipped' && p.errors.length > 0),
    );
    return cancelled || incomplete ? 'partially-completed' : 'completed';
  }

  private async release(session: SessionHandle): Promise<void> {
    try {
      await this.authenticator.release(session);
    } catch (error) {
      this.logger.warn(`[${session.accountId}] session release failed: ${describeError(error)}`);
    }
  }

  private async markRun(accountId: string, at: Date): Promise<void> {
    try {
      await this.metrics.markRun(accountId, at);
    } catch (error) {
      this.logger.warn(`[${accountId}] could not record last run: ${describeError(error)}`);
    }
  }
}
