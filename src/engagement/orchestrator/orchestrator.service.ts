import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import pLimit from 'p-limit';
import { anySignal, timeoutSignal } from '@/common/clock/abort';
import { CLOCK, Clock } from '@/common/clock/clock';
import { ConfigError, describeError } from '@/common/errors/engagement.errors';
import { engagementConfig } from '@/config/engagement.config';
import { Account, EngineSettings, RunResult } from '../engagement.types';
import { toRecordedError } from '../phases/phase-executor.service';
import { AccountRunnerService } from '../runner/account-runner.service';
import { RunReport, buildRunReport, failedRunResult, formatRunReport } from './run-report';

const MS_PER_MINUTE = 60_000;

/**
 * Fans account runs out with bounded concurrency. Each account's failure
 * stays inside its own RunResult.
 */
@Injectable()
export class OrchestratorService {
  private readonly logger = new Logger(OrchestratorService.name);
  private readonly running = new Set<string>();

  constructor(
    private readonly runner: AccountRunnerService,
    @Inject(CLOCK) private readonly clock: Clock,
    @Inject(engagementConfig.KEY)
    private readonly config: ConfigType<typeof engagementConfig>,
  ) {}

  async runAll(
    accounts: readonly Account[] = this.config.accounts,
    settings: EngineSettings = this.config.settings,
    signal?: AbortSignal,
  ): Promise<RunReport> {
    const startedAt = this.clock.now();
    const active = accounts.filter((account) => {
      if (!account.active) {
        this.logger.log(`[${account.id}] inactive, skipping`);
      }
      return account.active;
    });

    this.logger.log(
      `Starting run accounts=${active.length} concurrency=${settings.maxConcurrentAccounts}`,
    );

    const deadline = settings.runDeadlineMinutes
      ? timeoutSignal(settings.runDeadlineMinutes * MS_PER_MINUTE)
      : undefined;
    const runSignal = anySignal([signal, deadline?.signal]);
    const limit = pLimit(settings.maxConcurrentAccounts);
    let started = 0;

    try {
      const results = await Promise.all(
        active.map((account) =>
          limit(async () => {
            if (started++ > 0 && settings.accountStartDelaySeconds > 0) {
              await this.clock.sleep(settings.accountStartDelaySeconds * 1000, runSignal.signal);
            }
            return this.runGuarded(account, settings, runSignal.signal);
          }),
        ),
      );

      const report = buildRunReport(results, startedAt, this.clock.now());
      for (const line of formatRunReport(report)) {
        this.logger.log(line);
      }
      return report;
    } finally {
      deadline?.clear();
      runSignal.dispose();
    }
  }

  /** Runs one account ad hoc, active or not. */
  async runOne(accountOrId: Account | string, signal?: AbortSignal): Promise<RunResult> {
    const account =
      typeof accountOrId === 'string'
        ? this.config.accounts.find((candidate) => candidate.id === accountOrId)
        : accountOrId;
    if (!account) {
      throw new ConfigError([`unknown account "${String(accountOrId)}"`]);
    }
    if (!account.active) {
      this.logger.warn(`[${account.id}] running inactive account on request`);
    }

    const settings = this.config.settings;
    const deadline = settings.runDeadlineMinutes
      ? timeoutSignal(settings.runDeadlineMinutes * MS_PER_MINUTE)
      : undefined;
    const runSignal = anySignal([signal, deadline?.signal]);
    try {
      const result = await this.runGuarded(account, settings, runSignal.signal);
      const [, accountLine] = formatRunReport(
        buildRunReport([result], result.startedAt, result.finishedAt),
      );
      this.logger.log(accountLine);
      return result;
    } finally {
      deadline?.clear();
      runSignal.dispose();
    }
  }

  private async runGuarded(
    account: Account,
    settings: EngineSettings,
    parent: AbortSignal,
  ): Promise<RunResult> {
    if (this.running.has(account.id)) {
      this.logger.warn(`[${account.id}] already running, rejecting second run`);
      return failedRunResult(
        account.id,
        { code: 'ALREADY_RUNNING', message: `account ${account.id} is already running` },
        this.clock.now(),
      );
    }

    this.running.add(account.id);
    const timeout = settings.accountTimeoutMinutes
      ? timeoutSignal(settings.accountTimeoutMinutes * MS_PER_MINUTE)
      : undefined;
    const accountSignal = anySignal([parent, timeout?.signal]);

    try {
      return await this.runner.run(account, {
        signal: accountSignal.signal,
        rateLimitBackoffSeconds: settings.rateLimitBackoffSeconds,
      });
    } catch (error) {
      this.logger.error(`[${account.id}] runner threw: ${describeError(error)}`);
      return failedRunResult(account.id, toRecordedError(error), this.clock.now());
    } finally {
      this.running.delete(account.id);
      timeout?.clear();
      accountSignal.dispose();
    }
  }
}
