import { Inject, Injectable } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { StorageError, describeError } from '@/common/errors/engagement.errors';
import { engagementConfig } from '@/config/engagement.config';
import { RedisService, isRedisUnavailable } from '@/redis/redis.service';
import { ActionKind, ActionOutcome, PhaseKind } from '../engagement.types';
import { MetricsSink, MetricsSnapshot } from '../interfaces/collaborators.interface';
import { LAST_RUN_FIELD, metricsField } from './metrics-field';

/** Cumulative per-account counters in one hash: `<prefix>:metrics:<accountId>`. */
@Injectable()
export class RedisMetricsSink implements MetricsSink {
  private readonly prefix: string;

  constructor(
    private readonly redis: RedisService,
    @Inject(engagementConfig.KEY)
    config: ConfigType<typeof engagementConfig>,
  ) {
    this.prefix = config.settings.storage.keyPrefix;
  }

  keyFor(accountId: string): string {
    return `${this.prefix}:metrics:${accountId}`;
  }

  async record(
    accountId: string,
    _phase: PhaseKind,
    actionKind: ActionKind,
    outcome: ActionOutcome,
  ): Promise<void> {
    try {
      await this.redis.hincrby(this.keyFor(accountId), metricsField(actionKind, outcome), 1);
    } catch (error) {
      throw this.toStorageError('metrics write', error);
    }
  }

  async markRun(accountId: string, at: Date): Promise<void> {
    try {
      await this.redis.hset(this.keyFor(accountId), LAST_RUN_FIELD, at.getTime());
    } catch (error) {
      throw this.toStorageError('metrics write', error);
    }
  }

  async snapshot(accountId: string): Promise<MetricsSnapshot> {
    try {
      const raw = await this.redis.hgetall(this.keyFor(accountId));
      const snapshot: Record<string, number> = {};
      for (const [field, value] of Object.entries(raw)) {
        const parsed = Number(value);
        if (Number.isFinite(parsed)) snapshot[field] = parsed;
      }
      return snapshot;
    } catch (error) {
      throw this.toStorageError('metrics read', error);
    }
  }

  private toStorageError(operation: string, error: unknown): StorageError {
    return new StorageError(`${operation} failed: ${describeError(error)}`, {
      cause: error,
      unavailable: isRedisUnavailable(error),
    });
  }
}
