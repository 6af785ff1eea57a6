import { Inject, Injectable } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { StorageError, describeError } from '@/common/errors/engagement.errors';
import { engagementConfig } from '@/config/engagement.config';
import { RedisService, isRedisUnavailable } from '@/redis/redis.service';
import { ActionKind } from '../engagement.types';
import { DedupStore } from '../interfaces/collaborators.interface';

const SECONDS_PER_DAY = 86_400;

/**
 * One key per (account, action kind, content id). `SET NX` makes the
 * check-and-record atomic on the server, so two racing runs cannot both
 * claim the same record.
 */
@Injectable()
export class RedisDedupStore implements DedupStore {
  private readonly prefix: string;
  private readonly ttlSeconds?: number;

  constructor(
    private readonly redis: RedisService,
    @Inject(engagementConfig.KEY)
    config: ConfigType<typeof engagementConfig>,
  ) {
    const { keyPrefix, dedupTtlDays } = config.settings.storage;
    this.prefix = keyPrefix;
    this.ttlSeconds = dedupTtlDays ? Math.round(dedupTtlDays * SECONDS_PER_DAY) : undefined;
  }

  keyFor(accountId: string, actionKind: ActionKind, contentId: string): string {
    return `${this.prefix}:dedup:${accountId}:${actionKind}:${contentId}`;
  }

  async hasActed(accountId: string, contentId: string, actionKind: ActionKind): Promise<boolean> {
    try {
      return await this.redis.exists(this.keyFor(accountId, actionKind, contentId));
    } catch (error) {
      throw this.toStorageError('dedup lookup', error);
    }
  }

  async recordAction(
    accountId: string,
    contentId: string,
    actionKind: ActionKind,
    at: Date,
  ): Promise<boolean> {
    try {
      return await this.redis.setIfAbsent(
        this.keyFor(accountId, actionKind, contentId),
        at.toISOString(),
        this.ttlSeconds,
      );
    } catch (error) {
      throw this.toStorageError('dedup write', error);
    }
  }

  private toStorageError(operation: string, error: unknown): StorageError {
    return new StorageError(`${operation} failed: ${describeError(error)}`, {
      cause: error,
      unavailable: isRedisUnavailable(error),
    });
  }
}
