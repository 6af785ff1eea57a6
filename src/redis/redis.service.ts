import { Inject, Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import Redis from 'ioredis';

export const REDIS_CLIENT = 'REDIS_CLIENT';

const UNAVAILABLE_PATTERNS = [
  'ECONNREFUSED',
  'ECONNRESET',
  'ETIMEDOUT',
  'Connection is closed',
  'ENOSPC',
  'OOM',
];

/** True for failures of the whole server rather than of one command. */
export function isRedisUnavailable(error: unknown): boolean {
  if (!(error instanceof Error)) return false;
  if (error.name === 'MaxRetriesPerRequestError') return true;
  return UNAVAILABLE_PATTERNS.some((pattern) => error.message.includes(pattern));
}

@Injectable()
export class RedisService implements OnModuleDestroy {
  private readonly logger = new Logger(RedisService.name);

  constructor(@Inject(REDIS_CLIENT) private readonly client: Redis) {}

  /**
   * SET key value NX [EX ttl]. Resolves true when the key was created,
   * false when it already existed.
   */
  async setIfAbsent(key: string, value: string, ttlSeconds?: number): Promise<boolean> {
    const result = ttlSeconds
      ? await this.client.set(key, value, 'EX', ttlSeconds, 'NX')
      : await this.client.set(key, value, 'NX');
    return result === 'OK';
  }

  async exists(key: string): Promise<boolean> {
    const result = await this.client.exists(key);
    return result === 1;
  }

  async hincrby(key: string, field: string, increment = 1): Promise<number> {
    return this.client.hincrby(key, field, increment);
  }

  async hset(key: string, field: string, value: string | number): Promise<number> {
    return this.client.hset(key, field, value);
  }

  async hgetall(key: string): Promise<Record<string, string>> {
    return this.client.hgetall(key);
  }

  async onModuleDestroy(): Promise<void> {
    // lazyConnect: nothing to close when no command was ever sent
    if (this.client.status === 'wait' || this.client.status === 'end') {
      return;
    }
    try {
      await this.client.quit();
    } catch (error) {
      this.logger.warn(`Redis quit failed: ${error instanceof Error ? error.message : String(error)}`);
      this.client.disconnect();
    }
  }
}
