import { Test, TestingModule } from '@nestjs/testing';
import { StorageError } from '@/common/errors/engagement.errors';
import { engagementConfig } from '@/config/engagement.config';
import { REDIS_CLIENT, RedisService } from '@/redis/redis.service';
import { FakeRedisClient, makeConfig } from '@test/fakes';
import { RedisMetricsSink } from './redis-metrics.sink';

describe('RedisMetricsSink', () => {
  let sink: RedisMetricsSink;
  let client: FakeRedisClient;

  beforeEach(async () => {
    client = new FakeRedisClient();
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        RedisMetricsSink,
        RedisService,
        { provide: REDIS_CLIENT, useValue: client },
        {
          provide: engagementConfig.KEY,
          useValue: makeConfig([], { storage: { driver: 'redis', keyPrefix: 'eng' } }),
        },
      ],
    }).compile();
    sink = module.get<RedisMetricsSink>(RedisMetricsSink);
  });

  it('counts outcomes per action kind in one hash per account', async () => {
    await sink.record('acct-1', 'like', 'like', 'success');
    await sink.record('acct-1', 'community', 'like', 'success');
    await sink.record('acct-1', 'keyword-reply', 'reply', 'failure');
    await sink.record('acct-2', 'like', 'like', 'success');

    expect(Object.fromEntries(client.hashes.get('eng:metrics:acct-1') ?? [])).toEqual({
      like: '2',
      'reply:failure': '1',
    });
    expect(await sink.snapshot('acct-2')).toEqual({ like: 1 });
  });

  it('stores the last run time in epoch milliseconds', async () => {
    const at = new Date('2026-03-01T12:00:00.000Z');

    await sink.markRun('acct-1', at);

    expect(await sink.snapshot('acct-1')).toEqual({ lastRunAt: at.getTime() });
  });

  it('returns an empty snapshot for an unknown account', async () => {
    expect(await sink.snapshot('nobody')).toEqual({});
  });

  it('skips fields that are not numbers', async () => {
    await client.hset('eng:metrics:acct-1', 'note', 'hello');
    await client.hset('eng:metrics:acct-1', 'repost', '3');

    expect(await sink.snapshot('acct-1')).toEqual({ repost: 3 });
  });

  it('wraps client failures in StorageError', async () => {
    client.failWith = new Error('Connection is closed.');

    const error = await sink.record('acct-1', 'like', 'like', 'success').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(StorageError);
    expect(error).toMatchObject({ unavailable: true });
  });
});
