import { Global, Logger, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import Redis from 'ioredis';
import { REDIS_CLIENT, RedisService } from './redis.service';

function createRedisClient(config: ConfigService): Redis {
  const logger = new Logger('RedisModule');
  const redisUrl = config.get<string>('REDIS_URL');

  // lazyConnect: the memory storage driver never opens a socket
  if (redisUrl) {
    logger.log(`Using Redis at ${redisUrl.split('@').pop()}`);
    return new Redis(redisUrl, {
      lazyConnect: true,
      ...(redisUrl.startsWith('rediss://') ? { tls: { rejectUnauthorized: false } } : {}),
    });
  }

  const host = config.get<string>('REDIS_HOST') || 'localhost';
  const port = Number(config.get<string>('REDIS_PORT') || 6379);
  logger.log(`Using Redis at ${host}:${port}`);
  return new Redis({
    host,
    port,
    password: config.get<string>('REDIS_PASSWORD') || undefined,
    lazyConnect: true,
  });
}

@Global()
@Module({
  providers: [
    RedisService,
    {
      provide: REDIS_CLIENT,
      inject: [ConfigService],
      useFactory: createRedisClient,
    },
  ],
  exports: [RedisService, REDIS_CLIENT],
})
export class RedisModule {}
