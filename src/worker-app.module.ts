import { BullModule } from '@nestjs/bullmq';
import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { ScheduleModule } from '@nestjs/schedule';
import { ClockModule } from './common/clock/clock.module';
import { engagementConfig } from './config/engagement.config';
import { RedisModule } from './redis/redis.module';
import { WorkerModule } from './worker/worker.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [engagementConfig],
    }),
    ScheduleModule.forRoot(),
    ClockModule,
    RedisModule,

    // Queue connection; same variables RedisModule reads
    BullModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => {
        const redisUrl = configService.get<string>('REDIS_URL');
        if (redisUrl) {
          const url = new URL(redisUrl);
          const isTls = redisUrl.startsWith('rediss://');
          return {
            connection: {
              host: url.hostname,
              port: Number(url.port || 6379),
              username: url.username || undefined,
              password: url.password || undefined,
              ...(isTls ? { tls: { rejectUnauthorized: false } } : {}),
            },
          };
        }
        return {
          connection: {
            host: configService.get<string>('REDIS_HOST') || 'localhost',
            port: Number(configService.get<string>('REDIS_PORT') || 6379),
            password: configService.get<string>('REDIS_PASSWORD') || undefined,
          },
        };
      },
    }),

    WorkerModule,
  ],
})
export class WorkerAppModule {}
