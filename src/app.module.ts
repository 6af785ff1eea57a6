import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { ClockModule } from './common/clock/clock.module';
import { engagementConfig } from './config/engagement.config';
import { EngagementModule } from './engagement/engagement.module';
import { RedisModule } from './redis/redis.module';

/** One-shot run: no queue, no scheduler. */
@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [engagementConfig],
    }),
    ClockModule,
    RedisModule,
    EngagementModule,
  ],
})
export class AppModule {}
