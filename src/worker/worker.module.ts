import { BullModule } from '@nestjs/bullmq';
import { Module } from '@nestjs/common';
import { EngagementModule } from '@/engagement/engagement.module';
import { ENGAGEMENT_QUEUE } from './engagement-queue';
import { EngagementRunProcessor } from './processors/engagement-run.processor';
import { EngagementScheduler } from './schedulers/engagement.scheduler';

@Module({
  imports: [BullModule.registerQueue({ name: ENGAGEMENT_QUEUE }), EngagementModule],
  providers: [EngagementRunProcessor, EngagementScheduler],
  exports: [EngagementScheduler],
})
export class WorkerModule {}
