import { InjectQueue } from '@nestjs/bullmq';
import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { Cron, CronExpression } from '@nestjs/schedule';
import { Queue } from 'bullmq';
import { CLOCK, Clock } from '@/common/clock/clock';
import { engagementConfig } from '@/config/engagement.config';
import { ENGAGEMENT_QUEUE, ENGAGEMENT_RUN_JOB, EngagementRunJob } from '../engagement-queue';

const KEEP_FINISHED_JOBS = 100;

/** UTC minute of `at` as yyyyMMddHHmm. */
export function scheduleSlot(at: Date): string {
  return at.toISOString().slice(0, 16).replace(/\D/g, '');
}

/**
 * Enqueues engagement runs. The job id is derived from the schedule slot,
 * so a slot enqueued twice (two worker replicas, a restart) runs once.
 */
@Injectable()
export class EngagementScheduler {
  private readonly logger = new Logger(EngagementScheduler.name);

  constructor(
    @InjectQueue(ENGAGEMENT_QUEUE) private readonly queue: Queue<EngagementRunJob>,
    @Inject(CLOCK) private readonly clock: Clock,
    @Inject(engagementConfig.KEY)
    private readonly config: ConfigType<typeof engagementConfig>,
  ) {}

  // Read when this file loads, so it must come from the process environment
  @Cron(process.env.ENGAGEMENT_CRON ?? CronExpression.EVERY_4_HOURS, { name: 'engagement-run' })
  async handleCron(): Promise<void> {
    await this.enqueueRun();
  }

  /** Resolves to the job id, or null when scheduling is switched off. */
  async enqueueRun(accountId?: string): Promise<string | null> {
    if (!this.config.settings.schedule.enabled) {
      this.logger.log('Scheduling disabled, not enqueuing a run');
      return null;
    }

    const slot = scheduleSlot(this.clock.now());
    // BullMQ rejects ':' in custom ids
    const jobId = `run-${accountId ?? 'all'}-${slot}`;
    await this.queue.add(
      ENGAGEMENT_RUN_JOB,
      { accountId, slot },
      {
        jobId,
        attempts: 1,
        removeOnComplete: KEEP_FINISHED_JOBS,
        removeOnFail: KEEP_FINISHED_JOBS,
      },
    );
    this.logger.log(`Enqueued ${jobId}`);
    return jobId;
  }
}
