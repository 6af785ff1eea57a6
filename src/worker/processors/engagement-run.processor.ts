import { OnWorkerEvent, Processor, WorkerHost } from '@nestjs/bullmq';
import { Logger, OnModuleDestroy } from '@nestjs/common';
import { Job } from 'bullmq';
import { RunStatus } from '@/engagement/engagement.types';
import { OrchestratorService } from '@/engagement/orchestrator/orchestrator.service';
import { ENGAGEMENT_QUEUE, ENGAGEMENT_RUN_JOB, EngagementRunJob } from '../engagement-queue';

export type RunSummary = Readonly<Record<string, RunStatus>>;

@Processor(ENGAGEMENT_QUEUE)
export class EngagementRunProcessor extends WorkerHost implements OnModuleDestroy {
  private readonly logger = new Logger(EngagementRunProcessor.name);
  private readonly shutdown = new AbortController();

  constructor(private readonly orchestrator: OrchestratorService) {
    super();
  }

  async process(job: Job<EngagementRunJob>): Promise<RunSummary | null> {
    switch (job.name) {
      case ENGAGEMENT_RUN_JOB:
        return this.run(job.data);
      default:
        this.logger.warn(`Unknown job name: ${job.name}`);
        return null;
    }
  }

  /** Account id → status. Account failures stay in the summary; the job itself succeeds. */
  async run(data: EngagementRunJob): Promise<RunSummary> {
    this.logger.log(`Starting run slot=${data.slot} account=${data.accountId ?? 'all'}`);

    const { signal } = this.shutdown;
    const results = data.accountId
      ? [await this.orchestrator.runOne(data.accountId, signal)]
      : (await this.orchestrator.runAll(undefined, undefined, signal)).results;

    const summary: Record<string, RunStatus> = {};
    for (const result of results) {
      summary[result.accountId] = result.status;
    }
    return summary;
  }

  /** Cancels in-flight runs so the worker can close without waiting out their delays. */
  onModuleDestroy(): void {
    this.logger.log('Shutting down, cancelling in-flight runs');
    this.shutdown.abort();
  }

  @OnWorkerEvent('failed')
  onFailed(job: Job<EngagementRunJob>, error: Error) {
    this.logger.error(`Run ${job.id} failed slot=${job.data.slot}: ${error.message}`, error.stack);
  }

  @OnWorkerEvent('completed')
  onCompleted(job: Job<EngagementRunJob>) {
    this.logger.debug(`Run ${job.id} completed slot=${job.data.slot}`);
  }
}
