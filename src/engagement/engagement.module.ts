import { Module } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { AiModule } from '@/ai/ai.module';
import { engagementConfig } from '@/config/engagement.config';
import { TwitterModule } from '@/twitter/twitter.module';
import { InMemoryDedupStore } from './dedup/in-memory-dedup.store';
import { RedisDedupStore } from './dedup/redis-dedup.store';
import { DEDUP_STORE, DedupStore, METRICS_SINK, MetricsSink } from './interfaces/collaborators.interface';
import { InMemoryMetricsSink } from './metrics/in-memory-metrics.sink';
import { RedisMetricsSink } from './metrics/redis-metrics.sink';
import { OrchestratorService } from './orchestrator/orchestrator.service';
import { PhaseExecutorService } from './phases/phase-executor.service';
import { RateLimiterService } from './rate-limit/rate-limiter.service';
import { RelevanceGateService } from './relevance/relevance-gate.service';
import { AccountRunnerService } from './runner/account-runner.service';

type EngagementSettings = ConfigType<typeof engagementConfig>;

@Module({
  imports: [TwitterModule, AiModule],
  providers: [
    RateLimiterService,
    RelevanceGateService,
    PhaseExecutorService,
    AccountRunnerService,
    OrchestratorService,
    InMemoryDedupStore,
    RedisDedupStore,
    InMemoryMetricsSink,
    RedisMetricsSink,
    {
      provide: DEDUP_STORE,
      inject: [engagementConfig.KEY, RedisDedupStore, InMemoryDedupStore],
      useFactory: (
        config: EngagementSettings,
        redis: RedisDedupStore,
        memory: InMemoryDedupStore,
      ): DedupStore => (config.settings.storage.driver === 'redis' ? redis : memory),
    },
    {
      provide: METRICS_SINK,
      inject: [engagementConfig.KEY, RedisMetricsSink, InMemoryMetricsSink],
      useFactory: (
        config: EngagementSettings,
        redis: RedisMetricsSink,
        memory: InMemoryMetricsSink,
      ): MetricsSink => (config.settings.storage.driver === 'redis' ? redis : memory),
    },
  ],
  exports: [OrchestratorService],
})
export class EngagementModule {}
