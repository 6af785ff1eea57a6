import { Injectable } from '@nestjs/common';
import { ActionKind, ActionOutcome, PhaseKind } from '../engagement.types';
import { MetricsSink, MetricsSnapshot } from '../interfaces/collaborators.interface';
import { LAST_RUN_FIELD, metricsField } from './metrics-field';

@Injectable()
export class InMemoryMetricsSink implements MetricsSink {
  private readonly counters = new Map<string, Record<string, number>>();

  async record(
    accountId: string,
    _phase: PhaseKind,
    actionKind: ActionKind,
    outcome: ActionOutcome,
  ): Promise<void> {
    const counters = this.countersFor(accountId);
    const field = metricsField(actionKind, outcome);
    counters[field] = (counters[field] ?? 0) + 1;
  }

  async markRun(accountId: string, at: Date): Promise<void> {
    this.countersFor(accountId)[LAST_RUN_FIELD] = at.getTime();
  }

  async snapshot(accountId: string): Promise<MetricsSnapshot> {
    return { ...this.countersFor(accountId) };
  }

  private countersFor(accountId: string): Record<string, number> {
    let counters = this.counters.get(accountId);
    if (!counters) {
      counters = {};
      this.counters.set(accountId, counters);
    }
    return counters;
  }
}
