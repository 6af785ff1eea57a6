import { differenceInMilliseconds } from 'date-fns';
import { ACTION_KINDS, ActionKind, RecordedError, RunResult, RunStatus } from '../engagement.types';

export interface RunReport {
  readonly startedAt: Date;
  readonly finishedAt: Date;
  readonly durationMs: number;
  readonly results: readonly RunResult[];
  readonly statusCounts: Readonly<Record<RunStatus, number>>;
  readonly actionTotals: Readonly<Record<ActionKind, number>>;
}

export function emptyActionTotals(): Record<ActionKind, number> {
  return { like: 0, reply: 0, repost: 0 };
}

export function buildRunReport(
  results: readonly RunResult[],
  startedAt: Date,
  finishedAt: Date,
): RunReport {
  const statusCounts: Record<RunStatus, number> = {
    completed: 0,
    'partially-completed': 0,
    failed: 0,
  };
  const actionTotals = emptyActionTotals();

  for (const result of results) {
    statusCounts[result.status] += 1;
    for (const kind of ACTION_KINDS) {
      actionTotals[kind] += result.actionTotals[kind];
    }
  }

  return {
    startedAt,
    finishedAt,
    durationMs: differenceInMilliseconds(finishedAt, startedAt),
    results,
    statusCounts,
    actionTotals,
  };
}

/** A RunResult for an account that never got to run its phases. */
export function failedRunResult(
  accountId: string,
  error: RecordedError,
  at: Date,
): RunResult {
  return {
    accountId,
    status: 'failed',
    phases: [],
    actionTotals: emptyActionTotals(),
    errors: [error],
    fatalError: error,
    cancelled: false,
    startedAt: at,
    finishedAt: at,
    durationMs: 0,
  };
}

function formatTotals(totals: Readonly<Record<ActionKind, number>>): string {
  return ACTION_KINDS.map((kind) => `${kind}=${totals[kind]}`).join(' ');
}

/** One summary line, then one line per account. */
export function formatRunReport(report: RunReport): string[] {
  const { statusCounts } = report;
  const lines = [
    `accounts=${report.results.length} completed=${statusCounts.completed} ` +
      `partial=${statusCounts['partially-completed']} failed=${statusCounts.failed} ` +
      `${formatTotals(report.actionTotals)} duration=${(report.durationMs / 1000).toFixed(1)}s`,
  ];

  for (const result of report.results) {
    const phases = result.phases.map((p) => `${p.kind}:${p.status}:${p.actions}`).join(',');
    const fatal = result.fatalError ? ` fatal="${result.fatalError.message}"` : '';
    lines.push(
      `[${result.accountId}] status=${result.status} ${formatTotals(result.actionTotals)} ` +
        `phases=${phases || '-'}${result.cancelled ? ' cancelled' : ''}${fatal}`,
    );
  }
  return lines;
}
