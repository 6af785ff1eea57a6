import { ActionKind, ActionOutcome } from '../engagement.types';

export const LAST_RUN_FIELD = 'lastRunAt';

/** `like` for successes, `like:failure` otherwise. */
export function metricsField(actionKind: ActionKind, outcome: ActionOutcome): string {
  return outcome === 'success' ? actionKind : `${actionKind}:${outcome}`;
}
