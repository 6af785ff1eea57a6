import { isBefore } from 'date-fns';
import { Account, Candidate, PhaseConfig } from '../engagement.types';
import { SessionHandle } from '../interfaces/collaborators.interface';

export type FilterReason = 'own-content' | 'too-old' | 'low-likes' | 'low-reposts' | 'no-media';

/**
 * Pre-score filters, applied in this order. Returns the first reason the
 * candidate fails, or undefined when it survives.
 */
export function filterReason(
  candidate: Candidate,
  phase: PhaseConfig,
  selfHandles: readonly string[],
  since?: Date,
): FilterReason | undefined {
  if (selfHandles.includes(candidate.authorId.toLowerCase())) {
    return 'own-content';
  }
  if (since && candidate.createdAt && isBefore(candidate.createdAt, since)) {
    return 'too-old';
  }
  if (phase.kind === 'competitor-repost' || phase.kind === 'keyword-retweet') {
    if (candidate.likes < phase.minLikes) return 'low-likes';
    if (candidate.reposts < phase.minReposts) return 'low-reposts';
  }
  if (phase.kind === 'competitor-repost' && phase.mediaOnly && !candidate.mediaUrls?.length) {
    return 'no-media';
  }
  return undefined;
}

/** Configured self handles plus the handle the session is logged in as. */
export function ownHandles(account: Account, session: SessionHandle): readonly string[] {
  const live = session.handle?.trim().replace(/^@/, '').toLowerCase();
  return live && !account.selfHandles.includes(live)
    ? [...account.selfHandles, live]
    : account.selfHandles;
}
