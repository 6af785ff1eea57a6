import { Account, ActionKind, PhaseConfig, Target } from '../engagement.types';

export function actionKindFor(phase: PhaseConfig): ActionKind {
  switch (phase.kind) {
    case 'competitor-repost':
    case 'keyword-retweet':
      return 'repost';
    case 'keyword-reply':
    case 'home-reply':
      return 'reply';
    case 'like':
      return 'like';
    case 'community':
      return phase.action;
  }
}

/** Targets in configured order. */
export function resolveTargets(phase: PhaseConfig, account: Account): Target[] {
  switch (phase.kind) {
    case 'competitor-repost':
      return account.competitorProfiles.map((value): Target => ({ type: 'profile', value }));
    case 'keyword-reply':
    case 'keyword-retweet':
      return account.keywords.map((value): Target => ({ type: 'keyword', value }));
    case 'like':
      return likeKeywords(phase.keywords, account).map((value): Target => ({ type: 'keyword', value }));
    case 'community':
      return account.communityId ? [{ type: 'community', value: account.communityId }] : [];
    case 'home-reply':
      return [{ type: 'feed', value: '' }];
  }
}

/** Keywords handed to the scorer and reply composer. */
export function scoringKeywords(phase: PhaseConfig, account: Account): readonly string[] {
  return phase.kind === 'like' ? likeKeywords(phase.keywords, account) : account.keywords;
}

export function targetKey(target: Target): string {
  return `${target.type}:${target.value}`;
}

function likeKeywords(own: readonly string[], account: Account): readonly string[] {
  return own.length > 0 ? own : account.keywords;
}
