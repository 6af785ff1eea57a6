import { DelayWindow, PhaseKind, RelevanceSettings } from '@/engagement/engagement.types';

interface PhaseDefaults {
  readonly maxActions: number;
  readonly maxPerTarget?: number;
  readonly relevance: RelevanceSettings;
  readonly recencyHours?: number;
  readonly fetchMultiplier: number;
}

/** Every phase starts disabled; accounts or settings.json switch them on. */
export const PHASE_DEFAULTS: Readonly<Record<PhaseKind, PhaseDefaults>> = {
  'competitor-repost': {
    maxActions: 5,
    maxPerTarget: 1,
    relevance: { enabled: true, threshold: 0.35 },
    fetchMultiplier: 3,
  },
  community: {
    maxActions: 5,
    relevance: { enabled: false, threshold: 0.35 },
    recencyHours: 24,
    fetchMultiplier: 4,
  },
  'keyword-reply': {
    maxActions: 10,
    maxPerTarget: 2,
    relevance: { enabled: false, threshold: 0.35 },
    recencyHours: 24,
    fetchMultiplier: 2,
  },
  'keyword-retweet': {
    maxActions: 5,
    maxPerTarget: 1,
    relevance: { enabled: true, threshold: 0.3 },
    fetchMultiplier: 3,
  },
  like: {
    maxActions: 10,
    relevance: { enabled: true, threshold: 0.3 },
    fetchMultiplier: 2,
  },
  'home-reply': {
    maxActions: 30,
    relevance: { enabled: false, threshold: 0.35 },
    fetchMultiplier: 4,
  },
};

export const HOME_REPLY_DEFAULTS = { repliesPerHour: 10, maxHours: 3 } as const;

export const DEFAULT_DELAY: DelayWindow = { minSeconds: 60, maxSeconds: 180 };

/** Like phases without their own window wait half as long. */
export function halveDelay(window: DelayWindow): DelayWindow {
  return { minSeconds: window.minSeconds / 2, maxSeconds: window.maxSeconds / 2 };
}

export const DEFAULT_OFF_TOPIC_TERMS: readonly string[] = [
  'claude',
  'anthropic',
  'openai',
  'chatgpt',
  'opencv',
  'repo',
  'pull request',
  'merge request',
  'commit',
  'stack trace',
  'stacktrace',
  'exception',
  'bugfix',
  'script',
  'terminal',
  'command line',
];
