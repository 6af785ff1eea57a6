import { DelayWindow, HomeReplyPhase } from '../engagement.types';

const SECONDS_PER_HOUR = 3600;

/**
 * Wait after each home feed reply. The floor is an hour divided by
 * `repliesPerHour`, which also caps every hour of the session at that
 * many replies.
 */
export function homeReplySpacing(phase: HomeReplyPhase): DelayWindow {
  const minSeconds = Math.max(phase.delay.minSeconds, SECONDS_PER_HOUR / phase.repliesPerHour);
  let maxSeconds =
    phase.delay.maxSeconds >= minSeconds
      ? phase.delay.maxSeconds
      : minSeconds + Math.max(30, minSeconds * 0.15);
  if (maxSeconds - minSeconds < 1) {
    maxSeconds = minSeconds + Math.max(5, minSeconds * 0.05);
  }
  return { minSeconds, maxSeconds };
}
