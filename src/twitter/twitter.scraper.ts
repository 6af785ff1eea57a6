import { Inject, Injectable, Logger } from '@nestjs/common';
import { isBefore, subDays } from 'date-fns';
import { CLOCK, Clock } from '@/common/clock/clock';
import { ScrapeError } from '@/common/errors/engagement.errors';
import { Candidate, PhaseKind, Target } from '@/engagement/engagement.types';
import {
  FetchRequest,
  Scraper,
  SessionHandle,
} from '@/engagement/interfaces/collaborators.interface';
import { liveTwitterSession, TwitterSession } from './twitter-session';
import { XListOptions, XTweet } from './x-api.interface';
import { XApiError, toXApiError } from './x-api.errors';

// search/recent only reaches back seven days
const SEARCH_WINDOW_DAYS = 7;

/** Ranks the home feed; the API returns it newest first. */
export function popularity(tweet: XTweet): number {
  return (
    tweet.likeCount * 2.5 +
    tweet.retweetCount * 3 +
    tweet.replyCount * 1.2 +
    (tweet.impressionCount ?? 0) * 0.001
  );
}

export function searchQuery(keyword: string): string {
  const term = /\s/.test(keyword) ? `"${keyword.replace(/"/g, '')}"` : keyword;
  return `${term} -is:retweet`;
}

@Injectable()
export class TwitterScraper implements Scraper {
  private readonly logger = new Logger(TwitterScraper.name);

  constructor(@Inject(CLOCK) private readonly clock: Clock) {}

  async fetch(session: SessionHandle, request: FetchRequest): Promise<readonly Candidate[]> {
    const twitter = liveTwitterSession(session);
    if (!twitter) {
      throw new ScrapeError('session-invalid', `[${session.accountId}] no live X session`);
    }
    if (request.signal?.aborted) {
      return [];
    }

    const options: XListOptions = { since: request.since, maxResults: request.limit };
    let tweets: XTweet[];
    try {
      tweets = await this.load(twitter, request.target, options);
    } catch (error) {
      throw this.toScrapeError(error, request.target);
    }

    this.logger.debug(
      `[${session.accountId}] fetched target=${request.target.type}:${request.target.value} count=${tweets.length}`,
    );
    return tweets
      .slice(0, request.limit)
      .map((tweet) => this.toCandidate(tweet, request.phase, request.target));
  }

  private async load(
    session: TwitterSession,
    target: Target,
    options: XListOptions,
  ): Promise<XTweet[]> {
    switch (target.type) {
      case 'profile': {
        const userId = await session.resolveUserId(target.value);
        if (!userId) {
          throw new ScrapeError('invalid-target', `no X user @${target.value}`);
        }
        return session.api.userTimeline(userId, options);
      }
      case 'keyword':
        return session.api.searchRecent(searchQuery(target.value), this.withinSearchWindow(options));
      case 'feed': {
        const tweets = await session.api.homeTimeline(options);
        return [...tweets].sort((a, b) => popularity(b) - popularity(a));
      }
      case 'community':
        throw new ScrapeError(
          'invalid-target',
          `community ${target.value} cannot be read through the X API`,
        );
    }
  }

  private withinSearchWindow(options: XListOptions): XListOptions {
    const earliest = subDays(this.clock.now(), SEARCH_WINDOW_DAYS);
    if (options.since && isBefore(options.since, earliest)) {
      return { ...options, since: undefined };
    }
    return options;
  }

  private toCandidate(tweet: XTweet, phase: PhaseKind, target: Target): Candidate {
    return {
      contentId: tweet.id,
      authorId: tweet.authorUsername.toLowerCase(),
      likes: tweet.likeCount,
      reposts: tweet.retweetCount,
      replies: tweet.replyCount,
      views: tweet.impressionCount,
      text: tweet.text,
      createdAt: tweet.createdAt,
      mediaUrls: tweet.mediaUrls,
      origin: { phase, target },
    };
  }

  private toScrapeError(error: unknown, target: Target): ScrapeError {
    if (error instanceof ScrapeError) {
      return error;
    }
    const apiError: XApiError = toXApiError(error);
    const where = `${target.type}:${target.value}`;
    if (apiError.isAuth) {
      return new ScrapeError('session-invalid', `${where}: ${apiError.message}`, { cause: error });
    }
    if (apiError.isNotFound) {
      return new ScrapeError('invalid-target', `${where}: ${apiError.message}`, { cause: error });
    }
    return new ScrapeError('transient', `${where}: ${apiError.message}`, {
      cause: error,
      rateLimited: apiError.isRateLimit,
      retryAfterMs: apiError.retryAfterMs,
    });
  }
}
