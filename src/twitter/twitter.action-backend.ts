import { Injectable, Logger } from '@nestjs/common';
import { ActionError } from '@/common/errors/engagement.errors';
import { ActionKind } from '@/engagement/engagement.types';
import { ActionBackend, SessionHandle } from '@/engagement/interfaces/collaborators.interface';
import { liveTwitterSession, TwitterSession } from './twitter-session';
import { toXApiError } from './x-api.errors';

/** X counts reply length in code points. */
export const X_REPLY_CHAR_LIMIT = 280;

@Injectable()
export class TwitterActionBackend implements ActionBackend {
  private readonly logger = new Logger(TwitterActionBackend.name);

  like(session: SessionHandle, contentId: string): Promise<void> {
    return this.perform(session, 'like', contentId, (twitter) =>
      twitter.api.like(twitter.user.id, contentId),
    );
  }

  reply(session: SessionHandle, contentId: string, text: string): Promise<void> {
    if (!text.trim() || Array.from(text).length > X_REPLY_CHAR_LIMIT) {
      return Promise.reject(
        new ActionError('other', `reply to ${contentId} must be 1-${X_REPLY_CHAR_LIMIT} characters`),
      );
    }
    return this.perform(session, 'reply', contentId, (twitter) =>
      twitter.api.reply(text, contentId),
    );
  }

  repost(session: SessionHandle, contentId: string): Promise<void> {
    return this.perform(session, 'repost', contentId, (twitter) =>
      twitter.api.retweet(twitter.user.id, contentId),
    );
  }

  private async perform(
    session: SessionHandle,
    kind: ActionKind,
    contentId: string,
    action: (twitter: TwitterSession) => Promise<void>,
  ): Promise<void> {
    const twitter = liveTwitterSession(session);
    if (!twitter) {
      throw new ActionError('session-invalid', `[${session.accountId}] no live X session`);
    }

    try {
      await action(twitter);
      this.logger.log(`[${session.accountId}] ${kind} content=${contentId}`);
    } catch (error) {
      const apiError = toXApiError(error);
      const message = `${kind} ${contentId}: ${apiError.message}`;
      if (apiError.isAuth) {
        throw new ActionError('session-invalid', message, { cause: error });
      }
      if (apiError.isRateLimit) {
        throw new ActionError('rate-limited', message, {
          cause: error,
          retryAfterMs: apiError.retryAfterMs,
        });
      }
      throw new ActionError('other', message, { cause: error });
    }
  }
}
