import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AuthError, describeError } from '@/common/errors/engagement.errors';
import { Account } from '@/engagement/engagement.types';
import { Authenticator, SessionHandle } from '@/engagement/interfaces/collaborators.interface';
import { TwitterSession } from './twitter-session';
import { X_API_FACTORY, XApiFactory, XCredentials } from './x-api.interface';

/**
 * OAuth 1.0a user-context sessions. App keys come from TWITTER_API_KEY /
 * TWITTER_API_SECRET, user tokens from `<credentialRef>_ACCESS_TOKEN` and
 * `<credentialRef>_ACCESS_SECRET`.
 */
@Injectable()
export class TwitterAuthenticator implements Authenticator {
  private readonly logger = new Logger(TwitterAuthenticator.name);

  constructor(
    private readonly configService: ConfigService,
    @Inject(X_API_FACTORY) private readonly createApi: XApiFactory,
  ) {}

  async authenticate(account: Account): Promise<SessionHandle> {
    if (account.proxyRef) {
      throw new AuthError(
        `account ${account.id} names proxy "${account.proxyRef}", which API sessions cannot use`,
      );
    }

    const api = this.createApi(this.credentialsFor(account));
    try {
      const user = await api.me();
      this.logger.log(`[${account.id}] authenticated as @${user.username}`);
      return new TwitterSession(account.id, user, api);
    } catch (error) {
      throw new AuthError(`[${account.id}] X rejected the credentials: ${describeError(error)}`, {
        cause: error,
      });
    }
  }

  async release(session: SessionHandle): Promise<void> {
    // API sessions hold no connection; marking stops late use
    if (session instanceof TwitterSession) {
      session.released = true;
    }
    this.logger.debug(`[${session.accountId}] session released`);
  }

  private credentialsFor(account: Account): XCredentials {
    const ref = account.credentialRef;
    const names = {
      appKey: 'TWITTER_API_KEY',
      appSecret: 'TWITTER_API_SECRET',
      accessToken: `${ref}_ACCESS_TOKEN`,
      accessSecret: `${ref}_ACCESS_SECRET`,
    } as const;

    const missing = Object.values(names).filter((name) => !this.configService.get<string>(name));
    if (missing.length > 0) {
      throw new AuthError(`[${account.id}] missing credentials: ${missing.join(', ')}`);
    }

    return {
      appKey: this.configService.getOrThrow<string>(names.appKey),
      appSecret: this.configService.getOrThrow<string>(names.appSecret),
      accessToken: this.configService.getOrThrow<string>(names.accessToken),
      accessSecret: this.configService.getOrThrow<string>(names.accessSecret),
    };
  }
}
