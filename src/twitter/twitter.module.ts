import { Module } from '@nestjs/common';
import {
  ACTION_BACKEND,
  AUTHENTICATOR,
  SCRAPER,
} from '@/engagement/interfaces/collaborators.interface';
import { TwitterActionBackend } from './twitter.action-backend';
import { TwitterAuthenticator } from './twitter.authenticator';
import { TwitterScraper } from './twitter.scraper';
import { XApiClient } from './x-api.client';
import { X_API_FACTORY, XApiFactory } from './x-api.interface';

@Module({
  providers: [
    {
      provide: X_API_FACTORY,
      useValue: ((credentials) => XApiClient.fromCredentials(credentials)) satisfies XApiFactory,
    },
    TwitterAuthenticator,
    TwitterScraper,
    TwitterActionBackend,
    { provide: AUTHENTICATOR, useExisting: TwitterAuthenticator },
    { provide: SCRAPER, useExisting: TwitterScraper },
    { provide: ACTION_BACKEND, useExisting: TwitterActionBackend },
  ],
  exports: [AUTHENTICATOR, SCRAPER, ACTION_BACKEND],
})
export class TwitterModule {}
