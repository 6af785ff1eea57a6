import { Module } from '@nestjs/common';
import { REPLY_COMPOSER, SCORER } from '@/engagement/interfaces/collaborators.interface';
import { TEXT_GENERATOR } from './interfaces/text-generator.interface';
import { GeminiProvider } from './providers/gemini.provider';
import { GuardedReplyComposer } from './replies/guarded-reply.composer';
import { ModelRelevanceScorer } from './scoring/model-relevance.scorer';

@Module({
  providers: [
    GeminiProvider,
    { provide: TEXT_GENERATOR, useExisting: GeminiProvider },
    ModelRelevanceScorer,
    GuardedReplyComposer,
    { provide: SCORER, useExisting: ModelRelevanceScorer },
    { provide: REPLY_COMPOSER, useExisting: GuardedReplyComposer },
  ],
  exports: [SCORER, REPLY_COMPOSER],
})
export class AiModule {}
