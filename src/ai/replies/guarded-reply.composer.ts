import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { describeError } from '@/common/errors/engagement.errors';
import { engagementConfig } from '@/config/engagement.config';
import { Candidate } from '@/engagement/engagement.types';
import { ReplyComposer, ReplyContext } from '@/engagement/interfaces/collaborators.interface';
import { ReplyDraftDto } from '../dto/model-output.dto';
import { TEXT_GENERATOR, TextGenerator } from '../interfaces/text-generator.interface';
import { parseStructured } from '../structured-output';
import { buildReplyPrompt, checkDraft, describePost } from './reply-guard';

/**
 * Drafts replies with the text model and only lets through drafts that pass
 * the guard. Each rejection is fed back into the next attempt's prompt.
 */
@Injectable()
export class GuardedReplyComposer implements ReplyComposer {
  private readonly logger = new Logger(GuardedReplyComposer.name);

  constructor(
    @Inject(TEXT_GENERATOR) private readonly generator: TextGenerator,
    @Inject(engagementConfig.KEY)
    private readonly config: ConfigType<typeof engagementConfig>,
  ) {}

  async compose(candidate: Candidate, context: ReplyContext): Promise<string | null> {
    const { model, retryLimit, offTopicTerms } = this.config.settings.replies;
    const post = describePost(candidate);
    const attempts = Math.max(1, retryLimit);
    let feedback: string | undefined;

    for (let attempt = 1; attempt <= attempts; attempt++) {
      let raw: string;
      try {
        raw = await this.generator.generate({
          model,
          prompt: buildReplyPrompt(post, offTopicTerms, feedback),
          json: true,
        });
      } catch (error) {
        feedback = `Generation failed: ${describeError(error)}`;
        this.logger.debug(`[${context.accountId}] content=${candidate.contentId} attempt=${attempt} ${feedback}`);
        continue;
      }

      const parsed = parseStructured(ReplyDraftDto, raw);
      if ('problem' in parsed) {
        feedback = parsed.problem;
      } else {
        const check = checkDraft(parsed.value, post, offTopicTerms, context.keywords);
        if ('accepted' in check) {
          this.logger.log(
            `[${context.accountId}] reply accepted content=${candidate.contentId} attempt=${attempt}`,
          );
          return check.accepted;
        }
        feedback = check.rejected;
      }
      this.logger.debug(
        `[${context.accountId}] reply rejected content=${candidate.contentId} attempt=${attempt}: ${feedback}`,
      );
    }

    this.logger.warn(
      `[${context.accountId}] no acceptable reply content=${candidate.contentId} attempts=${attempts}: ${feedback}`,
    );
    return null;
  }
}
