import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { ScoringError, describeError } from '@/common/errors/engagement.errors';
import { engagementConfig } from '@/config/engagement.config';
import { Scorer } from '@/engagement/interfaces/collaborators.interface';
import { RelevanceScoreDto } from '../dto/model-output.dto';
import { TEXT_GENERATOR, TextGenerator } from '../interfaces/text-generator.interface';
import { parseStructured } from '../structured-output';

const SYSTEM_PROMPT =
  'You rate how relevant a social media post is to a set of topics. ' +
  'Answer only with JSON: {"score": number from 0 to 1, "reason": string}.';

export function buildScorePrompt(text: string, keywords: readonly string[]): string {
  const topics = keywords.length > 0 ? keywords.join(', ') : "the account's general interests";
  return [
    `Topics: ${topics}`,
    'Post:',
    text.trim() || '[no text supplied]',
    '',
    'A score of 1 means the post is squarely about the topics; 0 means unrelated.',
  ].join('\n');
}

@Injectable()
export class ModelRelevanceScorer implements Scorer {
  private readonly logger = new Logger(ModelRelevanceScorer.name);

  constructor(
    @Inject(TEXT_GENERATOR) private readonly generator: TextGenerator,
    @Inject(engagementConfig.KEY)
    private readonly config: ConfigType<typeof engagementConfig>,
  ) {}

  async score(text: string, context: { keywords: readonly string[] }): Promise<number> {
    const { model, timeoutMs } = this.config.settings.scoring;

    let raw: string;
    try {
      raw = await this.generator.generate({
        model,
        systemPrompt: SYSTEM_PROMPT,
        prompt: buildScorePrompt(text, context.keywords),
        json: true,
        timeoutMs,
      });
    } catch (error) {
      throw new ScoringError(`scoring request failed: ${describeError(error)}`, { cause: error });
    }

    const parsed = parseStructured(RelevanceScoreDto, raw);
    if ('problem' in parsed) {
      throw new ScoringError(`unusable score: ${parsed.problem}`);
    }
    this.logger.debug(`score=${parsed.value.score} reason=${parsed.value.reason ?? '-'}`);
    return parsed.value.score;
  }
}
