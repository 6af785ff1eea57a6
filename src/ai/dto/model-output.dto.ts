import { IsArray, IsBoolean, IsNumber, IsOptional, IsString } from 'class-validator';

/** JSON the reply prompt asks the model for. */
export class ReplyDraftDto {
  @IsString()
  reply_text!: string;

  @IsBoolean()
  is_relevant!: boolean;

  @IsOptional()
  @IsString()
  relevance_reason?: string;

  @IsOptional()
  @IsArray()
  @IsString({ each: true })
  referenced_topics?: string[];
}

/** JSON the scoring prompt asks the model for. */
export class RelevanceScoreDto {
  @IsNumber({ allowNaN: false, allowInfinity: false })
  score!: number;

  @IsOptional()
  @IsString()
  reason?: string;
}
