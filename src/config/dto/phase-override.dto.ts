import {
  IsArray,
  IsBoolean,
  IsIn,
  IsInt,
  IsNumber,
  IsString,
  Max,
  Min,
  ValidateNested,
} from 'class-validator';
import { Type, TypeOptions } from 'class-transformer';
import {
  ACTION_KINDS,
  ActionKind,
  PHASE_KINDS,
  PhaseKind,
} from '@/engagement/engagement.types';
import { DelayWindowDto } from './delay-window.dto';
import { IsOmittable } from './is-omittable.decorator';

export class RelevanceOverrideDto {
  @IsOmittable()
  @IsBoolean()
  enabled?: boolean;

  @IsOmittable()
  @IsNumber()
  @Min(0)
  @Max(1)
  threshold?: number;
}

/**
 * Partial phase settings. Used for the global per-kind defaults in
 * settings.json and for per-account overrides; every field left out keeps
 * the value from the level below.
 */
export class PhaseOverrideDto {
  @IsIn(PHASE_KINDS)
  kind!: PhaseKind;

  @IsOmittable()
  @IsBoolean()
  enabled?: boolean;

  @IsOmittable()
  @IsInt()
  @Min(0)
  maxActions?: number;

  @IsOmittable()
  @IsInt()
  @Min(1)
  maxPerTarget?: number;

  @IsOmittable()
  @ValidateNested()
  @Type(() => DelayWindowDto)
  delay?: DelayWindowDto;

  @IsOmittable()
  @ValidateNested()
  @Type(() => RelevanceOverrideDto)
  relevance?: RelevanceOverrideDto;

  @IsOmittable()
  @IsNumber()
  @Min(0)
  recencyHours?: number;

  @IsOmittable()
  @IsInt()
  @Min(1)
  fetchMultiplier?: number;
}

export class EngagementThresholdOverrideDto extends PhaseOverrideDto {
  @IsOmittable()
  @IsInt()
  @Min(0)
  minLikes?: number;

  @IsOmittable()
  @IsInt()
  @Min(0)
  minReposts?: number;
}

export class CompetitorRepostOverrideDto extends EngagementThresholdOverrideDto {
  @IsOmittable()
  @IsBoolean()
  mediaOnly?: boolean;
}

export class KeywordRetweetOverrideDto extends EngagementThresholdOverrideDto {}

export class KeywordReplyOverrideDto extends PhaseOverrideDto {}

export class HomeReplyOverrideDto extends PhaseOverrideDto {
  @IsOmittable()
  @IsInt()
  @Min(1)
  @Max(60)
  repliesPerHour?: number;

  @IsOmittable()
  @IsInt()
  @Min(1)
  @Max(24)
  maxHours?: number;
}

export class LikeOverrideDto extends PhaseOverrideDto {
  @IsOmittable()
  @IsArray()
  @IsString({ each: true })
  keywords?: string[];
}

export class CommunityOverrideDto extends PhaseOverrideDto {
  @IsOmittable()
  @IsIn(ACTION_KINDS)
  action?: ActionKind;
}

/**
 * `@Type` options for arrays of phase overrides. An unknown `kind` falls
 * back to the base class and fails its `@IsIn` check.
 */
export const PHASE_OVERRIDE_DISCRIMINATOR = {
  discriminator: {
    property: 'kind',
    subTypes: [
      { value: CompetitorRepostOverrideDto, name: 'competitor-repost' },
      { value: KeywordReplyOverrideDto, name: 'keyword-reply' },
      { value: KeywordRetweetOverrideDto, name: 'keyword-retweet' },
      { value: LikeOverrideDto, name: 'like' },
      { value: CommunityOverrideDto, name: 'community' },
      { value: HomeReplyOverrideDto, name: 'home-reply' },
    ],
  },
  keepDiscriminatorProperty: true,
} satisfies TypeOptions;
