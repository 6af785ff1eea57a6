import {
  ArrayUnique,
  IsArray,
  IsBoolean,
  IsIn,
  IsInt,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsPositive,
  IsString,
  Max,
  Min,
  ValidateNested,
} from 'class-validator';
import { Type } from 'class-transformer';
import { PHASE_KINDS, PhaseKind, StorageDriver } from '@/engagement/engagement.types';
import { DelayWindowDto } from './delay-window.dto';
import { PHASE_OVERRIDE_DISCRIMINATOR, PhaseOverrideDto } from './phase-override.dto';
import { DEFAULT_OFF_TOPIC_TERMS } from '../phase-defaults';

export class StorageSettingsDto {
  @IsIn(['redis', 'memory'])
  driver: StorageDriver = 'redis';

  @IsString()
  @IsNotEmpty()
  keyPrefix: string = 'engagement';

  @IsOptional()
  @IsPositive()
  dedupTtlDays?: number;
}

export class ScoringSettingsDto {
  @IsString()
  @IsNotEmpty()
  model: string = 'gemini-2.5-flash';

  @IsOptional()
  @IsInt()
  @IsPositive()
  timeoutMs?: number = 20_000;
}

export class ReplySettingsDto {
  @IsString()
  @IsNotEmpty()
  model: string = 'gemini-2.5-flash';

  @IsInt()
  @Min(1)
  @Max(5)
  retryLimit: number = 2;

  @IsArray()
  @IsString({ each: true })
  offTopicTerms: string[] = [...DEFAULT_OFF_TOPIC_TERMS];
}

export class ScheduleSettingsDto {
  @IsBoolean()
  enabled: boolean = true;
}

export class EngineSettingsDto {
  @IsInt()
  @Min(1)
  @Max(10)
  maxConcurrentAccounts: number = 2;

  @IsOptional()
  @IsPositive()
  runDeadlineMinutes?: number;

  @IsOptional()
  @IsPositive()
  accountTimeoutMinutes?: number;

  @IsNumber()
  @Min(0)
  accountStartDelaySeconds: number = 0;

  @IsNumber()
  @Min(0)
  rateLimitBackoffSeconds: number = 300;

  @IsArray()
  @ArrayUnique()
  @IsIn(PHASE_KINDS, { each: true })
  phaseOrder: PhaseKind[] = [...PHASE_KINDS];

  @ValidateNested()
  @Type(() => DelayWindowDto)
  delay: DelayWindowDto = DelayWindowDto.of(60, 180);

  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => PhaseOverrideDto, PHASE_OVERRIDE_DISCRIMINATOR)
  phases: PhaseOverrideDto[] = [];

  @ValidateNested()
  @Type(() => StorageSettingsDto)
  storage: StorageSettingsDto = new StorageSettingsDto();

  @ValidateNested()
  @Type(() => ScoringSettingsDto)
  scoring: ScoringSettingsDto = new ScoringSettingsDto();

  @ValidateNested()
  @Type(() => ReplySettingsDto)
  replies: ReplySettingsDto = new ReplySettingsDto();

  @ValidateNested()
  @Type(() => ScheduleSettingsDto)
  schedule: ScheduleSettingsDto = new ScheduleSettingsDto();
}
