import {
  IsArray,
  IsBoolean,
  IsNotEmpty,
  IsOptional,
  IsString,
  Matches,
  ValidateNested,
} from 'class-validator';
import { Type } from 'class-transformer';
import { DelayWindowDto } from './delay-window.dto';
import { PHASE_OVERRIDE_DISCRIMINATOR, PhaseOverrideDto } from './phase-override.dto';

export class AccountDto {
  @IsString()
  @IsNotEmpty()
  id!: string;

  @IsBoolean()
  active: boolean = true;

  /** Prefix of the `<REF>_ACCESS_TOKEN` / `<REF>_ACCESS_SECRET` env vars. */
  @IsString()
  @Matches(/^[A-Z][A-Z0-9_]*$/, {
    message: 'credentialRef must be an upper-case env var prefix',
  })
  credentialRef!: string;

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  proxyRef?: string;

  @IsArray()
  @IsString({ each: true })
  selfHandles: string[] = [];

  @IsArray()
  @IsString({ each: true })
  keywords: string[] = [];

  @IsArray()
  @IsString({ each: true })
  competitorProfiles: string[] = [];

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  communityId?: string;

  @IsOptional()
  @ValidateNested()
  @Type(() => DelayWindowDto)
  delay?: DelayWindowDto;

  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => PhaseOverrideDto, PHASE_OVERRIDE_DISCRIMINATOR)
  phases: PhaseOverrideDto[] = [];
}
