import { readFileSync, existsSync } from 'fs';
import * as path from 'path';
import { registerAs } from '@nestjs/config';
import { ClassConstructor, plainToInstance } from 'class-transformer';
import { ValidationError, validateSync } from 'class-validator';
import { ConfigError } from '@/common/errors/engagement.errors';
import {
  Account,
  ActionKind,
  DelayWindow,
  EngagementConfig,
  EngineSettings,
  PhaseConfig,
  PhaseKind,
} from '@/engagement/engagement.types';
import { AccountDto } from './dto/account.dto';
import { DelayWindowDto } from './dto/delay-window.dto';
import {
  CommunityOverrideDto,
  CompetitorRepostOverrideDto,
  EngagementThresholdOverrideDto,
  HomeReplyOverrideDto,
  LikeOverrideDto,
  PhaseOverrideDto,
} from './dto/phase-override.dto';
import { EngineSettingsDto } from './dto/settings.dto';
import { DEFAULT_DELAY, HOME_REPLY_DEFAULTS, PHASE_DEFAULTS, halveDelay } from './phase-defaults';

export const DEFAULT_SETTINGS_PATH = 'config/settings.json';
export const DEFAULT_ACCOUNTS_PATH = 'config/accounts.json';

export const engagementConfig = registerAs('engagement', (): EngagementConfig =>
  loadEngagementConfig(),
);

export function loadEngagementConfig(
  env: NodeJS.ProcessEnv = process.env,
): EngagementConfig {
  const settingsPath = env.ENGAGEMENT_SETTINGS_PATH || DEFAULT_SETTINGS_PATH;
  const accountsPath = env.ENGAGEMENT_ACCOUNTS_PATH || DEFAULT_ACCOUNTS_PATH;

  const rawSettings = existsSync(path.resolve(settingsPath))
    ? readJson(settingsPath)
    : {};
  if (!existsSync(path.resolve(accountsPath))) {
    throw new ConfigError([`accounts file not found at ${accountsPath}`]);
  }

  return parseEngagementConfig(rawSettings, readJson(accountsPath));
}

function readJson(file: string): unknown {
  try {
    const parsed: unknown = JSON.parse(readFileSync(path.resolve(file), 'utf8'));
    return parsed;
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError([`${file}: ${reason}`]);
  }
}

// ===========================================================================
// PARSING
// ===========================================================================

/**
 * Validates raw settings and accounts JSON and resolves every account's
 * phases. Collects all problems before throwing a single ConfigError.
 */
export function parseEngagementConfig(
  rawSettings: unknown,
  rawAccounts: unknown,
): EngagementConfig {
  const problems: string[] = [];

  const settingsDto =
    transform(EngineSettingsDto, rawSettings, 'settings', problems) ??
    new EngineSettingsDto();

  checkWindow(settingsDto.delay, 'settings.delay', problems);
  checkOverrides(settingsDto.phases, 'settings.phases', problems);

  const accountDtos: AccountDto[] = [];
  if (!Array.isArray(rawAccounts)) {
    problems.push('accounts: must be an array');
  } else {
    const seen = new Set<string>();
    rawAccounts.forEach((raw: unknown, index) => {
      const where = `accounts[${index}]`;
      const dto = transform(AccountDto, raw, where, problems);
      if (!dto) return;

      if (seen.has(dto.id)) {
        problems.push(`${where}.id: duplicate account id "${dto.id}"`);
      }
      seen.add(dto.id);

      if (dto.delay) checkWindow(dto.delay, `${where}.delay`, problems);
      checkOverrides(dto.phases, `${where}.phases`, problems);
      accountDtos.push(dto);
    });
  }

  if (problems.length > 0) {
    throw new ConfigError(problems);
  }

  const settings = toSettings(settingsDto);
  const accounts = accountDtos.map((dto) => toAccount(dto, settingsDto));

  for (const account of accounts) {
    const community = account.phases.find((p) => p.kind === 'community');
    if (community?.enabled && !account.communityId) {
      problems.push(
        `accounts.${account.id}: community phase enabled without communityId`,
      );
    }
  }
  if (problems.length > 0) {
    throw new ConfigError(problems);
  }

  return { settings, accounts };
}

function transform<T extends object>(
  cls: ClassConstructor<T>,
  raw: unknown,
  where: string,
  problems: string[],
): T | undefined {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    problems.push(`${where}: must be an object`);
    return undefined;
  }

  const instance = plainToInstance(cls, raw);
  const errors = validateSync(instance, {
    whitelist: true,
    forbidNonWhitelisted: true,
  });
  if (errors.length > 0) {
    flattenErrors(errors, where, problems);
    return undefined;
  }
  return instance;
}

function flattenErrors(
  errors: ValidationError[],
  parent: string,
  out: string[],
): void {
  for (const error of errors) {
    const where = `${parent}.${error.property}`;
    for (const message of Object.values(error.constraints ?? {})) {
      out.push(`${where}: ${message}`);
    }
    if (error.children?.length) {
      flattenErrors(error.children, where, out);
    }
  }
}

function checkWindow(window: DelayWindowDto, where: string, problems: string[]) {
  if (window.minSeconds > window.maxSeconds) {
    problems.push(`${where}: minSeconds must not exceed maxSeconds`);
  }
}

function checkOverrides(
  overrides: readonly PhaseOverrideDto[],
  where: string,
  problems: string[],
) {
  const kinds = new Set<PhaseKind>();
  overrides.forEach((override, index) => {
    if (kinds.has(override.kind)) {
      problems.push(`${where}[${index}].kind: duplicate phase "${override.kind}"`);
    }
    kinds.add(override.kind);
    if (override.delay) {
      checkWindow(override.delay, `${where}[${index}].delay`, problems);
    }
  });
}

// ===========================================================================
// RESOLUTION
// ===========================================================================

function toSettings(dto: EngineSettingsDto): EngineSettings {
  return {
    maxConcurrentAccounts: dto.maxConcurrentAccounts,
    runDeadlineMinutes: dto.runDeadlineMinutes,
    accountTimeoutMinutes: dto.accountTimeoutMinutes,
    accountStartDelaySeconds: dto.accountStartDelaySeconds,
    rateLimitBackoffSeconds: dto.rateLimitBackoffSeconds,
    phaseOrder: [...dto.phaseOrder],
    delay: toWindow(dto.delay) ?? DEFAULT_DELAY,
    storage: {
      driver: dto.storage.driver,
      keyPrefix: dto.storage.keyPrefix,
      dedupTtlDays: dto.storage.dedupTtlDays,
    },
    scoring: { model: dto.scoring.model, timeoutMs: dto.scoring.timeoutMs },
    replies: {
      model: dto.replies.model,
      retryLimit: dto.replies.retryLimit,
      offTopicTerms: dto.replies.offTopicTerms.map((t) => t.toLowerCase()),
    },
    schedule: { enabled: dto.schedule.enabled },
  };
}

function toAccount(dto: AccountDto, settings: EngineSettingsDto): Account {
  const baseDelay = toWindow(dto.delay) ?? toWindow(settings.delay) ?? DEFAULT_DELAY;

  const phases = settings.phaseOrder.map((kind) =>
    resolvePhase(
      kind,
      [
        settings.phases.find((p) => p.kind === kind),
        dto.phases.find((p) => p.kind === kind),
      ],
      baseDelay,
    ),
  );

  return {
    id: dto.id,
    active: dto.active,
    credentialRef: dto.credentialRef,
    proxyRef: dto.proxyRef,
    selfHandles: normaliseList(dto.selfHandles, normaliseHandle),
    keywords: normaliseList(dto.keywords, (k) => k.trim()),
    competitorProfiles: normaliseList(dto.competitorProfiles, normaliseHandle),
    communityId: dto.communityId,
    phases,
  };
}

/**
 * Merges built-in defaults with the settings.json layer and the account
 * layer, later layers winning field by field.
 */
export function resolvePhase(
  kind: PhaseKind,
  layers: ReadonlyArray<PhaseOverrideDto | undefined>,
  baseDelay: DelayWindow,
): PhaseConfig {
  const defaults = PHASE_DEFAULTS[kind];
  const present = layers.filter((l): l is PhaseOverrideDto => l !== undefined);
  const pick = <T>(read: (l: PhaseOverrideDto) => T | undefined, fallback: T): T =>
    present.reduce<T>((acc, layer) => read(layer) ?? acc, fallback);

  const common = {
    enabled: pick<boolean>((l) => l.enabled, false),
    maxActions: pick<number>((l) => l.maxActions, defaults.maxActions),
    maxPerTarget: pick<number | undefined>((l) => l.maxPerTarget, defaults.maxPerTarget),
    delay: pick<DelayWindow>(
      (l) => toWindow(l.delay),
      kind === 'like' ? halveDelay(baseDelay) : baseDelay,
    ),
    relevance: {
      enabled: pick<boolean>((l) => l.relevance?.enabled, defaults.relevance.enabled),
      threshold: pick<number>((l) => l.relevance?.threshold, defaults.relevance.threshold),
    },
    recencyHours: pick<number | undefined>((l) => l.recencyHours, defaults.recencyHours),
    fetchMultiplier: pick<number>((l) => l.fetchMultiplier, defaults.fetchMultiplier),
  };

  const thresholds = {
    minLikes: pick<number>(
      (l) => (l instanceof EngagementThresholdOverrideDto ? l.minLikes : undefined),
      0,
    ),
    minReposts: pick<number>(
      (l) => (l instanceof EngagementThresholdOverrideDto ? l.minReposts : undefined),
      0,
    ),
  };

  switch (kind) {
    case 'competitor-repost':
      return {
        ...common,
        ...thresholds,
        kind,
        mediaOnly: pick<boolean>(
          (l) => (l instanceof CompetitorRepostOverrideDto ? l.mediaOnly : undefined),
          false,
        ),
      };
    case 'keyword-retweet':
      return { ...common, ...thresholds, kind };
    case 'keyword-reply':
      return { ...common, kind };
    case 'home-reply': {
      const repliesPerHour = pick<number>(
        (l) => (l instanceof HomeReplyOverrideDto ? l.repliesPerHour : undefined),
        HOME_REPLY_DEFAULTS.repliesPerHour,
      );
      const maxHours = pick<number>(
        (l) => (l instanceof HomeReplyOverrideDto ? l.maxHours : undefined),
        HOME_REPLY_DEFAULTS.maxHours,
      );
      // a session never holds more replies than its hours allow
      const maxActions = Math.min(common.maxActions, repliesPerHour * maxHours);
      return { ...common, maxActions, kind, repliesPerHour, maxHours };
    }
    case 'like':
      return {
        ...common,
        kind,
        keywords: pick<readonly string[]>(
          (l) => (l instanceof LikeOverrideDto ? l.keywords : undefined),
          [],
        ),
      };
    case 'community':
      return {
        ...common,
        kind,
        action: pick<ActionKind>(
          (l) => (l instanceof CommunityOverrideDto ? l.action : undefined),
          'like',
        ),
      };
  }
}

function toWindow(dto: DelayWindowDto | undefined): DelayWindow | undefined {
  return dto ? { minSeconds: dto.minSeconds, maxSeconds: dto.maxSeconds } : undefined;
}

function normaliseHandle(handle: string): string {
  return handle.trim().replace(/^@/, '').toLowerCase();
}

function normaliseList(
  values: readonly string[],
  normalise: (value: string) => string,
): string[] {
  return [...new Set(values.map(normalise).filter((v) => v.length > 0))];
}
