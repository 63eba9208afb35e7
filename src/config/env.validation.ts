import { plainToInstance, Transform } from 'class-transformer';
import {
  IsBoolean,
  IsInt,
  IsOptional,
  IsString,
  IsUrl,
  Matches,
  Max,
  Min,
  MinLength,
  validateSync,
} from 'class-validator';

const toBoolean = ({ value }: { value: unknown }): unknown => {
  if (typeof value !== 'string') return value;
  const v = value.trim().toLowerCase();
  if (['true', '1', 'yes'].includes(v)) return true;
  if (['false', '0', 'no', ''].includes(v)) return false;
  return value;
};

const toInt = ({ value }: { value: unknown }): unknown => {
  if (typeof value !== 'string' || value.trim() === '') return value;
  const n = Number(value);
  return Number.isFinite(n) ? n : value;
};

const emptyToUndefined = ({ value }: { value: unknown }): unknown =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

export class EnvironmentVariables {
  @IsString()
  @MinLength(1, { message: 'BOT_TOKEN must be set' })
  BOT_TOKEN!: string;

  // Numeric chat id (-100…) or a public @username
  @Matches(/^(-?\d+|@[A-Za-z0-9_]{4,})$/, {
    message: 'PRIVATE_CHANNEL_ID must be a numeric chat id or an @username',
  })
  PRIVATE_CHANNEL_ID!: string;

  @Matches(/^(https?:\/\/\S+|@[A-Za-z0-9_]{4,})$/, {
    message: 'PUBLIC_CHANNEL must be a t.me URL or an @username',
  })
  PUBLIC_CHANNEL!: string;

  @IsUrl(
    { protocols: ['https'], require_protocol: true, require_tld: false },
    { message: 'WEBHOOK_URL must be an https URL' },
  )
  WEBHOOK_URL!: string;

  @IsOptional()
  @Transform(emptyToUndefined)
  @Matches(/^[A-Za-z0-9_-]{1,256}$/, {
    message: 'WEBHOOK_SECRET may only contain A-Z, a-z, 0-9, _ and -',
  })
  WEBHOOK_SECRET?: string;

  @Transform(toInt)
  @IsInt()
  @Min(1)
  @Max(65535)
  PORT: number = 8000;

  @Transform(toBoolean)
  @IsBoolean()
  REGISTER_WEBHOOK: boolean = true;

  @Transform(toBoolean)
  @IsBoolean()
  DROP_PENDING_UPDATES: boolean = true;

  @IsUrl({ require_tld: false, require_protocol: true })
  TELEGRAM_API_URL: string = 'https://api.telegram.org';

  @Transform(toInt)
  @IsInt()
  @Min(1000)
  TELEGRAM_TIMEOUT_MS: number = 15_000;

  @Transform(toInt)
  @IsInt()
  @Min(1)
  @Max(10)
  TELEGRAM_MAX_ATTEMPTS: number = 3;

  @Transform(toInt)
  @IsInt()
  @Min(0)
  TELEGRAM_RETRY_BASE_MS: number = 500;

  @IsOptional()
  @Transform(emptyToUndefined)
  @IsString()
  REDIS_URL?: string;

  @Transform(toBoolean)
  @IsBoolean()
  MULTI_INSTANCE: boolean = false;

  @IsOptional()
  @Transform(emptyToUndefined)
  @IsUrl({ require_tld: false, require_protocol: true })
  KEEP_ALIVE_URL?: string;

  @Transform(toInt)
  @IsInt()
  @Min(10_000)
  KEEP_ALIVE_INTERVAL_MS: number = 240_000;

  @Transform(toInt)
  @IsInt()
  @Min(10_000)
  HEALTH_CHECK_INTERVAL_MS: number = 300_000;
}

/**
 * Validates the raw environment for ConfigModule.
 * Throws a single error listing every invalid variable.
 */
export function validateEnv(raw: Record<string, unknown>): EnvironmentVariables {
  const env = plainToInstance(EnvironmentVariables, raw);
  const errors = validateSync(env, { skipMissingProperties: false });

  if (errors.length > 0) {
    const details = errors
      .map((e) => Object.values(e.constraints ?? {}).join(', '))
      .join('; ');
    throw new Error(`Invalid environment: ${details}`);
  }

  return env;
}

/**
 * Button URLs need a full link; an @username becomes its t.me URL.
 */
export function publicChannelUrl(value: string): string {
  return value.startsWith('@') ? `https://t.me/${value.slice(1)}` : value;
}
