import { plainToInstance, Type } from 'class-transformer';
import {
  IsBooleanString,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  Matches,
  Max,
  Min,
  validateSync,
  ValidationError,
} from 'class-validator';

/**
 * Environment variables read at startup. Everything but the signing secret
 * has a default.
 */
export class EnvironmentVariables {
  @IsNotEmpty({ message: 'JWT_SECRET must be configured' })
  @IsString()
  JWT_SECRET!: string;

  @IsOptional()
  @IsString()
  JWT_ISSUER?: string;

  @IsOptional()
  @IsString()
  JWT_AUDIENCE?: string;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  JWT_EXPIRY_MINUTES?: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  JWT_REFRESH_EXPIRY_DAYS?: number;

  @IsOptional()
  @Matches(/^[A-Za-z0-9-]+$/, {
    message: 'CLIENT_ID_HEADER must be a valid header name',
  })
  CLIENT_ID_HEADER?: string;

  @IsOptional()
  @IsString()
  EXEMPT_PATH_PREFIXES?: string;

  @IsOptional()
  @IsBooleanString()
  IP_RATE_LIMIT_ENABLED?: string;

  @IsOptional()
  @IsString()
  IP_RATE_LIMIT_RULES?: string;

  @IsOptional()
  @IsString()
  IP_RATE_LIMIT_WHITELIST?: string;

  @IsOptional()
  @IsBooleanString()
  CLIENT_RATE_LIMIT_ENABLED?: string;

  @IsOptional()
  @IsString()
  CLIENT_RATE_LIMIT_RULES?: string;

  @IsOptional()
  @IsString()
  CLIENT_RATE_LIMIT_WHITELIST?: string;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(0)
  RATE_LIMIT_SWEEP_INTERVAL_SECONDS?: number;

  @IsOptional()
  @IsString()
  IDENTITY_SEED_FILE?: string;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(65535)
  PORT?: number;
}

export interface EnvironmentValidationResult {
  value: EnvironmentVariables;
  violations: string[];
}

/**
 * Validates the raw environment. Blank values count as unset.
 */
export function validateEnvironment(
  env: Record<string, string | undefined>,
): EnvironmentValidationResult {
  const present: Record<string, string> = {};
  for (const [name, raw] of Object.entries(env)) {
    if (raw !== undefined && raw.trim() !== '') {
      present[name] = raw.trim();
    }
  }

  const value = plainToInstance(EnvironmentVariables, present);
  const errors = validateSync(value, { skipMissingProperties: false });

  return { value, violations: flattenErrors(errors) };
}

function flattenErrors(errors: ValidationError[]): string[] {
  return errors.flatMap((error) => Object.values(error.constraints ?? {}));
}
