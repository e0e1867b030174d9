import { plainToInstance } from 'class-transformer';
import { IsInt, IsNotEmpty, IsOptional, IsString, IsUrl, Min, validateSync } from 'class-validator';

/**
 * Environment variables checked at boot. Only GEMINI_API_KEY is required;
 * the rest fall back to the defaults in the config namespaces.
 */
export class EnvironmentVariables {
  @IsString()
  @IsNotEmpty()
  GEMINI_API_KEY!: string;

  @IsOptional()
  @IsUrl({ require_tld: false })
  GEMINI_API_BASE_URL?: string;

  @IsOptional()
  @IsInt()
  @Min(1)
  GEMINI_REQUEST_TIMEOUT_MS?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  GEMINI_UPLOAD_TIMEOUT_MS?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  GEMINI_POLL_MAX_ATTEMPTS?: number;

  @IsOptional()
  @IsInt()
  @Min(0)
  GEMINI_POLL_INTERVAL_MS?: number;

  @IsOptional()
  @IsInt()
  @Min(0)
  GEMINI_RETRY_MAX?: number;

  @IsOptional()
  @IsInt()
  @Min(0)
  GEMINI_RETRY_BACKOFF_MS?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  VIDEO_UPLOAD_MAX_BYTES?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  PORT?: number;
}

export function validateEnvironment(
  config: Record<string, unknown>,
): EnvironmentVariables {
  const validated = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: true,
  });
  const errors = validateSync(validated, { skipMissingProperties: false });

  if (errors.length > 0) {
    const details = errors
      .map((error) => Object.values(error.constraints ?? {}).join(', '))
      .join('; ');
    throw new Error(`Invalid environment configuration: ${details}`);
  }

  return validated;
}
