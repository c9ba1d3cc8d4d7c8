import { plainToInstance, Type } from 'class-transformer';
import { IsString, IsNumber, IsOptional, IsIn, validateSync, Min, Max } from 'class-validator';

export class EnvironmentVariables {
  @IsOptional()
  @IsIn(['fallback', 'reject'])
  GPX_UNKNOWN_VERSION?: string;

  @IsOptional()
  @IsIn(['1.0', '1.1'])
  GPX_FALLBACK_VERSION?: string;

  @IsOptional()
  @IsString()
  GPX_CREATOR?: string;

  @IsOptional()
  @Type(() => Number)
  @IsNumber()
  @Min(0)
  @Max(8)
  GPX_INDENT?: number;

  @IsOptional()
  @Type(() => Number)
  @IsNumber()
  @Min(1)
  @Max(65535)
  PORT?: number;

  @IsOptional()
  @IsString()
  NODE_ENV?: string;
}

export function validate(config: Record<string, unknown>) {
  const validatedConfig = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: true,
  });
  const errors = validateSync(validatedConfig, { skipMissingProperties: false });

  if (errors.length > 0) {
    throw new Error(errors.toString());
  }
  return validatedConfig;
}
