import { validateSync } from 'class-validator';
import { plainToInstance } from 'class-transformer';
import { Logger } from '@nestjs/common';

const logger = new Logger('ConfigValidation');

/**
 * Convert a plain object into a validated config class instance
 * Unknown keys are rejected; throws listing every failed constraint
 */
export function validateConfig<T extends object>(
  config: Record<string, unknown>,
  configKey: string,
  validationClass: new () => T,
): T {
  const validatedConfig = plainToInstance(validationClass, config, {
    enableImplicitConversion: true,
  });
  const errors = validateSync(validatedConfig, {
    skipMissingProperties: false,
    whitelist: true,
    forbidNonWhitelisted: true,
  });

  if (errors.length > 0) {
    const errorMessages = errors
      .map(error => `${error.property}: ${Object.values(error.constraints || {}).join(', ')}`)
      .join('; ');

    logger.error(`Configuration validation failed for ${configKey}`);
    throw new Error(`Invalid configuration for ${configKey}: ${errorMessages}`);
  }

  return validatedConfig;
}
