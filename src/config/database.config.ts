import { registerAs } from '@nestjs/config';
import { IsInt, IsNotEmpty, IsString, Max, Min } from 'class-validator';
import { Type } from 'class-transformer';
import { validateConfig } from './config-validation';

/**
 * PostgreSQL connection used to read back what the JDBC sink wrote
 * Validated using class-validator decorators
 */
export class DatabaseConfig {
  @IsString()
  @IsNotEmpty()
  host!: string;

  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(65535)
  port!: number;

  @IsString()
  @IsNotEmpty()
  user!: string;

  @IsString()
  @IsNotEmpty()
  password!: string;

  @IsString()
  @IsNotEmpty()
  database!: string;
}

export default registerAs('database', (): DatabaseConfig => {
  const rawConfig = {
    host: process.env.DATABASE_HOST || 'localhost',
    port: parseInt(process.env.DATABASE_PORT || '5432', 10),
    user: process.env.DATABASE_USER || 'test',
    password: process.env.DATABASE_PASSWORD || 'connector',
    database: process.env.DATABASE_NAME || 'test',
  };

  return validateConfig(rawConfig, 'database', DatabaseConfig);
});
