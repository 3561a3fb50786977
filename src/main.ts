#!/usr/bin/env node
/**
 * sinkcheck entry point - runs sink stream scenarios against a connector service
 * Scenario names come from the command line or SINK_SCENARIOS; exits non-zero on the first failure
 */
import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import { AppModule } from './app.module';
import { getLogLevels } from './common/logging.utils';
import { EXIT_FAILURE, ScenarioService } from './scenario/scenario.service';

export function selectedScenarios(argv: string[], env: NodeJS.ProcessEnv): string[] {
  const fromArgs = argv.filter(arg => !arg.startsWith('-'));
  const source = fromArgs.length > 0 ? fromArgs : (env.SINK_SCENARIOS || '').split(',');
  return source.map(name => name.trim()).filter(name => name.length > 0);
}

async function bootstrap(): Promise<number> {
  const logger = new Logger('sinkcheck');

  process.on('uncaughtException', (error) => {
    logger.error(`Uncaught exception: ${error.message}`);
    process.exit(EXIT_FAILURE);
  });

  process.on('unhandledRejection', (reason) => {
    logger.error(`Unhandled rejection: ${String(reason)}`);
    process.exit(EXIT_FAILURE);
  });

  const app = await NestFactory.createApplicationContext(AppModule, {
    logger: getLogLevels(process.env.LOG_LEVEL),
  });

  try {
    logger.log('=== sinkcheck starting ===');
    return await app.get(ScenarioService).runNamed(selectedScenarios(process.argv.slice(2), process.env));
  } finally {
    await app.close();
  }
}

if (require.main === module) {
  bootstrap()
    .then(exitCode => process.exit(exitCode))
    .catch(error => {
      new Logger('sinkcheck').error('Failed to start sinkcheck');
      console.error(error);
      process.exit(EXIT_FAILURE);
    });
}
