import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import harnessConfig from './config/harness.config';
import databaseConfig from './config/database.config';
import scenariosConfig from './config/scenarios.config';
import { ScenarioModule } from './scenario/scenario.module';

/**
 * Root module of the sink stream harness
 * Configuration is loaded once here and injected everywhere else
 */
@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      cache: true,
      load: [harnessConfig, databaseConfig, scenariosConfig],
    }),
    ScenarioModule,
  ],
})
export class AppModule {}
