import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { HarnessError, errorMessage } from '../common/errors';
import { SinkPayloadFormat, type TableSchema } from '../common/types';
import { ConnectorKind, toPropertyMap, type ConnectorSpec } from '../config/connectors';
import type { HarnessConfig } from '../config/harness.config';
import type { ScenarioCatalog } from '../config/scenarios.config';
import { encodeStreamChunk } from '../protocol/binary-encoder';
import { loadBinaryFixture, loadJsonFixture } from '../protocol/fixtures';
import { encodeJsonBatches } from '../protocol/json-encoder';
import type { Session, SinkConfig } from '../protocol/messages';
import { buildSession } from '../protocol/session-builder';
import { parseJdbcUrl } from '../database/jdbc-url';
import { StreamDriverService } from '../stream/stream-driver.service';
import { expectedRowsFromFixture } from '../validation/expected-rows';
import { JdbcStoreService } from '../validation/jdbc-store.service';
import { validateRows } from '../validation/result-validator';

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;

/**
 * Everything one scenario run needs
 * validationFixture names the JSON fixture whose rows the store must hold afterwards
 */
export interface ScenarioRun {
  name: string;
  connector: ConnectorSpec;
  schema: TableSchema;
  fixturePath: string;
  format: SinkPayloadFormat;
  opOverride?: number;
  validationFixture?: string;
}

/**
 * Runs scenarios end to end and turns the outcome into an exit code
 * Any failure stops the run; nothing is retried
 */
@Injectable()
export class ScenarioService {
  private readonly logger = new Logger(ScenarioService.name);

  constructor(
    private readonly configService: ConfigService,
    private readonly streamDriver: StreamDriverService,
    private readonly jdbcStore: JdbcStoreService,
  ) {}

  /**
   * Run scenarios by name in the given order, stopping at the first failure
   */
  async runNamed(names: string[]): Promise<number> {
    if (names.length === 0) {
      this.logger.error(`No scenario selected. Available scenarios: ${this.availableScenarios().join(', ')}`);
      return EXIT_FAILURE;
    }

    for (const name of names) {
      let run: ScenarioRun;
      try {
        run = this.resolve(name);
      } catch (error) {
        this.logger.error(errorMessage(error));
        return EXIT_FAILURE;
      }

      const exitCode = await this.runScenario(run);
      if (exitCode !== EXIT_SUCCESS) {
        return exitCode;
      }
    }
    return EXIT_SUCCESS;
  }

  /**
   * Build the session for one scenario, drive it, and validate the store when asked
   */
  async runScenario(run: ScenarioRun): Promise<number> {
    this.logger.log(`=== ${run.name}: ${run.connector.kind} sink, ${run.format} payload ===`);

    try {
      const session = this.prepareSession(run);
      const result = await this.streamDriver.run(session, this.harnessConfig().endpoint);
      if (!result.ok) {
        throw result.error;
      }

      if (run.validationFixture !== undefined) {
        await this.validateStore(run, run.validationFixture);
      }
    } catch (error) {
      if (error instanceof HarnessError) {
        this.logger.error(`${run.name} failed: ${error.message}`);
      } else {
        this.logger.error(`${run.name} failed unexpectedly: ${errorMessage(error)}`);
      }
      return EXIT_FAILURE;
    }

    this.logger.log(`=== ${run.name}: passed ===`);
    return EXIT_SUCCESS;
  }

  /**
   * Turn a named scenario into a run using the harness input files and data format
   */
  resolve(name: string): ScenarioRun {
    const definition = this.catalog().scenarios.get(name);
    if (!definition) {
      throw new Error(`Unknown scenario '${name}'. Available scenarios: ${this.availableScenarios().join(', ')}`);
    }

    const harness = this.harnessConfig();
    const format = definition.format ?? harness.dataFormat;

    return {
      name: definition.name,
      connector: definition.connector,
      schema: definition.schema,
      fixturePath: format === SinkPayloadFormat.Json ? harness.inputFile : harness.inputBinaryFile,
      format,
      opOverride: definition.opOverride,
      // The store is always checked against the JSON fixture, even after a binary run
      validationFixture: definition.validate ? harness.inputFile : undefined,
    };
  }

  private prepareSession(run: ScenarioRun): Session {
    const sinkConfig: SinkConfig = {
      connectorType: run.connector.kind,
      properties: toPropertyMap(run.connector),
      tableSchema: run.schema,
    };

    if (run.format === SinkPayloadFormat.Json) {
      const fixture = loadJsonFixture(run.fixturePath);
      const batches = encodeJsonBatches(fixture, run.schema, run.opOverride);
      return buildSession(sinkConfig, run.format, { format: SinkPayloadFormat.Json, batches });
    }

    const chunk = encodeStreamChunk(loadBinaryFixture(run.fixturePath));
    return buildSession(sinkConfig, run.format, { format: SinkPayloadFormat.StreamChunk, chunk });
  }

  private async validateStore(run: ScenarioRun, fixturePath: string): Promise<void> {
    if (run.connector.kind !== ConnectorKind.Jdbc) {
      throw new Error(`Store validation is only available for jdbc sinks, not ${run.connector.kind}`);
    }

    const expected = expectedRowsFromFixture(loadJsonFixture(fixturePath), run.schema);
    const { properties } = run.connector;
    const target = parseJdbcUrl(properties['jdbc.url']);
    const actual = await this.jdbcStore.readRows(properties['table.name'], run.schema, target);

    const result = validateRows(expected, actual, run.schema);
    if (!result.ok) {
      throw result.error;
    }
  }

  private availableScenarios(): string[] {
    return Array.from(this.catalog().scenarios.keys());
  }

  private catalog(): ScenarioCatalog {
    const catalog = this.configService.get<ScenarioCatalog>('scenarios');
    if (!catalog) {
      throw new Error('Scenarios configuration not found');
    }
    return catalog;
  }

  private harnessConfig(): HarnessConfig {
    const config = this.configService.get<HarnessConfig>('harness');
    if (!config) {
      throw new Error('Harness configuration not found');
    }
    return config;
  }
}
