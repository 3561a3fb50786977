import { registerAs } from '@nestjs/config';
import { readFileSync } from 'fs';
import { load } from 'js-yaml';
import { Logger } from '@nestjs/common';
import { SinkPayloadFormat, isRecord, type TableSchema } from '../common/types';
import { getDataType } from '../common/type-map';
import { createTableSchema } from '../protocol/schema';
import { errorMessage, hasErrorCode } from '../common/errors';
import { createConnectorSpec, type ConnectorSpec } from './connectors';

const logger = new Logger('ScenariosConfig');

/**
 * A runnable scenario resolved from the scenarios file
 * format pins the payload encoding; when absent the harness-wide data format applies
 */
export interface ScenarioDefinition {
  name: string;
  connector: ConnectorSpec;
  schema: TableSchema;
  opOverride?: number;
  format?: SinkPayloadFormat;
  validate: boolean;
}

export interface ScenarioCatalog {
  schemas: Map<string, TableSchema>;
  scenarios: Map<string, ScenarioDefinition>;
}

/**
 * Loads named schemas and scenarios from the YAML scenarios file
 * Resolves connector properties and column types at config load time
 */
export default registerAs('scenarios', (): ScenarioCatalog => {
  const scenariosPath = process.env.SCENARIOS_PATH || './scenarios.yaml';

  try {
    logger.log(`Loading scenarios from: ${scenariosPath}`);
    const catalog = parseScenarioCatalog(load(readFileSync(scenariosPath, 'utf-8')));
    logger.log(`Loaded ${catalog.scenarios.size} scenarios: ${Array.from(catalog.scenarios.keys()).join(', ')}`);
    return catalog;
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT')) {
      logger.error(`Scenarios file not found at ${scenariosPath}`);
      throw new Error(`Scenarios file not found: ${scenariosPath}. Please ensure the file exists or set SCENARIOS_PATH environment variable.`);
    }
    logger.error('Failed to load scenarios');
    throw error;
  }
});

/**
 * Turn parsed YAML into schemas and scenarios
 * Fails on the first malformed entry with the entry's name in the message
 */
export function parseScenarioCatalog(data: unknown): ScenarioCatalog {
  if (!isRecord(data) || !isRecord(data.schemas) || !isRecord(data.scenarios)) {
    throw new Error('Invalid scenarios file: must contain "schemas" and "scenarios" sections');
  }

  const schemas = new Map<string, TableSchema>();
  for (const [schemaName, schemaConfig] of Object.entries(data.schemas)) {
    schemas.set(schemaName, parseSchema(schemaName, schemaConfig));
  }

  const scenarios = new Map<string, ScenarioDefinition>();
  for (const [scenarioName, scenarioConfig] of Object.entries(data.scenarios)) {
    scenarios.set(scenarioName, parseScenario(scenarioName, scenarioConfig, schemas));
  }

  if (scenarios.size === 0) {
    throw new Error('No scenarios found in scenarios file. At least one scenario must be defined.');
  }

  return { schemas, scenarios };
}

function parseSchema(name: string, config: unknown): TableSchema {
  if (!isRecord(config) || !isRecord(config.columns) || Object.keys(config.columns).length === 0) {
    throw new Error(`Schema '${name}' must have at least one column defined`);
  }

  const columns = Object.entries(config.columns).map(([columnName, typeName]) => {
    if (typeof typeName !== 'string') {
      throw new Error(`Column '${columnName}' in schema '${name}' must name its type`);
    }
    try {
      return { name: columnName, dataType: getDataType(typeName) };
    } catch (error) {
      throw new Error(`Invalid type '${typeName}' for column '${columnName}' in schema '${name}': ${errorMessage(error)}`);
    }
  });

  const primaryKey = config.primary_key ?? [];
  if (!Array.isArray(primaryKey)) {
    throw new Error(`Schema '${name}' primary_key must be a list of column names`);
  }
  const pkIndices = primaryKey.map((key: unknown) => {
    const index = columns.findIndex(column => column.name === key);
    if (index < 0) {
      throw new Error(`Primary key '${String(key)}' not found in columns for schema '${name}'`);
    }
    return index;
  });

  try {
    return createTableSchema(columns, pkIndices);
  } catch (error) {
    throw new Error(`Schema '${name}': ${errorMessage(error)}`);
  }
}

function parseScenario(name: string, config: unknown, schemas: Map<string, TableSchema>): ScenarioDefinition {
  if (!isRecord(config)) {
    throw new Error(`Scenario '${name}' must be a mapping`);
  }

  const { connector, schema: schemaName, properties, op_override: opOverride, format, validate } = config;

  if (typeof connector !== 'string') {
    throw new Error(`Scenario '${name}' missing required 'connector' field`);
  }
  if (typeof schemaName !== 'string') {
    throw new Error(`Scenario '${name}' missing required 'schema' field`);
  }
  const schema = schemas.get(schemaName);
  if (!schema) {
    throw new Error(`Scenario '${name}' references unknown schema '${schemaName}'`);
  }
  if (!isRecord(properties)) {
    throw new Error(`Scenario '${name}' missing required 'properties' mapping`);
  }

  let override: number | undefined;
  if (opOverride !== undefined) {
    if (typeof opOverride !== 'number' || !Number.isInteger(opOverride)) {
      throw new Error(`Scenario '${name}' op_override must be an integer`);
    }
    override = opOverride;
  }

  let validateStore = false;
  if (validate !== undefined) {
    if (typeof validate !== 'boolean') {
      throw new Error(`Scenario '${name}' validate must be true or false`);
    }
    validateStore = validate;
  }

  let connectorSpec: ConnectorSpec;
  try {
    connectorSpec = createConnectorSpec(connector, properties);
  } catch (error) {
    throw new Error(`Scenario '${name}': ${errorMessage(error)}`);
  }

  return {
    name,
    connector: connectorSpec,
    schema,
    opOverride: override,
    format: format === undefined ? undefined : parseFormat(name, format),
    validate: validateStore,
  };
}

function parseFormat(scenario: string, format: unknown): SinkPayloadFormat {
  const normalized = typeof format === 'string' ? format.toUpperCase() : format;
  const match = Object.values(SinkPayloadFormat).find(value => value === normalized);
  if (!match) {
    throw new Error(`Scenario '${scenario}' format must be one of: json, stream_chunk`);
  }
  return match;
}
