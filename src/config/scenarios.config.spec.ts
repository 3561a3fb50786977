import { join } from 'path';
import { DataType, SinkPayloadFormat } from '../common/types';
import { ConnectorKind } from './connectors';
import scenariosConfig, { parseScenarioCatalog } from './scenarios.config';

describe('parseScenarioCatalog', () => {
  const schemas = {
    mock: { primary_key: ['id'], columns: { id: 'INT32', name: 'VARCHAR' } },
  };
  const fileSink = { connector: 'file', schema: 'mock', properties: { 'output.path': '/tmp/connector' } };

  it('should resolve schemas and scenarios', () => {
    const catalog = parseScenarioCatalog({
      schemas,
      scenarios: { file_sink: { ...fileSink, op_override: 1, format: 'json' } },
    });

    expect(catalog.schemas.get('mock')).toEqual({
      columns: [
        { name: 'id', dataType: DataType.Int32 },
        { name: 'name', dataType: DataType.Varchar },
      ],
      pkIndices: [0],
    });
    expect(catalog.scenarios.get('file_sink')).toEqual({
      name: 'file_sink',
      connector: { kind: ConnectorKind.File, properties: expect.objectContaining({ 'output.path': '/tmp/connector' }) },
      schema: catalog.schemas.get('mock'),
      opOverride: 1,
      format: SinkPayloadFormat.Json,
      validate: false,
    });
  });

  it('should leave format and op override unset when absent', () => {
    const scenario = parseScenarioCatalog({ schemas, scenarios: { file_sink: fileSink } }).scenarios.get('file_sink');

    expect(scenario?.format).toBeUndefined();
    expect(scenario?.opOverride).toBeUndefined();
  });

  it('should reject a file without both sections', () => {
    expect(() => parseScenarioCatalog({ schemas })).toThrow(
      'Invalid scenarios file: must contain "schemas" and "scenarios" sections',
    );
  });

  it('should reject an empty scenarios section', () => {
    expect(() => parseScenarioCatalog({ schemas, scenarios: {} })).toThrow(
      'No scenarios found in scenarios file. At least one scenario must be defined.',
    );
  });

  it('should reject unknown column types', () => {
    expect(() =>
      parseScenarioCatalog({ schemas: { mock: { columns: { id: 'UUID' } } }, scenarios: { file_sink: fileSink } }),
    ).toThrow("Invalid type 'UUID' for column 'id' in schema 'mock'");
  });

  it('should reject primary keys that name no column', () => {
    expect(() =>
      parseScenarioCatalog({
        schemas: { mock: { primary_key: ['key'], columns: { id: 'INT32' } } },
        scenarios: { file_sink: fileSink },
      }),
    ).toThrow("Primary key 'key' not found in columns for schema 'mock'");
  });

  it('should reject scenarios that reference unknown schemas', () => {
    expect(() => parseScenarioCatalog({ schemas, scenarios: { file_sink: { ...fileSink, schema: 'other' } } })).toThrow(
      "Scenario 'file_sink' references unknown schema 'other'",
    );
  });

  it('should reject a non-integer op override', () => {
    expect(() => parseScenarioCatalog({ schemas, scenarios: { file_sink: { ...fileSink, op_override: 1.5 } } })).toThrow(
      "Scenario 'file_sink' op_override must be an integer",
    );
  });

  it('should reject unknown formats', () => {
    expect(() => parseScenarioCatalog({ schemas, scenarios: { file_sink: { ...fileSink, format: 'avro' } } })).toThrow(
      "Scenario 'file_sink' format must be one of: json, stream_chunk",
    );
  });

  it('should name the scenario when connector properties are invalid', () => {
    expect(() => parseScenarioCatalog({ schemas, scenarios: { file_sink: { ...fileSink, properties: {} } } })).toThrow(
      /^Scenario 'file_sink': Invalid configuration for file connector properties/,
    );
  });
});

describe('scenariosConfig', () => {
  const originalPath = process.env.SCENARIOS_PATH;

  afterEach(() => {
    if (originalPath === undefined) {
      delete process.env.SCENARIOS_PATH;
    } else {
      process.env.SCENARIOS_PATH = originalPath;
    }
  });

  it('should load the bundled scenarios file', () => {
    process.env.SCENARIOS_PATH = join(__dirname, '../../scenarios.yaml');

    const catalog = scenariosConfig();

    expect(Array.from(catalog.scenarios.keys())).toEqual([
      'file_sink',
      'jdbc_sink',
      'elasticsearch_sink',
      'iceberg_sink',
      'upsert_iceberg_sink',
      'deltalake_sink',
      'stream_chunk_format_test',
    ]);
    expect(catalog.scenarios.get('jdbc_sink')?.validate).toBe(true);
    expect(catalog.scenarios.get('stream_chunk_format_test')?.format).toBe(SinkPayloadFormat.StreamChunk);
    expect(catalog.schemas.get('stream_chunk')?.columns).toHaveLength(7);
  });

  it('should report a missing scenarios file', () => {
    process.env.SCENARIOS_PATH = join(__dirname, 'missing.yaml');

    expect(() => scenariosConfig()).toThrow(`Scenarios file not found: ${join(__dirname, 'missing.yaml')}`);
  });
});
