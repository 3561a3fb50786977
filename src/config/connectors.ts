import { IsIn, IsNotEmpty, IsString, IsUrl, Matches } from 'class-validator';
import { validateConfig } from './config-validation';

/**
 * Connector types the harness knows how to configure
 * Values are the connector_type tags sent in SinkConfig
 */
export enum ConnectorKind {
  File = 'file',
  Jdbc = 'jdbc',
  Elasticsearch = 'elasticsearch',
  Iceberg = 'iceberg',
  DeltaLake = 'deltalake',
}

export class FileSinkProperties {
  @IsString()
  @IsNotEmpty()
  'output.path'!: string;
}

export class JdbcSinkProperties {
  @IsString()
  @Matches(/^jdbc:/, { message: 'jdbc.url must start with jdbc:' })
  'jdbc.url'!: string;

  @IsString()
  @IsNotEmpty()
  'table.name'!: string;
}

export class ElasticsearchSinkProperties {
  @IsUrl({ require_tld: false, require_protocol: true })
  url!: string;

  @IsString()
  @IsNotEmpty()
  index!: string;
}

export class IcebergSinkProperties {
  @IsIn(['append-only', 'upsert'])
  type!: 'append-only' | 'upsert';

  @IsString()
  @IsNotEmpty()
  'warehouse.path'!: string;

  @IsString()
  @IsNotEmpty()
  's3.endpoint'!: string;

  @IsString()
  @IsNotEmpty()
  's3.access.key'!: string;

  @IsString()
  @IsNotEmpty()
  's3.secret.key'!: string;

  @IsString()
  @IsNotEmpty()
  'database.name'!: string;

  @IsString()
  @IsNotEmpty()
  'table.name'!: string;
}

export class DeltaLakeSinkProperties {
  @IsString()
  @IsNotEmpty()
  location!: string;

  @IsString()
  @IsNotEmpty()
  's3.access.key'!: string;

  @IsString()
  @IsNotEmpty()
  's3.secret.key'!: string;

  @IsString()
  @IsNotEmpty()
  's3.endpoint'!: string;
}

/**
 * A connector kind together with its validated settings
 */
export type ConnectorSpec =
  | { kind: ConnectorKind.File; properties: FileSinkProperties }
  | { kind: ConnectorKind.Jdbc; properties: JdbcSinkProperties }
  | { kind: ConnectorKind.Elasticsearch; properties: ElasticsearchSinkProperties }
  | { kind: ConnectorKind.Iceberg; properties: IcebergSinkProperties }
  | { kind: ConnectorKind.DeltaLake; properties: DeltaLakeSinkProperties };

/**
 * Validate raw properties for a connector type
 * Throws for unknown connector types, missing settings and unexpected keys
 */
export function createConnectorSpec(kind: string, properties: Record<string, unknown>): ConnectorSpec {
  const label = `${kind} connector properties`;

  switch (kind) {
    case ConnectorKind.File:
      return { kind: ConnectorKind.File, properties: validateConfig(properties, label, FileSinkProperties) };
    case ConnectorKind.Jdbc:
      return { kind: ConnectorKind.Jdbc, properties: validateConfig(properties, label, JdbcSinkProperties) };
    case ConnectorKind.Elasticsearch:
      return { kind: ConnectorKind.Elasticsearch, properties: validateConfig(properties, label, ElasticsearchSinkProperties) };
    case ConnectorKind.Iceberg:
      return { kind: ConnectorKind.Iceberg, properties: validateConfig(properties, label, IcebergSinkProperties) };
    case ConnectorKind.DeltaLake:
      return { kind: ConnectorKind.DeltaLake, properties: validateConfig(properties, label, DeltaLakeSinkProperties) };
    default:
      throw new Error(`Unknown connector type '${kind}'. Valid types are: ${Object.values(ConnectorKind).join(', ')}`);
  }
}

/**
 * Flatten validated properties into the string map SinkConfig carries
 */
export function toPropertyMap(spec: ConnectorSpec): Record<string, string> {
  const map: Record<string, string> = {};
  for (const [key, value] of Object.entries(spec.properties)) {
    if (typeof value === 'string') {
      map[key] = value;
    }
  }
  return map;
}
