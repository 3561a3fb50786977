/**
 * Column data types understood by the connector service
 * Numeric values match the TypeName enumeration on the wire
 */
export enum DataType {
  Int16 = 1,
  Int32 = 2,
  Int64 = 3,
  Float = 4,
  Double = 5,
  Boolean = 6,
  Varchar = 7,
  Decimal = 8,
  Time = 9,
  Timestamp = 10,
  Interval = 11,
  Date = 12,
  Timestamptz = 13,
}

/**
 * Payload encodings a sink session can use
 * A session commits to exactly one of these in its Start message
 */
export enum SinkPayloadFormat {
  Json = 'JSON',
  StreamChunk = 'STREAM_CHUNK',
}

export interface ColumnDescriptor {
  name: string;
  dataType: DataType;
}

/**
 * Columns of the sink table plus the positions forming its primary key
 */
export interface TableSchema {
  readonly columns: readonly ColumnDescriptor[];
  readonly pkIndices: readonly number[];
}

/**
 * A row as decoded from a fixture line, keyed by column name
 */
export type RowRecord = Record<string, unknown>;

/**
 * A row laid out in schema column order
 */
export type RowTuple = unknown[];

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
