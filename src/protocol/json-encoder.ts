import { FixtureError, errorMessage } from '../common/errors';
import { fitsDataType, getDataTypeName } from '../common/type-map';
import { DataType, isRecord, type RowRecord, type TableSchema } from '../common/types';
import type { FixtureRow, JsonFixture } from './fixtures';
import type { RowOp } from './messages';

/**
 * Encode every batch of a JSON fixture into row operations
 * opOverride, when given, replaces each row's own op_type
 */
export function encodeJsonBatches(fixture: JsonFixture, schema: TableSchema, opOverride?: number): RowOp[][] {
  if (opOverride !== undefined && !Number.isInteger(opOverride)) {
    throw new Error(`Op override must be an integer, got ${opOverride}`);
  }

  return fixture.batches.map((batch, batchIndex) =>
    batch.map((row, rowIndex) => {
      const record = decodeRow(row, schema, fixture.path, `batch ${batchIndex}, row ${rowIndex}`);
      return {
        opType: opOverride ?? row.opType,
        line: JSON.stringify(record),
      };
    }),
  );
}

/**
 * Decode a fixture row's line into a record checked against the schema
 * Missing or extra columns and values that cannot fill their column fail immediately
 * The returned record lists columns in schema order
 */
export function decodeRow(row: FixtureRow, schema: TableSchema, path: string, location: string): RowRecord {
  const value = typeof row.line === 'string' ? parseLine(row.line, path, location) : row.line;

  const expected = new Set(schema.columns.map(column => column.name));
  const extra = Object.keys(value).filter(key => !expected.has(key));
  if (extra.length > 0) {
    throw new FixtureError(path, `${location} has columns not in the table schema: ${extra.join(', ')}`);
  }

  const record: RowRecord = {};
  for (const column of schema.columns) {
    if (!(column.name in value)) {
      throw new FixtureError(path, `${location} is missing column '${column.name}'`);
    }
    const cell = value[column.name];
    if (column.dataType === DataType.Int64 && typeof cell === 'number' && !Number.isSafeInteger(cell)) {
      throw new FixtureError(
        path,
        `${location} column '${column.name}' holds an Int64 number beyond the safe integer range; quote it as a string`,
      );
    }
    if (!fitsDataType(cell, column.dataType)) {
      throw new FixtureError(
        path,
        `${location} column '${column.name}' expects ${getDataTypeName(column.dataType)}, got ${JSON.stringify(cell)}`,
      );
    }
    record[column.name] = cell;
  }
  return record;
}

function parseLine(line: string, path: string, location: string): RowRecord {
  let value: unknown;
  try {
    value = JSON.parse(line);
  } catch (error) {
    throw new FixtureError(path, `${location} has a line that is not JSON: ${errorMessage(error)}`, { cause: error });
  }
  if (!isRecord(value)) {
    throw new FixtureError(path, `${location} has a line that is not a JSON object`);
  }
  return value;
}
