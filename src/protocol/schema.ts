import type { ColumnDescriptor, TableSchema } from '../common/types';

/**
 * Build a TableSchema, checking column names and primary key positions
 * Throws on duplicate or empty column names and on out-of-range or repeated pk indices
 */
export function createTableSchema(columns: ColumnDescriptor[], pkIndices: number[]): TableSchema {
  if (columns.length === 0) {
    throw new Error('Table schema must have at least one column');
  }

  const names = new Set<string>();
  for (const column of columns) {
    if (!column.name) {
      throw new Error('Table schema column names must not be empty');
    }
    if (names.has(column.name)) {
      throw new Error(`Duplicate column '${column.name}' in table schema`);
    }
    names.add(column.name);
  }

  const seen = new Set<number>();
  for (const index of pkIndices) {
    if (!Number.isInteger(index) || index < 0 || index >= columns.length) {
      throw new Error(`Primary key index ${index} is out of bounds for ${columns.length} columns`);
    }
    if (seen.has(index)) {
      throw new Error(`Primary key index ${index} is repeated`);
    }
    seen.add(index);
  }

  return {
    columns: columns.map(column => ({ ...column })),
    pkIndices: [...pkIndices],
  };
}

export function columnNames(schema: TableSchema): string[] {
  return schema.columns.map(column => column.name);
}

export function primaryKeyColumns(schema: TableSchema): string[] {
  return schema.pkIndices.map(index => schema.columns[index].name);
}
