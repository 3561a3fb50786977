import { DataType } from './types';

/**
 * Wire type name to internal DataType
 * Pure data structure - no behavior
 */
export const TYPE_MAP: Record<string, DataType> = {
  INT16: DataType.Int16,
  INT32: DataType.Int32,
  INT64: DataType.Int64,
  FLOAT: DataType.Float,
  DOUBLE: DataType.Double,
  BOOLEAN: DataType.Boolean,
  VARCHAR: DataType.Varchar,
  DECIMAL: DataType.Decimal,
  TIME: DataType.Time,
  TIMESTAMP: DataType.Timestamp,
  INTERVAL: DataType.Interval,
  DATE: DataType.Date,
  TIMESTAMPTZ: DataType.Timestamptz,
} as const;

const INT_RANGES: Partial<Record<DataType, [number, number]>> = {
  [DataType.Int16]: [-32768, 32767],
  [DataType.Int32]: [-2147483648, 2147483647],
};

/**
 * Resolve a type name from configuration
 * Throws error for unknown names
 */
export function getDataType(typeName: string): DataType {
  const dataType = TYPE_MAP[typeName.toUpperCase()];
  if (dataType === undefined) {
    throw new Error(`Unknown data type: ${typeName}. Valid types are: ${Object.keys(TYPE_MAP).join(', ')}`);
  }
  return dataType;
}

export function getDataTypeName(dataType: DataType): string {
  return DataType[dataType];
}

/**
 * Check that a decoded JSON value can populate a column of the given type
 * null is accepted for every type
 */
export function fitsDataType(value: unknown, dataType: DataType): boolean {
  if (value === null) return true;

  switch (dataType) {
    case DataType.Int16:
    case DataType.Int32: {
      const range = INT_RANGES[dataType];
      return Number.isInteger(value) && range !== undefined && Number(value) >= range[0] && Number(value) <= range[1];
    }

    case DataType.Int64:
      // Beyond 2^53 a JSON number has already lost precision; such values must be strings
      return Number.isSafeInteger(value) || (typeof value === 'string' && /^-?\d+$/.test(value));

    case DataType.Float:
    case DataType.Double:
      return typeof value === 'number';

    case DataType.Decimal:
      return typeof value === 'number' || (typeof value === 'string' && value.trim() !== '' && !Number.isNaN(Number(value)));

    case DataType.Boolean:
      return typeof value === 'boolean';

    case DataType.Varchar:
      return typeof value === 'string';

    // Temporal types travel as strings
    case DataType.Time:
    case DataType.Timestamp:
    case DataType.Timestamptz:
    case DataType.Date:
    case DataType.Interval:
      return typeof value === 'string';
  }
}

/**
 * Bring a value into a comparable form for its column type
 * pg returns 64-bit integers and numerics as strings and temporal types as Date objects
 */
export function normalizeValue(value: unknown, dataType: DataType): unknown {
  if (value === null || value === undefined) return null;

  switch (dataType) {
    case DataType.Int64:
    case DataType.Decimal:
      return typeof value === 'number' || typeof value === 'bigint' ? value.toString() : String(value);

    case DataType.Float:
    case DataType.Double:
      return typeof value === 'string' ? Number(value) : value;

    case DataType.Timestamp:
    case DataType.Timestamptz:
      return toTimestamp(value);

    case DataType.Date:
      return value instanceof Date ? formatLocalDate(value) : value;

    default:
      return value;
  }
}

function toTimestamp(value: unknown): unknown {
  const date = value instanceof Date ? value : typeof value === 'string' ? new Date(value) : null;
  if (!date || Number.isNaN(date.getTime())) {
    return value;
  }
  return date.toISOString();
}

// pg parses DATE columns into local midnight
function formatLocalDate(date: Date): string {
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${date.getFullYear()}-${month}-${day}`;
}
