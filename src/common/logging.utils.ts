import { LogLevel } from '@nestjs/common';

const DEFAULT_TRUNCATE_LENGTH = 100;

/**
 * Serialize data for logging, cutting long output short
 * Binary values are logged by size rather than content
 */
export function truncateForLog(data: unknown, maxLength: number = DEFAULT_TRUNCATE_LENGTH): string {
  const str = JSON.stringify(data, (_key, value: unknown) => {
    if (isSerializedBuffer(value)) {
      return `<${value.data.length} bytes>`;
    }
    return typeof value === 'bigint' ? value.toString() : value;
  });
  if (str === undefined) {
    return 'undefined';
  }
  if (str.length <= maxLength) {
    return str;
  }
  return str.substring(0, maxLength) + '...';
}

/**
 * Get enabled log levels based on minimum level.
 * NestJS uses cumulative log levels, so 'debug' includes error, warn, log, and debug.
 */
export function getLogLevels(minLevel: string = 'log'): LogLevel[] {
  const levels: LogLevel[] = ['error', 'warn', 'log', 'debug', 'verbose'];
  const index = levels.findIndex(level => level === minLevel);
  return index >= 0 ? levels.slice(0, index + 1) : ['error', 'warn', 'log'];
}

// Buffer.toJSON runs before the replacer sees the value
function isSerializedBuffer(value: unknown): value is { type: 'Buffer'; data: number[] } {
  return (
    typeof value === 'object' &&
    value !== null &&
    'type' in value &&
    value.type === 'Buffer' &&
    'data' in value &&
    Array.isArray(value.data)
  );
}
