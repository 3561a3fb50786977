import { readFileSync } from 'fs';
import { Logger } from '@nestjs/common';
import { FixtureError, errorMessage, hasErrorCode } from '../common/errors';
import { isRecord, type RowRecord } from '../common/types';

const logger = new Logger('Fixtures');

/**
 * One row of a JSON fixture
 * line is either a JSON-encoded row or the row object itself
 */
export interface FixtureRow {
  opType: number;
  line: string | RowRecord;
}

/**
 * A JSON fixture: batches in send order, rows in batch order
 */
export interface JsonFixture {
  path: string;
  batches: FixtureRow[][];
}

/**
 * Read and shape-check a JSON fixture file
 * Throws FixtureError if the file is unreadable, not JSON, or not a list of batches of rows
 */
export function loadJsonFixture(path: string): JsonFixture {
  const content = readFixture(path, 'utf-8');
  const fixture = parseJsonFixture(content, path);
  const rowCount = fixture.batches.reduce((total, batch) => total + batch.length, 0);
  logger.log(`Loaded ${fixture.batches.length} batches (${rowCount} rows) from ${path}`);
  return fixture;
}

/**
 * Read a binary fixture verbatim
 */
export function loadBinaryFixture(path: string): Buffer {
  const bytes = readFixture(path);
  logger.log(`Loaded ${bytes.length} bytes from ${path}`);
  return bytes;
}

export function parseJsonFixture(content: string, path: string): JsonFixture {
  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    throw new FixtureError(path, `invalid JSON: ${errorMessage(error)}`, { cause: error });
  }

  if (!Array.isArray(data)) {
    throw new FixtureError(path, 'expected a top-level array of batches');
  }

  const batches = data.map((batch: unknown, batchIndex) => {
    if (!Array.isArray(batch)) {
      throw new FixtureError(path, `batch ${batchIndex} is not an array of rows`);
    }
    return batch.map((row: unknown, rowIndex) => parseFixtureRow(row, path, `batch ${batchIndex}, row ${rowIndex}`));
  });

  return { path, batches };
}

function parseFixtureRow(row: unknown, path: string, location: string): FixtureRow {
  if (!isRecord(row)) {
    throw new FixtureError(path, `${location} is not an object`);
  }
  if (!('op_type' in row)) {
    throw new FixtureError(path, `${location} is missing 'op_type'`);
  }
  if (!('line' in row)) {
    throw new FixtureError(path, `${location} is missing 'line'`);
  }

  const opType = row.op_type;
  if (typeof opType !== 'number' || !Number.isInteger(opType)) {
    throw new FixtureError(path, `${location} has non-integer op_type ${JSON.stringify(opType)}`);
  }

  const line = row.line;
  if (typeof line !== 'string' && !isRecord(line)) {
    throw new FixtureError(path, `${location} has a 'line' that is neither a string nor an object`);
  }

  return { opType, line };
}

function readFixture(path: string): Buffer;
function readFixture(path: string, encoding: 'utf-8'): string;
function readFixture(path: string, encoding?: 'utf-8'): Buffer | string {
  try {
    return encoding ? readFileSync(path, encoding) : readFileSync(path);
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT')) {
      logger.error(`Fixture not found at ${path}`);
      throw new FixtureError(path, 'file not found', { cause: error });
    }
    throw new FixtureError(path, `unreadable: ${errorMessage(error)}`, { cause: error });
  }
}
