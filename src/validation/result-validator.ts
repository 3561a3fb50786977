import { Logger } from '@nestjs/common';
import { ResultMismatchError } from '../common/errors';
import { normalizeValue } from '../common/type-map';
import type { RowTuple, TableSchema } from '../common/types';

const logger = new Logger('ResultValidator');

export type ValidationResult = { ok: true } | { ok: false; error: ResultMismatchError };

/**
 * Compare stored rows with expected rows, strictly and in order
 * Reports the first row count, column count or value mismatch
 * With a schema, cells are normalized by column type before comparing
 */
export function validateRows(expected: RowTuple[], actual: RowTuple[], schema?: TableSchema): ValidationResult {
  if (expected.length !== actual.length) {
    return mismatch(`Row count mismatch: expected ${expected.length}, got ${actual.length}`);
  }

  for (let i = 0; i < expected.length; i++) {
    const expectedRow = expected[i];
    const actualRow = actual[i];

    if (expectedRow.length !== actualRow.length) {
      return mismatch(`Column count mismatch at row ${i}: expected ${expectedRow.length}, got ${actualRow.length}`);
    }

    for (let j = 0; j < expectedRow.length; j++) {
      const dataType = schema?.columns[j]?.dataType;
      const want = dataType === undefined ? expectedRow[j] : normalizeValue(expectedRow[j], dataType);
      const got = dataType === undefined ? actualRow[j] : normalizeValue(actualRow[j], dataType);

      if (!Object.is(want, got)) {
        return mismatch(
          `Value mismatch at row ${i}, column ${j}: expected ${JSON.stringify(want)}, got ${JSON.stringify(got)}`,
        );
      }
    }
  }

  logger.log(`Validated ${expected.length} rows`);
  return { ok: true };
}

function mismatch(message: string): ValidationResult {
  logger.error(`Integration test failed: ${message}`);
  return { ok: false, error: new ResultMismatchError(message) };
}
