import type { RowTuple, TableSchema } from '../common/types';
import type { JsonFixture } from '../protocol/fixtures';
import { decodeRow } from '../protocol/json-encoder';

/**
 * Flatten every batch of a fixture into tuples in schema column order
 * Ground truth for a store read, whichever payload format carried the rows
 */
export function expectedRowsFromFixture(fixture: JsonFixture, schema: TableSchema): RowTuple[] {
  return fixture.batches.flatMap((batch, batchIndex) =>
    batch.map((row, rowIndex) => {
      const record = decodeRow(row, schema, fixture.path, `batch ${batchIndex}, row ${rowIndex}`);
      return schema.columns.map(column => record[column.name]);
    }),
  );
}
