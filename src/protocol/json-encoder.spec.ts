import { FixtureError } from '../common/errors';
import { DataType } from '../common/types';
import { encodeStreamChunk } from './binary-encoder';
import type { JsonFixture } from './fixtures';
import { decodeRow, encodeJsonBatches } from './json-encoder';
import { createTableSchema } from './schema';

describe('payload encoders', () => {
  const schema = createTableSchema(
    [
      { name: 'id', dataType: DataType.Int32 },
      { name: 'name', dataType: DataType.Varchar },
    ],
    [0],
  );

  const fixture: JsonFixture = {
    path: 'input.json',
    batches: [
      [
        { opType: 1, line: '{"id":1,"name":"a"}' },
        { opType: 2, line: { name: 'b', id: 2 } },
      ],
      [{ opType: 4, line: '{"id":3,"name":"c"}' }],
    ],
  };

  describe('encodeJsonBatches', () => {
    it('should keep each row op type when no override is given', () => {
      expect(encodeJsonBatches(fixture, schema)).toEqual([
        [
          { opType: 1, line: '{"id":1,"name":"a"}' },
          { opType: 2, line: '{"id":2,"name":"b"}' },
        ],
        [{ opType: 4, line: '{"id":3,"name":"c"}' }],
      ]);
    });

    it('should force every op type to the override', () => {
      const batches = encodeJsonBatches(fixture, schema, 1);
      expect(batches.flat().map(op => op.opType)).toEqual([1, 1, 1]);
    });

    it('should produce identical output when encoded twice', () => {
      expect(encodeJsonBatches(fixture, schema, 1)).toEqual(encodeJsonBatches(fixture, schema, 1));
    });

    it('should reject a non-integer override', () => {
      expect(() => encodeJsonBatches(fixture, schema, 1.5)).toThrow('Op override must be an integer, got 1.5');
    });

    it('should encode the single-row scenario', () => {
      const single: JsonFixture = {
        path: 'single.json',
        batches: [[{ opType: 1, line: '{"id":1,"name":"a"}' }]],
      };
      expect(encodeJsonBatches(single, schema, 1)).toEqual([[{ opType: 1, line: '{"id":1,"name":"a"}' }]]);
    });
  });

  describe('64-bit integers', () => {
    const wide = createTableSchema([{ name: 'v3', dataType: DataType.Int64 }], [0]);

    it('should reject an Int64 number that JSON cannot hold exactly', () => {
      const unsafe: JsonFixture = {
        path: 'wide.json',
        batches: [[{ opType: 1, line: '{"v3":9007199254740993}' }]],
      };

      expect(() => encodeJsonBatches(unsafe, wide, 1)).toThrow(
        "Fixture wide.json: batch 0, row 0 column 'v3' holds an Int64 number beyond the safe integer range; quote it as a string",
      );
    });

    it('should send a quoted Int64 value digit for digit', () => {
      const quoted: JsonFixture = {
        path: 'wide.json',
        batches: [[{ opType: 1, line: '{"v3":"9007199254740993"}' }]],
      };

      expect(encodeJsonBatches(quoted, wide, 1)).toEqual([[{ opType: 1, line: '{"v3":"9007199254740993"}' }]]);
    });

    it('should accept Int64 numbers inside the safe range', () => {
      const safe: JsonFixture = {
        path: 'wide.json',
        batches: [[{ opType: 1, line: '{"v3":9007199254740991}' }]],
      };

      expect(encodeJsonBatches(safe, wide, 1)).toEqual([[{ opType: 1, line: '{"v3":9007199254740991}' }]]);
    });
  });

  describe('decodeRow', () => {
    it('should reject a line with a missing column', () => {
      expect(() => decodeRow({ opType: 1, line: '{"id":1}' }, schema, 'in.json', 'batch 0, row 0'))
        .toThrow("Fixture in.json: batch 0, row 0 is missing column 'name'");
    });

    it('should reject a line with extra columns', () => {
      expect(() => decodeRow({ opType: 1, line: { id: 1, name: 'a', age: 3 } }, schema, 'in.json', 'batch 0, row 1'))
        .toThrow('Fixture in.json: batch 0, row 1 has columns not in the table schema: age');
    });

    it('should reject values of the wrong type', () => {
      expect(() => decodeRow({ opType: 1, line: '{"id":"1","name":"a"}' }, schema, 'in.json', 'batch 1, row 0'))
        .toThrow(`Fixture in.json: batch 1, row 0 column 'id' expects Int32, got "1"`);
    });

    it('should reject lines that are not JSON objects', () => {
      expect(() => decodeRow({ opType: 1, line: 'not json' }, schema, 'in.json', 'batch 0, row 0'))
        .toThrow(FixtureError);
      expect(() => decodeRow({ opType: 1, line: '[1, "a"]' }, schema, 'in.json', 'batch 0, row 0'))
        .toThrow('Fixture in.json: batch 0, row 0 has a line that is not a JSON object');
    });

    it('should order record keys by schema', () => {
      const record = decodeRow({ opType: 1, line: { name: 'z', id: 9 } }, schema, 'in.json', 'batch 0, row 0');
      expect(Object.keys(record)).toEqual(['id', 'name']);
    });
  });

  describe('encodeStreamChunk', () => {
    it('should wrap the bytes without copying them', () => {
      const bytes = Buffer.alloc(37, 7);
      const chunk = encodeStreamChunk(bytes);
      expect(chunk.binaryData).toBe(bytes);
      expect(chunk.binaryData).toHaveLength(37);
    });
  });
});
