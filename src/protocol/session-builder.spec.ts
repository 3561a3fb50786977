import { ProtocolSequenceError } from '../common/errors';
import { DataType, SinkPayloadFormat } from '../common/types';
import { describeMessage, type ProtocolMessage, type Session, type SinkConfig } from './messages';
import { createTableSchema } from './schema';
import { assertSessionInvariants, buildSession } from './session-builder';

describe('SessionBuilder', () => {
  const sinkConfig: SinkConfig = {
    connectorType: 'file',
    properties: { 'output.path': '/tmp/connector' },
    tableSchema: createTableSchema(
      [
        { name: 'id', dataType: DataType.Int32 },
        { name: 'name', dataType: DataType.Varchar },
      ],
      [0],
    ),
  };

  const rowOp = (id: number) => ({ opType: 1, line: JSON.stringify({ id, name: `n${id}` }) });

  describe('buildSession', () => {
    it('should emit one epoch triple per JSON batch', () => {
      const batches = [[rowOp(1), rowOp(2)], [rowOp(3)], [rowOp(4)]];
      const session = buildSession(sinkConfig, SinkPayloadFormat.Json, { format: SinkPayloadFormat.Json, batches });

      expect(session.messages.map(m => m.kind)).toEqual([
        'start',
        'start_epoch', 'write', 'sync',
        'start_epoch', 'write', 'sync',
        'start_epoch', 'write', 'sync',
      ]);

      const writes = session.messages.filter(m => m.kind === 'write');
      expect(writes.map(m => m.kind === 'write' && [m.epoch, m.batchId])).toEqual([[0, 1], [1, 2], [2, 3]]);
    });

    it('should start with the format and full sink config', () => {
      const session = buildSession(sinkConfig, SinkPayloadFormat.Json, { format: SinkPayloadFormat.Json, batches: [] });
      expect(session.messages).toEqual([{ kind: 'start', format: SinkPayloadFormat.Json, sinkConfig }]);
    });

    it('should build the single-row scenario', () => {
      const session = buildSession(sinkConfig, SinkPayloadFormat.Json, {
        format: SinkPayloadFormat.Json,
        batches: [[{ opType: 1, line: '{"id":1,"name":"a"}' }]],
      });

      expect(session.messages.slice(1)).toEqual([
        { kind: 'start_epoch', epoch: 0 },
        {
          kind: 'write',
          batchId: 1,
          epoch: 0,
          payload: { format: SinkPayloadFormat.Json, rowOps: [{ opType: 1, line: '{"id":1,"name":"a"}' }] },
        },
        { kind: 'sync', epoch: 0 },
      ]);
    });

    it('should emit exactly one triple for a stream chunk', () => {
      const binaryData = Buffer.alloc(37, 1);
      const session = buildSession(sinkConfig, SinkPayloadFormat.StreamChunk, {
        format: SinkPayloadFormat.StreamChunk,
        chunk: { binaryData },
      });

      expect(session.messages.map(m => m.kind)).toEqual(['start', 'start_epoch', 'write', 'sync']);
      const write = session.messages[2];
      expect(write).toEqual({
        kind: 'write',
        batchId: 1,
        epoch: 0,
        payload: { format: SinkPayloadFormat.StreamChunk, chunk: { binaryData } },
      });
      expect(write.kind === 'write' && write.payload.format === SinkPayloadFormat.StreamChunk && write.payload.chunk.binaryData)
        .toBe(binaryData);
    });

    it('should refuse a payload in a different format than declared', () => {
      expect(() =>
        buildSession(sinkConfig, SinkPayloadFormat.StreamChunk, { format: SinkPayloadFormat.Json, batches: [] }),
      ).toThrow(new ProtocolSequenceError('Session format STREAM_CHUNK does not match JSON payload'));
    });
  });

  describe('assertSessionInvariants', () => {
    const start: ProtocolMessage = { kind: 'start', format: SinkPayloadFormat.Json, sinkConfig };
    const write = (batchId: number, epoch: number): ProtocolMessage => ({
      kind: 'write',
      batchId,
      epoch,
      payload: { format: SinkPayloadFormat.Json, rowOps: [] },
    });
    const session = (...messages: ProtocolMessage[]): Session => ({ format: SinkPayloadFormat.Json, messages });

    it('should accept a well-formed session', () => {
      expect(() => assertSessionInvariants(session(
        start,
        { kind: 'start_epoch', epoch: 0 }, write(1, 0), { kind: 'sync', epoch: 0 },
        { kind: 'start_epoch', epoch: 1 }, write(2, 1), { kind: 'sync', epoch: 1 },
      ))).not.toThrow();
    });

    it('should require a start message first', () => {
      expect(() => assertSessionInvariants(session({ kind: 'start_epoch', epoch: 0 })))
        .toThrow('Message 0: expected start, got start_epoch');
      expect(() => assertSessionInvariants(session())).toThrow('Session has no start message');
    });

    it('should reject a second start message', () => {
      expect(() => assertSessionInvariants(session(start, start))).toThrow('Message 1: expected start_epoch, got start');
    });

    it('should reject epoch gaps', () => {
      expect(() => assertSessionInvariants(session(start, { kind: 'start_epoch', epoch: 1 })))
        .toThrow('Message 1: expected epoch 0, got 1');
    });

    it('should reject a new epoch before the previous sync', () => {
      expect(() => assertSessionInvariants(session(
        start, { kind: 'start_epoch', epoch: 0 }, write(1, 0), { kind: 'start_epoch', epoch: 1 },
      ))).toThrow('Message 3: expected sync, got start_epoch');
    });

    it('should reject batch ids that do not increase', () => {
      expect(() => assertSessionInvariants(session(
        start,
        { kind: 'start_epoch', epoch: 0 }, write(1, 0), { kind: 'sync', epoch: 0 },
        { kind: 'start_epoch', epoch: 1 }, write(1, 1), { kind: 'sync', epoch: 1 },
      ))).toThrow('Message 5: batch id 1 does not follow 1');
    });

    it('should reject writes in another format', () => {
      const chunkWrite: ProtocolMessage = {
        kind: 'write',
        batchId: 1,
        epoch: 0,
        payload: { format: SinkPayloadFormat.StreamChunk, chunk: { binaryData: Buffer.alloc(1) } },
      };
      expect(() => assertSessionInvariants(session(start, { kind: 'start_epoch', epoch: 0 }, chunkWrite)))
        .toThrow('Message 2: STREAM_CHUNK write in a JSON session');
    });

    it('should reject a session that stops inside an epoch', () => {
      expect(() => assertSessionInvariants(session(start, { kind: 'start_epoch', epoch: 0 }, write(1, 0))))
        .toThrow('Session ends inside epoch 0, expected sync');
    });
  });

  describe('describeMessage', () => {
    it('should summarize each message kind', () => {
      expect(describeMessage({ kind: 'start', format: SinkPayloadFormat.Json, sinkConfig }))
        .toBe('start(format=JSON, connector=file, columns=2)');
      expect(describeMessage({ kind: 'start_epoch', epoch: 3 })).toBe('start_epoch(epoch=3)');
      expect(describeMessage({
        kind: 'write',
        batchId: 2,
        epoch: 1,
        payload: { format: SinkPayloadFormat.StreamChunk, chunk: { binaryData: Buffer.alloc(37) } },
      })).toBe('write(batch_id=2, epoch=1, 37 bytes)');
      expect(describeMessage({ kind: 'sync', epoch: 1 })).toBe('sync(epoch=1)');
    });
  });
});
