import { Logger } from '@nestjs/common';
import { ProtocolSequenceError } from '../common/errors';
import { SinkPayloadFormat } from '../common/types';
import type {
  ProtocolMessage,
  RowOp,
  Session,
  SinkConfig,
  StreamChunkPayload,
  WritePayload,
} from './messages';

const logger = new Logger('SessionBuilder');

const FIRST_EPOCH = 0;
const FIRST_BATCH_ID = 1;

/**
 * Payload already encoded for the wire
 * JSON carries one entry per batch; a stream chunk is always a single batch
 */
export type EncodedPayload =
  | { format: SinkPayloadFormat.Json; batches: RowOp[][] }
  | { format: SinkPayloadFormat.StreamChunk; chunk: StreamChunkPayload };

/**
 * Assemble the full ordered message list for one run
 * Start first, then a StartEpoch/Write/Sync triple per batch with epochs from 0 and batch ids from 1
 */
export function buildSession(sinkConfig: SinkConfig, format: SinkPayloadFormat, payload: EncodedPayload): Session {
  if (payload.format !== format) {
    throw new ProtocolSequenceError(`Session format ${format} does not match ${payload.format} payload`);
  }

  const writes: WritePayload[] = payload.format === SinkPayloadFormat.Json
    ? payload.batches.map((rowOps): WritePayload => ({ format: SinkPayloadFormat.Json, rowOps }))
    : [{ format: SinkPayloadFormat.StreamChunk, chunk: payload.chunk }];

  const messages: ProtocolMessage[] = [{ kind: 'start', format, sinkConfig }];

  let epoch = FIRST_EPOCH;
  let batchId = FIRST_BATCH_ID;
  for (const write of writes) {
    messages.push(
      { kind: 'start_epoch', epoch },
      { kind: 'write', batchId, epoch, payload: write },
      { kind: 'sync', epoch },
    );
    epoch++;
    batchId++;
  }

  const session: Session = { format, messages };
  assertSessionInvariants(session);

  logger.debug(`Built ${format} session for ${sinkConfig.connectorType}: ${writes.length} epochs, ${messages.length} messages`);
  return session;
}

type Expecting = 'start' | 'start_epoch' | 'write' | 'sync';

/**
 * Check start/epoch/write/sync ordering and format consistency
 * Throws ProtocolSequenceError at the first message out of place
 */
export function assertSessionInvariants(session: Session): void {
  let expecting: Expecting = 'start';
  let nextEpoch = FIRST_EPOCH;
  let currentEpoch = -1;
  let lastBatchId = FIRST_BATCH_ID - 1;

  for (const [index, message] of session.messages.entries()) {
    if (message.kind !== expecting) {
      throw new ProtocolSequenceError(`Message ${index}: expected ${expecting}, got ${message.kind}`);
    }

    switch (message.kind) {
      case 'start':
        if (message.format !== session.format) {
          throw new ProtocolSequenceError(`Message ${index}: start declares ${message.format} in a ${session.format} session`);
        }
        expecting = 'start_epoch';
        break;

      case 'start_epoch':
        if (message.epoch !== nextEpoch) {
          throw new ProtocolSequenceError(`Message ${index}: expected epoch ${nextEpoch}, got ${message.epoch}`);
        }
        currentEpoch = message.epoch;
        nextEpoch++;
        expecting = 'write';
        break;

      case 'write':
        if (message.epoch !== currentEpoch) {
          throw new ProtocolSequenceError(`Message ${index}: write for epoch ${message.epoch} inside epoch ${currentEpoch}`);
        }
        if (message.batchId <= lastBatchId) {
          throw new ProtocolSequenceError(`Message ${index}: batch id ${message.batchId} does not follow ${lastBatchId}`);
        }
        if (message.payload.format !== session.format) {
          throw new ProtocolSequenceError(`Message ${index}: ${message.payload.format} write in a ${session.format} session`);
        }
        lastBatchId = message.batchId;
        expecting = 'sync';
        break;

      case 'sync':
        if (message.epoch !== currentEpoch) {
          throw new ProtocolSequenceError(`Message ${index}: sync for epoch ${message.epoch} inside epoch ${currentEpoch}`);
        }
        expecting = 'start_epoch';
        break;
    }
  }

  if (expecting === 'start') {
    throw new ProtocolSequenceError('Session has no start message');
  }
  if (expecting !== 'start_epoch') {
    throw new ProtocolSequenceError(`Session ends inside epoch ${currentEpoch}, expected ${expecting}`);
  }
}
