import { SinkPayloadFormat, type TableSchema } from '../common/types';

/**
 * Connector target and settings for one session
 * Immutable for the duration of the session
 */
export interface SinkConfig {
  readonly connectorType: string;
  readonly properties: Readonly<Record<string, string>>;
  readonly tableSchema: TableSchema;
}

export interface RowOp {
  opType: number;
  line: string;
}

/**
 * Pre-encoded columnar batch; the harness never looks inside
 */
export interface StreamChunkPayload {
  binaryData: Buffer;
}

/**
 * Body of a Write message, tagged with the format it was encoded in
 */
export type WritePayload =
  | { format: SinkPayloadFormat.Json; rowOps: RowOp[] }
  | { format: SinkPayloadFormat.StreamChunk; chunk: StreamChunkPayload };

export interface StartMessage {
  kind: 'start';
  format: SinkPayloadFormat;
  sinkConfig: SinkConfig;
}

export interface StartEpochMessage {
  kind: 'start_epoch';
  epoch: number;
}

export interface WriteMessage {
  kind: 'write';
  batchId: number;
  epoch: number;
  payload: WritePayload;
}

export interface SyncMessage {
  kind: 'sync';
  epoch: number;
}

export type ProtocolMessage = StartMessage | StartEpochMessage | WriteMessage | SyncMessage;

/**
 * Ordered message list for one test run
 * Built once per invocation and consumed by the stream driver
 */
export interface Session {
  readonly format: SinkPayloadFormat;
  readonly messages: readonly ProtocolMessage[];
}

/**
 * One-line summary of a message for logs
 */
export function describeMessage(message: ProtocolMessage): string {
  switch (message.kind) {
    case 'start':
      return `start(format=${message.format}, connector=${message.sinkConfig.connectorType}, columns=${message.sinkConfig.tableSchema.columns.length})`;
    case 'start_epoch':
      return `start_epoch(epoch=${message.epoch})`;
    case 'write': {
      const body = message.payload.format === SinkPayloadFormat.Json
        ? `${message.payload.rowOps.length} row ops`
        : `${message.payload.chunk.binaryData.length} bytes`;
      return `write(batch_id=${message.batchId}, epoch=${message.epoch}, ${body})`;
    }
    case 'sync':
      return `sync(epoch=${message.epoch})`;
  }
}
