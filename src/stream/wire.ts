import { SinkPayloadFormat, type TableSchema } from '../common/types';
import type { ProtocolMessage, SinkConfig } from '../protocol/messages';

/**
 * Plain-object shapes of connector_service.proto messages as @grpc/proto-loader
 * serializes them (keepCase, enums by name)
 */
export interface WireTableSchema {
  columns: { name: string; data_type: { type_name: number } }[];
  pk_indices: number[];
}

export interface WireSinkConfig {
  connector_type: string;
  properties: Record<string, string>;
  table_schema: WireTableSchema;
}

export interface WireRowOp {
  op_type: number;
  line: string;
}

export type WireWriteBatch = { batch_id: number; epoch: number } & (
  | { json_payload: { row_ops: WireRowOp[] } }
  | { stream_chunk_payload: { binary_data: Buffer } }
);

export type SinkStreamRequestWire =
  | { start: { format: SinkPayloadFormat; sink_config: WireSinkConfig } }
  | { start_epoch: { epoch: number } }
  | { write: WireWriteBatch }
  | { sync: { epoch: number } };

const RESPONSE_KINDS = ['start', 'start_epoch', 'write', 'sync'] as const;

export type SinkResponseKind = (typeof RESPONSE_KINDS)[number];

export function toWireRequest(message: ProtocolMessage): SinkStreamRequestWire {
  switch (message.kind) {
    case 'start':
      return { start: { format: message.format, sink_config: toWireSinkConfig(message.sinkConfig) } };

    case 'start_epoch':
      return { start_epoch: { epoch: message.epoch } };

    case 'write': {
      const { batchId, epoch, payload } = message;
      if (payload.format === SinkPayloadFormat.Json) {
        return {
          write: {
            batch_id: batchId,
            epoch,
            json_payload: { row_ops: payload.rowOps.map(op => ({ op_type: op.opType, line: op.line })) },
          },
        };
      }
      return {
        write: {
          batch_id: batchId,
          epoch,
          stream_chunk_payload: { binary_data: payload.chunk.binaryData },
        },
      };
    }

    case 'sync':
      return { sync: { epoch: message.epoch } };
  }
}

function toWireSinkConfig(config: SinkConfig): WireSinkConfig {
  return {
    connector_type: config.connectorType,
    properties: { ...config.properties },
    table_schema: toWireTableSchema(config.tableSchema),
  };
}

function toWireTableSchema(schema: TableSchema): WireTableSchema {
  return {
    columns: schema.columns.map(column => ({ name: column.name, data_type: { type_name: column.dataType } })),
    pk_indices: [...schema.pkIndices],
  };
}

/**
 * Which variant a decoded response carries, read from the oneof virtual field
 * Responses are only checked positionally, so an unknown variant is not an error
 */
export function responseKind(response: object): SinkResponseKind | undefined {
  if (!('response' in response)) {
    return undefined;
  }
  const kind = response.response;
  return RESPONSE_KINDS.find(candidate => candidate === kind);
}
