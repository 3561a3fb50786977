import type { StreamChunkPayload } from './messages';

/**
 * Wrap a binary fixture as a single stream chunk
 * The bytes are passed through as-is; no splitting or re-encoding
 */
export function encodeStreamChunk(bytes: Buffer): StreamChunkPayload {
  return { binaryData: bytes };
}
