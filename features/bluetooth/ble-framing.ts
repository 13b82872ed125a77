import { BleConfig } from "@/constants/transport";
import { encodeLocationPayload, type LocationPayload } from "@/features/models";

const encoder = new TextEncoder();
const decoder = new TextDecoder();

/** Serialized payload followed by the newline frame terminator. */
export function frameForWrite(payload: LocationPayload): Uint8Array {
  const json = encoder.encode(encodeLocationPayload(payload));
  const frame = new Uint8Array(json.length + 1);
  frame.set(json);
  frame[json.length] = BleConfig.FRAME_TERMINATOR;
  return frame;
}

/**
 * Split `bytes` into consecutive chunks of at most `maxLength` bytes.
 */
export function chunkFrame(bytes: Uint8Array, maxLength: number): Uint8Array[] {
  const size = Math.max(1, Math.floor(maxLength));
  const chunks: Uint8Array[] = [];
  for (let i = 0; i < bytes.length; i += size) {
    chunks.push(bytes.subarray(i, Math.min(i + size, bytes.length)));
  }
  return chunks;
}

/**
 * Whether a notification asks for a position: any text containing
 * "request" (case-insensitive) or exactly the sentinel token.
 */
export function isLocationRequestSignal(value: Uint8Array): boolean {
  const message = decoder.decode(value);
  return (
    message.toLowerCase().includes("request") ||
    message === BleConfig.REQUEST_SENTINEL
  );
}
