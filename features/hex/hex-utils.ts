import { subtle } from "node:crypto";

/**
 * Convert bytes to a lowercase hex string.
 */
export function toHex(data: Uint8Array): string {
  let hex = "";
  for (let i = 0; i < data.length; i++) {
    hex += data[i].toString(16).padStart(2, "0");
  }
  return hex;
}

/**
 * SHA-256 of `data` as lowercase hex (using SubtleCrypto).
 */
export async function sha256Hex(data: Uint8Array): Promise<string> {
  const hashBuffer = await subtle.digest("SHA-256", data);
  return toHex(new Uint8Array(hashBuffer));
}

/** Case-insensitive fingerprint comparison. */
export function fingerprintsMatch(a: string, b: string): boolean {
  return a.toLowerCase() === b.toLowerCase();
}

/**
 * Format a hex fingerprint as `AB:CD:EF:...` for display.
 */
export function formatFingerprint(fingerprint: string): string {
  const pairs = fingerprint.toUpperCase().match(/.{1,2}/g);
  return pairs ? pairs.join(":") : "";
}
