/**
 * UTF-8 and hex helpers used at every string/byte boundary
 */

const utf8Encoder = new TextEncoder();

/**
 * Encode a string as UTF-8 bytes
 */
export function utf8ToBytes(text: string): Uint8Array {
  return utf8Encoder.encode(text);
}

/**
 * Decode UTF-8 bytes to a string.
 * Throws a TypeError on invalid UTF-8; a leading BOM is dropped.
 */
export function bytesToUtf8(bytes: Uint8Array): string {
  return new TextDecoder("utf-8", { fatal: true }).decode(bytes);
}

/**
 * Convert bytes to a lowercase hex string
 */
export function bytesToHex(bytes: Uint8Array): string {
  return Array.from(bytes)
    .map((b) => b.toString(16).padStart(2, "0"))
    .join("");
}

