import { createHmac } from "crypto";
import { bytesToHex, utf8ToBytes } from "../utils/encoding";

/** Length of a hex encoded HMAC-SHA1 digest */
export const SIGNATURE_HEX_LENGTH = 40;

/**
 * Lowercase hex HMAC-SHA1 of a message.
 * Key and message are both UTF-8 encoded as given; the key is not trimmed or normalized.
 */
export function hmacSha1Hex(key: string, message: string): string {
  const hmac = createHmac("sha1", utf8ToBytes(key));
  hmac.update(utf8ToBytes(message));
  return bytesToHex(hmac.digest());
}
