/**
 * Stand-in for the browser client: AES-256-CBC with PKCS#7 padding
 */

import { createCipheriv } from "node:crypto";

export function encryptLegacyCBC(
  plaintext: string | Uint8Array,
  key: Uint8Array,
  iv: Uint8Array
): string {
  const cipher = createCipheriv("aes-256-cbc", key, iv);
  const data =
    typeof plaintext === "string" ? Buffer.from(plaintext, "utf8") : plaintext;
  return Buffer.concat([cipher.update(data), cipher.final()]).toString("hex");
}

/**
 * Encrypt already-padded bytes as-is, for malformed padding cases.
 * Input length must be a multiple of 16.
 */
export function encryptRawCBC(
  padded: Uint8Array,
  key: Uint8Array,
  iv: Uint8Array
): string {
  const cipher = createCipheriv("aes-256-cbc", key, iv);
  cipher.setAutoPadding(false);
  return Buffer.concat([cipher.update(padded), cipher.final()]).toString("hex");
}
