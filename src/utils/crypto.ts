/**
 * Crypto primitives used by the hash compositions and ciphers.
 * SHA-2 and HMAC come from @noble/hashes; randomness, hex codecs and
 * memory wiping come from libsodium, which must be loaded first.
 */

import sodium from "libsodium-wrappers-sumo";

import { hmac } from "@noble/hashes/hmac";
import { sha256, sha512 } from "@noble/hashes/sha2";
import { bytesToHex, utf8ToBytes } from "@noble/hashes/utils";

import { KeyedCryptoError, ServiceError } from "../types/errors";
import type { HexDecodeOptions } from "../types/keyed-crypto";

const HEX_PATTERN = /^(?:[0-9a-fA-F]{2})*$/;
const LOWER_HEX_PATTERN = /^(?:[0-9a-f]{2})*$/;

let sodiumReady = false;

/**
 * Wait for libsodium's WebAssembly module. Safe to call repeatedly.
 */
export async function initializeSodium(): Promise<void> {
  await sodium.ready;
  sodiumReady = true;
}

export function isSodiumReady(): boolean {
  return sodiumReady;
}

function requireSodium(): typeof sodium {
  if (!sodiumReady) {
    throw new ServiceError(
      "libsodium is not initialized; await initializeSodium() first",
      { code: "SODIUM_NOT_READY" }
    );
  }
  return sodium;
}

export function sha256Hex(text: string): string {
  return bytesToHex(sha256(utf8ToBytes(text)));
}

export function sha512Hex(text: string): string {
  return bytesToHex(sha512(utf8ToBytes(text)));
}

/**
 * HMAC-SHA256 where both message and key are taken as UTF-8 strings
 */
export function hmacSha256Hex(text: string, key: string): string {
  return bytesToHex(hmac(sha256, utf8ToBytes(key), utf8ToBytes(text)));
}

export function generateRandomBytes(length: number): Uint8Array {
  return requireSodium().randombytes_buf(length);
}

export function toHex(data: Uint8Array): string {
  if (data.length === 0) {
    return "";
  }
  return requireSodium().to_hex(data);
}

/**
 * Decode a hex field, reporting the field name on failure.
 * Uppercase digits are accepted unless `strict` is set.
 */
export function fromHex(
  value: string,
  field: string,
  options: HexDecodeOptions = {}
): Uint8Array {
  const pattern = options.strict ? LOWER_HEX_PATTERN : HEX_PATTERN;
  if (!pattern.test(value)) {
    throw new KeyedCryptoError(`Malformed hex in ${field}`, {
      code: "MALFORMED_INPUT",
      details: { field, length: value.length },
    });
  }
  if (value.length === 0) {
    return new Uint8Array(0);
  }
  return requireSodium().from_hex(value);
}

export function wipe(data: Uint8Array): void {
  requireSodium().memzero(data);
}
