/**
 * Layered keyed hash compositions and the fixed data-type table.
 *
 * The key is rendered as lowercase hex and that string is the HMAC key; every
 * intermediate digest is a hex string and concatenation happens on those
 * strings. Existing stored hashes depend on both details.
 */

import { bytesToHex } from "@noble/hashes/utils";

import type { HashComposition, HashDataType } from "../types/keyed-crypto";
import { hmacSha256Hex, sha256Hex, sha512Hex } from "../utils/crypto";

export const HASH_COMPOSITION_TABLE: Readonly<
  Record<HashDataType, HashComposition>
> = Object.freeze({
  USER_NAME: "A",
  USER_TG: "B",
  USER_PHONE: "C",
  USER_EMAIL: "B",
  INCIDENT_NAME: "A",
  VERIFY_TOKEN_STRING: "C",
  INCIDENT_PHONE: "B",
  INCIDENT_TG: "C",
  API_KEY: "D",
  IDENTITY_KEY: "B",
  PASS_RESET_TOKEN: "B",
  BACKUP_EMAIL: "B",
});

export const HASH_DATA_TYPES: readonly HashDataType[] = Object.freeze([
  "USER_NAME",
  "USER_TG",
  "USER_PHONE",
  "USER_EMAIL",
  "INCIDENT_NAME",
  "VERIFY_TOKEN_STRING",
  "INCIDENT_PHONE",
  "INCIDENT_TG",
  "API_KEY",
  "IDENTITY_KEY",
  "PASS_RESET_TOKEN",
  "BACKUP_EMAIL",
] as const);

export function isHashDataType(dataType: string): dataType is HashDataType {
  return HASH_DATA_TYPES.some((label) => label === dataType);
}

export function compositionFor(dataType: string): HashComposition | undefined {
  return isHashDataType(dataType)
    ? HASH_COMPOSITION_TABLE[dataType]
    : undefined;
}

/**
 * sha256(sha512(hmac) + hmac)
 */
export function compositionA(text: string, key: Uint8Array): string {
  const mac = hmacSha256Hex(text, bytesToHex(key));
  return sha256Hex(sha512Hex(mac) + mac);
}

/**
 * sha512(sha256(hmac) + hmac)
 */
export function compositionB(text: string, key: Uint8Array): string {
  const mac = hmacSha256Hex(text, bytesToHex(key));
  return sha512Hex(sha256Hex(mac) + mac);
}

/**
 * hmac(sha512(text) + sha256(text)): unkeyed digests first, key last
 */
export function compositionC(text: string, key: Uint8Array): string {
  return hmacSha256Hex(sha512Hex(text) + sha256Hex(text), bytesToHex(key));
}

/**
 * hmac(sha512(sha256(text) + sha512(text) + sha256(text))), used for API keys
 */
export function compositionD(text: string, key: Uint8Array): string {
  const inner = sha512Hex(sha256Hex(text) + sha512Hex(text) + sha256Hex(text));
  return hmacSha256Hex(inner, bytesToHex(key));
}

export function applyComposition(
  composition: HashComposition,
  text: string,
  key: Uint8Array
): string {
  switch (composition) {
    case "A":
      return compositionA(text, key);
    case "B":
      return compositionB(text, key);
    case "C":
      return compositionC(text, key);
    case "D":
      return compositionD(text, key);
  }
}
