/**
 * keyed-field-crypto - keyed hashing and encryption of sensitive fields
 *
 * Deterministic layered hashes per data type, AES-256-GCM envelopes and
 * decryption of AES-256-CBC payloads from the browser client, all over a
 * fixed set of named 32-byte keys.
 *
 * @packageDocumentation
 */

// ===== Core Services =====
export {
  KeyedCryptoService,
  DEFAULT_KEYED_CRYPTO_CONFIG,
} from "./core/keyed-crypto-service";
export { KeyStore } from "./core/key-store";
export { HashEngine } from "./core/hash-engine";
export { AeadCipher, toWireEnvelope, fromWireEnvelope } from "./core/aead-cipher";
export {
  LegacyCbcDecoder,
  removePkcs7Padding,
  parseStructuredValue,
} from "./core/legacy-cbc-decoder";

// ===== Hash Compositions =====
export {
  HASH_COMPOSITION_TABLE,
  HASH_DATA_TYPES,
  isHashDataType,
  compositionFor,
  applyComposition,
  compositionA,
  compositionB,
  compositionC,
  compositionD,
} from "./core/hash-compositions";

// ===== Service Interface =====
export type { IKeyedCryptoService } from "./core/crypto-service-interface";

// ===== Types =====
export type {
  DataTypeLabel,
  KeyMap,
  HashDataType,
  HashComposition,
  EncryptionEnvelope,
  WireEnvelope,
  JsonValue,
  StructuredValue,
  KeyedCryptoConfig,
  HexDecodeOptions,
  KeyedCryptoStatus,
  ErrorContext,
  KeyedCryptoErrorCode,
} from "./types";

export { ServiceError, KeyedCryptoError, isKeyedCryptoError } from "./types";

// ===== Utilities =====
export {
  defaultLogger,
  ConsoleLogger,
  LogLevel,
  parseLogLevel,
  type ILogger,
} from "./utils/logger";

export { ErrorUtils } from "./utils/error-handling";

export {
  initializeSodium,
  isSodiumReady,
  sha256Hex,
  sha512Hex,
  hmacSha256Hex,
  generateRandomBytes,
  toHex,
  fromHex,
} from "./utils/crypto";

// ===== Constants =====
export { KEYED_CRYPTO_CONSTANTS, LOG_LEVEL_ENV_VAR } from "./constants";

export const VERSION = "1.0.0";
