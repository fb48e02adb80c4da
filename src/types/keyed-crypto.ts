/**
 * Keyed Crypto Type Definitions
 */

/**
 * Opaque label naming a category of sensitive field, e.g. "USER_EMAIL"
 */
export type DataTypeLabel = string;

export type KeyMap =
  | Readonly<Record<DataTypeLabel, Uint8Array>>
  | ReadonlyMap<DataTypeLabel, Uint8Array>;

/**
 * Labels accepted by the hash engine. The set is closed.
 */
export type HashDataType =
  | "USER_NAME"
  | "USER_TG"
  | "USER_PHONE"
  | "USER_EMAIL"
  | "INCIDENT_NAME"
  | "VERIFY_TOKEN_STRING"
  | "INCIDENT_PHONE"
  | "INCIDENT_TG"
  | "API_KEY"
  | "IDENTITY_KEY"
  | "PASS_RESET_TOKEN"
  | "BACKUP_EMAIL";

/**
 * Layered hash compositions:
 * - A: sha256(sha512(hmac) + hmac)
 * - B: sha512(sha256(hmac) + hmac)
 * - C: hmac(sha512(text) + sha256(text))
 * - D: hmac(sha512(sha256(text) + sha512(text) + sha256(text)))
 */
export type HashComposition = "A" | "B" | "C" | "D";

/**
 * AES-256-GCM output, every field lowercase hex
 */
export interface EncryptionEnvelope {
  ciphertext: string;
  nonce: string;
  tag: string;
}

/**
 * Envelope field names as stored by the external backend
 */
export interface WireEnvelope {
  encrypted: string;
  iv: string;
  authTag: string;
}

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

/**
 * Decrypted legacy payload: always a JSON object
 */
export type StructuredValue = { [key: string]: JsonValue };

export interface KeyedCryptoConfig {
  /**
   * Reject uppercase hex digits in ciphertext, nonce, tag and IV inputs.
   * Left off, hex decoding is case-insensitive, so flipping the case of a
   * digit (`a` to `A`) decodes to the same bytes and still opens; only a
   * change of value is caught by the tag or padding check.
   */
  strictHexInput: boolean;
  /** Emit a debug line for every successful operation */
  enableOperationLogging: boolean;
}

export interface HexDecodeOptions {
  strict?: boolean;
}

export interface KeyedCryptoStatus {
  destroyed: boolean;
  keyCount: number;
  dataTypes: DataTypeLabel[];
  config: KeyedCryptoConfig;
}
