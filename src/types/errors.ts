/**
 * Error Types and Classes for keyed-field-crypto
 */

export interface ErrorContext {
  message: string;
  type: string;
  source: string;
  operation: string;
  timestamp: number;
  severity: "low" | "medium" | "high" | "critical";
  metadata?: Record<string, unknown>;
  dataType?: string;
  [key: string]: unknown;
}

/**
 * Base Service Error Class
 */
export class ServiceError extends Error {
  public readonly code?: string;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    options?: {
      code?: string;
      details?: Record<string, unknown>;
    }
  ) {
    super(message);
    this.name = "ServiceError";
    this.code = options?.code;
    this.details = options?.details;
    Object.setPrototypeOf(this, ServiceError.prototype);
  }
}

export type KeyedCryptoErrorCode =
  | "INVALID_KEY_SIZE"
  | "UNKNOWN_DATA_TYPE"
  | "MISSING_KEY"
  | "DECRYPTION_FAILED"
  | "MALFORMED_PAYLOAD"
  | "MALFORMED_INPUT"
  | "INVALID_NONCE_SIZE"
  | "INVALID_IV_SIZE"
  | "SERVICE_DESTROYED";

/**
 * Errors raised by the key store, hash engine and ciphers.
 * `DECRYPTION_FAILED` never carries details.
 */
export class KeyedCryptoError extends ServiceError {
  declare readonly code: KeyedCryptoErrorCode;

  constructor(
    message: string,
    options: {
      code: KeyedCryptoErrorCode;
      details?: Record<string, unknown>;
    }
  ) {
    super(message, options);
    this.name = "KeyedCryptoError";
    Object.setPrototypeOf(this, KeyedCryptoError.prototype);
  }

  /**
   * The single opaque error for every authentication or padding failure
   */
  public static decryptionFailed(): KeyedCryptoError {
    return new KeyedCryptoError("Decryption failed", {
      code: "DECRYPTION_FAILED",
    });
  }

  public static unknownDataType(dataType: string): KeyedCryptoError {
    return new KeyedCryptoError(`Unknown data type: ${dataType}`, {
      code: "UNKNOWN_DATA_TYPE",
      details: { dataType },
    });
  }
}

export function isKeyedCryptoError(
  error: unknown,
  code?: KeyedCryptoErrorCode
): error is KeyedCryptoError {
  return (
    error instanceof KeyedCryptoError &&
    (code === undefined || error.code === code)
  );
}
