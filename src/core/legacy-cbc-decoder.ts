/**
 * Legacy CBC Decoder
 * Decrypts AES-256-CBC + PKCS#7 payloads produced by the browser client and
 * parses them as JSON objects. The scheme carries no authentication tag, so
 * the padding check is the only integrity signal.
 */

import { createDecipheriv } from "node:crypto";

import { KEYED_CRYPTO_CONSTANTS } from "../constants";
import { KeyedCryptoError } from "../types/errors";
import type {
  DataTypeLabel,
  HexDecodeOptions,
  StructuredValue,
} from "../types/keyed-crypto";
import { fromHex } from "../utils/crypto";
import type { KeyStore } from "./key-store";

const { CBC_ALGORITHM, CBC_BLOCK_SIZE } = KEYED_CRYPTO_CONSTANTS;

/**
 * Strip PKCS#7 padding. The pad length is bounded by the message length,
 * not by the block size, to accept what the client emits.
 */
export function removePkcs7Padding(data: Uint8Array): Uint8Array {
  const padding = data[data.length - 1];
  if (padding === undefined || padding === 0 || padding > data.length) {
    throw KeyedCryptoError.decryptionFailed();
  }

  let mismatch = 0;
  for (let i = data.length - padding; i < data.length; i++) {
    mismatch |= (data[i] ?? 0) ^ padding;
  }
  if (mismatch !== 0) {
    throw KeyedCryptoError.decryptionFailed();
  }

  return data.subarray(0, data.length - padding);
}

function isStructuredValue(value: unknown): value is StructuredValue {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function parseStructuredValue(plaintext: Uint8Array): StructuredValue {
  let text: string;
  try {
    text = new TextDecoder("utf-8", { fatal: true }).decode(plaintext);
  } catch {
    throw new KeyedCryptoError("Decrypted payload is not valid UTF-8", {
      code: "MALFORMED_PAYLOAD",
      details: { reason: "encoding", size: plaintext.length },
    });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    throw new KeyedCryptoError("Decrypted payload is not valid JSON", {
      code: "MALFORMED_PAYLOAD",
      details: { reason: "syntax", size: plaintext.length },
    });
  }

  if (!isStructuredValue(parsed)) {
    throw new KeyedCryptoError("Decrypted payload is not a JSON object", {
      code: "MALFORMED_PAYLOAD",
      details: {
        type: Array.isArray(parsed) ? "array" : parsed === null ? "null" : typeof parsed,
      },
    });
  }
  return parsed;
}

export class LegacyCbcDecoder {
  public constructor(
    private readonly keyStore: KeyStore,
    private readonly hexOptions: HexDecodeOptions = {}
  ) {}

  public decryptLegacyCBC(
    ciphertextHex: string,
    ivHex: string,
    dataType: DataTypeLabel
  ): StructuredValue {
    const key = this.keyStore.get(dataType);
    if (!key) {
      throw KeyedCryptoError.unknownDataType(dataType);
    }

    const ciphertext = fromHex(ciphertextHex, "ciphertext", this.hexOptions);
    const iv = fromHex(ivHex, "iv", this.hexOptions);

    if (iv.length !== CBC_BLOCK_SIZE) {
      throw new KeyedCryptoError(
        `IV must be ${CBC_BLOCK_SIZE} bytes for AES-CBC, got ${iv.length}`,
        {
          code: "INVALID_IV_SIZE",
          details: { expected: CBC_BLOCK_SIZE, actual: iv.length },
        }
      );
    }

    if (ciphertext.length === 0 || ciphertext.length % CBC_BLOCK_SIZE !== 0) {
      throw KeyedCryptoError.decryptionFailed();
    }

    const decipher = createDecipheriv(CBC_ALGORITHM, key, iv);
    decipher.setAutoPadding(false);
    const padded = Buffer.concat([decipher.update(ciphertext), decipher.final()]);

    return parseStructuredValue(removePkcs7Padding(padded));
  }
}
