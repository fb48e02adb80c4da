/**
 * AEAD Cipher
 * AES-256-GCM with a 16-byte nonce. Ciphertext, nonce and tag travel as
 * separate lowercase hex fields.
 */

import { createCipheriv, createDecipheriv } from "node:crypto";

import { KEYED_CRYPTO_CONSTANTS } from "../constants";
import { KeyedCryptoError } from "../types/errors";
import type {
  DataTypeLabel,
  EncryptionEnvelope,
  HexDecodeOptions,
  WireEnvelope,
} from "../types/keyed-crypto";
import { fromHex, generateRandomBytes, toHex } from "../utils/crypto";
import type { KeyStore } from "./key-store";

const { GCM_ALGORITHM, GCM_NONCE_SIZE, GCM_TAG_SIZE } = KEYED_CRYPTO_CONSTANTS;

export class AeadCipher {
  public constructor(
    private readonly keyStore: KeyStore,
    private readonly hexOptions: HexDecodeOptions = {}
  ) {}

  public encrypt(plaintext: string, dataType: DataTypeLabel): EncryptionEnvelope {
    const key = this.requireKey(dataType);
    const nonce = generateRandomBytes(GCM_NONCE_SIZE);

    const cipher = createCipheriv(GCM_ALGORITHM, key, nonce, {
      authTagLength: GCM_TAG_SIZE,
    });
    const ciphertext = Buffer.concat([
      cipher.update(plaintext, "utf8"),
      cipher.final(),
    ]);
    const tag = cipher.getAuthTag();

    return {
      ciphertext: toHex(ciphertext),
      nonce: toHex(nonce),
      tag: toHex(tag),
    };
  }

  /**
   * Open an envelope. Every authentication failure is reported as the same
   * DECRYPTION_FAILED error.
   */
  public decrypt(envelope: EncryptionEnvelope, dataType: DataTypeLabel): string {
    const key = this.requireKey(dataType);

    const ciphertext = fromHex(envelope.ciphertext, "ciphertext", this.hexOptions);
    const nonce = fromHex(envelope.nonce, "nonce", this.hexOptions);
    const tag = fromHex(envelope.tag, "tag", this.hexOptions);

    if (nonce.length !== GCM_NONCE_SIZE) {
      throw new KeyedCryptoError(
        `Invalid nonce size: expected ${GCM_NONCE_SIZE}, got ${nonce.length}`,
        {
          code: "INVALID_NONCE_SIZE",
          details: { expected: GCM_NONCE_SIZE, actual: nonce.length },
        }
      );
    }
    if (tag.length !== GCM_TAG_SIZE) {
      throw KeyedCryptoError.decryptionFailed();
    }

    let plaintext: Buffer;
    try {
      const decipher = createDecipheriv(GCM_ALGORITHM, key, nonce, {
        authTagLength: GCM_TAG_SIZE,
      });
      decipher.setAuthTag(tag);
      plaintext = Buffer.concat([decipher.update(ciphertext), decipher.final()]);
    } catch {
      throw KeyedCryptoError.decryptionFailed();
    }

    return plaintext.toString("utf8");
  }

  private requireKey(dataType: DataTypeLabel): Uint8Array {
    const key = this.keyStore.get(dataType);
    if (!key) {
      throw KeyedCryptoError.unknownDataType(dataType);
    }
    return key;
  }
}

export function toWireEnvelope(envelope: EncryptionEnvelope): WireEnvelope {
  return {
    encrypted: envelope.ciphertext,
    iv: envelope.nonce,
    authTag: envelope.tag,
  };
}

export function fromWireEnvelope(wire: WireEnvelope): EncryptionEnvelope {
  return {
    ciphertext: wire.encrypted,
    nonce: wire.iv,
    tag: wire.authTag,
  };
}
