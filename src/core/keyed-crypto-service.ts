/**
 * Keyed Crypto Service
 * Binds the key store to the hash engine, the AEAD cipher and the legacy
 * CBC decoder.
 *
 * Service Flow:
 * 1. create() waits for libsodium and validates every key (fail-fast)
 * 2. hash / encrypt / decrypt / decryptLegacyCBC run synchronously
 * 3. destroy() wipes the keys at process teardown
 */

import { ErrorUtils } from "../utils/error-handling";
import { initializeSodium } from "../utils/crypto";
import { defaultLogger, type ILogger } from "../utils/logger";

import { KeyedCryptoError } from "../types/errors";
import type {
  DataTypeLabel,
  EncryptionEnvelope,
  KeyMap,
  KeyedCryptoConfig,
  KeyedCryptoStatus,
  StructuredValue,
} from "../types/keyed-crypto";

import { AeadCipher } from "./aead-cipher";
import type { IKeyedCryptoService } from "./crypto-service-interface";
import { HashEngine } from "./hash-engine";
import { KeyStore } from "./key-store";
import { LegacyCbcDecoder } from "./legacy-cbc-decoder";

const SERVICE_NAME = "KeyedCryptoService";

export const DEFAULT_KEYED_CRYPTO_CONFIG: Readonly<KeyedCryptoConfig> =
  Object.freeze({
    strictHexInput: false,
    enableOperationLogging: false,
  });

export class KeyedCryptoService implements IKeyedCryptoService {
  private readonly hashEngine: HashEngine;
  private readonly aeadCipher: AeadCipher;
  private readonly legacyDecoder: LegacyCbcDecoder;
  private destroyed = false;

  private constructor(
    private readonly keyStore: KeyStore,
    private readonly config: KeyedCryptoConfig,
    private readonly logger: ILogger
  ) {
    const hexOptions = { strict: config.strictHexInput };
    this.hashEngine = new HashEngine(keyStore);
    this.aeadCipher = new AeadCipher(keyStore, hexOptions);
    this.legacyDecoder = new LegacyCbcDecoder(keyStore, hexOptions);
  }

  /**
   * Build a ready service. Rejects with INVALID_KEY_SIZE if any key is not
   * exactly 32 bytes; no partially valid service is returned.
   */
  public static async create(
    keys: KeyMap,
    config?: Partial<KeyedCryptoConfig>,
    logger: ILogger = defaultLogger
  ): Promise<KeyedCryptoService> {
    await initializeSodium();

    let keyStore: KeyStore;
    try {
      keyStore = KeyStore.fromKeyMap(keys);
    } catch (error) {
      ErrorUtils.handleError(
        error,
        ErrorUtils.createContext(SERVICE_NAME, "create", { severity: "critical" }),
        logger
      );
      throw error;
    }

    const service = new KeyedCryptoService(
      keyStore,
      {
        strictHexInput:
          config?.strictHexInput ?? DEFAULT_KEYED_CRYPTO_CONFIG.strictHexInput,
        enableOperationLogging:
          config?.enableOperationLogging ??
          DEFAULT_KEYED_CRYPTO_CONFIG.enableOperationLogging,
      },
      logger
    );
    logger.info("Keyed crypto service initialized", {
      keyCount: keyStore.size,
      dataTypes: keyStore.dataTypes(),
    });
    return service;
  }

  public hash(text: string, dataType: DataTypeLabel): string {
    return this.run("hash", dataType, () => this.hashEngine.hash(text, dataType));
  }

  public encrypt(plaintext: string, dataType: DataTypeLabel): EncryptionEnvelope {
    return this.run("encrypt", dataType, () =>
      this.aeadCipher.encrypt(plaintext, dataType)
    );
  }

  public decrypt(envelope: EncryptionEnvelope, dataType: DataTypeLabel): string {
    return this.run("decrypt", dataType, () =>
      this.aeadCipher.decrypt(envelope, dataType)
    );
  }

  public decryptHex(
    ciphertextHex: string,
    nonceHex: string,
    tagHex: string,
    dataType: DataTypeLabel
  ): string {
    return this.decrypt(
      { ciphertext: ciphertextHex, nonce: nonceHex, tag: tagHex },
      dataType
    );
  }

  public decryptLegacyCBC(
    ciphertextHex: string,
    ivHex: string,
    dataType: DataTypeLabel
  ): StructuredValue {
    return this.run("decryptLegacyCBC", dataType, () =>
      this.legacyDecoder.decryptLegacyCBC(ciphertextHex, ivHex, dataType)
    );
  }

  public hasKey(dataType: DataTypeLabel): boolean {
    return this.keyStore.has(dataType);
  }

  public dataTypes(): DataTypeLabel[] {
    return this.keyStore.dataTypes();
  }

  public getStatus(): KeyedCryptoStatus {
    return {
      destroyed: this.destroyed,
      keyCount: this.keyStore.size,
      dataTypes: this.keyStore.dataTypes(),
      config: { ...this.config },
    };
  }

  /**
   * Wipe all keys. Every later call fails with SERVICE_DESTROYED.
   */
  public destroy(): void {
    if (this.destroyed) {
      return;
    }
    this.keyStore.destroy();
    this.destroyed = true;
    this.logger.info("Keyed crypto service destroyed");
  }

  private run<T>(operation: string, dataType: DataTypeLabel, fn: () => T): T {
    try {
      if (this.destroyed) {
        throw new KeyedCryptoError("Keyed crypto service has been destroyed", {
          code: "SERVICE_DESTROYED",
        });
      }
      const result = fn();
      if (this.config.enableOperationLogging) {
        this.logger.debug(`${operation} completed`, { dataType });
      }
      return result;
    } catch (error) {
      ErrorUtils.handleError(
        error,
        ErrorUtils.createContext(SERVICE_NAME, operation, { dataType }),
        this.logger
      );
      throw error;
    }
  }
}
