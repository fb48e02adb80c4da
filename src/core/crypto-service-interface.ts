/**
 * Keyed Crypto Service Interface
 * What consumers of the service depend on, so they can be handed a fake in tests
 */

import type {
  DataTypeLabel,
  EncryptionEnvelope,
  StructuredValue,
} from "../types/keyed-crypto";

export interface IKeyedCryptoService {
  /**
   * Deterministic keyed hash of a field
   */
  hash(text: string, dataType: DataTypeLabel): string;

  encrypt(plaintext: string, dataType: DataTypeLabel): EncryptionEnvelope;

  decrypt(envelope: EncryptionEnvelope, dataType: DataTypeLabel): string;

  /**
   * Decrypt from the three hex fields as they arrive over the wire
   */
  decryptHex(
    ciphertextHex: string,
    nonceHex: string,
    tagHex: string,
    dataType: DataTypeLabel
  ): string;

  /**
   * Decrypt an AES-256-CBC + PKCS#7 payload from the browser client
   */
  decryptLegacyCBC(
    ciphertextHex: string,
    ivHex: string,
    dataType: DataTypeLabel
  ): StructuredValue;
}
