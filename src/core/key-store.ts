/**
 * Key Store
 * Immutable mapping from data-type label to a 32-byte key, validated eagerly.
 */

import { KEYED_CRYPTO_CONSTANTS } from "../constants";
import { KeyedCryptoError } from "../types/errors";
import type { DataTypeLabel, KeyMap } from "../types/keyed-crypto";
import { wipe } from "../utils/crypto";

function isReadonlyMap(
  keys: KeyMap
): keys is ReadonlyMap<DataTypeLabel, Uint8Array> {
  return typeof keys.entries === "function";
}

function entriesOf(keys: KeyMap): Array<[DataTypeLabel, unknown]> {
  if (isReadonlyMap(keys)) {
    return Array.from(keys.entries());
  }
  return Object.entries(keys);
}

export class KeyStore {
  private readonly keys: Map<DataTypeLabel, Uint8Array>;

  private constructor(keys: Map<DataTypeLabel, Uint8Array>) {
    this.keys = keys;
  }

  /**
   * Validate every entry and copy the key bytes. The first invalid entry
   * fails the whole store.
   */
  public static fromKeyMap(keys: KeyMap): KeyStore {
    const validated = new Map<DataTypeLabel, Uint8Array>();

    for (const [dataType, key] of entriesOf(keys)) {
      if (!(key instanceof Uint8Array)) {
        throw new KeyedCryptoError(
          `Key for data type ${dataType} must be a Uint8Array`,
          {
            code: "INVALID_KEY_SIZE",
            details: {
              dataType,
              expected: KEYED_CRYPTO_CONSTANTS.KEY_SIZE,
              actual: null,
            },
          }
        );
      }
      if (key.length !== KEYED_CRYPTO_CONSTANTS.KEY_SIZE) {
        throw new KeyedCryptoError(
          `Invalid key size for data type ${dataType}: expected ${KEYED_CRYPTO_CONSTANTS.KEY_SIZE} bytes, got ${key.length}`,
          {
            code: "INVALID_KEY_SIZE",
            details: {
              dataType,
              expected: KEYED_CRYPTO_CONSTANTS.KEY_SIZE,
              actual: key.length,
            },
          }
        );
      }
      validated.set(dataType, Uint8Array.from(key));
    }

    return new KeyStore(validated);
  }

  /**
   * Copy of the key for the label, or undefined when none is registered.
   * The stored bytes never leave the store.
   */
  public get(dataType: DataTypeLabel): Uint8Array | undefined {
    const key = this.keys.get(dataType);
    return key ? Uint8Array.from(key) : undefined;
  }

  public has(dataType: DataTypeLabel): boolean {
    return this.keys.has(dataType);
  }

  public dataTypes(): DataTypeLabel[] {
    return Array.from(this.keys.keys()).sort();
  }

  public get size(): number {
    return this.keys.size;
  }

  /**
   * Zero every key and forget the labels. Process teardown only.
   */
  public destroy(): void {
    for (const key of this.keys.values()) {
      wipe(key);
    }
    this.keys.clear();
  }
}
