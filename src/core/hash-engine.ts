/**
 * Hash Engine
 * Deterministic keyed hashing of sensitive fields, one composition per label.
 */

import { KeyedCryptoError } from "../types/errors";
import type { DataTypeLabel, HashComposition } from "../types/keyed-crypto";
import type { KeyStore } from "./key-store";
import { applyComposition, compositionFor } from "./hash-compositions";

export class HashEngine {
  public constructor(private readonly keyStore: KeyStore) {}

  /**
   * Hash `text` with the composition and key bound to `dataType`.
   * Output is 128 hex chars for composition B and 64 for the others.
   */
  public hash(text: string, dataType: DataTypeLabel): string {
    const composition = compositionFor(dataType);
    if (!composition) {
      throw KeyedCryptoError.unknownDataType(dataType);
    }

    const key = this.keyStore.get(dataType);
    if (!key) {
      throw new KeyedCryptoError(`Missing key for data type: ${dataType}`, {
        code: "MISSING_KEY",
        details: { dataType },
      });
    }

    return applyComposition(composition, text, key);
  }

  public compositionFor(dataType: DataTypeLabel): HashComposition | undefined {
    return compositionFor(dataType);
  }
}
