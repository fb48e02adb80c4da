/**
 * KeyStore Tests
 */

import { describe, it, expect, jest } from "@jest/globals";
import sodium from "libsodium-wrappers-sumo";

import { HashEngine } from "../../src/core/hash-engine";
import { KeyStore } from "../../src/core/key-store";
import { KeyedCryptoError } from "../../src/types/errors";
import {
  TEST_KEY_EMPTY,
  TEST_KEY_SEQUENTIAL,
  TEST_KEY_SHORT,
  TEST_KEY_STEP3,
} from "../fixtures/test-keys";
import { HASH_VECTORS } from "../fixtures/test-data";

function captureError(fn: () => unknown): KeyedCryptoError {
  try {
    fn();
  } catch (error) {
    if (error instanceof KeyedCryptoError) {
      return error;
    }
    throw error;
  }
  throw new Error("Expected a KeyedCryptoError");
}

describe("KeyStore", () => {
  describe("fromKeyMap", () => {
    it("should accept 32-byte keys from a record", () => {
      const store = KeyStore.fromKeyMap({
        A: TEST_KEY_STEP3,
        B: TEST_KEY_SEQUENTIAL,
      });
      expect(store.size).toBe(2);
      expect(store.get("A")).toEqual(TEST_KEY_STEP3);
      expect(store.get("B")).toEqual(TEST_KEY_SEQUENTIAL);
    });

    it("should accept keys from a Map", () => {
      const store = KeyStore.fromKeyMap(new Map([["USER_EMAIL", TEST_KEY_STEP3]]));
      expect(store.has("USER_EMAIL")).toBe(true);
    });

    it("should accept any ReadonlyMap, not only Map", () => {
      const backing = new Map([["USER_NAME", TEST_KEY_STEP3]]);
      const view: ReadonlyMap<string, Uint8Array> = {
        get size() {
          return backing.size;
        },
        get: (key) => backing.get(key),
        has: (key) => backing.has(key),
        forEach: (callback) => {
          backing.forEach((value, key) => callback(value, key, view));
        },
        entries: () => backing.entries(),
        keys: () => backing.keys(),
        values: () => backing.values(),
        [Symbol.iterator]: () => backing.entries(),
      };

      const store = KeyStore.fromKeyMap(view);
      expect(store.dataTypes()).toEqual(["USER_NAME"]);
      expect(store.get("USER_NAME")).toEqual(TEST_KEY_STEP3);
    });

    it("should accept Buffer keys", () => {
      const store = KeyStore.fromKeyMap({ A: Buffer.alloc(32, 7) });
      expect(store.get("A")).toEqual(new Uint8Array(32).fill(7));
    });

    it("should accept an empty map", () => {
      expect(KeyStore.fromKeyMap({}).size).toBe(0);
    });

    it("should reject a 5-byte key with INVALID_KEY_SIZE", () => {
      const error = captureError(() => KeyStore.fromKeyMap({ SHORT: TEST_KEY_SHORT }));
      expect(error.code).toBe("INVALID_KEY_SIZE");
      expect(error.details).toEqual({ dataType: "SHORT", expected: 32, actual: 5 });
    });

    it("should reject an empty key with INVALID_KEY_SIZE", () => {
      const error = captureError(() => KeyStore.fromKeyMap({ EMPTY: TEST_KEY_EMPTY }));
      expect(error.code).toBe("INVALID_KEY_SIZE");
      expect(error.details).toEqual({ dataType: "EMPTY", expected: 32, actual: 0 });
    });

    it("should reject a 33-byte key", () => {
      const error = captureError(() =>
        KeyStore.fromKeyMap({ LONG: new Uint8Array(33) })
      );
      expect(error.code).toBe("INVALID_KEY_SIZE");
    });

    it("should reject the whole map when one entry is invalid", () => {
      const error = captureError(() =>
        KeyStore.fromKeyMap({
          GOOD: TEST_KEY_STEP3,
          BAD: TEST_KEY_SHORT,
          ALSO_GOOD: TEST_KEY_SEQUENTIAL,
        })
      );
      expect(error.details?.dataType).toBe("BAD");
    });

    it("should reject key material that is not a byte array", () => {
      const error = captureError(() =>
        KeyStore.fromKeyMap(JSON.parse('{"TEXT":"00000000000000000000000000000000"}'))
      );
      expect(error.code).toBe("INVALID_KEY_SIZE");
      expect(error.details).toEqual({ dataType: "TEXT", expected: 32, actual: null });
    });

    it("should copy keys so caller mutation has no effect", () => {
      const key = new Uint8Array(TEST_KEY_STEP3);
      const store = KeyStore.fromKeyMap({ A: key });
      key.fill(0xff);
      expect(store.get("A")).toEqual(TEST_KEY_STEP3);
    });
  });

  describe("lookup", () => {
    const store = KeyStore.fromKeyMap({ ZED: TEST_KEY_STEP3, ALPHA: TEST_KEY_SEQUENTIAL });

    it("should return undefined for an unregistered label", () => {
      expect(store.get("MISSING")).toBeUndefined();
      expect(store.has("MISSING")).toBe(false);
    });

    it("should list data types sorted", () => {
      expect(store.dataTypes()).toEqual(["ALPHA", "ZED"]);
    });

    it("should hand out copies so stored keys cannot be changed", () => {
      const keys = KeyStore.fromKeyMap({ USER_NAME: TEST_KEY_STEP3 });
      keys.get("USER_NAME")?.fill(9);

      expect(keys.get("USER_NAME")).toEqual(TEST_KEY_STEP3);
      expect(new HashEngine(keys).hash("Alice", "USER_NAME")).toBe(
        HASH_VECTORS.A.aliceStep3
      );
    });
  });

  describe("destroy", () => {
    it("should zero keys and forget labels", () => {
      const memzero = jest.spyOn(sodium, "memzero");
      try {
        const store = KeyStore.fromKeyMap({ A: TEST_KEY_STEP3 });
        store.destroy();

        expect(memzero).toHaveBeenCalledTimes(1);
        expect(memzero.mock.calls[0]?.[0]).toEqual(new Uint8Array(32));
        expect(store.get("A")).toBeUndefined();
        expect(store.size).toBe(0);
      } finally {
        memzero.mockRestore();
      }
    });
  });
});
