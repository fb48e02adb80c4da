/**
 * Basic Usage Example for keyed-field-crypto
 *
 * This example demonstrates how to:
 * 1. Create the service from a key map
 * 2. Hash a field for lookups
 * 3. Encrypt and decrypt a field
 * 4. Decrypt a payload sent by the browser client
 */

import { createCipheriv, randomBytes } from "node:crypto";

import {
  KeyedCryptoService,
  defaultLogger,
  isKeyedCryptoError,
  toWireEnvelope,
} from "../src/index";

async function main(): Promise<void> {
  // Keys normally come from a secret store; random ones keep the example self-contained
  const keys = {
    USER_EMAIL: randomBytes(32),
    API_KEY: randomBytes(32),
    FRONT_KEY_1: randomBytes(32),
  };

  const service = await KeyedCryptoService.create(
    keys,
    { enableOperationLogging: true },
    defaultLogger
  );

  const emailHash = service.hash("user@example.com", "USER_EMAIL");
  console.log("Email hash:", emailHash);

  const envelope = service.encrypt("user@example.com", "USER_EMAIL");
  console.log("Stored envelope:", JSON.stringify(toWireEnvelope(envelope)));
  console.log("Decrypted:", service.decrypt(envelope, "USER_EMAIL"));

  // What the browser client sends: AES-256-CBC with PKCS#7 padding, hex encoded
  const iv = randomBytes(16);
  const client = createCipheriv("aes-256-cbc", keys.FRONT_KEY_1, iv);
  const payloadHex = Buffer.concat([
    client.update(JSON.stringify({ userId: 42, action: "login" }), "utf8"),
    client.final(),
  ]).toString("hex");

  const payload = service.decryptLegacyCBC(payloadHex, iv.toString("hex"), "FRONT_KEY_1");
  console.log("Legacy payload:", payload);

  try {
    service.hash("anything", "NOT_A_FIELD");
  } catch (error) {
    if (isKeyedCryptoError(error, "UNKNOWN_DATA_TYPE")) {
      console.log("Rejected unknown data type");
    } else {
      throw error;
    }
  }

  service.destroy();
}

main().catch((error: unknown) => {
  console.error("Example failed:", error);
  process.exitCode = 1;
});
