/**
 * Keyed Crypto Constants
 * Single source of truth for key, nonce and block sizes
 */

/**
 * Sizes and algorithm names shared by the key store and the ciphers
 */
export const KEYED_CRYPTO_CONSTANTS = {
  KEY_SIZE: 32, // AES-256
  GCM_ALGORITHM: "aes-256-gcm",
  GCM_NONCE_SIZE: 16, // wider than the usual 12 bytes, fixed by the external backend
  GCM_TAG_SIZE: 16,
  CBC_ALGORITHM: "aes-256-cbc",
  CBC_BLOCK_SIZE: 16,
} as const;

/**
 * Environment variable read by the default logger
 */
export const LOG_LEVEL_ENV_VAR = "KEYED_CRYPTO_LOG_LEVEL";
