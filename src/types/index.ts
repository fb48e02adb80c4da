export type {
  DataTypeLabel,
  KeyMap,
  HashDataType,
  HashComposition,
  EncryptionEnvelope,
  WireEnvelope,
  JsonValue,
  StructuredValue,
  KeyedCryptoConfig,
  HexDecodeOptions,
  KeyedCryptoStatus,
} from "./keyed-crypto";

export type { ErrorContext, KeyedCryptoErrorCode } from "./errors";

export { ServiceError, KeyedCryptoError, isKeyedCryptoError } from "./errors";
