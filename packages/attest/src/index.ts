export type { SignerIdentity } from "./signing.js";
export {
  ED25519_PUBLIC_KEY_HEX,
  ED25519_SIGNATURE_B64,
  ADDRESS_PREFIX,
  SIGNER_ADDRESS,
  addressFromPublicKey,
  deriveSeed,
  verifyEd25519,
} from "./signing.js";

export type { KeyManager } from "./key-manager.js";
export { LocalKeyManager, withSignTimeout } from "./key-manager.js";

export type { AttestationBundle } from "./bundle.js";
export { AttestationBundleSchema, SignerIdentitySchema, SignatureSchema, DigestSchema, parseBundle } from "./bundle.js";

export type { Attestor, AttestorOptions } from "./attestor.js";
export { createAttestor } from "./attestor.js";

export type { Verifier, VerifierOptions, VerificationResult, VerificationCode, MismatchReason } from "./verifier.js";
export { createVerifier, verifySignedBytes, requireSigner } from "./verifier.js";

export type { AttestationStore } from "./store.js";
export { DEFAULT_LIST_LIMIT } from "./store.js";
export { InMemoryAttestationStore } from "./in-memory-store.js";
export { SqliteAttestationStore } from "./sqlite-store.js";

export type { DecisionProducer, WaterSample, UseCase } from "./producer/producer.js";
export { USE_CASES, WaterSampleSchema } from "./producer/producer.js";
export type { ReferenceTable, Analyte, ReferenceRangeProducerOptions } from "./producer/reference-range.js";
export {
  DEFAULT_REFERENCE_TABLE,
  ReferenceTableSchema,
  assessReading,
  createReferenceRangeProducer,
  sampleSubject,
} from "./producer/reference-range.js";

export type { WatersealConfig } from "./config.js";
export { loadConfig } from "./config.js";

export type { LogLevel, LogEntry, LogHandler, Logger } from "./log.js";
export { LOG_LEVELS, createLogger, logger, setLogHandler, setLogLevel } from "./log.js";

export { KeyUnavailableError, ConfigError, WatersealError, InvalidDecisionError, UnknownSchemeError } from "./errors.js";

export type { AppContext, AppContextOptions, RunningServer } from "./server.js";
export { SERVICE_NAME, SERVICE_VERSION, createApp, createAppContext, startServer } from "./server.js";
