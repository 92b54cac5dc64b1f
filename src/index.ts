export * from "./core/types";
export * from "./core/errors";
export { RoleRegistry, type AccessControl, type Role } from "./core/access";
export { applyCommand } from "./core/reducer";
export { aggregate } from "./core/aggregate";
export { openBatch, closeBatch } from "./core/batch";
export { submitContribution } from "./core/ledger";
export { requestBatchDecryption, onDecryptionCallback } from "./core/decryption";
export { computeCommitment, computeStateRoot } from "./core/hash";
export { genesis } from "./core/state";
export { Runtime, type JournalEntry, type Listener, type RuntimeOptions } from "./core/runtime";
export type { DecryptionOracle, DecryptionResponse, FheBackend } from "./fhe/types";
export { ToyDecryptionOracle, ToyFhe } from "./fhe/toy";
export { encCleartexts, decCleartexts } from "./codec/rlp";
export { decryptionCallbackSchema, type DecryptionCallbackPayload } from "./model/validation";
export { loadConfig, type AppConfig } from "./config";
export { runDemo, type DemoResult } from "./demo";
export { makeLogger, type ILogger } from "./logging";
export * from "./types/brands";
