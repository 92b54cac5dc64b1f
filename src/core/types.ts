import type { BatchId, Identity, RequestId, Seconds } from "../types/brands";
import type { DecryptionOracle, FheBackend } from "../fhe/types";
import type { Hex } from "../utils/bytes";
import type { AccessControl } from "./access";

export type { Hex };

/* ── opaque homomorphic value ────────────────────────────── */
export type Ciphertext =
  | { readonly kind: "uninitialized" }
  | { readonly kind: "sealed"; readonly handle: Hex };

export type SealedCiphertext = Extract<Ciphertext, { kind: "sealed" }>;

export const UNINITIALIZED: Ciphertext = { kind: "uninitialized" };

/* ── record store ────────────────────────────────────────── */
export type EncryptedRecord = {
  readonly salary: Ciphertext;
  readonly score: Ciphertext;
};

/* ── batch registry ──────────────────────────────────────── */
export type Batch = {
  readonly id: BatchId;
  readonly isOpen: boolean;
  /** insertion order; this is the aggregation operand order */
  readonly contributors: readonly Identity[];
  /** records as submitted to this batch; later batches never touch them */
  readonly records: ReadonlyMap<Identity, EncryptedRecord>;
};

/* ── pending decryption table ────────────────────────────── */
export type DecryptionContext = {
  readonly batchId: BatchId;
  readonly commitment: Hex;
  readonly processed: boolean;
};

export type ProtocolState = {
  /** 0 until the first batch is opened */
  readonly currentBatchId: BatchId;
  readonly batches: ReadonlyMap<BatchId, Batch>;
  /** latest record per identity, across batches */
  readonly records: ReadonlyMap<Identity, EncryptedRecord>;
  readonly decryptions: ReadonlyMap<RequestId, DecryptionContext>;
  readonly lastSubmission: ReadonlyMap<Identity, bigint>;
  readonly lastDecryptionRequest: ReadonlyMap<Identity, bigint>;
};

export type ProtocolConfig = {
  /** binds commitments to one deployment */
  readonly instanceId: Hex;
  readonly submissionCooldown: Seconds;
  readonly decryptionCooldown: Seconds;
};

/* ── entry points ────────────────────────────────────────── */
export type Command =
  | { type: "openBatch" }
  | { type: "closeBatch" }
  | {
      type: "submitContribution";
      identity: Identity;
      salary: Ciphertext;
      score: Ciphertext;
    }
  | { type: "requestBatchDecryption"; batchId: BatchId }
  | {
      type: "onDecryptionCallback";
      requestId: RequestId;
      cleartexts: Uint8Array;
      proof: Uint8Array;
    };

export type Input = { caller: Identity; cmd: Command };

/* ── emitted events ──────────────────────────────────────── */
export type ProtocolEvent =
  | { type: "BatchOpened"; batchId: BatchId }
  | { type: "BatchClosed"; batchId: BatchId }
  | {
      type: "ContributionSubmitted";
      identity: Identity;
      batchId: BatchId;
      salary: Hex;
      score: Hex;
    }
  | {
      type: "DecryptionRequested";
      requestId: RequestId;
      batchId: BatchId;
      commitment: Hex;
    }
  | {
      type: "DecryptionCompleted";
      requestId: RequestId;
      batchId: BatchId;
      totalSalary: bigint;
      totalBonus: bigint;
    };

export type Transition = {
  next: ProtocolState;
  events: ProtocolEvent[];
};

export type Aggregate = {
  totalSalary: Ciphertext;
  totalBonus: Ciphertext;
};

/* ── collaborators handed to every transition ────────────── */
export type ProtocolEnv = {
  access: AccessControl;
  fhe: FheBackend;
  oracle: DecryptionOracle;
  config: ProtocolConfig;
  /** unix seconds */
  now: () => bigint;
};
