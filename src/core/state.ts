import { asBatchId, type BatchId, type Identity } from "../types/brands";
import { LifecycleError, RateLimitError } from "./errors";
import type { Batch, ProtocolState } from "./types";

export const genesis = (): ProtocolState => ({
  currentBatchId: asBatchId(0n),
  batches: new Map(),
  records: new Map(),
  decryptions: new Map(),
  lastSubmission: new Map(),
  lastDecryptionRequest: new Map(),
});

/** The current batch, only if it is still accepting contributions. */
export const openCurrentBatch = (s: ProtocolState): Batch | undefined => {
  const b = s.batches.get(s.currentBatchId);
  return b?.isOpen ? b : undefined;
};

export const requireClosedBatch = (s: ProtocolState, id: BatchId): Batch => {
  const b = s.batches.get(id);
  if (!b) throw new LifecycleError("InvalidBatch", `batch ${id} does not exist`);
  if (b.isOpen) throw new LifecycleError("InvalidBatch", `batch ${id} is still open`);
  return b;
};

/**
 * Fails (never waits) when `now < last + cooldown`. An identity with no
 * recorded timestamp is never throttled.
 */
export const checkCooldown = (
  last: ReadonlyMap<Identity, bigint>,
  who: Identity,
  cooldown: bigint,
  now: bigint,
): void => {
  const prev = last.get(who);
  if (prev === undefined) return;
  const retryAt = prev + cooldown;
  if (now < retryAt) throw new RateLimitError(retryAt);
};

export const withEntry = <K, V>(m: ReadonlyMap<K, V>, k: K, v: V): Map<K, V> =>
  new Map(m).set(k, v);
