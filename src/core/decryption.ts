import type { BatchId, Identity, RequestId } from "../types/brands";
import { decCleartexts } from "../codec/rlp";
import { requireNotPaused, requireOracle, requireProvider } from "./access";
import { aggregate } from "./aggregate";
import {
  ConsistencyError,
  LifecycleError,
  ProofError,
  ReplayError,
} from "./errors";
import { computeCommitment } from "./hash";
import { checkCooldown, withEntry } from "./state";
import type { ProtocolEnv, ProtocolState, Transition } from "./types";

/**
 * Commit phase. Aggregates a closed batch, binds the resulting ciphertext pair
 * to this deployment with a commitment and hands the pair to the oracle.
 */
export const requestBatchDecryption = (
  s: ProtocolState,
  caller: Identity,
  batchId: BatchId,
  env: ProtocolEnv,
): Transition => {
  requireProvider(env.access, caller);
  requireNotPaused(env.access);
  const now = env.now();
  checkCooldown(s.lastDecryptionRequest, caller, env.config.decryptionCooldown, now);

  const agg = aggregate(s, batchId, env.fhe);
  const commitment = computeCommitment(agg, env.config.instanceId);

  // The oracle call is the only side effect before the id check below. On a
  // reused id the oracle keeps a request this state never records, and its
  // eventual callback fails as UnknownRequest or against the older context.
  const requestId = env.oracle.requestDecryption([agg.totalSalary, agg.totalBonus]);
  if (s.decryptions.has(requestId))
    throw new LifecycleError("RequestIdReused", `oracle reissued request id ${requestId}`);

  return {
    next: {
      ...s,
      decryptions: withEntry(s.decryptions, requestId, {
        batchId,
        commitment,
        processed: false,
      }),
      lastDecryptionRequest: withEntry(s.lastDecryptionRequest, caller, now),
    },
    events: [{ type: "DecryptionRequested", requestId, batchId, commitment }],
  };
};

/**
 * Verify-and-finalize phase. Runs as its own entry point: nothing from the
 * request call is trusted except the stored context.
 *
 * Order matters: replay guard, commitment re-derivation against current state,
 * proof check, then finalize. Every failure leaves the context untouched.
 */
export const onDecryptionCallback = (
  s: ProtocolState,
  caller: Identity,
  requestId: RequestId,
  cleartexts: Uint8Array,
  proof: Uint8Array,
  env: ProtocolEnv,
): Transition => {
  requireOracle(env.access, caller);

  const ctx = s.decryptions.get(requestId);
  if (!ctx) throw new LifecycleError("UnknownRequest", `no decryption request ${requestId}`);
  if (ctx.processed)
    throw new ReplayError("ReplayAttempt", `decryption request ${requestId} already finalized`);

  const recomputed = computeCommitment(aggregate(s, ctx.batchId, env.fhe), env.config.instanceId);
  if (recomputed !== ctx.commitment)
    throw new ConsistencyError(
      "StateMismatch",
      `batch ${ctx.batchId} no longer matches commitment ${ctx.commitment}`,
    );

  if (!env.oracle.verifyProof(requestId, cleartexts, proof))
    throw new ProofError("ProofVerificationFailed", `proof rejected for request ${requestId}`);

  const totals = decCleartexts(cleartexts, 2);
  if (!totals)
    throw new ProofError("MalformedCleartexts", `cleartexts for request ${requestId} do not decode`);
  const [totalSalary, totalBonus] = totals;

  return {
    next: {
      ...s,
      decryptions: withEntry(s.decryptions, requestId, { ...ctx, processed: true }),
    },
    events: [
      {
        type: "DecryptionCompleted",
        requestId,
        batchId: ctx.batchId,
        totalSalary,
        totalBonus,
      },
    ],
  };
};
