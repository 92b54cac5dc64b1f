import { closeBatch, openBatch } from "./batch";
import { onDecryptionCallback, requestBatchDecryption } from "./decryption";
import { submitContribution } from "./ledger";
import type { Input, ProtocolEnv, ProtocolState, Transition } from "./types";

/* ── command-level reducer ───────────────────────────────── */
/**
 * Applies one entry point to the state. Pure apart from the oracle request
 * issued by `requestBatchDecryption`; throws a `ProtocolError` without
 * producing any state when a precondition fails.
 */
export const applyCommand = (s: ProtocolState, input: Input, env: ProtocolEnv): Transition => {
  const { caller, cmd } = input;
  switch (cmd.type) {
    /* ---------- batch lifecycle ---------------------------------- */
    case "openBatch":
      return openBatch(s, caller, env);
    case "closeBatch":
      return closeBatch(s, caller, env);

    /* ---------- record store ------------------------------------- */
    case "submitContribution":
      return submitContribution(s, caller, cmd.identity, cmd.salary, cmd.score, env);

    /* ---------- decryption handshake ----------------------------- */
    case "requestBatchDecryption":
      return requestBatchDecryption(s, caller, cmd.batchId, env);
    case "onDecryptionCallback":
      return onDecryptionCallback(s, caller, cmd.requestId, cmd.cleartexts, cmd.proof, env);
  }
};
