import { asBatchId, type Identity } from "../types/brands";
import { requireAdmin, requireNotPaused } from "./access";
import { LifecycleError } from "./errors";
import { openCurrentBatch, withEntry } from "./state";
import type { ProtocolEnv, ProtocolEvent, ProtocolState, Transition } from "./types";

/**
 * Starts batch `currentBatchId + 1`. A still-open current batch is frozen
 * first so that at most one batch is ever open.
 */
export const openBatch = (s: ProtocolState, caller: Identity, env: ProtocolEnv): Transition => {
  requireAdmin(env.access, caller);
  requireNotPaused(env.access);

  const events: ProtocolEvent[] = [];
  let batches = s.batches;
  const prev = openCurrentBatch(s);
  if (prev) {
    batches = withEntry(batches, prev.id, { ...prev, isOpen: false });
    events.push({ type: "BatchClosed", batchId: prev.id });
  }

  const id = asBatchId(s.currentBatchId + 1n);
  batches = withEntry(batches, id, {
    id,
    isOpen: true,
    contributors: [],
    records: new Map(),
  });
  events.push({ type: "BatchOpened", batchId: id });

  return { next: { ...s, currentBatchId: id, batches }, events };
};

/** Freezes the current batch. Terminal: a closed batch never reopens. */
export const closeBatch = (s: ProtocolState, caller: Identity, env: ProtocolEnv): Transition => {
  requireAdmin(env.access, caller);
  requireNotPaused(env.access);

  const current = openCurrentBatch(s);
  if (!current)
    throw new LifecycleError(
      "InvalidBatchState",
      s.batches.size === 0 ? "no batch has been opened" : `batch ${s.currentBatchId} is already closed`,
    );

  return {
    next: { ...s, batches: withEntry(s.batches, current.id, { ...current, isOpen: false }) },
    events: [{ type: "BatchClosed", batchId: current.id }],
  };
};
