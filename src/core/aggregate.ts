import type { BatchId } from "../types/brands";
import type { FheBackend } from "../fhe/types";
import { requireClosedBatch } from "./state";
import type { Aggregate, Ciphertext, ProtocolState } from "./types";

/**
 * Folds a closed batch into (Σ salary, Σ salary·score).
 *
 * Only the batch's own records are read, so a contributor's submission to a
 * later batch leaves this batch's totals alone. Operands are visited in
 * contributor insertion order and combined in a fixed shape, so re-running
 * against unchanged state reproduces the same handles. Absent or partially
 * initialized records are skipped.
 */
export const aggregate = (s: ProtocolState, batchId: BatchId, fhe: FheBackend): Aggregate => {
  const batch = requireClosedBatch(s, batchId);

  let totalSalary: Ciphertext = fhe.encryptZero();
  let totalBonus: Ciphertext = fhe.encryptZero();
  for (const who of batch.contributors) {
    const rec = batch.records.get(who);
    if (!rec || !fhe.isInitialized(rec.salary) || !fhe.isInitialized(rec.score)) continue;
    totalSalary = fhe.add(totalSalary, rec.salary);
    totalBonus = fhe.add(totalBonus, fhe.multiply(rec.salary, rec.score));
  }
  return { totalSalary, totalBonus };
};
