import type { Identity } from "../types/brands";
import { requireNotPaused, requireProvider } from "./access";
import { DuplicateError, LifecycleError } from "./errors";
import { checkCooldown, openCurrentBatch, withEntry } from "./state";
import type {
  Ciphertext,
  EncryptedRecord,
  ProtocolEnv,
  ProtocolState,
  SealedCiphertext,
  Transition,
} from "./types";

/**
 * Uninitialized inputs become an encrypted zero, the additive identity of the
 * aggregate, so a stored record is always fully initialized.
 */
const seal = (env: ProtocolEnv, ct: Ciphertext): SealedCiphertext =>
  env.fhe.isInitialized(ct) ? ct : env.fhe.encryptZero();

export const submitContribution = (
  s: ProtocolState,
  caller: Identity,
  identity: Identity,
  salaryCt: Ciphertext,
  scoreCt: Ciphertext,
  env: ProtocolEnv,
): Transition => {
  requireProvider(env.access, caller);
  requireNotPaused(env.access);
  const now = env.now();
  checkCooldown(s.lastSubmission, caller, env.config.submissionCooldown, now);

  const batch = openCurrentBatch(s);
  if (!batch) throw new LifecycleError("InvalidBatch", "no batch is open for contributions");
  if (batch.contributors.includes(identity))
    throw new DuplicateError(
      "DuplicateContribution",
      `${identity} already contributed to batch ${batch.id}`,
    );

  const salary = seal(env, salaryCt);
  const score = seal(env, scoreCt);
  const record: EncryptedRecord = { salary, score };

  return {
    next: {
      ...s,
      records: withEntry(s.records, identity, record),
      batches: withEntry(s.batches, batch.id, {
        ...batch,
        contributors: [...batch.contributors, identity],
        records: withEntry(batch.records, identity, record),
      }),
      lastSubmission: withEntry(s.lastSubmission, caller, now),
    },
    events: [
      {
        type: "ContributionSubmitted",
        identity,
        batchId: batch.id,
        salary: salary.handle,
        score: score.handle,
      },
    ],
  };
};
