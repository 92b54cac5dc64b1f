import type { AppConfig } from "./config";
import { RoleRegistry } from "./core/access";
import { Runtime } from "./core/runtime";
import { ToyDecryptionOracle, ToyFhe } from "./fhe/toy";
import type { ILogger } from "./logging";
import { asIdentity, type BatchId, type RequestId } from "./types/brands";
import { bytesToHex } from "./utils/bytes";

export const DEMO_ADMIN = asIdentity("demo-admin");
export const DEMO_PROVIDER = asIdentity("demo-provider");
export const DEMO_ORACLE = asIdentity("demo-oracle");

/** (identity, salary, score) rows of the two-contributor payroll */
const ROWS = [
  [asIdentity("alice"), 1000n, 80n],
  [asIdentity("bob"), 2000n, 50n],
] as const;

export type DemoResult = {
  batchId: BatchId;
  requestId: RequestId;
  totalSalary: bigint;
  totalBonus: bigint;
  root: string;
};

/**
 * One full payroll round against the in-process backend: open, two
 * contributions, close, request, oracle answer, verified callback.
 *
 * Time is simulated and starts at `start`; the provider's clock moves forward
 * by the submission cooldown between contributions.
 */
export const runDemo = (
  cfg: AppConfig,
  opts: { logger?: ILogger; start?: bigint } = {},
): DemoResult => {
  let t = opts.start ?? BigInt(Math.floor(Date.now() / 1000));
  const fhe = new ToyFhe();
  const oracle = new ToyDecryptionOracle(fhe);
  const rt = new Runtime({
    config: cfg.protocol,
    access: new RoleRegistry({
      admin: [DEMO_ADMIN],
      provider: [DEMO_PROVIDER],
      oracle: [DEMO_ORACLE],
    }),
    fhe,
    oracle,
    now: () => t,
    logger: opts.logger,
    logLevel: cfg.logLevel,
  });

  const batchId = rt.openBatch(DEMO_ADMIN);
  for (const [who, salary, score] of ROWS) {
    rt.submitContribution(DEMO_PROVIDER, who, fhe.encrypt(salary), fhe.encrypt(score));
    t += cfg.protocol.submissionCooldown;
  }
  rt.closeBatch(DEMO_ADMIN);

  const requestId = rt.requestBatchDecryption(DEMO_PROVIDER, batchId);
  const res = oracle.fulfil(requestId);
  // the answer travels as an untyped payload, as it would off the wire
  const totals = rt.deliverCallback(DEMO_ORACLE, {
    requestId: requestId.toString(),
    cleartexts: bytesToHex(res.cleartexts),
    proof: bytesToHex(res.proof),
  });

  return { batchId, requestId, ...totals, root: rt.stateRoot() };
};
