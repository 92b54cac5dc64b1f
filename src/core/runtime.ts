import type { LevelWithSilent } from "pino";
import * as v from "valibot";
import { encInput } from "../codec/rlp";
import type { DecryptionOracle, FheBackend } from "../fhe/types";
import { type ILogger, makeLogger } from "../logging";
import { decryptionCallbackSchema } from "../model/validation";
import type { BatchId, Identity, RequestId } from "../types/brands";
import type { Hex } from "../utils/bytes";
import type { AccessControl } from "./access";
import { aggregate } from "./aggregate";
import { PayloadError, ProtocolError } from "./errors";
import { computeStateRoot, hashBytes } from "./hash";
import { applyCommand } from "./reducer";
import { genesis } from "./state";
import type {
  Aggregate,
  Batch,
  Ciphertext,
  DecryptionContext,
  EncryptedRecord,
  Input,
  ProtocolConfig,
  ProtocolEnv,
  ProtocolEvent,
  ProtocolState,
  Transition,
} from "./types";

/** one accepted transition and the state root it produced */
export type JournalEntry = {
  seq: number;
  timestamp: bigint;
  inputHash: Hex;
  root: Hex;
};

export type Listener = (e: ProtocolEvent) => void;

export type RuntimeOptions = {
  config: ProtocolConfig;
  access: AccessControl;
  fhe: FheBackend;
  oracle: DecryptionOracle;
  now?: () => bigint;
  logger?: ILogger;
  logLevel?: LevelWithSilent;
  state?: ProtocolState;
};

const unixSeconds = () => BigInt(Math.floor(Date.now() / 1000));

/* bigint is not JSON; keep log lines serializable */
const eventFields = (e: ProtocolEvent): Record<string, string> =>
  Object.fromEntries(
    Object.entries(e).map(([k, val]) => [k, typeof val === "string" ? val : String(val)]),
  );

/* ──────────── runtime shell ──────────── */
/**
 * Owns the protocol state and applies entry points one at a time. Every call
 * runs to completion synchronously, so no two transitions ever interleave.
 */
export class Runtime {
  private state: ProtocolState;
  private readonly env: ProtocolEnv;
  private readonly log: ILogger;
  private readonly entries: JournalEntry[] = [];
  private readonly listeners = new Set<Listener>();

  constructor(opts: RuntimeOptions) {
    this.state = opts.state ?? genesis();
    this.env = {
      access: opts.access,
      fhe: opts.fhe,
      oracle: opts.oracle,
      config: opts.config,
      now: opts.now ?? unixSeconds,
    };
    this.log = opts.logger ?? makeLogger(opts.logLevel ?? "info");
  }

  /* ---------- entry points ------------------------------------- */
  dispatch(input: Input): ProtocolEvent[] {
    let t: Transition;
    try {
      t = applyCommand(this.state, input, this.env);
    } catch (err) {
      if (err instanceof ProtocolError)
        this.log.warn({ caller: input.caller, cmd: input.cmd.type, code: err.code }, err.message);
      else this.log.error({ err, caller: input.caller, cmd: input.cmd.type }, "transition failed");
      throw err;
    }

    this.state = t.next;
    const entry: JournalEntry = {
      seq: this.entries.length + 1,
      timestamp: this.env.now(),
      inputHash: hashBytes(encInput(input)),
      root: computeStateRoot(t.next),
    };
    this.entries.push(entry);
    this.log.debug({ seq: entry.seq, root: entry.root }, "journal");

    for (const e of t.events) {
      this.log.info(eventFields(e), e.type);
      this.emit(e);
    }
    return t.events;
  }

  openBatch(caller: Identity): BatchId {
    this.dispatch({ caller, cmd: { type: "openBatch" } });
    return this.state.currentBatchId;
  }

  closeBatch(caller: Identity): void {
    this.dispatch({ caller, cmd: { type: "closeBatch" } });
  }

  submitContribution(
    caller: Identity,
    identity: Identity,
    salary: Ciphertext,
    score: Ciphertext,
  ): void {
    this.dispatch({ caller, cmd: { type: "submitContribution", identity, salary, score } });
  }

  requestBatchDecryption(caller: Identity, batchId: BatchId): RequestId {
    const events = this.dispatch({ caller, cmd: { type: "requestBatchDecryption", batchId } });
    for (const e of events) if (e.type === "DecryptionRequested") return e.requestId;
    throw new Error("decryption request emitted no DecryptionRequested event");
  }

  onDecryptionCallback(
    caller: Identity,
    requestId: RequestId,
    cleartexts: Uint8Array,
    proof: Uint8Array,
  ): { totalSalary: bigint; totalBonus: bigint } {
    const events = this.dispatch({
      caller,
      cmd: { type: "onDecryptionCallback", requestId, cleartexts, proof },
    });
    for (const e of events)
      if (e.type === "DecryptionCompleted")
        return { totalSalary: e.totalSalary, totalBonus: e.totalBonus };
    throw new Error("decryption callback emitted no DecryptionCompleted event");
  }

  /** Callback entry for payloads that arrive off the wire, not yet typed. */
  deliverCallback(caller: Identity, payload: unknown): { totalSalary: bigint; totalBonus: bigint } {
    const res = v.safeParse(decryptionCallbackSchema, payload);
    if (!res.success) {
      const why = res.issues.map((i) => `${v.getDotPath(i) ?? "payload"}: ${i.message}`).join("; ");
      this.log.warn({ caller, code: "MalformedPayload" }, why);
      throw new PayloadError("MalformedPayload", why);
    }
    const { requestId, cleartexts, proof } = res.output;
    return this.onDecryptionCallback(caller, requestId, cleartexts, proof);
  }

  /* ---------- events ------------------------------------------- */
  subscribe(fn: Listener): () => void {
    this.listeners.add(fn);
    return () => {
      this.listeners.delete(fn);
    };
  }

  private emit(e: ProtocolEvent): void {
    for (const fn of this.listeners) {
      try {
        fn(e);
      } catch (err) {
        // the transition is already committed; a listener cannot undo it
        this.log.error({ err, event: e.type }, "event listener threw");
      }
    }
  }

  /* ---------- reads -------------------------------------------- */
  get currentBatchId(): BatchId {
    return this.state.currentBatchId;
  }

  isAvailable(): boolean {
    return !this.env.access.isPaused();
  }

  getBatch(id: BatchId): Batch | undefined {
    return this.state.batches.get(id);
  }

  getRecord(identity: Identity): EncryptedRecord | undefined {
    return this.state.records.get(identity);
  }

  getDecryption(requestId: RequestId): DecryptionContext | undefined {
    return this.state.decryptions.get(requestId);
  }

  /** requests still waiting for a verified callback */
  pendingDecryptions(): [RequestId, DecryptionContext][] {
    return [...this.state.decryptions.entries()].filter(([, ctx]) => !ctx.processed);
  }

  aggregate(batchId: BatchId): Aggregate {
    return aggregate(this.state, batchId, this.env.fhe);
  }

  snapshot(): ProtocolState {
    return this.state;
  }

  stateRoot(): Hex {
    return computeStateRoot(this.state);
  }

  journal(): readonly JournalEntry[] {
    return this.entries;
  }
}
