import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { AuthorizationError, LifecycleError, PausedError } from "../src/core/errors";
import { ADMIN, PROVIDER, mkHarness, run, thrown } from "./helpers/env";

describe("Batch lifecycle", () => {
  it("opens batch 1 first and emits BatchOpened", () => {
    const h = mkHarness();
    const events = run(h, ADMIN, { type: "openBatch" });

    expect(events).toEqual([{ type: "BatchOpened", batchId: 1n }]);
    expect(h.state.currentBatchId).toBe(1n);
    expect(h.state.batches.get(h.state.currentBatchId)).toEqual({
      id: 1n,
      isOpen: true,
      contributors: [],
      records: new Map(),
    });
  });

  it("closes the current batch exactly once", () => {
    const h = mkHarness();
    run(h, ADMIN, { type: "openBatch" });
    const events = run(h, ADMIN, { type: "closeBatch" });

    expect(events).toEqual([{ type: "BatchClosed", batchId: 1n }]);
    expect(h.state.batches.get(h.state.currentBatchId)?.isOpen).toBe(false);

    const err = thrown(() => run(h, ADMIN, { type: "closeBatch" }));
    expect(err).toBeInstanceOf(LifecycleError);
    expect(err).toMatchObject({ code: "InvalidBatchState" });
  });

  it("rejects close before any batch exists", () => {
    const h = mkHarness();
    expect(() => run(h, ADMIN, { type: "closeBatch" })).toThrow("no batch has been opened");
  });

  it("freezes a still-open batch when the next one opens", () => {
    const h = mkHarness();
    run(h, ADMIN, { type: "openBatch" });
    const events = run(h, ADMIN, { type: "openBatch" });

    expect(events).toEqual([
      { type: "BatchClosed", batchId: 1n },
      { type: "BatchOpened", batchId: 2n },
    ]);
    const open = [...h.state.batches.values()].filter((b) => b.isOpen);
    expect(open.map((b) => b.id)).toEqual([2n]);
  });

  it("requires the admin capability", () => {
    const h = mkHarness();
    expect(() => run(h, PROVIDER, { type: "openBatch" })).toThrow(AuthorizationError);
    run(h, ADMIN, { type: "openBatch" });
    expect(() => run(h, PROVIDER, { type: "closeBatch" })).toThrow(AuthorizationError);
  });

  it("is blocked while paused and leaves state untouched", () => {
    const h = mkHarness();
    run(h, ADMIN, { type: "openBatch" });
    const before = h.state;
    h.access.pause();

    expect(() => run(h, ADMIN, { type: "openBatch" })).toThrow(PausedError);
    expect(() => run(h, ADMIN, { type: "closeBatch" })).toThrow(PausedError);
    expect(h.state).toBe(before);

    h.access.unpause();
    expect(run(h, ADMIN, { type: "closeBatch" })).toEqual([{ type: "BatchClosed", batchId: 1n }]);
  });

  it("ids increase by one and a closed batch never reopens", () => {
    fc.assert(
      fc.property(fc.array(fc.boolean(), { minLength: 1, maxLength: 30 }), (ops) => {
        const h = mkHarness();
        const opened: bigint[] = [];
        const seenClosed = new Set<bigint>();

        for (const open of ops) {
          if (open) {
            run(h, ADMIN, { type: "openBatch" });
            opened.push(h.state.currentBatchId);
          } else {
            try {
              run(h, ADMIN, { type: "closeBatch" });
            } catch (err) {
              if (!(err instanceof LifecycleError)) throw err;
            }
          }
          for (const b of h.state.batches.values()) {
            if (seenClosed.has(b.id)) expect(b.isOpen).toBe(false);
            if (!b.isOpen) seenClosed.add(b.id);
          }
        }

        opened.forEach((id, i) => expect(id).toBe(BigInt(i + 1)));
      }),
    );
  });
});
