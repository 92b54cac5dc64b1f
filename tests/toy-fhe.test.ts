import { describe, it, expect } from "vitest";
import { decCleartexts } from "../src/codec/rlp";
import { UNINITIALIZED } from "../src/core/types";
import { ToyDecryptionOracle, ToyFhe } from "../src/fhe/toy";
import { asRequestId } from "../src/types/brands";

describe("Toy FHE backend", () => {
  it("adds and multiplies under encryption, wrapping at 2^64", () => {
    const fhe = new ToyFhe();
    const a = fhe.encrypt(2n ** 64n - 1n);
    const b = fhe.encrypt(3n);
    expect(fhe.reveal(fhe.add(a, b))).toBe(2n);
    expect(fhe.reveal(fhe.multiply(b, b))).toBe(9n);
    expect(() => fhe.encrypt(2n ** 64n)).toThrow(RangeError);
    expect(() => fhe.encrypt(-1n)).toThrow(RangeError);
  });

  it("derives identical handles for identical operations", () => {
    const fhe = new ToyFhe();
    const a = fhe.encrypt(5n);
    const b = fhe.encrypt(5n);
    expect(a).not.toEqual(b);
    expect(fhe.add(a, b)).toEqual(fhe.add(a, b));
    expect(fhe.add(a, b)).not.toEqual(fhe.add(b, a));
  });

  it("refuses uninitialized operands", () => {
    const fhe = new ToyFhe();
    expect(fhe.isInitialized(UNINITIALIZED)).toBe(false);
    expect(() => fhe.add(UNINITIALIZED, fhe.encryptZero())).toThrow("operand is not initialized");
  });
});

describe("Toy decryption oracle", () => {
  it("issues sequential ids and signs what it decrypts", () => {
    const fhe = new ToyFhe();
    const oracle = new ToyDecryptionOracle(fhe);
    const id = oracle.requestDecryption([fhe.encrypt(11n), fhe.encrypt(22n)]);
    expect(id).toBe(1n);
    expect(oracle.requestDecryption([fhe.encryptZero()])).toBe(2n);

    const res = oracle.fulfil(id);
    expect(decCleartexts(res.cleartexts, 2)).toEqual([11n, 22n]);
    expect(oracle.verifyProof(id, res.cleartexts, res.proof)).toBe(true);
    expect(oracle.verifyProof(asRequestId(2n), res.cleartexts, res.proof)).toBe(false);
    expect(oracle.verifyProof(id, res.cleartexts, new Uint8Array([1, 2, 3]))).toBe(false);
    expect(oracle.pending()).toEqual([2n]);
    expect(() => oracle.fulfil(id)).toThrow("unknown request 1");
  });

  it("rejects proofs from a different key", () => {
    const fhe = new ToyFhe();
    const honest = new ToyDecryptionOracle(fhe);
    const rogue = new ToyDecryptionOracle(fhe);
    const id = honest.requestDecryption([fhe.encrypt(1n)]);
    const res = honest.fulfil(id);
    expect(honest.verifyProof(id, res.cleartexts, rogue.sign(id, res.cleartexts))).toBe(false);
  });
});
