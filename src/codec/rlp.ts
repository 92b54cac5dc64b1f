// Canonical byte encodings, all RLP.

import { decode, encode, type Input, type NestedUint8Array } from "@ethereumjs/rlp";
import { utf8ToBytes } from "@noble/hashes/utils";
import type { Ciphertext, EncryptedRecord, Input as ProtocolInput, ProtocolState } from "../core/types";
import { bytesToBigInt, hexToBytes } from "../utils/bytes";

/* — helpers — */
const byKey = <K extends string | bigint, V>(m: ReadonlyMap<K, V>): [K, V][] =>
  [...m.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));

/** uninitialized encodes as the empty string so it can never collide with a handle */
const encCiphertext = (ct: Ciphertext): Uint8Array =>
  ct.kind === "sealed" ? hexToBytes(ct.handle) : new Uint8Array(0);

const encRecord = (r: EncryptedRecord): Input => [encCiphertext(r.salary), encCiphertext(r.score)];

/* — ciphertext list (commitment preimage) — */
export const encCiphertexts = (cts: readonly Ciphertext[]): Uint8Array =>
  encode(cts.map(encCiphertext));

/* — cleartexts — */
export const encCleartexts = (values: readonly bigint[]): Uint8Array => encode([...values]);

/**
 * Inverse of `encCleartexts`. Returns null on anything that is not a flat list
 * of canonical unsigned integers of the expected length.
 */
export const decCleartexts = (b: Uint8Array, expected: number): bigint[] | null => {
  let decoded: Uint8Array | NestedUint8Array;
  try {
    decoded = decode(b);
  } catch {
    return null; // not RLP at all
  }
  if (!Array.isArray(decoded) || decoded.length !== expected) return null;
  const out: bigint[] = [];
  for (const item of decoded) {
    if (!(item instanceof Uint8Array)) return null;
    if (item.length > 0 && item[0] === 0) return null; // leading zero, not canonical
    out.push(bytesToBigInt(item));
  }
  return out;
};

/* — toy backend handle preimage — */
export const encOperation = (op: string, operands: readonly Ciphertext[]): Uint8Array =>
  encode([utf8ToBytes(op), ...operands.map(encCiphertext)]);

/* — proof message — */
export const encProofMessage = (requestId: bigint, cleartexts: Uint8Array): Uint8Array =>
  encode([requestId, cleartexts]);

/* — entry-point input (journal) — */
export const encInput = ({ caller, cmd }: ProtocolInput): Uint8Array => {
  const head = [utf8ToBytes(caller), utf8ToBytes(cmd.type)];
  switch (cmd.type) {
    case "openBatch":
    case "closeBatch":
      return encode(head);
    case "submitContribution":
      return encode([
        ...head,
        utf8ToBytes(cmd.identity),
        encCiphertext(cmd.salary),
        encCiphertext(cmd.score),
      ]);
    case "requestBatchDecryption":
      return encode([...head, cmd.batchId]);
    case "onDecryptionCallback":
      return encode([...head, cmd.requestId, cmd.cleartexts, cmd.proof]);
  }
};

/* — whole state (journal root preimage) — */
export const encProtocolState = (s: ProtocolState): Uint8Array =>
  encode([
    s.currentBatchId,
    byKey(s.batches).map(([id, b]) => [
      id,
      b.isOpen ? 1 : 0,
      b.contributors.map((c) => utf8ToBytes(c)),
      byKey(b.records).map(([who, r]) => [utf8ToBytes(who), encRecord(r)]),
    ]),
    byKey(s.records).map(([who, r]) => [utf8ToBytes(who), encRecord(r)]),
    byKey(s.decryptions).map(([id, d]) => [
      id,
      d.batchId,
      hexToBytes(d.commitment),
      d.processed ? 1 : 0,
    ]),
    byKey(s.lastSubmission).map(([who, t]) => [utf8ToBytes(who), t]),
    byKey(s.lastDecryptionRequest).map(([who, t]) => [utf8ToBytes(who), t]),
  ]);
