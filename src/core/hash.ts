import { keccak_256 as keccak } from "@noble/hashes/sha3";
import { concatBytes } from "@noble/hashes/utils";
import { encCiphertexts, encProtocolState } from "../codec/rlp";
import { bytesToHex, hexToBytes, type Hex } from "../utils/bytes";
import type { Aggregate, ProtocolState } from "./types";

/* ── decryption commitment ───────────────────────────────── */
export const computeCommitment = (agg: Aggregate, instanceId: Hex): Hex =>
  bytesToHex(
    keccak(
      concatBytes(encCiphertexts([agg.totalSalary, agg.totalBonus]), hexToBytes(instanceId)),
    ),
  );

/* ── whole-state root, independent of Map insertion order ── */
export const computeStateRoot = (state: ProtocolState): Hex =>
  bytesToHex(keccak(encProtocolState(state)));

export const hashBytes = (b: Uint8Array): Hex => bytesToHex(keccak(b));
