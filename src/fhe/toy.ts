import { bls12_381 as bls } from "@noble/curves/bls12-381";
import { keccak_256 as keccak } from "@noble/hashes/sha3";
import { randomBytes } from "@noble/hashes/utils";
import { encCleartexts, encOperation, encProofMessage } from "../codec/rlp";
import type { Ciphertext, SealedCiphertext } from "../core/types";
import { asRequestId, type RequestId } from "../types/brands";
import { bytesToHex, type Hex } from "../utils/bytes";
import type { DecryptionOracle, DecryptionResponse, FheBackend } from "./types";

const U64 = 2n ** 64n;

/**
 * In-process stand-in for an FHE coprocessor over unsigned 64-bit integers.
 *
 * Handles are opaque 32-byte values; the plaintext behind each one lives in a
 * shadow table only this object and its oracle can read. Derived handles are
 * `keccak256(rlp([op, lhs, rhs]))`, so identical operation sequences produce
 * identical handles.
 */
export class ToyFhe implements FheBackend {
  private readonly plaintexts = new Map<Hex, bigint>();

  /** fresh, unlinkable ciphertext */
  encrypt(value: bigint): SealedCiphertext {
    if (value < 0n || value >= U64) throw new RangeError(`${value} is not a uint64`);
    const handle = bytesToHex(randomBytes(32));
    this.plaintexts.set(handle, value);
    return { kind: "sealed", handle };
  }

  encryptZero(): SealedCiphertext {
    return this.derive("zero", [], 0n);
  }

  isInitialized(ct: Ciphertext): ct is SealedCiphertext {
    return ct.kind === "sealed";
  }

  add(a: Ciphertext, b: Ciphertext): Ciphertext {
    return this.derive("add", [a, b], (this.read(a) + this.read(b)) % U64);
  }

  multiply(a: Ciphertext, b: Ciphertext): Ciphertext {
    return this.derive("mul", [a, b], (this.read(a) * this.read(b)) % U64);
  }

  /** oracle-side access to the shadow table */
  reveal(ct: Ciphertext): bigint {
    return this.read(ct);
  }

  private read(ct: Ciphertext): bigint {
    if (ct.kind !== "sealed") throw new TypeError("operand is not initialized");
    const v = this.plaintexts.get(ct.handle);
    if (v === undefined) throw new TypeError(`unknown handle ${ct.handle}`);
    return v;
  }

  private derive(op: string, operands: Ciphertext[], value: bigint): SealedCiphertext {
    const handle = bytesToHex(keccak(encOperation(op, operands)));
    this.plaintexts.set(handle, value);
    return { kind: "sealed", handle };
  }
}

/**
 * Decryption network stand-in. Request ids count up from 1. A response's
 * proof is a BLS12-381 signature over `keccak256(rlp([requestId, cleartexts]))`.
 */
export class ToyDecryptionOracle implements DecryptionOracle {
  readonly publicKey: Uint8Array;
  private readonly secretKey: Uint8Array;
  private readonly requests = new Map<RequestId, SealedCiphertext[]>();
  private nextId = 1n;

  constructor(
    private readonly fhe: ToyFhe,
    secretKey: Uint8Array = bls.utils.randomPrivateKey(),
  ) {
    this.secretKey = secretKey;
    this.publicKey = bls.getPublicKey(secretKey);
  }

  requestDecryption(cts: readonly Ciphertext[]): RequestId {
    const sealed: SealedCiphertext[] = [];
    for (const ct of cts) {
      if (!this.fhe.isInitialized(ct)) throw new TypeError("cannot decrypt an uninitialized ciphertext");
      sealed.push(ct);
    }
    const id = asRequestId(this.nextId++);
    this.requests.set(id, sealed);
    return id;
  }

  /** ids that have been requested but not yet answered */
  pending(): RequestId[] {
    return [...this.requests.keys()];
  }

  /** Decrypts and signs one outstanding request. */
  fulfil(requestId: RequestId): DecryptionResponse {
    const cts = this.requests.get(requestId);
    if (!cts) throw new Error(`unknown request ${requestId}`);
    this.requests.delete(requestId);
    const cleartexts = encCleartexts(cts.map((ct) => this.fhe.reveal(ct)));
    return { requestId, cleartexts, proof: this.sign(requestId, cleartexts) };
  }

  /** Signs arbitrary cleartexts, as a compromised or buggy node would. */
  sign(requestId: RequestId, cleartexts: Uint8Array): Uint8Array {
    return bls.sign(keccak(encProofMessage(requestId, cleartexts)), this.secretKey);
  }

  verifyProof(requestId: RequestId, cleartexts: Uint8Array, proof: Uint8Array): boolean {
    try {
      return bls.verify(proof, keccak(encProofMessage(requestId, cleartexts)), this.publicKey);
    } catch {
      // malformed signature or point encoding
      return false;
    }
  }
}
