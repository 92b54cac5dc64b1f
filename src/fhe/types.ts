import type { RequestId } from "../types/brands";
import type { Ciphertext, SealedCiphertext } from "../core/types";

/**
 * Homomorphic primitives. Implementations are pure with respect to their
 * operands: the same operation on the same handles yields the same handle.
 */
export interface FheBackend {
  encryptZero(): SealedCiphertext;
  isInitialized(ct: Ciphertext): ct is SealedCiphertext;
  add(a: Ciphertext, b: Ciphertext): Ciphertext;
  multiply(a: Ciphertext, b: Ciphertext): Ciphertext;
}

/**
 * Threshold decryption network. `requestDecryption` is fire-and-forget; the
 * result arrives later through the protocol's callback entry point.
 */
export interface DecryptionOracle {
  requestDecryption(cts: readonly Ciphertext[]): RequestId;
  verifyProof(requestId: RequestId, cleartexts: Uint8Array, proof: Uint8Array): boolean;
}

/** what the oracle hands back for one request */
export type DecryptionResponse = {
  requestId: RequestId;
  cleartexts: Uint8Array;
  proof: Uint8Array;
};
