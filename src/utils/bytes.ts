import { bytesToHex as toHexBody, hexToBytes as fromHexBody } from "@noble/hashes/utils";

export type Hex = `0x${string}`;

export const bytesToHex = (bytes: Uint8Array): Hex => `0x${toHexBody(bytes)}`;

export const hexToBytes = (h: Hex): Uint8Array => fromHexBody(h.slice(2));

export const isHex = (s: unknown, bytes?: number): s is Hex =>
  typeof s === "string" &&
  (bytes === undefined
    ? /^0x([0-9a-fA-F]{2})*$/.test(s)
    : new RegExp(`^0x[0-9a-fA-F]{${bytes * 2}}$`).test(s));

/* big-endian minimal encoding, 0n -> empty (RLP canonical integer) */
export const bytesToBigInt = (b: Uint8Array): bigint =>
  b.length === 0 ? 0n : BigInt(bytesToHex(b));
