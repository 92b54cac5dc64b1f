import * as v from "valibot";
import { asRequestId } from "../types/brands";
import { hexToBytes, isHex, type Hex } from "../utils/bytes";

export const hexSchema = v.custom<Hex>((s) => isHex(s), "expected 0x-prefixed even-length hex");
export const bytesSchema = v.pipe(hexSchema, v.transform(hexToBytes));

export const requestIdSchema = v.pipe(
  v.union([
    v.pipe(v.string(), v.regex(/^[1-9]\d*$/, "expected a positive decimal request id")),
    v.pipe(v.bigint(), v.minValue(1n, "request id must be positive")),
  ]),
  v.transform((id) => asRequestId(BigInt(id))),
);

/** wire shape of an oracle callback before it is trusted with anything */
export const decryptionCallbackSchema = v.object({
  requestId: requestIdSchema,
  cleartexts: bytesSchema,
  proof: bytesSchema,
});

export type DecryptionCallbackPayload = v.InferInput<typeof decryptionCallbackSchema>;
