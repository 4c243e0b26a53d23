import type { DecodeOptions, Patch } from "../types";

import { decodeCbor, encodeCbor } from "../cbor";
import { tryDecode, type TryDecodeResult } from "../errors";
import { decodeCompact, encodeCompact } from "./compact";

/** The compact patch, CBOR-encoded. */
export function encodeCompactBinary(patch: Patch): Uint8Array {
  return encodeCbor(encodeCompact(patch));
}

export function decodeCompactBinary(bytes: Uint8Array, options?: DecodeOptions): Patch {
  return decodeCompact(decodeCbor(bytes), options);
}

export function tryDecodeCompactBinary(
  bytes: Uint8Array,
  options?: DecodeOptions,
): TryDecodeResult<Patch> {
  return tryDecode(() => decodeCompactBinary(bytes, options));
}
