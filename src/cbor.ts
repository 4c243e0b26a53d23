import { Encoder } from "cbor-x";

import type { PackValue } from "./types";

import { DecodeError, fail } from "./errors";
import { readPackValue } from "./pack-value";

// Plain maps, untagged byte strings: the encoding depends only on the value.
const codec = new Encoder({
  useRecords: false,
  mapsAsObjects: true,
  tagUint8Array: false,
  variableMapSize: true,
});

export function encodeCbor(value: PackValue): Uint8Array {
  // The encoder hands out views of a shared scratch buffer.
  return new Uint8Array(codec.encode(value));
}

/**
 * Decode exactly one CBOR item. Structurally invalid input, trailing data and
 * values outside the constant domain raise `DecodeError("INVALID_CBOR")`.
 */
export function decodeCbor(bytes: Uint8Array, path = "@0"): PackValue {
  let raw: unknown;
  try {
    raw = codec.decode(bytes);
  } catch (error) {
    fail("INVALID_CBOR", path, `invalid CBOR: ${describeError(error)}`);
  }

  try {
    return readPackValue(raw, "");
  } catch (error) {
    if (error instanceof DecodeError) {
      fail("INVALID_CBOR", path, `unsupported CBOR value: ${error.message}`);
    }

    throw error;
  }
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Decode the single CBOR item starting at `start`, which may be followed by
 * other data. Returns the value and the offset just past the item.
 */
export function decodeCborItem(bytes: Uint8Array, start: number): [PackValue, number] {
  const path = `@${start}`;
  const end = cborItemEnd(bytes, start, path);
  return [decodeCbor(bytes.subarray(start, end), path), end];
}

const BREAK = 0xff;

/** Items still owed per open container; `-1` marks an indefinite-length one. */
function cborItemEnd(bytes: Uint8Array, start: number, path: string): number {
  let pos = start;
  const owed: number[] = [1];
  while (owed.length > 0) {
    const top = owed.length - 1;
    const left = owed[top]!;
    if (left === 0) {
      owed.pop();
      continue;
    }

    const head = bytes[pos];
    if (head === undefined) {
      fail("INVALID_CBOR", path, "truncated CBOR item");
    }
    pos++;
    if (head === BREAK) {
      if (left !== -1) {
        fail("INVALID_CBOR", path, "unexpected CBOR break");
      }
      owed.pop();
      continue;
    }
    if (left > 0) {
      owed[top] = left - 1;
    }

    const major = head >> 5;
    const info = head & 0x1f;
    if (info === 31) {
      if (major < 2 || major > 5) {
        fail("INVALID_CBOR", path, `invalid indefinite length for major type ${major}`);
      }
      owed.push(-1);
      continue;
    }
    if (info > 27) {
      fail("INVALID_CBOR", path, `reserved CBOR additional info ${info}`);
    }

    let arg = info;
    if (info >= 24) {
      const size = 1 << (info - 24);
      if (pos + size > bytes.length) {
        fail("INVALID_CBOR", path, "truncated CBOR item");
      }
      arg = 0;
      for (let i = 0; i < size; i++) {
        arg = arg * 0x100 + bytes[pos + i]!;
      }
      pos += size;
    }

    switch (major) {
      case 2:
      case 3:
        if (arg > bytes.length - pos) {
          fail("INVALID_CBOR", path, "truncated CBOR item");
        }
        pos += arg;
        break;
      case 4:
        owed.push(arg);
        break;
      case 5:
        owed.push(arg * 2);
        break;
      case 6:
        owed.push(1);
        break;
    }
  }

  return pos;
}
