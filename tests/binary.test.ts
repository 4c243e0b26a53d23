import { describe, expect, it } from "vitest";

import {
  DecodeError,
  decodeCbor,
  encodeCbor,
  readClockTable,
  Reader,
  ts,
  writeClockTable,
  Writer,
} from "../src/internals";

function bytesOf(write: (writer: Writer) => void): number[] {
  const writer = new Writer(4);
  write(writer);
  return [...writer.flush()];
}

function decodeFailure(run: () => unknown): { reason: string; path: string } | undefined {
  try {
    run();
  } catch (error) {
    if (error instanceof DecodeError) {
      return { reason: error.reason, path: error.path };
    }
    throw error;
  }
  return undefined;
}

describe("vu57", () => {
  it("writes seven bits per byte with a continuation flag", () => {
    expect(bytesOf((w) => w.vu57(0))).toEqual([0x00]);
    expect(bytesOf((w) => w.vu57(127))).toEqual([0x7f]);
    expect(bytesOf((w) => w.vu57(128))).toEqual([0x80, 0x01]);
    expect(bytesOf((w) => w.vu57(300))).toEqual([0xac, 0x02]);
  });

  it("round-trips values across every byte width", () => {
    const values = [0, 1, 127, 128, 16_383, 16_384, 2 ** 21, 2 ** 28 + 5, 2 ** 35, 2 ** 49 - 1];
    values.push(2 ** 49, 2 ** 52 + 3, Number.MAX_SAFE_INTEGER);
    for (const value of values) {
      const reader = new Reader(new Uint8Array(bytesOf((w) => w.vu57(value))));
      expect(reader.vu57()).toBe(value);
      expect(reader.remaining).toBe(0);
    }
  });

  it("uses a full terminator byte after seven groups", () => {
    const bytes = bytesOf((w) => w.vu57(Number.MAX_SAFE_INTEGER));
    expect(bytes).toEqual([0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0x0f]);
  });

  it("rejects values beyond the safe-integer range", () => {
    const reader = new Reader(new Uint8Array([0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff]));
    expect(decodeFailure(() => reader.vu57())).toEqual({ reason: "OVERFLOW", path: "@0" });
  });

  it("fails on truncated input", () => {
    const reader = new Reader(new Uint8Array([0x80]));
    expect(decodeFailure(() => reader.vu57())).toEqual({ reason: "OVERFLOW", path: "@1" });
  });
});

describe("b1vu56", () => {
  it("keeps the flag in the top bit", () => {
    expect(bytesOf((w) => w.b1vu56(1, 5))).toEqual([0x85]);
    expect(bytesOf((w) => w.b1vu56(0, 63))).toEqual([0x3f]);
    expect(bytesOf((w) => w.b1vu56(0, 64))).toEqual([0x40, 0x01]);
    expect(bytesOf((w) => w.b1vu56(1, 64))).toEqual([0xc0, 0x01]);
  });

  it("round-trips flag and value", () => {
    const values = [0, 5, 63, 64, 8_191, 8_192, 2 ** 20, 2 ** 34 + 9, 2 ** 48, Number.MAX_SAFE_INTEGER];
    for (const flag of [0, 1] as const) {
      for (const value of values) {
        const reader = new Reader(new Uint8Array(bytesOf((w) => w.b1vu56(flag, value))));
        expect(reader.b1vu56()).toEqual([flag, value]);
        expect(reader.remaining).toBe(0);
      }
    }
  });
});

describe("reader and writer", () => {
  it("writes big-endian u32 and patches it in place", () => {
    const writer = new Writer(2);
    writer.u32(0);
    writer.u8(0x11);
    writer.patchU32(0, 0xdeadbeef);
    const bytes = writer.flush();
    expect([...bytes]).toEqual([0xde, 0xad, 0xbe, 0xef, 0x11]);
    expect(new Reader(bytes).u32()).toBe(0xdeadbeef);
  });

  it("prefixes text with its UTF-8 byte length", () => {
    expect(bytesOf((w) => w.utf8("é"))).toEqual([0x02, 0xc3, 0xa9]);
    expect(new Reader(new Uint8Array([0x02, 0xc3, 0xa9])).utf8()).toBe("é");
  });

  it("rejects malformed UTF-8", () => {
    const reader = new Reader(new Uint8Array([0x01, 0xff]));
    expect(decodeFailure(() => reader.utf8())).toEqual({ reason: "INVALID_UTF8", path: "@1" });
  });

  it("reports unread bytes", () => {
    const reader = new Reader(new Uint8Array([0x01, 0x02]));
    reader.u8();
    expect(decodeFailure(() => reader.assertEnd())).toEqual({
      reason: "TRAILING_BYTES",
      path: "@1",
    });
  });

  it("refuses to read past the end", () => {
    const reader = new Reader(new Uint8Array([0x01, 0x02]));
    expect(decodeFailure(() => reader.bytes(3))).toEqual({ reason: "OVERFLOW", path: "@0" });
  });
});

describe("clock table", () => {
  it("writes a count followed by sid and time per row", () => {
    const bytes = bytesOf((w) => writeClockTable(w, [ts(5, 3), ts(7, 200)]));
    expect(bytes).toEqual([0x02, 0x05, 0x03, 0x07, 0xc8, 0x01]);
    expect(readClockTable(new Reader(new Uint8Array(bytes)))).toEqual([ts(5, 3), ts(7, 200)]);
  });

  it("rejects empty and truncated tables", () => {
    expect(decodeFailure(() => readClockTable(new Reader(new Uint8Array([0x00]))))).toEqual({
      reason: "INVALID_CLOCK_TABLE",
      path: "@0",
    });
    expect(
      decodeFailure(() => readClockTable(new Reader(new Uint8Array([0x02, 0x05, 0x03, 0x07])))),
    ).toEqual({ reason: "INVALID_CLOCK_TABLE", path: "@0" });
  });
});

describe("cbor", () => {
  it("round-trips constants", () => {
    expect([...encodeCbor(7)]).toEqual([0x07]);
    expect(decodeCbor(encodeCbor(null))).toBeNull();
    expect(decodeCbor(encodeCbor(undefined))).toBeUndefined();
    expect(decodeCbor(encodeCbor({ a: [1, "x", true] }))).toEqual({ a: [1, "x", true] });
    expect(decodeCbor(encodeCbor(new Uint8Array([1, 2])))).toEqual(new Uint8Array([1, 2]));
  });

  it("rejects trailing data", () => {
    expect(decodeFailure(() => decodeCbor(new Uint8Array([0x01, 0x01]), "@3"))).toEqual({
      reason: "INVALID_CBOR",
      path: "@3",
    });
  });

  it("rejects values outside the constant domain", () => {
    // half-precision infinity
    expect(decodeFailure(() => decodeCbor(new Uint8Array([0xf9, 0x7c, 0x00])))).toEqual({
      reason: "INVALID_CBOR",
      path: "@0",
    });
  });

  it("writes items without a length prefix", () => {
    expect(bytesOf((w) => w.cbor(42))).toEqual([0x18, 0x2a]);
    expect(bytesOf((w) => w.cbor(undefined))).toEqual([0xf7]);
    expect(bytesOf((w) => w.cbor("k"))).toEqual([0x61, 0x6b]);
  });

  it("reads one item and stops at its end", () => {
    const reader = new Reader(
      new Uint8Array([0x18, 0x2a, 0xa1, 0x61, 0x61, 0x82, 0x01, 0x61, 0x78, 0x09]),
    );
    expect(reader.cbor()).toBe(42);
    expect(reader.pos).toBe(2);
    expect(reader.cbor()).toEqual({ a: [1, "x"] });
    expect(reader.pos).toBe(9);
    expect(reader.u8()).toBe(0x09);
  });

  it("reads indefinite-length items up to their break", () => {
    const reader = new Reader(new Uint8Array([0x9f, 0x01, 0x02, 0xff, 0x07]));
    expect(reader.cbor()).toEqual([1, 2]);
    expect(reader.pos).toBe(4);
  });

  it("rejects truncated items", () => {
    const reader = new Reader(new Uint8Array([0x05, 0x82, 0x01]), 1);
    expect(decodeFailure(() => reader.cbor())).toEqual({ reason: "INVALID_CBOR", path: "@1" });
    expect(decodeFailure(() => new Reader(new Uint8Array([0x62, 0x61])).cbor())).toEqual({
      reason: "INVALID_CBOR",
      path: "@0",
    });
  });

  it("reads object keys as text strings", () => {
    expect(new Reader(new Uint8Array([0x61, 0x6b])).cborText()).toBe("k");
    expect(decodeFailure(() => new Reader(new Uint8Array([0x01])).cborText())).toEqual({
      reason: "INVALID_CBOR",
      path: "@0",
    });
  });
});
