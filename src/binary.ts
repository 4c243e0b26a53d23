import type { PackValue, SessionId, Timestamp } from "./types";

import { decodeCborItem, encodeCbor } from "./cbor";
import { ts } from "./clock";
import { DecodeError, fail } from "./errors";

const utf8Encoder = new TextEncoder();
const utf8Decoder = new TextDecoder("utf-8", { fatal: true });

/** Growable byte buffer with the varint encodings shared by every binary codec. */
export class Writer {
  private buf: Uint8Array;
  private pos = 0;

  constructor(capacity = 256) {
    this.buf = new Uint8Array(capacity);
  }

  get length(): number {
    return this.pos;
  }

  u8(value: number): void {
    this.ensure(1);
    this.buf[this.pos++] = value & 0xff;
  }

  /** Big-endian unsigned 32-bit integer. */
  u32(value: number): void {
    this.ensure(4);
    this.buf[this.pos++] = (value >>> 24) & 0xff;
    this.buf[this.pos++] = (value >>> 16) & 0xff;
    this.buf[this.pos++] = (value >>> 8) & 0xff;
    this.buf[this.pos++] = value & 0xff;
  }

  /** Overwrite four bytes at `offset` with a big-endian integer. */
  patchU32(offset: number, value: number): void {
    this.buf[offset] = (value >>> 24) & 0xff;
    this.buf[offset + 1] = (value >>> 16) & 0xff;
    this.buf[offset + 2] = (value >>> 8) & 0xff;
    this.buf[offset + 3] = value & 0xff;
  }

  bytes(data: Uint8Array): void {
    this.ensure(data.length);
    this.buf.set(data, this.pos);
    this.pos += data.length;
  }

  /**
   * Variable-length unsigned integer of up to 57 bits: seven 7-bit groups with
   * a continuation bit, then one terminator byte carrying the last 8 bits.
   */
  vu57(value: number): void {
    let rest = value;
    for (let i = 0; i < 7; i++) {
      const low = rest % 0x80;
      rest = Math.floor(rest / 0x80);
      if (rest === 0) {
        this.u8(low);
        return;
      }
      this.u8(low | 0x80);
    }
    this.u8(rest % 0x100);
  }

  /**
   * Flag bit plus a 56-bit magnitude: bit 7 of the first byte is `flag`,
   * bit 6 the continuation, bits 0-5 the lowest magnitude bits.
   */
  b1vu56(flag: 0 | 1, value: number): void {
    const low6 = value % 0x40;
    let rest = Math.floor(value / 0x40);
    const first = (flag << 7) | low6;
    if (rest === 0) {
      this.u8(first);
      return;
    }

    this.u8(first | 0x40);
    for (let i = 0; i < 6; i++) {
      const low = rest % 0x80;
      rest = Math.floor(rest / 0x80);
      if (rest === 0) {
        this.u8(low);
        return;
      }
      this.u8(low | 0x80);
    }
    this.u8(rest % 0x100);
  }

  /** UTF-8 text preceded by its `vu57` byte length. */
  utf8(text: string): void {
    const data = utf8Encoder.encode(text);
    this.vu57(data.length);
    this.bytes(data);
  }

  /** One raw CBOR item; `undefined` is the single byte `0xf7`. */
  cbor(value: PackValue): void {
    this.bytes(encodeCbor(value));
  }

  flush(): Uint8Array {
    const out = this.buf.slice(0, this.pos);
    this.pos = 0;
    return out;
  }

  private ensure(size: number): void {
    if (this.pos + size <= this.buf.length) {
      return;
    }

    let capacity = this.buf.length * 2;
    while (capacity < this.pos + size) {
      capacity *= 2;
    }
    const next = new Uint8Array(capacity);
    next.set(this.buf.subarray(0, this.pos));
    this.buf = next;
  }
}

/** Cursor over a byte array; every read past the end raises `DecodeError("OVERFLOW")`. */
export class Reader {
  readonly data: Uint8Array;
  pos: number;

  constructor(data: Uint8Array, pos = 0) {
    this.data = data;
    this.pos = pos;
  }

  get remaining(): number {
    return this.data.length - this.pos;
  }

  /** Current offset formatted for error paths. */
  at(): string {
    return `@${this.pos}`;
  }

  u8(): number {
    const value = this.data[this.pos];
    if (value === undefined) {
      fail("OVERFLOW", this.at(), "unexpected end of input");
    }
    this.pos++;
    return value;
  }

  peek(): number | undefined {
    return this.data[this.pos];
  }

  u32(): number {
    const b0 = this.u8();
    const b1 = this.u8();
    const b2 = this.u8();
    const b3 = this.u8();
    return ((b0 << 24) | (b1 << 16) | (b2 << 8) | b3) >>> 0;
  }

  bytes(length: number): Uint8Array {
    if (length > this.remaining) {
      fail("OVERFLOW", this.at(), `expected ${length} bytes, ${this.remaining} left`);
    }

    const out = this.data.slice(this.pos, this.pos + length);
    this.pos += length;
    return out;
  }

  vu57(): number {
    const start = this.at();
    let result = 0;
    let scale = 1;
    for (let i = 0; i < 7; i++) {
      const byte = this.u8();
      result += (byte & 0x7f) * scale;
      if ((byte & 0x80) === 0) {
        return checkSafe(result, start);
      }
      scale *= 0x80;
    }

    result += this.u8() * scale;
    return checkSafe(result, start);
  }

  b1vu56(): [0 | 1, number] {
    const start = this.at();
    const first = this.u8();
    const flag: 0 | 1 = (first & 0x80) === 0 ? 0 : 1;
    let result = first & 0x3f;
    if ((first & 0x40) === 0) {
      return [flag, result];
    }

    let scale = 0x40;
    for (let i = 0; i < 6; i++) {
      const byte = this.u8();
      result += (byte & 0x7f) * scale;
      if ((byte & 0x80) === 0) {
        return [flag, checkSafe(result, start)];
      }
      scale *= 0x80;
    }

    result += this.u8() * scale;
    return [flag, checkSafe(result, start)];
  }

  utf8(): string {
    const length = this.vu57();
    return this.text(length);
  }

  /** Decode `length` bytes as strict UTF-8. */
  text(length: number): string {
    const at = this.at();
    const data = this.bytes(length);
    try {
      return utf8Decoder.decode(data);
    } catch {
      fail("INVALID_UTF8", at, "invalid UTF-8 sequence");
    }
  }

  cbor(): PackValue {
    const [value, end] = decodeCborItem(this.data, this.pos);
    this.pos = end;
    return value;
  }

  /** A CBOR text string, as written for object keys. */
  cborText(): string {
    const at = this.at();
    const value = this.cbor();
    if (typeof value !== "string") {
      fail("INVALID_CBOR", at, "expected a CBOR text string");
    }

    return value;
  }

  /** Fail with `TRAILING_BYTES` unless the whole input has been consumed. */
  assertEnd(): void {
    if (this.remaining !== 0) {
      fail("TRAILING_BYTES", this.at(), `${this.remaining} unexpected trailing bytes`);
    }
  }
}

function checkSafe(value: number, at: string): number {
  if (!Number.isSafeInteger(value)) {
    fail("OVERFLOW", at, "varint exceeds the safe integer range");
  }

  return value;
}

// ---

/** One clock-table row: the base time of a session. */
export type ClockTableRow = Timestamp;

export function writeClockTable(writer: Writer, rows: ClockTableRow[]): void {
  writer.vu57(rows.length);
  for (const row of rows) {
    writer.vu57(row.sid);
    writer.vu57(row.time);
  }
}

/** Read a clock table; it must hold at least one complete row. */
export function readClockTable(reader: Reader): ClockTableRow[] {
  const at = reader.at();
  const length = readTableInt(reader, at);
  if (length === 0) {
    fail("INVALID_CLOCK_TABLE", at, "clock table must not be empty");
  }

  const rows: ClockTableRow[] = [];
  for (let i = 0; i < length; i++) {
    const sid: SessionId = readTableInt(reader, at);
    const time = readTableInt(reader, at);
    rows.push(ts(sid, time));
  }

  return rows;
}

function readTableInt(reader: Reader, at: string): number {
  try {
    return reader.vu57();
  } catch (error) {
    if (error instanceof DecodeError) {
      fail("INVALID_CLOCK_TABLE", at, "truncated clock table");
    }

    throw error;
  }
}
