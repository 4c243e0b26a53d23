import createDebug from "debug";

import type {
  DecodeOptions,
  Op,
  Patch,
  PatchPayload,
  SessionId,
  Timespan,
  Timestamp,
} from "../types";

import { Reader, Writer } from "../binary";
import { ORIGIN, ts } from "../clock";
import { DecodeError, fail, tryDecode, type TryDecodeResult } from "../errors";
import { OPCODE, opNameFromCode } from "../operations";
import { readPackValue } from "../pack-value";
import { patchId } from "../patch";
import { builderForPatch, replay } from "./shared";

const log = createDebug("json-crdt:codec");

const JSON_OBJECT_START = 0x7b;

const utf8 = new TextEncoder();

/**
 * Encode a patch into the binary wire format.
 *
 * Layout: `vu57 sid`, `vu57 time`, meta as one CBOR item (`undefined`, byte
 * `0xf7`, for none), `vu57` op count, then one record per operation. A record
 * starts with `opcode << 3 | len`; lengths above 7 are written as a following
 * `vu57`. Constants and object keys are raw CBOR items.
 */
export function encodeBinary(patch: Patch): Uint8Array {
  const writer = new Writer();
  const id = patchId(patch) ?? ORIGIN;
  writer.vu57(id.sid);
  writer.vu57(id.time);
  writer.cbor(patch.meta);
  writer.vu57(patch.ops.length);
  for (const op of patch.ops) {
    writeOp(writer, op, id.sid);
  }

  return writer.flush();
}

function writeId(writer: Writer, id: Timestamp, sid: SessionId): void {
  if (id.sid === sid) {
    writer.b1vu56(0, id.time);
    return;
  }

  writer.b1vu56(1, id.time);
  writer.vu57(id.sid);
}

function writeHeader(writer: Writer, code: number, len: number): void {
  if (len >= 1 && len <= 7) {
    writer.u8((code << 3) | len);
    return;
  }

  writer.u8(code << 3);
  writer.vu57(len);
}

function writeOp(writer: Writer, op: Op, sid: SessionId): void {
  const code = OPCODE[op.kind];
  switch (op.kind) {
    case "new_con":
      if (op.data.type === "ref") {
        writer.u8((code << 3) | 1);
        writeId(writer, op.data.ref, sid);
      } else {
        writer.u8(code << 3);
        writer.cbor(op.data.value);
      }
      return;
    case "new_val":
    case "new_obj":
    case "new_vec":
    case "new_str":
    case "new_bin":
    case "new_arr":
      writer.u8(code << 3);
      return;
    case "ins_val":
      writer.u8(code << 3);
      writeId(writer, op.obj, sid);
      writeId(writer, op.value, sid);
      return;
    case "ins_obj":
      writeHeader(writer, code, op.entries.length);
      writeId(writer, op.obj, sid);
      for (const [key, value] of op.entries) {
        writer.cbor(key);
        writeId(writer, value, sid);
      }
      return;
    case "ins_vec":
      writeHeader(writer, code, op.entries.length);
      writeId(writer, op.obj, sid);
      for (const [index, value] of op.entries) {
        writer.u8(index);
        writeId(writer, value, sid);
      }
      return;
    case "ins_str": {
      const data = utf8.encode(op.data);
      writeHeader(writer, code, data.length);
      writeId(writer, op.obj, sid);
      writeId(writer, op.after, sid);
      writer.bytes(data);
      return;
    }
    case "ins_bin":
      writeHeader(writer, code, op.data.length);
      writeId(writer, op.obj, sid);
      writeId(writer, op.after, sid);
      writer.bytes(op.data);
      return;
    case "ins_arr":
      writeHeader(writer, code, op.data.length);
      writeId(writer, op.obj, sid);
      writeId(writer, op.after, sid);
      for (const item of op.data) {
        writeId(writer, item, sid);
      }
      return;
    case "upd_arr":
      writer.u8(code << 3);
      writeId(writer, op.obj, sid);
      writeId(writer, op.ref, sid);
      writeId(writer, op.value, sid);
      return;
    case "del":
      writeHeader(writer, code, op.what.length);
      writeId(writer, op.obj, sid);
      for (const span of op.what) {
        writeId(writer, span, sid);
        writer.vu57(span.span);
      }
      return;
    case "nop":
      writeHeader(writer, code, op.len);
      return;
  }
}

/**
 * Decode a binary patch. Unknown opcodes, truncated input, invalid UTF-8 or
 * CBOR and trailing bytes raise `DecodeError` with an `@offset` path.
 */
export function decodeBinary(bytes: Uint8Array, options: DecodeOptions = {}): Patch {
  const reader = new Reader(bytes);
  const sid = reader.vu57();
  const time = reader.vu57();
  const meta = readPackValue(reader.cbor(), "/meta", options.maxDepth);
  const count = reader.vu57();
  if (count === 0) {
    reader.assertEnd();
    return meta === undefined ? { ops: [] } : { ops: [], meta };
  }

  const builder = builderForPatch(ts(sid, time), "@0");
  const readOpId = (): Timestamp => {
    const [explicit, opTime] = reader.b1vu56();
    return explicit === 1 ? ts(reader.vu57(), opTime) : ts(sid, opTime);
  };

  for (let i = 0; i < count; i++) {
    const at = reader.at();
    const octet = reader.u8();
    const code = octet >> 3;
    const low = octet & 0b111;
    const name = opNameFromCode(code);
    if (!name) {
      fail("UNKNOWN_OPCODE", at, `unknown opcode ${code}`);
    }

    const length = (): number => (low !== 0 ? low : reader.vu57());
    const noLength = (): void => {
      if (low !== 0) {
        fail("INVALID_SHAPE", at, `${name} takes no length`);
      }
    };

    switch (name) {
      case "new_con":
        if (low === 1) {
          const ref = readOpId();
          replay(at, () => builder.conRef(ref));
        } else if (low === 0) {
          const value = readPackValue(reader.cbor(), at, options.maxDepth);
          replay(at, () => builder.con(value));
        } else {
          fail("INVALID_SHAPE", at, "malformed new_con");
        }
        break;
      case "new_val":
        noLength();
        replay(at, () => builder.val());
        break;
      case "new_obj":
        noLength();
        replay(at, () => builder.obj());
        break;
      case "new_vec":
        noLength();
        replay(at, () => builder.vec());
        break;
      case "new_str":
        noLength();
        replay(at, () => builder.str());
        break;
      case "new_bin":
        noLength();
        replay(at, () => builder.bin());
        break;
      case "new_arr":
        noLength();
        replay(at, () => builder.arr());
        break;
      case "ins_val": {
        noLength();
        const obj = readOpId();
        const value = readOpId();
        replay(at, () => builder.setVal(obj, value));
        break;
      }
      case "ins_obj": {
        const n = length();
        const obj = readOpId();
        const entries: Array<[string, Timestamp]> = [];
        for (let j = 0; j < n; j++) {
          const key = reader.cborText();
          entries.push([key, readOpId()]);
        }
        replay(at, () => builder.insObj(obj, entries));
        break;
      }
      case "ins_vec": {
        const n = length();
        const obj = readOpId();
        const entries: Array<[number, Timestamp]> = [];
        for (let j = 0; j < n; j++) {
          const index = reader.u8();
          entries.push([index, readOpId()]);
        }
        replay(at, () => builder.insVec(obj, entries));
        break;
      }
      case "ins_str": {
        const n = length();
        const obj = readOpId();
        const after = readOpId();
        const data = reader.text(n);
        replay(at, () => builder.insStr(obj, after, data));
        break;
      }
      case "ins_bin": {
        const n = length();
        const obj = readOpId();
        const after = readOpId();
        const data = reader.bytes(n);
        replay(at, () => builder.insBin(obj, after, data));
        break;
      }
      case "ins_arr": {
        const n = length();
        const obj = readOpId();
        const after = readOpId();
        const data: Timestamp[] = [];
        for (let j = 0; j < n; j++) {
          data.push(readOpId());
        }
        replay(at, () => builder.insArr(obj, after, data));
        break;
      }
      case "upd_arr": {
        noLength();
        const obj = readOpId();
        const ref = readOpId();
        const value = readOpId();
        replay(at, () => builder.updArr(obj, ref, value));
        break;
      }
      case "del": {
        const n = length();
        const obj = readOpId();
        const what: Timespan[] = [];
        for (let j = 0; j < n; j++) {
          const start = readOpId();
          what.push({ sid: start.sid, time: start.time, span: reader.vu57() });
        }
        replay(at, () => builder.del(obj, what));
        break;
      }
      case "nop": {
        const n = length();
        replay(at, () => builder.nop(n));
        break;
      }
    }
  }

  reader.assertEnd();
  return builder.flush(meta);
}

export function tryDecodeBinary(bytes: Uint8Array, options?: DecodeOptions): TryDecodeResult<Patch> {
  return tryDecode(() => decodeBinary(bytes, options));
}

/**
 * Accept a patch payload from the wire. Well-formed payloads decode to a
 * patch; malformed ones are carried along untouched as opaque bytes. Input
 * that starts like a JSON object is rejected whatever made it fail.
 */
export function readPatchPayload(bytes: Uint8Array, options?: DecodeOptions): PatchPayload {
  try {
    return { kind: "patch", patch: decodeBinary(bytes, options) };
  } catch (error) {
    if (!(error instanceof DecodeError)) {
      throw error;
    }

    if (bytes[0] === JSON_OBJECT_START) {
      throw error;
    }

    log("accepting %d byte payload as opaque: %s", bytes.length, error.message);
    return { kind: "opaque", bytes };
  }
}
