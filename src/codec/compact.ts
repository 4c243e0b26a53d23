import type {
  CompactId,
  CompactPatch,
  DecodeOptions,
  Op,
  PackValue,
  Patch,
  SessionId,
  Timestamp,
} from "../types";

import { ORIGIN, SESSION } from "../clock";
import { fail, tryDecode, type TryDecodeResult } from "../errors";
import { OPCODE, opNameFromCode } from "../operations";
import { readPackValue } from "../pack-value";
import { patchId } from "../patch";
import {
  asArray,
  builderForPatch,
  fromBase64,
  readId,
  readPositive,
  readSpan,
  readString,
  readUint,
  replay,
  toBase64,
} from "./shared";

function encodeId(id: Timestamp, sid: SessionId): CompactId {
  return id.sid === sid ? id.time : [id.sid, id.time];
}

/**
 * Encode a patch as nested arrays: a `[id, meta?]` header followed by one
 * `[opcode, ...fields]` entry per operation. Ids of the patch's own session
 * shrink to their time.
 */
export function encodeCompact(patch: Patch): CompactPatch {
  const id = patchId(patch) ?? ORIGIN;
  const headerId: CompactId = id.sid === SESSION.SERVER ? id.time : [id.sid, id.time];
  const header: [CompactId] | [CompactId, PackValue] =
    patch.meta === undefined ? [headerId] : [headerId, patch.meta];

  return [header, ...patch.ops.map((op) => encodeOp(op, id.sid))];
}

function encodeOp(op: Op, sid: SessionId): PackValue[] {
  const code = OPCODE[op.kind];
  switch (op.kind) {
    case "new_con":
      if (op.data.type === "ref") {
        return [code, encodeId(op.data.ref, sid), true];
      }
      return op.data.value === undefined ? [code] : [code, op.data.value];
    case "new_val":
    case "new_obj":
    case "new_vec":
    case "new_str":
    case "new_bin":
    case "new_arr":
      return [code];
    case "ins_val":
      return [code, encodeId(op.obj, sid), encodeId(op.value, sid)];
    case "ins_obj":
      return [code, encodeId(op.obj, sid), op.entries.map(([key, id]) => [key, encodeId(id, sid)])];
    case "ins_vec":
      return [
        code,
        encodeId(op.obj, sid),
        op.entries.map(([index, id]) => [index, encodeId(id, sid)]),
      ];
    case "ins_str":
      return [code, encodeId(op.obj, sid), encodeId(op.after, sid), op.data];
    case "ins_bin":
      return [code, encodeId(op.obj, sid), encodeId(op.after, sid), toBase64(op.data)];
    case "ins_arr":
      return [
        code,
        encodeId(op.obj, sid),
        encodeId(op.after, sid),
        op.data.map((id) => encodeId(id, sid)),
      ];
    case "upd_arr":
      return [code, encodeId(op.obj, sid), encodeId(op.ref, sid), encodeId(op.value, sid)];
    case "del":
      return [
        code,
        encodeId(op.obj, sid),
        op.what.map((span) =>
          span.sid === sid ? [span.time, span.span] : [span.sid, span.time, span.span],
        ),
      ];
    case "nop":
      return op.len === 1 ? [code] : [code, op.len];
  }
}

/** Decode a compact patch; malformed input raises `DecodeError` at a JSON path. */
export function decodeCompact(data: unknown, options: DecodeOptions = {}): Patch {
  const raw = asArray(data, "/");
  const header = asArray(raw[0], "/0");
  if (header.length < 1 || header.length > 2) {
    fail("INVALID_SHAPE", "/0", "header must be [id] or [id, meta]");
  }

  const id = readId(header[0], "/0/0", SESSION.SERVER);
  const meta = header.length === 2 ? readPackValue(header[1], "/0/1", options.maxDepth) : undefined;
  if (raw.length === 1) {
    return meta === undefined ? { ops: [] } : { ops: [], meta };
  }

  const sid = id.sid;
  const readOpId = (value: unknown, path: string): Timestamp => readId(value, path, sid);
  const builder = builderForPatch(id, "/0/0");

  for (let i = 1; i < raw.length; i++) {
    const path = `/${i}`;
    const op = asArray(raw[i], path);
    const code = readUint(op[0], `${path}/0`);
    const name = opNameFromCode(code);
    if (!name) {
      fail("UNKNOWN_OPCODE", `${path}/0`, `unknown opcode ${code}`);
    }

    replay(path, () => {
      switch (name) {
        case "new_con":
          if (op.length === 3 && op[2] === true) {
            builder.conRef(readOpId(op[1], `${path}/1`));
          } else if (op.length <= 2) {
            builder.con(
              op.length === 2 ? readPackValue(op[1], `${path}/1`, options.maxDepth) : undefined,
            );
          } else {
            fail("INVALID_SHAPE", path, "malformed new_con");
          }
          return;
        case "new_val":
          builder.val();
          return;
        case "new_obj":
          builder.obj();
          return;
        case "new_vec":
          builder.vec();
          return;
        case "new_str":
          builder.str();
          return;
        case "new_bin":
          builder.bin();
          return;
        case "new_arr":
          builder.arr();
          return;
        case "ins_val":
          builder.setVal(readOpId(op[1], `${path}/1`), readOpId(op[2], `${path}/2`));
          return;
        case "ins_obj":
          builder.insObj(
            readOpId(op[1], `${path}/1`),
            asArray(op[2], `${path}/2`).map((entry, j): [string, Timestamp] => {
              const pair = readPair(entry, `${path}/2/${j}`);
              return [
                readString(pair[0], `${path}/2/${j}/0`),
                readOpId(pair[1], `${path}/2/${j}/1`),
              ];
            }),
          );
          return;
        case "ins_vec":
          builder.insVec(
            readOpId(op[1], `${path}/1`),
            asArray(op[2], `${path}/2`).map((entry, j): [number, Timestamp] => {
              const pair = readPair(entry, `${path}/2/${j}`);
              return [
                readUint(pair[0], `${path}/2/${j}/0`),
                readOpId(pair[1], `${path}/2/${j}/1`),
              ];
            }),
          );
          return;
        case "ins_str":
          builder.insStr(
            readOpId(op[1], `${path}/1`),
            readOpId(op[2], `${path}/2`),
            readString(op[3], `${path}/3`),
          );
          return;
        case "ins_bin":
          builder.insBin(
            readOpId(op[1], `${path}/1`),
            readOpId(op[2], `${path}/2`),
            fromBase64(op[3], `${path}/3`),
          );
          return;
        case "ins_arr":
          builder.insArr(
            readOpId(op[1], `${path}/1`),
            readOpId(op[2], `${path}/2`),
            asArray(op[3], `${path}/3`).map((value, j) => readOpId(value, `${path}/3/${j}`)),
          );
          return;
        case "upd_arr":
          builder.updArr(
            readOpId(op[1], `${path}/1`),
            readOpId(op[2], `${path}/2`),
            readOpId(op[3], `${path}/3`),
          );
          return;
        case "del":
          builder.del(
            readOpId(op[1], `${path}/1`),
            asArray(op[2], `${path}/2`).map((span, j) => readSpan(span, `${path}/2/${j}`, sid)),
          );
          return;
        case "nop":
          builder.nop(op.length > 1 ? readPositive(op[1], `${path}/1`) : 1);
          return;
      }
    });
  }

  return builder.flush(meta);
}

export function tryDecodeCompact(data: unknown, options?: DecodeOptions): TryDecodeResult<Patch> {
  return tryDecode(() => decodeCompact(data, options));
}

function readPair(value: unknown, path: string): unknown[] {
  const pair = asArray(value, path);
  if (pair.length !== 2) {
    fail("INVALID_SHAPE", path, "expected a pair");
  }

  return pair;
}
