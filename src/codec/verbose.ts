import type {
  DecodeOptions,
  Op,
  PackValue,
  Patch,
  Timespan,
  Timestamp,
  VerboseId,
  VerboseOp,
  VerbosePatch,
} from "../types";

import { ORIGIN, SESSION } from "../clock";
import { fail, tryDecode, type TryDecodeResult } from "../errors";
import { readPackValue } from "../pack-value";
import { patchId } from "../patch";
import {
  asArray,
  asRecord,
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

export function encodeVerboseId(id: Timestamp): VerboseId {
  return id.sid === SESSION.SERVER ? id.time : [id.sid, id.time];
}

/** Encode a patch as a human-readable JSON object. */
export function encodeVerbose(patch: Patch): VerbosePatch {
  const out: VerbosePatch = {
    id: encodeVerboseId(patchId(patch) ?? ORIGIN),
    ops: patch.ops.map(encodeOp),
  };
  if (patch.meta !== undefined) {
    out.meta = patch.meta;
  }

  return out;
}

function encodeOp(op: Op): VerboseOp {
  switch (op.kind) {
    case "new_con":
      if (op.data.type === "ref") {
        return { op: "new_con", timestamp: true, value: encodeVerboseId(op.data.ref) };
      }
      return op.data.value === undefined
        ? { op: "new_con" }
        : { op: "new_con", value: op.data.value };
    case "new_val":
    case "new_obj":
    case "new_vec":
    case "new_str":
    case "new_bin":
    case "new_arr":
      return { op: op.kind };
    case "ins_val":
      return { op: "ins_val", obj: encodeVerboseId(op.obj), value: encodeVerboseId(op.value) };
    case "ins_obj":
      return {
        op: "ins_obj",
        obj: encodeVerboseId(op.obj),
        value: op.entries.map(([key, id]): [string, VerboseId] => [key, encodeVerboseId(id)]),
      };
    case "ins_vec":
      return {
        op: "ins_vec",
        obj: encodeVerboseId(op.obj),
        value: op.entries.map(([index, id]): [number, VerboseId] => [index, encodeVerboseId(id)]),
      };
    case "ins_str":
      return {
        op: "ins_str",
        obj: encodeVerboseId(op.obj),
        after: encodeVerboseId(op.after),
        value: op.data,
      };
    case "ins_bin":
      return {
        op: "ins_bin",
        obj: encodeVerboseId(op.obj),
        after: encodeVerboseId(op.after),
        value: toBase64(op.data),
      };
    case "ins_arr":
      return {
        op: "ins_arr",
        obj: encodeVerboseId(op.obj),
        after: encodeVerboseId(op.after),
        values: op.data.map(encodeVerboseId),
      };
    case "upd_arr":
      return {
        op: "upd_arr",
        obj: encodeVerboseId(op.obj),
        ref: encodeVerboseId(op.ref),
        value: encodeVerboseId(op.value),
      };
    case "del":
      return {
        op: "del",
        obj: encodeVerboseId(op.obj),
        what: op.what.map((span: Timespan): [number, number, number] => [
          span.sid,
          span.time,
          span.span,
        ]),
      };
    case "nop":
      return { op: "nop", len: op.len };
  }
}

/**
 * Decode a verbose patch object. Every field is validated; malformed input
 * raises `DecodeError` with a JSON path to the offending value.
 */
export function decodeVerbose(data: unknown, options: DecodeOptions = {}): Patch {
  const raw = asRecord(data, "/");
  const id = readVerboseId(raw.id, "/id");
  const meta = "meta" in raw ? readPackValue(raw.meta, "/meta", options.maxDepth) : undefined;
  const ops = asArray(raw.ops, "/ops");
  if (ops.length === 0) {
    return meta === undefined ? { ops: [] } : { ops: [], meta };
  }

  const builder = builderForPatch(id, "/id");
  ops.forEach((rawOp, i) => {
    const path = `/ops/${i}`;
    const op = asRecord(rawOp, path);
    const name = readString(op.op, `${path}/op`);
    replay(path, () => {
      switch (name) {
        case "new_con":
          if (op.timestamp === true) {
            builder.conRef(readVerboseId(op.value, `${path}/value`));
          } else {
            builder.con(readConstant(op, path, options));
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
          builder.setVal(
            readVerboseId(op.obj, `${path}/obj`),
            readVerboseId(op.value, `${path}/value`),
          );
          return;
        case "ins_obj":
          builder.insObj(
            readVerboseId(op.obj, `${path}/obj`),
            asArray(op.value, `${path}/value`).map((entry, j): [string, Timestamp] => {
              const pair = readPair(entry, `${path}/value/${j}`);
              return [
                readString(pair[0], `${path}/value/${j}/0`),
                readVerboseId(pair[1], `${path}/value/${j}/1`),
              ];
            }),
          );
          return;
        case "ins_vec":
          builder.insVec(
            readVerboseId(op.obj, `${path}/obj`),
            asArray(op.value, `${path}/value`).map((entry, j): [number, Timestamp] => {
              const pair = readPair(entry, `${path}/value/${j}`);
              return [
                readUint(pair[0], `${path}/value/${j}/0`),
                readVerboseId(pair[1], `${path}/value/${j}/1`),
              ];
            }),
          );
          return;
        case "ins_str":
          builder.insStr(
            readVerboseId(op.obj, `${path}/obj`),
            readVerboseId(op.after, `${path}/after`),
            readString(op.value, `${path}/value`),
          );
          return;
        case "ins_bin":
          builder.insBin(
            readVerboseId(op.obj, `${path}/obj`),
            readVerboseId(op.after, `${path}/after`),
            fromBase64(op.value, `${path}/value`),
          );
          return;
        case "ins_arr":
          builder.insArr(
            readVerboseId(op.obj, `${path}/obj`),
            readVerboseId(op.after, `${path}/after`),
            asArray(op.values, `${path}/values`).map((value, j) =>
              readVerboseId(value, `${path}/values/${j}`),
            ),
          );
          return;
        case "upd_arr":
          builder.updArr(
            readVerboseId(op.obj, `${path}/obj`),
            readVerboseId(op.ref, `${path}/ref`),
            readVerboseId(op.value, `${path}/value`),
          );
          return;
        case "del":
          builder.del(
            readVerboseId(op.obj, `${path}/obj`),
            asArray(op.what, `${path}/what`).map((span, j) =>
              readSpan(span, `${path}/what/${j}`, undefined),
            ),
          );
          return;
        case "nop":
          builder.nop(op.len === undefined ? 1 : readPositive(op.len, `${path}/len`));
          return;
        default:
          fail("UNKNOWN_OPCODE", `${path}/op`, `unknown operation '${name}'`);
      }
    });
  });

  return builder.flush(meta);
}

/** Non-throwing variant of `decodeVerbose`. */
export function tryDecodeVerbose(data: unknown, options?: DecodeOptions): TryDecodeResult<Patch> {
  return tryDecode(() => decodeVerbose(data, options));
}

function readVerboseId(value: unknown, path: string): Timestamp {
  return readId(value, path, SESSION.SERVER);
}

function readConstant(op: Record<string, unknown>, path: string, options: DecodeOptions): PackValue {
  return "value" in op ? readPackValue(op.value, `${path}/value`, options.maxDepth) : undefined;
}

function readPair(value: unknown, path: string): unknown[] {
  const pair = asArray(value, path);
  if (pair.length !== 2) {
    fail("INVALID_SHAPE", path, "expected a [key, id] pair");
  }

  return pair;
}
