import type { ConData, Op, OpName, PackValue, Timespan, Timestamp } from "./types";

import { printTs, printTss } from "./clock";
import { clonePackValue } from "./pack-value";

/** Numeric opcode of every operation, shared by the compact and binary codecs. */
export const OPCODE = {
  new_con: 0,
  new_val: 1,
  new_obj: 2,
  new_vec: 3,
  new_str: 4,
  new_bin: 5,
  new_arr: 6,
  ins_val: 9,
  ins_obj: 10,
  ins_vec: 11,
  ins_str: 12,
  ins_bin: 13,
  ins_arr: 14,
  upd_arr: 15,
  del: 16,
  nop: 17,
} as const satisfies Record<OpName, number>;

const OP_NAMES = new Map<number, OpName>(
  Object.entries(OPCODE).flatMap(([name, code]) => {
    const opName = toOpName(name);
    return opName ? [[code, opName] as const] : [];
  }),
);

/** Operation name for a numeric opcode, if it is one. */
export function opNameFromCode(code: number): OpName | undefined {
  return OP_NAMES.get(code);
}

export function toOpName(name: string): OpName | undefined {
  switch (name) {
    case "new_con":
    case "new_val":
    case "new_obj":
    case "new_vec":
    case "new_str":
    case "new_bin":
    case "new_arr":
    case "ins_val":
    case "ins_obj":
    case "ins_vec":
    case "ins_str":
    case "ins_bin":
    case "ins_arr":
    case "upd_arr":
    case "del":
    case "nop":
      return name;
    default:
      return undefined;
  }
}

/** Logical clock cost of an operation. */
export function opSpan(op: Op): number {
  switch (op.kind) {
    case "ins_str":
    case "ins_bin":
    case "ins_arr":
      return op.data.length;
    case "nop":
      return op.len;
    default:
      return 1;
  }
}

/** Return a copy of `op` with every id and reference passed through `map`. */
export function mapOpTimestamps(op: Op, map: (id: Timestamp) => Timestamp): Op {
  const id = map(op.id);
  switch (op.kind) {
    case "new_con":
      return { kind: op.kind, id, data: mapConData(op.data, map) };
    case "new_val":
    case "new_obj":
    case "new_vec":
    case "new_str":
    case "new_bin":
    case "new_arr":
      return { kind: op.kind, id };
    case "ins_val":
      return { kind: op.kind, id, obj: map(op.obj), value: map(op.value) };
    case "ins_obj":
      return {
        kind: op.kind,
        id,
        obj: map(op.obj),
        entries: op.entries.map(([key, value]): [string, Timestamp] => [key, map(value)]),
      };
    case "ins_vec":
      return {
        kind: op.kind,
        id,
        obj: map(op.obj),
        entries: op.entries.map(([index, value]): [number, Timestamp] => [index, map(value)]),
      };
    case "ins_str":
      return { kind: op.kind, id, obj: map(op.obj), after: map(op.after), data: op.data };
    case "ins_bin":
      return {
        kind: op.kind,
        id,
        obj: map(op.obj),
        after: map(op.after),
        data: op.data.slice(),
      };
    case "ins_arr":
      return {
        kind: op.kind,
        id,
        obj: map(op.obj),
        after: map(op.after),
        data: op.data.map(map),
      };
    case "upd_arr":
      return { kind: op.kind, id, obj: map(op.obj), ref: map(op.ref), value: map(op.value) };
    case "del":
      return { kind: op.kind, id, obj: map(op.obj), what: op.what.map((span) => mapSpan(span, map)) };
    case "nop":
      return { kind: op.kind, id, len: op.len };
  }
}

/** One-line rendering: `<name> <id>!<span>` followed by the op's fields. */
export function printOp(op: Op): string {
  const head = `${op.kind} ${printTss({ ...op.id, span: opSpan(op) })}`;
  switch (op.kind) {
    case "new_con":
      return op.data.type === "ref"
        ? `${head}, ref = ${printTs(op.data.ref)}`
        : `${head}, value = ${printValue(op.data.value)}`;
    case "new_val":
    case "new_obj":
    case "new_vec":
    case "new_str":
    case "new_bin":
    case "new_arr":
    case "nop":
      return head;
    case "ins_val":
      return `${head}, obj = ${printTs(op.obj)}, value = ${printTs(op.value)}`;
    case "ins_obj":
      return `${head}, obj = ${printTs(op.obj)} { ${op.entries
        .map(([key, value]) => `${JSON.stringify(key)}: ${printTs(value)}`)
        .join(", ")} }`;
    case "ins_vec":
      return `${head}, obj = ${printTs(op.obj)} { ${op.entries
        .map(([index, value]) => `${index}: ${printTs(value)}`)
        .join(", ")} }`;
    case "ins_str":
      return `${head}, obj = ${printTs(op.obj)} { ${printTs(op.after)} ← ${JSON.stringify(op.data)} }`;
    case "ins_bin":
      return `${head}, obj = ${printTs(op.obj)} { ${printTs(op.after)} ← ${op.data.length} bytes }`;
    case "ins_arr":
      return `${head}, obj = ${printTs(op.obj)} { ${printTs(op.after)} ← ${op.data
        .map(printTs)
        .join(", ")} }`;
    case "upd_arr":
      return `${head}, obj = ${printTs(op.obj)} { ${printTs(op.ref)} ← ${printTs(op.value)} }`;
    case "del":
      return `${head}, obj = ${printTs(op.obj)} { ${op.what.map(printTss).join(", ")} }`;
  }
}

function mapConData(data: ConData, map: (id: Timestamp) => Timestamp): ConData {
  return data.type === "ref"
    ? { type: "ref", ref: map(data.ref) }
    : { type: "value", value: clonePackValue(data.value) };
}

function mapSpan(span: Timespan, map: (id: Timestamp) => Timestamp): Timespan {
  const start = map({ sid: span.sid, time: span.time });
  return { sid: start.sid, time: start.time, span: span.span };
}

function printValue(value: PackValue): string {
  if (value === undefined) {
    return "undefined";
  }

  if (value instanceof Uint8Array) {
    return `${value.length} bytes`;
  }

  return JSON.stringify(value);
}
