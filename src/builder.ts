import type { Clock, ConData, Op, PackValue, Patch, Timespan, Timestamp } from "./types";

import { clockTick, ORIGIN } from "./clock";
import { PatchError } from "./errors";
import { MAX_VEC_INDEX } from "./nodes";
import { opSpan } from "./operations";
import { isPackObject } from "./pack-value";

/**
 * Emits a well-formed operation log: every call allocates the next id from the
 * clock and advances it by the operation's span.
 */
export class PatchBuilder {
  readonly clock: Clock;
  private ops: Op[] = [];

  constructor(clock: Clock) {
    this.clock = clock;
  }

  /** Time the next operation will be allocated at. */
  nextTime(): number {
    return this.clock.time;
  }

  /** Number of buffered operations. */
  get size(): number {
    return this.ops.length;
  }

  /** Return the buffered operations as a patch and start over. */
  flush(meta?: PackValue): Patch {
    const patch: Patch = { ops: this.ops };
    if (meta !== undefined) {
      patch.meta = meta;
    }
    this.ops = [];
    return patch;
  }

  // --- creation

  con(value: PackValue): Timestamp {
    return this.newCon({ type: "value", value });
  }

  conRef(ref: Timestamp): Timestamp {
    return this.newCon({ type: "ref", ref });
  }

  val(): Timestamp {
    return this.push((id) => ({ kind: "new_val", id }));
  }

  obj(): Timestamp {
    return this.push((id) => ({ kind: "new_obj", id }));
  }

  vec(): Timestamp {
    return this.push((id) => ({ kind: "new_vec", id }));
  }

  str(): Timestamp {
    return this.push((id) => ({ kind: "new_str", id }));
  }

  bin(): Timestamp {
    return this.push((id) => ({ kind: "new_bin", id }));
  }

  arr(): Timestamp {
    return this.push((id) => ({ kind: "new_arr", id }));
  }

  // --- mutation

  /** Point register `obj` at `value`. */
  setVal(obj: Timestamp, value: Timestamp): Timestamp {
    return this.push((id) => ({ kind: "ins_val", id, obj, value }));
  }

  /** Point the document root at `value`. */
  root(value: Timestamp): Timestamp {
    return this.setVal(ORIGIN, value);
  }

  insObj(obj: Timestamp, entries: Array<[string, Timestamp]>): Timestamp {
    if (entries.length === 0) {
      throw new PatchError("INVALID_OP", "ins_obj requires at least one entry");
    }

    return this.push((id) => ({ kind: "ins_obj", id, obj, entries }));
  }

  insVec(obj: Timestamp, entries: Array<[number, Timestamp]>): Timestamp {
    if (entries.length === 0) {
      throw new PatchError("INVALID_OP", "ins_vec requires at least one entry");
    }

    for (const [index] of entries) {
      if (!Number.isInteger(index) || index < 0 || index > MAX_VEC_INDEX) {
        throw new PatchError("INVALID_OP", `vec index ${index} out of range 0..${MAX_VEC_INDEX}`);
      }
    }

    return this.push((id) => ({ kind: "ins_vec", id, obj, entries }));
  }

  /** Insert `data` after item `after` (the string's own id inserts at the start). */
  insStr(obj: Timestamp, after: Timestamp, data: string): Timestamp {
    if (data.length === 0) {
      throw new PatchError("INVALID_OP", "ins_str requires non-empty data");
    }

    return this.push((id) => ({ kind: "ins_str", id, obj, after, data }));
  }

  insBin(obj: Timestamp, after: Timestamp, data: Uint8Array): Timestamp {
    if (data.length === 0) {
      throw new PatchError("INVALID_OP", "ins_bin requires non-empty data");
    }

    return this.push((id) => ({ kind: "ins_bin", id, obj, after, data }));
  }

  insArr(obj: Timestamp, after: Timestamp, data: Timestamp[]): Timestamp {
    if (data.length === 0) {
      throw new PatchError("INVALID_OP", "ins_arr requires at least one element");
    }

    return this.push((id) => ({ kind: "ins_arr", id, obj, after, data }));
  }

  /** Replace the element at array slot `ref` with `value`. */
  updArr(obj: Timestamp, ref: Timestamp, value: Timestamp): Timestamp {
    return this.push((id) => ({ kind: "upd_arr", id, obj, ref, value }));
  }

  del(obj: Timestamp, what: Timespan[]): Timestamp {
    if (what.length === 0) {
      throw new PatchError("INVALID_OP", "del requires at least one span");
    }

    return this.push((id) => ({ kind: "del", id, obj, what }));
  }

  /** Reserve `len` ticks without any effect. */
  nop(len: number): Timestamp {
    if (!Number.isSafeInteger(len) || len < 1) {
      throw new PatchError("INVALID_OP", "nop length must be a positive integer");
    }

    return this.push((id) => ({ kind: "nop", id, len }));
  }

  // --- JSON helpers

  /**
   * Build the node tree of a value and return its id.
   * Strings become `str`, binary `bin`, arrays `arr`, objects `obj`; anything else is a constant.
   */
  json(value: PackValue): Timestamp {
    if (typeof value === "string") {
      return this.jsonStr(value);
    }

    if (value instanceof Uint8Array) {
      return this.jsonBin(value);
    }

    if (Array.isArray(value)) {
      return this.jsonArr(value);
    }

    if (isPackObject(value)) {
      return this.jsonObj(value);
    }

    return this.con(value);
  }

  /** Constants for scalars, a full node tree otherwise. */
  constOrJson(value: PackValue): Timestamp {
    return isScalar(value) ? this.con(value) : this.json(value);
  }

  /** A `val` register holding `value`. */
  jsonVal(value: PackValue): Timestamp {
    const id = this.val();
    this.setVal(id, this.constOrJson(value));
    return id;
  }

  /** A `vec` node with one element per value. */
  vecOf(values: PackValue[]): Timestamp {
    const id = this.vec();
    const entries: Array<[number, Timestamp]> = values.map((value, i) => [i, this.constOrJson(value)]);
    if (entries.length > 0) {
      this.insVec(id, entries);
    }

    return id;
  }

  /** Array element: scalars are wrapped in a register so they can be overwritten in place. */
  jsonArrItem(value: PackValue): Timestamp {
    return isScalar(value) ? this.jsonVal(value) : this.json(value);
  }

  private jsonStr(value: string): Timestamp {
    const id = this.str();
    if (value.length > 0) {
      this.insStr(id, id, value);
    }

    return id;
  }

  private jsonBin(value: Uint8Array): Timestamp {
    const id = this.bin();
    if (value.length > 0) {
      this.insBin(id, id, value);
    }

    return id;
  }

  private jsonArr(values: PackValue[]): Timestamp {
    const id = this.arr();
    if (values.length > 0) {
      const items = values.map((value) => this.jsonArrItem(value));
      this.insArr(id, id, items);
    }

    return id;
  }

  private jsonObj(value: Record<string, PackValue>): Timestamp {
    const id = this.obj();
    const entries: Array<[string, Timestamp]> = Object.entries(value).map(([key, child]) => [
      key,
      this.constOrJson(child),
    ]);
    if (entries.length > 0) {
      this.insObj(id, entries);
    }

    return id;
  }

  private newCon(data: ConData): Timestamp {
    return this.push((id) => ({ kind: "new_con", id, data }));
  }

  private push(create: (id: Timestamp) => Op): Timestamp {
    const id = { sid: this.clock.sid, time: this.clock.time };
    const op = create(id);
    clockTick(this.clock, opSpan(op));
    this.ops.push(op);
    return id;
  }
}

export function isScalar(value: PackValue): boolean {
  return (
    value === null ||
    value === undefined ||
    typeof value === "boolean" ||
    typeof value === "number"
  );
}
