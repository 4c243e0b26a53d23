import createDebug from "debug";

import type {
  ArrNode,
  BinNode,
  DiffOptions,
  Model,
  Node,
  ObjNode,
  PackValue,
  Patch,
  StrNode,
  Timespan,
  Timestamp,
  VecNode,
} from "./types";

import { isScalar, PatchBuilder } from "./builder";
import { cloneClock } from "./clock";
import { assertTraversalDepth } from "./errors";
import { materialize } from "./materialize";
import { arrElements, MAX_VEC_INDEX, nodeKey } from "./nodes";
import { createPackObject, isPackObject, packEquals, setPackProperty } from "./pack-value";
import { rgaFindInterval, rgaLiveIds } from "./rga";

const log = createDebug("json-crdt:diff");

type DiffContext = {
  readonly model: Model;
  readonly builder: PatchBuilder;
  readonly maxDepth: number;
};

/** A specialized array diff; returns `false` without emitting anything when it does not apply. */
type ArrayStrategy = (
  ctx: DiffContext,
  node: ArrNode,
  prev: PackValue[],
  next: PackValue[],
  depth: number,
) => boolean;

/**
 * Compute the patch that turns the model's current view into `next`.
 * Returns `undefined` when the view already equals `next`. The model is not
 * modified; apply the returned patch to commit the change.
 */
export function diff(model: Model, next: PackValue, options: DiffOptions = {}): Patch | undefined {
  const ctx: DiffContext = {
    model,
    builder: new PatchBuilder(cloneClock(model.clock)),
    maxDepth: options.maxDepth ?? model.maxDepth,
  };
  const prev = materialize(model.index, model.root, ctx.maxDepth);
  if (packEquals(prev, next)) {
    return undefined;
  }

  if (!diffNode(ctx, model.root, prev, next, 0)) {
    log("replacing document root");
    ctx.builder.root(ctx.builder.json(next));
  }

  return ctx.builder.size > 0 ? ctx.builder.flush() : undefined;
}

/**
 * Like `diff`, but only the keys present in `dst` are written; other keys of
 * an object root keep their current values.
 */
export function diffDstKeys(
  model: Model,
  dst: Record<string, PackValue>,
  options: DiffOptions = {},
): Patch | undefined {
  const prev = materialize(model.index, model.root, options.maxDepth ?? model.maxDepth);
  const next = createPackObject();
  if (isPackObject(prev)) {
    for (const [key, value] of Object.entries(prev)) {
      setPackProperty(next, key, value);
    }
  }
  for (const [key, value] of Object.entries(dst)) {
    setPackProperty(next, key, value);
  }

  return diff(model, next, options);
}

/**
 * Pick the anchor for the inserted middle of a sequence edit.
 * `slots` are the ids of the visible items before the edit.
 */
export function chooseSequenceInsertReference(
  slots: readonly Timestamp[],
  container: Timestamp,
  lcp: number,
  insLen: number,
  delLen: number,
  oldLen: number,
): Timestamp {
  // A replaced window is anchored on its last deleted item.
  if (insLen > 0 && delLen > 0) {
    const slot = slots[lcp + delLen - 1];
    if (slot) {
      return slot;
    }
  }

  if (lcp === 0 && delLen === 0) {
    return container;
  }

  const prefix = lcp > 0 ? slots[lcp - 1] : undefined;
  if (prefix) {
    return prefix;
  }

  const last = oldLen > 0 && delLen === oldLen ? slots[oldLen - 1] : undefined;
  return last ?? slots[0] ?? container;
}

// ---

/**
 * Emit operations that turn node `id` (currently viewing as `prev`) into
 * `next` in place. Returns `false` when the node cannot take the new value
 * and the caller has to replace it.
 */
function diffNode(
  ctx: DiffContext,
  id: Timestamp,
  prev: PackValue,
  next: PackValue,
  depth: number,
): boolean {
  assertTraversalDepth(depth, ctx.maxDepth);
  if (packEquals(prev, next)) {
    return true;
  }

  const node = ctx.model.index.get(nodeKey(id));
  if (!node) {
    return false;
  }

  switch (node.kind) {
    case "val": {
      if (!diffNode(ctx, node.value, prev, next, depth + 1)) {
        ctx.builder.setVal(node.id, ctx.builder.constOrJson(next));
      }
      return true;
    }
    case "str":
      if (typeof next !== "string" || typeof prev !== "string") {
        return false;
      }
      diffStr(ctx, node, prev, next);
      return true;
    case "bin":
      if (!(next instanceof Uint8Array) || !(prev instanceof Uint8Array)) {
        return false;
      }
      diffBin(ctx, node, prev, next);
      return true;
    case "arr":
      if (!Array.isArray(next) || !Array.isArray(prev)) {
        return false;
      }
      diffArr(ctx, node, prev, next, depth);
      return true;
    case "vec":
      if (!Array.isArray(next) || !Array.isArray(prev)) {
        return false;
      }
      return diffVec(ctx, node, prev, next, depth);
    case "obj":
      if (!isPackObject(next) || !isPackObject(prev)) {
        return false;
      }
      diffObj(ctx, node, prev, next, depth);
      return true;
    case "con":
      return false;
  }
}

/** Whether `diffNode` would succeed for `id` without emitting anything yet. */
function canDiffInPlace(
  ctx: DiffContext,
  id: Timestamp,
  prev: PackValue,
  next: PackValue,
): boolean {
  const node: Node | undefined = ctx.model.index.get(nodeKey(id));
  switch (node?.kind) {
    case "val":
      return true;
    case "str":
      return typeof next === "string";
    case "bin":
      return next instanceof Uint8Array;
    case "arr":
      return Array.isArray(next);
    case "vec":
      return (
        Array.isArray(next) &&
        Array.isArray(prev) &&
        next.length >= prev.length &&
        next.length <= MAX_VEC_INDEX + 1
      );
    case "obj":
      return isPackObject(next);
    default:
      return false;
  }
}

// --- sequences

type Edit = { lcp: number; delLen: number; insFrom: number; insTo: number };

/** Common prefix and suffix of two sequences given an element comparator. */
function trimEdit(
  prevLen: number,
  nextLen: number,
  equal: (i: number, j: number) => boolean,
): Edit {
  let lcp = 0;
  while (lcp < prevLen && lcp < nextLen && equal(lcp, lcp)) {
    lcp++;
  }

  let lcs = 0;
  while (
    lcs < prevLen - lcp &&
    lcs < nextLen - lcp &&
    equal(prevLen - 1 - lcs, nextLen - 1 - lcs)
  ) {
    lcs++;
  }

  return { lcp, delLen: prevLen - lcp - lcs, insFrom: lcp, insTo: nextLen - lcs };
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

function isLowSurrogate(code: number): boolean {
  return code >= 0xdc00 && code <= 0xdfff;
}

function diffStr(ctx: DiffContext, node: StrNode, prev: string, next: string): void {
  const edit = trimEdit(
    prev.length,
    next.length,
    (i, j) => prev.charCodeAt(i) === next.charCodeAt(j),
  );
  // Keep surrogate pairs whole on both edges of the edit window.
  if (edit.lcp > 0 && isHighSurrogate(prev.charCodeAt(edit.lcp - 1))) {
    edit.lcp--;
    edit.delLen++;
    edit.insFrom--;
  }
  if (edit.insTo < next.length && isLowSurrogate(next.charCodeAt(edit.insTo))) {
    edit.delLen++;
    edit.insTo++;
  }

  emitSequenceEdit(ctx, node, prev.length, edit, (after) =>
    ctx.builder.insStr(node.id, after, next.slice(edit.insFrom, edit.insTo)),
  );
}

function diffBin(ctx: DiffContext, node: BinNode, prev: Uint8Array, next: Uint8Array): void {
  const edit = trimEdit(prev.length, next.length, (i, j) => prev[i] === next[j]);
  emitSequenceEdit(ctx, node, prev.length, edit, (after) =>
    ctx.builder.insBin(node.id, after, next.slice(edit.insFrom, edit.insTo)),
  );
}

function emitSequenceEdit(
  ctx: DiffContext,
  node: StrNode | BinNode | ArrNode,
  prevLen: number,
  edit: Edit,
  insert: (after: Timestamp) => void,
): void {
  const insLen = edit.insTo - edit.insFrom;
  if (insLen > 0) {
    const slots = liveIds(node);
    insert(chooseSequenceInsertReference(slots, node.id, edit.lcp, insLen, edit.delLen, prevLen));
  }

  if (edit.delLen > 0) {
    ctx.builder.del(node.id, intervalOf(node, edit.lcp, edit.delLen));
  }
}

function liveIds(node: StrNode | BinNode | ArrNode): Timestamp[] {
  switch (node.kind) {
    case "str":
      return rgaLiveIds(node.rga);
    case "bin":
      return rgaLiveIds(node.rga);
    case "arr":
      return rgaLiveIds(node.rga);
  }
}

function intervalOf(node: StrNode | BinNode | ArrNode, pos: number, len: number): Timespan[] {
  switch (node.kind) {
    case "str":
      return rgaFindInterval(node.rga, pos, len);
    case "bin":
      return rgaFindInterval(node.rga, pos, len);
    case "arr":
      return rgaFindInterval(node.rga, pos, len);
  }
}

// --- arrays

/** Same length, only scalars changed: overwrite the changed slots. */
const diffArrIndexwise: ArrayStrategy = (ctx, node, prev, next) => {
  if (prev.length !== next.length) {
    return false;
  }

  const changed: number[] = [];
  for (let i = 0; i < next.length; i++) {
    const a = prev[i];
    const b = next[i];
    if (packEquals(a, b)) {
      continue;
    }
    if (!isScalar(a) || !isScalar(b)) {
      return false;
    }
    changed.push(i);
  }

  const slots = rgaLiveIds(node.rga);
  for (const i of changed) {
    const slot = slots[i];
    if (slot) {
      ctx.builder.updArr(node.id, slot, ctx.builder.jsonArrItem(next[i]));
    }
  }
  return true;
};

/** Same length, every changed element can be edited in place: recurse into each. */
const diffArrStructural: ArrayStrategy = (ctx, node, prev, next, depth) => {
  if (prev.length !== next.length) {
    return false;
  }

  const elements = arrElements(node);
  const changed: number[] = [];
  for (let i = 0; i < next.length; i++) {
    if (packEquals(prev[i], next[i])) {
      continue;
    }
    const element = elements[i];
    if (!element || !canDiffInPlace(ctx, element, prev[i], next[i])) {
      return false;
    }
    changed.push(i);
  }

  for (const i of changed) {
    const element = elements[i];
    if (element) {
      diffNode(ctx, element, prev[i], next[i], depth + 1);
    }
  }
  return true;
};

/** Delete the changed middle and insert the new elements in its place. */
const diffArrDelta: ArrayStrategy = (ctx, node, prev, next) => {
  const edit = trimEdit(prev.length, next.length, (i, j) => packEquals(prev[i], next[j]));
  emitSequenceEdit(ctx, node, prev.length, edit, (after) => {
    const items = next.slice(edit.insFrom, edit.insTo).map((item) => ctx.builder.jsonArrItem(item));
    ctx.builder.insArr(node.id, after, items);
  });
  return true;
};

const ARRAY_STRATEGIES: ReadonlyArray<[string, ArrayStrategy]> = [
  ["index-wise", diffArrIndexwise],
  ["structural", diffArrStructural],
  ["delta", diffArrDelta],
];

function diffArr(
  ctx: DiffContext,
  node: ArrNode,
  prev: PackValue[],
  next: PackValue[],
  depth: number,
): void {
  for (const [name, strategy] of ARRAY_STRATEGIES) {
    if (strategy(ctx, node, prev, next, depth)) {
      log("arr %d.%d: %s", node.id.sid, node.id.time, name);
      return;
    }
  }
}

// --- vectors and objects

function diffVec(
  ctx: DiffContext,
  node: VecNode,
  prev: PackValue[],
  next: PackValue[],
  depth: number,
): boolean {
  // vectors never shrink
  if (next.length < prev.length || next.length > MAX_VEC_INDEX + 1) {
    log("vec %d.%d cannot take %d elements", node.id.sid, node.id.time, next.length);
    return false;
  }

  const entries: Array<[number, Timestamp]> = [];
  for (let i = 0; i < next.length; i++) {
    const value = next[i];
    if (i < prev.length && packEquals(prev[i], value)) {
      continue;
    }
    const element = node.elements[i];
    if (element && i < prev.length && canDiffInPlace(ctx, element, prev[i], value)) {
      diffNode(ctx, element, prev[i], value, depth + 1);
      continue;
    }
    entries.push([i, ctx.builder.constOrJson(value)]);
  }

  if (entries.length > 0) {
    ctx.builder.insVec(node.id, entries);
  }
  return true;
}

function diffObj(
  ctx: DiffContext,
  node: ObjNode,
  prev: Record<string, PackValue>,
  next: Record<string, PackValue>,
  depth: number,
): void {
  const entries: Array<[string, Timestamp]> = [];
  for (const key of Object.keys(prev)) {
    if (!hasOwn(next, key)) {
      entries.push([key, ctx.builder.con(undefined)]);
    }
  }

  for (const key of Object.keys(next)) {
    const value = next[key];
    if (hasOwn(prev, key)) {
      const old = prev[key];
      if (packEquals(old, value)) {
        continue;
      }
      const child = node.keys.get(key);
      if (child && canDiffInPlace(ctx, child, old, value)) {
        diffNode(ctx, child, old, value, depth + 1);
        continue;
      }
    }
    entries.push([key, ctx.builder.constOrJson(value)]);
  }

  if (entries.length > 0) {
    ctx.builder.insObj(node.id, entries);
  }
}

function hasOwn(value: Record<string, PackValue>, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(value, key);
}
