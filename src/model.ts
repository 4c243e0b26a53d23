import createDebug from "debug";

import type {
  ChangeOrigin,
  Chunk,
  DiffOptions,
  Model,
  ModelChange,
  ModelListener,
  ModelOptions,
  Node,
  Op,
  PackValue,
  Patch,
  PathStep,
  Rga,
  SessionId,
  Timestamp,
} from "./types";

import { PatchBuilder } from "./builder";
import {
  cloneClock,
  clockObserve,
  compareTs,
  createClock,
  createServerClock,
  equalTs,
  forkClock,
  ORIGIN,
  SESSION,
} from "./clock";
import { diff } from "./diff";
import { MAX_TRAVERSAL_DEPTH } from "./errors";
import { materialize, resolveNode } from "./materialize";
import {
  arrElements,
  arrUpdate,
  newArr,
  newBin,
  newCon,
  newObj,
  newStr,
  newVal,
  newVec,
  nodeKey,
  objPut,
  valSet,
  vecPut,
} from "./nodes";
import { opSpan, printOp } from "./operations";
import { clonePackValue } from "./pack-value";
import { patchId } from "./patch";
import { rgaDelete, rgaInsert } from "./rga";

const log = createDebug("json-crdt:model");

/**
 * Create an empty document for a local session.
 * @param sid - Session id of this replica (2 or above).
 */
export function createModel(sid: SessionId, options: ModelOptions = {}): Model {
  return {
    clock: createClock(sid),
    index: new Map(),
    root: ORIGIN,
    maxDepth: options.maxDepth ?? MAX_TRAVERSAL_DEPTH,
    listeners: new Set(),
  };
}

/** Create an empty document driven by the shared server clock. */
export function createServerModel(time = 1, options: ModelOptions = {}): Model {
  return {
    clock: createServerClock(time),
    index: new Map(),
    root: ORIGIN,
    maxDepth: options.maxDepth ?? MAX_TRAVERSAL_DEPTH,
    listeners: new Set(),
  };
}

export function getNode(model: Model, id: Timestamp): Node | undefined {
  return model.index.get(nodeKey(id));
}

/** Current plain value of the document; `undefined` while the root is unset. */
export function modelView(model: Model): PackValue {
  return materialize(model.index, model.root, model.maxDepth);
}

/**
 * Apply every operation of `patch`, then notify listeners. Patches count as
 * remote unless the caller produced them locally.
 */
export function applyPatch(model: Model, patch: Patch, origin: ChangeOrigin = "remote"): void {
  const notify = model.listeners.size > 0 && patch.ops.length > 0;
  const before = notify ? modelView(model) : undefined;
  for (const op of patch.ops) {
    applyOperation(model, op);
  }

  if (notify) {
    emit(model, { origin, patch, before, after: modelView(model) });
  }
}

/**
 * Subscribe to applied patches. Listeners run synchronously, in subscription
 * order; a listener that throws aborts the remaining ones.
 * @returns A function that removes the listener.
 */
export function onModelChange(model: Model, listener: ModelListener): () => void {
  model.listeners.add(listener);
  return () => {
    model.listeners.delete(listener);
  };
}

/** Remove a listener; `false` when it was not subscribed. */
export function offModelChange(model: Model, listener: ModelListener): boolean {
  return model.listeners.delete(listener);
}

function emit(model: Model, change: ModelChange): void {
  // listeners may unsubscribe while being notified
  for (const listener of [...model.listeners]) {
    listener(change);
  }
}

/**
 * Apply one operation. Every operation advances the clock; operations that
 * target unknown or mismatched nodes have no other effect, and applying the
 * same operation twice leaves the model unchanged.
 */
export function applyOperation(model: Model, op: Op): void {
  clockObserve(model.clock, op.id, opSpan(op));

  switch (op.kind) {
    case "new_con":
      create(model, op, () => newCon(op.id, op.data));
      return;
    case "new_val":
      create(model, op, () => newVal(op.id));
      return;
    case "new_obj":
      create(model, op, () => newObj(op.id));
      return;
    case "new_vec":
      create(model, op, () => newVec(op.id));
      return;
    case "new_str":
      create(model, op, () => newStr(op.id));
      return;
    case "new_bin":
      create(model, op, () => newBin(op.id));
      return;
    case "new_arr":
      create(model, op, () => newArr(op.id));
      return;
    case "ins_val": {
      if (!getNode(model, op.value)) {
        return ignore(op, "value node is unknown");
      }

      if (equalTs(op.obj, ORIGIN)) {
        if (compareTs(op.value, model.root) > 0) {
          model.root = op.value;
        }
        return;
      }

      const node = getNode(model, op.obj);
      if (node?.kind !== "val") {
        return ignore(op, "target is not a val node");
      }
      valSet(node, op.value);
      return;
    }
    case "ins_obj": {
      const node = getNode(model, op.obj);
      if (node?.kind !== "obj") {
        return ignore(op, "target is not an obj node");
      }
      for (const [key, value] of op.entries) {
        if (getNode(model, value)) {
          objPut(node, key, value);
        }
      }
      return;
    }
    case "ins_vec": {
      const node = getNode(model, op.obj);
      if (node?.kind !== "vec") {
        return ignore(op, "target is not a vec node");
      }
      for (const [index, value] of op.entries) {
        if (getNode(model, value)) {
          vecPut(node, index, value);
        }
      }
      return;
    }
    case "ins_str": {
      const node = getNode(model, op.obj);
      if (node?.kind !== "str") {
        return ignore(op, "target is not a str node");
      }
      insert(node.rga, node.id, op.after, op.id, op.data.length, op.data);
      return;
    }
    case "ins_bin": {
      const node = getNode(model, op.obj);
      if (node?.kind !== "bin") {
        return ignore(op, "target is not a bin node");
      }
      insert(node.rga, node.id, op.after, op.id, op.data.length, op.data.slice());
      return;
    }
    case "ins_arr": {
      const node = getNode(model, op.obj);
      if (node?.kind !== "arr") {
        return ignore(op, "target is not an arr node");
      }
      if (!op.data.every((element) => getNode(model, element))) {
        return ignore(op, "element node is unknown");
      }
      insert(node.rga, node.id, op.after, op.id, op.data.length, op.data.slice());
      return;
    }
    case "upd_arr": {
      const node = getNode(model, op.obj);
      if (node?.kind !== "arr") {
        return ignore(op, "target is not an arr node");
      }
      if (!getNode(model, op.value)) {
        return ignore(op, "value node is unknown");
      }
      arrUpdate(node, op.ref, op.value);
      return;
    }
    case "del": {
      const node = getNode(model, op.obj);
      switch (node?.kind) {
        case "str":
          rgaDelete(node.rga, op.what);
          return;
        case "bin":
          rgaDelete(node.rga, op.what);
          return;
        case "arr":
          rgaDelete(node.rga, op.what);
          return;
        default:
          return ignore(op, "target is not a sequence node");
      }
    }
    case "nop":
      return;
  }
}

function create(model: Model, op: Op, build: () => Node): void {
  const key = nodeKey(op.id);
  if (model.index.has(key)) {
    return ignore(op, "node already exists");
  }

  model.index.set(key, build());
}

// The container's own id is the start-of-sequence anchor.
function insert<T>(
  rga: Rga<T>,
  container: Timestamp,
  after: Timestamp,
  id: Timestamp,
  span: number,
  data: T,
): void {
  rgaInsert(rga, equalTs(after, container) ? ORIGIN : after, id, span, data);
}

function ignore(op: Op, why: string): void {
  log("ignoring %s: %s", printOp(op), why);
}

// ---

/** Deep copy sharing no mutable state with the source. */
export function cloneModel(model: Model): Model {
  return {
    clock: cloneClock(model.clock),
    index: cloneIndex(model),
    root: model.root,
    maxDepth: model.maxDepth,
    listeners: new Set(),
  };
}

/** Copy of `model` that continues editing in a new session. */
export function forkModel(model: Model, sid: SessionId): Model {
  return {
    clock: forkClock(model.clock, sid),
    index: cloneIndex(model),
    root: model.root,
    maxDepth: model.maxDepth,
    listeners: new Set(),
  };
}

/**
 * Replay patches into a fresh model. The session of the first non-empty patch
 * seeds the clock; a server-session patch (or no patch at all) yields a server
 * model.
 */
export function modelFromPatches(patches: Patch[], options: ModelOptions = {}): Model {
  const first = patches.map(patchId).find((id): id is Timestamp => id !== undefined);
  const model =
    !first || first.sid === SESSION.SERVER
      ? createServerModel(first?.time ?? 1, options)
      : createModel(first.sid, options);
  for (const patch of patches) {
    applyPatch(model, patch);
  }

  return model;
}

/**
 * Build `value` as a fresh node tree, point the root at it and return the
 * patch that did so.
 */
export function setModelRoot(model: Model, value: PackValue): Patch {
  const builder = new PatchBuilder(cloneClock(model.clock));
  builder.root(builder.json(value));
  const patch = builder.flush();
  applyPatch(model, patch, "local");
  return patch;
}

/** Diff against `next` and apply the result as a local change. */
export function updateModel(
  model: Model,
  next: PackValue,
  options?: DiffOptions,
): Patch | undefined {
  const patch = diff(model, next, options);
  if (patch) {
    applyPatch(model, patch, "local");
  }

  return patch;
}

// --- path lookup

function resolve(model: Model, id: Timestamp): Node | undefined {
  return resolveNode(model.index, id, 0, model.maxDepth)?.node;
}

/** Node stored under `key` of the object `obj`, registers followed. */
export function objField(model: Model, obj: Timestamp, key: string): Node | undefined {
  const node = resolve(model, obj);
  if (node?.kind !== "obj") {
    return undefined;
  }

  const child = node.keys.get(key);
  return child ? resolve(model, child) : undefined;
}

/** Like `objField`, on the document root. */
export function rootField(model: Model, key: string): Node | undefined {
  return objField(model, model.root, key);
}

/**
 * Walk `path` from the root: keys step into objects, indexes into the live
 * elements of arrays and into vector slots. Registers are followed on the way.
 * Returns `undefined` as soon as a step does not apply.
 */
export function findNode(model: Model, path: readonly PathStep[]): Node | undefined {
  let node = resolve(model, model.root);
  for (const step of path) {
    if (!node) {
      return undefined;
    }
    const child = childAt(node, step);
    node = child ? resolve(model, child) : undefined;
  }

  return node;
}

/** View of the node at `path`; `undefined` when there is none. */
export function findView(model: Model, path: readonly PathStep[]): PackValue {
  const node = findNode(model, path);
  return node ? materialize(model.index, node.id, model.maxDepth) : undefined;
}

function childAt(node: Node, step: PathStep): Timestamp | undefined {
  if (typeof step === "string") {
    return node.kind === "obj" ? node.keys.get(step) : undefined;
  }

  switch (node.kind) {
    case "arr":
      return arrElements(node)[step];
    case "vec":
      return node.elements[step];
    default:
      return undefined;
  }
}

function cloneIndex(model: Model): Map<string, Node> {
  const index = new Map<string, Node>();
  for (const [key, node] of model.index) {
    index.set(key, cloneNode(node));
  }

  return index;
}

function cloneChunks<T>(rga: Rga<T>, copy: (data: T) => T): Rga<T> {
  return {
    slice: rga.slice,
    chunks: rga.chunks.map(
      (chunk): Chunk<T> => ({
        id: chunk.id,
        span: chunk.span,
        deleted: chunk.deleted,
        data: chunk.data === undefined ? undefined : copy(chunk.data),
      }),
    ),
  };
}

function cloneNode(node: Node): Node {
  switch (node.kind) {
    case "con":
      return {
        kind: "con",
        id: node.id,
        data:
          node.data.type === "ref"
            ? node.data
            : { type: "value", value: clonePackValue(node.data.value) },
      };
    case "val":
      return { kind: "val", id: node.id, value: node.value };
    case "obj":
      return { kind: "obj", id: node.id, keys: new Map(node.keys) };
    case "vec":
      return { kind: "vec", id: node.id, elements: node.elements.slice() };
    case "str":
      return { kind: "str", id: node.id, rga: cloneChunks(node.rga, (data) => data) };
    case "bin":
      return { kind: "bin", id: node.id, rga: cloneChunks(node.rga, (data) => data.slice()) };
    case "arr":
      return { kind: "arr", id: node.id, rga: cloneChunks(node.rga, (data) => data.slice()) };
  }
}
