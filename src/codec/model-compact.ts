import type {
  Chunk,
  Clock,
  CompactModel,
  CompactModelNode,
  DecodeOptions,
  Model,
  Node,
  PackValue,
  Timestamp,
} from "../types";

import {
  ClockError,
  createClock,
  createServerClock,
  ORIGIN,
  printTs,
  SESSION,
  ts,
} from "../clock";
import {
  assertTraversalDepth,
  fail,
  MAX_TRAVERSAL_DEPTH,
  tryDecode,
  type TryDecodeResult,
} from "../errors";
import {
  MAX_VEC_INDEX,
  newArr,
  newBin,
  newCon,
  newObj,
  newStr,
  newVal,
  newVec,
  nodeKey,
} from "../nodes";
import { readPackValue } from "../pack-value";
import { rgaPushChunk } from "../rga";
import { tableRows } from "./model-binary";
import {
  asArray,
  asRecord,
  fromBase64,
  readId,
  readPositive,
  readString,
  readUint,
  toBase64,
} from "./shared";

const TYPE = {
  con: 0,
  val: 1,
  obj: 2,
  vec: 3,
  str: 4,
  bin: 5,
  arr: 6,
} as const;

type IdEncoder = (id: Timestamp) => PackValue;
type IdDecoder = (value: unknown, path: string) => Timestamp;

/**
 * Encode a model as nested arrays, tombstones included.
 *
 * Server documents write ids as bare times. Logical documents write the clock
 * table flattened to `sid, time` pairs and every id as `[row, base - time]`.
 * Nodes are `[type, id, ...payload]`; sequence chunks are `[id, data]` when
 * live and `[id, span]` when deleted.
 */
export function encodeCompactModel(model: Model): CompactModel {
  if (model.clock.kind === "server") {
    const encodeId: IdEncoder = (id) =>
      id.sid === SESSION.SERVER ? id.time : [id.sid, id.time];
    return [model.clock.time, compactRoot(model, encodeId)];
  }

  const rows = tableRows(model, model.clock);
  const index = new Map(rows.map((row, i) => [row.sid, i]));
  const encodeId: IdEncoder = (id) => {
    const idx = index.get(id.sid) ?? 0;
    return [idx, (rows[idx]?.time ?? 0) - id.time];
  };
  const root = compactRoot(model, encodeId);
  return [rows.flatMap((row) => [row.sid, row.time]), root];
}

function compactRoot(model: Model, encodeId: IdEncoder): CompactModelNode | 0 {
  return model.index.has(nodeKey(model.root)) ? compactNode(model, model.root, encodeId, 0) : 0;
}

function compactNode(
  model: Model,
  id: Timestamp,
  encodeId: IdEncoder,
  depth: number,
): CompactModelNode {
  assertTraversalDepth(depth, model.maxDepth);
  const node = model.index.get(nodeKey(id));
  if (!node) {
    throw new Error(`cannot encode unknown node ${printTs(id)}`);
  }

  const nodeId = encodeId(node.id);
  const child = (childId: Timestamp): CompactModelNode =>
    compactNode(model, childId, encodeId, depth + 1);
  switch (node.kind) {
    case "con":
      if (node.data.type === "ref") {
        return [TYPE.con, nodeId, encodeId(node.data.ref), true];
      }
      return node.data.value === undefined
        ? [TYPE.con, nodeId]
        : [TYPE.con, nodeId, node.data.value];
    case "val":
      return model.index.has(nodeKey(node.value))
        ? [TYPE.val, nodeId, child(node.value)]
        : [TYPE.val, nodeId];
    case "obj": {
      const map = Object.create(null) as Record<string, CompactModelNode>;
      for (const [key, value] of node.keys) {
        if (model.index.has(nodeKey(value))) {
          Object.defineProperty(map, key, {
            configurable: true,
            enumerable: true,
            value: child(value),
            writable: true,
          });
        }
      }
      return [TYPE.obj, nodeId, map];
    }
    case "vec":
      return [
        TYPE.vec,
        nodeId,
        node.elements.map((element) =>
          element && model.index.has(nodeKey(element)) ? child(element) : 0,
        ),
      ];
    case "str":
      return [
        TYPE.str,
        nodeId,
        node.rga.chunks.map((chunk) => [encodeId(chunk.id), chunk.data ?? chunk.span]),
      ];
    case "bin":
      return [
        TYPE.bin,
        nodeId,
        node.rga.chunks.map((chunk) => [
          encodeId(chunk.id),
          chunk.data === undefined ? chunk.span : toBase64(chunk.data),
        ]),
      ];
    case "arr":
      return [
        TYPE.arr,
        nodeId,
        node.rga.chunks.map((chunk) => [
          encodeId(chunk.id),
          chunk.data === undefined ? chunk.span : chunk.data.map(child),
        ]),
      ];
  }
}

// ---

/** Rebuild a model from `encodeCompactModel` output; every field is validated. */
export function decodeCompactModel(data: unknown, options: DecodeOptions = {}): Model {
  const raw = asArray(data, "/");
  if (raw.length !== 2) {
    fail("INVALID_SHAPE", "/", "expected [clock, root]");
  }

  const [clock, decodeId] = readCompactClock(raw[0]);
  const model: Model = {
    clock,
    index: new Map(),
    root: ORIGIN,
    maxDepth: options.maxDepth ?? MAX_TRAVERSAL_DEPTH,
    listeners: new Set(),
  };
  if (raw[1] !== 0) {
    model.root = readCompactNode(model, raw[1], "/1", decodeId, 0);
  }

  return model;
}

export function tryDecodeCompactModel(
  data: unknown,
  options?: DecodeOptions,
): TryDecodeResult<Model> {
  return tryDecode(() => decodeCompactModel(data, options));
}

function readCompactClock(value: unknown): [Clock, IdDecoder] {
  try {
    if (typeof value === "number") {
      return [
        createServerClock(readUint(value, "/0")),
        (id, path) => readId(id, path, SESSION.SERVER),
      ];
    }

    const flat = asArray(value, "/0");
    if (flat.length === 0 || flat.length % 2 !== 0) {
      fail("INVALID_SHAPE", "/0", "clock table must hold sid, time pairs");
    }
    const rows: Timestamp[] = [];
    for (let i = 0; i < flat.length; i += 2) {
      rows.push(ts(readUint(flat[i], `/0/${i}`), readUint(flat[i + 1], `/0/${i + 1}`)));
    }

    const [local, ...peers] = rows;
    if (!local) {
      fail("INVALID_SHAPE", "/0", "clock must have a local row");
    }
    const clock = createClock(local.sid, local.time);
    for (const peer of peers) {
      if (peer.sid !== SESSION.SYSTEM && peer.sid !== local.sid) {
        clock.peers.set(peer.sid, peer);
      }
    }

    const decodeId: IdDecoder = (id, path) => {
      const pair = asArray(id, path);
      if (pair.length !== 2) {
        fail("INVALID_ID", path, "expected a [row, diff] pair");
      }
      const idx = readUint(pair[0], `${path}/0`);
      const diff = readUint(pair[1], `${path}/1`);
      const row = rows[idx];
      if (!row || row.time < diff) {
        fail("INVALID_ID", path, `id refers to missing clock row ${idx}`);
      }
      return ts(row.sid, row.time - diff);
    };
    return [clock, decodeId];
  } catch (error) {
    if (error instanceof ClockError) {
      fail("INVALID_SHAPE", "/0", error.message);
    }
    throw error;
  }
}

function readCompactNode(
  model: Model,
  value: unknown,
  path: string,
  decodeId: IdDecoder,
  depth: number,
): Timestamp {
  assertTraversalDepth(depth, model.maxDepth);
  const raw = asArray(value, path);
  const type = readUint(raw[0], `${path}/0`);
  const id = decodeId(raw[1], `${path}/1`);
  const node = readCompactBody(model, raw, type, id, path, decodeId, depth);
  // a node shared by several parents is written once per parent
  const key = nodeKey(id);
  if (!model.index.has(key)) {
    model.index.set(key, node);
  }

  return id;
}

function readCompactBody(
  model: Model,
  raw: unknown[],
  type: number,
  id: Timestamp,
  path: string,
  decodeId: IdDecoder,
  depth: number,
): Node {
  const child = (value: unknown, at: string): Timestamp =>
    readCompactNode(model, value, at, decodeId, depth + 1);
  const payload = `${path}/2`;
  switch (type) {
    case TYPE.con:
      if (raw.length === 2) {
        return newCon(id, { type: "value", value: undefined });
      }
      if (raw.length === 3) {
        return newCon(id, {
          type: "value",
          value: readPackValue(raw[2], payload, model.maxDepth),
        });
      }
      if (raw.length === 4 && raw[3] === true) {
        return newCon(id, { type: "ref", ref: decodeId(raw[2], payload) });
      }
      return fail("INVALID_SHAPE", path, "malformed con node");
    case TYPE.val:
      if (raw.length === 2) {
        return newVal(id);
      }
      if (raw.length !== 3) {
        fail("INVALID_SHAPE", path, "malformed val node");
      }
      return newVal(id, child(raw[2], payload));
    case TYPE.obj: {
      const node = newObj(id);
      const map = asRecord(raw[2], payload);
      for (const key of Object.keys(map)) {
        node.keys.set(key, child(map[key], `${payload}/${key}`));
      }
      return node;
    }
    case TYPE.vec: {
      const elements = asArray(raw[2], payload);
      if (elements.length > MAX_VEC_INDEX + 1) {
        fail("INVALID_SHAPE", payload, `vec of ${elements.length} elements`);
      }
      const node = newVec(id);
      elements.forEach((element, i) => {
        node.elements.push(element === 0 ? undefined : child(element, `${payload}/${i}`));
      });
      return node;
    }
    case TYPE.str: {
      const node = newStr(id);
      readChunks(raw[2], payload, decodeId, (chunkId, data, at) => {
        const text = readString(data, at);
        return text.length > 0 ? chunkOf(chunkId, text.length, text) : undefined;
      }).forEach((chunk) => rgaPushChunk(node.rga, chunk));
      return node;
    }
    case TYPE.bin: {
      const node = newBin(id);
      readChunks(raw[2], payload, decodeId, (chunkId, data, at) => {
        const bytes = fromBase64(data, at);
        return bytes.length > 0 ? chunkOf(chunkId, bytes.length, bytes) : undefined;
      }).forEach((chunk) => rgaPushChunk(node.rga, chunk));
      return node;
    }
    case TYPE.arr: {
      const node = newArr(id);
      readChunks(raw[2], payload, decodeId, (chunkId, data, at) => {
        const ids = asArray(data, at).map((element, j) => child(element, `${at}/${j}`));
        return ids.length > 0 ? chunkOf(chunkId, ids.length, ids) : undefined;
      }).forEach((chunk) => rgaPushChunk(node.rga, chunk));
      return node;
    }
    default:
      return fail("INVALID_SHAPE", `${path}/0`, `unknown node type ${type}`);
  }
}

/**
 * Read `[id, data]` chunks. A numeric second field is a tombstone span;
 * anything else goes to `live`, which returns `undefined` for empty data.
 */
function readChunks<T>(
  value: unknown,
  path: string,
  decodeId: IdDecoder,
  live: (id: Timestamp, data: unknown, at: string) => Chunk<T> | undefined,
): Array<Chunk<T>> {
  return asArray(value, path).map((entry, i) => {
    const at = `${path}/${i}`;
    const pair = asArray(entry, at);
    if (pair.length !== 2) {
      fail("INVALID_SHAPE", at, "expected [id, data]");
    }
    const id = decodeId(pair[0], `${at}/0`);
    if (typeof pair[1] === "number") {
      return chunkOf<T>(id, readPositive(pair[1], `${at}/1`), undefined);
    }

    const chunk = live(id, pair[1], `${at}/1`);
    if (!chunk) {
      fail("INVALID_SHAPE", `${at}/1`, "empty chunk");
    }
    return chunk;
  });
}

function chunkOf<T>(id: Timestamp, span: number, data: T | undefined): Chunk<T> {
  return { id, span, deleted: data === undefined, data };
}
