import type {
  Chunk,
  Clock,
  DecodeOptions,
  Model,
  ModelSnapshot,
  Node,
  SnapshotChunk,
  SnapshotNode,
  Timestamp,
} from "../types";

import {
  ClockError,
  clockRows,
  createClock,
  createServerClock,
  ORIGIN,
  printTs,
  SESSION,
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
import { encodeVerboseId } from "./verbose";

/** Structural JSON dump of a model, tombstones included. */
export function encodeSnapshot(model: Model): ModelSnapshot {
  const time: ModelSnapshot["time"] =
    model.clock.kind === "server"
      ? model.clock.time
      : clockRows(model.clock).map((row): [number, number] => [row.sid, row.time]);
  const root = model.index.has(nodeKey(model.root)) ? snapshotNode(model, model.root, 0) : null;
  return { time, root };
}

function snapshotNode(model: Model, id: Timestamp, depth: number): SnapshotNode {
  assertTraversalDepth(depth, model.maxDepth);
  const node = model.index.get(nodeKey(id));
  if (!node) {
    throw new Error(`cannot encode unknown node ${printTs(id)}`);
  }

  const nodeId = encodeVerboseId(node.id);
  switch (node.kind) {
    case "con":
      if (node.data.type === "ref") {
        return { type: "con", id: nodeId, timestamp: true, value: encodeVerboseId(node.data.ref) };
      }
      return node.data.value === undefined
        ? { type: "con", id: nodeId }
        : { type: "con", id: nodeId, value: node.data.value };
    case "val":
      return model.index.has(nodeKey(node.value))
        ? { type: "val", id: nodeId, value: snapshotNode(model, node.value, depth + 1) }
        : { type: "val", id: nodeId };
    case "obj": {
      const map = Object.create(null) as Record<string, SnapshotNode>;
      for (const [key, child] of node.keys) {
        if (model.index.has(nodeKey(child))) {
          Object.defineProperty(map, key, {
            configurable: true,
            enumerable: true,
            value: snapshotNode(model, child, depth + 1),
            writable: true,
          });
        }
      }
      return { type: "obj", id: nodeId, map };
    }
    case "vec":
      return {
        type: "vec",
        id: nodeId,
        map: node.elements.map((element) =>
          element && model.index.has(nodeKey(element))
            ? snapshotNode(model, element, depth + 1)
            : null,
        ),
      };
    case "str":
      return {
        type: "str",
        id: nodeId,
        chunks: node.rga.chunks.map((chunk): SnapshotChunk<string> =>
          chunk.data === undefined
            ? { id: encodeVerboseId(chunk.id), span: chunk.span }
            : { id: encodeVerboseId(chunk.id), value: chunk.data },
        ),
      };
    case "bin":
      return {
        type: "bin",
        id: nodeId,
        chunks: node.rga.chunks.map((chunk): SnapshotChunk<string> =>
          chunk.data === undefined
            ? { id: encodeVerboseId(chunk.id), span: chunk.span }
            : { id: encodeVerboseId(chunk.id), value: toBase64(chunk.data) },
        ),
      };
    case "arr":
      return {
        type: "arr",
        id: nodeId,
        chunks: node.rga.chunks.map((chunk): SnapshotChunk<SnapshotNode[]> =>
          chunk.data === undefined
            ? { id: encodeVerboseId(chunk.id), span: chunk.span }
            : {
                id: encodeVerboseId(chunk.id),
                value: chunk.data.map((child) => snapshotNode(model, child, depth + 1)),
              },
        ),
      };
  }
}

// ---

/** Rebuild a model from `encodeSnapshot` output; every field is validated. */
export function decodeSnapshot(data: unknown, options: DecodeOptions = {}): Model {
  const raw = asRecord(data, "/");
  const model: Model = {
    clock: readSnapshotClock(raw.time),
    index: new Map(),
    root: ORIGIN,
    maxDepth: options.maxDepth ?? MAX_TRAVERSAL_DEPTH,
    listeners: new Set(),
  };
  if (raw.root !== null) {
    model.root = readSnapshotNode(model, raw.root, "/root", 0);
  }

  return model;
}

export function tryDecodeSnapshot(data: unknown, options?: DecodeOptions): TryDecodeResult<Model> {
  return tryDecode(() => decodeSnapshot(data, options));
}

function readSnapshotClock(value: unknown): Clock {
  try {
    if (typeof value === "number") {
      return createServerClock(readUint(value, "/time"));
    }

    const rows = asArray(value, "/time").map((row, i) => readId(row, `/time/${i}`, SESSION.SERVER));
    const [local, ...peers] = rows;
    if (!local) {
      fail("INVALID_SHAPE", "/time", "clock must have a local row");
    }
    const clock = createClock(local.sid, local.time);
    for (const peer of peers) {
      if (peer.sid !== SESSION.SYSTEM && peer.sid !== local.sid) {
        clock.peers.set(peer.sid, peer);
      }
    }
    return clock;
  } catch (error) {
    if (error instanceof ClockError) {
      fail("INVALID_SHAPE", "/time", error.message);
    }
    throw error;
  }
}

function readSnapshotNode(model: Model, value: unknown, path: string, depth: number): Timestamp {
  assertTraversalDepth(depth, model.maxDepth);
  const raw = asRecord(value, path);
  const id = readId(raw.id, `${path}/id`, SESSION.SERVER);
  const node = readSnapshotBody(model, raw, id, path, depth);
  const key = nodeKey(id);
  if (!model.index.has(key)) {
    model.index.set(key, node);
  }

  return id;
}

function readSnapshotBody(
  model: Model,
  raw: Record<string, unknown>,
  id: Timestamp,
  path: string,
  depth: number,
): Node {
  const type = readString(raw.type, `${path}/type`);
  switch (type) {
    case "con":
      if (raw.timestamp === true) {
        return newCon(id, { type: "ref", ref: readId(raw.value, `${path}/value`, SESSION.SERVER) });
      }
      return newCon(id, {
        type: "value",
        value: "value" in raw ? readPackValue(raw.value, `${path}/value`, model.maxDepth) : undefined,
      });
    case "val":
      return "value" in raw
        ? newVal(id, readSnapshotNode(model, raw.value, `${path}/value`, depth + 1))
        : newVal(id);
    case "obj": {
      const node = newObj(id);
      const map = asRecord(raw.map, `${path}/map`);
      for (const key of Object.keys(map)) {
        node.keys.set(key, readSnapshotNode(model, map[key], `${path}/map/${key}`, depth + 1));
      }
      return node;
    }
    case "vec": {
      const elements = asArray(raw.map, `${path}/map`);
      if (elements.length > MAX_VEC_INDEX + 1) {
        fail("INVALID_SHAPE", `${path}/map`, `vec of ${elements.length} elements`);
      }
      const node = newVec(id);
      elements.forEach((element, i) => {
        node.elements.push(
          element === null
            ? undefined
            : readSnapshotNode(model, element, `${path}/map/${i}`, depth + 1),
        );
      });
      return node;
    }
    case "str": {
      const node = newStr(id);
      readChunks(raw, path, (chunkId, span, chunkValue, at) => {
        let data: string | undefined;
        if (chunkValue !== undefined) {
          data = readString(chunkValue, at);
          if (data.length === 0) {
            fail("INVALID_SHAPE", at, "empty chunk");
          }
        }
        rgaPushChunk(node.rga, chunkOf(chunkId, span ?? data?.length ?? 0, data));
      });
      return node;
    }
    case "bin": {
      const node = newBin(id);
      readChunks(raw, path, (chunkId, span, chunkValue, at) => {
        let data: Uint8Array | undefined;
        if (chunkValue !== undefined) {
          data = fromBase64(chunkValue, at);
          if (data.length === 0) {
            fail("INVALID_SHAPE", at, "empty chunk");
          }
        }
        rgaPushChunk(node.rga, chunkOf(chunkId, span ?? data?.length ?? 0, data));
      });
      return node;
    }
    case "arr": {
      const node = newArr(id);
      readChunks(raw, path, (chunkId, span, chunkValue, at) => {
        let data: Timestamp[] | undefined;
        if (chunkValue !== undefined) {
          data = asArray(chunkValue, at).map((child, j) =>
            readSnapshotNode(model, child, `${at}/${j}`, depth + 1),
          );
          if (data.length === 0) {
            fail("INVALID_SHAPE", at, "empty chunk");
          }
        }
        rgaPushChunk(node.rga, chunkOf(chunkId, span ?? data?.length ?? 0, data));
      });
      return node;
    }
    default:
      return fail("INVALID_SHAPE", `${path}/type`, `unknown node type '${type}'`);
  }
}

/** Visit each chunk: tombstones report their `span`, live chunks their raw `value`. */
function readChunks(
  raw: Record<string, unknown>,
  path: string,
  visit: (id: Timestamp, span: number | undefined, value: unknown, at: string) => void,
): void {
  asArray(raw.chunks, `${path}/chunks`).forEach((entry, i) => {
    const at = `${path}/chunks/${i}`;
    const chunk = asRecord(entry, at);
    const id = readId(chunk.id, `${at}/id`, SESSION.SERVER);
    if ("value" in chunk) {
      visit(id, undefined, chunk.value, `${at}/value`);
      return;
    }
    visit(id, readPositive(chunk.span, `${at}/span`), undefined, `${at}/span`);
  });
}

function chunkOf<T>(id: Timestamp, span: number, data: T | undefined): Chunk<T> {
  return { id, span, deleted: data === undefined, data };
}
