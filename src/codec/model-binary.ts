import type {
  Chunk,
  ClockVector,
  DecodeOptions,
  Model,
  Node,
  SessionId,
  Timestamp,
} from "../types";

import { readClockTable, Reader, writeClockTable, Writer, type ClockTableRow } from "../binary";
import {
  ClockError,
  clockRows,
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
  nodeChildren,
  nodeKey,
} from "../nodes";
import { rgaPushChunk } from "../rga";

const MAJOR = {
  con: 0,
  val: 1,
  obj: 2,
  vec: 3,
  str: 4,
  bin: 5,
  arr: 6,
} as const;

const SERVER_MODE = 0x80;
const LEN_FOLLOWS = 31;

type IdWriter = (writer: Writer, id: Timestamp) => void;
type IdReader = (reader: Reader) => Timestamp;

/**
 * Encode a whole document.
 *
 * Logical-clock documents start with the 4-byte length of the node tree, then
 * the tree, then the clock table; ids are written relative to their session's
 * row in the table. Server-clock documents start with `0x80` and the server
 * time, and write every id as a bare time. Constants and object keys are raw
 * CBOR items.
 */
export function encodeModel(model: Model): Uint8Array {
  const writer = new Writer();
  const encodeNode = (writeId: IdWriter): void => {
    if (!model.index.has(nodeKey(model.root))) {
      writer.u8(0);
      return;
    }
    writer.u8(1);
    writeNode(writer, model, model.root, writeId, 0);
  };

  if (model.clock.kind === "server") {
    writer.u8(SERVER_MODE);
    writer.vu57(model.clock.time);
    encodeNode((w, id) => {
      if (id.sid !== SESSION.SERVER) {
        throw new ClockError("INVALID_SESSION", `id ${printTs(id)} is not a server id`);
      }
      w.vu57(id.time);
    });
    return writer.flush();
  }

  const rows = tableRows(model, model.clock);
  const index = new Map<SessionId, number>(rows.map((row, i) => [row.sid, i]));
  writer.u32(0);
  encodeNode((w, id) => {
    const idx = index.get(id.sid) ?? 0;
    const base = rows[idx]?.time ?? 0;
    const diff = base - id.time;
    if (idx <= 7 && diff <= 15) {
      w.u8((idx << 4) | diff);
      return;
    }
    w.b1vu56(1, idx);
    w.vu57(diff);
  });
  writer.patchU32(0, writer.length - 4);
  writeClockTable(writer, rows);
  return writer.flush();
}

/** Local row first; every other session gets a base no smaller than any of its ids. */
export function tableRows(model: Model, clock: ClockVector): ClockTableRow[] {
  const bases = new Map<SessionId, number>();
  for (const row of clockRows(clock)) {
    bases.set(row.sid, row.time);
  }

  const see = (id: Timestamp): void => {
    const base = bases.get(id.sid);
    if (base === undefined || base < id.time) {
      bases.set(id.sid, id.time);
    }
  };
  const stack: Timestamp[] = model.index.has(nodeKey(model.root)) ? [model.root] : [];
  while (stack.length > 0) {
    const node = model.index.get(nodeKey(stack.pop()!));
    if (!node) {
      continue;
    }
    see(node.id);
    switch (node.kind) {
      case "con":
        if (node.data.type === "ref") {
          see(node.data.ref);
        }
        break;
      case "str":
        node.rga.chunks.forEach((chunk) => see(chunk.id));
        break;
      case "bin":
        node.rga.chunks.forEach((chunk) => see(chunk.id));
        break;
      case "arr":
        node.rga.chunks.forEach((chunk) => see(chunk.id));
        break;
      default:
        break;
    }
    stack.push(...nodeChildren(node));
  }

  // the system session never becomes a peer, so it always goes last
  const rows = [...bases].map(([sid, time]) => ts(sid, time));
  return [
    ...rows.filter((row) => row.sid !== SESSION.SYSTEM),
    ...rows.filter((row) => row.sid === SESSION.SYSTEM),
  ];
}

function writeHeader(writer: Writer, major: number, len: number): void {
  if (len < LEN_FOLLOWS) {
    writer.u8((major << 5) | len);
    return;
  }

  writer.u8((major << 5) | LEN_FOLLOWS);
  writer.vu57(len);
}

function writeNode(
  writer: Writer,
  model: Model,
  id: Timestamp,
  writeId: IdWriter,
  depth: number,
): void {
  assertTraversalDepth(depth, model.maxDepth);
  const node = model.index.get(nodeKey(id));
  if (!node) {
    throw new Error(`cannot encode unknown node ${printTs(id)}`);
  }

  writeId(writer, node.id);
  switch (node.kind) {
    case "con":
      if (node.data.type === "ref") {
        writeHeader(writer, MAJOR.con, 1);
        writeId(writer, node.data.ref);
      } else {
        writeHeader(writer, MAJOR.con, 0);
        writer.cbor(node.data.value);
      }
      return;
    case "val":
      // len 1 marks a register that was never written
      if (!model.index.has(nodeKey(node.value))) {
        writeHeader(writer, MAJOR.val, 1);
        return;
      }
      writeHeader(writer, MAJOR.val, 0);
      writeNode(writer, model, node.value, writeId, depth + 1);
      return;
    case "obj": {
      const entries = [...node.keys].filter(([, child]) => model.index.has(nodeKey(child)));
      writeHeader(writer, MAJOR.obj, entries.length);
      for (const [key, child] of entries) {
        writer.cbor(key);
        writeNode(writer, model, child, writeId, depth + 1);
      }
      return;
    }
    case "vec":
      writeHeader(writer, MAJOR.vec, node.elements.length);
      for (const element of node.elements) {
        if (element && model.index.has(nodeKey(element))) {
          writer.u8(1);
          writeNode(writer, model, element, writeId, depth + 1);
        } else {
          writer.u8(0);
        }
      }
      return;
    case "str":
      writeHeader(writer, MAJOR.str, node.rga.chunks.length);
      for (const chunk of node.rga.chunks) {
        writeChunkHead(writer, chunk, writeId);
        if (chunk.data !== undefined) {
          writer.utf8(chunk.data);
        }
      }
      return;
    case "bin":
      writeHeader(writer, MAJOR.bin, node.rga.chunks.length);
      for (const chunk of node.rga.chunks) {
        writeChunkHead(writer, chunk, writeId);
        if (chunk.data !== undefined) {
          writer.bytes(chunk.data);
        }
      }
      return;
    case "arr":
      writeHeader(writer, MAJOR.arr, node.rga.chunks.length);
      for (const chunk of node.rga.chunks) {
        writeChunkHead(writer, chunk, writeId);
        for (const child of chunk.data ?? []) {
          writeNode(writer, model, child, writeId, depth + 1);
        }
      }
      return;
  }
}

function writeChunkHead<T>(writer: Writer, chunk: Chunk<T>, writeId: IdWriter): void {
  writeId(writer, chunk.id);
  writer.b1vu56(chunk.data === undefined ? 1 : 0, chunk.span);
}

// ---

/** Decode a document written by `encodeModel`. */
export function decodeModel(bytes: Uint8Array, options: DecodeOptions = {}): Model {
  const maxDepth = options.maxDepth ?? MAX_TRAVERSAL_DEPTH;
  const first = bytes[0];
  if (first !== undefined && (first & SERVER_MODE) !== 0) {
    const reader = new Reader(bytes, 1);
    const clock = createServerClock(reader.vu57());
    const model: Model = {
      clock,
      index: new Map(),
      root: ORIGIN,
      maxDepth,
      listeners: new Set(),
    };
    decodeRoot(reader, model, (r) => ts(SESSION.SERVER, r.vu57()));
    reader.assertEnd();
    return model;
  }

  const head = new Reader(bytes);
  const treeLength = head.u32();
  const tableReader = new Reader(bytes, 4 + treeLength);
  const rows = readClockTable(tableReader);
  tableReader.assertEnd();

  const [local, ...peers] = rows;
  if (!local) {
    fail("INVALID_CLOCK_TABLE", "@4", "clock table must not be empty");
  }
  const clock = clockFromRows(local, peers);
  const model: Model = {
    clock,
    index: new Map(),
    root: ORIGIN,
    maxDepth,
    listeners: new Set(),
  };
  const reader = new Reader(bytes.subarray(0, 4 + treeLength), 4);
  decodeRoot(reader, model, (r) => {
    const at = r.at();
    let idx: number;
    let diff: number;
    const first = r.peek();
    if (first !== undefined && (first & 0x80) === 0) {
      r.u8();
      idx = first >> 4;
      diff = first & 0x0f;
    } else {
      idx = r.b1vu56()[1];
      diff = r.vu57();
    }
    const row = rows[idx];
    if (!row || row.time < diff) {
      fail("INVALID_MODEL", at, `id refers to missing clock row ${idx}`);
    }
    return ts(row.sid, row.time - diff);
  });
  reader.assertEnd();
  return model;
}

export function tryDecodeModel(bytes: Uint8Array, options?: DecodeOptions): TryDecodeResult<Model> {
  return tryDecode(() => decodeModel(bytes, options));
}

function clockFromRows(local: ClockTableRow, peers: ClockTableRow[]): ClockVector {
  let clock: ClockVector;
  try {
    clock = createClock(local.sid, local.time);
  } catch (error) {
    if (error instanceof ClockError) {
      fail("INVALID_CLOCK_TABLE", "@4", error.message);
    }
    throw error;
  }

  for (const peer of peers) {
    if (peer.sid !== SESSION.SYSTEM && peer.sid !== local.sid) {
      clock.peers.set(peer.sid, peer);
    }
  }
  return clock;
}

function decodeRoot(reader: Reader, model: Model, readId: IdReader): void {
  const at = reader.at();
  const flag = reader.u8();
  if (flag === 0) {
    return;
  }
  if (flag !== 1) {
    fail("INVALID_MODEL", at, "malformed root marker");
  }

  model.root = readNode(reader, model, readId, 0);
}

function readHeader(reader: Reader): [number, number] {
  const octet = reader.u8();
  const len = octet & LEN_FOLLOWS;
  return [octet >> 5, len === LEN_FOLLOWS ? reader.vu57() : len];
}

function readNode(reader: Reader, model: Model, readId: IdReader, depth: number): Timestamp {
  assertTraversalDepth(depth, model.maxDepth);
  const at = reader.at();
  const id = readId(reader);
  const [major, len] = readHeader(reader);
  const node = readNodeBody(reader, model, readId, depth, id, major, len, at);
  // a node shared by several parents is written once per parent
  const key = nodeKey(id);
  if (!model.index.has(key)) {
    model.index.set(key, node);
  }
  return id;
}

function readNodeBody(
  reader: Reader,
  model: Model,
  readId: IdReader,
  depth: number,
  id: Timestamp,
  major: number,
  len: number,
  at: string,
): Node {
  switch (major) {
    case MAJOR.con:
      if (len === 0) {
        return newCon(id, { type: "value", value: reader.cbor() });
      }
      if (len === 1) {
        return newCon(id, { type: "ref", ref: readId(reader) });
      }
      return fail("INVALID_MODEL", at, "malformed con node");
    case MAJOR.val:
      if (len === 1) {
        return newVal(id);
      }
      if (len !== 0) {
        fail("INVALID_MODEL", at, "malformed val node");
      }
      return newVal(id, readNode(reader, model, readId, depth + 1));
    case MAJOR.obj: {
      const node = newObj(id);
      for (let i = 0; i < len; i++) {
        const key = reader.cborText();
        node.keys.set(key, readNode(reader, model, readId, depth + 1));
      }
      return node;
    }
    case MAJOR.vec: {
      if (len > MAX_VEC_INDEX + 1) {
        fail("INVALID_MODEL", at, `vec of ${len} elements`);
      }
      const node = newVec(id);
      for (let i = 0; i < len; i++) {
        const flagAt = reader.at();
        const flag = reader.u8();
        if (flag === 0) {
          node.elements.push(undefined);
        } else if (flag === 1) {
          node.elements.push(readNode(reader, model, readId, depth + 1));
        } else {
          fail("INVALID_MODEL", flagAt, "malformed vec element marker");
        }
      }
      return node;
    }
    case MAJOR.str: {
      const node = newStr(id);
      for (let i = 0; i < len; i++) {
        const chunkAt = reader.at();
        const [chunkId, deleted, span] = readChunkHead(reader, readId);
        let data: string | undefined;
        if (!deleted) {
          data = reader.utf8();
          if (data.length !== span) {
            fail("INVALID_MODEL", chunkAt, `chunk text does not match span ${span}`);
          }
        }
        rgaPushChunk(node.rga, { id: chunkId, span, deleted, data });
      }
      return node;
    }
    case MAJOR.bin: {
      const node = newBin(id);
      for (let i = 0; i < len; i++) {
        const [chunkId, deleted, span] = readChunkHead(reader, readId);
        const data = deleted ? undefined : reader.bytes(span);
        rgaPushChunk(node.rga, { id: chunkId, span, deleted, data });
      }
      return node;
    }
    case MAJOR.arr: {
      const node = newArr(id);
      for (let i = 0; i < len; i++) {
        const [chunkId, deleted, span] = readChunkHead(reader, readId);
        let data: Timestamp[] | undefined;
        if (!deleted) {
          data = [];
          for (let j = 0; j < span; j++) {
            data.push(readNode(reader, model, readId, depth + 1));
          }
        }
        rgaPushChunk(node.rga, { id: chunkId, span, deleted, data });
      }
      return node;
    }
    default:
      return fail("INVALID_MODEL", at, `unknown node type ${major}`);
  }
}

function readChunkHead(reader: Reader, readId: IdReader): [Timestamp, boolean, number] {
  const at = reader.at();
  const id = readId(reader);
  const [deleted, span] = reader.b1vu56();
  if (span === 0) {
    fail("INVALID_MODEL", at, "empty chunk");
  }

  return [id, deleted === 1, span];
}
