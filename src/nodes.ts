import type {
  ArrNode,
  BinNode,
  ConData,
  ConNode,
  Node,
  NodeKey,
  ObjNode,
  StrNode,
  Timestamp,
  ValNode,
  VecNode,
} from "./types";

import { compareTs, ORIGIN } from "./clock";
import { createRga, rgaFindById, rgaLiveChunks, sliceBytes, sliceIds, sliceString } from "./rga";

/** Largest index a `vec` node accepts. */
export const MAX_VEC_INDEX = 255;

/** Index key of a node id. */
export function nodeKey(id: Timestamp): NodeKey {
  return `${id.sid}.${id.time}`;
}

export function newCon(id: Timestamp, data: ConData): ConNode {
  return { kind: "con", id, data };
}

export function newVal(id: Timestamp, value: Timestamp = ORIGIN): ValNode {
  return { kind: "val", id, value };
}

export function newObj(id: Timestamp): ObjNode {
  return { kind: "obj", id, keys: new Map() };
}

export function newVec(id: Timestamp): VecNode {
  return { kind: "vec", id, elements: [] };
}

export function newStr(id: Timestamp): StrNode {
  return { kind: "str", id, rga: createRga(sliceString) };
}

export function newBin(id: Timestamp): BinNode {
  return { kind: "bin", id, rga: createRga(sliceBytes) };
}

export function newArr(id: Timestamp): ArrNode {
  return { kind: "arr", id, rga: createRga(sliceIds) };
}

// Registers only move forward: a write lands when its id is newer than the current one.

export function valSet(node: ValNode, value: Timestamp): boolean {
  if (compareTs(value, node.value) <= 0) {
    return false;
  }

  node.value = value;
  return true;
}

export function objPut(node: ObjNode, key: string, value: Timestamp): boolean {
  const current = node.keys.get(key);
  if (current && compareTs(current, value) >= 0) {
    return false;
  }

  node.keys.set(key, value);
  return true;
}

export function vecPut(node: VecNode, index: number, value: Timestamp): boolean {
  if (!Number.isInteger(index) || index < 0 || index > MAX_VEC_INDEX) {
    return false;
  }

  const current = node.elements[index];
  if (current && compareTs(current, value) >= 0) {
    return false;
  }

  while (node.elements.length < index) {
    node.elements.push(undefined);
  }
  node.elements[index] = value;
  return true;
}

/** Element id stored at array slot `slot`, if the slot is known and live. */
export function arrGetById(node: ArrNode, slot: Timestamp): Timestamp | undefined {
  const index = rgaFindById(node.rga, slot);
  if (index === undefined) {
    return undefined;
  }

  const chunk = node.rga.chunks[index]!;
  return chunk.data?.[slot.time - chunk.id.time];
}

/** Replace the element at slot `slot` when `value` is newer than the current element. */
export function arrUpdate(node: ArrNode, slot: Timestamp, value: Timestamp): boolean {
  const index = rgaFindById(node.rga, slot);
  if (index === undefined) {
    return false;
  }

  const chunk = node.rga.chunks[index]!;
  if (!chunk.data) {
    return false;
  }

  const offset = slot.time - chunk.id.time;
  const current = chunk.data[offset];
  if (current && compareTs(current, value) >= 0) {
    return false;
  }

  chunk.data[offset] = value;
  return true;
}

export function strView(node: StrNode): string {
  let out = "";
  for (const chunk of rgaLiveChunks(node.rga)) {
    out += chunk.data;
  }

  return out;
}

export function binView(node: BinNode): Uint8Array {
  const parts: Uint8Array[] = [];
  let size = 0;
  for (const chunk of rgaLiveChunks(node.rga)) {
    parts.push(chunk.data);
    size += chunk.data.length;
  }

  const out = new Uint8Array(size);
  let offset = 0;
  for (const part of parts) {
    out.set(part, offset);
    offset += part.length;
  }

  return out;
}

/** Element ids of the visible array items, in order. */
export function arrElements(node: ArrNode): Timestamp[] {
  const out: Timestamp[] = [];
  for (const chunk of rgaLiveChunks(node.rga)) {
    out.push(...chunk.data);
  }

  return out;
}

/** Ids of every node directly referenced by `node`. */
export function nodeChildren(node: Node): Timestamp[] {
  switch (node.kind) {
    case "con":
    case "str":
    case "bin":
      return [];
    case "val":
      return [node.value];
    case "obj":
      return [...node.keys.values()];
    case "vec":
      return node.elements.filter((id): id is Timestamp => id !== undefined);
    case "arr":
      return arrElements(node);
  }
}
