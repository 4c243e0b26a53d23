import type { Model, PackValue, Timestamp } from "./types";

import { assertTraversalDepth } from "./errors";
import { arrElements, binView, nodeKey, strView } from "./nodes";

const START_STATE = 5381;

const CONST = {
  null: 982_452_847,
  true: 982_453_247,
  false: 982_454_243,
  array: 982_452_259,
  string: 982_453_601,
  object: 982_454_533,
  binary: 982_454_837,
} as const;

// djb2 step on 32-bit state
function updateNum(state: number, num: number): number {
  return (Math.imul(state, 33) + num) | 0;
}

function updateStr(state: number, text: string): number {
  let next = updateNum(state, CONST.string);
  next = updateNum(next, text.length);
  for (let i = text.length - 1; i >= 0; i--) {
    next = updateNum(next, text.charCodeAt(i));
  }

  return next;
}

function updateBin(state: number, data: Uint8Array): number {
  let next = updateNum(state, CONST.binary);
  next = updateNum(next, data.length);
  for (let i = data.length - 1; i >= 0; i--) {
    next = updateNum(next, data[i]!);
  }

  return next;
}

function updateJson(state: number, value: PackValue, depth: number): number {
  assertTraversalDepth(depth);
  if (value === null) {
    return updateNum(state, CONST.null);
  }

  switch (typeof value) {
    case "number":
      return updateNum(state, Math.trunc(value));
    case "boolean":
      return updateNum(state, value ? CONST.true : CONST.false);
    case "string":
      return updateStr(updateNum(state, CONST.string), value);
    case "undefined":
      return state;
    default:
      break;
  }

  if (value instanceof Uint8Array) {
    return updateBin(state, value);
  }

  if (Array.isArray(value)) {
    let next = updateNum(state, CONST.array);
    for (const item of value) {
      next = updateJson(next, item, depth + 1);
    }
    return next;
  }

  let next = updateNum(state, CONST.object);
  for (const key of Object.keys(value).sort()) {
    next = updateStr(next, key);
    next = updateJson(next, value[key], depth + 1);
  }
  return next;
}

/** 32-bit hash of a plain value; object keys are hashed in sorted order. */
export function hashJson(value: PackValue): number {
  return updateJson(START_STATE, value, 0) >>> 0;
}

/** 32-bit hash of a string's UTF-16 code units. */
export function hashStr(text: string): number {
  return updateStr(START_STATE, text) >>> 0;
}

export function hashBin(data: Uint8Array): number {
  return updateBin(START_STATE, data) >>> 0;
}

// ---

/**
 * Readable structural fingerprint of a plain value. Strings and binary data
 * collapse to a base-36 hash; arrays and objects (keys sorted) keep their shape.
 */
export function structHash(value: PackValue, depth = 0): string {
  assertTraversalDepth(depth);
  if (value === null) {
    return "N";
  }

  switch (typeof value) {
    case "string":
      return hashStr(value).toString(36);
    case "number":
      return Number.isInteger(value) ? value.toString(36) : String(value);
    case "boolean":
      return value ? "T" : "F";
    case "undefined":
      return "U";
    default:
      break;
  }

  if (value instanceof Uint8Array) {
    return hashBin(value).toString(36);
  }

  if (Array.isArray(value)) {
    let out = "[";
    for (const item of value) {
      out += structHash(item, depth + 1) + ";";
    }
    return out + "]";
  }

  let out = "{";
  for (const key of Object.keys(value).sort()) {
    out += `${hashStr(key).toString(36)}:${structHash(value[key], depth + 1)},`;
  }
  return out + "}";
}

function structHashTs(id: Timestamp): string {
  return `${(id.sid % 2_000_000).toString(36)}.${id.time.toString(36)}`;
}

/**
 * Structural fingerprint of the node graph under `id` (the root by default).
 * Matches `structHash` of the view, except that references hash as their
 * timestamp and vector holes are skipped.
 */
export function structHashNode(model: Model, id: Timestamp = model.root, depth = 0): string {
  assertTraversalDepth(depth, model.maxDepth);
  const node = model.index.get(nodeKey(id));
  if (!node) {
    return "U";
  }

  switch (node.kind) {
    case "con":
      return node.data.type === "ref" ? structHashTs(node.data.ref) : structHash(node.data.value);
    case "val":
      return structHashNode(model, node.value, depth + 1);
    case "str":
      return hashStr(strView(node)).toString(36);
    case "bin":
      return hashBin(binView(node)).toString(36);
    case "arr": {
      let out = "[";
      for (const element of arrElements(node)) {
        out += structHashNode(model, element, depth + 1) + ";";
      }
      return out + "]";
    }
    case "vec": {
      let out = "[";
      for (const element of node.elements) {
        if (element) {
          out += structHashNode(model, element, depth + 1) + ";";
        }
      }
      return out + "]";
    }
    case "obj": {
      let out = "{";
      for (const key of [...node.keys.keys()].sort()) {
        const child = node.keys.get(key);
        const hash = child ? structHashNode(model, child, depth + 1) : "U";
        if (hash !== "U") {
          out += `${hashStr(key).toString(36)}:${hash},`;
        }
      }
      return out + "}";
    }
  }
}
