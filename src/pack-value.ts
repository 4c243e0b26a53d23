import type { PackValue } from "./types";

import { assertTraversalDepth, fail, MAX_TRAVERSAL_DEPTH } from "./errors";

type NormalizeSlot =
  | { readonly kind: "root" }
  | { readonly kind: "array"; readonly out: PackValue[]; readonly index: number }
  | { readonly kind: "object"; readonly out: Record<string, PackValue>; readonly key: string };

type NormalizeFrame = {
  readonly value: unknown;
  readonly path: string;
  readonly depth: number;
  readonly slot: NormalizeSlot;
};

export function createPackObject(): Record<string, PackValue> {
  return Object.create(null) as Record<string, PackValue>;
}

export function setPackProperty(out: Record<string, PackValue>, key: string, value: PackValue): void {
  Object.defineProperty(out, key, {
    configurable: true,
    enumerable: true,
    value,
    writable: true,
  });
}

export function isPackObject(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === "object" &&
    value !== null &&
    !Array.isArray(value) &&
    !(value instanceof Uint8Array)
  );
}

/**
 * Validate an untrusted value and copy it into the constant domain.
 * Binary values are normalized to plain `Uint8Array` views; anything else
 * (functions, symbols, bigints, non-finite numbers, class instances) is a
 * `DecodeError("INVALID_SHAPE")` at the offending path.
 */
export function readPackValue(
  value: unknown,
  path = "",
  maxDepth: number = MAX_TRAVERSAL_DEPTH,
): PackValue {
  const rootHolder: { value?: PackValue } = {};
  const stack: NormalizeFrame[] = [{ value, path, depth: 0, slot: { kind: "root" } }];

  while (stack.length > 0) {
    const frame = stack.pop()!;
    assertTraversalDepth(frame.depth, maxDepth);
    const raw = frame.value;

    if (
      raw === null ||
      raw === undefined ||
      typeof raw === "string" ||
      typeof raw === "boolean"
    ) {
      assignSlot(frame.slot, raw, rootHolder);
      continue;
    }

    if (typeof raw === "number") {
      if (!Number.isFinite(raw)) {
        fail("INVALID_SHAPE", frame.path || "/", `non-finite number (${String(raw)})`);
      }

      assignSlot(frame.slot, raw, rootHolder);
      continue;
    }

    if (raw instanceof Uint8Array) {
      assignSlot(frame.slot, new Uint8Array(raw), rootHolder);
      continue;
    }

    if (Array.isArray(raw)) {
      const out: PackValue[] = new Array<PackValue>(raw.length);
      assignSlot(frame.slot, out, rootHolder);
      for (const [index, child] of raw.entries()) {
        stack.push({
          value: child,
          path: `${frame.path}/${index}`,
          depth: frame.depth + 1,
          slot: { kind: "array", out, index },
        });
      }
      continue;
    }

    if (isPackObject(raw) && isPlainPrototype(raw)) {
      const out = createPackObject();
      assignSlot(frame.slot, out, rootHolder);
      for (const [key, child] of Object.entries(raw)) {
        stack.push({
          value: child,
          path: `${frame.path}/${escapePathSegment(key)}`,
          depth: frame.depth + 1,
          slot: { kind: "object", out, key },
        });
      }
      continue;
    }

    fail("INVALID_SHAPE", frame.path || "/", describeInvalidValue(raw));
  }

  return rootHolder.value;
}

/** Structural equality over constants; binary values compare byte-wise. */
export function packEquals(a: PackValue, b: PackValue): boolean {
  const stack: Array<[PackValue, PackValue]> = [[a, b]];

  while (stack.length > 0) {
    const [left, right] = stack.pop()!;
    if (left === right) {
      continue;
    }

    if (left instanceof Uint8Array || right instanceof Uint8Array) {
      if (!(left instanceof Uint8Array) || !(right instanceof Uint8Array)) {
        return false;
      }
      if (!bytesEqual(left, right)) {
        return false;
      }
      continue;
    }

    if (Array.isArray(left) || Array.isArray(right)) {
      if (!Array.isArray(left) || !Array.isArray(right) || left.length !== right.length) {
        return false;
      }
      for (let i = 0; i < left.length; i++) {
        stack.push([left[i], right[i]]);
      }
      continue;
    }

    if (
      typeof left !== "object" ||
      typeof right !== "object" ||
      left === null ||
      right === null
    ) {
      return false;
    }

    const leftKeys = Object.keys(left);
    if (leftKeys.length !== Object.keys(right).length) {
      return false;
    }
    for (const key of leftKeys) {
      if (!Object.prototype.hasOwnProperty.call(right, key)) {
        return false;
      }
      stack.push([left[key], right[key]]);
    }
  }

  return true;
}

export function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) {
    return false;
  }

  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) {
      return false;
    }
  }

  return true;
}

/** Deep copy of a constant. */
export function clonePackValue(value: PackValue): PackValue {
  return readPackValue(value);
}

function assignSlot(
  slot: NormalizeSlot,
  value: PackValue,
  rootHolder: { value?: PackValue },
): void {
  if (slot.kind === "root") {
    rootHolder.value = value;
    return;
  }

  if (slot.kind === "array") {
    slot.out[slot.index] = value;
    return;
  }

  setPackProperty(slot.out, slot.key, value);
}

function isPlainPrototype(value: object): boolean {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === null || proto === Object.prototype;
}

function escapePathSegment(segment: string): string {
  return segment.replaceAll("~", "~0").replaceAll("/", "~1");
}

function describeInvalidValue(value: unknown): string {
  if (typeof value === "bigint") {
    return "bigint is not a supported constant";
  }

  if (typeof value === "symbol") {
    return "symbol is not a supported constant";
  }

  if (typeof value === "function") {
    return "function is not a supported constant";
  }

  return `unsupported value type (${typeof value})`;
}
