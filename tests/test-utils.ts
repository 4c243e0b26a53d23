import type { Model, PackValue, Patch, Rga, SessionId } from "../src/internals";

import { createModel, rgaLiveChunks, setModelRoot, updateModel } from "../src/internals";

export class SeededRng {
  private state: number;

  constructor(seed = 1) {
    this.state = seed >>> 0;
  }

  next(): number {
    let x = this.state;
    x ^= x << 13;
    x ^= x >>> 17;
    x ^= x << 5;
    this.state = x >>> 0;
    return this.state;
  }

  int(max: number): number {
    return this.next() % max;
  }

  bool(): boolean {
    return (this.next() & 1) === 1;
  }
}

export function shuffleArray<T>(rng: SeededRng, items: T[]): T[] {
  const arr = items.slice();
  for (let i = arr.length - 1; i > 0; i--) {
    const j = rng.int(i + 1);
    const tmp = arr[i]!;
    arr[i] = arr[j]!;
    arr[j] = tmp;
  }
  return arr;
}

export function randomPrimitive(rng: SeededRng): PackValue {
  const pick = rng.int(5);
  if (pick === 0) {
    return null;
  }
  if (pick === 1) {
    return rng.bool();
  }
  if (pick === 2) {
    return rng.int(10);
  }
  if (pick === 3) {
    return new Uint8Array([rng.int(4), rng.int(4)]);
  }
  return `s${rng.int(10)}`;
}

export function randomValue(rng: SeededRng, depth = 2): PackValue {
  if (depth <= 0) {
    return randomPrimitive(rng);
  }

  const pick = rng.int(3);
  if (pick === 0) {
    return randomPrimitive(rng);
  }
  if (pick === 1) {
    const len = rng.int(5);
    const out: PackValue[] = [];
    for (let i = 0; i < len; i++) {
      out.push(rng.bool() ? randomPrimitive(rng) : randomValue(rng, depth - 1));
    }
    return out;
  }

  const out: Record<string, PackValue> = {};
  const keys = ["a", "b", "c", "d", "e"];
  const count = rng.int(5);
  for (let i = 0; i < count; i++) {
    const key = keys[rng.int(keys.length)]!;
    out[key] = rng.bool() ? randomPrimitive(rng) : randomValue(rng, depth - 1);
  }
  return out;
}

/** Live text of a string RGA. */
export function rgaText(rga: Rga<string>): string {
  let out = "";
  for (const chunk of rgaLiveChunks(rga)) {
    out += chunk.data;
  }
  return out;
}

/** A fresh logical-clock model holding `value`. */
export function modelWith(sid: SessionId, value: PackValue): Model {
  const model = createModel(sid);
  setModelRoot(model, value);
  return model;
}

/** Diff `model` against `next`, apply the result and return it. */
export function commit(model: Model, next: PackValue): Patch | undefined {
  return updateModel(model, next);
}
