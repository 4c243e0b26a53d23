import { describe, expect, it } from "vitest";

import type { Model, ModelChange, Op, Patch } from "../src/internals";

import {
  applyPatch,
  arrGetById,
  ClockError,
  cloneClock,
  cloneModel,
  createModel,
  createServerModel,
  encodeSnapshot,
  findNode,
  findView,
  forkModel,
  getNode,
  modelFromPatches,
  modelView,
  nodeChildren,
  objField,
  offModelChange,
  onModelChange,
  ORIGIN,
  PatchBuilder,
  patchId,
  rootField,
  setModelRoot,
  TraversalDepthError,
  ts,
  tss,
  updateModel,
} from "../src/internals";
import { commit, modelWith, randomValue, SeededRng } from "./test-utils";

function opsOf(...ops: Op[]): Patch {
  return { ops };
}

function edit(model: Model, build: (builder: PatchBuilder) => void): Patch {
  const builder = new PatchBuilder(cloneClock(model.clock));
  build(builder);
  const patch = builder.flush();
  applyPatch(model, patch);
  return patch;
}

describe("model apply", () => {
  it("builds a document from a plain value", () => {
    const value = { name: "doc", tags: ["x", 1, null], on: true, raw: new Uint8Array([1, 2]) };
    const model = modelWith(5, value);
    expect(modelView(model)).toEqual(value);
    expect(model.clock.time).toBe(24);
  });

  it("views an empty document as undefined", () => {
    expect(modelView(createModel(5))).toBeUndefined();
  });

  it("is idempotent under re-application", () => {
    const source = createModel(5);
    const first = setModelRoot(source, { text: "hello", list: [1, 2] });
    const second = commit(source, { text: "help", list: [1, 2, 3], flag: true });
    expect(second).toBeDefined();
    const patches = [first, ...(second ? [second] : [])];

    const replica = createModel(9);
    for (const patch of patches) {
      applyPatch(replica, patch);
    }
    const once = modelView(replica);
    const snapshot = encodeSnapshot(replica);
    for (const patch of patches) {
      applyPatch(replica, patch);
    }

    expect(once).toEqual({ text: "help", list: [1, 2, 3], flag: true });
    expect(modelView(replica)).toEqual(once);
    expect(encodeSnapshot(replica)).toEqual(snapshot);
  });

  it("ignores operations on missing or mismatched nodes", () => {
    const model = modelWith(5, { a: 1 });
    // obj 5.1, con 5.2, ins_obj 5.3, root 5.4
    applyPatch(
      model,
      opsOf(
        { kind: "new_con", id: ts(5, 1), data: { type: "value", value: 9 } },
        { kind: "ins_str", id: ts(5, 5), obj: ts(5, 1), after: ts(5, 1), data: "zz" },
        { kind: "ins_val", id: ts(5, 7), obj: ts(5, 1), value: ts(5, 2) },
        { kind: "del", id: ts(5, 8), obj: ts(5, 1), what: [tss(5, 2, 1)] },
        { kind: "ins_obj", id: ts(5, 9), obj: ts(5, 1), entries: [["b", ts(9, 9)]] },
      ),
    );

    expect(modelView(model)).toEqual({ a: 1 });
    expect(getNode(model, ts(5, 1))?.kind).toBe("obj");
    expect(model.clock.time).toBe(10);
  });

  it("keeps the newer root when an older one arrives", () => {
    const model = modelWith(5, "current");
    const root = model.root;
    applyPatch(
      model,
      opsOf(
        { kind: "new_con", id: ts(3, 1), data: { type: "value", value: "old" } },
        { kind: "ins_val", id: ts(3, 2), obj: ORIGIN, value: ts(3, 1) },
      ),
    );

    expect(model.root).toEqual(root);
    expect(modelView(model)).toBe("current");
  });

  it("ignores an array insert that references unknown elements", () => {
    const model = modelWith(5, [1]);
    const arr = model.root;
    applyPatch(
      model,
      opsOf({ kind: "ins_arr", id: ts(5, 20), obj: arr, after: arr, data: [ts(8, 1)] }),
    );
    expect(modelView(model)).toEqual([1]);
  });

  it("views a reference constant as null", () => {
    const model = createModel(5);
    edit(model, (b) => b.root(b.conRef(ts(5, 99))));
    expect(modelView(model)).toBeNull();
  });

  it("fills vector holes with null", () => {
    const model = createModel(5);
    edit(model, (b) => {
      const vec = b.vecOf([1, "x"]);
      b.insVec(vec, [[3, b.con(true)]]);
      b.root(vec);
    });
    expect(modelView(model)).toEqual([1, "x", null, true]);
  });

  it("overwrites array slots in place", () => {
    const model = modelWith(5, { list: [1, 2] });
    const patch = commit(model, { list: [1, 5] });
    expect(patch?.ops.map((op) => op.kind)).toEqual(["new_val", "new_con", "ins_val", "upd_arr"]);
    expect(modelView(model)).toEqual({ list: [1, 5] });
  });

  it("lists children and resolves array slots", () => {
    const model = modelWith(5, [1, "x"]);
    // arr 5.1, val 5.2 -> con 5.3, str 5.5, ins_arr 5.7 holding [5.2, 5.5]
    const arr = getNode(model, ts(5, 1));
    if (arr?.kind !== "arr") {
      throw new Error("expected an array root");
    }

    expect(nodeChildren(arr)).toEqual([ts(5, 2), ts(5, 5)]);
    expect(arrGetById(arr, ts(5, 8))).toEqual(ts(5, 5));
    expect(arrGetById(arr, ts(5, 9))).toBeUndefined();

    const val = getNode(model, ts(5, 2));
    expect(val && nodeChildren(val)).toEqual([ts(5, 3)]);
  });

  it("enforces the traversal depth limit", () => {
    const model = createModel(5, { maxDepth: 2 });
    setModelRoot(model, { a: { b: { c: 1 } } });
    expect(() => modelView(model)).toThrow(TraversalDepthError);
  });

  it("rejects server ids from the future", () => {
    const model = createServerModel();
    const source = createServerModel(3);
    const patch = setModelRoot(source, 1);
    expect(() => applyPatch(model, patch)).toThrow(ClockError);
  });
});

describe("replicas", () => {
  function pair(): [Model, Model] {
    const left = createModel(10);
    const base = setModelRoot(left, { text: "", list: [] });
    const right = createModel(11);
    applyPatch(right, base);
    return [left, right];
  }

  it("converges after concurrent sequence edits", () => {
    const [left, right] = pair();
    expect(right.clock.time).toBe(6);

    const fromLeft = commit(left, { text: "abc", list: [1] });
    const fromRight = commit(right, { text: "xyz", list: [2] });
    if (!fromLeft || !fromRight) {
      throw new Error("expected both replicas to produce a patch");
    }
    expect(patchId(fromLeft)).toEqual(ts(10, 6));
    expect(patchId(fromRight)).toEqual(ts(11, 6));

    applyPatch(left, fromRight);
    applyPatch(right, fromLeft);

    expect(modelView(left)).toEqual({ text: "xyzabc", list: [2, 1] });
    expect(modelView(right)).toEqual(modelView(left));
    expect(encodeSnapshot(right).root).toEqual(encodeSnapshot(left).root);
  });

  it("resolves concurrent key writes by the greater id", () => {
    const [left, right] = pair();
    const fromLeft = commit(left, { text: "", list: [], k: "left" });
    const fromRight = commit(right, { text: "", list: [], k: "right" });
    if (!fromLeft || !fromRight) {
      throw new Error("expected both replicas to produce a patch");
    }

    applyPatch(left, fromRight);
    applyPatch(right, fromLeft);

    expect(modelView(left)).toEqual({ text: "", list: [], k: "right" });
    expect(modelView(right)).toEqual({ text: "", list: [], k: "right" });
  });

  it("converges when the same patches arrive in different orders", () => {
    const rng = new SeededRng(11);
    const origin = createModel(20);
    const base = setModelRoot(origin, { a: [1, 2, 3], b: "text", c: { d: null } });

    const sids = [21, 22, 23];
    const patches: Patch[] = [];
    for (const sid of sids) {
      const replica = forkModel(origin, sid);
      for (let step = 0; step < 3; step++) {
        const patch = commit(replica, { a: [step, sid], b: `text-${sid}`, c: randomValue(rng) });
        if (patch) {
          patches.push(patch);
        }
      }
    }

    const forward = createModel(30);
    const backward = createModel(31);
    for (const patch of [base, ...patches]) {
      applyPatch(forward, patch);
    }
    applyPatch(backward, base);
    for (const sid of [...sids].reverse()) {
      for (const patch of patches) {
        if (patchId(patch)?.sid === sid) {
          applyPatch(backward, patch);
        }
      }
    }

    expect(modelView(backward)).toEqual(modelView(forward));
  });
});

describe("model copies", () => {
  it("clones without sharing state", () => {
    const model = modelWith(5, { text: "ab" });
    const copy = cloneModel(model);
    commit(copy, { text: "abc" });

    expect(modelView(model)).toEqual({ text: "ab" });
    expect(modelView(copy)).toEqual({ text: "abc" });
    expect(model.clock.time).toBe(7);
  });

  it("forks into a new session", () => {
    const model = modelWith(5, { n: 1 });
    const fork = forkModel(model, 7);
    const patch = commit(fork, { n: 2 });

    expect(patch && patchId(patch)).toEqual(ts(7, 5));
    expect(fork.clock.kind === "vector" ? fork.clock.peers.get(5) : undefined).toEqual(ts(5, 4));
    expect(modelView(model)).toEqual({ n: 1 });
  });

  it("rebuilds a model from its patch log", () => {
    const model = createModel(5);
    const patches = [setModelRoot(model, { list: ["a"] })];
    const next = commit(model, { list: ["a", "b"] });
    if (next) {
      patches.push(next);
    }

    const rebuilt = modelFromPatches(patches);
    expect(rebuilt.clock.sid).toBe(5);
    expect(rebuilt.clock.time).toBe(model.clock.time);
    expect(modelView(rebuilt)).toEqual({ list: ["a", "b"] });
  });

  it("rebuilds a server model", () => {
    const model = createServerModel();
    const patch = setModelRoot(model, { a: 1 });
    const rebuilt = modelFromPatches([patch]);

    expect(rebuilt.clock).toEqual({ kind: "server", sid: 1, time: 5 });
    expect(modelView(rebuilt)).toEqual({ a: 1 });
  });
});

describe("change events", () => {
  it("reports local edits with the view before and after", () => {
    const model = modelWith(5, { k: 1 });
    const seen: ModelChange[] = [];
    const off = onModelChange(model, (change) => seen.push(change));

    const patch = updateModel(model, { k: 2 });
    expect(seen).toHaveLength(1);
    expect(seen[0]).toEqual({ origin: "local", patch, before: { k: 1 }, after: { k: 2 } });

    off();
    updateModel(model, { k: 3 });
    expect(seen).toHaveLength(1);
  });

  it("marks applied patches as remote", () => {
    const model = modelWith(5, { k: 1 });
    const patch = updateModel(forkModel(model, 7), { k: 9 });
    const origins: string[] = [];
    onModelChange(model, (change) => origins.push(change.origin));

    if (patch) {
      applyPatch(model, patch);
    }
    expect(origins).toEqual(["remote"]);
    expect(modelView(model)).toEqual({ k: 9 });
  });

  it("stays silent for empty patches and after unsubscribing", () => {
    const model = createModel(5);
    const origins: string[] = [];
    const listener = (change: ModelChange): void => {
      origins.push(change.origin);
    };
    onModelChange(model, listener);

    applyPatch(model, { ops: [] });
    setModelRoot(model, "x");
    expect(origins).toEqual(["local"]);

    expect(offModelChange(model, listener)).toBe(true);
    expect(offModelChange(model, listener)).toBe(false);
    setModelRoot(model, "y");
    expect(origins).toEqual(["local"]);
  });

  it("lets a listener unsubscribe while being notified", () => {
    const model = createModel(5);
    const calls: string[] = [];
    const offFirst = onModelChange(model, () => {
      calls.push("first");
      offFirst();
    });
    onModelChange(model, () => calls.push("second"));

    setModelRoot(model, 1);
    setModelRoot(model, 2);
    expect(calls).toEqual(["first", "second", "second"]);
  });

  it("does not hand listeners to copies", () => {
    const model = createModel(5);
    onModelChange(model, () => undefined);
    expect(cloneModel(model).listeners.size).toBe(0);
    expect(forkModel(model, 7).listeners.size).toBe(0);
  });
});

describe("path lookup", () => {
  it("walks object keys and array indexes", () => {
    const model = modelWith(5, { doc: { items: [1], title: "t" } });
    expect(findView(model, ["doc", "items", 0])).toBe(1);

    commit(model, { doc: { items: [1, 2], title: "t" } });
    expect(findView(model, ["doc", "items", 1])).toBe(2);
    expect(findView(model, ["doc", "title"])).toBe("t");
    expect(findView(model, [])).toEqual({ doc: { items: [1, 2], title: "t" } });
  });

  it("returns undefined when a step does not apply", () => {
    const model = modelWith(5, { doc: { items: [1] } });
    expect(findNode(model, ["missing"])).toBeUndefined();
    expect(findNode(model, ["doc", 0])).toBeUndefined();
    expect(findNode(model, ["doc", "items", "0"])).toBeUndefined();
    expect(findNode(model, ["doc", "items", 3])).toBeUndefined();
    expect(findView(createModel(5), ["a"])).toBeUndefined();
  });

  it("indexes vector slots", () => {
    const model = createModel(5);
    edit(model, (b) => b.root(b.vecOf(["a", 2])));
    expect(findView(model, [0])).toBe("a");
    expect(findView(model, [1])).toBe(2);
    expect(findNode(model, [2])).toBeUndefined();
  });

  it("reads object fields by id and on the root", () => {
    const model = modelWith(5, { a: "x", b: { c: true } });
    const b = rootField(model, "b");
    expect(b?.kind).toBe("obj");
    expect(b ? objField(model, b.id, "c") : undefined).toMatchObject({
      kind: "con",
      data: { type: "value", value: true },
    });
    expect(rootField(model, "a")?.kind).toBe("str");
    expect(rootField(model, "zzz")).toBeUndefined();
    expect(objField(model, ts(5, 99), "a")).toBeUndefined();
  });
});
