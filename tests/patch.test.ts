import { describe, expect, it } from "vitest";

import {
  clonePatch,
  createClock,
  createServerClock,
  PatchBuilder,
  PatchError,
  patchNextTime,
  patchSpan,
  printOp,
  printPatch,
  rebasePatch,
  ts,
  tss,
} from "../src/internals";

function patchErrorReason(run: () => unknown): string | undefined {
  try {
    run();
  } catch (error) {
    if (error instanceof PatchError) {
      return error.reason;
    }
    throw error;
  }
  return undefined;
}

function sample() {
  const builder = new PatchBuilder(createClock(5));
  const str = builder.str();
  builder.insStr(str, str, "hey");
  builder.nop(3);
  return builder;
}

describe("patch builder", () => {
  it("allocates consecutive ids by operation span", () => {
    const builder = new PatchBuilder(createClock(5));
    const str = builder.str();
    const ins = builder.insStr(str, str, "hey");
    expect(str).toEqual(ts(5, 1));
    expect(ins).toEqual(ts(5, 2));
    expect(builder.nextTime()).toBe(5);
    expect(builder.nop(3)).toEqual(ts(5, 5));
    expect(builder.nextTime()).toBe(8);
    expect(builder.size).toBe(3);
  });

  it("flushes operations with optional metadata", () => {
    const builder = sample();
    const patch = builder.flush({ tag: "x" });
    expect(patch.meta).toEqual({ tag: "x" });
    expect(patch.ops.map((op) => op.kind)).toEqual(["new_str", "ins_str", "nop"]);
    expect(builder.size).toBe(0);
    expect(builder.flush()).toEqual({ ops: [] });
  });

  it("rejects malformed operations", () => {
    const builder = new PatchBuilder(createClock(5));
    const obj = ts(5, 1);
    expect(patchErrorReason(() => builder.insObj(obj, []))).toBe("INVALID_OP");
    expect(patchErrorReason(() => builder.insVec(obj, [[256, obj]]))).toBe("INVALID_OP");
    expect(patchErrorReason(() => builder.insStr(obj, obj, ""))).toBe("INVALID_OP");
    expect(patchErrorReason(() => builder.insBin(obj, obj, new Uint8Array()))).toBe("INVALID_OP");
    expect(patchErrorReason(() => builder.insArr(obj, obj, []))).toBe("INVALID_OP");
    expect(patchErrorReason(() => builder.del(obj, []))).toBe("INVALID_OP");
    expect(patchErrorReason(() => builder.nop(0))).toBe("INVALID_OP");
    expect(builder.size).toBe(0);
  });

  it("wraps array scalars in registers", () => {
    const builder = new PatchBuilder(createClock(5));
    builder.json([1, "a"]);
    expect(builder.flush().ops.map((op) => op.kind)).toEqual([
      "new_arr",
      "new_val",
      "new_con",
      "ins_val",
      "new_str",
      "ins_str",
      "ins_arr",
    ]);
  });
});

describe("patch helpers", () => {
  it("measures span and next time", () => {
    const patch = sample().flush();
    expect(patchSpan(patch)).toBe(7);
    expect(patchNextTime(patch)).toBe(8);
    expect(patchNextTime({ ops: [] })).toBe(0);
  });

  it("rebases own ids and keeps older references", () => {
    const builder = new PatchBuilder(createClock(5, 10));
    builder.insStr(ts(5, 3), ts(5, 3), "a");
    builder.del(ts(5, 3), [tss(5, 10, 1), tss(7, 2, 1)]);
    const rebased = rebasePatch(builder.flush(), 12);

    expect(rebased.ops).toEqual([
      { kind: "ins_str", id: ts(5, 12), obj: ts(5, 3), after: ts(5, 3), data: "a" },
      { kind: "del", id: ts(5, 13), obj: ts(5, 3), what: [tss(5, 12, 1), tss(7, 2, 1)] },
    ]);
  });

  it("moves every id of the session from a given time", () => {
    const patch = sample().flush();
    const rebased = rebasePatch(patch, 20, 0);
    expect(rebased.ops[1]).toEqual({
      kind: "ins_str",
      id: ts(5, 21),
      obj: ts(5, 20),
      after: ts(5, 20),
      data: "hey",
    });
    expect(rebasePatch(patch, 1)).toBe(patch);
  });

  it("refuses to rebase an empty patch", () => {
    expect(patchErrorReason(() => rebasePatch({ ops: [] }, 3))).toBe("EMPTY_PATCH");
  });

  it("clones deeply", () => {
    const builder = new PatchBuilder(createClock(5));
    builder.con({ a: [1] });
    const patch = builder.flush({ m: 1 });
    const copy = clonePatch(patch);

    expect(copy).toEqual(patch);
    expect(copy.ops[0]).not.toBe(patch.ops[0]);
    expect(copy.meta).not.toBe(patch.meta);
  });

  it("prints one line per operation", () => {
    const builder = sample();
    builder.del(ts(5, 1), [tss(5, 2, 2)]);
    expect(printPatch(builder.flush())).toBe(
      [
        "Patch 5.1!8",
        "  new_str 5.1!1",
        '  ins_str 5.2!3, obj = 5.1 { 5.1 ← "hey" }',
        "  nop 5.5!3",
        "  del 5.8!1, obj = 5.1 { 5.2!2 }",
      ].join("\n"),
    );
    expect(printPatch({ ops: [] })).toBe("Patch (nil)!0");
  });

  it("prints server ids as bare times", () => {
    const builder = new PatchBuilder(createServerClock(3));
    const con = builder.con({ a: 1 });
    builder.root(con);
    const [first, second] = builder.flush().ops;
    expect(first && printOp(first)).toBe('new_con 3!1, value = {"a":1}');
    expect(second && printOp(second)).toBe("ins_val 4!1, obj = 0.0, value = 3");
  });
});
