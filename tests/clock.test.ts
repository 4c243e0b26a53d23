import { describe, expect, it } from "vitest";

import {
  ClockError,
  clockObserve,
  clockRows,
  clockTick,
  cloneClock,
  compareTs,
  containsTs,
  createClock,
  createServerClock,
  equalTs,
  forkClock,
  ORIGIN,
  printTs,
  printTss,
  SESSION,
  tick,
  ts,
  tss,
} from "../src/internals";

function clockErrorReason(run: () => unknown): string | undefined {
  try {
    run();
  } catch (error) {
    if (error instanceof ClockError) {
      return error.reason;
    }
    throw error;
  }
  return undefined;
}

describe("timestamps", () => {
  it("orders by time first and session second", () => {
    expect(compareTs(ts(5, 1), ts(2, 2))).toBeLessThan(0);
    expect(compareTs(ts(3, 4), ts(2, 4))).toBeGreaterThan(0);
    expect(compareTs(ts(3, 4), ts(3, 4))).toBe(0);
    expect(equalTs(ts(3, 4), ts(3, 4))).toBe(true);
    expect(equalTs(ts(3, 4), ts(4, 3))).toBe(false);
  });

  it("places the origin before every allocated id", () => {
    expect(ORIGIN).toEqual({ sid: SESSION.SYSTEM, time: 0 });
    expect(compareTs(ORIGIN, ts(SESSION.SERVER, 1))).toBeLessThan(0);
  });

  it("checks span membership within one session", () => {
    const span = tss(4, 10, 3);
    expect(containsTs(span, ts(4, 10))).toBe(true);
    expect(containsTs(span, ts(4, 12))).toBe(true);
    expect(containsTs(span, ts(4, 13))).toBe(false);
    expect(containsTs(span, ts(5, 11))).toBe(false);
    expect(tick(ts(4, 10), 2)).toEqual(ts(4, 12));
  });

  it("prints server ids as a bare time", () => {
    expect(printTs(ts(SESSION.SERVER, 42))).toBe("42");
    expect(printTs(ts(7, 3))).toBe("7.3");
    expect(printTss(tss(7, 3, 2))).toBe("7.3!2");
  });
});

describe("clocks", () => {
  it("rejects reserved and malformed sessions", () => {
    expect(clockErrorReason(() => createClock(SESSION.SYSTEM))).toBe("INVALID_SESSION");
    expect(clockErrorReason(() => createClock(SESSION.SERVER))).toBe("INVALID_SESSION");
    expect(clockErrorReason(() => createClock(-1))).toBe("INVALID_SESSION");
    expect(clockErrorReason(() => createClock(2.5))).toBe("INVALID_SESSION");
    expect(clockErrorReason(() => createClock(2, -1))).toBe("INVALID_TIME");
    expect(clockErrorReason(() => createServerClock(Number.NaN))).toBe("INVALID_TIME");
  });

  it("allocates ids and advances by the span", () => {
    const clock = createClock(5);
    expect(clockTick(clock, 3)).toEqual(ts(5, 1));
    expect(clockTick(clock, 1)).toEqual(ts(5, 4));
    expect(clock.time).toBe(5);
  });

  it("refuses to leave the safe-integer range", () => {
    const clock = createClock(5, Number.MAX_SAFE_INTEGER);
    expect(clockErrorReason(() => clockTick(clock, 1))).toBe("SPAN_OVERFLOW");
    expect(clock.time).toBe(Number.MAX_SAFE_INTEGER);
  });

  it("tracks the highest observed id per peer", () => {
    const clock = createClock(5);
    clockObserve(clock, ts(7, 10), 3);
    expect(clock.peers.get(7)).toEqual(ts(7, 12));
    expect(clock.time).toBe(13);

    clockObserve(clock, ts(7, 5), 1);
    expect(clock.peers.get(7)).toEqual(ts(7, 12));
    expect(clock.time).toBe(13);
  });

  it("does not record the local or system session as a peer", () => {
    const clock = createClock(5);
    clockObserve(clock, ts(5, 3), 1);
    clockObserve(clock, ORIGIN, 1);
    expect(clock.peers.size).toBe(0);
    expect(clock.time).toBe(4);
  });

  it("accepts only in-order server ids on a server clock", () => {
    const clock = createServerClock(5);
    expect(clockErrorReason(() => clockObserve(clock, ts(SESSION.SERVER, 6), 1))).toBe(
      "TIME_TRAVEL",
    );
    expect(clockErrorReason(() => clockObserve(clock, ts(3, 1), 1))).toBe("INVALID_SESSION");

    clockObserve(clock, ts(SESSION.SERVER, 4), 3);
    expect(clock.time).toBe(7);
  });

  it("clones without sharing peers", () => {
    const clock = createClock(5);
    clockObserve(clock, ts(7, 2), 1);
    const copy = cloneClock(clock);
    clockObserve(clock, ts(8, 9), 1);

    expect(copy.time).toBe(3);
    expect(copy.kind === "vector" ? [...copy.peers.keys()] : []).toEqual([7]);
  });

  it("forks into a new session that knows the parent", () => {
    const clock = createClock(5);
    clockTick(clock, 4);
    clock.peers.set(7, ts(7, 3));

    const fork = forkClock(clock, 9);
    expect(fork.sid).toBe(9);
    expect(fork.time).toBe(5);
    expect([...fork.peers.entries()]).toEqual([
      [7, ts(7, 3)],
      [5, ts(5, 4)],
    ]);
    expect(clockRows(fork)).toEqual([ts(9, 5), ts(7, 3), ts(5, 4)]);
  });
});
