import type { Clock, ClockVector, ServerClock, SessionId, Timespan, Timestamp } from "./types";

/** Reserved session ids. */
export const SESSION = {
  /** Origin sentinel; never allocates operations. */
  SYSTEM: 0,
  /** Shared server clock session. */
  SERVER: 1,
} as const;

/** `(0, 0)`: start-of-sequence anchor and container id of the root register. */
export const ORIGIN: Timestamp = { sid: SESSION.SYSTEM, time: 0 };

export type ClockErrorReason = "INVALID_SESSION" | "INVALID_TIME" | "SPAN_OVERFLOW" | "TIME_TRAVEL";

export class ClockError extends RangeError {
  readonly reason: ClockErrorReason;

  constructor(reason: ClockErrorReason, message: string) {
    super(message);
    this.name = "ClockError";
    this.reason = reason;
  }
}

export function ts(sid: SessionId, time: number): Timestamp {
  return { sid, time };
}

export function tss(sid: SessionId, time: number, span: number): Timespan {
  return { sid, time, span };
}

// total order: time first, higher sid wins ties
export function compareTs(a: Timestamp, b: Timestamp): number {
  if (a.time !== b.time) {
    return a.time - b.time;
  }

  return a.sid - b.sid;
}

export function equalTs(a: Timestamp, b: Timestamp): boolean {
  return a.time === b.time && a.sid === b.sid;
}

/** Whether `id` falls inside `span`. */
export function containsTs(span: Timespan, id: Timestamp): boolean {
  return span.sid === id.sid && id.time >= span.time && id.time < span.time + span.span;
}

/** Id `offset` steps after `id` within the same session. */
export function tick(id: Timestamp, offset: number): Timestamp {
  return { sid: id.sid, time: id.time + offset };
}

/** Render `sid.time`, or just `time` for the server session. */
export function printTs(id: Timestamp): string {
  return id.sid === SESSION.SERVER ? `${id.time}` : `${id.sid}.${id.time}`;
}

export function printTss(span: Timespan): string {
  return `${printTs(span)}!${span.span}`;
}

/**
 * Create a vector clock for a local session.
 * @param sid - Local session id; must not be a reserved session.
 * @param time - Next time to allocate (defaults to 1).
 */
export function createClock(sid: SessionId, time = 1): ClockVector {
  assertSession(sid);
  assertTime(time);
  if (sid === SESSION.SYSTEM || sid === SESSION.SERVER) {
    throw new ClockError("INVALID_SESSION", `session ${sid} is reserved`);
  }

  return { kind: "vector", sid, time, peers: new Map() };
}

/** Create the shared server clock. */
export function createServerClock(time = 1): ServerClock {
  assertTime(time);
  return { kind: "server", sid: SESSION.SERVER, time };
}

/**
 * Allocate the current timestamp and advance the clock by `span`.
 * Throws `ClockError` when the advanced time would leave the safe-integer range.
 */
export function clockTick(clock: Clock, span: number): Timestamp {
  const next = clock.time + span;
  if (!Number.isSafeInteger(next) || span < 0) {
    throw new ClockError("SPAN_OVERFLOW", `cannot advance clock ${clock.time} by ${span}`);
  }

  const id = ts(clock.sid, clock.time);
  clock.time = next;
  return id;
}

/**
 * Record that ids `id .. id + span - 1` have been seen.
 * Peer high-water marks only ever grow; the local time moves past the edge.
 */
export function clockObserve(clock: Clock, id: Timestamp, span: number): void {
  const edge = id.time + span - 1;
  if (!Number.isSafeInteger(edge + 1)) {
    throw new ClockError("SPAN_OVERFLOW", `observed span ${printTs(id)}!${span} overflows`);
  }

  if (clock.kind === "server") {
    if (id.sid !== SESSION.SERVER) {
      throw new ClockError("INVALID_SESSION", `server clock cannot observe session ${id.sid}`);
    }

    if (id.time > clock.time) {
      throw new ClockError("TIME_TRAVEL", `id ${id.time} is ahead of server time ${clock.time}`);
    }

    if (edge >= clock.time) {
      clock.time = edge + 1;
    }
    return;
  }

  if (id.sid !== clock.sid && id.sid !== SESSION.SYSTEM) {
    const peer = clock.peers.get(id.sid);
    if (!peer || peer.time < edge) {
      clock.peers.set(id.sid, ts(id.sid, edge));
    }
  }

  if (edge >= clock.time) {
    clock.time = edge + 1;
  }
}

/** Create an independent copy of a clock at the same position. */
export function cloneClock(clock: Clock): Clock {
  if (clock.kind === "server") {
    return { kind: "server", sid: clock.sid, time: clock.time };
  }

  return { kind: "vector", sid: clock.sid, time: clock.time, peers: new Map(clock.peers) };
}

/**
 * Derive a clock for a new session that has seen everything `clock` has.
 * The parent session becomes a peer of the fork.
 */
export function forkClock(clock: Clock, sid: SessionId): ClockVector {
  const fork = createClock(sid, clock.time);
  if (clock.kind === "vector") {
    for (const [peerSid, peer] of clock.peers) {
      if (peerSid !== sid) {
        fork.peers.set(peerSid, peer);
      }
    }
  }

  if (clock.time > 1 && clock.sid !== sid) {
    fork.peers.set(clock.sid, ts(clock.sid, clock.time - 1));
  }

  return fork;
}

/** Rows of the clock table: local session first, then peers. */
export function clockRows(clock: ClockVector): Timestamp[] {
  return [ts(clock.sid, clock.time), ...clock.peers.values()];
}

function assertSession(sid: SessionId): void {
  if (!Number.isSafeInteger(sid) || sid < 0) {
    throw new ClockError("INVALID_SESSION", "session id must be a non-negative safe integer");
  }
}

function assertTime(time: number): void {
  if (!Number.isSafeInteger(time) || time < 0) {
    throw new ClockError("INVALID_TIME", "time must be a non-negative safe integer");
  }
}
