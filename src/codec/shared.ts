import type { Clock, SessionId, Timespan, Timestamp } from "../types";

import { PatchBuilder } from "../builder";
import { ClockError, createClock, createServerClock, SESSION, ts, tss } from "../clock";
import { fail, PatchError } from "../errors";

const BASE64_PATTERN = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function asRecord(value: unknown, path: string): Record<string, unknown> {
  if (!isRecord(value)) {
    fail("INVALID_SHAPE", path, "expected object");
  }

  return value;
}

export function asArray(value: unknown, path: string): unknown[] {
  if (!Array.isArray(value)) {
    fail("INVALID_SHAPE", path, "expected array");
  }

  return value;
}

export function readString(value: unknown, path: string): string {
  if (typeof value !== "string") {
    fail("INVALID_SHAPE", path, "expected string");
  }

  return value;
}

/** A non-negative safe integer. */
export function readUint(value: unknown, path: string): number {
  if (typeof value !== "number" || !Number.isSafeInteger(value) || value < 0) {
    fail("INVALID_SHAPE", path, "expected a non-negative safe integer");
  }

  return value;
}

/**
 * Read a wire id: `[sid, time]`, or a bare time belonging to `implicitSid`.
 */
export function readId(value: unknown, path: string, implicitSid: SessionId): Timestamp {
  if (typeof value === "number") {
    if (!Number.isSafeInteger(value) || value < 0) {
      fail("INVALID_ID", path, "time must be a non-negative safe integer");
    }

    return ts(implicitSid, value);
  }

  if (Array.isArray(value) && value.length === 2) {
    const sid: unknown = value[0];
    const time: unknown = value[1];
    if (
      typeof sid !== "number" ||
      typeof time !== "number" ||
      !Number.isSafeInteger(sid) ||
      !Number.isSafeInteger(time) ||
      sid < 0 ||
      time < 0
    ) {
      fail("INVALID_ID", path, "id must be a pair of non-negative safe integers");
    }

    return ts(sid, time);
  }

  fail("INVALID_ID", path, "expected a time or a [sid, time] pair");
}

/** Read `[sid, time, span]`, or `[time, span]` of `implicitSid` when allowed. */
export function readSpan(
  value: unknown,
  path: string,
  implicitSid: SessionId | undefined,
): Timespan {
  const raw = asArray(value, path);
  if (raw.length === 3) {
    return tss(
      readUint(raw[0], `${path}/0`),
      readUint(raw[1], `${path}/1`),
      readPositive(raw[2], `${path}/2`),
    );
  }

  if (raw.length === 2 && implicitSid !== undefined) {
    return tss(implicitSid, readUint(raw[0], `${path}/0`), readPositive(raw[1], `${path}/1`));
  }

  fail("INVALID_ID", path, "malformed timespan");
}

export function readPositive(value: unknown, path: string): number {
  const n = readUint(value, path);
  if (n === 0) {
    fail("INVALID_SHAPE", path, "expected a positive integer");
  }

  return n;
}

export function toBase64(data: Uint8Array): string {
  return Buffer.from(data.buffer, data.byteOffset, data.byteLength).toString("base64");
}

export function fromBase64(value: unknown, path: string): Uint8Array {
  const text = readString(value, path);
  if (!BASE64_PATTERN.test(text)) {
    fail("INVALID_SHAPE", path, "expected base64 data");
  }

  return new Uint8Array(Buffer.from(text, "base64"));
}

/** Clock that re-allocates a patch's ids starting from its first id. */
export function clockForPatch(id: Timestamp, path: string): Clock {
  try {
    return id.sid === SESSION.SERVER ? createServerClock(id.time) : createClock(id.sid, id.time);
  } catch (error) {
    if (error instanceof ClockError) {
      fail("INVALID_ID", path, error.message);
    }

    throw error;
  }
}

/** Run one builder step; builder misuse caused by wire data becomes a `DecodeError`. */
export function replay<T>(path: string, step: () => T): T {
  try {
    return step();
  } catch (error) {
    if (error instanceof PatchError || error instanceof ClockError) {
      fail("INVALID_SHAPE", path, error.message);
    }

    throw error;
  }
}

/** Builder positioned at the patch's first id. */
export function builderForPatch(id: Timestamp, path: string): PatchBuilder {
  return new PatchBuilder(clockForPatch(id, path));
}
