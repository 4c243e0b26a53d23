import type { Op, Patch, Timestamp } from "./types";

import { printTs, ts } from "./clock";
import { PatchError } from "./errors";
import { mapOpTimestamps, opSpan, printOp } from "./operations";
import { clonePackValue } from "./pack-value";

/** Id of the first operation; a patch's identity. */
export function patchId(patch: Patch): Timestamp | undefined {
  return patch.ops[0]?.id;
}

/** Total clock cost of every operation. */
export function patchSpan(patch: Patch): number {
  let span = 0;
  for (const op of patch.ops) {
    span += opSpan(op);
  }

  return span;
}

/** Time right after the last operation, or `0` for an empty patch. */
export function patchNextTime(patch: Patch): number {
  const last = patch.ops[patch.ops.length - 1];
  return last ? last.id.time + opSpan(last) : 0;
}

/** Map every id, reference and deleted span of the patch. */
export function rewritePatchTime(patch: Patch, map: (id: Timestamp) => Timestamp): Patch {
  const ops: Op[] = patch.ops.map((op) => mapOpTimestamps(op, map));
  return withMeta({ ops }, patch);
}

/**
 * Move the patch so that it starts at `newTime`.
 *
 * Only ids of the patch's own session at or after `transformAfter` (the patch
 * start by default) shift; references to older or foreign ids are kept.
 * @param patch - Patch to rebase; must not be empty.
 * @param newTime - New start time.
 * @param transformAfter - Earliest time of the patch session that shifts.
 */
export function rebasePatch(patch: Patch, newTime: number, transformAfter?: number): Patch {
  const id = patchId(patch);
  if (!id) {
    throw new PatchError("EMPTY_PATCH", "cannot rebase an empty patch");
  }

  if (id.time === newTime) {
    return patch;
  }

  const delta = newTime - id.time;
  const horizon = transformAfter ?? id.time;
  return rewritePatchTime(patch, (stamp) =>
    stamp.sid === id.sid && stamp.time >= horizon ? ts(stamp.sid, stamp.time + delta) : stamp,
  );
}

/** Deep copy. */
export function clonePatch(patch: Patch): Patch {
  return rewritePatchTime(patch, (stamp) => ts(stamp.sid, stamp.time));
}

/** Multi-line dump: a `Patch <id>!<span>` header and one line per operation. */
export function printPatch(patch: Patch): string {
  const id = patchId(patch);
  const header = `Patch ${id ? printTs(id) : "(nil)"}!${patchSpan(patch)}`;
  return [header, ...patch.ops.map((op) => `  ${printOp(op)}`)].join("\n");
}

function withMeta(out: Patch, source: Patch): Patch {
  if (source.meta !== undefined) {
    out.meta = clonePackValue(source.meta);
  }

  return out;
}
