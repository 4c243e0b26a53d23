import type { Chunk, ChunkSlicer, Rga, Timespan, Timestamp } from "./types";

import { compareTs, containsTs, ORIGIN, equalTs, tick, tss } from "./clock";

/** An offset outside a chunk: a bug in the caller, never a result of wire input. */
export class RgaInvariantError extends Error {
  readonly reason = "OUT_OF_CHUNK_RANGE" as const;

  constructor(message: string) {
    super(message);
    this.name = "RgaInvariantError";
  }
}

export const sliceString: ChunkSlicer<string> = (data, from, to) => data.slice(from, to);

export const sliceBytes: ChunkSlicer<Uint8Array> = (data, from, to) => data.slice(from, to);

export const sliceIds: ChunkSlicer<Timestamp[]> = (data, from, to) => data.slice(from, to);

export function createRga<T>(slice: ChunkSlicer<T>): Rga<T> {
  return { chunks: [], slice };
}

export function chunkContains(chunk: Chunk<unknown>, id: Timestamp): boolean {
  return containsTs(tss(chunk.id.sid, chunk.id.time, chunk.span), id);
}

/**
 * Index of the chunk whose id range contains `id`.
 * Linear scan over document order.
 */
export function rgaFindById<T>(rga: Rga<T>, id: Timestamp): number | undefined {
  const { chunks } = rga;
  for (let i = 0; i < chunks.length; i++) {
    if (chunkContains(chunks[i]!, id)) {
      return i;
    }
  }

  return undefined;
}

/** Split the chunk at `index` so that its first `offset` items stay in place. */
export function rgaSplit<T>(rga: Rga<T>, index: number, offset: number): void {
  const chunk = rga.chunks[index];
  if (!chunk) {
    throw new RgaInvariantError(`no chunk at index ${index}`);
  }

  if (!Number.isInteger(offset) || offset <= 0 || offset >= chunk.span) {
    throw new RgaInvariantError(`split offset ${offset} outside chunk of span ${chunk.span}`);
  }

  const tail: Chunk<T> = {
    id: tick(chunk.id, offset),
    span: chunk.span - offset,
    deleted: chunk.deleted,
    data: chunk.data === undefined ? undefined : rga.slice(chunk.data, offset),
  };
  if (chunk.data !== undefined) {
    chunk.data = rga.slice(chunk.data, 0, offset);
  }
  chunk.span = offset;
  rga.chunks.splice(index + 1, 0, tail);
}

/**
 * Insert `span` items identified from `id` right after the item `after`.
 *
 * The origin anchor inserts at the start; an anchor that is not present appends
 * at the end. Concurrent inserts at the same anchor are ordered by skipping
 * every chunk whose id is greater than `id`, so the greatest id sits closest to
 * the anchor on every replica. Returns `false` when `id` is already present.
 */
export function rgaInsert<T>(
  rga: Rga<T>,
  after: Timestamp,
  id: Timestamp,
  span: number,
  data: T,
): boolean {
  if (span <= 0 || rgaFindById(rga, id) !== undefined) {
    return false;
  }

  const { chunks } = rga;
  let pos = 0;
  if (!equalTs(after, ORIGIN)) {
    const index = rgaFindById(rga, after);
    if (index === undefined) {
      pos = chunks.length;
    } else {
      const anchor = chunks[index]!;
      const offset = after.time - anchor.id.time;
      if (offset < anchor.span - 1) {
        rgaSplit(rga, index, offset + 1);
      }
      pos = index + 1;
    }
  }

  while (pos < chunks.length && compareTs(chunks[pos]!.id, id) > 0) {
    pos++;
  }

  chunks.splice(pos, 0, { id, span, deleted: false, data });
  return true;
}

/** Tombstone every item covered by `spans`, splitting chunks at the span edges. */
export function rgaDelete<T>(rga: Rga<T>, spans: Timespan[]): void {
  const { chunks } = rga;

  for (const span of spans) {
    const start = span.time;
    const end = span.time + span.span;
    let i = 0;

    while (i < chunks.length) {
      const chunk = chunks[i]!;
      const chunkStart = chunk.id.time;
      const chunkEnd = chunkStart + chunk.span;
      if (
        chunk.deleted ||
        chunk.id.sid !== span.sid ||
        chunkEnd <= start ||
        chunkStart >= end
      ) {
        i++;
        continue;
      }

      if (chunkStart < start) {
        rgaSplit(rga, i, start - chunkStart);
        i++;
        continue;
      }

      if (chunkEnd > end) {
        rgaSplit(rga, i, end - chunkStart);
      }

      chunk.deleted = true;
      chunk.data = undefined;
      i++;
    }
  }
}

/** Append a chunk known to follow every existing chunk in document order. */
export function rgaPushChunk<T>(rga: Rga<T>, chunk: Chunk<T>): void {
  rga.chunks.push(chunk);
}

export function* rgaChunks<T>(rga: Rga<T>): IterableIterator<Chunk<T>> {
  yield* rga.chunks;
}

export function* rgaLiveChunks<T>(rga: Rga<T>): IterableIterator<Chunk<T> & { data: T }> {
  for (const chunk of rga.chunks) {
    if (!chunk.deleted && chunk.data !== undefined) {
      yield { ...chunk, data: chunk.data };
    }
  }
}

/** Number of visible items. */
export function rgaLength<T>(rga: Rga<T>): number {
  let length = 0;
  for (const chunk of rga.chunks) {
    if (!chunk.deleted) {
      length += chunk.span;
    }
  }

  return length;
}

/** Id of the visible item at position `pos`. */
export function rgaFind<T>(rga: Rga<T>, pos: number): Timestamp | undefined {
  let remaining = pos;
  for (const chunk of rga.chunks) {
    if (chunk.deleted) {
      continue;
    }

    if (remaining < chunk.span) {
      return tick(chunk.id, remaining);
    }
    remaining -= chunk.span;
  }

  return undefined;
}

/** Timespans covering `len` visible items from `pos`, merged where contiguous. */
export function rgaFindInterval<T>(rga: Rga<T>, pos: number, len: number): Timespan[] {
  const out: Timespan[] = [];
  let skip = pos;
  let left = len;

  for (const chunk of rga.chunks) {
    if (left <= 0) {
      break;
    }
    if (chunk.deleted) {
      continue;
    }
    if (skip >= chunk.span) {
      skip -= chunk.span;
      continue;
    }

    const take = Math.min(chunk.span - skip, left);
    pushSpan(out, tss(chunk.id.sid, chunk.id.time + skip, take));
    left -= take;
    skip = 0;
  }

  return out;
}

/** Id of every visible item, in document order. */
export function rgaLiveIds<T>(rga: Rga<T>): Timestamp[] {
  const out: Timestamp[] = [];
  for (const chunk of rga.chunks) {
    if (chunk.deleted) {
      continue;
    }
    for (let k = 0; k < chunk.span; k++) {
      out.push(tick(chunk.id, k));
    }
  }

  return out;
}

/** Append `span` to `out`, extending the last entry when the two are adjacent. */
export function pushSpan(out: Timespan[], span: Timespan): void {
  const last = out[out.length - 1];
  if (last && last.sid === span.sid && last.time + last.span === span.time) {
    last.span += span.span;
    return;
  }

  out.push(span);
}
