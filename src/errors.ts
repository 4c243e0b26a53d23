export type DecodeErrorReason =
  | "OVERFLOW"
  | "UNKNOWN_OPCODE"
  | "INVALID_CBOR"
  | "INVALID_UTF8"
  | "TRAILING_BYTES"
  | "INVALID_CLOCK_TABLE"
  | "INVALID_MODEL"
  | "INVALID_SHAPE"
  | "INVALID_ID";

/**
 * Malformed wire input. `path` is a JSON path for the JSON formats and
 * `@<offset>` for the binary ones.
 */
export class DecodeError extends Error {
  readonly reason: DecodeErrorReason;
  readonly path: string;

  constructor(reason: DecodeErrorReason, path: string, message: string) {
    super(`${message} at ${path}`);
    this.name = "DecodeError";
    this.reason = reason;
    this.path = path;
  }
}

/** Non-throwing decode outcome. */
export type TryDecodeResult<T> = { ok: true; value: T } | { ok: false; error: DecodeError };

export type PatchErrorReason = "EMPTY_PATCH" | "INVALID_OP";

/** Misuse of the patch builder or patch helpers. */
export class PatchError extends Error {
  readonly reason: PatchErrorReason;

  constructor(reason: PatchErrorReason, message: string) {
    super(message);
    this.name = "PatchError";
    this.reason = reason;
  }
}

/** Nesting limit shared by every recursive walk over values and node graphs. */
export const MAX_TRAVERSAL_DEPTH = 16_384;

/** A value or node graph nested deeper than the configured limit. */
export class TraversalDepthError extends Error {
  readonly reason = "MAX_DEPTH_EXCEEDED" as const;
  readonly depth: number;
  readonly maxDepth: number;

  constructor(depth: number, maxDepth: number) {
    super(`nesting depth ${depth} is over the limit of ${maxDepth}`);
    this.name = "TraversalDepthError";
    this.depth = depth;
    this.maxDepth = maxDepth;
  }
}

export function assertTraversalDepth(depth: number, maxDepth: number = MAX_TRAVERSAL_DEPTH): void {
  if (depth > maxDepth) {
    throw new TraversalDepthError(depth, maxDepth);
  }
}

export function fail(reason: DecodeErrorReason, path: string, message: string): never {
  throw new DecodeError(reason, path, message);
}

/** Run a throwing decoder and capture `DecodeError`s; anything else propagates. */
export function tryDecode<T>(decode: () => T): TryDecodeResult<T> {
  try {
    return { ok: true, value: decode() };
  } catch (error) {
    if (error instanceof DecodeError) {
      return { ok: false, error };
    }

    throw error;
  }
}
