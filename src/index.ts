// Public API: the recommended surface for most consumers.

// Types
export type {
  ChangeOrigin,
  Clock,
  ClockVector,
  CompactId,
  CompactModel,
  CompactModelNode,
  CompactPatch,
  DecodeOptions,
  DiffOptions,
  JsonPrimitive,
  JsonValue,
  Model,
  ModelChange,
  ModelListener,
  ModelOptions,
  ModelSnapshot,
  Node,
  NodeKind,
  Op,
  OpName,
  PackValue,
  Patch,
  PatchPayload,
  PathStep,
  ServerClock,
  SessionId,
  SnapshotNode,
  Timespan,
  Timestamp,
  VerboseId,
  VerboseOp,
  VerbosePatch,
} from "./types";

// Errors
export { DecodeError, PatchError } from "./errors";
export type { DecodeErrorReason, PatchErrorReason, TryDecodeResult } from "./errors";
export { ClockError } from "./clock";
export { TraversalDepthError, MAX_TRAVERSAL_DEPTH } from "./errors";

// Clock
export {
  SESSION,
  ORIGIN,
  ts,
  tss,
  compareTs,
  equalTs,
  printTs,
  createClock,
  createServerClock,
  cloneClock,
  forkClock,
} from "./clock";

// Patches
export { PatchBuilder } from "./builder";
export {
  patchId,
  patchSpan,
  patchNextTime,
  rebasePatch,
  rewritePatchTime,
  clonePatch,
  printPatch,
} from "./patch";

// Model
export {
  createModel,
  createServerModel,
  applyPatch,
  applyOperation,
  modelView,
  getNode,
  cloneModel,
  forkModel,
  modelFromPatches,
  setModelRoot,
  updateModel,
  onModelChange,
  offModelChange,
  objField,
  rootField,
  findNode,
  findView,
} from "./model";
export { diff, diffDstKeys } from "./diff";

// Patch codecs
export { encodeVerbose, decodeVerbose, tryDecodeVerbose } from "./codec/verbose";
export { encodeCompact, decodeCompact, tryDecodeCompact } from "./codec/compact";
export {
  encodeCompactBinary,
  decodeCompactBinary,
  tryDecodeCompactBinary,
} from "./codec/compact-binary";
export { encodeBinary, decodeBinary, tryDecodeBinary, readPatchPayload } from "./codec/binary";

// Model codecs
export { encodeModel, decodeModel, tryDecodeModel } from "./codec/model-binary";
export { encodeSnapshot, decodeSnapshot, tryDecodeSnapshot } from "./codec/model-verbose";
export {
  encodeCompactModel,
  decodeCompactModel,
  tryDecodeCompactModel,
} from "./codec/model-compact";

// Hashing
export { hashJson, hashStr, hashBin, structHash, structHashNode } from "./hash";
