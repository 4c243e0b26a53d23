// Low-level internals for advanced use cases.
// Most consumers should use the main entry point instead.

// Re-export the full public API for convenience.
export * from "./index";

// Clock helpers.
export { clockTick, clockObserve, clockRows, containsTs, tick, printTss } from "./clock";
export type { ClockErrorReason } from "./clock";

// Binary primitives.
export { Reader, Writer, readClockTable, writeClockTable } from "./binary";
export type { ClockTableRow } from "./binary";
export { encodeCbor, decodeCbor } from "./cbor";

// RGA engine.
export {
  RgaInvariantError,
  createRga,
  sliceString,
  sliceBytes,
  sliceIds,
  chunkContains,
  rgaFindById,
  rgaSplit,
  rgaInsert,
  rgaDelete,
  rgaPushChunk,
  rgaChunks,
  rgaLiveChunks,
  rgaLength,
  rgaFind,
  rgaFindInterval,
  rgaLiveIds,
  pushSpan,
} from "./rga";

// Node model.
export {
  MAX_VEC_INDEX,
  nodeKey,
  newCon,
  newVal,
  newObj,
  newVec,
  newStr,
  newBin,
  newArr,
  valSet,
  objPut,
  vecPut,
  arrGetById,
  arrUpdate,
  strView,
  binView,
  arrElements,
  nodeChildren,
} from "./nodes";
export { materialize, resolveNode } from "./materialize";
export type { NodeIndex } from "./materialize";

// Operations.
export { OPCODE, opNameFromCode, toOpName, opSpan, mapOpTimestamps, printOp } from "./operations";
export { isScalar } from "./builder";
export { chooseSequenceInsertReference } from "./diff";
export { encodeVerboseId } from "./codec/verbose";

// Constant values.
export { readPackValue, packEquals, clonePackValue, bytesEqual } from "./pack-value";
export { assertTraversalDepth } from "./errors";

// Internals-only types.
export type {
  ArrNode,
  BinNode,
  Chunk,
  ChunkSlicer,
  ConData,
  ConNode,
  NodeKey,
  ObjNode,
  Rga,
  SnapshotChunk,
  StrNode,
  ValNode,
  VecNode,
} from "./types";
