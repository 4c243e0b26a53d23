/** Session id of a replica. `0` is the system session, `1` the server session. */
export type SessionId = number;

/** Globally unique operation identifier: `(sid, time)`. */
export type Timestamp = {
  sid: SessionId;
  /** Logical time; never decreases within a session. */
  time: number;
};

/** A contiguous range of `span` timestamps of one session starting at `time`. */
export type Timespan = {
  sid: SessionId;
  time: number;
  span: number;
};

// ---

/** Per-session vector clock: one local counter plus peer high-water marks. */
export type ClockVector = {
  kind: "vector";
  sid: SessionId;
  /** Next time to be allocated locally. */
  time: number;
  /** Highest observed timestamp per foreign session. */
  peers: Map<SessionId, Timestamp>;
};

/** Shared server clock; every id is allocated in the server session. */
export type ServerClock = {
  kind: "server";
  sid: SessionId;
  time: number;
};

export type Clock = ClockVector | ServerClock;

// ---

/** A JSON leaf value: `null`, `boolean`, `number`, or `string`. */
export type JsonPrimitive = null | boolean | number | string;

/** Any JSON-compatible value (primitives, arrays, and plain objects). */
export type JsonValue = JsonPrimitive | JsonValue[] | { [k: string]: JsonValue };

/**
 * Any value the constant codec can carry: JSON plus `undefined` and binary blobs.
 * Model views are expressed in this domain too (`bin` nodes view as `Uint8Array`).
 */
export type PackValue =
  | JsonPrimitive
  | undefined
  | Uint8Array
  | PackValue[]
  | { [k: string]: PackValue };

// ---

/** Payload of a `con` node or `new_con` op: a literal value or a reference to another id. */
export type ConData = { type: "value"; value: PackValue } | { type: "ref"; ref: Timestamp };

/** A contiguous run of items inserted by one operation. */
export type Chunk<T> = {
  /** Id of the first item; item `k` has id `(id.sid, id.time + k)`. */
  id: Timestamp;
  span: number;
  deleted: boolean;
  /** Absent once the chunk is tombstoned. */
  data: T | undefined;
};

/** Slices a chunk payload on logical item offsets. */
export type ChunkSlicer<T> = (data: T, from: number, to?: number) => T;

/** Replicated Growable Array: chunks in document order. */
export type Rga<T> = {
  chunks: Chunk<T>[];
  slice: ChunkSlicer<T>;
};

// ---

export type ConNode = { kind: "con"; id: Timestamp; data: ConData };

export type ValNode = { kind: "val"; id: Timestamp; value: Timestamp };

export type ObjNode = {
  kind: "obj";
  id: Timestamp;
  /** Current child per key, in first-insertion order. */
  keys: Map<string, Timestamp>;
};

export type VecNode = {
  kind: "vec";
  id: Timestamp;
  /** Sparse; holes are `undefined`. */
  elements: Array<Timestamp | undefined>;
};

export type StrNode = { kind: "str"; id: Timestamp; rga: Rga<string> };

export type BinNode = { kind: "bin"; id: Timestamp; rga: Rga<Uint8Array> };

export type ArrNode = { kind: "arr"; id: Timestamp; rga: Rga<Timestamp[]> };

/** A CRDT document node. */
export type Node = ConNode | ValNode | ObjNode | VecNode | StrNode | BinNode | ArrNode;

export type NodeKind = Node["kind"];

/** Map key of a node in the model index (`"sid.time"`). */
export type NodeKey = string;

/** A JSON CRDT document: a flat id-addressed node index and an LWW root register. */
export type Model = {
  clock: Clock;
  index: Map<NodeKey, Node>;
  /** Id of the node the root register points at; `ORIGIN` when empty. */
  root: Timestamp;
  maxDepth: number;
  /** Subscribers notified after each applied patch. */
  listeners: Set<ModelListener>;
};

/** Where an applied patch came from. */
export type ChangeOrigin = "local" | "remote";

/** Passed to model listeners once a patch has been applied. */
export type ModelChange = {
  origin: ChangeOrigin;
  patch: Patch;
  before: PackValue;
  after: PackValue;
};

export type ModelListener = (change: ModelChange) => void;

/** One step of a document path: an object key or an array/vector index. */
export type PathStep = string | number;

/** Options accepted by model constructors. */
export type ModelOptions = {
  /** Maximum nesting depth for view, diff and codec traversals. */
  maxDepth?: number;
};

// ---

export type NewConOp = { kind: "new_con"; id: Timestamp; data: ConData };
export type NewValOp = { kind: "new_val"; id: Timestamp };
export type NewObjOp = { kind: "new_obj"; id: Timestamp };
export type NewVecOp = { kind: "new_vec"; id: Timestamp };
export type NewStrOp = { kind: "new_str"; id: Timestamp };
export type NewBinOp = { kind: "new_bin"; id: Timestamp };
export type NewArrOp = { kind: "new_arr"; id: Timestamp };

export type InsValOp = { kind: "ins_val"; id: Timestamp; obj: Timestamp; value: Timestamp };
export type InsObjOp = {
  kind: "ins_obj";
  id: Timestamp;
  obj: Timestamp;
  entries: Array<[string, Timestamp]>;
};
export type InsVecOp = {
  kind: "ins_vec";
  id: Timestamp;
  obj: Timestamp;
  entries: Array<[number, Timestamp]>;
};
export type InsStrOp = {
  kind: "ins_str";
  id: Timestamp;
  obj: Timestamp;
  after: Timestamp;
  data: string;
};
export type InsBinOp = {
  kind: "ins_bin";
  id: Timestamp;
  obj: Timestamp;
  after: Timestamp;
  data: Uint8Array;
};
export type InsArrOp = {
  kind: "ins_arr";
  id: Timestamp;
  obj: Timestamp;
  after: Timestamp;
  data: Timestamp[];
};
export type UpdArrOp = {
  kind: "upd_arr";
  id: Timestamp;
  obj: Timestamp;
  /** Id of the array slot being replaced. */
  ref: Timestamp;
  value: Timestamp;
};
export type DelOp = { kind: "del"; id: Timestamp; obj: Timestamp; what: Timespan[] };
export type NopOp = { kind: "nop"; id: Timestamp; len: number };

/** One of the 16 patch operations. */
export type Op =
  | NewConOp
  | NewValOp
  | NewObjOp
  | NewVecOp
  | NewStrOp
  | NewBinOp
  | NewArrOp
  | InsValOp
  | InsObjOp
  | InsVecOp
  | InsStrOp
  | InsBinOp
  | InsArrOp
  | UpdArrOp
  | DelOp
  | NopOp;

export type OpName = Op["kind"];

/** An ordered, replayable batch of operations. */
export type Patch = {
  ops: Op[];
  meta?: PackValue;
};

// ---

/** Verbose wire id: a server-session time or `[sid, time]`. */
export type VerboseId = number | [SessionId, number];

export type VerboseOp =
  | { op: "new_con"; value?: PackValue | VerboseId; timestamp?: true }
  | { op: "new_val" | "new_obj" | "new_vec" | "new_str" | "new_bin" | "new_arr" }
  | { op: "ins_val"; obj: VerboseId; value: VerboseId }
  | { op: "ins_obj"; obj: VerboseId; value: Array<[string, VerboseId]> }
  | { op: "ins_vec"; obj: VerboseId; value: Array<[number, VerboseId]> }
  | { op: "ins_str"; obj: VerboseId; after: VerboseId; value: string }
  | { op: "ins_bin"; obj: VerboseId; after: VerboseId; value: string }
  | { op: "ins_arr"; obj: VerboseId; after: VerboseId; values: VerboseId[] }
  | { op: "upd_arr"; obj: VerboseId; ref: VerboseId; value: VerboseId }
  | { op: "del"; obj: VerboseId; what: Array<[SessionId, number, number]> }
  | { op: "nop"; len: number };

/** Human-readable patch representation. */
export type VerbosePatch = {
  id: VerboseId;
  meta?: PackValue;
  ops: VerboseOp[];
};

/** Compact wire id: a time within the patch session, or `[sid, time]`. */
export type CompactId = number | [SessionId, number];

/** Compact patch: `[[id, meta?], [opcode, ...fields], ...]`. */
export type CompactPatch = [[CompactId] | [CompactId, PackValue], ...PackValue[][]];

// ---

/** Verbose structural snapshot of one node. */
export type SnapshotNode =
  | { type: "con"; id: VerboseId; value?: PackValue; timestamp?: true }
  | { type: "val"; id: VerboseId; value?: SnapshotNode }
  | { type: "obj"; id: VerboseId; map: Record<string, SnapshotNode> }
  | { type: "vec"; id: VerboseId; map: Array<SnapshotNode | null> }
  | { type: "str"; id: VerboseId; chunks: Array<SnapshotChunk<string>> }
  | { type: "bin"; id: VerboseId; chunks: Array<SnapshotChunk<string>> }
  | { type: "arr"; id: VerboseId; chunks: Array<SnapshotChunk<SnapshotNode[]>> };

/** A live chunk carries `value`; a tombstone carries only `span`. */
export type SnapshotChunk<V> = { id: VerboseId; value: V } | { id: VerboseId; span: number };

/** Verbose structural snapshot of a whole model. */
export type ModelSnapshot = {
  /** Server time, or clock rows `[sid, time]` with the local session first. */
  time: number | Array<[SessionId, number]>;
  root: SnapshotNode | null;
};

/** One node of a compact model: `[type, id, ...payload]`. */
export type CompactModelNode = PackValue[];

/**
 * Compact structural model: `[clock, root]`. The clock is the server time, or
 * flattened `sid, time` clock-table rows; an empty document has root `0`.
 */
export type CompactModel = [time: number | number[], root: CompactModelNode | 0];

// ---

/** Options for `diff` / `diffDstKeys`. */
export type DiffOptions = {
  maxDepth?: number;
};

/** Options for structural decoders. */
export type DecodeOptions = {
  maxDepth?: number;
};

/** Outcome of wire-compatible patch acceptance. */
export type PatchPayload =
  | { kind: "patch"; patch: Patch }
  | { kind: "opaque"; bytes: Uint8Array };
