import type { Node, NodeKey, PackValue, Timestamp } from "./types";

import { assertTraversalDepth, MAX_TRAVERSAL_DEPTH } from "./errors";
import { arrElements, binView, nodeKey, strView } from "./nodes";
import { createPackObject, setPackProperty } from "./pack-value";

type Slot =
  | { readonly kind: "root" }
  | { readonly kind: "array"; readonly out: PackValue[]; readonly index: number }
  | { readonly kind: "object"; readonly out: Record<string, PackValue>; readonly key: string };

type Frame = {
  readonly id: Timestamp;
  readonly depth: number;
  readonly slot: Slot;
};

export type NodeIndex = ReadonlyMap<NodeKey, Node>;

/**
 * Follow `val` registers from `id` to the first non-register node.
 * Returns `undefined` when the chain ends at an unknown id.
 */
export function resolveNode(
  index: NodeIndex,
  id: Timestamp,
  depth = 0,
  maxDepth: number = MAX_TRAVERSAL_DEPTH,
): { node: Node; depth: number } | undefined {
  let current = index.get(nodeKey(id));
  let currentDepth = depth;
  while (current && current.kind === "val") {
    currentDepth++;
    assertTraversalDepth(currentDepth, maxDepth);
    current = index.get(nodeKey(current.value));
  }

  return current ? { node: current, depth: currentDepth } : undefined;
}

/**
 * Convert the node graph under `id` into a plain value using an explicit stack.
 * Object keys whose value views as `undefined` are omitted. Unknown array or
 * vector elements and references view as `null`; an unknown root views as `undefined`.
 */
export function materialize(
  index: NodeIndex,
  id: Timestamp,
  maxDepth: number = MAX_TRAVERSAL_DEPTH,
): PackValue {
  const rootHolder: { value?: PackValue } = {};
  const stack: Frame[] = [{ id, depth: 0, slot: { kind: "root" } }];

  while (stack.length > 0) {
    const frame = stack.pop()!;
    assertTraversalDepth(frame.depth, maxDepth);
    const resolved = resolveNode(index, frame.id, frame.depth, maxDepth);
    if (!resolved) {
      assign(frame.slot, frame.slot.kind === "array" ? null : undefined, rootHolder);
      continue;
    }

    const { node, depth } = resolved;
    switch (node.kind) {
      case "con":
        assign(frame.slot, node.data.type === "value" ? node.data.value : null, rootHolder);
        break;
      case "str":
        assign(frame.slot, strView(node), rootHolder);
        break;
      case "bin":
        assign(frame.slot, binView(node), rootHolder);
        break;
      case "obj": {
        const out = createPackObject();
        assign(frame.slot, out, rootHolder);
        // Reverse push keeps each object's keys in insertion order.
        const entries = [...node.keys.entries()];
        for (let i = entries.length - 1; i >= 0; i--) {
          const [key, child] = entries[i]!;
          stack.push({ id: child, depth: depth + 1, slot: { kind: "object", out, key } });
        }
        break;
      }
      case "vec": {
        const out: PackValue[] = new Array<PackValue>(node.elements.length).fill(null);
        assign(frame.slot, out, rootHolder);
        node.elements.forEach((child, i) => {
          if (child) {
            stack.push({ id: child, depth: depth + 1, slot: { kind: "array", out, index: i } });
          }
        });
        break;
      }
      case "arr": {
        const elements = arrElements(node);
        const out: PackValue[] = new Array<PackValue>(elements.length).fill(null);
        assign(frame.slot, out, rootHolder);
        elements.forEach((child, i) => {
          stack.push({ id: child, depth: depth + 1, slot: { kind: "array", out, index: i } });
        });
        break;
      }
      case "val":
        // resolveNode never stops on a register
        break;
    }
  }

  return rootHolder.value;
}

function assign(slot: Slot, value: PackValue, rootHolder: { value?: PackValue }): void {
  if (slot.kind === "root") {
    rootHolder.value = value;
    return;
  }

  if (slot.kind === "array") {
    slot.out[slot.index] = value;
    return;
  }

  if (value !== undefined) {
    setPackProperty(slot.out, slot.key, value);
  }
}
