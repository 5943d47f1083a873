/** Arena handle of a node: its index in the tree's node array. */
export type Slot = number;

/** The reserved handle meaning "no node". */
export const NONE: Slot = 0xffffffff;

/** Returned by `indexOf` for a key that is not in the tree. */
export const NOT_FOUND = 0xffffffff;

/** Handles are 32-bit with NONE reserved, so this many nodes at most. */
export const MAX_SIZE = 0xfffffffe;

export interface ZipNode<K> {
  key: K;
  left: Slot;
  right: Slot;
  parent: Slot;
  /** Packed (r1, 1 + r2); see rank.ts */
  rank: number;
  /** Number of nodes in the subtree rooted here, this one included. */
  count: number;
}

/** What a cursor needs to read: the node array and the structural version. */
export interface ZipArena<K> {
  readonly _nodes: ZipNode<K>[];
  readonly _version: number;
}

/** A map's arena also carries the values, index-aligned with `_nodes`. */
export interface ZipMapArena<K, V> extends ZipArena<K> {
  readonly _values: V[];
}

export function leftmost<K>(nodes: ZipNode<K>[], slot: Slot): Slot {
  if (slot === NONE) return NONE;
  while (nodes[slot].left !== NONE) slot = nodes[slot].left;
  return slot;
}

export function rightmost<K>(nodes: ZipNode<K>[], slot: Slot): Slot {
  if (slot === NONE) return NONE;
  while (nodes[slot].right !== NONE) slot = nodes[slot].right;
  return slot;
}

/** In-order successor, or NONE after the largest key. */
export function successor<K>(nodes: ZipNode<K>[], slot: Slot): Slot {
  const right = nodes[slot].right;
  if (right !== NONE) return leftmost(nodes, right);
  // climb until we arrive from a left child
  let parent = nodes[slot].parent;
  while (parent !== NONE && nodes[parent].right === slot) {
    slot = parent;
    parent = nodes[parent].parent;
  }
  return parent;
}

/** In-order predecessor, or NONE before the smallest key. */
export function predecessor<K>(nodes: ZipNode<K>[], slot: Slot): Slot {
  const left = nodes[slot].left;
  if (left !== NONE) return rightmost(nodes, left);
  let parent = nodes[slot].parent;
  while (parent !== NONE && nodes[parent].left === slot) {
    slot = parent;
    parent = nodes[parent].parent;
  }
  return parent;
}

/** Throws an Error built from `args` unless `fact` holds. */
export function check(fact: boolean, ...args: unknown[]): void {
  if (!fact) {
    args.unshift("zip tree"); // at beginning of message
    throw new Error(args.join(" "));
  }
}
