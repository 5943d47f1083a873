import {
  NONE,
  Slot,
  ZipArena,
  ZipMapArena,
  predecessor,
  successor,
} from "./zip-node";

/**
 * A cursor over a tree's arena. It is a view, not an owner: it remembers the
 * tree's structural version when it was issued, and once the tree has been
 * restructured (any successful insert, delete or clear, including a delete
 * made through this very cursor) it reports itself empty instead of reading
 * a slot that may now hold a different node.
 *
 * Overwriting a map value does not restructure the tree, so cursors survive it.
 */
export class ZipIterator<K> {
  protected _slot: Slot;
  protected readonly _version: number;

  constructor(readonly arena: ZipArena<K>, slot: Slot) {
    this._slot = slot;
    this._version = arena._version;
  }

  /** Arena handle of the current node, or NONE when empty or stale. */
  get slot(): Slot {
    return this._version === this.arena._version ? this._slot : NONE;
  }

  /** True once iteration ran off either end, or the cursor went stale. */
  isEmpty(): boolean {
    return this.slot === NONE;
  }

  /** Key at the cursor, or undefined if the cursor is empty. */
  get key(): K | undefined {
    const slot = this.slot;
    return slot === NONE ? undefined : this.arena._nodes[slot].key;
  }

  /** Slot of the current node's parent (diagnostic). */
  get parent(): Slot {
    const slot = this.slot;
    return slot === NONE ? NONE : this.arena._nodes[slot].parent;
  }

  /** Moves to the next larger key. No effect on an empty cursor. */
  next(): void {
    const slot = this.slot;
    if (slot !== NONE) this._slot = successor(this.arena._nodes, slot);
  }

  /** Moves to the next smaller key. No effect on an empty cursor. */
  prev(): void {
    const slot = this.slot;
    if (slot !== NONE) this._slot = predecessor(this.arena._nodes, slot);
  }
}

/** Cursor over a ZipTreeMap; adds the value stored beside each key. */
export class ZipMapIterator<K, V> extends ZipIterator<K> {
  private readonly map: ZipMapArena<K, V>;

  constructor(map: ZipMapArena<K, V>, slot: Slot) {
    super(map, slot);
    this.map = map;
  }

  get value(): V | undefined {
    const slot = this.slot;
    return slot === NONE ? undefined : this.map._values[slot];
  }
}
