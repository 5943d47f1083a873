import debug from "debug";

import { LessFn, Ordering } from "./ordering";
import { printInOrder, printTree } from "./print";
import {
  RandomSource,
  RankGenerator,
  primaryRank,
  secondaryRank,
} from "./rank";
import { ZipIterator } from "./zip-iterator";
import {
  MAX_SIZE,
  NONE,
  NOT_FOUND,
  Slot,
  ZipNode,
  leftmost,
  rightmost,
  check,
  successor,
} from "./zip-node";

const log = debug("zip-tree");

/**
 * The zip tree engine shared by ZipTree (a sorted set) and ZipTreeMap.
 *
 * Nodes live in `_nodes`, a dense array addressed by slot; links between
 * nodes are slots, with NONE for "no node". Every node carries a random rank
 * drawn when it is inserted, and the tree is a max-heap on rank (ties go to
 * the smaller key, which always sits higher) as well as a search tree on key.
 * Balance therefore needs no rotations: insertion "unzips" the subtree that
 * the new node displaces, and deletion "zips" the two subtrees of the removed
 * node back together.
 *
 * Deletion keeps the array gap-free by moving the node in the last slot into
 * the freed one. That node's slot changes, which is why cursors check the
 * structural version (see ZipIterator) rather than trusting their slot.
 *
 * @description
 * Not thread-safe; the injected random source belongs to the tree.
 * Expected cost of search, insertion, deletion and the order-statistics
 * queries is O(log size).
 */
export abstract class ZipTreeBase<K, I extends ZipIterator<K>> {
  _nodes: ZipNode<K>[] = [];
  _root: Slot = NONE;
  /** Bumped by every structural change; cursors compare against it. */
  _version: number = 0;

  readonly _ordering: Ordering<K>;
  readonly _ranks: RankGenerator;

  /**
   * @param lessThan Strict weak ordering over keys. See `defaultLessThan`
   *   for a ready-made one over numbers, strings, Dates and friends.
   * @param random Source of randomness for ranks; pass a seeded
   *   MersenneTwister for reproducible shapes. If omitted, an unseeded one
   *   is created.
   */
  constructor(lessThan: LessFn<K>, random?: RandomSource) {
    this._ordering = new Ordering(lessThan);
    this._ranks = new RankGenerator(random);
  }

  /** Wraps a slot (or NONE) in this tree's cursor type. */
  protected abstract iterator(slot: Slot): I;

  /////////////////////////////////////////////////////////////////////////////
  // Size //////////////////////////////////////////////////////////////////////

  /** Number of live nodes, i.e. the arena length. */
  get size(): number {
    return this._nodes.length;
  }

  /** Subtree count of the root; always equal to `size`. */
  get count(): number {
    return this._root === NONE ? 0 : this._nodes[this._root].count;
  }

  /** Returns true iff the tree holds no keys. */
  isEmpty(): boolean {
    return this._nodes.length === 0;
  }

  /////////////////////////////////////////////////////////////////////////////
  // Mutators //////////////////////////////////////////////////////////////////

  /**
   * Adds a key.
   * @returns true if a node was created, false if the key was already present
   *   (in which case nothing changes).
   * @description Expected computational complexity: O(log size)
   */
  insert(key: K): boolean {
    if (this.findSlot(key) !== NONE) return false;
    this.insertSlot(key);
    return true;
  }

  /**
   * Removes a key.
   * @returns true if the key was found and removed, false otherwise.
   * @description Expected computational complexity: O(log size)
   */
  delete(key: K): boolean {
    return this.deleteSlot(this.findSlot(key));
  }

  /**
   * Removes the key a cursor points at. The cursor must have been issued by
   * this tree and still be current; a stale, empty or foreign cursor removes
   * nothing.
   * @returns true if a key was removed.
   */
  deleteIter(iter: I): boolean {
    if (iter.arena !== this) return false;
    return this.deleteSlot(iter.slot);
  }

  /** Removes every key. */
  clear(): void {
    this._nodes = [];
    this._root = NONE;
    this._version++;
  }

  /////////////////////////////////////////////////////////////////////////////
  // Lookup ////////////////////////////////////////////////////////////////////

  /** Returns true if the key is present. */
  has(key: K): boolean {
    return this.findSlot(key) !== NONE;
  }

  /** Cursor at the key, or an empty cursor if absent. */
  find(key: K): I {
    return this.iterator(this.findSlot(key));
  }

  /** Cursor at the largest key less than or equal to `key`. */
  floor(key: K): I {
    const nodes = this._nodes, ord = this._ordering;
    let res = NONE;
    let curr = this._root;
    while (curr !== NONE) {
      if (ord.lt(key, nodes[curr].key)) {
        curr = nodes[curr].left;
      } else {
        res = curr;
        curr = nodes[curr].right;
      }
    }
    return this.iterator(res);
  }

  /** Cursor at the smallest key greater than or equal to `key`. */
  ceiling(key: K): I {
    const nodes = this._nodes, ord = this._ordering;
    let res = NONE;
    let curr = this._root;
    while (curr !== NONE) {
      if (ord.lt(nodes[curr].key, key)) {
        curr = nodes[curr].right;
      } else {
        res = curr;
        curr = nodes[curr].left;
      }
    }
    return this.iterator(res);
  }

  /** Cursor at the first key not ordered before `key`; same as ceiling(). */
  lowerBound(key: K): I {
    return this.ceiling(key);
  }

  /** Cursor at the first key ordered after `key`. */
  upperBound(key: K): I {
    const nodes = this._nodes, ord = this._ordering;
    let res = NONE;
    let curr = this._root;
    while (curr !== NONE) {
      if (ord.ge(key, nodes[curr].key)) {
        curr = nodes[curr].right;
      } else {
        res = curr;
        curr = nodes[curr].left;
      }
    }
    return this.iterator(res);
  }

  /** Cursor at the smallest key; empty if the tree is. */
  minimum(): I {
    return this.iterator(leftmost(this._nodes, this._root));
  }

  /** Cursor at the largest key; empty if the tree is. */
  maximum(): I {
    return this.iterator(rightmost(this._nodes, this._root));
  }

  /** Cursor for ascending iteration, starting at the minimum. */
  newIterator(): I {
    return this.minimum();
  }

  /** Cursor for descending iteration, starting at the maximum. */
  newReverseIterator(): I {
    return this.maximum();
  }

  /////////////////////////////////////////////////////////////////////////////
  // Order statistics //////////////////////////////////////////////////////////

  /**
   * Cursor at the key with `index` smaller keys before it (select).
   * Empty if `index` is not an integer in [0, size).
   * @description Expected computational complexity: O(log size)
   */
  atIndex(index: number): I {
    if (!Number.isInteger(index) || index < 0) return this.iterator(NONE);
    const nodes = this._nodes;
    let curr = this._root;
    while (curr !== NONE) {
      const leftCount = this.countOf(nodes[curr].left);
      if (index < leftCount) {
        curr = nodes[curr].left;
      } else if (index > leftCount) {
        index -= leftCount + 1;
        curr = nodes[curr].right;
      } else {
        break;
      }
    }
    return this.iterator(curr);
  }

  /**
   * Number of keys ordered before `key` (rank), or NOT_FOUND if the key is
   * not present.
   * @description Expected computational complexity: O(log size)
   */
  indexOf(key: K): number {
    const nodes = this._nodes, ord = this._ordering;
    let curr = this._root;
    let index = 0;
    while (curr !== NONE) {
      const node = nodes[curr];
      if (ord.lt(key, node.key)) {
        curr = node.left;
      } else if (ord.lt(node.key, key)) {
        index += this.countOf(node.left) + 1;
        curr = node.right;
      } else {
        return index + this.countOf(node.left);
      }
    }
    return NOT_FOUND;
  }

  /////////////////////////////////////////////////////////////////////////////
  // Iteration & diagnostics ///////////////////////////////////////////////////

  /**
   * Keys in ascending order. The tree must not be restructured while this
   * generator is being consumed.
   */
  *keys(): IterableIterator<K> {
    const nodes = this._nodes;
    for (let slot = leftmost(nodes, this._root); slot !== NONE; slot = successor(nodes, slot))
      yield nodes[slot].key;
  }

  /** Number of nodes on the longest root-to-leaf path (0 when empty). */
  getHeight(): number {
    const nodes = this._nodes;
    let height = 0;
    const stack: [Slot, number][] = [];
    if (this._root !== NONE) stack.push([this._root, 1]);
    for (let top = stack.pop(); top !== undefined; top = stack.pop()) {
      const [slot, depth] = top;
      if (depth > height) height = depth;
      const { left, right } = nodes[slot];
      if (left !== NONE) stack.push([left, depth + 1]);
      if (right !== NONE) stack.push([right, depth + 1]);
    }
    return height;
  }

  /** Pre-order dump of the tree shape, slots, ranks and counts. */
  toString(): string {
    return printTree(this);
  }

  /** One line per node, in ascending key order. */
  printInOrder(): string {
    return printInOrder(this);
  }

  /**
   * Scans the whole arena for signs of serious bugs: broken parent links,
   * keys out of order, heap order violated, stale subtree counts, or a
   * count that disagrees with the arena length. Throws on the first problem.
   * Computational complexity: O(size).
   */
  checkValid(): void {
    const nodes = this._nodes;
    if (this._root === NONE) {
      check(nodes.length === 0, "no root but", nodes.length, "nodes");
      return;
    }
    check(this._root < nodes.length, "root slot", this._root, "out of range");
    check(nodes[this._root].parent === NONE, "root", this._root, "has a parent");
    const counted = this.checkSubtree(this._root, 0);
    check(
      counted === nodes.length,
      "size mismatch: counted",
      counted,
      "but stored",
      nodes.length
    );
  }

  private checkSubtree(slot: Slot, depth: number): number {
    const nodes = this._nodes, ord = this._ordering;
    const node = nodes[slot];
    let count = 1;
    if (node.left !== NONE) {
      const left = nodes[node.left];
      check(left.parent === slot, "slot", node.left, "has parent", left.parent, "instead of", slot);
      check(ord.lt(left.key, node.key), "left child of slot", slot, "is not smaller at depth", depth);
      check(left.rank < node.rank, "left child of slot", slot, "outranks its parent");
      count += this.checkSubtree(node.left, depth + 1);
      const max = nodes[rightmost(nodes, node.left)];
      check(ord.lt(max.key, node.key), "left subtree of slot", slot, "holds a larger key");
    }
    if (node.right !== NONE) {
      const right = nodes[node.right];
      check(right.parent === slot, "slot", node.right, "has parent", right.parent, "instead of", slot);
      check(ord.lt(node.key, right.key), "right child of slot", slot, "is not larger at depth", depth);
      check(right.rank <= node.rank, "right child of slot", slot, "outranks its parent");
      count += this.checkSubtree(node.right, depth + 1);
      const min = nodes[leftmost(nodes, node.right)];
      check(ord.lt(node.key, min.key), "right subtree of slot", slot, "holds a smaller key");
    }
    check(node.count === count, "slot", slot, "stores count", node.count, "but has", count);
    return count;
  }

  /////////////////////////////////////////////////////////////////////////////
  // Engine ////////////////////////////////////////////////////////////////////

  protected countOf(slot: Slot): number {
    return slot === NONE ? 0 : this._nodes[slot].count;
  }

  /** Slot holding `key`, or NONE. */
  protected findSlot(key: K): Slot {
    const nodes = this._nodes, ord = this._ordering;
    let curr = this._root;
    while (curr !== NONE) {
      const node = nodes[curr];
      if (ord.lt(key, node.key)) curr = node.left;
      else if (ord.lt(node.key, key)) curr = node.right;
      else break;
    }
    return curr;
  }

  /**
   * Appends a node for `key`, which must not be present, and links it in.
   * @returns the new node's slot, which is always the old `size`.
   */
  protected insertSlot(key: K): Slot {
    const nodes = this._nodes, ord = this._ordering;
    check(nodes.length < MAX_SIZE, "is full at", nodes.length, "nodes");

    const slot = nodes.length;
    const rank = this._ranks.next(slot);
    nodes.push({ key, left: NONE, right: NONE, parent: NONE, rank, count: 1 });
    if (log.enabled)
      log("insert slot %d rank (%d, %d)", slot, primaryRank(rank), secondaryRank(rank));

    // Walk down past every node that stays above the new one: higher rank,
    // or equal rank and a smaller key.
    let prev = NONE;
    let curr = this._root;
    while (
      curr !== NONE &&
      (rank < nodes[curr].rank ||
        (rank === nodes[curr].rank && ord.lt(nodes[curr].key, key)))
    ) {
      prev = curr;
      curr = ord.lt(key, nodes[curr].key) ? nodes[curr].left : nodes[curr].right;
    }

    this.attach(prev, prev !== NONE && ord.lt(key, nodes[prev].key), slot);
    if (curr !== NONE) this.unzip(slot, curr);
    this.fixCounts(slot, NONE);
    this._version++;
    return slot;
  }

  /**
   * Splits the subtree rooted at `curr` around the key of `slot`: nodes with
   * smaller keys form a chain down the new node's left side (linked through
   * their right children), larger ones a chain down its right side (linked
   * through their left children). Each side keeps its original top-down
   * order, so heap order survives.
   */
  private unzip(slot: Slot, curr: Slot): void {
    const nodes = this._nodes, ord = this._ordering;
    const key = nodes[slot].key;
    // Tail of each chain; the new node stands in until a side gets its first node.
    let leftTail = slot;
    let rightTail = slot;
    while (curr !== NONE) {
      const node = nodes[curr];
      if (ord.lt(node.key, key)) {
        this.attach(leftTail, leftTail === slot, curr);
        leftTail = curr;
        curr = node.right;
      } else {
        this.attach(rightTail, rightTail !== slot, curr);
        rightTail = curr;
        curr = node.left;
      }
    }
    // Cut the links the tails still hold into the other chain.
    this.attach(leftTail, leftTail === slot, NONE);
    this.attach(rightTail, rightTail !== slot, NONE);
    this.fixCounts(leftTail, slot);
    this.fixCounts(rightTail, slot);
  }

  /**
   * Unlinks the node at `slot`, zips its subtrees together in its place,
   * then compacts the arena.
   * @returns false if `slot` is NONE (or out of range).
   */
  protected deleteSlot(slot: Slot): boolean {
    const nodes = this._nodes;
    if (slot === NONE || slot >= nodes.length) return false;

    const victim = nodes[slot];
    let left = victim.left;
    let right = victim.right;
    let hook = victim.parent;
    let hookLeft = hook !== NONE && nodes[hook].left === slot;

    // Zip: the higher-ranked head of the two sides takes the open position
    // (ties go left), and the merge continues down its inner edge.
    for (;;) {
      if (left === NONE || right === NONE) {
        this.attach(hook, hookLeft, left === NONE ? right : left);
        break;
      }
      if (nodes[left].rank >= nodes[right].rank) {
        this.attach(hook, hookLeft, left);
        hook = left;
        hookLeft = false;
        left = nodes[left].right;
      } else {
        this.attach(hook, hookLeft, right);
        hook = right;
        hookLeft = true;
        right = nodes[right].left;
      }
    }
    this.fixCounts(hook, NONE);

    this.compact(slot);
    this._version++;
    return true;
  }

  /**
   * Fills the hole at `slot`, which nothing links to any more, with the node
   * from the last slot and re-points that node's parent, children and (if
   * it is the root) the root handle at its new slot.
   */
  private compact(slot: Slot): void {
    const nodes = this._nodes;
    const last = nodes.length - 1;
    log("delete slot %d, relocating slot %d", slot, last);
    if (slot !== last) {
      const moved = nodes[last];
      if (moved.left !== NONE) nodes[moved.left].parent = slot;
      if (moved.right !== NONE) nodes[moved.right].parent = slot;
      if (moved.parent === NONE) this._root = slot;
      else if (nodes[moved.parent].left === last) nodes[moved.parent].left = slot;
      else nodes[moved.parent].right = slot;
    }
    this.removeSlot(slot);
  }

  /**
   * Moves whatever the last slot holds into `slot` and shrinks the arena by
   * one. Anything stored per slot beside `_nodes` must be moved here too, in
   * the same step, by overriding this method.
   */
  protected removeSlot(slot: Slot): void {
    const nodes = this._nodes;
    const last = nodes.length - 1;
    if (slot !== last) nodes[slot] = nodes[last];
    nodes.pop();
  }

  /** Makes `child` the left or right child of `parent`, or the root if `parent` is NONE. */
  private attach(parent: Slot, asLeft: boolean, child: Slot): void {
    const nodes = this._nodes;
    if (parent === NONE) this._root = child;
    else if (asLeft) nodes[parent].left = child;
    else nodes[parent].right = child;
    if (child !== NONE) nodes[child].parent = parent;
  }

  /** Recomputes subtree counts from `curr` upward, stopping before `limit`. */
  private fixCounts(curr: Slot, limit: Slot): void {
    const nodes = this._nodes;
    while (curr !== limit) {
      const node = nodes[curr];
      node.count = 1 + this.countOf(node.left) + this.countOf(node.right);
      curr = node.parent;
    }
  }
}

/**
 * A sorted set on a Zip-Zip tree, with order statistics.
 *
 * @example
 *     const tree = new ZipTree<number>((a, b) => a < b);
 *     [6, 4, 3, 1].forEach(k => tree.insert(k));
 *     tree.atIndex(1).key;   // 3
 *     tree.indexOf(6);       // 3
 *     [...tree];             // [1, 3, 4, 6]
 */
export class ZipTree<K> extends ZipTreeBase<K, ZipIterator<K>> {
  protected iterator(slot: Slot): ZipIterator<K> {
    return new ZipIterator<K>(this, slot);
  }

  [Symbol.iterator](): IterableIterator<K> {
    return this.keys();
  }

  /** Gets an array of all keys, sorted. */
  toArray(): K[] {
    return Array.from(this.keys());
  }
}

export default ZipTree;
