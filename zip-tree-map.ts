import { printInOrder, printTree } from "./print";
import { ZipMapIterator } from "./zip-iterator";
import { NONE, Slot, check, leftmost, successor } from "./zip-node";
import { ZipTreeBase } from "./zip-tree";

/**
 * A sorted map on a Zip-Zip tree. Values live in `_values`, index-aligned
 * with the tree's node array: `_values[i]` belongs to `_nodes[i].key`. The
 * engine's compaction moves both in one `removeSlot` step, so deleting a key
 * can never leave a value behind in the wrong slot.
 *
 * @example
 *     const ages = new ZipTreeMap<string, number>((a, b) => a < b);
 *     ages.put("Fran", 40);
 *     ages.put("Bill", 17);
 *     ages.minimum().value;   // 17
 */
export class ZipTreeMap<K, V> extends ZipTreeBase<K, ZipMapIterator<K, V>> {
  _values: V[] = [];

  protected iterator(slot: Slot): ZipMapIterator<K, V> {
    return new ZipMapIterator<K, V>(this, slot);
  }

  /**
   * Not available on a map: every key needs a value. Use put().
   * @throws always
   */
  insert(_key: K): never {
    throw new Error("ZipTreeMap.insert() is not supported; use put(key, value)");
  }

  /**
   * Adds or overwrites a key-value pair.
   * @returns true if a new pair was added, false if an existing value was
   *   replaced (which does not restructure the tree).
   * @description Expected computational complexity: O(log size)
   */
  put(key: K, value: V): boolean {
    const found = this.findSlot(key);
    if (found !== NONE) {
      this._values[found] = value;
      return false;
    }
    const slot = this.insertSlot(key);
    this._values[slot] = value;
    return true;
  }

  /**
   * Finds a key and returns the associated value.
   * @param defaultValue a value to return if the key was not found.
   * @description Expected computational complexity: O(log size)
   */
  get(key: K, defaultValue?: V): V | undefined {
    const slot = this.findSlot(key);
    return slot === NONE ? defaultValue : this._values[slot];
  }

  clear(): void {
    super.clear();
    this._values = [];
  }

  /** Values in ascending key order. */
  *values(): IterableIterator<V> {
    const nodes = this._nodes, values = this._values;
    for (let slot = leftmost(nodes, this._root); slot !== NONE; slot = successor(nodes, slot))
      yield values[slot];
  }

  /** Key-value pairs in ascending key order. */
  *entries(): IterableIterator<[K, V]> {
    const nodes = this._nodes, values = this._values;
    for (let slot = leftmost(nodes, this._root); slot !== NONE; slot = successor(nodes, slot))
      yield [nodes[slot].key, values[slot]];
  }

  [Symbol.iterator](): IterableIterator<[K, V]> {
    return this.entries();
  }

  /** Gets an array of all pairs, sorted by key. */
  toArray(): [K, V][] {
    return Array.from(this.entries());
  }

  toString(): string {
    return printTree(this, (slot) => String(this._values[slot]));
  }

  printInOrder(): string {
    return printInOrder(this, (slot) => String(this._values[slot]));
  }

  checkValid(): void {
    super.checkValid();
    check(
      this._values.length === this._nodes.length,
      "holds",
      this._values.length,
      "values for",
      this._nodes.length,
      "keys"
    );
  }

  protected removeSlot(slot: Slot): void {
    const values = this._values;
    const last = values.length - 1;
    super.removeSlot(slot);
    if (slot !== last) values[slot] = values[last];
    values.pop();
  }
}

export default ZipTreeMap;
