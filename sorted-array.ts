import { DefaultComparable, defaultComparator } from "./ordering";

/**
 * A plain sorted array of pairs, used by the tests as a reference map to
 * check the trees against. O(size) insertion and deletion.
 */
export default class SortedArray<K = DefaultComparable, V = unknown> {
  a: [K, V][];
  cmp: (a: K, b: K) => number;

  constructor(entries: [K, V][] = [], compare?: (a: K, b: K) => number) {
    this.cmp = compare ?? ((a, b) => defaultComparator(toComparable(a), toComparable(b)));
    this.a = [];
    for (const [k, v] of entries) this.set(k, v);
  }

  get size(): number {
    return this.a.length;
  }

  get(key: K, defaultValue?: V): V | undefined {
    const pos = this.indexOf(key);
    return pos >= 0 ? this.a[pos][1] : defaultValue;
  }

  has(key: K): boolean {
    return this.indexOf(key) >= 0;
  }

  /** @returns true if a new pair was added, false if a value was replaced */
  set(key: K, value: V): boolean {
    const pos = this.indexOf(key);
    if (pos >= 0) {
      this.a[pos][1] = value;
      return false;
    }
    this.a.splice(~pos, 0, [key, value]);
    return true;
  }

  delete(key: K): boolean {
    const pos = this.indexOf(key);
    if (pos < 0) return false;
    this.a.splice(pos, 1);
    return true;
  }

  /** Position of the key among the sorted keys, i.e. its index. */
  rank(key: K): number {
    return this.indexOf(key);
  }

  getArray(): [K, V][] {
    return this.a.map(([k, v]): [K, V] => [k, v]);
  }

  keys(): K[] {
    return this.a.map(([k]) => k);
  }

  /** Binary search: the index of the key, or ~(insertion point) if absent. */
  indexOf(key: K): number {
    let lo = 0;
    let hi = this.a.length;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      const c = this.cmp(this.a[mid][0], key);
      if (c < 0) lo = mid + 1;
      else if (c > 0) hi = mid;
      else return mid;
    }
    return ~lo;
  }
}

function toComparable(v: unknown): DefaultComparable {
  if (
    v === null ||
    v === undefined ||
    v instanceof Date ||
    typeof v === "number" ||
    typeof v === "string" ||
    typeof v === "bigint" ||
    typeof v === "boolean"
  )
    return v;
  throw new Error("SortedArray needs a comparator for " + typeof v + " keys");
}
