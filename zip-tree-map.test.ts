import ZipTreeMap from "./zip-tree-map";
import SortedArray from "./sorted-array";
import { RandomSource, tieBreakLimit } from "./rank";
import MersenneTwister from "mersenne-twister";

var rand = new MersenneTwister(1234);
function randInt(max: number) { return rand.random_int() % max; }

const lessThan = (a: number, b: number) => a < b;

function newMap<V>() {
  return new ZipTreeMap<number, V>(lessThan, new MersenneTwister(1234));
}

function expectMapEqualTo<V>(a: ZipTreeMap<number, V>, b: SortedArray<number, V>) {
  a.checkValid();
  expect(a.toArray()).toEqual(b.getArray());
}

/** Primary rank `primaries[i]` and tie-breaker 0 for the i-th insertion. */
class ScriptedRandom implements RandomSource {
  private values: number[] = [];
  constructor(primaries: number[]) {
    primaries.forEach((r1, size) => {
      for (let i = 0; i < r1; i++) this.values.push(0.25);
      this.values.push(0.75);
      if (tieBreakLimit(size) > 0) this.values.push(0);
    });
  }
  random(): number {
    const v = this.values.shift();
    if (v === undefined) throw new Error("random script exhausted");
    return v;
  }
}

describe("Basic map operations", () => {
  test("put() adds, then overwrites", () => {
    const map = newMap<string>();
    expect(map.put(2, "two")).toBe(true);
    expect(map.put(1, "one")).toBe(true);
    expect(map.put(2, "TWO")).toBe(false);
    expect(map.size).toBe(2);
    expect(map.get(2)).toBe("TWO");
    expect(map.get(3)).toBeUndefined();
    expect(map.get(3, "none")).toBe("none");
    expect(map.toArray()).toEqual([[1, "one"], [2, "TWO"]]);
    map.checkValid();
  });

  test("An overwrite does not restructure the map", () => {
    const map = newMap<number>();
    for (const k of [8, 3, 10, 1, 6]) map.put(k, k);
    const before = map.toString();
    const version = map._version;
    map.put(6, 60);
    expect(map._version).toBe(version);
    expect(map.toString()).toBe(before.replace("Key: 6, Value: 6,", "Key: 6, Value: 60,"));
  });

  test("insert() is rejected", () => {
    const map = newMap<string>();
    expect(() => map.insert(1)).toThrow("use put(key, value)");
    expect(map.size).toBe(0);
  });

  test("keys(), values() and entries() agree", () => {
    const map = newMap<string>();
    for (const k of [30, 10, 20]) map.put(k, "v" + k);
    expect([...map.keys()]).toEqual([10, 20, 30]);
    expect([...map.values()]).toEqual(["v10", "v20", "v30"]);
    expect([...map.entries()]).toEqual([[10, "v10"], [20, "v20"], [30, "v30"]]);
    expect([...map]).toEqual([...map.entries()]);
  });

  test("Order statistics carry values", () => {
    const map = newMap<string>();
    for (const k of [5, 1, 9, 3]) map.put(k, "v" + k);
    expect(map.atIndex(2).value).toBe("v5");
    expect(map.indexOf(9)).toBe(3);
    expect(map.ceiling(6).value).toBe("v9");
    expect(map.floor(4).value).toBe("v3");
  });

  test("delete() and deleteIter()", () => {
    const map = newMap<string>();
    for (const k of [5, 1, 9, 3]) map.put(k, "v" + k);
    expect(map.delete(5)).toBe(true);
    expect(map.delete(5)).toBe(false);
    expect(map.deleteIter(map.minimum())).toBe(true);
    map.checkValid();
    expect(map.toArray()).toEqual([[3, "v3"], [9, "v9"]]);
    expect(map._values.length).toBe(2);
  });

  test("clear()", () => {
    const map = newMap<string>();
    for (const k of [5, 1, 9]) map.put(k, "v" + k);
    map.clear();
    map.checkValid();
    expect(map.size).toBe(0);
    expect(map._values).toEqual([]);
    map.put(4, "v4");
    expect(map.toArray()).toEqual([[4, "v4"]]);
  });
});

describe("Values follow relocated nodes", () => {
  test("Deleting slot 0 moves the root and its value", () => {
    const map = new ZipTreeMap<number, string>(
      lessThan,
      new ScriptedRandom([0, 0, 0, 0, 0, 0, 5])
    );
    const names = ["", "one", "two", "three", "four", "five", "six", "seven"];
    for (const k of [1, 2, 3, 5, 6, 7, 4]) map.put(k, names[k]);
    expect(map._root).toBe(6);

    expect(map.delete(1)).toBe(true);
    map.checkValid();
    expect(map._root).toBe(0);
    expect(map.find(4).slot).toBe(0);
    expect(map._values[0]).toBe("four");
    expect(map.get(4)).toBe("four");
    expect(map.find(4).value).toBe("four");
    expect(map.toArray()).toEqual([
      [2, "two"], [3, "three"], [4, "four"], [5, "five"], [6, "six"], [7, "seven"],
    ]);
  });

  test("Random puts and deletes against a sorted array", () => {
    const map = newMap<number>();
    const list = new SortedArray<number, number>([], (a, b) => a - b);
    for (let round = 0; round < 10; round++) {
      for (let i = 0; i < 100; i++) {
        const k = randInt(250), v = randInt(1000);
        expect(map.put(k, v)).toBe(list.set(k, v));
      }
      expectMapEqualTo(map, list);
      for (let i = 0; i < 70; i++) {
        const k = randInt(250);
        expect(map.delete(k)).toBe(list.delete(k));
      }
      expectMapEqualTo(map, list);
      for (const k of list.keys()) expect(map.get(k)).toBe(list.get(k));
    }
  });
});

describe("Custom ordering", () => {
  test("String keys with a case-insensitive ordering", () => {
    const map = new ZipTreeMap<string, number>(
      (a, b) => a.toLowerCase() < b.toLowerCase(),
      new MersenneTwister(1234)
    );
    expect(map.put("Bill", 17)).toBe(true);
    expect(map.put("rose", 40)).toBe(true);
    expect(map.put("ROSE", 41)).toBe(false);
    expect(map.get("Rose")).toBe(41);
    expect(map.toArray()).toEqual([["Bill", 17], ["rose", 41]]);
  });
});
