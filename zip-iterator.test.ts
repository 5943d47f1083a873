import ZipTree from "./zip-tree";
import ZipTreeMap from "./zip-tree-map";
import { NONE } from "./zip-node";
import MersenneTwister from "mersenne-twister";

const lessThan = (a: number, b: number) => a < b;

function treeOf(keys: number[]) {
  const tree = new ZipTree<number>(lessThan, new MersenneTwister(1234));
  for (const k of keys) tree.insert(k);
  return tree;
}

describe("Iteration", () => {
  test("Forward from the minimum", () => {
    const tree = treeOf([6, 4, 3, 1]);
    const seen: (number | undefined)[] = [];
    for (const it = tree.newIterator(); !it.isEmpty(); it.next()) seen.push(it.key);
    expect(seen).toEqual([1, 3, 4, 6]);
  });

  test("Backward from the maximum", () => {
    const tree = treeOf([6, 4, 3, 1]);
    const seen: (number | undefined)[] = [];
    for (const it = tree.newReverseIterator(); !it.isEmpty(); it.prev()) seen.push(it.key);
    expect(seen).toEqual([6, 4, 3, 1]);
  });

  test("Back and forth", () => {
    const tree = treeOf([10, 20, 30, 40, 50]);
    const it = tree.find(30);
    it.next();
    expect(it.key).toBe(40);
    it.prev();
    it.prev();
    expect(it.key).toBe(20);
    it.next();
    expect(it.key).toBe(30);
  });

  test("Running off the end empties the cursor for good", () => {
    const tree = treeOf([1, 2]);
    const it = tree.maximum();
    it.next();
    expect(it.isEmpty()).toBe(true);
    expect(it.key).toBeUndefined();
    expect(it.parent).toBe(NONE);
    it.prev();
    expect(it.isEmpty()).toBe(true);
  });

  test("Iterators of an empty tree are empty", () => {
    const tree = treeOf([]);
    expect(tree.newIterator().isEmpty()).toBe(true);
    expect(tree.newReverseIterator().isEmpty()).toBe(true);
  });

  test("Walks every key of a larger tree in order", () => {
    const keys: number[] = [];
    for (let i = 0; i < 200; i++) keys.push((i * 37) % 200);
    const tree = treeOf(keys);
    let expected = 0;
    for (const it = tree.minimum(); !it.isEmpty(); it.next()) expect(it.key).toBe(expected++);
    expect(expected).toBe(200);
    for (const it = tree.maximum(); !it.isEmpty(); it.prev()) expect(it.key).toBe(--expected);
    expect(expected).toBe(0);
  });
});

describe("Stale cursors", () => {
  test("An insert invalidates earlier cursors", () => {
    const tree = treeOf([1, 2, 3]);
    const it = tree.find(2);
    expect(it.key).toBe(2);
    tree.insert(4);
    expect(it.isEmpty()).toBe(true);
    expect(it.key).toBeUndefined();
  });

  test("A duplicate insert or a failed delete does not", () => {
    const tree = treeOf([1, 2, 3]);
    const it = tree.find(2);
    expect(tree.insert(3)).toBe(false);
    expect(tree.delete(7)).toBe(false);
    expect(it.key).toBe(2);
  });

  test("A delete invalidates every cursor, including the one used", () => {
    const tree = treeOf([1, 2, 3, 4]);
    const a = tree.find(1);
    const b = tree.find(4);
    expect(tree.deleteIter(a)).toBe(true);
    expect(a.isEmpty()).toBe(true);
    expect(b.isEmpty()).toBe(true);
    expect(tree.deleteIter(b)).toBe(false);
    expect(tree.toArray()).toEqual([2, 3, 4]);
  });

  test("A stale cursor never reaches the node moved into its slot", () => {
    const tree = treeOf([5, 6, 7]);
    const first = tree.find(5);
    expect(first.slot).toBe(0);
    expect(tree.delete(5)).toBe(true);
    // 7 moved from slot 2 into slot 0
    expect(tree.find(7).slot).toBe(0);
    expect(first.key).toBeUndefined();
    expect(tree.deleteIter(first)).toBe(false);
    expect(tree.toArray()).toEqual([6, 7]);
  });

  test("clear() invalidates cursors", () => {
    const tree = treeOf([1, 2]);
    const it = tree.minimum();
    tree.clear();
    tree.insert(1);
    expect(it.isEmpty()).toBe(true);
  });

  test("A cursor from another tree deletes nothing", () => {
    const a = treeOf([1, 2, 3]);
    const b = treeOf([1, 2, 3]);
    expect(a.deleteIter(b.find(2))).toBe(false);
    expect(a.size).toBe(3);
    expect(b.size).toBe(3);
  });

  test("An empty cursor deletes nothing", () => {
    const tree = treeOf([1, 2, 3]);
    expect(tree.deleteIter(tree.find(9))).toBe(false);
    expect(tree.size).toBe(3);
  });
});

describe("Map cursors", () => {
  test("Cursors read values and survive overwrites", () => {
    const map = new ZipTreeMap<string, number>((a, b) => a < b, new MersenneTwister(1234));
    map.put("b", 2);
    map.put("a", 1);
    const it = map.find("b");
    expect(it.value).toBe(2);
    expect(map.put("b", 20)).toBe(false);
    expect(it.key).toBe("b");
    expect(it.value).toBe(20);
    it.prev();
    expect(it.key).toBe("a");
    expect(it.value).toBe(1);
    it.prev();
    expect(it.value).toBeUndefined();
  });

  test("A new pair invalidates map cursors", () => {
    const map = new ZipTreeMap<string, number>((a, b) => a < b, new MersenneTwister(1234));
    map.put("a", 1);
    const it = map.minimum();
    map.put("c", 3);
    expect(it.isEmpty()).toBe(true);
    expect(it.value).toBeUndefined();
  });
});
