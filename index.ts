export { ZipTree, ZipTreeBase } from "./zip-tree";
export { ZipTreeMap } from "./zip-tree-map";
export { ZipIterator, ZipMapIterator } from "./zip-iterator";
export { MAX_SIZE, NONE, NOT_FOUND } from "./zip-node";
export type { Slot, ZipArena, ZipMapArena, ZipNode } from "./zip-node";
export {
  Ordering,
  defaultComparator,
  defaultLessThan,
  lessThanOf,
  simpleComparator,
} from "./ordering";
export type { DefaultComparable, LessFn } from "./ordering";
export {
  RankGenerator,
  packRank,
  primaryRank,
  secondaryRank,
  tieBreakLimit,
} from "./rank";
export type { RandomSource } from "./rank";
export { printInOrder, printTree } from "./print";
export type { PrintableTree, ValueFormatter } from "./print";

export { ZipTree as default } from "./zip-tree";
