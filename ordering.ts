/** A strict "less than" predicate; the only ordering a tree is given. */
export type LessFn<T> = (a: T, b: T) => boolean;

/**
 * Types that `defaultComparator` knows how to order.
 */
export type DefaultComparable =
  | number
  | string
  | bigint
  | boolean
  | Date
  | null
  | undefined;

/**
 * Derives the full set of relations from a single less-than predicate, so
 * that callers supply one function and the tree never sees a hand-written
 * `>` that disagrees with its `<`.
 *
 * The predicate must be a strict weak ordering; none of the tree invariants
 * hold otherwise.
 */
export class Ordering<T> {
  constructor(readonly lessThan: LessFn<T>) {}

  /** a < b */
  lt(a: T, b: T): boolean {
    return this.lessThan(a, b);
  }

  /** a > b, i.e. b < a */
  gt(a: T, b: T): boolean {
    return this.lessThan(b, a);
  }

  /** a <= b, i.e. !(b < a) */
  le(a: T, b: T): boolean {
    return !this.lessThan(b, a);
  }

  /** a >= b, i.e. !(a < b) */
  ge(a: T, b: T): boolean {
    return !this.lessThan(a, b);
  }

  /** Neither is ordered before the other. */
  eq(a: T, b: T): boolean {
    return !this.lessThan(a, b) && !this.lessThan(b, a);
  }
}

function typeName(v: DefaultComparable): string {
  if (v === null) return "null";
  // Dates are the only objects accepted; keep them apart from their timestamps
  return typeof v;
}

/**
 * Compares DefaultComparables to form a total order.
 *
 * Handles +/-0 and NaN like Map: NaN is equal to NaN, and -0 is equal to +0.
 * NaN (and an invalid Date) orders before every other value of its type.
 *
 * Values of different types are ordered by the name of their type, so mixed
 * keys such as `number | string` still sort consistently. A Date never equals
 * the number holding its timestamp.
 */
export function defaultComparator(
  a: DefaultComparable,
  b: DefaultComparable
): number {
  // Special case finite numbers first for performance.
  if (
    typeof a === "number" &&
    typeof b === "number" &&
    Number.isFinite(a) &&
    Number.isFinite(b)
  ) {
    return a - b;
  }

  const ta = typeName(a);
  const tb = typeName(b);
  if (ta !== tb) {
    return ta < tb ? -1 : 1;
  }

  if (a instanceof Date && b instanceof Date) {
    return compareNumbers(a.getTime(), b.getTime());
  }
  if (typeof a === "number" && typeof b === "number") {
    return compareNumbers(a, b);
  }
  if (typeof a === "string" && typeof b === "string") {
    return a < b ? -1 : a > b ? 1 : 0;
  }
  if (typeof a === "bigint" && typeof b === "bigint") {
    return a < b ? -1 : a > b ? 1 : 0;
  }
  if (typeof a === "boolean" && typeof b === "boolean") {
    return Number(a) - Number(b);
  }
  // both null or both undefined
  return 0;
}

function compareNumbers(a: number, b: number): number {
  // Order NaN less than other numbers
  if (Number.isNaN(a)) return Number.isNaN(b) ? 0 : -1;
  else if (Number.isNaN(b)) return 1;
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Compares items using the < and > operators. Slightly cheaper than
 * defaultComparator, but it doesn't support mixed types, i.e. use it with
 * `ZipTree<string>` or `ZipTree<number>` but not `ZipTree<string|number>`.
 *
 * NaN is not supported.
 */
export function simpleComparator<T extends number | string | bigint | Date>(
  a: T,
  b: T
): number {
  return a > b ? 1 : a < b ? -1 : 0;
}

/** Turns a three-way comparator into the less-than predicate a tree takes. */
export function lessThanOf<T>(compare: (a: T, b: T) => number): LessFn<T> {
  return (a, b) => compare(a, b) < 0;
}

/** `defaultComparator` as a less-than predicate. */
export const defaultLessThan: LessFn<DefaultComparable> =
  lessThanOf(defaultComparator);
