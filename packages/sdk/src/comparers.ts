/**
 * Priority comparers
 */

import { UncomparablePriorityError } from "./errors.js";
import type { Comparer } from "./types.js";

/**
 * Natural ordering for numbers, bigints, strings and Dates.
 *
 * Numbers: NaN ranks before every other
 * number and equals itself.
 * Strings compare by UTF-16 code units. Mixed or other types throw
 * UncomparablePriorityError.
 */
export function defaultComparer(a: unknown, b: unknown): number {
  if (typeof a === "number" && typeof b === "number") {
    return compareNumbers(a, b);
  }

  if (typeof a === "string" && typeof b === "string") {
    return a < b ? -1 : a > b ? 1 : 0;
  }

  if (typeof a === "bigint" && typeof b === "bigint") {
    return a < b ? -1 : a > b ? 1 : 0;
  }

  if (a instanceof Date && b instanceof Date) {
    return compareNumbers(a.getTime(), b.getTime());
  }

  throw new UncomparablePriorityError(a, b);
}

function compareNumbers(a: number, b: number): number {
  if (a < b) return -1;
  if (a > b) return 1;
  if (a === b) return 0;

  // At least one side is NaN
  if (Number.isNaN(a)) return Number.isNaN(b) ? 0 : -1;
  return 1;
}

/**
 * Invert an ordering, turning a min-heap into a max-heap
 */
export function reverseComparer<T>(comparer: Comparer<T>): Comparer<T> {
  return (a, b) => comparer(b, a);
}

/**
 * Comparer wrapper that counts invocations
 */
export interface CountingComparer<T> {
  readonly compare: Comparer<T>;
  /** Comparisons performed since creation or the last reset() */
  readonly count: number;
  reset(): void;
}

/**
 * Wrap a comparer so the number of comparisons can be read back,
 * used by benchmarks to compare branching factors
 */
export function countingComparer<T>(comparer: Comparer<T>): CountingComparer<T> {
  let count = 0;
  return {
    compare: (a, b) => {
      count++;
      return comparer(a, b);
    },
    get count() {
      return count;
    },
    reset() {
      count = 0;
    },
  };
}
