/**
 * Range Indexer
 *
 * Half-open range queries over sequences sorted by a numeric key.
 * Given [xl, xr), returns the pair (l, r) such that:
 *
 *   key(s) <  xl        for s in sequence[lo:l]
 *   xl <= key(s) < xr   for s in sequence[l:r]
 *   key(s) >= xr        for s in sequence[r:hi]
 *
 * Sortedness of sequence[lo:hi] is assumed, never checked. O(log n), no allocation.
 *
 * @module services/chunking/range-indexer
 */

import { InvalidIndexError, InvalidRangeError } from '../../utils/errors.js';

/** Pair of boundary indices [l, r) */
export type Bounds = [number, number];

export interface BoundsOptions {
  /** First index searched (default 0) */
  lo?: number;

  /** End of the searched slice, exclusive (default sequence.length) */
  hi?: number;
}

export interface KeyedBoundsOptions<T> extends BoundsOptions {
  /** Numeric sort key of each element */
  key: (item: T) => number;
}

function numericKey(item: unknown): number {
  if (typeof item !== 'number') {
    throw new TypeError('A key function is required for sequences of non-numeric elements');
  }
  return item;
}

function resolveSlice(length: number, options: BoundsOptions): Bounds {
  const lo = options.lo ?? 0;
  const hi = options.hi ?? length;
  if (!Number.isInteger(lo) || lo < 0) {
    throw new InvalidIndexError(`lo must be a non-negative integer (got ${lo})`, { lo });
  }
  if (!Number.isInteger(hi) || hi < lo || hi > length) {
    throw new InvalidIndexError(`hi must be an integer in [lo, ${length}] (got ${hi})`, {
      lo,
      hi,
      length,
    });
  }
  return [lo, hi];
}

/**
 * Find the boundaries of the elements whose key lies in [xl, xr).
 *
 * Narrows [lo, hi) until a midpoint falls inside the interval, then bisects
 * each side of that split for the exact lower and upper boundary.
 *
 * @throws InvalidIndexError if lo or hi is not an integer, lo is negative or hi is
 *   outside [lo, length]
 * @throws InvalidRangeError if xl > xr
 */
export function findBounds(
  sequence: readonly number[],
  xl: number,
  xr: number,
  options?: BoundsOptions
): Bounds;
export function findBounds<T>(
  sequence: readonly T[],
  xl: number,
  xr: number,
  options: KeyedBoundsOptions<T>
): Bounds;
export function findBounds<T>(
  sequence: readonly T[],
  xl: number,
  xr: number,
  options: BoundsOptions & { key?: (item: T) => number } = {}
): Bounds {
  const key = options.key ?? numericKey;
  let [lo, hi] = resolveSlice(sequence.length, options);
  if (xl > xr) {
    throw new InvalidRangeError(`Range requires xl <= xr (got [${xl}, ${xr}))`, { xl, xr });
  }

  // Empty slice is a valid result
  if (lo === hi) {
    return [lo, hi];
  }

  let split = lo;
  while (lo < hi) {
    split = (lo + hi) >>> 1;
    const v = key(sequence[split]);
    if (v >= xr) {
      hi = split;
    } else if (v < xl) {
      lo = split + 1;
    } else {
      break;
    }
  }

  // Left boundary: first index in [lo, split) with key >= xl
  let left = lo;
  let leftEnd = split;
  while (left < leftEnd) {
    const mid = (left + leftEnd) >>> 1;
    if (key(sequence[mid]) < xl) {
      left = mid + 1;
    } else {
      leftEnd = mid;
    }
  }

  // Right boundary: first index in [split, hi) with key >= xr
  let right = split;
  let rightEnd = hi;
  while (right < rightEnd) {
    const mid = (right + rightEnd) >>> 1;
    if (key(sequence[mid]) >= xr) {
      rightEnd = mid;
    } else {
      right = mid + 1;
    }
  }

  return [left, right];
}

/**
 * First index in [lo, hi) whose key is >= x (or hi when there is none).
 */
export function lowerBound(sequence: readonly number[], x: number, options?: BoundsOptions): number;
export function lowerBound<T>(
  sequence: readonly T[],
  x: number,
  options: KeyedBoundsOptions<T>
): number;
export function lowerBound<T>(
  sequence: readonly T[],
  x: number,
  options: BoundsOptions & { key?: (item: T) => number } = {}
): number {
  const key = options.key ?? numericKey;
  let [lo, hi] = resolveSlice(sequence.length, options);
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (key(sequence[mid]) < x) {
      lo = mid + 1;
    } else {
      hi = mid;
    }
  }
  return lo;
}
