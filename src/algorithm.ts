/**
 * @skein/core — cursor algorithms
 *
 * Tier-aware building blocks shared by the adaptors: distance, advance and
 * lower-bound search. Each picks the O(1) path on random-access cursors and
 * falls back to stepping on weaker tiers, so callers never branch on tier.
 */

import { TIER_BIDIRECTIONAL, TIER_RANDOM_ACCESS } from './constants';
import { requireTier, type Cursor } from './cursor';
import type { Comparator } from './types';

/**
 * Number of increments from `first` to `last`.
 * `last` must be reachable from `first`; on forward cursors an unreachable
 * `last` never terminates.
 */
export function cursorDistance<T>(first: Cursor<T>, last: Cursor<T>): number {
  if (first.supports(TIER_RANDOM_ACCESS)) return first.distanceTo(last);

  const it = first.clone();
  let n = 0;
  while (!it.equals(last)) {
    it.increment();
    n++;
  }
  return n;
}

/** Move `cursor` in place by `n` positions. Negative `n` needs bidirectional. */
export function cursorAdvance<T>(cursor: Cursor<T>, n: number): void {
  if (cursor.supports(TIER_RANDOM_ACCESS)) {
    cursor.advanceBy(n);
    return;
  }

  if (n < 0) {
    requireTier(cursor, TIER_BIDIRECTIONAL, `cursorAdvance(${n})`);
    for (let i = 0; i > n; i--) cursor.decrement();
    return;
  }

  for (let i = 0; i < n; i++) cursor.increment();
}

/**
 * First position in [first, last) whose derived key is not less than `key`,
 * or a copy of `last` when every key is less. `compare` receives the
 * element's key first and the searched key second.
 *
 * The range must be partitioned by `keyOf(x) < key` (true for a range sorted
 * ascending by keyOf). This is not verified.
 *
 * O(log n) comparisons on every tier; O(log n) steps on random-access and
 * O(n) steps otherwise.
 */
export function lowerBound<T, K, Q = K>(
  first:   Cursor<T>,
  last:    Cursor<T>,
  key:     Q,
  keyOf:   (value: T) => K,
  compare: Comparator<K, Q>,
): Cursor<T> {
  // Invariant: every position before `lo` has keyOf < key;
  //            the answer lies in [lo, lo + count].
  let lo    = first.clone();
  let count = cursorDistance(first, last);

  while (count > 0) {
    const step = Math.floor(count / 2);
    const mid  = lo.clone();
    cursorAdvance(mid, step);

    if (compare(keyOf(mid.dereference()), key) < 0) {
      mid.increment();
      lo     = mid;
      count -= step + 1;
    } else {
      count = step;
    }
  }

  return lo;
}

/**
 * Natural `<` ordering for primitive keys.
 * Mixed-type keys (a number against a string) follow JavaScript's own
 * relational coercion and are best avoided.
 */
export function naturalOrder<K extends number | string | bigint>(a: K, b: K): number {
  if (a < b) return -1;
  if (b < a) return 1;
  return 0;
}
