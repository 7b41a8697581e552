/**
 * @skein/core — type definitions
 *
 * Shared vocabulary for cursors, views and adaptors. Cursor classes live in
 * cursor.ts; this file only holds the plain types they pass around.
 */

import type {
  TIER_FORWARD,
  TIER_BIDIRECTIONAL,
  TIER_RANDOM_ACCESS,
} from './constants';

// ─── Tiers ────────────────────────────────────────────────────────────────────

/**
 * Capability tier a cursor satisfies.
 *
 * forward:        dereference, increment, equals. Single logical pass.
 * bidirectional:  adds decrement.
 * random-access:  adds advanceBy(offset) and distanceTo(other), both O(1).
 *
 * Composed cursors report the weakest tier among the cursors they wrap,
 * unless their algorithm caps it lower (join-where is always forward).
 */
export type Tier =
  | typeof TIER_FORWARD
  | typeof TIER_BIDIRECTIONAL
  | typeof TIER_RANDOM_ACCESS;

// ─── Ordering ─────────────────────────────────────────────────────────────────

/**
 * Three-way comparison: negative, zero or positive. The two sides may be of
 * different types, as long as they are mutually comparable.
 */
export type Comparator<A, B = A> = (a: A, b: B) => number;

/** Key types that natural `<` ordering handles without a comparator. */
export type JoinKey = number | string | bigint;

// ─── Execution ────────────────────────────────────────────────────────────────

/**
 * How a search over a cursor range is carried out.
 *
 * sequenced  One position at a time, front to back.
 * parallel   The range is split into `lanes` contiguous parts that are
 *            scanned in interleaved rounds. Each lane keeps private search
 *            state; only the lowest matching position is committed.
 */
export type ExecutionPolicy =
  | { readonly kind: 'sequenced' }
  | { readonly kind: 'parallel'; readonly lanes?: number };

// ─── Random ───────────────────────────────────────────────────────────────────

/** Source of uniformly distributed numbers in [0, 1). */
export interface RandomEngine {
  next(): number;
}

/** Maps engine output onto a value distribution with known bounds. */
export interface Distribution<T> {
  readonly min: T;
  readonly max: T;
  sample(engine: RandomEngine): T;
}
