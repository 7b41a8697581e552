/**
 * @skein/core — cartesian product
 *
 * CartesianProductCursor walks the product of N >= 2 views as a mixed-radix
 * odometer. Dimension N-1 is the fastest-varying digit, dimension 0 the
 * slowest; the radix of dimension i is the size of view i:
 *
 *   from([1, 2]) × from(['a', 'b', 'c'])
 *     → [1,'a'] [1,'b'] [1,'c'] [2,'a'] [2,'b'] [2,'c']
 *
 * State is three parallel arrays of per-dimension cursors: begin[i],
 * current[i] and end[i]. begin and end are shared by every clone and never
 * moved; current is owned by each cursor.
 *
 * Terminal state: every dimension sits at its end. It is entered as soon as
 * dimension 0 reaches its end (the faster dimensions were just reset to
 * begin by the carry, and are then moved to end as well), so "is this the
 * end?" needs only dimension 0, and the terminal cursor compares equal to a
 * View's end cursor.
 *
 * The product's tier is the weakest tier among its dimensions:
 *   forward         increment / equals
 *   bidirectional   + decrement (borrow propagation)
 *   random-access   + advanceBy / distanceTo (mixed-radix arithmetic)
 */

import { TIER_BIDIRECTIONAL, TIER_RANDOM_ACCESS } from './constants';
import { Cursor, minTier, requireTier } from './cursor';
import { View } from './view';
import type { Tier } from './types';

/** Tuple of Views, one per element type of `Ts`. */
export type ViewsOf<Ts extends unknown[]> = { [K in keyof Ts]: View<Ts[K]> };

export class CartesianProductCursor extends Cursor<unknown[]> {
  readonly tier: Tier;

  /** @internal — use cartesianProduct() */
  constructor(
    private readonly _begin:   readonly Cursor<unknown>[],
    private readonly _current: Cursor<unknown>[],
    private readonly _end:     readonly Cursor<unknown>[],
  ) {
    super();
    if (_current.length < 2) {
      throw new TypeError(
        `CartesianProductCursor: needs at least 2 dimensions, got ${_current.length}.`,
      );
    }
    this.tier = minTier(_current.map(c => c.tier));
  }

  get dimensions(): number {
    return this._current.length;
  }

  // ── Terminal state ─────────────────────────────────────────────────────────

  private isTerminal(): boolean {
    return this._current[0]!.equals(this._end[0]!);
  }

  /** Canonicalize to all-at-end once dimension 0 has reached its end. */
  private settleTerminal(): void {
    if (!this.isTerminal()) return;
    for (let i = 0; i < this._current.length; i++) {
      this._current[i] = this._end[i]!.clone();
    }
  }

  private sizeOf(i: number): number {
    return this._begin[i]!.distanceTo(this._end[i]!);
  }

  // ── Primitives ─────────────────────────────────────────────────────────────

  /** Current value of every dimension, by position. */
  dereference(): unknown[] {
    const values: unknown[] = [];
    for (const c of this._current) values.push(c.dereference());
    return values;
  }

  increment(): void {
    // Carry right to left. Dimension 0 has no carry target: reaching its
    // end is the terminal condition.
    for (let i = this._current.length - 1; i >= 0; i--) {
      const c = this._current[i]!;
      c.increment();
      if (i === 0 || !c.equals(this._end[i]!)) break;
      this._current[i] = this._begin[i]!.clone();
    }
    this.settleTerminal();
  }

  decrement(): void {
    requireTier(this, TIER_BIDIRECTIONAL, 'CartesianProductCursor.decrement');

    // The terminal state holds end sentinels, not the last real position,
    // so borrowing from it would be wrong: jump straight to the last
    // combination instead.
    if (this.isTerminal()) {
      for (let i = 0; i < this._current.length; i++) {
        const last = this._end[i]!.clone();
        last.decrement();
        this._current[i] = last;
      }
      return;
    }

    if (this._current.every((c, i) => c.equals(this._begin[i]!))) {
      throw new RangeError(
        'CartesianProductCursor.decrement: already at the first combination.',
      );
    }

    // Borrow right to left: a dimension at its begin wraps to its last
    // element and borrows from the next slower one.
    for (let i = this._current.length - 1; i >= 0; i--) {
      const c = this._current[i]!;
      if (!c.equals(this._begin[i]!)) {
        c.decrement();
        return;
      }
      const last = this._end[i]!.clone();
      last.decrement();
      this._current[i] = last;
    }
  }

  /**
   * Jump `offset` combinations, forward or backward.
   *
   * The offset is distributed right to left as a mixed-radix number: each
   * dimension i > 0 keeps (pos_i + carry) mod size_i, floored so negative
   * offsets borrow, and passes the quotient to dimension i-1. Dimension 0
   * takes whatever carry is left.
   *
   * From the terminal state the faster dimensions are first re-read as
   * sitting at their begin (the terminal position is combination
   * ∏ size_i, i.e. dimension 0 one past its last element, all others at
   * their first), so jumping backward from the end lands correctly.
   */
  advanceBy(offset: number): void {
    requireTier(this, TIER_RANDOM_ACCESS, `CartesianProductCursor.advanceBy(${offset})`);
    if (offset === 0) return;

    if (this.isTerminal()) {
      for (let i = 1; i < this._current.length; i++) {
        this._current[i] = this._begin[i]!.clone();
      }
    }

    let carry = offset;
    for (let i = this._current.length - 1; i > 0; i--) {
      const size = this.sizeOf(i);
      if (size === 0) {
        throw new RangeError(
          `CartesianProductCursor.advanceBy(${offset}): dimension ${i} is empty.`,
        );
      }

      const c     = this._current[i]!;
      const pos   = this._begin[i]!.distanceTo(c);
      const total = pos + carry;
      let digit   = total % size;
      if (digit < 0) digit += size;

      carry = (total - digit) / size;
      c.advanceBy(digit - pos);
    }
    this._current[0]!.advanceBy(carry);

    this.settleTerminal();
  }

  /**
   * Signed number of combinations from this cursor to `other`: the
   * difference of their mixed-radix indices.
   */
  distanceTo(other: CartesianProductCursor): number {
    requireTier(this, TIER_RANDOM_ACCESS, 'CartesianProductCursor.distanceTo');
    return other.linearIndex() - this.linearIndex();
  }

  /** Combination number: 0 at begin, ∏ size_i at the terminal state. */
  private linearIndex(): number {
    const n = this._current.length;

    if (this.isTerminal()) {
      let total = 1;
      for (let i = 0; i < n; i++) total *= this.sizeOf(i);
      return total;
    }

    let index = 0;
    for (let i = 0; i < n; i++) {
      index = index * this.sizeOf(i) + this._begin[i]!.distanceTo(this._current[i]!);
    }
    return index;
  }

  /** Equal when every dimension is at the same position. */
  equals(other: CartesianProductCursor): boolean {
    for (let i = 0; i < this._current.length; i++) {
      if (!this._current[i]!.equals(other._current[i]!)) return false;
    }
    return true;
  }

  clone(): CartesianProductCursor {
    return new CartesianProductCursor(
      this._begin,
      this._current.map(c => c.clone()),
      this._end,
    );
  }
}

// ─── Factory ──────────────────────────────────────────────────────────────────

/**
 * View over every combination of one element from each view, in
 * lexicographic order with the last view varying fastest.
 *
 * At least two views are required: a shorter argument list does not
 * type-check, and throws TypeError when reached from untyped code.
 *
 * If any view is empty the product is empty: begin equals end immediately
 * and nothing is dereferenced.
 */
export function cartesianProduct<Ts extends [unknown, unknown, ...unknown[]]>(
  ...views: ViewsOf<Ts>
): View<Ts>;
export function cartesianProduct(...views: View<unknown>[]): View<unknown[]> {
  if (views.length < 2) {
    throw new TypeError(
      `cartesianProduct: needs at least 2 views, got ${views.length}.`,
    );
  }

  const begins = views.map(v => v.begin());
  const ends   = views.map(v => v.end());
  const empty  = begins.some((b, i) => b.equals(ends[i]!));

  const first = empty ? ends.map(e => e.clone()) : begins.map(b => b.clone());
  return new View<unknown[]>(
    new CartesianProductCursor(begins, first, ends),
    new CartesianProductCursor(begins, ends.map(e => e.clone()), ends),
  );
}
