/**
 * Shared test helpers.
 *
 * CappedCursor hides every capability above a chosen tier, so the same
 * array can stand in for a forward-only or bidirectional sequence. An
 * optional hook observes every increment.
 */

import {
  Cursor,
  View,
  TIER_BIDIRECTIONAL,
  TIER_RANDOM_ACCESS,
} from '../src/index';
import type { RandomEngine, Tier } from '../src/index';

export class CappedCursor<T> extends Cursor<T> {
  readonly tier: Tier;

  constructor(
    private readonly _inner:        Cursor<T>,
    tier:                           Tier,
    private readonly _onIncrement?: () => void,
  ) {
    super();
    this.tier = tier;
  }

  dereference(): T {
    return this._inner.dereference();
  }

  increment(): void {
    this._onIncrement?.();
    this._inner.increment();
  }

  // Below the cap, fall through to the base class, which throws.

  decrement(): void {
    if (!this.supports(TIER_BIDIRECTIONAL)) super.decrement();
    this._inner.decrement();
  }

  advanceBy(offset: number): void {
    if (!this.supports(TIER_RANDOM_ACCESS)) super.advanceBy(offset);
    this._inner.advanceBy(offset);
  }

  distanceTo(other: CappedCursor<T>): number {
    if (!this.supports(TIER_RANDOM_ACCESS)) super.distanceTo(other);
    return this._inner.distanceTo(other._inner);
  }

  equals(other: CappedCursor<T>): boolean {
    return this._inner.equals(other._inner);
  }

  clone(): CappedCursor<T> {
    return new CappedCursor(this._inner.clone(), this.tier, this._onIncrement);
  }
}

/** `view` restricted to `tier`, calling `onIncrement` on every step. */
export function capped<T>(view: View<T>, tier: Tier, onIncrement?: () => void): View<T> {
  return new View<T>(
    new CappedCursor(view.begin(), tier, onIncrement),
    new CappedCursor(view.end(),   tier, onIncrement),
  );
}

/** Engine that replays `values` in a loop and counts its draws. */
export function scriptedEngine(values: readonly number[]): RandomEngine & { readonly calls: number } {
  let calls = 0;
  return {
    get calls() {
      return calls;
    },
    next: () => values[calls++ % values.length]!,
  };
}
