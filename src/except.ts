/**
 * @skein/core — except adaptor
 *
 * Forward cursor over the elements of a view that do not occur in a
 * reference view. Membership is a linear scan of the reference with
 * `same` (Object.is by default), so keep the reference small or pass a
 * cheap comparison.
 */

import { TIER_FORWARD } from './constants';
import { Cursor } from './cursor';
import { View } from './view';
import type { Tier } from './types';

export class ExceptCursor<T> extends Cursor<T> {
  readonly tier: Tier = TIER_FORWARD;

  constructor(
    private readonly _inner:     Cursor<T>,
    private readonly _end:       Cursor<T>,
    private readonly _reference: View<T>,
    private readonly _same:      (a: T, b: T) => boolean,
  ) {
    super();
    this.skipExcluded();
  }

  private isExcluded(value: T): boolean {
    for (const candidate of this._reference) {
      if (this._same(value, candidate)) return true;
    }
    return false;
  }

  private skipExcluded(): void {
    while (!this._inner.equals(this._end) && this.isExcluded(this._inner.dereference())) {
      this._inner.increment();
    }
  }

  dereference(): T {
    return this._inner.dereference();
  }

  increment(): void {
    this._inner.increment();
    this.skipExcluded();
  }

  equals(other: ExceptCursor<T>): boolean {
    return this._inner.equals(other._inner);
  }

  clone(): ExceptCursor<T> {
    // The clone's position is already past any excluded run, so the
    // constructor's skip is a no-op.
    return new ExceptCursor(this._inner.clone(), this._end, this._reference, this._same);
  }
}

/** View of the elements of `view` that do not occur in `reference`. */
export function except<T>(
  view:      View<T>,
  reference: View<T>,
  same:      (a: T, b: T) => boolean = Object.is,
): View<T> {
  const end = view.end();
  return new View<T>(
    new ExceptCursor(view.begin(), end, reference, same),
    new ExceptCursor(view.end(),   end, reference, same),
  );
}
