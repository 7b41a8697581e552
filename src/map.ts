/**
 * @skein/core — map adaptor
 *
 * Applies `fn` to each element on dereference. Keeps the wrapped cursor's
 * tier: every navigation primitive is forwarded unchanged.
 *
 * `fn` runs on every dereference, not once per position. Keep it pure, or
 * cache at the call site.
 */

import { Cursor } from './cursor';
import { View } from './view';
import type { Tier } from './types';

export class MapCursor<T, U> extends Cursor<U> {
  readonly tier: Tier;

  constructor(
    private readonly _inner: Cursor<T>,
    private readonly _fn:    (value: T) => U,
  ) {
    super();
    this.tier = _inner.tier;
  }

  dereference(): U {
    return this._fn(this._inner.dereference());
  }

  increment(): void {
    this._inner.increment();
  }

  decrement(): void {
    this._inner.decrement();
  }

  advanceBy(offset: number): void {
    this._inner.advanceBy(offset);
  }

  distanceTo(other: MapCursor<T, U>): number {
    return this._inner.distanceTo(other._inner);
  }

  equals(other: MapCursor<T, U>): boolean {
    return this._inner.equals(other._inner);
  }

  clone(): MapCursor<T, U> {
    return new MapCursor(this._inner.clone(), this._fn);
  }
}

export function map<T, U>(view: View<T>, fn: (value: T) => U): View<U> {
  return new View<U>(
    new MapCursor(view.begin(), fn),
    new MapCursor(view.end(),   fn),
  );
}
