/**
 * @skein/core — enumerate adaptor
 *
 * Pairs each element with a running counter: [index, value]. Keeps the
 * wrapped cursor's tier; the counter follows every move of the wrapped
 * cursor, so jumps and decrements keep the pairing exact.
 */

import { TIER_BIDIRECTIONAL } from './constants';
import { cursorDistance } from './algorithm';
import { Cursor } from './cursor';
import { View } from './view';
import type { Tier } from './types';

export class EnumerateCursor<T> extends Cursor<[number, T]> {
  readonly tier: Tier;

  constructor(
    private readonly _inner: Cursor<T>,
    private _index: number,
  ) {
    super();
    this.tier = _inner.tier;
  }

  get index(): number {
    return this._index;
  }

  dereference(): [number, T] {
    return [this._index, this._inner.dereference()];
  }

  increment(): void {
    this._inner.increment();
    this._index++;
  }

  decrement(): void {
    this._inner.decrement();
    this._index--;
  }

  advanceBy(offset: number): void {
    this._inner.advanceBy(offset);
    this._index += offset;
  }

  distanceTo(other: EnumerateCursor<T>): number {
    return this._inner.distanceTo(other._inner);
  }

  /** Positions compare by the wrapped cursor; the counter is derived state. */
  equals(other: EnumerateCursor<T>): boolean {
    return this._inner.equals(other._inner);
  }

  clone(): EnumerateCursor<T> {
    return new EnumerateCursor(this._inner.clone(), this._index);
  }
}

/**
 * View of [index, value] pairs, counting from `start`.
 *
 * On bidirectional and random-access views the end cursor carries
 * `start + size`, so stepping back from the end yields the last index. On
 * forward views the end counter is left at `start`: forward cursors never
 * step back, and measuring an unbounded generator would not terminate.
 */
export function enumerate<T>(view: View<T>, start: number = 0): View<[number, T]> {
  const begin = view.begin();
  const end   = view.end();
  const endIndex = begin.supports(TIER_BIDIRECTIONAL)
    ? start + cursorDistance(begin, end)
    : start;

  return new View<[number, T]>(
    new EnumerateCursor(begin, start),
    new EnumerateCursor(end,   endIndex),
  );
}
