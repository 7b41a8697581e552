/**
 * @skein/core — array leaf cursor
 *
 * Random-access cursor over a caller-owned ReadonlyArray. The array is read,
 * never copied: a View from from() sees later writes to it.
 */

import { TIER_RANDOM_ACCESS } from './constants';
import { Cursor } from './cursor';
import { View } from './view';
import type { Tier } from './types';

export class ArrayCursor<T> extends Cursor<T> {
  readonly tier: Tier = TIER_RANDOM_ACCESS;

  constructor(
    private readonly _source: ReadonlyArray<T>,
    /** Position in `_source`; `_source.length` is the end sentinel. */
    public index: number,
  ) {
    super();
  }

  /** Throws RangeError outside [0, length). */
  dereference(): T {
    if (this.index < 0 || this.index >= this._source.length) {
      throw new RangeError(
        `ArrayCursor: dereference at index ${this.index} is outside ` +
        `[0, ${this._source.length}).`,
      );
    }
    return this._source[this.index]!;
  }

  increment(): void {
    this.index++;
  }

  decrement(): void {
    this.index--;
  }

  advanceBy(offset: number): void {
    this.index += offset;
  }

  distanceTo(other: ArrayCursor<T>): number {
    return other.index - this.index;
  }

  equals(other: ArrayCursor<T>): boolean {
    return this._source === other._source && this.index === other.index;
  }

  clone(): ArrayCursor<T> {
    return new ArrayCursor(this._source, this.index);
  }
}

/** Random-access View over every element of `source`. */
export function from<T>(source: ReadonlyArray<T>): View<T> {
  return new View<T>(
    new ArrayCursor(source, 0),
    new ArrayCursor(source, source.length),
  );
}
