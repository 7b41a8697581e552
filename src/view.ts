/**
 * @skein/core — View
 *
 * A View is the consumer-facing range: one (begin, end) cursor pair built
 * from the same sequence boundaries. Every adaptor factory returns a View,
 * and every adaptor accepts Views as input, so pipelines compose as plain
 * function calls:
 *
 *   const names  = from(['ada', 'grace', 'barbara']);
 *   const sizes  = from([1, 2]);
 *   const pairs  = cartesianProduct(names, sizes);   // View<[string, number]>
 *   for (const [name, size] of pairs) render(name, size);
 *
 * Iterating a View drives its begin cursor: dereference, increment, until
 * it equals end. Nothing is computed ahead of the consumer.
 *
 * begin() and end() return clones. The View's own pair is never moved, so a
 * View can be traversed any number of times (subject to what the underlying
 * sequence allows: a generator's producer runs again on each pass).
 *
 * A View references its sequences; it must not outlive them.
 */

import { cursorDistance } from './algorithm';
import type { Cursor } from './cursor';
import type { Tier } from './types';

export class View<T> implements Iterable<T> {
  constructor(
    private readonly _begin: Cursor<T>,
    private readonly _end:   Cursor<T>,
  ) {}

  /** Fresh cursor at the first position. */
  begin(): Cursor<T> {
    return this._begin.clone();
  }

  /** Fresh cursor at the end sentinel. Never dereference it. */
  end(): Cursor<T> {
    return this._end.clone();
  }

  get tier(): Tier {
    return this._begin.tier;
  }

  isEmpty(): boolean {
    return this._begin.equals(this._end);
  }

  /**
   * Number of positions in the range. O(1) on random-access views, a full
   * walk otherwise. Does not terminate on an unbounded view.
   */
  size(): number {
    return cursorDistance(this._begin, this._end);
  }

  *[Symbol.iterator](): Generator<T, void, undefined> {
    const it = this.begin();
    while (!it.equals(this._end)) {
      yield it.dereference();
      it.increment();
    }
  }

  /** Walk the range once and collect every element. */
  toArray(): T[] {
    const out: T[] = [];
    for (const value of this) out.push(value);
    return out;
  }
}
