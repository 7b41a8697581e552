/**
 * @skein/core — generate adaptor
 *
 * Forward cursor over the values of a zero-argument producer. The producer
 * is called lazily, at most once per position: on the first dereference at
 * that position. Incrementing past a position that was never dereferenced
 * skips the call entirely.
 *
 * Bounded views stop after `amount` positions; unbounded views never reach
 * their end, so stop them yourself (break out of the loop, or zip them with
 * a bounded dimension in a cartesian product).
 *
 * Clones share the producer. Interleaving two clones interleaves the calls,
 * so a stateful producer hands its values to whichever clone asks first.
 */

import { TIER_FORWARD } from './constants';
import { Cursor } from './cursor';
import { View } from './view';
import type { Tier } from './types';

export class GenerateCursor<T> extends Cursor<T> {
  readonly tier: Tier = TIER_FORWARD;

  private _cached: { readonly value: T } | null = null;

  constructor(
    private readonly _producer: () => T,
    private _index: number,
  ) {
    super();
  }

  get index(): number {
    return this._index;
  }

  dereference(): T {
    if (this._cached === null) {
      this._cached = { value: this._producer() };
    }
    return this._cached.value;
  }

  increment(): void {
    this._index++;
    this._cached = null;
  }

  equals(other: GenerateCursor<T>): boolean {
    return this._index === other._index;
  }

  clone(): GenerateCursor<T> {
    const copy = new GenerateCursor(this._producer, this._index);
    copy._cached = this._cached;
    return copy;
  }
}

/**
 * View over `amount` values of `producer`, or an unbounded one when
 * `amount` is omitted.
 *
 * Throws RangeError for a negative or non-integer amount.
 */
export function generate<T>(producer: () => T, amount?: number): View<T> {
  if (amount !== undefined && (!Number.isInteger(amount) || amount < 0)) {
    throw new RangeError(
      `generate: amount must be a non-negative integer, got ${amount}.`,
    );
  }

  // Infinity is never reached by counting up from 0.
  const endIndex = amount ?? Infinity;
  return new View<T>(
    new GenerateCursor(producer, 0),
    new GenerateCursor(producer, endIndex),
  );
}
