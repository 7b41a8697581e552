/**
 * @skein/core — random adaptor
 *
 * A counter cursor whose value at each position is a draw from
 * `distribution` using `engine`. Counting makes it random-access: jumps and
 * distances are plain arithmetic on the counter.
 *
 * The draw at a position happens on its first dereference and is kept until
 * the cursor moves, so dereferencing twice in place returns the same value.
 * Moving away and back draws again: positions are not memoized.
 *
 * The engine is shared by reference. Pass a seeded engine for reproducible
 * sequences; the default wraps Math.random.
 */

import { TIER_RANDOM_ACCESS } from './constants';
import { Cursor } from './cursor';
import { View } from './view';
import type { Distribution, RandomEngine, Tier } from './types';

// ─── Engines & distributions ──────────────────────────────────────────────────

export const mathRandomEngine: RandomEngine = {
  next: () => Math.random(),
};

function checkBounds(name: string, min: number, max: number): void {
  if (!Number.isFinite(min) || !Number.isFinite(max) || min > max) {
    throw new RangeError(
      `${name}: expected finite bounds with min <= max, got [${min}, ${max}].`,
    );
  }
}

/** Integers uniformly drawn from [min, max], both inclusive. */
export function uniformInt(min: number, max: number): Distribution<number> {
  checkBounds('uniformInt', min, max);
  const lo = Math.ceil(min);
  const hi = Math.floor(max);
  if (lo > hi) {
    throw new RangeError(`uniformInt: no integer lies in [${min}, ${max}].`);
  }
  return {
    min: lo,
    max: hi,
    sample: engine => lo + Math.floor(engine.next() * (hi - lo + 1)),
  };
}

/** Reals uniformly drawn from [min, max). */
export function uniformReal(min: number, max: number): Distribution<number> {
  checkBounds('uniformReal', min, max);
  return {
    min,
    max,
    sample: engine => min + engine.next() * (max - min),
  };
}

// ─── RandomCursor ─────────────────────────────────────────────────────────────

export class RandomCursor<T> extends Cursor<T> {
  readonly tier: Tier = TIER_RANDOM_ACCESS;

  private _drawn: { readonly value: T } | null = null;

  constructor(
    private readonly _distribution: Distribution<T>,
    private readonly _engine:       RandomEngine,
    private _index: number,
  ) {
    super();
  }

  dereference(): T {
    if (this._drawn === null) {
      this._drawn = { value: this._distribution.sample(this._engine) };
    }
    return this._drawn.value;
  }

  increment(): void {
    this.advanceBy(1);
  }

  decrement(): void {
    this.advanceBy(-1);
  }

  advanceBy(offset: number): void {
    if (offset === 0) return;
    this._index += offset;
    this._drawn = null;
  }

  distanceTo(other: RandomCursor<T>): number {
    return other._index - this._index;
  }

  equals(other: RandomCursor<T>): boolean {
    return this._index === other._index;
  }

  clone(): RandomCursor<T> {
    const copy = new RandomCursor(this._distribution, this._engine, this._index);
    copy._drawn = this._drawn;
    return copy;
  }
}

// ─── RandomView ───────────────────────────────────────────────────────────────

export class RandomView<T> extends View<T> {
  constructor(
    private readonly _distribution: Distribution<T>,
    private readonly _engine:       RandomEngine,
    amount: number,
  ) {
    super(
      new RandomCursor(_distribution, _engine, 0),
      new RandomCursor(_distribution, _engine, amount),
    );
  }

  /** One fresh draw, independent of any traversal. */
  nextRandom(): T {
    return this._distribution.sample(this._engine);
  }

  minRandom(): T {
    return this._distribution.min;
  }

  maxRandom(): T {
    return this._distribution.max;
  }
}

function randomView<T>(
  distribution: Distribution<T>,
  engine:       RandomEngine,
  amount:       number | undefined,
): RandomView<T> {
  if (amount !== undefined && (!Number.isInteger(amount) || amount < 0)) {
    throw new RangeError(
      `random: amount must be a non-negative integer, got ${amount}.`,
    );
  }
  return new RandomView(distribution, engine, amount ?? Infinity);
}

/**
 * View over `amount` numbers drawn from [min, max] with Math.random, or an
 * unbounded one when `amount` is omitted. Two integer bounds draw integers
 * (uniformInt); any other pair draws reals (uniformReal).
 *
 *   random(1, 6, 10)     ten dice rolls
 *   random(0, 0.5)       endless reals in [0, 0.5)
 */
export function random(min: number, max: number, amount?: number): RandomView<number>;
/**
 * View over `amount` draws from `distribution` using `engine`, or an
 * unbounded one when `amount` is omitted.
 *
 * Throws RangeError for a negative or non-integer amount.
 */
export function random<T>(
  distribution: Distribution<T>,
  engine?:      RandomEngine,
  amount?:      number,
): RandomView<T>;
export function random<T>(
  source:  Distribution<T> | number,
  second?: RandomEngine | number,
  amount?: number,
): RandomView<T> | RandomView<number> {
  if (typeof source === 'number') {
    if (typeof second !== 'number') {
      throw new TypeError('random: max must be a number when min is.');
    }
    const distribution = Number.isInteger(source) && Number.isInteger(second)
      ? uniformInt(source, second)
      : uniformReal(source, second);
    return randomView(distribution, mathRandomEngine, amount);
  }

  if (typeof second === 'number') {
    throw new TypeError('random: the second argument must be an engine after a distribution.');
  }
  return randomView(source, second ?? mathRandomEngine, amount);
}
