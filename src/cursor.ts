/**
 * @skein/core — Cursor capability contract
 *
 * A cursor is a position over a sequence. Concrete cursors implement a small
 * set of primitives:
 *
 *   every tier       dereference(), increment(), equals(other), clone()
 *   bidirectional    decrement()
 *   random-access    advanceBy(offset), distanceTo(other)
 *
 * and declare the tier they satisfy. The abstract Cursor base derives the
 * rest of the navigation surface (notEquals, ordering, post-increment,
 * indexed access) from those primitives alone.
 *
 * Calling an operation above a cursor's tier throws CursorCapabilityError.
 * That is a programming error: composition code checks tiers up front, so a
 * well-formed pipeline never reaches these throws.
 *
 * Cursors never own their sequence. clone() copies the position only; the
 * array, producer function or wrapped cursors' storage is shared.
 */

import { TIER_BIDIRECTIONAL, TIER_RANDOM_ACCESS, TIER_NAMES } from './constants';
import type { Tier } from './types';

// ─── Errors ───────────────────────────────────────────────────────────────────

/**
 * Thrown when an operation needs a higher tier than the cursor provides,
 * e.g. advanceBy() on a cursor over a generator.
 */
export class CursorCapabilityError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CursorCapabilityError';
  }
}

// ─── Tier helpers ─────────────────────────────────────────────────────────────

/** Name of a tier for messages: 'forward', 'bidirectional' or 'random-access'. */
export function tierName(tier: Tier): string {
  return TIER_NAMES[tier] ?? `tier(${tier})`;
}

/**
 * Weakest tier among `tiers`. An empty list yields random-access, the
 * identity of the minimum.
 */
export function minTier(tiers: Iterable<Tier>): Tier {
  let result: Tier = TIER_RANDOM_ACCESS;
  for (const t of tiers) {
    if (t < result) result = t;
  }
  return result;
}

/**
 * Throw CursorCapabilityError unless `cursor` satisfies `required`.
 * `op` names the operation for the message.
 */
export function requireTier(cursor: { readonly tier: Tier }, required: Tier, op: string): void {
  if (cursor.tier < required) {
    throw new CursorCapabilityError(
      `${op}: requires a ${tierName(required)} cursor, ` +
      `got a ${tierName(cursor.tier)} one.`,
    );
  }
}

// ─── Cursor ───────────────────────────────────────────────────────────────────

/**
 * Base class of every cursor.
 *
 * Subclasses implement the primitives for their tier and narrow `equals`,
 * `distanceTo` and `clone` to their own type. Comparing cursors of different
 * classes is not meaningful; compositions only compare cursors they built
 * from the same boundaries.
 */
export abstract class Cursor<T> {
  abstract readonly tier: Tier;

  /** Value at the current position. Not valid at the end. */
  abstract dereference(): T;

  abstract increment(): void;

  abstract equals(other: Cursor<T>): boolean;

  /** Independent copy of this position. */
  abstract clone(): Cursor<T>;

  decrement(): void {
    throw new CursorCapabilityError(
      `decrement: not supported by a ${tierName(this.tier)} cursor.`,
    );
  }

  advanceBy(offset: number): void {
    throw new CursorCapabilityError(
      `advanceBy(${offset}): not supported by a ${tierName(this.tier)} cursor.`,
    );
  }

  /** Signed number of increments that take this position to `other`. */
  distanceTo(_other: Cursor<T>): number {
    throw new CursorCapabilityError(
      `distanceTo: not supported by a ${tierName(this.tier)} cursor.`,
    );
  }

  // ── Derived surface ────────────────────────────────────────────────────────

  notEquals(other: Cursor<T>): boolean {
    return !this.equals(other);
  }

  lessThan(other: Cursor<T>): boolean {
    requireTier(this, TIER_RANDOM_ACCESS, 'lessThan');
    return this.distanceTo(other) > 0;
  }

  greaterThan(other: Cursor<T>): boolean {
    requireTier(this, TIER_RANDOM_ACCESS, 'greaterThan');
    return this.distanceTo(other) < 0;
  }

  lessOrEqual(other: Cursor<T>): boolean {
    return !this.greaterThan(other);
  }

  greaterOrEqual(other: Cursor<T>): boolean {
    return !this.lessThan(other);
  }

  /** Advance and return a copy of the position before the advance. */
  postIncrement(): Cursor<T> {
    const previous = this.clone();
    this.increment();
    return previous;
  }

  /** Step back and return a copy of the position before the step. */
  postDecrement(): Cursor<T> {
    requireTier(this, TIER_BIDIRECTIONAL, 'postDecrement');
    const previous = this.clone();
    this.decrement();
    return previous;
  }

  /** Copy of this cursor moved `offset` positions. */
  plus(offset: number): Cursor<T> {
    requireTier(this, TIER_RANDOM_ACCESS, 'plus');
    const moved = this.clone();
    moved.advanceBy(offset);
    return moved;
  }

  minus(offset: number): Cursor<T> {
    return this.plus(-offset);
  }

  /** Value `offset` positions away, without moving this cursor. */
  at(offset: number): T {
    return this.plus(offset).dereference();
  }

  /** True when this cursor can take `tier`-specific operations. */
  supports(tier: Tier): boolean {
    return this.tier >= tier;
  }
}
