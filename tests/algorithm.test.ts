/**
 * @skein/core — cursor algorithm tests
 *
 * cursorDistance / cursorAdvance / lowerBound must give the same answers on
 * every tier; only their cost differs.
 */

import { describe, it, expect } from 'vitest';
import {
  from,
  cursorDistance,
  cursorAdvance,
  lowerBound,
  naturalOrder,
  CursorCapabilityError,
  TIER_FORWARD,
  TIER_BIDIRECTIONAL,
  TIER_RANDOM_ACCESS,
} from '../src/index';
import type { Tier } from '../src/index';
import { capped } from './helpers';

const TIERS: readonly Tier[] = [TIER_FORWARD, TIER_BIDIRECTIONAL, TIER_RANDOM_ACCESS];

// ─── cursorDistance / cursorAdvance ──────────────────────────────────────────

describe('cursorDistance', () => {
  it.each(TIERS)('counts the positions of a range on tier %i', tier => {
    const view = capped(from([4, 5, 6, 7]), tier);
    expect(cursorDistance(view.begin(), view.end())).toBe(4);
    expect(cursorDistance(view.begin(), view.begin())).toBe(0);
  });
});

describe('cursorAdvance', () => {
  it.each(TIERS)('moves forward on tier %i', tier => {
    const cur = capped(from(['a', 'b', 'c']), tier).begin();
    cursorAdvance(cur, 2);
    expect(cur.dereference()).toBe('c');
  });

  it('moves backward on a bidirectional cursor', () => {
    const cur = capped(from(['a', 'b', 'c']), TIER_BIDIRECTIONAL).end();
    cursorAdvance(cur, -3);
    expect(cur.dereference()).toBe('a');
  });

  it('refuses to move a forward cursor backward', () => {
    const cur = capped(from(['a', 'b']), TIER_FORWARD).end();
    expect(() => cursorAdvance(cur, -1)).toThrow(CursorCapabilityError);
  });
});

// ─── lowerBound ──────────────────────────────────────────────────────────────

describe('lowerBound', () => {
  const sorted = [1, 3, 3, 5, 7];

  function indexOfBound(tier: Tier, key: number): number {
    const view  = capped(from(sorted), tier);
    const found = lowerBound(view.begin(), view.end(), key, v => v, naturalOrder);
    return cursorDistance(view.begin(), found);
  }

  it.each(TIERS)('finds the first element not less than the key on tier %i', tier => {
    expect(indexOfBound(tier, 3)).toBe(1);
    expect(indexOfBound(tier, 4)).toBe(3);
    expect(indexOfBound(tier, 7)).toBe(4);
  });

  it.each(TIERS)('returns the begin for a key below every element on tier %i', tier => {
    expect(indexOfBound(tier, 0)).toBe(0);
  });

  it.each(TIERS)('returns the end for a key above every element on tier %i', tier => {
    expect(indexOfBound(tier, 8)).toBe(sorted.length);
  });

  it('searches by a derived key', () => {
    const view  = from([{ k: 'ant' }, { k: 'bee' }, { k: 'cat' }]);
    const found = lowerBound(view.begin(), view.end(), 'bz', r => r.k, naturalOrder);
    expect(found.dereference()).toEqual({ k: 'cat' });
  });

  it('does not move the cursors it is given', () => {
    const view  = from(sorted);
    const first = view.begin();
    lowerBound(first, view.end(), 5, v => v, naturalOrder);
    expect(first.dereference()).toBe(1);
  });

  it('on an empty range returns the end without dereferencing', () => {
    const view  = from<number>([]);
    const found = lowerBound(view.begin(), view.end(), 1, v => v, naturalOrder);
    expect(found.equals(view.end())).toBe(true);
  });
});

describe('naturalOrder', () => {
  it('orders numbers, strings and bigints', () => {
    expect(naturalOrder(1, 2)).toBe(-1);
    expect(naturalOrder('b', 'a')).toBe(1);
    expect(naturalOrder(5n, 5n)).toBe(0);
  });
});
