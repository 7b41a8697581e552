/**
 * @skein/core — execution policy tests
 */

import { describe, it, expect } from 'vitest';
import {
  from,
  seq,
  par,
  resolveLanes,
  findFirstOf,
  CommitSlot,
  DEFAULT_PARALLEL_LANES,
  TIER_FORWARD,
  generate,
  random,
  uniformInt,
} from '../src/index';
import type { Cursor, ExecutionPolicy, Probe } from '../src/index';
import { capped, scriptedEngine } from './helpers';

const even: Probe<number, { v: number }> = at => {
  const v = at.dereference();
  return v % 2 === 0 ? { v } : null;
};

function firstEven(values: number[], policy: ExecutionPolicy): number | null {
  const view  = from(values);
  const found = findFirstOf(view.begin(), view.end(), () => even, policy);
  return found === null ? null : found.match.v;
}

describe('resolveLanes', () => {
  it('runs sequenced policies on one lane', () => {
    expect(resolveLanes(seq)).toBe(1);
  });

  it('defaults parallel policies to DEFAULT_PARALLEL_LANES', () => {
    expect(resolveLanes(par)).toBe(DEFAULT_PARALLEL_LANES);
    expect(resolveLanes({ kind: 'parallel', lanes: 3 })).toBe(3);
  });

  it('rejects lane counts that are not positive integers', () => {
    expect(() => resolveLanes({ kind: 'parallel', lanes: 0 })).toThrow(
      'ExecutionPolicy: lanes must be a positive integer, got 0.',
    );
    expect(() => resolveLanes({ kind: 'parallel', lanes: 2.5 })).toThrow(RangeError);
  });
});

describe('CommitSlot', () => {
  it('keeps the lowest offset regardless of report order', () => {
    const cur  = from([0]).begin();
    const slot = new CommitSlot<number, { lane: number }>();

    expect(slot.found).toBeNull();
    expect(slot.commit(5, cur, { lane: 1 })).toBe(true);
    expect(slot.commit(7, cur, { lane: 2 })).toBe(false);
    expect(slot.canImprove(5)).toBe(false);
    expect(slot.canImprove(4)).toBe(true);
    expect(slot.commit(2, cur, { lane: 0 })).toBe(true);
    expect(slot.found?.match).toEqual({ lane: 0 });
  });
});

describe('findFirstOf', () => {
  it('finds the first accepted position sequentially', () => {
    expect(firstEven([1, 3, 5, 8, 9, 10, 12], seq)).toBe(8);
  });

  it('finds the same position across lanes', () => {
    expect(firstEven([1, 3, 5, 8, 9, 10, 12], { kind: 'parallel', lanes: 3 })).toBe(8);
  });

  it('prefers a lower lane that matches later in its round', () => {
    // Lanes [1, 2] and [4, 6]: lane 1 matches 4 first, lane 0 then finds 2.
    expect(firstEven([1, 2, 4, 6], { kind: 'parallel', lanes: 2 })).toBe(2);
  });

  it('returns null when nothing matches', () => {
    expect(firstEven([1, 3, 5], seq)).toBeNull();
    expect(firstEven([1, 3, 5], par)).toBeNull();
    expect(firstEven([], par)).toBeNull();
  });

  it('reports the matching position', () => {
    const view  = from([7, 9, 4, 2]);
    const found = findFirstOf(view.begin(), view.end(), () => even, par);
    expect(found?.position.dereference()).toBe(4);
    expect(found === null ? -1 : view.begin().distanceTo(found.position)).toBe(2);
  });

  it('does not move the range cursors', () => {
    const view  = from([1, 2]);
    const first = view.begin();
    findFirstOf(first, view.end(), () => even, par);
    expect(first.dereference()).toBe(1);
  });

  it('makes one probe per lane, never more lanes than positions', () => {
    const lanes: number[] = [];
    const record = (lane: number): Probe<number, { v: number }> => {
      lanes.push(lane);
      return () => null;
    };

    const seven = from([1, 2, 3, 4, 5, 6, 7]);
    findFirstOf(seven.begin(), seven.end(), record, { kind: 'parallel', lanes: 3 });
    expect(lanes).toEqual([0, 1, 2]);

    lanes.length = 0;
    const two = from([1, 2]);
    findFirstOf(two.begin(), two.end(), record, { kind: 'parallel', lanes: 4 });
    expect(lanes).toEqual([0, 1]);

    lanes.length = 0;
    findFirstOf(seven.begin(), seven.end(), record, seq);
    expect(lanes).toEqual([0]);
  });

  it('hands each lane its positions in order', () => {
    const seen = new Map<number, number[]>();
    const record = (lane: number): Probe<number, { v: number }> => {
      const mine: number[] = [];
      seen.set(lane, mine);
      return (at: Cursor<number>) => {
        mine.push(at.dereference());
        return null;
      };
    };

    const view = from([1, 2, 3, 4, 5]);
    findFirstOf(view.begin(), view.end(), record, { kind: 'parallel', lanes: 2 });
    expect(seen.get(0)).toEqual([1, 2, 3]);
    expect(seen.get(1)).toEqual([4, 5]);
  });

  it('scans forward ranges on a single lane', () => {
    const lanes: number[] = [];
    const view  = capped(from([1, 3, 6, 7, 8]), TIER_FORWARD);
    const found = findFirstOf(view.begin(), view.end(), lane => {
      lanes.push(lane);
      return even;
    }, par);
    expect(found?.match).toEqual({ v: 6 });
    expect(lanes).toEqual([0]);
  });

  it('scans an unbounded range on a single lane', () => {
    const lanes: number[] = [];
    const view  = random(uniformInt(0, 9), scriptedEngine([0.1, 0.3, 0.4]));
    const found = findFirstOf(view.begin(), view.end(), lane => {
      lanes.push(lane);
      return even;
    }, { kind: 'parallel', lanes: 3 });
    expect(found?.match).toEqual({ v: 4 });
    expect(lanes).toEqual([0]);
  });

  it('never measures a forward range', () => {
    let n = 0;
    const view  = generate(() => n++);
    const found = findFirstOf(view.begin(), view.end(), () => even, par);
    expect(found?.match).toEqual({ v: 0 });
  });
});
