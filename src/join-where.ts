/**
 * @skein/core — join-where
 *
 * Equi-join of two views by derived key. For each element `a` of A, in
 * order, JoinWhereCursor emits `combine(a, b)` for the elements `b` of B
 * whose key equals `selectA(a)`. B must be sorted ascending by `selectB`
 * (non-decreasing under `compare`); the cursor never checks this, and an
 * unsorted B yields missing or repeated matches.
 *
 * The two selectors may return different types. `compare(keyA, keyB)` then
 * orders an A key against a B key; without it both keys must be numbers,
 * strings or bigints, ordered by `<`.
 *
 * Search step (findNext):
 *   1. lower-bound A's current key in B, starting from the resume position
 *      rather than B's begin;
 *   2. an equal key is a match: remember it, put the resume position one
 *      past it, stop;
 *   3. otherwise advance A, reset the resume position to B's begin, retry.
 *
 * increment() re-runs findNext() without moving A first, so every B
 * duplicate of A's key is emitted before A moves on:
 *
 *   A = [1, 2, 2, 3]    B = [(1,x) (2,y) (2,z) (4,w)]
 *   → (1,x) (2,y) (2,z) (2,y) (2,z)
 *
 * Positions compare by A only, and the cursor is always forward: finding
 * the next match is inherently sequential.
 *
 * Under the `par` execution policy, the scan over A is split into lanes
 * (see execution.ts). The winning lane's B position is the only state
 * written back to the cursor.
 */

import { TIER_FORWARD } from './constants';
import { lowerBound, naturalOrder } from './algorithm';
import { Cursor } from './cursor';
import { findFirstOf, resolveLanes, seq, type Probe } from './execution';
import { View } from './view';
import type { Comparator, ExecutionPolicy, JoinKey, Tier } from './types';

// ─── Options ──────────────────────────────────────────────────────────────────

export interface JoinOptions<KA, KB = KA> {
  /** Orders an A key against a B key. Defaults to natural `<` order. */
  readonly compare?:   Comparator<KA, KB>;
  /** `seq` (default) or `par`. */
  readonly execution?: ExecutionPolicy;
}

/** Options for keys that natural order does not cover. */
export interface KeyedJoinOptions<KA, KB> extends JoinOptions<KA, KB> {
  readonly compare: Comparator<KA, KB>;
}

/** Everything a join cursor shares with its clones. */
export interface JoinPlan<A, B, KA, KB, R> {
  readonly endA:    Cursor<A>;
  readonly beginB:  Cursor<B>;
  readonly endB:    Cursor<B>;
  readonly selectA: (a: A) => KA;
  readonly selectB: (b: B) => KB;
  readonly combine: (a: A, b: B) => R;
  readonly compare: Comparator<KA, KB>;
  readonly policy:  ExecutionPolicy;
}

function isJoinKey(value: unknown): value is JoinKey {
  return typeof value === 'number' || typeof value === 'string' || typeof value === 'bigint';
}

/** Natural order, for callers that bypass the typed signatures. */
function naturalKeyOrder(a: unknown, b: unknown): number {
  if (isJoinKey(a) && isJoinKey(b)) return naturalOrder<JoinKey>(a, b);
  throw new TypeError(
    'joinWhere: keys must be numbers, strings or bigints unless options.compare is given.',
  );
}

// ─── JoinWhereCursor ──────────────────────────────────────────────────────────

export class JoinWhereCursor<A, B, KA, KB, R> extends Cursor<R> {
  readonly tier: Tier = TIER_FORWARD;

  /**
   * @internal — use joinWhere()
   *
   * `iterBFound` is only meaningful while `iterA` is not at `endA`.
   */
  constructor(
    private readonly _plan: JoinPlan<A, B, KA, KB, R>,
    private _iterA:      Cursor<A>,
    private _iterB:      Cursor<B>,
    private _iterBFound: Cursor<B>,
  ) {
    super();
  }

  /** Cursor at A's first match, or at A's end if there is none. */
  static first<A, B, KA, KB, R>(
    plan:   JoinPlan<A, B, KA, KB, R>,
    beginA: Cursor<A>,
  ): JoinWhereCursor<A, B, KA, KB, R> {
    const cursor = new JoinWhereCursor(plan, beginA, plan.beginB.clone(), plan.beginB.clone());

    // No match can exist; skip A entirely without dereferencing anything.
    if (beginA.equals(plan.endA) || plan.beginB.equals(plan.endB)) {
      cursor._iterA = plan.endA.clone();
      return cursor;
    }

    cursor.findNext();
    return cursor;
  }

  /** Probe for one lane: a private resume position into B. */
  private probeFor(lane: number): Probe<A, Cursor<B>> {
    const { beginB, endB, selectA, selectB, compare } = this._plan;

    // Lane 0 continues from where the last match left off; every other lane
    // starts at an A element the serial scan would reach with B reset.
    let resume = lane === 0 ? this._iterB.clone() : beginB.clone();

    // lowerBound passes the B key first.
    const bAgainstA = (kb: KB, ka: KA): number => -compare(ka, kb);

    return at => {
      const key   = selectA(at.dereference());
      const found = lowerBound(resume, endB, key, selectB, bAgainstA);
      if (!found.equals(endB) && !(compare(key, selectB(found.dereference())) < 0)) {
        return found;
      }
      resume = beginB.clone();
      return null;
    };
  }

  private findNext(): void {
    const { endA, beginB, policy } = this._plan;

    const hit = findFirstOf(this._iterA, endA, lane => this.probeFor(lane), policy);
    if (hit === null) {
      this._iterA = endA.clone();
      this._iterB = beginB.clone();
      return;
    }

    this._iterA      = hit.position;
    this._iterBFound = hit.match;
    this._iterB      = hit.match.clone();
    this._iterB.increment();
  }

  dereference(): R {
    return this._plan.combine(this._iterA.dereference(), this._iterBFound.dereference());
  }

  increment(): void {
    this.findNext();
  }

  /** Compares A positions only. */
  equals(other: JoinWhereCursor<A, B, KA, KB, R>): boolean {
    return this._iterA.equals(other._iterA);
  }

  clone(): JoinWhereCursor<A, B, KA, KB, R> {
    return new JoinWhereCursor(
      this._plan,
      this._iterA.clone(),
      this._iterB.clone(),
      this._iterBFound.clone(),
    );
  }
}

// ─── Factory ──────────────────────────────────────────────────────────────────

/**
 * Join `a` with `b` where `selectA(x)` equals `selectB(y)`, producing
 * `combine(x, y)` for every match.
 *
 * `b` must already be sorted ascending by `selectB` under `options.compare`;
 * nothing is sorted or indexed here. An empty `a` or `b` gives an empty view
 * without dereferencing anything.
 *
 * Keys of any type join once `options.compare` is given; without it they
 * must be numbers, strings or bigints. Untyped callers that break this get a
 * TypeError on the first comparison.
 *
 * Throws RangeError for a parallel policy with an invalid lane count.
 */
export function joinWhere<A, B, K extends JoinKey, R>(
  a:        View<A>,
  b:        View<B>,
  selectA:  (a: A) => K,
  selectB:  (b: B) => K,
  combine:  (a: A, b: B) => R,
  options?: JoinOptions<K>,
): View<R>;
export function joinWhere<A, B, KA, KB, R>(
  a:       View<A>,
  b:       View<B>,
  selectA: (a: A) => KA,
  selectB: (b: B) => KB,
  combine: (a: A, b: B) => R,
  options: KeyedJoinOptions<KA, KB>,
): View<R>;
export function joinWhere<A, B, KA, KB, R>(
  a:        View<A>,
  b:        View<B>,
  selectA:  (a: A) => KA,
  selectB:  (b: B) => KB,
  combine:  (a: A, b: B) => R,
  options?: JoinOptions<KA, KB>,
): View<R> {
  const policy = options?.execution ?? seq;
  resolveLanes(policy);

  const plan: JoinPlan<A, B, KA, KB, R> = {
    endA:    a.end(),
    beginB:  b.begin(),
    endB:    b.end(),
    selectA,
    selectB,
    combine,
    compare: options?.compare ?? naturalKeyOrder,
    policy,
  };

  const endB = plan.endB;
  return new View<R>(
    JoinWhereCursor.first(plan, a.begin()),
    new JoinWhereCursor(plan, a.end(), endB.clone(), endB.clone()),
  );
}
