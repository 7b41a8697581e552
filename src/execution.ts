/**
 * @skein/core — execution policies
 *
 * findFirstOf() locates the first position in a cursor range that a probe
 * accepts, under one of two policies:
 *
 *   seq  Front to back with a single probe.
 *
 *   par  The range is cut into `lanes` contiguous parts. Every lane gets its
 *        own probe (and so its own search state) and the lanes advance in
 *        interleaved rounds, one position per lane per round. A lane that
 *        finds a match reports it to a CommitSlot, which keeps only the
 *        lowest matching position; lanes that start beyond the committed
 *        position stop early. Lanes that find nothing never touch shared
 *        state.
 *
 * `par` is not concurrent. Lanes run interleaved on the calling thread,
 * because probes are closures over caller code and cannot cross a worker
 * boundary. It exists so callers can name the parallel policy; it gives no
 * speed-up over `seq` and does a little more work.
 *
 * Lanes need the range size up front. A range that is not random-access, or
 * whose size is not finite (an unbounded generator or random view), is
 * scanned on a single lane under `par` as well: measuring it would walk it to
 * the end, or never finish.
 */

import { DEFAULT_PARALLEL_LANES, TIER_RANDOM_ACCESS } from './constants';
import type { Cursor } from './cursor';
import type { ExecutionPolicy } from './types';

// ─── Policies ─────────────────────────────────────────────────────────────────

export const seq: ExecutionPolicy = { kind: 'sequenced' };
export const par: ExecutionPolicy = { kind: 'parallel' };

/**
 * Number of lanes a policy runs with. Throws RangeError when a parallel
 * policy names a lane count that is not a positive integer.
 */
export function resolveLanes(policy: ExecutionPolicy): number {
  if (policy.kind === 'sequenced') return 1;

  const lanes = policy.lanes ?? DEFAULT_PARALLEL_LANES;
  if (!Number.isInteger(lanes) || lanes < 1) {
    throw new RangeError(
      `ExecutionPolicy: lanes must be a positive integer, got ${lanes}.`,
    );
  }
  return lanes;
}

// ─── Probes ───────────────────────────────────────────────────────────────────

/**
 * Tests one position. Returns a match payload, or null to move on.
 * A probe may keep state between calls; it sees its lane's positions in
 * order.
 */
export type Probe<T, R extends object> = (at: Cursor<T>) => R | null;

/** A position the probe accepted, with the probe's payload. */
export interface Found<T, R extends object> {
  readonly position: Cursor<T>;
  readonly match:    R;
}

/**
 * Holds the best match reported so far. Only a match at a lower range
 * offset than the current one replaces it, so the result does not depend on
 * the order lanes report in.
 */
export class CommitSlot<T, R extends object> {
  private _offset = Infinity;
  private _found: Found<T, R> | null = null;

  /** True when a match at `offset` would still be committed. */
  canImprove(offset: number): boolean {
    return offset < this._offset;
  }

  commit(offset: number, position: Cursor<T>, match: R): boolean {
    if (!this.canImprove(offset)) return false;
    this._offset = offset;
    this._found  = { position, match };
    return true;
  }

  get found(): Found<T, R> | null {
    return this._found;
  }
}

// ─── Search ───────────────────────────────────────────────────────────────────

interface Lane<T, R extends object> {
  readonly at:    Cursor<T>;
  readonly stop:  Cursor<T>;
  readonly probe: Probe<T, R>;
  offset: number;
  done:   boolean;
}

/** Front-to-back scan with a single probe. */
function scanSingleLane<T, R extends object>(
  first: Cursor<T>,
  last:  Cursor<T>,
  probe: Probe<T, R>,
): Found<T, R> | null {
  for (const at = first.clone(); !at.equals(last); at.increment()) {
    const match = probe(at);
    if (match !== null) return { position: at, match };
  }
  return null;
}

/**
 * First position in [first, last) accepted by a probe, or null.
 *
 * `makeProbe(lane)` is called once per lane; lane 0 always covers `first`.
 * Under `seq`, and under `par` on a range without a finite random-access
 * size, there is exactly one lane. Neither `first` nor `last` is moved.
 */
export function findFirstOf<T, R extends object>(
  first:     Cursor<T>,
  last:      Cursor<T>,
  makeProbe: (lane: number) => Probe<T, R>,
  policy:    ExecutionPolicy,
): Found<T, R> | null {
  const lanes = resolveLanes(policy);
  if (lanes === 1 || !first.supports(TIER_RANDOM_ACCESS)) {
    return scanSingleLane(first, last, makeProbe(0));
  }

  const remaining = first.distanceTo(last);
  if (!Number.isFinite(remaining)) {
    return scanSingleLane(first, last, makeProbe(0));
  }
  if (remaining === 0) return null;

  // Contiguous parts of `width` positions; the last part may be shorter,
  // and fewer lanes than requested are used when the range is small.
  const width = Math.ceil(remaining / Math.min(lanes, remaining));
  const running: Lane<T, R>[] = [];
  let start = first.clone();
  for (let offset = 0; offset < remaining; offset += width) {
    const stop = start.clone();
    stop.advanceBy(Math.min(width, remaining - offset));
    running.push({
      at:    start,
      stop,
      probe: makeProbe(running.length),
      offset,
      done:  false,
    });
    start = stop.clone();
  }

  const slot = new CommitSlot<T, R>();
  let active = running.length;
  while (active > 0) {
    for (const lane of running) {
      if (lane.done) continue;

      if (!slot.canImprove(lane.offset) || lane.at.equals(lane.stop)) {
        lane.done = true;
        active--;
        continue;
      }

      const match = lane.probe(lane.at);
      if (match !== null) {
        slot.commit(lane.offset, lane.at.clone(), match);
        lane.done = true;
        active--;
        continue;
      }

      lane.at.increment();
      lane.offset++;
    }
  }

  return slot.found;
}
