// ─── Types ────────────────────────────────────────────────────────────────────
export type {
  Tier,
  Comparator,
  JoinKey,
  ExecutionPolicy,
  RandomEngine,
  Distribution,
} from './types';

// ─── Constants ────────────────────────────────────────────────────────────────
export {
  TIER_FORWARD,
  TIER_BIDIRECTIONAL,
  TIER_RANDOM_ACCESS,
  TIER_NAMES,
  DEFAULT_PARALLEL_LANES,
} from './constants';

// ─── Cursor contract ──────────────────────────────────────────────────────────
export {
  Cursor,
  CursorCapabilityError,
  minTier,
  requireTier,
  tierName,
} from './cursor';

export {
  cursorDistance,
  cursorAdvance,
  lowerBound,
  naturalOrder,
} from './algorithm';

// ─── View ─────────────────────────────────────────────────────────────────────
export { View } from './view';

// ─── Single-sequence adaptors ─────────────────────────────────────────────────
export { ArrayCursor, from } from './array';
export { MapCursor, map } from './map';
export { EnumerateCursor, enumerate } from './enumerate';
export { GenerateCursor, generate } from './generate';
export {
  RandomCursor,
  RandomView,
  random,
  uniformInt,
  uniformReal,
  mathRandomEngine,
} from './random';
export { ExceptCursor, except } from './except';

// ─── Cartesian product ────────────────────────────────────────────────────────
export { CartesianProductCursor, cartesianProduct } from './cartesian-product';
export type { ViewsOf } from './cartesian-product';

// ─── Join ─────────────────────────────────────────────────────────────────────
export { seq, par, resolveLanes, findFirstOf, CommitSlot } from './execution';
export type { Probe, Found } from './execution';
export { JoinWhereCursor, joinWhere } from './join-where';
export type { JoinOptions, KeyedJoinOptions, JoinPlan } from './join-where';
