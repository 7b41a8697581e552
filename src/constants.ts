/**
 * @skein/core — capability constants
 *
 * Cursor tiers are ordered integers so that a composition's tier is simply
 * the minimum of its inputs' tiers:
 *
 *   TIER_FORWARD        single pass: dereference, increment, equals
 *   TIER_BIDIRECTIONAL  + decrement
 *   TIER_RANDOM_ACCESS  + advanceBy, distanceTo (both O(1))
 *
 * Any change to these values changes how minTier() orders tiers.
 */

// ─── Tiers ────────────────────────────────────────────────────────────────────

export const TIER_FORWARD:       0 = 0;
export const TIER_BIDIRECTIONAL: 1 = 1;
export const TIER_RANDOM_ACCESS: 2 = 2;

/** Human-readable tier names, used in error messages. */
export const TIER_NAMES: readonly string[] = [
  'forward',
  'bidirectional',
  'random-access',
];

// ─── Execution ────────────────────────────────────────────────────────────────

/**
 * Number of lanes the parallel execution policy splits a search range into
 * when the caller does not choose one.
 */
export const DEFAULT_PARALLEL_LANES = 4;
