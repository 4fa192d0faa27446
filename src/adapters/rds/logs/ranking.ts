/**
 * Ranking of parsed slow queries by duration.
 */

import type {
  RankedSlowQueries,
  SlowQueryRecord,
} from "../../../types/index.js";

/** Records kept after sorting */
export const DEFAULT_RANK_LIMIT = 50;

/** Records shown in tool output */
export const DEFAULT_TOP_COUNT = 5;

export interface RankOptions {
  limit?: number;
  top?: number;
}

/**
 * Sort by duration descending (stable) and bound the result.
 * `top` never exceeds `limit`.
 */
export function rankSlowQueries(
  records: readonly SlowQueryRecord[],
  options: RankOptions = {},
): RankedSlowQueries {
  const limit = Math.max(0, options.limit ?? DEFAULT_RANK_LIMIT);
  const top = Math.min(Math.max(0, options.top ?? DEFAULT_TOP_COUNT), limit);

  const sorted = [...records].sort((a, b) => b.queryTime - a.queryTime);
  const bounded = sorted.slice(0, limit);

  return {
    total: bounded.length,
    top: bounded.slice(0, top),
  };
}
