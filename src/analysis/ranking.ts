// ── Ranking ─────────────────────────────────────────────────────────
// Orders entities by revenue and annotates each with its rank and its
// share of the revenue of the whole family.

import { compareNames, revenueShare } from "./aggregation.js";
import { InvalidParameterError } from "./errors.js";

export interface Rankable {
  name: string;
  totalRevenue: number;
}

export interface RankedEntity<T extends Rankable = Rankable> {
  name: string;
  totalRevenue: number;
  /** Share of the revenue of all entities, not only the ranked ones */
  contributionPercentage: number;
  rank: number; // 1-based
  entity: T;
}

export interface RankingOptions {
  /** Keep only the first `limit` entities. All if omitted. */
  limit?: number;
}

/**
 * Rank entities by revenue, highest first; equal revenue is ordered by
 * name. The input array is left untouched.
 */
export function rankByRevenue<T extends Rankable>(
  entities: readonly T[],
  options: RankingOptions = {},
): RankedEntity<T>[] {
  const { limit } = options;
  if (limit !== undefined && (!Number.isInteger(limit) || limit < 1)) {
    throw new InvalidParameterError(
      `Ranking limit must be a positive integer, received ${limit}`,
    );
  }

  const grandTotal = entities.reduce((sum, e) => sum + e.totalRevenue, 0);
  const ordered = [...entities].sort(
    (a, b) => b.totalRevenue - a.totalRevenue || compareNames(a.name, b.name),
  );

  return ordered.slice(0, limit ?? ordered.length).map((entity, index) => ({
    name: entity.name,
    totalRevenue: entity.totalRevenue,
    contributionPercentage: revenueShare(entity.totalRevenue, grandTotal),
    rank: index + 1,
    entity,
  }));
}
