// ============================================================================
// RANKINGS - Select units by where they are relative to the base
// ============================================================================

import type { Result, UnitReport } from '../reports/types';
import { ok, err } from '../reports/types';
import { distanceFromBaseSquared } from '../geometry/heading';

type RankingResult = Result<UnitReport, 'EMPTY_REGISTRY'>;

/**
 * Pick the report with the smallest key, or the largest.
 * Matches a stable ascending sort: the minimum is the earliest of any tie,
 * the maximum the latest.
 */
function pick(
  reports: readonly UnitReport[],
  key: (report: UnitReport) => number,
  mode: 'min' | 'max'
): RankingResult {
  let best: UnitReport | undefined;
  let bestKey = 0;

  for (const report of reports) {
    const value = key(report);
    const better = best === undefined || (mode === 'min' ? value < bestKey : value >= bestKey);
    if (better) {
      best = report;
      bestKey = value;
    }
  }

  if (best === undefined) {
    return err('EMPTY_REGISTRY', 'No units registered');
  }
  return ok(best);
}

export function closest(reports: readonly UnitReport[]): RankingResult {
  return pick(reports, (r) => distanceFromBaseSquared(r.position), 'min');
}

export function furthest(reports: readonly UnitReport[]): RankingResult {
  return pick(reports, (r) => distanceFromBaseSquared(r.position), 'max');
}

export function lowest(reports: readonly UnitReport[]): RankingResult {
  return pick(reports, (r) => r.position.y, 'min');
}

export function highest(reports: readonly UnitReport[]): RankingResult {
  return pick(reports, (r) => r.position.y, 'max');
}
