// ============================================================================
// LINE OF FIRE - Which unit a shot along a heading would hit first
// ============================================================================

import type { Direction, UnitReport } from '../reports/types';

/**
 * A target is in the line of fire when the offset from the shooter is parallel
 * to direction and not behind it. A unit sharing the shooter's position counts.
 * Along an axis this means: same x and y >= shooter's y when firing up,
 * y <= when firing down, same y and x >= when firing forward.
 */
export function isInLineOfFire(shooter: UnitReport, direction: Direction, target: UnitReport): boolean {
  const dx = target.position.x - shooter.position.x;
  const dy = target.position.y - shooter.position.y;
  const cross = dx * direction.y - dy * direction.x;
  const dot = dx * direction.x + dy * direction.y;
  return cross === 0 && dot >= 0;
}

/** First other unit in listing order that a shot would endanger */
export function findInLineOfFire(
  shooter: UnitReport,
  direction: Direction,
  reports: readonly UnitReport[]
): UnitReport | undefined {
  return reports.find(
    (report) => report.serial !== shooter.serial && isInLineOfFire(shooter, direction, report)
  );
}
