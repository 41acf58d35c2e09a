import { existsSync, readFileSync } from 'fs';
import { join } from 'path';

/** One distinct failing sensor pattern */
export interface SensorErrorSummary {
  readonly pattern: string;
  /** Sensors reporting 0 in this pattern */
  readonly sensorFailures: number;
  readonly occurrences: number;
}

/**
 * Group error readings by exact pattern, in first-seen order.
 * A reading is an error when any sensor reports 0.
 */
export function countSensorErrors(lines: Iterable<string>): SensorErrorSummary[] {
  const groups = new Map<string, { sensorFailures: number; occurrences: number }>();

  for (const raw of lines) {
    const pattern = raw.trim();
    if (!pattern.includes('0')) continue; // No error

    const existing = groups.get(pattern);
    if (existing) {
      existing.occurrences++;
    } else {
      groups.set(pattern, { sensorFailures: pattern.split('0').length - 1, occurrences: 1 });
    }
  }

  return Array.from(groups, ([pattern, group]) => ({ pattern, ...group }));
}

/** Readings for one unit, or undefined when it has no sensor file */
export function readSensorData(dir: string, serial: string): string[] | undefined {
  const file = join(dir, `${serial}.txt`);
  if (!existsSync(file)) {
    return undefined;
  }
  return readFileSync(file, 'utf8').split(/\r?\n/);
}
