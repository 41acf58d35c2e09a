// ============================================================================
// SHOWCASE - Drive a registry from report files and print what happened
// ============================================================================

import { existsSync } from 'fs';
import { Registry, createPosition } from '../../fleet';
import type { Position, UnitReport } from '../../fleet';
import type { RunnerConfig } from './config';
import { SENSOR_PREVIEW_LIMIT, TORPEDO_FAILURE_PRINT_LIMIT } from './config';
import { listReportSerials, readMovementReport } from './reports';
import { countSensorErrors, readSensorData } from './sensors';

/** Every unit launches from the base */
const BASE = createPosition(0, 0);

/** Torpedo headings, taken in turn by each firing unit */
const TORPEDO_HEADINGS = ['up', 'down', 'forward'] as const;

export function formatPosition(position: Position): string {
  return `(${position.x}, ${position.y})`;
}

export function formatReport(report: UnitReport): string {
  return `|Unit ${report.serial} at ${formatPosition(report.position)}|`;
}

/**
 * Register one unit per report file. Files whose name is not a valid,
 * unused serial are skipped with a warning.
 */
export function registerFromReports(registry: Registry, dir: string): string[] {
  const registered: string[] = [];

  for (const serial of listReportSerials(dir)) {
    const result = registry.create(serial, BASE);
    if (!result.ok) {
      console.warn(`[Reports] Skipping '${serial}': ${result.error.message}`);
      continue;
    }
    registered.push(serial);
  }

  console.log(`[Reports] Registered ${registered.length} units from ${dir}`);
  return registered;
}

/**
 * Apply every instruction in a unit's report file.
 * Returns how many moves the registry accepted.
 */
export function moveByReport(registry: Registry, dir: string, serial: string): number {
  const { moves, skippedLines } = readMovementReport(dir, serial);

  for (const line of skippedLines) {
    console.warn(`[Reports] Line ${line} of the report for ${serial} is invalid. Skipping.`);
  }

  let applied = 0;
  for (const move of moves) {
    const result = registry.move(serial, move.direction, move.distance);
    if (!result.ok) {
      console.warn(`[Reports] Line ${move.line} of the report for ${serial}: ${result.error.message}`);
      continue;
    }
    applied++;
  }
  return applied;
}

/**
 * Mark the end of a unit's route and warn when it ends where another
 * unit's route already ended.
 */
export function completeRoute(registry: Registry, serial: string): void {
  const result = registry.completeRoute(serial);
  if (!result.ok) {
    console.warn(`[Runner] ${result.error.message}`);
    return;
  }
  const collision = result.value;
  if (collision !== undefined) {
    console.warn(
      `[Runner] |Unit ${collision.serial} at ${formatPosition(collision.position)}| ` +
        `has collided with ${collision.otherSerial}!`
    );
  }
}

/**
 * Every unit fires once, cycling through up, down and forward.
 * A shot with another unit in its line of fire is aborted.
 * Returns how many shots were aborted.
 */
export function fireTorpedos(registry: Registry, serials: readonly string[]): number {
  let failures = 0;

  serials.forEach((serial, i) => {
    const heading = TORPEDO_HEADINGS[i % TORPEDO_HEADINGS.length];
    const shooter = registry.report(serial);
    if (!shooter.ok) {
      console.warn(`[Torpedo] ${shooter.error.message}`);
      failures++;
      return;
    }
    const target = registry.lineOfFire(serial, heading);
    if (!target.ok) {
      console.warn(`[Torpedo] ${target.error.message}`);
      failures++;
      return;
    }
    if (target.value === undefined) {
      return;
    }

    failures++;
    if (failures <= TORPEDO_FAILURE_PRINT_LIMIT) {
      console.log(
        `[Torpedo] ${formatReport(shooter.value)} fire torpedo failed ${heading} - ` +
          `friendly fire towards ${formatReport(target.value)}!`
      );
    }
  });

  if (failures > TORPEDO_FAILURE_PRINT_LIMIT) {
    console.log(`[Torpedo] ${failures - TORPEDO_FAILURE_PRINT_LIMIT} other units failed firing torpedos!`);
  }
  console.log(`[Torpedo] ${serials.length - failures} torpedos fired successfully!`);
  return failures;
}

function printMovementLog(registry: Registry, serial: string): void {
  const result = registry.report(serial);
  if (!result.ok) {
    console.warn(`[Runner] ${result.error.message}`);
    return;
  }

  const report = result.value;
  console.log(`[Runner] ${formatReport(report)} (${registry.logCapacity} entries max)`);
  for (const record of report.recentMovements) {
    console.log(
      `  ${formatPosition(record.from)} -> ${formatPosition(record.to)} ` +
        `heading ${formatPosition(record.direction)} distance ${record.distance}`
    );
  }
}

function printCollisions(registry: Registry): void {
  const collisions = registry.collisions();
  if (collisions.length === 0) {
    console.log('[Runner] Collisions: none');
    return;
  }

  console.log(`[Runner] Collisions: ${collisions.length}`);
  for (const collision of collisions) {
    console.log(`  ${collision.serial} hit ${collision.otherSerial} at ${formatPosition(collision.position)}`);
  }
}

function printLocations(registry: Registry): void {
  const closest = registry.closest();
  const furthest = registry.furthest();
  const highest = registry.highest();
  const lowest = registry.lowest();

  if (!closest.ok || !furthest.ok || !highest.ok || !lowest.ok) {
    console.log('[Runner] No units registered.');
    return;
  }

  console.log(
    `[Runner] Closest: ${formatReport(closest.value)}, furthest: ${formatReport(furthest.value)}, ` +
      `highest: ${formatReport(highest.value)}, lowest: ${formatReport(lowest.value)}`
  );
}

function printSensorErrors(dir: string, serials: readonly string[]): void {
  if (!existsSync(dir)) {
    console.warn(`[Sensors] No '${dir}' directory detected. Skipping sensor errors.`);
    return;
  }

  for (const [index, serial] of serials.entries()) {
    const readings = readSensorData(dir, serial);
    if (!readings) {
      console.warn(`[Sensors] No sensor data for ${serial}.`);
      continue;
    }

    const errors = countSensorErrors(readings);
    console.log(`[Sensors] ${serial}: ${errors.length} error types`);

    if (index === serials.length - 1) {
      for (const [i, error] of errors.slice(0, SENSOR_PREVIEW_LIMIT).entries()) {
        console.log(
          `  Error type ${i + 1}: ${error.pattern} ` +
            `(${error.sensorFailures} sensors failed, ${error.occurrences} times)`
        );
      }
    }
  }
}

/**
 * Register units from the reports directory, move them, then print the
 * movement log of the last unit and the collisions, fire torpedos, and
 * print rankings and sensor errors.
 */
export function runShowcase(
  config: RunnerConfig,
  registry: Registry = new Registry({ logCapacity: config.moveLogCapacity })
): Registry {
  const serials = registerFromReports(registry, config.movementReportsDir);
  const selected = config.unitLimit === undefined ? serials : serials.slice(0, config.unitLimit);

  selected.forEach((serial, i) => {
    moveByReport(registry, config.movementReportsDir, serial);
    completeRoute(registry, serial);
    console.log(`[Runner] ${i + 1}/${selected.length} movement reports progress...`);
  });

  const last = selected[selected.length - 1];
  if (last !== undefined) {
    printMovementLog(registry, last);
  }
  printCollisions(registry);
  fireTorpedos(registry, selected);
  printLocations(registry);
  printSensorErrors(config.sensorDataDir, selected);

  return registry;
}
