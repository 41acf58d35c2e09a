// ============================================================================
// REGISTRY - The main API for creating, moving and inspecting units
// ============================================================================

import type { CollisionRecord, Position, Result, ResultErr, UnitReport } from '../reports/types';
import { ok, err, createPosition, isFinitePosition } from '../reports/types';
import type { Heading } from '../geometry/heading';
import { parseHeading, displace } from '../geometry/heading';
import { parseSerial } from '../units/serial';
import { Unit } from '../units/unit';
import type { RegistryOptions } from './options';
import { validateRegistryOptions } from './options';
import * as rankings from '../state/rankings';
import { findInLineOfFire } from '../state/lineOfFire';

// ============================================================================
// REGISTRY CLASS
// ============================================================================

/**
 * Registry is the SOLE OWNER of every unit.
 *
 * Invariants:
 * - All operations are synchronous
 * - Every key equals its unit's current serial
 * - The registry never throws - errors are returned as Result
 * - A failed operation changes nothing
 * - Callers only ever see frozen reports, never a Unit
 */
export class Registry {
  private units = new Map<string, Unit>();
  private collisionLog: CollisionRecord[] = [];
  /** "x,y" -> serial of the first unit whose route ended there */
  private routeEnds = new Map<string, string>();
  private readonly options: RegistryOptions;

  constructor(options: Partial<RegistryOptions> = {}) {
    this.options = validateRegistryOptions(options);
  }

  get logCapacity(): number {
    return this.options.logCapacity;
  }

  get size(): number {
    return this.units.size;
  }

  has(serial: string): boolean {
    return this.units.has(serial);
  }

  /** Serials in listing order */
  serials(): string[] {
    return Array.from(this.units.keys());
  }

  /**
   * Register a unit at the given position.
   */
  create(
    serial: string,
    position: Position
  ): Result<UnitReport, 'INVALID_SERIAL' | 'INVALID_POSITION' | 'DUPLICATE_SERIAL'> {
    const parsed = parseSerial(serial);
    if (!parsed.ok) {
      return parsed;
    }

    if (!isFinitePosition(position)) {
      return err('INVALID_POSITION', 'Position coordinates must be finite numbers');
    }

    if (this.units.has(parsed.value)) {
      return err('DUPLICATE_SERIAL', `Unit ${parsed.value} is already registered`);
    }

    const unit = new Unit(parsed.value, position, this.options.logCapacity);
    this.units.set(parsed.value, unit);
    return ok(unit.toReport());
  }

  /**
   * Move a unit distance units along heading.
   */
  move(
    serial: string,
    heading: Heading | string,
    distance: number
  ): Result<UnitReport, 'NOT_FOUND' | 'INVALID_MOVEMENT'> {
    const unit = this.units.get(serial);
    if (!unit) {
      return notFound(serial);
    }

    if (typeof distance !== 'number' || !Number.isFinite(distance) || distance < 0) {
      return err('INVALID_MOVEMENT', `Distance must be a finite, non-negative number, got ${distance}`);
    }

    const direction = parseHeading(heading);
    if (!direction.ok) {
      return direction;
    }

    // Check the destination before touching the unit
    if (!isFinitePosition(displace(unit.position, direction.value, distance))) {
      return err('INVALID_MOVEMENT', `Moving ${serial} by ${distance} leaves the plane`);
    }

    unit.applyMove(direction.value, distance);
    return ok(unit.toReport());
  }

  /**
   * Give a unit a new serial. The unit keeps its slot in listing order.
   */
  rename(
    serial: string,
    newSerial: string
  ): Result<UnitReport, 'NOT_FOUND' | 'INVALID_SERIAL' | 'DUPLICATE_SERIAL'> {
    const unit = this.units.get(serial);
    if (!unit) {
      return notFound(serial);
    }

    const parsed = parseSerial(newSerial);
    if (!parsed.ok) {
      return parsed;
    }

    const nextSerial = parsed.value;
    if (nextSerial === serial) {
      return ok(unit.toReport());
    }

    if (this.units.has(nextSerial)) {
      return err('DUPLICATE_SERIAL', `Unit ${nextSerial} is already registered`);
    }

    const renamed = unit.setSerial(nextSerial);
    if (!renamed.ok) {
      return renamed;
    }

    // Re-key in place so listing order is unchanged
    this.units = new Map(
      Array.from(this.units, ([key, value]): [string, Unit] =>
        key === serial ? [nextSerial, value] : [key, value]
      )
    );
    return ok(unit.toReport());
  }

  /**
   * Remove a unit. Its serial becomes available again.
   */
  remove(serial: string): Result<void, 'NOT_FOUND'> {
    if (!this.units.delete(serial)) {
      return notFound(serial);
    }
    return ok(undefined);
  }

  report(serial: string): Result<UnitReport, 'NOT_FOUND'> {
    const unit = this.units.get(serial);
    if (!unit) {
      return notFound(serial);
    }
    return ok(unit.toReport());
  }

  /** Reports for every unit, in creation order */
  listReports(): readonly UnitReport[] {
    return Object.freeze(Array.from(this.units.values(), (unit) => unit.toReport()));
  }

  /** Removes every unit and forgets recorded routes and collisions */
  clear(): void {
    this.units.clear();
    this.collisionLog = [];
    this.routeEnds.clear();
  }

  // ==========================================================================
  // COLLISIONS
  // ==========================================================================

  collisions(): readonly CollisionRecord[] {
    return Object.freeze([...this.collisionLog]);
  }

  /**
   * Mark the end of a unit's route at its current position.
   * If an earlier route already ended there, the collision is recorded and
   * returned; otherwise the position is claimed by this unit.
   */
  completeRoute(serial: string): Result<CollisionRecord | undefined, 'NOT_FOUND'> {
    const unit = this.units.get(serial);
    if (!unit) {
      return notFound(serial);
    }

    const { x, y } = unit.position;
    const key = `${x},${y}`;
    const claimedBy = this.routeEnds.get(key);
    if (claimedBy === undefined) {
      this.routeEnds.set(key, serial);
      return ok(undefined);
    }

    const collision: CollisionRecord = Object.freeze({
      serial,
      otherSerial: claimedBy,
      position: createPosition(x, y),
    });
    this.collisionLog.push(collision);
    return ok(collision);
  }

  // ==========================================================================
  // LINE OF FIRE
  // ==========================================================================

  /**
   * The first other unit a shot from serial along heading would hit,
   * or undefined when the line is clear.
   */
  lineOfFire(
    serial: string,
    heading: Heading | string
  ): Result<UnitReport | undefined, 'NOT_FOUND' | 'INVALID_MOVEMENT'> {
    const unit = this.units.get(serial);
    if (!unit) {
      return notFound(serial);
    }

    const direction = parseHeading(heading);
    if (!direction.ok) {
      return direction;
    }

    return ok(findInLineOfFire(unit.toReport(), direction.value, this.listReports()));
  }

  // ==========================================================================
  // RANKINGS
  // ==========================================================================

  /** Unit closest to the base */
  closest(): Result<UnitReport, 'EMPTY_REGISTRY'> {
    return rankings.closest(this.listReports());
  }

  /** Unit furthest from the base */
  furthest(): Result<UnitReport, 'EMPTY_REGISTRY'> {
    return rankings.furthest(this.listReports());
  }

  /** Unit with the greatest y */
  highest(): Result<UnitReport, 'EMPTY_REGISTRY'> {
    return rankings.highest(this.listReports());
  }

  /** Unit with the smallest y */
  lowest(): Result<UnitReport, 'EMPTY_REGISTRY'> {
    return rankings.lowest(this.listReports());
  }
}

function notFound(serial: string): ResultErr<'NOT_FOUND'> {
  return err('NOT_FOUND', `Unit ${serial} not found`);
}
