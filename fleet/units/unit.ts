// ============================================================================
// UNIT - One mobile entity. Only the registry constructs or mutates these;
// the package barrel does not export this module.
// ============================================================================

import type { Direction, MovementRecord, Position, Result, UnitReport } from '../reports/types';
import { ok, createPosition } from '../reports/types';
import { displace } from '../geometry/heading';
import { MovementLog } from '../log/movementLog';
import { parseSerial } from './serial';

export class Unit {
  private currentSerial: string;
  private currentPosition: Position;
  private readonly log: MovementLog;

  /** Inputs are validated by the registry; construction never fails afterwards. */
  constructor(serial: string, position: Position, logCapacity: number) {
    this.currentSerial = serial;
    this.currentPosition = createPosition(position.x, position.y);
    this.log = new MovementLog(logCapacity);
  }

  get serial(): string {
    return this.currentSerial;
  }

  get position(): Position {
    return this.currentPosition;
  }

  /**
   * Re-validate and replace the serial.
   * Uniqueness is the registry's concern: a unit cannot see its siblings.
   */
  setSerial(next: string): Result<void, 'INVALID_SERIAL'> {
    const parsed = parseSerial(next);
    if (!parsed.ok) {
      return parsed;
    }
    this.currentSerial = parsed.value;
    return ok(undefined);
  }

  applyMove(direction: Direction, distance: number): MovementRecord {
    const from = this.currentPosition;
    const to = displace(from, direction, distance);
    const record: MovementRecord = Object.freeze({ from, to, direction, distance });

    this.currentPosition = to;
    this.log.append(record);
    return record;
  }

  toReport(): UnitReport {
    return Object.freeze({
      serial: this.currentSerial,
      position: this.currentPosition,
      recentMovements: this.log.snapshot(),
    });
  }
}
