// ============================================================================
// HEADING - Caller-supplied directions, normalized to unit vectors
// ============================================================================

import type { Direction, Position, Result } from '../reports/types';
import { ok, err, createPosition } from '../reports/types';

/**
 * Named directions. The compass names are canonical; forward/backward/up/down
 * are the vocabulary used in movement report files.
 */
export type NamedHeading =
  | 'east'
  | 'west'
  | 'north'
  | 'south'
  | 'forward'
  | 'backward'
  | 'up'
  | 'down';

/** Radians, counter-clockwise from east */
export interface AngleHeading {
  readonly angle: number;
}

/** Any finite, non-zero vector */
export interface VectorHeading {
  readonly x: number;
  readonly y: number;
}

export type Heading = NamedHeading | AngleHeading | VectorHeading;

const EAST: Direction = Object.freeze({ x: 1, y: 0 });
const WEST: Direction = Object.freeze({ x: -1, y: 0 });
const NORTH: Direction = Object.freeze({ x: 0, y: 1 });
const SOUTH: Direction = Object.freeze({ x: 0, y: -1 });

const NAMED_DIRECTIONS: Readonly<Record<NamedHeading, Direction>> = {
  east: EAST,
  west: WEST,
  north: NORTH,
  south: SOUTH,
  forward: EAST,
  backward: WEST,
  up: NORTH,
  down: SOUTH,
};

export function isNamedHeading(value: string): value is NamedHeading {
  return Object.prototype.hasOwnProperty.call(NAMED_DIRECTIONS, value);
}

/**
 * Normalize a heading.
 * Unknown names, non-finite numbers and the zero vector are malformed.
 */
export function parseHeading(heading: unknown): Result<Direction, 'INVALID_MOVEMENT'> {
  if (typeof heading === 'string') {
    if (!isNamedHeading(heading)) {
      return err('INVALID_MOVEMENT', `Unknown direction '${heading}'`);
    }
    return ok(NAMED_DIRECTIONS[heading]);
  }

  if (typeof heading !== 'object' || heading === null) {
    return err('INVALID_MOVEMENT', 'Heading must be a direction name, an angle or a vector');
  }

  if ('angle' in heading) {
    const { angle } = heading;
    if (typeof angle !== 'number' || !Number.isFinite(angle)) {
      return err('INVALID_MOVEMENT', 'Heading angle must be a finite number');
    }
    return ok(Object.freeze({ x: Math.cos(angle), y: Math.sin(angle) }));
  }

  if (!('x' in heading) || !('y' in heading)) {
    return err('INVALID_MOVEMENT', 'Heading must be a direction name, an angle or a vector');
  }

  const { x, y } = heading;
  if (typeof x !== 'number' || typeof y !== 'number' || !Number.isFinite(x) || !Number.isFinite(y)) {
    return err('INVALID_MOVEMENT', 'Heading vector components must be finite numbers');
  }
  const length = Math.hypot(x, y);
  if (length === 0 || !Number.isFinite(length)) {
    return err('INVALID_MOVEMENT', 'Heading vector must have a non-zero, finite length');
  }
  return ok(Object.freeze({ x: x / length, y: y / length }));
}

/** Position reached by travelling distance along direction */
export function displace(from: Position, direction: Direction, distance: number): Position {
  return createPosition(from.x + distance * direction.x, from.y + distance * direction.y);
}

/** Squared distance from the base (origin) */
export function distanceFromBaseSquared(position: Position): number {
  return position.x * position.x + position.y * position.y;
}
