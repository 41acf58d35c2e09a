// ============================================================================
// VALUE TYPES - Everything that leaves the registry is one of these
// ============================================================================

/** A point on the plane. The base sits at the origin. */
export interface Position {
  readonly x: number;
  readonly y: number;
}

/** Normalized heading: a vector of length 1 */
export interface Direction {
  readonly x: number;
  readonly y: number;
}

/** One displacement event: to = from + distance * direction */
export interface MovementRecord {
  readonly from: Position;
  readonly to: Position;
  readonly direction: Direction;
  readonly distance: number;
}

/** Frozen snapshot of a unit, taken at the instant of the call */
export interface UnitReport {
  readonly serial: string;
  readonly position: Position;
  /** Oldest first, most recent last */
  readonly recentMovements: readonly MovementRecord[];
}

/** A move that ended on a position another unit already occupied */
export interface CollisionRecord {
  readonly serial: string;
  readonly otherSerial: string;
  readonly position: Position;
}

// ============================================================================
// RESULT TYPE - The registry never throws, returns Result instead
// ============================================================================

export type ErrorCode =
  | 'INVALID_SERIAL'
  | 'DUPLICATE_SERIAL'
  | 'NOT_FOUND'
  | 'INVALID_MOVEMENT'
  | 'INVALID_POSITION'
  | 'EMPTY_REGISTRY';

export interface ResultOk<T> {
  readonly ok: true;
  readonly value: T;
}

export interface ResultErr<C extends ErrorCode = ErrorCode> {
  readonly ok: false;
  readonly error: {
    readonly code: C;
    readonly message: string;
  };
}

export type Result<T, C extends ErrorCode = ErrorCode> = ResultOk<T> | ResultErr<C>;

/** Helper to create success result */
export function ok<T>(value: T): ResultOk<T> {
  return { ok: true, value };
}

/** Helper to create error result */
export function err<C extends ErrorCode>(code: C, message: string): ResultErr<C> {
  return { ok: false, error: { code, message } };
}

// ============================================================================
// CONSTRUCTORS
// ============================================================================

/** Create a frozen position */
export function createPosition(x: number, y: number): Position {
  return Object.freeze({ x, y });
}

/** Check that both coordinates are finite numbers */
export function isFinitePosition(position: Position): boolean {
  return (
    typeof position.x === 'number' &&
    typeof position.y === 'number' &&
    Number.isFinite(position.x) &&
    Number.isFinite(position.y)
  );
}
