// ============================================================================
// FLEET MODULE - Registry of simulated 2D units
// ============================================================================

// Core engine
export { Registry } from './engine/registry';
export { DEFAULT_REGISTRY_OPTIONS, validateRegistryOptions } from './engine/options';
export type { RegistryOptions } from './engine/options';

// Serial numbers
export { SERIAL_PATTERN, isValidSerial, parseSerial } from './units/serial';

// Headings
export { parseHeading, isNamedHeading, displace, distanceFromBaseSquared } from './geometry/heading';
export type { Heading, NamedHeading, AngleHeading, VectorHeading } from './geometry/heading';

// Movement log
export { MovementLog } from './log/movementLog';

// Rankings (exposed for testing/advanced use)
export { closest, furthest, highest, lowest } from './state/rankings';
export { isInLineOfFire, findInLineOfFire } from './state/lineOfFire';

// Reports & Results
export type {
  Position,
  Direction,
  MovementRecord,
  UnitReport,
  CollisionRecord,
  ErrorCode,
  Result,
  ResultOk,
  ResultErr,
} from './reports/types';
export { ok, err, createPosition, isFinitePosition } from './reports/types';
