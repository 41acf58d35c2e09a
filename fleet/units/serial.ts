import type { Result } from '../reports/types';
import { ok, err } from '../reports/types';

/** Eight digits, a hyphen, two digits, e.g. 41158662-03 */
export const SERIAL_PATTERN = /^\d{8}-\d{2}$/;

export function isValidSerial(value: unknown): value is string {
  return typeof value === 'string' && SERIAL_PATTERN.test(value);
}

/** Accept a serial number or explain why it was rejected. Never coerces. */
export function parseSerial(value: unknown): Result<string, 'INVALID_SERIAL'> {
  if (typeof value !== 'string') {
    return err('INVALID_SERIAL', 'Serial number must be a string');
  }
  if (!SERIAL_PATTERN.test(value)) {
    return err('INVALID_SERIAL', `Serial number '${value}' must be in the format XXXXXXXX-XX`);
  }
  return ok(value);
}
