import { describe, it, expect } from 'vitest';
import { loadConfig } from './config';

describe('loadConfig', () => {
  it('falls back to defaults', () => {
    expect(loadConfig({})).toEqual({
      movementReportsDir: 'MovementReports',
      sensorDataDir: 'Sensordata',
      moveLogCapacity: 50,
      unitLimit: undefined,
    });
  });

  it('reads overrides', () => {
    expect(
      loadConfig({
        MOVEMENT_REPORTS_DIR: 'data/reports',
        SENSOR_DATA_DIR: 'data/sensors',
        MOVE_LOG_CAPACITY: '0',
        UNIT_LIMIT: ' 12 ',
      })
    ).toEqual({
      movementReportsDir: 'data/reports',
      sensorDataDir: 'data/sensors',
      moveLogCapacity: 0,
      unitLimit: 12,
    });
  });

  it('rejects malformed numbers', () => {
    expect(() => loadConfig({ MOVE_LOG_CAPACITY: '-1' })).toThrow(
      'Invalid MOVE_LOG_CAPACITY: -1. Must be an integer >= 0.'
    );
    expect(() => loadConfig({ UNIT_LIMIT: '0' })).toThrow('Invalid UNIT_LIMIT: 0. Must be an integer >= 1.');
    expect(() => loadConfig({ UNIT_LIMIT: 'ten' })).toThrow('Invalid UNIT_LIMIT: ten. Must be an integer >= 1.');
  });
});
