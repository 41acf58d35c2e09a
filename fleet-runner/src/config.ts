import 'dotenv/config';
import { DEFAULT_REGISTRY_OPTIONS } from '../../fleet';

// Layout of the input directories matches the files the fleet produces:
// MovementReports/<serial>.txt and Sensordata/<serial>.txt

export const DEFAULT_MOVEMENT_REPORTS_DIR = 'MovementReports';
export const DEFAULT_SENSOR_DATA_DIR = 'Sensordata';

/** Sensor error groups printed for the last unit */
export const SENSOR_PREVIEW_LIMIT = 50;

/** Friendly-fire warnings printed before the rest are summarized */
export const TORPEDO_FAILURE_PRINT_LIMIT = 50;

export interface RunnerConfig {
  readonly movementReportsDir: string;
  readonly sensorDataDir: string;
  readonly moveLogCapacity: number;
  /** Process at most this many units; undefined means all */
  readonly unitLimit: number | undefined;
}

function readInteger(name: string, raw: string | undefined, min: number): number | undefined {
  if (raw === undefined || raw.trim() === '') {
    return undefined;
  }
  const trimmed = raw.trim();
  if (!/^\d+$/.test(trimmed) || Number(trimmed) < min) {
    throw new Error(`Invalid ${name}: ${raw}. Must be an integer >= ${min}.`);
  }
  return Number(trimmed);
}

/** Read runner settings from the environment (.env is loaded on import) */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): RunnerConfig {
  return {
    movementReportsDir: env.MOVEMENT_REPORTS_DIR || DEFAULT_MOVEMENT_REPORTS_DIR,
    sensorDataDir: env.SENSOR_DATA_DIR || DEFAULT_SENSOR_DATA_DIR,
    moveLogCapacity:
      readInteger('MOVE_LOG_CAPACITY', env.MOVE_LOG_CAPACITY, 0) ?? DEFAULT_REGISTRY_OPTIONS.logCapacity,
    unitLimit: readInteger('UNIT_LIMIT', env.UNIT_LIMIT, 1),
  };
}
