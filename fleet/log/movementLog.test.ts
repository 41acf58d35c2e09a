import { describe, it, expect } from 'vitest';
import { MovementLog } from './movementLog';
import type { MovementRecord } from '../reports/types';

function record(step: number): MovementRecord {
  return {
    from: { x: step - 1, y: 0 },
    to: { x: step, y: 0 },
    direction: { x: 1, y: 0 },
    distance: 1,
  };
}

describe('MovementLog', () => {
  it('starts empty', () => {
    const log = new MovementLog(3);
    expect(log.size).toBe(0);
    expect(log.snapshot()).toEqual([]);
  });

  it('keeps records in insertion order until full', () => {
    const log = new MovementLog(3);
    log.append(record(1));
    log.append(record(2));

    expect(log.size).toBe(2);
    expect(log.snapshot()).toEqual([record(1), record(2)]);
  });

  it('evicts the oldest record once full', () => {
    const log = new MovementLog(3);
    for (let step = 1; step <= 7; step++) {
      log.append(record(step));
    }

    expect(log.size).toBe(3);
    expect(log.snapshot()).toEqual([record(5), record(6), record(7)]);
  });

  it('discards everything at capacity zero', () => {
    const log = new MovementLog(0);
    log.append(record(1));
    expect(log.size).toBe(0);
    expect(log.snapshot()).toEqual([]);
  });

  it('hands out copies that later appends do not touch', () => {
    const log = new MovementLog(2);
    log.append(record(1));
    const before = log.snapshot();

    log.append(record(2));
    log.append(record(3));

    expect(before).toEqual([record(1)]);
    expect(Object.isFrozen(before)).toBe(true);
  });

  it('accepts a capacity far larger than it will ever fill', () => {
    const log = new MovementLog(2 ** 32);
    log.append(record(1));
    log.append(record(2));

    expect(log.size).toBe(2);
    expect(log.snapshot()).toEqual([record(1), record(2)]);
  });

  it('rejects a negative or fractional capacity', () => {
    expect(() => new MovementLog(-1)).toThrow(RangeError);
    expect(() => new MovementLog(1.5)).toThrow(RangeError);
  });
});
