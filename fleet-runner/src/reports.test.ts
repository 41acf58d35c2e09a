import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { parseMovementReport, listReportSerials, readMovementReport } from './reports';
import { countSensorErrors } from './sensors';

describe('parseMovementReport', () => {
  it('reads one instruction per line', () => {
    expect(parseMovementReport('up 5\nforward 3\r\ndown 12\n')).toEqual({
      moves: [
        { direction: 'up', distance: 5, line: 1 },
        { direction: 'forward', distance: 3, line: 2 },
        { direction: 'down', distance: 12, line: 3 },
      ],
      skippedLines: [],
    });
  });

  it('skips lines that are not a word and a whole number', () => {
    const parsed = parseMovementReport('up 5\nforward\nup -3\ndown 2.5\nleft 1 2\n\nforward 1');

    expect(parsed.moves).toEqual([
      { direction: 'up', distance: 5, line: 1 },
      { direction: 'forward', distance: 1, line: 7 },
    ]);
    expect(parsed.skippedLines).toEqual([2, 3, 4, 5]);
  });
});

describe('report files', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'fleet-reports-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('lists serials from .txt file names in sorted order', () => {
    writeFileSync(join(dir, '78532608-69.txt'), 'up 1\n');
    writeFileSync(join(dir, '00000000-00.txt'), '');
    writeFileSync(join(dir, 'notes.md'), '');

    expect(listReportSerials(dir)).toEqual(['00000000-00', '78532608-69']);
  });

  it('reads and parses one unit report', () => {
    writeFileSync(join(dir, '78532608-69.txt'), 'forward 4\n');
    expect(readMovementReport(dir, '78532608-69').moves).toEqual([{ direction: 'forward', distance: 4, line: 1 }]);
  });

  it('fails on a missing directory or file', () => {
    expect(() => listReportSerials(join(dir, 'missing'))).toThrow(
      `No '${join(dir, 'missing')}' directory detected.`
    );
    expect(() => readMovementReport(dir, '11111111-11')).toThrow(
      'No movement report file detected for 11111111-11.'
    );
  });
});

describe('countSensorErrors', () => {
  it('groups failing patterns in first-seen order', () => {
    const lines = ['1111', '1011', '0000', '1011\r', '1111', '1011', ''];

    expect(countSensorErrors(lines)).toEqual([
      { pattern: '1011', sensorFailures: 1, occurrences: 3 },
      { pattern: '0000', sensorFailures: 4, occurrences: 1 },
    ]);
  });

  it('returns nothing when every sensor worked', () => {
    expect(countSensorErrors(['111', '111'])).toEqual([]);
  });
});
