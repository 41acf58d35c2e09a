// ============================================================================
// MOVEMENT REPORTS - One text file per unit, one "<direction> <distance>"
// instruction per line
// ============================================================================

import { existsSync, readdirSync, readFileSync, statSync } from 'fs';
import { join, parse } from 'path';

export interface ReportedMove {
  readonly direction: string;
  readonly distance: number;
  /** 1-based line number in the report file */
  readonly line: number;
}

export interface ParsedMovementReport {
  readonly moves: ReportedMove[];
  /** Line numbers that were not a valid instruction */
  readonly skippedLines: number[];
}

/**
 * Parse a movement report. Blank lines are ignored; any other line that is not
 * a word followed by a whole number is skipped.
 */
export function parseMovementReport(text: string): ParsedMovementReport {
  const moves: ReportedMove[] = [];
  const skippedLines: number[] = [];

  text.split(/\r?\n/).forEach((raw, index) => {
    const line = index + 1;
    const trimmed = raw.trim();
    if (trimmed === '') return;

    const parts = trimmed.split(/\s+/);
    if (parts.length !== 2 || !/^\d+$/.test(parts[1])) {
      skippedLines.push(line);
      return;
    }

    moves.push({ direction: parts[0], distance: Number(parts[1]), line });
  });

  return { moves, skippedLines };
}

export function assertDirectory(dir: string): void {
  if (!existsSync(dir) || !statSync(dir).isDirectory()) {
    throw new Error(`No '${dir}' directory detected.`);
  }
}

/** Serials named by the report files in dir, sorted */
export function listReportSerials(dir: string): string[] {
  assertDirectory(dir);
  return readdirSync(dir)
    .filter((name) => name.endsWith('.txt'))
    .map((name) => parse(name).name)
    .sort();
}

export function readMovementReport(dir: string, serial: string): ParsedMovementReport {
  const file = join(dir, `${serial}.txt`);
  if (!existsSync(file)) {
    throw new Error(`No movement report file detected for ${serial}.`);
  }
  return parseMovementReport(readFileSync(file, 'utf8'));
}
