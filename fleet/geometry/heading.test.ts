import { describe, it, expect } from 'vitest';
import { parseHeading, displace, isNamedHeading } from './heading';

describe('parseHeading', () => {
  it('maps compass names and report vocabulary to axis vectors', () => {
    const cases: Array<[string, { x: number; y: number }]> = [
      ['east', { x: 1, y: 0 }],
      ['forward', { x: 1, y: 0 }],
      ['west', { x: -1, y: 0 }],
      ['backward', { x: -1, y: 0 }],
      ['north', { x: 0, y: 1 }],
      ['up', { x: 0, y: 1 }],
      ['south', { x: 0, y: -1 }],
      ['down', { x: 0, y: -1 }],
    ];
    for (const [name, expected] of cases) {
      const result = parseHeading(name);
      expect(result).toEqual({ ok: true, value: expected });
    }
  });

  it('rejects unknown names', () => {
    expect(parseHeading('onwards')).toEqual({
      ok: false,
      error: { code: 'INVALID_MOVEMENT', message: "Unknown direction 'onwards'" },
    });
    expect(isNamedHeading('toString')).toBe(false);
  });

  it('turns an angle into a unit vector', () => {
    const result = parseHeading({ angle: Math.PI / 2 });
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.x).toBeCloseTo(0);
    expect(result.value.y).toBeCloseTo(1);
  });

  it('normalizes vectors', () => {
    expect(parseHeading({ x: 0, y: -2 })).toEqual({ ok: true, value: { x: 0, y: -1 } });
  });

  it('rejects values that are not a name, an angle or a vector', () => {
    for (const heading of [42, null, undefined, {}, { x: 1 }]) {
      expect(parseHeading(heading)).toEqual({
        ok: false,
        error: { code: 'INVALID_MOVEMENT', message: 'Heading must be a direction name, an angle or a vector' },
      });
    }
  });

  it('rejects the zero vector and non-finite components', () => {
    for (const heading of [{ x: 0, y: 0 }, { x: Number.NaN, y: 1 }, { angle: Number.NaN }]) {
      const result = parseHeading(heading);
      expect(result.ok).toBe(false);
    }
  });
});

describe('displace', () => {
  it('adds distance times direction', () => {
    expect(displace({ x: 1, y: 1 }, { x: 0, y: -1 }, 3)).toEqual({ x: 1, y: -2 });
  });
});
