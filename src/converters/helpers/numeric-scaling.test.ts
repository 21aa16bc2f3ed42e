import { describe, it, expect } from 'vitest';
import { countDecimals, formatRounded, roundHalfAwayFromZero, scaleNumericToken } from './numeric-scaling';

/**
 * Small deterministic generator so failures can be reproduced
 */
function seededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (Math.imul(state, 1664525) + 1013904223) >>> 0;
    return state / 0x100000000;
  };
}

function hundredths(value: number): string {
  const sign = value < 0 ? '-' : '';
  const abs = Math.abs(value);
  return `${sign}${Math.floor(abs / 100)}.${String(abs % 100).padStart(2, '0')}`;
}

describe('countDecimals', () => {
  it('counts digits after the decimal point', () => {
    expect(countDecimals('10.0')).toBe(1);
    expect(countDecimals('7')).toBe(0);
    expect(countDecimals(' 2.50 ')).toBe(2);
  });

  it('accounts for exponents', () => {
    expect(countDecimals('1.5e-3')).toBe(4);
    expect(countDecimals('2e3')).toBe(0);
  });
});

describe('roundHalfAwayFromZero', () => {
  it('rounds halves away from zero on both sides', () => {
    expect(roundHalfAwayFromZero(2.5, 0)).toBe(3);
    expect(roundHalfAwayFromZero(-2.5, 0)).toBe(-3);
    expect(roundHalfAwayFromZero(0.125, 2)).toBe(0.13);
  });

  it('is not thrown off by binary representation', () => {
    expect(roundHalfAwayFromZero(1.005, 2)).toBe(1.01);
  });
});

describe('formatRounded', () => {
  it('trims trailing zeros down to the minimum', () => {
    expect(formatRounded(0.25, 6, 1)).toBe('0.25');
    expect(formatRounded(30, 3, 1)).toBe('30.0');
    expect(formatRounded(30, 3, 0)).toBe('30');
  });

  it('never writes negative zero', () => {
    expect(formatRounded(-0.0001, 2, 2)).toBe('0.00');
  });
});

describe('scaleNumericToken', () => {
  it('multiplies linear fields and keeps the token precision', () => {
    expect(scaleNumericToken('10.0', 'multiply', 2, 0)).toBe('20.0');
    expect(scaleNumericToken('10.0', 'multiply', 3, 3)).toBe('30.0');
    expect(scaleNumericToken('5', 'multiply', 1.5, 0)).toBe('8');
    expect(scaleNumericToken('-5', 'multiply', 1.5, 0)).toBe('-8');
  });

  it('divides inverse fields up to the rule precision', () => {
    expect(scaleNumericToken('1.0', 'divide', 3, 6)).toBe('0.333333');
    expect(scaleNumericToken('0.5', 'divide', 2, 6)).toBe('0.25');
  });

  it('keeps surrounding whitespace', () => {
    expect(scaleNumericToken(' 2.50 ', 'multiply', 2, 0)).toBe(' 5.00 ');
  });

  it('writes exponent tokens in fixed notation', () => {
    expect(scaleNumericToken('1e-3', 'multiply', 2, 0)).toBe('0.002');
  });

  it('returns undefined for text', () => {
    expect(scaleNumericToken('abc', 'multiply', 2, 0)).toBeUndefined();
    expect(scaleNumericToken('', 'multiply', 2, 0)).toBeUndefined();
  });

  it('matches exact decimal arithmetic for random linear values', () => {
    const random = seededRandom(20240301);
    for (let i = 0; i < 500; i++) {
      const value = Math.floor(random() * 20001) - 10000;
      const factor = [1, 2, 3][Math.floor(random() * 3)];
      const token = hundredths(value);
      expect(scaleNumericToken(token, 'multiply', factor, 0)).toBe(hundredths(value * factor));
    }
  });
});
