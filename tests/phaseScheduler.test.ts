import { describe, test, expect } from 'vitest';
import { phaseDelay, schedulePhases } from '../services/phaseScheduler';
import { DivisionByZeroError } from '../services/errors';
import { BreathPhase } from '../types';

describe('phaseDelay', () => {
  test('2 s in / 4 s out over 40 columns', () => {
    expect(phaseDelay(2, 40)).toEqual({ seconds: '0.05000', milliseconds: 50 });
    expect(phaseDelay(4, 40)).toEqual({ seconds: '0.10000', milliseconds: 100 });
  });

  test('handles durations that do not divide evenly', () => {
    expect(phaseDelay(7, 3)).toEqual({ seconds: '2.33333', milliseconds: 2333.33333 });
  });

  test('columns times the delay stays within one rounding step per column of the phase', () => {
    for (let duration = 1; duration <= 30; duration++) {
      for (const columns of [2, 3, 7, 40, 80, 101]) {
        const seconds = Number(phaseDelay(duration, columns).seconds);
        expect(seconds).toBeGreaterThan(0);

        const shortfall = duration - seconds * columns;
        expect(shortfall).toBeGreaterThanOrEqual(-1e-9);
        expect(shortfall).toBeLessThan(columns * 1e-5 + 1e-9);
      }
    }
  });

  test('zero columns is a division by zero', () => {
    expect(() => phaseDelay(1, 0)).toThrow(DivisionByZeroError);
  });
});

describe('schedulePhases', () => {
  test('computes both phases from the configuration', () => {
    const delays = schedulePhases({ inhaleSeconds: 2, exhaleSeconds: 4, columns: 40 });
    expect(delays[BreathPhase.INHALE].seconds).toBe('0.05000');
    expect(delays[BreathPhase.EXHALE].seconds).toBe('0.10000');
  });
});
