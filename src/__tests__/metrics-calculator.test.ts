/**
 * =============================================================================
 * METRICS CALCULATOR — Unit Tests
 * =============================================================================
 */

import { InvalidInputError } from '../core/errors/AppError';
import { computePerHour, computePerKm, meetsGoal } from '../modules/metrics/metrics.service';

describe('computePerKm', () => {
  it('divides tariff by distance', () => {
    const samples: Array<[number, number]> = [[5200, 14], [4800, 13], [1, 3], [0, 2.5], [99999.99, 0.1]];

    for (const [tariff, distance] of samples) {
      expect(computePerKm(tariff, distance)).toBeCloseTo(tariff / distance, 10);
    }
  });

  it('returns 371.43 per km for 5200 over 14 km', () => {
    expect(computePerKm(5200, 14)).toBeCloseTo(371.43, 2);
  });

  it.each([0, -1, -0.5, Number.NaN])('rejects distance %p with InvalidInputError', (distance) => {
    expect(() => computePerKm(5200, distance)).toThrow(InvalidInputError);
  });

  it('rejects a rate that overflows to Infinity', () => {
    expect(() => computePerKm(Number.MAX_VALUE, 0.5)).toThrow(new InvalidInputError('Fare per km is too large to record'));
  });
});

describe('computePerHour', () => {
  it('converts minutes to hours before dividing', () => {
    expect(computePerHour(5200, 28)).toBeCloseTo(5200 / (28 / 60), 10);
    expect(computePerHour(3000, 60)).toBe(3000);
    expect(computePerHour(1500, 30)).toBe(3000);
  });

  it('returns 11142.86 per hour for 5200 over 28 minutes', () => {
    expect(computePerHour(5200, 28)).toBeCloseTo(11142.86, 2);
  });

  it.each([0, -5])('rejects duration %p with InvalidInputError', (duration) => {
    expect(() => computePerHour(5200, duration)).toThrow(InvalidInputError);
  });

  it('rejects a rate that overflows to Infinity', () => {
    expect(() => computePerHour(Number.MAX_VALUE, 1)).toThrow('Fare per hour is too large to record');
  });

  it('reports the offending field in the error details', () => {
    let caught: unknown;
    try {
      computePerHour(100, 0);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(InvalidInputError);
    if (caught instanceof InvalidInputError) {
      expect(caught.details).toEqual({ durationMinutes: 0 });
      expect(caught.message).toBe('durationMinutes must be greater than 0');
    }
  });
});

describe('meetsGoal', () => {
  it('is true at or above the goal', () => {
    expect(meetsGoal(350, 350)).toBe(true);
    expect(meetsGoal(371.43, 350)).toBe(true);
  });

  it('is false below the goal', () => {
    expect(meetsGoal(349.99, 350)).toBe(false);
    expect(meetsGoal(0, 350)).toBe(false);
  });

  it('uses the threshold it is given', () => {
    expect(meetsGoal(371.43, 400)).toBe(false);
    expect(meetsGoal(371.43, 300)).toBe(true);
  });
});
