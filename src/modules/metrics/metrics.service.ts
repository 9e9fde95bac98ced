/**
 * =============================================================================
 * METRICS MODULE - SERVICE
 * =============================================================================
 *
 * Profitability arithmetic for a single trip.
 *
 * - per km:   tariff / distance
 * - per hour: tariff / (minutes / 60)
 * - goal:     perKm >= goalPerKm
 *
 * Plain floating point, no rounding. Formatting belongs to the message layer.
 * A rate that overflows to Infinity is rejected like a bad divisor.
 * =============================================================================
 */

import { MINUTES_PER_HOUR } from '../../core/constants';
import { InvalidInputError } from '../../core/errors/AppError';

function assertPositiveDivisor(name: string, value: number): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new InvalidInputError(`${name} must be greater than 0`, { [name]: value });
  }
}

function assertFiniteRate(label: string, rate: number): number {
  if (!Number.isFinite(rate)) {
    throw new InvalidInputError(`Fare ${label} is too large to record`, { rate: String(rate) });
  }
  return rate;
}

/**
 * Fare earned per kilometer driven
 */
export function computePerKm(tariff: number, distance: number): number {
  assertPositiveDivisor('distance', distance);
  return assertFiniteRate('per km', tariff / distance);
}

/**
 * Fare earned per hour, from a duration in minutes
 */
export function computePerHour(tariff: number, durationMinutes: number): number {
  assertPositiveDivisor('durationMinutes', durationMinutes);
  return assertFiniteRate('per hour', tariff / (durationMinutes / MINUTES_PER_HOUR));
}

export function meetsGoal(perKm: number, goalPerKm: number): boolean {
  return perKm >= goalPerKm;
}
