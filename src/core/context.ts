/**
 * =============================================================================
 * APPLICATION CONTEXT
 * =============================================================================
 *
 * Everything a command handler needs, built once at startup and passed into
 * each invocation: the trip store, the goal threshold and a clock.
 * =============================================================================
 */

import type { AppConfig } from '../config/environment';
import type { TripStore } from '../modules/trip/trip.types';

export interface AppContext {
  readonly store: TripStore;
  /** Fare-per-km goal */
  readonly goalPerKm: number;
  /** Source of "now"; today's date is derived from it */
  readonly clock: () => Date;
}

export function createAppContext(deps: {
  store: TripStore;
  config: Pick<AppConfig, 'goalPerKm'>;
  clock?: () => Date;
}): AppContext {
  return Object.freeze({
    store: deps.store,
    goalPerKm: deps.config.goalPerKm,
    clock: deps.clock ?? (() => new Date())
  });
}
