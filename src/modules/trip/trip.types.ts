/**
 * =============================================================================
 * TRIP MODULE - TYPES
 * =============================================================================
 */

/**
 * A stored trip. perKm / perHour are frozen at insert time.
 */
export interface Trip {
  id: number;
  userId: number;
  userName: string | null;
  /** Fare, currency-agnostic */
  tariff: number;
  /** Kilometers */
  distance: number;
  /** Minutes */
  duration: number;
  perKm: number;
  perHour: number;
  /** ISO-8601 instant of insertion */
  timestamp: string;
  /** Local calendar date of `timestamp`, YYYY-MM-DD */
  date: string;
}

export interface NewTripInput {
  userId: number;
  userName: string | null;
  tariff: number;
  distance: number;
  duration: number;
}

/**
 * Count / sum / mean summary over a day or a date range.
 * avgPerKm is the mean of the stored per-trip values, 0 when there are no trips.
 */
export interface TripAggregate {
  tripCount: number;
  totalTariff: number;
  totalDistance: number;
  avgPerKm: number;
}

export const EMPTY_AGGREGATE: Readonly<TripAggregate> = Object.freeze({
  tripCount: 0,
  totalTariff: 0,
  totalDistance: 0,
  avgPerKm: 0
});

/**
 * Persistence contract. Every operation is scoped to one user.
 * Implementations throw PersistenceError on storage faults.
 */
export interface TripStore {
  insertTrip(input: NewTripInput, now: Date): Trip;
  getDailyStats(userId: number, date: string): TripAggregate;
  /** Inclusive on both ends */
  getWeeklyStats(userId: number, startDate: string, endDate: string): TripAggregate;
  deleteTripsForDate(userId: number, date: string): number;
  /** Insertion order */
  listTripsForDate(userId: number, date: string): Trip[];
  ping(): boolean;
}
