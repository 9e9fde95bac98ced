/**
 * =============================================================================
 * TRIP MODULE - SQLITE REPOSITORY
 * =============================================================================
 *
 * TripStore backed by the `trips` table.
 *
 * - Rows are append-only; the only mutation is deleteTripsForDate
 * - Every query filters by user_id
 * - Aggregates average the stored per_km values (AVG(per_km)), never
 *   SUM(tariff) / SUM(distance)
 * - Driver errors surface as PersistenceError
 * =============================================================================
 */

import { z } from 'zod';
import { PersistenceError } from '../../core/errors/AppError';
import type { SqliteDatabase } from '../../shared/database/db';
import { logger } from '../../shared/services/logger.service';
import { formatLocalDate } from '../../shared/utils/date.utils';
import { computePerHour, computePerKm } from '../metrics/metrics.service';
import { EMPTY_AGGREGATE, type NewTripInput, type Trip, type TripAggregate, type TripStore } from './trip.types';

// =============================================================================
// ROW SCHEMAS
// =============================================================================

const tripRowSchema = z.object({
  id: z.number().int(),
  user_id: z.number().int(),
  user_name: z.string().nullable(),
  tariff: z.number(),
  distance: z.number(),
  duration: z.number().int(),
  per_km: z.number(),
  per_hour: z.number(),
  timestamp: z.string(),
  date: z.string()
});

type TripRow = z.infer<typeof tripRowSchema>;

const aggregateRowSchema = z.object({
  trip_count: z.number().int(),
  total_tariff: z.number(),
  total_distance: z.number(),
  avg_per_km: z.number()
});

const pingRowSchema = z.object({ ok: z.literal(1) });

function mapTripRow(row: TripRow): Trip {
  return {
    id: row.id,
    userId: row.user_id,
    userName: row.user_name,
    tariff: row.tariff,
    distance: row.distance,
    duration: row.duration,
    perKm: row.per_km,
    perHour: row.per_hour,
    timestamp: row.timestamp,
    date: row.date
  };
}

// =============================================================================
// SQL
// =============================================================================

const AGGREGATE_COLUMNS = `
  COUNT(*)                   AS trip_count,
  COALESCE(SUM(tariff), 0)   AS total_tariff,
  COALESCE(SUM(distance), 0) AS total_distance,
  COALESCE(AVG(per_km), 0)   AS avg_per_km
`;

const SQL = {
  insert: `
    INSERT INTO trips (user_id, user_name, tariff, distance, duration, per_km, per_hour, timestamp, date)
    VALUES (@userId, @userName, @tariff, @distance, @duration, @perKm, @perHour, @timestamp, @date)
  `,
  dailyStats: `SELECT ${AGGREGATE_COLUMNS} FROM trips WHERE user_id = ? AND date = ?`,
  rangeStats: `SELECT ${AGGREGATE_COLUMNS} FROM trips WHERE user_id = ? AND date BETWEEN ? AND ?`,
  deleteForDate: 'DELETE FROM trips WHERE user_id = ? AND date = ?',
  listForDate: 'SELECT * FROM trips WHERE user_id = ? AND date = ? ORDER BY id ASC',
  ping: 'SELECT 1 AS ok'
} as const;

// =============================================================================
// REPOSITORY
// =============================================================================

export class SqliteTripStore implements TripStore {
  constructor(private readonly db: SqliteDatabase) {}

  insertTrip(input: NewTripInput, now: Date): Trip {
    // Calculator errors (InvalidInputError) pass through untouched
    const perKm = computePerKm(input.tariff, input.distance);
    const perHour = computePerHour(input.tariff, input.duration);
    const timestamp = now.toISOString();
    const date = formatLocalDate(now);

    const result = this.run('insertTrip', () =>
      this.db.prepare(SQL.insert).run({
        userId: input.userId,
        userName: input.userName,
        tariff: input.tariff,
        distance: input.distance,
        duration: input.duration,
        perKm,
        perHour,
        timestamp,
        date
      })
    );

    const trip: Trip = {
      id: Number(result.lastInsertRowid),
      userId: input.userId,
      userName: input.userName,
      tariff: input.tariff,
      distance: input.distance,
      duration: input.duration,
      perKm,
      perHour,
      timestamp,
      date
    };

    logger.info('Trip recorded', {
      tripId: trip.id,
      userId: trip.userId,
      tariff: trip.tariff,
      distance: trip.distance,
      duration: trip.duration
    });

    return trip;
  }

  getDailyStats(userId: number, date: string): TripAggregate {
    return this.aggregate('getDailyStats', SQL.dailyStats, [userId, date]);
  }

  getWeeklyStats(userId: number, startDate: string, endDate: string): TripAggregate {
    return this.aggregate('getWeeklyStats', SQL.rangeStats, [userId, startDate, endDate]);
  }

  deleteTripsForDate(userId: number, date: string): number {
    const result = this.run('deleteTripsForDate', () =>
      this.db.prepare(SQL.deleteForDate).run(userId, date)
    );

    logger.info('Trips deleted for date', { userId, date, deleted: result.changes });
    return result.changes;
  }

  listTripsForDate(userId: number, date: string): Trip[] {
    const rows = this.run('listTripsForDate', () =>
      this.db.prepare(SQL.listForDate).all(userId, date)
    );
    return rows.map(row => mapTripRow(this.parseRow('listTripsForDate', tripRowSchema, row)));
  }

  ping(): boolean {
    try {
      return pingRowSchema.safeParse(this.db.prepare(SQL.ping).get()).success;
    } catch (error) {
      logger.warn('Database ping failed', { error: error instanceof Error ? error.message : String(error) });
      return false;
    }
  }

  // ---------------------------------------------------------------------------

  private aggregate(operation: string, sql: string, params: Array<number | string>): TripAggregate {
    const row = this.run(operation, () => this.db.prepare(sql).get(...params));
    const parsed = this.parseRow(operation, aggregateRowSchema, row);

    if (parsed.trip_count === 0) {
      return { ...EMPTY_AGGREGATE };
    }

    return {
      tripCount: parsed.trip_count,
      totalTariff: parsed.total_tariff,
      totalDistance: parsed.total_distance,
      avgPerKm: parsed.avg_per_km
    };
  }

  private run<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      throw new PersistenceError(`Trip store ${operation} failed`, error);
    }
  }

  private parseRow<T>(operation: string, schema: z.ZodType<T>, row: unknown): T {
    const parsed = schema.safeParse(row);
    if (!parsed.success) {
      throw new PersistenceError(`Trip store ${operation} returned an unexpected row`, parsed.error);
    }
    return parsed.data;
  }
}
