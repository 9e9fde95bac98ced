/**
 * Migration 001: Trips Table
 *
 * One row per reported trip. per_km / per_hour are frozen at insert time.
 * `date` is the local calendar day (YYYY-MM-DD) and is the aggregation key.
 */

import type Database from 'better-sqlite3';
import { logger } from '../../services/logger.service';

export const TRIPS_SCHEMA_SQL = `
-- =============================================================================
-- trips: one row per completed ride
-- =============================================================================

CREATE TABLE IF NOT EXISTS trips (
  id         INTEGER PRIMARY KEY AUTOINCREMENT,
  user_id    INTEGER NOT NULL,
  user_name  TEXT,
  tariff     REAL    NOT NULL,
  distance   REAL    NOT NULL CHECK (distance > 0),
  duration   INTEGER NOT NULL CHECK (duration > 0),
  per_km     REAL    NOT NULL,
  per_hour   REAL    NOT NULL,
  timestamp  TEXT    NOT NULL,
  date       TEXT    NOT NULL    -- YYYY-MM-DD format
);

CREATE INDEX IF NOT EXISTS idx_trips_user_date
  ON trips(user_id, date);
`;

export const ROLLBACK_SQL = `
DROP INDEX IF EXISTS idx_trips_user_date;
DROP TABLE IF EXISTS trips;
`;

export function up(db: Database.Database): void {
  logger.info('Running migration 001_create_trips');
  db.exec(TRIPS_SCHEMA_SQL);
  logger.info('Migration 001_create_trips completed');
}

export function down(db: Database.Database): void {
  logger.info('Reverting migration 001_create_trips');
  db.exec(ROLLBACK_SQL);
  logger.info('Migration 001_create_trips reverted');
}
