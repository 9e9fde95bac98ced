/**
 * =============================================================================
 * DATABASE SERVICE - SQLite File Storage
 * =============================================================================
 *
 * Opens the SQLite file that holds the `trips` table and applies migrations.
 * better-sqlite3 is synchronous, so every store call completes (or throws)
 * before the command that issued it returns.
 *
 * Pass ':memory:' for an in-process database (tests).
 * =============================================================================
 */

import * as fs from 'fs';
import * as path from 'path';
import Database from 'better-sqlite3';
import { PersistenceError } from '../../core/errors/AppError';
import { logger } from '../services/logger.service';
import * as createTrips from './migrations/001_create_trips';

export const IN_MEMORY_DATABASE = ':memory:';

export type SqliteDatabase = Database.Database;

/**
 * Migrations in the order they are applied
 */
const MIGRATIONS: ReadonlyArray<{ name: string; up: (db: SqliteDatabase) => void }> = [
  { name: '001_create_trips', up: createTrips.up }
];

/**
 * Open (and create if needed) the database file, then run migrations
 */
export function openDatabase(dbPath: string): SqliteDatabase {
  try {
    if (dbPath !== IN_MEMORY_DATABASE) {
      fs.mkdirSync(path.dirname(path.resolve(dbPath)), { recursive: true });
    }

    const db = new Database(dbPath);
    db.pragma('journal_mode = WAL');

    for (const migration of MIGRATIONS) {
      migration.up(db);
    }

    logger.info('Database initialized', { path: dbPath, migrations: MIGRATIONS.length });
    return db;
  } catch (error) {
    throw new PersistenceError(`Failed to open database at ${dbPath}`, error);
  }
}

export function closeDatabase(db: SqliteDatabase): void {
  if (db.open) {
    db.close();
    logger.info('Database connection closed');
  }
}
