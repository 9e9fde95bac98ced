/**
 * =============================================================================
 * RIDE PROFIT TRACKER - MAIN SERVER
 * =============================================================================
 *
 * Telegram bot backend. Drivers report each trip with
 * `/add FARE KM MINUTES` and get back what it paid per km and per hour.
 *
 * MODULES:
 * ┌─────────────────────────────────────────────────────────────────────────┐
 * │ METRICS    │ per-km / per-hour arithmetic, goal check                  │
 * │ TRIP       │ SQLite trips table, daily & weekly aggregates             │
 * │ COMMANDS   │ /start /add /stats /week /reset handlers + formatting     │
 * │ TELEGRAM   │ Webhook endpoint, replies with sendMessage                │
 * └─────────────────────────────────────────────────────────────────────────┘
 *
 * STARTUP ORDER:
 *   config (fatal if invalid) -> logger -> database -> context -> HTTP
 *
 * =============================================================================
 */

import { createServer } from 'http';
import { createApp } from './app';
import { loadConfig, type AppConfig } from './config/environment';
import { createAppContext } from './core/context';
import { ConfigurationError } from './core/errors/AppError';
import { SqliteTripStore } from './modules/trip/trip.repository';
import { closeDatabase, openDatabase, type SqliteDatabase } from './shared/database/db';
import { configureLogger, logger } from './shared/services/logger.service';

const processStartedAtMs = Date.now();

function processUptimeSec(): number {
  return (Date.now() - processStartedAtMs) / 1000;
}

// =============================================================================
// CONFIGURATION (Fail fast if config is invalid)
// =============================================================================
function loadConfigOrExit(): AppConfig {
  try {
    return loadConfig();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      logger.error(`❌ ${error.message}`);
    } else {
      logger.error('❌ Failed to load configuration', { error: error instanceof Error ? error.message : String(error) });
    }
    process.exit(1);
  }
}

function openDatabaseOrExit(config: AppConfig): SqliteDatabase {
  try {
    return openDatabase(config.database.path);
  } catch (error) {
    logger.error('❌ Could not open the trips database', {
      path: config.database.path,
      error: error instanceof Error ? error.message : String(error)
    });
    process.exit(1);
  }
}

function bootstrap(): void {
  const config = loadConfigOrExit();
  configureLogger(config);

  const db = openDatabaseOrExit(config);
  const ctx = createAppContext({ store: new SqliteTripStore(db), config });

  const app = createApp({ ctx, config, uptimeSec: processUptimeSec });
  const server = createServer(app);

  server.listen(config.port, () => {
    server.timeout = 30000;           // 30s max request time
    server.keepAliveTimeout = 65000;  // 65s > typical proxy idle timeout
    server.headersTimeout = 66000;    // 66s > keepAliveTimeout

    logger.info('🚗 Ride Profit Tracker started', {
      port: config.port,
      environment: config.nodeEnv,
      goalPerKm: config.goalPerKm,
      webhookVerification: config.telegram.webhookSecret ? 'on' : 'off'
    });
  });

  // ===========================================================================
  // GRACEFUL SHUTDOWN
  // ===========================================================================
  const gracefulShutdown = (signal: NodeJS.Signals) => {
    logger.info(`${signal} received. Starting graceful shutdown...`);

    server.close(() => {
      logger.info('HTTP server closed');

      try {
        closeDatabase(db);
      } catch (err) {
        logger.error('Error closing database connection', {
          error: err instanceof Error ? err.message : String(err)
        });
      }

      logger.info('Graceful shutdown complete');
      process.exit(0);
    });

    // Force shutdown after 10 seconds
    setTimeout(() => {
      logger.error('Forced shutdown after timeout');
      process.exit(1);
    }, 10000).unref();
  };

  process.on('SIGTERM', gracefulShutdown);
  process.on('SIGINT', gracefulShutdown);

  // Handle uncaught errors
  process.on('uncaughtException', (error) => {
    logger.error('Uncaught exception', { error: error.message, stack: error.stack });
    process.exit(1);
  });
}

bootstrap();
