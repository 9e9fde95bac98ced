/**
 * =============================================================================
 * COMMAND HANDLERS — Unit Tests
 * =============================================================================
 *
 * Handlers run against a real in-memory trip store with a fixed clock,
 * except where a scripted store is needed to observe or break storage calls.
 * =============================================================================
 */

import { BotCommand, ErrorCode } from '../core/constants';
import { createAppContext, type AppContext } from '../core/context';
import { PersistenceError } from '../core/errors/AppError';
import { commandService, toCommandFailure } from '../modules/commands/commands.service';
import type { CommandInvocation } from '../modules/commands/commands.types';
import { SqliteTripStore } from '../modules/trip/trip.repository';
import { EMPTY_AGGREGATE, type TripStore } from '../modules/trip/trip.types';
import { closeDatabase, IN_MEMORY_DATABASE, openDatabase, type SqliteDatabase } from '../shared/database/db';

jest.mock('../shared/services/logger.service', () => ({
  logger: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  },
}));

const DRIVER = 4242;
const TODAY = new Date(2026, 9, 19, 14, 0);

const invocation = (args = '', userId = DRIVER): CommandInvocation => ({ userId, userName: 'driver', args });

function scriptedStore(): jest.Mocked<TripStore> {
  return {
    insertTrip: jest.fn(),
    getDailyStats: jest.fn().mockReturnValue({ ...EMPTY_AGGREGATE }),
    getWeeklyStats: jest.fn().mockReturnValue({ ...EMPTY_AGGREGATE }),
    deleteTripsForDate: jest.fn().mockReturnValue(0),
    listTripsForDate: jest.fn().mockReturnValue([]),
    ping: jest.fn().mockReturnValue(true)
  };
}

describe('commandService', () => {
  let db: SqliteDatabase;
  let store: SqliteTripStore;
  let ctx: AppContext;

  beforeEach(() => {
    db = openDatabase(IN_MEMORY_DATABASE);
    store = new SqliteTripStore(db);
    ctx = createAppContext({ store, config: { goalPerKm: 350 }, clock: () => TODAY });
  });

  afterEach(() => {
    closeDatabase(db);
  });

  // ===========================================================================
  // /start
  // ===========================================================================

  describe('start', () => {
    it('reports the configured goal', () => {
      expect(commandService.start(ctx)).toEqual({ ok: true, command: BotCommand.START, goalPerKm: 350 });
    });
  });

  // ===========================================================================
  // /add
  // ===========================================================================

  describe('add', () => {
    it('records a profitable trip', () => {
      const result = commandService.add(ctx, invocation('5200 14 28'));

      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.input).toEqual({ tariff: 5200, distance: 14, duration: 28 });
        expect(result.perKm).toBeCloseTo(371.43, 2);
        expect(result.perHour).toBeCloseTo(11142.86, 2);
        expect(result.goalMet).toBe(true);
        expect(result.goalPerKm).toBe(350);
        expect(result.trip.date).toBe('2026-10-19');
        expect(result.trip.userName).toBe('driver');
      }

      expect(store.listTripsForDate(DRIVER, '2026-10-19')).toHaveLength(1);
    });

    it('flags a trip below the goal', () => {
      const result = commandService.add(ctx, invocation('3000 10 20'));

      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.perKm).toBe(300);
        expect(result.perHour).toBeCloseTo(9000, 6);
        expect(result.goalMet).toBe(false);
      }
    });

    it('accepts decimal fare and distance', () => {
      const result = commandService.add(ctx, invocation('  5000   14.5  27 '));

      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.input).toEqual({ tariff: 5000, distance: 14.5, duration: 27 });
      }
    });

    it.each([
      ['', 'Expected 3 values, got 0'],
      ['5200 14', 'Expected 3 values, got 2'],
      ['5200 14 28 9', 'Expected 3 values, got 4'],
      ['abc 14 28', 'fare must be a number'],
      ['5200 14 28.5', 'duration must be a whole number of minutes']
    ])('returns a parse failure for %p', (args, message) => {
      expect(commandService.add(ctx, invocation(args))).toEqual({
        ok: false,
        command: BotCommand.ADD,
        error: { kind: 'parse', code: ErrorCode.COMMAND_PARSE_ERROR, message },
        cause: expect.anything()
      });
      expect(store.listTripsForDate(DRIVER, '2026-10-19')).toEqual([]);
    });

    it.each([
      ['5200 0 28', 'Distance must be greater than 0'],
      ['5200 14 0', 'Duration must be greater than 0'],
      ['0 14 28', 'Fare must be greater than 0'],
      ['5200 -3 28', 'Distance must be greater than 0']
    ])('returns a validation failure for %p and stores nothing', (args, message) => {
      const result = commandService.add(ctx, invocation(args));

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe('validation');
        expect(result.error.code).toBe(ErrorCode.VALIDATION_ERROR);
        expect(result.error.message).toBe(message);
      }
      expect(store.listTripsForDate(DRIVER, '2026-10-19')).toEqual([]);
    });
  });

  describe('add with oversized values', () => {
    it('rejects a fare per km that overflows and stores nothing', () => {
      const hugeFare = '9'.repeat(300);
      const result = commandService.add(ctx, invocation(`${hugeFare} 0.0000000001 28`));

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toEqual({
          kind: 'validation',
          code: ErrorCode.VALIDATION_INVALID_INPUT,
          message: 'Fare per km is too large to record'
        });
      }
      expect(store.listTripsForDate(DRIVER, '2026-10-19')).toEqual([]);

      const stats = commandService.stats(ctx, invocation());
      expect(stats.ok && stats.aggregate.avgPerKm).toBe(0);
    });

    it('names the field when a value is not representable', () => {
      const result = commandService.add(ctx, invocation(`${'9'.repeat(400)} 14 28`));

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe('validation');
        expect(result.error.message).toBe('Fare is too large');
      }
    });
  });

  // ===========================================================================
  // /stats
  // ===========================================================================

  describe('stats', () => {
    it('returns zeros and goalMet false before any trip', () => {
      expect(commandService.stats(ctx, invocation())).toEqual({
        ok: true,
        command: BotCommand.STATS,
        period: { startDate: '2026-10-19', endDate: '2026-10-19' },
        aggregate: { tripCount: 0, totalTariff: 0, totalDistance: 0, avgPerKm: 0 },
        goalPerKm: 350,
        goalMet: false
      });
    });

    it('aggregates today\'s trips with the mean of per-trip values', () => {
      const reports = ['5200 14 28', '4800 13 25', '6000 16 30', '5000 14.5 27', '5000 13 24'];
      for (const args of reports) {
        commandService.add(ctx, invocation(args));
      }

      const result = commandService.stats(ctx, invocation());

      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.aggregate.tripCount).toBe(5);
        expect(result.aggregate.totalTariff).toBe(26000);
        expect(result.aggregate.totalDistance).toBeCloseTo(70.5, 10);
        expect(result.aggregate.avgPerKm).toBeCloseTo(369.02, 2);
        expect(result.goalMet).toBe(true);
      }
    });

    it('ignores other drivers', () => {
      commandService.add(ctx, invocation('9000 10 20', 1));

      const result = commandService.stats(ctx, invocation());
      expect(result.ok && result.aggregate.tripCount).toBe(0);
    });
  });

  // ===========================================================================
  // /week
  // ===========================================================================

  describe('week', () => {
    it('covers today and the six days before it', () => {
      const atDay = (day: number) =>
        createAppContext({ store, config: { goalPerKm: 350 }, clock: () => new Date(2026, 9, day, 9) });

      commandService.add(atDay(12), invocation('1000 1 10'));
      commandService.add(atDay(13), invocation('400 1 10'));
      commandService.add(atDay(19), invocation('300 1 10'));

      const result = commandService.week(ctx, invocation());

      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.command).toBe(BotCommand.WEEK);
        expect(result.period).toEqual({ startDate: '2026-10-13', endDate: '2026-10-19' });
        expect(result.aggregate.tripCount).toBe(2);
        expect(result.aggregate.totalTariff).toBe(700);
        expect(result.aggregate.avgPerKm).toBe(350);
        expect(result.goalMet).toBe(true);
      }
    });

    it('asks the store for the trailing window', () => {
      const scripted = scriptedStore();
      const scriptedCtx = createAppContext({ store: scripted, config: { goalPerKm: 350 }, clock: () => new Date(2026, 0, 3, 9) });

      commandService.week(scriptedCtx, invocation());

      expect(scripted.getWeeklyStats).toHaveBeenCalledWith(DRIVER, '2025-12-28', '2026-01-03');
    });
  });

  // ===========================================================================
  // /reset
  // ===========================================================================

  describe('reset', () => {
    it.each(['', 'yes', 'now please'])('asks for confirmation on %p without touching the store', (args) => {
      const scripted = scriptedStore();
      const scriptedCtx = createAppContext({ store: scripted, config: { goalPerKm: 350 }, clock: () => TODAY });

      expect(commandService.reset(scriptedCtx, invocation(args))).toEqual({
        ok: true,
        command: BotCommand.RESET,
        status: 'confirmation_required'
      });
      expect(scripted.deleteTripsForDate).not.toHaveBeenCalled();
    });

    it('deletes today\'s trips when confirmed', () => {
      commandService.add(ctx, invocation('5200 14 28'));
      commandService.add(ctx, invocation('4800 13 25'));

      expect(commandService.reset(ctx, invocation('confirm'))).toEqual({
        ok: true,
        command: BotCommand.RESET,
        status: 'deleted',
        date: '2026-10-19',
        deletedCount: 2
      });

      const stats = commandService.stats(ctx, invocation());
      expect(stats.ok && stats.aggregate.tripCount).toBe(0);
    });

    it('accepts the confirmation token in any case', () => {
      const scripted = scriptedStore();
      const scriptedCtx = createAppContext({ store: scripted, config: { goalPerKm: 350 }, clock: () => TODAY });

      commandService.reset(scriptedCtx, invocation('CONFIRM'));

      expect(scripted.deleteTripsForDate).toHaveBeenCalledWith(DRIVER, '2026-10-19');
    });
  });

  // ===========================================================================
  // Failures and routing
  // ===========================================================================

  describe('storage failures', () => {
    it('turns a PersistenceError into a persistence failure', () => {
      const scripted = scriptedStore();
      scripted.getDailyStats.mockImplementation(() => {
        throw new PersistenceError('Trip store getDailyStats failed', new Error('disk I/O error'));
      });
      const scriptedCtx = createAppContext({ store: scripted, config: { goalPerKm: 350 }, clock: () => TODAY });

      const result = commandService.stats(scriptedCtx, invocation());

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toEqual({
          kind: 'persistence',
          code: ErrorCode.DATABASE_ERROR,
          message: 'Trip store getDailyStats failed'
        });
        expect(result.cause).toBeInstanceOf(PersistenceError);
      }
    });

    it('reports a closed database as a persistence failure', () => {
      closeDatabase(db);

      const result = commandService.add(ctx, invocation('5200 14 28'));
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe('persistence');
      }
    });
  });

  describe('toCommandFailure', () => {
    it('classifies unexpected errors as internal', () => {
      expect(toCommandFailure('stats', new TypeError('boom')).error).toEqual({
        kind: 'internal',
        code: ErrorCode.INTERNAL_ERROR,
        message: 'boom'
      });
      expect(toCommandFailure('stats', 'not an error').error.message).toBe('Unexpected error');
    });
  });

  describe('execute', () => {
    it('routes command names case-insensitively', () => {
      expect(commandService.execute(ctx, 'START', invocation())).toEqual({
        ok: true,
        command: BotCommand.START,
        goalPerKm: 350
      });
    });

    it('returns an unknown-command failure for anything else', () => {
      expect(commandService.execute(ctx, 'help', invocation())).toEqual({
        ok: false,
        command: 'help',
        error: {
          kind: 'unknown_command',
          code: ErrorCode.COMMAND_UNKNOWN,
          message: 'Unknown command: help'
        }
      });
    });
  });
});
