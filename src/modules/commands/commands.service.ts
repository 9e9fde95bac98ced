/**
 * =============================================================================
 * COMMANDS MODULE - SERVICE
 * =============================================================================
 *
 * One handler per bot command. Each handler:
 *   parse/validate raw args -> calculator -> trip store -> result object
 *
 * Handlers keep no state between calls; everything they need arrives in the
 * AppContext. Every error is converted into a CommandFailure here, so nothing
 * thrown by the core reaches the transport.
 * =============================================================================
 */

import { BotCommand, ErrorCode, RESET_CONFIRMATION_TOKEN } from '../../core/constants';
import type { AppContext } from '../../core/context';
import { AppError, isParseError, isPersistenceError, isValidationError } from '../../core/errors/AppError';
import { formatLocalDate, getTrailingWeek } from '../../shared/utils/date.utils';
import { meetsGoal } from '../metrics/metrics.service';
import { parseAddArguments, parseResetArgument } from './commands.schema';
import type {
  AddResult,
  CommandFailure,
  CommandFailureKind,
  CommandInvocation,
  CommandResult,
  ResetResult,
  StartResult,
  StatsResult
} from './commands.types';

// =============================================================================
// ERROR CONVERSION
// =============================================================================

function classifyError(error: unknown): CommandFailureKind {
  if (isParseError(error)) return 'parse';
  if (isValidationError(error)) return 'validation';
  if (isPersistenceError(error)) return 'persistence';
  return 'internal';
}

export function toCommandFailure(command: string, error: unknown): CommandFailure {
  const kind = classifyError(error);

  return {
    ok: false,
    command,
    error: {
      kind,
      code: error instanceof AppError ? error.code : ErrorCode.INTERNAL_ERROR,
      message: error instanceof Error ? error.message : 'Unexpected error'
    },
    cause: error
  };
}

function guard<T extends CommandResult>(command: BotCommand, handler: () => T): T | CommandFailure {
  try {
    return handler();
  } catch (error) {
    return toCommandFailure(command, error);
  }
}

// =============================================================================
// HANDLERS
// =============================================================================

export const commandService = {

  start(ctx: AppContext): StartResult {
    return { ok: true, command: BotCommand.START, goalPerKm: ctx.goalPerKm };
  },

  /**
   * /add FARE KM MINUTES
   */
  add(ctx: AppContext, invocation: CommandInvocation): AddResult | CommandFailure {
    return guard(BotCommand.ADD, (): AddResult => {
      const input = parseAddArguments(invocation.args);

      const trip = ctx.store.insertTrip(
        {
          userId: invocation.userId,
          userName: invocation.userName,
          tariff: input.tariff,
          distance: input.distance,
          duration: input.duration
        },
        ctx.clock()
      );

      return {
        ok: true,
        command: BotCommand.ADD,
        input,
        trip,
        perKm: trip.perKm,
        perHour: trip.perHour,
        goalPerKm: ctx.goalPerKm,
        goalMet: meetsGoal(trip.perKm, ctx.goalPerKm)
      };
    });
  },

  /**
   * /stats - today's aggregate
   */
  stats(ctx: AppContext, invocation: CommandInvocation): StatsResult | CommandFailure {
    return guard(BotCommand.STATS, (): StatsResult => {
      const today = formatLocalDate(ctx.clock());
      const aggregate = ctx.store.getDailyStats(invocation.userId, today);

      return {
        ok: true,
        command: BotCommand.STATS,
        period: { startDate: today, endDate: today },
        aggregate,
        goalPerKm: ctx.goalPerKm,
        goalMet: meetsGoal(aggregate.avgPerKm, ctx.goalPerKm)
      };
    });
  },

  /**
   * /week - trailing 7 calendar days, today included
   */
  week(ctx: AppContext, invocation: CommandInvocation): StatsResult | CommandFailure {
    return guard(BotCommand.WEEK, (): StatsResult => {
      const period = getTrailingWeek(formatLocalDate(ctx.clock()));
      const aggregate = ctx.store.getWeeklyStats(invocation.userId, period.startDate, period.endDate);

      return {
        ok: true,
        command: BotCommand.WEEK,
        period,
        aggregate,
        goalPerKm: ctx.goalPerKm,
        goalMet: meetsGoal(aggregate.avgPerKm, ctx.goalPerKm)
      };
    });
  },

  /**
   * /reset confirm - delete today's trips. Without the token nothing is touched.
   */
  reset(ctx: AppContext, invocation: CommandInvocation): ResetResult | CommandFailure {
    return guard(BotCommand.RESET, (): ResetResult => {
      if (parseResetArgument(invocation.args) !== RESET_CONFIRMATION_TOKEN) {
        return { ok: true, command: BotCommand.RESET, status: 'confirmation_required' };
      }

      const date = formatLocalDate(ctx.clock());
      const deletedCount = ctx.store.deleteTripsForDate(invocation.userId, date);

      return { ok: true, command: BotCommand.RESET, status: 'deleted', date, deletedCount };
    });
  },

  /**
   * Route a command name to its handler
   */
  execute(ctx: AppContext, commandName: string, invocation: CommandInvocation): CommandResult {
    switch (commandName.toLowerCase()) {
      case BotCommand.START:
        return this.start(ctx);
      case BotCommand.ADD:
        return this.add(ctx, invocation);
      case BotCommand.STATS:
        return this.stats(ctx, invocation);
      case BotCommand.WEEK:
        return this.week(ctx, invocation);
      case BotCommand.RESET:
        return this.reset(ctx, invocation);
      default:
        return {
          ok: false,
          command: commandName,
          error: {
            kind: 'unknown_command',
            code: ErrorCode.COMMAND_UNKNOWN,
            message: `Unknown command: ${commandName}`
          }
        };
    }
  }
};
