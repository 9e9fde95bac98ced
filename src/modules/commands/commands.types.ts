/**
 * =============================================================================
 * COMMANDS MODULE - RESULT TYPES
 * =============================================================================
 *
 * Handlers never throw; they return one of these. The message formatter
 * renders them, the transport sends them.
 * =============================================================================
 */

import type { BotCommand } from '../../core/constants';
import type { DateRange } from '../../shared/utils/date.utils';
import type { Trip, TripAggregate } from '../trip/trip.types';
import type { AddTripPayload } from './commands.schema';

/**
 * Who issued the command and with what raw argument text
 */
export interface CommandInvocation {
  userId: number;
  userName: string | null;
  /** Everything after the command name, untouched */
  args: string;
}

export interface StartResult {
  ok: true;
  command: BotCommand.START;
  goalPerKm: number;
}

export interface AddResult {
  ok: true;
  command: BotCommand.ADD;
  input: AddTripPayload;
  trip: Trip;
  perKm: number;
  perHour: number;
  goalPerKm: number;
  goalMet: boolean;
}

export interface StatsResult {
  ok: true;
  command: BotCommand.STATS | BotCommand.WEEK;
  period: DateRange;
  aggregate: TripAggregate;
  goalPerKm: number;
  goalMet: boolean;
}

export type ResetResult =
  | { ok: true; command: BotCommand.RESET; status: 'confirmation_required' }
  | { ok: true; command: BotCommand.RESET; status: 'deleted'; date: string; deletedCount: number };

export type CommandFailureKind = 'parse' | 'validation' | 'persistence' | 'unknown_command' | 'internal';

export interface CommandFailure {
  ok: false;
  command: string;
  error: {
    kind: CommandFailureKind;
    code: string;
    message: string;
  };
  /** Original error, for transport-side logging only */
  cause?: unknown;
}

export type CommandResult = StartResult | AddResult | StatsResult | ResetResult | CommandFailure;
