/**
 * =============================================================================
 * COMMANDS MODULE - MESSAGE FORMATTER
 * =============================================================================
 *
 * Renders command results as Telegram (legacy) Markdown.
 * The only place numbers get rounded.
 * =============================================================================
 */

import { BotCommand } from '../../core/constants';
import { ADD_EXAMPLE, ADD_USAGE } from './commands.schema';
import type { AddResult, CommandFailure, CommandResult, ResetResult, StartResult, StatsResult } from './commands.types';

const wholeNumber = new Intl.NumberFormat('en-US', { maximumFractionDigits: 0 });

/** $5,200 */
export const formatMoney = (amount: number): string => `$${wholeNumber.format(amount)}`;

/** 14.0 km */
export const formatDistance = (km: number): string => `${km.toFixed(1)} km`;

const goalLabel = (goalPerKm: number): string => `(goal: ${formatMoney(goalPerKm)}/km)`;

// =============================================================================
// PER-COMMAND RENDERERS
// =============================================================================

function formatStart(result: StartResult): string {
  return [
    '*🚗 Ride Profit Tracker*',
    '',
    'Track how much every trip really pays.',
    '',
    '*📋 Commands*',
    `• \`${ADD_USAGE}\` - record a trip`,
    `  Example: \`${ADD_EXAMPLE}\``,
    '• `/stats` - today\'s summary 📊',
    '• `/week` - last 7 days 📈',
    '• `/reset` - delete today\'s trips ⚠️',
    '',
    `After every ride send \`${ADD_USAGE}\` and I will reply with what you made per km and per hour.`,
    `Goal: ${formatMoney(result.goalPerKm)}/km`
  ].join('\n');
}

function formatAdd(result: AddResult): string {
  const statusEmoji = result.goalMet ? '✅' : '⚠️';

  return [
    `${statusEmoji} *Trip recorded*`,
    '',
    `💰 Fare: ${formatMoney(result.input.tariff)}`,
    `🚗 Distance: ${formatDistance(result.input.distance)}`,
    `⏱️ Duration: ${result.input.duration} min`,
    '',
    '*Profitability*',
    `📊 Per km: ${formatMoney(result.perKm)} ${goalLabel(result.goalPerKm)}`,
    `💵 Per hour: ${formatMoney(result.perHour)}`,
    '',
    result.goalMet ? '✅ Goal reached!' : '🔴 Below goal'
  ].join('\n');
}

function formatStats(result: StatsResult): string {
  const isWeek = result.command === BotCommand.WEEK;
  const title = isWeek
    ? `📈 *Last 7 days* (${result.period.startDate} – ${result.period.endDate})`
    : `📊 *Today's stats* (${result.period.endDate})`;

  if (result.aggregate.tripCount === 0) {
    return [
      title,
      '',
      isWeek ? 'No trips recorded in the last 7 days.' : 'No trips recorded yet.'
    ].join('\n');
  }

  const verdict = isWeek
    ? (result.goalMet ? '✅ Excellent week!' : '⚠️ Room to improve your earnings')
    : (result.goalMet ? '✅ Goal reached!' : '⚠️ Below goal');

  return [
    title,
    '',
    `🚗 Trips: ${result.aggregate.tripCount}`,
    `💰 Earned: ${formatMoney(result.aggregate.totalTariff)}`,
    `📍 Distance: ${formatDistance(result.aggregate.totalDistance)}`,
    `📈 Avg per km: ${formatMoney(result.aggregate.avgPerKm)} ${goalLabel(result.goalPerKm)}`,
    '',
    verdict
  ].join('\n');
}

function formatReset(result: ResetResult): string {
  if (result.status === 'confirmation_required') {
    return [
      '⚠️ *Confirmation required*',
      '',
      'This deletes all of today\'s trips.',
      '',
      'To confirm, send: `/reset confirm`'
    ].join('\n');
  }

  if (result.deletedCount === 0) {
    return 'No trips to delete today.';
  }

  return `✅ Deleted ${result.deletedCount} ${result.deletedCount === 1 ? 'trip' : 'trips'} from today.`;
}

function formatFailure(result: CommandFailure): string {
  switch (result.error.kind) {
    case 'parse':
      return [
        '❌ Wrong format',
        '',
        `Use: \`${ADD_USAGE}\``,
        `Example: \`${ADD_EXAMPLE}\``
      ].join('\n');
    case 'validation':
      return `❌ ${result.error.message}`;
    case 'unknown_command':
      return '🤔 Unknown command. Send /start to see what I can do.';
    case 'persistence':
      return '❌ Could not save or read your trips. Please try again.';
    case 'internal':
      return '❌ Something went wrong. Please try again.';
  }
}

/**
 * Render any command result as a chat message
 */
export function formatCommandResult(result: CommandResult): string {
  if (!result.ok) {
    return formatFailure(result);
  }

  switch (result.command) {
    case BotCommand.START:
      return formatStart(result);
    case BotCommand.ADD:
      return formatAdd(result);
    case BotCommand.STATS:
    case BotCommand.WEEK:
      return formatStats(result);
    case BotCommand.RESET:
      return formatReset(result);
  }
}
