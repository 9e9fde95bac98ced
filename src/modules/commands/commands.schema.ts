import { z } from 'zod';
import { ParseError, ValidationError } from '../../core/errors/AppError';

// =============================================================================
// COMMAND ARGUMENT SCHEMAS
// =============================================================================
//
// Two stages, each producing a typed value or a typed error:
//   1. parse    - raw text -> three numbers          (ParseError)
//   2. validate - numbers  -> strictly positive trip  (ValidationError)

export const ADD_USAGE = '/add FARE KM MINUTES';
export const ADD_EXAMPLE = '/add 5200 14 28';

const DECIMAL_TOKEN = /^[+-]?(\d+(\.\d*)?|\.\d+)$/;
const INTEGER_TOKEN = /^[+-]?\d+$/;

const decimalToken = (field: string) =>
  z.string()
    .regex(DECIMAL_TOKEN, `${field} must be a number`)
    .transform(Number);

const integerToken = (field: string) =>
  z.string()
    .regex(INTEGER_TOKEN, `${field} must be a whole number of minutes`)
    .transform(Number);

/**
 * Positional tokens of /add: fare, kilometers, minutes
 */
export const addTokensSchema = z.tuple([
  decimalToken('fare'),
  decimalToken('distance'),
  integerToken('duration')
]);

/**
 * Parsed /add values; all strictly positive
 */
export const addTripSchema = z.object({
  tariff: z.number().finite('Fare is too large').positive('Fare must be greater than 0'),
  distance: z.number().finite('Distance is too large').positive('Distance must be greater than 0'),
  duration: z.number().finite('Duration is too large').int().positive('Duration must be greater than 0')
});

export type AddTripPayload = z.infer<typeof addTripSchema>;

/**
 * Split raw argument text on whitespace
 */
export function tokenize(args: string): string[] {
  return args.trim().split(/\s+/).filter(Boolean);
}

/**
 * Raw /add arguments -> typed payload
 */
export function parseAddArguments(args: string): AddTripPayload {
  const tokens = tokenize(args);

  if (tokens.length !== 3) {
    throw new ParseError(`Expected 3 values, got ${tokens.length}`, { usage: ADD_USAGE, tokens: tokens.length });
  }

  const parsed = addTokensSchema.safeParse(tokens);
  if (!parsed.success) {
    const firstError = parsed.error.errors[0];
    throw new ParseError(firstError?.message ?? 'Invalid arguments', { usage: ADD_USAGE });
  }

  const [tariff, distance, duration] = parsed.data;
  const validated = addTripSchema.safeParse({ tariff, distance, duration });
  if (!validated.success) {
    throw ValidationError.fromZodError(validated.error);
  }

  return validated.data;
}

/**
 * The first token of /reset, lower-cased ('' when absent)
 */
export function parseResetArgument(args: string): string {
  return (tokenize(args)[0] ?? '').toLowerCase();
}
