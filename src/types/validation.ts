/**
 * Input validation for configuration values.
 *
 * Provides sanity checks for the value shapes the report reads from the
 * environment:
 * - ISO dates (YYYY-MM-DD)
 * - Positive integers
 * - Clock times (HH:MM)
 */

import { Result } from './result';

/**
 * Validate ISO-8601 date format (YYYY-MM-DD).
 * Also checks that the date exists on the calendar (no Feb 30).
 */
export function validateIsoDate(input: string, fieldName = 'date'): Result<string> {
  if (!input) {
    return Result.err(`${fieldName} is required`);
  }

  const match = input.match(/^(\d{4})-(\d{2})-(\d{2})$/);
  if (!match) {
    return Result.err(`${fieldName} must be YYYY-MM-DD format (got: "${input}")`);
  }

  const [, year, month, day] = match;
  const date = new Date(Date.UTC(Number(year), Number(month) - 1, Number(day)));
  if (
    date.getUTCFullYear() !== Number(year) ||
    date.getUTCMonth() + 1 !== Number(month) ||
    date.getUTCDate() !== Number(day)
  ) {
    return Result.err(`${fieldName} is not a valid date: "${input}"`);
  }

  return Result.ok(input);
}

export function validatePositiveInt(input: string, fieldName = 'number'): Result<number> {
  if (!input) {
    return Result.err(`${fieldName} is required`);
  }

  if (!/^\d+$/.test(input)) {
    return Result.err(`${fieldName} must be a whole number (got: "${input}")`);
  }

  const num = parseInt(input, 10);
  if (num <= 0) {
    return Result.err(`${fieldName} must be positive (got: ${num})`);
  }

  return Result.ok(num);
}

/**
 * Validate time format (HH:MM, 24-hour).
 * Single-digit hours are padded so the result compares correctly as a string.
 */
export function validateTime(input: string, fieldName = 'time'): Result<string> {
  if (!input) {
    return Result.err(`${fieldName} is required`);
  }

  const match = input.match(/^([01]?\d|2[0-3]):([0-5]\d)$/);
  if (!match) {
    return Result.err(`${fieldName} must be HH:MM format (got: "${input}")`);
  }

  const [, hours, minutes] = match;
  return Result.ok(`${hours.padStart(2, '0')}:${minutes}`);
}
