/**
 * Zod Schemas for Report Configuration
 *
 * Runtime validation for the process environment and data/destinations.json.
 * Every setting is optional here; defaults are applied by the loader.
 */

import { z } from 'zod';
import { TRIP_TYPES, type TripType } from './constants';
import { validateIsoDate, validatePositiveInt, validateTime } from '../types/validation';
import { Result } from '../types/result';

export function splitList(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

function isTripType(value: string): value is TripType {
  return TRIP_TYPES.some((t) => t === value);
}

// ============================================================================
// Field builders
// ============================================================================

/** Trimmed string; blank counts as unset. */
const optionalText = z
  .string()
  .optional()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
  });

/** "1", "true" and "yes" (any case) switch a mode on. */
const flag = z
  .string()
  .optional()
  .transform((value) => ['1', 'true', 'yes'].includes((value ?? '').trim().toLowerCase()));

function checked<T>(validate: (input: string) => Result<T>) {
  return optionalText.transform((value, ctx): T | undefined => {
    if (value === undefined) return undefined;
    const result = validate(value);
    if (!result.ok) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: result.error });
      return z.NEVER;
    }
    return result.value;
  });
}

function checkedList<T>(validate: (item: string) => Result<T>) {
  return optionalText.transform((value, ctx): T[] | undefined => {
    if (value === undefined) return undefined;
    const items: T[] = [];
    for (const item of splitList(value)) {
      const result = validate(item);
      if (!result.ok) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: result.error });
        continue;
      }
      items.push(result.value);
    }
    return items;
  });
}

function dayOffset(item: string): Result<number> {
  if (!/^\d+$/.test(item)) {
    return Result.err(`DAYS_AHEAD entries must be whole numbers (got: "${item}")`);
  }
  return Result.ok(parseInt(item, 10));
}

// ============================================================================
// Environment
// ============================================================================

export const EnvSchema = z.object({
  SERPAPI_KEY: optionalText,
  MOCK_MODE: flag,
  SAVE_FIXTURES: flag,
  FIXTURES_DIR: optionalText,

  ORIGIN: optionalText,
  DESTINATIONS: optionalText,
  DEPARTURE_DATES: checkedList((d) => validateIsoDate(d, 'DEPARTURE_DATES')),
  DAYS_AHEAD: checkedList(dayOffset),
  RETURN_DATES: checkedList((d) => validateIsoDate(d, 'RETURN_DATES')),
  // Unknown trip types are dropped rather than rejected
  TRIP_TYPES: optionalText.transform((value) =>
    value === undefined ? undefined : splitList(value).filter(isTripType)
  ),

  ADULTS: checked((v) => validatePositiveInt(v, 'ADULTS')),
  MAX_RESULTS: checked((v) => validatePositiveInt(v, 'MAX_RESULTS')),
  CURRENCY: optionalText,
  REQUEST_TIMEOUT_MS: checked((v) => validatePositiveInt(v, 'REQUEST_TIMEOUT_MS')),
  REGION_LABEL: optionalText,

  EARLIEST_DEP_DATE: checked((v) => validateIsoDate(v, 'EARLIEST_DEP_DATE')),
  EARLIEST_DEP_TIME: checked((v) => validateTime(v, 'EARLIEST_DEP_TIME')),

  SMTP_HOST: optionalText,
  SMTP_PORT: checked((v) => validatePositiveInt(v, 'SMTP_PORT')),
  SMTP_USER: optionalText,
  SMTP_PASS: optionalText,
  EMAIL_FROM: optionalText,
  EMAIL_TO: optionalText.transform((value) => (value === undefined ? undefined : splitList(value))),
});

export type ParsedEnv = z.infer<typeof EnvSchema>;

// ============================================================================
// data/destinations.json
// ============================================================================

export const DestinationEntrySchema = z.object({
  name: z.string().min(1),
  code: z.string().min(1),
  /** Environment variable that overrides `code`, e.g. DEST_JAPAN */
  code_env: z.string().optional(),
  flag: z.string().default(''),
});

export const DestinationsFileSchema = z.object({
  version: z.string(),
  destinations: z.array(DestinationEntrySchema).min(1),
});

export type DestinationEntry = z.infer<typeof DestinationEntrySchema>;
export type DestinationsFile = z.infer<typeof DestinationsFileSchema>;
