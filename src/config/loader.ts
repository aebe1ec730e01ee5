/**
 * Configuration Loader
 *
 * Resolves the process environment and data/destinations.json into one
 * immutable ReportConfig, built once at start-up and passed to every
 * component.
 */

import * as fs from 'fs';
import * as path from 'path';
import { DEFAULTS, type TripType } from './constants';
import {
  DestinationsFileSchema,
  EnvSchema,
  splitList,
  type DestinationsFile,
  type ParsedEnv,
} from './schemas';
import { ConfigurationError } from '../types/errors';
import { Result, toError } from '../types/result';
import { addDays, formatIsoDate } from '../utils/dates';

export type Env = Record<string, string | undefined>;

export interface Destination {
  name: string;
  code: string;
  /** Short country marker shown before the name, e.g. "JP" */
  flag: string;
}

/** Offers on `date` departing before `time` (HH:MM) are dropped. */
export interface DepartureCutoff {
  date: string;
  time: string;
}

export interface SearchSettings {
  apiKey: string | null;
  /** Replay saved fixtures instead of calling the API */
  mockMode: boolean;
  /** Write every live response to the fixture store */
  saveFixtures: boolean;
  fixturesDir: string;
  timeoutMs: number;
  maxResults: number;
}

export interface SmtpSettings {
  host?: string;
  port: number;
  user?: string;
  pass?: string;
  from?: string;
  to: string[];
}

export interface ReportConfig {
  reportDate: string;
  origin: string;
  destinations: Destination[];
  departureDates: string[];
  returnDates: string[];
  tripTypes: TripType[];
  adults: number;
  currency: string;
  regionLabel: string;
  cutoff: DepartureCutoff | null;
  search: SearchSettings;
  smtp: SmtpSettings;
}

export interface LoadConfigOptions {
  /** Clock used for the report date and DAYS_AHEAD offsets */
  now?: Date;
  destinationsPath?: string;
}

let projectRootCache: string | null = null;

/**
 * Get the project root directory.
 */
export function getProjectRoot(): string {
  if (projectRootCache) return projectRootCache;
  // Walk up from current file to find package.json
  let dir = __dirname;
  while (dir !== path.dirname(dir)) {
    if (fs.existsSync(path.join(dir, 'package.json'))) {
      projectRootCache = dir;
      return dir;
    }
    dir = path.dirname(dir);
  }
  projectRootCache = path.resolve(__dirname, '../..');
  return projectRootCache;
}

/**
 * Load the default destination list.
 */
export function loadDestinationDefaults(
  filePath = path.join(getProjectRoot(), 'data', 'destinations.json')
): DestinationsFile {
  if (!fs.existsSync(filePath)) {
    throw new ConfigurationError(`Destinations config not found: ${filePath}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (e) {
    throw new ConfigurationError(`Destinations config is not valid JSON: ${filePath} (${toError(e).message})`);
  }

  const parsed = DestinationsFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(
      parsed.error.issues.map((issue) => `${path.basename(filePath)} ${issue.path.join('.')}: ${issue.message}`)
    );
  }
  return parsed.data;
}

/**
 * Parse a DESTINATIONS override: "Japan (Tokyo)=NRT,Taiwan=TPE".
 */
export function parseDestinationList(value: string): Result<Destination[]> {
  const destinations: Destination[] = [];
  for (const item of splitList(value)) {
    const sep = item.lastIndexOf('=');
    const name = sep > 0 ? item.slice(0, sep).trim() : '';
    const code = sep > 0 ? item.slice(sep + 1).trim() : '';
    if (!name || !code) {
      return Result.err(`DESTINATIONS entries must look like "Name=CODE" (got: "${item}")`);
    }
    destinations.push({ name, code, flag: '' });
  }
  if (destinations.length === 0) {
    return Result.err('DESTINATIONS must name at least one destination');
  }
  return Result.ok(destinations);
}

export function resolveDestinations(rawEnv: Env, defaults: DestinationsFile): Destination[] {
  return defaults.destinations.map((entry) => {
    const override = entry.code_env ? rawEnv[entry.code_env]?.trim() : undefined;
    return { name: entry.name, code: override || entry.code, flag: entry.flag };
  });
}

/**
 * Explicit DEPARTURE_DATES win over DAYS_AHEAD offsets from today. A
 * non-blank value with no dates in it stays an empty list.
 */
export function resolveDepartureDates(env: ParsedEnv, today: string): string[] {
  if (env.DEPARTURE_DATES !== undefined) {
    return env.DEPARTURE_DATES;
  }
  const offsets = env.DAYS_AHEAD ?? DEFAULTS.daysAhead;
  return offsets.map((days) => addDays(today, days));
}

/**
 * Return and round-trip searches need return dates; without any, only
 * outbound is searched whatever TRIP_TYPES asks for. A list with no
 * recognised trip type also falls back to outbound.
 */
export function resolveTripTypes(requested: TripType[], returnDates: string[]): TripType[] {
  const unique = [...new Set(requested)];
  if (returnDates.length === 0 || unique.length === 0) return ['outbound'];
  return unique;
}

export function loadConfig(rawEnv: Env = process.env, options: LoadConfigOptions = {}): ReportConfig {
  const parsed = EnvSchema.safeParse(rawEnv);
  if (!parsed.success) {
    throw new ConfigurationError(parsed.error.issues.map((issue) => issue.message));
  }
  const env = parsed.data;

  let destinations: Destination[];
  if (env.DESTINATIONS) {
    const listed = parseDestinationList(env.DESTINATIONS);
    if (!listed.ok) throw new ConfigurationError(listed.error);
    destinations = listed.value;
  } else {
    destinations = resolveDestinations(rawEnv, loadDestinationDefaults(options.destinationsPath));
  }

  const reportDate = formatIsoDate(options.now ?? new Date());
  const returnDates = env.RETURN_DATES ?? [];
  const fixturesDir = env.FIXTURES_DIR
    ? path.resolve(process.cwd(), env.FIXTURES_DIR)
    : path.join(getProjectRoot(), 'fixtures');

  return {
    reportDate,
    origin: env.ORIGIN ?? DEFAULTS.origin,
    destinations,
    departureDates: resolveDepartureDates(env, reportDate),
    returnDates,
    tripTypes: resolveTripTypes(env.TRIP_TYPES ?? DEFAULTS.tripTypes, returnDates),
    adults: env.ADULTS ?? DEFAULTS.adults,
    currency: env.CURRENCY ?? DEFAULTS.currency,
    regionLabel: env.REGION_LABEL ?? DEFAULTS.regionLabel,
    cutoff:
      env.EARLIEST_DEP_DATE && env.EARLIEST_DEP_TIME
        ? { date: env.EARLIEST_DEP_DATE, time: env.EARLIEST_DEP_TIME }
        : null,
    search: {
      apiKey: env.SERPAPI_KEY ?? null,
      mockMode: env.MOCK_MODE,
      saveFixtures: env.SAVE_FIXTURES,
      fixturesDir,
      timeoutMs: env.REQUEST_TIMEOUT_MS ?? DEFAULTS.requestTimeoutMs,
      maxResults: env.MAX_RESULTS ?? DEFAULTS.maxResults,
    },
    smtp: {
      host: env.SMTP_HOST,
      port: env.SMTP_PORT ?? DEFAULTS.smtpPort,
      user: env.SMTP_USER,
      pass: env.SMTP_PASS,
      from: env.EMAIL_FROM ?? env.SMTP_USER,
      to: env.EMAIL_TO ?? (env.SMTP_USER ? [env.SMTP_USER] : []),
    },
  };
}
