/**
 * SerpApi Google Flights Client
 *
 * One search per call, no retries. Live mode calls the API; mock mode
 * replays bodies saved by an earlier run with SAVE_FIXTURES=1.
 */

import { z } from 'zod';
import { ERROR_BODY_LOG_LIMIT, SERPAPI } from '../config/constants';
import type { ReportConfig } from '../config/loader';
import {
  ClientRequestError,
  ConfigurationError,
  FixtureNotFoundError,
  TransportError,
} from '../types/errors';
import { toError } from '../types/result';
import type { RawOfferGroup } from '../utils/flight-normalizer';
import { FixtureStore, fixtureKey } from './fixture-store';

export interface FlightSearchClient {
  search(
    origin: string,
    destination: string,
    departureDate: string,
    returnDate?: string
  ): Promise<RawOfferGroup[]>;
}

export interface SerpApiClientOptions {
  apiKey: string | null;
  currency: string;
  adults: number;
  maxResults: number;
  timeoutMs: number;
  mockMode: boolean;
  saveFixtures: boolean;
  fixtures: FixtureStore;
  baseUrl?: string;
  fetchImpl?: typeof fetch;
}

const SearchResponseSchema = z.object({
  search_metadata: z
    .object({ google_flights_url: z.string().catch('') })
    .catch({ google_flights_url: '' }),
  best_flights: z.array(z.unknown()).catch([]),
  other_flights: z.array(z.unknown()).catch([]),
});

const ErrorBodySchema = z.object({ error: z.string() });

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Best + other offer groups, truncated to `maxResults`, each tagged with the
 * response's own Google Flights deep link under `_book_url`.
 */
export function parseSearchResponse(body: unknown, maxResults: number): RawOfferGroup[] {
  const parsed = SearchResponseSchema.safeParse(body);
  if (!parsed.success) return [];

  const { search_metadata, best_flights, other_flights } = parsed.data;
  const bookUrl = search_metadata.google_flights_url;
  return [...best_flights, ...other_flights]
    .filter(isRecord)
    .slice(0, maxResults)
    .map((group) => ({ ...group, _book_url: bookUrl }));
}

function parseJsonOrNull(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return null; // plain-text error page
  }
}

async function readErrorDetail(res: Response): Promise<string> {
  const text = await res.text();
  const parsed = ErrorBodySchema.safeParse(parseJsonOrNull(text));
  return parsed.success ? parsed.data.error : text.slice(0, ERROR_BODY_LOG_LIMIT);
}

export class SerpApiClient implements FlightSearchClient {
  private readonly apiKey: string | null;
  private readonly currency: string;
  private readonly adults: number;
  private readonly maxResults: number;
  private readonly timeoutMs: number;
  private readonly mockMode: boolean;
  private readonly saveFixtures: boolean;
  private readonly fixtures: FixtureStore;
  private readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;

  constructor(args: SerpApiClientOptions) {
    this.apiKey = args.apiKey;
    this.currency = args.currency;
    this.adults = args.adults;
    this.maxResults = args.maxResults;
    this.timeoutMs = args.timeoutMs;
    this.mockMode = args.mockMode;
    this.saveFixtures = args.saveFixtures;
    this.fixtures = args.fixtures;
    this.baseUrl = args.baseUrl ?? SERPAPI.url;
    this.fetchImpl = args.fetchImpl ?? ((input, init) => fetch(input, init));
  }

  static fromConfig(config: ReportConfig, fetchImpl?: typeof fetch): SerpApiClient {
    return new SerpApiClient({
      apiKey: config.search.apiKey,
      currency: config.currency,
      adults: config.adults,
      maxResults: config.search.maxResults,
      timeoutMs: config.search.timeoutMs,
      mockMode: config.search.mockMode,
      saveFixtures: config.search.saveFixtures,
      fixtures: new FixtureStore(config.search.fixturesDir),
      fetchImpl,
    });
  }

  async search(
    origin: string,
    destination: string,
    departureDate: string,
    returnDate?: string
  ): Promise<RawOfferGroup[]> {
    const key = fixtureKey(origin, destination, departureDate, returnDate);

    if (this.mockMode) {
      if (!this.fixtures.has(key)) {
        throw new FixtureNotFoundError(this.fixtures.pathFor(key));
      }
      return parseSearchResponse(this.fixtures.read(key), this.maxResults);
    }

    if (!this.apiKey) {
      throw new ConfigurationError('SERPAPI_KEY must be set. Register free at https://serpapi.com');
    }

    const route = `${origin}->${destination} ${departureDate}`;
    const params = new URLSearchParams({
      engine: SERPAPI.engine,
      api_key: this.apiKey,
      departure_id: origin,
      arrival_id: destination,
      outbound_date: departureDate,
      currency: this.currency,
      adults: String(this.adults),
      type: returnDate ? SERPAPI.roundTripType : SERPAPI.oneWayType,
    });
    if (returnDate) params.set('return_date', returnDate);

    let res: Response;
    try {
      res = await this.fetchImpl(`${this.baseUrl}?${params.toString()}`, {
        headers: { Accept: 'application/json' },
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (e) {
      throw new TransportError(`Search request failed for ${route}: ${toError(e).message}`, null, { cause: e });
    }

    if (res.status === 200) {
      let body: unknown;
      try {
        body = await res.json();
      } catch (e) {
        throw new TransportError(`Unreadable response body for ${route}: ${toError(e).message}`, 200, { cause: e });
      }
      if (this.saveFixtures) {
        const saved = this.fixtures.write(key, body);
        console.error(`    [fixture] saved ${saved}`);
      }
      return parseSearchResponse(body, this.maxResults);
    }

    if (res.status === 400 || res.status === 404) {
      // Unknown airport codes and unserved routes land here; skip the combination
      const err = new ClientRequestError(res.status, route, await readErrorDetail(res));
      console.error(`    ${err.message}`);
      return [];
    }

    await res.body?.cancel();
    throw new TransportError(`SerpApi returned HTTP ${res.status} for ${route}`, res.status);
  }
}
