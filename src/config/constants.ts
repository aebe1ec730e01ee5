/**
 * Flight Report Configuration Constants
 *
 * Defaults applied when the corresponding environment variable is unset.
 */

export const TRIP_TYPES = ['outbound', 'return', 'roundtrip'] as const;

export type TripType = (typeof TRIP_TYPES)[number];

export const DEFAULTS = {
  /** Toronto Pearson */
  origin: 'YYZ',

  /** Departure offsets from today, used when DEPARTURE_DATES is unset */
  daysAhead: [30, 60, 90],

  tripTypes: [...TRIP_TYPES],

  adults: 1,

  /** Offer groups kept per route per date */
  maxResults: 5,

  currency: 'CAD',

  requestTimeoutMs: 30_000,

  /** Shown in headings and the email subject, e.g. "YYZ ↔ Asia" */
  regionLabel: 'Asia',

  smtpPort: 587,
};

export const SERPAPI = {
  url: 'https://serpapi.com/search',
  engine: 'google_flights',
  /** SerpApi `type` parameter */
  roundTripType: '1',
  oneWayType: '2',
} as const;

export const GOOGLE_FLIGHTS_URL = 'https://www.google.com/travel/flights';

/** SMTP port that expects TLS from the first byte; every other port upgrades with STARTTLS. */
export const IMPLICIT_TLS_PORT = 465;

export const PLAIN_TEXT_FALLBACK =
  'HTML report attached. Please view this email in an HTML-capable client.';

/** Characters of a non-JSON error body kept in the log line. */
export const ERROR_BODY_LOG_LIMIT = 300;
