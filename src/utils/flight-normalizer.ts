/**
 * Flight Offer Normalizer
 *
 * Flattens one SerpApi Google Flights offer group into an OfferRecord.
 * The raw group is treated as an untyped document: every field is
 * optional and falls back to an empty value instead of failing the parse.
 *
 * Segment times arrive as "YYYY-MM-DD HH:MM" in the airport's local time
 * and are sliced, never converted between zones.
 */

import { z } from 'zod';
import { GOOGLE_FLIGHTS_URL, type TripType } from '../config/constants';
import { formatLayovers, formatMinutes, formatPrice, formatStops } from './format';

/** One offer group as returned by the search client, `_book_url` attached. */
export type RawOfferGroup = Record<string, unknown>;

export interface OfferRecord {
  tripType: TripType;
  destinationName: string;
  destinationCode: string;
  departureDate: string;
  /** Empty unless tripType is roundtrip */
  returnDate: string;
  /** Distinct carriers in first-seen order, joined with " / " */
  airline: string;
  departureTime: string;
  arrivalTime: string;
  /** Landing date of the shown leg; differs from departureDate on overnight arrivals */
  arrivalDate: string;
  durationMinutes: number;
  duration: string;
  stopCount: number;
  stops: string;
  layovers: string;
  price: number;
  priceDisplay: string;
  currency: string;
  bookingUrl: string;
}

export interface OfferTarget {
  destinationName: string;
  destinationCode: string;
  departureDate: string;
  tripType?: TripType;
  returnDate?: string;
}

/** Run-wide values the record needs but the raw group does not carry. */
export interface NormalizeContext {
  origin: string;
  adults: number;
  currency: string;
}

// ============================================================================
// Tolerant raw-group schema
// ============================================================================

const AirportSchema = z
  .object({
    id: z.string().optional().catch(undefined),
    time: z.string().optional().catch(undefined),
  })
  .catch({});

const SegmentSchema = z
  .object({
    departure_airport: AirportSchema,
    arrival_airport: AirportSchema,
    airline: z.string().catch(''),
  })
  .catch({ departure_airport: {}, arrival_airport: {}, airline: '' });

const LayoverSchema = z
  .object({
    id: z.string().optional().catch(undefined),
    duration: z.number().optional().catch(undefined),
  })
  .catch({});

const OfferGroupSchema = z.object({
  flights: z.array(SegmentSchema).catch([]),
  layovers: z.array(LayoverSchema).catch([]),
  total_duration: z.number().catch(0),
  price: z.union([z.number(), z.string()]).catch(0),
  _book_url: z.string().catch(''),
});

// ============================================================================
// Helpers
// ============================================================================

function timeOfDay(timestamp: string): string {
  return timestamp.length >= 16 ? timestamp.slice(11, 16) : timestamp;
}

function calendarDate(timestamp: string): string {
  return timestamp.length >= 10 ? timestamp.slice(0, 10) : '';
}

function uniqueAirlines(segments: Array<{ airline: string }>): string[] {
  const seen = new Set<string>();
  const airlines: string[] = [];
  for (const seg of segments) {
    if (seg.airline && !seen.has(seg.airline)) {
      seen.add(seg.airline);
      airlines.push(seg.airline);
    }
  }
  return airlines;
}

function toPrice(raw: number | string): number {
  const amount = Number(raw);
  return Number.isFinite(amount) && amount > 0 ? amount : 0;
}

/**
 * Google Flights results page for a one-way search, used when the API
 * response carried no deep link of its own.
 */
export function googleFlightsUrl(args: {
  origin: string;
  destination: string;
  date: string;
  adults: number;
  currency: string;
}): string {
  const params = new URLSearchParams({
    f: args.origin,
    t: args.destination,
    d: args.date,
    return: '0',
    adults: String(args.adults),
    curr: args.currency,
  });
  return `${GOOGLE_FLIGHTS_URL}?${params.toString()}`;
}

// ============================================================================
// Normalization
// ============================================================================

/**
 * Flatten one offer group. Returns null when the group has no flight
 * segments (or is not an object at all).
 *
 * Round-trip groups carry the outbound leg and the combined price only;
 * the record shows that leg and never synthesizes the return.
 */
export function normalizeOffer(
  raw: unknown,
  target: OfferTarget,
  context: NormalizeContext
): OfferRecord | null {
  const parsed = OfferGroupSchema.safeParse(raw);
  if (!parsed.success) return null;

  const group = parsed.data;
  const segments = group.flights;
  if (segments.length === 0) return null;

  const first = segments[0];
  const last = segments[segments.length - 1];
  const departedAt = first.departure_airport.time ?? '';
  const arrivedAt = last.arrival_airport.time ?? '';

  const stopCount = group.layovers.length;
  const price = toPrice(group.price);

  const bookingUrl =
    group._book_url ||
    googleFlightsUrl({
      origin: first.departure_airport.id || context.origin,
      destination: last.arrival_airport.id || target.destinationCode,
      date: target.departureDate,
      adults: context.adults,
      currency: context.currency,
    });

  return {
    tripType: target.tripType ?? 'outbound',
    destinationName: target.destinationName,
    destinationCode: target.destinationCode,
    departureDate: target.departureDate,
    returnDate: target.returnDate ?? '',
    airline: uniqueAirlines(segments).join(' / '),
    departureTime: timeOfDay(departedAt),
    arrivalTime: timeOfDay(arrivedAt),
    arrivalDate: calendarDate(arrivedAt),
    durationMinutes: group.total_duration,
    duration: group.total_duration ? formatMinutes(group.total_duration) : '',
    stopCount,
    stops: formatStops(stopCount),
    layovers: formatLayovers(group.layovers),
    price,
    priceDisplay: formatPrice(price),
    currency: context.currency,
    bookingUrl,
  };
}
