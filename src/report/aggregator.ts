/**
 * Offer Aggregator
 *
 * Runs one search per (destination, date[, return date]) combination,
 * sequentially, destination outer and date inner, and collects the
 * normalized offers per trip type and destination.
 *
 * A failing combination is logged and counts as zero offers; only
 * configuration errors and missing fixtures end the fetch phase.
 */

import type { TripType } from '../config/constants';
import type { DepartureCutoff, Destination, ReportConfig } from '../config/loader';
import type { FlightSearchClient } from '../services/serpapi-client';
import { isFatalFetchError } from '../types/errors';
import { Result } from '../types/result';
import { normalizeOffer, type OfferRecord } from '../utils/flight-normalizer';

/** trip type → destination name → offers in discovery order */
export type ReportAggregate = Map<TripType, Map<string, OfferRecord[]>>;

export interface Combination {
  tripType: TripType;
  destination: Destination;
  from: string;
  to: string;
  departureDate: string;
  returnDate?: string;
  /** Outbound and round-trip legs honour the departure cutoff; return legs do not. */
  applyCutoff: boolean;
}

type AggregateConfig = Pick<ReportConfig, 'origin' | 'destinations' | 'adults' | 'currency' | 'cutoff'>;

/**
 * True when the offer leaves on the cutoff date strictly before the cutoff
 * time. Both times are zero-padded HH:MM, so string order is clock order.
 */
export function isTooEarly(
  offer: Pick<OfferRecord, 'departureDate' | 'departureTime'>,
  cutoff: DepartureCutoff | null
): boolean {
  if (!cutoff || !cutoff.date || !cutoff.time) return false;
  if (offer.departureDate !== cutoff.date) return false;
  return offer.departureTime < cutoff.time;
}

export function countOffers(aggregate: ReportAggregate): number {
  let total = 0;
  for (const byDestination of aggregate.values()) {
    for (const offers of byDestination.values()) total += offers.length;
  }
  return total;
}

function describe(c: Combination): string {
  switch (c.tripType) {
    case 'outbound':
      return `  [outbound]  ${c.from} -> ${c.to}  on  ${c.departureDate}`;
    case 'return':
      return `  [return]    ${c.from} -> ${c.to}  on  ${c.departureDate}`;
    case 'roundtrip':
      return `  [roundtrip] ${c.from} <-> ${c.to}  ${c.departureDate} / ${c.returnDate ?? ''}`;
  }
}

async function fetchCombination(
  client: FlightSearchClient,
  config: AggregateConfig,
  c: Combination
): Promise<OfferRecord[]> {
  const groups = await client.search(c.from, c.to, c.departureDate, c.returnDate);
  const offers: OfferRecord[] = [];
  for (const group of groups) {
    const offer = normalizeOffer(
      group,
      {
        destinationName: c.destination.name,
        destinationCode: c.destination.code,
        departureDate: c.departureDate,
        tripType: c.tripType,
        returnDate: c.returnDate,
      },
      { origin: config.origin, adults: config.adults, currency: config.currency }
    );
    if (!offer) continue;
    if (c.applyCutoff && isTooEarly(offer, config.cutoff)) continue;
    offers.push(offer);
  }
  return offers;
}

const tryFetchCombination = Result.wrapAsync(fetchCombination);

/**
 * Every combination searched for one destination, in the order they run.
 * Round trips only pair a return date strictly after the departure date.
 */
export function planCombinations(
  origin: string,
  destination: Destination,
  departureDates: string[],
  returnDates: string[],
  tripTypes: TripType[]
): Combination[] {
  const plan: Combination[] = [];
  const code = destination.code;

  if (tripTypes.includes('outbound')) {
    for (const date of departureDates) {
      plan.push({ tripType: 'outbound', destination, from: origin, to: code, departureDate: date, applyCutoff: true });
    }
  }

  if (tripTypes.includes('return')) {
    for (const date of returnDates) {
      plan.push({ tripType: 'return', destination, from: code, to: origin, departureDate: date, applyCutoff: false });
    }
  }

  if (tripTypes.includes('roundtrip')) {
    for (const dep of departureDates) {
      for (const ret of returnDates) {
        if (ret <= dep) continue;
        plan.push({
          tripType: 'roundtrip',
          destination,
          from: origin,
          to: code,
          departureDate: dep,
          returnDate: ret,
          applyCutoff: true,
        });
      }
    }
  }

  return plan;
}

export async function aggregateOffers(
  client: FlightSearchClient,
  config: AggregateConfig,
  departureDates: string[],
  returnDates: string[],
  tripTypes: TripType[]
): Promise<ReportAggregate> {
  const aggregate: ReportAggregate = new Map();
  for (const tripType of tripTypes) {
    aggregate.set(tripType, new Map(config.destinations.map((d): [string, OfferRecord[]] => [d.name, []])));
  }

  for (const destination of config.destinations) {
    const plan = planCombinations(config.origin, destination, departureDates, returnDates, tripTypes);

    for (const combination of plan) {
      console.error(describe(combination));
      const result = await tryFetchCombination(client, config, combination);

      if (!result.ok) {
        if (isFatalFetchError(result.error)) throw result.error;
        console.error(`    Warning: ${result.error.message}`);
        continue;
      }

      aggregate.get(combination.tripType)?.get(destination.name)?.push(...result.value);
    }
  }

  return aggregate;
}
