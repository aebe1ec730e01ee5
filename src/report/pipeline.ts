/**
 * Report Pipeline
 *
 * fetch → render → deliver, returning the process exit code:
 *   0  report delivered
 *   1  fetch failed (an error notice is sent if possible) or delivery failed
 */

import { aggregateOffers, countOffers } from './aggregator';
import { escapeHtml, renderReport } from './render';
import type { ReportConfig } from '../config/loader';
import type { ReportMailer } from '../services/email-service';
import type { FlightSearchClient } from '../services/serpapi-client';
import { Result, toError } from '../types/result';

export interface PipelineDeps {
  searchClient: FlightSearchClient;
  mailer: ReportMailer;
}

const tryAggregate = Result.wrapAsync(aggregateOffers);

export function reportSubject(
  config: Pick<ReportConfig, 'origin' | 'regionLabel' | 'departureDates' | 'reportDate'>,
  total: number
): string {
  const dates = config.departureDates;
  const range = dates.length > 0 ? `${dates[0]}–${dates[dates.length - 1]}` : 'n/a';
  return (
    `[Flight Report] ${config.origin} <-> ${config.regionLabel} | ` +
    `dep ${range} | ${total} options (${config.reportDate})`
  );
}

export function errorSubject(reportDate: string): string {
  return `[Flight Report] ERROR – data fetch failed (${reportDate})`;
}

export function errorBody(message: string): string {
  return `<p><strong>Error fetching flight data:</strong> ${escapeHtml(message)}</p>`;
}

function logHeader(config: ReportConfig): void {
  console.error(`Flight Finder  |  report date: ${config.reportDate}`);
  console.error(`Destinations:    ${config.destinations.map((d) => `${d.name} (${d.code})`).join(', ')}`);
  console.error(`Trip types:      ${config.tripTypes.join(', ')}`);
  console.error(`Departure dates: ${config.departureDates.join(', ')}`);
  if (config.returnDates.length > 0) {
    console.error(`Return dates:    ${config.returnDates.join(', ')}`);
  }
  if (config.search.mockMode) {
    console.error(`Mode:            replay from ${config.search.fixturesDir}`);
  }
}

export async function runFlightReport(config: ReportConfig, deps: PipelineDeps): Promise<number> {
  logHeader(config);

  const fetched = await tryAggregate(
    deps.searchClient,
    config,
    config.departureDates,
    config.returnDates,
    config.tripTypes
  );

  if (!fetched.ok) {
    console.error(`Error: ${fetched.error.message}`);
    try {
      await deps.mailer.send(errorSubject(config.reportDate), errorBody(fetched.error.message));
    } catch (e) {
      console.error(`Failed to send error email: ${toError(e).message}`);
    }
    return 1;
  }

  const aggregate = fetched.value;
  const total = countOffers(aggregate);
  const html = renderReport(
    aggregate,
    config.departureDates,
    config.returnDates,
    config.tripTypes,
    config.reportDate,
    config
  );

  try {
    await deps.mailer.send(reportSubject(config, total), html);
  } catch (e) {
    console.error(`Failed to send report email: ${toError(e).message}`);
    return 1;
  }

  console.error(`Report sent.  ${total} flight options included.`);
  return 0;
}
