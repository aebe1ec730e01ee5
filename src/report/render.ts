import { ALT_ROW, PLAIN_ROW, STYLE } from './styles';
import { countOffers, type ReportAggregate } from './aggregator';
import type { TripType } from '../config/constants';
import type { Destination, ReportConfig } from '../config/loader';
import { compareText } from '../utils/dates';
import type { OfferRecord } from '../utils/flight-normalizer';
import { DIRECT_MARKER } from '../utils/format';

export type RenderOptions = Pick<
  ReportConfig,
  'origin' | 'destinations' | 'adults' | 'currency' | 'regionLabel'
>;

export function escapeHtml(s: string): string {
  return s
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

const NEXT_DAY_MARKER = `<sup style="${STYLE.nextDay}">+1</sup>`;

function th(text: string): string {
  return `<th style="${STYLE.th}">${escapeHtml(text)}</th>`;
}

function td(html: string, bold = false): string {
  return `<td style="${bold ? STYLE.tdBold : STYLE.td}">${html}</td>`;
}

function tdLink(url: string, label = 'Search'): string {
  return (
    `<td style="${STYLE.td}">` +
    `<a href="${escapeHtml(url)}" target="_blank" style="${STYLE.link}">${label}</a></td>`
  );
}

function table(headers: string[], rows: string[]): string {
  return (
    `<table cellpadding="0" cellspacing="0" border="0" style="${STYLE.table}">` +
    `<thead><tr>${headers.map(th).join('')}</tr></thead>` +
    `<tbody>${rows.join('')}</tbody>` +
    `</table>`
  );
}

function row(background: string, cells: string[]): string {
  return `<tr style="background:${background};">${cells.join('')}</tr>`;
}

function stripe(index: number): string {
  return index % 2 === 0 ? ALT_ROW : PLAIN_ROW;
}

/** "+1" badge when the leg lands on a later calendar date than it left. */
export function nextDayMarker(departureDate: string, arrivalDate: string): string {
  return arrivalDate && arrivalDate !== departureDate ? NEXT_DAY_MARKER : '';
}

export function arrivalCell(departureDate: string, arrivalTime: string, arrivalDate: string): string {
  return escapeHtml(arrivalTime) + nextDayMarker(departureDate, arrivalDate);
}

function destinationLabel(d: Destination): string {
  return escapeHtml([d.flag, d.name].filter(Boolean).join(' '));
}

/** Airline through booking link; shared by every table. */
function legCells(o: OfferRecord): string[] {
  return [
    td(escapeHtml(o.airline)),
    td(escapeHtml(o.departureTime)),
    td(arrivalCell(o.departureDate, o.arrivalTime, o.arrivalDate)),
    td(escapeHtml(o.duration)),
    td(escapeHtml(o.stops)),
    td(escapeHtml(o.layovers || DIRECT_MARKER)),
    td(`${escapeHtml(o.currency)} ${o.priceDisplay}`, true),
    tdLink(o.bookingUrl),
  ];
}

// ============================================================================
// Sorting
// ============================================================================

export function sortOneWay(offers: OfferRecord[]): OfferRecord[] {
  return [...offers].sort(
    (a, b) => compareText(a.departureDate, b.departureDate) || a.price - b.price
  );
}

export function sortRoundTrip(offers: OfferRecord[]): OfferRecord[] {
  return [...offers].sort(
    (a, b) =>
      compareText(a.departureDate, b.departureDate) ||
      compareText(a.returnDate, b.returnDate) ||
      a.price - b.price
  );
}

// ============================================================================
// Tables
// ============================================================================

export function renderOneWayTable(
  offers: OfferRecord[],
  departLabel: string,
  arriveLabel: string,
  currency: string
): string {
  const rows = sortOneWay(offers).map((o, i) =>
    row(stripe(i), [td(escapeHtml(o.departureDate)), ...legCells(o)])
  );
  return table(
    [
      'Dep. Date',
      'Airline(s)',
      `Departs (${departLabel})`,
      `Arrives (${arriveLabel})`,
      'Duration',
      'Stops',
      'Via',
      `Price (${currency})`,
      'Book',
    ],
    rows
  );
}

/**
 * Round-trip rows show the outbound leg with the combined price; the API
 * returns no return-leg detail in the first response.
 */
export function renderRoundTripTable(offers: OfferRecord[], currency: string): string {
  const rows = sortRoundTrip(offers).map((o, i) =>
    row(stripe(i), [td(escapeHtml(o.departureDate)), td(escapeHtml(o.returnDate)), ...legCells(o)])
  );
  return table(
    [
      'Departs',
      'Returns',
      'Airline(s)',
      'Dep. Time',
      'Arr. Time',
      'Outbound Duration',
      'Stops',
      'Via',
      `Total Price (${currency})`,
      'Book',
    ],
    rows
  );
}

// ============================================================================
// Sections
// ============================================================================

function sectionHeading(label: string, route: string): string {
  return (
    `<h3 style="${STYLE.destinationTitle}">${label}` +
    `<span style="${STYLE.route}"> (${escapeHtml(route)})</span></h3>`
  );
}

function tripTypeTitle(tripType: TripType, options: RenderOptions): [string, string] {
  const { origin, regionLabel } = options;
  switch (tripType) {
    case 'outbound':
      return ['Outbound Flights', `${origin} → ${regionLabel}`];
    case 'return':
      return ['Return Flights', `${regionLabel} → ${origin}`];
    case 'roundtrip':
      return ['Round Trip Flights', `${origin} ↔ ${regionLabel} (total price, outbound leg shown)`];
  }
}

/**
 * One trip type: a sub-section per configured destination, in configured order.
 */
export function renderTripTypeBlock(
  tripType: TripType,
  byDestination: Map<string, OfferRecord[]> | undefined,
  options: RenderOptions
): string {
  const { origin, currency } = options;
  const [title, subtitle] = tripTypeTitle(tripType, options);

  const sections = options.destinations.map((dest) => {
    const offers = byDestination?.get(dest.name) ?? [];
    const departLabel = tripType === 'return' ? dest.code : origin;
    const arriveLabel = tripType === 'return' ? origin : dest.code;
    const route = tripType === 'roundtrip' ? `${origin} ↔ ${dest.code}` : `${departLabel} → ${arriveLabel}`;
    const heading = sectionHeading(destinationLabel(dest), route);

    if (offers.length === 0) {
      return heading + `<p style="${STYLE.empty}">No flights found.</p>`;
    }

    return (
      heading +
      (tripType === 'roundtrip'
        ? renderRoundTripTable(offers, currency)
        : renderOneWayTable(offers, departLabel, arriveLabel, currency))
    );
  });

  return (
    `<h2 style="${STYLE.blockTitle}">${escapeHtml(title)} ` +
    `<span style="${STYLE.subtitle}">(${escapeHtml(subtitle)})</span></h2>\n` +
    sections.join('\n')
  );
}

function cheapest(offers: OfferRecord[]): OfferRecord | null {
  let best: OfferRecord | null = null;
  for (const o of offers) {
    if (!best || o.price < best.price) best = o;
  }
  return best;
}

/**
 * Cheapest outbound offer per departure date and destination. Dates and
 * destinations without offers are left out.
 */
export function renderSummaryTable(
  aggregate: ReportAggregate,
  departureDates: string[],
  options: RenderOptions
): string {
  const outbound = aggregate.get('outbound');
  const rows: string[] = [];

  for (const date of departureDates) {
    let first = true;
    for (const dest of options.destinations) {
      const offers = (outbound?.get(dest.name) ?? []).filter((o) => o.departureDate === date);
      const best = cheapest(offers);
      if (!best) continue;

      rows.push(
        row(first ? ALT_ROW : PLAIN_ROW, [td(escapeHtml(date)), td(destinationLabel(dest)), ...legCells(best)])
      );
      first = false;
    }
  }

  if (rows.length === 0) {
    return `<p style="${STYLE.noData}">No outbound flight data found.</p>`;
  }

  return (
    `<h3 style="${STYLE.summaryTitle}">Cheapest Outbound Flight Per Destination</h3>\n` +
    table(
      [
        'Departure Date',
        'Destination',
        'Airline(s)',
        `Departs (${options.origin})`,
        'Arrives',
        'Duration',
        'Stops',
        'Via',
        `Best Price (${options.currency})`,
        'Book',
      ],
      rows
    )
  );
}

// ============================================================================
// Document
// ============================================================================

/**
 * Full HTML email. Pure: the same aggregate, dates and trip types always
 * yield the same document apart from the report date.
 */
export function renderReport(
  aggregate: ReportAggregate,
  departureDates: string[],
  returnDates: string[],
  tripTypes: TripType[],
  reportDate: string,
  options: RenderOptions
): string {
  const total = countOffers(aggregate);
  const passengers = `${options.adults} adult${options.adults !== 1 ? 's' : ''}`;
  const returnList = returnDates.length > 0 ? returnDates.join(', ') : 'N/A';
  const rule = `<hr style="${STYLE.rule}">`;

  const blocks = tripTypes
    .map((tt) => renderTripTypeBlock(tt, aggregate.get(tt), options))
    .join(`\n${rule}\n`);

  return `<!DOCTYPE html>
<html>
<body style="${STYLE.body}">

  <h2 style="${STYLE.title}">
    Flight Price Report: ${escapeHtml(options.origin)} &harr; ${escapeHtml(options.regionLabel)}
  </h2>
  <p style="${STYLE.meta}">
    <strong>Report date:</strong> ${escapeHtml(reportDate)} &nbsp;|&nbsp;
    <strong>Passengers:</strong> ${passengers}
  </p>
  <p style="${STYLE.metaBlock}">
    <strong>Outbound dates:</strong> ${escapeHtml(departureDates.join(', '))}<br>
    <strong>Return dates:</strong> ${escapeHtml(returnList)}<br>
    <strong>Trip types:</strong> ${tripTypes.join(', ')}<br>
    <strong>Total options found:</strong> ${total}
  </p>

  ${rule}

  ${renderSummaryTable(aggregate, departureDates, options)}

  ${rule}

  ${blocks}

  <p style="${STYLE.footer}">
    Data source: SerpApi Google Flights.
    Prices are per person, economy class, and are approximate &ndash; confirm at booking.
    Google Flights links open a search for that route and date; final price may differ.
    Round-trip rows show the outbound leg; click Search to see full round-trip details.
    Report generated: ${escapeHtml(reportDate)}.
  </p>
</body>
</html>
`;
}
