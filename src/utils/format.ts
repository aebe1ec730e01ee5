/**
 * Display formatting for offer fields.
 */

export interface LayoverInput {
  id?: string;
  duration?: number;
}

/** Shown in place of a layover list for a direct flight. */
export const DIRECT_MARKER = '—';

const priceFormatter = new Intl.NumberFormat('en-US', {
  minimumFractionDigits: 0,
  maximumFractionDigits: 0,
});

/**
 * Whole minutes as "14h 30m", or "2h" when the minutes part is zero.
 */
export function formatMinutes(mins: number): string {
  const total = Math.trunc(mins);
  const h = Math.floor(total / 60);
  const m = total % 60;
  return m ? `${h}h ${m}m` : `${h}h`;
}

/**
 * "ICN (1h 35m) · PVG (2h 10m)"; a missing airport shows as "?", a
 * missing duration as 0h.
 */
export function formatLayovers(layovers: LayoverInput[]): string {
  if (layovers.length === 0) return DIRECT_MARKER;
  return layovers
    .map((l) => `${l.id ?? '?'} (${formatMinutes(l.duration ?? 0)})`)
    .join(' · ');
}

export function formatStops(count: number): string {
  if (count === 0) return 'Direct';
  return `${count} stop${count > 1 ? 's' : ''}`;
}

/** 1450 → "1,450" */
export function formatPrice(amount: number): string {
  return priceFormatter.format(amount);
}
