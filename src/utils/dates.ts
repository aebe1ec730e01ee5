/**
 * Calendar helpers working on local YYYY-MM-DD strings.
 */

export function formatIsoDate(date: Date): string {
  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${year}-${month}-${day}`;
}

export function addDays(dateStr: string, days: number): string {
  const [y, m, d] = dateStr.split('-').map(Number);
  return formatIsoDate(new Date(y, m - 1, d + days));
}

/**
 * Plain string comparison for zero-padded dates and clock times, where
 * code-unit order is chronological order.
 */
export function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
