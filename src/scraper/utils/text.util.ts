export const NA_PRICE = 'NA';
export const UNKNOWN_AVAILABILITY = 'Unknown';

/**
 * Collapse whitespace runs (newlines, tabs, nbsp) into single spaces
 */
export function cleanTitle(title: string): string {
  return title.split(/\s+/).filter(Boolean).join(' ');
}

export function cleanAvailability(availability?: string | null): string {
  if (!availability) return UNKNOWN_AVAILABILITY;
  return cleanTitle(availability);
}

/**
 * Normalize a displayed price into a plain decimal string.
 * Handles:
 * - US grouping: $1,234.56 -> 1234.56
 * - European decimals: €99,99 -> 99.99 (only for the short `ddd,dd` shape)
 * - Bare grouping without decimals: 1,234 -> 1234
 * Returns 'NA' when no number can be found.
 */
export function extractPrice(priceText: string | null | undefined): string {
  if (!priceText) return NA_PRICE;

  let cleaned = priceText.replace(/\$|£|€|EUR/g, '').trim();

  if (cleaned.includes(',') && cleaned.includes('.')) {
    cleaned = cleaned.replace(/,/g, '');
  } else if (cleaned.includes(',')) {
    cleaned = /^\d{1,3},\d{2}$/.test(cleaned) ? cleaned.replace(',', '.') : cleaned.replace(/,/g, '');
  }

  const match = cleaned.match(/\d+(?:\.\d{1,2})?/);
  return match ? match[0] : NA_PRICE;
}

/**
 * Convert a scraped price string to a number; 'NA', blanks and garbage become null
 */
export function toPriceValue(price: string | null | undefined): number | null {
  if (price === null || price === undefined || price === '' || price === NA_PRICE) {
    return null;
  }
  const value = Number(price);
  return Number.isFinite(value) ? value : null;
}

const pad = (value: number): string => String(value).padStart(2, '0');

/**
 * Local calendar date as YYYY-MM-DD
 */
export function formatDate(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

/**
 * Local timestamp as yyyyMMdd_HHmmss, used in snapshot file names
 */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}
