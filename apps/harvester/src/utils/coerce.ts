/**
 * Text to typed value conversions used at the markup and CSV boundaries.
 * Each function returns undefined (or a documented default) instead of throwing.
 */

const MONTHS = new Map<string, number>(
  ['jan', 'feb', 'mar', 'apr', 'may', 'jun', 'jul', 'aug', 'sep', 'oct', 'nov', 'dec'].map((name, i) => [name, i])
);

const CATALOG_DATE_PATTERN = /^([A-Za-z]{3}) (\d{1,2}), (\d{4})$/;
const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})(?:[T ].*)?$/;

/**
 * Trims and collapses whitespace; blank text becomes undefined.
 */
export function cleanText(value: string | null | undefined): string | undefined {
  if (value == null) return undefined;
  const cleaned = value.replace(/\s+/g, ' ').trim();
  return cleaned === '' ? undefined : cleaned;
}

/**
 * Numeric value of a rank label such as "12.". Anything that is not a plain
 * number once trailing dots are dropped counts as 0.
 */
export function parseRankValue(rank: string | undefined): number {
  if (!rank) return 0;
  const digits = rank.trim().replace(/\.+$/, '');
  return /^\d+$/.test(digits) ? Number(digits) : 0;
}

function utcDate(year: number, monthIndex: number, day: number): Date | undefined {
  const date = new Date(Date.UTC(year, monthIndex, day));
  // Date.UTC rolls Feb 30 over into March
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== monthIndex || date.getUTCDate() !== day) {
    return undefined;
  }
  return date;
}

/**
 * Parses the catalog's "Mar 3, 2017" format.
 */
export function parseCatalogDate(text: string | undefined): Date | undefined {
  const cleaned = cleanText(text);
  if (!cleaned) return undefined;

  const match = CATALOG_DATE_PATTERN.exec(cleaned);
  if (!match) return undefined;

  const month = MONTHS.get(match[1].toLowerCase());
  if (month === undefined) return undefined;

  return utcDate(Number(match[3]), month, Number(match[2]));
}

/**
 * Parses "yyyy-MM-dd", ignoring a trailing time part.
 */
export function parseIsoDate(text: string | undefined): Date | undefined {
  const cleaned = cleanText(text);
  if (!cleaned) return undefined;

  const match = ISO_DATE_PATTERN.exec(cleaned);
  if (!match) return undefined;

  return utcDate(Number(match[1]), Number(match[2]) - 1, Number(match[3]));
}

export function formatIsoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export function parseMetascore(text: string | undefined): number | undefined {
  const cleaned = cleanText(text);
  if (!cleaned || !/^\d+$/.test(cleaned)) return undefined;

  const score = Number(cleaned);
  return score <= 100 ? score : undefined;
}

/**
 * Makes a card link absolute. Root-relative links are prefixed with the
 * catalog origin, absolute ones pass through.
 */
export function resolveCatalogUrl(href: string | undefined, origin: string): string | undefined {
  const cleaned = cleanText(href);
  if (!cleaned) return undefined;
  if (cleaned.startsWith('/')) {
    return origin.replace(/\/+$/, '') + cleaned;
  }
  return cleaned;
}
