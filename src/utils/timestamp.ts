const DIGITS = /^\d+$/;
// YYYY-MM-DD, optionally followed by a time and a Z, ±HH, ±HHMM or ±HH:MM offset
const ISO_8601 =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:[.,](\d+))?)?(Z|[+-]\d{2}(?::?\d{2})?)?)?$/i;

function isValidDate(date: Date): boolean {
  return !Number.isNaN(date.getTime());
}

function fromUnixSeconds(seconds: number): Date | null {
  const date = new Date(seconds * 1000);
  return isValidDate(date) ? date : null;
}

function offsetMinutes(offset: string | undefined): number | null {
  if (!offset || offset.toUpperCase() === 'Z') {
    return 0;
  }
  const sign = offset.startsWith('-') ? -1 : 1;
  const digits = offset.slice(1).replace(':', '');
  const hours = Number(digits.slice(0, 2));
  const minutes = digits.length > 2 ? Number(digits.slice(2)) : 0;
  if (hours > 23 || minutes > 59) {
    return null;
  }
  return sign * (hours * 60 + minutes);
}

/**
 * Built from the matched fields rather than `Date.parse`, whose handling
 * of non-ISO text depends on the host time zone. Naive times are UTC.
 */
function fromIsoString(raw: string): Date | null {
  const match = ISO_8601.exec(raw);
  if (!match) {
    return null;
  }
  const [, year, month, day, hour = '0', minute = '0', second = '0', fraction = '', offset] = match;
  const fields = [year, month, day, hour, minute, second].map(Number);
  const [y, mo, d, h, mi, s] = fields;
  const ms = Number(fraction.slice(0, 3).padEnd(3, '0'));

  const utc = new Date(Date.UTC(y, mo - 1, d, h, mi, s, ms));
  // Date.UTC rolls 2024-02-30 over into March; reject instead
  if (
    utc.getUTCFullYear() !== y ||
    utc.getUTCMonth() !== mo - 1 ||
    utc.getUTCDate() !== d ||
    utc.getUTCHours() !== h ||
    utc.getUTCMinutes() !== mi ||
    utc.getUTCSeconds() !== s
  ) {
    return null;
  }

  const shift = offsetMinutes(offset);
  if (shift === null) {
    return null;
  }
  const date = new Date(utc.getTime() - shift * 60_000);
  return isValidDate(date) ? date : null;
}

/**
 * Parse a Hoarder `createdAt` value.
 *
 * Numbers and digit strings are Unix seconds; other strings must be
 * ISO-8601. Returns null when the value is missing or unusable.
 */
export function parseTimestamp(value: unknown): Date | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? fromUnixSeconds(value) : null;
  }
  if (typeof value !== 'string') {
    return null;
  }

  const raw = value.trim();
  if (!raw) {
    return null;
  }
  if (DIGITS.test(raw)) {
    return fromUnixSeconds(Number(raw));
  }
  return fromIsoString(raw);
}

/**
 * Format a date the way Linkwarden stores it.
 */
export function toIsoTimestamp(date: Date): string {
  return date.toISOString();
}
