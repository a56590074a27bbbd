/**
 * Calendar-date helpers. Dates travel as YYYY-MM-DD strings, which sort
 * lexicographically in date order.
 */

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const DAY_MS = 24 * 60 * 60 * 1000;

const MONTHS = [
  'january', 'february', 'march', 'april', 'may', 'june',
  'july', 'august', 'september', 'october', 'november', 'december',
];

export const LONG_DATE_PATTERN =
  /\b(January|February|March|April|May|June|July|August|September|October|November|December)\s+(\d{1,2}),\s+(\d{4})\b/;

function pad(n: number, width = 2): string {
  return String(n).padStart(width, '0');
}

function toIso(year: number, month: number, day: number): string | null {
  const date = new Date(Date.UTC(year, month - 1, day));
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return null;
  }
  return `${pad(year, 4)}-${pad(month)}-${pad(day)}`;
}

/**
 * Parses a stored `datePosted` value. Anything that is not a real
 * YYYY-MM-DD calendar date yields null ("unknown").
 */
export function parseIsoDate(value: string | null | undefined): string | null {
  const match = ISO_DATE.exec((value ?? '').trim());
  if (!match) return null;
  return toIso(Number(match[1]), Number(match[2]), Number(match[3]));
}

/**
 * Parses "January 5, 2024" style dates
 */
export function parseLongDate(text: string): string | null {
  const match = LONG_DATE_PATTERN.exec(text);
  if (!match) return null;
  const month = MONTHS.indexOf(match[1].toLowerCase()) + 1;
  return toIso(Number(match[3]), month, Number(match[2]));
}

/**
 * Today's calendar date in the given IANA time zone
 */
export function todayIn(timeZone: string, now: Date = new Date()): string {
  const parts = new Intl.DateTimeFormat('en-US', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
  }).formatToParts(now);

  const part = (type: Intl.DateTimeFormatPartTypes): number =>
    Number(parts.find(p => p.type === type)?.value);

  return `${pad(part('year'), 4)}-${pad(part('month'))}-${pad(part('day'))}`;
}

/**
 * Moves a YYYY-MM-DD date by a number of days (negative goes back)
 */
export function shiftDays(isoDate: string, days: number): string {
  const parsed = parseIsoDate(isoDate);
  if (!parsed) {
    throw new Error(`Invalid calendar date: ${isoDate}`);
  }
  const [year, month, day] = parsed.split('-').map(Number);
  const shifted = new Date(Date.UTC(year, month - 1, day) + days * DAY_MS);
  return `${pad(shifted.getUTCFullYear(), 4)}-${pad(shifted.getUTCMonth() + 1)}-${pad(shifted.getUTCDate())}`;
}
