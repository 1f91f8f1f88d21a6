/**
 * Calendar-date helpers. Every date in the planner is an ISO `YYYY-MM-DD`
 * string interpreted in UTC, so day arithmetic never shifts with the host
 * timezone or daylight-saving changes.
 */

const MS_PER_DAY = 86_400_000;

function toIsoDate(year: number, month: number, day: number): string | null {
  const date = new Date(Date.UTC(year, month - 1, day));
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return null;
  }
  return date.toISOString().slice(0, 10);
}

/**
 * Accepts `YYYY-MM-DD`, `YYYY/MM/DD` and `MM/DD/YYYY`. Returns null for
 * anything else, including impossible dates such as `2024-02-30`.
 */
export function parseCalendarDate(value: unknown): string | null {
  if (value === null || value === undefined) return null;
  const str = String(value).trim();
  if (!str) return null;

  const isoMatch = str.match(/^(\d{4})[-/](\d{1,2})[-/](\d{1,2})$/);
  if (isoMatch) {
    const [, year, month, day] = isoMatch;
    return toIsoDate(parseInt(year, 10), parseInt(month, 10), parseInt(day, 10));
  }

  const usMatch = str.match(/^(\d{1,2})\/(\d{1,2})\/(\d{4})$/);
  if (usMatch) {
    const [, month, day, year] = usMatch;
    return toIsoDate(parseInt(year, 10), parseInt(month, 10), parseInt(day, 10));
  }

  return null;
}

function dayNumber(isoDate: string): number {
  const [year, month, day] = isoDate.split("-").map((part) => parseInt(part, 10));
  return Math.round(Date.UTC(year, month - 1, day) / MS_PER_DAY);
}

/** Signed whole days from `from` to `to`. */
export function daysBetween(from: string, to: string): number {
  return dayNumber(to) - dayNumber(from);
}

export function addDays(isoDate: string, days: number): string {
  return new Date((dayNumber(isoDate) + days) * MS_PER_DAY).toISOString().slice(0, 10);
}

export function isoDateFromInstant(instant: Date): string {
  return instant.toISOString().slice(0, 10);
}
