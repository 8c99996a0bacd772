const MONTHS = ["jan", "feb", "mar", "apr", "may", "jun", "jul", "aug", "sep", "oct", "nov", "dec"];

const ISO_PREFIX = /^(\d{4})-(\d{2})-(\d{2})/;
const MONTH_FIRST = /\b([A-Za-z]{3,9})\.?\s+(\d{1,2}),?\s+(\d{4})\b/;
const DAY_FIRST = /\b(\d{1,2})\s+([A-Za-z]{3,9})\.?,?\s+(\d{4})\b/;

function pad(value: number) {
  return String(value).padStart(2, "0");
}

function monthIndex(name: string) {
  return MONTHS.indexOf(name.slice(0, 3).toLowerCase());
}

function buildDate(year: number, month: number, day: number): string | null {
  if (month < 0 || month > 11 || day < 1) return null;
  const probe = new Date(Date.UTC(year, month, day));
  if (probe.getUTCMonth() !== month || probe.getUTCDate() !== day) return null;
  return `${year}-${pad(month + 1)}-${pad(day)}`;
}

/**
 * Reduces a source date to `YYYY-MM-DD`. Accepts ISO dates and date-times
 * (the calendar part is taken as written), "Feb 15 2026" / "15 February 2026"
 * text, and epoch milliseconds. Returns null for anything else.
 */
export function toCalendarDate(value: unknown): string | null {
  if (typeof value === "number") {
    if (!Number.isFinite(value)) return null;
    const date = new Date(value);
    return Number.isNaN(date.getTime()) ? null : date.toISOString().slice(0, 10);
  }
  if (typeof value !== "string") return null;
  const text = value.trim();
  if (!text) return null;

  const iso = text.match(ISO_PREFIX);
  if (iso) {
    return buildDate(Number(iso[1]), Number(iso[2]) - 1, Number(iso[3]));
  }

  const monthFirst = text.match(MONTH_FIRST);
  if (monthFirst) {
    return buildDate(Number(monthFirst[3]), monthIndex(monthFirst[1]), Number(monthFirst[2]));
  }

  const dayFirst = text.match(DAY_FIRST);
  if (dayFirst) {
    return buildDate(Number(dayFirst[3]), monthIndex(dayFirst[2]), Number(dayFirst[1]));
  }

  return null;
}

/** Local calendar date of `date`, as `YYYY-MM-DD`. */
export function localDateString(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

/** Local wall-clock time of `date`, as `HH:MM:SS`. */
export function localTimeString(date: Date): string {
  return `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}
