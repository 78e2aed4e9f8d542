// Calendar-day helpers. A "day" is a YYYY-MM-DD string in server local time.

const ISO_DAY = /^\d{4}-\d{2}-\d{2}$/;

export function toISODate(value: Date): string {
  const y = value.getFullYear();
  const m = String(value.getMonth() + 1).padStart(2, "0");
  const d = String(value.getDate()).padStart(2, "0");
  return `${y}-${m}-${d}`;
}

/** Local midnight of an ISO day, or null when the string is not a real date. */
export function parseISODate(iso: string): Date | null {
  if (!ISO_DAY.test(iso)) return null;
  const [year, month, day] = iso.split("-").map((part) => Number(part));
  const date = new Date(year, month - 1, day);
  if (date.getFullYear() !== year || date.getMonth() !== month - 1 || date.getDate() !== day) {
    return null;
  }
  return date;
}

export function isISODate(value: string): boolean {
  return parseISODate(value) !== null;
}

export function addDays(iso: string, offset: number): string {
  const base = parseISODate(iso);
  if (!base) throw new RangeError(`Not a calendar date: ${iso}`);
  base.setDate(base.getDate() + offset);
  return toISODate(base);
}

/** Monday of the ISO week containing `iso` (Monday=1 … Sunday=7). */
export function mondayOf(iso: string): string {
  const date = parseISODate(iso);
  if (!date) throw new RangeError(`Not a calendar date: ${iso}`);
  const isoWeekday = ((date.getDay() + 6) % 7) + 1;
  return addDays(iso, -(isoWeekday - 1));
}

// ISO day strings compare correctly as plain strings.
export function isWithin(iso: string, from: string, to: string): boolean {
  return iso >= from && iso <= to;
}

export function formatDayLabel(day: string, now: Date): string {
  const today = toISODate(now);
  if (day === today) return "Today";
  if (day === addDays(today, -1)) return "Yesterday";
  return day;
}

/** Accepts what pg hands back for date/timestamp columns. */
export function normalizeDay(value: string | Date): string {
  if (value instanceof Date) return toISODate(value);
  return value.slice(0, 10);
}
