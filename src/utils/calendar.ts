export const MS_PER_DAY = 24 * 60 * 60 * 1000;

/** UTC calendar day, `YYYY-MM-DD`. */
export function dayKey(at: Date): string {
  return at.toISOString().slice(0, 10);
}

/** UTC calendar month, `YYYY-MM`. */
export function monthKey(at: Date): string {
  return at.toISOString().slice(0, 7);
}

export function isSameCalendarDay(a: Date, b: Date): boolean {
  return dayKey(a) === dayKey(b);
}

export function parseInstant(value: string | null): Date | null {
  if (!value) return null;
  const parsed = new Date(value);
  return Number.isNaN(parsed.getTime()) ? null : parsed;
}

/** Whole days from `from`'s calendar day to `to`'s calendar day. */
export function calendarDaysBetween(from: Date, to: Date): number {
  const start = Date.parse(`${dayKey(from)}T00:00:00.000Z`);
  const end = Date.parse(`${dayKey(to)}T00:00:00.000Z`);
  return Math.round((end - start) / MS_PER_DAY);
}

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();
