import { format, isValid, parse } from 'date-fns';

const DATE_KEY = /^\d{4}-\d{2}-\d{2}$/;
const TIME_OF_DAY = /^([01]\d|2[0-3]):([0-5]\d)$/;

/**
 * Local calendar date as `yyyy-MM-dd`. Keys of this shape sort chronologically.
 */
export function toDateKey(date: Date): string {
  return format(date, 'yyyy-MM-dd');
}

/**
 * Parse a `yyyy-MM-dd` key into local midnight, or null when it is not a real date.
 */
export function parseDateKey(key: string): Date | null {
  if (!DATE_KEY.test(key)) return null;
  const date = parse(key, 'yyyy-MM-dd', new Date());
  return isValid(date) ? date : null;
}

export function isDateKey(value: string): boolean {
  return parseDateKey(value) !== null;
}

export interface TimeOfDay {
  hours: number;
  minutes: number;
}

export function parseTimeOfDay(value: string): TimeOfDay | null {
  const match = TIME_OF_DAY.exec(value);
  if (!match) return null;
  return { hours: Number(match[1]), minutes: Number(match[2]) };
}

export function isTimeOfDay(value: string): boolean {
  return parseTimeOfDay(value) !== null;
}
