import { addDays, getISODay, isAfter, startOfDay } from 'date-fns';
import { toDateKey } from '../common/dates';
import { RecurrencePattern } from './RecurrencePattern';

/**
 * How far `nextOccurrence` looks ahead. Callers needing a longer horizon
 * call again with a later `after`.
 */
export const MAX_LOOKAHEAD_DAYS = 14;

export function shouldOccurOn(pattern: RecurrencePattern, date: Date): boolean {
  if (pattern.type === 'none') return false;
  if (pattern.endDate !== null && toDateKey(date) > pattern.endDate) return false;
  return pattern.weekdays.includes(getISODay(date));
}

/**
 * First occurrence strictly after the calendar day of `after`, within
 * MAX_LOOKAHEAD_DAYS. Returned dates are local midnight.
 */
export function nextOccurrence(pattern: RecurrencePattern, after: Date): Date | null {
  const firstCandidate = startOfDay(addDays(after, 1));
  for (let offset = 0; offset < MAX_LOOKAHEAD_DAYS; offset++) {
    const candidate = addDays(firstCandidate, offset);
    if (shouldOccurOn(pattern, candidate)) {
      return candidate;
    }
  }
  return null;
}

/**
 * Every occurrence in [start, end], both ends inclusive.
 */
export function occurrencesInRange(pattern: RecurrencePattern, start: Date, end: Date): Date[] {
  const last = startOfDay(end);
  const dates: Date[] = [];
  for (let day = startOfDay(start); !isAfter(day, last); day = addDays(day, 1)) {
    if (shouldOccurOn(pattern, day)) {
      dates.push(day);
    }
  }
  return dates;
}
