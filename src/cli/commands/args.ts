import { UsageError } from '../utils/errors';

export function parseIntArg(value: string, name: string): number {
  if (!/^-?\d+$/.test(value.trim())) {
    throw new UsageError(`${name} must be an integer, got "${value}"`);
  }
  return parseInt(value, 10);
}

export function parseNumberArg(value: string, name: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed)) {
    throw new UsageError(`${name} must be a number, got "${value}"`);
  }
  return parsed;
}

/**
 * "1,3,5" into [1, 3, 5]; every entry must be an ISO weekday.
 */
export function parseWeekdays(list: string): number[] {
  const days = list.split(',').map(part => part.trim()).filter(Boolean).map(part => parseIntArg(part, 'weekday'));
  if (days.length === 0 || days.some(day => day < 1 || day > 7)) {
    throw new UsageError(`Weekdays must be numbers from 1 (Monday) to 7 (Sunday), got "${list}"`);
  }
  return days;
}
