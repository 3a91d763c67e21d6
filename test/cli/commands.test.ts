import { parseDateKey } from '../../src/domain/common/dates';
import { RecurrencePattern } from '../../src/domain/recurrence/RecurrencePattern';
import { parseIntArg, parseNumberArg, parseWeekdays } from '../../src/cli/commands/args';
import { upcomingDates } from '../../src/cli/commands/recurrence';
import { recurrenceFromOptions } from '../../src/cli/commands/task';
import { UsageError } from '../../src/cli/utils/errors';

function date(key: string): Date {
  const parsed = parseDateKey(key);
  if (!parsed) throw new Error(`bad test date ${key}`);
  return parsed;
}

describe('argument parsing', () => {
  it('should parse integers and reject anything else', () => {
    expect(parseIntArg(' 42 ', 'id')).toBe(42);
    expect(parseIntArg('-3', 'offset')).toBe(-3);
    expect(() => parseIntArg('4.5', 'id')).toThrow('id must be an integer, got "4.5"');
    expect(() => parseIntArg('abc', 'id')).toThrow(UsageError);
  });

  it('should parse coordinates', () => {
    expect(parseNumberArg('52.52', 'latitude')).toBe(52.52);
    expect(() => parseNumberArg('', 'latitude')).toThrow('latitude must be a number, got ""');
    expect(() => parseNumberArg('north', 'latitude')).toThrow(UsageError);
  });

  it('should parse weekday lists', () => {
    expect(parseWeekdays('1, 3,5')).toEqual([1, 3, 5]);
    expect(() => parseWeekdays('0,2')).toThrow('Weekdays must be numbers from 1 (Monday) to 7 (Sunday), got "0,2"');
    expect(() => parseWeekdays(',')).toThrow(UsageError);
  });
});

describe('recurrenceFromOptions', () => {
  it('should return null for one-off tasks', () => {
    expect(recurrenceFromOptions({})).toBeNull();
    expect(recurrenceFromOptions({ repeat: 'none' })).toBeNull();
  });

  it('should build daily and weekday rules', () => {
    expect(recurrenceFromOptions({ repeat: 'daily', until: '2026-02-01' })).toEqual({
      type: 'daily',
      weekdays: [1, 2, 3, 4, 5, 6, 7],
      endDate: '2026-02-01',
    });
    expect(recurrenceFromOptions({ repeat: 'weekdays' })).toEqual({
      type: 'weekdaysOnly',
      weekdays: [1, 2, 3, 4, 5],
      endDate: null,
    });
  });

  it('should require days for weekly rules', () => {
    expect(recurrenceFromOptions({ repeat: 'weekly', days: '2,4' })).toEqual({
      type: 'weekly',
      weekdays: [2, 4],
      endDate: null,
    });
    expect(() => recurrenceFromOptions({ repeat: 'weekly' })).toThrow('--repeat weekly needs --days, e.g. --days 1,3,5');
  });

  it('should reject unknown repeat kinds', () => {
    expect(() => recurrenceFromOptions({ repeat: 'monthly' }))
      .toThrow('Unknown repeat "monthly" (use none, daily, weekdays or weekly)');
  });
});

describe('upcomingDates', () => {
  it('should skip weekends for weekday rules', () => {
    expect(upcomingDates(RecurrencePattern.weekdaysOnly(), date('2026-01-09'), 3))
      .toEqual(['2026-01-12', '2026-01-13', '2026-01-14']);
  });

  it('should stop at the end date', () => {
    const pattern = RecurrencePattern.weekly([1], '2026-01-20');

    expect(upcomingDates(pattern, date('2026-01-05'), 5)).toEqual(['2026-01-12', '2026-01-19']);
  });

  it('should return nothing for a non-recurring rule', () => {
    expect(upcomingDates(RecurrencePattern.none(), date('2026-01-05'), 3)).toEqual([]);
  });
});
