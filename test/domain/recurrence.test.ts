import { RecurrencePattern } from '../../src/domain/recurrence/RecurrencePattern';
import { nextOccurrence, occurrencesInRange, shouldOccurOn } from '../../src/domain/recurrence/recurrenceEvaluator';
import { toDateKey } from '../../src/domain/common/dates';
import { ValidationError } from '../../src/domain/common/Errors';

// 2026-01-05 is a Monday
const monday = new Date(2026, 0, 5, 9, 30);
const friday = new Date(2026, 0, 9, 18, 0);

describe('RecurrencePattern', () => {
  it('should cover the full week for daily and Monday to Friday for weekdaysOnly', () => {
    expect(RecurrencePattern.daily().weekdays).toEqual([1, 2, 3, 4, 5, 6, 7]);
    expect(RecurrencePattern.weekdaysOnly().weekdays).toEqual([1, 2, 3, 4, 5]);
    expect(RecurrencePattern.none().weekdays).toEqual([]);
    expect(RecurrencePattern.none().isRecurring).toBe(false);
  });

  it('should sort and deduplicate weekly days', () => {
    const pattern = RecurrencePattern.weekly([3, 1, 3]);
    expect(pattern.type).toBe('weekly');
    expect(pattern.weekdays).toEqual([1, 3]);
  });

  it('should reject an empty or out-of-range weekly set', () => {
    expect(() => RecurrencePattern.weekly([])).toThrow(ValidationError);
    expect(() => RecurrencePattern.weekly([0, 2])).toThrow(ValidationError);
    expect(() => RecurrencePattern.weekly([8])).toThrow(ValidationError);
  });

  it('should keep only the calendar date of an end date timestamp', () => {
    expect(RecurrencePattern.daily('2026-03-01T00:00:00.000Z').endDate).toBe('2026-03-01');
    expect(() => RecurrencePattern.daily('next week')).toThrow(ValidationError);
  });

  describe('fromJson', () => {
    it('should decode what toJson wrote', () => {
      const pattern = RecurrencePattern.weekly([2, 4], '2026-06-30');
      expect(RecurrencePattern.fromJson(pattern.toJson()).equals(pattern)).toBe(true);
    });

    it('should read the legacy weekdays type as weekdaysOnly', () => {
      const pattern = RecurrencePattern.fromJson('{"type":"weekdays"}');
      expect(pattern.type).toBe('weekdaysOnly');
      expect(pattern.weekdays).toEqual([1, 2, 3, 4, 5]);
    });

    it('should decode anything unreadable to none', () => {
      expect(RecurrencePattern.fromJson(null).type).toBe('none');
      expect(RecurrencePattern.fromJson('').type).toBe('none');
      expect(RecurrencePattern.fromJson('not json').type).toBe('none');
      expect(RecurrencePattern.fromJson('{"type":"monthly"}').type).toBe('none');
      expect(RecurrencePattern.fromJson('{"type":"weekly","weekdays":[]}').type).toBe('none');
      expect(RecurrencePattern.fromJson('[1,2]').type).toBe('none');
    });
  });

  it('should describe itself', () => {
    expect(RecurrencePattern.none().describe()).toBe('No recurrence');
    expect(RecurrencePattern.daily().describe()).toBe('Daily');
    expect(RecurrencePattern.weekdaysOnly('2026-02-01').describe()).toBe('Weekdays only until 2026-02-01');
    expect(RecurrencePattern.weekly([1, 3]).describe()).toBe('Weekly on Mon, Wed');
  });
});

describe('recurrenceEvaluator', () => {
  it('should never occur for none', () => {
    expect(shouldOccurOn(RecurrencePattern.none(), monday)).toBe(false);
    expect(nextOccurrence(RecurrencePattern.none(), monday)).toBeNull();
  });

  it('should treat the end date as inclusive', () => {
    const pattern = RecurrencePattern.daily('2026-01-06');
    expect(shouldOccurOn(pattern, new Date(2026, 0, 6, 23, 59))).toBe(true);
    expect(shouldOccurOn(pattern, new Date(2026, 0, 7, 0, 0))).toBe(false);
  });

  it('should find the next occurrence strictly after the given day', () => {
    const next = nextOccurrence(RecurrencePattern.daily(), monday);
    expect(next).not.toBeNull();
    expect(next && toDateKey(next)).toBe('2026-01-06');
    expect(next?.getHours()).toBe(0);
  });

  it('should skip the weekend for weekdaysOnly', () => {
    const next = nextOccurrence(RecurrencePattern.weekdaysOnly(), friday);
    expect(next && toDateKey(next)).toBe('2026-01-12');
  });

  it('should wrap to the following week for weekly patterns', () => {
    const next = nextOccurrence(RecurrencePattern.weekly([1]), monday);
    expect(next && toDateKey(next)).toBe('2026-01-12');
  });

  it('should return null once the end date has passed', () => {
    expect(nextOccurrence(RecurrencePattern.daily('2026-01-05'), monday)).toBeNull();
  });

  it('should list occurrences in an inclusive range', () => {
    const dates = occurrencesInRange(RecurrencePattern.weekly([1]), new Date(2026, 0, 1), new Date(2026, 0, 26));
    expect(dates.map(toDateKey)).toEqual(['2026-01-05', '2026-01-12', '2026-01-19', '2026-01-26']);
  });
});
