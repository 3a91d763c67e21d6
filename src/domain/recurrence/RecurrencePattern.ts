import { z } from 'zod';
import { ValidationError } from '../common/Errors';
import { isDateKey } from '../common/dates';
import { RecurrencePatternData, RecurrenceType } from '../../types';

const FULL_WEEK: readonly number[] = [1, 2, 3, 4, 5, 6, 7];
const WORK_WEEK: readonly number[] = [1, 2, 3, 4, 5];
const DAY_NAMES = ['Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat', 'Sun'];

const storedPatternSchema = z.object({
  type: z.string(),
  weekdays: z.array(z.number()).optional(),
  endDate: z.string().nullable().optional(),
});

function normalizeType(type: string): RecurrenceType | null {
  switch (type) {
    case 'none':
    case 'daily':
    case 'weekly':
    case 'weekdaysOnly':
      return type;
    case 'weekdays':
      return 'weekdaysOnly';
    default:
      return null;
  }
}

// Accepts a date key or a full ISO timestamp and keeps the calendar date.
function normalizeEndDate(endDate: string | null | undefined): string | null {
  if (endDate === null || endDate === undefined || endDate === '') return null;
  const key = endDate.slice(0, 10);
  if (!isDateKey(key)) {
    throw new ValidationError(`Invalid recurrence end date: ${endDate}`);
  }
  return key;
}

/**
 * Immutable recurrence rule attached to a task.
 *
 * Weekday invariants hold for every instance: `daily` covers the full week,
 * `weekdaysOnly` covers Monday to Friday, `weekly` has at least one day in
 * 1..7 and `none` has no days.
 */
export class RecurrencePattern {
  private constructor(
    public readonly type: RecurrenceType,
    public readonly weekdays: readonly number[],
    public readonly endDate: string | null
  ) {}

  static none(): RecurrencePattern {
    return new RecurrencePattern('none', [], null);
  }

  static daily(endDate: string | null = null): RecurrencePattern {
    return new RecurrencePattern('daily', FULL_WEEK, normalizeEndDate(endDate));
  }

  static weekdaysOnly(endDate: string | null = null): RecurrencePattern {
    return new RecurrencePattern('weekdaysOnly', WORK_WEEK, normalizeEndDate(endDate));
  }

  /**
   * @throws {ValidationError} when the set is empty or holds a day outside 1..7
   */
  static weekly(weekdays: Iterable<number>, endDate: string | null = null): RecurrencePattern {
    const days = [...new Set(weekdays)].sort((a, b) => a - b);
    if (days.length === 0) {
      throw new ValidationError('Weekly recurrence needs at least one weekday');
    }
    const invalid = days.filter(day => !Number.isInteger(day) || day < 1 || day > 7);
    if (invalid.length > 0) {
      throw new ValidationError('Weekdays must be integers from 1 (Monday) to 7 (Sunday)', { invalid });
    }
    return new RecurrencePattern('weekly', days, normalizeEndDate(endDate));
  }

  static fromData(data: RecurrencePatternData): RecurrencePattern {
    switch (data.type) {
      case 'none':
        return RecurrencePattern.none();
      case 'daily':
        return RecurrencePattern.daily(data.endDate);
      case 'weekdaysOnly':
        return RecurrencePattern.weekdaysOnly(data.endDate);
      case 'weekly':
        return RecurrencePattern.weekly(data.weekdays, data.endDate);
    }
  }

  /**
   * Decode a stored pattern. Anything unreadable decodes to `none`.
   */
  static fromJson(json: string | null | undefined): RecurrencePattern {
    if (!json) return RecurrencePattern.none();

    let raw: unknown;
    try {
      raw = JSON.parse(json);
    } catch {
      return RecurrencePattern.none();
    }

    const parsed = storedPatternSchema.safeParse(raw);
    if (!parsed.success) return RecurrencePattern.none();

    const type = normalizeType(parsed.data.type);
    if (type === null) return RecurrencePattern.none();

    try {
      return RecurrencePattern.fromData({
        type,
        weekdays: parsed.data.weekdays ?? [],
        endDate: parsed.data.endDate ?? null,
      });
    } catch {
      return RecurrencePattern.none();
    }
  }

  get isRecurring(): boolean {
    return this.type !== 'none';
  }

  toData(): RecurrencePatternData {
    return { type: this.type, weekdays: [...this.weekdays], endDate: this.endDate };
  }

  toJson(): string {
    return JSON.stringify(this.toData());
  }

  equals(other: RecurrencePattern): boolean {
    return this.type === other.type
      && this.endDate === other.endDate
      && this.weekdays.length === other.weekdays.length
      && this.weekdays.every((day, i) => other.weekdays[i] === day);
  }

  describe(): string {
    if (this.type === 'none') return 'No recurrence';
    const text = this.type === 'daily'
      ? 'Daily'
      : this.type === 'weekdaysOnly'
        ? 'Weekdays only'
        : `Weekly on ${this.weekdays.map(day => DAY_NAMES[day - 1]).join(', ')}`;
    return this.endDate ? `${text} until ${this.endDate}` : text;
  }
}
