import chalk from 'chalk';
import { formatDuration, formatPriority, formatSchedule, outputJSON, outputKeyValue } from '../../src/cli/utils/formatter';

describe('formatter', () => {
  const originalLevel = chalk.level;

  beforeAll(() => {
    chalk.level = 0;
  });

  afterAll(() => {
    chalk.level = originalLevel;
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('outputJSON prints valid JSON to stdout', () => {
    const consoleSpy = jest.spyOn(console, 'log').mockImplementation(() => {});
    const data = { id: 1, name: 'Buy milk' };

    outputJSON(data);

    expect(consoleSpy).toHaveBeenCalledWith(JSON.stringify({ success: true, data }, null, 2));
  });

  it('outputKeyValue prints one line', () => {
    const consoleSpy = jest.spyOn(console, 'log').mockImplementation(() => {});

    outputKeyValue('Priority', 4);

    expect(consoleSpy).toHaveBeenCalledWith('Priority: 4');
  });

  it('should name priority levels', () => {
    expect(formatPriority(1)).toBe('1 (Very Low)');
    expect(formatPriority(3)).toBe('3 (Medium)');
    expect(formatPriority(5)).toBe('5 (Very High)');
    expect(formatPriority(9)).toBe('9 (Unknown)');
  });

  it('should join date and time of a schedule', () => {
    expect(formatSchedule('2026-01-05', '09:30')).toBe('2026-01-05 09:30');
    expect(formatSchedule('2026-01-05', null)).toBe('2026-01-05');
    expect(formatSchedule(null, '09:30')).toBe('09:30');
    expect(formatSchedule(null, null)).toBe('-');
  });

  it('should format durations compactly', () => {
    expect(formatDuration(3900)).toBe('1h 05m');
    expect(formatDuration(125)).toBe('2m 05s');
    expect(formatDuration(42)).toBe('42s');
    expect(formatDuration(0)).toBe('0s');
  });
});
