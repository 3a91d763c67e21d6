import chalk from 'chalk';
import Table from 'cli-table3';

export type Cell = string | number;

export function outputJSON(data: unknown) {
  console.log(JSON.stringify({ success: true, data }, null, 2));
}

export function outputTable(headers: string[], rows: Cell[][]) {
  const table = new Table({
    head: headers.map(h => chalk.cyan(h)),
    style: { head: [], border: [] }
  });
  table.push(...rows);
  console.log(table.toString());
}

export function outputKeyValue(key: string, value: Cell) {
  console.log(`${chalk.bold(key)}: ${value}`);
}

const PRIORITY_NAMES = ['Very Low', 'Low', 'Medium', 'High', 'Very High'];

/**
 * "4 (High)", colored by urgency of the level.
 */
export function formatPriority(priority: number): string {
  const name = PRIORITY_NAMES[priority - 1] ?? 'Unknown';
  const text = `${priority} (${name})`;
  if (priority >= 5) return chalk.red(text);
  if (priority === 4) return chalk.yellow(text);
  return text;
}

export function formatSchedule(date: string | null, time: string | null): string {
  if (!date && !time) return chalk.gray('-');
  return [date, time].filter(Boolean).join(' ');
}

/**
 * Compact duration such as `1h 05m` or `42s`.
 */
export function formatDuration(seconds: number): string {
  const hours = Math.floor(seconds / 3600);
  const minutes = Math.floor((seconds % 3600) / 60);
  const rest = seconds % 60;
  if (hours > 0) return `${hours}h ${String(minutes).padStart(2, '0')}m`;
  if (minutes > 0) return `${minutes}m ${String(rest).padStart(2, '0')}s`;
  return `${rest}s`;
}
