import { Command } from 'commander';
import { parseDateKey, toDateKey } from '../../domain/common/dates';
import { RecurrencePattern } from '../../domain/recurrence/RecurrencePattern';
import { nextOccurrence } from '../../domain/recurrence/recurrenceEvaluator';
import { outputJSON, outputKeyValue } from '../utils/formatter';
import { handleError, UsageError } from '../utils/errors';
import { recurrenceFromOptions } from './task';
import { parseIntArg } from './args';

interface NextOptions {
  repeat: string;
  days?: string;
  until?: string;
  after?: string;
  count: string;
}

/**
 * Next `count` dates of a rule, computed locally.
 */
export function upcomingDates(pattern: RecurrencePattern, after: Date, count: number): string[] {
  const dates: string[] = [];
  let cursor = after;
  while (dates.length < count) {
    const next = nextOccurrence(pattern, cursor);
    if (!next) break;
    dates.push(toDateKey(next));
    cursor = next;
  }
  return dates;
}

export function registerRecurrenceCommands(program: Command) {
  const recurrence = program.command('recurrence').description('Inspect recurrence rules');

  recurrence.command('next')
    .description('Show the next dates a rule applies to (no server needed)')
    .requiredOption('-r, --repeat <kind>', 'daily, weekdays or weekly')
    .option('--days <list>', 'ISO weekdays for weekly repeats, Monday = 1')
    .option('--until <yyyy-MM-dd>', 'Last date of the repeat')
    .option('--after <yyyy-MM-dd>', 'Start looking after this date (default today)')
    .option('-n, --count <n>', 'How many dates', '5')
    .action((cmdOpts: NextOptions) => {
      const isJson = program.opts().json === true;

      try {
        const data = recurrenceFromOptions(cmdOpts);
        if (!data) throw new UsageError('--repeat none has no occurrences');
        const pattern = RecurrencePattern.fromData(data);

        const after = cmdOpts.after ? parseDateKey(cmdOpts.after) : new Date();
        if (!after) throw new UsageError(`--after must be yyyy-MM-dd, got "${cmdOpts.after}"`);

        const dates = upcomingDates(pattern, after, parseIntArg(cmdOpts.count, 'count'));
        if (isJson) {
          outputJSON({ rule: pattern.describe(), dates });
        } else {
          outputKeyValue('Rule', pattern.describe());
          console.log(dates.length > 0 ? dates.join('\n') : 'No upcoming dates.');
        }
      } catch (err) {
        handleError(err, isJson);
      }
    });
}
