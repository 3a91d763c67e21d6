import { Command } from 'commander';
import ora from 'ora';
import { z } from 'zod';
import { api } from '../api';
import { completionSchema, rankedTaskSchema, successSchema, taskSchema } from '../schemas';
import { outputJSON, outputKeyValue, outputTable, formatPriority, formatSchedule } from '../utils/formatter';
import { handleError, UsageError } from '../utils/errors';
import { parseIntArg, parseWeekdays } from './args';

interface AddTaskOptions {
  priority?: string;
  date?: string;
  time?: string;
  geofence?: string;
  repeat?: string;
  days?: string;
  until?: string;
  sound?: string;
  speech?: boolean;
}

/**
 * Recurrence body for `task add`, or null for a one-off task.
 */
export function recurrenceFromOptions(opts: Pick<AddTaskOptions, 'repeat' | 'days' | 'until'>) {
  if (!opts.repeat || opts.repeat === 'none') return null;
  const endDate = opts.until ?? null;
  switch (opts.repeat) {
    case 'daily':
      return { type: 'daily' as const, weekdays: [1, 2, 3, 4, 5, 6, 7], endDate };
    case 'weekdays':
      return { type: 'weekdaysOnly' as const, weekdays: [1, 2, 3, 4, 5], endDate };
    case 'weekly':
      if (!opts.days) throw new UsageError('--repeat weekly needs --days, e.g. --days 1,3,5');
      return { type: 'weekly' as const, weekdays: parseWeekdays(opts.days), endDate };
    default:
      throw new UsageError(`Unknown repeat "${opts.repeat}" (use none, daily, weekdays or weekly)`);
  }
}

export function registerTaskCommands(program: Command) {
  const task = program.command('task').description('Manage tasks');

  task.command('list')
    .description('List tasks, highest effective priority first')
    .option('--all', 'Include completed tasks')
    .option('-g, --geofence <id>', 'Only tasks bound to this geofence')
    .action(async (cmdOpts: { all?: boolean; geofence?: string }) => {
      const isJson = program.opts().json === true;
      const spinner = !isJson ? ora('Fetching tasks...').start() : null;

      try {
        const params = new URLSearchParams();
        if (!cmdOpts.all) params.set('completed', 'false');
        if (cmdOpts.geofence) params.set('geofenceId', cmdOpts.geofence);
        const query = params.toString();
        const tasks = await api.get(`/api/tasks${query ? `?${query}` : ''}`, z.array(rankedTaskSchema));

        spinner?.stop();

        if (isJson) {
          outputJSON(tasks);
        } else if (tasks.length === 0) {
          console.log('No tasks.');
        } else {
          outputTable(
            ['ID', 'Name', 'Priority', 'Effective', 'Scheduled', 'Urgency', 'Geofence', 'Done'],
            tasks.map(({ task: t, effectivePriority, urgency }) => [
              t.id,
              t.name,
              formatPriority(t.priority),
              effectivePriority,
              formatSchedule(t.scheduledDate, t.scheduledTime),
              urgency ?? '-',
              t.geofenceId ?? '-',
              t.isCompleted ? 'yes' : 'no',
            ])
          );
        }
      } catch (err) {
        spinner?.stop();
        handleError(err, isJson);
      }
    });

  task.command('add <name>')
    .description('Create a task')
    .option('-p, --priority <1-5>', 'Priority from 1 (lowest) to 5 (highest)')
    .option('-d, --date <yyyy-MM-dd>', 'Scheduled date')
    .option('-t, --time <HH:mm>', 'Scheduled time')
    .option('-g, --geofence <id>', 'Geofence that triggers the task')
    .option('-r, --repeat <kind>', 'none, daily, weekdays or weekly')
    .option('--days <list>', 'ISO weekdays for weekly repeats, Monday = 1')
    .option('--until <yyyy-MM-dd>', 'Last date of the repeat')
    .option('--sound <name>', 'Notification sound')
    .option('--no-speech', 'Never speak this task')
    .action(async (name: string, cmdOpts: AddTaskOptions) => {
      const isJson = program.opts().json === true;
      const spinner = !isJson ? ora('Creating task...').start() : null;

      try {
        const created = await api.post('/api/tasks', {
          name,
          priority: cmdOpts.priority !== undefined ? parseIntArg(cmdOpts.priority, 'priority') : undefined,
          scheduledDate: cmdOpts.date,
          scheduledTime: cmdOpts.time,
          geofenceId: cmdOpts.geofence,
          recurrence: recurrenceFromOptions(cmdOpts),
          notificationSound: cmdOpts.sound,
          enableSpeech: cmdOpts.speech === false ? false : undefined,
        }, taskSchema);

        spinner?.succeed('Task created');

        if (isJson) {
          outputJSON(created);
        } else {
          outputKeyValue('ID', created.id);
          outputKeyValue('Name', created.name);
          outputKeyValue('Priority', formatPriority(created.priority));
          outputKeyValue('Scheduled', formatSchedule(created.scheduledDate, created.scheduledTime));
        }
      } catch (err) {
        spinner?.stop();
        handleError(err, isJson);
      }
    });

  task.command('complete <id>')
    .description('Mark a task completed; recurring tasks get their next instance')
    .action(async (id: string) => {
      const isJson = program.opts().json === true;
      const spinner = !isJson ? ora('Completing task...').start() : null;

      try {
        const taskId = parseIntArg(id, 'id');
        const result = await api.post(`/api/tasks/${taskId}/complete`, {}, completionSchema);

        spinner?.succeed(`Task ${taskId} completed`);

        if (isJson) {
          outputJSON(result);
        } else if (result.nextInstance) {
          outputKeyValue('Next instance', `${result.nextInstance.id} on ${result.nextInstance.scheduledDate}`);
        }
      } catch (err) {
        spinner?.stop();
        handleError(err, isJson);
      }
    });

  task.command('delete <id>')
    .description('Delete a task')
    .action(async (id: string) => {
      const isJson = program.opts().json === true;
      const spinner = !isJson ? ora('Deleting task...').start() : null;

      try {
        const taskId = parseIntArg(id, 'id');
        const result = await api.delete(`/api/tasks/${taskId}`, successSchema);
        spinner?.succeed(`Task ${taskId} deleted`);
        if (isJson) outputJSON(result);
      } catch (err) {
        spinner?.stop();
        handleError(err, isJson);
      }
    });
}
