import { Command } from 'commander';
import ora from 'ora';
import { z } from 'zod';
import { api } from '../api';
import { activeSessionResponseSchema, activeSessionSchema, endedSessionSchema, pendingSchema, successSchema } from '../schemas';
import { formatDuration, outputJSON, outputKeyValue, outputTable } from '../utils/formatter';
import { handleError } from '../utils/errors';
import { parseIntArg } from './args';

export function registerSessionCommands(program: Command) {
  const session = program.command('session').description('Work on one task at a time');

  session.command('status')
    .description('Show the active session')
    .action(async () => {
      const isJson = program.opts().json === true;

      try {
        const { session: active } = await api.get('/api/sessions/active', activeSessionResponseSchema);
        if (isJson) {
          outputJSON(active);
        } else if (!active) {
          console.log('No active session.');
        } else {
          outputKeyValue('Task', `${active.task.id} ${active.task.name}`);
          outputKeyValue('Started', new Date(active.marker.startedAt).toLocaleString());
          outputKeyValue('Elapsed', formatDuration(Math.max(0, Math.floor((Date.now() - active.marker.startedAt) / 1000))));
        }
      } catch (err) {
        handleError(err, isJson);
      }
    });

  session.command('start <taskId>')
    .description('Start working on a task')
    .action(async (taskId: string) => {
      const isJson = program.opts().json === true;
      const spinner = !isJson ? ora('Starting session...').start() : null;

      try {
        const started = await api.post('/api/sessions/start', { taskId: parseIntArg(taskId, 'taskId') }, activeSessionSchema);
        spinner?.succeed(`Working on ${started.task.name}`);
        if (isJson) outputJSON(started);
      } catch (err) {
        spinner?.stop();
        handleError(err, isJson);
      }
    });

  session.command('end <taskId>')
    .description('End the session of a task')
    .option('-c, --complete', 'Also mark the task completed')
    .action(async (taskId: string, cmdOpts: { complete?: boolean }) => {
      const isJson = program.opts().json === true;
      const spinner = !isJson ? ora('Ending session...').start() : null;

      try {
        const ended = await api.post('/api/sessions/end', {
          taskId: parseIntArg(taskId, 'taskId'),
          markCompleted: cmdOpts.complete === true,
        }, endedSessionSchema);

        spinner?.succeed('Session ended');

        if (isJson) {
          outputJSON(ended);
        } else {
          outputKeyValue('Duration', formatDuration(ended.entry.durationSeconds ?? 0));
          if (ended.completion?.nextInstance) {
            outputKeyValue('Next instance', `${ended.completion.nextInstance.id} on ${ended.completion.nextInstance.scheduledDate}`);
          }
        }
      } catch (err) {
        spinner?.stop();
        handleError(err, isJson);
      }
    });

  session.command('abandon <taskId>')
    .description('Drop the session of a task without recording it')
    .action(async (taskId: string) => {
      const isJson = program.opts().json === true;

      try {
        const result = await api.post('/api/sessions/abandon', { taskId: parseIntArg(taskId, 'taskId') }, successSchema);
        if (isJson) {
          outputJSON(result);
        } else {
          console.log('Session abandoned.');
        }
      } catch (err) {
        handleError(err, isJson);
      }
    });

  const pending = program.command('pending').description('Tasks deferred with "Do Later"');

  pending.command('list')
    .description('List pending tasks')
    .action(async () => {
      const isJson = program.opts().json === true;

      try {
        const entries = await api.get('/api/pending', z.array(pendingSchema));
        if (isJson) {
          outputJSON(entries);
        } else if (entries.length === 0) {
          console.log('Nothing pending.');
        } else {
          outputTable(
            ['Task', 'Geofence', 'Queued', 'Expires'],
            entries.map(p => [
              p.taskId,
              p.geofenceId ?? '-',
              new Date(p.queuedAt).toLocaleTimeString(),
              new Date(p.expiresAt).toLocaleTimeString(),
            ])
          );
        }
      } catch (err) {
        handleError(err, isJson);
      }
    });

  pending.command('dismiss <taskId>')
    .description('Remove a task from the pending queue')
    .action(async (taskId: string) => {
      const isJson = program.opts().json === true;

      try {
        const result = await api.delete(`/api/pending/${parseIntArg(taskId, 'taskId')}`, successSchema);
        if (isJson) {
          outputJSON(result);
        } else {
          console.log(`Task ${taskId} dismissed.`);
        }
      } catch (err) {
        handleError(err, isJson);
      }
    });
}
