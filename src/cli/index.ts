#!/usr/bin/env node
import { Command } from 'commander';
import { config } from './config';
import { api } from './api';
import { registerTaskCommands } from './commands/task';
import { registerGeofenceCommands } from './commands/geofence';
import { registerSessionCommands } from './commands/session';
import { registerTriggerCommands } from './commands/trigger';
import { registerRecurrenceCommands } from './commands/recurrence';

const program = new Command();

program
  .name('geotask')
  .description('Location-triggered task reminders')
  .version('1.0.0')
  .option('--json', 'Output results as JSON')
  .option('--server <url>', 'Server URL', config.apiUrl)
  .hook('preAction', () => {
    const server: unknown = program.opts().server;
    if (typeof server === 'string') {
      api.setBaseUrl(server);
    }
  });

registerTaskCommands(program);
registerGeofenceCommands(program);
registerSessionCommands(program);
registerTriggerCommands(program);
registerRecurrenceCommands(program);

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : String(err));
  process.exit(1);
});
