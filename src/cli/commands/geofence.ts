import { Command } from 'commander';
import ora from 'ora';
import { z } from 'zod';
import { api } from '../api';
import { createdGeofenceSchema, geofenceSchema, successSchema } from '../schemas';
import { outputJSON, outputKeyValue, outputTable } from '../utils/formatter';
import { handleError } from '../utils/errors';
import { parseIntArg, parseNumberArg } from './args';

export function registerGeofenceCommands(program: Command) {
  const geofence = program.command('geofence').description('Manage geofences');

  geofence.command('list')
    .description('List geofences')
    .action(async () => {
      const isJson = program.opts().json === true;
      const spinner = !isJson ? ora('Fetching geofences...').start() : null;

      try {
        const geofences = await api.get('/api/geofences', z.array(geofenceSchema));
        spinner?.stop();

        if (isJson) {
          outputJSON(geofences);
        } else if (geofences.length === 0) {
          console.log('No geofences.');
        } else {
          outputTable(
            ['ID', 'Latitude', 'Longitude', 'Radius (m)', 'Legacy task'],
            geofences.map(g => [g.id, g.latitude, g.longitude, g.radiusMeters, g.task ?? '-'])
          );
        }
      } catch (err) {
        spinner?.stop();
        handleError(err, isJson);
      }
    });

  geofence.command('add <latitude> <longitude>')
    .description('Create a geofence')
    .option('--id <id>', 'Geofence id (generated when omitted)')
    .option('-r, --radius <meters>', 'Radius in meters')
    .option('-t, --task <taskId>', 'Bind an existing task to the new geofence')
    .action(async (latitude: string, longitude: string, cmdOpts: { id?: string; radius?: string; task?: string }) => {
      const isJson = program.opts().json === true;
      const spinner = !isJson ? ora('Creating geofence...').start() : null;

      try {
        const created = await api.post('/api/geofences', {
          id: cmdOpts.id,
          latitude: parseNumberArg(latitude, 'latitude'),
          longitude: parseNumberArg(longitude, 'longitude'),
          radiusMeters: cmdOpts.radius !== undefined ? parseNumberArg(cmdOpts.radius, 'radius') : undefined,
          taskId: cmdOpts.task !== undefined ? parseIntArg(cmdOpts.task, 'task') : undefined,
        }, createdGeofenceSchema);

        spinner?.succeed('Geofence created');

        if (isJson) {
          outputJSON(created);
        } else {
          outputKeyValue('ID', created.geofence.id);
          outputKeyValue('Radius (m)', created.geofence.radiusMeters);
          if (created.linkedTaskId !== null) {
            outputKeyValue('Linked task', created.linkedTaskId);
          }
        }
      } catch (err) {
        spinner?.stop();
        handleError(err, isJson);
      }
    });

  geofence.command('delete <id>')
    .description('Delete a geofence and detach its tasks')
    .action(async (id: string) => {
      const isJson = program.opts().json === true;
      const spinner = !isJson ? ora('Deleting geofence...').start() : null;

      try {
        const result = await api.delete(`/api/geofences/${encodeURIComponent(id)}`, successSchema);
        spinner?.succeed(`Geofence ${id} deleted`);
        if (isJson) outputJSON(result);
      } catch (err) {
        spinner?.stop();
        handleError(err, isJson);
      }
    });
}
