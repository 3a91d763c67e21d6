import { Command } from 'commander';
import ora from 'ora';
import { api } from '../api';
import { locationResponseSchema, triggerResponseSchema } from '../schemas';
import { outputJSON, outputKeyValue } from '../utils/formatter';
import { handleError } from '../utils/errors';
import { parseNumberArg } from './args';

/**
 * Commands that feed geofence activity to the server, for testing a setup
 * without moving around.
 */
export function registerTriggerCommands(program: Command) {
  const trigger = program.command('trigger').description('Simulate geofence events');

  for (const event of ['enter', 'exit'] as const) {
    trigger.command(`${event} <geofenceIds...>`)
      .description(`Deliver an ${event} event for the given geofences`)
      .action(async (geofenceIds: string[]) => {
        const isJson = program.opts().json === true;
        const spinner = !isJson ? ora(`Sending ${event} event...`).start() : null;

        try {
          const result = await api.post('/api/geofence-events', { event, geofenceIds, location: null }, triggerResponseSchema);
          spinner?.stop();

          if (isJson) {
            outputJSON(result);
          } else if (!result.report) {
            console.log(`${event} event ignored.`);
          } else {
            const { report } = result;
            outputKeyValue('Notification', report.notificationId);
            outputKeyValue('Decision', report.decision);
            outputKeyValue('Foreground ack', report.ackOutcome ?? 'none');
            outputKeyValue('Candidates', report.candidateTaskIds.join(', ') || '-');
            outputKeyValue('Alert shown', report.alertShown ? 'yes' : 'no');
            outputKeyValue('History rows', report.historyRecorded);
          }
        } catch (err) {
          spinner?.stop();
          handleError(err, isJson);
        }
      });
  }

  program.command('location <latitude> <longitude>')
    .description('Report a location fix; crossing a geofence fires its event')
    .action(async (latitude: string, longitude: string) => {
      const isJson = program.opts().json === true;

      try {
        const result = await api.post('/api/location', {
          latitude: parseNumberArg(latitude, 'latitude'),
          longitude: parseNumberArg(longitude, 'longitude'),
        }, locationResponseSchema);

        if (isJson) {
          outputJSON(result);
        } else if (result.events.length === 0) {
          console.log('No geofence crossed.');
        } else {
          for (const e of result.events) {
            outputKeyValue(e.event, e.geofenceIds.join(', '));
          }
        }
      } catch (err) {
        handleError(err, isJson);
      }
    });
}
