import { defineCommand } from 'citty';
import { consola } from 'consola';
import { createHubController } from '@hubcast/control';
import { delay, errorMessage } from '@hubcast/types';
import { radioArgs, resolveConfig } from '../utils/config.js';
import { formatSwitch, formatTrain } from '../utils/format.js';
import { createCliLogger } from '../utils/logger.js';

export const statusCommand = defineCommand({
  meta: {
    name: 'status',
    description: 'Scan for a few seconds and list the hubs heard',
  },
  args: {
    ...radioArgs,
    seconds: {
      type: 'string',
      description: 'How long to scan',
      default: '5',
    },
  },
  async run({ args }) {
    const seconds = Number(args.seconds);
    if (!Number.isFinite(seconds) || seconds <= 0) {
      consola.error(`Invalid duration: ${args.seconds}`);
      process.exit(1);
    }

    const config = resolveConfig(args, { resetOnStartup: false });
    const controller = createHubController({ config, logger: createCliLogger('hubcast', config.logLevel) });

    consola.start(`Scanning for ${seconds}s on ${config.hciDevice}...`);
    try {
      await controller.start();
      await delay(seconds * 1000);
    } catch (error) {
      consola.error('Scan failed:', errorMessage(error));
      process.exitCode = 1;
    } finally {
      await controller.stop();
    }

    const trains = [...controller.listConnectedTrains().values()];
    const switches = [...controller.listConnectedSwitches().values()];

    consola.info('Hub Status');
    consola.info('='.repeat(40));
    consola.info(`Trains (${trains.length}):`);
    for (const train of trains) consola.log(formatTrain(train));
    consola.info(`Switches (${switches.length}):`);
    for (const entry of switches) consola.log(formatSwitch(entry));

    if (trains.length === 0 && switches.length === 0) {
      consola.warn('No hubs heard. Check that the hubs are powered and the adapter is up.');
    }
  },
});
