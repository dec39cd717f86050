import { defineCommand } from 'citty';
import { consola } from 'consola';
import { HciClient, NobleScanner, RadioAccessLayer } from '@hubcast/radio';
import { radioArgs, resolveConfig } from '../utils/config.js';
import { createCliLogger } from '../utils/logger.js';

export const resetCommand = defineCommand({
  meta: {
    name: 'reset',
    description: 'Power-cycle the Bluetooth adapter',
  },
  args: radioArgs,
  async run({ args }) {
    const config = resolveConfig(args);
    const logger = createCliLogger('hubcast', config.logLevel);
    const radio = new RadioAccessLayer({
      scanner: new NobleScanner({ logger }),
      hci: new HciClient({ sudo: config.sudo, hciDevice: config.hciDevice, logger }),
      logger,
    });

    consola.start(`Resetting ${config.hciDevice}...`);
    await radio.resetAdapter();
    consola.success('Adapter reset');
  },
});
