import { defineCommand } from 'citty';
import { consola } from 'consola';
import { createInterface } from 'node:readline';
import { createHubController } from '@hubcast/control';
import type { HubController } from '@hubcast/control';
import { describeCommand, errorMessage } from '@hubcast/types';
import { CONSOLE_HELP, parseConsoleLine } from '../console.js';
import type { ConsoleCommand } from '../console.js';
import { radioArgs, resolveConfig } from '../utils/config.js';
import { formatSwitch, formatTrain } from '../utils/format.js';
import { createCliLogger } from '../utils/logger.js';

async function execute(controller: HubController, command: ConsoleCommand): Promise<void> {
  switch (command.type) {
    case 'help':
      consola.log(CONSOLE_HELP);
      return;

    case 'power':
      await controller.enqueuePower(command.channel, command.power);
      consola.success(`Queued power ${command.power} on channel ${command.channel}`);
      return;

    case 'drive':
      await controller.enqueueSelfDrive(command.channel, command.enabled);
      consola.success(`Queued self-drive ${command.enabled ? 'on' : 'off'} on channel ${command.channel}`);
      return;

    case 'switch': {
      const confirmed = await controller.enqueueSwitch(command.channel, command.port, command.position);
      if (confirmed) {
        consola.success(`Switch ${command.port} on channel ${command.channel} confirmed`);
      } else {
        consola.warn(`Switch ${command.port} on channel ${command.channel} not confirmed`);
      }
      return;
    }

    case 'register': {
      const hub = controller.registerHub(command.channel, command.kind, command.name);
      consola.success(`Registered ${hub.kind} "${hub.name}" on channel ${hub.channel}`);
      return;
    }

    case 'trains': {
      const trains = [...controller.listConnectedTrains().values()];
      consola.info(`Connected trains (${trains.length}):`);
      for (const train of trains) consola.log(formatTrain(train));
      return;
    }

    case 'switches': {
      const switches = [...controller.listConnectedSwitches().values()];
      consola.info(`Connected switches (${switches.length}):`);
      for (const entry of switches) consola.log(formatSwitch(entry));
      return;
    }

    case 'reset':
      await controller.resetAdapter();
      consola.success('Adapter reset');
      return;

    case 'quit':
      return;
  }
}

export const runCommand = defineCommand({
  meta: {
    name: 'run',
    description: 'Start the hub controller with an interactive console',
  },
  args: {
    ...radioArgs,
    'reset-on-startup': {
      type: 'boolean',
      description: 'Power-cycle the adapter before scanning',
      default: true,
    },
  },
  async run({ args }) {
    const config = resolveConfig(args, { resetOnStartup: args['reset-on-startup'] });
    const controller = createHubController({ config, logger: createCliLogger('hubcast', config.logLevel) });

    controller.on('hubRegistered', (hub) => {
      consola.success(`Discovered ${hub.kind} "${hub.name}" on channel ${hub.channel}`);
    });
    controller.on('commandStateChanged', (change) => {
      if (change.state === 'exhausted') {
        consola.warn(`Gave up on ${describeCommand(change.command)}: ${change.error ?? 'no confirmation'}`);
      }
    });
    controller.on('scanRestarting', (reason) => {
      consola.warn(`Scan restarting: ${reason}`);
    });

    const input = createInterface({ input: process.stdin, output: process.stdout, prompt: 'hubcast> ' });

    let stopping: Promise<void> | null = null;
    const shutdown = () => {
      stopping ??= (async () => {
        consola.info('Shutting down...');
        input.close();
        await controller.stop();
        consola.success('Stopped');
        process.exit(0);
      })();
      return stopping;
    };

    process.on('SIGINT', () => void shutdown());
    process.on('SIGTERM', () => void shutdown());

    consola.start('Starting hub controller');
    try {
      await controller.start();
    } catch (error) {
      consola.error('Failed to start:', errorMessage(error));
      process.exit(1);
    }
    consola.success('Listening for hubs. Type "help" for commands.');
    input.prompt();

    input.on('line', (line) => {
      let command: ConsoleCommand | null;
      try {
        command = parseConsoleLine(line);
      } catch (error) {
        consola.error(errorMessage(error));
        input.prompt();
        return;
      }

      if (command?.type === 'quit') {
        void shutdown();
        return;
      }
      if (command) {
        void execute(controller, command)
          .catch((error: unknown) => consola.error(errorMessage(error)))
          .finally(() => input.prompt());
      } else {
        input.prompt();
      }
    });
    input.on('close', () => void shutdown());
  },
});
