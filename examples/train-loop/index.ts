/**
 * Train Loop Example - Run a train and flip a switch when it passes
 *
 * Drives the train on channel 21 forward, throws switch A on channel 1 to
 * diverging after a few seconds, and stops the train again.
 *
 * Usage:
 *   npx tsx examples/train-loop/index.ts
 *
 * Prerequisites:
 *   - Linux with BlueZ (hcitool, bluetoothctl) and a BLE adapter on hci0
 *   - Powered-Up hubs running the advertisement firmware
 */

import { createHubController, delay, loadConfig, SWITCH_POSITION } from 'hubcast';

const TRAIN_CHANNEL = 21;
const SWITCH_CHANNEL = 1;

const controller = createHubController({ config: loadConfig() });

controller.on('hubRegistered', (hub) => {
  console.log(`Discovered ${hub.kind}: ${hub.name} (channel ${hub.channel})`);
});

controller.on('commandStateChanged', (change) => {
  console.log(`  #${change.id} ${change.command.type} -> ${change.state} (attempt ${change.attempt})`);
});

process.on('SIGINT', async () => {
  console.log('\nShutting down...');
  await controller.stop();
  process.exit(0);
});

await controller.start();

controller.registerHub(TRAIN_CHANNEL, 'train', 'Freight');
controller.registerHub(SWITCH_CHANNEL, 'switch', 'Yard');

await controller.enqueuePower(TRAIN_CHANNEL, 40);
await delay(3000);

const confirmed = await controller.enqueueSwitch(SWITCH_CHANNEL, 'A', SWITCH_POSITION.DIVERGING);
console.log(confirmed ? 'Switch A is diverging' : 'Switch A did not confirm');

await delay(3000);
await controller.enqueuePower(TRAIN_CHANNEL, 0);

for (const train of controller.listConnectedTrains().values()) {
  console.log(`${train.name}: ${train.status?.speedPercent ?? '?'}% (${train.lastUpdateSecondsAgo}s ago)`);
}

await controller.stop();
