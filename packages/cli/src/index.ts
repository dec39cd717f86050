#!/usr/bin/env node
import { defineCommand, runMain } from 'citty';
import { runCommand } from './commands/run.js';
import { statusCommand } from './commands/status.js';
import { resetCommand } from './commands/reset.js';

const main = defineCommand({
  meta: {
    name: 'hubcast',
    version: '0.1.0',
    description: 'Control Powered-Up trains and switches over BLE advertisements',
  },
  subCommands: {
    run: runCommand,
    status: statusCommand,
    reset: resetCommand,
  },
});

void runMain(main);
