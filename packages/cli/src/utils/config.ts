import { loadConfig } from '@hubcast/types';
import type { HubcastConfig, HubcastConfigInput } from '@hubcast/types';

/** Flags shared by every command. Unset flags fall back to `HUBCAST_*` env vars. */
export const radioArgs = {
  hci: {
    type: 'string',
    description: 'HCI device (e.g. hci0)',
  },
  sudo: {
    type: 'boolean',
    description: 'Run the BlueZ tools through sudo',
  },
  'log-level': {
    type: 'string',
    description: 'Minimum log level: debug, info, warn or error',
  },
} as const;

export interface RadioArgs {
  hci?: string;
  sudo?: boolean;
  'log-level'?: string;
}

export function resolveConfig(args: RadioArgs, overrides: HubcastConfigInput = {}): HubcastConfig {
  const fromArgs: Record<string, string | undefined> = {
    HUBCAST_HCI_DEVICE: args.hci,
    HUBCAST_SUDO: args.sudo === undefined ? undefined : String(args.sudo),
    HUBCAST_LOG_LEVEL: args['log-level'],
  };
  const env = { ...process.env };
  for (const [key, value] of Object.entries(fromArgs)) {
    if (value !== undefined) env[key] = value;
  }
  return loadConfig(env, overrides);
}
