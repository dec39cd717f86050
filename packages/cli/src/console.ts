/**
 * Interactive console commands for `hubcast run`.
 *
 * One command per line. Arguments are whitespace separated; a hub name given
 * to `register` may contain spaces.
 */

import { InvalidCommandError } from '@hubcast/types';
import type { HubKind } from '@hubcast/types';

export type ConsoleCommand =
  | { type: 'help' }
  | { type: 'power'; channel: number; power: number }
  | { type: 'drive'; channel: number; enabled: boolean }
  | { type: 'switch'; channel: number; port: string; position: number }
  | { type: 'register'; kind: HubKind; channel: number; name?: string }
  | { type: 'trains' }
  | { type: 'switches' }
  | { type: 'reset' }
  | { type: 'quit' };

export const CONSOLE_HELP = [
  'Commands:',
  '  power <channel> <power>           Set train power (-100..100)',
  '  drive <channel> on|off            Toggle train self-drive',
  '  switch <channel> <port> <0|1>     Set switch port A-D straight (0) or diverging (1)',
  '  register train|switch <channel> [name]',
  '  trains                            List connected trains',
  '  switches                          List connected switches',
  '  reset                             Power-cycle the Bluetooth adapter',
  '  help                              Show this help',
  '  quit                              Stop and exit',
].join('\n');

const POSITION_WORDS: Partial<Record<string, number>> = {
  straight: 0,
  diverging: 1,
};

/** Parse one console line. Returns null for a blank line. */
export function parseConsoleLine(line: string): ConsoleCommand | null {
  const [verb, ...args] = line.trim().split(/\s+/);
  if (!verb) return null;

  switch (verb.toLowerCase()) {
    case 'help':
    case '?':
      return { type: 'help' };

    case 'power': {
      expectArgs(args, 2, 'power <channel> <power>');
      return { type: 'power', channel: parseNumber(args[0], 'channel'), power: parseNumber(args[1], 'power') };
    }

    case 'drive': {
      expectArgs(args, 2, 'drive <channel> on|off');
      const mode = args[1].toLowerCase();
      if (mode !== 'on' && mode !== 'off') {
        throw new InvalidCommandError(`Invalid self-drive mode: ${args[1]}. Must be on or off`);
      }
      return { type: 'drive', channel: parseNumber(args[0], 'channel'), enabled: mode === 'on' };
    }

    case 'switch': {
      expectArgs(args, 3, 'switch <channel> <port> <0|1>');
      const word = POSITION_WORDS[args[2].toLowerCase()];
      return {
        type: 'switch',
        channel: parseNumber(args[0], 'channel'),
        port: args[1].toUpperCase(),
        position: word ?? parseNumber(args[2], 'position'),
      };
    }

    case 'register': {
      if (args.length < 2) {
        throw new InvalidCommandError('Usage: register train|switch <channel> [name]');
      }
      const [kind, channel, ...name] = args;
      if (kind !== 'train' && kind !== 'switch') {
        throw new InvalidCommandError(`Invalid hub kind: ${kind}. Must be train or switch`);
      }
      const parsedChannel = parseNumber(channel, 'channel');
      return name.length > 0
        ? { type: 'register', kind, channel: parsedChannel, name: name.join(' ') }
        : { type: 'register', kind, channel: parsedChannel };
    }

    case 'trains':
      return { type: 'trains' };
    case 'switches':
      return { type: 'switches' };
    case 'reset':
      return { type: 'reset' };
    case 'quit':
    case 'exit':
      return { type: 'quit' };

    default:
      throw new InvalidCommandError(`Unknown command: ${verb}. Type "help" for a list`);
  }
}

function expectArgs(args: string[], count: number, usage: string): void {
  if (args.length !== count) {
    throw new InvalidCommandError(`Usage: ${usage}`);
  }
}

function parseNumber(value: string, label: string): number {
  const parsed = Number(value);
  if (value === '' || Number.isNaN(parsed)) {
    throw new InvalidCommandError(`Invalid ${label}: ${value}`);
  }
  return parsed;
}
