import { consola, LogLevels } from 'consola';
import type { LogLevel, Logger } from '@hubcast/types';

const CONSOLA_LEVELS: Record<LogLevel, number> = {
  debug: LogLevels.debug,
  info: LogLevels.info,
  warn: LogLevels.warn,
  error: LogLevels.error,
};

/** Route component logs through consola, tagged with the component name. */
export function createCliLogger(tag: string, level: LogLevel = 'info'): Logger {
  const tagged = consola.withTag(tag);
  tagged.level = CONSOLA_LEVELS[level];
  return {
    info: (msg, ...args) => tagged.info(msg, ...args),
    warn: (msg, ...args) => tagged.warn(msg, ...args),
    error: (msg, ...args) => tagged.error(msg, ...args),
    debug: (msg, ...args) => tagged.debug(msg, ...args),
  };
}
