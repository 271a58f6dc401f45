// =============================================================================
// PDF SCAN — Console Logging
//
// Tagged console output ("[Pipeline] ...") gated by LOG_LEVEL.
// Never pass file contents or matched text to these functions.
// =============================================================================

import { config, LogLevel } from '../config';

const SEVERITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

export function createLogger(tag: string, level: LogLevel = config.logging.level): Logger {
  const enabled = (l: LogLevel) => SEVERITY[l] >= SEVERITY[level];
  const prefix = `[${tag}]`;

  return {
    debug: (message, ...details) => {
      if (enabled('debug')) console.debug(prefix, message, ...details);
    },
    info: (message, ...details) => {
      if (enabled('info')) console.log(prefix, message, ...details);
    },
    warn: (message, ...details) => {
      if (enabled('warn')) console.warn(prefix, message, ...details);
    },
    error: (message, ...details) => {
      if (enabled('error')) console.error(prefix, message, ...details);
    },
  };
}
