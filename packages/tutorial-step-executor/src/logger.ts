/**
 * Console logging with bracketed level prefixes
 */

export const VERBOSITY_LEVELS = ['quiet', 'normal', 'verbose', 'debug'] as const;

export type Verbosity = (typeof VERBOSITY_LEVELS)[number];

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

type Level = keyof Logger;

/** Lowest level printed at each verbosity */
const THRESHOLDS: Record<Verbosity, Level> = {
  quiet: 'warn',
  normal: 'info',
  verbose: 'debug',
  debug: 'debug',
};

const LEVEL_ORDER: Record<Level, number> = { debug: 0, info: 1, warn: 2, error: 3 };

/**
 * Create a logger that writes `[LEVEL] message` lines to the console.
 * Warnings and errors go to stderr.
 */
export function createConsoleLogger(verbosity: Verbosity = 'normal'): Logger {
  const threshold = LEVEL_ORDER[THRESHOLDS[verbosity]];
  const enabled = (level: Level) => LEVEL_ORDER[level] >= threshold;

  return {
    debug(message) {
      if (enabled('debug')) console.log(`[DEBUG] ${message}`);
    },
    info(message) {
      if (enabled('info')) console.log(`[INFO] ${message}`);
    },
    warn(message) {
      if (enabled('warn')) console.warn(`[WARN] ${message}`);
    },
    error(message) {
      if (enabled('error')) console.error(`[ERROR] ${message}`);
    },
  };
}

/** Logger that discards everything (used by default in the engine and in tests) */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
