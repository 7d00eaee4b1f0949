/**
 * Leveled console logger
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

let threshold: LogLevel = 'info';

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[threshold];
}

export const logger = {
  /** `-v` count to level: 0 → info, 1+ → debug */
  setVerbosity(verbosity: number): void {
    threshold = verbosity > 0 ? 'debug' : 'info';
  },

  debug(message: string, ...args: unknown[]): void {
    if (enabled('debug')) console.log(`  [debug] ${message}`, ...args);
  },

  info(message: string, ...args: unknown[]): void {
    if (enabled('info')) console.log(message, ...args);
  },

  warn(message: string, ...args: unknown[]): void {
    if (enabled('warn')) console.warn(`  ⚠ ${message}`, ...args);
  },

  error(message: string, ...args: unknown[]): void {
    if (enabled('error')) console.error(message, ...args);
  },

  banner(title: string): void {
    if (!enabled('info')) return;
    console.log('='.repeat(60));
    console.log(title);
    console.log('='.repeat(60));
  },
};
