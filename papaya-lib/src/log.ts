export const LOG_LEVELS = ['error', 'warn', 'info', 'debug'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/** Sink for the library's diagnostics, shaped so that a winston logger can
 * be passed to `setLogger` as it is. */
export interface Logger {
  debug(message: string, ...meta: unknown[]): void;
  info(message: string, ...meta: unknown[]): void;
  warn(message: string, ...meta: unknown[]): void;
  error(message: string, ...meta: unknown[]): void;
}

/** Writes messages at or above `level` to the console, used until the
 * embedding application installs its own logger. */
export class ConsoleLogger implements Logger {
  readonly level: LogLevel;

  constructor(level: LogLevel = 'warn') {
    this.level = level;
  }

  private enabled(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) <= LOG_LEVELS.indexOf(this.level);
  }

  debug(message: string, ...meta: unknown[]): void {
    if (this.enabled('debug')) {
      console.debug(message, ...meta);
    }
  }

  info(message: string, ...meta: unknown[]): void {
    if (this.enabled('info')) {
      console.info(message, ...meta);
    }
  }

  warn(message: string, ...meta: unknown[]): void {
    if (this.enabled('warn')) {
      console.warn(message, ...meta);
    }
  }

  error(message: string, ...meta: unknown[]): void {
    console.error(message, ...meta);
  }
}

let current: Logger = new ConsoleLogger();

export function setLogger(logger: Logger): void {
  current = logger;
}

/** Forwards to whichever logger is installed at the time of the call */
const log: Logger = {
  debug: (message, ...meta) => current.debug(message, ...meta),
  info: (message, ...meta) => current.info(message, ...meta),
  warn: (message, ...meta) => current.warn(message, ...meta),
  error: (message, ...meta) => current.error(message, ...meta),
};

export default log;
