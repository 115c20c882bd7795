/**
 * lattice-di - Logger
 *
 * Minimal logging port used by the container. Plug in any logger that has
 * the four level methods (pino, winston and console all qualify).
 */

/**
 * Logger interface for the container
 */
export interface ILogger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

/**
 * Default console logger
 */
export const consoleLogger: ILogger = {
  debug: (message, ...args) => console.debug(`[DEBUG] ${message}`, ...args),
  info: (message, ...args) => console.info(`[INFO] ${message}`, ...args),
  warn: (message, ...args) => console.warn(`[WARN] ${message}`, ...args),
  error: (message, ...args) => console.error(`[ERROR] ${message}`, ...args),
};

const noop = (): void => undefined;

/**
 * Logger that discards everything (tests, embedded use)
 */
export const silentLogger: ILogger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
};
