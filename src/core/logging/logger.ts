/**
 * Logging seam for the pipeline.
 *
 * Library code reports through a {@link LineageLogger} so that callers decide
 * where messages go; only the console logger touches `console`.
 */

export interface LineageLogger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export const LOG_PREFIX = '[subtrack-lineage]';

export function createConsoleLogger(prefix: string = LOG_PREFIX): LineageLogger {
  return {
    info: (message) => console.log(`${prefix} ${message}`),
    warn: (message) => console.warn(`${prefix} ${message}`),
    error: (message) => console.error(`${prefix} ${message}`),
  };
}

export const silentLogger: LineageLogger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
