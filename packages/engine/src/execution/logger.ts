import type { Logger } from '@forkline/core';

const noop = (): void => undefined;

/** Logger used when an executor is created without one. */
export const silentLogger: Logger = {
  trace: noop,
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
  fatal: noop,
  child: () => silentLogger
};
