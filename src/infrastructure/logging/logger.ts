import pino from 'pino';
import type { DestinationStream, Level, Logger } from 'pino';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace'] as const satisfies readonly Level[];

/**
 * Application logger: JSON to stdout plus any extra destinations (the
 * bus log stream) through `pino.multistream`.
 */
export function createLogger(
  level: Level,
  extra: readonly DestinationStream[] = [],
  primary: DestinationStream = process.stdout,
): Logger {
  const streams = [primary, ...extra].map((stream) => ({ level, stream }));
  return pino({ level }, pino.multistream(streams));
}
