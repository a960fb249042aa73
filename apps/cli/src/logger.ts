// apps/cli/src/logger.ts
//
// Root pino logger. Logs go to stderr so they never interleave with the
// board the game prints on stdout.

import pino from 'pino';
import type { LogLevel } from './config.js';

export type { Logger } from 'pino';

export function createLogger(level: LogLevel) {
  return pino({ name: 'nerdle', level }, pino.destination(2));
}
