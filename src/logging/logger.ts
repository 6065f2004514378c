import pino, { type Logger } from 'pino';
import type { LogLevel } from '../config.js';

/**
 * Process logger. Writes to stderr: stdout is reserved for the commit line.
 */
export function createLogger(level: LogLevel): Logger {
  return pino({ level }, pino.destination(2));
}
