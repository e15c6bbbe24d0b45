import pino, { type Logger } from 'pino';
import type { LogLevel } from './config.js';

/** CLI logger. Writes to stderr so stdout carries only the rendered document. */
export function createCliLogger(level: LogLevel): Logger {
  return pino({ name: 'zonecfg', level }, pino.destination(2));
}
