// apps/cli/src/logger.ts
//
// pino logger for the CLI. Logs go to stderr so stdout carries only the
// verdict (and stays pipeable when --json is used).

import pino, { type Logger } from 'pino';

export type { Logger };

export function createLogger(level: string): Logger {
  return pino({ name: 'connections-strategy', level }, pino.destination(2));
}
