/**
 * Structured logging via pino.
 *
 * The core never creates a global logger: callers pass one in, and
 * components default to a silent instance.
 */

import { pino, type Logger } from 'pino';
import type { LoggingConfig } from './config/types.js';

export type { Logger } from 'pino';

export type LogEvent =
  | 'task_created'
  | 'classified'
  | 'generation_start'
  | 'generation_failed'
  | 'candidate_ready'
  | 'critique_start'
  | 'verdict'
  | 'escalation'
  | 'task_accepted'
  | 'task_failed'
  | 'task_cancelled'
  | 'metrics_failed'
  | 'suspicious_input';

/** Logs go to stderr; stdout belongs to command output. */
export function createLogger(opts: LoggingConfig): Logger {
  if (opts.pretty) {
    return pino({
      name: 'verisql',
      level: opts.level,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          destination: 2,
        },
      },
    });
  }
  return pino({ name: 'verisql', level: opts.level }, pino.destination(2));
}

export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}

export interface TaskLogger {
  info(event: LogEvent, extra?: Record<string, unknown>): void;
  warn(event: LogEvent, extra?: Record<string, unknown>): void;
}

export function createTaskLogger(logger: Logger, taskId: string): TaskLogger {
  const child = logger.child({ taskId });
  return {
    info(event, extra) {
      child.info({ event, ...extra });
    },
    warn(event, extra) {
      child.warn({ event, ...extra });
    },
  };
}
