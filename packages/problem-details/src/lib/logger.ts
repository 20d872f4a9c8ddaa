import type { Logger, LoggerOptions } from 'pino';
import pino from 'pino';

import type { AppConfig } from '../config';
import type { ProblemDetails } from '../problem/problem-details';
import { sanitizeLogValue } from './log-sanitizer';

export type AppLogger = Logger;

export function buildLoggerOptions(config: AppConfig): LoggerOptions {
  return {
    level: config.logging.level,
    base: { component: 'problem-details' },
    formatters: {
      level: (label) => ({ level: label }),
      log: (object) => sanitizeLogValue(object),
    },
  };
}

export function createLogger(config: AppConfig): AppLogger {
  return pino(buildLoggerOptions(config));
}

export const silentLogger: AppLogger = pino({ level: 'silent' });

export function problemLogFields(problem: ProblemDetails) {
  return sanitizeLogValue({
    problem: {
      type: problem.problemType,
      status: problem.status,
      title: problem.title,
      extensions: Object.fromEntries([...problem.extensions].map((member) => [member.name, member.json])),
    },
  });
}
