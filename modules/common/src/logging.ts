/**
 * modules/common/src/logging.ts
 *
 * @file Console logging for the shared module. The engine entry point reconfigures the root logger with its own
 * appenders; until then everything goes to a colored console appender.
 */
import process from 'node:process';
import {configureLogging, useLog} from '@mburchard/bit-log';
import {ConsoleAppender} from '@mburchard/bit-log/appender/ConsoleAppender';

export const LOG_LEVELS = ['DEBUG', 'INFO', 'WARN', 'ERROR'] as const;

export type LogLevelName = typeof LOG_LEVELS[number];

/**
 * Read the root log level from `TILEWRIGHT_LOG_LEVEL`.
 *
 * @param fallback - Level used when the variable is unset or invalid.
 * @returns The configured level name.
 */
export function levelFromEnv(fallback: LogLevelName = 'INFO'): LogLevelName {
  const raw = process.env.TILEWRIGHT_LOG_LEVEL?.trim().toUpperCase();
  return LOG_LEVELS.find(level => level === raw) ?? fallback;
}

configureLogging({
  appender: {
    CONSOLE: {
      Class: ConsoleAppender,
      colored: true,
      pretty: true,
    },
  },
  root: {
    appender: ['CONSOLE'],
    level: levelFromEnv(),
  },
});

export const getLog = useLog;
