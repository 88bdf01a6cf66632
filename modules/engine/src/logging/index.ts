/**
 * modules/engine/src/logging/index.ts
 *
 * @file Root logger configuration for the engine process: a colored console appender, plus a file appender when a
 * log directory is configured.
 */
import type {LogLevelName} from '@common/logging.js';
import {levelFromEnv} from '@common/logging.js';
import {configureLogging, useLog} from '@mburchard/bit-log';
import {Ansi} from '@mburchard/bit-log/ansi';
import {ConsoleAppender} from '@mburchard/bit-log/appender/ConsoleAppender';
import {FileAppender} from '@mburchard/bit-log/appender/FileAppender';
import {fileExists, mkDir} from '../utils/file-utils.js';

const log = useLog('engine.logging');

export interface LoggingOptions {
  /** Root level; `TILEWRIGHT_LOG_LEVEL` wins over it. */
  level?: LogLevelName;
  /** Directory for `tilewright.log`. Console only when omitted. */
  directory?: string;
  version?: string;
}

let isLoggingSetup = false;

/**
 * Configure the root logger once. Later calls are ignored.
 *
 * @param options - Level, log directory and the version shown in the start banner.
 */
export async function setupLogging(options: LoggingOptions = {}): Promise<void> {
  if (isLoggingSetup) {
    return;
  }
  isLoggingSetup = true;
  const level = levelFromEnv(options.level ?? 'INFO');

  if (options.directory === undefined) {
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
        level,
      },
    });
  } else {
    if (!await fileExists(options.directory)) {
      log.debug(`the filepath for logging '${options.directory}' does not exist, creating...`);
      await mkDir(options.directory);
    }
    configureLogging({
      appender: {
        CONSOLE: {
          Class: ConsoleAppender,
          colored: true,
          pretty: true,
        },
        FILE: {
          Class: FileAppender,
          baseName: 'tilewright',
          filePath: options.directory,
          colored: false,
          pretty: true,
        },
      },
      root: {
        appender: ['CONSOLE', 'FILE'],
        level,
      },
    });
  }

  const version = options.version ?? 'dev';
  log.info(`${Ansi.magenta('**********')} tilewright (${Ansi.cyan(version)}) started ${Ansi.magenta('**********')}`);
}

export const getLogger = useLog;
