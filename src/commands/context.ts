/**
 * Helpers shared by command handlers: turning global options into run
 * settings and wiring the run's logger.
 */

import type { CommandContext } from '../types.js';
import type { RunConfig, RunConfigInput } from '../config/settings.js';
import { consoleWriter, createLogger, FileLogWriter, runLogPath, type Logger, type LogWriter } from '../utils/logger.js';

/**
 * Map parsed CLI options onto config resolution input
 */
export function toRunConfigInput(ctx: CommandContext, apply: boolean): RunConfigInput {
  const { options } = ctx;
  return {
    addonsRoot: options.addonsRoot,
    feedRoot: options.feedRoot,
    destRoot: options.destRoot,
    spaceMarginBytes: options.spaceMarginBytes,
    acceptedTag: options.acceptedTag,
    apply,
    logDir: options.logFile === false ? null : options.logDir,
    allowUncheckedMove: options.allowUncheckedMove,
    configPath: options.config,
    cwd: ctx.cwd,
  };
}

export interface RunLoggingOptions {
  /** Run start time, used in the log file name */
  now?: Date;
  /** Called once if the log file cannot be written */
  onLogError?: (error: Error) => void;
}

export interface RunLogging {
  logger: Logger;
  /** Per-run log file writer, when a log directory is configured */
  file: FileLogWriter | null;
}

/**
 * Build the logger for one run
 *
 * Human output logs to the console; JSON output keeps stdout for the result
 * and only writes the log file.
 */
export function createRunLogging(
  ctx: CommandContext,
  config: Pick<RunConfig, 'logDir'>,
  options: RunLoggingOptions = {}
): RunLogging {
  const file = config.logDir
    ? new FileLogWriter(runLogPath(config.logDir, options.now ?? new Date()), options.onLogError)
    : null;
  const writers: LogWriter[] = [];

  if (ctx.outputFormat === 'human') {
    writers.push(consoleWriter);
  }
  if (file) writers.push(file);

  const logger = createLogger({
    level: ctx.options.verbose ? 'debug' : 'info',
    timestamps: true,
    writers,
  });

  return { logger, file };
}
