/**
 * reconcile command - Correct manifest simType values and relocate accepted
 * packages
 *
 * Dry run by default; --apply rewrites manifests and moves directories.
 */

import type { CommandContext, CommandResult } from '../types.js';
import { formatError, isConfigError, resolveRunConfig, type RunConfig } from '../config/index.js';
import {
  ConsoleReportSink,
  LogWriterReportSink,
  MemoryReportSink,
  TeeReportSink,
  formatSummaryLines,
  runReconciliation,
  type OutcomeRecord,
  type ReportSink,
  type RunSummary,
} from '../run/index.js';
import { dryRunNotice, error as printError, header, info, printSummary, verbose, warn } from '../utils/output.js';
import { createRunLogging, toRunConfigInput } from './context.js';

export interface ReconcileCommandOptions {
  /** Rewrite manifests and move directories */
  apply?: boolean;
}

export interface ReconcileCommandData {
  config: RunConfig;
  summary: RunSummary;
  /** Path of the run's log file, if one was written */
  logFile: string | null;
  /** Output destinations that failed during the run; the run itself went on */
  warnings: string[];
  /** Outcome records (JSON output only) */
  records?: OutcomeRecord[];
}

/**
 * Execute the reconcile command
 */
export async function reconcileCommand(
  ctx: CommandContext,
  options: ReconcileCommandOptions = {}
): Promise<CommandResult<ReconcileCommandData>> {
  const { options: globalOpts, outputFormat } = ctx;
  const apply = options.apply ?? false;

  let config: RunConfig;
  try {
    const resolution = resolveRunConfig(toRunConfigInput(ctx, apply));
    config = resolution.config;
    if (resolution.configFile) {
      verbose(`Config file: ${resolution.configFile}`, globalOpts.verbose);
    }
    verbose(`Setting sources: ${JSON.stringify(resolution.sources)}`, globalOpts.verbose);
  } catch (err) {
    return configFailure(err, outputFormat === 'human');
  }

  if (outputFormat === 'human') {
    header(apply ? 'Reconcile (apply)' : 'Reconcile');
    if (!apply) dryRunNotice();
  }

  const warnings: string[] = [];
  const outputFailure =
    (target: string) =>
    (err: Error): void => {
      const text = `${target} failed: ${err.message}`;
      warnings.push(text);
      if (outputFormat === 'human') warn(text);
    };

  const { logger, file } = createRunLogging(ctx, config, { onLogError: outputFailure('Writing the log file') });
  const memory = new MemoryReportSink();
  const sinks: ReportSink[] = [outputFormat === 'human' ? new ConsoleReportSink() : memory];
  if (file) sinks.push(new LogWriterReportSink(file));
  const sink = new TeeReportSink(sinks, outputFailure('Writing the report'));

  let summary: RunSummary;
  try {
    summary = runReconciliation(config, { sink, logger });
  } catch (err) {
    if (err instanceof Error) logger.error('Run aborted', err);
    return configFailure(err, outputFormat === 'human');
  }

  if (file) {
    for (const line of formatSummaryLines(summary)) {
      file.write('info', line);
    }
  }

  if (outputFormat === 'human') {
    printSummary(summary, outputFormat);
    if (file && !file.failure) info(`Log written to ${file.path}`);
  }

  const processed = summary.manifestsScanned;
  return {
    success: true,
    message: `${apply ? 'Applied' : 'Dry run over'} ${processed} manifest(s)`,
    data: {
      config,
      summary,
      logFile: file?.path ?? null,
      warnings,
      records: outputFormat === 'json' ? memory.records : undefined,
    },
  };
}

/**
 * Failure result for configuration errors; anything else is rethrown
 */
function configFailure(err: unknown, print: boolean): CommandResult<ReconcileCommandData> {
  if (!isConfigError(err)) throw err;
  if (print) printError(formatError(err));
  return {
    success: false,
    message: err.message,
    errors: [formatError(err)],
  };
}
