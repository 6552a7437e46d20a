/**
 * Output formatting utilities for consistent CLI output
 */

import chalk from 'chalk';
import type { CommandResult, OutputFormat } from '../types.js';
import type { FeedSourceStats } from '../feed/types.js';
import { formatOutcomeLine, formatSummaryLines } from '../run/report.js';
import type { OutcomeCode, OutcomeRecord, RunSummary } from '../run/types.js';

/**
 * Format and print command result based on output format
 */
export function printResult<T>(
  result: CommandResult<T>,
  format: OutputFormat
): void {
  if (format === 'json') {
    console.log(JSON.stringify(result, null, 2));
    return;
  }

  if (result.success) {
    console.log(chalk.green('✓'), result.message);
  } else {
    console.log(chalk.red('✗'), result.message);
  }

  if (result.errors && result.errors.length > 0) {
    console.log(chalk.red('\nErrors:'));
    result.errors.forEach((err) => {
      console.log(chalk.red('  •'), err);
    });
  }
}

/**
 * Print informational message
 */
export function info(message: string): void {
  console.log(chalk.blue('ℹ'), message);
}

/**
 * Print warning message
 */
export function warn(message: string): void {
  console.log(chalk.yellow('⚠'), message);
}

/**
 * Print error message
 */
export function error(message: string): void {
  console.log(chalk.red('✗'), message);
}

/**
 * Print verbose/debug message (only if verbose mode is enabled)
 */
export function verbose(message: string, isVerbose: boolean): void {
  if (isVerbose) {
    // Keep JSON output clean: verbose/debug output should never go to stdout.
    console.error(chalk.gray('[verbose]'), message);
  }
}

/**
 * Print a section header
 */
export function header(title: string): void {
  console.log(chalk.bold.underline(`\n${title}\n`));
}

/**
 * Print dry-run notice
 */
export function dryRunNotice(): void {
  console.log(chalk.yellow.bold('\n[DRY RUN] No changes will be applied\n'));
}

// Helper functions

function getOutcomeColor(code: OutcomeCode): typeof chalk.green {
  switch (code) {
    case 'UPDATED':
    case 'MOVED':
      return chalk.green;
    case 'WILL_UPDATE':
    case 'WILL_MOVE':
      return chalk.cyan;
    case 'NOOP':
    case 'SKIP_EXIST':
    case 'WILL_SKIP_EXIST':
      return chalk.gray;
    case 'NO_VERSION':
    case 'NO_MATCH':
      return chalk.yellow;
    case 'NO_SPACE':
    case 'WILL_NO_SPACE':
      return chalk.magenta;
    case 'BAD_JSON':
    case 'UPDATE_FAILED':
    case 'MOVE_FAILED':
      return chalk.red;
  }
}

/**
 * Print one per-item outcome line
 */
export function printOutcome(record: OutcomeRecord): void {
  console.log(getOutcomeColor(record.code)(formatOutcomeLine(record)));
}

/**
 * Print the end-of-run summary
 */
export function printSummary(summary: RunSummary, format: OutputFormat): void {
  if (format === 'json') {
    console.log(JSON.stringify(summary, null, 2));
    return;
  }

  console.log();
  for (const line of formatSummaryLines(summary)) {
    console.log(line.startsWith('  ') ? line : chalk.bold(line));
  }
}

/**
 * Print per-source feed statistics
 */
export function printFeedSources(sources: FeedSourceStats[], keys: number): void {
  console.log(chalk.bold(`\nFeed index: ${keys} (identifier, version) key(s)\n`));

  if (sources.length === 0) {
    console.log(chalk.gray('  No feed sources found'));
    return;
  }

  for (const source of sources) {
    if (source.error) {
      console.log(chalk.red(`  ✗ ${source.source}`), chalk.gray(source.error));
      continue;
    }
    console.log(
      `  ${chalk.green('•')} ${source.source}`,
      chalk.gray(
        `${source.elements} element(s), ${source.accepted} accepted, ` +
          `${source.skipped} skipped, ${source.keysWritten} key(s)`
      )
    );
  }
}
