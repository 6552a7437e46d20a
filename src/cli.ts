/**
 * addon-sync CLI - Reconcile installed addon manifests against a feed
 *
 * Commands:
 * - reconcile: Correct manifest simType values and relocate accepted packages
 * - feed: Build the feed index and show what it contains
 */

import { Command, Option } from 'commander';
import type { GlobalOptions, CommandContext } from './types.js';
import { reconcileCommand, feedCommand } from './commands/index.js';
import { printResult, error, verbose as verboseLog } from './utils/output.js';

const VERSION = '0.1.0';

/**
 * Create the command context from parsed options
 */
function createContext(options: GlobalOptions): CommandContext {
  verboseLog(`Options: ${JSON.stringify(options)}`, options.verbose);

  return {
    options,
    outputFormat: options.json ? 'json' : 'human',
    cwd: process.cwd(),
  };
}

/**
 * Main CLI program
 */
const program = new Command()
  .name('addon-sync')
  .description('Reconcile installed addon manifests against a package feed')
  .version(VERSION)
  // Global options available to all commands; unset ones fall back to the
  // config file, then built-in defaults
  .addOption(
    new Option('--addons-root <dir>', 'Directory scanned for manifest.json files')
      .env('ADDONS_ROOT')
  )
  .addOption(
    new Option('--feed-root <dir>', 'Directory holding feed *.json files')
      .env('FEED_ROOT')
  )
  .addOption(
    new Option('--dest-root <dir>', 'Directory accepted packages are relocated into')
      .env('DEST_ROOT')
  )
  .addOption(
    new Option('--space-margin-bytes <bytes>', 'Free space to keep on the destination beyond the package size')
      .env('SPACE_MARGIN_BYTES')
  )
  .addOption(
    new Option('--accepted-tag <tag>', 'Feed tag that marks a package as accepted')
      .env('ACCEPTED_TAG')
  )
  .addOption(
    new Option('--config <path>', 'YAML config file (default: ./addon-sync.yaml when present)')
  )
  .addOption(
    new Option('--log-dir <dir>', 'Directory for the per-run log file')
      .env('ADDON_SYNC_LOG_DIR')
  )
  .addOption(
    new Option('--no-log-file', 'Do not write a per-run log file')
  )
  .addOption(
    new Option('--allow-unchecked-move', 'Move across volumes even when free space cannot be determined')
  )
  .addOption(
    new Option('--json', 'Output JSON for CI/automation')
      .default(false)
  )
  .addOption(
    new Option('-v, --verbose', 'Enable verbose logging')
      .default(false)
  );

/**
 * reconcile command - Full run (default)
 */
program
  .command('reconcile', { isDefault: true })
  .description('Correct manifest simType values and relocate accepted packages (dry run unless --apply)')
  .option('--apply', 'Rewrite manifests and move directories', false)
  .action(async (cmdOpts: { apply: boolean }) => {
    const ctx = createContext(program.opts<GlobalOptions>());

    try {
      const result = await reconcileCommand(ctx, { apply: cmdOpts.apply });

      if (ctx.outputFormat === 'json') {
        printResult(result, ctx.outputFormat);
      }

      process.exit(result.success ? 0 : 1);
    } catch (err) {
      error(`Reconcile failed: ${err instanceof Error ? err.message : String(err)}`);
      process.exit(1);
    }
  });

/**
 * feed command - Inspect the feed index
 */
program
  .command('feed')
  .description('Build the feed index and show per-source statistics')
  .option('--lookup <key>', 'Resolve one key, e.g. KLAX@1.2.0')
  .action(async (cmdOpts: { lookup?: string }) => {
    const ctx = createContext(program.opts<GlobalOptions>());

    try {
      const result = await feedCommand(ctx, { lookup: cmdOpts.lookup });

      if (ctx.outputFormat === 'json') {
        printResult(result, ctx.outputFormat);
      }

      process.exit(result.success ? 0 : 1);
    } catch (err) {
      error(`Feed failed: ${err instanceof Error ? err.message : String(err)}`);
      process.exit(1);
    }
  });

// Parse and execute
await program.parseAsync();
