/**
 * feed command - Build the feed index and report what it contains
 */

import type { CommandContext, CommandResult } from '../types.js';
import {
  InvalidSettingError,
  formatError,
  isConfigError,
  resolveRunConfig,
  validateRunConfig,
  type RunConfig,
} from '../config/index.js';
import { FeedIndex, loadFeedIndex, type FeedSourceStats } from '../feed/index.js';
import { normalizeVersionString } from '../matching/index.js';
import { error as printError, header, info, printFeedSources, warn } from '../utils/output.js';
import { createRunLogging, toRunConfigInput } from './context.js';

export interface FeedCommandOptions {
  /** Key to resolve, as IDENT@version */
  lookup?: string;
}

export interface FeedLookup {
  key: string;
  tag: string | null;
}

export interface FeedCommandData {
  keys: number;
  sources: FeedSourceStats[];
  lookup?: FeedLookup;
}

export interface LookupTarget {
  identifier: string;
  version: string;
}

/**
 * Parse an IDENT@version lookup, normalizing the version
 */
export function parseLookup(raw: string): LookupTarget {
  const at = raw.lastIndexOf('@');
  const identifier = at > 0 ? raw.slice(0, at).trim() : '';
  const version = at > 0 ? normalizeVersionString(raw.slice(at + 1)) : null;

  if (!/^[A-Za-z]{4}$/.test(identifier) || version === null) {
    throw new InvalidSettingError('lookup', raw, 'expected IDENT@version, e.g. KLAX@1.2.0');
  }
  return { identifier: identifier.toUpperCase(), version };
}

/**
 * Execute the feed command
 */
export async function feedCommand(
  ctx: CommandContext,
  options: FeedCommandOptions = {}
): Promise<CommandResult<FeedCommandData>> {
  const { outputFormat } = ctx;

  let target: LookupTarget | undefined;
  let config: RunConfig;
  try {
    target = options.lookup === undefined ? undefined : parseLookup(options.lookup);
    config = resolveRunConfig(toRunConfigInput(ctx, false)).config;
    validateRunConfig(config, ['feed']);
  } catch (err) {
    if (!isConfigError(err)) throw err;
    if (outputFormat === 'human') printError(formatError(err));
    return { success: false, message: err.message, errors: [formatError(err)] };
  }

  const { logger } = createRunLogging(ctx, { logDir: null });
  const feed = loadFeedIndex(config.feedRoot, { acceptedTag: config.acceptedTag, logger });

  const data: FeedCommandData = { keys: feed.index.size, sources: feed.sources };

  if (target) {
    data.lookup = {
      key: FeedIndex.key(target.identifier, target.version),
      tag: feed.index.get(target.identifier, target.version) ?? null,
    };
  }

  if (outputFormat === 'human') {
    header('Feed');
    info(`Accepted tag: ${config.acceptedTag}`);
    printFeedSources(feed.sources, feed.index.size);
    if (data.lookup) {
      console.log();
      if (data.lookup.tag === null) warn(`${data.lookup.key}: not in index`);
      else info(`${data.lookup.key} -> ${data.lookup.tag}`);
    }
  }

  const failed = feed.sources.filter((source) => source.error).length;
  return {
    success: true,
    message: `Indexed ${feed.index.size} key(s) from ${feed.sources.length} source(s)` +
      (failed > 0 ? `, ${failed} source(s) skipped` : ''),
    data,
  };
}
