/**
 * Feed index builder
 *
 * Loads every `*.json` source directly inside the feed root in file-name
 * order, so a later file overrides an earlier one for the same key.
 */

import { readdirSync, readFileSync } from 'node:fs';
import { join, extname } from 'node:path';
import type { Logger } from '../utils/logger.js';
import {
  FeedEntry,
  FeedIndex,
  FEED_LIST_KEYS,
  type FeedLoadResult,
  type FeedSourceStats,
} from './types.js';

/**
 * Options for building the feed index
 */
export interface FeedLoadOptions {
  /** Tag an entry must carry to be indexed */
  acceptedTag: string;
  /** Logger for source-level problems */
  logger?: Logger;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Find the element list in a parsed feed payload
 *
 * @returns the list, or null when the payload is neither a list nor an object
 * wrapping one under a recognized key
 */
export function extractFeedList(payload: unknown): unknown[] | null {
  if (Array.isArray(payload)) return payload;
  if (!isRecord(payload)) return null;

  for (const key of FEED_LIST_KEYS) {
    const list = payload[key];
    if (Array.isArray(list)) return list;
  }
  return null;
}

/**
 * List feed source file names in override order
 */
export function listFeedSources(feedRoot: string): string[] {
  return readdirSync(feedRoot, { withFileTypes: true })
    .filter((entry) => entry.isFile() && extname(entry.name).toLowerCase() === '.json')
    .map((entry) => entry.name)
    .sort();
}

/**
 * Add the entries of one parsed payload to the index
 */
export function indexFeedPayload(
  index: FeedIndex,
  source: string,
  payload: unknown,
  acceptedTag: string
): FeedSourceStats {
  const stats: FeedSourceStats = { source, elements: 0, skipped: 0, accepted: 0, keysWritten: 0 };

  const list = extractFeedList(payload);
  if (!list) {
    stats.error = 'payload is not a list of entries';
    return stats;
  }

  stats.elements = list.length;
  for (const element of list) {
    if (!isRecord(element)) {
      stats.skipped++;
      continue;
    }
    const entry = new FeedEntry(source, element);
    const written = index.add(entry, acceptedTag);
    if (written > 0) {
      stats.accepted++;
      stats.keysWritten += written;
    }
  }

  return stats;
}

/**
 * Build the feed index from every source under the feed root
 *
 * An unreadable or malformed source is logged and recorded in its stats; the
 * remaining sources still load.
 */
export function loadFeedIndex(feedRoot: string, options: FeedLoadOptions): FeedLoadResult {
  const { acceptedTag, logger } = options;
  const index = new FeedIndex();
  const sources: FeedSourceStats[] = [];

  for (const name of listFeedSources(feedRoot)) {
    const path = join(feedRoot, name);

    let payload: unknown;
    try {
      payload = JSON.parse(readFileSync(path, 'utf-8'));
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger?.error(`Failed to read feed source ${path}: ${message}`);
      sources.push({ source: name, elements: 0, skipped: 0, accepted: 0, keysWritten: 0, error: message });
      continue;
    }

    const stats = indexFeedPayload(index, name, payload, acceptedTag);
    if (stats.error) {
      logger?.warn(`Skipping feed source ${path}: ${stats.error}`);
    } else {
      logger?.debug(`Indexed feed source ${name}`, {
        elements: stats.elements,
        accepted: stats.accepted,
        keysWritten: stats.keysWritten,
      });
    }
    sources.push(stats);
  }

  return { index, sources };
}
