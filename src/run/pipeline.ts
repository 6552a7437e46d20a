/**
 * Run pipeline
 *
 * One run: validate roots, build the feed index, scan every manifest as a
 * single batch, then reconcile and relocate each manifest in turn. Per-item
 * failures become outcome records; only configuration errors throw.
 */

import { resolve } from 'node:path';
import { ensureDestinationRoot, validateRunConfig, type RunConfig } from '../config/index.js';
import { loadFeedIndex, type FeedIndex } from '../feed/index.js';
import { isWithin, scanManifests, type ManifestRecord } from '../manifests/index.js';
import { nodeRelocationFs, relocatePackage, type RelocationFs, type RelocationResult } from '../reconcilers/relocation/index.js';
import {
  formatTagValue,
  hasResolvedTag,
  reconcileManifest,
  type ReconcileOptions,
  type ReconcileResult,
} from '../reconcilers/simtype/index.js';
import { logger as defaultLogger, type Logger } from '../utils/logger.js';
import type { ReportSink } from './sink.js';
import { RunState } from './state.js';
import type { OutcomeRecord, RunSummary } from './types.js';

// =============================================================================
// Types
// =============================================================================

export interface RunOptions {
  /** Receives every outcome record as it is produced */
  sink: ReportSink;
  logger?: Logger;
  /** Filesystem port for relocation (default: node:fs) */
  fs?: RelocationFs;
  /** Manifest writer override (default: atomic rewrite) */
  writeManifest?: ReconcileOptions['writeManifest'];
}

// =============================================================================
// Outcome Mapping
// =============================================================================

function reconcileDetail(result: ReconcileResult): string | undefined {
  switch (result.code) {
    case 'NOOP':
      return `simType already ${formatTagValue(result.resolvedTag)}`;
    case 'WILL_UPDATE':
    case 'UPDATED':
    case 'UPDATE_FAILED':
      return `simType ${formatTagValue(result.previousTag)} -> ${formatTagValue(result.resolvedTag)}`;
    default:
      return undefined;
  }
}

/**
 * Report record for a reconciliation result
 */
export function reconcileOutcome(result: ReconcileResult): OutcomeRecord {
  const outcome: OutcomeRecord = {
    phase: 'reconcile',
    code: result.code,
    paths: [result.record.manifestPath],
  };

  if (result.code !== 'BAD_JSON') {
    outcome.identifier = result.identifier;
  }
  if (result.version !== null) {
    outcome.version = result.version;
  }
  const detail = reconcileDetail(result);
  if (detail) outcome.detail = detail;
  if (result.error) outcome.cause = result.error;

  return outcome;
}

/**
 * Report record for a relocation result
 */
export function relocationOutcome(reconciled: ReconcileResult, result: RelocationResult): OutcomeRecord {
  const outcome: OutcomeRecord = {
    phase: 'relocate',
    code: result.code,
    identifier: reconciled.identifier,
    detail: result.detail,
    paths: [result.source, result.destination],
  };
  if (reconciled.version !== null) outcome.version = reconciled.version;
  if (result.cause) outcome.cause = result.cause;
  return outcome;
}

/**
 * Whether a reconciled manifest goes on to relocation
 *
 * The resolved tag must be the accepted tag whether or not it needed
 * updating; a manifest whose rewrite failed stays where it is.
 */
export function shouldRelocate(
  result: ReconcileResult,
  acceptedTag: string
): result is ReconcileResult & { resolvedTag: string } {
  return hasResolvedTag(result) && result.resolvedTag === acceptedTag && result.code !== 'UPDATE_FAILED';
}

// =============================================================================
// Pipeline
// =============================================================================

function processManifest(
  record: ManifestRecord,
  index: FeedIndex,
  config: RunConfig,
  state: RunState,
  options: RunOptions,
  fs: RelocationFs
): void {
  const reconciled = reconcileManifest(record, index, {
    apply: config.apply,
    writeManifest: options.writeManifest,
  });
  const outcome = reconcileOutcome(reconciled);
  state.record(outcome);
  options.sink.write(outcome);

  if (!shouldRelocate(reconciled, config.acceptedTag)) return;

  const moved = relocatePackage(
    record.directory,
    {
      sourceRoot: config.addonsRoot,
      destRoot: config.destRoot,
      spaceMarginBytes: config.spaceMarginBytes,
      apply: config.apply,
      spaceCheckFailurePolicy: config.spaceCheckFailurePolicy,
    },
    fs
  );
  const relocated = relocationOutcome(reconciled, moved);
  state.record(relocated);
  options.sink.write(relocated);
}

/**
 * Execute one full reconciliation run
 *
 * @throws ConfigError when a root is missing or the destination root cannot
 * be created
 */
export function runReconciliation(config: RunConfig, options: RunOptions): RunSummary {
  const log = options.logger ?? defaultLogger;
  const fs = options.fs ?? nodeRelocationFs;

  validateRunConfig(config);
  ensureDestinationRoot(config);

  log.info(config.apply ? 'Starting apply run' : 'Starting dry run', {
    addonsRoot: config.addonsRoot,
    feedRoot: config.feedRoot,
    destRoot: config.destRoot,
  });

  const feed = loadFeedIndex(config.feedRoot, {
    acceptedTag: config.acceptedTag,
    logger: log.child({ phase: 'feed' }),
  });
  log.info(`Feed index built: ${feed.index.size} key(s) from ${feed.sources.length} source(s)`);

  if (isWithin(resolve(config.addonsRoot), resolve(config.destRoot))) {
    log.warn(
      `Addons root ${config.addonsRoot} lies inside destination root ${config.destRoot}; relocated packages will be scanned again`
    );
  }

  const manifests = scanManifests(config.addonsRoot, {
    exclude: [config.destRoot],
    onUnreadableDirectory: (path, err) => log.warn(`Cannot list directory ${path}: ${err.message}`),
  });
  log.info(`Found ${manifests.length} manifest(s)`);

  const state = new RunState();
  state.manifestsScanned = manifests.length;

  for (const record of manifests) {
    processManifest(record, feed.index, config, state, options, fs);
  }

  return {
    apply: config.apply,
    counts: state.counts,
    badJson: state.badJson,
    manifestsScanned: state.manifestsScanned,
    feed: { keys: feed.index.size, sources: feed.sources },
  };
}
