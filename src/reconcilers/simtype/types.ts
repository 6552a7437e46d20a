/**
 * Types for simType reconciliation
 *
 * Each manifest is classified against the feed index into exactly one
 * outcome. Dry runs stop at WILL_UPDATE; apply runs rewrite the manifest and
 * report UPDATED (or UPDATE_FAILED when the rewrite could not land).
 */

import type { ManifestRecord } from '../../manifests/types.js';

export const RECONCILE_CODES = [
  'BAD_JSON',
  'NO_VERSION',
  'NO_MATCH',
  'NOOP',
  'WILL_UPDATE',
  'UPDATED',
  'UPDATE_FAILED',
] as const;

export type ReconcileCode = (typeof RECONCILE_CODES)[number];

/**
 * Classification of one manifest
 */
export interface ReconcileResult {
  code: ReconcileCode;
  record: ManifestRecord;
  /** Matched identifier, or the unknown placeholder */
  identifier: string;
  /** Normalized manifest version, null when it could not be derived */
  version: string | null;
  /** simType before reconciliation */
  previousTag?: unknown;
  /** Tag the feed resolves for this manifest, when a match exists */
  resolvedTag?: string;
  /** Parse or write error text */
  error?: string;
}

/**
 * Options for reconcile operations
 */
export interface ReconcileOptions {
  /** Rewrite manifests that need a new tag */
  apply: boolean;
  /** Replaces the on-disk writer; used by tests */
  writeManifest?: (manifestPath: string, body: string) => void;
}

/**
 * Whether a result carries a feed match (and so may lead to relocation)
 */
export function hasResolvedTag(result: ReconcileResult): result is ReconcileResult & { resolvedTag: string } {
  return typeof result.resolvedTag === 'string';
}
