/**
 * simType diff
 *
 * Pure classification of a manifest against the feed index, with no side
 * effects. Order of checks: parse failure, version, identifier, feed lookup,
 * tag comparison.
 */

import type { FeedIndex } from '../../feed/types.js';
import { UNKNOWN_IDENTIFIER } from '../../matching/identifier.js';
import { normalizeVersionString } from '../../matching/version.js';
import type { ManifestRecord } from '../../manifests/types.js';
import type { ReconcileResult } from './types.js';

/**
 * Classify a manifest as it would be in a dry run
 */
export function diffManifestTag(record: ManifestRecord, index: FeedIndex): ReconcileResult {
  if (record.status === 'bad_json') {
    return { code: 'BAD_JSON', record, identifier: UNKNOWN_IDENTIFIER, version: null, error: record.error };
  }

  const version = normalizeVersionString(record.declaredVersion);
  if (!version) {
    return { code: 'NO_VERSION', record, identifier: UNKNOWN_IDENTIFIER, version: null };
  }

  if (record.identifier.kind === 'absent') {
    return { code: 'NO_MATCH', record, identifier: UNKNOWN_IDENTIFIER, version };
  }

  const identifier = record.identifier.identifier;
  const tag = index.get(identifier, version);
  if (tag === undefined) {
    return { code: 'NO_MATCH', record, identifier, version };
  }

  const base = { record, identifier, version, previousTag: record.currentTag, resolvedTag: tag };
  return record.currentTag === tag ? { ...base, code: 'NOOP' } : { ...base, code: 'WILL_UPDATE' };
}

/**
 * Render a tag value for report lines
 */
export function formatTagValue(value: unknown): string {
  if (value === undefined || value === null) return '(none)';
  return typeof value === 'string' ? value : JSON.stringify(value);
}
