/**
 * simType apply
 *
 * Turns a WILL_UPDATE classification into a rewrite of the manifest when
 * running in apply mode. Only the simType value changes in the file text.
 */

import type { FeedIndex } from '../../feed/types.js';
import { TAG_FIELD, type ManifestRecord } from '../../manifests/types.js';
import { setManifestField, writeManifestAtomic } from '../../manifests/writer.js';
import { diffManifestTag } from './diff.js';
import { hasResolvedTag, type ReconcileOptions, type ReconcileResult } from './types.js';

/**
 * Reconcile one manifest's simType against the feed index
 *
 * Never throws: a failed rewrite is reported as UPDATE_FAILED and the manifest
 * on disk is left as it was.
 */
export function reconcileManifest(
  record: ManifestRecord,
  index: FeedIndex,
  options: ReconcileOptions
): ReconcileResult {
  const result = diffManifestTag(record, index);

  if (!options.apply || result.code !== 'WILL_UPDATE' || record.status !== 'parsed' || !hasResolvedTag(result)) {
    return result;
  }

  const write = options.writeManifest ?? writeManifestAtomic;
  let body: string;

  try {
    body = setManifestField(record.source, TAG_FIELD, result.resolvedTag);
    write(record.manifestPath, body);
  } catch (err) {
    return { ...result, code: 'UPDATE_FAILED', error: err instanceof Error ? err.message : String(err) };
  }

  record.source = body;
  record.content = { ...record.content, [TAG_FIELD]: result.resolvedTag };
  record.currentTag = result.resolvedTag;
  return { ...result, code: 'UPDATED' };
}
