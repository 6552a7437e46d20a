/**
 * simType reconciler exports
 */

export {
  RECONCILE_CODES,
  hasResolvedTag,
  type ReconcileCode,
  type ReconcileResult,
  type ReconcileOptions,
} from './types.js';

export { diffManifestTag, formatTagValue } from './diff.js';
export { reconcileManifest } from './apply.js';
