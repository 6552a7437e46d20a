/**
 * Relocation exports
 */

export {
  RELOCATION_CODES,
  type RelocationCode,
  type MoveStrategy,
  type SpaceCheckFailurePolicy,
  type SpacePreflight,
  type RelocationPlan,
  type MovePlan,
  type InsufficientSpace,
  type RelocationResult,
  type RelocationOptions,
} from './types.js';

export {
  nodeRelocationFs,
  nearestExistingAncestor,
  directorySizeBytes,
  type ListDirectory,
  type RelocationFs,
  type VolumeId,
} from './fs.js';

export {
  mirrorDestination,
  selectMoveStrategy,
  resolveMoveStrategy,
  preflightSpace,
  planRelocation,
} from './plan.js';

export { executeMove, executeRelocation, relocatePackage } from './apply.js';
