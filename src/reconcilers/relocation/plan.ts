/**
 * Relocation planning
 *
 * Decides where a package directory goes, which move strategy applies and,
 * for cross-volume moves, whether the destination has room for it.
 */

import { basename, isAbsolute, join, relative } from 'node:path';
import { errorMessage } from '../../utils/format.js';
import type { RelocationFs, VolumeId } from './fs.js';
import type {
  MoveStrategy,
  RelocationOptions,
  RelocationPlan,
  SpacePreflight,
} from './types.js';

/**
 * Mirror a directory's position under the source root into the destination root
 *
 * A directory outside the source root lands directly under the destination
 * root by its own name.
 */
export function mirrorDestination(sourceRoot: string, destRoot: string, directory: string): string {
  const rel = relative(sourceRoot, directory);
  if (rel === '' || rel.startsWith('..') || isAbsolute(rel)) {
    return join(destRoot, basename(directory));
  }
  return join(destRoot, rel);
}

/**
 * Pick the move strategy from the two volume identities
 *
 * An unknown volume is treated as a different one, so the move gets a space
 * preflight.
 */
export function selectMoveStrategy(sourceVolume: VolumeId | null, destVolume: VolumeId | null): MoveStrategy {
  if (sourceVolume === null || destVolume === null) return 'copy+delete';
  return sourceVolume === destVolume ? 'rename' : 'copy+delete';
}

function volumeOrNull(fs: RelocationFs, path: string): VolumeId | null {
  try {
    return fs.volumeOf(path);
  } catch {
    return null;
  }
}

/**
 * Resolve the strategy for moving `source` under `destRoot`
 */
export function resolveMoveStrategy(fs: RelocationFs, source: string, destRoot: string): MoveStrategy {
  return selectMoveStrategy(volumeOrNull(fs, source), volumeOrNull(fs, destRoot));
}

/**
 * Compare the source tree size plus margin against free space at the destination
 *
 * Queries free space fresh on every call.
 */
export function preflightSpace(
  fs: RelocationFs,
  source: string,
  destRoot: string,
  marginBytes: number
): SpacePreflight {
  let sizeBytes: number;
  let freeBytes: number;
  try {
    sizeBytes = fs.directorySize(source);
    freeBytes = fs.freeBytes(destRoot);
  } catch (err) {
    return { status: 'unknown', cause: errorMessage(err) };
  }

  const requiredBytes = sizeBytes + marginBytes;
  return requiredBytes > freeBytes
    ? { status: 'insufficient', sizeBytes, freeBytes, requiredBytes }
    : { status: 'ok', sizeBytes, freeBytes, requiredBytes };
}

/**
 * Plan the relocation of one package directory
 */
export function planRelocation(
  fs: RelocationFs,
  source: string,
  options: Pick<RelocationOptions, 'sourceRoot' | 'destRoot' | 'spaceMarginBytes' | 'spaceCheckFailurePolicy'>
): RelocationPlan {
  const destination = mirrorDestination(options.sourceRoot, options.destRoot, source);

  if (fs.exists(destination)) {
    return { action: 'skip_exist', source, destination };
  }

  const strategy = resolveMoveStrategy(fs, source, options.destRoot);
  if (strategy === 'rename') {
    return { action: 'move', source, destination, strategy };
  }

  const preflight = preflightSpace(fs, source, options.destRoot, options.spaceMarginBytes);
  switch (preflight.status) {
    case 'insufficient':
      return { action: 'no_space', source, destination, strategy, preflight };
    case 'unknown':
      if (options.spaceCheckFailurePolicy === 'skip') {
        return { action: 'blocked', source, destination, strategy, cause: `space check failed: ${preflight.cause}` };
      }
      return { action: 'move', source, destination, strategy, preflight };
    case 'ok':
      return { action: 'move', source, destination, strategy, preflight };
  }
}
