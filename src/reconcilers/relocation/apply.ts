/**
 * Relocation apply
 *
 * Executes a relocation plan. Dry runs report the plan with WILL_* codes and
 * touch nothing. Failures are returned as MOVE_FAILED results; nothing here
 * throws.
 */

import { dirname } from 'node:path';
import { errorMessage, formatBytes } from '../../utils/format.js';
import { nodeRelocationFs, type RelocationFs } from './fs.js';
import { planRelocation } from './plan.js';
import type {
  InsufficientSpace,
  MovePlan,
  MoveStrategy,
  RelocationOptions,
  RelocationPlan,
  RelocationResult,
  SpacePreflight,
} from './types.js';

function spaceDetail(preflight: InsufficientSpace): string {
  return `required ${formatBytes(preflight.requiredBytes)} > free ${formatBytes(preflight.freeBytes)}`;
}

function intentDetail(strategy: MoveStrategy, preflight: SpacePreflight | undefined, marginBytes: number): string {
  if (strategy === 'rename' || !preflight) return `(${strategy})`;
  if (preflight.status === 'unknown') {
    return `(copy+delete, space unchecked: ${preflight.cause})`;
  }
  return (
    `(copy+delete, size ${formatBytes(preflight.sizeBytes)}, ` +
    `free ${formatBytes(preflight.freeBytes)}, margin ${formatBytes(marginBytes)})`
  );
}

/**
 * Move a directory with the planned strategy
 *
 * Never writes into an existing destination. A failed copy removes whatever
 * reached the destination and leaves the source untouched.
 */
export function executeMove(fs: RelocationFs, source: string, destination: string, strategy: MoveStrategy): void {
  if (fs.exists(destination)) {
    throw new Error(`destination already exists: ${destination}`);
  }
  fs.ensureDir(dirname(destination));

  if (strategy === 'rename') {
    fs.rename(source, destination);
    return;
  }

  try {
    fs.copyTree(source, destination);
  } catch (err) {
    if (fs.exists(destination)) {
      fs.removeTree(destination);
    }
    throw err;
  }

  try {
    fs.removeTree(source);
  } catch (err) {
    throw new Error(`copied to destination but source removal failed: ${errorMessage(err)}`);
  }
}

/**
 * Turn a plan into a result, performing the move in apply mode
 */
export function executeRelocation(
  fs: RelocationFs,
  plan: RelocationPlan,
  options: Pick<RelocationOptions, 'apply' | 'spaceMarginBytes'>
): RelocationResult {
  const { source, destination } = plan;
  const { apply } = options;

  switch (plan.action) {
    case 'skip_exist':
      return { code: apply ? 'SKIP_EXIST' : 'WILL_SKIP_EXIST', source, destination, detail: 'dest exists' };

    case 'no_space':
      return {
        code: apply ? 'NO_SPACE' : 'WILL_NO_SPACE',
        source,
        destination,
        strategy: plan.strategy,
        detail: spaceDetail(plan.preflight),
      };

    case 'blocked':
      return { code: 'MOVE_FAILED', source, destination, strategy: plan.strategy, detail: `(${plan.strategy})`, cause: plan.cause };

    case 'move':
      return executeMovePlan(fs, plan, options);
  }
}

function executeMovePlan(
  fs: RelocationFs,
  plan: MovePlan,
  options: Pick<RelocationOptions, 'apply' | 'spaceMarginBytes'>
): RelocationResult {
  const { source, destination, strategy } = plan;

  if (!options.apply) {
    return {
      code: 'WILL_MOVE',
      source,
      destination,
      strategy,
      detail: intentDetail(strategy, plan.preflight, options.spaceMarginBytes),
    };
  }

  try {
    executeMove(fs, source, destination, strategy);
  } catch (err) {
    return { code: 'MOVE_FAILED', source, destination, strategy, detail: `(${strategy})`, cause: errorMessage(err) };
  }

  return { code: 'MOVED', source, destination, strategy, detail: `(${strategy})` };
}

/**
 * Plan and (in apply mode) perform the relocation of one package directory
 */
export function relocatePackage(
  source: string,
  options: RelocationOptions,
  fs: RelocationFs = nodeRelocationFs
): RelocationResult {
  return executeRelocation(fs, planRelocation(fs, source, options), options);
}
