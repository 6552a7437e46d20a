/**
 * Types for package relocation
 *
 * A relocation is planned first (destination, move strategy, space preflight)
 * and only then executed, so dry runs report exactly what an apply run would
 * attempt.
 */

export const RELOCATION_CODES = [
  'WILL_MOVE',
  'MOVED',
  'SKIP_EXIST',
  'WILL_SKIP_EXIST',
  'NO_SPACE',
  'WILL_NO_SPACE',
  'MOVE_FAILED',
] as const;

export type RelocationCode = (typeof RELOCATION_CODES)[number];

/**
 * How a directory gets to its destination
 */
export type MoveStrategy = 'rename' | 'copy+delete';

/**
 * What to do when the free-space check itself fails
 * - skip: do not move, report MOVE_FAILED with the cause
 * - attempt: move without a verified space figure
 */
export type SpaceCheckFailurePolicy = 'skip' | 'attempt';

/**
 * Result of the free-space check for a copy+delete move
 */
export type SpacePreflight =
  | { status: 'ok'; sizeBytes: number; freeBytes: number; requiredBytes: number }
  | { status: 'insufficient'; sizeBytes: number; freeBytes: number; requiredBytes: number }
  | { status: 'unknown'; cause: string };

export type InsufficientSpace = Extract<SpacePreflight, { status: 'insufficient' }>;

/**
 * Planned relocation for one package directory
 */
export type RelocationPlan =
  | { action: 'skip_exist'; source: string; destination: string }
  | { action: 'no_space'; source: string; destination: string; strategy: 'copy+delete'; preflight: InsufficientSpace }
  | { action: 'blocked'; source: string; destination: string; strategy: MoveStrategy; cause: string }
  | MovePlan;

export interface MovePlan {
  action: 'move';
  source: string;
  destination: string;
  strategy: MoveStrategy;
  /** Present for copy+delete moves */
  preflight?: SpacePreflight;
}

/**
 * Outcome of relocating one package directory
 */
export interface RelocationResult {
  code: RelocationCode;
  source: string;
  destination: string;
  strategy?: MoveStrategy;
  /** Human-readable move detail, e.g. "(rename)" */
  detail: string;
  /** Underlying error text for failures */
  cause?: string;
}

/**
 * Options shared by planning and execution
 */
export interface RelocationOptions {
  /** Root the package directory was scanned from */
  sourceRoot: string;
  /** Root the directory tree is mirrored into */
  destRoot: string;
  /** Bytes kept free on top of the package size */
  spaceMarginBytes: number;
  /** Perform the move (false = dry run) */
  apply: boolean;
  spaceCheckFailurePolicy: SpaceCheckFailurePolicy;
}
