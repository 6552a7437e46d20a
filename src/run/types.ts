/**
 * Run-level types: outcome records, counters and the run summary
 */

import type { FeedSourceStats } from '../feed/types.js';
import { RECONCILE_CODES, type ReconcileCode } from '../reconcilers/simtype/types.js';
import { RELOCATION_CODES, type RelocationCode } from '../reconcilers/relocation/types.js';

export type OutcomeCode = ReconcileCode | RelocationCode;

/** Every outcome code in report order */
export const OUTCOME_CODES: readonly OutcomeCode[] = [...RECONCILE_CODES, ...RELOCATION_CODES];

export type OutcomePhase = 'reconcile' | 'relocate';

/**
 * One report line's worth of structured data
 */
export interface OutcomeRecord {
  phase: OutcomePhase;
  code: OutcomeCode;
  /** Identifier or placeholder; absent for BAD_JSON */
  identifier?: string;
  /** Normalized version */
  version?: string;
  /** Manifest or move detail */
  detail?: string;
  /** Manifest path, or source and destination of a move */
  paths: string[];
  /** Underlying error text for failures */
  cause?: string;
}

/**
 * A manifest that failed to parse, for the grouped summary block
 */
export interface BadJsonEntry {
  path: string;
  error: string;
}

/**
 * Aggregate result of one run
 */
export interface RunSummary {
  apply: boolean;
  counts: Record<OutcomeCode, number>;
  badJson: BadJsonEntry[];
  manifestsScanned: number;
  feed: {
    keys: number;
    sources: FeedSourceStats[];
  };
}
