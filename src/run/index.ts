/**
 * Run module exports
 */

export { runReconciliation, reconcileOutcome, relocationOutcome, shouldRelocate, type RunOptions } from './pipeline.js';
export { RunState, emptyCounts } from './state.js';
export { formatOutcomeLine, formatSummaryLines } from './report.js';
export {
  ConsoleReportSink,
  LogWriterReportSink,
  MemoryReportSink,
  TeeReportSink,
  type ReportSink,
} from './sink.js';
export {
  OUTCOME_CODES,
  type OutcomeCode,
  type OutcomePhase,
  type OutcomeRecord,
  type BadJsonEntry,
  type RunSummary,
} from './types.js';
