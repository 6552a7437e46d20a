/**
 * Command exports
 */

export { reconcileCommand, type ReconcileCommandOptions, type ReconcileCommandData } from './reconcile.js';
export { feedCommand, parseLookup, type FeedCommandOptions, type FeedCommandData, type FeedLookup, type LookupTarget } from './feed.js';
export { toRunConfigInput, createRunLogging, type RunLogging, type RunLoggingOptions } from './context.js';
