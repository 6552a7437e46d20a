/**
 * Feed module exports
 */

export {
  FeedEntry,
  FeedIndex,
  FEED_LIST_KEYS,
  type RawFeedElement,
  type FeedSourceStats,
  type FeedLoadResult,
} from './types.js';

export {
  loadFeedIndex,
  listFeedSources,
  extractFeedList,
  indexFeedPayload,
  type FeedLoadOptions,
} from './loader.js';
