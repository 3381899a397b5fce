/**
 * Newsdesk — Feeds Module
 *
 * Fetching, normalizing and aggregating RSS/Atom feeds.
 */

export {
  FeedFetcher,
  DEFAULT_FETCHER_CONFIG,
  type ArticleFetcher,
  type FeedFetchOutcome,
  type FetcherConfig,
} from './fetcher';

export {
  normalizeEntry,
  normalizeEntries,
  cleanText,
  generateContentHash,
  type FeedEntry,
  type FeedEntryExtras,
} from './normalizer';

export {
  aggregateFeeds,
  filterSourcesByCategory,
  type AggregatorConfig,
  type AggregatorResult,
  type SourceFetchResult,
} from './aggregator';
