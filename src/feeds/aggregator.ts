/**
 * Newsdesk — Feed Aggregator
 *
 * Fans out one fetch per configured feed, with bounded concurrency, and
 * merges the results:
 * 1. Filter feeds by category (optional)
 * 2. Fetch all feeds concurrently
 * 3. Record feeds still outstanding at cancellation as FetchErrors
 * 4. Merge articles in feed-configuration order
 */

import type { Article, FeedSource } from '../types';
import { FetchError, errorMessage } from '../lib/errors';
import { silentLogger, type Logger } from '../lib/logger';
import { mapWithConcurrency } from '../lib/pool';
import type { ArticleFetcher, FeedFetchOutcome } from './fetcher';

// ============================================================
// TYPES
// ============================================================

export interface AggregatorConfig {
  /** Maximum feeds fetched at once */
  maxConcurrency?: number;
  /** Only fetch feeds in these categories (case-insensitive, empty = all) */
  categories?: readonly string[];
  /** Run-level cancellation */
  signal?: AbortSignal;
  logger?: Logger;
}

export interface SourceFetchResult {
  sourceName: string;
  category: string;
  articleCount: number;
  fetchDurationMs: number;
  error?: string;
}

export interface AggregatorResult {
  /** Articles from every successful feed, per-feed order preserved */
  articles: Article[];
  /** One per failed or cancelled feed */
  errors: FetchError[];
  /** Per-source breakdown, in configuration order */
  sourceResults: SourceFetchResult[];
  feedsTotal: number;
  feedsSucceeded: number;
  durationMs: number;
  completedAt: string;
}

const DEFAULT_MAX_CONCURRENCY = 5;

// ============================================================
// HELPERS
// ============================================================

/**
 * Filter feeds by category. An empty list keeps every feed.
 */
export function filterSourcesByCategory(
  sources: readonly FeedSource[],
  categories: readonly string[] = []
): FeedSource[] {
  if (categories.length === 0) return [...sources];

  const categorySet = new Set(categories.map(c => c.toLowerCase()));
  return sources.filter(s => categorySet.has(s.category.toLowerCase()));
}

function cancelledOutcome(source: FeedSource): FeedFetchOutcome {
  const cause = new Error('Run was cancelled or timed out before this feed completed');
  return {
    source,
    success: false,
    error: new FetchError(source, 'cancelled', cause),
    durationMs: 0,
  };
}

/**
 * ArticleFetcher implementations are expected to resolve; one that rejects
 * is recorded as a failure of that feed alone.
 */
function rejectedOutcome(source: FeedSource, cause: unknown, signal?: AbortSignal): FeedFetchOutcome {
  const kind = signal?.aborted ? 'cancelled' : 'network';
  return {
    source,
    success: false,
    error: new FetchError(source, kind, cause),
    durationMs: 0,
  };
}

function toSourceResult(outcome: FeedFetchOutcome): SourceFetchResult {
  return {
    sourceName: outcome.source.name,
    category: outcome.source.category,
    articleCount: outcome.success ? outcome.articles.length : 0,
    fetchDurationMs: outcome.durationMs,
    ...(outcome.success ? {} : { error: outcome.error.message }),
  };
}

// ============================================================
// MAIN AGGREGATOR
// ============================================================

/**
 * Fetch every feed and merge the results. Waits for all feeds unless the
 * signal aborts, in which case it returns immediately with what finished.
 */
export async function aggregateFeeds(
  sources: readonly FeedSource[],
  fetcher: ArticleFetcher,
  config: AggregatorConfig = {}
): Promise<AggregatorResult> {
  const startTime = Date.now();
  const log = config.logger ?? silentLogger;
  const selected = filterSourcesByCategory(sources, config.categories);
  const maxConcurrency = config.maxConcurrency ?? DEFAULT_MAX_CONCURRENCY;

  log.info('Starting feed aggregation', {
    feeds: selected.length,
    skippedByCategory: sources.length - selected.length,
    maxConcurrency,
  });

  const slots = await mapWithConcurrency(
    selected,
    source =>
      fetcher.fetchFeed(source, config.signal).catch((cause: unknown) => {
        log.warn('Fetcher rejected', { source: source.name, error: errorMessage(cause) });
        return rejectedOutcome(source, cause, config.signal);
      }),
    { concurrency: maxConcurrency, signal: config.signal }
  );

  const outcomes = selected.map((source, index) => slots[index] ?? cancelledOutcome(source));

  const articles: Article[] = [];
  const errors: FetchError[] = [];

  for (const outcome of outcomes) {
    if (outcome.success) {
      articles.push(...outcome.articles);
    } else {
      errors.push(outcome.error);
    }
  }

  const cancelled = errors.filter(e => e.kind === 'cancelled').length;
  if (cancelled > 0) {
    log.warn('Aggregation cut short', { cancelledFeeds: cancelled });
  }

  const durationMs = Date.now() - startTime;
  const feedsSucceeded = outcomes.length - errors.length;

  log.info('Feed aggregation completed', {
    feedsSucceeded,
    feedsFailed: errors.length,
    articles: articles.length,
    durationMs,
  });

  return {
    articles,
    errors,
    sourceResults: outcomes.map(toSourceResult),
    feedsTotal: outcomes.length,
    feedsSucceeded,
    durationMs,
    completedAt: new Date().toISOString(),
  };
}
