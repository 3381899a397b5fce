/**
 * Newsdesk — Pipeline
 *
 * One-shot run: idle → fetching → scoring → selecting → done.
 * Feed failures are collected, never thrown; invalid input is rejected
 * in the constructor, before anything is fetched.
 */

import { nanoid } from 'nanoid';
import type {
  Article,
  FeedSource,
  FetchOptions,
  Interest,
  ScoredArticle,
  SelectionConfig,
} from './types';
import { FetchError, ValidationError } from './lib/errors';
import { silentLogger, timeOperation, type Logger } from './lib/logger';
import { FeedFetcher, type ArticleFetcher } from './feeds/fetcher';
import { aggregateFeeds, type SourceFetchResult } from './feeds/aggregator';
import { scoreAll } from './matching/scorer';
import { selectArticles, validateSelection, withSelectionDefaults } from './matching/selector';

// ============================================================
// TYPES
// ============================================================

export type PipelineStage = 'idle' | 'fetching' | 'scoring' | 'selecting' | 'done';

export interface PipelineOptions {
  feeds: readonly FeedSource[];
  interests: readonly Interest[];
  selection?: Partial<SelectionConfig>;
  fetching?: Partial<FetchOptions>;
  /** Defaults to an HTTP FeedFetcher built from `fetching` */
  fetcher?: ArticleFetcher;
  logger?: Logger;
  onStageChange?: (stage: PipelineStage) => void;
}

export interface PipelineStats {
  feedsTotal: number;
  feedsSucceeded: number;
  feedsFailed: number;
  articlesFetched: number;
  candidates: number;
  selected: number;
}

export interface AggregationResult {
  runId: string;
  /** Selected entries, ranked */
  articles: ScoredArticle[];
  /** One per failed feed */
  errors: FetchError[];
  /** Every article fetched this run */
  fetched: Article[];
  /** Every matching (article, interest) pair before selection */
  candidates: ScoredArticle[];
  sourceResults: SourceFetchResult[];
  stats: PipelineStats;
  startedAt: string;
  completedAt: string;
  durationMs: number;
}

const DEFAULT_FETCHING: FetchOptions = {
  timeoutMs: 10_000,
  maxConcurrency: 5,
  userAgent: 'Newsdesk/1.0',
  categories: [],
};

// ============================================================
// VALIDATION
// ============================================================

function requirePositiveNumber(value: number, field: string): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new ValidationError(`${field} must be a positive number, got ${value}`, field);
  }
}

/**
 * Trim keywords and drop case-insensitive duplicates; first spelling wins.
 */
export function normalizeInterest(interest: Interest): Interest {
  const seen = new Set<string>();
  const keywords: string[] = [];

  for (const raw of interest.keywords) {
    const keyword = raw.trim();
    const key = keyword.toLowerCase();
    if (!keyword || seen.has(key)) continue;
    seen.add(key);
    keywords.push(keyword);
  }

  return Object.freeze({ name: interest.name.trim(), keywords: Object.freeze(keywords), weight: interest.weight });
}

/**
 * Reject structurally invalid input.
 */
export function validatePipelineInput(
  feeds: readonly FeedSource[],
  interests: readonly Interest[],
  selection: SelectionConfig,
  fetching: FetchOptions
): void {
  if (feeds.length === 0) {
    throw new ValidationError('At least one feed is required', 'feeds');
  }

  feeds.forEach((feed, idx) => {
    if (!feed.name.trim()) {
      throw new ValidationError(`Feed #${idx + 1} has an empty name`, `feeds[${idx}].name`);
    }
    if (!feed.url.trim()) {
      throw new ValidationError(`Feed '${feed.name}' has an empty URL`, `feeds[${idx}].url`);
    }
  });

  if (interests.length === 0) {
    throw new ValidationError('At least one interest is required', 'interests');
  }

  interests.forEach((interest, idx) => {
    const label = interest.name.trim() || `#${idx + 1}`;
    if (!interest.name.trim()) {
      throw new ValidationError(`Interest ${label} has an empty name`, `interests[${idx}].name`);
    }
    if (interest.keywords.length === 0) {
      throw new ValidationError(`Interest '${label}' has no keywords`, `interests[${idx}].keywords`);
    }
    if (interest.keywords.some(k => !k.trim())) {
      throw new ValidationError(`Interest '${label}' has an empty keyword`, `interests[${idx}].keywords`);
    }
    requirePositiveNumber(interest.weight, `interests[${idx}].weight`);
  });

  validateSelection(selection);

  requirePositiveNumber(fetching.timeoutMs, 'fetching.timeoutMs');
  if (!Number.isInteger(fetching.maxConcurrency) || fetching.maxConcurrency < 1) {
    throw new ValidationError(
      `maxConcurrency must be a positive integer, got ${fetching.maxConcurrency}`,
      'fetching.maxConcurrency'
    );
  }
  if (fetching.runTimeoutMs !== undefined) {
    requirePositiveNumber(fetching.runTimeoutMs, 'fetching.runTimeoutMs');
  }
}

// ============================================================
// PIPELINE
// ============================================================

export class NewsPipeline {
  private readonly feeds: readonly FeedSource[];
  private readonly interests: readonly Interest[];
  private readonly selection: SelectionConfig;
  private readonly fetching: FetchOptions;
  private readonly fetcher: ArticleFetcher;
  private readonly logger: Logger;
  private readonly onStageChange?: (stage: PipelineStage) => void;
  private stage: PipelineStage = 'idle';

  constructor(options: PipelineOptions) {
    this.selection = withSelectionDefaults(options.selection);
    this.fetching = { ...DEFAULT_FETCHING, ...options.fetching };

    validatePipelineInput(options.feeds, options.interests, this.selection, this.fetching);

    this.feeds = Object.freeze([...options.feeds]);
    this.interests = Object.freeze(options.interests.map(normalizeInterest));
    this.logger = (options.logger ?? silentLogger).child({ component: 'pipeline' });
    this.fetcher = options.fetcher ?? new FeedFetcher(
      { timeoutMs: this.fetching.timeoutMs, userAgent: this.fetching.userAgent },
      options.logger ?? silentLogger
    );
    this.onStageChange = options.onStageChange;
  }

  getStage(): PipelineStage {
    return this.stage;
  }

  /**
   * Run once. Resolves even when every feed fails; the caller decides how
   * to report the errors.
   */
  async run(signal?: AbortSignal): Promise<AggregationResult> {
    if (this.stage !== 'idle') {
      throw new Error(`Pipeline already ran (stage: ${this.stage})`);
    }

    const runId = nanoid(10);
    const startTime = Date.now();
    const startedAt = new Date(startTime).toISOString();
    const log = this.logger.child({ runId });
    const runSignal = this.buildRunSignal(signal);

    log.info('Pipeline started', {
      feeds: this.feeds.length,
      interests: this.interests.length,
    });

    this.transition('fetching', log);
    const aggregation = await timeOperation(log, 'Fetch phase', () =>
      aggregateFeeds(this.feeds, this.fetcher, {
        maxConcurrency: this.fetching.maxConcurrency,
        categories: this.fetching.categories,
        signal: runSignal,
        logger: log,
      })
    );

    if (aggregation.articles.length === 0) {
      log.warn('No articles fetched', { feedsFailed: aggregation.errors.length });
    }

    this.transition('scoring', log);
    const candidates = await timeOperation(log, 'Scoring phase', () =>
      scoreAll(aggregation.articles, this.interests, log)
    );

    this.transition('selecting', log);
    const selected = selectArticles(candidates, this.selection, log);

    this.transition('done', log);

    const durationMs = Date.now() - startTime;
    const stats: PipelineStats = {
      feedsTotal: aggregation.feedsTotal,
      feedsSucceeded: aggregation.feedsSucceeded,
      feedsFailed: aggregation.errors.length,
      articlesFetched: aggregation.articles.length,
      candidates: candidates.length,
      selected: selected.length,
    };

    log.info('Pipeline finished', { ...stats, durationMs });

    return {
      runId,
      articles: selected,
      errors: aggregation.errors,
      fetched: aggregation.articles,
      candidates,
      sourceResults: aggregation.sourceResults,
      stats,
      startedAt,
      completedAt: new Date().toISOString(),
      durationMs,
    };
  }

  private buildRunSignal(signal?: AbortSignal): AbortSignal | undefined {
    const signals: AbortSignal[] = [];
    if (signal) signals.push(signal);
    if (this.fetching.runTimeoutMs !== undefined) {
      signals.push(AbortSignal.timeout(this.fetching.runTimeoutMs));
    }
    if (signals.length === 0) return undefined;
    return signals.length === 1 ? signals[0] : AbortSignal.any(signals);
  }

  private transition(stage: PipelineStage, log: Logger): void {
    log.debug('Stage change', { from: this.stage, to: stage });
    this.stage = stage;
    this.onStageChange?.(stage);
  }
}
