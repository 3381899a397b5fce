/**
 * Newsdesk — Feed Fetcher
 *
 * Downloads and parses one RSS/Atom feed. A failure of any kind is
 * returned as a FetchError outcome; fetchFeed never rejects.
 */

import Parser from 'rss-parser';
import type { Article, FeedSource, FetchErrorKind } from '../types';
import { FetchError, errorMessage } from '../lib/errors';
import { silentLogger, type Logger } from '../lib/logger';
import { normalizeEntries, type FeedEntryExtras } from './normalizer';

// ============================================================
// TYPES
// ============================================================

export interface FetcherConfig {
  /** Per-feed timeout in ms */
  timeoutMs: number;
  userAgent: string;
}

export type FeedFetchOutcome =
  | { source: FeedSource; success: true; articles: Article[]; durationMs: number }
  | { source: FeedSource; success: false; error: FetchError; durationMs: number };

/**
 * Anything that can turn a FeedSource into an outcome.
 * The aggregator depends on this, not on HTTP.
 */
export interface ArticleFetcher {
  fetchFeed(source: FeedSource, signal?: AbortSignal): Promise<FeedFetchOutcome>;
}

export const DEFAULT_FETCHER_CONFIG: FetcherConfig = {
  timeoutMs: 10_000,
  userAgent: 'Newsdesk/1.0',
};

const ACCEPT_HEADER = 'application/rss+xml, application/atom+xml, application/xml, text/xml;q=0.9, */*;q=0.8';

class HttpStatusError extends Error {
  constructor(readonly status: number, statusText: string) {
    super(`HTTP ${status}${statusText ? ` ${statusText}` : ''}`);
    this.name = 'HttpStatusError';
  }
}

class FeedParseError extends Error {
  constructor(cause: unknown) {
    super(`Invalid feed document: ${errorMessage(cause)}`);
    this.name = 'FeedParseError';
  }
}

// ============================================================
// FETCHER
// ============================================================

export class FeedFetcher implements ArticleFetcher {
  private readonly config: FetcherConfig;
  private readonly logger: Logger;
  private readonly parser = new Parser<Record<string, unknown>, FeedEntryExtras>();

  constructor(config: Partial<FetcherConfig> = {}, logger: Logger = silentLogger) {
    this.config = { ...DEFAULT_FETCHER_CONFIG, ...config };
    this.logger = logger.child({ component: 'fetcher' });

    if (!Number.isFinite(this.config.timeoutMs) || this.config.timeoutMs <= 0) {
      throw new RangeError(`timeoutMs must be a positive finite number, got ${this.config.timeoutMs}`);
    }
  }

  /**
   * Fetch a single feed: one attempt, bounded by the per-feed timeout
   * and by the optional run-level signal.
   */
  async fetchFeed(source: FeedSource, signal?: AbortSignal): Promise<FeedFetchOutcome> {
    const startTime = Date.now();
    const timeoutSignal = AbortSignal.timeout(this.config.timeoutMs);
    const combined = signal ? AbortSignal.any([timeoutSignal, signal]) : timeoutSignal;

    this.logger.debug('Starting fetch', { source: source.name, url: source.url });

    try {
      const xml = await this.download(source.url, combined);

      let feed: Parser.Output<FeedEntryExtras>;
      try {
        feed = await this.parser.parseString(xml);
      } catch (error) {
        throw new FeedParseError(error);
      }

      const articles = normalizeEntries(feed.items, source);
      const durationMs = Date.now() - startTime;

      this.logger.info('Feed fetched', {
        source: source.name,
        articles: articles.length,
        durationMs,
      });

      return { source, success: true, articles, durationMs };
    } catch (error) {
      const durationMs = Date.now() - startTime;
      const kind = classifyFailure(error, timeoutSignal, signal);
      const fetchError = new FetchError(source, kind, error);

      this.logger.warn('Feed fetch failed', {
        source: source.name,
        kind,
        error: fetchError.message,
        durationMs,
      });

      return { source, success: false, error: fetchError, durationMs };
    }
  }

  private async download(url: string, signal: AbortSignal): Promise<string> {
    const response = await fetch(url, {
      headers: {
        'User-Agent': this.config.userAgent,
        Accept: ACCEPT_HEADER,
      },
      signal,
    });

    if (!response.ok) {
      throw new HttpStatusError(response.status, response.statusText);
    }

    return response.text();
  }
}

function classifyFailure(
  error: unknown,
  timeoutSignal: AbortSignal,
  runSignal: AbortSignal | undefined
): FetchErrorKind {
  if (runSignal?.aborted) return 'cancelled';
  if (timeoutSignal.aborted) return 'timeout';
  if (error instanceof HttpStatusError) return 'http';
  if (error instanceof FeedParseError) return 'parse';
  return 'network';
}
