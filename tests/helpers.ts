/**
 * Shared fixtures for tests.
 */

import { generateContentHash } from '../src/feeds/normalizer';
import type { ArticleFetcher, FeedFetchOutcome } from '../src/feeds/fetcher';
import { FetchError } from '../src/lib/errors';
import type { Article, FeedSource, Interest, ScoredArticle } from '../src/types';

export const makeSource = (name: string, category = 'Tech'): FeedSource => ({
  name,
  url: `https://${name.toLowerCase().replace(/\s+/g, '-')}.example.com/feed`,
  category,
});

export const makeArticle = (overrides: Partial<Article> = {}): Article => {
  const title = overrides.title ?? 'Untitled';
  const link = overrides.link ?? `https://example.com/${encodeURIComponent(title)}`;
  return {
    id: generateContentHash(title, link),
    title,
    description: '',
    link,
    author: '',
    sourceName: 'Test Feed',
    category: 'Tech',
    ...overrides,
  };
};

export const makeInterest = (name: string, keywords: string[], weight = 1): Interest => ({
  name,
  keywords,
  weight,
});

export const makeScored = (
  title: string,
  score: number,
  interestName = 'AI',
  overrides: Partial<Article> = {}
): ScoredArticle => ({
  article: makeArticle({ title, ...overrides }),
  interestName,
  score,
  titleMatches: 0,
  descriptionMatches: 0,
});

type Behavior =
  | { articles: Article[]; delayMs?: number }
  | { fail: string; delayMs?: number }
  | { reject: string }
  | { hang: true };

/**
 * In-process fetcher: each feed name maps to a canned outcome.
 */
export class StubFetcher implements ArticleFetcher {
  readonly calls: string[] = [];
  inFlight = 0;
  maxInFlight = 0;

  constructor(private readonly behaviors: Record<string, Behavior>) {}

  async fetchFeed(source: FeedSource): Promise<FeedFetchOutcome> {
    this.calls.push(source.name);
    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);

    const behavior = this.behaviors[source.name] ?? { articles: [] };

    try {
      if ('hang' in behavior) {
        await new Promise<never>(() => undefined);
      } else if ('reject' in behavior) {
        throw new Error(behavior.reject);
      } else if (behavior.delayMs) {
        await new Promise(resolve => setTimeout(resolve, behavior.delayMs));
      }

      if ('fail' in behavior) {
        return {
          source,
          success: false,
          error: new FetchError(source, 'network', new Error(behavior.fail)),
          durationMs: 0,
        };
      }

      return { source, success: true, articles: 'articles' in behavior ? behavior.articles : [], durationMs: 0 };
    } finally {
      this.inFlight--;
    }
  }
}
