/**
 * Newsdesk — Keyword Filter
 *
 * Case-insensitive substring matching of an interest's keywords against
 * article title and description. Deterministic, no I/O.
 */

import type { Article, Interest, KeywordMatchCounts, ScoredArticle } from '../types';

// ============================================================
// OCCURRENCE COUNTING
// ============================================================

/**
 * Count non-overlapping, case-insensitive occurrences of `keyword` in `text`.
 */
export function countOccurrences(text: string, keyword: string): number {
  if (!text || !keyword) return 0;

  const haystack = text.toLowerCase();
  const needle = keyword.toLowerCase();

  let count = 0;
  let position = haystack.indexOf(needle);

  while (position !== -1) {
    count++;
    position = haystack.indexOf(needle, position + needle.length);
  }

  return count;
}

/**
 * Sum of occurrences over all keywords.
 */
export function countKeywordMatches(text: string, keywords: readonly string[]): number {
  return keywords.reduce((sum, keyword) => sum + countOccurrences(text, keyword), 0);
}

// ============================================================
// ARTICLE MATCHING
// ============================================================

/**
 * Count title and description matches of one interest, independently.
 */
export function matchInterest(article: Article, interest: Interest): KeywordMatchCounts {
  return {
    titleMatches: countKeywordMatches(article.title, interest.keywords),
    descriptionMatches: countKeywordMatches(article.description, interest.keywords),
  };
}

export function isCandidate(counts: KeywordMatchCounts): boolean {
  return counts.titleMatches + counts.descriptionMatches > 0;
}

/**
 * Keywords of the interest that occur anywhere in the article.
 */
export function findMatchedKeywords(article: Article, interest: Interest): string[] {
  return interest.keywords.filter(keyword =>
    countOccurrences(article.title, keyword) > 0 ||
    countOccurrences(article.description, keyword) > 0
  );
}

// ============================================================
// STATISTICS
// ============================================================

export interface KeywordStat {
  keyword: string;
  articles: number;
}

/**
 * How many candidates contain each keyword of their interest.
 * Sorted by count descending, then keyword.
 */
export function getKeywordStatistics(
  candidates: readonly ScoredArticle[],
  interests: readonly Interest[]
): KeywordStat[] {
  const byName = new Map(interests.map(i => [i.name, i]));
  const counts = new Map<string, number>();

  for (const candidate of candidates) {
    const interest = byName.get(candidate.interestName);
    if (!interest) continue;

    for (const keyword of findMatchedKeywords(candidate.article, interest)) {
      counts.set(keyword, (counts.get(keyword) ?? 0) + 1);
    }
  }

  return Array.from(counts, ([keyword, articles]) => ({ keyword, articles }))
    .sort((a, b) => b.articles - a.articles || (a.keyword < b.keyword ? -1 : a.keyword > b.keyword ? 1 : 0));
}
