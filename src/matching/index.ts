/**
 * Newsdesk — Matching Engine
 *
 * Runs the CPU-only stages over a merged article set:
 * 1. Keyword filter (per article, per interest)
 * 2. Scorer (weighted title/description matches)
 * 3. Selector (dedup, threshold, rank, cap)
 */

import type { Article, Interest, ScoredArticle, SelectionConfig } from '../types';
import { silentLogger, type Logger } from '../lib/logger';
import { scoreAll } from './scorer';
import { selectArticles } from './selector';

// Re-export components
export * from './keyword-filter';
export * from './scorer';
export * from './selector';

export interface MatchingResult {
  /** Every (article, interest) pair with at least one match */
  candidates: ScoredArticle[];
  /** Ranked, capped output */
  selected: ScoredArticle[];
}

export function runMatching(
  articles: readonly Article[],
  interests: readonly Interest[],
  selection: Partial<SelectionConfig> = {},
  log: Logger = silentLogger
): MatchingResult {
  const candidates = scoreAll(articles, interests, log);
  const selected = selectArticles(candidates, selection, log);
  return { candidates, selected };
}
