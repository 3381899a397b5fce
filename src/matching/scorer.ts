/**
 * Newsdesk — Scorer
 *
 * score = descriptionMatches * weight + titleMatches * 1.5 * weight
 */

import type { Article, Interest, ScoredArticle } from '../types';
import { silentLogger, type Logger } from '../lib/logger';
import { isCandidate, matchInterest } from './keyword-filter';

/** Title matches count 1.5x a description match */
export const TITLE_MULTIPLIER = 1.5;

export type ScoreBucket = '0-2' | '2-4' | '4-6' | '6-8' | '8+';

const DISTRIBUTION_BOUNDARIES: ReadonlyArray<[number, ScoreBucket]> = [
  [2, '0-2'],
  [4, '2-4'],
  [6, '4-6'],
  [8, '6-8'],
];

// ============================================================
// SCORING
// ============================================================

export function calculateScore(
  titleMatches: number,
  descriptionMatches: number,
  weight: number
): number {
  for (const [name, value] of [
    ['titleMatches', titleMatches],
    ['descriptionMatches', descriptionMatches],
    ['weight', weight],
  ] as const) {
    if (!Number.isFinite(value) || value < 0) {
      throw new RangeError(`${name} must be a non-negative finite number, got ${value}`);
    }
  }

  return descriptionMatches * weight + titleMatches * TITLE_MULTIPLIER * weight;
}

/**
 * Score one (article, interest) pair. Null when nothing matched.
 */
export function scoreArticle(article: Article, interest: Interest): ScoredArticle | null {
  const counts = matchInterest(article, interest);
  if (!isCandidate(counts)) return null;

  return {
    article,
    interestName: interest.name,
    score: calculateScore(counts.titleMatches, counts.descriptionMatches, interest.weight),
    titleMatches: counts.titleMatches,
    descriptionMatches: counts.descriptionMatches,
  };
}

/**
 * Evaluate every interest against every article. Candidates come out
 * interest by interest, articles in input order within each.
 */
export function scoreAll(
  articles: readonly Article[],
  interests: readonly Interest[],
  log: Logger = silentLogger
): ScoredArticle[] {
  const candidates: ScoredArticle[] = [];

  for (const interest of interests) {
    let matched = 0;

    for (const article of articles) {
      const scored = scoreArticle(article, interest);
      if (!scored) continue;

      candidates.push(scored);
      matched++;

      log.debug('Article matched', {
        interest: interest.name,
        title: article.title.slice(0, 60),
        titleMatches: scored.titleMatches,
        descriptionMatches: scored.descriptionMatches,
        score: scored.score,
      });
    }

    log.debug('Interest evaluated', { interest: interest.name, matched });
  }

  if (candidates.length > 0) {
    const scores = candidates.map(c => c.score);
    log.info('Scoring completed', {
      articles: articles.length,
      candidates: candidates.length,
      avg: Number((scores.reduce((a, b) => a + b, 0) / scores.length).toFixed(2)),
      max: Math.max(...scores),
      min: Math.min(...scores),
    });
  } else {
    log.info('Scoring completed', { articles: articles.length, candidates: 0 });
  }

  return candidates;
}

// ============================================================
// STATISTICS
// ============================================================

export function scoreBucket(score: number): ScoreBucket {
  for (const [upper, bucket] of DISTRIBUTION_BOUNDARIES) {
    if (score < upper) return bucket;
  }
  return '8+';
}

export function getScoreDistribution(scored: readonly ScoredArticle[]): Record<ScoreBucket, number> {
  const distribution: Record<ScoreBucket, number> = {
    '0-2': 0,
    '2-4': 0,
    '4-6': 0,
    '6-8': 0,
    '8+': 0,
  };

  for (const entry of scored) {
    distribution[scoreBucket(entry.score)]++;
  }

  return distribution;
}
