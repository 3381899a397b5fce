/**
 * Newsdesk — Selector / Ranker
 *
 * Final deduplication, thresholding, ranking and capping of candidates.
 * The output order depends only on the input, never on timing.
 */

import type { ScoredArticle, SelectionConfig } from '../types';
import { ValidationError } from '../lib/errors';
import { silentLogger, type Logger } from '../lib/logger';

export const DEFAULT_SELECTION: SelectionConfig = {
  minScore: 0.5,
  maxArticles: 50,
  capScope: 'overall',
  multiInterest: 'per-interest',
};

// ============================================================
// CONFIG
// ============================================================

/**
 * Fill unset fields from DEFAULT_SELECTION. An explicit `undefined` counts
 * as unset.
 */
export function withSelectionDefaults(config: Partial<SelectionConfig> = {}): SelectionConfig {
  return {
    minScore: config.minScore ?? DEFAULT_SELECTION.minScore,
    maxArticles: config.maxArticles ?? DEFAULT_SELECTION.maxArticles,
    capScope: config.capScope ?? DEFAULT_SELECTION.capScope,
    multiInterest: config.multiInterest ?? DEFAULT_SELECTION.multiInterest,
  };
}

/**
 * Throws ValidationError for a negative or non-finite minScore, or a
 * maxArticles that is not a positive integer.
 */
export function validateSelection(selection: SelectionConfig): void {
  if (!Number.isFinite(selection.minScore) || selection.minScore < 0) {
    throw new ValidationError(`minScore must be >= 0, got ${selection.minScore}`, 'selection.minScore');
  }
  if (!Number.isInteger(selection.maxArticles) || selection.maxArticles < 1) {
    throw new ValidationError(
      `maxArticles must be a positive integer, got ${selection.maxArticles}`,
      'selection.maxArticles'
    );
  }
}

// ============================================================
// DEDUPLICATION
// ============================================================

/**
 * Collapse entries sharing a key, keeping the highest score at the
 * position where the key first appeared. Ties keep the earlier entry.
 */
function keepBestBy(
  candidates: readonly ScoredArticle[],
  keyOf: (candidate: ScoredArticle) => string
): ScoredArticle[] {
  const kept: ScoredArticle[] = [];
  const positions = new Map<string, number>();

  for (const candidate of candidates) {
    const key = keyOf(candidate);
    const position = positions.get(key);

    if (position === undefined) {
      positions.set(key, kept.length);
      kept.push(candidate);
    } else if (candidate.score > (kept[position]?.score ?? -Infinity)) {
      kept[position] = candidate;
    }
  }

  return kept;
}

/**
 * The same story from two feeds, matched by the same interest, is kept once.
 */
export function deduplicateCandidates(candidates: readonly ScoredArticle[]): ScoredArticle[] {
  return keepBestBy(candidates, c => `${c.article.id}\u0000${c.interestName}`);
}

/**
 * Keep only the best-scoring interest per article.
 */
export function keepBestInterest(candidates: readonly ScoredArticle[]): ScoredArticle[] {
  return keepBestBy(candidates, c => c.article.id);
}

// ============================================================
// RANKING
// ============================================================

function compareTitles(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Sort by score descending, then title, then input position.
 */
export function rankCandidates(candidates: readonly ScoredArticle[]): ScoredArticle[] {
  return candidates
    .map((candidate, index) => ({ candidate, index }))
    .sort((a, b) =>
      b.candidate.score - a.candidate.score ||
      compareTitles(a.candidate.article.title, b.candidate.article.title) ||
      a.index - b.index
    )
    .map(entry => entry.candidate);
}

/**
 * Cap a ranked list, either overall or per interest. Order is preserved.
 */
export function capCandidates(
  ranked: readonly ScoredArticle[],
  maxArticles: number,
  scope: SelectionConfig['capScope']
): ScoredArticle[] {
  if (scope === 'overall') {
    return ranked.slice(0, maxArticles);
  }

  const perInterest = new Map<string, number>();
  return ranked.filter(candidate => {
    const taken = perInterest.get(candidate.interestName) ?? 0;
    if (taken >= maxArticles) return false;
    perInterest.set(candidate.interestName, taken + 1);
    return true;
  });
}

// ============================================================
// SELECTION
// ============================================================

/**
 * Deduplicate, threshold, rank and cap. Throws ValidationError on an
 * invalid config.
 */
export function selectArticles(
  candidates: readonly ScoredArticle[],
  config: Partial<SelectionConfig> = {},
  log: Logger = silentLogger
): ScoredArticle[] {
  const selection = withSelectionDefaults(config);
  validateSelection(selection);
  const { minScore, maxArticles, capScope, multiInterest } = selection;

  const deduped = deduplicateCandidates(candidates);
  const perArticle = multiInterest === 'best-only' ? keepBestInterest(deduped) : deduped;
  const aboveThreshold = perArticle.filter(c => c.score >= minScore);
  const ranked = rankCandidates(aboveThreshold);
  const selected = capCandidates(ranked, maxArticles, capScope);

  log.info('Candidates selected', {
    candidates: candidates.length,
    duplicates: candidates.length - deduped.length,
    belowMinScore: perArticle.length - aboveThreshold.length,
    selected: selected.length,
    minScore,
    maxArticles,
    capScope,
    multiInterest,
  });

  return selected;
}

/**
 * Group selected entries by interest for presentation. Interests appear in
 * order of their first entry, entries keep selection order.
 */
export function groupByInterest(selected: readonly ScoredArticle[]): Map<string, ScoredArticle[]> {
  const groups = new Map<string, ScoredArticle[]>();

  for (const entry of selected) {
    const group = groups.get(entry.interestName);
    if (group) {
      group.push(entry);
    } else {
      groups.set(entry.interestName, [entry]);
    }
  }

  return groups;
}
