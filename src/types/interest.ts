/**
 * Newsdesk — Interest & Scoring Types
 */

import { z } from 'zod';
import type { Article } from './feed';

// ============================================================
// INTEREST
// ============================================================

export const InterestSchema = z.object({
  name: z.string().trim().min(1),
  keywords: z.array(z.string().trim().min(1)).min(1, 'At least one keyword is required'),
  weight: z.number().positive().finite().default(1),
});
export type InterestInput = z.input<typeof InterestSchema>;

export interface Interest {
  readonly name: string;
  readonly keywords: readonly string[];
  readonly weight: number;
}

// ============================================================
// MATCHING & SCORING
// ============================================================

export interface KeywordMatchCounts {
  titleMatches: number;
  descriptionMatches: number;
}

/**
 * An (article, interest) pair with at least one keyword match.
 * References the article; never copies it.
 */
export interface ScoredArticle extends Readonly<KeywordMatchCounts> {
  readonly article: Article;
  readonly interestName: string;
  readonly score: number;
}

// ============================================================
// SELECTION
// ============================================================

export const CapScopeSchema = z.enum(['overall', 'per-interest']);
export type CapScope = z.infer<typeof CapScopeSchema>;

export const MultiInterestPolicySchema = z.enum(['per-interest', 'best-only']);
export type MultiInterestPolicy = z.infer<typeof MultiInterestPolicySchema>;

export const SelectionConfigSchema = z.object({
  minScore: z.number().min(0).finite().default(0.5),
  maxArticles: z.number().int().positive().default(50),
  capScope: CapScopeSchema.default('overall'),
  multiInterest: MultiInterestPolicySchema.default('per-interest'),
});
export type SelectionConfig = z.infer<typeof SelectionConfigSchema>;
