/**
 * Newsdesk — Feed Types
 *
 * Feed sources as configured, and the normalized article shape every
 * feed entry is mapped to before matching.
 */

import { z } from 'zod';

// ============================================================
// FEED SOURCE
// ============================================================

export const FeedSourceSchema = z.object({
  name: z.string().trim().min(1),
  url: z
    .string()
    .trim()
    .url()
    .refine(url => /^https?:\/\//i.test(url), { message: 'URL must start with http:// or https://' }),
  category: z.string().trim().min(1),
});
export type FeedSource = Readonly<z.infer<typeof FeedSourceSchema>>;

// ============================================================
// ARTICLE
// ============================================================

/**
 * One normalized feed entry. Text fields are never null; a missing
 * value in the source entry becomes an empty string.
 */
export interface Article {
  readonly id: string;               // content hash of title + link
  readonly title: string;
  readonly description: string;
  readonly link: string;
  readonly author: string;
  readonly sourceName: string;
  readonly category: string;
  readonly publishedAt?: Date;
}

// ============================================================
// FETCH OUTCOME
// ============================================================

export type FetchErrorKind = 'http' | 'network' | 'parse' | 'timeout' | 'cancelled';
