/**
 * Newsdesk — Feed Normalizer
 *
 * Converts parsed RSS/Atom entries into the unified Article format.
 * Every text field is trimmed, stripped of markup and entity-decoded once
 * here; nothing downstream sees a missing field.
 */

import { createHash } from 'crypto';
import { load } from 'cheerio';
import type Parser from 'rss-parser';
import type { Article, FeedSource } from '../types';

/** Fields rss-parser fills in that its Item type leaves out */
export interface FeedEntryExtras {
  author?: string;
  id?: string;
  summary?: string;
}

export type FeedEntry = Parser.Item & FeedEntryExtras;

// ============================================================
// TEXT HELPERS
// ============================================================

/**
 * Strip HTML tags, decode entities and collapse whitespace.
 */
export function cleanText(value: string | undefined | null): string {
  if (!value) return '';

  const text = value.includes('<') || value.includes('&')
    ? load(value, null, false).root().text()
    : value;

  return text.replace(/\s+/g, ' ').trim();
}

export function isHttpUrl(value: string): boolean {
  return /^https?:\/\//i.test(value);
}

export function generateContentHash(title: string, url: string): string {
  const content = `${title.toLowerCase().trim()}|${url.toLowerCase().trim()}`;
  return createHash('sha256').update(content).digest('hex').slice(0, 16);
}

// ============================================================
// FIELD EXTRACTION
// ============================================================

/**
 * RSS puts the teaser in description (content here), Atom in summary,
 * some feeds only ship full content.
 */
function extractDescription(entry: FeedEntry): string {
  const candidates = [entry.summary, entry.content, entry.contentSnippet];

  for (const candidate of candidates) {
    const cleaned = cleanText(candidate);
    if (cleaned) return cleaned;
  }

  return '';
}

/** http(s) only; other schemes become an empty link. */
function extractLink(entry: FeedEntry): string {
  const link = entry.link?.trim();
  if (link && isHttpUrl(link)) return link;

  // Atom entries sometimes carry the permalink only as their id
  const id = entry.id?.trim() || entry.guid?.trim();
  if (id && isHttpUrl(id)) return id;

  return '';
}

function extractPublishedAt(entry: FeedEntry): Date | undefined {
  for (const raw of [entry.isoDate, entry.pubDate]) {
    if (!raw) continue;
    const date = new Date(raw);
    if (!Number.isNaN(date.getTime())) return date;
  }
  return undefined;
}

function extractAuthor(entry: FeedEntry): string {
  return cleanText(entry.creator) || cleanText(entry.author);
}

/**
 * Title + link identify an entry. Entries with neither fall back to the
 * feed's own id, or failing that their text and date, scoped to the source.
 */
function deriveId(
  entry: FeedEntry,
  fields: { title: string; link: string; description: string; publishedAt?: Date },
  source: FeedSource
): string {
  if (fields.title || fields.link) {
    return generateContentHash(fields.title, fields.link);
  }

  const key = entry.guid?.trim() || entry.id?.trim() || fields.description;
  return generateContentHash(`${source.name}|${key}`, fields.publishedAt?.toISOString() ?? '');
}

// ============================================================
// MAIN NORMALIZER
// ============================================================

/**
 * Normalize a single entry. Source name and category are stamped from
 * the configured feed, not from the feed document.
 */
export function normalizeEntry(entry: FeedEntry, source: FeedSource): Article {
  const title = cleanText(entry.title);
  const link = extractLink(entry);
  const description = extractDescription(entry);
  const publishedAt = extractPublishedAt(entry);

  const article: Article = {
    id: deriveId(entry, { title, link, description, publishedAt }, source),
    title,
    description,
    link,
    author: extractAuthor(entry),
    sourceName: source.name,
    category: source.category,
    ...(publishedAt ? { publishedAt } : {}),
  };

  return Object.freeze(article);
}

/**
 * Normalize entries, keeping feed order.
 */
export function normalizeEntries(entries: readonly FeedEntry[], source: FeedSource): Article[] {
  return entries.map(entry => normalizeEntry(entry, source));
}
