/**
 * Newsdesk — HTML Report
 *
 * Turns an AggregationResult into a standalone HTML page:
 * score bands, grouping by interest and category, header statistics.
 */

import { mkdirSync, writeFileSync } from 'fs';
import { join, resolve } from 'path';
import type { ScoredArticle } from '../types';
import type { AggregationResult } from '../pipeline';
import { groupByInterest } from '../matching/selector';
import { isHttpUrl } from '../feeds/normalizer';

// ============================================================
// SCORE BANDS
// ============================================================

export type ScoreBand = 'Low' | 'Medium' | 'High';

export const SCORE_BAND_MEDIUM_THRESHOLD = 3;
export const SCORE_BAND_HIGH_THRESHOLD = 6;

export function scoreBand(score: number): ScoreBand {
  if (score < SCORE_BAND_MEDIUM_THRESHOLD) return 'Low';
  if (score < SCORE_BAND_HIGH_THRESHOLD) return 'Medium';
  return 'High';
}

// ============================================================
// TYPES
// ============================================================

export interface ReportArticle {
  title: string;
  link: string;
  description: string;
  author: string;
  sourceName: string;
  category: string;
  publishedAt?: Date;
  interest: string;
  score: number;
  band: ScoreBand;
  titleMatches: number;
  descriptionMatches: number;
}

export interface ReportStatistics {
  totalArticles: number;
  avgScore: number;
  maxScore: number;
  minScore: number;
  categoriesCount: number;
  interestsCount: number;
}

export interface ReportData {
  title: string;
  generatedAt: Date;
  articles: ReportArticle[];
  byInterest: Array<{ interest: string; articles: ReportArticle[] }>;
  byCategory: Array<{ category: string; articles: ReportArticle[] }>;
  statistics: ReportStatistics;
  feeds: { total: number; succeeded: number; failed: number };
  fetchErrors: string[];
  minScore: number;
}

export interface ReportOptions {
  title?: string;
  minScore?: number;
  generatedAt?: Date;
}

// ============================================================
// DATA PREPARATION
// ============================================================

function toReportArticle(entry: ScoredArticle): ReportArticle {
  const { article } = entry;
  return {
    title: article.title,
    link: article.link,
    description: article.description,
    author: article.author,
    sourceName: article.sourceName,
    category: article.category,
    publishedAt: article.publishedAt,
    interest: entry.interestName,
    score: entry.score,
    band: scoreBand(entry.score),
    titleMatches: entry.titleMatches,
    descriptionMatches: entry.descriptionMatches,
  };
}

export function calculateStatistics(articles: readonly ReportArticle[]): ReportStatistics {
  if (articles.length === 0) {
    return {
      totalArticles: 0,
      avgScore: 0,
      maxScore: 0,
      minScore: 0,
      categoriesCount: 0,
      interestsCount: 0,
    };
  }

  const scores = articles.map(a => a.score);

  return {
    totalArticles: articles.length,
    avgScore: scores.reduce((sum, s) => sum + s, 0) / scores.length,
    maxScore: Math.max(...scores),
    minScore: Math.min(...scores),
    categoriesCount: new Set(articles.map(a => a.category)).size,
    interestsCount: new Set(articles.map(a => a.interest)).size,
  };
}

export function prepareReportData(result: AggregationResult, options: ReportOptions = {}): ReportData {
  const articles = result.articles.map(toReportArticle);

  const byInterest = Array.from(groupByInterest(result.articles), ([interest, entries]) => ({
    interest,
    articles: entries.map(toReportArticle),
  }));

  const categories = new Map<string, ReportArticle[]>();
  for (const article of articles) {
    const key = article.category || 'Other';
    const group = categories.get(key);
    if (group) {
      group.push(article);
    } else {
      categories.set(key, [article]);
    }
  }

  return {
    title: options.title ?? 'Newsdesk Report',
    generatedAt: options.generatedAt ?? new Date(),
    articles,
    byInterest,
    byCategory: Array.from(categories, ([category, entries]) => ({ category, articles: entries })),
    statistics: calculateStatistics(articles),
    feeds: {
      total: result.stats.feedsTotal,
      succeeded: result.stats.feedsSucceeded,
      failed: result.stats.feedsFailed,
    },
    fetchErrors: result.errors.map(e => e.message),
    minScore: options.minScore ?? 0,
  };
}

// ============================================================
// HTML RENDERING
// ============================================================

const REPORT_STYLES = `
  body { font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, sans-serif; line-height: 1.6; color: #1e293b; max-width: 960px; margin: 0 auto; padding: 20px; background: #f8fafc; }
  .header { background: #0f172a; color: white; padding: 24px; border-radius: 8px; }
  .header h1 { margin: 0 0 6px 0; font-size: 24px; }
  .subtitle { opacity: 0.8; font-size: 14px; }
  .stat-grid { display: grid; grid-template-columns: repeat(4, 1fr); gap: 12px; margin: 20px 0; }
  .stat-card { background: white; padding: 14px; border-radius: 8px; text-align: center; border: 1px solid #e2e8f0; }
  .stat-value { font-size: 22px; font-weight: 700; }
  .stat-label { font-size: 12px; color: #64748b; }
  .article { background: white; border: 1px solid #e2e8f0; border-radius: 8px; padding: 14px 18px; margin: 10px 0; }
  .article h3 { margin: 0 0 4px 0; font-size: 16px; }
  .article a { color: #1d4ed8; text-decoration: none; }
  .meta { font-size: 12px; color: #64748b; }
  .badge { display: inline-block; padding: 2px 8px; border-radius: 4px; font-size: 12px; font-weight: 600; }
  .badge-high { background: #dcfce7; color: #166534; }
  .badge-medium { background: #fef9c3; color: #854d0e; }
  .badge-low { background: #f1f5f9; color: #475569; }
  .categories ul { list-style: none; padding: 0; display: flex; flex-wrap: wrap; gap: 8px; }
  .categories li { background: white; border: 1px solid #e2e8f0; border-radius: 4px; padding: 4px 10px; font-size: 13px; }
  .errors { background: #fef2f2; border: 1px solid #fecaca; border-radius: 8px; padding: 12px 18px; }
  .footer { text-align: center; color: #94a3b8; font-size: 12px; margin-top: 30px; }
`;

/**
 * Escape HTML special characters.
 */
export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#039;');
}

export function formatScore(score: number): string {
  return score.toFixed(1);
}

export function formatDate(value: Date | undefined): string {
  if (!value) return 'Unknown';
  return value.toISOString().slice(0, 16).replace('T', ' ');
}

function renderArticle(article: ReportArticle): string {
  const band = article.band.toLowerCase();
  const label = escapeHtml(article.title || '(untitled)');
  const title = isHttpUrl(article.link)
    ? `<a href="${escapeHtml(article.link)}">${label}</a>`
    : label;

  return `
    <div class="article">
      <h3>${title}</h3>
      <span class="badge badge-${band}">${article.band} · ${formatScore(article.score)}</span>
      <span class="meta">${escapeHtml(article.sourceName)} | ${escapeHtml(article.category)} | ${formatDate(article.publishedAt)}${article.author ? ` | ${escapeHtml(article.author)}` : ''}</span>
      ${article.description ? `<p>${escapeHtml(article.description)}</p>` : ''}
    </div>`;
}

export function renderHtmlReport(data: ReportData): string {
  const { statistics } = data;

  const sectionsHtml = data.byInterest.map(group => `
  <h2>${escapeHtml(group.interest)} (${group.articles.length})</h2>
  ${group.articles.map(renderArticle).join('')}
  `).join('');

  const categoriesHtml = `
  <div class="categories">
    <h2>By category</h2>
    <ul>${data.byCategory.map(group => `<li>${escapeHtml(group.category)} (${group.articles.length})</li>`).join('')}</ul>
  </div>
  `;

  return `<!DOCTYPE html>
<html>
<head>
  <meta charset="utf-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>${escapeHtml(data.title)}</title>
  <style>${REPORT_STYLES}</style>
</head>
<body>
  <div class="header">
    <h1>${escapeHtml(data.title)}</h1>
    <div class="subtitle">Generated ${formatDate(data.generatedAt)} | ${data.feeds.succeeded} of ${data.feeds.total} feeds fetched | min score ${formatScore(data.minScore)}</div>
  </div>

  <div class="stat-grid">
    <div class="stat-card"><div class="stat-value">${statistics.totalArticles}</div><div class="stat-label">Articles</div></div>
    <div class="stat-card"><div class="stat-value">${formatScore(statistics.avgScore)}</div><div class="stat-label">Average score</div></div>
    <div class="stat-card"><div class="stat-value">${formatScore(statistics.maxScore)}</div><div class="stat-label">Top score</div></div>
    <div class="stat-card"><div class="stat-value">${statistics.interestsCount}</div><div class="stat-label">Interests</div></div>
  </div>

  ${data.fetchErrors.length > 0 ? `
  <div class="errors">
    <strong>Feeds that failed:</strong>
    <ul>${data.fetchErrors.map(e => `<li>${escapeHtml(e)}</li>`).join('')}</ul>
  </div>
  ` : ''}

  ${data.articles.length > 0 ? sectionsHtml + categoriesHtml : '<p>No articles matched your interests.</p>'}

  <div class="footer">
    <p>Generated by Newsdesk</p>
  </div>
</body>
</html>
`;
}

// ============================================================
// OUTPUT
// ============================================================

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * `<prefix>_YYYYMMDD_HHMMSS.html`, local time.
 */
export function reportFilename(prefix: string, now: Date = new Date()): string {
  const date = `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}`;
  const time = `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
  return `${prefix}_${date}_${time}.html`;
}

/**
 * Write the report, creating the directory. Returns the absolute path.
 */
export function saveReport(
  html: string,
  directory: string,
  filenamePrefix: string,
  now: Date = new Date()
): string {
  const dir = resolve(directory);
  mkdirSync(dir, { recursive: true });

  const path = join(dir, reportFilename(filenamePrefix, now));
  writeFileSync(path, html, 'utf-8');
  return path;
}
