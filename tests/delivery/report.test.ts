/**
 * Tests for the HTML Report
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdtempSync, readFileSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  calculateStatistics,
  escapeHtml,
  formatDate,
  prepareReportData,
  renderHtmlReport,
  reportFilename,
  saveReport,
  scoreBand,
} from '../../src/delivery/report';
import { FetchError } from '../../src/lib/errors';
import type { AggregationResult } from '../../src/pipeline';
import type { ScoredArticle } from '../../src/types';
import { makeScored, makeSource } from '../helpers';

function makeResult(articles: ScoredArticle[], errors: FetchError[] = []): AggregationResult {
  return {
    runId: 'run-1',
    articles,
    errors,
    fetched: articles.map(a => a.article),
    candidates: articles,
    sourceResults: [],
    stats: {
      feedsTotal: 2,
      feedsSucceeded: 2 - errors.length,
      feedsFailed: errors.length,
      articlesFetched: articles.length,
      candidates: articles.length,
      selected: articles.length,
    },
    startedAt: '2025-01-06T09:00:00.000Z',
    completedAt: '2025-01-06T09:00:01.000Z',
    durationMs: 1000,
  };
}

const generatedAt = new Date('2025-01-06T09:05:00.000Z');

describe('HTML Report', () => {
  describe('scoreBand', () => {
    it('should place scores on the band boundaries', () => {
      expect(scoreBand(0)).toBe('Low');
      expect(scoreBand(2.999)).toBe('Low');
      expect(scoreBand(3)).toBe('Medium');
      expect(scoreBand(5.999)).toBe('Medium');
      expect(scoreBand(6)).toBe('High');
      expect(scoreBand(42)).toBe('High');
    });
  });

  describe('escapeHtml', () => {
    it('should escape markup characters', () => {
      expect(escapeHtml(`<a href="x">Tom & Jerry's</a>`)).toBe(
        '&lt;a href=&quot;x&quot;&gt;Tom &amp; Jerry&#039;s&lt;/a&gt;'
      );
    });
  });

  describe('formatDate', () => {
    it('should render UTC minutes or Unknown', () => {
      expect(formatDate(generatedAt)).toBe('2025-01-06 09:05');
      expect(formatDate(undefined)).toBe('Unknown');
    });
  });

  describe('calculateStatistics', () => {
    it('should return zeros for no articles', () => {
      expect(calculateStatistics([])).toEqual({
        totalArticles: 0,
        avgScore: 0,
        maxScore: 0,
        minScore: 0,
        categoriesCount: 0,
        interestsCount: 0,
      });
    });

    it('should summarise scores, categories and interests', () => {
      const data = prepareReportData(
        makeResult([
          makeScored('One', 7, 'AI', { category: 'Tech' }),
          makeScored('Two', 3, 'Security', { category: 'Security' }),
          makeScored('Three', 2, 'AI', { category: 'Tech' }),
        ])
      );

      expect(data.statistics).toEqual({
        totalArticles: 3,
        avgScore: 4,
        maxScore: 7,
        minScore: 2,
        categoriesCount: 2,
        interestsCount: 2,
      });
    });
  });

  describe('prepareReportData', () => {
    it('should group by interest and category in order of appearance', () => {
      const data = prepareReportData(
        makeResult([
          makeScored('One', 7, 'AI', { category: 'Tech' }),
          makeScored('Two', 5, 'Security', { category: '' }),
          makeScored('Three', 4, 'AI', { category: 'Tech' }),
        ]),
        { title: 'Morning', minScore: 1, generatedAt }
      );

      expect(data.title).toBe('Morning');
      expect(data.byInterest.map(g => [g.interest, g.articles.map(a => a.title)])).toEqual([
        ['AI', ['One', 'Three']],
        ['Security', ['Two']],
      ]);
      expect(data.byCategory.map(g => g.category)).toEqual(['Tech', 'Other']);
      expect(data.articles.map(a => a.band)).toEqual(['High', 'Medium', 'Medium']);
    });

    it('should carry feed counts and error messages', () => {
      const error = new FetchError(makeSource('Broken'), 'http', new Error('HTTP 503'));
      const data = prepareReportData(makeResult([], [error]));

      expect(data.feeds).toEqual({ total: 2, succeeded: 1, failed: 1 });
      expect(data.fetchErrors).toEqual(['Broken: HTTP 503']);
    });
  });

  describe('renderHtmlReport', () => {
    it('should render escaped articles with their band', () => {
      const html = renderHtmlReport(
        prepareReportData(
          makeResult([makeScored('Rust <1.80> released', 6.5, 'Rust', { link: 'https://example.com/rust' })]),
          { title: 'Daily', minScore: 0.5, generatedAt }
        )
      );

      expect(html).toContain('<title>Daily</title>');
      expect(html).toContain('<a href="https://example.com/rust">Rust &lt;1.80&gt; released</a>');
      expect(html).toContain('<span class="badge badge-high">High · 6.5</span>');
      expect(html).toContain('<h2>Rust (1)</h2>');
      expect(html).toContain('Generated 2025-01-06 09:05 | 2 of 2 feeds fetched | min score 0.5');
    });

    it('should not link articles whose link is not http(s)', () => {
      const html = renderHtmlReport(
        prepareReportData(
          makeResult([makeScored('Click me', 4, 'AI', { link: 'javascript:alert(document.cookie)' })]),
          { generatedAt }
        )
      );

      expect(html).not.toContain('javascript:');
      expect(html).toContain('<h3>Click me</h3>');
    });

    it('should list categories with their counts', () => {
      const html = renderHtmlReport(
        prepareReportData(
          makeResult([
            makeScored('One', 7, 'AI', { category: 'Tech' }),
            makeScored('Two', 5, 'Security', { category: 'Security & Privacy' }),
            makeScored('Three', 4, 'AI', { category: 'Tech' }),
          ]),
          { generatedAt }
        )
      );

      expect(html).toContain('<ul><li>Tech (2)</li><li>Security &amp; Privacy (1)</li></ul>');
    });

    it('should say so when nothing matched', () => {
      const html = renderHtmlReport(prepareReportData(makeResult([]), { generatedAt }));

      expect(html).toContain('<p>No articles matched your interests.</p>');
      expect(html).toContain('<title>Newsdesk Report</title>');
    });

    it('should list failed feeds', () => {
      const error = new FetchError(makeSource('Broken'), 'parse', new Error('Unexpected <eof>'));
      const html = renderHtmlReport(prepareReportData(makeResult([], [error]), { generatedAt }));

      expect(html).toContain('<li>Broken: Unexpected &lt;eof&gt;</li>');
    });
  });

  describe('reportFilename', () => {
    it('should stamp the local date and time', () => {
      expect(reportFilename('newsdesk_report', new Date(2025, 0, 6, 9, 5, 3))).toBe(
        'newsdesk_report_20250106_090503.html'
      );
    });
  });

  describe('saveReport', () => {
    let dir: string;

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), 'newsdesk-report-'));
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    it('should create the directory and write the file', () => {
      const target = join(dir, 'nested', 'reports');
      const path = saveReport('<html></html>', target, 'daily', new Date(2025, 11, 31, 23, 59, 59));

      expect(path).toBe(join(target, 'daily_20251231_235959.html'));
      expect(existsSync(path)).toBe(true);
      expect(readFileSync(path, 'utf-8')).toBe('<html></html>');
    });
  });
});
