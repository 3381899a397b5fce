/**
 * Tests for the Feed Fetcher
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { FeedFetcher } from '../../src/feeds/fetcher';
import { FetchError } from '../../src/lib/errors';
import { makeSource } from '../helpers';

const RSS_FEED = `<?xml version="1.0" encoding="UTF-8"?>
<rss version="2.0">
  <channel>
    <title>Example</title>
    <link>https://example.com</link>
    <description>Example feed</description>
    <item>
      <title>New AI breakthrough</title>
      <link>https://example.com/1</link>
      <description>Machine Learning and AI advance together</description>
      <pubDate>Mon, 06 Jan 2025 10:00:00 GMT</pubDate>
    </item>
    <item>
      <title>  Second   story  </title>
      <link>https://example.com/2</link>
    </item>
  </channel>
</rss>`;

const ATOM_FEED = `<?xml version="1.0" encoding="utf-8"?>
<feed xmlns="http://www.w3.org/2005/Atom">
  <title>Atom Example</title>
  <id>urn:example:feed</id>
  <updated>2025-01-06T10:00:00Z</updated>
  <entry>
    <title>Atom entry</title>
    <link href="https://example.com/atom/1"/>
    <id>urn:example:entry:1</id>
    <updated>2025-01-05T08:00:00Z</updated>
    <summary>Short &lt;b&gt;summary&lt;/b&gt;</summary>
    <author><name>Jane Doe</name></author>
  </entry>
</feed>`;

const mockFetch = vi.fn();

const respondWith = (body: string, status = 200) =>
  mockFetch.mockResolvedValueOnce(new Response(body, { status }));

/** Resolves only when the request's signal aborts, then rejects with its reason */
const hangUntilAborted = (_url: string, init?: RequestInit) =>
  new Promise<Response>((_, reject) => {
    init?.signal?.addEventListener('abort', () => reject(init.signal?.reason));
  });

describe('FeedFetcher', () => {
  const source = makeSource('Example', 'Tech');

  beforeEach(() => {
    vi.stubGlobal('fetch', mockFetch);
  });

  afterEach(() => {
    mockFetch.mockReset();
    vi.unstubAllGlobals();
  });

  describe('successful fetches', () => {
    it('should parse RSS items into articles in feed order', async () => {
      respondWith(RSS_FEED);
      const fetcher = new FeedFetcher();

      const outcome = await fetcher.fetchFeed(source);

      expect(outcome.success).toBe(true);
      if (!outcome.success) return;

      expect(outcome.articles).toHaveLength(2);
      const [first, second] = outcome.articles;
      expect(first?.title).toBe('New AI breakthrough');
      expect(first?.link).toBe('https://example.com/1');
      expect(first?.description).toBe('Machine Learning and AI advance together');
      expect(first?.publishedAt?.toISOString()).toBe('2025-01-06T10:00:00.000Z');
      expect(first?.sourceName).toBe('Example');
      expect(first?.category).toBe('Tech');
      expect(second?.title).toBe('Second story');
      expect(second?.description).toBe('');
    });

    it('should parse Atom entries', async () => {
      respondWith(ATOM_FEED);
      const fetcher = new FeedFetcher();

      const outcome = await fetcher.fetchFeed(source);

      expect(outcome.success).toBe(true);
      if (!outcome.success) return;

      expect(outcome.articles).toHaveLength(1);
      expect(outcome.articles[0]?.title).toBe('Atom entry');
      expect(outcome.articles[0]?.link).toBe('https://example.com/atom/1');
      expect(outcome.articles[0]?.description).toBe('Short summary');
    });

    it('should send the configured user agent', async () => {
      respondWith(RSS_FEED);
      const fetcher = new FeedFetcher({ userAgent: 'TestAgent/2.0' });

      await fetcher.fetchFeed(source);

      expect(mockFetch).toHaveBeenCalledTimes(1);
      const [url, init] = mockFetch.mock.calls[0] ?? [];
      expect(url).toBe(source.url);
      expect(init.headers).toMatchObject({ 'User-Agent': 'TestAgent/2.0' });
      expect(init.signal).toBeInstanceOf(AbortSignal);
    });
  });

  describe('failures', () => {
    it('should map an HTTP error status to an http FetchError', async () => {
      respondWith('Server Error', 500);
      const fetcher = new FeedFetcher();

      const outcome = await fetcher.fetchFeed(source);

      expect(outcome.success).toBe(false);
      if (outcome.success) return;
      expect(outcome.error).toBeInstanceOf(FetchError);
      expect(outcome.error.kind).toBe('http');
      expect(outcome.error.source).toBe(source);
      expect(outcome.error.message).toBe('Example: HTTP 500');
    });

    it('should map malformed content to a parse FetchError', async () => {
      respondWith('<html><body>Not a feed</body></html>');
      const fetcher = new FeedFetcher();

      const outcome = await fetcher.fetchFeed(source);

      expect(outcome.success).toBe(false);
      if (outcome.success) return;
      expect(outcome.error.kind).toBe('parse');
    });

    it('should map an unreachable endpoint to a network FetchError', async () => {
      mockFetch.mockRejectedValueOnce(new TypeError('fetch failed'));
      const fetcher = new FeedFetcher();

      const outcome = await fetcher.fetchFeed(source);

      expect(outcome.success).toBe(false);
      if (outcome.success) return;
      expect(outcome.error.kind).toBe('network');
      expect(outcome.error.cause).toBeInstanceOf(TypeError);
      expect(outcome.error.message).toBe('Example: fetch failed');
    });

    it('should enforce the per-feed timeout', async () => {
      mockFetch.mockImplementationOnce(hangUntilAborted);
      const fetcher = new FeedFetcher({ timeoutMs: 20 });

      const outcome = await fetcher.fetchFeed(source);

      expect(outcome.success).toBe(false);
      if (outcome.success) return;
      expect(outcome.error.kind).toBe('timeout');
    });

    it('should report a run-level abort as cancelled', async () => {
      mockFetch.mockImplementationOnce(hangUntilAborted);
      const fetcher = new FeedFetcher({ timeoutMs: 5_000 });
      const controller = new AbortController();

      const pending = fetcher.fetchFeed(source, controller.signal);
      controller.abort();
      const outcome = await pending;

      expect(outcome.success).toBe(false);
      if (outcome.success) return;
      expect(outcome.error.kind).toBe('cancelled');
    });

    it('should reject a non-positive timeout', () => {
      expect(() => new FeedFetcher({ timeoutMs: 0 })).toThrow(RangeError);
      expect(() => new FeedFetcher({ timeoutMs: Number.POSITIVE_INFINITY })).toThrow(RangeError);
    });
  });
});
