/**
 * Tests for the Matching Engine
 */

import { describe, it, expect } from 'vitest';
import { runMatching } from '../../src/matching';
import { makeArticle, makeInterest } from '../helpers';

describe('runMatching', () => {
  it('should return every candidate and the ranked selection', () => {
    const articles = [
      makeArticle({ title: 'Weekly roundup', description: 'a short AI mention' }),
      makeArticle({ title: 'AI chips', description: 'AI everywhere' }),
      makeArticle({ title: 'Gardening tips' }),
    ];

    const { candidates, selected } = runMatching(articles, [makeInterest('AI', ['AI'])], { minScore: 1.5 });

    expect(candidates.map(c => [c.article.title, c.score])).toEqual([
      ['Weekly roundup', 1],
      ['AI chips', 2.5],
    ]);
    expect(selected.map(c => c.article.title)).toEqual(['AI chips']);
  });
});
