/**
 * Field Inferencer Tests
 * Unit tests for per-field selector cascades
 */

import {
  inferFieldSelector,
  poolFieldSuggestions,
  suggestFields,
} from '../field-inferencer';
import { UnsupportedFieldTypeError } from '../field.errors';
import { Element, loadDocument, selectAll } from '../../dom';
import { blogHtml, listingHtml } from '../../../__tests__/helpers/fixtures';

function firstItem(html: string, selector: string): Element {
  const [item] = selectAll(loadDocument(html), selector) ?? [];
  if (!item) {
    throw new Error(`fixture has no ${selector}`);
  }
  return item;
}

describe('inferFieldSelector', () => {
  describe('on a blog entry', () => {
    const item = firstItem(blogHtml, 'article.entry');

    it('should use the heading for the title', () => {
      expect(inferFieldSelector(item, 'title')).toBe('h2.entry-title');
    });

    it('should read the url from the link inside the title', () => {
      expect(inferFieldSelector(item, 'url')).toBe('h2.entry-title a::attr(href)');
    });

    it('should find the time element', () => {
      expect(inferFieldSelector(item, 'date')).toBe('time');
    });

    it('should score the byline as author', () => {
      expect(inferFieldSelector(item, 'author')).toBe('.byline');
    });

    it('should score the points element', () => {
      expect(inferFieldSelector(item, 'score')).toBe('.points');
    });

    it('should pick the first image', () => {
      expect(inferFieldSelector(item, 'image')).toBe('img.thumb');
    });
  });

  describe('on a listing item', () => {
    const item = firstItem(listingHtml, 'li.item');

    it('should resolve the title to the heading', () => {
      expect(inferFieldSelector(item, 'title')).toBe('h3');
    });

    it('should read the url from the link inside the heading', () => {
      expect(inferFieldSelector(item, 'url')).toBe('h3 a::attr(href)');
    });
  });

  it('should throw on an unknown field type', () => {
    const item = firstItem(blogHtml, 'article.entry');
    expect(() => inferFieldSelector(item, 'price')).toThrow(UnsupportedFieldTypeError);
  });

  it('should return null for every field of an empty item', () => {
    const item = firstItem('<div class="row"></div>', '.row');
    for (const fieldType of ['title', 'url', 'date', 'author', 'score', 'image']) {
      expect(inferFieldSelector(item, fieldType)).toBeNull();
    }
  });

  describe('title', () => {
    it('should prefer data attributes over text', () => {
      const item = firstItem(
        '<div class="row"><span data-title="x">Short</span><p>Some much longer paragraph text</p></div>',
        '.row'
      );
      expect(inferFieldSelector(item, 'title')).toBe('[data-title]');
    });

    it('should honour itemprop markers', () => {
      const item = firstItem('<div class="row"><b itemprop="headline">Hi</b></div>', '.row');
      expect(inferFieldSelector(item, 'title')).toBe('[itemprop="headline"]');
    });

    it('should take the innermost element holding the longest text', () => {
      const item = firstItem(
        '<div class="card"><div class="wrapper"><span class="headline-text">A very long headline here</span></div><a href="/x">More</a></div>',
        '.card'
      );
      expect(inferFieldSelector(item, 'title')).toBe('.headline-text');
    });

    it('should score links when no text container qualifies', () => {
      const item = firstItem(
        '<li class="entry"><a class="vote-btn" href="/vote/1">upvote</a><a class="storylink" href="/story/1">Readable story title</a><a href="/story/1#c">12 comments</a></li>',
        '.entry'
      );
      expect(inferFieldSelector(item, 'title')).toBe('a.storylink');
    });

    it('should scope an unclassed link by its parent class', () => {
      const item = firstItem(
        '<li class="entry"><a href="/vote/1">vote</a><a href="/story/1">Readable story title</a></li>',
        '.entry'
      );
      expect(inferFieldSelector(item, 'title')).toBe('.entry a');
    });
  });

  describe('url', () => {
    it('should prefer url data attributes', () => {
      const item = firstItem(
        '<div class="row"><span data-href="/p/1">Title text here</span></div>',
        '.row'
      );
      expect(inferFieldSelector(item, 'url')).toBe('[data-href]::attr(data-href)');
    });
  });

  describe('date', () => {
    it('should prefer date-like classes over bare patterns', () => {
      const item = firstItem(
        '<div class="row"><div class="meta"><span class="timestamp">3 hours ago</span></div></div>',
        '.row'
      );
      expect(inferFieldSelector(item, 'date')).toBe('.timestamp');
    });

    it('should recognise ISO dates in text', () => {
      const item = firstItem('<div class="row"><p>Posted 2024-01-15</p><p>Other text</p></div>', '.row');
      expect(inferFieldSelector(item, 'date')).toBe('p');
    });

    it('should use data attributes before scoring', () => {
      const item = firstItem('<div class="row"><span data-published="2024">x</span></div>', '.row');
      expect(inferFieldSelector(item, 'date')).toBe('[data-published]');
    });
  });

  describe('author', () => {
    it('should use rel=author markup', () => {
      const item = firstItem('<div class="row"><a rel="author" href="/u/1">Sam</a></div>', '.row');
      expect(inferFieldSelector(item, 'author')).toBe('[rel~="author"]');
    });
  });

  describe('score', () => {
    it('should use score data attributes', () => {
      const item = firstItem('<div class="row"><span data-votes="7">7</span></div>', '.row');
      expect(inferFieldSelector(item, 'score')).toBe('[data-votes]');
    });
  });
});

describe('suggestFields', () => {
  it('should evaluate each suggestion inside the item', () => {
    const $ = loadDocument(blogHtml);
    const [item] = selectAll($, 'article.entry') ?? [];

    expect(suggestFields($, item)).toEqual([
      { fieldName: 'title', selector: 'h2.entry-title', sample: 'Growing tomatoes indoors', matchCount: 1, source: 'heuristic' },
      { fieldName: 'url', selector: 'h2.entry-title a::attr(href)', sample: '/posts/tomatoes', matchCount: 1, source: 'heuristic' },
      { fieldName: 'date', selector: 'time', sample: 'March 1, 2024', matchCount: 1, source: 'heuristic' },
      { fieldName: 'author', selector: '.byline', sample: 'by Ada', matchCount: 1, source: 'heuristic' },
      { fieldName: 'score', selector: '.points', sample: '42 points', matchCount: 1, source: 'heuristic' },
      { fieldName: 'image', selector: 'img.thumb', sample: '', matchCount: 1, source: 'heuristic' },
    ]);
  });
});

describe('poolFieldSuggestions', () => {
  it('should count how many items agree on each selector', () => {
    const $ = loadDocument(blogHtml);
    const items = selectAll($, 'article.entry') ?? [];

    const pooled = poolFieldSuggestions($, items);

    expect(pooled.map((s) => [s.fieldName, s.selector, s.support])).toEqual([
      ['title', 'h2.entry-title', 3],
      ['url', 'h2.entry-title a::attr(href)', 3],
      ['date', 'time', 3],
      ['author', '.byline', 3],
      ['score', '.points', 3],
      ['image', 'img.thumb', 3],
    ]);
    expect(pooled[3].sample).toBe('by Ada');
  });

  it('should return nothing without items', () => {
    expect(poolFieldSuggestions(loadDocument(blogHtml), [])).toEqual([]);
  });
});
