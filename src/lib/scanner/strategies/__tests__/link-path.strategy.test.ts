/**
 * Link Path Strategy Tests
 */

import { firstPathSegment, LinkPathStrategy } from '../link-path.strategy';
import { allElements, loadDocument } from '../../../dom';

describe('firstPathSegment', () => {
  it('should read the first segment of relative and absolute links', () => {
    expect(firstPathSegment('/post/1')).toBe('post');
    expect(firstPathSegment('https://example.com/news/a?x=1')).toBe('news');
    expect(firstPathSegment('//cdn.example.com/lib/x.js')).toBe('lib');
    expect(firstPathSegment('item?id=3')).toBe('item');
  });

  it('should ignore fragments, scripts and bare hosts', () => {
    expect(firstPathSegment('#top')).toBeNull();
    expect(firstPathSegment('javascript:void(0)')).toBeNull();
    expect(firstPathSegment('https://example.com')).toBeNull();
    expect(firstPathSegment('/')).toBeNull();
  });
});

describe('LinkPathStrategy', () => {
  const strategy = new LinkPathStrategy();

  it('should climb to the classed wrapper of clustered links', () => {
    const rows = [1, 2, 3]
      .map((n) => `<tr class="athing"><td><span><a href="/item?id=${n}">Headline ${n}</a></span></td></tr>`)
      .join('');
    const $ = loadDocument(`<table>${rows}</table>`);

    const candidates = strategy.detect({ $, elements: allElements($), minRepeat: 3, existing: [] });

    expect(candidates).toEqual([
      {
        selector: 'tr.athing',
        matchCount: 3,
        sampleText: 'Headline 1',
        sampleUrl: '/item?id=1',
        confidence: 'medium',
      },
    ]);
  });

  it('should fall back to an href selector when no wrapper exists', () => {
    const $ = loadDocument(
      '<div><a href="/docs/a">Alpha guide</a></div><div><a href="/docs/b">Beta guide</a></div><div><a href="/docs/c">Gamma guide</a></div>'
    );

    const candidates = strategy.detect({ $, elements: allElements($), minRepeat: 3, existing: [] });

    expect(candidates).toEqual([
      {
        selector: 'a[href*="/docs"]',
        matchCount: 3,
        sampleText: 'Alpha guide',
        sampleUrl: '/docs/a',
        confidence: 'low',
      },
    ]);
  });

  it('should match relative hrefs without a leading slash in the fallback', () => {
    const $ = loadDocument(
      '<div><a href="item?id=1">Alpha story</a></div><div><a href="item?id=2">Beta story</a></div><div><a href="item?id=3">Gamma story</a></div>'
    );

    const candidates = strategy.detect({ $, elements: allElements($), minRepeat: 3, existing: [] });

    expect(candidates).toEqual([
      {
        selector: 'a[href*="item"]',
        matchCount: 3,
        sampleText: 'Alpha story',
        sampleUrl: 'item?id=1',
        confidence: 'low',
      },
    ]);
  });
});
