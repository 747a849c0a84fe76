/**
 * Pagination Detection Tests
 */

import { detectInfiniteScroll, detectPaginationLinks } from '../pagination';
import { loadDocument } from '../../dom';

describe('detectPaginationLinks', () => {
  it('should score rel, class and text signals', () => {
    const $ = loadDocument(`
      <div id="results"><a href="/item/1">First item</a></div>
      <div class="pagination">
        <a class="next-page" href="?page=2">Older posts ›</a>
        <a href="?page=3">3</a>
      </div>
    `);

    expect(detectPaginationLinks($)).toEqual([
      {
        selector: 'html body .pagination .next-page',
        href: '?page=2',
        text: 'Older posts ›',
        score: 75,
        hints: ['class match', 'link text', 'arrow symbol'],
      },
    ]);
  });

  it('should ignore links below the threshold', () => {
    const $ = loadDocument('<a href="/about">About us</a><a class="more" href="/x">Read</a>');

    expect(detectPaginationLinks($)).toEqual([]);
  });
});

describe('detectInfiniteScroll', () => {
  it('should combine loader, script and missing pagination signals', () => {
    const $ = loadDocument(`
      <div class="feed"></div>
      <div class="spinner loading"></div>
      <script>window.addEventListener('scroll', loadMore);</script>
    `);

    const report = detectInfiniteScroll($);

    expect(report.detected).toBe(true);
    expect(report.confidence).toBeCloseTo(0.45);
    expect(report.signals).toEqual([
      'No traditional pagination links found',
      'Loading indicator found: spinner',
      'Scroll event handlers in JavaScript',
    ]);
  });

  it('should not flag a page with classic pagination', () => {
    const $ = loadDocument('<a rel="next" href="/page/2">Next</a>');

    expect(detectInfiniteScroll($)).toEqual({ detected: false, confidence: 0, signals: [] });
  });
});
