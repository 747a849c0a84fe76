/**
 * Pattern Scanner Tests
 * Unit tests for findItemCandidates
 */

import { findItemCandidates, PatternScanner } from '../pattern-scanner';
import { IItemStrategy } from '../scanner.strategy';
import { loadDocument, selectAll } from '../../dom';
import { blogHtml, listingHtml } from '../../../__tests__/helpers/fixtures';

describe('findItemCandidates', () => {
  it('should rank the repeated item class first', () => {
    const candidates = findItemCandidates(loadDocument(listingHtml));

    expect(candidates[0]).toEqual({
      selector: '.item',
      matchCount: 5,
      sampleText: 'Story number one',
      sampleUrl: '/post/1',
      confidence: 'medium',
    });
  });

  it('should merge every strategy in rank order', () => {
    const candidates = findItemCandidates(loadDocument(listingHtml));

    expect(candidates.map((c) => c.selector)).toEqual(['.item', 'li', 'li.item', 'h3']);
    expect(candidates[3].confidence).toBe('low');
  });

  it('should keep selector and count coherent', () => {
    const $ = loadDocument(blogHtml);

    for (const candidate of findItemCandidates($)) {
      expect(selectAll($, candidate.selector)?.length).toBe(candidate.matchCount);
    }
  });

  it('should never emit the same selector twice', () => {
    const selectors = findItemCandidates(loadDocument(blogHtml)).map((c) => c.selector);
    expect(new Set(selectors).size).toBe(selectors.length);
  });

  it('should be idempotent', () => {
    const $ = loadDocument(blogHtml);
    expect(findItemCandidates($)).toEqual(findItemCandidates($));
  });

  it('should label large clusters high confidence', () => {
    const cards = Array.from(
      { length: 12 },
      (_, i) => `<div class="card"><p>Card body number ${i}</p></div>`
    ).join('');
    const [top] = findItemCandidates(loadDocument(`<section>${cards}</section>`));

    expect(top.selector).toBe('.card');
    expect(top.matchCount).toBe(12);
    expect(top.confidence).toBe('high');
  });

  it('should honour minRepeat', () => {
    const candidates = findItemCandidates(loadDocument(listingHtml), { minRepeat: 6 });
    expect(candidates).toEqual([]);
  });

  it('should return nothing for an empty document', () => {
    expect(findItemCandidates(loadDocument(''))).toEqual([]);
  });

  it('should cap the number of candidates', () => {
    const candidates = findItemCandidates(loadDocument(listingHtml), { maxCandidates: 2 });
    expect(candidates.map((c) => c.selector)).toEqual(['.item', 'li']);
  });
});

describe('findItemCandidates with malformed markup', () => {
  const html =
    '<p class="note">a</p><p class="note">b</p><p class="note">c</p>' +
    '<div><x(>one thing</x(><x(>one thing</x(><x(>one thing</x(></div>';

  it('should skip tag names that are not valid selectors', () => {
    const $ = loadDocument(html);

    const selectors = findItemCandidates($).map((c) => c.selector);

    expect(selectors).toContain('.note');
    expect(selectors.filter((selector) => selector.includes('x('))).toEqual([]);
  });
});

describe('PatternScanner', () => {
  it('should run custom strategies with earlier candidates visible', () => {
    const seen: number[] = [];
    const first: IItemStrategy = {
      name: 'first',
      detect: () => [
        { selector: 'li', matchCount: 5, sampleText: 'Story number one', confidence: 'low' },
      ],
    };
    const second: IItemStrategy = {
      name: 'second',
      detect: ({ existing }) => {
        seen.push(existing.length);
        return [];
      },
    };

    const scanner = new PatternScanner([first, second]);
    const candidates = scanner.scan(loadDocument(listingHtml));

    expect(scanner.getStrategyNames()).toEqual(['first', 'second']);
    expect(seen).toEqual([1]);
    expect(candidates.map((c) => c.selector)).toEqual(['li']);
  });
});
