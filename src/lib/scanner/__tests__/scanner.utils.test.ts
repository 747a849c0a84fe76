/**
 * Scanner Utilities Tests
 */

import {
  buildSampleText,
  classSignature,
  referencesTag,
  rankCandidates,
  selectTopCandidates,
} from '../scanner.utils';
import { SelectorCandidate } from '../scanner.types';
import { loadDocument, selectAll } from '../../dom';

function element(html: string, selector: string) {
  const [match] = selectAll(loadDocument(html), selector) ?? [];
  if (!match) {
    throw new Error(`fixture has no ${selector}`);
  }
  return match;
}

describe('referencesTag', () => {
  it('should match type selectors only', () => {
    expect(referencesTag('ul > li', 'li')).toBe(true);
    expect(referencesTag('li.item', 'li')).toBe(true);
    expect(referencesTag('tr.athing td', 'td')).toBe(true);
    expect(referencesTag('.item', 'li')).toBe(false);
    expect(referencesTag('a[href*="/li"]', 'li')).toBe(false);
    expect(referencesTag('.list', 'li')).toBe(false);
  });

  it('should treat regex characters in tag names literally', () => {
    expect(referencesTag('div > x(', 'x(')).toBe(true);
    expect(referencesTag('.note', 'x(')).toBe(false);
    expect(referencesTag('div > xy', 'x.')).toBe(false);
  });
});

describe('classSignature', () => {
  it('should use the first class token', () => {
    expect(classSignature(element('<div class="card wide">x</div>', 'div'))).toBe('div.card');
  });

  it('should fall back to the bare tag for unusable classes', () => {
    expect(classSignature(element('<div class="2col">x</div>', 'div'))).toBe('div');
  });
});

describe('buildSampleText', () => {
  it('should prefer heading text', () => {
    const item = element('<div class="row"><a href="/a">Link text</a><h4>Heading</h4></div>', '.row');
    expect(buildSampleText(item)).toBe('Heading');
  });

  it('should flag very short text', () => {
    expect(buildSampleText(element('<div class="rank"><span>1.</span></div>', '.rank'))).toBe(
      "Text: '1.'"
    );
  });

  it('should describe structure when there is no text', () => {
    const item = element('<div class="row"><img src="a.png"><a href="/x"></a></div>', '.row');
    expect(buildSampleText(item)).toBe('<div> | contains a, img | 1 link');
  });
});

describe('rankCandidates', () => {
  const candidate = (
    selector: string,
    matchCount: number,
    sampleText: string,
    confidence: SelectorCandidate['confidence']
  ): SelectorCandidate => ({ selector, matchCount, sampleText, confidence });

  it('should order by tier, sample quality, then halved count', () => {
    const ranked = rankCandidates([
      candidate('.row', 8, '<div> | contains img', 'medium'),
      candidate('.story', 30, 'A long enough title', 'medium'),
      candidate('.nav', 120, 'Home page link', 'high'),
      candidate('.big', 80, 'Something long text', 'medium'),
    ]);

    expect(ranked.map((c) => c.selector)).toEqual(['.nav', '.big', '.story', '.row']);
  });

  it('should keep input order on ties', () => {
    const ranked = rankCandidates([
      candidate('.a', 5, 'Story number one', 'medium'),
      candidate('.b', 5, 'Story number one', 'medium'),
    ]);
    expect(ranked.map((c) => c.selector)).toEqual(['.a', '.b']);
  });
});

describe('selectTopCandidates', () => {
  const chrome: SelectorCandidate = {
    selector: '.menu-link',
    matchCount: 150,
    sampleText: 'Menu entry',
    confidence: 'high',
  };
  const item: SelectorCandidate = {
    selector: '.story',
    matchCount: 5,
    sampleText: 'Story number one',
    sampleUrl: '/post/1',
    confidence: 'medium',
  };

  it('should drop large clusters without links', () => {
    expect(selectTopCandidates([chrome, item], 15, 100)).toEqual([item]);
  });

  it('should fall back to the unfiltered list when everything is dropped', () => {
    expect(selectTopCandidates([chrome], 15, 100)).toEqual([chrome]);
  });

  it('should truncate to the maximum', () => {
    expect(selectTopCandidates([item, item, item], 2, 100)).toHaveLength(2);
  });
});
