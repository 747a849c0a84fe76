/**
 * Selector Builder Tests
 * Unit tests for stable marker detection and selector paths
 */

import {
  buildSelector,
  getStableMarker,
  isVeryStable,
  looksDynamic,
  simplifySelector,
} from '../selector-builder';
import { loadDocument, selectAll } from '../../dom';

function first(html: string, selector: string) {
  const $ = loadDocument(html);
  const [element] = selectAll($, selector) ?? [];
  if (!element) {
    throw new Error(`fixture has no ${selector}`);
  }
  return { $, element };
}

describe('looksDynamic', () => {
  it('should flag build-tool prefixes', () => {
    expect(looksDynamic('css-1a2b3c')).toBe(true);
    expect(looksDynamic('MuiBox-root')).toBe(true);
    expect(looksDynamic('sc-bdVaJa')).toBe(true);
  });

  it('should flag short tokens', () => {
    expect(looksDynamic('a')).toBe(true);
    expect(looksDynamic('h2')).toBe(true);
    expect(looksDynamic('')).toBe(true);
  });

  it('should flag hashes, UUIDs and long numeric suffixes', () => {
    expect(looksDynamic('123e4567-e89b-12d3-a456-426614174000')).toBe(true);
    expect(looksDynamic('item-12345678')).toBe(true);
    expect(looksDynamic('widget-x7f3a9')).toBe(true);
  });

  it('should accept readable class names', () => {
    expect(looksDynamic('article-title')).toBe(false);
    expect(looksDynamic('post-title')).toBe(false);
    expect(looksDynamic('sidebar')).toBe(false);
    expect(looksDynamic('facade')).toBe(false);
    expect(looksDynamic('nav')).toBe(false);
  });

  it('should be deterministic', () => {
    expect(looksDynamic('card-body')).toBe(looksDynamic('card-body'));
  });
});

describe('getStableMarker', () => {
  it('should prefer a stable id', () => {
    const { element } = first('<div id="main" class="content">x</div>', 'div');
    expect(getStableMarker(element)).toBe('#main');
  });

  it('should combine a semantic tag with its class', () => {
    const { element } = first('<article class="post">x</article>', 'article');
    expect(getStableMarker(element)).toBe('article.post');
  });

  it('should prefer semantic class keywords', () => {
    const { element } = first('<div class="blue card-body">x</div>', 'div');
    expect(getStableMarker(element)).toBe('.card-body');
  });

  it('should fall back to nth-of-type among same-tag siblings', () => {
    const { $ } = first('<ul><li>a</li><li>b</li></ul>', 'li');
    const items = selectAll($, 'li') ?? [];
    expect(getStableMarker(items[1])).toBe('li:nth-of-type(2)');
  });

  it('should skip dynamic ids and classes', () => {
    const { element } = first('<p id="widget-x7f3a9" class="css-1a2b3c">x</p>', 'p');
    expect(getStableMarker(element)).toBe('p');
  });
});

describe('isVeryStable', () => {
  it('should accept ids and classed landmark tags', () => {
    expect(isVeryStable('#main')).toBe(true);
    expect(isVeryStable('article.post')).toBe(true);
  });

  it('should reject bare tags and bare classes', () => {
    expect(isVeryStable('article')).toBe(false);
    expect(isVeryStable('.title')).toBe(false);
    expect(isVeryStable('section.box')).toBe(false);
  });
});

describe('buildSelector', () => {
  it('should never use a dynamic ancestor id', () => {
    const { element } = first(
      '<div id="widget-x7f3a9"><article class="post"><h2 class="title">Hello</h2></article></div>',
      'h2'
    );
    expect(buildSelector(element)).toBe('article.post .title');
  });

  it('should short-circuit on the element id', () => {
    const { element } = first('<section><p id="lead">Hi</p></section>', 'p');
    expect(buildSelector(element)).toBe('#lead');
  });

  it('should short-circuit on the element id below a root', () => {
    const { $, element } = first('<ul><li class="row"><p id="lead">Hi</p></li></ul>', 'p');
    const [row] = selectAll($, 'li.row') ?? [];
    expect(buildSelector(element, row)).toBe('#lead');
  });

  it('should omit generic containers and stop at a stable ancestor', () => {
    const { element } = first('<div id="main"><span><a href="/x">x</a></span></div>', 'a');
    expect(buildSelector(element)).toBe('#main a');
  });

  it('should walk up to the document when no stable marker exists', () => {
    const { $ } = first('<ul><li>a</li><li><a href="/b">b</a></li></ul>', 'a');
    const [anchor] = selectAll($, 'a') ?? [];
    expect(buildSelector(anchor)).toBe('html body ul li:nth-of-type(2) a');
  });

  it('should stop at an explicit root', () => {
    const { $ } = first(
      '<article class="story"><li class="item"><div><span class="meta"><a href="/u">u</a></span></div></li></article>',
      'a'
    );
    const [anchor] = selectAll($, 'a') ?? [];
    const [item] = selectAll($, 'li.item') ?? [];
    expect(buildSelector(anchor, item)).toBe('.item .meta a');
  });

  it('should produce a selector that matches the element', () => {
    const { $, element } = first(
      '<main class="feed"><div class="entry"><h3>Story</h3></div></main>',
      'h3'
    );
    const matches = selectAll($, buildSelector(element)) ?? [];
    expect(matches).toContain(element);
  });
});

describe('simplifySelector', () => {
  it('should strip generic tags and child combinators', () => {
    expect(simplifySelector('div.container > div > div > a')).toBe('.container a');
  });

  it('should fold generic tags with classes', () => {
    expect(simplifySelector('span.title')).toBe('.title');
    expect(simplifySelector('article.post > h2')).toBe('article.post h2');
  });

  it('should return the input when nothing remains', () => {
    expect(simplifySelector('div > span')).toBe('div > span');
  });
});
