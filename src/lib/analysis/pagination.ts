/**
 * Pagination Detection
 * "Next page" link candidates and infinite scroll signals
 */

import { DocumentTree, getAttr, getText, selectAll } from '../dom';
import { buildSelector } from '../selectors';
import { InfiniteScrollReport, PaginationCandidate } from './analysis.types';

const MAX_ANCHORS = 200;
const MIN_PAGINATION_SCORE = 40;
const MAX_PAGINATION_CANDIDATES = 6;
const INFINITE_SCROLL_THRESHOLD = 0.3;

const NEXT_TEXT = /(^|[^\p{L}])(next|older|more|weiter|nächste|suivant)(?=$|[^\p{L}])/iu;
const ARROW_TEXT = /[»›→⟩⟫]/;

const PAGINATION_SELECTOR =
  "a.next, a[rel~='next'], .pagination a, a.page-link, nav[aria-label*='pagination' i]";
const LOADING_SELECTOR = ".loading, .spinner, .loader, [class*='load-more'], [id*='load-more']";

/**
 * Links that most likely lead to the next page, best first
 */
export function detectPaginationLinks($: DocumentTree): PaginationCandidate[] {
  const candidates = new Map<string, PaginationCandidate>();
  const anchors = (selectAll($, 'a[href]') ?? []).slice(0, MAX_ANCHORS);

  for (const anchor of anchors) {
    const text = getText(anchor);
    const rel = getAttr(anchor, 'rel').toLowerCase();
    const ariaLabel = getAttr(anchor, 'aria-label').toLowerCase();
    const testId = getAttr(anchor, 'data-testid').toLowerCase();
    const classes = getAttr(anchor, 'class').toLowerCase();

    let score = 0;
    const hints: string[] = [];

    if (rel.includes('next')) {
      score += 60;
      hints.push('rel=next');
    }
    if (['next', 'more', 'older'].some((keyword) => ariaLabel.includes(keyword))) {
      score += 25;
      hints.push('aria label');
    }
    if (['next', 'pagination'].some((keyword) => testId.includes(keyword))) {
      score += 20;
      hints.push('data-testid');
    }
    if (['next', 'more', 'older', 'pagination'].some((keyword) => classes.includes(keyword))) {
      score += 20;
      hints.push('class match');
    }
    if (NEXT_TEXT.test(text)) {
      score += 40;
      hints.push('link text');
    }
    if (ARROW_TEXT.test(text)) {
      score += 15;
      hints.push('arrow symbol');
    }

    if (score < MIN_PAGINATION_SCORE) {
      continue;
    }

    const selector = buildSelector(anchor);
    const href = getAttr(anchor, 'href');
    const key = `${selector}\n${href}`;
    const existing = candidates.get(key);
    if (!existing || score > existing.score) {
      candidates.set(key, { selector, href, text: text.slice(0, 80), score, hints });
    }
  }

  return Array.from(candidates.values())
    .sort((a, b) => b.score - a.score)
    .slice(0, MAX_PAGINATION_CANDIDATES);
}

/**
 * Signals that the page loads more items on scroll instead of paging
 */
export function detectInfiniteScroll($: DocumentTree): InfiniteScrollReport {
  const html = $.html();
  const lowered = html.toLowerCase();
  const signals: string[] = [];
  let score = 0;

  if (lowered.includes('infinite-scroll')) {
    score += 30;
    signals.push('infinite-scroll library detected');
  }
  if (lowered.includes('waypoint')) {
    score += 25;
    signals.push('Waypoints.js (scroll detection library)');
  }
  if (lowered.includes('intersection observer') || lowered.includes('intersectionobserver')) {
    score += 30;
    signals.push('IntersectionObserver API (modern infinite scroll)');
  }
  if (['react-infinite', 'vue-infinite', 'InfiniteScroll'].some((lib) => html.includes(lib))) {
    score += 35;
    signals.push('React/Vue infinite scroll component');
  }

  if ((selectAll($, PAGINATION_SELECTOR) ?? []).length === 0) {
    score += 20;
    signals.push('No traditional pagination links found');
  }

  const [loader] = selectAll($, LOADING_SELECTOR) ?? [];
  if (loader) {
    score += 15;
    signals.push(`Loading indicator found: ${getAttr(loader, 'class').split(/\s+/)[0] || loader.name}`);
  }

  const scrollScript = $('script')
    .toArray()
    .some((script) => /scroll/i.test($(script).text()));
  if (scrollScript) {
    score += 10;
    signals.push('Scroll event handlers in JavaScript');
  }

  if ((selectAll($, '[data-page], [data-offset], [data-cursor]') ?? []).length > 0) {
    score += 20;
    signals.push('Pagination data attributes (likely API-driven)');
  }

  const confidence = Math.min(score / 100, 1);
  return {
    detected: confidence > INFINITE_SCROLL_THRESHOLD,
    confidence,
    signals,
  };
}
