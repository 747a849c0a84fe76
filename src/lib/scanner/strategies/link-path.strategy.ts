/**
 * Link Path Strategy
 * Clusters links by their first path segment and climbs to the element
 * that wraps each link, e.g. every `/item/...` link inside a `tr.athing`
 */

import { Element, getAttr, getClassTokens, getParentElement, tagName } from '../../dom';
import { BaseItemStrategy } from '../scanner.strategy';
import { ScanContext, SelectorCandidate } from '../scanner.types';
import { classSignature } from '../scanner.utils';

const TOP_SEGMENTS = 2;
const SAMPLE_LINKS = 10;
const MAX_CLIMB = 5;

const WRAPPER_TAGS = new Set(['article', 'li', 'tr', 'section']);

/**
 * First path segment of an href, or null for fragments, scripts and bare hosts
 */
export function firstPathSegment(href: string): string | null {
  const trimmed = href.trim();
  if (!trimmed || trimmed.startsWith('#') || trimmed.toLowerCase().startsWith('javascript:')) {
    return null;
  }

  const path = trimmed
    .replace(/^[a-z][a-z0-9+.-]*:\/\/[^/]*/i, '')
    .replace(/^\/\/[^/]*/, '')
    .split(/[?#]/)[0];

  const [segment] = path.split('/').filter(Boolean);
  return segment ?? null;
}

export class LinkPathStrategy extends BaseItemStrategy {
  name = 'link-path';

  detect({ $, elements, minRepeat }: ScanContext): SelectorCandidate[] {
    const linksBySegment = new Map<string, Element[]>();
    for (const element of elements) {
      if (tagName(element) !== 'a') {
        continue;
      }
      const segment = firstPathSegment(getAttr(element, 'href'));
      if (segment) {
        linksBySegment.set(segment, [...(linksBySegment.get(segment) ?? []), element]);
      }
    }

    const topSegments = Array.from(linksBySegment.entries())
      .filter(([, links]) => links.length >= minRepeat)
      .sort(([, a], [, b]) => b.length - a.length)
      .slice(0, TOP_SEGMENTS);

    const candidates: SelectorCandidate[] = [];
    for (const [segment, links] of topSegments) {
      const wrapper = this.findWrapperSignature(links.slice(0, SAMPLE_LINKS));
      const candidate = wrapper
        ? this.createCandidate($, wrapper, 'medium')
        : this.createFallback($, segment);
      if (candidate) {
        candidates.push(candidate);
      }
    }
    return candidates;
  }

  /**
   * Most frequent wrapper signature, classed wrappers first
   */
  private findWrapperSignature(links: Element[]): string | null {
    const signatures: string[] = [];
    for (const link of links) {
      const wrapper = this.climbToWrapper(link);
      if (wrapper) {
        signatures.push(classSignature(wrapper));
      }
    }

    const ranked = Array.from(this.tally(signatures).entries()).sort(
      ([, a], [, b]) => b - a
    );
    const classed = ranked.find(([signature]) => signature.includes('.'));
    const best = classed ?? ranked[0];
    return best ? best[0] : null;
  }

  private climbToWrapper(link: Element): Element | null {
    let current = getParentElement(link);
    for (let level = 0; current && level < MAX_CLIMB; level++) {
      if (WRAPPER_TAGS.has(tagName(current)) || getClassTokens(current).length > 0) {
        return current;
      }
      current = getParentElement(current);
    }
    return null;
  }

  private createFallback($: ScanContext['$'], segment: string): SelectorCandidate | null {
    if (/["\\]/.test(segment)) {
      return null;
    }
    // Relative hrefs like "item?id=1" carry no leading slash
    return (
      this.createCandidate($, `a[href*="/${segment}"]`, 'low') ??
      this.createCandidate($, `a[href*="${segment}"]`, 'low')
    );
  }
}
