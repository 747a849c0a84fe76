/**
 * Scanner Utilities
 * Sample text, signatures and ranking for item candidates
 */

import {
  Element,
  byTag,
  findAll,
  findFirst,
  getAttr,
  getChildElements,
  getClassTokens,
  getText,
  hasAttr,
  isCssIdentifier,
  tagName,
} from '../dom';
import { Confidence, SelectorCandidate } from './scanner.types';

const SAMPLE_LENGTH = 80;

const CONFIDENCE_TIER: Record<Confidence, number> = {
  high: 3,
  medium: 2,
  low: 1,
};

const isHeading = byTag('h1', 'h2', 'h3', 'h4', 'h5', 'h6');

const isLink = (element: Element): boolean => tagName(element) === 'a' && hasAttr(element, 'href');

/**
 * First class token usable in a selector, or null
 */
export function firstClass(element: Element): string | null {
  const [token] = getClassTokens(element);
  return token && isCssIdentifier(token) ? token : null;
}

/**
 * `tag.firstClass` signature, or the bare tag
 */
export function classSignature(element: Element): string {
  const cls = firstClass(element);
  return cls ? `${tagName(element)}.${cls}` : tagName(element);
}

/**
 * Whether a selector names the tag as a type selector
 */
export function referencesTag(selector: string, tag: string): boolean {
  const escaped = tag.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
  return new RegExp(`(^|[\\s>+~,])${escaped}(?=$|[.#:\\[\\s>+~,])`).test(selector);
}

/**
 * Human-readable preview of what an item holds
 */
export function buildSampleText(element: Element): string {
  const heading = findFirst(element, (el) => isHeading(el) && getText(el) !== '');
  if (heading) {
    return getText(heading).slice(0, SAMPLE_LENGTH);
  }

  const link = isLink(element) ? element : findFirst(element, isLink);
  if (link) {
    const linkText = getText(link);
    if (linkText.length > 3) {
      return linkText.slice(0, SAMPLE_LENGTH);
    }
  }

  const text = getText(element);
  if (text) {
    return text.length <= 10 ? `Text: '${text}'` : text.slice(0, SAMPLE_LENGTH);
  }

  return describeStructure(element);
}

/**
 * Structural description used when an item holds no text
 */
export function describeStructure(element: Element): string {
  const parts = [`<${tagName(element)}>`];

  const childTags = Array.from(new Set(getChildElements(element).map(tagName))).sort().slice(0, 3);
  if (childTags.length > 0) {
    parts.push(`contains ${childTags.join(', ')}`);
  }

  const linkCount = findAll(element, byTag('a')).length;
  if (linkCount > 0) {
    parts.push(`${linkCount} link${linkCount === 1 ? '' : 's'}`);
  }

  return parts.join(' | ');
}

/**
 * href of the first link in (or being) the element
 */
export function findSampleUrl(element: Element): string | undefined {
  const link = isLink(element) ? element : findFirst(element, isLink);
  return link ? getAttr(link, 'href') : undefined;
}

/**
 * Drop repeated selectors, first occurrence wins
 */
export function dedupeCandidates(candidates: SelectorCandidate[]): SelectorCandidate[] {
  const seen = new Set<string>();
  return candidates.filter((candidate) => {
    if (seen.has(candidate.selector)) {
      return false;
    }
    seen.add(candidate.selector);
    return true;
  });
}

function hasMeaningfulSample(candidate: SelectorCandidate): boolean {
  return candidate.sampleText.length > 10 && !candidate.sampleText.startsWith('<');
}

// Navigation-sized clusters compete at half weight
function countScore(candidate: SelectorCandidate): number {
  return candidate.matchCount > 50 ? candidate.matchCount / 2 : candidate.matchCount;
}

/**
 * Stable sort by confidence tier, sample quality, then count
 */
export function rankCandidates(candidates: SelectorCandidate[]): SelectorCandidate[] {
  return [...candidates].sort(
    (a, b) =>
      CONFIDENCE_TIER[b.confidence] - CONFIDENCE_TIER[a.confidence] ||
      Number(hasMeaningfulSample(b)) - Number(hasMeaningfulSample(a)) ||
      countScore(b) - countScore(a)
  );
}

/**
 * Keep the top candidates, dropping large link-less clusters
 */
export function selectTopCandidates(
  ranked: SelectorCandidate[],
  maxCandidates: number,
  chromeCountThreshold: number
): SelectorCandidate[] {
  const filtered = ranked.filter(
    (candidate) => !(candidate.matchCount > chromeCountThreshold && !candidate.sampleUrl)
  );
  return (filtered.length > 0 ? filtered : ranked).slice(0, maxCandidates);
}
