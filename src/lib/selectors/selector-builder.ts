/**
 * Selector Path Builder
 * Builds CSS selectors from stable markers (ids, semantic tags, stable classes)
 * so they keep matching when siblings move or build tooling rehashes classes
 */

import {
  Element,
  getAttr,
  getClassTokens,
  getChildElements,
  getParentElement,
  isCssIdentifier,
  tagName,
} from '../dom';

const MAX_DEPTH = 15;

const DYNAMIC_PREFIXES = ['css-', 'sc-', 'jsx-', 'styled-', 'emotion-', 'MuiBox-'];

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/;

export const SEMANTIC_TAGS = new Set([
  'article',
  'header',
  'footer',
  'nav',
  'aside',
  'main',
  'section',
  'time',
  'figure',
  'figcaption',
]);

// Semantic tags that end the walk when paired with a class
const ANCHOR_TAGS = new Set(['article', 'header', 'footer', 'nav', 'main']);

const SEMANTIC_CLASS_KEYWORDS = [
  'title',
  'heading',
  'content',
  'article',
  'post',
  'item',
  'container',
  'wrapper',
  'card',
  'list',
  'meta',
  'author',
  'date',
];

const POSITIONAL_TAGS = new Set(['div', 'span', 'li', 'tr', 'td']);

const GENERIC_TAGS = new Set(['div', 'span']);

/**
 * Whether a class or id token looks generated by build tooling
 */
export function looksDynamic(token: string): boolean {
  if (!token || token.length < 3) {
    return true;
  }

  if (DYNAMIC_PREFIXES.some((prefix) => token.startsWith(prefix))) {
    return true;
  }

  const lowered = token.toLowerCase();

  // Hash runs like "8f3a2c1d"
  const hexRuns = lowered.match(/[0-9a-f]{6,}/g) ?? [];
  if (hexRuns.some((run) => /\d/.test(run))) {
    return true;
  }

  // Mixed segments like "x7f3a9"
  const segments = lowered.split(/[-_]/);
  if (
    segments.some(
      (segment) =>
        /^[0-9a-z]{6,}$/.test(segment) &&
        /[a-z]/.test(segment) &&
        (segment.match(/\d/g) ?? []).length >= 2
    )
  ) {
    return true;
  }

  if (UUID_PATTERN.test(lowered)) {
    return true;
  }

  return /\d{8,}$/.test(token);
}

/**
 * Class tokens safe to use in a selector
 */
export function getStableClasses(element: Element): string[] {
  return getClassTokens(element).filter((cls) => isCssIdentifier(cls) && !looksDynamic(cls));
}

/**
 * Non-dynamic id usable as `#id`, or null
 */
export function getStableId(element: Element): string | null {
  const id = getAttr(element, 'id');
  if (id && isCssIdentifier(id) && !looksDynamic(id)) {
    return id;
  }
  return null;
}

/**
 * Most stable identifier for a single element
 */
export function getStableMarker(element: Element): string {
  const stableId = getStableId(element);
  if (stableId) {
    return `#${stableId}`;
  }

  const tag = tagName(element);
  const stableClasses = getStableClasses(element);

  if (SEMANTIC_TAGS.has(tag)) {
    return stableClasses.length > 0 ? `${tag}.${stableClasses[0]}` : tag;
  }

  if (stableClasses.length > 0) {
    const semantic = stableClasses.find((cls) =>
      SEMANTIC_CLASS_KEYWORDS.some((keyword) => cls.toLowerCase().includes(keyword))
    );
    return `.${semantic ?? stableClasses[0]}`;
  }

  if (POSITIONAL_TAGS.has(tag)) {
    const parent = getParentElement(element);
    if (parent) {
      const siblings = getChildElements(parent).filter((child) => tagName(child) === tag);
      if (siblings.length > 1) {
        return `${tag}:nth-of-type(${siblings.indexOf(element) + 1})`;
      }
    }
  }

  return tag;
}

/**
 * Whether a marker is distinctive enough to end the upward walk
 */
export function isVeryStable(marker: string): boolean {
  if (marker.startsWith('#')) {
    return true;
  }
  const [tag, ...classes] = marker.split('.');
  return ANCHOR_TAGS.has(tag) && classes.length > 0;
}

/**
 * Build a selector for element, relative to root when given
 */
export function buildSelector(element: Element, root?: Element | null): string {
  const ownId = getStableId(element);
  if (ownId) {
    return `#${ownId}`;
  }

  const pathParts: string[] = [];
  let current: Element | null = element;
  let depth = 0;

  while (current && depth < MAX_DEPTH) {
    depth++;
    const marker = getStableMarker(current);

    if (root && current === root) {
      if (!GENERIC_TAGS.has(marker)) {
        pathParts.unshift(marker);
      }
      break;
    }

    if (!GENERIC_TAGS.has(marker)) {
      pathParts.unshift(marker);
    }

    if (!root && isVeryStable(marker)) {
      break;
    }

    current = getParentElement(current);
  }

  return pathParts.length > 0 ? pathParts.join(' ') : tagName(element);
}

/**
 * Strip generic tags and child combinators from a selector, textually
 *
 * "div.container > div > div > a" becomes ".container a"
 */
export function simplifySelector(selector: string): string {
  const filtered: string[] = [];

  for (const part of selector.split(/\s+/).filter(Boolean)) {
    if (part === '>' || part === '+') {
      continue;
    }
    if (GENERIC_TAGS.has(part)) {
      continue;
    }

    const dot = part.indexOf('.');
    if (dot > 0 && GENERIC_TAGS.has(part.slice(0, dot))) {
      filtered.push(part.slice(dot));
    } else {
      filtered.push(part);
    }
  }

  return filtered.length > 0 ? filtered.join(' ') : selector;
}
