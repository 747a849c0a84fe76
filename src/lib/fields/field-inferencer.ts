/**
 * Field Inferencer
 * Proposes a selector per field type inside one item element.
 * Each field runs an ordered cascade; the first step that yields wins.
 */

import {
  DocumentTree,
  Element,
  byTag,
  depthBelow,
  findAll,
  findFirst,
  getAttr,
  getChildElements,
  getDirectText,
  getParentElement,
  getText,
  hasAttr,
  selectWithin,
  tagName,
} from '../dom';
import { buildSelector, getStableClasses } from '../selectors';
import { getFrameworkFieldSelector } from '../frameworks/framework.registry';
import { UnsupportedFieldTypeError } from './field.errors';
import {
  AUTHOR_CLASS_KEYWORDS,
  AUTHOR_MARKERS,
  AUTHOR_TAGS,
  DATE_CLASS_KEYWORDS,
  DATE_DATA_ATTRIBUTES,
  DATE_TAGS,
  DELIMITED_DATE_PATTERN,
  INLINE_TAGS,
  ISO_DATE_PATTERN,
  LINK_NOISE_CLASSES,
  LINK_NOISE_TEXT,
  RELATIVE_TIME_PATTERN,
  SCORE_CLASS_KEYWORDS,
  SCORE_DATA_ATTRIBUTES,
  SCORE_TAGS,
  SCORE_TEXT_PATTERN,
  TITLE_DATA_ATTRIBUTES,
  TITLE_MARKERS,
  TITLE_TEXT_TAGS,
  URL_DATA_ATTRIBUTES,
} from './field.rules';
import {
  FIELD_TYPES,
  FieldSuggestion,
  FieldType,
  PooledFieldSuggestion,
  SuggestFieldsOptions,
  isFieldType,
} from './field.types';

const HEADING_TAGS = ['h1', 'h2', 'h3', 'h4', 'h5', 'h6'];
const MIN_TITLE_TEXT = 10;
const DEEP_TITLE_LEVELS = 5;
const SAMPLE_LENGTH = 80;

const ATTR_MARKER = '::attr(';

export interface TitleMatch {
  selector: string;
  element: Element;
}

interface PoolEntry {
  first: FieldSuggestion;
  support: number;
}

interface Scored {
  element: Element;
  score: number;
  text: string;
}

function classText(element: Element): string {
  return getAttr(element, 'class').toLowerCase();
}

function isAscii(text: string): boolean {
  return /^[\x00-\x7F]*$/.test(text);
}

/**
 * `tag.class` or `tag` from the first stable class
 */
function tagClassSelector(element: Element): string {
  const [cls] = getStableClasses(element);
  return cls ? `${tagName(element)}.${cls}` : tagName(element);
}

/**
 * `.class` or `tag` from the first stable class
 */
function classOrTagSelector(element: Element): string {
  const [cls] = getStableClasses(element);
  return cls ? `.${cls}` : tagName(element);
}

/**
 * Highest positive score; ties go to the shorter text, then document order
 */
function pickBest(candidates: Scored[]): Scored | null {
  let best: Scored | null = null;
  for (const candidate of candidates) {
    if (candidate.score <= 0) {
      continue;
    }
    if (
      !best ||
      candidate.score > best.score ||
      (candidate.score === best.score && candidate.text.length < best.text.length)
    ) {
      best = candidate;
    }
  }
  return best;
}

function findByDataAttribute(item: Element, attributes: string[]): string | null {
  for (const attribute of attributes) {
    if (findFirst(item, (el) => hasAttr(el, attribute))) {
      return attribute;
    }
  }
  return null;
}

function titleFromHeadings(item: Element): TitleMatch | null {
  for (const tag of HEADING_TAGS) {
    const heading = findFirst(item, (el) => tagName(el) === tag && getText(el) !== '');
    if (heading) {
      return { selector: tagClassSelector(heading), element: heading };
    }
  }
  return null;
}

function titleFromDataAttributes(item: Element): TitleMatch | null {
  for (const attribute of TITLE_DATA_ATTRIBUTES) {
    const element = findFirst(item, (el) => hasAttr(el, attribute));
    if (element) {
      return { selector: `[${attribute}]`, element };
    }
  }
  return null;
}

function titleFromMarkers(item: Element): TitleMatch | null {
  for (const { attribute, value } of TITLE_MARKERS) {
    const element = findFirst(item, (el) => getAttr(el, attribute) === value);
    if (element) {
      return { selector: `[${attribute}="${value}"]`, element };
    }
  }
  return null;
}

function titleText(element: Element): string {
  const direct = getDirectText(element);
  if (direct.length >= MIN_TITLE_TEXT) {
    return direct;
  }
  const inlineOnly = getChildElements(element).every((child) => INLINE_TAGS.has(tagName(child)));
  return inlineOnly ? getText(element) : direct;
}

function titleFromLongestText(item: Element): TitleMatch | null {
  let best: Element | null = null;
  let bestLength = MIN_TITLE_TEXT;

  // Equal lengths go to the later, innermost element
  for (const element of findAll(item, byTag(...TITLE_TEXT_TAGS))) {
    const length = titleText(element).length;
    if (length > bestLength || (best && length === bestLength)) {
      best = element;
      bestLength = length;
    }
  }

  if (!best) {
    return null;
  }

  const [cls] = getStableClasses(best);
  if (cls && depthBelow(best, item) < DEEP_TITLE_LEVELS) {
    return { selector: `.${cls}`, element: best };
  }
  return { selector: buildSelector(best, item), element: best };
}

function scoreTitleLink(link: Element): number {
  const text = getText(link);
  let score = Math.min(text.length, 100);

  if (text.length <= 3 && isAscii(text)) {
    score -= 50;
  }
  if (
    getAttr(link, 'rel').split(/\s+/).includes('bookmark') ||
    getAttr(link, 'itemprop').includes('name')
  ) {
    score += 20;
  }
  if (hasAttr(link, 'data-title') || hasAttr(link, 'data-name')) {
    score += 15;
  }

  const classes = classText(link);
  const lowered = text.toLowerCase();
  if (
    LINK_NOISE_CLASSES.some((word) => classes.includes(word)) ||
    LINK_NOISE_TEXT.some((word) => lowered.includes(word))
  ) {
    score -= 30;
  }
  if (text.length <= 5 && isAscii(text)) {
    score -= 20;
  }
  return score;
}

function titleFromLinks(item: Element): TitleMatch | null {
  const links = findAll(item, (el) => {
    if (tagName(el) !== 'a' || !hasAttr(el, 'href')) {
      return false;
    }
    const href = getAttr(el, 'href');
    return !href.startsWith('#') && !href.startsWith('javascript:') && getText(el) !== '';
  });

  // Every usable link is a candidate, even with a negative score
  let best: Scored | null = null;
  for (const link of links) {
    const scored = { element: link, score: scoreTitleLink(link), text: getText(link) };
    if (
      !best ||
      scored.score > best.score ||
      (scored.score === best.score && scored.text.length < best.text.length)
    ) {
      best = scored;
    }
  }
  if (!best) {
    return null;
  }

  const link = best.element;
  const [cls] = getStableClasses(link);
  if (cls) {
    return { selector: `a.${cls}`, element: link };
  }
  const parent = getParentElement(link);
  const [parentClass] = parent ? getStableClasses(parent) : [];
  if (parentClass) {
    return { selector: `.${parentClass} a`, element: link };
  }
  return { selector: 'a', element: link };
}

/**
 * Title selector together with the element it was derived from
 */
export function findTitle(item: Element): TitleMatch | null {
  return (
    titleFromHeadings(item) ??
    titleFromDataAttributes(item) ??
    titleFromMarkers(item) ??
    titleFromLongestText(item) ??
    titleFromLinks(item)
  );
}

function inferUrl(item: Element): string | null {
  const dataAttribute = findByDataAttribute(item, URL_DATA_ATTRIBUTES);
  if (dataAttribute) {
    return `[${dataAttribute}]::attr(${dataAttribute})`;
  }

  const title = findTitle(item);
  if (!title) {
    return null;
  }
  if (title.selector.includes(ATTR_MARKER)) {
    return title.selector;
  }
  if (
    tagName(title.element) !== 'a' &&
    findFirst(title.element, (el) => tagName(el) === 'a' && hasAttr(el, 'href'))
  ) {
    return `${title.selector} a::attr(href)`;
  }
  return `${title.selector}::attr(href)`;
}

function scoreDate(element: Element): number {
  const text = getText(element);
  const classes = classText(element);
  let score = 0;

  if (DATE_CLASS_KEYWORDS.some((keyword) => classes.includes(keyword))) {
    score += 30;
  }
  if (Object.keys(element.attribs).some((name) => /^data-.*(date|time|published)/.test(name))) {
    score += 25;
  }
  if (ISO_DATE_PATTERN.test(text)) {
    score += 20;
  }
  if (RELATIVE_TIME_PATTERN.test(text)) {
    score += 15;
  }
  if (DELIMITED_DATE_PATTERN.test(text)) {
    score += 15;
  }
  return score;
}

function inferDate(item: Element): string | null {
  const time = findFirst(item, byTag('time'));
  if (time) {
    return tagClassSelector(time);
  }

  const dataAttribute = findByDataAttribute(item, DATE_DATA_ATTRIBUTES);
  if (dataAttribute) {
    return `[${dataAttribute}]`;
  }

  const withDatetime = findFirst(item, (el) => hasAttr(el, 'datetime'));
  if (withDatetime) {
    const [cls] = getStableClasses(withDatetime);
    return cls ? `.${cls}` : '[datetime]';
  }

  const best = pickBest(
    findAll(item, byTag(...DATE_TAGS)).map((element) => ({
      element,
      score: scoreDate(element),
      text: getText(element),
    }))
  );
  return best ? classOrTagSelector(best.element) : null;
}

function scoreAuthor(element: Element): number {
  const text = getText(element);
  const classes = classText(element);
  let score = 0;

  if (AUTHOR_CLASS_KEYWORDS.some((keyword) => classes.includes(keyword))) {
    score += 30;
  }
  if (Object.keys(element.attribs).some((name) => /^data-.*(author|user)/.test(name))) {
    score += 25;
  }
  if (text.toLowerCase().startsWith('by ') || text.startsWith('@')) {
    score += 15;
  }
  if (text.length > 50) {
    score -= 10;
  }
  if (text.length < 2) {
    score -= 20;
  }
  return score;
}

function inferAuthor(item: Element): string | null {
  for (const marker of AUTHOR_MARKERS) {
    if (findFirst(item, (el) => marker.matches(el.attribs))) {
      return marker.selector;
    }
  }

  const best = pickBest(
    findAll(item, byTag(...AUTHOR_TAGS)).map((element) => ({
      element,
      score: scoreAuthor(element),
      text: getText(element),
    }))
  );
  return best ? classOrTagSelector(best.element) : null;
}

function scoreScore(element: Element): number {
  const text = getText(element);
  const classes = classText(element);
  let score = 0;

  if (SCORE_CLASS_KEYWORDS.some((keyword) => classes.includes(keyword))) {
    score += 30;
  }
  if (SCORE_TEXT_PATTERN.test(text)) {
    score += 20;
  }
  if (/^\d+$/.test(text)) {
    score += 5;
  }
  return score;
}

function inferScore(item: Element): string | null {
  const dataAttribute = findByDataAttribute(item, SCORE_DATA_ATTRIBUTES);
  if (dataAttribute) {
    return `[${dataAttribute}]`;
  }

  const best = pickBest(
    findAll(item, byTag(...SCORE_TAGS)).map((element) => ({
      element,
      score: scoreScore(element),
      text: getText(element),
    }))
  );
  return best ? classOrTagSelector(best.element) : null;
}

function inferImage(item: Element): string | null {
  const image = findFirst(item, byTag('img'));
  return image ? tagClassSelector(image) : null;
}

/**
 * Selector for one field inside an item, or null when nothing qualifies
 */
export function inferFieldSelector(item: Element, fieldType: string): string | null {
  if (!isFieldType(fieldType)) {
    throw new UnsupportedFieldTypeError(fieldType);
  }

  switch (fieldType) {
    case 'title':
      return findTitle(item)?.selector ?? null;
    case 'url':
      return inferUrl(item);
    case 'date':
      return inferDate(item);
    case 'author':
      return inferAuthor(item);
    case 'score':
      return inferScore(item);
    case 'image':
      return inferImage(item);
  }
}

/**
 * Apply a field selector inside an item; `::attr(name)` reads an attribute
 * and an empty CSS part targets the item itself. Throws on invalid CSS.
 */
export function evaluateFieldSelector(
  $: DocumentTree,
  item: Element,
  selector: string
): { values: string[]; matchCount: number } {
  const markerIndex = selector.indexOf(ATTR_MARKER);
  const css = (markerIndex >= 0 ? selector.slice(0, markerIndex) : selector).trim();
  const attribute =
    markerIndex >= 0 ? selector.slice(markerIndex + ATTR_MARKER.length).replace(/\)\s*$/, '') : null;

  const targets = css ? selectWithin($, item, css) : [item];
  const values = targets.map((target) =>
    attribute ? getAttr(target, attribute) : getText(target)
  );
  return { values, matchCount: targets.length };
}

function toSuggestion(
  $: DocumentTree,
  item: Element,
  fieldName: FieldType,
  selector: string,
  source: FieldSuggestion['source']
): FieldSuggestion | null {
  try {
    const { values, matchCount } = evaluateFieldSelector($, item, selector);
    return {
      fieldName,
      selector,
      sample: (values[0] ?? '').slice(0, SAMPLE_LENGTH),
      matchCount,
      source,
    };
  } catch (error) {
    console.warn(`⚠️  Skipping ${fieldName} selector "${selector}":`, error);
    return null;
  }
}

/**
 * One suggestion per field type that resolves inside the item
 */
export function suggestFields(
  $: DocumentTree,
  item: Element,
  options: SuggestFieldsOptions = {}
): FieldSuggestion[] {
  const suggestions: FieldSuggestion[] = [];

  for (const fieldName of FIELD_TYPES) {
    const frameworkSelector = options.framework
      ? getFrameworkFieldSelector($, options.framework, item, fieldName)
      : null;

    const suggestion = frameworkSelector
      ? toSuggestion($, item, fieldName, frameworkSelector, 'framework')
      : null;
    if (suggestion) {
      suggestions.push(suggestion);
      continue;
    }

    const heuristic = inferFieldSelector(item, fieldName);
    const fallback = heuristic ? toSuggestion($, item, fieldName, heuristic, 'heuristic') : null;
    if (fallback) {
      suggestions.push(fallback);
    }
  }

  return suggestions;
}

/**
 * Per field, the selector most items agree on; the sample comes from the
 * first item that produced it
 */
export function poolFieldSuggestions(
  $: DocumentTree,
  items: Element[],
  options: SuggestFieldsOptions = {}
): PooledFieldSuggestion[] {
  const pools = new Map<FieldType, Map<string, PoolEntry>>();

  for (const item of items) {
    for (const suggestion of suggestFields($, item, options)) {
      const pool = pools.get(suggestion.fieldName) ?? new Map<string, PoolEntry>();
      const entry = pool.get(suggestion.selector);
      if (entry) {
        entry.support++;
      } else {
        pool.set(suggestion.selector, { first: suggestion, support: 1 });
      }
      pools.set(suggestion.fieldName, pool);
    }
  }

  const pooled: PooledFieldSuggestion[] = [];
  for (const fieldName of FIELD_TYPES) {
    const pool = pools.get(fieldName);
    if (!pool) {
      continue;
    }
    let best: PoolEntry | null = null;
    for (const entry of pool.values()) {
      if (!best || entry.support > best.support) {
        best = entry;
      }
    }
    if (best) {
      pooled.push({ ...best.first, support: best.support });
    }
  }
  return pooled;
}
