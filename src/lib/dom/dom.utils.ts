/**
 * DOM Utilities
 * Read-only accessors over cheerio documents and domhandler elements
 */

import * as cheerio from 'cheerio';
import { AnyNode, Element, isTag, isText } from 'domhandler';
import { DocumentTree } from './dom.types';

const CSS_IDENTIFIER = /^-?[_a-zA-Z][_a-zA-Z0-9-]*$/;

/**
 * Parse an HTML string into a document tree
 */
export function loadDocument(html: string): DocumentTree {
  return cheerio.load(html);
}

/**
 * Lowercased tag name
 */
export function tagName(element: Element): string {
  return element.name.toLowerCase();
}

/**
 * Class tokens in source order, without duplicates
 */
export function getClassTokens(element: Element): string[] {
  const raw = element.attribs.class;
  if (!raw) {
    return [];
  }
  return Array.from(new Set(raw.split(/\s+/).filter(Boolean)));
}

/**
 * Attribute value, or empty string when absent
 */
export function getAttr(element: Element, name: string): string {
  return element.attribs[name] ?? '';
}

export function hasAttr(element: Element, name: string): boolean {
  return Object.prototype.hasOwnProperty.call(element.attribs, name);
}

export function getChildElements(element: Element): Element[] {
  return element.children.filter(isTag);
}

export function getParentElement(element: Element): Element | null {
  const parent = element.parent;
  return parent && isTag(parent) ? parent : null;
}

function collectText(node: AnyNode, parts: string[]): void {
  if (isText(node)) {
    parts.push(node.data);
    return;
  }
  if (isTag(node)) {
    for (const child of node.children) {
      collectText(child, parts);
    }
  }
}

/**
 * Descendant text with whitespace collapsed
 */
export function getText(element: Element): string {
  const parts: string[] = [];
  collectText(element, parts);
  return normalizeWhitespace(parts.join(''));
}

/**
 * Text held by the element's own text nodes only
 */
export function getDirectText(element: Element): string {
  const parts = element.children.filter(isText).map((node) => node.data);
  return normalizeWhitespace(parts.join(' '));
}

export function normalizeWhitespace(value: string): string {
  return value.replace(/\s+/g, ' ').trim();
}

/**
 * Descendant elements in document order
 */
export function findAll(
  element: Element,
  predicate: (candidate: Element) => boolean = () => true
): Element[] {
  const results: Element[] = [];
  const walk = (node: Element): void => {
    for (const child of getChildElements(node)) {
      if (predicate(child)) {
        results.push(child);
      }
      walk(child);
    }
  };
  walk(element);
  return results;
}

export function findFirst(
  element: Element,
  predicate: (candidate: Element) => boolean
): Element | null {
  for (const child of getChildElements(element)) {
    if (predicate(child)) {
      return child;
    }
    const nested = findFirst(child, predicate);
    if (nested) {
      return nested;
    }
  }
  return null;
}

export function byTag(...names: string[]): (element: Element) => boolean {
  const wanted = new Set(names);
  return (element) => wanted.has(tagName(element));
}

/**
 * Every element of the document in document order
 */
export function allElements($: DocumentTree): Element[] {
  return $('*').toArray().filter(isTag);
}

/**
 * Select over the whole document; null when the selector does not parse
 */
export function selectAll($: DocumentTree, selector: string): Element[] | null {
  try {
    return $(selector).toArray().filter(isTag);
  } catch {
    return null;
  }
}

/**
 * Select descendants of an element; throws on an invalid selector
 */
export function selectWithin($: DocumentTree, element: Element, selector: string): Element[] {
  return $(element).find(selector).toArray();
}

/**
 * Number of parent hops from element up to ancestor, or -1 when unrelated
 */
export function depthBelow(element: Element, ancestor: Element): number {
  let depth = 0;
  let current: Element | null = element;
  while (current) {
    if (current === ancestor) {
      return depth;
    }
    current = getParentElement(current);
    depth++;
  }
  return -1;
}

/**
 * Whether a class or id token can be written without escaping
 */
export function isCssIdentifier(token: string): boolean {
  return CSS_IDENTIFIER.test(token);
}
