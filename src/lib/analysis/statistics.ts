/**
 * Page Statistics
 */

import { DocumentTree, allElements, getClassTokens, normalizeWhitespace, tagName } from '../dom';
import { PageStatistics, TagCount } from './analysis.types';

const TOP_ENTRIES = 10;

function mostCommon(values: string[]): TagCount[] {
  const counts = new Map<string, number>();
  for (const value of values) {
    counts.set(value, (counts.get(value) ?? 0) + 1);
  }
  return Array.from(counts.entries())
    .sort(([, a], [, b]) => b - a)
    .slice(0, TOP_ENTRIES);
}

export function calculateStatistics($: DocumentTree): PageStatistics {
  const elements = allElements($);
  const count = (selector: string): number => $(selector).length;

  const headings: Record<string, number> = {};
  for (let level = 1; level <= 6; level++) {
    headings[`h${level}`] = count(`h${level}`);
  }

  const text = normalizeWhitespace($.root().text());

  return {
    totalElements: elements.length,
    totalLinks: count('a[href]'),
    totalImages: count('img'),
    totalForms: count('form'),
    totalTables: count('table'),
    totalLists: count('ul, ol'),
    headings,
    textLength: text.length,
    textWords: text ? text.split(' ').length : 0,
    mostCommonTags: mostCommon(elements.map(tagName)),
    mostCommonClasses: mostCommon(elements.flatMap(getClassTokens)),
  };
}
