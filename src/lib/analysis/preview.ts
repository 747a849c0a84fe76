/**
 * Extraction Preview
 * Applies an item selector and field selectors to the first few items
 */

import { env } from '../../config/env';
import { loadDocument, selectAll } from '../dom';
import { evaluateFieldSelector } from '../fields';
import { PreviewRecord } from './analysis.types';

export const EXTRACTION_FAILED = '[extraction failed]';

/**
 * Preview records for a selector map; empty when the item selector is
 * blank, invalid or matches nothing
 */
export function previewExtraction(
  html: string,
  itemSelector: string,
  fieldSelectors: Record<string, string>,
  limit: number = env.PREVIEW_LIMIT
): PreviewRecord[] {
  if (!html.trim() || !itemSelector.trim()) {
    return [];
  }

  const $ = loadDocument(html);
  const items = selectAll($, itemSelector);
  if (!items || items.length === 0) {
    return [];
  }

  return items.slice(0, limit).map((item) => {
    const record: PreviewRecord = {};

    for (const [fieldName, rawSelector] of Object.entries(fieldSelectors)) {
      const selector = rawSelector.trim();
      if (!selector) {
        record[fieldName] = '';
        continue;
      }

      try {
        const { values } = evaluateFieldSelector($, item, selector);
        record[fieldName] = values[0] ?? '';
      } catch (error) {
        console.warn(`⚠️  Preview selector failed for ${fieldName} ("${selector}"):`, error);
        record[fieldName] = EXTRACTION_FAILED;
      }
    }

    return record;
  });
}
