/**
 * Inspector Service
 * Runs the selector inference core over submitted HTML
 */

import { env } from '../../config/env';
import { ApiError } from '../../middleware/error-handler';
import { PageAnalysis, PreviewRecord, analyzePage, previewExtraction } from '../../lib/analysis';
import { loadDocument, selectAll } from '../../lib/dom';
import { applyStructuralStrategies, poolFieldSuggestions } from '../../lib/fields';
import { FRAMEWORK_PROFILES, detectFramework } from '../../lib/frameworks';
import { SelectorCandidate, findItemCandidates } from '../../lib/scanner';
import { IFieldsResult, IProfileSummary } from './inspector.types';

export class InspectorService {
  /**
   * Full page report
   */
  analyze(html: string, url?: string | null): PageAnalysis {
    return analyzePage(html, url);
  }

  /**
   * Repeated item candidates, best first
   */
  findCandidates(html: string, minRepeat?: number): SelectorCandidate[] {
    if (!html.trim()) {
      return [];
    }
    return findItemCandidates(loadDocument(html), { minRepeat });
  }

  /**
   * Field suggestions pooled over the items matched by itemSelector
   */
  suggestFields(html: string, itemSelector: string): IFieldsResult {
    const $ = loadDocument(html);
    const matched = selectAll($, itemSelector);
    if (!matched) {
      throw new ApiError(400, `Invalid item selector: ${itemSelector}`);
    }

    const items = matched.slice(0, env.FIELD_SAMPLE_ITEMS);
    if (items.length === 0) {
      return { fields: [], structuralFields: {} };
    }

    const framework = detectFramework($, items[0]);
    return {
      fields: poolFieldSuggestions($, items, { framework }),
      structuralFields: applyStructuralStrategies($, itemSelector),
    };
  }

  /**
   * Records extracted with the given selectors
   */
  preview(
    html: string,
    itemSelector: string,
    fieldSelectors: Record<string, string>,
    limit?: number
  ): PreviewRecord[] {
    return previewExtraction(html, itemSelector, fieldSelectors, limit);
  }

  /**
   * Known framework profiles in registry order
   */
  listFrameworks(): IProfileSummary[] {
    return FRAMEWORK_PROFILES.map(({ id, name, category }) => ({ id, name, category }));
  }
}

// Export singleton instance
export const inspectorService = new InspectorService();
