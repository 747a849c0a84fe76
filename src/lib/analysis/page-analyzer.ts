/**
 * Page Analyzer
 * Runs every analysis over one document and assembles the report
 */

import { env } from '../../config/env';
import { DocumentTree, loadDocument, selectAll } from '../dom';
import { applyStructuralStrategies, poolFieldSuggestions } from '../fields';
import {
  FrameworkMatch,
  describeFrameworks,
  detectFramework,
  getFrameworkProfile,
} from '../frameworks';
import { SelectorCandidate, findItemCandidates } from '../scanner';
import { AnalysisSuggestions, FrameworkHint, PageAnalysis } from './analysis.types';
import { extractMetadata } from './metadata';
import { detectInfiniteScroll, detectPaginationLinks } from './pagination';
import { calculateStatistics } from './statistics';

/**
 * Report returned for empty input
 */
export function emptyAnalysis(url: string | null = null): PageAnalysis {
  return {
    url,
    frameworks: [],
    containers: [],
    metadata: {},
    statistics: {},
    suggestions: {},
  };
}

function buildFrameworkHint(frameworks: FrameworkMatch[]): FrameworkHint | null {
  const [top] = frameworks;
  const profile = top ? getFrameworkProfile(top.profileId) : null;
  if (!top || !profile) {
    return null;
  }
  return {
    profileId: top.profileId,
    name: top.name,
    category: top.category,
    confidence: top.confidence,
    recommendation: profile.recommendation,
  };
}

function buildSuggestions(
  $: DocumentTree,
  containers: SelectorCandidate[],
  frameworks: FrameworkMatch[]
): AnalysisSuggestions {
  const bestCandidate = containers[0] ?? null;
  const itemSelector = bestCandidate ? bestCandidate.selector : null;
  const items = itemSelector
    ? (selectAll($, itemSelector) ?? []).slice(0, env.FIELD_SAMPLE_ITEMS)
    : [];

  const framework = items.length > 0 ? detectFramework($, items[0]) : null;

  return {
    bestCandidate,
    itemSelector,
    fieldSuggestions: poolFieldSuggestions($, items, { framework }),
    structuralFields: itemSelector ? applyStructuralStrategies($, itemSelector) : {},
    paginationCandidates: detectPaginationLinks($),
    infiniteScroll: detectInfiniteScroll($),
    frameworkHint: buildFrameworkHint(frameworks),
  };
}

/**
 * Full structural report for an HTML page
 */
export function analyzePage(html: string, url?: string | null): PageAnalysis {
  if (!html.trim()) {
    return emptyAnalysis(url ?? null);
  }

  let source = html;
  if (source.length > env.MAX_HTML_LENGTH) {
    console.warn(`⚠️  HTML truncated from ${source.length} to ${env.MAX_HTML_LENGTH} characters`);
    source = source.slice(0, env.MAX_HTML_LENGTH);
  }

  const $ = loadDocument(source);
  const [body] = selectAll($, 'body') ?? [];

  const frameworks = describeFrameworks($, body ?? null);
  const containers = findItemCandidates($);

  return {
    url: url ?? null,
    frameworks,
    containers,
    metadata: extractMetadata($),
    statistics: calculateStatistics($),
    suggestions: buildSuggestions($, containers, frameworks),
  };
}
