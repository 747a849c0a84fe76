/**
 * Analysis Types
 * Shape of the page analysis report
 */

import { FieldSelectorMap, PooledFieldSuggestion } from '../fields';
import { FrameworkCategory, FrameworkMatch } from '../frameworks';
import { SelectorCandidate } from '../scanner';

export interface PageMetadata {
  title: string;
  description: string;
  og: {
    title: string | null;
    description: string | null;
    image: string | null;
    type: string | null;
    url: string | null;
  };
  twitter: {
    card: string | null;
    title: string | null;
  };
  language: string | null;
  canonical: string | null;
}

export type TagCount = [name: string, count: number];

export interface PageStatistics {
  totalElements: number;
  totalLinks: number;
  totalImages: number;
  totalForms: number;
  totalTables: number;
  totalLists: number;
  headings: Record<string, number>;
  textLength: number;
  textWords: number;
  mostCommonTags: TagCount[];
  mostCommonClasses: TagCount[];
}

export interface PaginationCandidate {
  selector: string;
  href: string;
  text: string;
  score: number;
  hints: string[];
}

export interface InfiniteScrollReport {
  detected: boolean;
  confidence: number;
  signals: string[];
}

export interface FrameworkHint {
  profileId: string;
  name: string;
  category: FrameworkCategory;
  confidence: number;
  recommendation: string;
}

export interface AnalysisSuggestions {
  bestCandidate: SelectorCandidate | null;
  itemSelector: string | null;
  fieldSuggestions: PooledFieldSuggestion[];
  structuralFields: FieldSelectorMap;
  paginationCandidates: PaginationCandidate[];
  infiniteScroll: InfiniteScrollReport;
  frameworkHint: FrameworkHint | null;
}

export interface PageAnalysis {
  url: string | null;
  frameworks: FrameworkMatch[];
  containers: SelectorCandidate[];
  metadata: PageMetadata | Record<string, never>;
  statistics: PageStatistics | Record<string, never>;
  suggestions: AnalysisSuggestions | Record<string, never>;
}

/**
 * One previewed record, field name to extracted value
 */
export type PreviewRecord = Record<string, string>;
