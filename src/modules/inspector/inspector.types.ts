/**
 * Inspector Module Types
 * Request and response shapes for the inspection endpoints
 */

import { PageAnalysis, PreviewRecord } from '../../lib/analysis';
import { FieldSelectorMap, PooledFieldSuggestion } from '../../lib/fields';
import { FrameworkCategory } from '../../lib/frameworks';
import { SelectorCandidate } from '../../lib/scanner';

// ============================================================================
// Requests
// ============================================================================

export interface IAnalyzeRequest {
  html: string;
  url?: string | null;
}

export interface ICandidatesRequest {
  html: string;
  minRepeat?: number;
}

export interface IFieldsRequest {
  html: string;
  itemSelector: string;
}

export interface IPreviewRequest {
  html: string;
  itemSelector: string;
  fieldSelectors: Record<string, string>;
  limit?: number;
}

// ============================================================================
// Responses
// ============================================================================

export interface IAnalyzeResponse {
  success: true;
  analysis: PageAnalysis;
}

export interface ICandidatesResponse {
  success: true;
  candidates: SelectorCandidate[];
}

export interface IFieldsResult {
  fields: PooledFieldSuggestion[];
  structuralFields: FieldSelectorMap;
}

export interface IFieldsResponse extends IFieldsResult {
  success: true;
}

export interface IPreviewResponse {
  success: true;
  records: PreviewRecord[];
}

export interface IProfileSummary {
  id: string;
  name: string;
  category: FrameworkCategory;
}

export interface IFrameworksResponse {
  success: true;
  profiles: IProfileSummary[];
}
