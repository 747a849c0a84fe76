/**
 * Field Types
 * Type definitions for per-item field inference
 */

import type { FrameworkProfile } from '../frameworks/framework.types';

export const FIELD_TYPES = ['title', 'url', 'date', 'author', 'score', 'image'] as const;

export type FieldType = (typeof FIELD_TYPES)[number];

export type FieldSource = 'framework' | 'heuristic';

/**
 * Proposed selector for one field inside an item
 */
export interface FieldSuggestion {
  fieldName: FieldType;
  selector: string;
  sample: string;
  matchCount: number;
  source: FieldSource;
}

/**
 * Suggestion chosen across several items
 */
export interface PooledFieldSuggestion extends FieldSuggestion {
  support: number; // Items whose own inference produced this selector
}

export interface SuggestFieldsOptions {
  framework?: FrameworkProfile | null;
}

/**
 * Field name to selector, as produced by the structural strategies
 */
export type FieldSelectorMap = Record<string, string>;

export function isFieldType(value: string): value is FieldType {
  return FIELD_TYPES.some((fieldType) => fieldType === value);
}
