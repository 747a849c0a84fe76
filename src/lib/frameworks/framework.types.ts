/**
 * Framework Types
 * Type definitions for framework signature matching
 */

import { DocumentTree, Element } from '../dom';
import type { FieldType } from '../fields/field.types';

export const FRAMEWORK_CATEGORIES = ['universal', 'framework', 'cms', 'ecommerce', 'css'] as const;

export type FrameworkCategory = (typeof FRAMEWORK_CATEGORIES)[number];

/**
 * What a profile's signal checks look at
 */
export interface DetectionInput {
  html: string;
  $: DocumentTree;
  item?: Element | null;
}

/**
 * Signal checks for one profile
 */
export interface ProfileSignals {
  /**
   * Raw score; the registry clamps it to 0-100
   */
  detect(input: DetectionInput): number;

  /**
   * Version advertised by the page, if any
   */
  getVersion?(input: DetectionInput): string | null;
}

/**
 * Static profile data, as stored in profiles.json
 */
export interface ProfileDefinition {
  id: string;
  name: string;
  category: FrameworkCategory;
  itemSelectorHints: readonly string[];
  fieldMappings: Readonly<Partial<Record<FieldType, readonly string[]>>>;
  recommendation: string;
}

export type FrameworkProfile = Readonly<ProfileDefinition & ProfileSignals>;

export interface FrameworkDetection {
  profile: FrameworkProfile;
  score: number;
}

/**
 * Serializable detection result
 */
export interface FrameworkMatch {
  profileId: string;
  name: string;
  category: FrameworkCategory;
  score: number;
  confidence: number; // score / 100
  version?: string;
}
