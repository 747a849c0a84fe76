/**
 * Scanner Types
 * Type definitions for the structural pattern scanner
 */

import { DocumentTree, Element } from '../dom';

/**
 * Confidence label attached to a candidate
 */
export type Confidence = 'low' | 'medium' | 'high';

/**
 * Proposed item selector; list order is rank
 */
export interface SelectorCandidate {
  selector: string;
  matchCount: number;
  sampleText: string;
  sampleUrl?: string;
  confidence: Confidence;
}

export interface ScannerOptions {
  minRepeat?: number;
  maxCandidates?: number;
  chromeCountThreshold?: number; // Counts above this with no sample URL are dropped
}

/**
 * Input handed to each detection strategy
 */
export interface ScanContext {
  $: DocumentTree;
  elements: Element[];
  minRepeat: number;
  existing: readonly SelectorCandidate[]; // Candidates from strategies that ran earlier
}
