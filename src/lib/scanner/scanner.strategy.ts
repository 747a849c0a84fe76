/**
 * Scanner Strategy
 * Base interface and abstract class for item detection strategies
 */

import { DocumentTree, selectAll } from '../dom';
import { Confidence, ScanContext, SelectorCandidate } from './scanner.types';
import { buildSampleText, findSampleUrl, referencesTag } from './scanner.utils';

/**
 * Item detection strategy interface
 */
export interface IItemStrategy {
  /**
   * Strategy name
   */
  name: string;

  /**
   * Propose item candidates for the document
   */
  detect(context: ScanContext): SelectorCandidate[];
}

/**
 * Base item strategy class
 * Provides candidate construction shared by all strategies
 */
export abstract class BaseItemStrategy implements IItemStrategy {
  abstract name: string;

  abstract detect(context: ScanContext): SelectorCandidate[];

  /**
   * Build a candidate by re-selecting the selector, so matchCount always
   * equals what the selector selects; null when it selects nothing
   */
  protected createCandidate(
    $: DocumentTree,
    selector: string,
    confidence: Confidence
  ): SelectorCandidate | null {
    const matches = selectAll($, selector);
    if (!matches || matches.length === 0) {
      return null;
    }

    const [first] = matches;
    const candidate: SelectorCandidate = {
      selector,
      matchCount: matches.length,
      sampleText: buildSampleText(first),
      confidence,
    };

    const sampleUrl = findSampleUrl(first);
    if (sampleUrl) {
      candidate.sampleUrl = sampleUrl;
    }

    return candidate;
  }

  /**
   * Whether an earlier candidate already uses this exact selector
   */
  protected isCovered(candidates: readonly SelectorCandidate[], selector: string): boolean {
    return candidates.some((candidate) => candidate.selector === selector);
  }

  /**
   * Whether an earlier candidate already names the tag
   */
  protected isTagReferenced(candidates: readonly SelectorCandidate[], tag: string): boolean {
    return candidates.some((candidate) => referencesTag(candidate.selector, tag));
  }

  /**
   * Tally keys in first-seen order
   */
  protected tally(keys: Iterable<string>): Map<string, number> {
    const counts = new Map<string, number>();
    for (const key of keys) {
      counts.set(key, (counts.get(key) ?? 0) + 1);
    }
    return counts;
  }
}
