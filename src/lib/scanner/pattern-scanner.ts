/**
 * Pattern Scanner
 * Runs the item detection strategies over a document and ranks their output
 */

import { env } from '../../config/env';
import { DocumentTree, allElements } from '../dom';
import { IItemStrategy } from './scanner.strategy';
import { ScannerOptions, SelectorCandidate } from './scanner.types';
import { dedupeCandidates, rankCandidates, selectTopCandidates } from './scanner.utils';
import {
  ContainerChildStrategy,
  LinkDensityStrategy,
  LinkPathStrategy,
  RepeatedClassStrategy,
  SemanticTagStrategy,
  TagClassStrategy,
} from './strategies';

export class PatternScanner {
  private strategies: IItemStrategy[];

  constructor(strategies?: IItemStrategy[]) {
    this.strategies = strategies ?? [
      new RepeatedClassStrategy(),
      new TagClassStrategy(),
      new SemanticTagStrategy(),
      new ContainerChildStrategy(),
      new LinkPathStrategy(),
      new LinkDensityStrategy(),
    ];
  }

  /**
   * Names of the strategies in run order
   */
  getStrategyNames(): string[] {
    return this.strategies.map((strategy) => strategy.name);
  }

  /**
   * Ranked item candidates for the document
   */
  scan($: DocumentTree, options: ScannerOptions = {}): SelectorCandidate[] {
    const minRepeat = options.minRepeat ?? env.SCANNER_MIN_REPEAT;
    const maxCandidates = options.maxCandidates ?? env.SCANNER_MAX_CANDIDATES;
    const chromeCountThreshold =
      options.chromeCountThreshold ?? env.SCANNER_CHROME_COUNT_THRESHOLD;

    const elements = allElements($);
    if (elements.length === 0) {
      return [];
    }

    const collected: SelectorCandidate[] = [];
    for (const strategy of this.strategies) {
      collected.push(...strategy.detect({ $, elements, minRepeat, existing: collected }));
    }

    const ranked = rankCandidates(dedupeCandidates(collected));
    return selectTopCandidates(ranked, maxCandidates, chromeCountThreshold);
  }
}

// Export singleton instance
export const patternScanner = new PatternScanner();

/**
 * Find likely item selectors in a document
 */
export function findItemCandidates(
  $: DocumentTree,
  options: ScannerOptions = {}
): SelectorCandidate[] {
  return patternScanner.scan($, options);
}
