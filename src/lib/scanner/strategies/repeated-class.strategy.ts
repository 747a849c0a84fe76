/**
 * Repeated Class Strategy
 * Class tokens shared by many elements usually mark list items
 */

import { getClassTokens, isCssIdentifier } from '../../dom';
import { BaseItemStrategy } from '../scanner.strategy';
import { ScanContext, SelectorCandidate } from '../scanner.types';

const HIGH_CONFIDENCE_COUNT = 10;

export class RepeatedClassStrategy extends BaseItemStrategy {
  name = 'repeated-class';

  detect({ $, elements, minRepeat }: ScanContext): SelectorCandidate[] {
    const counts = this.tally(
      elements.flatMap((element) => getClassTokens(element).filter(isCssIdentifier))
    );

    const candidates: SelectorCandidate[] = [];
    for (const [token, count] of counts) {
      if (count < minRepeat) {
        continue;
      }
      const candidate = this.createCandidate(
        $,
        `.${token}`,
        count >= HIGH_CONFIDENCE_COUNT ? 'high' : 'medium'
      );
      if (candidate) {
        candidates.push(candidate);
      }
    }
    return candidates;
  }
}
