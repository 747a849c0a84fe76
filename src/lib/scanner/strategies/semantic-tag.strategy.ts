/**
 * Semantic Tag Strategy
 * Bare article, li and tr tags when nothing earlier names them
 */

import { tagName } from '../../dom';
import { BaseItemStrategy } from '../scanner.strategy';
import { ScanContext, SelectorCandidate } from '../scanner.types';

const ITEM_TAGS = ['article', 'li', 'tr'];

export class SemanticTagStrategy extends BaseItemStrategy {
  name = 'semantic-tag';

  detect({ $, elements, minRepeat, existing }: ScanContext): SelectorCandidate[] {
    const counts = this.tally(elements.map(tagName));

    const candidates: SelectorCandidate[] = [];
    for (const tag of ITEM_TAGS) {
      if ((counts.get(tag) ?? 0) < minRepeat || this.isTagReferenced(existing, tag)) {
        continue;
      }
      const candidate = this.createCandidate($, tag, 'medium');
      if (candidate) {
        candidates.push(candidate);
      }
    }
    return candidates;
  }
}
