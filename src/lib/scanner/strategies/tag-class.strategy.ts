/**
 * Tag + First Class Strategy
 * Signatures like `li.story` that the class-only pass did not cover
 */

import { tagName } from '../../dom';
import { BaseItemStrategy } from '../scanner.strategy';
import { ScanContext, SelectorCandidate } from '../scanner.types';
import { firstClass } from '../scanner.utils';

export class TagClassStrategy extends BaseItemStrategy {
  name = 'tag-class';

  detect({ $, elements, minRepeat, existing }: ScanContext): SelectorCandidate[] {
    const signatures = elements.flatMap((element) => {
      const cls = firstClass(element);
      return cls ? [`${tagName(element)}.${cls}`] : [];
    });

    const candidates: SelectorCandidate[] = [];
    for (const [signature, count] of this.tally(signatures)) {
      const classSelector = signature.slice(signature.indexOf('.'));
      if (count < minRepeat || this.isCovered(existing, classSelector)) {
        continue;
      }
      const candidate = this.createCandidate($, signature, 'medium');
      if (candidate) {
        candidates.push(candidate);
      }
    }
    return candidates;
  }
}
