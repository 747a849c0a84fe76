/**
 * Container Child Strategy
 * Lists, table bodies and divs whose direct children repeat one tag
 */

import { getChildElements, isCssIdentifier, tagName } from '../../dom';
import { BaseItemStrategy } from '../scanner.strategy';
import { ScanContext, SelectorCandidate } from '../scanner.types';

const CONTAINER_TAGS = ['ul', 'ol', 'tbody', 'div'];

export class ContainerChildStrategy extends BaseItemStrategy {
  name = 'container-child';

  detect({ $, elements, minRepeat, existing }: ScanContext): SelectorCandidate[] {
    const candidates: SelectorCandidate[] = [];

    for (const parentTag of CONTAINER_TAGS) {
      const containers = elements.filter((element) => tagName(element) === parentTag);

      for (const container of containers) {
        const childCounts = this.tally(getChildElements(container).map(tagName));

        for (const [childTag, count] of childCounts) {
          // Parser-accepted names like "x(" cannot be selected
          if (count < minRepeat || !isCssIdentifier(childTag)) {
            continue;
          }
          if (this.isTagReferenced([...existing, ...candidates], childTag)) {
            continue;
          }
          const candidate = this.createCandidate($, `${parentTag} > ${childTag}`, 'medium');
          if (candidate) {
            candidates.push(candidate);
          }
        }
      }
    }

    return candidates;
  }
}
