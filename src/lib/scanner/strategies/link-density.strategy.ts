/**
 * Link Density Strategy
 * Groups elements holding a few links and some text, the usual shape of a
 * card or row even when it carries no semantic tag
 */

import { byTag, findAll, getText, tagName } from '../../dom';
import { BaseItemStrategy } from '../scanner.strategy';
import { ScanContext, SelectorCandidate } from '../scanner.types';
import { classSignature } from '../scanner.utils';

const EXCLUDED_TAGS = new Set(['html', 'head', 'body', 'script', 'style']);
const MIN_LINKS = 1;
const MAX_LINKS = 3;
const MIN_TEXT_LENGTH = 10;

export class LinkDensityStrategy extends BaseItemStrategy {
  name = 'link-density';

  detect({ $, elements, minRepeat }: ScanContext): SelectorCandidate[] {
    const isAnchor = byTag('a');

    const signatures = elements.flatMap((element) => {
      if (EXCLUDED_TAGS.has(tagName(element))) {
        return [];
      }
      const linkCount = findAll(element, isAnchor).length;
      if (linkCount < MIN_LINKS || linkCount > MAX_LINKS) {
        return [];
      }
      return getText(element).length > MIN_TEXT_LENGTH ? [classSignature(element)] : [];
    });

    const candidates: SelectorCandidate[] = [];
    for (const [signature, count] of this.tally(signatures)) {
      if (count < minRepeat) {
        continue;
      }
      const candidate = this.createCandidate(
        $,
        signature,
        signature.includes('.') ? 'medium' : 'low'
      );
      if (candidate) {
        candidates.push(candidate);
      }
    }
    return candidates;
  }
}
