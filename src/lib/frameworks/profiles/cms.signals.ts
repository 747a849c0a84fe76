/**
 * CMS Signals
 */

import { getClassTokens } from '../../dom';
import { DetectionInput, ProfileSignals } from '../framework.types';

function generatorVersion({ $ }: DetectionInput, product: RegExp): string | null {
  const generator = $('meta[name="generator"]').attr('content') ?? '';
  const match = generator.match(product);
  return match ? match[1] : null;
}

export const drupalViewsSignals: ProfileSignals = {
  detect({ html, item }) {
    let score = 0;
    if (html.includes('views-row')) score += 35;
    if (html.includes('views-field')) score += 25;
    if (html.includes('view-content')) score += 15;
    if (html.includes('views-table')) score += 10;

    if (item) {
      const classes = getClassTokens(item).join(' ');
      if (classes.includes('views-row')) score += 25;
      if (classes.includes('views-field')) score += 10;
    }
    return score;
  },

  getVersion(input) {
    return generatorVersion(input, /Drupal\s+(\d+(?:\.\d+)*)/i);
  },
};

export const wordpressSignals: ProfileSignals = {
  detect({ html, item }) {
    let score = 0;
    if (html.includes('wp-content')) score += 30;
    if (html.includes('post-')) score += 20;
    if (html.includes('entry-')) score += 20;
    if (html.includes('hentry')) score += 15;
    if (html.includes('wp-includes')) score += 15;

    if (item) {
      const classes = getClassTokens(item).join(' ');
      if (['post', 'entry', 'hentry', 'article'].some((marker) => classes.includes(marker))) {
        score += 20;
      }
    }
    return score;
  },

  getVersion(input) {
    return generatorVersion(input, /WordPress\s+(\d+(?:\.\d+)*)/i);
  },
};
