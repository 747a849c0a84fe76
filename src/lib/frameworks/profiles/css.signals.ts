/**
 * CSS Framework Signals
 */

import { getClassTokens } from '../../dom';
import { ProfileSignals } from '../framework.types';

const TAILWIND_PATTERNS = [
  'flex',
  'grid',
  'space-y',
  'gap-',
  'p-',
  'm-',
  'text-',
  'bg-',
  'rounded',
  'shadow',
  'border-',
  'hover:',
  'dark:',
  'sm:',
  'md:',
  'lg:',
];

export const tailwindSignals: ProfileSignals = {
  detect({ html }) {
    // Utility names are generic, so only many distinct hits count
    const matches = TAILWIND_PATTERNS.filter((pattern) => html.includes(pattern)).length;
    if (matches >= 10) return 70;
    if (matches >= 8) return 60;
    if (matches >= 6) return 50;
    if (matches >= 4) return 30;
    return 0;
  },
};

export const bootstrapSignals: ProfileSignals = {
  detect({ html, item }) {
    let score = 0;
    if (html.includes('card')) score += 25;
    if (html.includes('list-group-item')) score += 25;
    if (html.includes('media')) score += 15;
    if (html.includes('row') && html.includes('col')) score += 15;
    if (html.includes('btn-')) score += 10;
    if (html.includes('container')) score += 10;

    if (item) {
      const classes = getClassTokens(item).join(' ');
      if (['card', 'list-group-item', 'media'].some((marker) => classes.includes(marker))) {
        score += 20;
      }
    }
    return score;
  },

  getVersion({ html }) {
    const match =
      html.match(/bootstrap@(\d+\.\d+(?:\.\d+)?)/i) ??
      html.match(/bootstrap\/(\d+\.\d+(?:\.\d+)?)\//i) ??
      html.match(/bootstrap[.-](\d+\.\d+(?:\.\d+)?)(?:\.min)?\.(?:css|js)/i);
    return match ? match[1] : null;
  },
};
