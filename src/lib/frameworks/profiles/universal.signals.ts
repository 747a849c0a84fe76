/**
 * Universal Signals
 * Structured data and social meta conventions any site may carry
 */

import { ProfileSignals } from '../framework.types';

const SCHEMA_TYPES: Array<[string, number]> = [
  ['Article', 15],
  ['Product', 15],
  ['NewsArticle', 12],
  ['BlogPosting', 12],
  ['Recipe', 10],
  ['Event', 10],
  ['Person', 10],
  ['Organization', 10],
];

function countOccurrences(html: string, needle: string): number {
  return html.split(needle).length - 1;
}

/**
 * Score by how many meta tags of a family the page carries
 */
function metaFamilyScore(count: number): number {
  if (count >= 5) return 50;
  if (count >= 3) return 40;
  if (count >= 1) return 25;
  return 0;
}

export const schemaOrgSignals: ProfileSignals = {
  detect({ html, $ }) {
    let score = 0;

    const jsonLdBlocks = $('script[type="application/ld+json"]').length;
    if (jsonLdBlocks > 0) {
      score += 50;
      if (jsonLdBlocks > 1) {
        score += Math.min(20, jsonLdBlocks * 5);
      }
    }

    if (html.includes('itemscope')) score += 30;
    if (html.includes('itemprop=')) score += 25;
    if (html.includes('itemtype=')) score += 20;

    const schemaType = SCHEMA_TYPES.find(
      ([type]) =>
        html.includes(`schema.org/${type}`) ||
        new RegExp(`"@type"\\s*:\\s*"${type}"`).test(html)
    );
    if (schemaType) {
      score += schemaType[1];
    }

    return score;
  },
};

export const openGraphSignals: ProfileSignals = {
  detect({ html }) {
    let score = metaFamilyScore(countOccurrences(html, 'property="og:'));

    if (html.includes('property="og:title"')) score += 15;
    if (html.includes('property="og:description"')) score += 10;
    if (html.includes('property="og:image"')) score += 10;
    if (html.includes('property="og:url"')) score += 10;
    if (html.includes('property="og:type"')) score += 5;

    return score;
  },
};

export const twitterCardsSignals: ProfileSignals = {
  detect({ html }) {
    let score = metaFamilyScore(countOccurrences(html, 'name="twitter:'));

    if (html.includes('name="twitter:card"')) score += 20;
    if (html.includes('name="twitter:title"')) score += 15;
    if (html.includes('name="twitter:description"')) score += 10;
    if (html.includes('name="twitter:image"')) score += 10;
    if (html.includes('name="twitter:site"') || html.includes('name="twitter:creator"')) score += 10;

    return score;
  },
};
