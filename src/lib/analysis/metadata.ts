/**
 * Page Metadata
 * Title, description and social meta tags
 */

import { DocumentTree, normalizeWhitespace } from '../dom';
import { PageMetadata } from './analysis.types';

function metaContent($: DocumentTree, selector: string): string | null {
  const content = $(selector).first().attr('content');
  return content ?? null;
}

export function extractMetadata($: DocumentTree): PageMetadata {
  return {
    title: normalizeWhitespace($('title').first().text()),
    description:
      metaContent($, 'meta[name="description"]') ??
      metaContent($, 'meta[property="og:description"]') ??
      '',
    og: {
      title: metaContent($, 'meta[property="og:title"]'),
      description: metaContent($, 'meta[property="og:description"]'),
      image: metaContent($, 'meta[property="og:image"]'),
      type: metaContent($, 'meta[property="og:type"]'),
      url: metaContent($, 'meta[property="og:url"]'),
    },
    twitter: {
      card: metaContent($, 'meta[name="twitter:card"]'),
      title: metaContent($, 'meta[name="twitter:title"]'),
    },
    language: $('html').first().attr('lang') ?? null,
    canonical: $('link[rel="canonical"]').first().attr('href') ?? null,
  };
}
