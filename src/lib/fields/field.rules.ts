/**
 * Field Rules
 * Keyword tables and patterns behind the field heuristics
 */

export const TITLE_TEXT_TAGS = ['span', 'div', 'p', 'strong', 'b', 'em', 'td', 'label'];

export const INLINE_TAGS = new Set([
  'a',
  'abbr',
  'b',
  'br',
  'code',
  'em',
  'i',
  'mark',
  'small',
  'span',
  'strong',
  'sub',
  'sup',
  'time',
]);

export const TITLE_DATA_ATTRIBUTES = ['data-title', 'data-name', 'data-heading'];

export const TITLE_MARKERS: Array<{ attribute: string; value: string }> = [
  { attribute: 'itemprop', value: 'name' },
  { attribute: 'itemprop', value: 'headline' },
  { attribute: 'role', value: 'heading' },
];

export const LINK_NOISE_CLASSES = ['vote', 'upvote', 'reply', 'share', 'flag', 'hide', 'button', 'btn'];
export const LINK_NOISE_TEXT = ['vote', 'reply', 'share', 'hide', 'save', 'report'];

export const URL_DATA_ATTRIBUTES = ['data-url', 'data-href', 'data-link'];

export const DATE_TAGS = ['span', 'div', 'p', 'small', 'em', 'abbr'];
export const DATE_DATA_ATTRIBUTES = ['data-date', 'data-time', 'data-timestamp', 'data-published'];
export const DATE_CLASS_KEYWORDS = ['date', 'time', 'timestamp', 'posted', 'published', 'ago', 'updated'];

export const ISO_DATE_PATTERN = /\d{4}-\d{2}-\d{2}/;
export const RELATIVE_TIME_PATTERN = /\d+\s*(second|minute|hour|day|week|month|year)s?\s+ago/i;
export const DELIMITED_DATE_PATTERN = /\b\d{1,2}[/\-.]\d{1,2}[/\-.]\d{2,4}\b/;

export const AUTHOR_MARKERS: Array<{ selector: string; matches: (attribs: Record<string, string>) => boolean }> = [
  { selector: '[itemprop="author"]', matches: (attribs) => attribs.itemprop === 'author' },
  {
    selector: '[rel~="author"]',
    matches: (attribs) => (attribs.rel ?? '').split(/\s+/).includes('author'),
  },
  { selector: '[data-author]', matches: (attribs) => 'data-author' in attribs },
  { selector: '[data-user]', matches: (attribs) => 'data-user' in attribs },
];

export const AUTHOR_TAGS = ['span', 'a', 'div', 'p', 'small', 'em', 'strong'];
export const AUTHOR_CLASS_KEYWORDS = [
  'author',
  'user',
  'username',
  'by',
  'posted-by',
  'submitter',
  'creator',
  'writer',
];

export const SCORE_DATA_ATTRIBUTES = ['data-score', 'data-points', 'data-votes', 'data-rating'];
export const SCORE_TAGS = ['span', 'div', 'p', 'small', 'strong'];
export const SCORE_CLASS_KEYWORDS = ['score', 'points', 'votes', 'upvotes', 'rating', 'karma', 'likes'];
export const SCORE_TEXT_PATTERN = /\d+\s*(point|vote|upvote|like|star)/i;

/**
 * Table header keywords per field, checked in this order
 */
export const TABLE_HEADER_KEYWORDS: Array<[string, string[]]> = [
  ['title', ['title', 'name', 'product', 'description', 'subject', 'heading']],
  ['url', ['url', 'link', 'href', 'permalink']],
  ['date', ['date', 'time', 'posted', 'published', 'created', 'updated', 'modified']],
  ['author', ['author', 'by', 'user', 'company', 'brand', 'vendor', 'publisher']],
  ['price', ['price', 'cost', 'amount']],
  ['category', ['category', 'type', 'class', 'tag']],
  ['status', ['status', 'state']],
  ['id', ['id', 'number', '#']],
];
