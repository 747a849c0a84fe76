/**
 * DOM Types
 */

import type { CheerioAPI } from 'cheerio';

export type { Element } from 'domhandler';

/**
 * Parsed, read-only document supplied to every analysis call
 */
export type DocumentTree = CheerioAPI;
