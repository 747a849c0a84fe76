/**
 * Structure Strategies
 * Field maps read from page structure rather than per-element scoring:
 * table header rows and HTML5 semantic markup
 */

import {
  DocumentTree,
  Element,
  byTag,
  findAll,
  findFirst,
  getAttr,
  getChildElements,
  getParentElement,
  getText,
  hasAttr,
  selectAll,
  tagName,
} from '../dom';
import { getStableClasses } from '../selectors';
import { TABLE_HEADER_KEYWORDS } from './field.rules';
import { FieldSelectorMap } from './field.types';

const HEADER_SCAN_ROWS = 3;
const HEADER_CELL_MAX_TEXT = 30;

function closest(element: Element, tag: string): Element | null {
  let current = getParentElement(element);
  while (current) {
    if (tagName(current) === tag) {
      return current;
    }
    current = getParentElement(current);
  }
  return null;
}

function cells(row: Element, tags: string[]): Element[] {
  return getChildElements(row).filter((cell) => tags.includes(tagName(cell)));
}

function findHeaderRow(table: Element, rows: Element[]): Element | null {
  const thead = findFirst(table, byTag('thead'));
  const theadRow = thead ? findFirst(thead, byTag('tr')) : null;
  if (theadRow) {
    return theadRow;
  }

  const withTh = rows.find((row) => cells(row, ['th']).length > 0);
  if (withTh) {
    return withTh;
  }

  // Short text in every cell and at most one link
  return (
    rows.slice(0, HEADER_SCAN_ROWS).find((row) => {
      const rowCells = cells(row, ['td', 'th']);
      return (
        rowCells.length > 0 &&
        rowCells.every((cell) => {
          const text = getText(cell);
          return text !== '' && text.length < HEADER_CELL_MAX_TEXT;
        }) &&
        findAll(row, byTag('a')).length <= 1
      );
    }) ?? null
  );
}

/**
 * Map header keywords to column selectors for table-row items
 */
export function detectByTableHeaders($: DocumentTree, itemSelector: string): FieldSelectorMap {
  const [sample] = selectAll($, itemSelector) ?? [];
  if (!sample || tagName(sample) !== 'tr') {
    return {};
  }

  const table = closest(sample, 'table');
  if (!table) {
    return {};
  }

  const rows = findAll(table, byTag('tr'));
  const headerRow = findHeaderRow(table, rows);
  if (!headerRow) {
    return {};
  }

  const dataRow = rows.find((row) => row !== headerRow && closest(row, 'tbody') !== null);
  if (!dataRow) {
    return {};
  }

  const headerCells = cells(headerRow, ['th', 'td']);
  const dataCells = cells(dataRow, ['td']);
  if (headerCells.length !== dataCells.length) {
    return {};
  }

  const fields: FieldSelectorMap = {};

  headerCells.forEach((headerCell, index) => {
    const headerText = getText(headerCell).toLowerCase();
    if (!headerText) {
      return;
    }

    const match = TABLE_HEADER_KEYWORDS.find(([, keywords]) =>
      keywords.some((keyword) => headerText.includes(keyword))
    );
    if (!match) {
      return;
    }
    const [fieldType] = match;
    if (fieldType in fields) {
      return;
    }

    const dataCell = dataCells[index];
    const [cls] = getStableClasses(dataCell);
    const cellSelector = cls ? `td.${cls}` : `td:nth-child(${index + 1})`;
    const hasLink = findFirst(dataCell, byTag('a')) !== null;

    if (fieldType === 'title') {
      fields.title = hasLink ? `${cellSelector} a` : cellSelector;
    } else if (fieldType === 'url') {
      if (hasLink) {
        fields.url = `${cellSelector} a::attr(href)`;
      }
    } else if (fieldType === 'date') {
      fields.date = findFirst(dataCell, byTag('time')) ? `${cellSelector} time` : cellSelector;
    } else {
      fields[fieldType] = cellSelector;
    }
  });

  return fields;
}

/**
 * Read fields from headings, time, authorship markup and figures
 */
export function detectBySemanticStructure(
  $: DocumentTree,
  itemSelector: string
): FieldSelectorMap {
  const [sample] = selectAll($, itemSelector) ?? [];
  if (!sample) {
    return {};
  }

  const fields: FieldSelectorMap = {};

  for (const tag of ['h1', 'h2', 'h3']) {
    const heading = findFirst(sample, byTag(tag));
    if (heading) {
      if (findFirst(heading, byTag('a'))) {
        fields.title = `${tag} a`;
        fields.url = `${tag} a::attr(href)`;
      } else {
        fields.title = tag;
      }
      break;
    }
  }

  if (findFirst(sample, byTag('time'))) {
    fields.date = 'time';
  }

  const relAuthor = findFirst(
    sample,
    (el) => tagName(el) === 'a' && getAttr(el, 'rel').split(/\s+/).includes('author')
  );
  if (relAuthor) {
    fields.author = "[rel='author']";
  } else if (findFirst(sample, (el) => getAttr(el, 'itemprop') === 'author')) {
    fields.author = "[itemprop='author']";
  }

  const figure = findFirst(sample, byTag('figure'));
  if (findFirst(sample, (el) => tagName(el) === 'img' && getAttr(el, 'itemprop') === 'image')) {
    fields.image = "img[itemprop='image']::attr(src)";
  } else if (figure && findFirst(figure, byTag('img'))) {
    fields.image = 'figure img::attr(src)';
  } else if (findFirst(sample, (el) => tagName(el) === 'img' && hasAttr(el, 'src'))) {
    fields.image = 'img::attr(src)';
  }

  return fields;
}

/**
 * Merge the structural strategies; table headers take precedence
 */
export function applyStructuralStrategies(
  $: DocumentTree,
  itemSelector: string
): FieldSelectorMap {
  const merged: FieldSelectorMap = {};
  for (const strategy of [detectByTableHeaders, detectBySemanticStructure]) {
    for (const [fieldType, selector] of Object.entries(strategy($, itemSelector))) {
      if (!(fieldType in merged)) {
        merged[fieldType] = selector;
      }
    }
  }
  return merged;
}
