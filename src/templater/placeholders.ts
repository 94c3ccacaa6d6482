/**
 * `{{name}}` placeholders in presentation text.
 */

import { shapeText, type PageElement, type PageElementKind, type Table } from '../model/elements';
import type { Presentation } from '../model/presentation';
import { plainText } from '../model/text';
import type { JsonValue } from '../model/wire';
import { isJsonObject } from '../requests/field-mask';

// ============================================================================
// Types
// ============================================================================

export interface PlaceholderOccurrence {
  slideId: string;
  elementId: string;
  elementKind: PageElementKind;
}

export interface TableCellText {
  rowIndex: number;
  columnIndex: number;
  text: string;
}

// ============================================================================
// Constants
// ============================================================================

const PLACEHOLDER_PATTERN = /\{\{([^{}]+)\}\}/g;

const URL_PATTERN = /^https?:\/\/(?:[A-Z0-9](?:[A-Z0-9-]{0,61}[A-Z0-9])?\.)+[A-Z]{2,63}\.?(?:\/?|[/?]\S+)$/i;

const IMAGE_EXTENSIONS = ['.jpg', '.jpeg', '.png', '.gif', '.bmp', '.webp', '.svg'];

// ============================================================================
// Public API
// ============================================================================

/** Placeholder names in order of first appearance, without duplicates. */
export function extractPlaceholders(text: string): string[] {
  const names = new Set<string>();
  for (const match of text.matchAll(PLACEHOLDER_PATTERN)) {
    const name = match[1];
    if (name !== undefined) names.add(name);
  }
  return [...names];
}

export function placeholderToken(name: string): string {
  return `{{${name}}}`;
}

/**
 * Every placeholder on the presentation's slides, keyed by name. Searches
 * shape text, table cells and element titles and descriptions, including
 * elements inside groups.
 */
export function findPlaceholders(presentation: Presentation): Map<string, PlaceholderOccurrence[]> {
  const found = new Map<string, PlaceholderOccurrence[]>();

  const visit = (slideId: string, element: PageElement): void => {
    const { content } = element;
    if (content.kind === 'elementGroup') {
      for (const child of content.elementGroup.children ?? []) visit(slideId, child);
      return;
    }
    if (element.objectId === undefined) return;

    for (const name of extractPlaceholders(elementText(element))) {
      const occurrences = found.get(name) ?? [];
      occurrences.push({ slideId, elementId: element.objectId, elementKind: content.kind });
      found.set(name, occurrences);
    }
  };

  for (const slide of presentation.slides ?? []) {
    if (slide.objectId === undefined) continue;
    for (const element of slide.pageElements ?? []) visit(slide.objectId, element);
  }
  return found;
}

/** An http(s) URL whose path ends in a common image extension. */
export function isImageUrl(value: string): boolean {
  if (!URL_PATTERN.test(value)) return false;
  const path = value.toLowerCase().split(/[?#]/, 1)[0] ?? '';
  return IMAGE_EXTENSIONS.some((extension) => path.endsWith(extension));
}

/** Title, description and text content of an element, one per line, skipping empty parts. */
export function elementText(element: PageElement): string {
  const parts = [element.title ?? '', element.description ?? ''];
  const { content } = element;
  if (content.kind === 'shape') {
    parts.push(plainText(shapeText(element)));
  } else if (content.kind === 'table') {
    for (const row of content.table.tableRows ?? []) parts.push(jsonTextContent(row));
  }
  return parts.filter((part) => part.length > 0).join('\n');
}

/** Text of every cell that has a `text` body, row by row. */
export function tableCells(table: Table): TableCellText[] {
  const cells: TableCellText[] = [];
  (table.tableRows ?? []).forEach((row, rowIndex) => {
    const rowCells = isJsonObject(row) ? row.tableCells : undefined;
    if (!Array.isArray(rowCells)) return;
    rowCells.forEach((cell, columnIndex) => {
      if (isJsonObject(cell) && cell.text !== undefined) {
        cells.push({ rowIndex, columnIndex, text: jsonTextContent(cell.text) });
      }
    });
  });
  return cells;
}

export function tableCellText(table: Table, rowIndex: number, columnIndex: number): string {
  const cell = tableCells(table).find((c) => c.rowIndex === rowIndex && c.columnIndex === columnIndex);
  return cell?.text ?? '';
}

// ============================================================================
// Internal Helpers
// ============================================================================

/** Concatenates every `content` string in raw table JSON. */
function jsonTextContent(value: JsonValue): string {
  if (Array.isArray(value)) return value.map(jsonTextContent).join('');
  if (value === null || typeof value !== 'object') return '';
  let text = '';
  for (const [key, nested] of Object.entries(value)) {
    text += key === 'content' && typeof nested === 'string' ? nested : jsonTextContent(nested);
  }
  return text;
}
