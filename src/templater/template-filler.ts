/**
 * Template Filling
 *
 * Replaces `{{name}}` placeholders with values. Text values go through
 * replaceAllText; image URLs replace image elements whose title or
 * description carries the placeholder and become `[Image: name]` elsewhere.
 * Records and lists fill the cells of tables that carry the placeholder.
 */

import { findPageElement, type Table } from '../model/elements';
import type { Presentation } from '../model/presentation';
import { replaceAllTextRequest, replaceImageRequest } from '../requests/object-requests';
import { deleteAllTextRequest, insertTextRequest } from '../requests/text-requests';
import type { SlidesRequest } from '../requests/types';
import { copyPresentation, getPresentation } from '../services/presentation-service';
import type { BatchUpdateResponse, SlidesConnection } from '../services/slides-client';
import { safeLog } from '../utils/log-sanitizer';
import {
  findPlaceholders,
  isImageUrl,
  placeholderToken,
  tableCellText,
  type PlaceholderOccurrence,
} from './placeholders';

// ============================================================================
// Types
// ============================================================================

export type TemplateValue = string | number | boolean;

export type TableRowData = TemplateValue | Record<string, TemplateValue>;

/**
 * A record fills a header row and a value row. A list of records fills a
 * header row from the first record's keys, then one row per record. Any
 * other list runs down the first column, or row by row when it is longer
 * than the table.
 */
export type TableData = Record<string, TemplateValue> | readonly TableRowData[];

export type TemplateData = Record<string, TemplateValue | TableData>;

export interface FillPlan {
  requests: SlidesRequest[];
  /** Placeholders with a value, in order of first appearance. */
  filled: string[];
  /** Placeholders present in the presentation but absent from the data. */
  missing: string[];
  /** Data keys with no placeholder in the presentation. */
  unused: string[];
}

export interface FillResult extends FillPlan {
  /** Absent when there was nothing to send. */
  response?: BatchUpdateResponse;
}

// ============================================================================
// Public API
// ============================================================================

export function buildFillRequests(presentation: Presentation, data: TemplateData): FillPlan {
  const placeholders = findPlaceholders(presentation);
  const plan: FillPlan = { requests: [], filled: [], missing: [], unused: [] };

  for (const [name, occurrences] of placeholders) {
    if (!Object.hasOwn(data, name)) {
      plan.missing.push(name);
      continue;
    }
    plan.filled.push(name);
    const value = data[name];
    const token = placeholderToken(name);

    if (typeof value === 'object') {
      let textOccurrences = 0;
      for (const occurrence of occurrences) {
        const table = occurrence.elementKind === 'table' ? tableAt(presentation, occurrence) : undefined;
        if (table) {
          plan.requests.push(...tableFillRequests(occurrence.elementId, table, value));
        } else {
          textOccurrences++;
        }
      }
      if (textOccurrences > 0) {
        plan.requests.push(replaceAllTextRequest(token, JSON.stringify(value), { matchCase: true }));
      }
    } else if (typeof value === 'string' && isImageUrl(value)) {
      let textOccurrences = 0;
      for (const occurrence of occurrences) {
        if (occurrence.elementKind === 'image') {
          plan.requests.push(replaceImageRequest(occurrence.elementId, value));
        } else {
          textOccurrences++;
        }
      }
      if (textOccurrences > 0) {
        plan.requests.push(replaceAllTextRequest(token, `[Image: ${name}]`, { matchCase: true }));
      }
    } else {
      plan.requests.push(replaceAllTextRequest(token, String(value), { matchCase: true }));
    }
  }

  plan.unused = Object.keys(data).filter((key) => !placeholders.has(key));
  return plan;
}

/**
 * deleteText and insertText per written cell. Cells outside the table's
 * rows and columns are skipped; a table without rows or columns gets no
 * requests.
 */
export function tableFillRequests(objectId: string, table: Table, data: TableData): SlidesRequest[] {
  const rows = table.rows ?? table.tableRows?.length ?? 0;
  const columns = table.columns ?? 0;
  if (rows === 0 || columns === 0) {
    safeLog.warn('[Templater] Table has no rows or columns', { objectId });
    return [];
  }

  const requests: SlidesRequest[] = [];
  const setCell = (rowIndex: number, columnIndex: number, value: TableRowData): void => {
    if (rowIndex >= rows || columnIndex >= columns) return;
    const cellLocation = { rowIndex, columnIndex };
    if (tableCellText(table, rowIndex, columnIndex).length > 0) {
      requests.push(deleteAllTextRequest(objectId, cellLocation));
    }
    const text = cellString(value);
    if (text.length > 0) requests.push(insertTextRequest(objectId, text, 0, cellLocation));
  };

  if (!isTableList(data)) {
    Object.keys(data)
      .slice(0, columns)
      .forEach((key, column) => {
        setCell(0, column, key);
        setCell(1, column, data[key]);
      });
    return requests;
  }

  if (data.length === 0) return requests;
  const records = data.filter(isRowRecord);
  const [first] = records;

  if (first !== undefined && records.length === data.length) {
    const headers = Object.keys(first).slice(0, columns);
    headers.forEach((header, column) => setCell(0, column, header));
    records.slice(0, rows - 1).forEach((record, row) => {
      headers.forEach((header, column) => {
        if (Object.hasOwn(record, header)) setCell(row + 1, column, record[header]);
      });
    });
  } else if (data.length <= rows) {
    data.forEach((item, row) => setCell(row, 0, item));
  } else {
    data.slice(0, rows * columns).forEach((item, index) => {
      setCell(Math.floor(index / columns), index % columns, item);
    });
  }
  return requests;
}

/**
 * Fetches the presentation, fills it in one batch and reports what was
 * missing or unused.
 */
export async function fillTemplate(
  conn: SlidesConnection,
  presentationId: string,
  data: TemplateData
): Promise<FillResult> {
  const presentation = await getPresentation(conn, presentationId);
  const plan = buildFillRequests(presentation, data);

  if (plan.missing.length > 0) {
    safeLog.warn('[Templater] Placeholders without a value', { presentationId, missing: plan.missing });
  }
  if (plan.unused.length > 0) {
    safeLog.debug('[Templater] Values without a placeholder', { presentationId, unused: plan.unused });
  }
  if (plan.requests.length === 0) {
    return plan;
  }

  const response = await conn.batchUpdate(presentationId, plan.requests);
  safeLog.info('[Templater] Filled template', { presentationId, filled: plan.filled.length });
  return { ...plan, response };
}

/** Drive copy of a template, titled "From template: <title>" unless a title is given. */
export async function createFromTemplate(
  conn: SlidesConnection,
  templateId: string,
  title?: string
): Promise<Presentation> {
  let name = title;
  if (!name) {
    const template = await getPresentation(conn, templateId);
    name = `From template: ${template.title ?? templateId}`;
  }
  return copyPresentation(conn, templateId, name);
}

// ============================================================================
// Internal Helpers
// ============================================================================

function isTableList(data: TableData): data is readonly TableRowData[] {
  return Array.isArray(data);
}

function isRowRecord(value: TableRowData): value is Record<string, TemplateValue> {
  return typeof value === 'object';
}

function cellString(value: TableRowData): string {
  return typeof value === 'object' ? JSON.stringify(value) : String(value);
}

function tableAt(presentation: Presentation, occurrence: PlaceholderOccurrence): Table | undefined {
  const slide = presentation.slides?.find((page) => page.objectId === occurrence.slideId);
  const element = findPageElement(slide?.pageElements, occurrence.elementId);
  return element?.content.kind === 'table' ? element.content.table : undefined;
}
