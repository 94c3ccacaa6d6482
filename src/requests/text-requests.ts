/**
 * Text insertion and styling for a shape body.
 *
 * Runs are inserted in ascending original `startIndex` order at a running
 * cursor, so every request in the sequence addresses the text as it stands
 * after the requests before it.
 */

import { InvalidTextRangeError } from '../errors';
import { encodeParagraphStyle, encodeTextStyle, type ParagraphStyle, type TextStyle } from '../model/styles';
import type { Text } from '../model/text';
import { fieldMask, isEmptyPayload, prepareUpdatePayload } from './field-mask';
import type { RequestOf, SlidesRequest, TableCellLocation, TextRange } from './types';

interface RunPlacement {
  /** Offset in the source text body. */
  sourceStart: number;
  /** Offset after insertion. */
  targetStart: number;
  length: number;
}

interface PendingRun {
  start: number;
  content: string;
  style?: TextStyle;
}

interface PendingMarker {
  start: number;
  end: number;
  style: ParagraphStyle;
}

// ============================================================================
// Public API
// ============================================================================

/**
 * insertText + updateTextStyle per run, then updateParagraphStyle per styled
 * paragraph marker. Bullets and auto text are not recreated.
 *
 * @throws InvalidTextRangeError on negative, overlapping or mis-sized runs
 */
export function shapeTextRequests(objectId: string, text: Text | undefined): SlidesRequest[] {
  if (!text?.textElements) return [];

  const runs: PendingRun[] = [];
  const markers: PendingMarker[] = [];
  for (const element of text.textElements) {
    const start = element.startIndex ?? 0;
    const { content } = element;
    if (content.kind === 'textRun') {
      const run: PendingRun = { start, content: content.textRun.content ?? '' };
      if (content.textRun.style) run.style = content.textRun.style;
      if (element.endIndex !== undefined && element.endIndex - start !== run.content.length) {
        throw new InvalidTextRangeError('Text run length does not match its content', start, element.endIndex);
      }
      runs.push(run);
    } else if (content.kind === 'paragraphMarker' && content.paragraphMarker.style) {
      markers.push({ start, end: element.endIndex ?? start, style: content.paragraphMarker.style });
    }
  }

  runs.sort((a, b) => a.start - b.start);

  const requests: SlidesRequest[] = [];
  const placements: RunPlacement[] = [];
  let cursor = 0;
  let previousEnd = 0;

  for (const run of runs) {
    const end = run.start + run.content.length;
    if (run.start < 0) {
      throw new InvalidTextRangeError('Text run starts before the text body', run.start, end);
    }
    if (run.start < previousEnd) {
      throw new InvalidTextRangeError('Text run overlaps the previous run', run.start, end);
    }
    previousEnd = end;
    if (run.content.length === 0) continue;

    requests.push(insertTextRequest(objectId, run.content, cursor));
    if (run.style) {
      const style = prepareUpdatePayload(encodeTextStyle(run.style));
      if (!isEmptyPayload(style)) {
        requests.push({
          updateTextStyle: {
            objectId,
            style,
            textRange: fixedRange(cursor, cursor + run.content.length),
            fields: fieldMask(style),
          },
        });
      }
    }
    placements.push({ sourceStart: run.start, targetStart: cursor, length: run.content.length });
    cursor += run.content.length;
  }

  for (const marker of markers) {
    const style = prepareUpdatePayload(encodeParagraphStyle(marker.style));
    if (isEmptyPayload(style)) continue;
    const start = mapIndex(placements, marker.start, cursor);
    const end = mapIndex(placements, marker.end, cursor);
    if (end <= start) continue;
    requests.push({
      updateParagraphStyle: {
        objectId,
        style,
        textRange: fixedRange(start, end),
        fields: fieldMask(style),
      },
    });
  }

  return requests;
}

export function insertTextRequest(
  objectId: string,
  text: string,
  insertionIndex = 0,
  cellLocation?: TableCellLocation
): RequestOf<'insertText'> {
  if (cellLocation) return { insertText: { objectId, cellLocation, text, insertionIndex } };
  return { insertText: { objectId, text, insertionIndex } };
}

/** Deletes the whole text body, or one table cell's text. */
export function deleteAllTextRequest(objectId: string, cellLocation?: TableCellLocation): RequestOf<'deleteText'> {
  const textRange: TextRange = { type: 'ALL' };
  if (cellLocation) return { deleteText: { objectId, cellLocation, textRange } };
  return { deleteText: { objectId, textRange } };
}

export function fixedRange(startIndex: number, endIndex: number): TextRange {
  return { type: 'FIXED_RANGE', startIndex, endIndex };
}

// ============================================================================
// Internal Helpers
// ============================================================================

/** Source offset to inserted offset, clamped to the run it falls in and to the text length. */
function mapIndex(placements: readonly RunPlacement[], index: number, textLength: number): number {
  let mapped = 0;
  for (const placement of placements) {
    if (placement.sourceStart > index) break;
    const offset = Math.min(index - placement.sourceStart, placement.length);
    mapped = placement.targetStart + offset;
  }
  return Math.min(Math.max(mapped, 0), textLength);
}
