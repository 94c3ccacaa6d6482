/**
 * Markdown to Slides text
 *
 * Strips markdown syntax to plain text and records where each style applies,
 * so one insertText followed by range styling reproduces the formatting.
 * Offsets are UTF-16 code units, as the Slides API counts them.
 */

import type { TextStyle } from '../model/styles';
import type { Text } from '../model/text';
import type { JsonObject } from '../model/wire';
import { fixedRange, insertTextRequest } from '../requests/text-requests';
import type { BulletPreset, SlidesRequest } from '../requests/types';

// ============================================================================
// Types
// ============================================================================

export type ParagraphKind = 'plain' | 'header' | 'bullet' | 'numbered' | 'code';

export interface MarkdownParagraph {
  kind: ParagraphKind;
  start: number;
  end: number;
  /** Header level, 1-6. */
  level?: number;
}

export interface StyleSpan {
  start: number;
  end: number;
  /** TextStyle in wire form. */
  style: JsonObject;
}

export interface ParsedMarkdown {
  text: string;
  paragraphs: MarkdownParagraph[];
  spans: StyleSpan[];
}

// ============================================================================
// Constants
// ============================================================================

/** Point sizes for header levels 1-6. */
export const HEADER_SIZES = [36, 28, 24, 20, 18, 16] as const;

const CODE_STYLE: JsonObject = {
  fontFamily: 'Courier New',
  foregroundColor: { opaqueColor: { rgbColor: { red: 0.8, green: 0.2, blue: 0.2 } } },
};

const MARKDOWN_PATTERNS = [
  /^#{1,6}\s+/m,
  /\*\*[^*]+\*\*/,
  /(?<!\*)\*[^*]+\*(?!\*)/,
  /`[^`]+`/,
  /^\s*[-*+]\s+/m,
  /^\s*\d+\.\s+/m,
  /\[[^\]]+\]\([^)]+\)/,
  /~~[^~]+~~/,
  /^\s*>\s+/m,
  /^---+$/m,
];

/** bold | strikethrough | code | link | italic, first match wins. */
const INLINE_PATTERN = /\*\*(.+?)\*\*|~~(.+?)~~|`([^`]+)`|(?<!!)\[([^\]]+)\]\(([^)\s]+)\)|(?<!\*)\*([^*]+)\*(?!\*)/g;

const HEADER_LINE = /^(#{1,6})\s+(.*)$/;
const BULLET_LINE = /^\s*[-*+]\s+(.*)$/;
const NUMBERED_LINE = /^\s*\d+[.)]\s+(.*)$/;
const FENCE_LINE = /^\s*```/;

const BULLET_PRESETS: Record<'bullet' | 'numbered', BulletPreset> = {
  bullet: 'BULLET_DISC_CIRCLE_SQUARE',
  numbered: 'NUMBERED_DIGIT_ALPHA_ROMAN',
};

// ============================================================================
// Public API
// ============================================================================

export function isMarkdown(text: string): boolean {
  if (!text.trim()) return false;
  return MARKDOWN_PATTERNS.some((pattern) => pattern.test(text));
}

/**
 * Plain text with paragraph kinds and style spans. Leading and trailing
 * blank lines are dropped; fenced code blocks keep their lines verbatim.
 */
export function parseInlineMarkdown(markdown: string): ParsedMarkdown {
  const lines = trimBlankLines(markdown.replace(/\r\n?/g, '\n').split('\n'));
  const parsed: ParsedMarkdown = { text: '', paragraphs: [], spans: [] };
  let inFence = false;

  for (const line of lines) {
    if (FENCE_LINE.test(line)) {
      inFence = !inFence;
      continue;
    }
    if (parsed.text.length > 0 || parsed.paragraphs.length > 0) parsed.text += '\n';
    const start = parsed.text.length;

    if (inFence) {
      parsed.text += line;
      parsed.paragraphs.push({ kind: 'code', start, end: parsed.text.length });
      if (line.length > 0) parsed.spans.push({ start, end: parsed.text.length, style: CODE_STYLE });
      continue;
    }

    const header = HEADER_LINE.exec(line);
    const bullet = header ? null : BULLET_LINE.exec(line);
    const numbered = header || bullet ? null : NUMBERED_LINE.exec(line);

    let kind: ParagraphKind = 'plain';
    let source = line;
    if (header) {
      kind = 'header';
      source = header[2] ?? '';
    } else if (bullet) {
      kind = 'bullet';
      source = bullet[1] ?? '';
    } else if (numbered) {
      kind = 'numbered';
      source = numbered[1] ?? '';
    }

    const lineSpans: StyleSpan[] = [];
    parsed.text += parseInline(source, start, lineSpans);
    const end = parsed.text.length;

    const paragraph: MarkdownParagraph = { kind, start, end };
    if (header) {
      const level = (header[1] ?? '#').length;
      paragraph.level = level;
      if (end > start) {
        parsed.spans.push({
          start,
          end,
          style: { fontSize: { magnitude: HEADER_SIZES[level - 1] ?? 16, unit: 'PT' }, bold: true },
        });
      }
    }
    parsed.paragraphs.push(paragraph);
    parsed.spans.push(...lineSpans);
  }

  return parsed;
}

/**
 * Inserts the stripped text at index 0 of `objectId`, then styles it and
 * turns list lines into bullets. Empty markdown yields no requests.
 */
export function markdownTextRequests(objectId: string, markdown: string): SlidesRequest[] {
  const parsed = parseInlineMarkdown(markdown);
  if (!parsed.text) return [];

  const requests: SlidesRequest[] = [insertTextRequest(objectId, parsed.text, 0)];
  for (const span of parsed.spans) {
    requests.push({
      updateTextStyle: {
        objectId,
        style: span.style,
        textRange: fixedRange(span.start, span.end),
        fields: Object.keys(span.style).join(','),
      },
    });
  }

  for (const list of listRuns(parsed.paragraphs)) {
    requests.push({
      createParagraphBullets: {
        objectId,
        textRange: fixedRange(list.start, list.end),
        bulletPreset: BULLET_PRESETS[list.kind],
      },
    });
  }
  return requests;
}

/**
 * Markdown for a text body: each run through `styleToMarkdown`, a newline
 * for a paragraph marker unless the output already ends with one. Auto text
 * is dropped.
 */
export function slidesTextToMarkdown(text: Text | undefined): string {
  let markdown = '';
  for (const element of text?.textElements ?? []) {
    const { content } = element;
    if (content.kind === 'textRun') {
      markdown += styleToMarkdown(content.textRun.content ?? '', content.textRun.style);
    } else if (content.kind === 'paragraphMarker' && markdown.length > 0 && !markdown.endsWith('\n')) {
      markdown += '\n';
    }
  }
  return markdown;
}

/**
 * Wraps one run in markdown markers. Font sizes at or above a header size
 * become that header level; Courier fonts become inline code. Trailing
 * newlines stay outside the markers.
 */
export function styleToMarkdown(content: string, style: TextStyle | undefined): string {
  if (!content) return content;
  const trailing = /\n*$/.exec(content)?.[0] ?? '';
  let text = content.slice(0, content.length - trailing.length);
  if (!style) return content;

  const size = style.fontSize?.magnitude;
  if (size !== undefined) {
    const level = HEADER_SIZES.findIndex((headerSize) => size >= headerSize);
    if (level >= 0) text = `${'#'.repeat(level + 1)} ${text}`;
  }
  if (style.fontFamily?.toLowerCase().includes('courier')) text = `\`${text}\``;

  if (style.bold && style.italic) text = `***${text}***`;
  else if (style.bold) text = `**${text}**`;
  else if (style.italic) text = `*${text}*`;
  if (style.strikethrough) text = `~~${text}~~`;

  return text + trailing;
}

// ============================================================================
// Internal Helpers
// ============================================================================

/** Appends spans for `source` (placed at `offset`) to `spans`; returns the stripped text. */
function parseInline(source: string, offset: number, spans: StyleSpan[]): string {
  let out = '';
  let last = 0;

  for (const match of source.matchAll(INLINE_PATTERN)) {
    const index = match.index ?? 0;
    out += source.slice(last, index);
    last = index + match[0].length;
    const start = offset + out.length;

    const groups: (string | undefined)[] = [...match];
    const [, bold, strike, code, linkText, linkUrl, italic] = groups;

    if (code !== undefined) {
      out += code;
      spans.push({ start, end: offset + out.length, style: CODE_STYLE });
      continue;
    }

    let style: JsonObject;
    let inner: string;
    if (bold !== undefined) {
      style = { bold: true };
      inner = bold;
    } else if (strike !== undefined) {
      style = { strikethrough: true };
      inner = strike;
    } else if (linkText !== undefined && linkUrl !== undefined) {
      style = { link: { url: linkUrl } };
      inner = linkText;
    } else {
      style = { italic: true };
      inner = italic ?? '';
    }

    const nested: StyleSpan[] = [];
    out += parseInline(inner, start, nested);
    spans.push({ start, end: offset + out.length, style }, ...nested);
  }

  return out + source.slice(last);
}

interface ListRun {
  kind: 'bullet' | 'numbered';
  start: number;
  end: number;
}

function trimBlankLines(lines: string[]): string[] {
  let first = 0;
  let last = lines.length;
  while (first < last && !lines[first]?.trim()) first++;
  while (last > first && !lines[last - 1]?.trim()) last--;
  return lines.slice(first, last);
}

/** Consecutive bullet or numbered paragraphs of the same kind. */
function listRuns(paragraphs: readonly MarkdownParagraph[]): ListRun[] {
  const runs: ListRun[] = [];
  let current: ListRun | undefined;

  for (const paragraph of paragraphs) {
    const { kind } = paragraph;
    if (kind !== 'bullet' && kind !== 'numbered') {
      current = undefined;
      continue;
    }
    if (current && current.kind === kind) {
      current.end = paragraph.end;
    } else {
      current = { kind, start: paragraph.start, end: paragraph.end };
      runs.push(current);
    }
  }
  return runs;
}
