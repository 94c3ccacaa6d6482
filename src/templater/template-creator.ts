/**
 * Template Authoring
 *
 * Turns an ordinary presentation into a template: finds text worth
 * replacing, swaps it for `{{name}}` placeholders, tags elements by role and
 * records which elements a template config fills.
 */

import { findPageElement, shapeText, type PageElement } from '../model/elements';
import type { Presentation } from '../model/presentation';
import type { Text } from '../model/text';
import { pageElementPropertiesRequest } from '../requests/element-requests';
import { replaceAllTextRequest, replaceImageRequest } from '../requests/object-requests';
import { deleteAllTextRequest } from '../requests/text-requests';
import type { SlidesRequest } from '../requests/types';
import { copyPresentation, getPresentation } from '../services/presentation-service';
import type { BatchUpdateResponse, SlidesConnection } from '../services/slides-client';
import { safeLog } from '../utils/log-sanitizer';
import { markdownTextRequests, slidesTextToMarkdown } from './markdown-text';
import { elementText, findPlaceholders, placeholderToken, tableCells } from './placeholders';

// ============================================================================
// Types
// ============================================================================

export type TemplateElementType = 'text' | 'image' | 'table' | 'video' | 'unknown';

export interface TemplateElementInfo {
  elementId: string;
  placeholderName: string;
  elementType: TemplateElementType;
  /** Text with size, font and colour kept as HTML comments, or the image URL. */
  originalContent: string;
  markdownContent: string;
}

export interface TemplateSlideInfo {
  slideId: string;
  slideIndex: number;
  replaceableElements: TemplateElementInfo[];
}

export interface TemplatePlaceholderInfo {
  type: TemplateElementType;
  slideIndex: number;
  description: string;
  example: string;
  originalExample: string;
}

export interface TemplateConfig {
  name: string;
  sourcePresentationId: string;
  title: string;
  createdAt: string;
  /** Only slides with at least one replaceable element. */
  slides: TemplateSlideInfo[];
  placeholders: Record<string, TemplatePlaceholderInfo>;
}

export interface TemplateManifest {
  templateId: string;
  title: string;
  slides: { slideId: string; index: number }[];
  placeholders: Record<string, { slideId: string; elementId: string; context: string }[]>;
}

export interface MarkPlan {
  requests: SlidesRequest[];
  /** Element ids not found on any slide. */
  notFound: string[];
}

/** Candidate texts per category, plus `other` for text no pattern matched. */
export type PotentialPlaceholders = Record<string, string[]>;

// ============================================================================
// Constants
// ============================================================================

const CANDIDATE_PATTERNS: Record<string, RegExp[]> = {
  company_name: [/[A-Z][a-z]+ (Corporation|Corp|Inc|LLC|Ltd)/g, /[A-Z][A-Z]+ (CORPORATION|CORP|INC|LLC|LTD)/g],
  person_name: [/[A-Z][a-z]+ [A-Z][a-z]+/g, /[A-Z]\. [A-Z][a-z]+/g],
  date: [
    /\d{1,2}\/\d{1,2}\/\d{2,4}/g,
    /\d{1,2}-\d{1,2}-\d{2,4}/g,
    /(Jan|Feb|Mar|Apr|May|Jun|Jul|Aug|Sep|Oct|Nov|Dec)\s+\d{1,2},\s+\d{4}/g,
  ],
  number: [/\$\d+([,.]\d+)*[KMB]?/g, /\d+([,.]\d+)*[KMB]?/g],
  email: [/[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g],
  website: [/(www\.)?[a-zA-Z0-9-]+\.[a-zA-Z]{2,}(\.[a-zA-Z]{2,})?/g],
  phone: [/\+?\d{1,3}[-.\s]?\(?\d{1,4}\)?[-.\s]?\d{1,4}[-.\s]?\d{1,4}/g],
};

const OTHER = 'other';
const MAX_NAME_LENGTH = 30;
const CONTEXT_LENGTH = 100;

const PLACEHOLDER_DESCRIPTIONS: Record<TemplateElementType, string> = {
  text: 'Text content (supports Markdown and HTML comments)',
  image: 'Image URL (must be publicly accessible)',
  table: 'Table data (list of rows or dictionary)',
  video: 'Video URL',
  unknown: 'Unknown type content',
};

// ============================================================================
// Finding candidates
// ============================================================================

/**
 * Text in shapes and table cells that looks like a company, person, date,
 * number, email, website or phone number. Text matching none of them is
 * listed whole under `other`. Categories without matches are left out.
 */
export function identifyPotentialPlaceholders(presentation: Presentation): PotentialPlaceholders {
  const matches = new Map<string, Set<string>>();
  const other = new Set<string>();

  const classify = (text: string): void => {
    if (!text.trim()) return;
    let matched = false;
    for (const [category, patterns] of Object.entries(CANDIDATE_PATTERNS)) {
      for (const pattern of patterns) {
        for (const match of text.matchAll(pattern)) {
          const found = matches.get(category) ?? new Set<string>();
          found.add(match[0]);
          matches.set(category, found);
          matched = true;
        }
      }
    }
    if (!matched) other.add(text.trim());
  };

  for (const slide of presentation.slides ?? []) {
    for (const element of slide.pageElements ?? []) {
      const { content } = element;
      if (content.kind === 'shape' && content.shape.text) {
        classify(runText(content.shape.text));
      } else if (content.kind === 'table') {
        for (const cell of tableCells(content.table)) classify(cell.text);
      }
    }
  }

  const result: PotentialPlaceholders = {};
  for (const category of Object.keys(CANDIDATE_PATTERNS)) {
    const found = matches.get(category);
    if (found) result[category] = [...found];
  }
  if (other.size > 0) result[OTHER] = [...other];
  return result;
}

/**
 * Original text to placeholder name. A category with one text uses the
 * category name, otherwise a 1-based suffix; `other` texts are named after
 * themselves. A text found in several categories keeps the last name.
 */
export function suggestReplacements(potential: PotentialPlaceholders): Record<string, string> {
  const suggestions: Record<string, string> = {};
  for (const [category, texts] of Object.entries(potential)) {
    texts.forEach((text, index) => {
      if (category === OTHER) {
        suggestions[text] = textToPlaceholderName(text);
      } else {
        suggestions[text] = texts.length === 1 ? category : `${category}_${index + 1}`;
      }
    });
  }
  return suggestions;
}

/**
 * Lower-case, underscores for spaces, `[a-z0-9_]` only, no leading digit,
 * at most 30 characters; `placeholder` when nothing is left.
 */
export function textToPlaceholderName(text: string): string {
  let name = text.toLowerCase().replaceAll(' ', '_').replace(/[^a-z0-9_]/g, '');
  if (/^\d/.test(name)) name = `n${name}`;
  name = name.slice(0, MAX_NAME_LENGTH);
  return name || 'placeholder';
}

/** One case-sensitive replaceAllText per original text. */
export function replaceTextWithPlaceholders(replacements: Record<string, string>): SlidesRequest[] {
  return Object.entries(replacements).map(([original, name]) =>
    replaceAllTextRequest(original, placeholderToken(name), { matchCase: true })
  );
}

/**
 * Sets the description of each listed element to `template:<role>`, so a
 * filler can find elements by role.
 */
export function markTemplateElements(presentation: Presentation, roles: Record<string, string[]>): MarkPlan {
  const plan: MarkPlan = { requests: [], notFound: [] };
  for (const [role, elementIds] of Object.entries(roles)) {
    for (const elementId of elementIds) {
      const found = (presentation.slides ?? []).some((slide) => findPageElement(slide.pageElements, elementId));
      if (!found) {
        plan.notFound.push(elementId);
        continue;
      }
      const request = pageElementPropertiesRequest({ description: `template:${role}` }, elementId);
      if (request) plan.requests.push(request);
    }
  }
  return plan;
}

/** Slides and placeholder occurrences with up to 100 characters of surrounding text. */
export function buildTemplateManifest(presentation: Presentation): TemplateManifest {
  const slides = (presentation.slides ?? []).map((slide, index) => ({ slideId: slide.objectId ?? '', index }));
  const placeholders: TemplateManifest['placeholders'] = {};

  for (const [name, occurrences] of findPlaceholders(presentation)) {
    placeholders[name] = occurrences.map(({ slideId, elementId }) => {
      const slide = presentation.slides?.find((page) => page.objectId === slideId);
      const element = findPageElement(slide?.pageElements, elementId);
      const text = element ? elementText(element) : '';
      const context = text.length > CONTEXT_LENGTH ? `${text.slice(0, CONTEXT_LENGTH)}...` : text;
      return { slideId, elementId, context };
    });
  }

  return { templateId: presentation.presentationId ?? '', title: presentation.title ?? '', slides, placeholders };
}

// ============================================================================
// Template config
// ============================================================================

export function templateElementType(element: PageElement): TemplateElementType {
  switch (element.content.kind) {
    case 'image':
      return 'image';
    case 'shape':
      return 'text';
    case 'table':
      return 'table';
    case 'video':
      return 'video';
    default:
      return 'unknown';
  }
}

/** Images, tables, and shapes with a text run longer than one character once trimmed. */
export function isReplaceableElement(element: PageElement): boolean {
  const { content } = element;
  if (content.kind === 'image' || content.kind === 'table') return true;
  if (content.kind !== 'shape') return false;
  return (content.shape.text?.textElements ?? []).some(
    ({ content: run }) => run.kind === 'textRun' && (run.textRun.content ?? '').trim().length > 1
  );
}

/**
 * The first two words of a text element when the first is longer than two
 * characters, else `slide_<n>_<type>_<counter>` with a 1-based slide number.
 */
export function generatePlaceholderName(element: PageElement, slideIndex: number, counter: number): string {
  const type = templateElementType(element);
  if (type === 'text') {
    const clean = styledText(shapeText(element))
      .replace(/[#*`~[\]()]+/g, '')
      .replace(/<[^>]+>/g, '');
    const words = (clean.toLowerCase().match(/[\p{L}\p{N}_]+/gu) ?? []).slice(0, 2);
    const [first] = words;
    if (first !== undefined && first.length > 2) return words.join('_');
  }
  return `slide_${slideIndex + 1}_${type}_${counter}`;
}

/**
 * One placeholder per replaceable element, numbered across the deck. A name
 * already taken gets the counter appended.
 */
export function buildTemplateConfig(
  presentation: Presentation,
  name: string,
  createdAt: string = new Date().toISOString()
): TemplateConfig {
  const config: TemplateConfig = {
    name,
    sourcePresentationId: presentation.presentationId ?? '',
    title: presentation.title ?? 'Untitled',
    createdAt,
    slides: [],
    placeholders: {},
  };
  let counter = 1;

  (presentation.slides ?? []).forEach((slide, slideIndex) => {
    const slideInfo: TemplateSlideInfo = { slideId: slide.objectId ?? '', slideIndex, replaceableElements: [] };

    for (const element of slide.pageElements ?? []) {
      if (element.objectId === undefined || !isReplaceableElement(element)) continue;

      let placeholderName = generatePlaceholderName(element, slideIndex, counter);
      if (Object.hasOwn(config.placeholders, placeholderName)) placeholderName = `${placeholderName}_${counter}`;

      const elementType = templateElementType(element);
      const originalContent = extractContent(element);
      const markdownContent = elementMarkdown(element, originalContent);

      slideInfo.replaceableElements.push({
        elementId: element.objectId,
        placeholderName,
        elementType,
        originalContent,
        markdownContent,
      });
      config.placeholders[placeholderName] = {
        type: elementType,
        slideIndex,
        description: PLACEHOLDER_DESCRIPTIONS[elementType],
        example: markdownContent,
        originalExample: originalContent,
      };
      counter++;
    }

    if (slideInfo.replaceableElements.length > 0) config.slides.push(slideInfo);
  });

  return config;
}

/**
 * Requests that write `data` into a copy of the config's source deck.
 * Non-blank text replaces the element's text as markdown; an http(s) string
 * replaces an image. Other values and element types are skipped.
 */
export function templateConfigRequests(config: TemplateConfig, data: Record<string, unknown>): SlidesRequest[] {
  const requests: SlidesRequest[] = [];
  for (const slide of config.slides) {
    for (const element of slide.replaceableElements) {
      if (!Object.hasOwn(data, element.placeholderName)) continue;
      const value = data[element.placeholderName];
      if (typeof value !== 'string') continue;

      if (element.elementType === 'text' && value.trim()) {
        requests.push(deleteAllTextRequest(element.elementId), ...markdownTextRequests(element.elementId, value));
      } else if (element.elementType === 'image' && /^https?:\/\//.test(value)) {
        requests.push(replaceImageRequest(element.elementId, value));
      }
    }
  }
  return requests;
}

export async function createTemplate(
  conn: SlidesConnection,
  presentationId: string,
  name: string
): Promise<TemplateConfig> {
  const presentation = await getPresentation(conn, presentationId);
  const config = buildTemplateConfig(presentation, name);
  safeLog.info('[Templater] Created template config', {
    presentationId,
    placeholders: Object.keys(config.placeholders).length,
  });
  return config;
}

export interface ApplyTemplateResult {
  presentationId: string;
  requests: SlidesRequest[];
  /** Absent when there was nothing to send. */
  response?: BatchUpdateResponse;
}

/** Copies the source deck, then writes `data` into the copy in one batch. */
export async function applyTemplate(
  conn: SlidesConnection,
  config: TemplateConfig,
  data: Record<string, unknown>,
  title?: string
): Promise<ApplyTemplateResult> {
  const copy = await copyPresentation(
    conn,
    config.sourcePresentationId,
    title || `Copy of ${config.title} - ${new Date().toISOString()}`
  );
  const presentationId = copy.presentationId ?? '';
  const requests = templateConfigRequests(config, data);
  if (requests.length === 0) return { presentationId, requests };

  const response = await conn.batchUpdate(presentationId, requests);
  safeLog.info('[Templater] Applied template', { presentationId, requests: requests.length });
  return { presentationId, requests, response };
}

// ============================================================================
// Internal Helpers
// ============================================================================

function runText(text: Text): string {
  let result = '';
  for (const { content } of text.textElements ?? []) {
    if (content.kind === 'textRun') result += content.textRun.content ?? '';
  }
  return result;
}

/** Run text with font size, family and colour kept as HTML comments, trimmed. */
function styledText(text: Text | undefined): string {
  let result = '';
  for (const { content } of text?.textElements ?? []) {
    if (content.kind !== 'textRun') continue;
    const raw = content.textRun.content ?? '';
    const style = content.textRun.style;
    const trailing = /\n*$/.exec(raw)?.[0] ?? '';
    let run = raw.slice(0, raw.length - trailing.length);

    if (run && style) {
      if (style.fontSize) run = `<!-- size:${Math.trunc(style.fontSize.magnitude ?? 12)} -->${run}<!-- /size -->`;
      if (style.fontFamily) run = `<!-- font:${style.fontFamily.toLowerCase()} -->${run}<!-- /font -->`;
      if (style.foregroundColor) run = `<!-- color:default -->${run}<!-- /color -->`;
    }
    result += run + trailing;
  }
  return result.trim();
}

function imageUrl(element: PageElement): string {
  const { content } = element;
  if (content.kind !== 'image') return '';
  return content.image.sourceUrl ?? content.image.contentUrl ?? '';
}

function extractContent(element: PageElement): string {
  const type = templateElementType(element);
  if (type === 'text') return styledText(shapeText(element));
  if (type === 'image') return imageUrl(element);
  return `Sample ${type} content`;
}

function elementMarkdown(element: PageElement, content: string): string {
  const type = templateElementType(element);
  if (type === 'text') {
    const text = shapeText(element);
    return text?.textElements?.length ? slidesTextToMarkdown(text) : content;
  }
  if (type === 'image') return `![${element.title ?? 'Image'}](${imageUrl(element)})`;
  return content;
}
