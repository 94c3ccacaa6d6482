/**
 * Markdown Deck Builder
 *
 * Splits slide-ready markdown (`# Title`, sections separated by `---`) into
 * sections and turns them into batchUpdate requests, one slide per section.
 */

import type { Presentation } from '../model/presentation';
import type { ElementProperties, PlaceholderIdMapping, SlidesRequest } from '../requests/types';
import { markdownTextRequests } from './markdown-text';

// ============================================================================
// Types
// ============================================================================

export type SlideLayout = 'title' | 'text' | 'image_only' | 'text_with_image';

export interface SlideSection {
  heading: string;
  /** Body lines with their markdown kept. */
  body: string[];
  isTitle: boolean;
  subtitle?: string;
  /** Public image URL, from `![](url)` or a mermaid block. */
  imageUrl?: string;
  layout: SlideLayout;
}

export interface PlaceholderInfo {
  objectId: string;
  type: string;
}

/** The slide a new presentation starts with, and its placeholders. */
export interface FirstSlidePlaceholders {
  slideObjectId: string;
  placeholders: PlaceholderInfo[];
}

export interface DeckBuildOptions {
  /** Prefix of every generated object id. */
  idPrefix?: string;
  /** Slide index of the first section. */
  insertionIndex?: number;
  /** Fill a leading title section into this slide instead of creating one. */
  firstSlide?: FirstSlidePlaceholders;
}

export interface Box {
  x: number;
  y: number;
  width: number;
  height: number;
}

// ============================================================================
// Constants
// ============================================================================

const TITLE_IMAGE_BOX: Box = { x: 6_800_000, y: 3_200_000, width: 2_000_000, height: 2_000_000 };
const SIDE_IMAGE_BOX: Box = { x: 4_800_000, y: 1_500_000, width: 4_000_000, height: 3_400_000 };
const FULL_IMAGE_BOX: Box = { x: 572_000, y: 1_100_000, width: 8_000_000, height: 3_800_000 };
const TITLE_TEXT_BOX: Box = { x: 572_000, y: 200_000, width: 8_000_000, height: 800_000 };

const MERMAID_IMAGE_BASE = 'https://mermaid.ink/img/';

// ============================================================================
// Markdown Parser
// ============================================================================

/**
 * Parse slide-ready markdown into sections.
 * A leading section whose heading is `# ...` becomes the title slide.
 */
export function parseMarkdownToSections(markdown: string): SlideSection[] {
  const rawSections = markdown
    .replace(/\r\n?/g, '\n')
    .split(/\n---+\n/)
    .map((s) => s.trim())
    .filter(Boolean);
  const sections: SlideSection[] = [];

  rawSections.forEach((raw, i) => {
    let imageUrl: string | undefined;
    const mermaidMatch = /```mermaid\n([\s\S]*?)```/.exec(raw);
    if (mermaidMatch) {
      imageUrl = mermaidToImageUrl((mermaidMatch[1] ?? '').trim());
    }
    const imageMatch = /!\[[^\]]*\]\(([^)\s]+)\)/.exec(raw);
    if (!imageUrl && imageMatch) {
      imageUrl = imageMatch[1];
    }

    const cleaned = raw
      .replace(/```mermaid\n[\s\S]*?```/g, '')
      .replace(/!\[[^\]]*\]\([^)]+\)/g, '')
      .replace(/<!--[\s\S]*?-->/g, '');

    const lines = cleaned.split('\n');
    const headingIndex = lines.findIndex((l) => /^#{1,2}\s/.test(l));
    const headingLine = headingIndex >= 0 ? lines[headingIndex] : undefined;
    const heading = headingLine?.replace(/^#{1,2}\s*/, '').trim() ?? '';
    const body = lines
      .filter((l, index) => index !== headingIndex && l.trim())
      .map((l) => l.trim());

    if (i === 0 && headingLine?.startsWith('# ')) {
      const section: SlideSection = { heading, body: [], isTitle: true, layout: 'title' };
      if (body.length > 0) section.subtitle = body.join(' ');
      if (imageUrl) section.imageUrl = imageUrl;
      sections.push(section);
      return;
    }

    const layout: SlideLayout = imageUrl ? (body.length > 0 ? 'text_with_image' : 'image_only') : 'text';
    const section: SlideSection = { heading, body, isTitle: false, layout };
    if (imageUrl) section.imageUrl = imageUrl;
    sections.push(section);
  });

  return sections;
}

/**
 * Ensures a `---` separator before every `#`/`##` heading that does not
 * directly follow another heading.
 */
export function normalizeMarkdownForSlides(rawMarkdown: string): string {
  const result: string[] = [];
  let lastWasHeading = false;

  for (const line of rawMarkdown.split('\n')) {
    const isTopHeading = /^#{1,2}\s/.test(line);
    if (isTopHeading && result.length > 0 && !lastWasHeading) {
      result.push('', '---', '');
    }
    result.push(line);
    lastWasHeading = isTopHeading;
  }

  return result.join('\n');
}

/** Placeholder shapes of a presentation's first slide. */
export function firstSlidePlaceholders(presentation: Presentation): FirstSlidePlaceholders | undefined {
  const slide = presentation.slides?.[0];
  if (slide?.objectId === undefined) return undefined;

  const placeholders: PlaceholderInfo[] = [];
  for (const element of slide.pageElements ?? []) {
    const { content } = element;
    const type = content.kind === 'shape' ? content.shape.placeholder?.type : undefined;
    if (element.objectId !== undefined && type !== undefined) {
      placeholders.push({ objectId: element.objectId, type });
    }
  }
  return { slideObjectId: slide.objectId, placeholders };
}

// ============================================================================
// Batch Request Builders
// ============================================================================

export function buildDeckRequests(sections: SlideSection[], options: DeckBuildOptions = {}): SlidesRequest[] {
  const prefix = options.idPrefix ?? 'slide';
  const baseIndex = options.insertionIndex ?? 0;
  const requests: SlidesRequest[] = [];
  let start = 0;

  const [first] = sections;
  if (first?.isTitle && options.firstSlide) {
    requests.push(...fillFirstSlide(first, options.firstSlide, `${prefix}_0`));
    start = 1;
  }

  for (let i = start; i < sections.length; i++) {
    const section = sections[i];
    if (!section) continue;
    const ids = {
      slide: `${prefix}_${i}`,
      title: `${prefix}_${i}_title`,
      body: `${prefix}_${i}_body`,
      image: `${prefix}_${i}_img`,
    };
    const insertionIndex = baseIndex + i;

    switch (section.layout) {
      case 'title':
        requests.push(...buildTitleSlide(ids, insertionIndex, section));
        break;
      case 'image_only':
        requests.push(...buildImageOnlySlide(ids, insertionIndex, section));
        break;
      case 'text':
      case 'text_with_image':
        requests.push(...buildTextSlide(ids, insertionIndex, section));
        break;
    }
  }

  return requests;
}

// --- Layout-specific builders ---

type SlideIds = { slide: string; title: string; body: string; image: string };

function fillFirstSlide(section: SlideSection, first: FirstSlidePlaceholders, idBase: string): SlidesRequest[] {
  const reqs: SlidesRequest[] = [];
  const title = first.placeholders.find((p) => p.type === 'CENTERED_TITLE' || p.type === 'TITLE');
  const subtitle = first.placeholders.find((p) => p.type === 'SUBTITLE');

  if (title && section.heading) {
    reqs.push({ insertText: { objectId: title.objectId, text: section.heading, insertionIndex: 0 } });
  }
  if (subtitle && section.subtitle) {
    reqs.push({ insertText: { objectId: subtitle.objectId, text: section.subtitle, insertionIndex: 0 } });
  }
  if (section.imageUrl) {
    reqs.push(createImageRequest(first.slideObjectId, `${idBase}_img`, section.imageUrl, TITLE_IMAGE_BOX));
  }
  return reqs;
}

function buildTitleSlide(ids: SlideIds, index: number, section: SlideSection): SlidesRequest[] {
  const mappings: PlaceholderIdMapping[] = [
    { layoutPlaceholder: { type: 'CENTERED_TITLE', index: 0 }, objectId: ids.title },
  ];
  if (section.subtitle) {
    mappings.push({ layoutPlaceholder: { type: 'SUBTITLE', index: 0 }, objectId: ids.body });
  }

  const reqs: SlidesRequest[] = [
    {
      createSlide: {
        objectId: ids.slide,
        insertionIndex: index,
        slideLayoutReference: { predefinedLayout: 'TITLE' },
        placeholderIdMappings: mappings,
      },
    },
  ];
  if (section.heading) {
    reqs.push({ insertText: { objectId: ids.title, text: section.heading, insertionIndex: 0 } });
  }
  if (section.subtitle) {
    reqs.push({ insertText: { objectId: ids.body, text: section.subtitle, insertionIndex: 0 } });
  }
  if (section.imageUrl) {
    reqs.push(createImageRequest(ids.slide, ids.image, section.imageUrl, TITLE_IMAGE_BOX));
  }
  return reqs;
}

function buildTextSlide(ids: SlideIds, index: number, section: SlideSection): SlidesRequest[] {
  const reqs: SlidesRequest[] = [
    {
      createSlide: {
        objectId: ids.slide,
        insertionIndex: index,
        slideLayoutReference: { predefinedLayout: 'TITLE_AND_BODY' },
        placeholderIdMappings: [
          { layoutPlaceholder: { type: 'TITLE', index: 0 }, objectId: ids.title },
          { layoutPlaceholder: { type: 'BODY', index: 0 }, objectId: ids.body },
        ],
      },
    },
  ];

  if (section.heading) {
    reqs.push({ insertText: { objectId: ids.title, text: section.heading, insertionIndex: 0 } });
  }
  if (section.body.length > 0) {
    reqs.push(...markdownTextRequests(ids.body, section.body.join('\n')));
  }
  if (section.imageUrl) {
    reqs.push(createImageRequest(ids.slide, ids.image, section.imageUrl, SIDE_IMAGE_BOX));
  }
  return reqs;
}

function buildImageOnlySlide(ids: SlideIds, index: number, section: SlideSection): SlidesRequest[] {
  const reqs: SlidesRequest[] = [
    {
      createSlide: {
        objectId: ids.slide,
        insertionIndex: index,
        slideLayoutReference: { predefinedLayout: 'BLANK' },
      },
    },
  ];

  if (section.heading) {
    reqs.push(...createTitleTextBox(ids.slide, ids.title, section.heading));
  }
  if (section.imageUrl) {
    reqs.push(createImageRequest(ids.slide, ids.image, section.imageUrl, FULL_IMAGE_BOX));
  }
  return reqs;
}

export function createImageRequest(pageId: string, imageId: string, url: string, box: Box): SlidesRequest {
  return { createImage: { objectId: imageId, url, elementProperties: boxProperties(pageId, box) } };
}

/** Bold 28pt text box across the top of a BLANK slide. */
export function createTitleTextBox(pageId: string, textBoxId: string, text: string): SlidesRequest[] {
  return [
    {
      createShape: {
        objectId: textBoxId,
        shapeType: 'TEXT_BOX',
        elementProperties: boxProperties(pageId, TITLE_TEXT_BOX),
      },
    },
    { insertText: { objectId: textBoxId, text, insertionIndex: 0 } },
    {
      updateTextStyle: {
        objectId: textBoxId,
        style: { fontSize: { magnitude: 28, unit: 'PT' }, bold: true },
        textRange: { type: 'ALL' },
        fields: 'fontSize,bold',
      },
    },
  ];
}

// ============================================================================
// Internal Helpers
// ============================================================================

function boxProperties(pageId: string, box: Box): ElementProperties {
  return {
    pageObjectId: pageId,
    size: {
      width: { magnitude: box.width, unit: 'EMU' },
      height: { magnitude: box.height, unit: 'EMU' },
    },
    transform: { scaleX: 1, scaleY: 1, translateX: box.x, translateY: box.y, unit: 'EMU' },
  };
}

/** mermaid.ink renders the diagram from its base64 source. */
function mermaidToImageUrl(mermaidCode: string): string {
  return `${MERMAID_IMAGE_BASE}${Buffer.from(mermaidCode, 'utf-8').toString('base64')}`;
}
