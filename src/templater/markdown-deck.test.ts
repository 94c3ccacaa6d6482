/**
 * Tests for the markdown deck builder
 */

import { describe, it, expect } from 'vitest';
import { PresentationCodec } from '../model/presentation';
import type { SlidesRequest } from '../requests/types';
import { elementGeometry } from '../testing/fixtures';
import {
  buildDeckRequests,
  firstSlidePlaceholders,
  normalizeMarkdownForSlides,
  parseMarkdownToSections,
} from './markdown-deck';

const DECK_MARKDOWN = [
  '# Launch Plan',
  'Q4 kickoff',
  '',
  '---',
  '',
  '## Goals',
  '- Ship **v2**',
  '- Grow',
  '',
  '---',
  '',
  '## Architecture',
  '![diagram](https://example.com/arch.png)',
].join('\n');

function kinds(requests: SlidesRequest[]): string[] {
  return requests.map((request) => Object.keys(request).join(','));
}

// ============================================================================
// Parsing
// ============================================================================

describe('parseMarkdownToSections', () => {
  it('should split sections and pick layouts', () => {
    expect(parseMarkdownToSections(DECK_MARKDOWN)).toEqual([
      { heading: 'Launch Plan', body: [], isTitle: true, layout: 'title', subtitle: 'Q4 kickoff' },
      { heading: 'Goals', body: ['- Ship **v2**', '- Grow'], isTitle: false, layout: 'text' },
      {
        heading: 'Architecture',
        body: [],
        isTitle: false,
        layout: 'image_only',
        imageUrl: 'https://example.com/arch.png',
      },
    ]);
  });

  it('should render mermaid blocks as image URLs', () => {
    const [section] = parseMarkdownToSections('## Flow\n```mermaid\ngraph TD\nA-->B\n```');

    expect(section?.imageUrl).toBe('https://mermaid.ink/img/Z3JhcGggVEQKQS0tPkI=');
    expect(section?.layout).toBe('image_only');
  });

  it('should drop HTML comments and keep text beside an image', () => {
    const [section] = parseMarkdownToSections(
      '## Notes\n<!-- presenter only -->\nVisible\n![](https://example.com/side.png)'
    );

    expect(section?.body).toEqual(['Visible']);
    expect(section?.layout).toBe('text_with_image');
  });

  it('should return no sections for blank input', () => {
    expect(parseMarkdownToSections('\n\n')).toEqual([]);
  });
});

describe('normalizeMarkdownForSlides', () => {
  it('should insert separators before headings that follow content', () => {
    expect(normalizeMarkdownForSlides('# A\n## B\ntext\n## C')).toBe('# A\n## B\ntext\n\n---\n\n## C');
  });
});

describe('firstSlidePlaceholders', () => {
  it('should list placeholder shapes of the first slide', () => {
    const presentation = PresentationCodec.decode({
      presentationId: 'deck-1',
      slides: [
        {
          objectId: 'p1',
          pageElements: [
            { objectId: 't1', ...elementGeometry, shape: { placeholder: { type: 'CENTERED_TITLE' } } },
            { objectId: 'st1', ...elementGeometry, shape: { placeholder: { type: 'SUBTITLE' } } },
            { objectId: 'free', ...elementGeometry, shape: { shapeType: 'TEXT_BOX' } },
          ],
        },
      ],
    });

    expect(firstSlidePlaceholders(presentation)).toEqual({
      slideObjectId: 'p1',
      placeholders: [
        { objectId: 't1', type: 'CENTERED_TITLE' },
        { objectId: 'st1', type: 'SUBTITLE' },
      ],
    });
  });

  it('should return undefined for a presentation without slides', () => {
    expect(firstSlidePlaceholders(PresentationCodec.decode({ presentationId: 'deck-1' }))).toBeUndefined();
  });
});

// ============================================================================
// Request building
// ============================================================================

describe('buildDeckRequests', () => {
  const sections = parseMarkdownToSections(DECK_MARKDOWN);

  it('should create one slide per section', () => {
    const requests = buildDeckRequests(sections);

    expect(kinds(requests)).toEqual([
      'createSlide',
      'insertText',
      'insertText',
      'createSlide',
      'insertText',
      'insertText',
      'updateTextStyle',
      'createParagraphBullets',
      'createSlide',
      'createShape',
      'insertText',
      'updateTextStyle',
      'createImage',
    ]);
    expect(requests[0]).toEqual({
      createSlide: {
        objectId: 'slide_0',
        insertionIndex: 0,
        slideLayoutReference: { predefinedLayout: 'TITLE' },
        placeholderIdMappings: [
          { layoutPlaceholder: { type: 'CENTERED_TITLE', index: 0 }, objectId: 'slide_0_title' },
          { layoutPlaceholder: { type: 'SUBTITLE', index: 0 }, objectId: 'slide_0_body' },
        ],
      },
    });
    expect(requests[5]).toEqual({
      insertText: { objectId: 'slide_1_body', text: 'Ship v2\nGrow', insertionIndex: 0 },
    });
    expect(requests[12]).toEqual({
      createImage: {
        objectId: 'slide_2_img',
        url: 'https://example.com/arch.png',
        elementProperties: {
          pageObjectId: 'slide_2',
          size: {
            width: { magnitude: 8_000_000, unit: 'EMU' },
            height: { magnitude: 3_800_000, unit: 'EMU' },
          },
          transform: { scaleX: 1, scaleY: 1, translateX: 572_000, translateY: 1_100_000, unit: 'EMU' },
        },
      },
    });
  });

  it('should fill the existing first slide and offset the rest', () => {
    const requests = buildDeckRequests(sections, {
      idPrefix: 'x',
      firstSlide: {
        slideObjectId: 'p1',
        placeholders: [
          { objectId: 't1', type: 'CENTERED_TITLE' },
          { objectId: 'st1', type: 'SUBTITLE' },
        ],
      },
    });

    expect(requests.slice(0, 3)).toEqual([
      { insertText: { objectId: 't1', text: 'Launch Plan', insertionIndex: 0 } },
      { insertText: { objectId: 'st1', text: 'Q4 kickoff', insertionIndex: 0 } },
      {
        createSlide: {
          objectId: 'x_1',
          insertionIndex: 1,
          slideLayoutReference: { predefinedLayout: 'TITLE_AND_BODY' },
          placeholderIdMappings: [
            { layoutPlaceholder: { type: 'TITLE', index: 0 }, objectId: 'x_1_title' },
            { layoutPlaceholder: { type: 'BODY', index: 0 }, objectId: 'x_1_body' },
          ],
        },
      },
    ]);
  });

  it('should start at the given insertion index when appending', () => {
    const requests = buildDeckRequests(sections.slice(1), { idPrefix: 'app', insertionIndex: 4 });
    const created = requests.flatMap((request) =>
      'createSlide' in request ? [request.createSlide.insertionIndex] : []
    );

    expect(created).toEqual([4, 5]);
  });
});
