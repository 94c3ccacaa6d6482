/**
 * Tests for template authoring
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { PageElementCodec } from '../model/elements';
import { PresentationCodec } from '../model/presentation';
import type { JsonObject } from '../model/wire';
import { FakeConnection } from '../testing/fake-connection';
import { elementGeometry } from '../testing/fixtures';
import { safeLog } from '../utils/log-sanitizer';
import {
  applyTemplate,
  buildTemplateConfig,
  buildTemplateManifest,
  createTemplate,
  generatePlaceholderName,
  identifyPotentialPlaceholders,
  isReplaceableElement,
  markTemplateElements,
  replaceTextWithPlaceholders,
  suggestReplacements,
  templateConfigRequests,
  textToPlaceholderName,
  type TemplateConfig,
} from './template-creator';

vi.mock('../utils/log-sanitizer', () => ({
  safeLog: {
    log: vi.fn(),
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

function textShape(objectId: string, content: string, style?: JsonObject): JsonObject {
  const textRun: JsonObject = style ? { content, style } : { content };
  return { objectId, ...elementGeometry, shape: { shapeType: 'TEXT_BOX', text: { textElements: [{ textRun }] } } };
}

const authoringDeckJson: JsonObject = {
  presentationId: 'authoring-1',
  title: 'Q4 Review',
  slides: [
    {
      objectId: 'a1',
      pageElements: [
        textShape('company', 'Acme Corp\n', { fontSize: { magnitude: 28, unit: 'PT' }, bold: true }),
        textShape('note', 'Quarterly review\n'),
        { objectId: 'rect', ...elementGeometry, shape: { shapeType: 'RECTANGLE' } },
        {
          objectId: 'photo',
          ...elementGeometry,
          title: 'Team',
          image: { sourceUrl: 'https://example.com/photo.png', contentUrl: 'https://example.com/cached' },
        },
      ],
    },
    {
      objectId: 'a2',
      pageElements: [{ objectId: 'art', ...elementGeometry, wordArt: { renderedText: 'Hi' } }],
    },
    {
      objectId: 'a3',
      pageElements: [
        {
          objectId: 'contacts',
          ...elementGeometry,
          table: {
            rows: 1,
            columns: 1,
            tableRows: [{ tableCells: [{ text: { textElements: [{ textRun: { content: 'hello@example.com\n' } }] } }] }],
          },
        },
      ],
    },
  ],
};

const authoringDeck = PresentationCodec.decode(authoringDeckJson);

const CREATED_AT = '2026-10-19T00:00:00.000Z';

// ============================================================================
// Finding candidates
// ============================================================================

describe('identifyPotentialPlaceholders', () => {
  it('should group shape and table text by pattern', () => {
    expect(identifyPotentialPlaceholders(authoringDeck)).toEqual({
      company_name: ['Acme Corp'],
      person_name: ['Acme Corp'],
      email: ['hello@example.com'],
      website: ['example.com'],
      other: ['Quarterly review'],
    });
  });

  it('should return nothing for a deck without text', () => {
    expect(identifyPotentialPlaceholders(PresentationCodec.decode({ presentationId: 'empty' }))).toEqual({});
  });
});

describe('suggestReplacements', () => {
  it('should name texts after their category or their own words', () => {
    const suggestions = suggestReplacements(identifyPotentialPlaceholders(authoringDeck));

    expect(suggestions).toEqual({
      'Acme Corp': 'person_name',
      'hello@example.com': 'email',
      'example.com': 'website',
      'Quarterly review': 'quarterly_review',
    });
  });

  it('should number texts that share a category', () => {
    expect(suggestReplacements({ date: ['1/2/2026', '3/4/2026'] })).toEqual({
      '1/2/2026': 'date_1',
      '3/4/2026': 'date_2',
    });
  });
});

describe('textToPlaceholderName', () => {
  it('should keep lower-case letters, digits and underscores', () => {
    expect(textToPlaceholderName('2026 Plan!')).toBe('n2026_plan');
    expect(textToPlaceholderName('A very long heading that keeps going on')).toBe('a_very_long_heading_that_keeps');
    expect(textToPlaceholderName('!!!')).toBe('placeholder');
  });
});

describe('replaceTextWithPlaceholders', () => {
  it('should emit one case-sensitive replacement per text', () => {
    expect(replaceTextWithPlaceholders({ 'Acme Corp': 'company' })).toStrictEqual([
      { replaceAllText: { containsText: { text: 'Acme Corp', matchCase: true }, replaceText: '{{company}}' } },
    ]);
  });
});

describe('markTemplateElements', () => {
  it('should tag found elements and report the rest', () => {
    const plan = markTemplateElements(authoringDeck, { title: ['company'], body: ['note', 'ghost'] });

    expect(plan.requests).toStrictEqual([
      {
        updatePageElementProperties: {
          objectId: 'company',
          pageElementProperties: { description: 'template:title' },
          fields: 'description',
        },
      },
      {
        updatePageElementProperties: {
          objectId: 'note',
          pageElementProperties: { description: 'template:body' },
          fields: 'description',
        },
      },
    ]);
    expect(plan.notFound).toEqual(['ghost']);
  });
});

describe('buildTemplateManifest', () => {
  it('should list slides and placeholder occurrences with context', () => {
    const longText = `{{intro}} ${'x'.repeat(120)}`;
    const deck = PresentationCodec.decode({
      presentationId: 'tpl-7',
      title: 'Pitch',
      slides: [
        { objectId: 'p1', pageElements: [textShape('hero', longText)] },
        { objectId: 'p2', pageElements: [textShape('footer', 'By {{author}}')] },
      ],
    });

    expect(buildTemplateManifest(deck)).toEqual({
      templateId: 'tpl-7',
      title: 'Pitch',
      slides: [
        { slideId: 'p1', index: 0 },
        { slideId: 'p2', index: 1 },
      ],
      placeholders: {
        intro: [{ slideId: 'p1', elementId: 'hero', context: `${longText.slice(0, 100)}...` }],
        author: [{ slideId: 'p2', elementId: 'footer', context: 'By {{author}}' }],
      },
    });
  });
});

// ============================================================================
// Template config
// ============================================================================

describe('isReplaceableElement', () => {
  it('should accept images, tables and shapes with real text', () => {
    const [company, note, rect, photo] = authoringDeck.slides?.[0]?.pageElements ?? [];

    expect(company && isReplaceableElement(company)).toBe(true);
    expect(note && isReplaceableElement(note)).toBe(true);
    expect(rect && isReplaceableElement(rect)).toBe(false);
    expect(photo && isReplaceableElement(photo)).toBe(true);
  });

  it('should reject a shape whose only run is a single character', () => {
    expect(isReplaceableElement(PageElementCodec.decode(textShape('dot', ' .\n')))).toBe(false);
  });
});

describe('generatePlaceholderName', () => {
  it('should use the first two words of the text', () => {
    expect(generatePlaceholderName(PageElementCodec.decode(textShape('h', '## Über uns heute')), 0, 1)).toBe(
      'über_uns'
    );
  });

  it('should fall back to slide, type and counter', () => {
    expect(generatePlaceholderName(PageElementCodec.decode(textShape('h', 'Hi there')), 1, 5)).toBe(
      'slide_2_text_5'
    );
  });
});

describe('buildTemplateConfig', () => {
  it('should record every replaceable element with examples', () => {
    expect(buildTemplateConfig(authoringDeck, 'Quarterly', CREATED_AT)).toStrictEqual({
      name: 'Quarterly',
      sourcePresentationId: 'authoring-1',
      title: 'Q4 Review',
      createdAt: CREATED_AT,
      slides: [
        {
          slideId: 'a1',
          slideIndex: 0,
          replaceableElements: [
            {
              elementId: 'company',
              placeholderName: 'acme_corp',
              elementType: 'text',
              originalContent: '<!-- size:28 -->Acme Corp<!-- /size -->',
              markdownContent: '**## Acme Corp**\n',
            },
            {
              elementId: 'note',
              placeholderName: 'quarterly_review',
              elementType: 'text',
              originalContent: 'Quarterly review',
              markdownContent: 'Quarterly review\n',
            },
            {
              elementId: 'photo',
              placeholderName: 'slide_1_image_3',
              elementType: 'image',
              originalContent: 'https://example.com/photo.png',
              markdownContent: '![Team](https://example.com/photo.png)',
            },
          ],
        },
        {
          slideId: 'a3',
          slideIndex: 2,
          replaceableElements: [
            {
              elementId: 'contacts',
              placeholderName: 'slide_3_table_4',
              elementType: 'table',
              originalContent: 'Sample table content',
              markdownContent: 'Sample table content',
            },
          ],
        },
      ],
      placeholders: {
        acme_corp: {
          type: 'text',
          slideIndex: 0,
          description: 'Text content (supports Markdown and HTML comments)',
          example: '**## Acme Corp**\n',
          originalExample: '<!-- size:28 -->Acme Corp<!-- /size -->',
        },
        quarterly_review: {
          type: 'text',
          slideIndex: 0,
          description: 'Text content (supports Markdown and HTML comments)',
          example: 'Quarterly review\n',
          originalExample: 'Quarterly review',
        },
        slide_1_image_3: {
          type: 'image',
          slideIndex: 0,
          description: 'Image URL (must be publicly accessible)',
          example: '![Team](https://example.com/photo.png)',
          originalExample: 'https://example.com/photo.png',
        },
        slide_3_table_4: {
          type: 'table',
          slideIndex: 2,
          description: 'Table data (list of rows or dictionary)',
          example: 'Sample table content',
          originalExample: 'Sample table content',
        },
      },
    });
  });

  it('should suffix a repeated name with the counter', () => {
    const deck = PresentationCodec.decode({
      presentationId: 'dup',
      slides: [{ objectId: 'd1', pageElements: [textShape('x1', 'Acme Corp'), textShape('x2', 'Acme Corp Ltd')] }],
    });

    expect(Object.keys(buildTemplateConfig(deck, 'Dup', CREATED_AT).placeholders)).toEqual([
      'acme_corp',
      'acme_corp_2',
    ]);
  });
});

describe('templateConfigRequests', () => {
  const config: TemplateConfig = buildTemplateConfig(authoringDeck, 'Quarterly', CREATED_AT);

  it('should rewrite text as markdown and replace images', () => {
    const requests = templateConfigRequests(config, {
      acme_corp: '**New** Co',
      quarterly_review: '   ',
      slide_1_image_3: 'https://example.com/new.png',
      slide_3_table_4: 'ignored',
      unrelated: 'y',
    });

    expect(requests).toStrictEqual([
      { deleteText: { objectId: 'company', textRange: { type: 'ALL' } } },
      { insertText: { objectId: 'company', text: 'New Co', insertionIndex: 0 } },
      {
        updateTextStyle: {
          objectId: 'company',
          style: { bold: true },
          textRange: { type: 'FIXED_RANGE', startIndex: 0, endIndex: 3 },
          fields: 'bold',
        },
      },
      {
        replaceImage: {
          imageObjectId: 'photo',
          url: 'https://example.com/new.png',
          imageReplaceMethod: 'CENTER_INSIDE',
        },
      },
    ]);
  });

  it('should skip image values that are not http(s) URLs', () => {
    expect(templateConfigRequests(config, { slide_1_image_3: 'photo.png', acme_corp: 42 })).toEqual([]);
  });
});

// ============================================================================
// createTemplate / applyTemplate
// ============================================================================

describe('createTemplate', () => {
  let conn: FakeConnection;

  beforeEach(() => {
    vi.clearAllMocks();
    conn = new FakeConnection();
    conn.presentations.set('authoring-1', authoringDeckJson);
  });

  it('should build the config from the fetched presentation', async () => {
    const config = await createTemplate(conn, 'authoring-1', 'Quarterly');

    expect(config.name).toBe('Quarterly');
    expect(Object.keys(config.placeholders)).toEqual([
      'acme_corp',
      'quarterly_review',
      'slide_1_image_3',
      'slide_3_table_4',
    ]);
    expect(safeLog.info).toHaveBeenCalledWith('[Templater] Created template config', {
      presentationId: 'authoring-1',
      placeholders: 4,
    });
  });
});

describe('applyTemplate', () => {
  let conn: FakeConnection;
  const config = buildTemplateConfig(authoringDeck, 'Quarterly', CREATED_AT);

  beforeEach(() => {
    vi.clearAllMocks();
    conn = new FakeConnection();
    conn.presentations.set('authoring-1', authoringDeckJson);
  });

  it('should copy the source deck and fill the copy', async () => {
    const result = await applyTemplate(
      conn,
      config,
      { slide_1_image_3: 'https://example.com/new.png' },
      'Review copy'
    );

    expect(conn.copyPresentation).toHaveBeenCalledWith('authoring-1', 'Review copy');
    expect(result.presentationId).toBe('copy-1');
    expect(conn.batchUpdate).toHaveBeenCalledTimes(1);
    expect(conn.batches[0]).toEqual([
      {
        replaceImage: {
          imageObjectId: 'photo',
          url: 'https://example.com/new.png',
          imageReplaceMethod: 'CENTER_INSIDE',
        },
      },
    ]);
    expect(result.response).toEqual({ presentationId: 'copy-1', replies: [] });
  });

  it('should title the copy after the template and skip an empty batch', async () => {
    const result = await applyTemplate(conn, config, {});

    expect(conn.copyPresentation).toHaveBeenCalledWith('authoring-1', expect.stringMatching(/^Copy of Q4 Review - /));
    expect(conn.batchUpdate).not.toHaveBeenCalled();
    expect(result).toEqual({ presentationId: 'copy-1', requests: [] });
  });
});
