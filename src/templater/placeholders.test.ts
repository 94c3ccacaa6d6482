import { describe, it, expect } from 'vitest';
import { PageElementCodec, findPageElement } from '../model/elements';
import { PresentationCodec } from '../model/presentation';
import { elementGeometry, templateDeckJson } from '../testing/fixtures';
import {
  elementText,
  extractPlaceholders,
  findPlaceholders,
  isImageUrl,
  tableCellText,
  tableCells,
} from './placeholders';

const templateDeck = PresentationCodec.decode(templateDeckJson);

describe('extractPlaceholders', () => {
  it('should return unique names in order of appearance', () => {
    expect(extractPlaceholders('{{b}} and {{a}}, again {{b}}')).toEqual(['b', 'a']);
  });

  it('should ignore unbalanced braces', () => {
    expect(extractPlaceholders('{{open and {single} and {{}}')).toEqual([]);
  });
});

describe('findPlaceholders', () => {
  it('should locate placeholders in shapes, groups, tables and image titles', () => {
    const found = findPlaceholders(templateDeck);

    expect([...found.keys()]).toEqual(['name', 'amount', 'logo', 'quarter']);
    expect(found.get('name')).toEqual([
      { slideId: 's1', elementId: 'greeting', elementKind: 'shape' },
      { slideId: 's2', elementId: 'inner', elementKind: 'shape' },
    ]);
    expect(found.get('logo')).toEqual([{ slideId: 's1', elementId: 'logo', elementKind: 'image' }]);
    expect(found.get('quarter')).toEqual([{ slideId: 's2', elementId: 'tbl', elementKind: 'table' }]);
  });
});

describe('elementText', () => {
  it('should join title, description and text without empty parts', () => {
    const slide = templateDeck.slides?.[0];
    const logo = findPageElement(slide?.pageElements, 'logo');
    const greeting = findPageElement(slide?.pageElements, 'greeting');

    expect(logo && elementText(logo)).toBe('{{logo}}');
    expect(greeting && elementText(greeting)).toBe('Dear {{name}}, you owe {{amount}}\n');
  });
});

describe('tableCells', () => {
  const element = PageElementCodec.decode({
    objectId: 'grid',
    ...elementGeometry,
    table: {
      rows: 2,
      columns: 2,
      tableRows: [
        {
          tableCells: [
            { text: { textElements: [{ paragraphMarker: {} }, { textRun: { content: 'Region\n' } }] } },
            {},
          ],
        },
        { tableCells: [{ text: { textElements: [{ textRun: { content: 'North\n' } }] } }, { text: {} }] },
      ],
    },
  });
  const table = element.content.kind === 'table' ? element.content.table : { rows: 0 };

  it('should list the text of every cell with a text body', () => {
    expect(tableCells(table)).toEqual([
      { rowIndex: 0, columnIndex: 0, text: 'Region\n' },
      { rowIndex: 1, columnIndex: 0, text: 'North\n' },
      { rowIndex: 1, columnIndex: 1, text: '' },
    ]);
  });

  it('should return an empty string for a cell without text', () => {
    expect(tableCellText(table, 0, 0)).toBe('Region\n');
    expect(tableCellText(table, 0, 1)).toBe('');
    expect(tableCellText(table, 5, 5)).toBe('');
  });
});

describe('isImageUrl', () => {
  it('should accept http(s) URLs with an image extension', () => {
    expect(isImageUrl('https://example.com/a.png')).toBe(true);
    expect(isImageUrl('http://cdn.example.org/img/photo.JPEG')).toBe(true);
    expect(isImageUrl('https://example.com/a.PNG?size=2')).toBe(true);
  });

  it('should reject other values', () => {
    expect(isImageUrl('https://example.com/report.pdf')).toBe(false);
    expect(isImageUrl('ftp://example.com/a.png')).toBe(false);
    expect(isImageUrl('logo.png')).toBe(false);
  });
});
