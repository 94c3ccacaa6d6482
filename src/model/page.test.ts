import { describe, it, expect } from 'vitest';
import { SchemaMismatchError, UnsupportedVariantError } from '../errors';
import { PageCodec, effectivePageType, layoutReference, slideProperties } from './page';

describe('Page', () => {
  it('should tag the page-kind properties', () => {
    const page = PageCodec.decode({
      objectId: 'p1',
      pageType: 'LAYOUT',
      layoutProperties: { name: 'TITLE', masterObjectId: 'm1' },
    });
    expect(page.properties).toEqual({
      kind: 'layout',
      layoutProperties: { name: 'TITLE', masterObjectId: 'm1' },
    });
    expect(PageCodec.encode(page)).toStrictEqual({
      objectId: 'p1',
      pageType: 'LAYOUT',
      layoutProperties: { name: 'TITLE', masterObjectId: 'm1' },
    });
  });

  it('should reject properties that disagree with the page type', () => {
    try {
      PageCodec.decode({ pageType: 'LAYOUT', slideProperties: { layoutObjectId: 'l1' } });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(SchemaMismatchError);
      if (error instanceof SchemaMismatchError) {
        expect(error.issues).toEqual(['pageType: slide properties do not match page type LAYOUT']);
      }
    }
  });

  it('should reject properties on a notes master', () => {
    expect(() => PageCodec.decode({ pageType: 'NOTES_MASTER', masterProperties: {} })).toThrow(
      SchemaMismatchError
    );
  });

  it('should reject two page-kind variants', () => {
    expect(() => PageCodec.decode({ slideProperties: {}, masterProperties: {} })).toThrow(
      UnsupportedVariantError
    );
  });

  it('should not check an unrecognised page type against its properties', () => {
    const json = { pageType: 'HANDOUT', slideProperties: { isSkipped: true } };
    const page = PageCodec.decode(json);
    expect(page.pageType).toBe('UNKNOWN');
    expect(PageCodec.encode(page)).toStrictEqual(json);
  });

  it('should decode a nested notes page', () => {
    const page = PageCodec.decode({
      pageType: 'SLIDE',
      slideProperties: {
        notesPage: { objectId: 'n1', pageType: 'NOTES', notesProperties: { speakerNotesObjectId: 'b1' } },
      },
    });
    expect(slideProperties(page)?.notesPage?.objectId).toBe('n1');
  });
});

describe('effectivePageType', () => {
  it('should prefer the declared type, then the variant, then SLIDE', () => {
    expect(effectivePageType(PageCodec.decode({ pageType: 'NOTES_MASTER' }))).toBe('NOTES_MASTER');
    expect(effectivePageType(PageCodec.decode({ masterProperties: {} }))).toBe('MASTER');
    expect(effectivePageType(PageCodec.decode({}))).toBe('SLIDE');
  });
});

describe('layoutReference', () => {
  it('should accept exactly one reference', () => {
    expect(layoutReference({ layoutId: 'l1' })).toEqual({ layoutId: 'l1' });
    expect(layoutReference({ predefinedLayout: 'TITLE_ONLY' })).toEqual({ predefinedLayout: 'TITLE_ONLY' });
  });

  it('should reject none or both', () => {
    expect(() => layoutReference({})).toThrow('Exactly one of layoutId or predefinedLayout must be set');
    expect(() => layoutReference({ layoutId: 'l1', predefinedLayout: 'BLANK' })).toThrow(
      UnsupportedVariantError
    );
  });
});
