import { describe, it, expect } from 'vitest';
import { layoutReference, SlidePropertiesSchema } from '../model/page';
import { PagePropertiesCodec } from '../model/styles';
import {
  deleteObjectRequest,
  duplicateObjectRequest,
  groupObjectsRequest,
  replaceAllTextRequest,
  replaceImageRequest,
  ungroupObjectsRequest,
} from './object-requests';
import {
  createSlideRequest,
  pagePropertiesRequest,
  slidePropertiesRequest,
  slidesPositionRequest,
} from './page-requests';

describe('createSlideRequest', () => {
  it('should carry only the options that are given', () => {
    expect(createSlideRequest()).toEqual({ createSlide: {} });
    expect(
      createSlideRequest({
        objectId: 'slide-2',
        insertionIndex: 1,
        layout: layoutReference({ predefinedLayout: 'TITLE_AND_BODY' }),
        placeholderIdMappings: [{ layoutPlaceholder: { type: 'TITLE', index: 0 }, objectId: 'slide-2-title' }],
      })
    ).toEqual({
      createSlide: {
        objectId: 'slide-2',
        insertionIndex: 1,
        slideLayoutReference: { predefinedLayout: 'TITLE_AND_BODY' },
        placeholderIdMappings: [{ layoutPlaceholder: { type: 'TITLE', index: 0 }, objectId: 'slide-2-title' }],
      },
    });
  });
});

describe('pagePropertiesRequest', () => {
  it('should mask the background fill without its property state', () => {
    const props = PagePropertiesCodec.decode({
      pageBackgroundFill: { propertyState: 'RENDERED', solidFill: { color: { themeColor: 'LIGHT1' } } },
    });
    expect(pagePropertiesRequest('slide-1', props)).toEqual({
      updatePageProperties: {
        objectId: 'slide-1',
        pageProperties: { pageBackgroundFill: { solidFill: { color: { themeColor: 'LIGHT1' } } } },
        fields: 'pageBackgroundFill.solidFill.color.themeColor',
      },
    });
  });

  it('should emit nothing when no writable property is set', () => {
    expect(pagePropertiesRequest('slide-1', PagePropertiesCodec.decode({}))).toBeUndefined();
  });
});

describe('slidePropertiesRequest', () => {
  it('should leave out layout, master and notes page', () => {
    const props = SlidePropertiesSchema.parse({
      layoutObjectId: 'layout-1',
      masterObjectId: 'master-1',
      notesPage: { objectId: 'notes-1' },
      isSkipped: true,
    });
    expect(slidePropertiesRequest('slide-1', props)).toEqual({
      updateSlideProperties: { objectId: 'slide-1', slideProperties: { isSkipped: true }, fields: 'isSkipped' },
    });
    expect(slidePropertiesRequest('slide-1', { layoutObjectId: 'layout-1' })).toBeUndefined();
  });
});

describe('object requests', () => {
  it('should build position, duplicate and delete requests', () => {
    expect(slidesPositionRequest(['a', 'b'], 0)).toEqual({
      updateSlidesPosition: { slideObjectIds: ['a', 'b'], insertionIndex: 0 },
    });
    expect(duplicateObjectRequest('a')).toEqual({ duplicateObject: { objectId: 'a' } });
    expect(duplicateObjectRequest('a', { a: 'a-copy' })).toEqual({
      duplicateObject: { objectId: 'a', objectIds: { a: 'a-copy' } },
    });
    expect(deleteObjectRequest('a')).toEqual({ deleteObject: { objectId: 'a' } });
  });

  it('should match case by default when replacing text', () => {
    expect(replaceAllTextRequest('{{name}}', 'Ada')).toEqual({
      replaceAllText: { containsText: { text: '{{name}}', matchCase: true }, replaceText: 'Ada' },
    });
    expect(replaceAllTextRequest('x', 'y', { matchCase: false, pageObjectIds: ['p1'] })).toEqual({
      replaceAllText: { containsText: { text: 'x', matchCase: false }, replaceText: 'y', pageObjectIds: ['p1'] },
    });
  });

  it('should build image replacement and grouping requests', () => {
    expect(replaceImageRequest('img-1', 'https://example.com/b.png')).toEqual({
      replaceImage: { imageObjectId: 'img-1', url: 'https://example.com/b.png', imageReplaceMethod: 'CENTER_INSIDE' },
    });
    expect(groupObjectsRequest(['a', 'b'])).toEqual({ groupObjects: { childrenObjectIds: ['a', 'b'] } });
    expect(groupObjectsRequest(['a', 'b'], 'g')).toEqual({
      groupObjects: { groupObjectId: 'g', childrenObjectIds: ['a', 'b'] },
    });
    expect(ungroupObjectsRequest(['g'])).toEqual({ ungroupObjects: { objectIds: ['g'] } });
  });
});
