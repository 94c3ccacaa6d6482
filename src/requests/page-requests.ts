/**
 * Slide and page-level request builders.
 */

import { encodeSlideProperties, type LayoutReference, type SlideProperties } from '../model/page';
import { encodePageProperties, type PageProperties } from '../model/styles';
import type { JsonObject } from '../model/wire';
import { fieldMask, isEmptyPayload, prepareUpdatePayload } from './field-mask';
import type { PlaceholderIdMapping, RequestOf } from './types';

/** Writable through `updatePageProperties`. */
export const PAGE_WRITABLE_KEYS = ['pageBackgroundFill', 'colorScheme'] as const;

/** Slide properties owned by the layout/master relation or the notes page itself. */
const SLIDE_RELATION_KEYS: ReadonlySet<string> = new Set(['layoutObjectId', 'masterObjectId', 'notesPage']);

export interface CreateSlideOptions {
  objectId?: string;
  insertionIndex?: number;
  layout?: LayoutReference;
  placeholderIdMappings?: PlaceholderIdMapping[];
}

export function createSlideRequest(options: CreateSlideOptions = {}): RequestOf<'createSlide'> {
  const createSlide: RequestOf<'createSlide'>['createSlide'] = {};
  if (options.objectId !== undefined) createSlide.objectId = options.objectId;
  if (options.insertionIndex !== undefined) createSlide.insertionIndex = options.insertionIndex;
  if (options.layout) createSlide.slideLayoutReference = options.layout;
  if (options.placeholderIdMappings && options.placeholderIdMappings.length > 0) {
    createSlide.placeholderIdMappings = options.placeholderIdMappings;
  }
  return { createSlide };
}

export function pagePropertiesRequest(
  pageId: string,
  properties: PageProperties
): RequestOf<'updatePageProperties'> | undefined {
  const payload = prepareUpdatePayload(encodePageProperties(properties), PAGE_WRITABLE_KEYS);
  if (isEmptyPayload(payload)) return undefined;
  return { updatePageProperties: { objectId: pageId, pageProperties: payload, fields: fieldMask(payload) } };
}

export function slidePropertiesRequest(
  pageId: string,
  properties: SlideProperties
): RequestOf<'updateSlideProperties'> | undefined {
  const encoded = encodeSlideProperties(properties);
  const writable: JsonObject = {};
  for (const [key, value] of Object.entries(encoded)) {
    if (!SLIDE_RELATION_KEYS.has(key)) writable[key] = value;
  }
  const payload = prepareUpdatePayload(writable);
  if (isEmptyPayload(payload)) return undefined;
  return { updateSlideProperties: { objectId: pageId, slideProperties: payload, fields: fieldMask(payload) } };
}

export function slidesPositionRequest(
  slideObjectIds: string[],
  insertionIndex: number
): RequestOf<'updateSlidesPosition'> {
  return { updateSlidesPosition: { slideObjectIds, insertionIndex } };
}
