/**
 * Page Element Request Builders
 *
 * Create path: one create request for the populated branch, followed by the
 * update requests that fill in what the create request cannot carry.
 * Update path: property updates with field masks taken from the encoded payload.
 */

import { UnsupportedVariantError } from '../errors';
import { type Group, type Line, type PageElement } from '../model/elements';
import type { Dimension, Extent, Size, Transform } from '../model/primitives';
import {
  encodeImageProperties,
  encodeLineProperties,
  encodeShapeProperties,
  encodeSheetsChartProperties,
  encodeVideoProperties,
} from '../model/styles';
import { UNKNOWN, type JsonObject } from '../model/wire';
import { generateObjectId, type IdFactory } from '../utils/object-id';
import { fieldMask, isEmptyPayload, isJsonObject, prepareUpdatePayload } from './field-mask';
import { groupObjectsRequest } from './object-requests';
import { shapeTextRequests } from './text-requests';
import type {
  ElementProperties,
  LineCategoryName,
  RequestOf,
  SlidesRequest,
  UpdatePageElementPropertiesRequest,
  WireDimension,
  WireTransform,
} from './types';

// ============================================================================
// Constants
// ============================================================================

/** Keys `updateShapeProperties` accepts. */
export const SHAPE_WRITABLE_KEYS = ['shapeBackgroundFill', 'outline', 'link', 'contentAlignment'] as const;

/** Keys `updateImageProperties` accepts; the rest of ImageProperties is read-only. */
export const IMAGE_WRITABLE_KEYS = ['outline', 'link'] as const;

export interface ElementCreateOptions {
  /** Id for the created element; otherwise one is generated. */
  objectId?: string;
  idFactory?: IdFactory;
}

export interface ElementCreation {
  objectId: string;
  requests: SlidesRequest[];
}

// ============================================================================
// Create Path
// ============================================================================

/**
 * Requests that recreate `element` on `pageId`.
 *
 * @throws UnsupportedVariantError when the branch lacks what its create request needs
 */
export function elementCreateRequests(
  element: PageElement,
  pageId: string,
  options: ElementCreateOptions = {}
): ElementCreation {
  const idFactory = options.idFactory ?? generateObjectId;
  const { content } = element;
  const objectId = options.objectId ?? idFactory(content.kind);

  if (content.kind === 'elementGroup') {
    return groupCreateRequests(element, content.elementGroup, pageId, objectId, idFactory);
  }

  const elementProperties = elementPropertiesFor(element, pageId);
  const requests: SlidesRequest[] = [];

  switch (content.kind) {
    case 'shape': {
      const { shape } = content;
      requests.push({
        createShape: {
          objectId,
          shapeType: resolveLiteral(shape.shapeType, shape.unknownFields, 'shapeType', 'createShape'),
          elementProperties,
        },
      });
      break;
    }
    case 'image': {
      const url = content.image.sourceUrl ?? content.image.contentUrl;
      if (url === undefined) {
        throw new UnsupportedVariantError('createImage requires sourceUrl or contentUrl');
      }
      requests.push({ createImage: { objectId, url, elementProperties } });
      break;
    }
    case 'table': {
      const { rows, columns } = content.table;
      if (rows === undefined || columns === undefined) {
        throw new UnsupportedVariantError('createTable requires rows and columns');
      }
      requests.push({ createTable: { objectId, rows, columns, elementProperties } });
      break;
    }
    case 'video': {
      const { video } = content;
      const { source: videoSource } = video;
      let source: string | undefined;
      if (videoSource?.form === 'object') {
        source = resolveLiteral(videoSource.type, videoSource.unknownFields, 'type', 'createVideo');
      } else if (videoSource) {
        source = videoSource.value;
      }
      if (source === undefined || video.id === undefined) {
        throw new UnsupportedVariantError('createVideo requires source and id');
      }
      requests.push({ createVideo: { objectId, source, id: video.id, elementProperties } });
      break;
    }
    case 'line':
      requests.push({
        createLine: { objectId, category: lineCategory(content.line), elementProperties },
      });
      break;
    case 'wordArt': {
      const { renderedText } = content.wordArt;
      if (renderedText === undefined) {
        throw new UnsupportedVariantError('createWordArt requires renderedText');
      }
      requests.push({ createWordArt: { objectId, renderedText, elementProperties } });
      break;
    }
    case 'sheetsChart': {
      const { spreadsheetId, chartId } = content.sheetsChart;
      if (spreadsheetId === undefined || chartId === undefined) {
        throw new UnsupportedVariantError('createSheetsChart requires spreadsheetId and chartId');
      }
      requests.push({
        createSheetsChart: { objectId, spreadsheetId, chartId, linkingMode: 'LINKED', elementProperties },
      });
      break;
    }
    case 'speakerSpotlight':
      throw new UnsupportedVariantError('speakerSpotlight elements cannot be created');
  }

  requests.push(...elementUpdateRequests(element, objectId));
  return { objectId, requests };
}

function groupCreateRequests(
  element: PageElement,
  group: Group,
  pageId: string,
  objectId: string,
  idFactory: IdFactory
): ElementCreation {
  const children = group.children ?? [];
  if (children.length < 2) {
    throw new UnsupportedVariantError('groupObjects requires at least two children');
  }

  const requests: SlidesRequest[] = [];
  const childIds: string[] = [];
  for (const child of children) {
    const created = elementCreateRequests(child, pageId, { idFactory });
    childIds.push(created.objectId);
    requests.push(...created.requests);
  }
  requests.push(groupObjectsRequest(childIds, objectId));

  const labels = pageElementPropertiesRequest(element, objectId);
  if (labels) requests.push(labels);
  return { objectId, requests };
}

// ============================================================================
// Update Path
// ============================================================================

/**
 * Updates that bring the element with `objectId` to the state described by
 * `element`. Unset property objects are skipped.
 */
export function elementUpdateRequests(element: PageElement, objectId: string): SlidesRequest[] {
  const requests: SlidesRequest[] = [];
  const { content } = element;

  switch (content.kind) {
    case 'shape': {
      requests.push(...shapeTextRequests(objectId, content.shape.text));
      const props = content.shape.shapeProperties;
      if (props) {
        const payload = prepareUpdatePayload(encodeShapeProperties(props), SHAPE_WRITABLE_KEYS);
        if (!isEmptyPayload(payload)) {
          requests.push({
            updateShapeProperties: { objectId, shapeProperties: payload, fields: fieldMask(payload) },
          });
        }
      }
      break;
    }
    case 'image': {
      const props = content.image.imageProperties;
      if (props) {
        const payload = prepareUpdatePayload(encodeImageProperties(props), IMAGE_WRITABLE_KEYS);
        if (!isEmptyPayload(payload)) {
          requests.push({
            updateImageProperties: { objectId, imageProperties: payload, fields: fieldMask(payload) },
          });
        }
      }
      break;
    }
    case 'video': {
      const props = content.video.videoProperties;
      if (props) {
        const payload = prepareUpdatePayload(encodeVideoProperties(props));
        if (!isEmptyPayload(payload)) {
          requests.push({
            updateVideoProperties: { objectId, videoProperties: payload, fields: fieldMask(payload) },
          });
        }
      }
      break;
    }
    case 'line': {
      const props = content.line.lineProperties;
      if (props) {
        const payload = prepareUpdatePayload(encodeLineProperties(props));
        if (!isEmptyPayload(payload)) {
          requests.push({
            updateLineProperties: { objectId, lineProperties: payload, fields: fieldMask(payload) },
          });
        }
      }
      break;
    }
    case 'sheetsChart': {
      const props = content.sheetsChart.sheetsChartProperties;
      if (props) {
        const payload = sheetsChartPayload(encodeSheetsChartProperties(props));
        if (!isEmptyPayload(payload)) {
          requests.push({
            updateSheetsChartProperties: {
              objectId,
              sheetsChartProperties: payload,
              fields: fieldMask(payload),
            },
          });
        }
      }
      break;
    }
    case 'table':
    case 'wordArt':
    case 'speakerSpotlight':
    case 'elementGroup':
      break;
  }

  const labels = pageElementPropertiesRequest(element, objectId);
  if (labels) requests.push(labels);
  return requests;
}

/** Title/description, masked to whichever of the two is set. */
export function pageElementPropertiesRequest(
  element: Pick<PageElement, 'title' | 'description'>,
  objectId: string
): RequestOf<'updatePageElementProperties'> | undefined {
  const pageElementProperties: UpdatePageElementPropertiesRequest['pageElementProperties'] = {};
  const fields: string[] = [];
  if (element.title !== undefined) {
    pageElementProperties.title = element.title;
    fields.push('title');
  }
  if (element.description !== undefined) {
    pageElementProperties.description = element.description;
    fields.push('description');
  }
  if (fields.length === 0) return undefined;
  return { updatePageElementProperties: { objectId, pageElementProperties, fields: fields.join(',') } };
}

// ============================================================================
// Internal Helpers
// ============================================================================

export function elementPropertiesFor(
  element: Pick<PageElement, 'size' | 'transform'>,
  pageId: string
): ElementProperties {
  const properties: ElementProperties = { pageObjectId: pageId, transform: wireTransform(element.transform) };
  if (element.size) properties.size = wireSize(element.size);
  return properties;
}

function wireSize(size: Size): { width: WireDimension; height: WireDimension } {
  return { width: wireDimension(size.width), height: wireDimension(size.height) };
}

/** Omitted magnitude is zero on the wire. */
function wireDimension(extent: Extent): WireDimension {
  const dimension: Dimension = extent.dimension;
  return { magnitude: dimension.magnitude ?? 0, unit: dimension.unit === 'PT' ? 'PT' : 'EMU' };
}

function wireTransform(transform: Transform): WireTransform {
  const out: WireTransform = { unit: transform.unit === 'PT' ? 'PT' : 'EMU' };
  if (transform.scaleX !== undefined) out.scaleX = transform.scaleX;
  if (transform.scaleY !== undefined) out.scaleY = transform.scaleY;
  if (transform.shearX !== undefined) out.shearX = transform.shearX;
  if (transform.shearY !== undefined) out.shearY = transform.shearY;
  if (transform.translateX !== undefined) out.translateX = transform.translateX;
  if (transform.translateY !== undefined) out.translateY = transform.translateY;
  return out;
}

/** A known enum value, or the raw literal kept when the value decoded to UNKNOWN. */
function resolveLiteral(
  value: string | undefined,
  unknownFields: JsonObject | undefined,
  key: string,
  operation: string
): string {
  if (value !== undefined && value !== UNKNOWN) return value;
  const raw = unknownFields?.[key];
  if (typeof raw === 'string') return raw;
  throw new UnsupportedVariantError(`${operation} requires ${key}`);
}

function lineCategory(line: Line): LineCategoryName {
  const category = line.lineCategory;
  if (category === 'STRAIGHT' || category === 'BENT' || category === 'CURVED') return category;
  const lineType = line.lineType ?? '';
  if (lineType.startsWith('BENT')) return 'BENT';
  if (lineType.startsWith('CURVED')) return 'CURVED';
  return 'STRAIGHT';
}

function sheetsChartPayload(encoded: JsonObject): JsonObject {
  const image = encoded.chartImageProperties;
  if (!isJsonObject(image)) return {};
  return prepareUpdatePayload({
    chartImageProperties: prepareUpdatePayload(image, IMAGE_WRITABLE_KEYS),
  });
}
