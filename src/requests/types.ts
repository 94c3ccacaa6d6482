/**
 * Slides API batchUpdate request shapes.
 *
 * Each request is an object with exactly one key naming the operation.
 * Property payloads are carried in their encoded wire form.
 */

import type { JsonObject } from '../model/wire';
import type { LayoutReference } from '../model/page';

// ============================================================================
// Shared
// ============================================================================

export type RangeType = 'FIXED_RANGE' | 'FROM_START_INDEX' | 'ALL';

/** UTF-16 code-unit offsets, end exclusive. */
export interface TextRange {
  type: RangeType;
  startIndex?: number;
  endIndex?: number;
}

export interface WireDimension {
  magnitude: number;
  unit: 'EMU' | 'PT';
}

export interface WireTransform {
  scaleX?: number;
  scaleY?: number;
  shearX?: number;
  shearY?: number;
  translateX?: number;
  translateY?: number;
  unit: 'EMU' | 'PT';
}

export interface ElementProperties {
  pageObjectId: string;
  size?: { width: WireDimension; height: WireDimension };
  transform?: WireTransform;
}

export interface PlaceholderIdMapping {
  objectId: string;
  layoutPlaceholder?: { type: string; index?: number };
  layoutPlaceholderObjectId?: string;
}

export interface TableCellLocation {
  rowIndex: number;
  columnIndex: number;
}

export type LineCategoryName = 'STRAIGHT' | 'BENT' | 'CURVED';

// ============================================================================
// Create
// ============================================================================

export interface CreateSlideRequest {
  objectId?: string;
  insertionIndex?: number;
  slideLayoutReference?: LayoutReference;
  placeholderIdMappings?: PlaceholderIdMapping[];
}

export interface CreateShapeRequest {
  objectId?: string;
  shapeType: string;
  elementProperties: ElementProperties;
}

export interface CreateImageRequest {
  objectId?: string;
  url: string;
  elementProperties: ElementProperties;
}

export interface CreateTableRequest {
  objectId?: string;
  rows: number;
  columns: number;
  elementProperties: ElementProperties;
}

export interface CreateVideoRequest {
  objectId?: string;
  source: string;
  id: string;
  elementProperties: ElementProperties;
}

export interface CreateLineRequest {
  objectId?: string;
  category: LineCategoryName;
  elementProperties: ElementProperties;
}

export interface CreateSheetsChartRequest {
  objectId?: string;
  spreadsheetId: string;
  chartId: number;
  linkingMode: 'LINKED' | 'NOT_LINKED_IMAGE';
  elementProperties: ElementProperties;
}

export interface CreateWordArtRequest {
  objectId?: string;
  renderedText: string;
  elementProperties: ElementProperties;
}

// ============================================================================
// Text
// ============================================================================

export interface InsertTextRequest {
  objectId: string;
  /** Set when `objectId` is a table. */
  cellLocation?: TableCellLocation;
  text: string;
  insertionIndex: number;
}

export interface DeleteTextRequest {
  objectId: string;
  cellLocation?: TableCellLocation;
  textRange: TextRange;
}

export interface UpdateTextStyleRequest {
  objectId: string;
  style: JsonObject;
  textRange: TextRange;
  fields: string;
}

export interface UpdateParagraphStyleRequest {
  objectId: string;
  style: JsonObject;
  textRange: TextRange;
  fields: string;
}

export type BulletPreset =
  | 'BULLET_DISC_CIRCLE_SQUARE'
  | 'BULLET_ARROW_DIAMOND_DISC'
  | 'BULLET_CHECKBOX'
  | 'NUMBERED_DIGIT_ALPHA_ROMAN'
  | 'NUMBERED_DIGIT_NESTED';

export interface CreateParagraphBulletsRequest {
  objectId: string;
  textRange: TextRange;
  bulletPreset: BulletPreset;
}

// ============================================================================
// Update
// ============================================================================

export interface UpdateShapePropertiesRequest {
  objectId: string;
  shapeProperties: JsonObject;
  fields: string;
}

export interface UpdateImagePropertiesRequest {
  objectId: string;
  imageProperties: JsonObject;
  fields: string;
}

export interface UpdateVideoPropertiesRequest {
  objectId: string;
  videoProperties: JsonObject;
  fields: string;
}

export interface UpdateLinePropertiesRequest {
  objectId: string;
  lineProperties: JsonObject;
  fields: string;
}

export interface UpdateSheetsChartPropertiesRequest {
  objectId: string;
  sheetsChartProperties: JsonObject;
  fields: string;
}

export interface UpdatePageElementPropertiesRequest {
  objectId: string;
  pageElementProperties: { title?: string; description?: string };
  fields: string;
}

export interface UpdatePagePropertiesRequest {
  objectId: string;
  pageProperties: JsonObject;
  fields: string;
}

export interface UpdateSlidePropertiesRequest {
  objectId: string;
  slideProperties: JsonObject;
  fields: string;
}

// ============================================================================
// Objects
// ============================================================================

export interface DuplicateObjectRequest {
  objectId: string;
  objectIds?: Record<string, string>;
}

export interface DeleteObjectRequest {
  objectId: string;
}

export interface UpdateSlidesPositionRequest {
  slideObjectIds: string[];
  insertionIndex: number;
}

export interface ReplaceAllTextRequest {
  containsText: { text: string; matchCase: boolean };
  replaceText: string;
  pageObjectIds?: string[];
}

export interface ReplaceImageRequest {
  imageObjectId: string;
  url: string;
  imageReplaceMethod?: 'CENTER_INSIDE' | 'CENTER_CROP';
}

export interface GroupObjectsRequest {
  groupObjectId?: string;
  childrenObjectIds: string[];
}

export interface UngroupObjectsRequest {
  objectIds: string[];
}

// ============================================================================
// Union
// ============================================================================

export interface RequestBodies {
  createSlide: CreateSlideRequest;
  createShape: CreateShapeRequest;
  createImage: CreateImageRequest;
  createTable: CreateTableRequest;
  createVideo: CreateVideoRequest;
  createLine: CreateLineRequest;
  createSheetsChart: CreateSheetsChartRequest;
  createWordArt: CreateWordArtRequest;
  insertText: InsertTextRequest;
  deleteText: DeleteTextRequest;
  updateTextStyle: UpdateTextStyleRequest;
  updateParagraphStyle: UpdateParagraphStyleRequest;
  createParagraphBullets: CreateParagraphBulletsRequest;
  updateShapeProperties: UpdateShapePropertiesRequest;
  updateImageProperties: UpdateImagePropertiesRequest;
  updateVideoProperties: UpdateVideoPropertiesRequest;
  updateLineProperties: UpdateLinePropertiesRequest;
  updateSheetsChartProperties: UpdateSheetsChartPropertiesRequest;
  updatePageElementProperties: UpdatePageElementPropertiesRequest;
  updatePageProperties: UpdatePagePropertiesRequest;
  updateSlideProperties: UpdateSlidePropertiesRequest;
  duplicateObject: DuplicateObjectRequest;
  deleteObject: DeleteObjectRequest;
  updateSlidesPosition: UpdateSlidesPositionRequest;
  replaceAllText: ReplaceAllTextRequest;
  replaceImage: ReplaceImageRequest;
  groupObjects: GroupObjectsRequest;
  ungroupObjects: UngroupObjectsRequest;
}

export type RequestKind = keyof RequestBodies;

/** `{ [kind]: body }` for a single operation kind. */
export type RequestOf<K extends RequestKind> = { [P in K]: RequestBodies[P] };

export type SlidesRequest = { [K in RequestKind]: RequestOf<K> }[RequestKind];
