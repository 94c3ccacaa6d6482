/**
 * Presentation / Page Orchestration
 *
 * Every function takes the connection explicitly. Replies are decoded with
 * the model codecs; remote errors propagate unchanged from the connection.
 */

import { z } from 'zod';
import { SlidesError } from '../errors';
import type { PageElement } from '../model/elements';
import { PageCodec, layoutReference, slideProperties, type Page } from '../model/page';
import { PresentationCodec, type Presentation } from '../model/presentation';
import { decodeWith, type JsonObject } from '../model/wire';
import {
  elementCreateRequests,
  elementUpdateRequests,
  type ElementCreateOptions,
} from '../requests/element-requests';
import { deleteObjectRequest, duplicateObjectRequest } from '../requests/object-requests';
import {
  createSlideRequest,
  pagePropertiesRequest,
  slidePropertiesRequest,
  slidesPositionRequest,
  type CreateSlideOptions,
} from '../requests/page-requests';
import type { SlidesRequest } from '../requests/types';
import { generateObjectId, type IdFactory } from '../utils/object-id';
import { safeLog } from '../utils/log-sanitizer';
import type { BatchUpdateResponse, SlidesConnection } from './slides-client';

// ============================================================================
// Reply Schemas
// ============================================================================

const CreatedPresentationSchema = z.object({ presentationId: z.string().min(1) });

const CreateSlideReplySchema = z.object({
  createSlide: z.object({ objectId: z.string().min(1) }),
});

const DuplicateObjectReplySchema = z.object({
  duplicateObject: z.object({ objectId: z.string().min(1) }),
});

// ============================================================================
// Presentations
// ============================================================================

export async function getPresentation(conn: SlidesConnection, presentationId: string): Promise<Presentation> {
  return PresentationCodec.decode(await conn.getPresentation(presentationId));
}

export async function createBlankPresentation(conn: SlidesConnection, title: string): Promise<Presentation> {
  const created = await conn.createPresentation({ title });
  const { presentationId } = decodeWith(CreatedPresentationSchema, created, 'Presentation');
  safeLog.info('[Presentations] Created presentation', { presentationId, title });
  return getPresentation(conn, presentationId);
}

/**
 * Creates a new presentation from a local model. The server assigns the id
 * and revision; the result is the re-fetched copy.
 */
export async function clonePresentation(conn: SlidesConnection, presentation: Presentation): Promise<Presentation> {
  const body: JsonObject = {};
  for (const [key, value] of Object.entries(PresentationCodec.encode(presentation))) {
    if (key !== 'presentationId' && key !== 'revisionId') body[key] = value;
  }
  const created = await conn.createPresentation(body);
  const { presentationId } = decodeWith(CreatedPresentationSchema, created, 'Presentation');
  return getPresentation(conn, presentationId);
}

/** Drive-side copy, which keeps everything the Slides create call drops. */
export async function copyPresentation(
  conn: SlidesConnection,
  presentationId: string,
  name: string
): Promise<Presentation> {
  const copyId = await conn.copyPresentation(presentationId, name);
  safeLog.info('[Presentations] Copied presentation', { presentationId, copyId });
  return getPresentation(conn, copyId);
}

/** Fresh server state for a presentation; the argument is left untouched. */
export async function syncFromCloud(conn: SlidesConnection, presentation: Presentation): Promise<Presentation> {
  return getPresentation(conn, requirePresentationId(presentation));
}

// ============================================================================
// Slides
// ============================================================================

export async function getSlide(conn: SlidesConnection, presentationId: string, slideId: string): Promise<Page> {
  return PageCodec.decode(await conn.getPage(presentationId, slideId));
}

export async function createBlankSlide(
  conn: SlidesConnection,
  presentationId: string,
  options: CreateSlideOptions = {}
): Promise<Page> {
  const response = await conn.batchUpdate(presentationId, [createSlideRequest(options)]);
  const slideId = decodeWith(CreateSlideReplySchema, response.replies[0], 'CreateSlideResponse').createSlide.objectId;
  return getSlide(conn, presentationId, slideId);
}

export interface WriteSlideCopyOptions {
  insertionIndex?: number;
  idFactory?: IdFactory;
}

/**
 * Recreates `slide` in `presentationId` on the same layout: a blank slide,
 * then one batch with its page and slide properties and every element.
 * Element ids are newly generated.
 */
export async function writeSlideCopy(
  conn: SlidesConnection,
  slide: Page,
  presentationId: string,
  options: WriteSlideCopyOptions = {}
): Promise<Page> {
  const props = slideProperties(slide);
  const createOptions: CreateSlideOptions = {};
  if (options.insertionIndex !== undefined) createOptions.insertionIndex = options.insertionIndex;
  if (props?.layoutObjectId !== undefined) {
    createOptions.layout = layoutReference({ layoutId: props.layoutObjectId });
  }

  const blank = await createBlankSlide(conn, presentationId, createOptions);
  const slideId = requireObjectId(blank, 'created slide');

  const requests: SlidesRequest[] = [];
  if (slide.pageProperties) {
    const request = pagePropertiesRequest(slideId, slide.pageProperties);
    if (request) requests.push(request);
  }
  if (props) {
    const request = slidePropertiesRequest(slideId, props);
    if (request) requests.push(request);
  }
  const idFactory = options.idFactory ?? generateObjectId;
  for (const element of slide.pageElements ?? []) {
    requests.push(...elementCreateRequests(element, slideId, { idFactory }).requests);
  }

  if (requests.length > 0) {
    await conn.batchUpdate(presentationId, requests);
  }
  safeLog.info('[Presentations] Wrote slide copy', {
    presentationId,
    sourceSlideId: slide.objectId,
    slideId,
    requests: requests.length,
  });
  return getSlide(conn, presentationId, slideId);
}

export async function moveSlides(
  conn: SlidesConnection,
  presentationId: string,
  slideIds: string[],
  insertionIndex: number
): Promise<BatchUpdateResponse> {
  return conn.batchUpdate(presentationId, [slidesPositionRequest(slideIds, insertionIndex)]);
}

// ============================================================================
// Objects
// ============================================================================

/** Resolves to the id of the duplicate. */
export async function duplicateObject(
  conn: SlidesConnection,
  presentationId: string,
  objectId: string,
  objectIds?: Record<string, string>
): Promise<string> {
  const response = await conn.batchUpdate(presentationId, [duplicateObjectRequest(objectId, objectIds)]);
  return decodeWith(DuplicateObjectReplySchema, response.replies[0], 'DuplicateObjectResponse').duplicateObject
    .objectId;
}

export async function deleteObject(
  conn: SlidesConnection,
  presentationId: string,
  objectId: string
): Promise<BatchUpdateResponse> {
  return conn.batchUpdate(presentationId, [deleteObjectRequest(objectId)]);
}

/**
 * Creates `element` on `pageId` and resolves to the new object id.
 *
 * @throws UnsupportedVariantError before any call when the element cannot be created
 */
export async function createElement(
  conn: SlidesConnection,
  presentationId: string,
  pageId: string,
  element: PageElement,
  options: ElementCreateOptions = {}
): Promise<string> {
  const creation = elementCreateRequests(element, pageId, options);
  await conn.batchUpdate(presentationId, creation.requests);
  return creation.objectId;
}

/** Pushes the element's text and writable properties; no call when there is nothing to send. */
export async function updateElement(
  conn: SlidesConnection,
  presentationId: string,
  objectId: string,
  element: PageElement
): Promise<BatchUpdateResponse | undefined> {
  const requests = elementUpdateRequests(element, objectId);
  if (requests.length === 0) return undefined;
  return conn.batchUpdate(presentationId, requests);
}

// ============================================================================
// Helpers
// ============================================================================

export function requirePresentationId(presentation: Presentation): string {
  if (presentation.presentationId === undefined) {
    throw new SlidesError('Presentation has no presentationId; it has not been created yet');
  }
  return presentation.presentationId;
}

function requireObjectId(page: Page, label: string): string {
  if (page.objectId === undefined) {
    throw new SlidesError(`The ${label} has no objectId`);
  }
  return page.objectId;
}
