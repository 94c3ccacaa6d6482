/**
 * Fluent collector for batchUpdate requests.
 */

import type { PageElement } from '../model/elements';
import { encodeVideoProperties, type VideoProperties } from '../model/styles';
import { elementPropertiesFor } from '../requests/element-requests';
import { fieldMask, isEmptyPayload, prepareUpdatePayload } from '../requests/field-mask';
import {
  deleteObjectRequest,
  duplicateObjectRequest,
  replaceAllTextRequest,
  replaceImageRequest,
  type ReplaceAllTextOptions,
} from '../requests/object-requests';
import { createSlideRequest, slidesPositionRequest, type CreateSlideOptions } from '../requests/page-requests';
import type { SlidesRequest } from '../requests/types';
import type { BatchUpdateResponse, SlidesConnection, WriteControl } from '../services/slides-client';
import { safeLog } from '../utils/log-sanitizer';

export type VideoSourceName = 'YOUTUBE' | 'DRIVE';

export class BatchRequestBuilder {
  private requests: SlidesRequest[] = [];

  get size(): number {
    return this.requests.length;
  }

  add(...requests: SlidesRequest[]): this {
    this.requests.push(...requests);
    return this;
  }

  createSlide(options: CreateSlideOptions = {}): this {
    return this.add(createSlideRequest(options));
  }

  duplicate(objectId: string, objectIds?: Record<string, string>): this {
    return this.add(duplicateObjectRequest(objectId, objectIds));
  }

  delete(objectId: string): this {
    return this.add(deleteObjectRequest(objectId));
  }

  moveSlide(slideId: string, insertionIndex: number): this {
    return this.add(slidesPositionRequest([slideId], insertionIndex));
  }

  replaceAllText(find: string, replacement: string, options: ReplaceAllTextOptions = {}): this {
    return this.add(replaceAllTextRequest(find, replacement, options));
  }

  replaceImage(imageObjectId: string, url: string, method?: 'CENTER_INSIDE' | 'CENTER_CROP'): this {
    return this.add(replaceImageRequest(imageObjectId, url, method));
  }

  createVideo(
    slideId: string,
    source: VideoSourceName,
    videoId: string,
    geometry: Pick<PageElement, 'size' | 'transform'>,
    objectId?: string
  ): this {
    const elementProperties = elementPropertiesFor(geometry, slideId);
    return this.add({
      createVideo: objectId
        ? { objectId, source, id: videoId, elementProperties }
        : { source, id: videoId, elementProperties },
    });
  }

  /** Skipped when nothing in `properties` is writable. */
  updateVideoProperties(videoObjectId: string, properties: VideoProperties): this {
    const payload = prepareUpdatePayload(encodeVideoProperties(properties));
    if (isEmptyPayload(payload)) return this;
    return this.add({
      updateVideoProperties: { objectId: videoObjectId, videoProperties: payload, fields: fieldMask(payload) },
    });
  }

  toRequests(): SlidesRequest[] {
    return [...this.requests];
  }

  /**
   * Sends the collected requests as one batch and clears them once it
   * succeeds. An empty batch resolves without a call.
   */
  async execute(
    conn: SlidesConnection,
    presentationId: string,
    writeControl?: WriteControl
  ): Promise<BatchUpdateResponse> {
    if (this.requests.length === 0) {
      return { presentationId, replies: [] };
    }
    safeLog.debug('[Batch] Executing', { presentationId, requests: this.requests.length });
    const response = await conn.batchUpdate(presentationId, this.toRequests(), writeControl);
    this.requests = [];
    return response;
  }
}
