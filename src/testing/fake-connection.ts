/**
 * In-process SlidesConnection for tests. Presentations and pages are served
 * from maps; batchUpdate records its requests and answers with queued replies.
 */

import { vi } from 'vitest';
import { SlidesApiError } from '../errors';
import type { JsonObject } from '../model/wire';
import type { SlidesRequest } from '../requests/types';
import type { BatchUpdateResponse, SlidesConnection, WriteControl } from '../services/slides-client';

export class FakeConnection implements SlidesConnection {
  readonly presentations = new Map<string, JsonObject>();
  readonly pages = new Map<string, JsonObject>();
  readonly batches: SlidesRequest[][] = [];
  readonly created: JsonObject[] = [];
  replies: JsonObject[][] = [];
  /** Slides a newly created presentation starts with. */
  initialSlides: JsonObject[] = [];

  getPresentation = vi.fn(async (presentationId: string): Promise<JsonObject> => {
    const found = this.presentations.get(presentationId);
    if (!found) throw new SlidesApiError('getPresentation', 404, 'not found');
    return found;
  });

  getPage = vi.fn(async (_presentationId: string, pageObjectId: string): Promise<JsonObject> => {
    const found = this.pages.get(pageObjectId);
    if (!found) throw new SlidesApiError('getPage', 404, 'not found');
    return found;
  });

  createPresentation = vi.fn(async (body: JsonObject): Promise<JsonObject> => {
    this.created.push(body);
    const presentationId = `created-${this.created.length}`;
    const stored: JsonObject = { ...body, presentationId };
    if (this.initialSlides.length > 0) stored.slides = this.initialSlides;
    this.presentations.set(presentationId, stored);
    return stored;
  });

  batchUpdate = vi.fn(
    async (presentationId: string, requests: SlidesRequest[], _writeControl?: WriteControl): Promise<BatchUpdateResponse> => {
      this.batches.push(requests);
      return { presentationId, replies: this.replies.shift() ?? [] };
    }
  );

  copyPresentation = vi.fn(async (fileId: string, name: string): Promise<string> => {
    const source = this.presentations.get(fileId) ?? {};
    this.presentations.set('copy-1', { ...source, presentationId: 'copy-1', title: name });
    return 'copy-1';
  });
}
