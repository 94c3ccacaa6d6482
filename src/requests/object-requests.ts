/**
 * Requests addressing existing objects by id.
 */

import type { RequestOf } from './types';

export function duplicateObjectRequest(
  objectId: string,
  objectIds?: Record<string, string>
): RequestOf<'duplicateObject'> {
  return { duplicateObject: objectIds ? { objectId, objectIds } : { objectId } };
}

export function deleteObjectRequest(objectId: string): RequestOf<'deleteObject'> {
  return { deleteObject: { objectId } };
}

export interface ReplaceAllTextOptions {
  matchCase?: boolean;
  pageObjectIds?: string[];
}

export function replaceAllTextRequest(
  find: string,
  replaceText: string,
  options: ReplaceAllTextOptions = {}
): RequestOf<'replaceAllText'> {
  const replaceAllText: RequestOf<'replaceAllText'>['replaceAllText'] = {
    containsText: { text: find, matchCase: options.matchCase ?? true },
    replaceText,
  };
  if (options.pageObjectIds && options.pageObjectIds.length > 0) {
    replaceAllText.pageObjectIds = options.pageObjectIds;
  }
  return { replaceAllText };
}

export function replaceImageRequest(
  imageObjectId: string,
  url: string,
  imageReplaceMethod: 'CENTER_INSIDE' | 'CENTER_CROP' = 'CENTER_INSIDE'
): RequestOf<'replaceImage'> {
  return { replaceImage: { imageObjectId, url, imageReplaceMethod } };
}

export function groupObjectsRequest(
  childrenObjectIds: string[],
  groupObjectId?: string
): RequestOf<'groupObjects'> {
  return {
    groupObjects: groupObjectId ? { groupObjectId, childrenObjectIds } : { childrenObjectIds },
  };
}

export function ungroupObjectsRequest(objectIds: string[]): RequestOf<'ungroupObjects'> {
  return { ungroupObjects: { objectIds } };
}
