/**
 * Presentation root aggregate and id lookups across its pages.
 */

import { z } from 'zod';
import { SizeSchema, encodeSize } from './primitives';
import { PageSchema, encodePage, slideProperties, type Page } from './page';
import { encodeList, encodeObject, encodeOptional, wireCodec, wireObject, type JsonObject } from './wire';
import { safeLog } from '../utils/log-sanitizer';

export const PresentationSchema = wireObject({
  presentationId: z.string().optional(),
  pageSize: SizeSchema.optional(),
  slides: z.array(PageSchema).optional(),
  title: z.string().optional(),
  masters: z.array(PageSchema).optional(),
  layouts: z.array(PageSchema).optional(),
  locale: z.string().optional(),
  revisionId: z.string().optional(),
  notesMaster: PageSchema.optional(),
});
export type Presentation = z.infer<typeof PresentationSchema>;

export function encodePresentation(presentation: Presentation): JsonObject {
  return encodeObject(
    {
      presentationId: presentation.presentationId,
      pageSize: encodeOptional(presentation.pageSize, encodeSize),
      slides: encodeList(presentation.slides, encodePage),
      title: presentation.title,
      masters: encodeList(presentation.masters, encodePage),
      layouts: encodeList(presentation.layouts, encodePage),
      locale: presentation.locale,
      revisionId: presentation.revisionId,
      notesMaster: encodeOptional(presentation.notesMaster, encodePage),
    },
    presentation.unknownFields
  );
}

export const PresentationCodec = wireCodec('Presentation', PresentationSchema, encodePresentation);

// ============================================================================
// Lookups
// ============================================================================

/** Logs and returns undefined when the presentation has no such slide. */
export function findSlide(presentation: Presentation, slideId: string): Page | undefined {
  const slide = presentation.slides?.find((candidate) => candidate.objectId === slideId);
  if (!slide) {
    safeLog.warn('[Presentation] Slide not found', {
      presentationId: presentation.presentationId,
      slideId,
    });
  }
  return slide;
}

export function layoutOf(presentation: Presentation, slide: Page): Page | undefined {
  const layoutId = slideProperties(slide)?.layoutObjectId;
  if (layoutId === undefined) return undefined;
  return presentation.layouts?.find((layout) => layout.objectId === layoutId);
}

/** Slides name their master directly; layouts through their layout properties. */
export function masterOf(presentation: Presentation, page: Page): Page | undefined {
  const props = page.properties;
  let masterId: string | undefined;
  if (props?.kind === 'slide') masterId = props.slideProperties.masterObjectId;
  else if (props?.kind === 'layout') masterId = props.layoutProperties.masterObjectId;
  if (masterId === undefined) return undefined;
  return presentation.masters?.find((master) => master.objectId === masterId);
}

export function notesPageOf(slide: Page): Page | undefined {
  return slideProperties(slide)?.notesPage;
}
