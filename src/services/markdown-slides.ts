/**
 * Slides from Markdown
 *
 * Creates a presentation from slide-ready markdown, or appends the sections
 * to an existing one, in a single batchUpdate.
 */

import { z } from 'zod';
import { SlidesError } from '../errors';
import { deleteObjectRequest } from '../requests/object-requests';
import type { SlidesRequest } from '../requests/types';
import { buildDeckRequests, firstSlidePlaceholders, parseMarkdownToSections } from '../templater/markdown-deck';
import { safeLog } from '../utils/log-sanitizer';
import { createBlankPresentation, getPresentation, requirePresentationId } from './presentation-service';
import type { SlidesConnection } from './slides-client';

// ============================================================================
// Schemas
// ============================================================================

const GenerateSlidesOptionsSchema = z.object({
  markdown: z.string().min(1),
  title: z.string().min(1),
  /** Append to existing presentation instead of creating a new one */
  appendTo: z.string().min(1).optional(),
});

export type GenerateSlidesOptions = z.infer<typeof GenerateSlidesOptionsSchema>;

export interface GenerateSlidesResult {
  presentationId: string;
  slidesUrl: string;
  slideCount: number;
}

// ============================================================================
// Public API
// ============================================================================

export async function generateSlidesFromMarkdown(
  conn: SlidesConnection,
  options: GenerateSlidesOptions
): Promise<GenerateSlidesResult> {
  const { markdown, title, appendTo } = GenerateSlidesOptionsSchema.parse(options);

  const sections = parseMarkdownToSections(markdown);
  if (sections.length === 0) {
    throw new SlidesError('No slide sections found in markdown');
  }

  let presentationId: string;
  let requests: SlidesRequest[];
  if (appendTo) {
    const existing = await getPresentation(conn, appendTo);
    presentationId = appendTo;
    requests = buildDeckRequests(sections, {
      idPrefix: `append_${Date.now().toString(36)}`,
      insertionIndex: existing.slides?.length ?? 0,
    });
  } else {
    // A new presentation comes with one title slide; the first section fills it.
    const created = await createBlankPresentation(conn, title);
    presentationId = requirePresentationId(created);
    const firstSlide = firstSlidePlaceholders(created);
    requests = buildDeckRequests(sections, firstSlide ? { firstSlide } : {});
    if (firstSlide && !sections[0]?.isTitle) {
      requests.push(deleteObjectRequest(firstSlide.slideObjectId));
    }
  }

  if (requests.length > 0) {
    await conn.batchUpdate(presentationId, requests);
  }
  safeLog.info('[MarkdownSlides] Generated slides', {
    presentationId,
    sections: sections.length,
    requests: requests.length,
    appended: Boolean(appendTo),
  });

  return {
    presentationId,
    slidesUrl: `https://docs.google.com/presentation/d/${presentationId}`,
    slideCount: sections.length,
  };
}
