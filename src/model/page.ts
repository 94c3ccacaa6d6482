/**
 * Pages: slides, layouts, masters, notes pages and the notes master.
 *
 * Page-kind properties are a tagged union (`properties.kind`) that must agree
 * with `pageType` whenever both are present. Slides reference their layout
 * and master by id; resolve them through the presentation lookups.
 */

import { z } from 'zod';
import { UnsupportedVariantError } from '../errors';
import { PageElementSchema, encodePageElement, type PageElement } from './elements';
import { PagePropertiesSchema, encodePageProperties, type PageProperties } from './styles';
import {
  UNKNOWN,
  addVariantIssue,
  encodeList,
  encodeObject,
  encodeOptional,
  lenientEnum,
  wireCodec,
  wireObject,
  type Extensible,
  type JsonObject,
} from './wire';

// ============================================================================
// Enums
// ============================================================================

export const PageTypeSchema = lenientEnum(['SLIDE', 'MASTER', 'LAYOUT', 'NOTES', 'NOTES_MASTER']);
export type PageType = z.infer<typeof PageTypeSchema>;

export const PredefinedLayoutSchema = z.enum([
  'PREDEFINED_LAYOUT_UNSPECIFIED',
  'BLANK',
  'CAPTION_ONLY',
  'TITLE',
  'TITLE_AND_BODY',
  'TITLE_AND_TWO_COLUMNS',
  'TITLE_ONLY',
  'SECTION_HEADER',
  'SECTION_TITLE_AND_DESCRIPTION',
  'ONE_COLUMN_TEXT',
  'MAIN_POINT',
  'BIG_NUMBER',
]);
export type PredefinedLayout = z.infer<typeof PredefinedLayoutSchema>;

// ============================================================================
// Page-kind Properties
// ============================================================================

export interface SlideProperties extends Extensible {
  layoutObjectId?: string;
  masterObjectId?: string;
  notesPage?: Page;
  isSkipped?: boolean;
}

export const SlidePropertiesSchema: z.ZodType<SlideProperties, z.ZodTypeDef, unknown> = wireObject({
  layoutObjectId: z.string().optional(),
  masterObjectId: z.string().optional(),
  notesPage: z.lazy(() => PageSchema).optional(),
  isSkipped: z.boolean().optional(),
});

export const LayoutPropertiesSchema = wireObject({
  masterObjectId: z.string().optional(),
  name: z.string().optional(),
  displayName: z.string().optional(),
});
export type LayoutProperties = z.infer<typeof LayoutPropertiesSchema>;

export const NotesPropertiesSchema = wireObject({
  speakerNotesObjectId: z.string().optional(),
});
export type NotesProperties = z.infer<typeof NotesPropertiesSchema>;

export const MasterPropertiesSchema = wireObject({
  displayName: z.string().optional(),
});
export type MasterProperties = z.infer<typeof MasterPropertiesSchema>;

export type PageVariant =
  | { kind: 'slide'; slideProperties: SlideProperties }
  | { kind: 'layout'; layoutProperties: LayoutProperties }
  | { kind: 'notes'; notesProperties: NotesProperties }
  | { kind: 'master'; masterProperties: MasterProperties };

const VARIANT_PAGE_TYPES: Record<PageVariant['kind'], PageType> = {
  slide: 'SLIDE',
  layout: 'LAYOUT',
  notes: 'NOTES',
  master: 'MASTER',
};

// ============================================================================
// Page
// ============================================================================

export interface Page extends Extensible {
  objectId?: string;
  pageType?: PageType;
  pageElements?: PageElement[];
  revisionId?: string;
  pageProperties?: PageProperties;
  properties?: PageVariant;
}

const PageWireSchema = wireObject({
  objectId: z.string().optional(),
  pageType: PageTypeSchema.optional(),
  pageElements: z.array(PageElementSchema).optional(),
  revisionId: z.string().optional(),
  pageProperties: PagePropertiesSchema.optional(),
  slideProperties: SlidePropertiesSchema.optional(),
  layoutProperties: LayoutPropertiesSchema.optional(),
  notesProperties: NotesPropertiesSchema.optional(),
  masterProperties: MasterPropertiesSchema.optional(),
});

export const PageSchema: z.ZodType<Page, z.ZodTypeDef, unknown> = PageWireSchema.transform(
  (wire, ctx) => {
    const variants: PageVariant[] = [];
    if (wire.slideProperties) {
      variants.push({ kind: 'slide', slideProperties: wire.slideProperties });
    }
    if (wire.layoutProperties) {
      variants.push({ kind: 'layout', layoutProperties: wire.layoutProperties });
    }
    if (wire.notesProperties) {
      variants.push({ kind: 'notes', notesProperties: wire.notesProperties });
    }
    if (wire.masterProperties) {
      variants.push({ kind: 'master', masterProperties: wire.masterProperties });
    }
    if (variants.length > 1) {
      addVariantIssue(
        ctx,
        `expected at most one of slideProperties, layoutProperties, notesProperties, masterProperties; found ${variants
          .map((variant) => variant.kind)
          .join(', ')}`
      );
      return z.NEVER;
    }

    const [variant] = variants;
    if (variant && wire.pageType !== undefined && wire.pageType !== UNKNOWN) {
      const expected = VARIANT_PAGE_TYPES[variant.kind];
      if (expected !== wire.pageType) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `${variant.kind} properties do not match page type ${wire.pageType}`,
          path: ['pageType'],
        });
        return z.NEVER;
      }
    }

    const page: Page = {};
    if (wire.objectId !== undefined) page.objectId = wire.objectId;
    if (wire.pageType !== undefined) page.pageType = wire.pageType;
    if (wire.pageElements !== undefined) page.pageElements = wire.pageElements;
    if (wire.revisionId !== undefined) page.revisionId = wire.revisionId;
    if (wire.pageProperties !== undefined) page.pageProperties = wire.pageProperties;
    if (variant) page.properties = variant;
    if (wire.unknownFields) page.unknownFields = wire.unknownFields;
    return page;
  }
);

// ============================================================================
// Encoders
// ============================================================================

export function encodeSlideProperties(props: SlideProperties): JsonObject {
  return encodeObject(
    {
      layoutObjectId: props.layoutObjectId,
      masterObjectId: props.masterObjectId,
      notesPage: encodeOptional(props.notesPage, encodePage),
      isSkipped: props.isSkipped,
    },
    props.unknownFields
  );
}

function encodeVariant(variant: PageVariant | undefined): JsonObject {
  if (!variant) return {};
  switch (variant.kind) {
    case 'slide':
      return { slideProperties: encodeSlideProperties(variant.slideProperties) };
    case 'layout': {
      const props = variant.layoutProperties;
      return {
        layoutProperties: encodeObject(
          { masterObjectId: props.masterObjectId, name: props.name, displayName: props.displayName },
          props.unknownFields
        ),
      };
    }
    case 'notes': {
      const props = variant.notesProperties;
      return {
        notesProperties: encodeObject(
          { speakerNotesObjectId: props.speakerNotesObjectId },
          props.unknownFields
        ),
      };
    }
    case 'master': {
      const props = variant.masterProperties;
      return {
        masterProperties: encodeObject({ displayName: props.displayName }, props.unknownFields),
      };
    }
  }
}

export function encodePage(page: Page): JsonObject {
  return encodeObject(
    {
      objectId: page.objectId,
      pageType: page.pageType,
      pageElements: encodeList(page.pageElements, encodePageElement),
      revisionId: page.revisionId,
      pageProperties: encodeOptional(page.pageProperties, encodePageProperties),
      ...encodeVariant(page.properties),
    },
    page.unknownFields
  );
}

export const PageCodec = wireCodec('Page', PageSchema, encodePage);

// ============================================================================
// Helpers
// ============================================================================

/** Declared type, else the type implied by the properties variant; the API default is SLIDE. */
export function effectivePageType(page: Page): PageType {
  if (page.pageType !== undefined) return page.pageType;
  if (page.properties) return VARIANT_PAGE_TYPES[page.properties.kind];
  return 'SLIDE';
}

export function slideProperties(page: Page): SlideProperties | undefined {
  return page.properties?.kind === 'slide' ? page.properties.slideProperties : undefined;
}

export type LayoutReference = { layoutId: string } | { predefinedLayout: PredefinedLayout };

/**
 * @throws UnsupportedVariantError unless exactly one of the two is given
 */
export function layoutReference(ref: {
  layoutId?: string;
  predefinedLayout?: PredefinedLayout;
}): LayoutReference {
  const { layoutId, predefinedLayout } = ref;
  if (layoutId !== undefined && predefinedLayout === undefined) return { layoutId };
  if (predefinedLayout !== undefined && layoutId === undefined) return { predefinedLayout };
  throw new UnsupportedVariantError('Exactly one of layoutId or predefinedLayout must be set');
}
