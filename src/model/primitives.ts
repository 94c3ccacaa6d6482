/**
 * Primitive value types: dimensions, sizes, transforms, colours, links and
 * the enums shared across the model.
 */

import { z } from 'zod';
import {
  encodeObject,
  encodeOptional,
  lenientEnum,
  wireCodec,
  wireObject,
  type JsonObject,
  type JsonValue,
} from './wire';

// ============================================================================
// Enums
// ============================================================================

/** Strict: an unrecognised unit cannot be converted and fails decoding. */
export const UnitSchema = z.enum(['EMU', 'PT', 'UNIT_UNSPECIFIED']);
export type Unit = z.infer<typeof UnitSchema>;

export const ThemeColorTypeSchema = lenientEnum([
  'THEME_COLOR_TYPE_UNSPECIFIED',
  'DARK1',
  'LIGHT1',
  'DARK2',
  'LIGHT2',
  'ACCENT1',
  'ACCENT2',
  'ACCENT3',
  'ACCENT4',
  'ACCENT5',
  'ACCENT6',
  'HYPERLINK',
  'FOLLOWED_HYPERLINK',
  'TEXT1',
  'BACKGROUND1',
  'TEXT2',
  'BACKGROUND2',
]);
export type ThemeColorType = z.infer<typeof ThemeColorTypeSchema>;

export const DashStyleSchema = lenientEnum([
  'DASH_STYLE_UNSPECIFIED',
  'SOLID',
  'DOT',
  'DASH',
  'DASH_DOT',
  'LONG_DASH',
  'LONG_DASH_DOT',
]);
export type DashStyle = z.infer<typeof DashStyleSchema>;

/** Server-computed; never sent back in an update payload. */
export const PropertyStateSchema = lenientEnum(['RENDERED', 'NOT_RENDERED', 'INHERIT']);
export type PropertyState = z.infer<typeof PropertyStateSchema>;

export const ShapeTypeSchema = lenientEnum([
  'TYPE_UNSPECIFIED',
  'TEXT_BOX',
  'RECTANGLE',
  'ROUND_RECTANGLE',
  'ELLIPSE',
  'ARC',
  'BEVEL',
  'CLOUD',
  'CUSTOM',
  'DIAMOND',
  'DONUT',
  'DOWN_ARROW',
  'FLOWCHART_PROCESS',
  'HEART',
  'HEXAGON',
  'LEFT_ARROW',
  'OCTAGON',
  'PARALLELOGRAM',
  'PENTAGON',
  'PIE',
  'PLUS',
  'RIGHT_ARROW',
  'ROUND_2_SAME_RECTANGLE',
  'SPEECH',
  'STAR_5',
  'TRAPEZOID',
  'TRIANGLE',
  'UP_ARROW',
  'WAVE',
]);
export type ShapeType = z.infer<typeof ShapeTypeSchema>;

export const PlaceholderTypeSchema = lenientEnum([
  'NONE',
  'BODY',
  'CHART',
  'CLIP_ART',
  'CENTERED_TITLE',
  'DIAGRAM',
  'DATE_AND_TIME',
  'FOOTER',
  'HEADER',
  'MEDIA',
  'OBJECT',
  'PICTURE',
  'SLIDE_NUMBER',
  'SUBTITLE',
  'TABLE',
  'TITLE',
  'SLIDE_IMAGE',
]);
export type PlaceholderType = z.infer<typeof PlaceholderTypeSchema>;

export const VideoSourceTypeSchema = lenientEnum(['SOURCE_UNSPECIFIED', 'YOUTUBE', 'DRIVE']);
export type VideoSourceType = z.infer<typeof VideoSourceTypeSchema>;

export const LineCategorySchema = lenientEnum([
  'LINE_CATEGORY_UNSPECIFIED',
  'STRAIGHT',
  'BENT',
  'CURVED',
]);
export type LineCategory = z.infer<typeof LineCategorySchema>;

// ============================================================================
// Dimension / Size
// ============================================================================

export const DimensionSchema = wireObject({
  magnitude: z.number().optional(),
  unit: UnitSchema.optional(),
});
export type Dimension = z.infer<typeof DimensionSchema>;

export function encodeDimension(dimension: Dimension): JsonObject {
  return encodeObject(
    { magnitude: dimension.magnitude, unit: dimension.unit },
    dimension.unknownFields
  );
}

/**
 * A width or height. The wire format allows a bare number (EMU) or a
 * `{magnitude, unit}` object; `form` records which one was read.
 */
export interface Extent {
  form: 'bare' | 'object';
  dimension: Dimension;
}

export const ExtentSchema: z.ZodType<Extent, z.ZodTypeDef, unknown> = z
  .union([z.number(), DimensionSchema])
  .transform((value): Extent =>
    typeof value === 'number'
      ? { form: 'bare', dimension: { magnitude: value, unit: 'EMU' } }
      : { form: 'object', dimension: value }
  );

/** Bare form survives only while the value is still expressible as a plain EMU number. */
export function encodeExtent(extent: Extent): JsonValue {
  const { magnitude, unit, unknownFields } = extent.dimension;
  if (
    extent.form === 'bare' &&
    magnitude !== undefined &&
    (unit === undefined || unit === 'EMU') &&
    unknownFields === undefined
  ) {
    return magnitude;
  }
  return encodeDimension(extent.dimension);
}

export function extentOf(magnitude: number, unit: Unit = 'EMU'): Extent {
  return { form: 'object', dimension: { magnitude, unit } };
}

export const SizeSchema = wireObject({
  width: ExtentSchema,
  height: ExtentSchema,
});
export type Size = z.infer<typeof SizeSchema>;

export function encodeSize(size: Size): JsonObject {
  return encodeObject(
    { width: encodeExtent(size.width), height: encodeExtent(size.height) },
    size.unknownFields
  );
}

export function emuSize(width: number, height: number): Size {
  return { width: extentOf(width), height: extentOf(height) };
}

// ============================================================================
// Transform
// ============================================================================

/** Affine transform; the API omits zero-valued components. */
export const TransformSchema = wireObject({
  scaleX: z.number().optional(),
  scaleY: z.number().optional(),
  shearX: z.number().optional(),
  shearY: z.number().optional(),
  translateX: z.number().optional(),
  translateY: z.number().optional(),
  unit: UnitSchema.optional(),
});
export type Transform = z.infer<typeof TransformSchema>;

export function encodeTransform(transform: Transform): JsonObject {
  return encodeObject(
    {
      scaleX: transform.scaleX,
      scaleY: transform.scaleY,
      shearX: transform.shearX,
      shearY: transform.shearY,
      translateX: transform.translateX,
      translateY: transform.translateY,
      unit: transform.unit,
    },
    transform.unknownFields
  );
}

export function translation(translateX: number, translateY: number): Transform {
  return { scaleX: 1, scaleY: 1, translateX, translateY, unit: 'EMU' };
}

// ============================================================================
// Colour
// ============================================================================

export const RgbColorSchema = wireObject({
  red: z.number().optional(),
  green: z.number().optional(),
  blue: z.number().optional(),
});
export type RgbColor = z.infer<typeof RgbColorSchema>;

export function encodeRgbColor(color: RgbColor): JsonObject {
  return encodeObject(
    { red: color.red, green: color.green, blue: color.blue },
    color.unknownFields
  );
}

/** OpaqueColor on the wire: an RGB value or a theme colour reference. */
export const ColorSchema = wireObject({
  rgbColor: RgbColorSchema.optional(),
  themeColor: ThemeColorTypeSchema.optional(),
});
export type Color = z.infer<typeof ColorSchema>;

export function encodeColor(color: Color): JsonObject {
  return encodeObject(
    { rgbColor: encodeOptional(color.rgbColor, encodeRgbColor), themeColor: color.themeColor },
    color.unknownFields
  );
}

export const ColorCodec = wireCodec('Color', ColorSchema, encodeColor);

/** A colour that may be transparent (absent `opaqueColor`). */
export const OptionalColorSchema = wireObject({
  opaqueColor: ColorSchema.optional(),
});
export type OptionalColor = z.infer<typeof OptionalColorSchema>;

export function encodeOptionalColor(color: OptionalColor): JsonObject {
  return encodeObject(
    { opaqueColor: encodeOptional(color.opaqueColor, encodeColor) },
    color.unknownFields
  );
}

// ============================================================================
// Link
// ============================================================================

export const LinkSchema = wireObject({
  url: z.string().optional(),
  relativeLink: lenientEnum([
    'RELATIVE_SLIDE_LINK_UNSPECIFIED',
    'NEXT_SLIDE',
    'PREVIOUS_SLIDE',
    'FIRST_SLIDE',
    'LAST_SLIDE',
  ]).optional(),
  pageObjectId: z.string().optional(),
  slideIndex: z.number().int().optional(),
});
export type Link = z.infer<typeof LinkSchema>;

export function encodeLink(link: Link): JsonObject {
  return encodeObject(
    {
      url: link.url,
      relativeLink: link.relativeLink,
      pageObjectId: link.pageObjectId,
      slideIndex: link.slideIndex,
    },
    link.unknownFields
  );
}

// ============================================================================
// Codecs
// ============================================================================

export const DimensionCodec = wireCodec('Dimension', DimensionSchema, encodeDimension);
export const SizeCodec = wireCodec('Size', SizeSchema, encodeSize);
export const TransformCodec = wireCodec('Transform', TransformSchema, encodeTransform);
