/**
 * Style and property aggregates.
 *
 * Every field is optional and absence means "inherit", so nothing here
 * carries a default.
 */

import { z } from 'zod';
import {
  ColorSchema,
  DashStyleSchema,
  DimensionSchema,
  LinkSchema,
  OptionalColorSchema,
  PropertyStateSchema,
  RgbColorSchema,
  SizeSchema,
  ThemeColorTypeSchema,
  TransformSchema,
  encodeColor,
  encodeDimension,
  encodeLink,
  encodeOptionalColor,
  encodeRgbColor,
  encodeSize,
  encodeTransform,
} from './primitives';
import {
  encodeList,
  encodeObject,
  encodeOptional,
  lenientEnum,
  wireCodec,
  wireObject,
  type JsonObject,
} from './wire';

// ============================================================================
// Fills
// ============================================================================

export const SolidFillSchema = wireObject({
  color: ColorSchema.optional(),
  alpha: z.number().optional(),
});
export type SolidFill = z.infer<typeof SolidFillSchema>;

export function encodeSolidFill(fill: SolidFill): JsonObject {
  return encodeObject(
    { color: encodeOptional(fill.color, encodeColor), alpha: fill.alpha },
    fill.unknownFields
  );
}

export const ShapeBackgroundFillSchema = wireObject({
  propertyState: PropertyStateSchema.optional(),
  solidFill: SolidFillSchema.optional(),
});
export type ShapeBackgroundFill = z.infer<typeof ShapeBackgroundFillSchema>;

export function encodeShapeBackgroundFill(fill: ShapeBackgroundFill): JsonObject {
  return encodeObject(
    { propertyState: fill.propertyState, solidFill: encodeOptional(fill.solidFill, encodeSolidFill) },
    fill.unknownFields
  );
}

export const StretchedPictureFillSchema = wireObject({
  contentUrl: z.string().optional(),
  size: SizeSchema.optional(),
});
export type StretchedPictureFill = z.infer<typeof StretchedPictureFillSchema>;

export function encodeStretchedPictureFill(fill: StretchedPictureFill): JsonObject {
  return encodeObject(
    { contentUrl: fill.contentUrl, size: encodeOptional(fill.size, encodeSize) },
    fill.unknownFields
  );
}

export const PageBackgroundFillSchema = wireObject({
  propertyState: PropertyStateSchema.optional(),
  solidFill: SolidFillSchema.optional(),
  stretchedPictureFill: StretchedPictureFillSchema.optional(),
});
export type PageBackgroundFill = z.infer<typeof PageBackgroundFillSchema>;

export function encodePageBackgroundFill(fill: PageBackgroundFill): JsonObject {
  return encodeObject(
    {
      propertyState: fill.propertyState,
      solidFill: encodeOptional(fill.solidFill, encodeSolidFill),
      stretchedPictureFill: encodeOptional(fill.stretchedPictureFill, encodeStretchedPictureFill),
    },
    fill.unknownFields
  );
}

// ============================================================================
// Outline / Shadow
// ============================================================================

export const OutlineSchema = wireObject({
  outlineFill: wireObject({ solidFill: SolidFillSchema.optional() }).optional(),
  weight: DimensionSchema.optional(),
  dashStyle: DashStyleSchema.optional(),
  propertyState: PropertyStateSchema.optional(),
});
export type Outline = z.infer<typeof OutlineSchema>;

export function encodeOutline(outline: Outline): JsonObject {
  const fill = outline.outlineFill;
  return encodeObject(
    {
      outlineFill:
        fill &&
        encodeObject({ solidFill: encodeOptional(fill.solidFill, encodeSolidFill) }, fill.unknownFields),
      weight: encodeOptional(outline.weight, encodeDimension),
      dashStyle: outline.dashStyle,
      propertyState: outline.propertyState,
    },
    outline.unknownFields
  );
}

export const ShadowSchema = wireObject({
  type: lenientEnum(['SHADOW_TYPE_UNSPECIFIED', 'OUTER']).optional(),
  transform: TransformSchema.optional(),
  alignment: z.string().optional(),
  blurRadius: DimensionSchema.optional(),
  color: ColorSchema.optional(),
  alpha: z.number().optional(),
  rotateWithShape: z.boolean().optional(),
  propertyState: PropertyStateSchema.optional(),
});
export type Shadow = z.infer<typeof ShadowSchema>;

export function encodeShadow(shadow: Shadow): JsonObject {
  return encodeObject(
    {
      type: shadow.type,
      transform: encodeOptional(shadow.transform, encodeTransform),
      alignment: shadow.alignment,
      blurRadius: encodeOptional(shadow.blurRadius, encodeDimension),
      color: encodeOptional(shadow.color, encodeColor),
      alpha: shadow.alpha,
      rotateWithShape: shadow.rotateWithShape,
      propertyState: shadow.propertyState,
    },
    shadow.unknownFields
  );
}

// ============================================================================
// Shape Properties
// ============================================================================

export const AutofitSchema = wireObject({
  autofitType: lenientEnum(['AUTOFIT_TYPE_UNSPECIFIED', 'NONE', 'TEXT_AUTOFIT', 'SHAPE_AUTOFIT']).optional(),
  fontScale: z.number().optional(),
  lineSpacingReduction: z.number().optional(),
});
export type Autofit = z.infer<typeof AutofitSchema>;

export function encodeAutofit(autofit: Autofit): JsonObject {
  return encodeObject(
    {
      autofitType: autofit.autofitType,
      fontScale: autofit.fontScale,
      lineSpacingReduction: autofit.lineSpacingReduction,
    },
    autofit.unknownFields
  );
}

export const ContentAlignmentSchema = lenientEnum([
  'CONTENT_ALIGNMENT_UNSPECIFIED',
  'CONTENT_ALIGNMENT_UNSUPPORTED',
  'TOP',
  'MIDDLE',
  'BOTTOM',
]);

export const ShapePropertiesSchema = wireObject({
  shapeBackgroundFill: ShapeBackgroundFillSchema.optional(),
  outline: OutlineSchema.optional(),
  shadow: ShadowSchema.optional(),
  link: LinkSchema.optional(),
  contentAlignment: ContentAlignmentSchema.optional(),
  autofit: AutofitSchema.optional(),
});
export type ShapeProperties = z.infer<typeof ShapePropertiesSchema>;

export function encodeShapeProperties(props: ShapeProperties): JsonObject {
  return encodeObject(
    {
      shapeBackgroundFill: encodeOptional(props.shapeBackgroundFill, encodeShapeBackgroundFill),
      outline: encodeOptional(props.outline, encodeOutline),
      shadow: encodeOptional(props.shadow, encodeShadow),
      link: encodeOptional(props.link, encodeLink),
      contentAlignment: props.contentAlignment,
      autofit: encodeOptional(props.autofit, encodeAutofit),
    },
    props.unknownFields
  );
}

// ============================================================================
// Image / Video / Line / Chart Properties
// ============================================================================

export const CropPropertiesSchema = wireObject({
  leftOffset: z.number().optional(),
  rightOffset: z.number().optional(),
  topOffset: z.number().optional(),
  bottomOffset: z.number().optional(),
  angle: z.number().optional(),
});
export type CropProperties = z.infer<typeof CropPropertiesSchema>;

export function encodeCropProperties(crop: CropProperties): JsonObject {
  return encodeObject(
    {
      leftOffset: crop.leftOffset,
      rightOffset: crop.rightOffset,
      topOffset: crop.topOffset,
      bottomOffset: crop.bottomOffset,
      angle: crop.angle,
    },
    crop.unknownFields
  );
}

export const ColorStopSchema = wireObject({
  color: ColorSchema.optional(),
  alpha: z.number().optional(),
  position: z.number().optional(),
});
export type ColorStop = z.infer<typeof ColorStopSchema>;

export const RecolorSchema = wireObject({
  recolorStops: z.array(ColorStopSchema).optional(),
  name: z.string().optional(),
});
export type Recolor = z.infer<typeof RecolorSchema>;

export function encodeRecolor(recolor: Recolor): JsonObject {
  return encodeObject(
    {
      recolorStops: encodeList(recolor.recolorStops, (stop) =>
        encodeObject(
          { color: encodeOptional(stop.color, encodeColor), alpha: stop.alpha, position: stop.position },
          stop.unknownFields
        )
      ),
      name: recolor.name,
    },
    recolor.unknownFields
  );
}

export const ImagePropertiesSchema = wireObject({
  cropProperties: CropPropertiesSchema.optional(),
  transparency: z.number().optional(),
  brightness: z.number().optional(),
  contrast: z.number().optional(),
  recolor: RecolorSchema.optional(),
  outline: OutlineSchema.optional(),
  shadow: ShadowSchema.optional(),
  link: LinkSchema.optional(),
});
export type ImageProperties = z.infer<typeof ImagePropertiesSchema>;

export function encodeImageProperties(props: ImageProperties): JsonObject {
  return encodeObject(
    {
      cropProperties: encodeOptional(props.cropProperties, encodeCropProperties),
      transparency: props.transparency,
      brightness: props.brightness,
      contrast: props.contrast,
      recolor: encodeOptional(props.recolor, encodeRecolor),
      outline: encodeOptional(props.outline, encodeOutline),
      shadow: encodeOptional(props.shadow, encodeShadow),
      link: encodeOptional(props.link, encodeLink),
    },
    props.unknownFields
  );
}

export const VideoPropertiesSchema = wireObject({
  outline: OutlineSchema.optional(),
  autoPlay: z.boolean().optional(),
  start: z.number().int().optional(),
  end: z.number().int().optional(),
  mute: z.boolean().optional(),
});
export type VideoProperties = z.infer<typeof VideoPropertiesSchema>;

export function encodeVideoProperties(props: VideoProperties): JsonObject {
  return encodeObject(
    {
      outline: encodeOptional(props.outline, encodeOutline),
      autoPlay: props.autoPlay,
      start: props.start,
      end: props.end,
      mute: props.mute,
    },
    props.unknownFields
  );
}

export const LineConnectionSchema = wireObject({
  connectedObjectId: z.string().optional(),
  connectionSiteIndex: z.number().int().optional(),
});
export type LineConnection = z.infer<typeof LineConnectionSchema>;

function encodeLineConnection(connection: LineConnection): JsonObject {
  return encodeObject(
    {
      connectedObjectId: connection.connectedObjectId,
      connectionSiteIndex: connection.connectionSiteIndex,
    },
    connection.unknownFields
  );
}

export const LinePropertiesSchema = wireObject({
  lineFill: wireObject({ solidFill: SolidFillSchema.optional() }).optional(),
  weight: DimensionSchema.optional(),
  dashStyle: DashStyleSchema.optional(),
  startArrow: z.string().optional(),
  endArrow: z.string().optional(),
  link: LinkSchema.optional(),
  startConnection: LineConnectionSchema.optional(),
  endConnection: LineConnectionSchema.optional(),
});
export type LineProperties = z.infer<typeof LinePropertiesSchema>;

export function encodeLineProperties(props: LineProperties): JsonObject {
  const fill = props.lineFill;
  return encodeObject(
    {
      lineFill:
        fill &&
        encodeObject({ solidFill: encodeOptional(fill.solidFill, encodeSolidFill) }, fill.unknownFields),
      weight: encodeOptional(props.weight, encodeDimension),
      dashStyle: props.dashStyle,
      startArrow: props.startArrow,
      endArrow: props.endArrow,
      link: encodeOptional(props.link, encodeLink),
      startConnection: encodeOptional(props.startConnection, encodeLineConnection),
      endConnection: encodeOptional(props.endConnection, encodeLineConnection),
    },
    props.unknownFields
  );
}

export const SheetsChartPropertiesSchema = wireObject({
  chartImageProperties: ImagePropertiesSchema.optional(),
});
export type SheetsChartProperties = z.infer<typeof SheetsChartPropertiesSchema>;

export function encodeSheetsChartProperties(props: SheetsChartProperties): JsonObject {
  return encodeObject(
    { chartImageProperties: encodeOptional(props.chartImageProperties, encodeImageProperties) },
    props.unknownFields
  );
}

// ============================================================================
// Text Styles
// ============================================================================

export const TextStyleSchema = wireObject({
  backgroundColor: OptionalColorSchema.optional(),
  foregroundColor: OptionalColorSchema.optional(),
  bold: z.boolean().optional(),
  italic: z.boolean().optional(),
  fontFamily: z.string().optional(),
  fontSize: DimensionSchema.optional(),
  link: LinkSchema.optional(),
  baselineOffset: lenientEnum(['BASELINE_OFFSET_UNSPECIFIED', 'NONE', 'SUPERSCRIPT', 'SUBSCRIPT']).optional(),
  smallCaps: z.boolean().optional(),
  strikethrough: z.boolean().optional(),
  underline: z.boolean().optional(),
  weightedFontFamily: wireObject({
    fontFamily: z.string().optional(),
    weight: z.number().int().optional(),
  }).optional(),
});
export type TextStyle = z.infer<typeof TextStyleSchema>;

export function encodeTextStyle(style: TextStyle): JsonObject {
  const weighted = style.weightedFontFamily;
  return encodeObject(
    {
      backgroundColor: encodeOptional(style.backgroundColor, encodeOptionalColor),
      foregroundColor: encodeOptional(style.foregroundColor, encodeOptionalColor),
      bold: style.bold,
      italic: style.italic,
      fontFamily: style.fontFamily,
      fontSize: encodeOptional(style.fontSize, encodeDimension),
      link: encodeOptional(style.link, encodeLink),
      baselineOffset: style.baselineOffset,
      smallCaps: style.smallCaps,
      strikethrough: style.strikethrough,
      underline: style.underline,
      weightedFontFamily:
        weighted &&
        encodeObject({ fontFamily: weighted.fontFamily, weight: weighted.weight }, weighted.unknownFields),
    },
    style.unknownFields
  );
}

export const ParagraphStyleSchema = wireObject({
  lineSpacing: z.number().optional(),
  alignment: lenientEnum(['ALIGNMENT_UNSPECIFIED', 'START', 'CENTER', 'END', 'JUSTIFIED']).optional(),
  indentStart: DimensionSchema.optional(),
  indentEnd: DimensionSchema.optional(),
  spaceAbove: DimensionSchema.optional(),
  spaceBelow: DimensionSchema.optional(),
  indentFirstLine: DimensionSchema.optional(),
  direction: lenientEnum(['TEXT_DIRECTION_UNSPECIFIED', 'LEFT_TO_RIGHT', 'RIGHT_TO_LEFT']).optional(),
  spacingMode: lenientEnum(['SPACING_MODE_UNSPECIFIED', 'NEVER_COLLAPSE', 'COLLAPSE_LISTS']).optional(),
});
export type ParagraphStyle = z.infer<typeof ParagraphStyleSchema>;

export function encodeParagraphStyle(style: ParagraphStyle): JsonObject {
  return encodeObject(
    {
      lineSpacing: style.lineSpacing,
      alignment: style.alignment,
      indentStart: encodeOptional(style.indentStart, encodeDimension),
      indentEnd: encodeOptional(style.indentEnd, encodeDimension),
      spaceAbove: encodeOptional(style.spaceAbove, encodeDimension),
      spaceBelow: encodeOptional(style.spaceBelow, encodeDimension),
      indentFirstLine: encodeOptional(style.indentFirstLine, encodeDimension),
      direction: style.direction,
      spacingMode: style.spacingMode,
    },
    style.unknownFields
  );
}

// ============================================================================
// Page Properties
// ============================================================================

export const ThemeColorPairSchema = wireObject({
  type: ThemeColorTypeSchema.optional(),
  color: RgbColorSchema.optional(),
});

export const ColorSchemeSchema = wireObject({
  colors: z.array(ThemeColorPairSchema).optional(),
});
export type ColorScheme = z.infer<typeof ColorSchemeSchema>;

export function encodeColorScheme(scheme: ColorScheme): JsonObject {
  return encodeObject(
    {
      colors: encodeList(scheme.colors, (pair) =>
        encodeObject(
          { type: pair.type, color: encodeOptional(pair.color, encodeRgbColor) },
          pair.unknownFields
        )
      ),
    },
    scheme.unknownFields
  );
}

export const PagePropertiesSchema = wireObject({
  pageBackgroundFill: PageBackgroundFillSchema.optional(),
  colorScheme: ColorSchemeSchema.optional(),
});
export type PageProperties = z.infer<typeof PagePropertiesSchema>;

export function encodePageProperties(props: PageProperties): JsonObject {
  return encodeObject(
    {
      pageBackgroundFill: encodeOptional(props.pageBackgroundFill, encodePageBackgroundFill),
      colorScheme: encodeOptional(props.colorScheme, encodeColorScheme),
    },
    props.unknownFields
  );
}

// ============================================================================
// Codecs
// ============================================================================

export const TextStyleCodec = wireCodec('TextStyle', TextStyleSchema, encodeTextStyle);
export const ParagraphStyleCodec = wireCodec('ParagraphStyle', ParagraphStyleSchema, encodeParagraphStyle);
export const OutlineCodec = wireCodec('Outline', OutlineSchema, encodeOutline);
export const ShadowCodec = wireCodec('Shadow', ShadowSchema, encodeShadow);
export const ShapePropertiesCodec = wireCodec('ShapeProperties', ShapePropertiesSchema, encodeShapeProperties);
export const ImagePropertiesCodec = wireCodec('ImageProperties', ImagePropertiesSchema, encodeImageProperties);
export const VideoPropertiesCodec = wireCodec('VideoProperties', VideoPropertiesSchema, encodeVideoProperties);
export const LinePropertiesCodec = wireCodec('LineProperties', LinePropertiesSchema, encodeLineProperties);
export const PageBackgroundFillCodec = wireCodec(
  'PageBackgroundFill',
  PageBackgroundFillSchema,
  encodePageBackgroundFill
);
export const PagePropertiesCodec = wireCodec('PageProperties', PagePropertiesSchema, encodePageProperties);
