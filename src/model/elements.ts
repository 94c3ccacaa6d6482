/**
 * Page elements
 *
 * A PageElement carries its geometry plus exactly one content branch
 * (`content.kind`). Groups nest further page elements.
 */

import { z } from 'zod';
import { UnsupportedVariantError } from '../errors';
import {
  LineCategorySchema,
  PlaceholderTypeSchema,
  ShapeTypeSchema,
  SizeSchema,
  TransformSchema,
  VideoSourceTypeSchema,
  encodeSize,
  encodeTransform,
  type Size,
  type Transform,
} from './primitives';
import {
  ImagePropertiesSchema,
  LinePropertiesSchema,
  OutlineSchema,
  ShadowSchema,
  ShapePropertiesSchema,
  SheetsChartPropertiesSchema,
  VideoPropertiesSchema,
  encodeImageProperties,
  encodeLineProperties,
  encodeOutline,
  encodeShadow,
  encodeShapeProperties,
  encodeSheetsChartProperties,
  encodeVideoProperties,
} from './styles';
import { TextSchema, encodeText, type Text } from './text';
import {
  JsonValueSchema,
  addVariantIssue,
  encodeList,
  encodeObject,
  encodeOptional,
  wireCodec,
  wireObject,
  type Extensible,
  type JsonObject,
  type JsonValue,
} from './wire';

// ============================================================================
// Variant Schemas
// ============================================================================

export const PlaceholderSchema = wireObject({
  type: PlaceholderTypeSchema.optional(),
  index: z.number().int().optional(),
  parentObjectId: z.string().optional(),
});
export type Placeholder = z.infer<typeof PlaceholderSchema>;

export const ShapeSchema = wireObject({
  shapeType: ShapeTypeSchema.optional(),
  text: TextSchema.optional(),
  shapeProperties: ShapePropertiesSchema.optional(),
  placeholder: PlaceholderSchema.optional(),
});
export type Shape = z.infer<typeof ShapeSchema>;

/** Cell contents are carried as raw JSON. */
export const TableSchema = wireObject({
  rows: z.number().int().optional(),
  columns: z.number().int().optional(),
  tableRows: z.array(JsonValueSchema).optional(),
  tableColumns: z.array(JsonValueSchema).optional(),
  horizontalBorderRows: z.array(JsonValueSchema).optional(),
  verticalBorderRows: z.array(JsonValueSchema).optional(),
});
export type Table = z.infer<typeof TableSchema>;

export const ImageSchema = wireObject({
  contentUrl: z.string().optional(),
  sourceUrl: z.string().optional(),
  imageProperties: ImagePropertiesSchema.optional(),
  placeholder: PlaceholderSchema.optional(),
});
export type Image = z.infer<typeof ImageSchema>;

const VideoSourceObjectSchema = wireObject({
  type: VideoSourceTypeSchema.optional(),
  id: z.string().optional(),
});

/** `source` arrives either as a bare string or as `{type, id}`. */
export type VideoSource =
  | { form: 'bare'; value: string }
  | ({ form: 'object' } & z.infer<typeof VideoSourceObjectSchema>);

export const VideoSourceSchema: z.ZodType<VideoSource, z.ZodTypeDef, unknown> = z
  .union([z.string(), VideoSourceObjectSchema])
  .transform(
    (value): VideoSource =>
      typeof value === 'string' ? { form: 'bare', value } : { form: 'object', ...value }
  );

export function encodeVideoSource(source: VideoSource): JsonValue {
  if (source.form === 'bare') return source.value;
  return encodeObject({ type: source.type, id: source.id }, source.unknownFields);
}

/** Source kind regardless of which literal form carried it. */
export function videoSourceType(source: VideoSource): string | undefined {
  return source.form === 'bare' ? source.value : source.type;
}

export const VideoSchema = wireObject({
  url: z.string().optional(),
  source: VideoSourceSchema.optional(),
  id: z.string().optional(),
  videoProperties: VideoPropertiesSchema.optional(),
});
export type Video = z.infer<typeof VideoSchema>;

export const LineSchema = wireObject({
  lineProperties: LinePropertiesSchema.optional(),
  lineType: z.string().optional(),
  lineCategory: LineCategorySchema.optional(),
});
export type Line = z.infer<typeof LineSchema>;

export const WordArtSchema = wireObject({
  renderedText: z.string().optional(),
});
export type WordArt = z.infer<typeof WordArtSchema>;

export const SheetsChartSchema = wireObject({
  spreadsheetId: z.string().optional(),
  chartId: z.number().int().optional(),
  contentUrl: z.string().optional(),
  sheetsChartProperties: SheetsChartPropertiesSchema.optional(),
});
export type SheetsChart = z.infer<typeof SheetsChartSchema>;

export const SpeakerSpotlightSchema = wireObject({
  speakerSpotlightProperties: wireObject({
    outline: OutlineSchema.optional(),
    shadow: ShadowSchema.optional(),
  }).optional(),
});
export type SpeakerSpotlight = z.infer<typeof SpeakerSpotlightSchema>;

export interface Group extends Extensible {
  children?: PageElement[];
}

export const GroupSchema: z.ZodType<Group, z.ZodTypeDef, unknown> = wireObject({
  children: z.array(z.lazy(() => PageElementSchema)).optional(),
});

// ============================================================================
// PageElement
// ============================================================================

export type PageElementContent =
  | { kind: 'shape'; shape: Shape }
  | { kind: 'table'; table: Table }
  | { kind: 'image'; image: Image }
  | { kind: 'video'; video: Video }
  | { kind: 'line'; line: Line }
  | { kind: 'wordArt'; wordArt: WordArt }
  | { kind: 'sheetsChart'; sheetsChart: SheetsChart }
  | { kind: 'speakerSpotlight'; speakerSpotlight: SpeakerSpotlight }
  | { kind: 'elementGroup'; elementGroup: Group };

export type PageElementKind = PageElementContent['kind'];

export const PAGE_ELEMENT_KINDS: readonly PageElementKind[] = [
  'shape',
  'table',
  'image',
  'video',
  'line',
  'wordArt',
  'sheetsChart',
  'speakerSpotlight',
  'elementGroup',
];

export interface PageElement extends Extensible {
  objectId?: string;
  /** Absent only for groups, whose extent follows their children. */
  size?: Size;
  transform: Transform;
  title?: string;
  description?: string;
  content: PageElementContent;
}

/** One optional field per branch, as the branches appear on the wire. */
export interface PageElementBranches {
  shape?: Shape;
  table?: Table;
  image?: Image;
  video?: Video;
  line?: Line;
  wordArt?: WordArt;
  sheetsChart?: SheetsChart;
  speakerSpotlight?: SpeakerSpotlight;
  elementGroup?: Group;
}

function collectBranches(fields: PageElementBranches): PageElementContent[] {
  const branches: PageElementContent[] = [];
  if (fields.shape) branches.push({ kind: 'shape', shape: fields.shape });
  if (fields.table) branches.push({ kind: 'table', table: fields.table });
  if (fields.image) branches.push({ kind: 'image', image: fields.image });
  if (fields.video) branches.push({ kind: 'video', video: fields.video });
  if (fields.line) branches.push({ kind: 'line', line: fields.line });
  if (fields.wordArt) branches.push({ kind: 'wordArt', wordArt: fields.wordArt });
  if (fields.sheetsChart) branches.push({ kind: 'sheetsChart', sheetsChart: fields.sheetsChart });
  if (fields.speakerSpotlight) {
    branches.push({ kind: 'speakerSpotlight', speakerSpotlight: fields.speakerSpotlight });
  }
  if (fields.elementGroup) {
    branches.push({ kind: 'elementGroup', elementGroup: fields.elementGroup });
  }
  return branches;
}

function branchMessage(found: PageElementContent[]): string {
  const kinds = found.map((branch) => branch.kind).join(', ') || 'none';
  return `expected exactly one of ${PAGE_ELEMENT_KINDS.join(', ')}; found ${kinds}`;
}

const PageElementWireSchema = wireObject({
  objectId: z.string().optional(),
  size: SizeSchema.optional(),
  transform: TransformSchema,
  title: z.string().optional(),
  description: z.string().optional(),
  shape: ShapeSchema.optional(),
  table: TableSchema.optional(),
  image: ImageSchema.optional(),
  video: VideoSchema.optional(),
  line: LineSchema.optional(),
  wordArt: WordArtSchema.optional(),
  sheetsChart: SheetsChartSchema.optional(),
  speakerSpotlight: SpeakerSpotlightSchema.optional(),
  elementGroup: GroupSchema.optional(),
});

export const PageElementSchema: z.ZodType<PageElement, z.ZodTypeDef, unknown> =
  PageElementWireSchema.transform((wire, ctx) => {
    const branches = collectBranches(wire);
    const [content] = branches;
    if (branches.length !== 1 || content === undefined) {
      addVariantIssue(ctx, branchMessage(branches));
      return z.NEVER;
    }
    if (wire.size === undefined && content.kind !== 'elementGroup') {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Required', path: ['size'] });
      return z.NEVER;
    }

    const element: PageElement = { transform: wire.transform, content };
    if (wire.objectId !== undefined) element.objectId = wire.objectId;
    if (wire.size !== undefined) element.size = wire.size;
    if (wire.title !== undefined) element.title = wire.title;
    if (wire.description !== undefined) element.description = wire.description;
    if (wire.unknownFields) element.unknownFields = wire.unknownFields;
    return element;
  });

// ============================================================================
// Encoders
// ============================================================================

function encodePlaceholder(placeholder: Placeholder): JsonObject {
  return encodeObject(
    {
      type: placeholder.type,
      index: placeholder.index,
      parentObjectId: placeholder.parentObjectId,
    },
    placeholder.unknownFields
  );
}

function encodeShape(shape: Shape): JsonObject {
  return encodeObject(
    {
      shapeType: shape.shapeType,
      text: encodeOptional(shape.text, encodeText),
      shapeProperties: encodeOptional(shape.shapeProperties, encodeShapeProperties),
      placeholder: encodeOptional(shape.placeholder, encodePlaceholder),
    },
    shape.unknownFields
  );
}

function encodeTable(table: Table): JsonObject {
  return encodeObject(
    {
      rows: table.rows,
      columns: table.columns,
      tableRows: table.tableRows,
      tableColumns: table.tableColumns,
      horizontalBorderRows: table.horizontalBorderRows,
      verticalBorderRows: table.verticalBorderRows,
    },
    table.unknownFields
  );
}

function encodeImage(image: Image): JsonObject {
  return encodeObject(
    {
      contentUrl: image.contentUrl,
      sourceUrl: image.sourceUrl,
      imageProperties: encodeOptional(image.imageProperties, encodeImageProperties),
      placeholder: encodeOptional(image.placeholder, encodePlaceholder),
    },
    image.unknownFields
  );
}

function encodeVideo(video: Video): JsonObject {
  return encodeObject(
    {
      url: video.url,
      source: encodeOptional(video.source, encodeVideoSource),
      id: video.id,
      videoProperties: encodeOptional(video.videoProperties, encodeVideoProperties),
    },
    video.unknownFields
  );
}

function encodeLine(line: Line): JsonObject {
  return encodeObject(
    {
      lineProperties: encodeOptional(line.lineProperties, encodeLineProperties),
      lineType: line.lineType,
      lineCategory: line.lineCategory,
    },
    line.unknownFields
  );
}

function encodeSheetsChart(chart: SheetsChart): JsonObject {
  return encodeObject(
    {
      spreadsheetId: chart.spreadsheetId,
      chartId: chart.chartId,
      contentUrl: chart.contentUrl,
      sheetsChartProperties: encodeOptional(chart.sheetsChartProperties, encodeSheetsChartProperties),
    },
    chart.unknownFields
  );
}

function encodeSpeakerSpotlight(spotlight: SpeakerSpotlight): JsonObject {
  const props = spotlight.speakerSpotlightProperties;
  return encodeObject(
    {
      speakerSpotlightProperties: props
        ? encodeObject(
            {
              outline: encodeOptional(props.outline, encodeOutline),
              shadow: encodeOptional(props.shadow, encodeShadow),
            },
            props.unknownFields
          )
        : undefined,
    },
    spotlight.unknownFields
  );
}

function encodeGroup(group: Group): JsonObject {
  return encodeObject(
    { children: encodeList(group.children, encodePageElement) },
    group.unknownFields
  );
}

function encodeContent(content: PageElementContent): JsonObject {
  switch (content.kind) {
    case 'shape':
      return { shape: encodeShape(content.shape) };
    case 'table':
      return { table: encodeTable(content.table) };
    case 'image':
      return { image: encodeImage(content.image) };
    case 'video':
      return { video: encodeVideo(content.video) };
    case 'line':
      return { line: encodeLine(content.line) };
    case 'wordArt':
      return {
        wordArt: encodeObject(
          { renderedText: content.wordArt.renderedText },
          content.wordArt.unknownFields
        ),
      };
    case 'sheetsChart':
      return { sheetsChart: encodeSheetsChart(content.sheetsChart) };
    case 'speakerSpotlight':
      return { speakerSpotlight: encodeSpeakerSpotlight(content.speakerSpotlight) };
    case 'elementGroup':
      return { elementGroup: encodeGroup(content.elementGroup) };
  }
}

export function encodePageElement(element: PageElement): JsonObject {
  return encodeObject(
    {
      objectId: element.objectId,
      size: encodeOptional(element.size, encodeSize),
      transform: encodeTransform(element.transform),
      title: element.title,
      description: element.description,
      ...encodeContent(element.content),
    },
    element.unknownFields
  );
}

export const PageElementCodec = wireCodec('PageElement', PageElementSchema, encodePageElement);

// ============================================================================
// Construction / Lookup
// ============================================================================

export interface PageElementInit extends PageElementBranches {
  objectId?: string;
  size?: Size;
  transform: Transform;
  title?: string;
  description?: string;
}

/**
 * Build a local element from one populated branch.
 * @throws UnsupportedVariantError when zero or several branches are set
 */
export function createPageElement(init: PageElementInit): PageElement {
  const branches = collectBranches(init);
  const [content] = branches;
  if (branches.length !== 1 || content === undefined) {
    throw new UnsupportedVariantError(`PageElement: ${branchMessage(branches)}`);
  }
  const element: PageElement = { transform: init.transform, content };
  if (init.objectId !== undefined) element.objectId = init.objectId;
  if (init.size !== undefined) element.size = init.size;
  if (init.title !== undefined) element.title = init.title;
  if (init.description !== undefined) element.description = init.description;
  return element;
}

export function elementKind(element: PageElement): PageElementKind {
  return element.content.kind;
}

export function shapeText(element: PageElement): Text | undefined {
  return element.content.kind === 'shape' ? element.content.shape.text : undefined;
}

/** Depth-first search, descending into groups. */
export function findPageElement(
  elements: readonly PageElement[] | undefined,
  objectId: string
): PageElement | undefined {
  for (const element of elements ?? []) {
    if (element.objectId === objectId) return element;
    if (element.content.kind === 'elementGroup') {
      const found = findPageElement(element.content.elementGroup.children, objectId);
      if (found) return found;
    }
  }
  return undefined;
}
