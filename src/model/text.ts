/**
 * Text bodies: runs, paragraph markers, auto text and list definitions.
 *
 * Indices are UTF-16 code-unit offsets into the flattened text of the owning
 * shape, the same unit as JavaScript string length.
 */

import { z } from 'zod';
import {
  ParagraphStyleSchema,
  TextStyleSchema,
  encodeParagraphStyle,
  encodeTextStyle,
  type TextStyle,
} from './styles';
import {
  addVariantIssue,
  encodeList,
  encodeObject,
  encodeOptional,
  encodeRecord,
  lenientEnum,
  wireCodec,
  wireObject,
  type Extensible,
  type JsonObject,
} from './wire';

// ============================================================================
// Schemas
// ============================================================================

export const TextRunSchema = wireObject({
  content: z.string().optional(),
  style: TextStyleSchema.optional(),
});
export type TextRun = z.infer<typeof TextRunSchema>;

export const AutoTextSchema = wireObject({
  type: lenientEnum(['TYPE_UNSPECIFIED', 'SLIDE_NUMBER']).optional(),
  content: z.string().optional(),
  style: TextStyleSchema.optional(),
});
export type AutoText = z.infer<typeof AutoTextSchema>;

export const BulletSchema = wireObject({
  listId: z.string().optional(),
  nestingLevel: z.number().int().optional(),
  glyph: z.string().optional(),
  bulletStyle: TextStyleSchema.optional(),
});
export type Bullet = z.infer<typeof BulletSchema>;

export const ParagraphMarkerSchema = wireObject({
  style: ParagraphStyleSchema.optional(),
  bullet: BulletSchema.optional(),
});
export type ParagraphMarker = z.infer<typeof ParagraphMarkerSchema>;

export type TextElementContent =
  | { kind: 'textRun'; textRun: TextRun }
  | { kind: 'paragraphMarker'; paragraphMarker: ParagraphMarker }
  | { kind: 'autoText'; autoText: AutoText };

export interface TextElement extends Extensible {
  /** Absent on the wire when zero. */
  startIndex?: number;
  endIndex?: number;
  content: TextElementContent;
}

const TextElementWireSchema = wireObject({
  startIndex: z.number().int().optional(),
  endIndex: z.number().int().optional(),
  textRun: TextRunSchema.optional(),
  paragraphMarker: ParagraphMarkerSchema.optional(),
  autoText: AutoTextSchema.optional(),
});

export const TextElementSchema: z.ZodType<TextElement, z.ZodTypeDef, unknown> =
  TextElementWireSchema.transform((wire, ctx) => {
    const branches: TextElementContent[] = [];
    if (wire.textRun) branches.push({ kind: 'textRun', textRun: wire.textRun });
    if (wire.paragraphMarker) {
      branches.push({ kind: 'paragraphMarker', paragraphMarker: wire.paragraphMarker });
    }
    if (wire.autoText) branches.push({ kind: 'autoText', autoText: wire.autoText });

    const [content] = branches;
    if (branches.length !== 1 || content === undefined) {
      addVariantIssue(
        ctx,
        `expected exactly one of textRun, paragraphMarker, autoText; found ${branches.length}`
      );
      return z.NEVER;
    }
    const element: TextElement = { content };
    if (wire.startIndex !== undefined) element.startIndex = wire.startIndex;
    if (wire.endIndex !== undefined) element.endIndex = wire.endIndex;
    if (wire.unknownFields) element.unknownFields = wire.unknownFields;
    return element;
  });

export const ListSchema = wireObject({
  listId: z.string().optional(),
  nestingLevel: z.record(wireObject({ bulletStyle: TextStyleSchema.optional() })).optional(),
});
export type List = z.infer<typeof ListSchema>;

export const TextSchema = wireObject({
  textElements: z.array(TextElementSchema).optional(),
  lists: z.record(ListSchema).optional(),
});
export type Text = z.infer<typeof TextSchema>;

// ============================================================================
// Encoders
// ============================================================================

function encodeTextRun(run: TextRun): JsonObject {
  return encodeObject(
    { content: run.content, style: encodeOptional(run.style, encodeTextStyle) },
    run.unknownFields
  );
}

function encodeAutoText(autoText: AutoText): JsonObject {
  return encodeObject(
    {
      type: autoText.type,
      content: autoText.content,
      style: encodeOptional(autoText.style, encodeTextStyle),
    },
    autoText.unknownFields
  );
}

function encodeBullet(bullet: Bullet): JsonObject {
  return encodeObject(
    {
      listId: bullet.listId,
      nestingLevel: bullet.nestingLevel,
      glyph: bullet.glyph,
      bulletStyle: encodeOptional(bullet.bulletStyle, encodeTextStyle),
    },
    bullet.unknownFields
  );
}

function encodeParagraphMarker(marker: ParagraphMarker): JsonObject {
  return encodeObject(
    {
      style: encodeOptional(marker.style, encodeParagraphStyle),
      bullet: encodeOptional(marker.bullet, encodeBullet),
    },
    marker.unknownFields
  );
}

function encodeTextElementBranch(content: TextElementContent): JsonObject {
  switch (content.kind) {
    case 'textRun':
      return { textRun: encodeTextRun(content.textRun) };
    case 'paragraphMarker':
      return { paragraphMarker: encodeParagraphMarker(content.paragraphMarker) };
    case 'autoText':
      return { autoText: encodeAutoText(content.autoText) };
  }
}

export function encodeTextElement(element: TextElement): JsonObject {
  return encodeObject(
    {
      startIndex: element.startIndex,
      endIndex: element.endIndex,
      ...encodeTextElementBranch(element.content),
    },
    element.unknownFields
  );
}

function encodeTextList(list: List): JsonObject {
  return encodeObject(
    {
      listId: list.listId,
      nestingLevel: encodeRecord(list.nestingLevel, (level) =>
        encodeObject(
          { bulletStyle: encodeOptional(level.bulletStyle, encodeTextStyle) },
          level.unknownFields
        )
      ),
    },
    list.unknownFields
  );
}

export function encodeText(text: Text): JsonObject {
  return encodeObject(
    {
      textElements: encodeList(text.textElements, encodeTextElement),
      lists: encodeRecord(text.lists, encodeTextList),
    },
    text.unknownFields
  );
}

export const TextElementCodec = wireCodec('TextElement', TextElementSchema, encodeTextElement);
export const TextCodec = wireCodec('Text', TextSchema, encodeText);

// ============================================================================
// Helpers
// ============================================================================

/** Build a run element spanning `[startIndex, startIndex + content.length)`. */
export function textRunElement(content: string, startIndex: number, style?: TextStyle): TextElement {
  const textRun: TextRun = style ? { content, style } : { content };
  return {
    startIndex,
    endIndex: startIndex + content.length,
    content: { kind: 'textRun', textRun },
  };
}

/** Concatenated content of runs and auto text, in element order. */
export function plainText(text: Text | undefined): string {
  if (!text?.textElements) return '';
  let result = '';
  for (const element of text.textElements) {
    const { content } = element;
    if (content.kind === 'textRun') result += content.textRun.content ?? '';
    else if (content.kind === 'autoText') result += content.autoText.content ?? '';
  }
  return result;
}
