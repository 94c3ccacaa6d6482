/**
 * Wire codec primitives
 *
 * Every model type is decoded through `wireObject`, which validates the known
 * fields with zod and captures everything else (unrecognised keys, explicit
 * nulls, enum literals newer than this model) into `unknownFields`, so that
 * `encode(decode(json))` reproduces `json` field-for-field.
 */

import { z } from 'zod';
import { SchemaMismatchError, UnsupportedVariantError } from '../errors';

// ============================================================================
// JSON Types
// ============================================================================

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;
export interface JsonObject {
  [key: string]: JsonValue;
}

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema),
  ])
);

export const JsonObjectSchema = z.record(JsonValueSchema);

/** Fields the model does not know about, replayed verbatim on encode. */
export interface Extensible {
  unknownFields?: JsonObject;
}

export const UNKNOWN = 'UNKNOWN' as const;
export type Unknown = typeof UNKNOWN;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// ============================================================================
// Decoding
// ============================================================================

const VARIANT_PARAM = 'unsupportedVariant';
const LENIENT_ENUMS = new WeakMap<z.ZodTypeAny, ReadonlySet<string>>();

/**
 * Forward-compatible enum: literals outside `values` decode to `UNKNOWN`.
 * Inside a `wireObject` the raw literal is kept in `unknownFields`.
 */
export function lenientEnum<T extends string>(values: readonly T[]) {
  const allowed: ReadonlySet<string> = new Set<string>(values);
  const isMember = (raw: string): raw is T => allowed.has(raw);
  const schema = z
    .unknown()
    .transform((raw): T | Unknown => (typeof raw === 'string' && isMember(raw) ? raw : UNKNOWN));
  LENIENT_ENUMS.set(schema, allowed);
  return schema;
}

function lenientValues(field: z.ZodTypeAny): ReadonlySet<string> | undefined {
  const inner = field instanceof z.ZodOptional ? field.unwrap() : field;
  return LENIENT_ENUMS.get(inner);
}

/**
 * Object schema that keeps unrecognised keys.
 * Output is the parsed known fields plus `unknownFields` when anything was captured.
 */
export function wireObject<T extends z.ZodRawShape>(shape: T) {
  const schema = z.object(shape).extend({ unknownFields: JsonObjectSchema.optional() });
  const knownKeys = new Set(Object.keys(shape));
  const lenientKeys = new Map<string, ReadonlySet<string>>();
  for (const [key, field] of Object.entries(shape)) {
    const values = lenientValues(field);
    if (values) lenientKeys.set(key, values);
  }

  return z.unknown().transform((input, ctx) => {
    if (!isRecord(input)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: input === undefined ? 'Required' : `Expected object, received ${describeJsonType(input)}`,
      });
      return z.NEVER;
    }

    const present: Record<string, unknown> = {};
    const unknownFields: JsonObject = {};

    for (const [key, value] of Object.entries(input)) {
      if (knownKeys.has(key) && value !== null) {
        present[key] = value;
        const allowed = lenientKeys.get(key);
        if (!allowed || (typeof value === 'string' && (allowed.has(value) || value === UNKNOWN))) {
          continue;
        }
      }
      const json = JsonValueSchema.safeParse(value);
      if (json.success) {
        unknownFields[key] = json.data;
      } else {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Expected JSON value', path: [key] });
      }
    }

    const candidate = Object.keys(unknownFields).length > 0 ? { ...present, unknownFields } : present;
    const parsed = schema.safeParse(candidate);
    if (!parsed.success) {
      forwardIssues(ctx, parsed.error);
      return z.NEVER;
    }
    return parsed.data;
  });
}

/** Report a zero-or-many branch union from inside a transform. */
export function addVariantIssue(
  ctx: z.RefinementCtx,
  message: string,
  path: Array<string | number> = []
): void {
  ctx.addIssue({ code: z.ZodIssueCode.custom, message, path, params: { [VARIANT_PARAM]: true } });
}

function forwardIssues(ctx: z.RefinementCtx, error: z.ZodError): void {
  for (const issue of error.issues) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: issue.message,
      path: issue.path,
      params: issue.code === z.ZodIssueCode.custom ? issue.params : undefined,
    });
  }
}

function isVariantIssue(issue: z.ZodIssue): boolean {
  return issue.code === z.ZodIssueCode.custom && issue.params?.[VARIANT_PARAM] === true;
}

function describeJsonType(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

export function formatIssue(issue: z.ZodIssue): string {
  const path = issue.path.join('.');
  return path ? `${path}: ${issue.message}` : issue.message;
}

export function decodeWith<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  json: unknown,
  typeName: string
): T {
  const result = schema.safeParse(json);
  if (result.success) {
    return result.data;
  }
  const variantIssue = result.error.issues.find(isVariantIssue);
  if (variantIssue) {
    throw new UnsupportedVariantError(`${typeName}: ${formatIssue(variantIssue)}`);
  }
  throw new SchemaMismatchError(typeName, result.error.issues.map(formatIssue));
}

// ============================================================================
// Encoding
// ============================================================================

export type WireFields = Record<string, JsonValue | undefined>;

/**
 * Drop unset fields, then replay captured unknown fields. A captured value
 * only replaces a known field that still holds the `UNKNOWN` placeholder.
 */
export function encodeObject(fields: WireFields, unknownFields?: JsonObject): JsonObject {
  const out: JsonObject = {};
  for (const [key, value] of Object.entries(fields)) {
    if (value !== undefined) out[key] = value;
  }
  if (unknownFields) {
    for (const [key, value] of Object.entries(unknownFields)) {
      if (!Object.hasOwn(out, key) || out[key] === UNKNOWN) out[key] = value;
    }
  }
  return out;
}

export function encodeOptional<T>(
  value: T | undefined,
  encode: (value: T) => JsonValue
): JsonValue | undefined {
  return value === undefined ? undefined : encode(value);
}

export function encodeList<T>(
  values: readonly T[] | undefined,
  encode: (value: T) => JsonValue
): JsonValue[] | undefined {
  return values === undefined ? undefined : values.map((value) => encode(value));
}

export function encodeRecord<T>(
  values: Record<string, T> | undefined,
  encode: (value: T) => JsonValue
): JsonObject | undefined {
  if (values === undefined) return undefined;
  const out: JsonObject = {};
  for (const [key, value] of Object.entries(values)) {
    out[key] = encode(value);
  }
  return out;
}

// ============================================================================
// Codec
// ============================================================================

export interface WireCodec<T> {
  readonly typeName: string;
  readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  decode(json: unknown): T;
  encode(value: T): JsonObject;
}

export function wireCodec<T>(
  typeName: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  encode: (value: T) => JsonObject
): WireCodec<T> {
  return {
    typeName,
    schema,
    decode: (json: unknown): T => decodeWith(schema, json, typeName),
    encode,
  };
}
