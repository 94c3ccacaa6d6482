/**
 * Field masks for update requests.
 *
 * Masks are always derived from the encoded payload that goes out in the same
 * request, never from a model that still carries unset optionals.
 */

import type { JsonObject, JsonValue } from '../model/wire';

/** Server-computed; the API rejects requests that try to set it. */
const READ_ONLY_KEYS: ReadonlySet<string> = new Set(['propertyState']);

export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * One dot-joined path per present leaf.
 *
 * @example dotSeparatedFieldList({ outline: { weight: { magnitude: 2 } } }) // ['outline.weight.magnitude']
 */
export function dotSeparatedFieldList(properties: JsonObject, prefix = ''): string[] {
  const fields: string[] = [];
  for (const [key, value] of Object.entries(properties)) {
    if (value === null) continue;
    const path = prefix ? `${prefix}.${key}` : key;
    if (isJsonObject(value)) {
      fields.push(...dotSeparatedFieldList(value, path));
    } else {
      fields.push(path);
    }
  }
  return fields;
}

export function fieldMask(properties: JsonObject): string {
  return dotSeparatedFieldList(properties).join(',');
}

/**
 * Payload for an update request: the writable keys of `encoded` with
 * read-only keys, nulls and objects left empty removed at every depth.
 */
export function prepareUpdatePayload(encoded: JsonObject, writableKeys?: readonly string[]): JsonObject {
  const picked: JsonObject = {};
  for (const [key, value] of Object.entries(encoded)) {
    if (writableKeys && !writableKeys.includes(key)) continue;
    picked[key] = value;
  }
  return stripUnsettable(picked);
}

function stripUnsettable(object: JsonObject): JsonObject {
  const out: JsonObject = {};
  for (const [key, value] of Object.entries(object)) {
    if (value === null || READ_ONLY_KEYS.has(key)) continue;
    if (isJsonObject(value)) {
      const nested = stripUnsettable(value);
      if (Object.keys(nested).length > 0) out[key] = nested;
    } else {
      out[key] = value;
    }
  }
  return out;
}

export function isEmptyPayload(payload: JsonObject): boolean {
  return Object.keys(payload).length === 0;
}
