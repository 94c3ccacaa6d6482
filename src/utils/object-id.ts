/**
 * Object ids for elements created client-side.
 *
 * The Slides API accepts caller-chosen ids of 5-50 characters from
 * `[a-zA-Z0-9_-:]`, starting with a word character.
 */

let counter = 0;

export type IdFactory = (prefix?: string) => string;

export function generateObjectId(prefix = 'obj'): string {
  counter = (counter + 1) % 1_296;
  const random = Math.random().toString(36).slice(2, 8).padEnd(6, '0');
  return `${prefix}_${Date.now().toString(36)}_${counter.toString(36)}${random}`;
}

/** Deterministic ids (`prefix_1`, `prefix_2`, ...), for previews and tests. */
export function sequentialIds(prefix = 'obj'): IdFactory {
  let next = 0;
  return (kind?: string) => `${kind ?? prefix}_${++next}`;
}
