import { QueryError } from '../errors.js';

export interface AttrValue {
  readonly value: string;
  readonly description: string;
}

/**
 * Accepted values per attr type, for documentation and autocompletion.
 * Nothing in the query or walker layers reads this.
 */
export type AttrValues = ReadonlyMap<string, readonly AttrValue[]>;

/**
 * Parses `{ "<attr type>": [["value", "description"], ...] }`, the format
 * source catalogues are stored in.
 */
export function parseAttrValues(input: unknown, source = 'attr values'): AttrValues {
  if (typeof input !== 'object' || input === null || Array.isArray(input)) {
    throw new QueryError(`${source}: expected an object keyed by attr type`);
  }
  const values = new Map<string, readonly AttrValue[]>();
  for (const [type, pairs] of Object.entries(input)) {
    if (!Array.isArray(pairs)) {
      throw new QueryError(`${source}: "${type}" must be a list of [value, description] pairs`);
    }
    values.set(
      type,
      pairs.map((pair: unknown, index) => {
        if (!Array.isArray(pair) || pair.length !== 2) {
          throw new QueryError(`${source}: "${type}"[${index}] must be a [value, description] pair`);
        }
        const [value, description]: unknown[] = pair;
        if (typeof value !== 'string' || typeof description !== 'string') {
          throw new QueryError(`${source}: "${type}"[${index}] must contain two strings`);
        }
        return { value, description };
      }),
    );
  }
  return values;
}

/**
 * Merges catalogues. Entries for the same type are concatenated in
 * argument order; a value already present for that type is skipped.
 */
export function mergeAttrValues(...catalogues: AttrValues[]): AttrValues {
  const merged = new Map<string, AttrValue[]>();
  for (const catalogue of catalogues) {
    for (const [type, entries] of catalogue) {
      const list = merged.get(type) ?? [];
      for (const entry of entries) {
        if (!list.some((existing) => existing.value.toLowerCase() === entry.value.toLowerCase())) {
          list.push(entry);
        }
      }
      merged.set(type, list);
    }
  }
  return merged;
}
