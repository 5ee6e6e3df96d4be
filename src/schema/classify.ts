// src/schema/classify.ts

/** Container type names rendered as `name[element]` */
export const SEQUENCE_TYPES: ReadonlySet<string> = new Set(['list', 'tuple', 'set', 'frozenset']);

export type Classified =
  | { kind: 'mapping'; typeName: 'dict'; entries: Array<[string, unknown]> }
  | { kind: 'ordered-sequence'; typeName: 'list' | 'tuple'; items: Iterable<unknown> }
  | { kind: 'unordered-sequence'; typeName: 'set' | 'frozenset'; items: Iterable<unknown> }
  | { kind: 'scalar'; typeName: string };

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== 'object') return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Mark an array as a tuple. Frozen arrays are reported as `tuple`,
 * everything else array-shaped as `list`.
 */
export function tuple<T>(...items: T[]): readonly T[] {
  return Object.freeze(items);
}

/** Mark a set as a frozenset (a frozen `Set` instance). */
export function frozenset<T>(items: Iterable<T> = []): ReadonlySet<T> {
  return Object.freeze(new Set(items));
}

/**
 * A number written with a fraction or exponent whose value is integral,
 * e.g. JSON `10.0`. Reported as `float` rather than `int`.
 */
export class FloatValue {
  constructor(readonly value: number) {}

  valueOf(): number {
    return this.value;
  }

  toJSON(): number {
    return this.value;
  }
}

/**
 * Type name of a single value, without looking inside it.
 */
export function typeNameOf(value: unknown): string {
  if (value === null || value === undefined) return 'NoneType';
  switch (typeof value) {
    case 'string':
      return 'str';
    case 'boolean':
      return 'bool';
    case 'bigint':
      return 'int';
    case 'number':
      return Number.isInteger(value) ? 'int' : 'float';
    case 'symbol':
      return 'symbol';
    case 'function':
      return 'function';
  }
  if (typeof value !== 'object') return typeof value;
  if (value instanceof FloatValue) return 'float';
  if (Array.isArray(value)) return Object.isFrozen(value) ? 'tuple' : 'list';
  if (value instanceof Set) return Object.isFrozen(value) ? 'frozenset' : 'set';
  if (value instanceof Map || isPlainObject(value)) return 'dict';
  return constructorName(value);
}

function constructorName(value: object): string {
  const ctor: unknown = Object.getPrototypeOf(value)?.constructor;
  if (typeof ctor === 'function' && ctor.name) return ctor.name;
  return 'object';
}

/** Sort a value into mapping, ordered/unordered sequence or scalar. */
export function classify(value: unknown): Classified {
  const typeName = typeNameOf(value);
  switch (typeName) {
    case 'dict':
      return { kind: 'mapping', typeName: 'dict', entries: mappingEntries(value) };
    case 'list':
    case 'tuple':
      return {
        kind: 'ordered-sequence',
        typeName: typeName === 'tuple' ? 'tuple' : 'list',
        items: iterableOf(value),
      };
    case 'set':
    case 'frozenset':
      return {
        kind: 'unordered-sequence',
        typeName: typeName === 'frozenset' ? 'frozenset' : 'set',
        items: iterableOf(value),
      };
    default:
      return { kind: 'scalar', typeName };
  }
}

/** Key/value pairs of a mapping in insertion order. */
export function mappingEntries(value: unknown): Array<[string, unknown]> {
  if (value instanceof Map) {
    return Array.from(value, ([k, v]): [string, unknown] => [String(k), v]);
  }
  if (isPlainObject(value)) return Object.entries(value);
  return [];
}

function iterableOf(value: unknown): Iterable<unknown> {
  if (Array.isArray(value) || value instanceof Set) return value;
  return [];
}

/** First `maxItems` elements in iteration order. */
export function sample(items: Iterable<unknown>, maxItems: number): unknown[] {
  const limit = Math.floor(maxItems);
  const out: unknown[] = [];
  if (!(limit > 0)) return out;
  for (const item of items) {
    out.push(item);
    if (out.length >= limit) break;
  }
  return out;
}

function quote(name: string): string {
  const q = name.includes("'") && !name.includes('"') ? '"' : "'";
  const escaped = name
    .replace(/\\/g, '\\\\')
    .replace(/\n/g, '\\n')
    .replace(/\r/g, '\\r')
    .replace(/\t/g, '\\t')
    .split(q).join(`\\${q}`);
  return `${q}${escaped}${q}`;
}

/**
 * Literal list form used for multi-type fields and diagnostics,
 * e.g. `['NoneType', 'int']`.
 */
export function formatTypeList(names: readonly string[]): string {
  return `[${names.map(quote).join(', ')}]`;
}

export function distinctSorted(names: Iterable<string>): string[] {
  return [...new Set(names)].sort();
}
