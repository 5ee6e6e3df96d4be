// src/schema/infer.ts
import type { Diagnostic, InferOptions, InferResult, SchemaNode } from '../types.js';
import { SchemaDepthError } from '../errors.js';
import {
  classify,
  distinctSorted,
  formatTypeList,
  mappingEntries,
  sample,
  typeNameOf,
} from './classify.js';

export const DEFAULT_MAX_ITEMS = 10;
export const DEFAULT_MAX_DEPTH = 256;

interface InferContext {
  maxItems: number;
  maxDepth: number;
  report: (diagnostic: Diagnostic) => void;
}

function makeNode(
  key: string,
  types: string[],
  children: SchemaNode[] = [],
  elementType?: string,
): SchemaNode {
  const node: SchemaNode = elementType === undefined
    ? { key, types: Object.freeze(types), children: Object.freeze(children) }
    : { key, types: Object.freeze(types), children: Object.freeze(children), elementType };
  return Object.freeze(node);
}

function mixedTypes(key: string, types: string[]): Diagnostic {
  return {
    code: 'mixed-types',
    key,
    types,
    message: `Key '${key}': mixed types in list: ${formatTypeList(types)}`,
  };
}

function checkDepth(key: string, depth: number, ctx: InferContext): void {
  if (depth > ctx.maxDepth) {
    throw new SchemaDepthError(key, ctx.maxDepth);
  }
}

function inferValue(data: unknown, key: string, depth: number, ctx: InferContext): SchemaNode {
  checkDepth(key, depth, ctx);
  const classified = classify(data);

  switch (classified.kind) {
    case 'mapping':
      return makeNode(
        key,
        ['dict'],
        classified.entries.map(([k, v]) => inferValue(v, k, depth + 1, ctx)),
      );
    case 'ordered-sequence':
    case 'unordered-sequence':
      return inferSequence(classified.typeName, classified.items, key, depth, ctx);
    case 'scalar':
      return makeNode(key, [classified.typeName]);
  }
}

/**
 * Sample the first `maxItems` elements and describe them:
 * all dicts are merged into children, one shared type becomes the
 * element type, anything else is reported as mixed.
 */
function inferSequence(
  container: string,
  items: Iterable<unknown>,
  key: string,
  depth: number,
  ctx: InferContext,
): SchemaNode {
  const sampled = sample(items, ctx.maxItems);
  if (sampled.length === 0) {
    return makeNode(key, [container]);
  }

  const names = distinctSorted(sampled.map(typeNameOf));

  if (names.length === 1 && names[0] === 'dict') {
    const children = mergeDicts(sampled, key, depth + 1, ctx);
    return makeNode(key, [container], children, 'dict');
  }

  if (names.length === 1) {
    return makeNode(key, [container], [], names[0]);
  }

  ctx.report(mixedTypes(key, names));
  return makeNode(key, [container]);
}

function mergeDicts(dicts: readonly unknown[], key: string, depth: number, ctx: InferContext): SchemaNode[] {
  checkDepth(key, depth, ctx);

  // Map iteration order is insertion order, i.e. first-seen key order
  const valuesByKey = new Map<string, unknown[]>();
  for (const dict of dicts) {
    for (const [k, v] of mappingEntries(dict)) {
      const bucket = valuesByKey.get(k);
      if (bucket) {
        bucket.push(v);
      } else {
        valuesByKey.set(k, [v]);
      }
    }
  }

  const children: SchemaNode[] = [];
  for (const [k, values] of valuesByKey) {
    const names = distinctSorted(values.map(typeNameOf));

    if (names.length === 1 && names[0] === 'dict') {
      children.push(makeNode(k, ['dict'], mergeDicts(values, k, depth + 1, ctx)));
      continue;
    }

    if (names.length === 1 && names[0] === 'list') {
      // Every occurrence is flattened into one pool, which is then sampled as a whole
      const pool: unknown[] = values.flatMap((v) => (Array.isArray(v) ? v : []));
      children.push(inferSequence('list', pool, k, depth, ctx));
      continue;
    }

    children.push(makeNode(k, names));
  }
  return children;
}

/**
 * Merge the keys of several dicts into one ordered list of child schemas.
 * Keys keep their first-seen order; a key missing from some dicts is still
 * listed, and a key whose values differ in type keeps every type name.
 */
export function mergeDictSchemas(
  dicts: readonly unknown[],
  options: InferOptions = {},
): SchemaNode[] {
  return mergeDicts(dicts, options.key ?? 'root', 0, contextFor(options));
}

function contextFor(options: InferOptions): InferContext {
  const onDiagnostic = options.onDiagnostic;
  return {
    maxItems: options.maxItems ?? DEFAULT_MAX_ITEMS,
    maxDepth: options.maxDepth ?? DEFAULT_MAX_DEPTH,
    report: onDiagnostic ?? (() => undefined),
  };
}

/**
 * Build a schema tree from `data`.
 *
 * Sequences are only sampled up to `maxItems` elements. Mixed-type
 * sequences are reported through `onDiagnostic` and never stop the walk.
 *
 * @throws {SchemaDepthError} when nesting exceeds `maxDepth`
 */
export function inferSchema(data: unknown, options: InferOptions = {}): SchemaNode {
  return inferValue(data, options.key ?? 'root', 0, contextFor(options));
}

/** Like {@link inferSchema}, also returning every diagnostic raised. */
export function inferSchemaWithDiagnostics(data: unknown, options: InferOptions = {}): InferResult {
  const diagnostics: Diagnostic[] = [];
  const schema = inferSchema(data, {
    ...options,
    onDiagnostic: (diagnostic) => {
      diagnostics.push(diagnostic);
      options.onDiagnostic?.(diagnostic);
    },
  });
  return { schema, diagnostics };
}
