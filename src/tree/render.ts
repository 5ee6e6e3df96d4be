// src/tree/render.ts
import type { SchemaNode } from '../types.js';
import { SEQUENCE_TYPES, formatTypeList } from '../schema/classify.js';

const TEE = '├── ';
const ELBOW = '└── ';
const PIPE = '│   ';
const SPACE = '    ';

function isDict(node: SchemaNode): boolean {
  return node.types.length === 1 && node.types[0] === 'dict';
}

/**
 * Type annotation shown after the colon:
 * `list[int]`, `list`, `dict`, `str` or `['NoneType', 'int']`.
 */
export function formatType(node: SchemaNode): string {
  if (node.types.length === 1 && SEQUENCE_TYPES.has(node.types[0])) {
    const seqType = node.types[0];
    return node.elementType ? `${seqType}[${node.elementType}]` : seqType;
  }
  if (node.types.length === 1) return node.types[0];
  return formatTypeList(node.types);
}

function renderChildren(children: readonly SchemaNode[], prefix: string, lines: string[]): void {
  children.forEach((child, i) => {
    const isLast = i === children.length - 1;
    lines.push(`${prefix}${isLast ? ELBOW : TEE}${child.key}: ${formatType(child)}`);
    if (child.children.length > 0) {
      renderChildren(child.children, prefix + (isLast ? SPACE : PIPE), lines);
    }
  });
}

/**
 * Render a schema tree as a Unicode box-drawing diagram.
 *
 * ```
 * root
 * ├── user_id: int
 * └── history: list[dict]
 *     ├── action: str
 *     └── timestamp: int
 * ```
 *
 * A dict root prints its key alone; any other root prints `key: type`.
 */
export function render(node: SchemaNode): string {
  const lines = [isDict(node) ? node.key : `${node.key}: ${formatType(node)}`];
  renderChildren(node.children, '', lines);
  return lines.join('\n');
}
