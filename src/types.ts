// src/types.ts

/** One node in an inferred schema tree */
export interface SchemaNode {
  key: string;
  /** Observed type names, e.g. ['int'] or ['NoneType', 'int'] */
  types: readonly string[];
  children: readonly SchemaNode[];
  /** Shared type of every sampled element, for homogeneous sequences only */
  elementType?: string;
}

/** Non-fatal notice raised while inferring */
export interface Diagnostic {
  code: 'mixed-types';
  key: string;
  types: string[];
  message: string;
}

export interface InferOptions {
  /** Label for the top-level node (default 'root') */
  key?: string;
  /** Elements sampled per sequence (default 10); <= 0 inspects none */
  maxItems?: number;
  /** Nesting levels allowed before SchemaDepthError (default 256) */
  maxDepth?: number;
  onDiagnostic?: (diagnostic: Diagnostic) => void;
}

export interface InferResult {
  schema: SchemaNode;
  diagnostics: Diagnostic[];
}
