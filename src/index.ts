// src/index.ts
export {
  inferSchema,
  inferSchemaWithDiagnostics,
  mergeDictSchemas,
  DEFAULT_MAX_ITEMS,
  DEFAULT_MAX_DEPTH,
} from './schema/infer.js';
export { FloatValue, classify, typeNameOf, tuple, frozenset, formatTypeList, type Classified } from './schema/classify.js';
export { render, formatType } from './tree/render.js';
export { schemaOf, preview, schemaOfInput, type PreviewOptions } from './preview.js';
export { loadJsonFile, resolveInput, readJsonStream } from './input/load.js';
export { decodeJson } from './input/json.js';
export { SchemaDepthError, SchemaInputError, type SchemaInputErrorCode } from './errors.js';
export type { SchemaNode, Diagnostic, InferOptions, InferResult } from './types.js';
