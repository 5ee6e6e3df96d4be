// src/errors.ts

export type SchemaInputErrorCode = 'FILE_NOT_FOUND' | 'UNSUPPORTED_FILE' | 'INVALID_JSON';

/**
 * Raised when data nests deeper than the configured limit.
 * Cyclic structures end up here too.
 */
export class SchemaDepthError extends Error {
  readonly code = 'SCHEMA_TOO_DEEP';

  constructor(
    readonly key: string,
    readonly maxDepth: number,
  ) {
    super(`Nesting deeper than ${maxDepth} levels at key '${key}'`);
    this.name = 'SchemaDepthError';
  }
}

/** File or stdin input that could not be turned into data */
export class SchemaInputError extends Error {
  constructor(
    readonly code: SchemaInputErrorCode,
    message: string,
    readonly source: string,
  ) {
    super(message);
    this.name = 'SchemaInputError';
  }
}
