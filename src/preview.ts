// src/preview.ts
import { z } from 'zod';
import type { Diagnostic, InferOptions } from './types.js';
import { inferSchema } from './schema/infer.js';
import { render } from './tree/render.js';
import { resolveInput } from './input/load.js';

export interface PreviewOptions extends InferOptions {
  /** Also print the tree to stdout (default true, `preview` only) */
  print?: boolean;
}

const optionsSchema = z.object({
  key: z.string().optional(),
  maxItems: z.number().int().optional(),
  maxDepth: z.number().int().positive().optional(),
  print: z.boolean().optional(),
});

export function warnToStderr(diagnostic: Diagnostic): void {
  console.error(`Warning: ${diagnostic.message}`);
}

/**
 * Infer the schema of `data` and return the rendered tree.
 * Diagnostics go to `onDiagnostic`, or to stderr when none is given.
 */
export function schemaOf(data: unknown, options: PreviewOptions = {}): string {
  const { key, maxItems, maxDepth, print } = options;
  optionsSchema.parse({ key, maxItems, maxDepth, print });

  return render(inferSchema(data, {
    key,
    maxItems,
    maxDepth,
    onDiagnostic: options.onDiagnostic ?? warnToStderr,
  }));
}

/**
 * Like {@link schemaOf}, printing the tree unless `print` is false.
 */
export function preview(data: unknown, options: PreviewOptions = {}): string {
  const text = schemaOf(data, options);
  if (options.print !== false) {
    console.log(text);
  }
  return text;
}

/**
 * Path-accepting form of {@link schemaOf}: a file URL or a string naming an
 * existing `.json` file is loaded first.
 */
export async function schemaOfInput(input: unknown, options: PreviewOptions = {}): Promise<string> {
  return schemaOf(await resolveInput(input), options);
}
