// src/input/load.ts
import { readFile, stat } from 'node:fs/promises';
import { extname } from 'node:path';
import { fileURLToPath } from 'node:url';
import type { TextDecoder as NodeTextDecoder } from 'node:util';
import { SchemaInputError } from '../errors.js';
import { decodeJson } from './json.js';

export const STDIN_SOURCE = '<stdin>';

function invalidJson(err: unknown, source: string): SchemaInputError {
  const reason = err instanceof Error ? err.message : String(err);
  return new SchemaInputError('INVALID_JSON', `Invalid JSON in ${source}: ${reason}`, source);
}

function parseJson(text: string, source: string): unknown {
  try {
    return decodeJson(text);
  } catch (err) {
    throw invalidJson(err, source);
  }
}

function utf8Decoder(): NodeTextDecoder {
  return new TextDecoder('utf-8', { fatal: true });
}

/** Decode bytes as UTF-8, rejecting malformed sequences. */
function decodeUtf8(bytes: Uint8Array, source: string): string {
  try {
    return utf8Decoder().decode(bytes);
  } catch (err) {
    throw invalidJson(err, source);
  }
}

async function isFile(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch {
    // Missing or unreadable: not a file we can load
    return false;
  }
}

/**
 * Load and parse a `.json` file.
 */
export async function loadJsonFile(path: string | URL): Promise<unknown> {
  const filePath = path instanceof URL ? fileURLToPath(path) : path;

  if (!(await isFile(filePath))) {
    throw new SchemaInputError('FILE_NOT_FOUND', `File not found: ${filePath}`, filePath);
  }

  const ext = extname(filePath).toLowerCase();
  if (ext !== '.json') {
    throw new SchemaInputError(
      'UNSUPPORTED_FILE',
      `Unsupported file type '${ext || '(none)'}': ${filePath} (expected .json)`,
      filePath,
    );
  }

  return parseJson(decodeUtf8(await readFile(filePath), filePath), filePath);
}

/**
 * Turn a path-or-data argument into data. File URLs are always loaded,
 * strings only when they name an existing file; anything else is data.
 */
export async function resolveInput(input: unknown): Promise<unknown> {
  if (input instanceof URL) return loadJsonFile(input);
  if (typeof input === 'string' && input.length > 0 && (await isFile(input))) {
    return loadJsonFile(input);
  }
  return input;
}

/** Read a stream to its end and parse it as JSON. */
export async function readJsonStream(
  stream: AsyncIterable<string | Uint8Array>,
  source: string = STDIN_SOURCE,
): Promise<unknown> {
  const chunks: string[] = [];
  const decoder = utf8Decoder();
  const decode = (chunk?: Uint8Array): string => {
    try {
      return chunk === undefined ? decoder.decode() : decoder.decode(chunk, { stream: true });
    } catch (err) {
      throw invalidJson(err, source);
    }
  };
  for await (const chunk of stream) {
    chunks.push(typeof chunk === 'string' ? chunk : decode(chunk));
  }
  chunks.push(decode());
  return parseJson(chunks.join(''), source);
}
