#!/usr/bin/env node
// src/cli.ts
import { inferSchema, inferSchemaWithDiagnostics, DEFAULT_MAX_ITEMS } from './schema/infer.js';
import { render } from './tree/render.js';
import { loadJsonFile, readJsonStream } from './input/load.js';

interface ParsedArgs {
  positional: string[];
  flags: Record<string, string | boolean>;
}

export interface CliIO {
  stdin: AsyncIterable<string | Uint8Array> & { isTTY?: boolean };
  out: (text: string) => void;
  err: (text: string) => void;
  env: Record<string, string | undefined>;
}

const BOOLEAN_FLAGS = new Set(['json', 'help']);

function parseArgs(argv: string[]): ParsedArgs {
  const positional: string[] = [];
  const flags: Record<string, string | boolean> = {};

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '-h') {
      flags.help = true;
    } else if (arg.startsWith('--')) {
      const eq = arg.indexOf('=');
      if (eq > 0) {
        flags[arg.slice(2, eq)] = arg.slice(eq + 1);
        continue;
      }
      const key = arg.slice(2);
      const next = argv[i + 1];
      if (!BOOLEAN_FLAGS.has(key) && next !== undefined && !next.startsWith('--')) {
        flags[key] = next;
        i++;
      } else {
        flags[key] = true;
      }
    } else {
      positional.push(arg);
    }
  }

  return { positional, flags };
}

function usage(): string {
  return `
  schema-preview — quickly preview the schema of a JSON file

  Usage:
    schema-preview <file.json>     Print the schema tree of a JSON file
    cat data.json | schema-preview Read JSON from stdin

  Options:
    --max-items <n>                List elements sampled per list (default: ${DEFAULT_MAX_ITEMS},
                                   or SCHEMA_PREVIEW_MAX_ITEMS)
    --json                         Output { schema, diagnostics } as JSON
    --help, -h                     Show this help
  `.trim();
}

const MAX_ITEMS_ENV = 'SCHEMA_PREVIEW_MAX_ITEMS';

function parseInteger(raw: string | boolean): number | null {
  if (typeof raw !== 'string' || !/^-?\d+$/.test(raw.trim())) return null;
  return parseInt(raw, 10);
}

/** `--max-items` wins over the environment; errors name whichever was used. */
function resolveMaxItems(
  flag: string | boolean | undefined,
  env: string | undefined,
): { maxItems: number } | { error: string } {
  if (flag !== undefined) {
    const maxItems = parseInteger(flag);
    return maxItems === null ? { error: '--max-items must be an integer' } : { maxItems };
  }
  if (env !== undefined) {
    const maxItems = parseInteger(env);
    return maxItems === null ? { error: `${MAX_ITEMS_ENV} must be an integer` } : { maxItems };
  }
  return { maxItems: DEFAULT_MAX_ITEMS };
}

/**
 * Run the CLI against `argv` (without the node and script entries).
 * Resolves to the process exit code.
 */
export async function runCli(argv: string[], io: CliIO = defaultIO()): Promise<number> {
  const { positional, flags } = parseArgs(argv);

  if (flags.help === true) {
    io.out(usage());
    return 0;
  }

  const resolved = resolveMaxItems(flags['max-items'], io.env[MAX_ITEMS_ENV]);
  if ('error' in resolved) {
    io.err(`Error: ${resolved.error}`);
    return 1;
  }
  const { maxItems } = resolved;

  const file = positional[0];
  if (file === undefined && io.stdin.isTTY) {
    io.out(usage());
    return 1;
  }

  try {
    const data = file !== undefined ? await loadJsonFile(file) : await readJsonStream(io.stdin);

    if (flags.json === true) {
      const result = inferSchemaWithDiagnostics(data, { maxItems });
      io.out(JSON.stringify(result, null, 2));
      return 0;
    }

    const schema = inferSchema(data, {
      maxItems,
      onDiagnostic: (d) => io.err(`Warning: ${d.message}`),
    });
    io.out(render(schema));
    return 0;
  } catch (err) {
    io.err(`Error: ${err instanceof Error ? err.message : String(err)}`);
    return 1;
  }
}

function defaultIO(): CliIO {
  return {
    stdin: process.stdin,
    out: (text) => console.log(text),
    err: (text) => console.error(text),
    env: process.env,
  };
}

// Only run when executed directly (not imported for testing)
const _argv1 = (process.argv[1] || '').replace(/\\/g, '/');
const isMainModule = _argv1.endsWith('/cli.ts') ||
  _argv1.endsWith('/cli.js') ||
  _argv1.endsWith('/schema-preview');

if (isMainModule) {
  runCli(process.argv.slice(2)).then((code) => {
    process.exitCode = code;
  }).catch((err: unknown) => {
    console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    process.exitCode = 1;
  });
}
