#!/usr/bin/env node
// src/mcp.ts
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { z } from 'zod';
import { inferSchemaWithDiagnostics, DEFAULT_MAX_ITEMS } from './schema/infer.js';
import { render } from './tree/render.js';
import { loadJsonFile } from './input/load.js';
import { decodeJson } from './input/json.js';
import { createRequire } from 'node:module';

const require = createRequire(import.meta.url);
const { version: PACKAGE_VERSION } = require('../package.json') as { version: string };

function textResult(text: string, isError = false) {
  return {
    content: [{ type: 'text' as const, text }],
    ...(isError ? { isError: true } : {}),
  };
}

async function dataFrom(json: string | undefined, path: string | undefined): Promise<unknown> {
  if (path !== undefined) return loadJsonFile(path);
  try {
    return decodeJson(json ?? '');
  } catch (err) {
    throw new Error(`Invalid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }
}

export function createMcpServer(): McpServer {
  const server = new McpServer({
    name: 'schema-preview',
    version: PACKAGE_VERSION,
  });

  // --- schema_preview ---
  server.registerTool(
    'schema_preview',
    {
      description:
        'Summarize the shape of a JSON payload as a type tree (e.g. "history: list[dict]"). ' +
        'Pass exactly one of json (the document text) or path (a local .json file). ' +
        'Mixed-type lists are listed as warnings after the tree.',
      inputSchema: {
        json: z.string().optional().describe('JSON document text'),
        path: z.string().optional().describe('Path to a local .json file'),
        maxItems: z.number().int().optional()
          .describe(`List elements sampled per list (default ${DEFAULT_MAX_ITEMS})`),
      },
      annotations: {
        readOnlyHint: true,
        openWorldHint: false,
      },
    },
    async ({ json, path, maxItems }) => {
      if ((json === undefined) === (path === undefined)) {
        return textResult('Provide exactly one of "json" or "path"', true);
      }

      try {
        const data = await dataFrom(json, path);
        const { schema, diagnostics } = inferSchemaWithDiagnostics(data, {
          maxItems: maxItems ?? DEFAULT_MAX_ITEMS,
        });
        const warnings = diagnostics.map((d) => `Warning: ${d.message}`);
        const text = warnings.length > 0
          ? `${render(schema)}\n\n${warnings.join('\n')}`
          : render(schema);
        return textResult(text);
      } catch (err) {
        return textResult(`Schema preview failed: ${err instanceof Error ? err.message : String(err)}`, true);
      }
    },
  );

  return server;
}

// --- stdio entry point ---
// Only start when run directly (not imported for testing)
const _argv1 = (process.argv[1] || '').replace(/\\/g, '/');
const isMainModule = _argv1.endsWith('/mcp.ts') ||
  _argv1.endsWith('/mcp.js') ||
  _argv1.endsWith('/schema-preview-mcp');

if (isMainModule) {
  const server = createMcpServer();
  const transport = new StdioServerTransport();
  server.connect(transport).catch((err: unknown) => {
    console.error('MCP server failed to start:', err);
    process.exit(1);
  });
}
