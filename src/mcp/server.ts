import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { z } from 'zod';
import { resolveConfig } from '../core/config.js';
import type { ResolveOptions } from '../core/config.js';
import { createDetector, MojibakeDetector } from '../core/detector.js';
import { errorMessage } from '../core/errors.js';
import { readTextFile } from '../core/source.js';

export function createServer(detector: MojibakeDetector = new MojibakeDetector()): McpServer {
  const server = new McpServer({
    name: 'mojiscan',
    version: '0.1.0',
  });

  // Tool: detect_mojibake
  server.tool(
    'detect_mojibake',
    'Check a piece of text for mojibake and return the detection result',
    {
      text: z.string().describe('Text to inspect'),
    },
    async ({ text }) => ({
      content: [{
        type: 'text' as const,
        text: JSON.stringify(detector.detect(text), null, 2),
      }],
    }),
  );

  // Tool: scan_file
  server.tool(
    'scan_file',
    'Read a file (UTF-8 with lossy fallback) and check it for mojibake',
    {
      path: z.string().describe('Path of the file to check'),
    },
    async ({ path }) => {
      try {
        const { text, lossy } = readTextFile(path);
        return {
          content: [{
            type: 'text' as const,
            text: JSON.stringify({ path, lossy, result: detector.detect(text) }, null, 2),
          }],
        };
      } catch (err) {
        return {
          isError: true,
          content: [{
            type: 'text' as const,
            text: `Cannot read ${path}: ${errorMessage(err)}`,
          }],
        };
      }
    },
  );

  return server;
}

export async function startServer(options: ResolveOptions = {}): Promise<void> {
  const config = resolveConfig(options);
  const server = createServer(createDetector(config));
  const transport = new StdioServerTransport();
  await server.connect(transport);
}
