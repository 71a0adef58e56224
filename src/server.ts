import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import type { ToolRegistry } from './tools/registry.js';
import type { ToolContext } from './tools/types.js';

export const SERVER_NAME = 'toolbox';

/**
 * Exposes a sealed registry over the Model Context Protocol. `tools/list`
 * mirrors the catalog; `tools/call` relays the envelope as JSON text, with
 * `isError` set whenever the envelope reports failure.
 */
export function createServer(
  registry: ToolRegistry,
  options: { version: string; context?: ToolContext }
): Server {
  const server = new Server(
    {
      name: SERVER_NAME,
      version: options.version,
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  server.setRequestHandler(ListToolsRequestSchema, () => ({
    tools: registry.list().map(({ name, description, inputSchema }) => ({
      name,
      description,
      inputSchema,
    })),
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const result = await registry.invoke(
      request.params.name,
      request.params.arguments ?? {},
      options.context ?? { cwd: process.cwd() }
    );
    return {
      content: [{ type: 'text' as const, text: JSON.stringify(result, null, 2) }],
      isError: !result.success,
    };
  });

  return server;
}
