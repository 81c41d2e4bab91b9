import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import type { AppServices } from '@/bootstrap.js';
import type { ServerConfig } from '@/config/app-config.js';
import type { ContentBlock, ToolResult } from '@/types/tools.js';

type McpContent = CallToolResult['content'][number];

/**
 * Error blocks have no MCP counterpart and travel as text.
 */
export function toMcpContent(block: ContentBlock): McpContent {
  switch (block.type) {
    case 'text':
      return { type: 'text', text: block.text };
    case 'image':
      return { type: 'image', data: block.data, mimeType: block.mimeType };
    case 'error':
      return { type: 'text', text: `${block.kind}: ${block.message}` };
  }
}

export function toMcpResult(result: ToolResult): CallToolResult {
  return {
    content: result.content.map(toMcpContent),
    ...(result.isError ? { isError: true } : {}),
  };
}

export function createMcpServer(services: AppServices, config: ServerConfig): McpServer {
  const server = new McpServer({ name: config.name, version: config.version });

  for (const tool of services.registry.all()) {
    server.registerTool(
      tool.name,
      {
        title: tool.title,
        description: tool.description,
        inputSchema: tool.schema.shape,
      },
      async (args: unknown) => toMcpResult(await services.registry.call(tool.name, args))
    );
  }

  for (const descriptor of services.resources.list()) {
    server.registerResource(
      descriptor.name,
      descriptor.uri,
      {
        title: descriptor.title,
        description: descriptor.description,
        mimeType: descriptor.mimeType,
      },
      async (uri) => {
        const content = await services.resources.read(descriptor.name);
        return {
          contents: [{ uri: uri.href, mimeType: content.mimeType, text: content.text }],
        };
      }
    );
  }

  return server;
}
