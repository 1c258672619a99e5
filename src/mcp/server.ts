/**
 * MCP Server
 * 把註冊表中的工具掛到 McpServer 上
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { ToolRegistry } from './registry.js';

export const SERVER_NAME = 'teamsnap';
export const SERVER_VERSION = '0.1.0';

export function createMcpServer(registry: ToolRegistry): McpServer {
  const server = new McpServer(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION,
    },
    {
      capabilities: {
        logging: {},
      },
    }
  );

  for (const tool of registry.list()) {
    server.registerTool(
      tool.name,
      {
        description: tool.description,
        inputSchema: tool.inputShape,
        annotations: {
          readOnlyHint: tool.readOnly,
          destructiveHint: !tool.readOnly && tool.name.startsWith('delete_'),
          openWorldHint: true,
        },
      },
      async (args) => {
        const result = await registry.invoke(tool.name, args);
        return {
          content: [{ type: 'text' as const, text: result.text }],
          isError: result.isError,
        };
      }
    );
  }

  return server;
}
