#!/usr/bin/env node

/**
 * teamsnap-mcp
 * stdio MCP server；stdout 保留給協定，日誌一律寫到 stderr
 */

import dotenv from 'dotenv';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { createLoggers, isLogLevel, stderrSink } from '../lib/logger.js';
import { AssistantClient } from '../services/assistant-client.js';
import { createMcpServer } from './server.js';
import { buildToolRegistry } from './tools.js';

dotenv.config();

const envLevel = process.env.TEAMSNAP_LOG_LEVEL;
const loggers = createLoggers({
  minLevel: isLogLevel(envLevel) ? envLevel : 'info',
  sink: stderrSink,
});

// 第一次呼叫工具時才建立；缺少設定時錯誤會顯示在工具結果中
let client: AssistantClient | null = null;
const getClient = (): AssistantClient => {
  if (!client) {
    client = AssistantClient.fromEnv(process.env, {
      logger: loggers.api,
      auth: { logger: loggers.auth },
    });
    loggers.mcp.info('TeamSnap client ready', { mode: client.mode });
  }
  return client;
};

async function main(): Promise<void> {
  const registry = buildToolRegistry(getClient, loggers.mcp);
  const server = createMcpServer(registry);
  await server.connect(new StdioServerTransport());
  loggers.mcp.info('TeamSnap MCP server running on stdio', { tools: registry.list().length });
}

main().catch((error: unknown) => {
  loggers.mcp.error('MCP server failed to start', error instanceof Error ? error : new Error(String(error)));
  process.exit(1);
});
