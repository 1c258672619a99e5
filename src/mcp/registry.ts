/**
 * Tool Registry
 * 工具名稱 → { 說明, 輸入 schema, 處理函數 }，啟動時建立一次
 */

import { z } from 'zod';
import { renderError } from './render.js';
import { loggers } from '../lib/logger.js';
import type { StructuredLogger } from '../lib/logger.js';
import type { AssistantClient } from '../services/assistant-client.js';

export interface ToolResult {
  text: string;
  isError: boolean;
}

export interface ToolDefinition {
  name: string;
  description: string;
  /** 不修改資料的工具 */
  readOnly: boolean;
  inputShape: z.ZodRawShape;
  /** 驗證參數後執行，回傳要顯示的文字 */
  invoke(client: AssistantClient, args: unknown): Promise<string>;
}

export interface ToolSpec<S extends z.ZodRawShape> {
  name: string;
  description: string;
  readOnly: boolean;
  input: S;
  run(client: AssistantClient, args: z.infer<z.ZodObject<S>>): Promise<string>;
}

export class ToolArgumentError extends Error {
  constructor(toolName: string, error: z.ZodError) {
    const details = error.issues
      .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : 'arguments'}: ${issue.message}`)
      .join('; ');
    super(`Invalid arguments for ${toolName}: ${details}`);
    this.name = 'ToolArgumentError';
  }
}

/**
 * 建立工具定義；參數在每次呼叫時以 zod 驗證
 */
export function defineTool<S extends z.ZodRawShape>(options: ToolSpec<S>): ToolDefinition {
  const schema = z.object(options.input);
  return {
    name: options.name,
    description: options.description,
    readOnly: options.readOnly,
    inputShape: options.input,
    invoke: async (client, args) => {
      const parsed = schema.safeParse(args ?? {});
      if (!parsed.success) {
        throw new ToolArgumentError(options.name, parsed.error);
      }
      return options.run(client, parsed.data);
    },
  };
}

/**
 * 取得客戶端；沒有設定時會拋出 ConfigurationError，於每次呼叫時顯示
 */
export type ClientProvider = () => AssistantClient;

export class ToolRegistry {
  private tools = new Map<string, ToolDefinition>();
  private getClient: ClientProvider;
  private logger: StructuredLogger;

  constructor(getClient: ClientProvider, logger: StructuredLogger = loggers.mcp) {
    this.getClient = getClient;
    this.logger = logger;
  }

  register(tool: ToolDefinition): this {
    if (this.tools.has(tool.name)) {
      throw new Error(`Tool ${tool.name} is already registered`);
    }
    this.tools.set(tool.name, tool);
    return this;
  }

  get(name: string): ToolDefinition | undefined {
    return this.tools.get(name);
  }

  list(): ToolDefinition[] {
    return [...this.tools.values()];
  }

  /**
   * 執行工具；任何錯誤都轉成文字結果
   */
  async invoke(name: string, args: unknown): Promise<ToolResult> {
    const tool = this.tools.get(name);
    if (!tool) {
      return { text: `❌ Unknown tool: ${name}`, isError: true };
    }

    const startTime = Date.now();
    try {
      const text = await tool.invoke(this.getClient(), args);
      this.logger.info('Tool completed', { tool: name, duration: Date.now() - startTime });
      return { text, isError: false };
    } catch (error) {
      this.logger.error(
        'Tool failed',
        error instanceof Error ? error : new Error(String(error)),
        { tool: name, duration: Date.now() - startTime }
      );
      return { text: renderError(error), isError: true };
    }
  }
}
