/**
 * Structured Logger - 結構化日誌系統
 * JSON 格式日誌，每個元件一個實例
 * 特性：
 *   - JSON 格式輸出（易於機器解析）
 *   - 日誌級別控制
 *   - requestId 追蹤
 *   - 可替換輸出端（MCP stdio 模式下必須寫到 stderr）
 */

import { randomUUID } from 'node:crypto';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
  /** 請求唯一識別碼 */
  requestId?: string;
  /** HTTP 方法 */
  method?: string;
  /** 請求 URL 或端點 */
  url?: string;
  /** 執行時間（毫秒） */
  duration?: number;
  /** 返回狀態碼 */
  statusCode?: number;
  /** 自定義數據 */
  [key: string]: unknown;
}

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  component: string;
  context?: LogContext;
  error?: {
    name: string;
    message: string;
    code?: string;
    stack?: string;
  };
  metadata?: Record<string, unknown>;
}

/** 日誌輸出端 */
export type LogSink = (line: string, level: LogLevel) => void;

export interface LoggerConfig {
  /** 最小日誌級別 (default: 'info') */
  minLevel?: LogLevel;
  /** 輸出端 (default: 依級別寫到 console) */
  sink?: LogSink;
  /** 自定義格式化函數 */
  formatter?: (entry: LogEntry) => string;
  /** 是否包含堆棧追蹤 (default: true) */
  includeStack?: boolean;
}

/** 日誌級別優先級 */
const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.prototype.hasOwnProperty.call(LOG_LEVEL_PRIORITY, value);
}

/**
 * 預設輸出端：依級別選擇 console 方法
 */
export const consoleSink: LogSink = (line, level) => {
  switch (level) {
    case 'error':
      console.error(line);
      break;
    case 'warn':
      console.warn(line);
      break;
    case 'debug':
      console.debug(line);
      break;
    case 'info':
    default:
      console.log(line);
  }
};

/**
 * stderr 輸出端：stdout 被協定佔用時使用
 */
export const stderrSink: LogSink = (line) => {
  process.stderr.write(line + '\n');
};

function readCode(error: Error): string | undefined {
  if ('code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * 結構化日誌記錄器
 */
export class StructuredLogger {
  private component: string;
  private config: Required<LoggerConfig>;
  private requestIdStack: string[] = [];

  constructor(component: string, config: LoggerConfig = {}) {
    this.component = component;
    this.config = {
      minLevel: config.minLevel || 'info',
      sink: config.sink || consoleSink,
      formatter: config.formatter || ((entry: LogEntry) => JSON.stringify(entry)),
      includeStack: config.includeStack !== false,
    };
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[this.config.minLevel];
  }

  private output(entry: LogEntry): void {
    this.config.sink(this.config.formatter(entry), entry.level);
  }

  debug(message: string, context?: LogContext, metadata?: Record<string, unknown>): void {
    if (!this.shouldLog('debug')) return;
    this.log('debug', message, context, metadata);
  }

  info(message: string, context?: LogContext, metadata?: Record<string, unknown>): void {
    if (!this.shouldLog('info')) return;
    this.log('info', message, context, metadata);
  }

  warn(message: string, context?: LogContext, metadata?: Record<string, unknown>): void {
    if (!this.shouldLog('warn')) return;
    this.log('warn', message, context, metadata);
  }

  error(
    message: string,
    error?: Error | null,
    context?: LogContext,
    metadata?: Record<string, unknown>
  ): void {
    if (!this.shouldLog('error')) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level: 'error',
      message,
      component: this.component,
      context: this.enrichContext(context),
      metadata,
    };

    if (error) {
      entry.error = {
        name: error.name,
        message: error.message,
        code: readCode(error),
        stack: this.config.includeStack ? error.stack : undefined,
      };
    }

    this.output(entry);
  }

  private log(
    level: LogLevel,
    message: string,
    context?: LogContext,
    metadata?: Record<string, unknown>
  ): void {
    this.output({
      timestamp: new Date().toISOString(),
      level,
      message,
      component: this.component,
      context: this.enrichContext(context),
      metadata,
    });
  }

  /**
   * 沒有指定 requestId 時補上目前棧頂的值
   */
  private enrichContext(context?: LogContext): LogContext | undefined {
    const current = this.getCurrentRequestId();
    if (!context) {
      return current ? { requestId: current } : undefined;
    }
    if (!context.requestId && current) {
      return { ...context, requestId: current };
    }
    return context;
  }

  /**
   * 推入新的 requestId（支持嵌套請求）
   */
  pushRequestId(requestId?: string): string {
    const id = requestId || randomUUID();
    this.requestIdStack.push(id);
    return id;
  }

  popRequestId(): string | undefined {
    return this.requestIdStack.pop();
  }

  getCurrentRequestId(): string | undefined {
    return this.requestIdStack[this.requestIdStack.length - 1];
  }

  setMinLevel(level: LogLevel): void {
    this.config.minLevel = level;
  }

  /**
   * 執行帶日誌的非同步操作
   */
  async trackAsync<T>(
    operation: string,
    fn: () => Promise<T>,
    context?: Omit<LogContext, 'duration'>
  ): Promise<T> {
    const startTime = Date.now();
    const requestId = this.getCurrentRequestId();

    try {
      const result = await fn();
      this.info(`${operation} completed`, {
        ...context,
        requestId,
        duration: Date.now() - startTime,
      });
      return result;
    } catch (error) {
      this.error(
        `${operation} failed`,
        error instanceof Error ? error : new Error(String(error)),
        {
          ...context,
          requestId,
          duration: Date.now() - startTime,
        }
      );
      throw error;
    }
  }
}

/**
 * 各元件的日誌記錄器
 */
export interface Loggers {
  api: StructuredLogger;
  auth: StructuredLogger;
  store: StructuredLogger;
  mcp: StructuredLogger;
  cli: StructuredLogger;
}

/**
 * 建立一組元件日誌記錄器（共用同一份設定）
 */
export function createLoggers(config: LoggerConfig = {}): Loggers {
  return {
    api: new StructuredLogger('API', config),
    auth: new StructuredLogger('Auth', config),
    store: new StructuredLogger('TokenStore', config),
    mcp: new StructuredLogger('MCP', config),
    cli: new StructuredLogger('CLI', config),
  };
}

const envLevel = process.env.TEAMSNAP_LOG_LEVEL;

/**
 * 預設的日誌記錄器，未注入 logger 時使用（寫到 stderr，stdout 留給指令輸出）
 */
export const loggers: Loggers = createLoggers({
  minLevel: isLogLevel(envLevel) ? envLevel : 'warn',
  sink: stderrSink,
});
