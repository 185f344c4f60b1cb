/**
 * Structured Logger - 結構化日誌系統
 * JSON 格式日誌，每行一筆，方便以 jq 或集中式日誌系統解析
 *   - 日誌級別控制
 *   - requestId 追蹤（一次 CLI 指令或一次 ensure 呼叫）
 *   - 執行時間 (duration)
 *   - 錯誤堆棧記錄
 *
 * 所有日誌都寫到 stderr；stdout 保留給指令輸出（例如權杖 JSON）。
 * 權杖值不得放進 context 或 metadata。
 */

import { randomUUID } from 'node:crypto';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
  /** 請求唯一識別碼 */
  requestId?: string;
  /** 權杖種類，如 access、xsts[http://xboxlive.com] */
  token?: string;
  /** 請求 URL 或端點 */
  url?: string;
  /** 執行時間（毫秒） */
  duration?: number;
  /** 返回狀態碼 */
  statusCode?: number;
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

export interface LoggerConfig {
  /** 最小日誌級別 (default: 'warn') */
  minLevel?: LogLevel;
  /** 自定義輸出函數 (default: 寫到 stderr) */
  sink?: (line: string) => void;
  /** 自定義格式化函數 */
  formatter?: (entry: LogEntry) => string;
  /** 是否包含堆棧追蹤 (default: true) */
  includeStack?: boolean;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3
};

export function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVEL_PRIORITY;
}

function errorCode(error: Error): string | undefined {
  if ('code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export class StructuredLogger {
  private component: string;
  private config: Required<LoggerConfig>;
  private requestIdStack: string[] = [];

  constructor(component: string, config: LoggerConfig = {}) {
    this.component = component;
    this.config = {
      minLevel: config.minLevel || 'warn',
      sink: config.sink || ((line: string) => console.error(line)),
      formatter: config.formatter || this.defaultFormatter,
      includeStack: config.includeStack !== false
    };
  }

  private defaultFormatter = (entry: LogEntry): string => {
    return JSON.stringify(entry);
  };

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[this.config.minLevel];
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
      metadata
    };

    if (error) {
      entry.error = {
        name: error.name,
        message: error.message,
        code: errorCode(error),
        stack: this.config.includeStack ? error.stack : undefined
      };
    }

    this.config.sink(this.config.formatter(entry));
  }

  private log(
    level: LogLevel,
    message: string,
    context?: LogContext,
    metadata?: Record<string, unknown>
  ): void {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      component: this.component,
      context: this.enrichContext(context),
      metadata
    };

    this.config.sink(this.config.formatter(entry));
  }

  /**
   * 自動補上目前的 requestId
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

  getMinLevel(): LogLevel {
    return this.config.minLevel;
  }
}

/**
 * 預設的日誌記錄器實例，按組件分類
 */
export const loggers = {
  auth: new StructuredLogger('Auth'),
  store: new StructuredLogger('TokenStore'),
  exchange: new StructuredLogger('Exchange'),
  cli: new StructuredLogger('CLI')
};

/**
 * 一次設定所有預設記錄器的級別
 */
export function setLogLevel(level: LogLevel): void {
  for (const logger of Object.values(loggers)) {
    logger.setMinLevel(level);
  }
}

/**
 * 為一次 CLI 指令建立 requestId，套用到所有預設記錄器
 */
export function beginRequest(requestId: string = randomUUID()): string {
  for (const logger of Object.values(loggers)) {
    logger.pushRequestId(requestId);
  }
  return requestId;
}

export function endRequest(): void {
  for (const logger of Object.values(loggers)) {
    logger.popRequestId();
  }
}
