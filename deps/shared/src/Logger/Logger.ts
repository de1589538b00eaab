export const logLevels = ["trace", "debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof logLevels)[number];

export type LogContext = {
  /** 事件名稱，會取代輸出中的 level 欄位 */
  event?: string;
  emoji?: string;
  error?: unknown;
  [key: string]: unknown;
};

export type TemplateLog = (
  strings: TemplateStringsArray,
  ...values: unknown[]
) => void;

export type LogRecord = {
  time: string;
  level: LogLevel;
  path: string;
  event?: string;
  msg: string;
  context: Record<string, unknown>;
  err?: { name: string; message: string; stack?: string };
};

export interface LogTransport {
  write(record: LogRecord): void;
  close(): Promise<void>;
}

/**
 * 三種呼叫方式：
 *   logger.info("訊息")
 *   logger.info({ count }, "訊息")
 *   logger.info({ emoji: "📦" })`搬移 ${n} 個檔案`
 */
export interface Logger {
  trace(message: string): void;
  trace(context: LogContext, message: string): void;
  trace(context?: LogContext): TemplateLog;

  debug(message: string): void;
  debug(context: LogContext, message: string): void;
  debug(context?: LogContext): TemplateLog;

  info(message: string): void;
  info(context: LogContext, message: string): void;
  info(context?: LogContext): TemplateLog;

  warn(message: string): void;
  warn(context: LogContext, message: string): void;
  warn(context?: LogContext): TemplateLog;

  error(message: string): void;
  error(context: LogContext, message: string): void;
  error(context?: LogContext): TemplateLog;

  /** 加一層命名空間（輸出為 a:b:c） */
  extend(name: string, context?: LogContext): Logger;

  /** 只合併 context，不改變命名空間 */
  append(context: LogContext): Logger;
}
