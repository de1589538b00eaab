import type { LogLevel, LogRecord, LogTransport } from "../Logger";
import { LoggerConsole } from "../Logger";

/** 把紀錄留在記憶體，讓測試可以檢查輸出 */
export class MemoryTransport implements LogTransport {
  readonly records: LogRecord[] = [];

  write(record: LogRecord) {
    this.records.push(record);
  }

  async close() {}

  byLevel(level: LogLevel) {
    return this.records.filter((r) => r.level === level);
  }

  messages(level?: LogLevel) {
    return (level ? this.byLevel(level) : this.records).map((r) => r.msg);
  }
}

/**
 * 測試用 logger：預設不輸出到 console，設定 TEST_LOG_OUTPUT=1 可打開。
 */
export function buildTestLogger(): LoggerConsole {
  return buildTestLoggerWithRecords().logger;
}

export function buildTestLoggerWithRecords() {
  const transport = new MemoryTransport();
  const logger = new LoggerConsole("trace", [], {}, undefined, [transport], {
    console: process.env.TEST_LOG_OUTPUT === "1",
  });
  return { logger, transport };
}
