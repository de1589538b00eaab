import { Type as t } from "@sinclair/typebox";
import path from "node:path";

import { buildConfigFactoryEnv } from "../ConfigFactory";
import { LoggerConsole, defaultEmojiMap } from "./LoggerConsole";
import { RfsTransport } from "./RfsTransport";

export * from "./Logger";
export * from "./LoggerConsole";

const getLoggerConfig = buildConfigFactoryEnv(
  t.Object({
    LOG_LEVEL: t.Optional(
      t.Union([
        t.Literal("trace"),
        t.Literal("debug"),
        t.Literal("info"),
        t.Literal("warn"),
        t.Literal("error"),
      ])
    ),
    /** 設定後額外寫入 JSON lines 日誌，例如 logs/app.log */
    LOG_FILE: t.Optional(t.String()),
  })
);

export function createDefaultLoggerFromEnv(): LoggerConsole {
  const { LOG_LEVEL, LOG_FILE } = getLoggerConfig();
  const logger = new LoggerConsole(LOG_LEVEL ?? "info", [], {}, defaultEmojiMap);
  if (LOG_FILE) {
    logger.attachTransport(
      new RfsTransport({
        filename: path.basename(LOG_FILE),
        rfs: { path: path.dirname(LOG_FILE) },
      })
    );
  }
  return logger;
}
