import kleur from "kleur";

import {
  type LogContext,
  type LogLevel,
  type LogRecord,
  type LogTransport,
  type Logger,
  type TemplateLog,
  logLevels,
} from "./Logger";

export type EmojiMap = Record<string, string>;

export const defaultEmojiMap: EmojiMap = {
  start: "🏁",
  done: "✅",
  trace: "🔍",
  debug: "🐛",
  info: "ℹ️",
  warn: "⚠️",
  error: "❌",
};

export type LoggerConsoleOptions = {
  /** false 時只寫 transport，不輸出到 console */
  console?: boolean;
};

const levelColor: Record<LogLevel, (s: string) => string> = {
  trace: kleur.gray,
  debug: kleur.blue,
  info: kleur.cyan,
  warn: kleur.yellow,
  error: kleur.red,
};

export class LoggerConsole implements Logger {
  private readonly minLevel: number;

  constructor(
    private readonly level: LogLevel,
    private readonly path: string[] = [],
    private readonly context: LogContext = {},
    private readonly emojiMap: EmojiMap = defaultEmojiMap,
    private readonly transports: LogTransport[] = [],
    private readonly options: LoggerConsoleOptions = {}
  ) {
    this.minLevel = logLevels.indexOf(level);
  }

  attachTransport(transport: LogTransport) {
    this.transports.push(transport);
  }

  /** 關閉所有 transport，程式結束前呼叫 */
  async dispose() {
    await Promise.all(this.transports.map((t) => t.close()));
  }

  extend(name: string, context: LogContext = {}): LoggerConsole {
    return new LoggerConsole(
      this.level,
      [...this.path, name],
      { ...this.context, ...context },
      this.emojiMap,
      this.transports,
      this.options
    );
  }

  append(context: LogContext): LoggerConsole {
    return new LoggerConsole(
      this.level,
      this.path,
      { ...this.context, ...context },
      this.emojiMap,
      this.transports,
      this.options
    );
  }

  trace(message: string): void;
  trace(context: LogContext, message: string): void;
  trace(context?: LogContext): TemplateLog;
  trace(contextOrMessage?: LogContext | string, message?: string) {
    return this.dispatch("trace", contextOrMessage, message);
  }

  debug(message: string): void;
  debug(context: LogContext, message: string): void;
  debug(context?: LogContext): TemplateLog;
  debug(contextOrMessage?: LogContext | string, message?: string) {
    return this.dispatch("debug", contextOrMessage, message);
  }

  info(message: string): void;
  info(context: LogContext, message: string): void;
  info(context?: LogContext): TemplateLog;
  info(contextOrMessage?: LogContext | string, message?: string) {
    return this.dispatch("info", contextOrMessage, message);
  }

  warn(message: string): void;
  warn(context: LogContext, message: string): void;
  warn(context?: LogContext): TemplateLog;
  warn(contextOrMessage?: LogContext | string, message?: string) {
    return this.dispatch("warn", contextOrMessage, message);
  }

  error(message: string): void;
  error(context: LogContext, message: string): void;
  error(context?: LogContext): TemplateLog;
  error(contextOrMessage?: LogContext | string, message?: string) {
    return this.dispatch("error", contextOrMessage, message);
  }

  private dispatch(
    level: LogLevel,
    contextOrMessage: LogContext | string | undefined,
    message: string | undefined
  ): TemplateLog | undefined {
    if (typeof contextOrMessage === "string") {
      this.write(level, {}, contextOrMessage, contextOrMessage);
      return undefined;
    }
    const context = contextOrMessage ?? {};
    if (message !== undefined) {
      this.write(level, context, message, message);
      return undefined;
    }
    return (strings, ...values) => {
      const plain = strings.reduce(
        (acc, s, i) => acc + s + (i < values.length ? show(values[i]) : ""),
        ""
      );
      const colored = strings.reduce(
        (acc, s, i) =>
          acc + s + (i < values.length ? kleur.green(show(values[i])) : ""),
        ""
      );
      const templateValues = Object.fromEntries(
        values.map((v, i) => [`__${i}`, v])
      );
      this.write(level, { ...context, ...templateValues }, plain, colored);
    };
  }

  private write(
    level: LogLevel,
    callContext: LogContext,
    plainMessage: string,
    coloredMessage: string
  ) {
    if (logLevels.indexOf(level) < this.minLevel) return;

    const { event, emoji, error, ...rest } = { ...this.context, ...callContext };
    const data: Record<string, unknown> = rest;
    const resolvedEmoji = this.resolveEmoji(level, callContext, event, emoji);
    const head = [...this.path, event ?? level].join(":");
    const errInfo = toErrInfo(error);

    const record: LogRecord = {
      time: new Date().toISOString(),
      level,
      path: this.path.join(":"),
      event: typeof event === "string" ? event : undefined,
      msg: plainMessage,
      context: data,
      err: errInfo,
    };
    for (const transport of this.transports) transport.write(record);

    if (this.options.console === false) return;

    const dataText = Object.keys(data).length > 0 ? ` ${safeJson(data)}` : "";
    const line = `${resolvedEmoji} ${kleur.gray(record.time)} ${levelColor[level](head)}: ${coloredMessage}${kleur.gray(dataText)}`;
    if (level === "error") {
      console.error(errInfo?.stack ? `${line}\n${errInfo.stack}` : line);
    } else if (level === "warn") {
      console.warn(line);
    } else {
      console.log(line);
    }
  }

  private resolveEmoji(
    level: LogLevel,
    callContext: LogContext,
    event: unknown,
    inherited: unknown
  ) {
    if (typeof callContext.emoji === "string") return callContext.emoji;
    if (typeof event === "string" && this.emojiMap[event])
      return this.emojiMap[event];
    // warn/error 一律用等級圖示，避免被上層 emoji 蓋掉
    if ((level === "warn" || level === "error") && this.emojiMap[level])
      return this.emojiMap[level];
    if (typeof inherited === "string") return inherited;
    return this.emojiMap[level] ?? "";
  }
}

function show(value: unknown) {
  if (typeof value === "string") return value;
  if (value instanceof Error) return value.message;
  if (typeof value === "object" && value !== null) return safeJson(value);
  return String(value);
}

function toErrInfo(error: unknown): LogRecord["err"] {
  if (error === undefined) return undefined;
  if (error instanceof Error)
    return { name: error.name, message: error.message, stack: error.stack };
  return { name: "NonError", message: show(error) };
}

function safeJson(value: unknown) {
  return JSON.stringify(value, (_key, v: unknown) => {
    if (typeof v === "bigint") return v.toString();
    if (v instanceof Map) return Object.fromEntries(v);
    if (v instanceof Set) return [...v];
    if (v instanceof Error) return { name: v.name, message: v.message };
    return v;
  });
}
