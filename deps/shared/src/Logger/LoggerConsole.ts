import kleur from "kleur";

import type { LogRecord, LogTransport, SerializedError } from "./LogTransport";
import {
  type LogContext,
  type LogLevel,
  type LogMethod,
  type Logger,
  type LoggerLevel,
  type TemplateLog,
} from "./Logger";

const levelWeight: Record<LoggerLevel, number> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
  silent: 100,
};

const reservedKeys = new Set(["event", "emoji", "error"]);

export function serializeError(error: unknown): SerializedError | undefined {
  if (error === undefined || error === null) return undefined;
  if (error instanceof Error) {
    return { name: error.name, message: error.message, stack: error.stack };
  }
  if (typeof error === "object" && "message" in error) {
    return { name: "Error", message: String(error.message) };
  }
  return { name: "Error", message: String(error) };
}

export class LoggerConsole implements Logger {
  readonly trace: LogMethod;
  readonly debug: LogMethod;
  readonly info: LogMethod;
  readonly warn: LogMethod;
  readonly error: LogMethod;

  constructor(
    private readonly level: LoggerLevel,
    private readonly path: string[],
    private readonly context: LogContext,
    private readonly emojiMap: Record<string, string>,
    private readonly transports: LogTransport[] = []
  ) {
    this.trace = this.buildMethod("trace");
    this.debug = this.buildMethod("debug");
    this.info = this.buildMethod("info");
    this.warn = this.buildMethod("warn");
    this.error = this.buildMethod("error");
  }

  extend(name: string, context: LogContext = {}): LoggerConsole {
    return new LoggerConsole(
      this.level,
      [...this.path, name],
      { ...this.context, ...context },
      this.emojiMap,
      this.transports
    );
  }

  append(context: LogContext): LoggerConsole {
    return new LoggerConsole(
      this.level,
      this.path,
      { ...this.context, ...context },
      this.emojiMap,
      this.transports
    );
  }

  attachTransport(transport: LogTransport) {
    this.transports.push(transport);
  }

  detachTransport(transport: LogTransport) {
    const index = this.transports.indexOf(transport);
    if (index >= 0) this.transports.splice(index, 1);
  }

  private buildMethod(level: LogLevel): LogMethod {
    const write = (context: LogContext, message: string, colored?: string) =>
      this.write(level, context, message, colored);

    function method(message: string): void;
    function method(context: LogContext, message: string): void;
    function method(context?: LogContext): TemplateLog;
    function method(
      first?: string | LogContext,
      message?: string
    ): void | TemplateLog {
      if (typeof first === "string") {
        write({}, first);
        return;
      }
      const context = first ?? {};
      if (message !== undefined) {
        write(context, message);
        return;
      }
      return (strings, ...values) => {
        const templateContext: LogContext = { ...context };
        let text = strings[0] ?? "";
        let colored = text;
        values.forEach((value, i) => {
          const tail = strings[i + 1] ?? "";
          templateContext[`__${i}`] = value;
          text += String(value) + tail;
          colored += kleur.green(String(value)) + tail;
        });
        write(templateContext, text, colored);
      };
    }

    return method;
  }

  private write(
    level: LogLevel,
    context: LogContext,
    message: string,
    colored = message
  ) {
    if (levelWeight[level] < levelWeight[this.level]) return;

    const merged: LogContext = { ...this.context, ...context };
    const { event, error } = merged;
    // warn 與 error 的層級 emoji 蓋過繼承來的 emoji
    const loud = level === "warn" || level === "error";
    const emoji =
      context.emoji ??
      (event ? this.emojiMap[event] : undefined) ??
      (loud ? this.emojiMap[level] : undefined) ??
      this.context.emoji ??
      this.emojiMap[level] ??
      "";

    const extra: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(merged)) {
      if (!reservedKeys.has(key)) extra[key] = value;
    }

    const pathText = this.path.join(":");
    const label = [pathText, event ?? level].filter(Boolean).join(":");
    const extraText =
      Object.keys(extra).length > 0 ? ` ${kleur.gray(safeJson(extra))}` : "";
    const line = `${emoji} ${label}: ${colored}${extraText}`;

    const serialized = serializeError(error);
    if (level === "error") {
      console.error(line);
      if (serialized) console.error(serialized.stack ?? serialized.message);
    } else if (level === "warn") {
      console.warn(line);
    } else if (level === "info") {
      console.info(line);
    } else {
      console.debug(line);
    }

    const record: LogRecord = {
      level,
      time: new Date().toISOString(),
      path: pathText,
      event,
      msg: message,
      err: serialized,
      context: extra,
    };
    for (const transport of this.transports) {
      transport.write(record);
    }
  }
}

function safeJson(value: unknown) {
  try {
    return JSON.stringify(value);
  } catch {
    return "[unserializable]";
  }
}
