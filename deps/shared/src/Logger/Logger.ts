import type { LogTransport } from "./LogTransport";

export const logLevels = ["trace", "debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof logLevels)[number];

/** silent 代表不輸出任何紀錄 */
export type LoggerLevel = LogLevel | "silent";

export type LogContext = {
  /** 事件名稱，會取代輸出中的層級名稱 */
  event?: string;
  emoji?: string;
  error?: unknown;
  [key: string]: unknown;
};

export type TemplateLog = (
  strings: TemplateStringsArray,
  ...values: unknown[]
) => void;

export interface LogMethod {
  (message: string): void;
  (context: LogContext, message: string): void;
  (context?: LogContext): TemplateLog;
}

export interface Logger {
  trace: LogMethod;
  debug: LogMethod;
  info: LogMethod;
  warn: LogMethod;
  error: LogMethod;

  /** 建立子 logger，路徑為 `parent:name` */
  extend(name: string, context?: LogContext): Logger;

  /** 合併 context，但不改變路徑 */
  append(context: LogContext): Logger;

  /** transport 由整棵 logger 樹共用 */
  attachTransport(transport: LogTransport): void;
  detachTransport(transport: LogTransport): void;
}
