import type { LogLevel } from "./Logger";

export type SerializedError = {
  name: string;
  message: string;
  stack?: string;
};

export type LogRecord = {
  level: LogLevel;
  time: string;
  path: string;
  event?: string;
  msg: string;
  err?: SerializedError;
  context: Record<string, unknown>;
};

export interface LogTransport extends AsyncDisposable {
  write(record: LogRecord): void;
}
