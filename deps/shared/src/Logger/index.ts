import { Type as t } from "@sinclair/typebox";

import { buildConfigFactoryEnv } from "../ConfigFactory";
import { LoggerConsole } from "./LoggerConsole";

export * from "./Logger";
export * from "./LogTransport";
export { LoggerConsole, serializeError } from "./LoggerConsole";
export { RfsTransport } from "./RfsTransport";

export const defaultEmojiMap: Record<string, string> = {
  start: "🏁",
  done: "✅",
  trace: "🔍",
  debug: "🐛",
  info: "ℹ️",
  warn: "⚠️",
  error: "❌",
};

const getLoggerConfig = buildConfigFactoryEnv(
  t.Object({
    LOG_LEVEL: t.Union(
      [
        t.Literal("trace"),
        t.Literal("debug"),
        t.Literal("info"),
        t.Literal("warn"),
        t.Literal("error"),
        t.Literal("silent"),
      ],
      { default: "info" }
    ),
  })
);

export function createDefaultLoggerFromEnv(
  env: Record<string, string | undefined> = process.env
) {
  const { LOG_LEVEL } = getLoggerConfig(env);
  return new LoggerConsole(LOG_LEVEL, [], {}, defaultEmojiMap);
}
