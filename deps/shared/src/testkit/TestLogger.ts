import { LoggerConsole, defaultEmojiMap } from "../Logger";
import type { LoggerLevel } from "../Logger";

/**
 * 測試用 logger，預設靜音；設定 TEST_LOG_LEVEL 可打開輸出。
 */
export function buildTestLogger(level?: LoggerLevel) {
  const envLevel = process.env.TEST_LOG_LEVEL;
  const resolved = level ?? (isLoggerLevel(envLevel) ? envLevel : "silent");
  return new LoggerConsole(resolved, ["test"], {}, defaultEmojiMap);
}

function isLoggerLevel(value: string | undefined): value is LoggerLevel {
  return (
    value === "trace" ||
    value === "debug" ||
    value === "info" ||
    value === "warn" ||
    value === "error" ||
    value === "silent"
  );
}
