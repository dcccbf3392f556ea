import { setTimeout as sleep } from "node:timers/promises";

import type { Logger } from "~shared/Logger";

export type RetryPolicy = {
  /** 總嘗試次數（含第一次） */
  attempts: number;
  /** 第 n 次重試前等待 delayMs × n */
  delayMs: number;
};

const inUseCodes = new Set(["EBUSY", "EPERM", "ETXTBSY"]);
const inUseMessage = /\b(EBUSY|resource busy|being used by another process|in use)\b/i;

/**
 * 判斷是否為「檔案使用中」類型的錯誤，只有這類錯誤值得重試。
 */
export function isFileInUseError(e: unknown): boolean {
  if (typeof e !== "object" || e === null) return false;
  if ("code" in e && typeof e.code === "string" && inUseCodes.has(e.code)) {
    return true;
  }
  return e instanceof Error && inUseMessage.test(e.message);
}

export async function withRetry<T>(
  fn: () => Promise<T>,
  policy: RetryPolicy,
  options: { label: string; logger?: Logger }
): Promise<T> {
  const attempts = Math.max(1, policy.attempts);
  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (e) {
      if (attempt >= attempts || !isFileInUseError(e)) throw e;
      const waitMs = policy.delayMs * attempt;
      const { logger } = options;
      if (logger)
        logger.warn({
          emoji: "⏳",
          attempt,
          attempts,
          waitMs,
        })`${options.label} 檔案使用中，${waitMs}ms 後重試 (${attempt}/${attempts})`;
      await sleep(waitMs);
    }
  }
}
