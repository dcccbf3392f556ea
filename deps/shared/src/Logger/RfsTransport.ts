import { type Options, type RotatingFileStream, createStream } from "rotating-file-stream";

import type { LogRecord, LogTransport } from "./LogTransport";

/**
 * 以 JSON Lines 寫入檔案，檔案輪替交給 rotating-file-stream。
 * 第一個寫入錯誤會保留在 `error`，之後的紀錄不再寫入。
 */
export class RfsTransport implements LogTransport {
  private readonly stream: RotatingFileStream;
  private failure: Error | undefined;

  constructor(options: { filename: string; rfs?: Options }) {
    this.stream = createStream(options.filename, options.rfs ?? {});
    this.stream.on("error", (error: Error) => {
      if (!this.failure) {
        console.error(`記錄檔寫入失敗: ${error.message}`);
      }
      this.failure ??= error;
    });
  }

  /** 第一個寫入錯誤 */
  get error(): Error | undefined {
    return this.failure;
  }

  write(record: LogRecord) {
    if (this.failure) return;
    const { context, ...rest } = record;
    this.stream.write(JSON.stringify({ ...context, ...rest }) + "\n");
  }

  async [Symbol.asyncDispose]() {
    if (this.failure) return;
    await new Promise<void>((resolve) => {
      this.stream.once("error", () => resolve());
      this.stream.end(() => resolve());
    });
  }
}
