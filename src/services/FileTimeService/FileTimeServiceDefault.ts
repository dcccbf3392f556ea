import { utimes } from "node:fs/promises";

import type { Logger } from "~shared/Logger";
import { type Result, err, isErr, ok } from "~shared/utils/Result";

import { defaultRetryPolicy } from "@/constants";
import type { ExifService } from "@/services/ExifService";
import { errorMessage } from "@/utils/helper";
import { type RetryPolicy, isFileInUseError, withRetry } from "@/utils/retry";

import type {
  FileTimeError,
  FileTimeService,
  FileTimesApplied,
} from "./FileTimeService";

/** 只有這些平台能透過 exiftool 寫入 FileCreateDate */
const createDatePlatforms = new Set<NodeJS.Platform>(["win32", "darwin"]);

export class FileTimeServiceDefault implements FileTimeService {
  private readonly retry: RetryPolicy;
  private readonly exifService?: ExifService;
  private readonly platform: NodeJS.Platform;
  private readonly logger?: Logger;

  constructor(
    deps: {
      retry?: RetryPolicy;
      exifService?: ExifService;
      platform?: NodeJS.Platform;
      logger?: Logger;
    } = {}
  ) {
    this.retry = deps.retry ?? defaultRetryPolicy;
    this.exifService = deps.exifService;
    this.platform = deps.platform ?? process.platform;
    this.logger = deps.logger?.extend("FileTimeServiceDefault");
  }

  async setTimes(
    filePath: string,
    time: Date
  ): Promise<Result<FileTimesApplied, FileTimeError>> {
    const warnings: string[] = [];
    let created: FileTimesApplied["created"] = "UNSUPPORTED";

    // 建立時間要先寫：exiftool 寫入時可能碰到修改時間
    if (this.exifService && createDatePlatforms.has(this.platform)) {
      const res = await this.exifService.writeFileCreateDate(filePath, time);
      if (isErr(res)) {
        created = "FAILED";
        warnings.push(res.error.message);
      } else {
        created = "APPLIED";
      }
    }

    try {
      await withRetry(() => utimes(filePath, time, time), this.retry, {
        label: filePath,
        logger: this.logger,
      });
    } catch (error) {
      const failure: FileTimeError = {
        type: isFileInUseError(error) ? "FILE_IN_USE" : "SET_TIME_FAILED",
        message: `設定檔案時間失敗: ${filePath}: ${errorMessage(error)}`,
      };
      return err(failure);
    }

    const applied: FileTimesApplied = { modified: true, created, warnings };
    return ok(applied);
  }
}
