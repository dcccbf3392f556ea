import { access, constants } from "node:fs/promises";

import type { Logger } from "~shared/Logger";
import { type Result, err, isErr, ok } from "~shared/utils/Result";

import { defaultRetryPolicy } from "@/constants";
import type { ExifService } from "@/services/ExifService";
import type { FileTimeService } from "@/services/FileTimeService/FileTimeService";
import type { SidecarRecord } from "@/services/SidecarParser/SidecarParser";
import { errorMessage } from "@/utils/helper";
import { type RetryPolicy, withRetry } from "@/utils/retry";

import { detectFormatCapability } from "./FormatCapability";
import type {
  AppliedFields,
  ApplyError,
  MetadataApplier,
  StepStatus,
} from "./MetadataApplier";

export class MetadataApplierDefault implements MetadataApplier {
  private readonly logger: Logger;
  private readonly exifService: ExifService;
  private readonly fileTimeService: FileTimeService;
  private readonly embeddedExtensions: readonly string[];
  private readonly retry: RetryPolicy;

  constructor(deps: {
    logger: Logger;
    exifService: ExifService;
    fileTimeService: FileTimeService;
    embeddedExtensions: readonly string[];
    retry?: RetryPolicy;
  }) {
    this.logger = deps.logger.extend("MetadataApplierDefault");
    this.exifService = deps.exifService;
    this.fileTimeService = deps.fileTimeService;
    this.embeddedExtensions = deps.embeddedExtensions;
    this.retry = deps.retry ?? defaultRetryPolicy;
  }

  async apply(
    mediaPath: string,
    record: SidecarRecord
  ): Promise<Result<AppliedFields, ApplyError>> {
    try {
      await withRetry(() => access(mediaPath, constants.W_OK), this.retry, {
        label: mediaPath,
        logger: this.logger,
      });
    } catch (error) {
      const failure: ApplyError = {
        type: "NOT_WRITABLE",
        path: mediaPath,
        message: `檔案無法寫入: ${errorMessage(error)}`,
      };
      return err(failure);
    }

    const capability = await detectFormatCapability(
      mediaPath,
      this.embeddedExtensions
    );
    const { captureTime, geo } = record;
    const failures: string[] = [];
    const warnings: string[] = [];

    let embedded: StepStatus = "SKIPPED";
    if (capability === "TIMESTAMP_ONLY") {
      embedded = "UNSUPPORTED";
    } else if (captureTime || geo) {
      const res = await this.exifService.writeMetadata(mediaPath, {
        captureTime,
        gps: geo ? { ...geo } : undefined,
      });
      if (isErr(res)) {
        embedded = "FAILED";
        failures.push(res.error.message);
      } else {
        embedded = "APPLIED";
      }
    }

    // 檔案時間要最後設定，寫入內嵌資料會更新修改時間
    let fileTimes: StepStatus = "SKIPPED";
    let createdTime: StepStatus = "SKIPPED";
    if (captureTime) {
      const res = await this.fileTimeService.setTimes(mediaPath, captureTime);
      if (isErr(res)) {
        fileTimes = "FAILED";
        createdTime = "FAILED";
        failures.push(res.error.message);
      } else {
        fileTimes = "APPLIED";
        createdTime = res.value.created;
        warnings.push(...res.value.warnings);
      }
    }

    const attempted = [embedded, fileTimes].filter(
      (s) => s === "APPLIED" || s === "FAILED"
    );
    if (attempted.length > 0 && attempted.every((s) => s === "FAILED")) {
      const failure: ApplyError = {
        type: "WRITE_FAILED",
        path: mediaPath,
        message: failures.join("; "),
      };
      return err(failure);
    }

    if (failures.length > 0) {
      this.logger.warn({ emoji: "🩹", failures })`${mediaPath} 部分寫入失敗`;
    } else {
      this.logger.debug()`${mediaPath} 已寫入 (${capability})`;
    }

    const applied: AppliedFields = {
      capability,
      embedded,
      fileTimes,
      createdTime,
      captureTime: captureTime?.toISOString(),
      gpsWritten: embedded === "APPLIED" && geo !== undefined,
      failures,
      warnings,
    };
    return ok(applied);
  }
}
