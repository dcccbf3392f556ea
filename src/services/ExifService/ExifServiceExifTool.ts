import { type WriteTags, exiftool } from "exiftool-vendored";

import type { Logger } from "~shared/Logger";
import { type Result, err, ok } from "~shared/utils/Result";

import { defaultRetryPolicy } from "@/constants";
import { errorMessage } from "@/utils/helper";
import { type RetryPolicy, isFileInUseError, withRetry } from "@/utils/retry";

import type { EmbeddedMetadata, WriteError } from "./Exif";
import type { ExifService } from "./ExifService";
import { buildWriteTags, toExifDateTime } from "./ExifTagsHelper";

export class ExifServiceExifTool implements ExifService {
  private readonly retry: RetryPolicy;
  private readonly logger?: Logger;

  constructor(deps: { retry?: RetryPolicy; logger?: Logger } = {}) {
    this.retry = deps.retry ?? defaultRetryPolicy;
    this.logger = deps.logger?.extend("ExifServiceExifTool");
  }

  async writeMetadata(
    filePath: string,
    metadata: EmbeddedMetadata
  ): Promise<Result<void, WriteError>> {
    const tags = buildWriteTags(metadata);
    if (Object.keys(tags).length === 0) return ok();
    return this.write(filePath, tags);
  }

  async writeFileCreateDate(
    filePath: string,
    date: Date
  ): Promise<Result<void, WriteError>> {
    return this.write(filePath, { FileCreateDate: toExifDateTime(date) });
  }

  private async write(
    filePath: string,
    tags: WriteTags
  ): Promise<Result<void, WriteError>> {
    try {
      await withRetry(
        () =>
          exiftool.write(filePath, tags, {
            writeArgs: ["-overwrite_original"],
          }),
        this.retry,
        { label: filePath, logger: this.logger }
      );
      return ok();
    } catch (error) {
      const failure: WriteError = {
        type: isFileInUseError(error) ? "FILE_IN_USE" : "WRITE_FAILED",
        message: `寫入 EXIF 失敗: ${filePath}: ${errorMessage(error)}`,
      };
      return err(failure);
    }
  }

  async [Symbol.asyncDispose]() {
    await exiftool.end();
  }
}
