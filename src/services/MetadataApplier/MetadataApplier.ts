import type { Result } from "~shared/utils/Result";

import type { SidecarRecord } from "@/services/SidecarParser/SidecarParser";

/**
 * 每個檔案只判定一次的格式能力：
 * - EMBEDDED_METADATA_CAPABLE：可寫入內嵌日期與 GPS，也會設定檔案時間
 * - TIMESTAMP_ONLY：只設定檔案時間（影片、PNG 等）
 */
export type FormatCapability = "EMBEDDED_METADATA_CAPABLE" | "TIMESTAMP_ONLY";

export type StepStatus = "APPLIED" | "SKIPPED" | "UNSUPPORTED" | "FAILED";

export type AppliedFields = {
  capability: FormatCapability;
  /** 內嵌 metadata（日期、GPS） */
  embedded: StepStatus;
  /** 檔案系統的修改時間 */
  fileTimes: StepStatus;
  /** 檔案系統的建立時間 */
  createdTime: StepStatus;
  captureTime?: string;
  gpsWritten: boolean;
  /** 部分失敗的原因；有內容代表部分成功 */
  failures: string[];
  warnings: string[];
};

export type ApplyError = {
  type: "NOT_WRITABLE" | "WRITE_FAILED";
  path: string;
  message: string;
};

export interface MetadataApplier {
  apply(
    mediaPath: string,
    record: SidecarRecord
  ): Promise<Result<AppliedFields, ApplyError>>;
}
