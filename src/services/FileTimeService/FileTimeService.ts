import type { Result } from "~shared/utils/Result";

export type FileTimesApplied = {
  /** 存取與修改時間已設定 */
  modified: true;
  /** 建立時間的處理結果；多數 Linux 檔案系統無法設定 */
  created: "APPLIED" | "UNSUPPORTED" | "FAILED";
  warnings: string[];
};

export type FileTimeError = {
  type: "FILE_IN_USE" | "SET_TIME_FAILED";
  message: string;
};

export interface FileTimeService {
  /**
   * 將檔案的建立、修改時間設為指定時間。
   */
  setTimes(
    filePath: string,
    time: Date
  ): Promise<Result<FileTimesApplied, FileTimeError>>;
}
