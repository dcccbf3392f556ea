import type { Result } from "~shared/utils/Result";

export type ScanError = {
  type: "SCAN_FAILED";
  message: string;
};

export type ScanOptions = {
  recursive?: boolean;
  allowExts?: readonly string[];
  /** 這些資料夾（含子資料夾）內的檔案不列入結果 */
  excludeDirs?: readonly string[];
};

export interface FileSystemScanner {
  scan(
    rootPath: string,
    options?: ScanOptions
  ): Promise<Result<string[], ScanError>>;
}
