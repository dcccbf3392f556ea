import type { Result } from "~shared/utils/Result";

import type { EmbeddedMetadata, WriteError } from "./Exif";

export interface ExifService {
  /**
   * 寫入拍攝時間與 GPS 到檔案內嵌的 EXIF。
   * 成功時回傳 void，失敗時包含錯誤原因。
   */
  writeMetadata(
    filePath: string,
    metadata: EmbeddedMetadata
  ): Promise<Result<void, WriteError>>;

  /**
   * 寫入檔案系統的建立時間（僅 Windows / macOS 支援）。
   */
  writeFileCreateDate(
    filePath: string,
    date: Date
  ): Promise<Result<void, WriteError>>;
}
