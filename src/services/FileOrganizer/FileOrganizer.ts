import type { Result } from "~shared/utils/Result";

export type OrganizeRequest = {
  /** 已套用 metadata 的媒體檔 */
  mediaPath: string;
  /** 編輯版的原始檔，會搬到原始檔資料夾 */
  rawOriginalPath?: string;
};

export type RawOriginalMove =
  | { status: "MOVED"; from: string; to: string }
  | { status: "FAILED"; from: string; message: string };

export type Organized = {
  destinationPath: string;
  rawOriginal?: RawOriginalMove;
};

export type OrganizeError = {
  type: "TARGET_EXISTS" | "MOVE_FAILED";
  from: string;
  to: string;
  message: string;
};

export interface FileOrganizer {
  /**
   * 將媒體檔搬到完成資料夾，絕不覆蓋既有檔案。
   * 原始檔搬移失敗不影響主檔的結果，只記錄在 rawOriginal。
   */
  organize(request: OrganizeRequest): Promise<Result<Organized, OrganizeError>>;
}
