import type { Result } from "~shared/utils/Result";

import type { GeoLocation } from "@/types";

/**
 * 單一 sidecar JSON 解析後的結果，建立後不再變動。
 */
export type SidecarRecord = Readonly<{
  sidecarPath: string;
  /** sidecar 宣告的原始檔名（title），不為空 */
  declaredFilename: string;
  /** 拍攝時間；缺少、為 0 或無法解析時為 undefined */
  captureTime?: Date;
  /** 經緯度皆為 0 時視為沒有位置 */
  geo?: Readonly<GeoLocation>;
  description?: string;
  warnings: readonly string[];
}>;

export type MalformedSidecarError = {
  type: "MALFORMED_SIDECAR";
  sidecarPath: string;
  message: string;
};

export interface SidecarParser {
  parse(
    raw: string,
    sidecarPath: string
  ): Result<SidecarRecord, MalformedSidecarError>;
}
