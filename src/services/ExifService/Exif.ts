import type { GeoLocation } from "@/types";

/** 要寫入檔案內嵌 metadata 的欄位 */
export type EmbeddedMetadata = {
  /** 拍攝時間 */
  captureTime?: Date;

  /** GPS 位置，正負號決定半球 */
  gps?: GeoLocation;
};

export type WriteError = {
  type: "FILE_IN_USE" | "WRITE_FAILED";
  message: string;
};
