export type MoveFile = { from: string; to: string };

export type GeoLocation = {
  latitude: number;
  longitude: number;
  /** 公尺；沒有高度資料時不寫入 */
  altitude?: number;
};
