/** 可寫入內嵌 EXIF 的副檔名 */
export const embeddedMetadataExtensions = [
  ".jpg",
  ".jpeg",
  ".tif",
  ".tiff",
] as const;

export const sidecarExtension = ".json";

/** Takeout 新版的 sidecar 會多一段 .supplemental-metadata */
export const supplementalSidecarSuffix = ".supplemental-metadata";

/** Takeout 內非單檔描述的 JSON（相簿、帳號資料），不視為 sidecar */
export const ignoredSidecarNames = [
  "metadata.json",
  "print-subscriptions.json",
  "shared_album_comments.json",
  "user-generated-memory-titles.json",
] as const;

export const defaultEditedSuffix = "edited";

/** Takeout 截斷檔名的長度（不含副檔名），依實際匯出觀察而來 */
export const defaultTruncationLength = 47;

export const defaultOutputDirs = {
  matched: "MatchedMedia",
  rawOriginals: "EditedRaw",
  logs: "logs",
} as const;

export const defaultRetryPolicy = {
  attempts: 3,
  delayMs: 500,
} as const;
