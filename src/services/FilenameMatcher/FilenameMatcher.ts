/**
 * 比對層級，越前面優先權越高。
 */
export const matchTiers = [
  "EXACT",
  "TRUNCATED",
  "EDITED_SUFFIX",
  "NUMBERED_DUPLICATE",
] as const;

export type MatchTier = (typeof matchTiers)[number];

export type MatchCandidate = {
  fileName: string;
  tier: MatchTier;
  /** 檔名帶有編輯後綴（例如 `-edited`） */
  edited: boolean;
};

export type MatchInput = {
  /** sidecar 宣告的檔名 */
  declaredFilename: string;
  /** sidecar 本身的檔名，用來取得重複編號，例如 `party.jpg(1).json` */
  sidecarFileName: string;
  /** 與 sidecar 同資料夾的媒體檔名 */
  fileNames: Iterable<string>;
};

export type MatchResult =
  | {
      type: "MATCHED";
      candidate: MatchCandidate;
      /** 同層級但未被選中的候選，依字典序排列 */
      alternatives: string[];
      /** 編輯版找到的原始檔，應搬到原始檔資料夾 */
      originalFileName?: string;
      /** 編輯版應有但找不到的原始檔名 */
      expectedOriginal?: string;
    }
  | { type: "NOT_FOUND"; declaredFilename: string };

export interface FilenameMatcher {
  match(input: MatchInput): MatchResult;
}
