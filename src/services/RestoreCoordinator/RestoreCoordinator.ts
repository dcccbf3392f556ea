import type { Result } from "~shared/utils/Result";

import type { MatchTier } from "@/services/FilenameMatcher/FilenameMatcher";
import type { RawOriginalMove } from "@/services/FileOrganizer/FileOrganizer";
import type { AppliedFields } from "@/services/MetadataApplier/MetadataApplier";

/**
 * 單一 sidecar 的處理階段，依序前進；任何階段失敗即提前結束。
 */
export const pipelineStages = [
  "DISCOVERED",
  "EXTRACTED",
  "MATCHED",
  "APPLIED",
  "ORGANIZED",
  "DONE",
] as const;

export type PipelineStage = (typeof pipelineStages)[number];

type Restored = {
  sidecarPath: string;
  mediaPath: string;
  destinationPath: string;
  tier: MatchTier;
  edited: boolean;
  alternatives: string[];
  applied: AppliedFields;
};

/**
 * 每個 sidecar 恰好產生一筆結果，產生後不再變動。
 */
export type RestoreOutcome =
  | (Restored & { type: "MATCHED"; rawOriginal?: RawOriginalMove })
  | (Restored & { type: "MISSING_ORIGINAL_FOR_EDITED"; expectedOriginal: string })
  | { type: "MISSING_MEDIA"; sidecarPath: string; declaredFilename: string }
  | {
      type: "APPLY_FAILED";
      sidecarPath: string;
      path: string;
      /** 失敗時正要進入的階段 */
      stage: PipelineStage;
      reason: string;
    }
  | { type: "MALFORMED_SIDECAR"; sidecarPath: string; reason: string };

export type OutcomeType = RestoreOutcome["type"];

export type RunSummary = Record<OutcomeType, number>;

export type RunReport = Readonly<{
  sourceRoot: string;
  startedAt: string;
  finishedAt: string;
  /** 找到的 sidecar 數量 */
  discovered: number;
  outcomes: readonly RestoreOutcome[];
  summary: Readonly<RunSummary>;
  /** 使用者中止時為 true */
  cancelled: boolean;
  /** 中止時尚未處理的 sidecar 數量 */
  notProcessed: number;
}>;

export type RunError = {
  type: "SCAN_FAILED";
  message: string;
};

export type RunProgress = {
  index: number;
  total: number;
  outcome: RestoreOutcome;
};

export type RunOptions = {
  /** 只在兩個 sidecar 之間檢查，處理中的檔案一定會完成 */
  signal?: AbortSignal;
  onProgress?: (progress: RunProgress) => void;
};

export interface RestoreCoordinator {
  run(options?: RunOptions): Promise<Result<RunReport, RunError>>;
}
