import type { RunReport } from "@/services/RestoreCoordinator/RestoreCoordinator";

export type RunLogFiles = {
  /** 找不到的媒體檔與原始檔清單 */
  missingFiles: string;
  /** 失敗與部分失敗清單 */
  errors: string;
};

export interface RestoreLogWriter {
  write(report: RunReport): Promise<RunLogFiles>;
}
