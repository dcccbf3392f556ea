import { format } from "date-fns";
import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";

import type { Logger } from "~shared/Logger";

import type {
  RestoreOutcome,
  RunReport,
} from "@/services/RestoreCoordinator/RestoreCoordinator";

import type { RestoreLogWriter, RunLogFiles } from "./RestoreLogWriter";

/** 一筆一行、欄位以 tab 分隔，欄位內不能再出現 tab 或換行 */
function field(value: string) {
  return value.replace(/[\t\r\n]+/g, " ");
}

function line(...fields: string[]) {
  return fields.map(field).join("\t");
}

export function missingLines(outcome: RestoreOutcome): string[] {
  switch (outcome.type) {
    case "MISSING_MEDIA":
      return [line(outcome.declaredFilename, outcome.sidecarPath)];
    case "MISSING_ORIGINAL_FOR_EDITED":
      return [line(outcome.expectedOriginal, outcome.sidecarPath)];
    default:
      return [];
  }
}

export function errorLines(outcome: RestoreOutcome): string[] {
  switch (outcome.type) {
    case "APPLY_FAILED":
      return [line(outcome.path, outcome.reason)];
    case "MALFORMED_SIDECAR":
      return [line(outcome.sidecarPath, outcome.reason)];
    case "MATCHED":
    case "MISSING_ORIGINAL_FOR_EDITED": {
      const lines = outcome.applied.failures.map((f) =>
        line(outcome.destinationPath, f)
      );
      if (outcome.type === "MATCHED" && outcome.rawOriginal?.status === "FAILED") {
        lines.push(line(outcome.rawOriginal.from, outcome.rawOriginal.message));
      }
      return lines;
    }
    case "MISSING_MEDIA":
      return [];
  }
}

function toContent(lines: string[]) {
  return lines.length > 0 ? `${lines.join("\n")}\n` : "";
}

export class RestoreLogWriterDefault implements RestoreLogWriter {
  private readonly logger: Logger;

  constructor(
    logger: Logger,
    private readonly logsRoot: string,
    private readonly now: () => Date = () => new Date()
  ) {
    this.logger = logger.extend("RestoreLogWriter");
  }

  async write(report: RunReport): Promise<RunLogFiles> {
    await mkdir(this.logsRoot, { recursive: true });
    const stamp = format(this.now(), "yyyyMMdd_HHmmss");
    const files: RunLogFiles = {
      missingFiles: path.join(this.logsRoot, `missing_files_${stamp}.log`),
      errors: path.join(this.logsRoot, `errors_${stamp}.log`),
    };

    const missing = report.outcomes.flatMap(missingLines);
    const errors = report.outcomes.flatMap(errorLines);
    await writeFile(files.missingFiles, toContent(missing), "utf8");
    await writeFile(files.errors, toContent(errors), "utf8");

    this.logger.info({
      emoji: "🗒️",
      missing: missing.length,
      errors: errors.length,
    })`紀錄已寫入 ${this.logsRoot}`;
    return files;
  }
}
