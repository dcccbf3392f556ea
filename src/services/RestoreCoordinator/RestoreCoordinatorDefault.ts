import { readFile, unlink } from "node:fs/promises";
import path from "node:path";

import type { Logger } from "~shared/Logger";
import { type Result, err, isErr, ok } from "~shared/utils/Result";

import type { RestoreConfig } from "@/config";
import { ignoredSidecarNames, sidecarExtension } from "@/constants";
import type { FileOrganizer } from "@/services/FileOrganizer/FileOrganizer";
import type { FileSystemScanner } from "@/services/FileSystemScanner/FileSystemScanner";
import {
  type FilenameMatcher,
  compareNames,
} from "@/services/FilenameMatcher";
import type { MetadataApplier } from "@/services/MetadataApplier/MetadataApplier";
import type { SidecarParser } from "@/services/SidecarParser/SidecarParser";
import { errorMessage } from "@/utils/helper";

import type {
  PipelineStage,
  RestoreCoordinator,
  RestoreOutcome,
  RunError,
  RunOptions,
  RunReport,
  RunSummary,
} from "./RestoreCoordinator";

type DirectoryListing = {
  dir: string;
  sidecars: string[];
  /** 尚未被認領的媒體檔名；搬走的檔案會從這裡移除 */
  media: Set<string>;
};

const ignoredNames = new Set<string>(ignoredSidecarNames);

export function isSidecar(fileName: string) {
  return (
    fileName.toLowerCase().endsWith(sidecarExtension) &&
    !ignoredNames.has(fileName.toLowerCase())
  );
}

function emptySummary(): RunSummary {
  return {
    MATCHED: 0,
    MISSING_ORIGINAL_FOR_EDITED: 0,
    MISSING_MEDIA: 0,
    APPLY_FAILED: 0,
    MALFORMED_SIDECAR: 0,
  };
}

/** 資料夾依字典序；同資料夾內先短後長，沒有編號的 sidecar 先處理 */
function bySidecarOrder(a: string, b: string) {
  return a.length - b.length || compareNames(a, b);
}

export class RestoreCoordinatorDefault implements RestoreCoordinator {
  private readonly logger: Logger;
  private readonly config: RestoreConfig;
  private readonly scanner: FileSystemScanner;
  private readonly parser: SidecarParser;
  private readonly matcher: FilenameMatcher;
  private readonly applier: MetadataApplier;
  private readonly organizer: FileOrganizer;

  constructor(deps: {
    logger: Logger;
    config: RestoreConfig;
    scanner: FileSystemScanner;
    parser: SidecarParser;
    matcher: FilenameMatcher;
    applier: MetadataApplier;
    organizer: FileOrganizer;
  }) {
    this.logger = deps.logger.extend("RestoreCoordinator");
    this.config = deps.config;
    this.scanner = deps.scanner;
    this.parser = deps.parser;
    this.matcher = deps.matcher;
    this.applier = deps.applier;
    this.organizer = deps.organizer;
  }

  async run(options: RunOptions = {}): Promise<Result<RunReport, RunError>> {
    const startedAt = new Date().toISOString();
    const { sourceRoot } = this.config;

    const scanned = await this.scanner.scan(sourceRoot, {
      recursive: true,
      excludeDirs: [
        this.config.matchedRoot,
        this.config.rawOriginalsRoot,
        this.config.logsRoot,
      ],
    });
    if (isErr(scanned)) {
      this.logger.error()`無法列舉來源資料夾 ${sourceRoot}: ${scanned.error.message}`;
      const failure: RunError = {
        type: "SCAN_FAILED",
        message: scanned.error.message,
      };
      return err(failure);
    }

    const listings = this.groupByDirectory(scanned.value);
    const queue = listings.flatMap((listing) =>
      listing.sidecars.map((name) => ({ listing, name }))
    );
    const total = queue.length;
    this.logger.info({ event: "start", total })`開始處理 ${total} 個 sidecar`;

    const outcomes: RestoreOutcome[] = [];
    const summary = emptySummary();
    let cancelled = false;

    for (const [index, { listing, name }] of queue.entries()) {
      if (options.signal?.aborted) {
        cancelled = true;
        break;
      }
      const outcome = await this.processSidecar(listing, name);
      outcomes.push(outcome);
      summary[outcome.type]++;
      options.onProgress?.({ index: index + 1, total, outcome });
    }

    const notProcessed = total - outcomes.length;
    if (cancelled) {
      this.logger.warn({ emoji: "🛑" })`已中止，剩餘 ${notProcessed} 個 sidecar 未處理`;
    }

    const report: RunReport = Object.freeze({
      sourceRoot,
      startedAt,
      finishedAt: new Date().toISOString(),
      discovered: total,
      outcomes: Object.freeze(outcomes),
      summary: Object.freeze(summary),
      cancelled,
      notProcessed,
    });
    this.logger.info({ event: "done", ...summary })`處理完成 ${outcomes.length}/${total}`;
    return ok(report);
  }

  private groupByDirectory(filePaths: string[]): DirectoryListing[] {
    const byDir = new Map<string, DirectoryListing>();
    for (const filePath of filePaths) {
      const dir = path.dirname(filePath);
      const name = path.basename(filePath);
      let listing = byDir.get(dir);
      if (!listing) {
        listing = { dir, sidecars: [], media: new Set() };
        byDir.set(dir, listing);
      }
      if (isSidecar(name)) {
        listing.sidecars.push(name);
      } else if (!name.toLowerCase().endsWith(sidecarExtension)) {
        listing.media.add(name);
      }
    }

    const listings = [...byDir.values()].sort((a, b) =>
      compareNames(a.dir, b.dir)
    );
    for (const listing of listings) listing.sidecars.sort(bySidecarOrder);
    return listings;
  }

  private async processSidecar(
    listing: DirectoryListing,
    sidecarName: string
  ): Promise<RestoreOutcome> {
    const sidecarPath = path.join(listing.dir, sidecarName);
    let stage: PipelineStage = "DISCOVERED";
    let currentPath = sidecarPath;

    try {
      stage = "EXTRACTED";
      const raw = await readFile(sidecarPath, "utf8");
      const parsed = this.parser.parse(raw, sidecarPath);
      if (isErr(parsed)) {
        this.logger.warn({ emoji: "🧾" })`無法解析 ${sidecarPath}: ${parsed.error.message}`;
        return {
          type: "MALFORMED_SIDECAR",
          sidecarPath,
          reason: parsed.error.message,
        };
      }
      const record = parsed.value;

      stage = "MATCHED";
      const match = this.matcher.match({
        declaredFilename: record.declaredFilename,
        sidecarFileName: sidecarName,
        fileNames: listing.media,
      });
      if (match.type === "NOT_FOUND") {
        this.logger.warn({ emoji: "🔎" })`找不到 ${record.declaredFilename} (${sidecarPath})`;
        return {
          type: "MISSING_MEDIA",
          sidecarPath,
          declaredFilename: record.declaredFilename,
        };
      }
      const { candidate } = match;
      const mediaPath = path.join(listing.dir, candidate.fileName);
      currentPath = mediaPath;

      stage = "APPLIED";
      const applied = await this.applier.apply(mediaPath, record);
      if (isErr(applied)) {
        return this.failed(sidecarPath, mediaPath, stage, applied.error.message);
      }

      stage = "ORGANIZED";
      const organized = await this.organizer.organize({
        mediaPath,
        rawOriginalPath: match.originalFileName
          ? path.join(listing.dir, match.originalFileName)
          : undefined,
      });
      if (isErr(organized)) {
        return this.failed(sidecarPath, mediaPath, stage, organized.error.message);
      }
      listing.media.delete(candidate.fileName);
      const { rawOriginal, destinationPath } = organized.value;
      if (rawOriginal?.status === "MOVED" && match.originalFileName) {
        listing.media.delete(match.originalFileName);
      }

      stage = "DONE";
      if (this.config.removeSidecars) await this.removeSidecar(sidecarPath);

      const restored = {
        sidecarPath,
        mediaPath,
        destinationPath,
        tier: candidate.tier,
        edited: candidate.edited,
        alternatives: match.alternatives,
        applied: applied.value,
      };
      if (match.expectedOriginal) {
        this.logger.warn({ emoji: "🕳️" })`${candidate.fileName} 的原始檔 ${match.expectedOriginal} 不存在`;
        return {
          ...restored,
          type: "MISSING_ORIGINAL_FOR_EDITED",
          expectedOriginal: match.expectedOriginal,
        };
      }
      this.logger.debug({ emoji: "📸" })`${candidate.fileName} → ${destinationPath}`;
      return { ...restored, type: "MATCHED", rawOriginal };
    } catch (error) {
      return this.failed(sidecarPath, currentPath, stage, errorMessage(error));
    }
  }

  private failed(
    sidecarPath: string,
    filePath: string,
    stage: PipelineStage,
    reason: string
  ): RestoreOutcome {
    this.logger.error({ stage })`${filePath} 處理失敗: ${reason}`;
    return { type: "APPLY_FAILED", sidecarPath, path: filePath, stage, reason };
  }

  /** sidecar 刪除失敗不影響結果 */
  private async removeSidecar(sidecarPath: string) {
    try {
      await unlink(sidecarPath);
    } catch (error) {
      this.logger.warn({ error })`無法刪除 sidecar ${sidecarPath}`;
    }
  }
}

