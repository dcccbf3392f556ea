import type { CAC } from "cac";
import { mkdir } from "node:fs/promises";
import path from "node:path";

import { DumpWriterDefault } from "~shared/DumpWriter/DumpWriterDefault";
import { type Logger, RfsTransport } from "~shared/Logger";
import { dispose } from "~shared/utils/Disposeable";
import { isErr } from "~shared/utils/Result";

import { type RestoreConfig, buildRestoreConfig } from "@/config";
import { sidecarExtension } from "@/constants";
import { ExifServiceExifTool } from "@/services/ExifService";
import { FileOrganizerDefault } from "@/services/FileOrganizer";
import { FileSystemScannerDefault } from "@/services/FileSystemScanner";
import { FileTimeServiceDefault } from "@/services/FileTimeService";
import { FilenameMatcherDefault } from "@/services/FilenameMatcher";
import { MetadataApplierDefault } from "@/services/MetadataApplier";
import {
  type RestoreOutcome,
  type RunReport,
  RestoreCoordinatorDefault,
  isSidecar,
} from "@/services/RestoreCoordinator";
import { RestoreLogWriterDefault } from "@/services/RestoreLogWriter";
import { SidecarParserDefault } from "@/services/SidecarParser";
import { confirm, expandHome, isDirectory, toInt } from "@/utils/helper";

type RestoreOptions = {
  editedSuffix?: string;
  truncationLength?: number | string;
  matchedDir?: string;
  rawDir?: string;
  logsDir?: string;
  retryAttempts?: number | string;
  retryDelay?: number | string;
  removeSidecars?: boolean;
  quiet?: boolean;
  yes?: boolean;
};

const outcomeEmoji: Record<RestoreOutcome["type"], string> = {
  MATCHED: "📸",
  MISSING_ORIGINAL_FOR_EDITED: "🕳️",
  MISSING_MEDIA: "🔎",
  APPLY_FAILED: "💥",
  MALFORMED_SIDECAR: "🧾",
};

export function registerRestore(cli: CAC, baseLogger: Logger) {
  cli
    .command(
      "restore <folder>",
      "依 sidecar JSON 還原相片與影片的拍攝時間、GPS，並搬到完成資料夾"
    )
    .option("--edited-suffix <suffix>", "編輯版檔名後綴，預設 edited")
    .option("--truncation-length <n>", "匯出時截斷的主檔名長度，預設 47")
    .option("--matched-dir <dir>", "完成檔案的目的地，預設 <folder>/MatchedMedia")
    .option("--raw-dir <dir>", "編輯版原始檔的目的地，預設 <folder>/EditedRaw")
    .option("--logs-dir <dir>", "紀錄檔資料夾，預設 <folder>/logs")
    .option("--retry-attempts <n>", "檔案使用中時的嘗試次數，預設 3")
    .option("--retry-delay <ms>", "重試間隔（毫秒），預設 500")
    .option("--remove-sidecars", "成功後刪除 sidecar JSON", { default: false })
    .option("--quiet", "不顯示逐檔進度", { default: false })
    .option("--yes", "略過確認直接執行", { default: false })
    .action(async (folder: string, options: RestoreOptions) => {
      const logger = baseLogger.extend("restore");
      const root = path.resolve(expandHome(folder));

      if (!(await isDirectory(root))) {
        logger.error()`來源資料夾不存在: ${root}`;
        process.exit(1);
      }

      const configRes = buildRestoreConfig(root, {
        editedSuffix: options.editedSuffix,
        truncationLength: toInt(options.truncationLength),
        matchedRoot: options.matchedDir ? expandHome(options.matchedDir) : undefined,
        rawOriginalsRoot: options.rawDir ? expandHome(options.rawDir) : undefined,
        logsRoot: options.logsDir ? expandHome(options.logsDir) : undefined,
        retryAttempts: toInt(options.retryAttempts),
        retryDelayMs: toInt(options.retryDelay),
        removeSidecars: options.removeSidecars,
      });
      if (isErr(configRes)) {
        logger.error({ error: configRes.error })`設定錯誤: ${configRes.error.message}`;
        process.exit(1);
      }
      const config = configRes.value;

      // 規劃
      const scanner = new FileSystemScannerDefault();
      const scanRes = await scanner.scan(root, {
        allowExts: [sidecarExtension],
        excludeDirs: [config.matchedRoot, config.rawOriginalsRoot, config.logsRoot],
      });
      if (isErr(scanRes)) {
        logger.error({ error: scanRes.error })`掃描來源目錄失敗`;
        process.exit(1);
      }
      const sidecarCount = scanRes.value.filter((p) =>
        isSidecar(path.basename(p))
      ).length;
      if (sidecarCount === 0) {
        logger.warn("來源目錄沒有 sidecar JSON");
        return;
      }
      logger.info({ emoji: "🔎", count: sidecarCount })`掃描完成`;

      // 確認
      const proceed =
        options.yes ||
        (await confirm(
          `將處理 ${sidecarCount} 個 sidecar，完成的檔案會搬到 ${config.matchedRoot}，是否繼續？ [y/N] `
        ));
      if (!proceed) {
        logger.warn({ emoji: "⏹️" })`使用者取消`;
        return;
      }

      // 執行
      await mkdir(config.logsRoot, { recursive: true });
      const transport = new RfsTransport({
        filename: "restore.log",
        rfs: { path: config.logsRoot, size: "10M", maxFiles: 5 },
      });
      baseLogger.attachTransport(transport);

      const controller = new AbortController();
      const onSigint = () => {
        logger.warn({ emoji: "🛑" })`收到中止要求，處理完目前的檔案後停止`;
        controller.abort();
      };
      process.once("SIGINT", onSigint);

      try {
        const report = await runRestore(logger, config, controller.signal, {
          quiet: options.quiet ?? false,
        });
        if (!report) process.exitCode = 1;
      } finally {
        process.off("SIGINT", onSigint);
        baseLogger.detachTransport(transport);
        await dispose(transport);
        if (transport.error) {
          logger.warn({
            error: transport.error,
          })`執行紀錄 ${path.join(config.logsRoot, "restore.log")} 未完整寫入`;
        }
      }
    });
}

/**
 * 組裝服務並執行一次還原，寫出紀錄檔與報告。掃描失敗時回傳 undefined。
 */
export async function runRestore(
  logger: Logger,
  config: RestoreConfig,
  signal: AbortSignal,
  options: { quiet: boolean }
): Promise<RunReport | undefined> {
  await using exifService = new ExifServiceExifTool({
    retry: config.retry,
    logger,
  });
  const coordinator = new RestoreCoordinatorDefault({
    logger,
    config,
    scanner: new FileSystemScannerDefault(),
    parser: new SidecarParserDefault(),
    matcher: new FilenameMatcherDefault(config),
    applier: new MetadataApplierDefault({
      logger,
      exifService,
      fileTimeService: new FileTimeServiceDefault({
        retry: config.retry,
        exifService,
        logger,
      }),
      embeddedExtensions: config.embeddedExtensions,
      retry: config.retry,
    }),
    organizer: new FileOrganizerDefault({
      logger,
      sourceRoot: config.sourceRoot,
      matchedRoot: config.matchedRoot,
      rawOriginalsRoot: config.rawOriginalsRoot,
      retry: config.retry,
    }),
  });

  const res = await coordinator.run({
    signal,
    onProgress: options.quiet
      ? undefined
      : ({ index, total, outcome }) => {
          logger.info({
            emoji: outcomeEmoji[outcome.type],
          })`[${index}/${total}] ${outcome.type} ${path.basename(outcome.sidecarPath)}`;
        },
  });
  if (isErr(res)) {
    logger.error()`執行失敗: ${res.error.message}`;
    return undefined;
  }
  const report = res.value;

  const logWriter = new RestoreLogWriterDefault(logger, config.logsRoot);
  await logWriter.write(report);
  const writer = new DumpWriterDefault(logger, config.logsRoot);
  await writer.dump("restore-report", report);

  logger.info({
    event: "done",
    ...report.summary,
    cancelled: report.cancelled,
    notProcessed: report.notProcessed,
  })`還原完成：成功 ${report.summary.MATCHED + report.summary.MISSING_ORIGINAL_FOR_EDITED}，找不到 ${report.summary.MISSING_MEDIA}，失敗 ${report.summary.APPLY_FAILED + report.summary.MALFORMED_SIDECAR}`;
  return report;
}
