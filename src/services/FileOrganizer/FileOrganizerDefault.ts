import {
  copyFile,
  mkdir,
  rename,
  rm,
  stat,
  unlink,
  utimes,
} from "node:fs/promises";
import path from "node:path";

import type { Logger } from "~shared/Logger";
import { type Result, err, isErr, ok } from "~shared/utils/Result";

import { defaultRetryPolicy } from "@/constants";
import type { MoveFile } from "@/types";
import { errorMessage, exists } from "@/utils/helper";
import { type RetryPolicy, withRetry } from "@/utils/retry";

import type {
  FileOrganizer,
  OrganizeError,
  OrganizeRequest,
  Organized,
  RawOriginalMove,
} from "./FileOrganizer";

function hasCode(e: unknown, code: string) {
  return typeof e === "object" && e !== null && "code" in e && e.code === code;
}

export class FileOrganizerDefault implements FileOrganizer {
  private readonly logger: Logger;
  private readonly sourceRoot: string;
  private readonly matchedRoot: string;
  private readonly rawOriginalsRoot: string;
  private readonly retry: RetryPolicy;

  constructor(deps: {
    logger: Logger;
    sourceRoot: string;
    matchedRoot: string;
    rawOriginalsRoot: string;
    retry?: RetryPolicy;
  }) {
    this.logger = deps.logger.extend("FileOrganizerDefault");
    this.sourceRoot = deps.sourceRoot;
    this.matchedRoot = deps.matchedRoot;
    this.rawOriginalsRoot = deps.rawOriginalsRoot;
    this.retry = deps.retry ?? defaultRetryPolicy;
  }

  async organize(
    request: OrganizeRequest
  ): Promise<Result<Organized, OrganizeError>> {
    const main: MoveFile = {
      from: request.mediaPath,
      to: this.targetOf(request.mediaPath, this.matchedRoot),
    };
    const moved = await this.moveFile(main);
    if (isErr(moved)) return moved;

    const organized: Organized = { destinationPath: main.to };
    if (request.rawOriginalPath) {
      organized.rawOriginal = await this.moveRawOriginal(request.rawOriginalPath);
    }
    return ok(organized);
  }

  /** 保留相對於來源根目錄的子路徑，避免不同資料夾的同名檔互撞 */
  private targetOf(filePath: string, destRoot: string) {
    const rel = path.relative(this.sourceRoot, path.dirname(filePath));
    const inside = !rel.startsWith("..") && !path.isAbsolute(rel);
    return path.join(destRoot, inside ? rel : "", path.basename(filePath));
  }

  private async moveRawOriginal(from: string): Promise<RawOriginalMove> {
    const move: MoveFile = {
      from,
      to: this.targetOf(from, this.rawOriginalsRoot),
    };
    const res = await this.moveFile(move);
    if (isErr(res)) {
      this.logger.warn({ emoji: "📦" })`原始檔搬移失敗 ${from}: ${res.error.message}`;
      return { status: "FAILED", from, message: res.error.message };
    }
    return { status: "MOVED", from: move.from, to: move.to };
  }

  private async moveFile(move: MoveFile): Promise<Result<void, OrganizeError>> {
    if (await exists(move.to)) {
      const failure: OrganizeError = {
        type: "TARGET_EXISTS",
        ...move,
        message: `目的地已存在: ${move.to}`,
      };
      return err(failure);
    }

    try {
      await mkdir(path.dirname(move.to), { recursive: true });
      await this.relocate(move);
    } catch (error) {
      const failure: OrganizeError = {
        type: "MOVE_FAILED",
        ...move,
        message: `搬移失敗 ${move.from} → ${move.to}: ${errorMessage(error)}`,
      };
      return err(failure);
    }

    this.logger.debug()`${move.from} → ${move.to}`;
    return ok();
  }

  private retrying<T>(fn: () => Promise<T>, label: string) {
    return withRetry(fn, this.retry, { label, logger: this.logger });
  }

  private async relocate(move: MoveFile) {
    try {
      await this.retrying(() => rename(move.from, move.to), move.from);
    } catch (error) {
      if (!hasCode(error, "EXDEV")) throw error;
      await this.copyAcrossDevices(move);
    }
  }

  /**
   * 跨磁碟時先複製到目的地旁的暫存檔，保留時間後再改名，最後才刪除來源。
   * 來源刪不掉時撤回目的地的副本，檔案只會留在其中一邊。
   */
  private async copyAcrossDevices(move: MoveFile) {
    const temp = path.join(
      path.dirname(move.to),
      `.${path.basename(move.to)}.${process.pid}.partial`
    );
    try {
      await this.retrying(async () => {
        const source = await stat(move.from);
        await copyFile(move.from, temp);
        await utimes(temp, source.atime, source.mtime);
      }, move.from);
      await rename(temp, move.to);
    } catch (error) {
      await rm(temp, { force: true });
      throw error;
    }

    try {
      await this.retrying(() => unlink(move.from), move.from);
    } catch (error) {
      await unlink(move.to);
      throw error;
    }
  }
}
