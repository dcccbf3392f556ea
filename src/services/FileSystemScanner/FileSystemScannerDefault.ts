import { readdir } from "node:fs/promises";
import path from "node:path";

import { type Result, err, ok } from "~shared/utils/Result";

import type { FileSystemScanner, ScanError, ScanOptions } from "./FileSystemScanner";

function isInside(dir: string, parent: string) {
  const rel = path.relative(parent, dir);
  return rel === "" || (!rel.startsWith("..") && !path.isAbsolute(rel));
}

export class FileSystemScannerDefault implements FileSystemScanner {
  async scan(
    rootPath: string,
    options?: ScanOptions
  ): Promise<Result<string[], ScanError>> {
    const allowExts = options?.allowExts ?? [];
    const isRecursive = options?.recursive ?? true;
    const excludeDirs = (options?.excludeDirs ?? []).map((d) => path.resolve(d));
    const lowerExts = allowExts.map((e) => {
      if (e.startsWith(".")) return e.toLowerCase();
      return `.${e.toLowerCase()}`;
    });
    const allowExtsSet = new Set(lowerExts);
    try {
      const files = await readdir(rootPath, {
        recursive: isRecursive,
        withFileTypes: true,
      });
      const fullPaths = files
        .filter((d) => {
          if (!d.isFile()) return false;
          const dir = path.resolve(d.parentPath);
          if (excludeDirs.some((ex) => isInside(dir, ex))) return false;
          if (allowExts.length === 0) return true;
          const ext = path.extname(d.name).toLowerCase();
          return allowExtsSet.has(ext);
        })
        .map((d) => path.join(d.parentPath, d.name));
      return ok(fullPaths);
    } catch (e) {
      const failure: ScanError = {
        type: "SCAN_FAILED",
        message: e instanceof Error ? e.message : String(e),
      };
      return err(failure);
    }
  }
}
