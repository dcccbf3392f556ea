import path from "node:path";

import { sidecarExtension, supplementalSidecarSuffix } from "@/constants";
import { splitName } from "@/utils/helper";

import type {
  FilenameMatcher,
  MatchInput,
  MatchResult,
  MatchTier,
} from "./FilenameMatcher";

type Found = { fileName: string; tier: MatchTier; alternatives: string[] };

const counterRe = /^(.*)\((\d+)\)$/;
const lastCounterRe = /\((\d+)\)(?!.*\(\d+\))/;

/** 匯出時會被拿掉、Windows 上不合法的字元 */
const incompatibleChars = /[%<>=:?¿*#&{}\\@!+|"']/g;

/** 以 UTF-16 code unit 比較，不受語系影響 */
export function compareNames(a: string, b: string) {
  return a < b ? -1 : a > b ? 1 : 0;
}

export function sanitizeTitle(title: string) {
  return title.replace(incompatibleChars, "");
}

/** `party(2)` → { base: "party", counter: 2 } */
export function parseCounter(stem: string) {
  const m = counterRe.exec(stem);
  if (!m) return undefined;
  return { base: m[1], counter: Number(m[2]) };
}

/**
 * 解析 sidecar 檔名：`party.jpg(1).json` → { core: "party", counter: 1 }。
 */
export function parseSidecarName(sidecarFileName: string) {
  let name = path.basename(sidecarFileName);
  if (name.toLowerCase().endsWith(sidecarExtension)) {
    name = name.slice(0, -sidecarExtension.length);
  }
  if (name.endsWith(supplementalSidecarSuffix)) {
    name = name.slice(0, -supplementalSidecarSuffix.length);
  }
  let counter: number | undefined;
  const m = lastCounterRe.exec(name);
  if (m) {
    counter = Number(m[1]);
    name = name.slice(0, m.index) + name.slice(m.index + m[0].length);
  }
  return { core: splitName(name).stem, counter };
}

/**
 * 依序嘗試：完全相同 → 截斷 → 編輯後綴 → 重複編號，第一個命中者勝出。
 * 同層級的多個候選以字典序決定。
 */
export class FilenameMatcherDefault implements FilenameMatcher {
  private readonly suffixTag: string;
  private readonly truncationLength: number;

  constructor(options: { editedSuffix: string; truncationLength: number }) {
    this.suffixTag = `-${options.editedSuffix}`;
    this.truncationLength = options.truncationLength;
  }

  match(input: MatchInput): MatchResult {
    const files = [...new Set(input.fileNames)].sort(compareNames);
    const fileSet = new Set(files);
    const sidecar = parseSidecarName(input.sidecarFileName);
    const effective = this.effectiveName(input.declaredFilename, sidecar);

    const found =
      this.findExact(effective, files, fileSet) ??
      this.findTruncated(effective, files) ??
      this.findEditedSuffix(effective, fileSet) ??
      this.findNumberedDuplicate(effective, sidecar.counter, files);

    if (!found) {
      return { type: "NOT_FOUND", declaredFilename: input.declaredFilename };
    }

    const edited = this.isEditedName(found.fileName);
    const candidate = { fileName: found.fileName, tier: found.tier, edited };
    if (!edited) {
      return { type: "MATCHED", candidate, alternatives: found.alternatives };
    }

    const originals = this.originalNamesOf(found.fileName);
    const originalFileName = this.findOriginal(
      originals,
      found.fileName,
      files,
      fileSet
    );
    return {
      type: "MATCHED",
      candidate,
      alternatives: found.alternatives,
      ...(originalFileName
        ? { originalFileName }
        : { expectedOriginal: originals[0] }),
    };
  }

  /**
   * sidecar 檔名攜帶的資訊（重複編號、編輯後綴）也是檔案身分的一部分：
   * `party.jpg(1).json` 描述的是 `party(1).jpg`，
   * `vacation-edited.json` 描述的是 `vacation-edited.jpg`。
   */
  private effectiveName(
    declared: string,
    sidecar: { core: string; counter?: number }
  ) {
    const { stem, ext } = splitName(declared);
    const parsed = parseCounter(stem);
    let base = parsed?.base ?? stem;
    let counter = parsed?.counter;

    const tag = this.suffixTag;
    if (
      sidecar.core.endsWith(tag) &&
      !base.endsWith(tag) &&
      sidecar.core.length > tag.length &&
      base.startsWith(sidecar.core.slice(0, -tag.length))
    ) {
      base = `${base}${tag}`;
    }
    if (counter === undefined) counter = sidecar.counter;

    return `${base}${counter !== undefined ? `(${counter})` : ""}${ext}`;
  }

  private findExact(
    name: string,
    files: string[],
    fileSet: Set<string>
  ): Found | undefined {
    const names = [...new Set([name, sanitizeTitle(name)])];
    for (const n of names) {
      if (fileSet.has(n)) return { fileName: n, tier: "EXACT", alternatives: [] };
    }
    for (const n of names) {
      const lower = n.toLowerCase();
      const hits = files.filter((f) => f.toLowerCase() === lower);
      if (hits.length > 0) {
        return { fileName: hits[0], tier: "EXACT", alternatives: hits.slice(1) };
      }
    }
    return undefined;
  }

  /**
   * 匯出服務會把過長的主檔名截斷：兩邊主檔名（去掉重複編號後）互為前綴，
   * 長的超過截斷長度、短的不超過，且副檔名相同。
   * 截斷後才加上的 `(n)` 要與 sidecar 的編號相符，否則取最小編號。
   */
  private findTruncated(name: string, files: string[]): Found | undefined {
    const { stem, ext } = splitName(name);
    const parsed = parseCounter(stem);
    const base = parsed?.base ?? stem;
    const counter = parsed?.counter ?? 0;
    const limit = this.truncationLength;
    const hits: Array<{ fileName: string; shared: number; counter: number }> =
      [];

    for (const fileName of files) {
      const file = splitName(fileName);
      if (file.ext.toLowerCase() !== ext.toLowerCase()) continue;
      const fileParsed = parseCounter(file.stem);
      const fileBase = fileParsed?.base ?? file.stem;
      if (fileBase.length === base.length) continue;
      const [shorter, longer] =
        fileBase.length < base.length ? [fileBase, base] : [base, fileBase];
      if (shorter.length === 0 || shorter.length > limit) continue;
      if (longer.length <= limit || !longer.startsWith(shorter)) continue;
      // 多出來的部分若是編輯後綴，交給後面的規則
      if (longer.slice(shorter.length) === this.suffixTag) continue;
      hits.push({
        fileName,
        shared: shorter.length,
        counter: fileParsed?.counter ?? 0,
      });
    }
    if (hits.length === 0) return undefined;

    const rank = (h: { counter: number }) => (h.counter === counter ? 0 : 1);
    hits.sort(
      (a, b) =>
        rank(a) - rank(b) ||
        b.shared - a.shared ||
        a.counter - b.counter ||
        compareNames(a.fileName, b.fileName)
    );
    return {
      fileName: hits[0].fileName,
      tier: "TRUNCATED",
      alternatives: hits
        .slice(1)
        .map((h) => h.fileName)
        .sort(compareNames),
    };
  }

  private findEditedSuffix(
    name: string,
    fileSet: Set<string>
  ): Found | undefined {
    const { stem, ext } = splitName(name);
    const parsed = parseCounter(stem);
    const base = parsed?.base ?? stem;
    const counterPart = parsed ? `(${parsed.counter})` : "";
    const tag = this.suffixTag;

    const candidates = [`${base}${tag}${counterPart}${ext}`];
    if (base.length > this.truncationLength) {
      candidates.push(
        `${base.slice(0, this.truncationLength)}${tag}${counterPart}${ext}`
      );
    }
    for (const candidate of candidates) {
      if (fileSet.has(candidate)) {
        return { fileName: candidate, tier: "EDITED_SUFFIX", alternatives: [] };
      }
    }
    return undefined;
  }

  /**
   * `party.jpg`、`party(1).jpg`、`party(2).jpg` 視為同一組，
   * 優先選與 sidecar 編號相同者，否則取最小編號（無編號視為 0）。
   */
  private findNumberedDuplicate(
    name: string,
    sidecarCounter: number | undefined,
    files: string[]
  ): Found | undefined {
    const { stem, ext } = splitName(name);
    const base = parseCounter(stem)?.base ?? stem;
    // 長檔名的重複檔是截斷後才加上編號
    const bases = new Set([base, base.slice(0, this.truncationLength)]);
    const hits: Array<{ fileName: string; counter: number }> = [];

    for (const fileName of files) {
      const file = splitName(fileName);
      if (file.ext.toLowerCase() !== ext.toLowerCase()) continue;
      if (bases.has(file.stem)) {
        hits.push({ fileName, counter: 0 });
        continue;
      }
      const parsed = parseCounter(file.stem);
      if (parsed && bases.has(parsed.base)) {
        hits.push({ fileName, counter: parsed.counter });
      }
    }
    if (hits.length === 0) return undefined;

    hits.sort(
      (a, b) => a.counter - b.counter || compareNames(a.fileName, b.fileName)
    );
    const chosen =
      hits.find((h) => h.counter === sidecarCounter) ?? hits[0];
    return {
      fileName: chosen.fileName,
      tier: "NUMBERED_DUPLICATE",
      alternatives: hits
        .filter((h) => h !== chosen)
        .map((h) => h.fileName)
        .sort(compareNames),
    };
  }

  private isEditedName(fileName: string) {
    const { stem } = splitName(fileName);
    const base = parseCounter(stem)?.base ?? stem;
    return base.length > this.suffixTag.length && base.endsWith(this.suffixTag);
  }

  /** `vacation-edited(1).jpg` → [`vacation(1).jpg`, 截斷後的版本] */
  private originalNamesOf(editedFileName: string) {
    const { stem, ext } = splitName(editedFileName);
    const parsed = parseCounter(stem);
    const base = (parsed?.base ?? stem).slice(0, -this.suffixTag.length);
    const counterPart = parsed ? `(${parsed.counter})` : "";

    const names = [`${base}${counterPart}${ext}`];
    if (base.length > this.truncationLength) {
      names.push(`${base.slice(0, this.truncationLength)}${counterPart}${ext}`);
    }
    return names;
  }

  private findOriginal(
    names: string[],
    editedFileName: string,
    files: string[],
    fileSet: Set<string>
  ) {
    for (const name of names) {
      if (fileSet.has(name)) return name;
    }
    for (const name of names) {
      const lower = name.toLowerCase();
      const hit = files.find(
        (f) => f !== editedFileName && f.toLowerCase() === lower
      );
      if (hit) return hit;
    }
    return undefined;
  }
}
