import { stat } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { stdin as input, stdout as output } from "node:process";
import { createInterface } from "node:readline/promises";

export function expandHome(p: string) {
  if (p.startsWith("~/")) return path.join(os.homedir(), p.slice(2));
  return p;
}

export async function confirm(question: string) {
  const rl = createInterface({ input, output });
  const ans = (await rl.question(question)).trim().toLowerCase();
  rl.close();
  return ans === "y" || ans === "yes";
}

export async function exists(p: string) {
  try {
    await stat(p);
    return true;
  } catch {
    return false;
  }
}

export async function isDirectory(p: string) {
  try {
    return (await stat(p)).isDirectory();
  } catch {
    return false;
  }
}

/** 未提供時回傳 undefined；無法解析時回傳 NaN，交給設定驗證處理 */
export function toInt(v: number | string | undefined) {
  if (v === undefined) return undefined;
  return typeof v === "string" ? Number(v.trim() === "" ? NaN : v) : v;
}

/** 將路徑拆成主檔名與副檔名（副檔名含 .，沒有則為空字串） */
export function splitName(fileName: string) {
  const ext = path.extname(fileName);
  return { stem: fileName.slice(0, fileName.length - ext.length), ext };
}

export function errorMessage(e: unknown) {
  return e instanceof Error ? e.message : String(e);
}
