import { open } from "node:fs/promises";
import path from "node:path";

import type { FormatCapability } from "./MetadataApplier";

type Signature = readonly number[];

const jpegSignatures: Signature[] = [[0xff, 0xd8, 0xff]];
const tiffSignatures: Signature[] = [
  [0x49, 0x49, 0x2a, 0x00],
  [0x4d, 0x4d, 0x00, 0x2a],
];

const signaturesByExtension: Record<string, Signature[]> = {
  ".jpg": jpegSignatures,
  ".jpeg": jpegSignatures,
  ".tif": tiffSignatures,
  ".tiff": tiffSignatures,
};

async function readHead(filePath: string, length: number) {
  const handle = await open(filePath, "r");
  try {
    const buffer = Buffer.alloc(length);
    const { bytesRead } = await handle.read(buffer, 0, length, 0);
    return buffer.subarray(0, bytesRead);
  } finally {
    await handle.close();
  }
}

function startsWith(head: Buffer, signature: Signature) {
  return (
    head.length >= signature.length && signature.every((b, i) => head[i] === b)
  );
}

/**
 * 先看副檔名，再以檔頭確認內容。副檔名是 .jpg 但內容其實是 PNG 的檔案
 * 只會設定檔案時間。未知檔頭的自訂副檔名則相信副檔名。
 */
export async function detectFormatCapability(
  filePath: string,
  embeddedExtensions: readonly string[]
): Promise<FormatCapability> {
  const ext = path.extname(filePath).toLowerCase();
  if (!embeddedExtensions.includes(ext)) return "TIMESTAMP_ONLY";

  const signatures = signaturesByExtension[ext];
  if (!signatures) return "EMBEDDED_METADATA_CAPABLE";

  const head = await readHead(filePath, 4);
  return signatures.some((s) => startsWith(head, s))
    ? "EMBEDDED_METADATA_CAPABLE"
    : "TIMESTAMP_ONLY";
}
