import { mkdir, readFile, rm } from "node:fs/promises";
import path from "node:path";
import { beforeEach, describe, expect, test } from "vitest";

import { buildTestLogger } from "~shared/testkit/TestLogger";

import type {
  RestoreOutcome,
  RunReport,
} from "@/services/RestoreCoordinator";
import { RestoreLogWriterDefault } from "@/services/RestoreLogWriter";
import type { AppliedFields } from "@/services/MetadataApplier";

const tmpDir = "test/tmp/logwriter";

const applied: AppliedFields = {
  capability: "EMBEDDED_METADATA_CAPABLE",
  embedded: "APPLIED",
  fileTimes: "APPLIED",
  createdTime: "UNSUPPORTED",
  captureTime: "2023-01-01T00:00:00.000Z",
  gpsWritten: false,
  failures: [],
  warnings: [],
};

const outcomes: RestoreOutcome[] = [
  {
    type: "MATCHED",
    sidecarPath: "/t/a.jpg.json",
    mediaPath: "/t/a.jpg",
    destinationPath: "/m/a.jpg",
    tier: "EXACT",
    edited: false,
    alternatives: [],
    applied,
  },
  {
    type: "MATCHED",
    sidecarPath: "/t/b-edited.json",
    mediaPath: "/t/b-edited.jpg",
    destinationPath: "/m/b-edited.jpg",
    tier: "EXACT",
    edited: true,
    alternatives: [],
    applied: { ...applied, embedded: "FAILED", failures: ["exif\tbroken"] },
    rawOriginal: { status: "FAILED", from: "/t/b.jpg", message: "目的地已存在" },
  },
  {
    type: "MISSING_ORIGINAL_FOR_EDITED",
    sidecarPath: "/t/c.jpg.json",
    mediaPath: "/t/c-edited.jpg",
    destinationPath: "/m/c-edited.jpg",
    tier: "EDITED_SUFFIX",
    edited: true,
    alternatives: [],
    applied,
    expectedOriginal: "c.jpg",
  },
  { type: "MISSING_MEDIA", sidecarPath: "/t/d.jpg.json", declaredFilename: "d.jpg" },
  {
    type: "APPLY_FAILED",
    sidecarPath: "/t/e.jpg.json",
    path: "/t/e.jpg",
    stage: "ORGANIZED",
    reason: "目的地已存在: /m/e.jpg",
  },
  {
    type: "MALFORMED_SIDECAR",
    sidecarPath: "/t/f.jpg.json",
    reason: "JSON 根節點不是物件",
  },
];

const report: RunReport = {
  sourceRoot: "/t",
  startedAt: "2024-01-02T03:04:00.000Z",
  finishedAt: "2024-01-02T03:04:05.000Z",
  discovered: outcomes.length,
  outcomes,
  summary: {
    MATCHED: 2,
    MISSING_ORIGINAL_FOR_EDITED: 1,
    MISSING_MEDIA: 1,
    APPLY_FAILED: 1,
    MALFORMED_SIDECAR: 1,
  },
  cancelled: false,
  notProcessed: 0,
};

beforeEach(async () => {
  await rm(tmpDir, { recursive: true, force: true });
  await mkdir(tmpDir, { recursive: true });
});

describe("RestoreLogWriterDefault", () => {
  test("寫出缺檔清單與錯誤清單", async () => {
    const writer = new RestoreLogWriterDefault(
      buildTestLogger(),
      tmpDir,
      () => new Date(2024, 0, 2, 3, 4, 5)
    );

    const files = await writer.write(report);

    expect(files).toEqual({
      missingFiles: path.join(tmpDir, "missing_files_20240102_030405.log"),
      errors: path.join(tmpDir, "errors_20240102_030405.log"),
    });
    expect(await readFile(files.missingFiles, "utf8")).toBe(
      "c.jpg\t/t/c.jpg.json\nd.jpg\t/t/d.jpg.json\n"
    );
    expect(await readFile(files.errors, "utf8")).toBe(
      [
        "/m/b-edited.jpg\texif broken",
        "/t/b.jpg\t目的地已存在",
        "/t/e.jpg\t目的地已存在: /m/e.jpg",
        "/t/f.jpg.json\tJSON 根節點不是物件",
        "",
      ].join("\n")
    );
  });

  test("沒有內容時仍寫出空檔案", async () => {
    const writer = new RestoreLogWriterDefault(
      buildTestLogger(),
      tmpDir,
      () => new Date(2024, 0, 2, 3, 4, 5)
    );

    const files = await writer.write({
      ...report,
      outcomes: [outcomes[0]],
      discovered: 1,
    });

    expect(await readFile(files.missingFiles, "utf8")).toBe("");
    expect(await readFile(files.errors, "utf8")).toBe("");
  });
});
