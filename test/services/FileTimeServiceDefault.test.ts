import { mkdir, rm, stat, writeFile } from "node:fs/promises";
import path from "node:path";
import { beforeEach, describe, expect, test } from "vitest";

import { expectErr, expectOk } from "~shared/testkit/ExpectResult";

import { FileTimeServiceDefault } from "@/services/FileTimeService";

import { ExifServiceFake } from "~test/fakes/ExifServiceFake";

const tmpDir = "test/tmp/filetime";
const retry = { attempts: 1, delayMs: 0 };
const time = new Date("2021-06-01T08:00:00Z");

beforeEach(async () => {
  await rm(tmpDir, { recursive: true, force: true });
  await mkdir(tmpDir, { recursive: true });
});

describe("FileTimeServiceDefault", () => {
  test("設定修改與存取時間，Linux 不支援建立時間", async () => {
    const filePath = path.join(tmpDir, "a.mp4");
    await writeFile(filePath, "a");
    const exifService = new ExifServiceFake();
    const service = new FileTimeServiceDefault({
      retry,
      exifService,
      platform: "linux",
    });

    const result = await service.setTimes(filePath, time);

    expectOk(result);
    expect(result.value).toEqual({
      modified: true,
      created: "UNSUPPORTED",
      warnings: [],
    });
    const s = await stat(filePath);
    expect(s.mtime.getTime()).toBe(time.getTime());
    expect(s.atime.getTime()).toBe(time.getTime());
    expect(exifService.writes).toEqual([]);
  });

  test("macOS 與 Windows 透過 exiftool 寫入建立時間", async () => {
    const filePath = path.join(tmpDir, "b.mp4");
    await writeFile(filePath, "b");
    const exifService = new ExifServiceFake();
    const service = new FileTimeServiceDefault({
      retry,
      exifService,
      platform: "darwin",
    });

    const result = await service.setTimes(filePath, time);

    expectOk(result);
    expect(result.value.created).toBe("APPLIED");
    expect(exifService.writes).toEqual([
      { kind: "createDate", filePath, date: time },
    ]);
    expect((await stat(filePath)).mtime.getTime()).toBe(time.getTime());
  });

  test("建立時間寫入失敗只留下警告", async () => {
    const filePath = path.join(tmpDir, "c.mp4");
    await writeFile(filePath, "c");
    const exifService = new ExifServiceFake();
    exifService.setWriteError(filePath, {
      type: "WRITE_FAILED",
      message: "no create date",
    });
    const service = new FileTimeServiceDefault({
      retry,
      exifService,
      platform: "win32",
    });

    const result = await service.setTimes(filePath, time);

    expectOk(result);
    expect(result.value).toEqual({
      modified: true,
      created: "FAILED",
      warnings: ["no create date"],
    });
  });

  test("檔案不存在時回傳 SET_TIME_FAILED", async () => {
    const service = new FileTimeServiceDefault({ retry, platform: "linux" });

    const result = await service.setTimes(path.join(tmpDir, "none.mp4"), time);

    expectErr(result);
    expect(result.error.type).toBe("SET_TIME_FAILED");
  });
});
