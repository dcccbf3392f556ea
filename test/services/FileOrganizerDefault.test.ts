import {
  mkdir,
  readFile,
  readdir,
  rename,
  rm,
  unlink,
  writeFile,
} from "node:fs/promises";
import path from "node:path";
import { beforeEach, describe, expect, test, vi } from "vitest";

import { buildTestLogger } from "~shared/testkit/TestLogger";
import { expectErr, expectOk } from "~shared/testkit/ExpectResult";

import { FileOrganizerDefault } from "@/services/FileOrganizer";
import { exists } from "@/utils/helper";

vi.mock("node:fs/promises", async (importOriginal) => {
  const actual = await importOriginal<typeof import("node:fs/promises")>();
  return {
    ...actual,
    rename: vi.fn(actual.rename),
    unlink: vi.fn(actual.unlink),
  };
});

function errno(code: string) {
  return Object.assign(new Error(`${code}: failed`), { code });
}

const tmpDir = path.resolve("test/tmp/organizer");
const sourceRoot = path.join(tmpDir, "takeout");
const matchedRoot = path.join(tmpDir, "matched");
const rawOriginalsRoot = path.join(tmpDir, "raw");

const organizer = new FileOrganizerDefault({
  logger: buildTestLogger(),
  sourceRoot,
  matchedRoot,
  rawOriginalsRoot,
  retry: { attempts: 1, delayMs: 0 },
});

async function createFile(relPath: string, content = relPath) {
  const filePath = path.join(tmpDir, relPath);
  await mkdir(path.dirname(filePath), { recursive: true });
  await writeFile(filePath, content);
  return filePath;
}

beforeEach(async () => {
  vi.clearAllMocks();
  await rm(tmpDir, { recursive: true, force: true });
  await mkdir(sourceRoot, { recursive: true });
});

describe("FileOrganizerDefault", () => {
  test("搬到完成資料夾並保留子路徑", async () => {
    const mediaPath = await createFile("takeout/2023/trip/a.jpg", "A");

    const result = await organizer.organize({ mediaPath });

    expectOk(result);
    const expected = path.join(matchedRoot, "2023", "trip", "a.jpg");
    expect(result.value).toEqual({ destinationPath: expected });
    expect(await readFile(expected, "utf8")).toBe("A");
    expect(await exists(mediaPath)).toBe(false);
  });

  test("編輯版的原始檔搬到原始檔資料夾", async () => {
    const mediaPath = await createFile("takeout/album/v-edited.jpg");
    const rawOriginalPath = await createFile("takeout/album/v.jpg");

    const result = await organizer.organize({ mediaPath, rawOriginalPath });

    expectOk(result);
    expect(result.value).toEqual({
      destinationPath: path.join(matchedRoot, "album", "v-edited.jpg"),
      rawOriginal: {
        status: "MOVED",
        from: rawOriginalPath,
        to: path.join(rawOriginalsRoot, "album", "v.jpg"),
      },
    });
    expect(await exists(rawOriginalPath)).toBe(false);
  });

  test("目的地已存在時不覆蓋", async () => {
    const mediaPath = await createFile("takeout/a.jpg", "new");
    await createFile("matched/a.jpg", "old");

    const result = await organizer.organize({ mediaPath });

    expectErr(result);
    expect(result.error.type).toBe("TARGET_EXISTS");
    expect(result.error.to).toBe(path.join(matchedRoot, "a.jpg"));
    expect(await readFile(path.join(matchedRoot, "a.jpg"), "utf8")).toBe("old");
    expect(await readFile(mediaPath, "utf8")).toBe("new");
  });

  test("原始檔搬移失敗不影響主檔", async () => {
    const mediaPath = await createFile("takeout/b-edited.jpg");
    const rawOriginalPath = await createFile("takeout/b.jpg", "original");
    await createFile("raw/b.jpg", "occupied");

    const result = await organizer.organize({ mediaPath, rawOriginalPath });

    expectOk(result);
    expect(result.value.destinationPath).toBe(
      path.join(matchedRoot, "b-edited.jpg")
    );
    expect(result.value.rawOriginal).toEqual({
      status: "FAILED",
      from: rawOriginalPath,
      message: `目的地已存在: ${path.join(rawOriginalsRoot, "b.jpg")}`,
    });
    expect(await readFile(rawOriginalPath, "utf8")).toBe("original");
  });

  test("來源不存在時回傳 MOVE_FAILED", async () => {
    const result = await organizer.organize({
      mediaPath: path.join(sourceRoot, "ghost.jpg"),
    });

    expectErr(result);
    expect(result.error.type).toBe("MOVE_FAILED");
    expect(result.error.from).toBe(path.join(sourceRoot, "ghost.jpg"));
  });

  describe("跨磁碟搬移", () => {
    test("複製到目的地後刪除來源", async () => {
      const mediaPath = await createFile("takeout/2023/x.jpg", "X");
      vi.mocked(rename).mockRejectedValueOnce(errno("EXDEV"));

      const result = await organizer.organize({ mediaPath });

      expectOk(result);
      const expected = path.join(matchedRoot, "2023", "x.jpg");
      expect(result.value).toEqual({ destinationPath: expected });
      expect(await readFile(expected, "utf8")).toBe("X");
      expect(await exists(mediaPath)).toBe(false);
      expect(await readdir(path.join(matchedRoot, "2023"))).toEqual(["x.jpg"]);
    });

    test("來源刪除失敗時撤回目的地的副本", async () => {
      const mediaPath = await createFile("takeout/y.jpg", "Y");
      vi.mocked(rename).mockRejectedValueOnce(errno("EXDEV"));
      vi.mocked(unlink).mockRejectedValueOnce(errno("EBUSY"));

      const result = await organizer.organize({ mediaPath });

      expectErr(result);
      expect(result.error.type).toBe("MOVE_FAILED");
      expect(result.error.message).toBe(
        `搬移失敗 ${mediaPath} → ${path.join(matchedRoot, "y.jpg")}: EBUSY: failed`
      );
      expect(await readFile(mediaPath, "utf8")).toBe("Y");
      expect(await readdir(matchedRoot)).toEqual([]);

      // 重新執行時不會被殘留的副本擋住
      const again = await organizer.organize({ mediaPath });
      expectOk(again);
      expect(await readFile(path.join(matchedRoot, "y.jpg"), "utf8")).toBe("Y");
    });

    test("只重試刪除來源，不重新複製", async () => {
      const retrying = new FileOrganizerDefault({
        logger: buildTestLogger(),
        sourceRoot,
        matchedRoot,
        rawOriginalsRoot,
        retry: { attempts: 2, delayMs: 0 },
      });
      const mediaPath = await createFile("takeout/z.jpg", "Z");
      vi.mocked(rename).mockRejectedValueOnce(errno("EXDEV"));
      vi.mocked(unlink).mockRejectedValueOnce(errno("EBUSY"));

      const result = await retrying.organize({ mediaPath });

      expectOk(result);
      expect(await exists(mediaPath)).toBe(false);
      expect(await readFile(path.join(matchedRoot, "z.jpg"), "utf8")).toBe("Z");
      // 一次原地改名失敗、一次暫存檔改名
      expect(vi.mocked(rename)).toHaveBeenCalledTimes(2);
      expect(vi.mocked(unlink)).toHaveBeenCalledTimes(2);
      expect(vi.mocked(unlink)).toHaveBeenLastCalledWith(mediaPath);
    });
  });
});
