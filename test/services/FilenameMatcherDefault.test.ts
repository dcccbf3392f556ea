import { describe, expect, test } from "vitest";

import {
  FilenameMatcherDefault,
  parseSidecarName,
  sanitizeTitle,
} from "@/services/FilenameMatcher";

const matcher = new FilenameMatcherDefault({
  editedSuffix: "edited",
  truncationLength: 47,
});

describe("parseSidecarName", () => {
  test("取出主檔名與重複編號", () => {
    expect(parseSidecarName("party.jpg(1).json")).toEqual({
      core: "party",
      counter: 1,
    });
    expect(parseSidecarName("party(1).json")).toEqual({
      core: "party",
      counter: 1,
    });
    expect(
      parseSidecarName("IMG_1.jpg.supplemental-metadata.json")
    ).toEqual({ core: "IMG_1", counter: undefined });
  });
});

describe("sanitizeTitle", () => {
  test("移除檔案系統不接受的字元", () => {
    expect(sanitizeTitle('what?is:this*"now".jpg')).toBe("whatisthisnow.jpg");
  });
});

describe("FilenameMatcherDefault", () => {
  test("完全相同的檔名優先於其他規則", () => {
    const result = matcher.match({
      declaredFilename: "IMG_1.jpg",
      sidecarFileName: "IMG_1.jpg.json",
      fileNames: ["IMG_1(1).jpg", "IMG_1-edited.jpg", "IMG_1.jpg"],
    });
    expect(result).toEqual({
      type: "MATCHED",
      candidate: { fileName: "IMG_1.jpg", tier: "EXACT", edited: false },
      alternatives: [],
    });
  });

  test("大小寫不同時退回不分大小寫比對，同分取字典序最小", () => {
    const result = matcher.match({
      declaredFilename: "a.JPG",
      sidecarFileName: "a.JPG.json",
      fileNames: ["a.jpg", "A.jpg"],
    });
    expect(result).toEqual({
      type: "MATCHED",
      candidate: { fileName: "A.jpg", tier: "EXACT", edited: false },
      alternatives: ["a.jpg"],
    });
  });

  test("title 含不合法字元時比對清理後的檔名", () => {
    const result = matcher.match({
      declaredFilename: "what?.jpg",
      sidecarFileName: "what.jpg.json",
      fileNames: ["what.jpg"],
    });
    expect(result.type).toBe("MATCHED");
    if (result.type === "MATCHED") {
      expect(result.candidate.fileName).toBe("what.jpg");
      expect(result.candidate.tier).toBe("EXACT");
    }
  });

  test("被截斷的長檔名以截斷規則比對", () => {
    const result = matcher.match({
      declaredFilename:
        "IMG_20230101_altered_very_long_filename_truncated_at_47_char.jpg",
      sidecarFileName:
        "IMG_20230101_altered_very_long_filename_truncated_at_47_char.json",
      fileNames: ["IMG_20230101_altered_very_long_filename_trun.jpg", "x.jpg"],
    });
    expect(result).toEqual({
      type: "MATCHED",
      candidate: {
        fileName: "IMG_20230101_altered_very_long_filename_trun.jpg",
        tier: "TRUNCATED",
        edited: false,
      },
      alternatives: [],
    });
  });

  test("截斷後才加上的重複編號與 sidecar 的編號對應", () => {
    const full = "A".repeat(60);
    const short = "A".repeat(47);
    const fileNames = [`${short}.jpg`, `${short}(1).jpg`];

    const numbered = matcher.match({
      declaredFilename: `${full}.jpg`,
      sidecarFileName: `${"A".repeat(46)}.jpg(1).json`,
      fileNames,
    });
    expect(numbered).toEqual({
      type: "MATCHED",
      candidate: {
        fileName: `${short}(1).jpg`,
        tier: "TRUNCATED",
        edited: false,
      },
      alternatives: [`${short}.jpg`],
    });

    const plain = matcher.match({
      declaredFilename: `${full}.jpg`,
      sidecarFileName: `${"A".repeat(46)}.json`,
      fileNames,
    });
    expect(plain).toEqual({
      type: "MATCHED",
      candidate: { fileName: `${short}.jpg`, tier: "TRUNCATED", edited: false },
      alternatives: [`${short}(1).jpg`],
    });
  });

  test("截斷規則要求副檔名相同", () => {
    const result = matcher.match({
      declaredFilename:
        "IMG_20230101_altered_very_long_filename_truncated_at_47_char.jpg",
      sidecarFileName:
        "IMG_20230101_altered_very_long_filename_truncated_at_47_char.json",
      fileNames: ["IMG_20230101_altered_very_long_filename_trun.mp4"],
    });
    expect(result).toEqual({
      type: "NOT_FOUND",
      declaredFilename:
        "IMG_20230101_altered_very_long_filename_truncated_at_47_char.jpg",
    });
  });

  test("sidecar 為編輯版時選編輯版，並找出原始檔", () => {
    const result = matcher.match({
      declaredFilename: "vacation.jpg",
      sidecarFileName: "vacation-edited.json",
      fileNames: ["vacation-edited.jpg", "vacation.jpg"],
    });
    expect(result).toEqual({
      type: "MATCHED",
      candidate: {
        fileName: "vacation-edited.jpg",
        tier: "EXACT",
        edited: true,
      },
      alternatives: [],
      originalFileName: "vacation.jpg",
    });
  });

  test("只有編輯版時以編輯後綴規則比對，並回報缺少的原始檔", () => {
    const result = matcher.match({
      declaredFilename: "trip.jpg",
      sidecarFileName: "trip.jpg.json",
      fileNames: ["trip-edited.jpg"],
    });
    expect(result).toEqual({
      type: "MATCHED",
      candidate: {
        fileName: "trip-edited.jpg",
        tier: "EDITED_SUFFIX",
        edited: true,
      },
      alternatives: [],
      expectedOriginal: "trip.jpg",
    });
  });

  test("編輯後綴可以設定", () => {
    const german = new FilenameMatcherDefault({
      editedSuffix: "bearbeitet",
      truncationLength: 47,
    });
    const input = {
      declaredFilename: "x.jpg",
      sidecarFileName: "x.jpg.json",
      fileNames: ["x-bearbeitet.jpg"],
    };
    expect(german.match(input)).toEqual({
      type: "MATCHED",
      candidate: {
        fileName: "x-bearbeitet.jpg",
        tier: "EDITED_SUFFIX",
        edited: true,
      },
      alternatives: [],
      expectedOriginal: "x.jpg",
    });
    expect(matcher.match(input)).toEqual({
      type: "NOT_FOUND",
      declaredFilename: "x.jpg",
    });
  });

  test("sidecar 的重複編號決定對應哪一個檔案", () => {
    const result = matcher.match({
      declaredFilename: "party.jpg",
      sidecarFileName: "party(1).json",
      fileNames: ["party.jpg", "party(1).jpg"],
    });
    expect(result.type).toBe("MATCHED");
    if (result.type === "MATCHED") {
      expect(result.candidate.fileName).toBe("party(1).jpg");
    }

    const takeoutStyle = matcher.match({
      declaredFilename: "party.jpg",
      sidecarFileName: "party.jpg(1).json",
      fileNames: ["party.jpg", "party(1).jpg"],
    });
    expect(takeoutStyle.type).toBe("MATCHED");
    if (takeoutStyle.type === "MATCHED") {
      expect(takeoutStyle.candidate.fileName).toBe("party(1).jpg");
    }
  });

  test("沒有相同編號時取最小編號", () => {
    const result = matcher.match({
      declaredFilename: "beach.jpg",
      sidecarFileName: "beach.jpg(2).json",
      fileNames: ["beach(3).jpg", "beach(1).jpg"],
    });
    expect(result).toEqual({
      type: "MATCHED",
      candidate: {
        fileName: "beach(1).jpg",
        tier: "NUMBERED_DUPLICATE",
        edited: false,
      },
      alternatives: ["beach(3).jpg"],
    });
  });

  test("sidecar 沒有編號時也能找到重複編號的檔案", () => {
    const result = matcher.match({
      declaredFilename: "beach.jpg",
      sidecarFileName: "beach.jpg.json",
      fileNames: ["beach(2).jpg", "beach(1).jpg"],
    });
    expect(result.type).toBe("MATCHED");
    if (result.type === "MATCHED") {
      expect(result.candidate).toEqual({
        fileName: "beach(1).jpg",
        tier: "NUMBERED_DUPLICATE",
        edited: false,
      });
      expect(result.alternatives).toEqual(["beach(2).jpg"]);
    }
  });

  test("完全找不到時回傳 NOT_FOUND", () => {
    const result = matcher.match({
      declaredFilename: "ghost.jpg",
      sidecarFileName: "ghost.jpg.json",
      fileNames: ["other.jpg"],
    });
    expect(result).toEqual({ type: "NOT_FOUND", declaredFilename: "ghost.jpg" });
  });

  test("同樣的輸入順序不同，結果相同", () => {
    const files = ["b(2).jpg", "b(1).jpg", "b(3).jpg"];
    const first = matcher.match({
      declaredFilename: "b.jpg",
      sidecarFileName: "b.jpg.json",
      fileNames: files,
    });
    const second = matcher.match({
      declaredFilename: "b.jpg",
      sidecarFileName: "b.jpg.json",
      fileNames: [...files].reverse(),
    });
    expect(second).toEqual(first);
  });
});
