import { Type as t } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import path from "node:path";

import { type Result, err, ok } from "~shared/utils/Result";

import { sidecarExtension, supplementalSidecarSuffix } from "@/constants";
import type { GeoLocation } from "@/types";

import type {
  MalformedSidecarError,
  SidecarParser,
  SidecarRecord,
} from "./SidecarParser";

const timeSchema = t.Object({
  timestamp: t.Union([t.String(), t.Number()]),
});

const geoSchema = t.Object({
  latitude: t.Number(),
  longitude: t.Number(),
  altitude: t.Optional(t.Number()),
});

/** 只描述會用到的欄位，其餘欄位忽略 */
const sidecarSchema = t.Object({
  title: t.Optional(t.String()),
  description: t.Optional(t.String()),
  photoTakenTime: t.Optional(timeSchema),
  geoData: t.Optional(geoSchema),
  geoDataExif: t.Optional(geoSchema),
});

/** 2100-01-01T00:00:00Z */
const farFutureSeconds = 4102444800;

export class SidecarParserDefault implements SidecarParser {
  parse(
    raw: string,
    sidecarPath: string
  ): Result<SidecarRecord, MalformedSidecarError> {
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (e) {
      return malformed(
        sidecarPath,
        `JSON 格式錯誤: ${e instanceof Error ? e.message : String(e)}`
      );
    }
    if (typeof json !== "object" || json === null || Array.isArray(json)) {
      return malformed(sidecarPath, "JSON 根節點不是物件");
    }
    if (!Value.Check(sidecarSchema, json)) {
      const first = Value.Errors(sidecarSchema, json).First();
      return malformed(
        sidecarPath,
        `欄位格式錯誤: ${first ? `${first.path} ${first.message}` : "未知"}`
      );
    }

    const warnings: string[] = [];

    const declaredFilename =
      json.title?.trim() || filenameFromSidecarPath(sidecarPath);
    if (!declaredFilename) {
      return malformed(sidecarPath, "缺少 title，且無法從 sidecar 檔名推得");
    }

    const captureTime = parseTimestamp(json.photoTakenTime?.timestamp, warnings);
    const geo =
      parseGeo(json.geoData, "geoData", warnings) ??
      parseGeo(json.geoDataExif, "geoDataExif", warnings);

    const record: SidecarRecord = Object.freeze({
      sidecarPath,
      declaredFilename,
      captureTime,
      geo: geo ? Object.freeze(geo) : undefined,
      description: json.description || undefined,
      warnings: Object.freeze(warnings),
    });
    return ok(record);
  }
}

function malformed(sidecarPath: string, message: string) {
  return err<MalformedSidecarError>({
    type: "MALFORMED_SIDECAR",
    sidecarPath,
    message,
  });
}

/**
 * `IMG_1.jpg.json`、`IMG_1.jpg.supplemental-metadata.json` → `IMG_1.jpg`。
 * 去掉後若沒有副檔名（例如 `vacation.json`）則無法作為檔名，回傳空字串。
 */
export function filenameFromSidecarPath(sidecarPath: string) {
  let name = path.basename(sidecarPath);
  if (name.toLowerCase().endsWith(sidecarExtension)) {
    name = name.slice(0, -sidecarExtension.length);
  }
  if (name.endsWith(supplementalSidecarSuffix)) {
    name = name.slice(0, -supplementalSidecarSuffix.length);
  }
  return path.extname(name) ? name : "";
}

function parseTimestamp(
  value: string | number | undefined,
  warnings: string[]
): Date | undefined {
  if (value === undefined) return undefined;
  const seconds = typeof value === "number" ? value : Number(value.trim());
  if (!Number.isFinite(seconds)) {
    warnings.push(`無法解析的拍攝時間: ${String(value)}`);
    return undefined;
  }
  // 0 或負值代表沒有時間，不是錯誤
  if (seconds <= 0) return undefined;
  const date = new Date(Math.trunc(seconds) * 1000);
  if (Number.isNaN(date.getTime())) {
    warnings.push(`拍攝時間無法表示為日期: ${String(value)}`);
    return undefined;
  }
  if (seconds > farFutureSeconds) {
    warnings.push(`拍攝時間超出合理範圍: ${seconds}`);
  }
  return date;
}

function parseGeo(
  value: { latitude: number; longitude: number; altitude?: number } | undefined,
  field: string,
  warnings: string[]
): GeoLocation | undefined {
  if (!value) return undefined;
  const { latitude, longitude } = value;
  // 經緯度皆為 0 是服務端「沒有位置」的標記
  if (latitude === 0 && longitude === 0) return undefined;
  if (Math.abs(latitude) > 90 || Math.abs(longitude) > 180) {
    warnings.push(`${field} 座標超出範圍: ${latitude}, ${longitude}`);
    return undefined;
  }
  return value.altitude === undefined
    ? { latitude, longitude }
    : { latitude, longitude, altitude: value.altitude };
}
