import { format } from "date-fns";
import type { WriteTags } from "exiftool-vendored";

import type { GeoLocation } from "@/types";

import type { EmbeddedMetadata } from "./Exif";

/**
 * EXIF 的日期格式沒有時區，依慣例寫入本地時間：YYYY:MM:DD HH:mm:ss
 */
export function toExifDateTime(date: Date) {
  return format(date, "yyyy:MM:dd HH:mm:ss");
}

/**
 * EXIF 的 GPS 以絕對值 + 參考方向表示，方向由正負號決定。
 */
export function toGpsTags(gps: GeoLocation): WriteTags {
  const tags: WriteTags = {
    GPSLatitude: Math.abs(gps.latitude),
    GPSLatitudeRef: gps.latitude < 0 ? "S" : "N",
    GPSLongitude: Math.abs(gps.longitude),
    GPSLongitudeRef: gps.longitude < 0 ? "W" : "E",
  };
  if (gps.altitude !== undefined) {
    tags.GPSAltitude = Math.abs(gps.altitude);
    tags.GPSAltitudeRef =
      gps.altitude < 0 ? "Below Sea Level" : "Above Sea Level";
  }
  return tags;
}

export function buildWriteTags(metadata: EmbeddedMetadata): WriteTags {
  const tags: WriteTags = {};
  if (metadata.captureTime) {
    const dateTime = toExifDateTime(metadata.captureTime);
    tags.DateTimeOriginal = dateTime;
    tags.CreateDate = dateTime;
    tags.ModifyDate = dateTime;
  }
  if (metadata.gps) {
    Object.assign(tags, toGpsTags(metadata.gps));
  }
  return tags;
}
