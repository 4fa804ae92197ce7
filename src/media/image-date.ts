import type { DateEvidence } from "./types.js";
import * as logger from "../logging/logger.js";
import { formatError } from "../errors.js";
import { makeEvidence } from "./types.js";

const EXIF_DATE_PATTERN = /(\d{4}):(\d{2}):\d{2}/;

/**
 * Read year and month from a raw DateTimeOriginal value (`YYYY:MM:DD HH:MM:SS`).
 * Day and time are dropped.
 */
export function parseExifDateTime(value: unknown): DateEvidence | null {
  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) {
      return null;
    }
    return makeEvidence(value.getUTCFullYear(), value.getUTCMonth() + 1);
  }
  if (typeof value !== "string") {
    return null;
  }
  const match = EXIF_DATE_PATTERN.exec(value);
  if (!match) {
    return null;
  }
  return makeEvidence(Number(match[1]), Number(match[2]));
}

/**
 * Capture month from the image's DateTimeOriginal tag. Returns null on any error.
 * Values are read unrevived so the textual form is parsed as written.
 */
export async function extractImageDate(filePath: string): Promise<DateEvidence | null> {
  try {
    // Dynamic import to avoid loading exifr if not needed
    const exifr = await import("exifr");
    const data: unknown = await exifr.parse(filePath, {
      pick: ["DateTimeOriginal"],
      reviveValues: false,
    });
    if (!data || typeof data !== "object" || !("DateTimeOriginal" in data)) {
      return null;
    }
    return parseExifDateTime(data.DateTimeOriginal);
  } catch (err) {
    logger.debug(`EXIF read failed for ${filePath}: ${formatError(err)}`);
    return null;
  }
}
