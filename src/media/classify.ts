import path from "node:path";
import type { FileCategory } from "./types.js";
import * as logger from "../logging/logger.js";
import { formatError } from "../errors.js";

const RAW_EXTENSIONS = new Set([
  ".cr2",
  ".cr3",
  ".nef",
  ".arw",
  ".dng",
  ".raf",
  ".rw2",
  ".orf",
  ".pef",
  ".srw",
]);

const PHOTO_EXTENSIONS = new Set([
  ".jpg",
  ".jpeg",
  ".jpe",
  ".png",
  ".gif",
  ".bmp",
  ".heic",
  ".heif",
  ".tif",
  ".tiff",
  ".webp",
  ".avif",
]);

const VIDEO_EXTENSIONS = new Set([
  ".mp4",
  ".m4v",
  ".mov",
  ".qt",
  ".avi",
  ".mkv",
  ".webm",
  ".3gp",
  ".3g2",
  ".mpg",
  ".mpeg",
  ".mts",
  ".m2ts",
  ".wmv",
  ".flv",
]);

/**
 * Classify by extension alone. Returns null when the extension is not registered,
 * so the caller can fall back to the file signature.
 */
export function classifyExtension(ext: string): FileCategory | null {
  const lower = ext.toLowerCase();
  if (PHOTO_EXTENSIONS.has(lower) || RAW_EXTENSIONS.has(lower)) {
    return "image";
  }
  if (VIDEO_EXTENSIONS.has(lower)) {
    return "video";
  }
  return null;
}

export function classifyMime(mime: string): FileCategory {
  if (mime.startsWith("image/")) {
    return "image";
  }
  if (mime.startsWith("video/")) {
    return "video";
  }
  return "other";
}

/**
 * Determine the category of a file. Never throws: anything that cannot be
 * recognised is "other".
 */
export async function classifyFile(filePath: string): Promise<FileCategory> {
  const byExtension = classifyExtension(path.extname(filePath));
  if (byExtension) {
    return byExtension;
  }

  try {
    const { fileTypeFromFile } = await import("file-type");
    const detected = await fileTypeFromFile(filePath);
    return detected ? classifyMime(detected.mime) : "other";
  } catch (err) {
    logger.debug(`signature sniff failed for ${filePath}: ${formatError(err)}`);
    return "other";
  }
}
