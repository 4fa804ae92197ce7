import path from "node:path";
import type { DateEvidence } from "./types.js";
import { makeEvidence } from "./types.js";

type FilenamePattern = {
  label: string;
  regex: RegExp;
  /** Capture group indexes holding year and month. */
  year: number;
  month: number;
};

// Tried in this order; the first accepted match wins. Order is part of the behaviour:
// an 8-digit run matches YYYYMMDD before the IMG/VID-prefixed forms are reached.
export const FILENAME_PATTERNS: readonly FilenamePattern[] = [
  { label: "YYYY-MM-DD", regex: /(\d{4})[-_](\d{2})[-_]\d{2}/, year: 1, month: 2 },
  { label: "DD-MM-YYYY", regex: /\d{2}[-_](\d{2})[-_](\d{4})/, year: 2, month: 1 },
  { label: "YYYYMMDD", regex: /(\d{4})(\d{2})\d{2}/, year: 1, month: 2 },
  { label: "IMG_YYYYMMDD", regex: /IMG[-_](\d{4})(\d{2})\d{2}/, year: 1, month: 2 },
  { label: "VID_YYYYMMDD", regex: /VID[-_](\d{4})(\d{2})\d{2}/, year: 1, month: 2 },
];

/** True when the evidence names the month of `now` or an earlier one (local calendar). */
export function isNotInFuture(evidence: DateEvidence, now: Date): boolean {
  const currentYear = now.getFullYear();
  const currentMonth = now.getMonth() + 1;
  return (
    evidence.year < currentYear || (evidence.year === currentYear && evidence.month <= currentMonth)
  );
}

/**
 * Recover a capture month from a timestamp embedded in the file name.
 * Future-dated or out-of-range matches are rejected and the next pattern is tried.
 */
export function extractFilenameDate(filename: string, now: Date = new Date()): DateEvidence | null {
  const name = path.basename(filename);
  for (const pattern of FILENAME_PATTERNS) {
    const match = pattern.regex.exec(name);
    if (!match) {
      continue;
    }
    const evidence = makeEvidence(Number(match[pattern.year]), Number(match[pattern.month]));
    if (evidence && isNotInFuture(evidence, now)) {
      return evidence;
    }
  }
  return null;
}
