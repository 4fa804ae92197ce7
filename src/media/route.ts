import path from "node:path";
import type { TargetLayout } from "../config/paths.js";
import type { DateEvidence, FileCategory, ProcessingOutcome } from "./types.js";
import { evidenceSegments } from "./types.js";

export const NOT_MEDIA_REASON = "not image or video";

export function route(category: FileCategory, evidence: DateEvidence | null): ProcessingOutcome {
  if (category === "other") {
    return { kind: "unprocessable", reason: NOT_MEDIA_REASON };
  }
  if (evidence) {
    return { kind: "organized", year: evidence.year, month: evidence.month };
  }
  return { kind: "needs_sort" };
}

export function evidenceFolder(layout: TargetLayout, evidence: DateEvidence): string {
  return path.join(layout.root, ...evidenceSegments(evidence));
}

/**
 * Folder an outcome sends its file to. `failed` has none: the file stays put.
 */
export function resolveOutcomeFolder(
  outcome: ProcessingOutcome,
  layout: TargetLayout,
): string | null {
  switch (outcome.kind) {
    case "organized":
      return evidenceFolder(layout, { year: outcome.year, month: outcome.month });
    case "needs_sort":
      return layout.toSort;
    case "unprocessable":
      return layout.unprocessable;
    case "failed":
      return null;
  }
}
