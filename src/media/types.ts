export type FileCategory = "image" | "video" | "other";

/** Resolved capture month. Build through `makeEvidence` so the ranges hold. */
export type DateEvidence = {
  year: number;
  month: number;
};

export const MIN_EVIDENCE_YEAR = 1900;

export function makeEvidence(year: number, month: number): DateEvidence | null {
  if (!Number.isInteger(year) || !Number.isInteger(month)) {
    return null;
  }
  if (year < MIN_EVIDENCE_YEAR || month < 1 || month > 12) {
    return null;
  }
  return { year, month };
}

/** Folder segments for an evidence pair, month zero-padded: `["2023", "07"]`. */
export function evidenceSegments(evidence: DateEvidence): [string, string] {
  return [String(evidence.year), String(evidence.month).padStart(2, "0")];
}

export type ProcessingOutcome =
  | { kind: "organized"; year: number; month: number }
  | { kind: "needs_sort" }
  | { kind: "unprocessable"; reason: string }
  | { kind: "failed"; reason: string };

export type OutcomeKind = ProcessingOutcome["kind"];

export type ProcessEvent = {
  filename: string;
  target_folder: string;
  timestamp_utc: string; // ISO 8601
};

export type IssueEvent = {
  filename: string;
  warning_code: number | null;
  error_code: number | null;
  description: string;
  timestamp_utc: string; // ISO 8601
};

export type AuditRecord =
  | ({ type: "process" } & ProcessEvent)
  | ({ type: "issue" } & IssueEvent);

export type SweepPhase = "primary" | "resort";

export type FileResult = {
  source_path: string; // where the file was when the sweep saw it
  filename: string;
  category: FileCategory | null; // null in the resort sweep, which does not classify
  outcome: ProcessingOutcome;
  final_path: string; // equals source_path when the file was not moved
  phase: SweepPhase;
};

export type OrganizeParams = {
  source_path: string;
  target_path: string;
};

export type RunTotals = {
  file_count: number;
  organized_count: number;
  needs_sort_count: number;
  unprocessable_count: number;
  failed_count: number;
  resorted_count: number;
  resort_left_count: number;
};

export type RunSummary = {
  started_at: string; // ISO 8601
  finished_at: string;
  source_path: string;
  target_root: string;
  primary: FileResult[];
  resort: FileResult[];
  totals: RunTotals;
};

// Progress events emitted via the onProgress callback
export type OrganizeProgressEvent =
  | { type: "organize.start"; source_path: string; target_root: string }
  | { type: "organize.scan"; discovered_count: number }
  | { type: "organize.file"; index: number; total: number; result: FileResult }
  | { type: "organize.resort.start"; candidate_count: number }
  | { type: "organize.resort.file"; index: number; total: number; result: FileResult }
  | { type: "organize.done"; totals: RunTotals; elapsed_ms: number };

export type OnProgress = (event: OrganizeProgressEvent) => void;
