import type { Dirent } from "node:fs";
import fs from "node:fs/promises";
import path from "node:path";
import type { AuditSink } from "../audit/audit-log.js";
import type { TargetLayout } from "../config/paths.js";
import type { FileMover, MoveResult } from "./move.js";
import type {
  DateEvidence,
  FileCategory,
  FileResult,
  OnProgress,
  OrganizeParams,
  ProcessingOutcome,
  RunSummary,
  RunTotals,
} from "./types.js";
import type { VideoDateExtractor } from "./video-date.js";
import { ErrorCodes, WarningCodes } from "../audit/audit-log.js";
import { resolveTargetLayout, resolveUserPath } from "../config/paths.js";
import { formatError, SetupError } from "../errors.js";
import * as logger from "../logging/logger.js";
import { classifyFile } from "./classify.js";
import { extractFilenameDate } from "./filename-date.js";
import { extractImageDate } from "./image-date.js";
import { FsFileMover } from "./move.js";
import { evidenceFolder, resolveOutcomeFolder, route } from "./route.js";
import { evidenceSegments } from "./types.js";
import { createVideoDateExtractor } from "./video-date.js";

export type OrganizeDeps = {
  audit: AuditSink;
  classify?: (filePath: string) => Promise<FileCategory>;
  extractImageDate?: (filePath: string) => Promise<DateEvidence | null>;
  extractVideoDate?: VideoDateExtractor;
  mover?: FileMover;
  now?: () => Date;
};

type SweepContext = {
  layout: TargetLayout;
  audit: AuditSink;
  classify: (filePath: string) => Promise<FileCategory>;
  extractImageDate: (filePath: string) => Promise<DateEvidence | null>;
  extractVideoDate: VideoDateExtractor;
  mover: FileMover;
  now: () => Date;
};

export type PreparedRun = {
  source: string;
  layout: TargetLayout;
};

/**
 * Validate the source and create the target skeleton. Throws SetupError before
 * any file is touched.
 */
export async function prepareRun(params: OrganizeParams): Promise<PreparedRun> {
  const source = resolveUserPath(params.source_path);
  const target = resolveUserPath(params.target_path);

  let isDirectory = false;
  try {
    isDirectory = (await fs.stat(source)).isDirectory();
  } catch (err) {
    throw new SetupError(
      "SOURCE_INACCESSIBLE",
      `Source directory does not exist or is not accessible: ${source}`,
      { cause: err },
    );
  }
  if (!isDirectory) {
    throw new SetupError("SOURCE_INACCESSIBLE", `Source path is not a directory: ${source}`);
  }

  const layout = resolveTargetLayout(target);
  try {
    for (const dir of [layout.root, layout.toSort, layout.unprocessable]) {
      await fs.mkdir(dir, { recursive: true });
    }
  } catch (err) {
    throw new SetupError(
      "TARGET_UNWRITABLE",
      `Cannot access or create target directory: ${target}. Error: ${formatError(err)}`,
      { cause: err },
    );
  }

  return { source, layout };
}

export function isInside(child: string, parent: string): boolean {
  const rel = path.relative(parent, child);
  if (rel === "") {
    return true;
  }
  return rel !== ".." && !rel.startsWith(`..${path.sep}`) && !path.isAbsolute(rel);
}

/**
 * Every regular file under the source root, sorted for deterministic order.
 * A target root nested inside the source is left out. Folders that cannot be
 * read are logged and skipped.
 */
export async function listSourceFiles(source: string, targetRoot: string): Promise<string[]> {
  const skipTarget = isInside(targetRoot, source);
  const files: string[] = [];
  const pending = [source];

  for (let dir = pending.pop(); dir !== undefined; dir = pending.pop()) {
    if (skipTarget && isInside(dir, targetRoot)) {
      continue;
    }
    let entries: Dirent[];
    try {
      entries = await fs.readdir(dir, { withFileTypes: true });
    } catch (err) {
      logger.warn(`Skipping unreadable folder ${dir}: ${formatError(err)}`);
      continue;
    }
    for (const entry of entries) {
      const absPath = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        pending.push(absPath);
      } else if (entry.isFile() && !(skipTarget && isInside(absPath, targetRoot))) {
        files.push(absPath);
      }
    }
  }

  files.sort((a, b) => a.localeCompare(b));
  return files;
}

async function safeMove(mover: FileMover, src: string, folder: string): Promise<MoveResult> {
  try {
    return await mover.move(src, folder);
  } catch (err) {
    return { ok: false, error: formatError(err) };
  }
}

async function extractEvidence(
  ctx: SweepContext,
  category: FileCategory,
  filePath: string,
): Promise<DateEvidence | null> {
  switch (category) {
    case "image":
      return ctx.extractImageDate(filePath);
    case "video":
      return ctx.extractVideoDate(filePath);
    case "other":
      return null;
  }
}

/**
 * Last-resort relocation into the quarantine folder. If that move fails too the
 * file stays where it is and the outcome is `failed`.
 */
async function quarantine(
  ctx: SweepContext,
  filePath: string,
  category: FileCategory,
  reason: string,
): Promise<FileResult> {
  const filename = path.basename(filePath);
  const moved = await safeMove(ctx.mover, filePath, ctx.layout.unprocessable);
  if (moved.ok) {
    ctx.audit.recordProcess(filename, ctx.layout.unprocessable);
    return {
      source_path: filePath,
      filename,
      category,
      outcome: { kind: "unprocessable", reason },
      final_path: moved.final_path,
      phase: "primary",
    };
  }
  ctx.audit.recordIssue(
    filename,
    null,
    ErrorCodes.MOVE_ERROR,
    `Failed to move file to unprocessable folder: ${moved.error}`,
  );
  return {
    source_path: filePath,
    filename,
    category,
    outcome: { kind: "failed", reason: moved.error },
    final_path: filePath,
    phase: "primary",
  };
}

async function processPrimaryFile(ctx: SweepContext, filePath: string): Promise<FileResult> {
  const filename = path.basename(filePath);
  let category: FileCategory = "other";

  try {
    category = await ctx.classify(filePath);
    const evidence = await extractEvidence(ctx, category, filePath);
    const outcome = route(category, evidence);
    const folder = resolveOutcomeFolder(outcome, ctx.layout);
    if (!folder) {
      throw new Error(`no destination for outcome ${outcome.kind}`);
    }

    if (outcome.kind === "needs_sort") {
      ctx.audit.recordIssue(
        filename,
        WarningCodes.NO_DATE_METADATA,
        null,
        `No date metadata found for ${category} file: ${filename}`,
      );
    }

    const moved = await safeMove(ctx.mover, filePath, folder);
    if (moved.ok) {
      ctx.audit.recordProcess(filename, folder);
      if (outcome.kind === "unprocessable") {
        ctx.audit.recordIssue(
          filename,
          WarningCodes.UNSUPPORTED_FILE,
          null,
          `File is neither image nor video: ${filename}`,
        );
      }
      logger.debug(`${filePath} -> ${moved.final_path}`);
      return {
        source_path: filePath,
        filename,
        category,
        outcome,
        final_path: moved.final_path,
        phase: "primary",
      };
    }

    ctx.audit.recordIssue(
      filename,
      null,
      ErrorCodes.MOVE_ERROR,
      `Failed to move file to ${folder}: ${moved.error}`,
    );
    if (folder === ctx.layout.unprocessable) {
      return {
        source_path: filePath,
        filename,
        category,
        outcome: { kind: "failed", reason: moved.error },
        final_path: filePath,
        phase: "primary",
      };
    }
    return await quarantine(ctx, filePath, category, `move failed: ${moved.error}`);
  } catch (err) {
    const result = await quarantine(ctx, filePath, category, formatError(err));
    ctx.audit.recordIssue(
      filename,
      null,
      ErrorCodes.UNPROCESSABLE_FILE,
      `Error processing file: ${formatError(err)}`,
    );
    return result;
  }
}

async function processResortFile(ctx: SweepContext, filePath: string): Promise<FileResult> {
  const filename = path.basename(filePath);
  const base = { source_path: filePath, filename, category: null, phase: "resort" } as const;

  const evidence = extractFilenameDate(filename, ctx.now());
  if (!evidence) {
    logger.info(`Couldn't extract date from filename: ${filename}`);
    return { ...base, outcome: { kind: "needs_sort" }, final_path: filePath };
  }

  const outcome: ProcessingOutcome = { kind: "organized", ...evidence };
  const folder = evidenceFolder(ctx.layout, evidence);
  const moved = await safeMove(ctx.mover, filePath, folder);
  if (!moved.ok) {
    ctx.audit.recordIssue(
      filename,
      null,
      ErrorCodes.MOVE_ERROR,
      `Failed to move file from to_sort folder: ${moved.error}`,
    );
    return { ...base, outcome: { kind: "failed", reason: moved.error }, final_path: filePath };
  }

  const [year, month] = evidenceSegments(evidence);
  ctx.audit.recordProcess(filename, folder);
  ctx.audit.recordIssue(
    filename,
    WarningCodes.FILENAME_DATE_EXTRACTION,
    null,
    `Moved based on filename timestamp: ${year}-${month}`,
  );
  logger.info(`Moved '${filename}' to ${folder} based on filename timestamp`);
  return { ...base, outcome, final_path: moved.final_path };
}

async function runPrimarySweep(
  ctx: SweepContext,
  source: string,
  onProgress?: OnProgress,
): Promise<FileResult[]> {
  const files = await listSourceFiles(source, ctx.layout.root);
  onProgress?.({ type: "organize.scan", discovered_count: files.length });

  const results: FileResult[] = [];
  for (let i = 0; i < files.length; i++) {
    const result = await processPrimaryFile(ctx, files[i]);
    results.push(result);
    onProgress?.({ type: "organize.file", index: i + 1, total: files.length, result });
  }
  return results;
}

async function runResortSweep(ctx: SweepContext, onProgress?: OnProgress): Promise<FileResult[]> {
  let entries: Dirent[];
  try {
    entries = await fs.readdir(ctx.layout.toSort, { withFileTypes: true });
  } catch {
    logger.warn(`'to_sort' folder does not exist: ${ctx.layout.toSort}`);
    return [];
  }

  const files = entries
    .filter((entry) => entry.isFile())
    .map((entry) => path.join(ctx.layout.toSort, entry.name))
    .sort((a, b) => a.localeCompare(b));
  onProgress?.({ type: "organize.resort.start", candidate_count: files.length });

  const results: FileResult[] = [];
  for (let i = 0; i < files.length; i++) {
    const result = await processResortFile(ctx, files[i]);
    results.push(result);
    onProgress?.({ type: "organize.resort.file", index: i + 1, total: files.length, result });
  }
  return results;
}

function countOutcomes(results: FileResult[], kind: ProcessingOutcome["kind"]): number {
  return results.filter((r) => r.outcome.kind === kind).length;
}

export function buildTotals(primary: FileResult[], resort: FileResult[]): RunTotals {
  return {
    file_count: primary.length,
    organized_count: countOutcomes(primary, "organized"),
    needs_sort_count: countOutcomes(primary, "needs_sort"),
    unprocessable_count: countOutcomes(primary, "unprocessable"),
    failed_count: countOutcomes(primary, "failed") + countOutcomes(resort, "failed"),
    resorted_count: countOutcomes(resort, "organized"),
    resort_left_count: countOutcomes(resort, "needs_sort"),
  };
}

/**
 * Primary sweep over the source tree, then a resort sweep over the holding folder
 * using file names only. Per-file failures are contained; only setup errors throw.
 */
export async function runOrganize(
  params: OrganizeParams,
  deps: OrganizeDeps,
  onProgress?: OnProgress,
): Promise<RunSummary> {
  const startedAt = new Date().toISOString();
  const startMs = Date.now();

  const { source, layout } = await prepareRun(params);

  const ctx: SweepContext = {
    layout,
    audit: deps.audit,
    classify: deps.classify ?? classifyFile,
    extractImageDate: deps.extractImageDate ?? extractImageDate,
    extractVideoDate: deps.extractVideoDate ?? createVideoDateExtractor(),
    mover: deps.mover ?? new FsFileMover(),
    now: deps.now ?? (() => new Date()),
  };

  onProgress?.({ type: "organize.start", source_path: source, target_root: layout.root });

  // ── Phase 1: primary sweep ──
  let primary: FileResult[] = [];
  try {
    primary = await runPrimarySweep(ctx, source, onProgress);
    logger.info("Main file organization completed successfully.");
  } catch (err) {
    logger.error(`An error occurred: ${formatError(err)}`);
  }

  // ── Phase 2: resort sweep ──
  let resort: FileResult[] = [];
  try {
    logger.info("Processing files in 'to_sort' folder...");
    resort = await runResortSweep(ctx, onProgress);
    logger.info("Processing files in 'to_sort' folder completed successfully.");
  } catch (err) {
    logger.error(`Error processing files in 'to_sort' folder: ${formatError(err)}`);
  }

  const totals = buildTotals(primary, resort);
  onProgress?.({ type: "organize.done", totals, elapsed_ms: Date.now() - startMs });

  return {
    started_at: startedAt,
    finished_at: new Date().toISOString(),
    source_path: source,
    target_root: layout.root,
    primary,
    resort,
    totals,
  };
}
