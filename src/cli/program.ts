import { Command, CommanderError } from "commander";
import type { LogLevel } from "../logging/logger.js";
import type { OrganizeProgressEvent, RunSummary } from "../media/types.js";
import { withAuditLog } from "../audit/audit-log.js";
import { resolveAuditDbPath, resolveProbeCommand, resolveUserPath } from "../config/paths.js";
import { formatError, SetupError } from "../errors.js";
import * as logger from "../logging/logger.js";
import { prepareRun, runOrganize } from "../media/organize.js";
import { createVideoDateExtractor } from "../media/video-date.js";
import { VERSION } from "../version.js";

export type CliOptions = {
  source: string;
  target: string;
  db: string;
  probe: string | false;
  json?: boolean;
  verbose?: boolean;
  quiet?: boolean;
};

export function buildProgram(env: NodeJS.ProcessEnv = process.env): Command {
  return new Command()
    .name("mediasort")
    .description("Move photos and videos into <target>/<year>/<month> folders by capture date")
    .version(VERSION)
    .requiredOption("-s, --source <dir>", "Folder to organize (read recursively)")
    .requiredOption("-t, --target <dir>", "Folder that receives the year/month tree")
    .option("--db <path>", "Audit database path", resolveAuditDbPath(env))
    .option("--probe <command>", "Media probe command for video dates", resolveProbeCommand(env))
    .option("--no-probe", "Skip the media probe and use container tags or file times")
    .option("--json", "Print the run summary as JSON")
    .option("-v, --verbose", "Log every file")
    .option("-q, --quiet", "Only log errors")
    .exitOverride();
}

function pickLogLevel(options: CliOptions, env: NodeJS.ProcessEnv): LogLevel {
  if (options.verbose) {
    return "debug";
  }
  // stdout carries the JSON summary
  if (options.quiet || options.json) {
    return "error";
  }
  return logger.resolveLogLevel(env);
}

function logProgress(event: OrganizeProgressEvent): void {
  switch (event.type) {
    case "organize.start":
      logger.info(`Organizing ${event.source_path} into ${event.target_root}`);
      break;
    case "organize.scan":
      logger.info(`Found ${event.discovered_count} files`);
      break;
    case "organize.file":
    case "organize.resort.file":
      logger.debug(
        `[${event.index}/${event.total}] ${event.result.filename} -> ${event.result.outcome.kind}`,
      );
      break;
    case "organize.resort.start":
      logger.debug(`${event.candidate_count} files waiting in to_sort`);
      break;
    case "organize.done":
      logger.debug(`Finished in ${event.elapsed_ms}ms`);
      break;
  }
}

function printSummary(summary: RunSummary, dbPath: string): void {
  const { totals } = summary;
  logger.heading("Organize Complete");
  logger.table([
    ["Source", summary.source_path],
    ["Target", summary.target_root],
    ["Files", String(totals.file_count)],
    ["Organized", String(totals.organized_count)],
    ["To sort", String(totals.needs_sort_count)],
    ["Unprocessable", String(totals.unprocessable_count)],
    ["Failed", String(totals.failed_count)],
    ["Resorted by name", String(totals.resorted_count)],
    ["Left in to_sort", String(totals.resort_left_count)],
    ["Audit log", dbPath],
  ]);
  if (totals.failed_count > 0) {
    logger.warn(`${totals.failed_count} files could not be moved and were left in place`);
  } else {
    logger.success("All files accounted for");
  }
}

/**
 * Parse `argv`, run both sweeps and report. Resolves to the process exit code.
 */
export async function runCli(
  argv: string[] = process.argv,
  env: NodeJS.ProcessEnv = process.env,
): Promise<number> {
  const program = buildProgram(env);
  try {
    program.parse(argv);
  } catch (err) {
    if (err instanceof CommanderError) {
      return err.exitCode;
    }
    throw err;
  }

  const options = program.opts<CliOptions>();
  logger.setLogLevel(pickLogLevel(options, env));

  const params = { source_path: options.source, target_path: options.target };
  const dbPath = resolveUserPath(options.db, env);
  const extractVideoDate = createVideoDateExtractor({
    probeCommand: options.probe === false ? null : options.probe,
  });

  try {
    await prepareRun(params);
    const summary = await withAuditLog(dbPath, (audit) =>
      runOrganize(params, { audit, extractVideoDate }, logProgress),
    );
    if (options.json) {
      console.log(JSON.stringify(summary, null, 2));
    } else {
      printSummary(summary, dbPath);
    }
    return 0;
  } catch (err) {
    if (err instanceof SetupError) {
      logger.error(err.message);
    } else {
      logger.error(`Organize failed: ${formatError(err)}`);
    }
    return 1;
  }
}
