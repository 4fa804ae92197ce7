export { ErrorCodes, SqliteAuditLog, WarningCodes, withAuditLog } from "./audit/audit-log.js";
export type { AuditLogOptions, AuditSink, ErrorCode, WarningCode } from "./audit/audit-log.js";
export { runCli } from "./cli/program.js";
export {
  resolveAuditDbPath,
  resolveProbeCommand,
  resolveStateDir,
  resolveTargetLayout,
  resolveUserPath,
} from "./config/paths.js";
export type { TargetLayout } from "./config/paths.js";
export { MoveError, SetupError } from "./errors.js";
export type { SetupErrorCode } from "./errors.js";
export { classifyFile } from "./media/classify.js";
export { extractFilenameDate } from "./media/filename-date.js";
export { extractImageDate } from "./media/image-date.js";
export { FsFileMover } from "./media/move.js";
export type { FileMover, MoveResult } from "./media/move.js";
export { prepareRun, runOrganize } from "./media/organize.js";
export type { OrganizeDeps } from "./media/organize.js";
export { route } from "./media/route.js";
export { createVideoDateExtractor } from "./media/video-date.js";
export type { ProbeRunner, VideoDateExtractor, VideoDateOptions } from "./media/video-date.js";
export type * from "./media/types.js";
export { VERSION } from "./version.js";
