import os from "node:os";
import path from "node:path";

const STATE_DIRNAME = ".mediasort";
const DATABASE_DIRNAME = "database";
const DATABASE_FILENAME = "mediasort.db";
const DEFAULT_PROBE_COMMAND = "ffprobe";

export const TO_SORT_DIRNAME = "to_sort";
export const UNPROCESSABLE_DIRNAME = "unprocessable";

export type TargetLayout = {
  root: string;
  toSort: string;
  unprocessable: string;
};

function resolveHomeDir(env: NodeJS.ProcessEnv, homedir: () => string): string {
  const override = env.MEDIASORT_HOME?.trim();
  if (override) {
    return path.resolve(override);
  }
  return homedir();
}

/**
 * Expand a leading `~` and resolve to an absolute path.
 * Empty input stays empty so callers can detect "unset".
 */
export function resolveUserPath(
  input: string,
  env: NodeJS.ProcessEnv = process.env,
  homedir: () => string = os.homedir,
): string {
  const trimmed = input.trim();
  if (!trimmed) {
    return trimmed;
  }
  if (trimmed === "~") {
    return path.resolve(resolveHomeDir(env, homedir));
  }
  if (trimmed.startsWith("~/") || trimmed.startsWith("~\\")) {
    return path.resolve(resolveHomeDir(env, homedir), trimmed.slice(2));
  }
  return path.resolve(trimmed);
}

/**
 * State directory for the audit database.
 * Can be overridden via MEDIASORT_STATE_DIR.
 * Default: ~/.mediasort
 */
export function resolveStateDir(
  env: NodeJS.ProcessEnv = process.env,
  homedir: () => string = os.homedir,
): string {
  const override = env.MEDIASORT_STATE_DIR?.trim();
  if (override) {
    return resolveUserPath(override, env, homedir);
  }
  return path.join(resolveHomeDir(env, homedir), STATE_DIRNAME);
}

/**
 * Audit database path. MEDIASORT_DB_PATH wins over the state directory.
 */
export function resolveAuditDbPath(
  env: NodeJS.ProcessEnv = process.env,
  stateDir: string = resolveStateDir(env),
): string {
  const override = env.MEDIASORT_DB_PATH?.trim();
  if (override) {
    return resolveUserPath(override, env);
  }
  return path.join(stateDir, DATABASE_DIRNAME, DATABASE_FILENAME);
}

export function resolveProbeCommand(env: NodeJS.ProcessEnv = process.env): string {
  return env.MEDIASORT_FFPROBE?.trim() || DEFAULT_PROBE_COMMAND;
}

export function resolveTargetLayout(targetRoot: string): TargetLayout {
  return {
    root: targetRoot,
    toSort: path.join(targetRoot, TO_SORT_DIRNAME),
    unprocessable: path.join(targetRoot, UNPROCESSABLE_DIRNAME),
  };
}
