/**
 * Operator-facing log with coloured level markers.
 */

import chalk from "chalk";

export type LogLevel = "silent" | "error" | "warn" | "info" | "debug";

const LEVEL_ORDER: Record<LogLevel, number> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const raw = env.MEDIASORT_LOG_LEVEL?.trim().toLowerCase();
  if (raw && isLogLevel(raw)) {
    return raw;
  }
  if (env.MEDIASORT_DEBUG || env.DEBUG) {
    return "debug";
  }
  return "info";
}

let currentLevel: LogLevel = resolveLogLevel();

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

function enabled(level: Exclude<LogLevel, "silent">): boolean {
  return LEVEL_ORDER[currentLevel] >= LEVEL_ORDER[level];
}

export function info(message: string): void {
  if (enabled("info")) {
    console.log(chalk.blue("ℹ"), message);
  }
}

export function success(message: string): void {
  if (enabled("info")) {
    console.log(chalk.green("✓"), message);
  }
}

export function warn(message: string): void {
  if (enabled("warn")) {
    console.warn(chalk.yellow("⚠"), message);
  }
}

export function error(message: string): void {
  if (enabled("error")) {
    console.error(chalk.red("✗"), message);
  }
}

export function debug(message: string): void {
  if (enabled("debug")) {
    console.log(chalk.gray("⋯"), message);
  }
}

export function heading(message: string): void {
  if (!enabled("info")) {
    return;
  }
  console.log();
  console.log(chalk.bold.underline(message));
  console.log();
}

export function table(rows: [string, string][]): void {
  if (!enabled("info") || rows.length === 0) {
    return;
  }
  const maxKeyLen = Math.max(...rows.map(([k]) => k.length));
  for (const [key, value] of rows) {
    console.log(`  ${chalk.dim(key.padEnd(maxKeyLen))}  ${value}`);
  }
}
