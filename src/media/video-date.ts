import { execFile } from "node:child_process";
import fs from "node:fs/promises";
import { type Static, Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import type { DateEvidence } from "./types.js";
import * as logger from "../logging/logger.js";
import { formatError } from "../errors.js";
import { makeEvidence } from "./types.js";

/** Runs the probe binary and resolves with its stdout; rejects on spawn failure or non-zero exit. */
export type ProbeRunner = (command: string, args: string[]) => Promise<string>;

export type VideoDateOptions = {
  /** Probe binary to invoke. `null` disables the probe strategy. */
  probeCommand?: string | null;
  probe?: ProbeRunner;
};

export type VideoDateExtractor = (filePath: string) => Promise<DateEvidence | null>;

type VideoDateStrategy = {
  label: string;
  run: (filePath: string) => Promise<DateEvidence | null>;
};

const PROBE_ARGS = ["-v", "quiet", "-print_format", "json", "-show_format", "-show_streams"];

const PROBE_DATE_TAGS = ["creation_time", "date", "DateTimeOriginal"] as const;

const PROBE_MAX_BUFFER = 8 * 1024 * 1024;

// Filesystem dates at or before this year are treated as unset defaults
const MIN_PLAUSIBLE_FS_YEAR = 1980;

// mvhd creation time of zero decodes to this instant
const QUICKTIME_EPOCH_MS = Date.UTC(1904, 0, 1);

const ProbeTagsSchema = Type.Record(Type.String(), Type.Unknown());

const ProbeOutputSchema = Type.Object({
  format: Type.Optional(Type.Object({ tags: Type.Optional(ProbeTagsSchema) })),
  streams: Type.Optional(Type.Array(Type.Object({ tags: Type.Optional(ProbeTagsSchema) }))),
});

type ProbeOutput = Static<typeof ProbeOutputSchema>;

type TimestampFormat = {
  label: string;
  regex: RegExp;
};

// Exact-match formats, tried in order. Year and month are read as written.
export const PROBE_TIMESTAMP_FORMATS: readonly TimestampFormat[] = [
  {
    label: "iso-fractional",
    regex: /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})\.\d{1,6}Z$/,
  },
  { label: "space-separated", regex: /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})$/ },
  { label: "colon-separated", regex: /^(\d{4}):(\d{2}):(\d{2}) (\d{2}):(\d{2}):(\d{2})$/ },
];

function isValidClock(day: number, hour: number, minute: number, second: number): boolean {
  return day >= 1 && day <= 31 && hour <= 23 && minute <= 59 && second <= 61;
}

export function parseProbeTimestamp(value: unknown): DateEvidence | null {
  if (typeof value !== "string") {
    return null;
  }
  for (const format of PROBE_TIMESTAMP_FORMATS) {
    const match = format.regex.exec(value);
    if (!match) {
      continue;
    }
    const [, year, month, day, hour, minute, second] = match.map(Number);
    if (!isValidClock(day, hour, minute, second)) {
      continue;
    }
    const evidence = makeEvidence(year, month);
    if (evidence) {
      return evidence;
    }
  }
  return null;
}

function probeTagDictionaries(output: ProbeOutput): Record<string, unknown>[] {
  const dictionaries: Record<string, unknown>[] = [];
  if (output.format?.tags) {
    dictionaries.push(output.format.tags);
  }
  for (const stream of output.streams ?? []) {
    if (stream.tags) {
      dictionaries.push(stream.tags);
    }
  }
  return dictionaries;
}

/**
 * Find a capture month in probe JSON output. Container tags are scanned before
 * stream tags; malformed output yields null.
 */
export function parseProbeOutput(stdout: string): DateEvidence | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(stdout);
  } catch {
    return null;
  }
  if (!Value.Check(ProbeOutputSchema, parsed)) {
    return null;
  }
  for (const tags of probeTagDictionaries(parsed)) {
    for (const key of PROBE_DATE_TAGS) {
      if (!(key in tags)) {
        continue;
      }
      const evidence = parseProbeTimestamp(tags[key]);
      if (evidence) {
        return evidence;
      }
    }
  }
  return null;
}

export const execProbe: ProbeRunner = (command, args) =>
  new Promise<string>((resolve, reject) => {
    execFile(command, args, { maxBuffer: PROBE_MAX_BUFFER }, (err, stdout) => {
      if (err) {
        reject(err);
        return;
      }
      resolve(stdout);
    });
  });

function evidenceFromContainerDate(value: unknown): DateEvidence | null {
  if (value instanceof Date) {
    const ms = value.getTime();
    if (Number.isNaN(ms) || ms === QUICKTIME_EPOCH_MS) {
      return null;
    }
    return makeEvidence(value.getUTCFullYear(), value.getUTCMonth() + 1);
  }
  if (typeof value === "string") {
    const match = /^(\d{4})-(\d{2})/.exec(value.trim());
    return match ? makeEvidence(Number(match[1]), Number(match[2])) : null;
  }
  return null;
}

async function fromContainerMetadata(filePath: string): Promise<DateEvidence | null> {
  const { parseFile } = await import("music-metadata");
  const metadata = await parseFile(filePath, { duration: false, skipCovers: true });
  const candidates: unknown[] = [
    metadata.format.creationTime,
    metadata.common.date,
    metadata.common.originaldate,
  ];
  for (const candidate of candidates) {
    const evidence = evidenceFromContainerDate(candidate);
    if (evidence) {
      return evidence;
    }
  }
  return null;
}

function plausibleFsEvidence(date: Date): DateEvidence | null {
  if (Number.isNaN(date.getTime()) || date.getFullYear() <= MIN_PLAUSIBLE_FS_YEAR) {
    return null;
  }
  return makeEvidence(date.getFullYear(), date.getMonth() + 1);
}

/**
 * Creation time, then modification time, on the local calendar. A creation time
 * later than the modification time means the file was copied with only its mtime
 * preserved, so it is skipped.
 */
export async function fromFilesystemTimes(filePath: string): Promise<DateEvidence | null> {
  const stat = await fs.stat(filePath);
  const candidates: Date[] = [];
  if (stat.birthtimeMs <= stat.mtimeMs) {
    candidates.push(stat.birthtime);
  }
  candidates.push(stat.mtime);
  for (const candidate of candidates) {
    const evidence = plausibleFsEvidence(candidate);
    if (evidence) {
      return evidence;
    }
  }
  return null;
}

export function createVideoDateExtractor(options: VideoDateOptions = {}): VideoDateExtractor {
  const probeCommand = options.probeCommand === undefined ? "ffprobe" : options.probeCommand;
  const probe = options.probe ?? execProbe;

  const strategies: VideoDateStrategy[] = [
    { label: "container metadata", run: fromContainerMetadata },
  ];
  if (probeCommand) {
    strategies.push({
      label: `${probeCommand} probe`,
      run: async (filePath) => parseProbeOutput(await probe(probeCommand, [...PROBE_ARGS, filePath])),
    });
  }
  strategies.push({ label: "filesystem timestamps", run: fromFilesystemTimes });

  return async (filePath) => {
    for (const strategy of strategies) {
      try {
        const evidence = await strategy.run(filePath);
        if (evidence) {
          logger.debug(`${filePath}: date from ${strategy.label}`);
          return evidence;
        }
      } catch (err) {
        logger.debug(`${strategy.label} failed for ${filePath}: ${formatError(err)}`);
      }
    }
    return null;
  };
}
