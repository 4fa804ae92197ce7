import path from "node:path";
import { describe, expect, it } from "vitest";
import {
  resolveAuditDbPath,
  resolveProbeCommand,
  resolveStateDir,
  resolveTargetLayout,
  resolveUserPath,
} from "./paths.js";

describe("state + database paths", () => {
  it("defaults the state dir under the home directory", () => {
    expect(resolveStateDir({}, () => "/home/test")).toBe(path.join("/home/test", ".mediasort"));
  });

  it("uses MEDIASORT_STATE_DIR when set", () => {
    const env = { MEDIASORT_STATE_DIR: "/srv/state" };
    expect(resolveStateDir(env, () => "/home/test")).toBe(path.resolve("/srv/state"));
  });

  it("expands ~ in MEDIASORT_STATE_DIR", () => {
    const env = { MEDIASORT_STATE_DIR: "~/custom-state" };
    expect(resolveStateDir(env, () => "/home/test")).toBe(
      path.resolve("/home/test", "custom-state"),
    );
  });

  it("uses MEDIASORT_HOME for the default state location", () => {
    const env = { MEDIASORT_HOME: "/srv/home" };
    expect(resolveStateDir(env, () => "/home/test")).toBe(
      path.join(path.resolve("/srv/home"), ".mediasort"),
    );
  });

  it("puts the database under <state>/database", () => {
    expect(resolveAuditDbPath({}, "/srv/state")).toBe(
      path.join("/srv/state", "database", "mediasort.db"),
    );
  });

  it("prefers MEDIASORT_DB_PATH over the state dir", () => {
    expect(resolveAuditDbPath({ MEDIASORT_DB_PATH: "/tmp/audit.db" }, "/srv/state")).toBe(
      path.resolve("/tmp/audit.db"),
    );
  });
});

describe("resolveUserPath", () => {
  it("keeps empty input empty", () => {
    expect(resolveUserPath("   ")).toBe("");
  });

  it("resolves a bare ~ to the home directory", () => {
    expect(resolveUserPath("~", {}, () => "/home/test")).toBe(path.resolve("/home/test"));
  });

  it("resolves relative paths against the cwd", () => {
    expect(resolveUserPath("photos")).toBe(path.resolve("photos"));
  });
});

describe("resolveProbeCommand", () => {
  it("defaults to ffprobe", () => {
    expect(resolveProbeCommand({})).toBe("ffprobe");
  });

  it("honours MEDIASORT_FFPROBE", () => {
    expect(resolveProbeCommand({ MEDIASORT_FFPROBE: "/opt/bin/ffprobe" })).toBe(
      "/opt/bin/ffprobe",
    );
  });
});

describe("resolveTargetLayout", () => {
  it("places holding and quarantine folders under the target root", () => {
    expect(resolveTargetLayout("/data/out")).toEqual({
      root: "/data/out",
      toSort: path.join("/data/out", "to_sort"),
      unprocessable: path.join("/data/out", "unprocessable"),
    });
  });
});
