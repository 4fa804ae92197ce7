import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { FsFileMover } from "./move.js";

function fsError(code: string): NodeJS.ErrnoException {
  return Object.assign(new Error(`${code}: simulated failure`), { code });
}

async function exists(p: string): Promise<boolean> {
  try {
    await fs.lstat(p);
    return true;
  } catch {
    return false;
  }
}

describe("FsFileMover", () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "mediasort-move-test-"));
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it("creates missing parent folders and moves the file", async () => {
    const src = path.join(tmpDir, "IMG_0001.jpg");
    await fs.writeFile(src, "jpg-bytes");
    const dest = path.join(tmpDir, "out", "2021", "03");

    const result = await new FsFileMover().move(src, dest);

    expect(result).toEqual({ ok: true, final_path: path.join(dest, "IMG_0001.jpg") });
    expect(await fs.readFile(path.join(dest, "IMG_0001.jpg"), "utf-8")).toBe("jpg-bytes");
    await expect(fs.stat(src)).rejects.toThrow();
  });

  it("reuses an existing folder", async () => {
    const dest = path.join(tmpDir, "out");
    await fs.mkdir(dest);
    const mover = new FsFileMover();
    for (const name of ["a.jpg", "b.jpg"]) {
      await fs.writeFile(path.join(tmpDir, name), name);
      const result = await mover.move(path.join(tmpDir, name), dest);
      expect(result.ok).toBe(true);
    }
    expect((await fs.readdir(dest)).sort()).toEqual(["a.jpg", "b.jpg"]);
  });

  it("refuses to overwrite an existing destination file", async () => {
    const src = path.join(tmpDir, "clip.mp4");
    const dest = path.join(tmpDir, "out");
    await fs.writeFile(src, "new");
    await fs.mkdir(dest);
    await fs.writeFile(path.join(dest, "clip.mp4"), "old");

    const result = await new FsFileMover().move(src, dest);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toContain("destination already exists");
    }
    expect(await fs.readFile(src, "utf-8")).toBe("new");
    expect(await fs.readFile(path.join(dest, "clip.mp4"), "utf-8")).toBe("old");
  });

  it("treats a file already in its destination folder as moved", async () => {
    const src = path.join(tmpDir, "same.jpg");
    await fs.writeFile(src, "x");
    const result = await new FsFileMover().move(src, tmpDir);
    expect(result).toEqual({ ok: true, final_path: src });
  });

  it("reports a missing source as a failure instead of throwing", async () => {
    const mover = new FsFileMover();
    const result = await mover.move(path.join(tmpDir, "gone.jpg"), path.join(tmpDir, "out"));
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toContain("gone.jpg");
    }
  });

  it("fails when the destination folder cannot be created", async () => {
    const blocker = path.join(tmpDir, "blocker");
    await fs.writeFile(blocker, "a file where a folder should be");
    const src = path.join(tmpDir, "IMG_0002.jpg");
    await fs.writeFile(src, "x");

    const result = await new FsFileMover().move(src, path.join(blocker, "2020"));

    expect(result.ok).toBe(false);
    expect(await fs.readFile(src, "utf-8")).toBe("x");
  });

  describe("across devices", () => {
    let src: string;
    let dest: string;
    let dst: string;

    beforeEach(async () => {
      src = path.join(tmpDir, "VID_0001.mp4");
      dest = path.join(tmpDir, "out");
      dst = path.join(dest, "VID_0001.mp4");
      await fs.writeFile(src, "mp4-bytes");
      vi.spyOn(fs, "rename").mockRejectedValueOnce(fsError("EXDEV"));
    });

    it("copies then removes the source when rename crosses devices", async () => {
      const result = await new FsFileMover().move(src, dest);

      expect(result).toEqual({ ok: true, final_path: dst });
      expect(await fs.readFile(dst, "utf-8")).toBe("mp4-bytes");
      expect(await exists(src)).toBe(false);
      expect(await exists(dst + ".partial")).toBe(false);
    });

    it("removes the copy when the source cannot be deleted", async () => {
      vi.spyOn(fs, "unlink").mockRejectedValueOnce(fsError("EACCES"));

      const result = await new FsFileMover().move(src, dest);

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toContain("EACCES");
      }
      expect(await fs.readFile(src, "utf-8")).toBe("mp4-bytes");
      expect(await exists(dst)).toBe(false);
      expect(await exists(dst + ".partial")).toBe(false);
    });

    it("leaves no partial or destination file when the copy fails", async () => {
      vi.spyOn(fs, "copyFile").mockImplementationOnce(async (_from, to) => {
        await fs.writeFile(to, "mp4");
        throw fsError("ENOSPC");
      });

      const result = await new FsFileMover().move(src, dest);

      expect(result.ok).toBe(false);
      expect(await fs.readFile(src, "utf-8")).toBe("mp4-bytes");
      expect(await exists(dst)).toBe(false);
      expect(await exists(dst + ".partial")).toBe(false);

      const retry = await new FsFileMover().move(src, dest);
      expect(retry).toEqual({ ok: true, final_path: dst });
    });
  });
});
