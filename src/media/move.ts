import fs from "node:fs/promises";
import path from "node:path";
import { errorCode, formatError, MoveError } from "../errors.js";

export type MoveResult = { ok: true; final_path: string } | { ok: false; error: string };

export interface FileMover {
  move(src: string, destFolder: string): Promise<MoveResult>;
}

async function pathExists(p: string): Promise<boolean> {
  try {
    await fs.lstat(p);
    return true;
  } catch {
    return false;
  }
}

/**
 * Copy through a `.partial` file, then drop the source. If the source cannot be
 * removed the copy is removed instead, so the file is never in two places.
 */
async function copyAcrossDevices(src: string, dst: string): Promise<void> {
  const partial = dst + ".partial";
  try {
    await fs.copyFile(src, partial, fs.constants.COPYFILE_EXCL);
    await fs.rename(partial, dst);
  } catch (err) {
    await fs.rm(partial, { force: true });
    throw err;
  }

  try {
    await fs.unlink(src);
  } catch (err) {
    await fs.rm(dst, { force: true });
    throw err;
  }
}

async function renameOrCopy(src: string, dst: string): Promise<void> {
  try {
    await fs.rename(src, dst);
  } catch (err) {
    if (errorCode(err) !== "EXDEV") {
      throw err;
    }
    await copyAcrossDevices(src, dst);
  }
}

/**
 * Moves files into folders, creating each folder (and its parents) on first use.
 * Existing files at the destination are never overwritten.
 */
export class FsFileMover implements FileMover {
  private readonly knownFolders = new Set<string>();

  async ensureFolder(folder: string): Promise<void> {
    const resolved = path.resolve(folder);
    if (this.knownFolders.has(resolved)) {
      return;
    }
    await fs.mkdir(resolved, { recursive: true });
    this.knownFolders.add(resolved);
  }

  async move(src: string, destFolder: string): Promise<MoveResult> {
    const dst = path.join(destFolder, path.basename(src));
    try {
      await this.ensureFolder(destFolder);

      if (path.resolve(src) === path.resolve(dst)) {
        return { ok: true, final_path: dst };
      }
      if (await pathExists(dst)) {
        throw new Error(`destination already exists: ${dst}`);
      }

      await renameOrCopy(src, dst);
      return { ok: true, final_path: dst };
    } catch (err) {
      // Folder may have been removed under us; re-check next time
      this.knownFolders.delete(path.resolve(destFolder));
      return { ok: false, error: formatError(new MoveError(src, dst, { cause: err })) };
    }
  }
}
