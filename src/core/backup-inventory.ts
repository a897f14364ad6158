import type { Dirent } from "node:fs";
import { lstat, readdir } from "node:fs/promises";
import { basename, dirname, join, resolve } from "node:path";
import { errorCode } from "../errors.ts";
import type { Backup } from "../types.ts";
import { isBackupOf, noteFromBackupName } from "./backup-naming.ts";
import { isNotFoundError } from "./file-ops.ts";
import { toWorkingRelative } from "./path-utils.ts";

export interface ListBackupsOptions {
  cwd?: string;
}

/**
 * Backups of `sourceFile` under `backupRoot`, most recent first. A missing
 * backup root or mirror directory means there are no backups yet.
 */
export async function listBackups(
  backupRoot: string,
  sourceFile: string,
  options: ListBackupsOptions = {},
): Promise<Backup[]> {
  const cwd = options.cwd ?? process.cwd();
  const sourcePath = toWorkingRelative(sourceFile, cwd);
  const fileName = basename(sourcePath);
  const backupDir = join(backupRoot, dirname(sourcePath));

  let entries: Dirent[];
  try {
    entries = await readdir(resolve(cwd, backupDir), { withFileTypes: true });
  } catch (error) {
    if (isNotFoundError(error)) {
      return [];
    }
    throw error;
  }

  const backups: Backup[] = [];
  for (const entry of entries) {
    if (entry.isDirectory() || !isBackupOf(entry.name, fileName)) continue;

    const path = join(backupDir, entry.name);
    let modified: Date;
    try {
      modified = (await lstat(resolve(cwd, path))).mtime;
    } catch (error) {
      // Entry vanished between readdir and lstat.
      if (errorCode(error) === "ENOENT") continue;
      throw error;
    }

    backups.push({
      name: entry.name,
      path,
      creationTime: modified,
      sourceFile,
      note: noteFromBackupName(entry.name),
    });
  }

  return backups.sort(newestFirst);
}

function newestFirst(a: Backup, b: Backup): number {
  const byTime = b.creationTime.getTime() - a.creationTime.getTime();
  if (byTime !== 0) return byTime;
  return a.name < b.name ? 1 : a.name > b.name ? -1 : 0;
}
