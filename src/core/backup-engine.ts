import { mkdir, stat } from "node:fs/promises";
import type { Stats } from "node:fs";
import { basename, dirname, join, resolve } from "node:path";
import { silentLogger } from "../debug/logger.ts";
import { errorMessage } from "../errors.ts";
import type { Backup, BackupConfig, BackupFailureKind, BackupOutcome, RuntimeOptions } from "../types.ts";
import { listBackups } from "./backup-inventory.ts";
import { formatBackupTimestamp, generateBackupName } from "./backup-naming.ts";
import { compareFiles, copyFile, isDiskSpaceError, isNotFoundError, isPermissionError } from "./file-ops.ts";
import { toWorkingRelative } from "./path-utils.ts";

export interface CreateBackupOptions extends RuntimeOptions {
  dryRun?: boolean;
}

/**
 * Backs up one file. Every failure is classified into an outcome carrying
 * the configured status code; nothing is thrown.
 */
export async function createBackup(
  config: BackupConfig,
  filePath: string,
  note: string,
  options: CreateBackupOptions = {},
): Promise<BackupOutcome> {
  const cwd = options.cwd ?? process.cwd();
  const now = options.now ?? (() => new Date());
  const logger = options.logger ?? silentLogger;
  const fail = (kind: BackupFailureKind, message: string, path?: string): BackupOutcome => ({
    kind,
    statusCode: statusFor(config, kind),
    message,
    path,
  });

  let info: Stats;
  try {
    info = await stat(resolve(cwd, filePath));
  } catch (error) {
    if (isNotFoundError(error)) return fail("not_found", `file not found: ${filePath}`, filePath);
    if (isPermissionError(error)) return fail("permission_denied", `permission denied: ${filePath}`, filePath);
    return fail("config_error", `failed to get file info: ${errorMessage(error)}`, filePath);
  }
  if (!info.isFile()) {
    return fail("invalid_type", `not a regular file: ${filePath}`, filePath);
  }

  let sourcePath: string;
  try {
    sourcePath = toWorkingRelative(filePath, cwd);
  } catch (error) {
    return fail("config_error", `failed to resolve path: ${errorMessage(error)}`, filePath);
  }

  let existing: Backup[];
  try {
    existing = await listBackups(config.backupDirPath, filePath, { cwd });
  } catch (error) {
    return fail("config_error", `failed to list existing backups: ${errorMessage(error)}`);
  }
  await logger.debug(`backup: ${existing.length} existing backup(s) for ${sourcePath}`);

  const mostRecent = existing[0];
  if (mostRecent) {
    let identical: boolean;
    try {
      identical = await compareFiles(resolve(cwd, filePath), resolve(cwd, mostRecent.path));
    } catch (error) {
      return fail("config_error", `failed to compare files: ${errorMessage(error)}`, mostRecent.path);
    }
    if (identical) {
      return { kind: "identical", statusCode: config.statusFileIdentical, path: mostRecent.path };
    }
  }

  const backupName = generateBackupName(basename(sourcePath), formatBackupTimestamp(now()), note);
  const backupDir = join(config.backupDirPath, dirname(sourcePath));
  const backupPath = join(backupDir, backupName);

  if (options.dryRun) {
    return { kind: "created", statusCode: config.statusCreatedBackup, path: backupPath, dryRun: true };
  }

  try {
    await mkdir(resolve(cwd, backupDir), { recursive: true, mode: 0o755 });
  } catch (error) {
    const message = `failed to create backup directory: ${errorMessage(error)}`;
    if (isPermissionError(error)) return fail("permission_denied", message, backupDir);
    if (isDiskSpaceError(error)) return fail("disk_full", message, backupDir);
    return fail("dir_create_failed", message, backupDir);
  }

  try {
    await copyFile(resolve(cwd, filePath), resolve(cwd, backupPath));
  } catch (error) {
    const message = `failed to create backup: ${errorMessage(error)}`;
    if (isPermissionError(error)) return fail("permission_denied", message, backupPath);
    if (isDiskSpaceError(error)) return fail("disk_full", message, backupPath);
    return fail("config_error", message, backupPath);
  }

  await logger.debug(`backup: wrote ${backupPath}`);
  return { kind: "created", statusCode: config.statusCreatedBackup, path: backupPath, dryRun: false };
}

export function statusFor(config: BackupConfig, kind: BackupOutcome["kind"]): number {
  switch (kind) {
    case "created":
      return config.statusCreatedBackup;
    case "identical":
      return config.statusFileIdentical;
    case "not_found":
      return config.statusFileNotFound;
    case "invalid_type":
      return config.statusInvalidFileType;
    case "permission_denied":
      return config.statusPermissionDenied;
    case "disk_full":
      return config.statusDiskFull;
    case "dir_create_failed":
      return config.statusFailedCreateDir;
    case "config_error":
      return config.statusConfigError;
  }
}
