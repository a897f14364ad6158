import type { DebugLogger } from "./debug/logger.ts";

export interface BackupConfig {
  backupDirPath: string;
  useCurrentDirName: boolean;
  configSearchOverride: string;
  statusCreatedBackup: number;
  statusFileIdentical: number;
  statusFileNotFound: number;
  statusInvalidFileType: number;
  statusPermissionDenied: number;
  statusDiskFull: number;
  statusFailedCreateDir: number;
  statusConfigError: number;
}

export type StatusCodeField =
  | "statusCreatedBackup"
  | "statusFileIdentical"
  | "statusFileNotFound"
  | "statusInvalidFileType"
  | "statusPermissionDenied"
  | "statusDiskFull"
  | "statusFailedCreateDir"
  | "statusConfigError";

/** One resolved configuration field and where its value came from. */
export interface ConfigValue {
  name: string;
  value: string;
  source: string;
}

export interface Backup {
  name: string;
  path: string;
  creationTime: Date;
  sourceFile: string;
  note: string;
}

export type BackupFailureKind =
  | "not_found"
  | "invalid_type"
  | "permission_denied"
  | "disk_full"
  | "dir_create_failed"
  | "config_error";

export type BackupOutcome =
  | { kind: "created"; statusCode: number; path: string; dryRun: boolean }
  | { kind: "identical"; statusCode: number; path: string }
  | { kind: BackupFailureKind; statusCode: number; message: string; path?: string };

export interface RuntimeOptions {
  env?: Record<string, string | undefined>;
  cwd?: string;
  now?: () => Date;
  version?: string;
  isTTY?: boolean;
  logger?: DebugLogger;
}

export interface CommandResult {
  exitCode: number;
  stdout: string[];
  stderr: string[];
}
