import { CliError } from "../errors.ts";
import type { BackupConfig, StatusCodeField } from "../types.ts";
import { expandHome } from "./path-utils.ts";

export type PartialConfig = Partial<BackupConfig>;

export const DEFAULT_STATUS_CONFIG_ERROR = 10;

/** YAML key for every configuration property. */
export const configKeys: Record<keyof BackupConfig, string> = {
  backupDirPath: "backup_dir_path",
  useCurrentDirName: "use_current_dir_name",
  configSearchOverride: "config",
  statusCreatedBackup: "status_created_backup",
  statusFileIdentical: "status_file_is_identical_to_existing_backup",
  statusFileNotFound: "status_file_not_found",
  statusInvalidFileType: "status_invalid_file_type",
  statusPermissionDenied: "status_permission_denied",
  statusDiskFull: "status_disk_full",
  statusFailedCreateDir: "status_failed_to_create_backup_directory",
  statusConfigError: "status_config_error",
};

export const configProperties: readonly (keyof BackupConfig)[] = [
  "backupDirPath",
  "useCurrentDirName",
  "configSearchOverride",
  "statusCreatedBackup",
  "statusFileIdentical",
  "statusFileNotFound",
  "statusInvalidFileType",
  "statusPermissionDenied",
  "statusDiskFull",
  "statusFailedCreateDir",
  "statusConfigError",
];

const statusCodeFields: readonly StatusCodeField[] = [
  "statusCreatedBackup",
  "statusFileIdentical",
  "statusFileNotFound",
  "statusInvalidFileType",
  "statusPermissionDenied",
  "statusDiskFull",
  "statusFailedCreateDir",
  "statusConfigError",
];

/**
 * Builds a partial config holding only the keys the document mentions, so an
 * explicit `false` or `0` overrides a default just like any other value.
 */
export function parsePartialConfig(
  raw: Record<string, unknown>,
  env: Record<string, string | undefined>,
  source: string,
): PartialConfig {
  const partial: PartialConfig = {};

  if (has(raw, configKeys.backupDirPath)) {
    const value = asString(raw[configKeys.backupDirPath], configKeys.backupDirPath, source);
    if (value !== "") {
      partial.backupDirPath = expandHome(value, env);
    }
  }

  if (has(raw, configKeys.useCurrentDirName)) {
    partial.useCurrentDirName = asBoolean(
      raw[configKeys.useCurrentDirName],
      configKeys.useCurrentDirName,
      source,
    );
  }

  if (has(raw, configKeys.configSearchOverride)) {
    const value = asString(raw[configKeys.configSearchOverride], configKeys.configSearchOverride, source);
    if (value !== "") {
      partial.configSearchOverride = value;
    }
  }

  for (const field of statusCodeFields) {
    const key = configKeys[field];
    if (has(raw, key)) {
      partial[field] = asInteger(raw[key], key, source);
    }
  }

  return partial;
}

function has(raw: Record<string, unknown>, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(raw, key);
}

function asString(value: unknown, key: string, source: string): string {
  if (value === null) return "";
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  throw schemaError(`${key} must be a string`, source);
}

// YAML 1.1 boolean words, still accepted for boolean fields.
const legacyBooleans: Record<string, boolean> = {
  y: true,
  Y: true,
  yes: true,
  Yes: true,
  YES: true,
  on: true,
  On: true,
  ON: true,
  n: false,
  N: false,
  no: false,
  No: false,
  NO: false,
  off: false,
  Off: false,
  OFF: false,
};

function asBoolean(value: unknown, key: string, source: string): boolean {
  if (value === null) return false;
  if (typeof value === "boolean") return value;
  if (typeof value === "string" && Object.prototype.hasOwnProperty.call(legacyBooleans, value)) {
    return legacyBooleans[value];
  }
  throw schemaError(`${key} must be a boolean`, source);
}

function asInteger(value: unknown, key: string, source: string): number {
  if (value === null) return 0;
  if (typeof value !== "number" || !Number.isInteger(value)) {
    throw schemaError(`${key} must be an integer`, source);
  }
  return value;
}

function schemaError(message: string, source: string): CliError {
  return new CliError(`invalid config file ${source}: ${message}`, "ERR_CONFIG_SCHEMA", DEFAULT_STATUS_CONFIG_ERROR);
}
