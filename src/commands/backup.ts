import { createStyle } from "../cli/help.ts";
import { loadConfig } from "../config.ts";
import { createBackup } from "../core/backup-engine.ts";
import { configFailure } from "./config.ts";
import type { BackupConfig, CommandResult, RuntimeOptions } from "../types.ts";

export interface BackupCommandOptions extends RuntimeOptions {
  dryRun?: boolean;
  color?: boolean;
}

export async function runBackup(
  filePath: string,
  note: string,
  options: BackupCommandOptions = {},
): Promise<CommandResult> {
  const stdout: string[] = [];
  const stderr: string[] = [];
  const style = createStyle(options.color ?? false);

  let config: BackupConfig;
  try {
    config = await loadConfig(".", options);
  } catch (error) {
    return configFailure(error);
  }

  const outcome = await createBackup(config, filePath, note, options);
  await options.logger?.debug(`backup outcome=${outcome.kind} status=${outcome.statusCode}`);

  switch (outcome.kind) {
    case "created":
      stdout.push(`${outcome.dryRun ? "Would create backup" : "Created backup"}: ${style.path(outcome.path)}`);
      break;
    case "identical":
      stdout.push(`File is identical to existing backup: ${style.path(outcome.path)}`);
      break;
    default:
      stderr.push(style.error(outcome.message));
  }

  return { exitCode: outcome.statusCode, stdout, stderr };
}
